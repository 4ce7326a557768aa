import type {Logger as Winston} from "winston";
import {LogData, LogLevel, ModuleLogger} from "./interface.js";

/**
 * `ModuleLogger` writing to a winston instance shared by the whole module tree.
 * Children only differ by the `module` field of their entries, so they share transports.
 */
export class WinstonLogger implements ModuleLogger {
  constructor(
    private readonly winston: Winston,
    readonly module: string
  ) {}

  error(message: string, context?: LogData, error?: Error): void {
    this.log(LogLevel.error, message, context, error);
  }

  warn(message: string, context?: LogData, error?: Error): void {
    this.log(LogLevel.warn, message, context, error);
  }

  info(message: string, context?: LogData, error?: Error): void {
    this.log(LogLevel.info, message, context, error);
  }

  verbose(message: string, context?: LogData, error?: Error): void {
    this.log(LogLevel.verbose, message, context, error);
  }

  debug(message: string, context?: LogData, error?: Error): void {
    this.log(LogLevel.debug, message, context, error);
  }

  child(module: string): WinstonLogger {
    return new WinstonLogger(this.winston, this.module ? `${this.module}/${module}` : module);
  }

  private log(level: LogLevel, message: string, context?: LogData, error?: Error): void {
    // Passing a single object skips winston's splat handling, the formats read the fields as is
    this.winston.log(level, {message, module: this.module, context, error});
  }
}
