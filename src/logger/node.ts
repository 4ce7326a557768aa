// We want to keep `winston` export as it's more readable and easier to understand
/* eslint-disable import/no-named-as-default-member */
import winston from "winston";
import type TransportStream from "winston-transport";
import {LogFormat, LogLevel, logLevelNum, logLevels, ModuleLogger, TimestampFormat} from "./interface.js";
import {getFormat} from "./utils/format.js";
import {moduleLevelFilter} from "./utils/moduleLevel.js";
import {WinstonLogger} from "./winston.js";

export type LoggerNodeOpts = {
  /** Console level of the modules without a `levelModule` override */
  level: LogLevel;
  /** Also append every entry up to `file.level` to `file.filepath` */
  file?: {
    filepath: string;
    level: LogLevel;
  };
  /** Rendering format of the console and the file, defaults to "human" */
  format?: LogFormat;
  /** Console level by module path, applied to the module and its children */
  levelModule?: Record<string, LogLevel>;
  timestampFormat?: TimestampFormat;
  /** Write the console output to stderr, leaving stdout to the command output */
  stderr?: boolean;
};

/**
 * Root logger of a sync-eta command, with module "". Use `child` to name the command module.
 */
export function getNodeLogger(opts: LoggerNodeOpts): ModuleLogger {
  const instance = winston.createLogger({
    // Levels are filtered by each transport
    level: LogLevel.debug,
    levels: logLevelNum,
    format: getFormat(opts),
    transports: getNodeLoggerTransports(opts),
  });
  return new WinstonLogger(instance, "");
}

function getNodeLoggerTransports(opts: LoggerNodeOpts): TransportStream[] {
  const transports: TransportStream[] = [
    new winston.transports.Console({
      format: moduleLevelFilter({defaultLevel: opts.level, levelModule: opts.levelModule ?? {}}),
      stderrLevels: opts.stderr ? logLevels : [],
    }),
  ];

  if (opts.file) {
    transports.push(new winston.transports.File({level: opts.file.level, filename: opts.file.filepath}));
  }

  return transports;
}
