import {LogFormat, LogLevel, TimestampFormatCode, logFormats, toLogLevel} from "../../logger/index.js";
import {LoggerNodeOpts} from "../../logger/node.js";
import {LogArgs} from "../options/logOptions.js";
import {YargsError} from "./errors.js";

/**
 * Logger options of a command. With `stderr`, logs stay out of the command output on stdout.
 */
export function parseLoggerArgs(args: LogArgs, {stderr = false}: {stderr?: boolean} = {}): LoggerNodeOpts {
  return {
    level: parseLogLevel(args.logLevel),
    file:
      args.logFile === undefined
        ? undefined
        : {
            filepath: args.logFile,
            level: parseLogLevel(args.logFileLevel),
          },
    format: args.logFormat ? parseLogFormat(args.logFormat) : undefined,
    levelModule: args.logLevelModule && parseLogLevelModule(args.logLevelModule),
    timestampFormat: {format: TimestampFormatCode.DateRegular},
    stderr,
  };
}

function parseLogFormat(format: string): LogFormat {
  const logFormat = logFormats.find((f) => f === format);
  if (logFormat === undefined) {
    throw new YargsError(`Unknown log format '${format}'`);
  }
  return logFormat;
}

function parseLogLevel(level: string): LogLevel {
  const logLevel = toLogLevel(level);
  if (logLevel === undefined) {
    throw new YargsError(`Unknown log level '${level}'`);
  }
  return logLevel;
}

function parseLogLevelModule(logLevelModuleArr: string[]): Record<string, LogLevel> {
  const levelModule: Record<string, LogLevel> = {};
  for (const logLevelModule of logLevelModuleArr) {
    const [module, levelStr] = logLevelModule.split("=");
    if (!module || levelStr === undefined) {
      throw new YargsError(`Invalid log level module '${logLevelModule}', expected 'module=level'`);
    }
    levelModule[module] = parseLogLevel(levelStr);
  }
  return levelModule;
}
