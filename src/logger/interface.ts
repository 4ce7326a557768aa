import {LEVEL} from "triple-beam";

export {LEVEL};

export enum LogLevel {
  error = "error",
  warn = "warn",
  info = "info",
  verbose = "verbose",
  debug = "debug",
}

export const logLevels = Object.values(LogLevel);

/** Lower is more severe, as winston's `levels` option expects */
export const logLevelNum: Record<LogLevel, number> = {
  [LogLevel.error]: 0,
  [LogLevel.warn]: 1,
  [LogLevel.info]: 2,
  [LogLevel.verbose]: 3,
  [LogLevel.debug]: 4,
};

export function toLogLevel(value: unknown): LogLevel | undefined {
  return logLevels.find((level) => level === value);
}

export type LogValue = string | number | bigint | boolean | null | undefined;
export type LogData = LogValue | Record<string, LogValue> | LogValue[] | Record<string, LogValue>[];

export type LogHandler = (message: string, context?: LogData, error?: Error) => void;

export type Logger = Record<LogLevel, LogHandler>;

/**
 * Logger bound to a module path such as `eta` or `eta/parser`.
 * The path is printed with every line and selects the `levelModule` override.
 */
export type ModuleLogger = Logger & {
  readonly module: string;
  child(module: string): ModuleLogger;
};

export type LogFormat = "human" | "json";
export const logFormats: LogFormat[] = ["human", "json"];

export enum TimestampFormatCode {
  DateRegular = "regular",
  Hidden = "hidden",
}
export type TimestampFormat = {format: TimestampFormatCode};
