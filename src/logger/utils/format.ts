import winston from "winston";
import {SyncEtaError, isEmptyObject, logCtxToJson, logCtxToString} from "../../util/index.js";
import {LogData, LogFormat, TimestampFormat, TimestampFormatCode} from "../interface.js";

type Format = ReturnType<typeof winston.format.combine>;

export type FormatOpts = {
  format?: LogFormat;
  timestampFormat?: TimestampFormat;
};

/** Fields of a `WinstonLogger` entry once winston has set `level` and the optional `timestamp` */
type LogLine = {
  level: string;
  message: string;
  module?: string;
  timestamp?: string;
  context?: LogData;
  error?: Error;
};

/** Width of `[module] level` in human lines */
const MODULE_LEVEL_WIDTH = 30;

export function getFormat({format = "human", timestampFormat}: FormatOpts): Format {
  const showTimestamp = timestampFormat?.format !== TimestampFormatCode.Hidden;

  if (format === "json") {
    return winston.format.combine(
      ...(showTimestamp ? [winston.format.timestamp()] : []),
      serializeLogData(),
      winston.format.json()
    );
  }

  return winston.format.combine(
    ...(showTimestamp ? [winston.format.timestamp({format: "MMM-DD HH:mm:ss.SSS"})] : []),
    winston.format.colorize(),
    winston.format.printf((info) => renderHumanLine(info as LogLine))
  );
}

/** Context and error turned into plain JSON values, `SyncEtaError` metadata included */
const serializeLogData = winston.format((info) => {
  info.context = logCtxToJson(info.context);
  info.error = logCtxToJson(info.error);
  return info;
});

/**
 * `<timestamp>[module]     level: message key=value, ...` then the error, if any
 */
function renderHumanLine(line: LogLine): string {
  const module = line.module ?? "";
  let str = `${line.timestamp ?? ""}[${module}] ${line.level.padStart(MODULE_LEVEL_WIDTH - module.length)}: ${line.message}`;

  if (!isEmptyObject(line.context)) {
    str += " " + logCtxToString(line.context);
  }

  if (line.error !== undefined) {
    // SyncEtaError metadata reads as more context, any other error is set apart
    const separator = line.error instanceof SyncEtaError ? (isEmptyObject(line.context) ? " " : ", ") : " - ";
    str += separator + logCtxToString(line.error);
  }

  return str;
}
