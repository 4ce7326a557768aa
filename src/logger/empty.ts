import {LogHandler, Logger} from "./interface.js";

const ignore: LogHandler = () => undefined;

/**
 * Logger that drops every entry, for library callers without logging
 */
export function getEmptyLogger(): Logger {
  return {error: ignore, warn: ignore, info: ignore, verbose: ignore, debug: ignore};
}
