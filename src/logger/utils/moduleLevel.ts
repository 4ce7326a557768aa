import winston from "winston";
import {LEVEL, LogLevel, logLevelNum, toLogLevel} from "../interface.js";

/**
 * Level of `module`: its own override, else the override of its closest parent path, else `defaultLevel`.
 * With `{eta: "debug"}`, both `eta` and `eta/parser` log at debug.
 */
export function getModuleLevel(
  module: string,
  defaultLevel: LogLevel,
  levelModule: Record<string, LogLevel>
): LogLevel {
  for (let path = module; path !== ""; path = path.slice(0, Math.max(path.lastIndexOf("/"), 0))) {
    const level = levelModule[path];
    if (level !== undefined) return level;
  }
  return defaultLevel;
}

/**
 * Transport format dropping the entries above the level of their module
 */
export const moduleLevelFilter = winston.format(
  (info, opts: {defaultLevel: LogLevel; levelModule: Record<string, LogLevel>}) => {
    const level = toLogLevel(info[LEVEL]);
    const module = typeof info.module === "string" ? info.module : "";
    if (level === undefined) return info;
    const maxLevel = getModuleLevel(module, opts.defaultLevel, opts.levelModule);
    return logLevelNum[level] <= logLevelNum[maxLevel] ? info : false;
  }
);
