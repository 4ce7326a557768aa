export * from "./command.js";
export * from "./errors.js";
export * from "./file.js";
export * from "./logFiles.js";
export * from "./logger.js";
export * from "./version.js";
