export * from "./interface.js";
export * from "./errors.js";
export * from "./consensus.js";
export * from "./execution.js";
