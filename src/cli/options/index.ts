export * from "./globalOptions.js";
export * from "./logOptions.js";
