export * from "./errors.js";
export * from "./err.js";
export * from "./json.js";
export * from "./objects.js";
export * from "./time.js";
