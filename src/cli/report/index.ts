export * from "./etaReport.js";
export * from "./levelReport.js";
export * from "./statusReport.js";
