export * from "./levelScan.js";
