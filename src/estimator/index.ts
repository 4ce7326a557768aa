export * from "./interface.js";
export {InsufficientDataError, EstimateErrorCode} from "./errors.js";
export type {EstimateErrorType} from "./errors.js";
export {estimateSyncEta, windowDurationSec} from "./estimate.js";
