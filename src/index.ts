export * from "./parser/index.js";
export * from "./estimator/index.js";
export * from "./health/index.js";
export * from "./status/index.js";
export {SyncEtaError, isErr} from "./util/index.js";
export type {Result, Err} from "./util/index.js";
