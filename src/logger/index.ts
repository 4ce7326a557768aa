export * from "./interface.js";
export {getEmptyLogger} from "./empty.js";
export {getNodeLogger} from "./node.js";
export type {LoggerNodeOpts} from "./node.js";
export {getModuleLevel} from "./utils/moduleLevel.js";
