export type {Sample} from "./interface.js";
export {ParseError, ParseErrorCode} from "./errors.js";
export type {ParseErrorType} from "./errors.js";
export {syncProgressGrammars, matchSyncProgressLine} from "./grammar.js";
export type {SyncProgressGrammar, SyncProgressFields} from "./grammar.js";
export {parseLogTimestamp} from "./timestamp.js";
export {parseLogLine, parseLogLines} from "./parser.js";
export type {ParseLogLinesOpts} from "./parser.js";
export {mergeSamplesByTime} from "./merge.js";
