import {SyncEtaError} from "../util/index.js";

export enum ParseErrorCode {
  INVALID_TIMESTAMP = "PARSE_ERROR_INVALID_TIMESTAMP",
  INVALID_HEIGHT = "PARSE_ERROR_INVALID_HEIGHT",
  TARGET_BELOW_CURRENT = "PARSE_ERROR_TARGET_BELOW_CURRENT",
}

export type ParseErrorType =
  | {code: ParseErrorCode.INVALID_TIMESTAMP; grammar: string; timestamp: string}
  | {code: ParseErrorCode.INVALID_HEIGHT; grammar: string; height: string}
  | {code: ParseErrorCode.TARGET_BELOW_CURRENT; grammar: string; currentHeight: number; targetHeight: number};

/**
 * A line matched a sync progress grammar but its fields could not be turned into a sample
 */
export class ParseError extends SyncEtaError<ParseErrorType> {
  constructor(
    type: ParseErrorType,
    readonly line: string
  ) {
    super(type);
  }
}
