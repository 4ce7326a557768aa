import {Err, Result, isErr} from "../util/index.js";
import {ParseError, ParseErrorCode} from "./errors.js";
import {SyncProgressGrammar, matchSyncProgressLine, syncProgressGrammars} from "./grammar.js";
import {Sample} from "./interface.js";
import {parseLogTimestamp} from "./timestamp.js";

const HEIGHT_RX = /^\d+$/;

export type ParseLogLinesOpts = {
  /** Called for every line that matched a grammar but could not be parsed. The line is skipped */
  onParseError?: (error: ParseError, lineNumber: number) => void;
  grammars?: SyncProgressGrammar[];
};

/**
 * Parse a single log line.
 * - `null` if the line is not a sync progress line
 * - `Err<ParseError>` if it is one but its fields are invalid
 */
export function parseLogLine(
  line: string,
  grammars: SyncProgressGrammar[] = syncProgressGrammars
): Result<Sample | null, ParseError> {
  const fields = matchSyncProgressLine(line, grammars);
  if (fields === null) {
    return null;
  }

  const {grammar} = fields;

  const timestamp = parseLogTimestamp(fields.time);
  if (timestamp === null) {
    return Err(new ParseError({code: ParseErrorCode.INVALID_TIMESTAMP, grammar, timestamp: fields.time}, line));
  }

  const currentHeight = parseHeight(fields.current);
  if (currentHeight === null) {
    return Err(new ParseError({code: ParseErrorCode.INVALID_HEIGHT, grammar, height: fields.current}, line));
  }

  const targetHeight = parseHeight(fields.target);
  if (targetHeight === null) {
    return Err(new ParseError({code: ParseErrorCode.INVALID_HEIGHT, grammar, height: fields.target}, line));
  }

  if (targetHeight < currentHeight) {
    return Err(
      new ParseError({code: ParseErrorCode.TARGET_BELOW_CURRENT, grammar, currentHeight, targetHeight}, line)
    );
  }

  return {timestamp, currentHeight, targetHeight};
}

/**
 * Lazily turn log lines into sync progress samples, in input order.
 * Unrelated lines are skipped silently, invalid sync progress lines are reported to `opts.onParseError`
 */
export function* parseLogLines(lines: Iterable<string>, opts?: ParseLogLinesOpts): Generator<Sample, void, undefined> {
  let lineNumber = 0;

  for (const line of lines) {
    lineNumber++;

    const result = parseLogLine(line, opts?.grammars);
    if (result === null) {
      continue;
    }

    if (isErr(result)) {
      opts?.onParseError?.(result.error, lineNumber);
      continue;
    }

    yield result;
  }
}

function parseHeight(value: string): number | null {
  if (!HEIGHT_RX.test(value)) return null;
  const height = Number(value);
  return Number.isSafeInteger(height) ? height : null;
}
