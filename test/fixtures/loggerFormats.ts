import {LogData, LogFormat} from "../../src/logger/index.js";
import {ParseError, ParseErrorCode} from "../../src/parser/index.js";

type TestCase = {
  id: string;
  opts?: {module?: string};
  message: string;
  context?: LogData;
  error?: Error;
  output: {[P in LogFormat]: string};
};

/* eslint-disable quotes */
export const formatsTestCases: (TestCase | (() => TestCase))[] = [
  {
    id: "regular log with metadata",
    message: "Parsed log file",
    context: {file: "node.log", samples: 3},
    output: {
      human: "[]                 \u001b[33mwarn\u001b[39m: Parsed log file file=node.log, samples=3",
      json: '{"context":{"file":"node.log","samples":3},"level":"warn","message":"Parsed log file","module":""}',
    },
  },

  {
    id: "regular log with big int metadata",
    message: "big int",
    context: {height: BigInt(1)},
    output: {
      human: "[]                 \u001b[33mwarn\u001b[39m: big int height=1",
      json: '{"context":{"height":"1"},"level":"warn","message":"big int","module":""}',
    },
  },

  () => {
    const error = new Error("err message");
    error.stack = "$STACK";
    return {
      id: "regular log with error",
      opts: {module: "eta"},
      message: "Reading log files",
      context: {},
      error,
      output: {
        human: `[eta]              \u001b[33mwarn\u001b[39m: Reading log files - err message\n$STACK`,
        json: '{"context":{},"error":{"message":"err message","stack":"$STACK"},"level":"warn","message":"Reading log files","module":"eta"}',
      },
    };
  },

  () => {
    const error = new ParseError(
      {code: ParseErrorCode.INVALID_HEIGHT, grammar: "processing_block", height: "12a"},
      "time=..."
    );
    error.stack = "$STACK";
    return {
      id: "parse error with metadata",
      opts: {module: "eta"},
      message: "Skipping sync progress line",
      context: {file: "node.log", line: 4},
      error,
      output: {
        human:
          "[eta]              \u001b[33mwarn\u001b[39m: Skipping sync progress line file=node.log, line=4, " +
          "code=PARSE_ERROR_INVALID_HEIGHT, grammar=processing_block, height=12a\n$STACK",
        json:
          '{"context":{"file":"node.log","line":4},' +
          '"error":{"code":"PARSE_ERROR_INVALID_HEIGHT","grammar":"processing_block","height":"12a","stack":"$STACK"},' +
          '"level":"warn","message":"Skipping sync progress line","module":"eta"}',
      },
    };
  },

  () => {
    const error = new ParseError(
      {code: ParseErrorCode.INVALID_TIMESTAMP, grammar: "processed_slot", timestamp: "yesterday"},
      "time=..."
    );
    error.stack = "$STACK";
    return {
      id: "parse error without context",
      opts: {module: "eta"},
      message: "foo bar",
      error,
      output: {
        human:
          "[eta]              \u001b[33mwarn\u001b[39m: foo bar " +
          "code=PARSE_ERROR_INVALID_TIMESTAMP, grammar=processed_slot, timestamp=yesterday\n$STACK",
        json:
          '{"error":{"code":"PARSE_ERROR_INVALID_TIMESTAMP","grammar":"processed_slot","stack":"$STACK","timestamp":"yesterday"},' +
          '"level":"warn","message":"foo bar","module":"eta"}',
      },
    };
  },
];
