import {describe, it, expect} from "vitest";
import {LogLevel, TimestampFormatCode} from "../../../src/logger/index.js";
import {LogArgs} from "../../../src/cli/options/index.js";
import {YargsError, parseLoggerArgs} from "../../../src/cli/util/index.js";

describe("cli / parseLoggerArgs", () => {
  const defaultArgs: LogArgs = {
    logLevel: LogLevel.info,
    logFileLevel: LogLevel.debug,
  };

  it("should parse default args", () => {
    expect(parseLoggerArgs(defaultArgs)).toEqual({
      level: LogLevel.info,
      file: undefined,
      format: undefined,
      levelModule: undefined,
      timestampFormat: {format: TimestampFormatCode.DateRegular},
      stderr: false,
    });
  });

  it("should send the logs to stderr", () => {
    expect(parseLoggerArgs(defaultArgs, {stderr: true}).stderr).toBe(true);
  });

  it("should enable the file transport", () => {
    expect(parseLoggerArgs({...defaultArgs, logFile: "sync-eta.log", logFileLevel: "verbose"}).file).toEqual({
      filepath: "sync-eta.log",
      level: LogLevel.verbose,
    });
  });

  it("should parse format and level by module", () => {
    const opts = parseLoggerArgs({...defaultArgs, logFormat: "json", logLevelModule: ["eta/parser=debug", "eta=warn"]});
    expect(opts.format).toBe("json");
    expect(opts.levelModule).toEqual({"eta/parser": LogLevel.debug, eta: LogLevel.warn});
  });

  it("should reject an unknown log level", () => {
    expect(() => parseLoggerArgs({...defaultArgs, logLevel: "loud"})).toThrow(YargsError);
    expect(() => parseLoggerArgs({...defaultArgs, logLevel: "loud"})).toThrow("Unknown log level 'loud'");
  });

  it("should reject an unknown log format", () => {
    expect(() => parseLoggerArgs({...defaultArgs, logFormat: "xml"})).toThrow("Unknown log format 'xml'");
  });

  it("should reject a level module without level", () => {
    expect(() => parseLoggerArgs({...defaultArgs, logLevelModule: ["eta"]})).toThrow(
      "Invalid log level module 'eta', expected 'module=level'"
    );
  });
});
