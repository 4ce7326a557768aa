import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {describe, it, expect, beforeAll, afterAll, afterEach, vi, Mock} from "vitest";
import {EstimateWindow, InsufficientDataError, RateEstimateStatus} from "../../../src/estimator/index.js";
import {Logger, getEmptyLogger} from "../../../src/logger/index.js";
import {etaHandler, parseLogFiles, runEta} from "../../../src/cli/cmds/eta/handler.js";
import {EtaArgs} from "../../../src/cli/cmds/eta/options.js";
import {GlobalArgs} from "../../../src/cli/options/index.js";
import {YargsError} from "../../../src/cli/util/index.js";
import {T0, processedSlotLine, processingBlockLine, secondsAfter} from "../../utils/logLines.js";
import {writeLogFiles} from "../../utils/files.js";

// Node.js maps `process.stdout` to `console._stdout`.
// spy does not work on `process.stdout` directly.
type TestConsole = typeof console & {_stdout: {write: Mock}; _stderr: {write: Mock}};

function getMockLogger(): Logger {
  return {error: vi.fn(), warn: vi.fn(), info: vi.fn(), verbose: vi.fn(), debug: vi.fn()};
}

describe("cli / eta", () => {
  let tmpDir: string;

  beforeAll(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "sync-eta-eta-test-"));
    writeLogFiles(tmpDir, [
      {
        name: "beacon.log.1",
        lines: ["ignored, extension is .1"],
        mtimeSec: 100,
      },
      {
        name: "beacon-1.log",
        lines: [
          processingBlockLine("2024-06-15 00:00:00.500", 100, 1000),
          'time="2024-06-15 00:00:30" level=info msg="Peer connected" peers=12',
          processingBlockLine("2024-06-15 00:03:20", 300, 1000),
        ],
        mtimeSec: 200,
      },
      {
        name: "beacon-2.log",
        lines: [
          processedSlotLine("2024-06-15 00:01:40", 200, 1000),
          processedSlotLine("2024-06-15 00:02:00", 250, 100),
        ],
        mtimeSec: 300,
      },
    ]);
    fs.mkdirSync(path.join(tmpDir, "empty"));
    fs.mkdirSync(path.join(tmpDir, "handler"));
    writeLogFiles(path.join(tmpDir, "handler"), [
      {
        name: "beacon.log",
        lines: [
          processingBlockLine("2024-06-15 00:00:00", 100, 1000),
          processingBlockLine("2024-06-15 00:01:40", 300, 1000),
          processingBlockLine("2024-06-15 00:01:50", "x", 1000),
        ],
        mtimeSec: 100,
      },
    ]);
  });

  afterAll(() => {
    fs.rmSync(tmpDir, {recursive: true});
  });

  describe("parseLogFiles", () => {
    it("should merge the samples of every file by timestamp", () => {
      const logger = getMockLogger();

      const samples = parseLogFiles(
        [
          {filepath: "a.log", lines: [processingBlockLine("2024-06-15 00:00:00", 100, 1000)]},
          {filepath: "b.log", lines: [processedSlotLine("2024-06-14 23:59:00", 50, 1000)]},
        ],
        logger
      );

      expect(samples.map((sample) => sample.currentHeight)).toEqual([50, 100]);
      expect(logger.warn).not.toHaveBeenCalled();
      expect(logger.verbose).toHaveBeenCalledWith("Parsed log file", {file: "a.log", lines: 1, samples: 1});
    });

    it("should log skipped lines", () => {
      const logger = getMockLogger();

      const samples = parseLogFiles(
        [
          {
            filepath: "a.log",
            lines: [processingBlockLine("2024-06-15 00:00:00", "x", 1000), processingBlockLine("2024-06-15", 1, 2)],
          },
        ],
        logger
      );

      expect(samples).toEqual([]);
      expect(logger.debug).toHaveBeenCalledTimes(2);
      expect(logger.debug).toHaveBeenNthCalledWith(
        2,
        "Skipping sync progress line",
        {file: "a.log", line: 2},
        expect.any(Error)
      );
      expect(logger.warn).toHaveBeenCalledWith("Skipped invalid sync progress lines", {count: 2});
    });
  });

  describe("runEta", () => {
    it("should estimate from every log file of a directory", async () => {
      const now = secondsAfter(T0, 200);

      const estimate = await runEta(tmpDir, ".log", now, getEmptyLogger());

      expect(estimate.latest).toEqual({timestamp: secondsAfter(T0, 200), currentHeight: 300, targetHeight: 1000});
      expect(estimate.remainingBlocks).toBe(700);

      const allTime = estimate.estimates[EstimateWindow.allTime];
      expect(allTime.status).toBe(RateEstimateStatus.progressing);
      expect(allTime.blocksPerSecond).toBe(1);
      expect(allTime.estimatedCompletion).toEqual(secondsAfter(T0, 900));
    });

    it("should reject a single file with one valid sample", async () => {
      await expect(runEta(path.join(tmpDir, "beacon-2.log"), ".log", T0, getEmptyLogger())).rejects.toThrow(
        InsufficientDataError
      );
    });

    it("should reject a directory without log files", async () => {
      await expect(runEta(path.join(tmpDir, "empty"), ".log", T0, getEmptyLogger())).rejects.toThrow(YargsError);
    });
  });

  describe("etaHandler", () => {
    const args: EtaArgs & GlobalArgs = {
      logPath: "",
      logExtension: ".log",
      now: "2024-06-15T00:01:40Z",
      output: "text",
      logLevel: "info",
      logFileLevel: "debug",
    };

    function getWrites(write: Mock): string {
      return write.mock.calls.map((call: unknown[]) => String(call[0])).join("");
    }

    afterEach(() => {
      vi.restoreAllMocks();
    });

    it("should print a parseable JSON estimate with logs on stderr", async () => {
      vi.spyOn((console as TestConsole)._stdout, "write").mockImplementation(() => true);
      vi.spyOn((console as TestConsole)._stderr, "write").mockImplementation(() => true);

      await etaHandler({...args, logPath: path.join(tmpDir, "handler"), output: "json"});

      const estimate: unknown = JSON.parse(getWrites((console as TestConsole)._stdout.write));
      expect(estimate).toMatchObject({
        now: "2024-06-15T00:01:40.000Z",
        remainingBlocks: 700,
        estimates: {
          all_time: {status: "progressing", blocksPerSecond: 2, estimatedCompletion: "2024-06-15T00:07:30.000Z"},
        },
      });
      expect((console as TestConsole)._stderr.write).toHaveBeenCalledTimes(1);
      expect(getWrites((console as TestConsole)._stderr.write)).toMatch(
        /\[eta\] +\u001b\[33mwarn\u001b\[39m: Skipped invalid sync progress lines count=1\n$/
      );
    });

    it("should print the text report", async () => {
      vi.spyOn((console as TestConsole)._stdout, "write").mockImplementation(() => true);

      await etaHandler({...args, logPath: path.join(tmpDir, "handler"), logLevel: "error"});

      expect((console as TestConsole)._stdout.write).toHaveBeenCalledTimes(1);
      expect(getWrites((console as TestConsole)._stdout.write).split("\n").slice(0, 5)).toEqual([
        "Last log (UTC): 2024-06-15 00:01",
        "Last processed block: 300/1000 (30.00%)",
        "",
        "All time start (UTC): 2024-06-15 00:00",
        "  200 blocks processed in 1.7 minutes, aka 2.0 blocks/second, estimated finish at 2024-06-15 00:07",
      ]);
    });
  });
});
