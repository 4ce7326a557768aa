import {describe, it, expect, afterEach, vi, Mock} from "vitest";
import {getEmptyLogger} from "../../../src/logger/index.js";
import {runStatus, statusHandler} from "../../../src/cli/cmds/status/handler.js";
import {TestServer, startTestServer} from "../../utils/httpServer.js";

// Node.js maps `process.stdout` to `console._stdout`.
// spy does not work on `process.stdout` directly.
type TestConsole = typeof console & {_stdout: {write: Mock}; _stderr: {write: Mock}};

describe("cli / status", () => {
  let beacon: TestServer;
  let execution: TestServer;

  afterEach(async () => {
    vi.restoreAllMocks();
    await Promise.all([beacon.close(), execution.close()]);
  });

  async function startNodes(executionResponse: {status?: number; body: string}): Promise<void> {
    beacon = await startTestServer(() => ({
      body: JSON.stringify({data: {head_slot: "100", sync_distance: "20", is_syncing: true}}),
    }));
    execution = await startTestServer(() => executionResponse);
  }

  it("should report both nodes", async () => {
    await startNodes({body: JSON.stringify({jsonrpc: "2.0", id: 1, result: false})});

    const status = await runStatus({beaconUrl: beacon.url, executionUrl: execution.url}, getEmptyLogger());

    expect(status).toEqual({
      consensus: {status: {headSlot: 100, syncDistance: 20, isSyncing: true}},
      execution: {status: {synced: true}},
    });
  });

  it("should report the node that failed and keep the other one", async () => {
    await startNodes({status: 500, body: "internal error"});
    const logger = {...getEmptyLogger(), warn: vi.fn()};

    const status = await runStatus({beaconUrl: beacon.url, executionUrl: execution.url}, logger);

    expect(status).toEqual({
      consensus: {status: {headSlot: 100, syncDistance: 20, isSyncing: true}},
      execution: {error: `${execution.url} responded 500 Internal Server Error`},
    });
    expect(logger.warn).toHaveBeenCalledWith("Node sync status unavailable", {node: "execution"}, expect.any(Error));
  });

  it("should print the status as JSON with logs on stderr", async () => {
    await startNodes({status: 500, body: "internal error"});
    vi.spyOn((console as TestConsole)._stdout, "write").mockImplementation(() => true);
    vi.spyOn((console as TestConsole)._stderr, "write").mockImplementation(() => true);

    await statusHandler({
      beaconUrl: beacon.url,
      executionUrl: execution.url,
      output: "json",
      logLevel: "info",
      logFileLevel: "debug",
    });

    const stdout = (console as TestConsole)._stdout.write.mock.calls.map((call: unknown[]) => String(call[0])).join("");
    expect(JSON.parse(stdout)).toEqual({
      consensus: {status: {headSlot: 100, syncDistance: 20, isSyncing: true}},
      execution: {error: `${execution.url} responded 500 Internal Server Error`},
    });
    expect((console as TestConsole)._stderr.write).toHaveBeenCalledTimes(1);
  });
});
