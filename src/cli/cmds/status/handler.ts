import {Logger, getNodeLogger} from "../../../logger/index.js";
import {
  NodeStatusQuery,
  NodeSyncStatus,
  getConsensusSyncStatus,
  getExecutionSyncStatus,
} from "../../../status/index.js";
import {SyncEtaError} from "../../../util/index.js";
import {GlobalArgs} from "../../options/index.js";
import {renderStatusReport} from "../../report/index.js";
import {parseLoggerArgs} from "../../util/logger.js";
import {OutputFormat} from "../eta/options.js";
import {StatusArgs} from "./options.js";

export type StatusUrls = {
  beaconUrl: string;
  executionUrl: string;
  /** Overrides the default timeout of each node */
  timeoutMs?: number;
};

/**
 * Query the sync status of the consensus and execution nodes and print it
 */
export async function statusHandler(args: StatusArgs & GlobalArgs): Promise<void> {
  const logger = getNodeLogger(parseLoggerArgs(args, {stderr: args.output === OutputFormat.json})).child("status");

  const status = await runStatus(args, logger);

  if (args.output === OutputFormat.json) {
    console.log(JSON.stringify(status, null, 2));
  } else {
    console.log(renderStatusReport(status).join("\n"));
  }
}

/**
 * Both nodes are queried concurrently. A node that cannot be reached or answers an invalid response is reported
 * with its error, the other one is still reported.
 */
export async function runStatus(
  {beaconUrl, executionUrl, timeoutMs}: StatusUrls,
  logger: Logger
): Promise<NodeSyncStatus> {
  logger.verbose("Querying node sync status", {beaconUrl, executionUrl});

  const [consensus, execution] = await Promise.all([
    queryNode("consensus", () => getConsensusSyncStatus(beaconUrl, timeoutMs), logger),
    queryNode("execution", () => getExecutionSyncStatus(executionUrl, timeoutMs), logger),
  ]);

  return {consensus, execution};
}

async function queryNode<T>(node: string, query: () => Promise<T>, logger: Logger): Promise<NodeStatusQuery<T>> {
  try {
    return {status: await query()};
  } catch (e) {
    // Anything but a request or response error is a bug
    if (!(e instanceof SyncEtaError)) throw e;
    logger.warn("Node sync status unavailable", {node}, e);
    return {error: e.message};
  }
}
