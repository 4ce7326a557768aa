import {ConsensusSyncStatus, ExecutionSyncStatus, NodeStatusQuery, NodeSyncStatus} from "../../status/index.js";

/**
 * Render the sync status of both nodes, one line per node
 */
export function renderStatusReport(status: NodeSyncStatus): string[] {
  return [
    `Consensus node: ${renderQuery(status.consensus, renderConsensusStatus)}`,
    `Execution node: ${renderQuery(status.execution, renderExecutionStatus)}`,
  ];
}

function renderQuery<T>(query: NodeStatusQuery<T>, render: (status: T) => string): string {
  return "error" in query ? `unreachable, ${query.error}` : render(query.status);
}

function renderConsensusStatus(status: ConsensusSyncStatus): string {
  let str = status.isSyncing
    ? `syncing, head slot ${status.headSlot}, ${status.syncDistance} slots behind`
    : `synced, head slot ${status.headSlot}`;
  if (status.isOptimistic) str += ", optimistic";
  if (status.elOffline) str += ", execution client offline";
  return str;
}

function renderExecutionStatus(status: ExecutionSyncStatus): string {
  if (status.synced) {
    return "synced";
  }
  const {currentBlock, highestBlock} = status;
  const percent = highestBlock === 0 ? 100 : (currentBlock / highestBlock) * 100;
  return `syncing, block ${currentBlock}/${highestBlock} (${percent.toFixed(2)}%), ${highestBlock - currentBlock} blocks behind`;
}
