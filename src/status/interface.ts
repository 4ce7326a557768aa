/** `GET /eth/v1/node/syncing` of a consensus client (beacon node API) */
export type ConsensusSyncStatus = {
  headSlot: number;
  /** Slots between the head and the current wall clock slot */
  syncDistance: number;
  isSyncing: boolean;
  /** Absent on clients that predate the field */
  isOptimistic?: boolean;
  elOffline?: boolean;
};

/** `eth_syncing` of an execution client that is still syncing */
export type ExecutionSyncProgress = {
  synced: false;
  /** Absent on clients that do not track where this sync started */
  startingBlock?: number;
  currentBlock: number;
  highestBlock: number;
};

/** `eth_syncing` answers `false` once the node is synced */
export type ExecutionSyncStatus = {synced: true} | ExecutionSyncProgress;

/** Status of a node, or why it could not be queried */
export type NodeStatusQuery<T> = {status: T} | {error: string};

export type NodeSyncStatus = {
  consensus: NodeStatusQuery<ConsensusSyncStatus>;
  execution: NodeStatusQuery<ExecutionSyncStatus>;
};
