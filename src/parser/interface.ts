/**
 * A sync progress point read from a single log line
 */
export type Sample = Readonly<{
  timestamp: Date;
  /** Block or slot the node has processed */
  currentHeight: number;
  /** Block or slot of the chain head the node is syncing towards */
  targetHeight: number;
}>;
