export enum NodeClient {
  consensus = "consensus",
  execution = "execution",
}

export const nodeClients = Object.values(NodeClient);

export type LogLevelKeywords = {
  warn: string;
  error: string;
};

/** Warning and error markers of the default log format of each client kind */
export const logLevelKeywordsByClient: Record<NodeClient, LogLevelKeywords> = {
  [NodeClient.consensus]: {warn: "level=warning", error: "level=error"},
  [NodeClient.execution]: {warn: "[WARN]", error: "[ERROR]"},
};

export type LogLevelSummary = {
  errorCount: number;
  warningCount: number;
  totalCount: number;
  /** Fraction of lines, 0 when there are no lines */
  errorRate: number;
  warningRate: number;
};

/**
 * Count warning and error lines. A line with the error keyword is only counted as an error.
 */
export function summarizeLogLevels(lines: Iterable<string>, keywords: LogLevelKeywords): LogLevelSummary {
  let errorCount = 0;
  let warningCount = 0;
  let totalCount = 0;

  for (const line of lines) {
    if (line.includes(keywords.error)) {
      errorCount++;
    } else if (line.includes(keywords.warn)) {
      warningCount++;
    }
    totalCount++;
  }

  return {
    errorCount,
    warningCount,
    totalCount,
    errorRate: totalCount === 0 ? 0 : errorCount / totalCount,
    warningRate: totalCount === 0 ? 0 : warningCount / totalCount,
  };
}
