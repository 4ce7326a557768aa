import {LogLevelSummary} from "../../health/index.js";

/**
 * One line summary of the warnings and errors of a log file, rates as `14.29 %`
 */
export function renderLevelReport(filepath: string, summary: LogLevelSummary): string {
  return (
    `${filepath}: ${summary.errorCount} errors (${formatRate(summary.errorRate)}), ` +
    `${summary.warningCount} warnings (${formatRate(summary.warningRate)}) in ${summary.totalCount} lines`
  );
}

function formatRate(rate: number): string {
  return `${(rate * 100).toFixed(2)} %`;
}
