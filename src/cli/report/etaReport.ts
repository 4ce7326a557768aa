import {EstimateWindow, RateEstimate, RateEstimateStatus, SyncEstimate, estimateWindows} from "../../estimator/index.js";
import {formatUtcMinutes, prettyTimeDiffSec} from "../../util/index.js";

const windowLabels: Record<EstimateWindow, string> = {
  [EstimateWindow.allTime]: "All time",
  [EstimateWindow.lastDay]: "Last day",
  [EstimateWindow.lastHour]: "Last hour",
};

/**
 * Render a sync estimate as text lines, one block per window
 */
export function renderEtaReport(estimate: SyncEstimate): string[] {
  const {latest, estimates} = estimate;

  const lines = [
    `Last log (UTC): ${formatUtcMinutes(latest.timestamp)}`,
    `Last processed block: ${latest.currentHeight}/${latest.targetHeight} (${estimate.progressPercent.toFixed(2)}%)`,
  ];

  for (const window of estimateWindows) {
    const rateEstimate = estimates[window];
    const start = rateEstimate.from ? formatUtcMinutes(rateEstimate.from.timestamp) : "-";
    lines.push("", `${windowLabels[window]} start (UTC): ${start}`, ...renderRateEstimate(rateEstimate));
  }

  return lines;
}

function renderRateEstimate(rateEstimate: RateEstimate): string[] {
  const {from, to} = rateEstimate;

  switch (rateEstimate.status) {
    case RateEstimateStatus.synced:
      return [`  synced, estimated finish at ${formatEta(rateEstimate.estimatedCompletion)}`];

    case RateEstimateStatus.stalled:
      return ["  stalled, no progress in window"];

    case RateEstimateStatus.noData:
      return ["  no data, fewer than two samples in window"];

    case RateEstimateStatus.progressing: {
      if (from === null || to === null) {
        return ["  no data, fewer than two samples in window"];
      }

      const processed = to.currentHeight - from.currentHeight;
      const elapsedSec = (to.timestamp.getTime() - from.timestamp.getTime()) / 1000;
      const lines = [
        `  ${processed} blocks processed in ${prettyTimeDiffSec(elapsedSec)}, ` +
          `aka ${rateEstimate.blocksPerSecond.toFixed(1)} blocks/second, ` +
          `estimated finish at ${formatEta(rateEstimate.estimatedCompletion)}`,
      ];

      const headRate = rateEstimate.headBlocksPerSecond;
      if (headRate > 0) {
        lines.push(
          headRate < rateEstimate.blocksPerSecond
            ? `  head advancing at ${headRate.toFixed(2)} blocks/second, ` +
                `adjusted finish at ${formatEta(rateEstimate.estimatedCompletionWithHeadGrowth)}`
            : `  LOSING GROUND: head advancing at ${headRate.toFixed(2)} blocks/second, faster than sync`
        );
      }
      return lines;
    }
  }
}

function formatEta(date: Date | null): string {
  return date === null ? "-" : formatUtcMinutes(date);
}
