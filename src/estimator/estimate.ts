import {Sample} from "../parser/index.js";
import {InsufficientDataError} from "./errors.js";
import {EstimateWindow, RateEstimate, RateEstimateStatus, SyncEstimate} from "./interface.js";

/** A rate needs a delta between two samples */
const MIN_SAMPLES = 2;

/** Look-back of the recent windows, samples with `timestamp >= now - duration` are kept */
export const windowDurationSec: Record<Exclude<EstimateWindow, EstimateWindow.allTime>, number> = {
  [EstimateWindow.lastDay]: 24 * 60 * 60,
  [EstimateWindow.lastHour]: 60 * 60,
};

type SampleSpan = {oldest: Sample; newest: Sample};

/**
 * Estimate when sync completes from the sync progress samples, with three rates: all time, last day and last hour.
 *
 * The remaining distance is always taken from the most recent sample, so the three estimates share the same goal
 * even if the chain head moved while syncing. `now` is only used to place the windows and project the ETAs.
 */
export function estimateSyncEta(samples: readonly Sample[], now: Date): SyncEstimate {
  const allTimeSpan = getSampleSpan(samples);
  if (allTimeSpan === null) {
    throw new InsufficientDataError(samples.length, MIN_SAMPLES);
  }

  const latest = allTimeSpan.newest;
  const remainingBlocks = latest.targetHeight - latest.currentHeight;
  const progressPercent = latest.targetHeight === 0 ? 100 : (latest.currentHeight / latest.targetHeight) * 100;

  const recentSpan = (window: Exclude<EstimateWindow, EstimateWindow.allTime>): SampleSpan | null => {
    const startMs = now.getTime() - windowDurationSec[window] * 1000;
    return getSampleSpan(samples.filter((sample) => sample.timestamp.getTime() >= startMs));
  };

  return {
    now,
    latest,
    remainingBlocks,
    progressPercent,
    estimates: {
      [EstimateWindow.allTime]: estimateWindow(EstimateWindow.allTime, allTimeSpan, remainingBlocks, now),
      [EstimateWindow.lastDay]: estimateWindow(
        EstimateWindow.lastDay,
        recentSpan(EstimateWindow.lastDay),
        remainingBlocks,
        now
      ),
      [EstimateWindow.lastHour]: estimateWindow(
        EstimateWindow.lastHour,
        recentSpan(EstimateWindow.lastHour),
        remainingBlocks,
        now
      ),
    },
  };
}

function estimateWindow(
  window: EstimateWindow,
  span: SampleSpan | null,
  remainingBlocks: number,
  now: Date
): RateEstimate {
  const synced = remainingBlocks <= 0;

  if (span === null) {
    return {
      window,
      status: synced ? RateEstimateStatus.synced : RateEstimateStatus.noData,
      blocksPerSecond: 0,
      estimatedCompletion: synced ? new Date(now.getTime()) : null,
      from: null,
      to: null,
      headBlocksPerSecond: 0,
      estimatedCompletionWithHeadGrowth: synced ? new Date(now.getTime()) : null,
    };
  }

  const {oldest: from, newest: to} = span;
  const elapsedSec = (to.timestamp.getTime() - from.timestamp.getTime()) / 1000;
  // Rate over an empty interval is undefined, reported as no progress
  const blocksPerSecond = elapsedSec > 0 ? (to.currentHeight - from.currentHeight) / elapsedSec : 0;
  const headBlocksPerSecond = elapsedSec > 0 ? (to.targetHeight - from.targetHeight) / elapsedSec : 0;

  if (synced) {
    return {
      window,
      status: RateEstimateStatus.synced,
      blocksPerSecond,
      estimatedCompletion: new Date(now.getTime()),
      from,
      to,
      headBlocksPerSecond,
      estimatedCompletionWithHeadGrowth: new Date(now.getTime()),
    };
  }

  if (blocksPerSecond <= 0) {
    return {
      window,
      status: RateEstimateStatus.stalled,
      blocksPerSecond,
      estimatedCompletion: null,
      from,
      to,
      headBlocksPerSecond,
      estimatedCompletionWithHeadGrowth: null,
    };
  }

  const etaSec = remainingBlocks / blocksPerSecond;
  // Blocks the head adds until the first ETA, synced at the same rate. A head moving backwards
  // (reorg, misreported head) does not speed up the sync.
  const headGrowthBlocks = Math.max(headBlocksPerSecond, 0) * etaSec;

  return {
    window,
    status: RateEstimateStatus.progressing,
    blocksPerSecond,
    estimatedCompletion: addSeconds(now, etaSec),
    from,
    to,
    headBlocksPerSecond,
    estimatedCompletionWithHeadGrowth: addSeconds(now, (remainingBlocks + headGrowthBlocks) / blocksPerSecond),
  };
}

/**
 * Oldest and newest sample by timestamp. Ties keep the first sample as oldest and the last one as newest.
 * Returns null with less than two samples.
 */
function getSampleSpan(samples: readonly Sample[]): SampleSpan | null {
  if (samples.length < MIN_SAMPLES) {
    return null;
  }

  let oldest = samples[0];
  let newest = samples[0];
  for (const sample of samples) {
    if (sample.timestamp.getTime() < oldest.timestamp.getTime()) oldest = sample;
    if (sample.timestamp.getTime() >= newest.timestamp.getTime()) newest = sample;
  }

  return {oldest, newest};
}

function addSeconds(date: Date, seconds: number): Date {
  return new Date(date.getTime() + seconds * 1000);
}
