import {Sample} from "../parser/index.js";

export enum EstimateWindow {
  allTime = "all_time",
  lastDay = "last_day",
  lastHour = "last_hour",
}

export const estimateWindows = Object.values(EstimateWindow);

export enum RateEstimateStatus {
  /** The latest sample has reached its target */
  synced = "synced",
  /** Positive rate, completion time projected */
  progressing = "progressing",
  /** Zero, negative or undefined rate in the window */
  stalled = "stalled",
  /** Less than two samples in the window */
  noData = "no_data",
}

export type RateEstimate = {
  window: EstimateWindow;
  status: RateEstimateStatus;
  /** 0 when the rate is undefined */
  blocksPerSecond: number;
  /** null when stalled or without data, a copy of `now` when synced */
  estimatedCompletion: Date | null;
  /** Oldest and newest sample of the window, null without data */
  from: Sample | null;
  to: Sample | null;
  /** Rate at which the target head moved between `from` and `to` */
  headBlocksPerSecond: number;
  /**
   * Completion once the sync also covers the blocks the head adds until `estimatedCompletion`.
   * Not a bound when the head grows as fast as the sync. Null when stalled or without data.
   */
  estimatedCompletionWithHeadGrowth: Date | null;
};

export type SyncEstimate = {
  now: Date;
  /** Most recent sample, source of the remaining distance for every window */
  latest: Sample;
  remainingBlocks: number;
  progressPercent: number;
  estimates: Record<EstimateWindow, RateEstimate>;
};
