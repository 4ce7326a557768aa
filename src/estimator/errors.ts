import {SyncEtaError} from "../util/index.js";

export enum EstimateErrorCode {
  INSUFFICIENT_SAMPLES = "ESTIMATE_ERROR_INSUFFICIENT_SAMPLES",
}

export type EstimateErrorType = {code: EstimateErrorCode.INSUFFICIENT_SAMPLES; sampleCount: number; required: number};

export class InsufficientDataError extends SyncEtaError<EstimateErrorType> {
  constructor(sampleCount: number, required: number) {
    super(
      {code: EstimateErrorCode.INSUFFICIENT_SAMPLES, sampleCount, required},
      `Need at least ${required} sync progress samples to estimate a rate, got ${sampleCount}`
    );
  }
}
