import {
  AnalysisAbortedError,
  err,
  fromPromise,
  partition,
  toMarkerEngineError,
  type AnalyzeRequest,
  type AnalyzeResponse,
  type MarkerEngineError,
  type Result,
} from '@marker-engine/core';
import type { Analyzer, BatchOptions } from './types';

export type BatchResult<Res> = Result<Res, MarkerEngineError>;

/**
 * Batch analyzer: fans requests out over a bounded number of lanes.
 * Every request gets its own analysis; results keep request order.
 */
export class BatchAnalyzer<Req extends AnalyzeRequest = AnalyzeRequest, Res = AnalyzeResponse> {
  constructor(private readonly analyzer: Analyzer<Req, Res>) {}

  /**
   * Analyze every request; rejects with the first failure in request order
   */
  async analyzeBatch(requests: Req[], options: BatchOptions = {}): Promise<Res[]> {
    const settled = await this.analyzeBatchSettled(requests, { ...options, stopOnError: true });
    const { successes, failures } = partition(settled);
    if (failures.length > 0) throw failures[0];
    return successes;
  }

  /**
   * Analyze every request and report each outcome as a Result
   */
  async analyzeBatchSettled(requests: Req[], options: BatchOptions = {}): Promise<BatchResult<Res>[]> {
    const {
      concurrency,
      stopOnError = false,
      progressCallback,
      signal,
    } = options;

    const results: BatchResult<Res>[] = [];
    let next = 0;
    let done = 0;
    let stopped = false;

    const lane = async (): Promise<void> => {
      while (next < requests.length) {
        const index = next++;

        if (stopped) {
          results[index] = err(new AnalysisAbortedError('scanning'));
        } else {
          const result = await fromPromise(
            this.analyzer.analyze(requests[index], { signal }),
            toMarkerEngineError
          );
          if (!result.ok && stopOnError) stopped = true;
          results[index] = result;
        }

        done++;
        progressCallback?.(done, requests.length);
      }
    };

    const limit = laneLimit(concurrency, this.analyzer.config.batchConcurrency);
    const lanes = Math.max(1, Math.min(limit, requests.length));
    await Promise.all(Array.from({ length: lanes }, lane));
    return results;
  }
}

/**
 * Whole number of lanes; anything below one or not finite takes the configured size
 */
function laneLimit(requested: number | undefined, configured: number): number {
  if (requested === undefined) return configured;
  const whole = Math.floor(requested);
  return Number.isFinite(whole) && whole >= 1 ? whole : configured;
}
