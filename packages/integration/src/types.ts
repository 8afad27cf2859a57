import type { AnalyzeRequest, AnalyzeResponse, DetectedMarker, EngineConfig } from '@marker-engine/core';
import type { AnalyzeOptions } from '@marker-engine/pipeline';

/**
 * Anything that analyzes one request at a time: the engine or the service
 */
export interface Analyzer<Req extends AnalyzeRequest = AnalyzeRequest, Res = AnalyzeResponse> {
  readonly config: EngineConfig;
  analyze(request: Req, options?: AnalyzeOptions): Promise<Res>;
}

export interface BatchOptions {
  /** Parallel analyses; defaults to `config.batchConcurrency` */
  concurrency?: number;
  /** Start no further requests after the first failure */
  stopOnError?: boolean;
  progressCallback?: (done: number, total: number) => void;
  /** Forwarded to every analysis */
  signal?: AbortSignal;
}

// =============================================================================
// Interpretation
// =============================================================================

export interface InterpretationInput {
  schema_id: string;
  markers: DetectedMarker[];
  marker_count: number;
  total_score: number;
}

export interface Interpretation {
  interpretation: string;
  /** Provider name, or `default` for the built-in narrative */
  model_used: string;
  processing_time_ms: number;
}

export interface InterpretationProvider {
  readonly name: string;
  interpret(input: InterpretationInput, signal: AbortSignal): Promise<string>;
}

/** What the bridge returns when every provider fails */
export type FallbackMode = 'default' | 'omit';
