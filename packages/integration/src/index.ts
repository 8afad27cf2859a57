/**
 * @marker-engine/integration - Caller-side layers around the engine
 *
 * Components:
 * - BatchAnalyzer: bounded-concurrency fan-out, order preserved
 * - ResponseCache: TTL + LRU cache keyed by text digest and registry version
 * - InterpretationBridge: narrative from primary / fallback providers
 * - AnalysisService: cache, engine and bridge combined
 */

export { BatchAnalyzer, type BatchResult } from './batch';
export { ResponseCache, textDigest, type CacheStats, type ResponseCacheOptions } from './cache';
export {
  InterpretationBridge,
  ChatCompletionProvider,
  buildInterpretationPrompt,
  defaultInterpretation,
  toInterpretationInput,
  DEFAULT_MODEL_NAME,
  DEFAULT_SYSTEM_PROMPT,
  type ChatCompletionConfig,
  type InterpretationBridgeOptions,
  type InterpretOptions,
} from './interpretation';
export {
  AnalysisService,
  type AnalysisServiceOptions,
  type BridgeProviders,
  type ServiceRequest,
  type ServiceResponse,
} from './service';
export type {
  Analyzer,
  BatchOptions,
  FallbackMode,
  Interpretation,
  InterpretationInput,
  InterpretationProvider,
} from './types';
