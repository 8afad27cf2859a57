import {
  createLogger,
  type AnalyzeRequest,
  type AnalyzeResponse,
  type EngineConfig,
  type Logger,
} from '@marker-engine/core';
import type { AnalyzeOptions, MarkerEngine } from '@marker-engine/pipeline';
import { ResponseCache } from './cache';
import {
  InterpretationBridge,
  toInterpretationInput,
  type InterpretationBridgeOptions,
} from './interpretation';
import type { Analyzer, Interpretation } from './types';

export interface AnalysisServiceOptions {
  engine: MarkerEngine;
  /** Defaults to a cache sized from the engine config; `false` disables caching */
  cache?: ResponseCache | false;
  /**
   * A ready bridge, or the providers for one bounded by `bridgeTimeoutMs`.
   * Without a bridge responses carry no interpretation.
   */
  bridge?: InterpretationBridge | BridgeProviders;
  logger?: Logger;
}

export type BridgeProviders = Pick<InterpretationBridgeOptions, 'primary'> &
  Partial<Pick<InterpretationBridgeOptions, 'fallback' | 'fallbackMode'>>;

export interface ServiceRequest extends AnalyzeRequest {
  /** Ask the bridge for a narrative; defaults to true when a bridge is configured */
  interpret?: boolean;
}

export interface ServiceResponse extends AnalyzeResponse {
  /** Served from the response cache */
  cached: boolean;
  interpretation?: Interpretation;
}

/**
 * Caller-side analysis: response cache in front of the engine, optional
 * interpretation behind it
 */
export class AnalysisService implements Analyzer<ServiceRequest, ServiceResponse> {
  private readonly engine: MarkerEngine;
  private readonly cache?: ResponseCache;
  private readonly bridge?: InterpretationBridge;
  private readonly logger: Logger;

  constructor(options: AnalysisServiceOptions) {
    this.engine = options.engine;
    this.logger = options.logger ?? createLogger('AnalysisService', this.engine.config.logLevel);

    if (options.bridge instanceof InterpretationBridge) {
      this.bridge = options.bridge;
    } else if (options.bridge) {
      this.bridge = new InterpretationBridge({
        ...options.bridge,
        timeoutMs: this.engine.config.bridgeTimeoutMs,
        logger: this.logger,
      });
    }

    if (options.cache !== false) {
      this.cache =
        options.cache ??
        new ResponseCache({
          ttlMs: this.engine.config.cacheTtlMs,
          maxEntries: this.engine.config.cacheMaxEntries,
        });
    }
  }

  get config(): EngineConfig {
    return this.engine.config;
  }

  async analyze(input: ServiceRequest, options: AnalyzeOptions = {}): Promise<ServiceResponse> {
    const request = this.engine.validateRequest(input);
    const { response, cached } = await this.analyzeCached(request, options);

    const wantsInterpretation = input.interpret ?? true;
    if (!this.bridge || !wantsInterpretation) {
      return { ...response, cached };
    }

    const interpretation = await this.bridge.interpret(toInterpretationInput(response), options);
    return interpretation ? { ...response, cached, interpretation } : { ...response, cached };
  }

  private async analyzeCached(
    request: AnalyzeRequest,
    options: AnalyzeOptions
  ): Promise<{ response: AnalyzeResponse; cached: boolean }> {
    if (!this.cache) {
      return { response: await this.engine.analyze(request, options), cached: false };
    }

    const registry = await this.engine.registryFor(request.schema_id);
    const hit = this.cache.get(ResponseCache.key(request, registry.version));
    if (hit) {
      this.logger.debug(`Cache hit for ${request.schema_id}@${registry.version}`);
      return { response: withSession(hit, request.session_id), cached: true };
    }

    const response = await this.engine.analyze(request, options);
    this.cache.set(ResponseCache.key(request, response.registry_version), response);
    return { response, cached: false };
  }
}

/**
 * A cached response answering a request from another session
 */
function withSession(response: AnalyzeResponse, sessionId: string | undefined): AnalyzeResponse {
  const { session_id: _cachedSession, ...rest } = response;
  return sessionId === undefined ? rest : { ...rest, session_id: sessionId };
}
