/**
 * MarkerEngine - Main analysis orchestrator
 *
 * Runs the phases strictly in sequence:
 * SCAN → ENRICH → RESCAN → SCORE
 *
 * Scanning, enrichment and rescanning are isolated: a failure inside one is
 * recorded in the response and contributes an empty or degraded result.
 * Only an invalid request, an unavailable registry or cancellation reject.
 */

import {
  AnalysisAbortedError,
  AnalyzeRequestSchema,
  RegistryLoadError,
  RequestValidationError,
  advance,
  appendDetected,
  applyEnrichment,
  createContext,
  createLogger,
  errorMessage,
  loadConfig,
  phaseRecord,
  recordPhase,
  type AnalysisContext,
  type AnalyzeRequest,
  type AnalyzeResponse,
  type EngineConfig,
  type EngineConfigInput,
  type EngineState,
  type Logger,
  type PhaseName,
} from '@marker-engine/core';
import { MarkerRegistry, RegistryStore, type MarkerSource } from '@marker-engine/registry';
import { degradedEnrichment, type EnrichmentAdapter } from './enrichment/adapter';
import { sentenceIndexAt } from './rules/positions';
import { createEnrichmentAdapter, enrich, type EnrichOutput } from './stages/enrich';
import { rescan } from './stages/rescan';
import { scan } from './stages/scan';
import { score } from './stages/score';

// =============================================================================
// Engine Configuration
// =============================================================================

export interface MarkerEngineOptions {
  /** A fixed snapshot, or a store resolving the snapshot per schema id */
  registry: MarkerRegistry | RegistryStore;
  config?: EngineConfigInput;
  /** Overrides the adapter selected by `config.enrichment` */
  enrichmentAdapter?: EnrichmentAdapter;
  logger?: Logger;
  /** Called after each phase with its duration */
  onPhaseComplete?: (phase: PhaseName, durationMs: number) => void;
}

export interface AnalyzeOptions {
  /** Checked at every phase boundary */
  signal?: AbortSignal;
}

// =============================================================================
// MarkerEngine Class
// =============================================================================

export class MarkerEngine {
  readonly config: EngineConfig;
  private readonly registrySource: MarkerRegistry | RegistryStore;
  private readonly adapter: EnrichmentAdapter;
  private readonly logger: Logger;
  private readonly onPhaseComplete?: (phase: PhaseName, durationMs: number) => void;

  constructor(options: MarkerEngineOptions) {
    this.config = loadConfig(options.config);
    this.registrySource = options.registry;
    this.adapter = options.enrichmentAdapter ?? createEnrichmentAdapter(this.config.enrichment);
    this.logger = options.logger ?? createLogger('MarkerEngine', this.config.logLevel);
    this.onPhaseComplete = options.onPhaseComplete;
  }

  /**
   * An engine serving registries from a source through a store built from
   * the same configuration
   */
  static fromSource(
    source: MarkerSource,
    options: Omit<MarkerEngineOptions, 'registry'> = {}
  ): MarkerEngine {
    const config = loadConfig(options.config);
    return new MarkerEngine({
      ...options,
      config,
      registry: RegistryStore.fromConfig(source, config, options.logger),
    });
  }

  /**
   * Main analysis entry point
   */
  async analyze(input: AnalyzeRequest, options: AnalyzeOptions = {}): Promise<AnalyzeResponse> {
    const startTime = performance.now();
    const request = this.validateRequest(input);
    const context = createContext(request);

    let registry: MarkerRegistry;
    try {
      this.checkAborted(options.signal, 'scanning');
      registry = await this.registryFor(request.schema_id);
    } catch (error) {
      this.transition(context, 'failed');
      throw error;
    }

    // Phase 1: SCAN
    this.transition(context, 'scanning');
    await this.runPhase(context, 'scanning', () => {
      appendDetected(
        context,
        scan(context.text, registry, { similarityThreshold: this.config.similarityThreshold })
      );
      return [];
    });
    const markersFound = context.detected.length;

    // Phase 2: ENRICH
    this.checkAborted(options.signal, 'enriching');
    this.transition(context, 'enriching');
    let enrichment: EnrichOutput = { result: degradedEnrichment(context.text), enriched: false };
    await this.runPhase(context, 'enriching', async () => {
      if (request.enable_nlp !== false) {
        enrichment = await enrich(context.text, this.adapter, {
          timeoutMs: this.config.enrichmentTimeoutMs,
          signal: options.signal,
          logger: this.logger,
        });
      }
      applyEnrichment(context, enrichment.result, enrichment.enriched);
      annotateSentences(context);
      return enrichment.error ? [enrichment.error] : [];
    });

    // Phase 3: RESCAN
    this.checkAborted(options.signal, 'rescanning');
    this.transition(context, 'rescanning');
    let markersAdded = 0;
    await this.runPhase(context, 'rescanning', () => {
      if (request.enable_contextual === false) return [];
      const output = rescan(context, registry, {
        negationRadius: this.config.negationRadius,
        logger: this.logger,
      });
      markersAdded = output.added.length;
      return output.errors.map((e) => e.message);
    });

    // Phase 4: SCORE
    this.checkAborted(options.signal, 'scoring');
    this.transition(context, 'scoring');
    let totalScore = 0;
    await this.runPhase(context, 'scoring', () => {
      totalScore = score(context.detected, registry);
      return [];
    });
    this.transition(context, 'done');

    return this.buildResponse(context, registry, {
      markersFound,
      markersAdded,
      totalScore,
      totalMs: performance.now() - startTime,
    });
  }

  // ===========================================================================
  // Phase Runners
  // ===========================================================================

  /**
   * Run one phase, timing it and recording its errors. A throwing phase
   * records the error and the analysis moves on.
   */
  private async runPhase(
    context: AnalysisContext,
    phase: PhaseName,
    body: () => string[] | Promise<string[]>
  ): Promise<void> {
    const start = performance.now();
    let errors: string[] = [];

    try {
      errors = await body();
    } catch (error) {
      if (phase === 'scoring') throw error;
      const message = errorMessage(error);
      this.logger.error(`Phase ${phase} failed: ${message}`);
      errors = [message];
    }

    const durationMs = performance.now() - start;
    recordPhase(context, phase, durationMs, errors);
    this.onPhaseComplete?.(phase, durationMs);
  }

  private checkAborted(signal: AbortSignal | undefined, phase: PhaseName): void {
    if (signal?.aborted) {
      this.logger.info(`Analysis aborted before ${phase}`);
      throw new AnalysisAbortedError(phase);
    }
  }

  private transition(context: AnalysisContext, next: EngineState): void {
    this.logger.debug(`${context.state} -> ${next}`);
    advance(context, next);
  }

  // ===========================================================================
  // Request & Registry Resolution
  // ===========================================================================

  /**
   * Parse a request, rejecting with RequestValidationError
   */
  validateRequest(input: AnalyzeRequest): AnalyzeRequest {
    const parsed = AnalyzeRequestSchema.safeParse(input);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue.path.join('.');
      throw new RequestValidationError(`Invalid request: ${field ? `${field}: ` : ''}${issue.message}`, field);
    }
    if (parsed.data.text.length > this.config.maxTextLength) {
      throw new RequestValidationError(
        `Invalid request: text exceeds ${this.config.maxTextLength} characters`,
        'text'
      );
    }
    return parsed.data;
  }

  /**
   * Snapshot serving a schema; rejects with RegistryLoadError
   */
  async registryFor(schemaId: string): Promise<MarkerRegistry> {
    if (!(this.registrySource instanceof MarkerRegistry)) {
      return this.registrySource.get(schemaId);
    }
    if (this.registrySource.schemaId !== schemaId) {
      throw new RegistryLoadError(schemaId, [
        {
          code: 'invalid_document',
          message: `No registry loaded for schema ${schemaId} (engine serves ${this.registrySource.schemaId})`,
        },
      ]);
    }
    return this.registrySource;
  }

  // ===========================================================================
  // Response Assembly
  // ===========================================================================

  private buildResponse(
    context: AnalysisContext,
    registry: MarkerRegistry,
    summary: { markersFound: number; markersAdded: number; totalScore: number; totalMs: number }
  ): AnalyzeResponse {
    const durationOf = (phase: PhaseName) => phaseRecord(context, phase)?.durationMs ?? 0;
    const errorOf = (phase: PhaseName) => {
      const errors = phaseRecord(context, phase)?.errors ?? [];
      return errors.length > 0 ? { error: errors.join('; ') } : {};
    };

    const response: AnalyzeResponse = {
      schema_id: context.request.schema_id,
      registry_version: registry.version,
      markers: context.detected,
      marker_count: context.detected.length,
      total_score: summary.totalScore,
      phases: {
        initial: { markers_found: summary.markersFound, ...errorOf('scanning') },
        enrichment: { enriched: context.nlpEnriched, ...errorOf('enriching') },
        contextual: { markers_added: summary.markersAdded, ...errorOf('rescanning') },
      },
      nlp_enriched: context.nlpEnriched,
      performance_metrics: {
        phase_durations_ms: {
          scanning: durationOf('scanning'),
          enriching: durationOf('enriching'),
          rescanning: durationOf('rescanning'),
          scoring: durationOf('scoring'),
          total: summary.totalMs,
        },
      },
    };
    if (context.request.session_id !== undefined) {
      response.session_id = context.request.session_id;
    }
    return response;
  }
}

/**
 * Attach sentence indices to positions found before enrichment
 */
function annotateSentences(context: AnalysisContext): void {
  const sentences = context.sentences ?? [];
  for (const marker of context.detected) {
    if (!marker.position) continue;
    const index = sentenceIndexAt(sentences, marker.position.start);
    if (index !== undefined) marker.position.sentence_index = index;
  }
}
