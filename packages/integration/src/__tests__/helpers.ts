import {
  silentLogger,
  unwrap,
  type AnalyzeResponse,
  type EngineConfigInput,
  type EnrichmentResult,
  type MarkerDefinitionInput,
} from '@marker-engine/core';
import { loadRegistry, type MarkerRegistry } from '@marker-engine/registry';
import {
  MarkerEngine,
  degradedEnrichment,
  type EnrichmentAdapter,
  type MarkerEngineOptions,
} from '@marker-engine/pipeline';

export const MARKERS: MarkerDefinitionInput[] = [
  { id: 'A_ONE', pattern: '\\bone\\b' },
  { id: 'A_TWO', pattern: '\\btwo\\b' },
  { id: 'C_BOTH', activation: { type: 'ALL', components: ['A_ONE', 'A_TWO'] } },
];

export function testRegistry(version = '1.0.0'): MarkerRegistry {
  return unwrap(loadRegistry({ schema_id: 'test', version, markers: MARKERS }));
}

export function createEngine(
  config: EngineConfigInput = {},
  extra: Partial<MarkerEngineOptions> = {}
): MarkerEngine {
  return new MarkerEngine({
    registry: testRegistry(),
    config: { enrichment: 'whitespace', logLevel: 'silent', ...config },
    logger: silentLogger,
    ...extra,
  });
}

/**
 * Adapter that holds every call for `delayMs` and records how many overlap
 */
export class CountingAdapter implements EnrichmentAdapter {
  readonly name = 'counting';
  active = 0;
  maxActive = 0;
  calls = 0;

  constructor(private readonly delayMs = 5) {}

  async enrich(text: string): Promise<EnrichmentResult> {
    this.calls++;
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    this.active--;
    return degradedEnrichment(text);
  }
}

export function sampleResponse(overrides: Partial<AnalyzeResponse> = {}): AnalyzeResponse {
  return {
    schema_id: 'test',
    registry_version: '1.0.0',
    markers: [{ marker_id: 'A_ONE', confidence: 1, detection_phase: 'initial', position: { start: 0, end: 3 } }],
    marker_count: 1,
    total_score: 1,
    phases: {
      initial: { markers_found: 1 },
      enrichment: { enriched: true },
      contextual: { markers_added: 0 },
    },
    nlp_enriched: true,
    performance_metrics: {
      phase_durations_ms: { scanning: 1, enriching: 1, rescanning: 1, scoring: 1, total: 4 },
    },
    ...overrides,
  };
}
