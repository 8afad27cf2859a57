import {
  appendDetected,
  applyEnrichment,
  createContext,
  unwrap,
  type ActivationRule,
  type AnalysisContext,
  type DetectedMarker,
  type EnrichmentResult,
  type MarkerDefinition,
  type MarkerDefinitionInput,
} from '@marker-engine/core';
import { loadRegistry, type MarkerRegistry } from '@marker-engine/registry';
import { degradedEnrichment } from '../enrichment/adapter.js';

export function buildRegistry(markers: MarkerDefinitionInput[], version = '1.0.0'): MarkerRegistry {
  return unwrap(loadRegistry({ schema_id: 'test', version, markers }));
}

/**
 * Atomic A, B and C plus a composed X with the given rule
 */
export function registryWithRule(activation: ActivationRule): MarkerRegistry {
  return buildRegistry([
    { id: 'A', pattern: 'alpha' },
    { id: 'B', pattern: 'beta' },
    { id: 'C', pattern: 'gamma' },
    { id: 'X', activation },
  ]);
}

export function definition(registry: MarkerRegistry, id: string): MarkerDefinition {
  const def = registry.get(id);
  if (!def) throw new Error(`no marker ${id}`);
  return def;
}

export function at(id: string, start: number, end: number, confidence = 1): DetectedMarker {
  return { marker_id: id, confidence, detection_phase: 'initial', position: { start, end } };
}

export function unpositioned(id: string, confidence = 1): DetectedMarker {
  return { marker_id: id, confidence, detection_phase: 'initial' };
}

export function contextFor(
  text: string,
  detected: DetectedMarker[],
  enrichment: EnrichmentResult = degradedEnrichment(text)
): AnalysisContext {
  const context = createContext({ text, schema_id: 'test' });
  appendDetected(context, detected);
  applyEnrichment(context, enrichment, enrichment.sentimentAvailable);
  return context;
}
