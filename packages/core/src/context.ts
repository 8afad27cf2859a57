/**
 * Analysis context
 *
 * Per-request accumulator carried through the phases. Owned by the
 * orchestrator for the lifetime of one analysis call and never shared.
 */

import type {
  AnalyzeRequest,
  DetectedMarker,
  EnrichmentResult,
  Entity,
  Sentence,
  Token,
} from './types';

// =============================================================================
// Orchestrator State Machine
// =============================================================================

export type EngineState =
  | 'init'
  | 'scanning'
  | 'enriching'
  | 'rescanning'
  | 'scoring'
  | 'done'
  | 'failed';

export type PhaseName = 'scanning' | 'enriching' | 'rescanning' | 'scoring';

const TRANSITIONS: Record<EngineState, EngineState[]> = {
  init: ['scanning', 'failed'],
  scanning: ['enriching'],
  enriching: ['rescanning'],
  rescanning: ['scoring'],
  scoring: ['done'],
  done: [],
  failed: [],
};

export function canTransition(from: EngineState, to: EngineState): boolean {
  return TRANSITIONS[from].includes(to);
}

// =============================================================================
// Context
// =============================================================================

export interface PhaseRecord {
  phase: PhaseName;
  durationMs: number;
  errors: string[];
}

export interface AnalysisContext {
  readonly text: string;
  readonly request: AnalyzeRequest;
  state: EngineState;

  // Enrichment (absent until the enriching phase completes)
  tokens?: Token[];
  sentences?: Sentence[];
  entities?: Entity[];
  sentimentAvailable: boolean;
  nlpEnriched: boolean;

  // Append-only across phases
  detected: DetectedMarker[];

  phaseMetadata: PhaseRecord[];
}

export function createContext(request: AnalyzeRequest): AnalysisContext {
  return {
    text: request.text,
    request,
    state: 'init',
    sentimentAvailable: false,
    nlpEnriched: false,
    detected: [],
    phaseMetadata: [],
  };
}

export function advance(context: AnalysisContext, next: EngineState): void {
  if (!canTransition(context.state, next)) {
    throw new Error(`Illegal state transition ${context.state} -> ${next}`);
  }
  context.state = next;
}

export function appendDetected(
  context: AnalysisContext,
  markers: readonly DetectedMarker[]
): void {
  context.detected.push(...markers);
}

export function applyEnrichment(
  context: AnalysisContext,
  enrichment: EnrichmentResult,
  enriched: boolean
): void {
  context.tokens = enrichment.tokens;
  context.sentences = enrichment.sentences;
  context.entities = enrichment.entities;
  context.sentimentAvailable = enrichment.sentimentAvailable;
  context.nlpEnriched = enriched;
}

export function recordPhase(
  context: AnalysisContext,
  phase: PhaseName,
  durationMs: number,
  errors: string[] = []
): void {
  context.phaseMetadata.push({ phase, durationMs, errors });
}

export function phaseRecord(
  context: AnalysisContext,
  phase: PhaseName
): PhaseRecord | undefined {
  return context.phaseMetadata.find((record) => record.phase === phase);
}
