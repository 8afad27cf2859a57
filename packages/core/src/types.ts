/**
 * Core types for the Marker Engine
 *
 * Wire formats (registry documents, requests, responses) keep the snake_case
 * keys they are exchanged with; zod schemas validate them at the boundary.
 */

import { z } from 'zod';

// =============================================================================
// Activation Rules
// =============================================================================

export const RULE_TYPES = [
  'ALL',
  'ANY',
  'ANY_N',
  'TEMPORAL',
  'PROXIMITY',
  'SENTIMENT',
  'NEGATION',
  'PATTERN',
  'COMPOSITE',
] as const;

export type RuleType = (typeof RULE_TYPES)[number];

export const SentimentAlignmentSchema = z.enum([
  'positive',
  'negative',
  'neutral',
  'consistent',  // all considered sentences share one non-neutral polarity
  'contrasting', // positive and negative sentences both present
]);

export type SentimentAlignment = z.infer<typeof SentimentAlignmentSchema>;

export type Combinator = 'ALL' | 'ANY';

export type ActivationRule =
  | { type: 'ALL'; components: string[] }
  | { type: 'ANY'; components: string[] }
  | { type: 'ANY_N'; components: string[]; n: number }
  | { type: 'TEMPORAL'; components: string[]; window: number; strict_order?: boolean }
  | { type: 'PROXIMITY'; components: string[]; max_distance: number }
  | { type: 'SENTIMENT'; alignment: SentimentAlignment; components?: string[] }
  | { type: 'NEGATION'; rule: ActivationRule; allows_negation?: boolean; radius?: number }
  | { type: 'PATTERN'; regex: string }
  | { type: 'COMPOSITE'; rules: ActivationRule[]; combinator: Combinator };

const ComponentsSchema = z.array(z.string().min(1)).min(1);

export const ActivationRuleSchema: z.ZodType<ActivationRule> = z.lazy(() =>
  z.discriminatedUnion('type', [
    z.object({ type: z.literal('ALL'), components: ComponentsSchema }),
    z.object({ type: z.literal('ANY'), components: ComponentsSchema }),
    z.object({
      type: z.literal('ANY_N'),
      components: ComponentsSchema,
      n: z.number().int(),
    }),
    z.object({
      type: z.literal('TEMPORAL'),
      components: ComponentsSchema,
      window: z.number().int().min(1),
      strict_order: z.boolean().optional(),
    }),
    z.object({
      type: z.literal('PROXIMITY'),
      components: ComponentsSchema,
      max_distance: z.number().int().min(0),
    }),
    z.object({
      type: z.literal('SENTIMENT'),
      alignment: SentimentAlignmentSchema,
      components: ComponentsSchema.optional(),
    }),
    z.object({
      type: z.literal('NEGATION'),
      rule: ActivationRuleSchema,
      allows_negation: z.boolean().optional(),
      radius: z.number().int().min(0).optional(),
    }),
    z.object({ type: z.literal('PATTERN'), regex: z.string().min(1) }),
    z.object({
      type: z.literal('COMPOSITE'),
      rules: z.array(ActivationRuleSchema).min(1),
      combinator: z.enum(['ALL', 'ANY']),
    }),
  ])
);

// =============================================================================
// Marker Definitions
// =============================================================================

export const MarkerFrameSchema = z.object({
  signal: z.union([z.string(), z.array(z.string())]).optional(),
  concept: z.string().optional(),
  pragmatics: z.string().optional(),
  narrative: z.string().optional(),
});

export type MarkerFrame = z.infer<typeof MarkerFrameSchema>;

export const MarkerMetadataSchema = z.object({
  category: z.string().optional(),
  confidence_default: z.number().min(0).max(1).optional(),
  version: z.string().optional(),
  tags: z.array(z.string()).default([]),
  weight: z.number().finite().optional(),
  description: z.string().optional(),
});

export type MarkerMetadata = z.infer<typeof MarkerMetadataSchema>;

export const MarkerDefinitionSchema = z.object({
  id: z.string().min(1),
  frame: MarkerFrameSchema.default({}),
  examples: z.array(z.string()).default([]),
  pattern: z.string().min(1).optional(),
  composed_of: z.array(z.string().min(1)).optional(),
  activation: ActivationRuleSchema.optional(),
  metadata: MarkerMetadataSchema.default({}),
});

export type MarkerDefinition = z.infer<typeof MarkerDefinitionSchema>;
export type MarkerDefinitionInput = z.input<typeof MarkerDefinitionSchema>;

/**
 * Raw registry document as read from a marker source. Markers are either a
 * list or a map keyed by id; entries are validated one by one by the loader.
 */
export const RegistryDataSchema = z.object({
  schema_id: z.string().min(1).optional(),
  version: z.string().min(1).optional(),
  markers: z.union([z.array(z.unknown()), z.record(z.unknown())]),
});

export type RegistryData = z.infer<typeof RegistryDataSchema>;

// =============================================================================
// Enrichment
// =============================================================================

export type Polarity = 'positive' | 'negative' | 'neutral';

export interface Token {
  text: string;
  start: number;
  end: number;
}

export interface SentenceSentiment {
  polarity: Polarity;
  /** In [-1, 1] */
  score: number;
}

export interface Sentence {
  index: number;
  text: string;
  start: number;
  end: number;
  sentiment?: SentenceSentiment;
}

export type EntityType = 'person' | 'place' | 'organization';

export interface Entity {
  text: string;
  type: EntityType;
  start: number;
  end: number;
}

export interface EnrichmentResult {
  tokens: Token[];
  sentences: Sentence[];
  entities: Entity[];
  sentimentAvailable: boolean;
}

// =============================================================================
// Detection Output
// =============================================================================

export type DetectionPhase = 'initial' | 'contextual';

export interface MarkerPosition {
  start: number;
  end: number;
  sentence_index?: number;
}

export interface DetectedMarker {
  marker_id: string;
  confidence: number;
  detection_phase: DetectionPhase;
  position?: MarkerPosition;
  components?: string[];
}

// =============================================================================
// Engine Interface
// =============================================================================

export const AnalyzeRequestSchema = z.object({
  text: z.string(),
  schema_id: z.string().min(1),
  session_id: z.string().optional(),
  enable_nlp: z.boolean().optional(),
  enable_contextual: z.boolean().optional(),
});

export type AnalyzeRequest = z.infer<typeof AnalyzeRequestSchema>;

export interface InitialPhaseReport {
  markers_found: number;
  error?: string;
}

export interface EnrichmentPhaseReport {
  enriched: boolean;
  error?: string;
}

export interface ContextualPhaseReport {
  markers_added: number;
  error?: string;
}

export interface PhaseDurations {
  scanning: number;
  enriching: number;
  rescanning: number;
  scoring: number;
  total: number;
}

export interface AnalyzeResponse {
  schema_id: string;
  registry_version: string;
  session_id?: string;
  markers: DetectedMarker[];
  marker_count: number;
  total_score: number;
  phases: {
    initial: InitialPhaseReport;
    enrichment: EnrichmentPhaseReport;
    contextual: ContextualPhaseReport;
  };
  nlp_enriched: boolean;
  performance_metrics: {
    phase_durations_ms: PhaseDurations;
  };
}
