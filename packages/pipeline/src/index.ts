/**
 * @marker-engine/pipeline - Analysis phases and the MarkerEngine orchestrator
 *
 * 4 stages: SCAN → ENRICH → RESCAN → SCORE
 */

export * from './stages/scan';
export * from './stages/enrich';
export * from './stages/rescan';
export * from './stages/score';
export * from './enrichment/adapter';
export * from './enrichment/linguistic';
export { isNegationCue, scoreSentiment } from './enrichment/lexicon';
export * from './rules/detection-index';
export * from './rules/positions';
export * from './rules/evaluator';
export * from './engine';
