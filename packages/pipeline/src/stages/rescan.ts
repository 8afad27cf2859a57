/**
 * RESCAN Stage
 *
 * Input: context after scanning and enrichment + registry snapshot
 * Output: contextual detections of composed markers
 *
 * One pass in the registry's evaluation order. Each marker sees every
 * detection made before it, including composed markers added earlier in the
 * pass. A marker whose evaluation throws is skipped and reported.
 */

import {
  RuleEvaluationError,
  appendDetected,
  silentLogger,
  type AnalysisContext,
  type DetectedMarker,
  type Logger,
} from '@marker-engine/core';
import type { MarkerRegistry } from '@marker-engine/registry';
import { DetectionIndex } from '../rules/detection-index';
import { ActivationRuleEngine, type RuleEngineOptions } from '../rules/evaluator';

export interface RescanOptions extends Partial<RuleEngineOptions> {
  logger?: Logger;
}

export interface RescanOutput {
  added: DetectedMarker[];
  errors: RuleEvaluationError[];
}

export function rescan(
  context: AnalysisContext,
  registry: MarkerRegistry,
  options: RescanOptions = {}
): RescanOutput {
  const logger = options.logger ?? silentLogger;
  const engine = new ActivationRuleEngine(registry, options);
  const index = DetectionIndex.from(context.detected);
  const added: DetectedMarker[] = [];
  const errors: RuleEvaluationError[] = [];

  for (const marker of registry.composedMarkers()) {
    try {
      const detected = engine.evaluate(marker, context, index);
      if (detected) {
        appendDetected(context, [detected]);
        index.add(detected);
        added.push(detected);
      }
    } catch (cause) {
      const error = new RuleEvaluationError(marker.id, cause);
      logger.warn(`Skipping marker: ${error.message}`);
      errors.push(error);
    }
  }

  return { added, errors };
}
