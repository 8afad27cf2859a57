/**
 * SCORE Stage
 *
 * total = Σ weight(marker) × confidence over every detection; weight
 * defaults to 1.0. No normalization.
 */

import type { DetectedMarker } from '@marker-engine/core';
import type { MarkerRegistry } from '@marker-engine/registry';

export function score(detected: readonly DetectedMarker[], registry: MarkerRegistry): number {
  return detected.reduce(
    (total, marker) => total + registry.weightOf(marker.marker_id) * marker.confidence,
    0
  );
}
