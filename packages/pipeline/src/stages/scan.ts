/**
 * SCAN Stage
 *
 * Input: raw text + registry snapshot
 * Output: initial detections of atomic markers
 *
 * Per marker the first method with a hit wins:
 * 1. keyword containment of examples (only when there is no pattern)
 * 2. regex pattern
 * 3. example similarity (token overlap ratio)
 */

import { tokenize, type DetectedMarker, type MarkerDefinition } from '@marker-engine/core';
import type { MarkerRegistry } from '@marker-engine/registry';

export interface ScanOptions {
  /** Minimum token-overlap ratio for a similarity match */
  similarityThreshold: number;
}

const DEFAULT_OPTIONS: ScanOptions = {
  similarityThreshold: 0.6,
};

interface Span {
  start: number;
  end: number;
}

/**
 * Main scan function
 */
export function scan(
  text: string,
  registry: MarkerRegistry,
  options: Partial<ScanOptions> = {}
): DetectedMarker[] {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const detected: DetectedMarker[] = [];
  if (text.length === 0) return detected;

  const textTokens = new Set(tokenize(text));

  for (const marker of registry.atomicMarkers()) {
    const confidence = marker.metadata.confidence_default ?? 1.0;

    const spans =
      marker.pattern === undefined
        ? keywordSpans(text, marker.examples)
        : regexSpans(text, registry.patternOf(marker.id));

    if (spans.length > 0) {
      for (const span of spans) {
        detected.push({
          marker_id: marker.id,
          confidence,
          detection_phase: 'initial',
          position: { start: span.start, end: span.end },
        });
      }
      continue;
    }

    const ratio = bestSimilarity(marker, textTokens);
    if (ratio !== undefined && ratio >= opts.similarityThreshold) {
      detected.push({ marker_id: marker.id, confidence: ratio, detection_phase: 'initial' });
    }
  }

  return detected;
}

// =============================================================================
// Matching Methods
// =============================================================================

/**
 * Case-insensitive occurrences of every example. Where occurrences of
 * different examples overlap, the earliest wins, then the longest.
 */
export function keywordSpans(text: string, examples: readonly string[]): Span[] {
  const candidates: Span[] = [];

  for (const example of examples) {
    if (example.trim().length === 0) continue;
    const pattern = new RegExp(escapeRegExp(example), 'giu');
    for (const match of text.matchAll(pattern)) {
      const start = match.index ?? 0;
      candidates.push({ start, end: start + match[0].length });
    }
  }

  return selectDisjoint(candidates);
}

/**
 * Every non-overlapping, non-empty match of a compiled pattern
 */
export function regexSpans(text: string, pattern: RegExp | undefined): Span[] {
  if (!pattern) return [];
  const spans: Span[] = [];

  for (const match of text.matchAll(pattern)) {
    if (match[0].length === 0) continue;
    const start = match.index ?? 0;
    spans.push({ start, end: start + match[0].length });
  }

  return spans;
}

/**
 * Best overlap ratio |tokens(example) ∩ tokens(text)| / |tokens(example)|
 * over the marker's examples
 */
export function bestSimilarity(
  marker: MarkerDefinition,
  textTokens: ReadonlySet<string>
): number | undefined {
  let best: number | undefined;

  for (const example of marker.examples) {
    const exampleTokens = new Set(tokenize(example));
    if (exampleTokens.size === 0) continue;

    let shared = 0;
    for (const token of exampleTokens) {
      if (textTokens.has(token)) shared++;
    }
    const ratio = shared / exampleTokens.size;
    if (best === undefined || ratio > best) best = ratio;
  }

  return best;
}

function selectDisjoint(candidates: Span[]): Span[] {
  const ordered = [...candidates].sort((a, b) => a.start - b.start || b.end - a.end);
  const selected: Span[] = [];
  let cursor = -1;

  for (const span of ordered) {
    if (span.start >= cursor) {
      selected.push(span);
      cursor = span.end;
    }
  }

  return selected;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
