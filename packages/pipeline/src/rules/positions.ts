/**
 * Mapping between character offsets, token indices and sentences
 */

import type { DetectedMarker, MarkerPosition, Sentence, Token } from '@marker-engine/core';

/** Inclusive token index range covered by a character span */
export interface TokenSpan {
  first: number;
  last: number;
}

export function tokenSpan(tokens: readonly Token[], position: MarkerPosition): TokenSpan | undefined {
  let first = -1;
  let last = -1;

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token.end > position.start && token.start < position.end) {
      if (first === -1) first = i;
      last = i;
    } else if (token.start >= position.end) {
      break;
    }
  }

  return first === -1 ? undefined : { first, last };
}

/**
 * Token gap between two spans; 0 when they overlap
 */
export function tokenDistance(a: TokenSpan, b: TokenSpan): number {
  if (a.last < b.first) return b.first - a.last;
  if (b.last < a.first) return a.first - b.last;
  return 0;
}

/**
 * Index of the sentence holding a character offset. Offsets between
 * sentences belong to the preceding one.
 */
export function sentenceIndexAt(sentences: readonly Sentence[], offset: number): number | undefined {
  let found: number | undefined;
  for (const sentence of sentences) {
    if (sentence.start > offset) break;
    found = sentence.index;
    if (offset < sentence.end) break;
  }
  return found;
}

/**
 * Smallest position covering every positioned instance
 */
export function coveringPosition(
  instances: readonly DetectedMarker[],
  sentences: readonly Sentence[]
): MarkerPosition | undefined {
  let start = Infinity;
  let end = -Infinity;

  for (const instance of instances) {
    if (!instance.position) continue;
    start = Math.min(start, instance.position.start);
    end = Math.max(end, instance.position.end);
  }

  if (start === Infinity) return undefined;

  const position: MarkerPosition = { start, end };
  const sentenceIndex = sentenceIndexAt(sentences, start);
  if (sentenceIndex !== undefined) position.sentence_index = sentenceIndex;
  return position;
}
