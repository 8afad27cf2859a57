/**
 * Enrichment adapters
 *
 * The engine depends only on `EnrichmentAdapter`; which implementation runs
 * is chosen by configuration when the engine is built.
 */

import { whitespaceTokens, type EnrichmentResult } from '@marker-engine/core';

export interface EnrichmentAdapter {
  readonly name: string;
  /**
   * Annotate a text. `signal` aborts when the caller stops waiting.
   */
  enrich(text: string, signal?: AbortSignal): Promise<EnrichmentResult>;
}

/**
 * Fallback annotation: whitespace tokens, the whole text as one sentence,
 * no entities and no sentiment
 */
export function degradedEnrichment(text: string): EnrichmentResult {
  return {
    tokens: whitespaceTokens(text),
    sentences: [{ index: 0, text, start: 0, end: text.length }],
    entities: [],
    sentimentAvailable: false,
  };
}

export class WhitespaceEnrichmentAdapter implements EnrichmentAdapter {
  readonly name = 'whitespace';

  async enrich(text: string): Promise<EnrichmentResult> {
    return degradedEnrichment(text);
  }
}
