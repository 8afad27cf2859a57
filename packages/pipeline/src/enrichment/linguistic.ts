/**
 * Linguistic enrichment backed by the compromise NLP library
 *
 * compromise segments sentences and finds named entities; tokens come from
 * the core word tokenizer so their offsets line up with the matcher's, and
 * sentence sentiment is scored against the bundled lexicon.
 */

import nlp from 'compromise';
import { z } from 'zod';
import {
  EnrichmentError,
  errorMessage,
  wordTokens,
  type EnrichmentResult,
  type Entity,
  type EntityType,
  type Sentence,
  type Token,
} from '@marker-engine/core';
import type { EnrichmentAdapter } from './adapter';
import { scoreSentiment } from './lexicon';

const OffsetViewSchema = z.array(
  z.object({
    text: z.string(),
    offset: z.object({ start: z.number().int().min(0), length: z.number().int().min(0) }),
  })
);

type OffsetView = z.infer<typeof OffsetViewSchema>;

export interface LinguisticAdapterConfig {
  /** Extract people, places and organizations */
  entities: boolean;
  /** Score sentence sentiment */
  sentiment: boolean;
}

const DEFAULT_CONFIG: LinguisticAdapterConfig = {
  entities: true,
  sentiment: true,
};

export class LinguisticEnrichmentAdapter implements EnrichmentAdapter {
  readonly name = 'linguistic';
  private readonly config: LinguisticAdapterConfig;

  constructor(config: Partial<LinguisticAdapterConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async enrich(text: string, signal?: AbortSignal): Promise<EnrichmentResult> {
    if (signal?.aborted) {
      throw new EnrichmentError('Enrichment aborted before it started');
    }

    const tokens = wordTokens(text);
    if (text.trim().length === 0) {
      return { tokens, sentences: [], entities: [], sentimentAvailable: this.config.sentiment };
    }

    try {
      const doc = nlp(text);
      const sentences = this.sentences(readOffsets(doc.sentences().json({ offset: true })), text, tokens);
      const entities = this.config.entities
        ? [
            ...toEntities(readOffsets(doc.people().json({ offset: true })), 'person', text),
            ...toEntities(readOffsets(doc.places().json({ offset: true })), 'place', text),
            ...toEntities(readOffsets(doc.organizations().json({ offset: true })), 'organization', text),
          ].sort((a, b) => a.start - b.start)
        : [];

      return { tokens, sentences, entities, sentimentAvailable: this.config.sentiment };
    } catch (cause) {
      if (cause instanceof EnrichmentError) throw cause;
      throw new EnrichmentError(`compromise failed: ${errorMessage(cause)}`, { cause });
    }
  }

  private sentences(views: OffsetView, text: string, tokens: Token[]): Sentence[] {
    return views.map((view, index) => {
      const [start, end] = clampSpan(view.offset.start, view.offset.length, text.length);
      const sentence: Sentence = { index, text: text.slice(start, end), start, end };

      if (this.config.sentiment) {
        const words = tokens.filter((t) => t.start >= start && t.end <= end).map((t) => t.text);
        sentence.sentiment = scoreSentiment(words);
      }
      return sentence;
    });
  }
}

function readOffsets(json: unknown): OffsetView {
  const parsed = OffsetViewSchema.safeParse(json);
  if (!parsed.success) {
    throw new EnrichmentError(`Unexpected compromise output: ${parsed.error.issues[0].message}`);
  }
  return parsed.data;
}

function toEntities(views: OffsetView, type: EntityType, text: string): Entity[] {
  return views.map((view) => {
    const [start, end] = clampSpan(view.offset.start, view.offset.length, text.length);
    return { text: text.slice(start, end), type, start, end };
  });
}

function clampSpan(start: number, length: number, max: number): [number, number] {
  const from = Math.min(start, max);
  return [from, Math.min(from + length, max)];
}
