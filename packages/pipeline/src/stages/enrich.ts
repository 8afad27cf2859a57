/**
 * ENRICH Stage
 *
 * Input: raw text
 * Output: tokens, sentences, entities and sentiment from the configured adapter
 *
 * Never throws: adapter errors and timeouts fall back to degraded enrichment
 * and are reported through `error`.
 */

import {
  EnrichmentError,
  errorMessage,
  silentLogger,
  type EngineConfig,
  type EnrichmentResult,
  type Logger,
} from '@marker-engine/core';
import {
  WhitespaceEnrichmentAdapter,
  degradedEnrichment,
  type EnrichmentAdapter,
} from '../enrichment/adapter';
import { LinguisticEnrichmentAdapter } from '../enrichment/linguistic';

export interface EnrichOptions {
  timeoutMs: number;
  /** Caller cancellation; forwarded to the adapter */
  signal?: AbortSignal;
  logger?: Logger;
}

export interface EnrichOutput {
  result: EnrichmentResult;
  enriched: boolean;
  error?: string;
}

export function createEnrichmentAdapter(kind: EngineConfig['enrichment']): EnrichmentAdapter {
  switch (kind) {
    case 'whitespace':
      return new WhitespaceEnrichmentAdapter();
    case 'linguistic':
      return new LinguisticEnrichmentAdapter();
  }
}

/**
 * Run the adapter bounded by `timeoutMs`
 */
export async function enrich(
  text: string,
  adapter: EnrichmentAdapter,
  options: EnrichOptions
): Promise<EnrichOutput> {
  const logger = options.logger ?? silentLogger;
  const controller = new AbortController();
  const onAbort = () => controller.abort();
  options.signal?.addEventListener('abort', onAbort, { once: true });

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new EnrichmentError(`Enrichment timed out after ${options.timeoutMs}ms`));
    }, options.timeoutMs);
  });

  try {
    const result = await Promise.race([
      Promise.resolve().then(() => adapter.enrich(text, controller.signal)),
      timeout,
    ]);
    return { result, enriched: true };
  } catch (error) {
    const message =
      error instanceof EnrichmentError
        ? error.message
        : `${adapter.name} adapter failed: ${errorMessage(error)}`;
    logger.warn(`Falling back to degraded enrichment: ${message}`);
    return { result: degradedEnrichment(text), enriched: false, error: message };
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', onAbort);
  }
}
