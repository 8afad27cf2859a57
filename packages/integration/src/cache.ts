/**
 * Response cache
 *
 * Keyed by sha256(text), schema id, registry version and the phase switches,
 * so a registry reload never serves responses computed against the old
 * snapshot. Entries expire after `ttlMs`; the least recently used entry is
 * evicted once `maxEntries` is reached.
 */

import { createHash } from 'node:crypto';
import type { AnalyzeRequest, AnalyzeResponse } from '@marker-engine/core';

export interface ResponseCacheOptions {
  ttlMs: number;
  maxEntries: number;
}

const DEFAULT_OPTIONS: ResponseCacheOptions = {
  ttlMs: 3_600_000,
  maxEntries: 1000,
};

interface CacheEntry {
  response: AnalyzeResponse;
  expiresAt: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
}

export function textDigest(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

export class ResponseCache {
  private readonly options: ResponseCacheOptions;
  // Map iteration order doubles as recency order
  private entries: Map<string, CacheEntry> = new Map();
  private hits = 0;
  private misses = 0;

  constructor(options: Partial<ResponseCacheOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  static key(request: AnalyzeRequest, registryVersion: string): string {
    return [
      request.schema_id,
      registryVersion,
      request.enable_nlp === false ? 'no-nlp' : 'nlp',
      request.enable_contextual === false ? 'no-contextual' : 'contextual',
      textDigest(request.text),
    ].join(':');
  }

  /**
   * A copy of the cached response, or undefined when absent or expired
   */
  get(key: string): AnalyzeResponse | undefined {
    const entry = this.entries.get(key);
    if (!entry || entry.expiresAt <= Date.now()) {
      if (entry) this.entries.delete(key);
      this.misses++;
      return undefined;
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;
    return structuredClone(entry.response);
  }

  set(key: string, response: AnalyzeResponse): void {
    this.entries.delete(key);
    while (this.entries.size >= this.options.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    this.entries.set(key, {
      response: structuredClone(response),
      expiresAt: Date.now() + this.options.ttlMs,
    });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Drop expired entries; returns how many were removed
   */
  prune(): number {
    const now = Date.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): CacheStats {
    return { hits: this.hits, misses: this.misses, size: this.entries.size };
  }
}
