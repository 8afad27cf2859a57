/**
 * Registry Store - current snapshot per schema id
 *
 * Snapshots are swapped, never mutated: an analysis that captured a snapshot
 * keeps using it after a reload.
 */

import { createLogger, silentLogger, unwrap, type EngineConfig, type Logger } from '@marker-engine/core';
import { loadRegistry } from './loader';
import type { MarkerRegistry } from './registry';
import type { MarkerSource } from './sources';

export interface RegistryStoreOptions {
  maxRuleDepth: number;
  logger: Logger;
}

const DEFAULT_OPTIONS: RegistryStoreOptions = {
  maxRuleDepth: 16,
  logger: silentLogger,
};

export class RegistryStore {
  private readonly options: RegistryStoreOptions;
  private snapshots: Map<string, MarkerRegistry> = new Map();
  private pending: Map<string, Promise<MarkerRegistry>> = new Map();

  constructor(
    private readonly source: MarkerSource,
    options: Partial<RegistryStoreOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * A store whose loads apply the configured rule depth and log level
   */
  static fromConfig(
    source: MarkerSource,
    config: Pick<EngineConfig, 'maxRuleDepth' | 'logLevel'>,
    logger: Logger = createLogger('RegistryStore', config.logLevel)
  ): RegistryStore {
    return new RegistryStore(source, { maxRuleDepth: config.maxRuleDepth, logger });
  }

  /**
   * Current snapshot for a schema, loading it on first use.
   * Rejects with RegistryLoadError when the document is missing or invalid.
   */
  async get(schemaId: string): Promise<MarkerRegistry> {
    const cached = this.snapshots.get(schemaId);
    if (cached) return cached;

    const inFlight = this.pending.get(schemaId);
    if (inFlight) return inFlight;

    return this.track(schemaId, this.fetch(schemaId));
  }

  /**
   * Load a fresh snapshot and swap it in. On failure the previous snapshot
   * stays current.
   */
  async reload(schemaId: string, version?: string): Promise<MarkerRegistry> {
    return this.track(schemaId, this.fetch(schemaId, version));
  }

  peek(schemaId: string): MarkerRegistry | undefined {
    return this.snapshots.get(schemaId);
  }

  evict(schemaId: string): boolean {
    return this.snapshots.delete(schemaId);
  }

  clear(): void {
    this.snapshots.clear();
  }

  private async fetch(schemaId: string, version?: string): Promise<MarkerRegistry> {
    const document = await this.source.load(schemaId, version);
    const registry = unwrap(
      loadRegistry(document, {
        schemaId,
        maxRuleDepth: this.options.maxRuleDepth,
        logger: this.options.logger,
      })
    );
    this.snapshots.set(schemaId, registry);
    return registry;
  }

  private async track(schemaId: string, loading: Promise<MarkerRegistry>): Promise<MarkerRegistry> {
    this.pending.set(schemaId, loading);
    try {
      return await loading;
    } finally {
      if (this.pending.get(schemaId) === loading) {
        this.pending.delete(schemaId);
      }
    }
  }
}
