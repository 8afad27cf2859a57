import { describe, it, expect } from 'vitest';
import { loadConfig, loadConfigFromEnv } from '../config.js';
import { ConfigurationError } from '../errors.js';

describe('loadConfig', () => {
  it('fills defaults', () => {
    const config = loadConfig();
    expect(config).toMatchObject({
      similarityThreshold: 0.6,
      negationRadius: 3,
      maxRuleDepth: 16,
      enrichment: 'linguistic',
      enrichmentTimeoutMs: 2000,
      bridgeTimeoutMs: 10000,
      cacheTtlMs: 3_600_000,
      cacheMaxEntries: 1000,
      maxTextLength: 100_000,
      logLevel: 'info',
    });
    expect(config.batchConcurrency).toBeGreaterThanOrEqual(1);
  });

  it('keeps overrides', () => {
    expect(loadConfig({ negationRadius: 5, enrichment: 'whitespace' })).toMatchObject({
      negationRadius: 5,
      enrichment: 'whitespace',
    });
  });

  it('rejects out-of-range values', () => {
    expect(() => loadConfig({ similarityThreshold: 2 })).toThrow(ConfigurationError);
    expect(() => loadConfig({ similarityThreshold: 2 })).toThrow(
      'Invalid configuration for similarityThreshold'
    );
  });
});

describe('loadConfigFromEnv', () => {
  it('maps MARKER_ENGINE_ variables', () => {
    const config = loadConfigFromEnv({
      MARKER_ENGINE_NEGATION_RADIUS: '5',
      MARKER_ENGINE_ENRICHMENT: 'whitespace',
      MARKER_ENGINE_LOG_LEVEL: ' silent ',
      MARKER_ENGINE_CACHE_TTL_MS: '',
    });
    expect(config.negationRadius).toBe(5);
    expect(config.enrichment).toBe('whitespace');
    expect(config.logLevel).toBe('silent');
    expect(config.cacheTtlMs).toBe(3_600_000);
  });

  it('rejects non-numeric values', () => {
    expect(() => loadConfigFromEnv({ MARKER_ENGINE_NEGATION_RADIUS: 'many' })).toThrow(
      'MARKER_ENGINE_NEGATION_RADIUS must be a number, got "many"'
    );
  });

  it('rejects unknown enum values', () => {
    try {
      loadConfigFromEnv({ MARKER_ENGINE_ENRICHMENT: 'neural' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ details: { configKey: 'enrichment' } });
    }
  });
});
