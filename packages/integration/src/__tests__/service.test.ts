import { describe, it, expect, vi } from 'vitest';
import { RequestValidationError } from '@marker-engine/core';
import { InMemoryMarkerSource, RegistryStore } from '@marker-engine/registry';
import { MarkerEngine } from '@marker-engine/pipeline';
import { BatchAnalyzer } from '../batch.js';
import { ResponseCache } from '../cache.js';
import { InterpretationBridge } from '../interpretation.js';
import { AnalysisService } from '../service.js';
import { MARKERS, createEngine } from './helpers.js';

describe('AnalysisService caching', () => {
  it('serves repeated requests from the cache', async () => {
    const engine = createEngine();
    const analyze = vi.spyOn(engine, 'analyze');
    const service = new AnalysisService({ engine });

    const first = await service.analyze({ text: 'one and two', schema_id: 'test', session_id: 'a' });
    const second = await service.analyze({ text: 'one and two', schema_id: 'test', session_id: 'b' });

    expect(first.cached).toBe(false);
    expect(second.cached).toBe(true);
    expect(analyze).toHaveBeenCalledTimes(1);
    expect(second.session_id).toBe('b');
    expect(second.markers).toEqual(first.markers);
  });

  it('drops the cached session id when the request has none', async () => {
    const service = new AnalysisService({ engine: createEngine() });

    await service.analyze({ text: 'one', schema_id: 'test', session_id: 'a' });
    const hit = await service.analyze({ text: 'one', schema_id: 'test' });

    expect(hit.cached).toBe(true);
    expect('session_id' in hit).toBe(false);
  });

  it('misses after the registry version changes', async () => {
    const source = new InMemoryMarkerSource({ test: { version: '1.0.0', markers: MARKERS } });
    const store = new RegistryStore(source);
    const engine = new MarkerEngine({
      registry: store,
      config: { enrichment: 'whitespace', logLevel: 'silent' },
    });
    const service = new AnalysisService({ engine });

    await service.analyze({ text: 'one', schema_id: 'test' });
    expect((await service.analyze({ text: 'one', schema_id: 'test' })).cached).toBe(true);

    source.set('test', { version: '1.1.0', markers: MARKERS });
    await store.reload('test');
    const fresh = await service.analyze({ text: 'one', schema_id: 'test' });

    expect(fresh.cached).toBe(false);
    expect(fresh.registry_version).toBe('1.1.0');
  });

  it('keeps requests with different switches apart', async () => {
    const service = new AnalysisService({ engine: createEngine() });

    await service.analyze({ text: 'one and two', schema_id: 'test' });
    const flat = await service.analyze({ text: 'one and two', schema_id: 'test', enable_contextual: false });

    expect(flat.cached).toBe(false);
    expect(flat.marker_count).toBe(2);
  });

  it('can run without a cache', async () => {
    const service = new AnalysisService({ engine: createEngine(), cache: false });

    await service.analyze({ text: 'one', schema_id: 'test' });
    expect((await service.analyze({ text: 'one', schema_id: 'test' })).cached).toBe(false);
  });

  it('uses a provided cache', async () => {
    const cache = new ResponseCache({ maxEntries: 10 });
    const service = new AnalysisService({ engine: createEngine(), cache });

    await service.analyze({ text: 'one', schema_id: 'test' });
    expect(cache.size).toBe(1);
  });

  it('validates before touching the cache or the engine', async () => {
    const engine = createEngine();
    const analyze = vi.spyOn(engine, 'analyze');
    const service = new AnalysisService({ engine });

    await expect(service.analyze({ text: 'one', schema_id: '' })).rejects.toBeInstanceOf(
      RequestValidationError
    );
    expect(analyze).not.toHaveBeenCalled();
  });
});

describe('AnalysisService interpretation', () => {
  function bridgeReturning(text: string) {
    const interpret = vi.fn(async () => text);
    return { interpret, bridge: new InterpretationBridge({ primary: { name: 'stub', interpret } }) };
  }

  it('attaches an interpretation', async () => {
    const { bridge } = bridgeReturning('Narrative.');
    const service = new AnalysisService({ engine: createEngine(), bridge });

    const response = await service.analyze({ text: 'one and two', schema_id: 'test' });

    expect(response.interpretation).toEqual({
      interpretation: 'Narrative.',
      model_used: 'stub',
      processing_time_ms: expect.any(Number),
    });
  });

  it('interprets cached responses again', async () => {
    const { bridge, interpret } = bridgeReturning('Narrative.');
    const service = new AnalysisService({ engine: createEngine(), bridge });

    await service.analyze({ text: 'one', schema_id: 'test' });
    const hit = await service.analyze({ text: 'one', schema_id: 'test' });

    expect(hit.cached).toBe(true);
    expect(hit.interpretation?.interpretation).toBe('Narrative.');
    expect(interpret).toHaveBeenCalledTimes(2);
  });

  it('skips the bridge when interpretation is not wanted', async () => {
    const { bridge, interpret } = bridgeReturning('Narrative.');
    const service = new AnalysisService({ engine: createEngine(), bridge });

    const response = await service.analyze({ text: 'one', schema_id: 'test', interpret: false });

    expect('interpretation' in response).toBe(false);
    expect(interpret).not.toHaveBeenCalled();
  });

  it('bounds providers by the configured bridge timeout', async () => {
    const service = new AnalysisService({
      engine: createEngine({ bridgeTimeoutMs: 20 }),
      bridge: {
        primary: { name: 'stalled', interpret: () => new Promise<string>(() => {}) },
        fallback: { name: 'backup', interpret: async () => 'In time.' },
      },
    });

    const response = await service.analyze({ text: 'one', schema_id: 'test' });

    expect(response.interpretation?.model_used).toBe('backup');
    expect(response.interpretation?.interpretation).toBe('In time.');
  });

  it('leaves the field out when the bridge omits it', async () => {
    const bridge = new InterpretationBridge({
      primary: {
        name: 'stub',
        interpret: async () => {
          throw new Error('offline');
        },
      },
      fallbackMode: 'omit',
    });
    const service = new AnalysisService({ engine: createEngine(), bridge });

    const response = await service.analyze({ text: 'one', schema_id: 'test' });
    expect('interpretation' in response).toBe(false);
  });
});

describe('AnalysisService in a batch', () => {
  it('shares its cache across batch requests', async () => {
    const engine = createEngine();
    const service = new AnalysisService({ engine });
    expect(service.config).toBe(engine.config);

    const responses = await new BatchAnalyzer(service).analyzeBatch(
      [
        { text: 'one', schema_id: 'test' },
        { text: 'one', schema_id: 'test' },
      ],
      { concurrency: 1 }
    );

    expect(responses.map((r) => r.cached)).toEqual([false, true]);
  });
});
