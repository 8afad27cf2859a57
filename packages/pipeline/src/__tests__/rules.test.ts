import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  wordTokens,
  whitespaceTokens,
  type ActivationRule,
  type DetectedMarker,
  type EnrichmentResult,
} from '@marker-engine/core';
import { ActivationRuleEngine } from '../rules/evaluator.js';
import { sentenceIndexAt, tokenDistance, tokenSpan } from '../rules/positions.js';
import { rescan } from '../stages/rescan.js';
import {
  at,
  buildRegistry,
  contextFor,
  definition,
  registryWithRule,
  unpositioned,
} from './helpers.js';

function evaluate(rule: ActivationRule, text: string, detected: DetectedMarker[], enrichment?: EnrichmentResult) {
  const registry = registryWithRule(rule);
  const engine = new ActivationRuleEngine(registry);
  return engine.evaluate(definition(registry, 'X'), contextFor(text, detected, enrichment));
}

const SENTIMENT_TEXT = 'I love this. I hate that.';
const sentimentEnrichment: EnrichmentResult = {
  tokens: wordTokens(SENTIMENT_TEXT),
  sentences: [
    { index: 0, text: 'I love this.', start: 0, end: 12, sentiment: { polarity: 'positive', score: 1 } },
    { index: 1, text: 'I hate that.', start: 13, end: 25, sentiment: { polarity: 'negative', score: -1 } },
  ],
  entities: [],
  sentimentAvailable: true,
};

describe('ALL / ANY / ANY_N', () => {
  it('ALL fires only when every component is present', () => {
    const rule: ActivationRule = { type: 'ALL', components: ['A', 'B'] };
    const result = evaluate(rule, 'alpha beta', [at('A', 0, 5, 0.9), at('B', 6, 10, 0.8)]);
    expect(result?.detection_phase).toBe('contextual');
    expect(result?.components).toEqual(['A', 'B']);
    expect(result?.confidence).toBeCloseTo(0.72);
    expect(result?.position).toEqual({ start: 0, end: 10, sentence_index: 0 });

    expect(evaluate(rule, 'alpha', [at('A', 0, 5)])).toBeNull();
  });

  it('ANY fires on any present component and reports only those', () => {
    const rule: ActivationRule = { type: 'ANY', components: ['A', 'B'] };
    expect(evaluate(rule, 'beta', [at('B', 0, 4, 0.6)])).toEqual({
      marker_id: 'X',
      confidence: 0.6,
      detection_phase: 'contextual',
      position: { start: 0, end: 4, sentence_index: 0 },
      components: ['B'],
    });
    expect(evaluate(rule, 'gamma', [at('C', 0, 5)])).toBeNull();
  });

  it('ANY_N counts distinct present components', () => {
    const rule: ActivationRule = { type: 'ANY_N', components: ['A', 'B', 'C'], n: 2 };
    expect(evaluate(rule, 'alpha gamma', [at('A', 0, 5), at('C', 6, 11)])?.components).toEqual(['A', 'C']);
    expect(evaluate(rule, 'alpha alpha', [at('A', 0, 5), at('A', 6, 11)])).toBeNull();
  });

  it('uses the best confidence of a repeated component', () => {
    const result = evaluate({ type: 'ALL', components: ['A'] }, 'alpha alpha', [
      at('A', 0, 5, 0.4),
      at('A', 6, 11, 0.9),
    ]);
    expect(result?.confidence).toBe(0.9);
    expect(result?.position).toEqual({ start: 0, end: 11, sentence_index: 0 });
  });
});

describe('TEMPORAL', () => {
  const detected = [at('A', 0, 5), at('B', 10, 14)];

  it('requires the components inside the token window', () => {
    expect(evaluate({ type: 'TEMPORAL', components: ['A', 'B'], window: 4 }, 'alpha x x beta', detected)).not.toBeNull();
    expect(evaluate({ type: 'TEMPORAL', components: ['A', 'B'], window: 3 }, 'alpha x x beta', detected)).toBeNull();
  });

  it('checks first-occurrence order when strict', () => {
    const text = 'alpha x x beta';
    expect(
      evaluate({ type: 'TEMPORAL', components: ['A', 'B'], window: 10, strict_order: true }, text, detected)
    ).not.toBeNull();
    expect(
      evaluate({ type: 'TEMPORAL', components: ['B', 'A'], window: 10, strict_order: true }, text, detected)
    ).toBeNull();
  });

  it('finds a later window when the first occurrences are too far apart', () => {
    const text = 'alpha x x x x x beta x alpha';
    const result = evaluate({ type: 'TEMPORAL', components: ['A', 'B'], window: 3 }, text, [
      at('A', 0, 5),
      at('B', 16, 20),
      at('A', 23, 28),
    ]);
    expect(result?.position).toEqual({ start: 16, end: 28, sentence_index: 0 });
  });

  it('cannot place unpositioned components', () => {
    expect(
      evaluate({ type: 'TEMPORAL', components: ['A', 'B'], window: 50 }, 'alpha beta', [
        unpositioned('A'),
        at('B', 6, 10),
      ])
    ).toBeNull();
  });
});

describe('PROXIMITY', () => {
  it('compares the token gap of the closest spans', () => {
    const detected = [at('A', 0, 5), at('B', 10, 14)];
    expect(evaluate({ type: 'PROXIMITY', components: ['A', 'B'], max_distance: 3 }, 'alpha x x beta', detected)).not.toBeNull();
    expect(evaluate({ type: 'PROXIMITY', components: ['A', 'B'], max_distance: 2 }, 'alpha x x beta', detected)).toBeNull();
  });

  it('treats overlapping spans as distance 0', () => {
    const detected = [at('A', 0, 5), at('B', 0, 5)];
    expect(evaluate({ type: 'PROXIMITY', components: ['A', 'B'], max_distance: 0 }, 'alpha', detected)).not.toBeNull();
  });
});

describe('NEGATION', () => {
  const negated: Extract<ActivationRule, { type: 'NEGATION' }> = {
    type: 'NEGATION',
    rule: { type: 'ALL', components: ['A'] },
  };

  it('suppresses a component preceded by a negation cue', () => {
    expect(evaluate(negated, 'I am not sorry', [at('A', 9, 14)])).toBeNull();
    expect(evaluate(negated, 'I am sorry', [at('A', 5, 10)])).not.toBeNull();
  });

  it('recognises contractions and cues after the span', () => {
    expect(evaluate(negated, "I don't regret it", [at('A', 8, 14)])).toBeNull();
    expect(evaluate(negated, 'sorry, not really', [at('A', 0, 5)])).toBeNull();
  });

  it('ignores cues beyond the radius', () => {
    expect(evaluate(negated, 'not one two three four sorry', [at('A', 23, 28)])).not.toBeNull();
    expect(evaluate({ ...negated, radius: 0 }, 'I am not sorry', [at('A', 9, 14)])).not.toBeNull();
  });

  it('keeps the inner result when negation is allowed', () => {
    const result = evaluate({ ...negated, allows_negation: true }, 'I am not sorry', [at('A', 9, 14, 0.7)]);
    expect(result?.confidence).toBe(0.7);
  });
});

describe('PATTERN', () => {
  it('tests the raw text case-insensitively', () => {
    expect(evaluate({ type: 'PATTERN', regex: 'help' }, 'Please HELP me', [])).toEqual({
      marker_id: 'X',
      confidence: 1,
      detection_phase: 'contextual',
    });
    expect(evaluate({ type: 'PATTERN', regex: 'help' }, 'Please go', [])).toBeNull();
  });
});

describe('SENTIMENT', () => {
  const a = at('A', 2, 6, 0.9);
  const b = at('B', 15, 19);

  it('matches the polarity of the sentences holding the components', () => {
    const positive: ActivationRule = { type: 'SENTIMENT', alignment: 'positive', components: ['A'] };
    expect(evaluate(positive, SENTIMENT_TEXT, [a, b], sentimentEnrichment)).toEqual({
      marker_id: 'X',
      confidence: 0.9,
      detection_phase: 'contextual',
      position: { start: 2, end: 6, sentence_index: 0 },
      components: ['A'],
    });
    expect(
      evaluate({ type: 'SENTIMENT', alignment: 'positive', components: ['B'] }, SENTIMENT_TEXT, [a, b], sentimentEnrichment)
    ).toBeNull();
    expect(
      evaluate({ type: 'SENTIMENT', alignment: 'negative', components: ['B'] }, SENTIMENT_TEXT, [a, b], sentimentEnrichment)
    ).not.toBeNull();
  });

  it('considers every sentence when no components are known', () => {
    expect(evaluate({ type: 'SENTIMENT', alignment: 'contrasting' }, SENTIMENT_TEXT, [], sentimentEnrichment)).toEqual({
      marker_id: 'X',
      confidence: 1,
      detection_phase: 'contextual',
    });
    expect(evaluate({ type: 'SENTIMENT', alignment: 'consistent' }, SENTIMENT_TEXT, [], sentimentEnrichment)).toBeNull();
  });

  it('falls back to the components referenced elsewhere in the rule', () => {
    const rule = (alignment: 'positive' | 'negative'): ActivationRule => ({
      type: 'COMPOSITE',
      combinator: 'ALL',
      rules: [
        { type: 'ALL', components: ['A'] },
        { type: 'SENTIMENT', alignment },
      ],
    });
    const result = evaluate(rule('positive'), SENTIMENT_TEXT, [a], sentimentEnrichment);
    expect(result?.confidence).toBe(0.9);
    expect(result?.components).toEqual(['A']);
    expect(evaluate(rule('negative'), SENTIMENT_TEXT, [a], sentimentEnrichment)).toBeNull();
  });

  it('is false without sentiment data', () => {
    expect(evaluate({ type: 'SENTIMENT', alignment: 'positive', components: ['A'] }, SENTIMENT_TEXT, [a])).toBeNull();
  });
});

describe('COMPOSITE', () => {
  it('ANY takes the first satisfied branch', () => {
    const result = evaluate(
      {
        type: 'COMPOSITE',
        combinator: 'ANY',
        rules: [
          { type: 'ALL', components: ['C'] },
          { type: 'ANY', components: ['A', 'B'] },
        ],
      },
      'alpha beta',
      [at('A', 0, 5, 0.5), at('B', 6, 10, 0.8)]
    );
    expect(result?.confidence).toBeCloseTo(0.4);
    expect(result?.components).toEqual(['A', 'B']);
  });

  it('ALL propagates the weakest branch', () => {
    const rule: ActivationRule = {
      type: 'COMPOSITE',
      combinator: 'ALL',
      rules: [
        { type: 'ALL', components: ['A'] },
        { type: 'ALL', components: ['B'] },
      ],
    };
    const result = evaluate(rule, 'alpha beta', [at('A', 0, 5, 0.9), at('B', 6, 10, 0.5)]);
    expect(result?.confidence).toBe(0.5);
    expect(result?.components).toEqual(['A', 'B']);
    expect(evaluate(rule, 'alpha', [at('A', 0, 5)])).toBeNull();
  });
});

describe('rescan', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('lets later markers see composed markers added earlier in the pass', () => {
    const registry = buildRegistry([
      { id: 'D', activation: { type: 'ANY', components: ['C'] } },
      { id: 'C', activation: { type: 'ALL', components: ['A'] } },
      { id: 'A', pattern: 'alpha' },
    ]);
    const context = contextFor('alpha', [at('A', 0, 5)]);

    const output = rescan(context, registry);
    expect(output.added.map((d) => d.marker_id)).toEqual(['C', 'D']);
    expect(output.added[1]).toEqual({
      marker_id: 'D',
      confidence: 1,
      detection_phase: 'contextual',
      position: { start: 0, end: 5, sentence_index: 0 },
      components: ['C'],
    });
    expect(context.detected).toHaveLength(3);
  });

  it('skips a marker whose evaluation throws and continues', () => {
    const registry = buildRegistry([
      { id: 'A', pattern: 'alpha' },
      { id: 'C1', activation: { type: 'ALL', components: ['A'] } },
      { id: 'C2', activation: { type: 'ANY', components: ['A'] } },
    ]);
    vi.spyOn(ActivationRuleEngine.prototype, 'evaluate').mockImplementationOnce(() => {
      throw new Error('boom');
    });

    const output = rescan(contextFor('alpha', [at('A', 0, 5)]), registry);
    expect(output.added.map((d) => d.marker_id)).toEqual(['C2']);
    expect(output.errors.map((e) => e.message)).toEqual(['C1: boom']);
    expect(output.errors[0].markerId).toBe('C1');
  });
});

describe('positions', () => {
  const tokens = whitespaceTokens('alpha x x beta');

  it('maps character spans onto token indices', () => {
    expect(tokenSpan(tokens, { start: 6, end: 9 })).toEqual({ first: 1, last: 2 });
    expect(tokenSpan(tokens, { start: 5, end: 6 })).toBeUndefined();
  });

  it('measures token gaps', () => {
    expect(tokenDistance({ first: 0, last: 0 }, { first: 3, last: 3 })).toBe(3);
    expect(tokenDistance({ first: 3, last: 4 }, { first: 0, last: 1 })).toBe(2);
    expect(tokenDistance({ first: 0, last: 2 }, { first: 2, last: 5 })).toBe(0);
  });

  it('assigns offsets between sentences to the preceding one', () => {
    expect(sentenceIndexAt(sentimentEnrichment.sentences, 12)).toBe(0);
    expect(sentenceIndexAt(sentimentEnrichment.sentences, 20)).toBe(1);
    expect(sentenceIndexAt([], 0)).toBeUndefined();
  });
});
