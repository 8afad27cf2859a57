/**
 * Activation Rule Engine
 *
 * Depth-first walk over a composed marker's rule tree against the detections
 * made so far plus enrichment. Rule depth is bounded when the registry loads.
 */

import {
  whitespaceTokens,
  type ActivationRule,
  type AnalysisContext,
  type DetectedMarker,
  type MarkerDefinition,
  type Polarity,
  type Sentence,
  type SentimentAlignment,
  type Token,
} from '@marker-engine/core';
import type { MarkerRegistry } from '@marker-engine/registry';
import { isNegationCue } from '../enrichment/lexicon';
import { DetectionIndex } from './detection-index';
import {
  coveringPosition,
  sentenceIndexAt,
  tokenDistance,
  tokenSpan,
  type TokenSpan,
} from './positions';

export interface RuleEngineOptions {
  /** Token radius searched for negation cues when a rule sets none */
  negationRadius: number;
}

const DEFAULT_OPTIONS: RuleEngineOptions = {
  negationRadius: 3,
};

/**
 * What a rule (or sub-rule) evaluated to
 */
export interface RuleOutcome {
  satisfied: boolean;
  confidence: number;
  /** Component ids that satisfied the rule */
  components: string[];
  /** Component detections that satisfied the rule */
  instances: DetectedMarker[];
}

interface Scope {
  markerId: string;
  text: string;
  tokens: readonly Token[];
  sentences: readonly Sentence[];
  sentimentAvailable: boolean;
  index: DetectionIndex;
}

interface Placed {
  instance: DetectedMarker;
  span: TokenSpan;
}

const UNSATISFIED: RuleOutcome = { satisfied: false, confidence: 0, components: [], instances: [] };

export class ActivationRuleEngine {
  private readonly options: RuleEngineOptions;

  constructor(
    private readonly registry: MarkerRegistry,
    options: Partial<RuleEngineOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Evaluate a composed marker; returns its contextual detection or null
   */
  evaluate(
    marker: MarkerDefinition,
    context: AnalysisContext,
    index: DetectionIndex = DetectionIndex.from(context.detected)
  ): DetectedMarker | null {
    if (!marker.activation) return null;

    const scope: Scope = {
      markerId: marker.id,
      text: context.text,
      tokens: context.tokens ?? whitespaceTokens(context.text),
      sentences: context.sentences ?? [],
      sentimentAvailable: context.sentimentAvailable,
      index,
    };

    const outcome = this.check(marker.activation, scope);
    if (!outcome.satisfied) return null;

    const detected: DetectedMarker = {
      marker_id: marker.id,
      confidence: clamp(outcome.confidence),
      detection_phase: 'contextual',
    };
    const position = coveringPosition(outcome.instances, scope.sentences);
    if (position) detected.position = position;
    if (outcome.components.length > 0) detected.components = outcome.components;
    return detected;
  }

  /**
   * Evaluate one rule node
   */
  private check(rule: ActivationRule, scope: Scope): RuleOutcome {
    switch (rule.type) {
      case 'ALL': {
        const ids = unique(rule.components);
        const present = scope.index.present(ids);
        return present.length === ids.length ? presence(present, scope) : UNSATISFIED;
      }
      case 'ANY': {
        const present = scope.index.present(rule.components);
        return present.length > 0 ? presence(present, scope) : UNSATISFIED;
      }
      case 'ANY_N': {
        const present = scope.index.present(rule.components);
        return present.length >= rule.n ? presence(present, scope) : UNSATISFIED;
      }
      case 'TEMPORAL':
        return this.checkTemporal(rule.components, rule.window, rule.strict_order ?? false, scope);
      case 'PROXIMITY':
        return this.checkProximity(rule.components, rule.max_distance, scope);
      case 'SENTIMENT':
        return this.checkSentiment(rule.alignment, rule.components, scope);
      case 'NEGATION':
        return this.checkNegation(rule.rule, rule.allows_negation ?? false, rule.radius, scope);
      case 'PATTERN': {
        const pattern = this.registry.rulePattern(rule.regex);
        if (!pattern) {
          throw new Error(`PATTERN /${rule.regex}/ was not compiled with the registry`);
        }
        return pattern.test(scope.text)
          ? { satisfied: true, confidence: 1.0, components: [], instances: [] }
          : UNSATISFIED;
      }
      case 'COMPOSITE':
        return this.checkComposite(rule.rules, rule.combinator, scope);
      default: {
        const unknown: never = rule;
        throw new Error(`Unhandled rule type ${JSON.stringify(unknown)}`);
      }
    }
  }

  // ===========================================================================
  // Positional Rules
  // ===========================================================================

  private checkTemporal(
    components: string[],
    window: number,
    strictOrder: boolean,
    scope: Scope
  ): RuleOutcome {
    const ids = unique(components);
    const placed = placeAll(ids, scope);
    if (!placed) return UNSATISFIED;

    if (strictOrder) {
      const firsts = placed.map((list) => Math.min(...list.map((p) => p.span.first)));
      for (let i = 1; i < firsts.length; i++) {
        if (firsts[i - 1] >= firsts[i]) return UNSATISFIED;
      }
    }

    const anchors = [...new Set(placed.flat().map((p) => p.span.first))].sort((a, b) => a - b);
    for (const anchor of anchors) {
      const chosen: Placed[] = [];
      for (const list of placed) {
        let best: Placed | undefined;
        for (const entry of list) {
          if (entry.span.first < anchor) continue;
          if (!best || entry.span.last < best.span.last) best = entry;
        }
        if (!best) break;
        chosen.push(best);
      }
      if (chosen.length < placed.length) continue;

      const end = Math.max(...chosen.map((p) => p.span.last));
      if (end - anchor + 1 <= window) {
        return {
          satisfied: true,
          confidence: product(ids, scope),
          components: ids,
          instances: chosen.map((p) => p.instance),
        };
      }
    }

    return UNSATISFIED;
  }

  private checkProximity(components: string[], maxDistance: number, scope: Scope): RuleOutcome {
    const ids = unique(components);
    const placed = placeAll(ids, scope);
    if (!placed) return UNSATISFIED;

    const instances = new Set<DetectedMarker>(ids.length === 1 ? placed[0].map((p) => p.instance) : []);

    for (let i = 0; i < placed.length; i++) {
      for (let j = i + 1; j < placed.length; j++) {
        let closest: [Placed, Placed, number] | undefined;
        for (const a of placed[i]) {
          for (const b of placed[j]) {
            const distance = tokenDistance(a.span, b.span);
            if (!closest || distance < closest[2]) closest = [a, b, distance];
          }
        }
        if (!closest || closest[2] > maxDistance) return UNSATISFIED;
        instances.add(closest[0].instance);
        instances.add(closest[1].instance);
      }
    }

    return {
      satisfied: true,
      confidence: product(ids, scope),
      components: ids,
      instances: [...instances],
    };
  }

  // ===========================================================================
  // Context Rules
  // ===========================================================================

  private checkSentiment(
    alignment: SentimentAlignment,
    components: string[] | undefined,
    scope: Scope
  ): RuleOutcome {
    if (!scope.sentimentAvailable) return UNSATISFIED;

    const listed = components ? unique(components) : undefined;
    const focus = listed ?? this.registry.ruleReferences(scope.markerId);

    let considered: readonly Sentence[] = scope.sentences;
    let instances: DetectedMarker[] = [];

    if (focus.length > 0) {
      const focusInstances = focus.flatMap((id) =>
        scope.index.instances(id).filter((instance) => instance.position !== undefined)
      );
      const indices = new Set<number>();
      for (const instance of focusInstances) {
        const sentenceIndex = instance.position
          ? sentenceIndexAt(scope.sentences, instance.position.start)
          : undefined;
        if (sentenceIndex !== undefined) indices.add(sentenceIndex);
      }
      considered = scope.sentences.filter((s) => indices.has(s.index));
      if (listed) instances = focusInstances;
    }

    const polarities: Polarity[] = [];
    for (const sentence of considered) {
      if (sentence.sentiment) polarities.push(sentence.sentiment.polarity);
    }
    if (!alignmentHolds(alignment, polarities)) return UNSATISFIED;

    const present = listed ? scope.index.present(listed) : [];
    return {
      satisfied: true,
      confidence: product(present, scope),
      components: present,
      instances,
    };
  }

  private checkNegation(
    inner: ActivationRule,
    allowsNegation: boolean,
    radius: number | undefined,
    scope: Scope
  ): RuleOutcome {
    const outcome = this.check(inner, scope);
    if (!outcome.satisfied || allowsNegation) return outcome;

    const reach = radius ?? this.options.negationRadius;
    for (const instance of outcome.instances) {
      if (!instance.position) continue;
      const span = tokenSpan(scope.tokens, instance.position);
      if (span && negatedAround(scope.tokens, span, reach)) return UNSATISFIED;
    }

    return outcome;
  }

  private checkComposite(
    rules: ActivationRule[],
    combinator: 'ALL' | 'ANY',
    scope: Scope
  ): RuleOutcome {
    const satisfied: RuleOutcome[] = [];

    for (const rule of rules) {
      const outcome = this.check(rule, scope);
      if (outcome.satisfied) {
        satisfied.push(outcome);
        if (combinator === 'ANY') break;
      } else if (combinator === 'ALL') {
        return UNSATISFIED;
      }
    }

    if (satisfied.length === 0) return UNSATISFIED;

    return {
      satisfied: true,
      confidence: Math.min(...satisfied.map((o) => o.confidence)),
      components: unique(satisfied.flatMap((o) => o.components)),
      instances: [...new Set(satisfied.flatMap((o) => o.instances))],
    };
  }
}

// =============================================================================
// Helpers
// =============================================================================

function presence(present: string[], scope: Scope): RuleOutcome {
  return {
    satisfied: true,
    confidence: product(present, scope),
    components: present,
    instances: present.flatMap((id) => [...scope.index.instances(id)]),
  };
}

/**
 * Product of each component's best confidence
 */
function product(ids: readonly string[], scope: Scope): number {
  return ids.reduce((acc, id) => acc * scope.index.maxConfidence(id), 1.0);
}

/**
 * Token spans of every positioned detection per id; undefined when some id
 * is absent or has no positioned detection
 */
function placeAll(ids: readonly string[], scope: Scope): Placed[][] | undefined {
  const placed: Placed[][] = [];

  for (const id of ids) {
    const list: Placed[] = [];
    for (const instance of scope.index.instances(id)) {
      if (!instance.position) continue;
      const span = tokenSpan(scope.tokens, instance.position);
      if (span) list.push({ instance, span });
    }
    if (list.length === 0) return undefined;
    placed.push(list);
  }

  return placed;
}

function negatedAround(tokens: readonly Token[], span: TokenSpan, radius: number): boolean {
  const from = Math.max(0, span.first - radius);
  const to = Math.min(tokens.length - 1, span.last + radius);

  for (let i = from; i <= to; i++) {
    if (i >= span.first && i <= span.last) continue;
    if (isNegationCue(tokens[i].text)) return true;
  }
  return false;
}

function alignmentHolds(alignment: SentimentAlignment, polarities: readonly Polarity[]): boolean {
  switch (alignment) {
    case 'positive':
    case 'negative':
    case 'neutral':
      return polarities.includes(alignment);
    case 'consistent':
      return (
        polarities.length > 0 &&
        polarities[0] !== 'neutral' &&
        polarities.every((p) => p === polarities[0])
      );
    case 'contrasting':
      return polarities.includes('positive') && polarities.includes('negative');
  }
}

function unique(ids: readonly string[]): string[] {
  return [...new Set(ids)];
}

function clamp(value: number): number {
  return Math.min(1, Math.max(0, value));
}
