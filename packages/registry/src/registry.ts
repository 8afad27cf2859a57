/**
 * Marker Registry - immutable, validated snapshot of marker definitions
 *
 * Built only by `loadRegistry`. Safe to share between concurrent analyses:
 * nothing here changes after construction, and a reload builds a new
 * snapshot instead of touching this one.
 */

import type { ActivationRule, MarkerDefinition } from '@marker-engine/core';

export interface RegistrySnapshotData {
  schemaId: string;
  version: string;
  definitions: MarkerDefinition[];
  /** Composed markers, dependencies first */
  evaluationOrder: string[];
  /** Compiled `pattern` of each atomic marker (global flag set) */
  patterns: Map<string, RegExp>;
  /** Compiled PATTERN rule expressions, keyed by source */
  rulePatterns: Map<string, RegExp>;
  warnings: string[];
}

export class MarkerRegistry {
  readonly schemaId: string;
  readonly version: string;
  readonly warnings: readonly string[];

  private readonly definitions: ReadonlyMap<string, MarkerDefinition>;
  private readonly atomic: readonly MarkerDefinition[];
  private readonly composed: readonly MarkerDefinition[];
  private readonly patterns: ReadonlyMap<string, RegExp>;
  private readonly rulePatterns: ReadonlyMap<string, RegExp>;
  private readonly references: ReadonlyMap<string, readonly string[]>;

  constructor(data: RegistrySnapshotData) {
    this.schemaId = data.schemaId;
    this.version = data.version;
    this.warnings = Object.freeze([...data.warnings]);

    const definitions = new Map<string, MarkerDefinition>();
    const references = new Map<string, readonly string[]>();
    for (const def of data.definitions) {
      definitions.set(def.id, deepFreeze(structuredClone(def)));
      if (def.activation) {
        references.set(def.id, Object.freeze(ruleComponents(def.activation)));
      }
    }
    this.definitions = definitions;
    this.references = references;

    this.atomic = Object.freeze(
      data.definitions
        .filter((def) => !def.activation)
        .map((def) => this.require(def.id))
    );
    this.composed = Object.freeze(data.evaluationOrder.map((id) => this.require(id)));

    this.patterns = new Map(data.patterns);
    this.rulePatterns = new Map(data.rulePatterns);
    Object.freeze(this);
  }

  get size(): number {
    return this.definitions.size;
  }

  get(id: string): MarkerDefinition | undefined {
    return this.definitions.get(id);
  }

  has(id: string): boolean {
    return this.definitions.has(id);
  }

  ids(): string[] {
    return Array.from(this.definitions.keys());
  }

  /**
   * Markers without an activation rule, in document order
   */
  atomicMarkers(): readonly MarkerDefinition[] {
    return this.atomic;
  }

  /**
   * Markers with an activation rule, in evaluation order
   */
  composedMarkers(): readonly MarkerDefinition[] {
    return this.composed;
  }

  /**
   * Every component id referenced anywhere in a marker's rule tree
   */
  ruleReferences(id: string): readonly string[] {
    return this.references.get(id) ?? [];
  }

  weightOf(id: string): number {
    return this.definitions.get(id)?.metadata.weight ?? 1.0;
  }

  /**
   * A fresh copy of the marker's compiled pattern, so callers never share
   * `lastIndex` state
   */
  patternOf(id: string): RegExp | undefined {
    const pattern = this.patterns.get(id);
    return pattern ? new RegExp(pattern.source, pattern.flags) : undefined;
  }

  rulePattern(source: string): RegExp | undefined {
    const pattern = this.rulePatterns.get(source);
    return pattern ? new RegExp(pattern.source, pattern.flags) : undefined;
  }

  private require(id: string): MarkerDefinition {
    const def = this.definitions.get(id);
    if (!def) {
      throw new Error(`Marker ${id} missing from registry ${this.schemaId}`);
    }
    return def;
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Visit a rule and every nested rule, parents before children
 */
export function visitRules(rule: ActivationRule, visit: (rule: ActivationRule) => void): void {
  const stack: ActivationRule[] = [rule];

  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;
    visit(current);

    if (current.type === 'NEGATION') {
      stack.push(current.rule);
    } else if (current.type === 'COMPOSITE') {
      for (let i = current.rules.length - 1; i >= 0; i--) {
        stack.push(current.rules[i]);
      }
    }
  }
}

/**
 * Component ids referenced by a rule and all of its nested rules, in first
 * appearance order
 */
export function ruleComponents(rule: ActivationRule): string[] {
  const ids = new Set<string>();
  visitRules(rule, (current) => {
    if ('components' in current) {
      current.components?.forEach((id) => ids.add(id));
    }
  });
  return Array.from(ids);
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
