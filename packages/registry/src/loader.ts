/**
 * Registry Loader - validates a registry document into a MarkerRegistry
 *
 * Fail-closed: every problem is collected as a RegistryIssue and any issue
 * rejects the whole document. composed_of problems are only warnings, since
 * the activation rule is what gets evaluated.
 */

import {
  MarkerDefinitionSchema,
  PatternCompileError,
  RegistryDataSchema,
  RegistryLoadError,
  err,
  errorMessage,
  ok,
  silentLogger,
  type ActivationRule,
  type Logger,
  type MarkerDefinition,
  type RegistryIssue,
  type Result,
} from '@marker-engine/core';
import type { ZodIssue } from 'zod';
import { DependencyGraph } from './dependency-graph';
import { MarkerRegistry, ruleComponents, visitRules } from './registry';

export interface LoadOptions {
  /** Used when the document carries no schema_id */
  schemaId?: string;
  maxRuleDepth: number;
  logger: Logger;
}

const DEFAULT_OPTIONS: LoadOptions = {
  maxRuleDepth: 16,
  logger: silentLogger,
};

export const DEFAULT_REGISTRY_VERSION = '0.0.0';

interface RawEntry {
  label: string;
  key?: string;
  raw: unknown;
}

/**
 * Validate a parsed registry document and build an immutable snapshot
 */
export function loadRegistry(
  data: unknown,
  options: Partial<LoadOptions> = {}
): Result<MarkerRegistry, RegistryLoadError> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const fallbackId = opts.schemaId ?? 'default';

  const document = RegistryDataSchema.safeParse(data);
  if (!document.success) {
    return err(
      new RegistryLoadError(fallbackId, [
        {
          code: 'invalid_document',
          message: `Registry document is invalid: ${formatZodIssues(document.error.issues)}`,
        },
      ])
    );
  }

  const schemaId = document.data.schema_id ?? fallbackId;
  const version = document.data.version ?? DEFAULT_REGISTRY_VERSION;
  const issues: RegistryIssue[] = [];
  const warnings: string[] = [];

  // 1. Depth bound and schema validation of each definition
  const definitions = parseDefinitions(collectEntries(document.data.markers), opts.maxRuleDepth, issues);

  // 2. Unique ids
  const byId = new Map<string, MarkerDefinition>();
  for (const def of definitions) {
    if (byId.has(def.id)) {
      issues.push({ code: 'duplicate_id', markerId: def.id, message: `Duplicate marker id ${def.id}` });
      continue;
    }
    byId.set(def.id, def);
  }
  const unique = Array.from(byId.values());

  // 3. Eager pattern compilation
  const patterns = new Map<string, RegExp>();
  const rulePatterns = new Map<string, RegExp>();
  for (const def of unique) {
    if (def.pattern !== undefined) {
      const compiled = compile(def.id, def.pattern, 'gi', issues);
      if (compiled) patterns.set(def.id, compiled);
    }
    if (def.activation) {
      visitRules(def.activation, (rule) => {
        if (rule.type === 'PATTERN' && !rulePatterns.has(rule.regex)) {
          const compiled = compile(def.id, rule.regex, 'i', issues);
          if (compiled) rulePatterns.set(rule.regex, compiled);
        }
      });
    }
  }

  // 4-5. References, thresholds
  for (const def of unique) {
    if (def.activation) {
      checkRule(def.id, def.activation, byId, issues);
    }
    warnings.push(...composedOfWarnings(def, byId));
  }

  // 7. Acyclicity over rule components and known composed_of ids
  const graph = new DependencyGraph();
  graph.build(
    unique.map((def) => ({
      id: def.id,
      dependencies: [
        ...(def.activation ? ruleComponents(def.activation) : []),
        ...(def.composed_of ?? []),
      ],
    }))
  );
  const resolution = graph.resolve();
  for (const cycle of resolution.circular) {
    issues.push({
      code: 'cycle',
      markerId: cycle[0],
      message: `Dependency cycle: ${[...cycle, cycle[0]].join(' -> ')}`,
    });
  }

  if (issues.length > 0) {
    opts.logger.error(`Registry ${schemaId}@${version} rejected with ${issues.length} issue(s)`);
    return err(new RegistryLoadError(schemaId, issues));
  }

  for (const warning of warnings) {
    opts.logger.warn(warning);
  }

  const evaluationOrder = resolution.order.filter((id) => byId.get(id)?.activation !== undefined);

  opts.logger.info(
    `Loaded registry ${schemaId}@${version}: ${unique.length} markers, ${evaluationOrder.length} composed`
  );

  return ok(
    new MarkerRegistry({
      schemaId,
      version,
      definitions: unique,
      evaluationOrder,
      patterns,
      rulePatterns,
      warnings,
    })
  );
}

// =============================================================================
// Validation Steps
// =============================================================================

function collectEntries(markers: unknown[] | Record<string, unknown>): RawEntry[] {
  if (Array.isArray(markers)) {
    return markers.map((raw, index) => ({ label: `markers[${index}]`, raw }));
  }

  return Object.entries(markers).map(([key, raw]) => ({
    label: `markers.${key}`,
    key,
    raw: isRecord(raw) && raw.id === undefined ? { ...raw, id: key } : raw,
  }));
}

function parseDefinitions(
  entries: RawEntry[],
  maxDepth: number,
  issues: RegistryIssue[]
): MarkerDefinition[] {
  const definitions: MarkerDefinition[] = [];

  for (const entry of entries) {
    const rawId = isRecord(entry.raw) && typeof entry.raw.id === 'string' ? entry.raw.id : undefined;
    const label = `${entry.label}${rawId ? ` (${rawId})` : ''}`;

    // Rule trees are parsed recursively, so their depth is bounded first
    const activation = isRecord(entry.raw) ? entry.raw.activation : undefined;
    if (exceedsRuleDepth(activation, maxDepth)) {
      issues.push({
        code: 'max_depth_exceeded',
        markerId: rawId,
        message: `${rawId ? `Marker ${rawId}` : entry.label}: rule depth exceeds maximum ${maxDepth}`,
      });
      continue;
    }

    let parsed: ReturnType<typeof MarkerDefinitionSchema.safeParse>;
    try {
      parsed = MarkerDefinitionSchema.safeParse(entry.raw);
    } catch (error) {
      issues.push({ code: 'invalid_definition', markerId: rawId, message: `${label}: ${errorMessage(error)}` });
      continue;
    }

    if (!parsed.success) {
      issues.push({
        code: 'invalid_definition',
        markerId: rawId,
        message: `${label}: ${formatZodIssues(parsed.error.issues)}`,
      });
      continue;
    }

    if (entry.key !== undefined && parsed.data.id !== entry.key) {
      issues.push({
        code: 'id_mismatch',
        markerId: parsed.data.id,
        message: `Marker key ${entry.key} does not match its id ${parsed.data.id}`,
      });
      continue;
    }

    definitions.push(parsed.data);
  }

  return definitions;
}

/**
 * Walks nested `rule` / `rules` of an unvalidated activation without
 * recursion, stopping as soon as a level beyond `maxDepth` is seen
 */
export function exceedsRuleDepth(activation: unknown, maxDepth: number): boolean {
  const stack: Array<{ node: unknown; depth: number }> = [{ node: activation, depth: 1 }];

  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry || !isRecord(entry.node)) continue;
    if (entry.depth > maxDepth) return true;

    const { rule, rules } = entry.node;
    if (rule !== undefined) {
      stack.push({ node: rule, depth: entry.depth + 1 });
    }
    if (Array.isArray(rules)) {
      for (const child of rules) {
        stack.push({ node: child, depth: entry.depth + 1 });
      }
    }
  }

  return false;
}

function compile(
  markerId: string,
  source: string,
  flags: string,
  issues: RegistryIssue[]
): RegExp | undefined {
  try {
    return new RegExp(source, flags);
  } catch (cause) {
    const error = new PatternCompileError(markerId, source, cause);
    issues.push({ code: 'invalid_pattern', markerId, message: error.message });
    return undefined;
  }
}

function checkRule(
  markerId: string,
  activation: ActivationRule,
  byId: ReadonlyMap<string, MarkerDefinition>,
  issues: RegistryIssue[]
): void {
  for (const component of ruleComponents(activation)) {
    if (!byId.has(component)) {
      issues.push({
        code: 'unresolved_reference',
        markerId,
        message: `Marker ${markerId} references unknown marker ${component}`,
      });
    }
  }

  visitRules(activation, (rule) => {
    if (rule.type === 'ANY_N' && (rule.n < 1 || rule.n > rule.components.length)) {
      issues.push({
        code: 'invalid_threshold',
        markerId,
        message: `Marker ${markerId}: ANY_N n=${rule.n} must be between 1 and ${rule.components.length}`,
      });
    }
  });
}

function composedOfWarnings(
  def: MarkerDefinition,
  byId: ReadonlyMap<string, MarkerDefinition>
): string[] {
  if (!def.composed_of) return [];
  const warnings: string[] = [];

  for (const id of def.composed_of) {
    if (!byId.has(id)) {
      warnings.push(`Marker ${def.id}: composed_of names unknown marker ${id}`);
    }
  }

  if (def.activation) {
    const declared = new Set(def.composed_of);
    const referenced = new Set(ruleComponents(def.activation));
    const diverges =
      declared.size !== referenced.size || [...declared].some((id) => !referenced.has(id));
    if (diverges) {
      warnings.push(
        `Marker ${def.id}: composed_of [${[...declared].join(', ')}] differs from activation components [${[...referenced].join(', ')}]`
      );
    }
  }

  return warnings;
}

// =============================================================================
// Helpers
// =============================================================================

function formatZodIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
