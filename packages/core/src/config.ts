/**
 * Engine configuration
 *
 * Defaults live in the schema; `loadConfigFromEnv` maps MARKER_ENGINE_*
 * variables onto it.
 */

import { availableParallelism } from 'node:os';
import { z } from 'zod';
import { ConfigurationError } from './errors';

export const EngineConfigSchema = z.object({
  /** Minimum token-overlap ratio for example-similarity matches */
  similarityThreshold: z.number().min(0).max(1).default(0.6),
  /** Token radius searched for negation cues */
  negationRadius: z.number().int().min(0).default(3),
  /** Maximum nesting depth of activation rules accepted at load time */
  maxRuleDepth: z.number().int().min(1).default(16),
  enrichment: z.enum(['whitespace', 'linguistic']).default('linguistic'),
  enrichmentTimeoutMs: z.number().int().positive().default(2000),
  bridgeTimeoutMs: z.number().int().positive().default(10000),
  batchConcurrency: z.number().int().positive().default(() => availableParallelism()),
  cacheTtlMs: z.number().int().positive().default(3_600_000),
  cacheMaxEntries: z.number().int().positive().default(1000),
  maxTextLength: z.number().int().positive().default(100_000),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

export function loadConfig(input: EngineConfigInput = {}): EngineConfig {
  return parseConfig(input);
}

function parseConfig(input: unknown): EngineConfig {
  const parsed = EngineConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue.path.join('.');
    throw new ConfigurationError(`Invalid configuration for ${key}: ${issue.message}`, key);
  }
  return parsed.data;
}

const ENV_KEYS: Record<keyof EngineConfig, string> = {
  similarityThreshold: 'MARKER_ENGINE_SIMILARITY_THRESHOLD',
  negationRadius: 'MARKER_ENGINE_NEGATION_RADIUS',
  maxRuleDepth: 'MARKER_ENGINE_MAX_RULE_DEPTH',
  enrichment: 'MARKER_ENGINE_ENRICHMENT',
  enrichmentTimeoutMs: 'MARKER_ENGINE_ENRICHMENT_TIMEOUT_MS',
  bridgeTimeoutMs: 'MARKER_ENGINE_BRIDGE_TIMEOUT_MS',
  batchConcurrency: 'MARKER_ENGINE_BATCH_CONCURRENCY',
  cacheTtlMs: 'MARKER_ENGINE_CACHE_TTL_MS',
  cacheMaxEntries: 'MARKER_ENGINE_CACHE_MAX_ENTRIES',
  maxTextLength: 'MARKER_ENGINE_MAX_TEXT_LENGTH',
  logLevel: 'MARKER_ENGINE_LOG_LEVEL',
};

const STRING_KEYS = new Set<string>(['enrichment', 'logLevel']);

/**
 * Build a config from environment variables; unset variables take defaults.
 */
export function loadConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): EngineConfig {
  const input: Record<string, string | number> = {};

  for (const [key, envKey] of Object.entries(ENV_KEYS)) {
    const raw = env[envKey];
    if (raw === undefined || raw.trim() === '') continue;

    if (STRING_KEYS.has(key)) {
      input[key] = raw.trim();
      continue;
    }

    const value = Number(raw);
    if (Number.isNaN(value)) {
      throw new ConfigurationError(`${envKey} must be a number, got "${raw}"`, key);
    }
    input[key] = value;
  }

  return parseConfig(input);
}
