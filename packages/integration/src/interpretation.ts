/**
 * Interpretation Bridge
 *
 * Turns an analysis result into a short narrative through external
 * providers. The primary provider is tried first, then the fallback; each
 * attempt is bounded by `timeoutMs`. When both fail the bridge answers with
 * a built-in narrative, or nothing in `omit` mode. Never throws.
 */

import { z } from 'zod';
import {
  BridgeError,
  errorMessage,
  silentLogger,
  type AnalyzeResponse,
  type Logger,
} from '@marker-engine/core';
import type {
  FallbackMode,
  Interpretation,
  InterpretationInput,
  InterpretationProvider,
} from './types';

// =============================================================================
// Bridge
// =============================================================================

export interface InterpretationBridgeOptions {
  primary: InterpretationProvider;
  fallback?: InterpretationProvider;
  timeoutMs: number;
  fallbackMode: FallbackMode;
  logger: Logger;
}

export interface InterpretOptions {
  signal?: AbortSignal;
}

export const DEFAULT_MODEL_NAME = 'default';

export class InterpretationBridge {
  private readonly options: InterpretationBridgeOptions;

  constructor(
    options: Pick<InterpretationBridgeOptions, 'primary'> & Partial<InterpretationBridgeOptions>
  ) {
    this.options = {
      timeoutMs: 10_000,
      fallbackMode: 'default',
      logger: silentLogger,
      ...options,
    };
  }

  async interpret(
    input: InterpretationInput,
    options: InterpretOptions = {}
  ): Promise<Interpretation | undefined> {
    const start = performance.now();
    const failures: string[] = [];

    for (const provider of this.providers()) {
      try {
        const text = await this.attempt(provider, input, options.signal);
        return {
          interpretation: text,
          model_used: provider.name,
          processing_time_ms: performance.now() - start,
        };
      } catch (error) {
        const message = errorMessage(error);
        this.options.logger.warn(`Interpretation provider failed: ${message}`);
        failures.push(message);
      }
    }

    this.options.logger.error(`No interpretation provider succeeded: ${failures.join('; ')}`);
    if (this.options.fallbackMode === 'omit') return undefined;

    return {
      interpretation: defaultInterpretation(input),
      model_used: DEFAULT_MODEL_NAME,
      processing_time_ms: performance.now() - start,
    };
  }

  private providers(): InterpretationProvider[] {
    const { primary, fallback } = this.options;
    return fallback ? [primary, fallback] : [primary];
  }

  /**
   * One provider call bounded by the timeout. Rejects with BridgeError.
   */
  private async attempt(
    provider: InterpretationProvider,
    input: InterpretationInput,
    signal?: AbortSignal
  ): Promise<string> {
    const { timeoutMs } = this.options;
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new BridgeError(provider.name, `${provider.name} timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    });

    try {
      const text = await Promise.race([
        Promise.resolve().then(() => provider.interpret(input, controller.signal)),
        timeout,
      ]);
      if (text.trim().length === 0) {
        throw new BridgeError(provider.name, `${provider.name} returned an empty interpretation`);
      }
      return text.trim();
    } catch (error) {
      if (error instanceof BridgeError) throw error;
      throw new BridgeError(provider.name, `${provider.name} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

export function toInterpretationInput(response: AnalyzeResponse): InterpretationInput {
  return {
    schema_id: response.schema_id,
    markers: response.markers,
    marker_count: response.marker_count,
    total_score: response.total_score,
  };
}

export function defaultInterpretation(input: InterpretationInput): string {
  const count = `${input.marker_count} marker${input.marker_count === 1 ? '' : 's'}`;
  return (
    `The analysis found ${count} in schema ${input.schema_id} ` +
    `with a total score of ${input.total_score.toFixed(2)}. ` +
    'A detailed interpretation is not available at the moment.'
  );
}

// =============================================================================
// Prompt
// =============================================================================

export const DEFAULT_SYSTEM_PROMPT =
  'You are an expert in psycholinguistic analysis and narrative interpretation.';

/**
 * User prompt listing each detected marker once, with its count and best
 * confidence. The source text is never included.
 */
export function buildInterpretationPrompt(input: InterpretationInput): string {
  const summary = new Map<string, { count: number; confidence: number; contextual: boolean }>();
  for (const marker of input.markers) {
    const entry = summary.get(marker.marker_id) ?? { count: 0, confidence: 0, contextual: false };
    entry.count++;
    entry.confidence = Math.max(entry.confidence, marker.confidence);
    entry.contextual ||= marker.detection_phase === 'contextual';
    summary.set(marker.marker_id, entry);
  }

  const lines = [...summary].map(
    ([id, entry]) =>
      `- ${id} x${entry.count} (${entry.contextual ? 'composed' : 'atomic'}, ` +
      `confidence ${entry.confidence.toFixed(2)})`
  );

  return [
    `Schema: ${input.schema_id}`,
    `Markers detected: ${input.marker_count}`,
    `Total score: ${input.total_score.toFixed(2)}`,
    '',
    'Markers:',
    ...(lines.length > 0 ? lines : ['- none']),
    '',
    'Interpret only these markers, not the original text. Describe what the ' +
      'combination suggests about the communication dynamics, in an empathetic, ' +
      'non-judgmental tone, in 150 to 300 words.',
  ].join('\n');
}

// =============================================================================
// OpenAI-compatible Provider
// =============================================================================

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1),
});

export interface ChatCompletionConfig {
  /** Reported as `model_used`; defaults to `model` */
  name?: string;
  /** Full chat-completions URL */
  endpoint: string;
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  systemPrompt: string;
  fetch: typeof fetch;
}

const DEFAULT_CHAT_CONFIG = {
  temperature: 0.7,
  maxTokens: 1000,
  systemPrompt: DEFAULT_SYSTEM_PROMPT,
};

/**
 * Provider for any OpenAI-compatible chat-completions endpoint
 */
export class ChatCompletionProvider implements InterpretationProvider {
  readonly name: string;
  private readonly config: ChatCompletionConfig;

  constructor(
    config: Pick<ChatCompletionConfig, 'endpoint' | 'apiKey' | 'model'> & Partial<ChatCompletionConfig>
  ) {
    this.config = { ...DEFAULT_CHAT_CONFIG, fetch: globalThis.fetch, ...config };
    this.name = config.name ?? config.model;
  }

  async interpret(input: InterpretationInput, signal: AbortSignal): Promise<string> {
    const { endpoint, apiKey, model, temperature, maxTokens, systemPrompt } = this.config;

    const response = await this.config.fetch(endpoint, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${apiKey}`,
      },
      body: JSON.stringify({
        model,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: buildInterpretationPrompt(input) },
        ],
        temperature,
        max_tokens: maxTokens,
      }),
      signal,
    });

    if (!response.ok) {
      const body = await response.text();
      throw new BridgeError(this.name, `${this.name} returned HTTP ${response.status}: ${truncate(body, 200)}`);
    }

    const parsed = ChatCompletionResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new BridgeError(this.name, `${this.name} returned an unexpected response body`);
    }
    return parsed.data.choices[0].message.content ?? '';
  }
}

function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.substring(0, maxLength - 3) + '...';
}
