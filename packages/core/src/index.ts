/**
 * @marker-engine/core - Shared primitives for marker detection
 *
 * - Types: marker definitions, activation rules, requests and responses
 * - Result: explicit error handling for expected failures
 * - Errors: the engine's error taxonomy
 * - Config, logging, tokenization, analysis context
 */

export * from './types';
export * from './result';
export * from './errors';
export * from './config';
export * from './logger';
export * from './tokenizer';
export * from './context';
