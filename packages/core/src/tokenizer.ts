import type { Token } from './types';

export interface TokenizerConfig {
  stripPunctuation: boolean;
  splitHyphens: boolean;
  lowercase: boolean;
}

const DEFAULT_CONFIG: TokenizerConfig = {
  stripPunctuation: true,
  splitHyphens: true,
  lowercase: true,
};

/**
 * Tokenizes free text into normalized word tokens.
 *
 * @param text The text to tokenize.
 * @param config Configuration options for the tokenizer.
 * @returns An array of string tokens.
 */
export function tokenize(text: string, config?: Partial<TokenizerConfig>): string[] {
  const cfg = { ...DEFAULT_CONFIG, ...config };
  let processed = text;

  // 1. Strip punctuation, keeping letters, digits, apostrophes and hyphens.
  if (cfg.stripPunctuation) {
    processed = processed.replace(/[^\p{L}\p{N}'’-]+/gu, ' ');
  }

  // 2. Split hyphenated compounds.
  if (cfg.splitHyphens) {
    processed = processed.replace(/-/g, ' ');
  }

  // 3. Normalize to lowercase.
  if (cfg.lowercase) {
    processed = processed.toLowerCase();
  }

  return processed
    .split(/\s+/)
    .map((token) => token.replace(/^['’]+|['’]+$/g, ''))
    .filter((token) => token.length > 0);
}

/**
 * Whitespace-delimited tokens with character offsets (end exclusive).
 */
export function whitespaceTokens(text: string): Token[] {
  return collect(text, /\S+/g);
}

/**
 * Word tokens with character offsets; each punctuation mark is its own token.
 */
export function wordTokens(text: string): Token[] {
  return collect(text, /[\p{L}\p{N}]+(?:['’][\p{L}\p{N}]+)*|[^\s\p{L}\p{N}]/gu);
}

/**
 * Lowercase a token and trim surrounding punctuation, for lexicon lookups.
 */
export function normalizeToken(token: string): string {
  return token.toLowerCase().replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, '');
}

function collect(text: string, pattern: RegExp): Token[] {
  const tokens: Token[] = [];
  for (const match of text.matchAll(pattern)) {
    const start = match.index ?? 0;
    tokens.push({ text: match[0], start, end: start + match[0].length });
  }
  return tokens;
}
