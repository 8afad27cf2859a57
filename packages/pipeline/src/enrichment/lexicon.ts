/**
 * Word lists for negation cues and lexicon sentiment (English and German)
 */

import { normalizeToken, type SentenceSentiment } from '@marker-engine/core';
import negationCues from '../data/negation-cues.json';
import sentimentLexicon from '../data/sentiment-lexicon.json';

const NEGATION_CUES = new Set([...negationCues.en, ...negationCues.de]);
const POSITIVE = new Set(sentimentLexicon.positive);
const NEGATIVE = new Set(sentimentLexicon.negative);

/** Tokens before a sentiment word that flip its polarity */
const FLIP_WINDOW = 2;

/**
 * True for listed negation words and any contraction ending in n't
 */
export function isNegationCue(token: string): boolean {
  const normalized = normalizeToken(token).replace(/’/g, "'");
  return NEGATION_CUES.has(normalized) || normalized.endsWith("n't");
}

/**
 * Lexicon sentiment of a run of tokens. A negation cue up to two tokens
 * before a sentiment word flips it. Score is (pos - neg) / (pos + neg).
 */
export function scoreSentiment(tokens: readonly string[]): SentenceSentiment {
  let positive = 0;
  let negative = 0;

  tokens.forEach((token, index) => {
    const word = normalizeToken(token);
    let polarity = POSITIVE.has(word) ? 1 : NEGATIVE.has(word) ? -1 : 0;
    if (polarity === 0) return;

    const window = tokens.slice(Math.max(0, index - FLIP_WINDOW), index);
    if (window.some(isNegationCue)) polarity = -polarity;

    if (polarity > 0) positive++;
    else negative++;
  });

  const total = positive + negative;
  const score = total === 0 ? 0 : (positive - negative) / total;
  return {
    polarity: score > 0 ? 'positive' : score < 0 ? 'negative' : 'neutral',
    score,
  };
}
