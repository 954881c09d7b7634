/**
 * Sentiment Scorer
 *
 * Scores a bio's stance toward independent games from weighted keyword tallies:
 * +2 per positive phrase, -3 per negative phrase, +0.5 per neutral phrase,
 * clamped to [-10, 10].
 */

import keywords from '../data/keywords.json';
import type { SentimentAnalysis, SentimentCategory } from '../types/index.js';

const POSITIVE_PHRASES: readonly string[] = keywords.sentiment.positive;
const NEGATIVE_PHRASES: readonly string[] = keywords.sentiment.negative;
const NEUTRAL_PHRASES: readonly string[] = keywords.sentiment.neutral;

const MAX_INDICATORS = 5;
const SCORE_LIMIT = 10;

/**
 * Map a score onto its category
 */
export function categorizeSentiment(score: number): SentimentCategory {
  if (score >= 3) return 'very_positive';
  if (score >= 1) return 'positive';
  if (score >= -1) return 'neutral';
  if (score >= -3) return 'negative';
  return 'very_negative';
}

/**
 * Analyze a bio. Indicators list positive matches before negative ones,
 * each in keyword-table order, truncated to five.
 */
export function analyzeSentiment(text: string | null | undefined): SentimentAnalysis {
  if (!text) {
    return { score: 0, sentiment: 'neutral', indicators: [] };
  }

  const lower = text.toLowerCase();
  const positive = POSITIVE_PHRASES.filter((phrase) => lower.includes(phrase));
  const negative = NEGATIVE_PHRASES.filter((phrase) => lower.includes(phrase));
  const neutralCount = NEUTRAL_PHRASES.filter((phrase) => lower.includes(phrase)).length;

  const raw = positive.length * 2 - negative.length * 3 + neutralCount * 0.5;
  const score = Math.round(Math.max(-SCORE_LIMIT, Math.min(SCORE_LIMIT, raw)) * 100) / 100;

  const indicators = [
    ...positive.map((phrase) => `+${phrase}`),
    ...negative.map((phrase) => `-${phrase}`),
  ].slice(0, MAX_INDICATORS);

  return {
    score,
    sentiment: categorizeSentiment(score),
    indicators,
  };
}
