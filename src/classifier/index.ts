/**
 * Content Classifier
 *
 * Decides whether a channel belongs to a gaming content creator, as opposed
 * to a game developer or an off-topic creator, from its description and
 * recent video titles.
 */

import keywords from '../data/keywords.json';

const DEVELOPER_PHRASES: readonly string[] = keywords.classifier.developer;
const CREATOR_PHRASES: readonly string[] = keywords.classifier.creator;
const NON_GAMING_PHRASES: readonly string[] = keywords.classifier.nonGaming;

/**
 * Per-category scores behind a classification
 */
export interface ClassificationScores {
  devScore: number;
  creatorScore: number;
  nonGamingScore: number;
}

function countMatches(text: string, phrases: readonly string[]): number {
  return phrases.filter((phrase) => text.includes(phrase)).length;
}

/**
 * Score description and titles against the three phrase tables.
 * Developer phrases weigh 2, the others 1.
 */
export function scoreChannelContent(description: string, recentTitles: readonly string[]): ClassificationScores {
  const text = `${description} ${recentTitles.join(' ')}`.toLowerCase();

  return {
    devScore: 2 * countMatches(text, DEVELOPER_PHRASES),
    creatorScore: countMatches(text, CREATOR_PHRASES),
    nonGamingScore: countMatches(text, NON_GAMING_PHRASES),
  };
}

/**
 * Rules, in order:
 * 1. devScore > 1 rejects
 * 2. nonGamingScore > creatorScore rejects (ties pass)
 * 3. accept when creatorScore >= 2
 */
export function isGamingChannel(description: string | null | undefined, recentTitles: readonly string[] = []): boolean {
  const { devScore, creatorScore, nonGamingScore } = scoreChannelContent(description ?? '', recentTitles);

  if (devScore > 1) {
    return false;
  }

  if (nonGamingScore > creatorScore) {
    return false;
  }

  return creatorScore >= 2;
}
