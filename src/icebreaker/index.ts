/**
 * Icebreaker Generator
 *
 * Builds a one-line personalized opener from the creator's name, most recent
 * content title and audience size.
 */

import keywords from '../data/keywords.json';

const KNOWN_GAMES: readonly string[] = keywords.icebreakerGames;
const TITLE_PREVIEW_LENGTH = 50;

export interface IcebreakerInput {
  name: string;
  recentTitle: string;
  audienceSize: number;
  gameName?: string | null;
}

/**
 * Abbreviate an audience count: 1.2M, 45.3K or the literal number
 */
export function formatFollowerCount(count: number): string {
  if (count >= 1_000_000) {
    return `${(count / 1_000_000).toFixed(1)}M`;
  }
  if (count >= 1_000) {
    return `${(count / 1_000).toFixed(1)}K`;
  }
  return String(count);
}

/**
 * First well-known platformer named in a title, matched case-insensitively
 */
export function detectGameInTitle(title: string): string | null {
  const lower = title.toLowerCase();
  return KNOWN_GAMES.find((game) => lower.includes(game.toLowerCase())) ?? null;
}

export function generateIcebreaker(input: IcebreakerInput): string {
  const game = input.gameName || detectGameInTitle(input.recentTitle);
  const audience = formatFollowerCount(input.audienceSize);

  if (game) {
    return `Hi ${input.name}! Loved your recent ${game} content. Your ${audience} followers clearly appreciate your platformer gameplay!`;
  }

  // The ellipsis is part of the template, even for short titles
  const preview = input.recentTitle.slice(0, TITLE_PREVIEW_LENGTH);
  return `Hi ${input.name}! Really enjoyed your recent video '${preview}...'. Your ${audience} community is impressive!`;
}
