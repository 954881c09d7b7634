/**
 * Email Content Composer
 *
 * Fills the outreach and follow-up templates for one recipient.
 * Variant selection is a substring check against the recipient's most recent
 * content title and game; the result is deterministic for a given input.
 */

import keywords from '../data/keywords.json';
import { formatFollowerCount } from '../icebreaker/index.js';
import type { CampaignSettings, EmailContent, InfluencerRecord } from '../types/index.js';

const SKILL_PLATFORMER_GAMES: readonly string[] = keywords.composer.skillPlatformerGames;
const SPEEDRUN_TERMS: readonly string[] = keywords.composer.speedrunTerms;
const SPEED_FEATURE_TERMS: readonly string[] = keywords.composer.speedFeatureTerms;
const COOP_TERMS: readonly string[] = keywords.composer.coopTerms;
const SUBJECT_COOP_TERMS: readonly string[] = keywords.composer.subjectCoopTerms;
const SOCIAL_TERMS: readonly string[] = keywords.composer.socialTerms;

/**
 * Record fields the outreach template reads
 */
export type OutreachRecipient = Pick<
  InfluencerRecord,
  'username' | 'display_name' | 'followers' | 'last_video_title' | 'last_game_played'
>;

export interface FollowUpRecipient {
  name: string;
  address: string;
  key: string;
}

export type ContentAngle = 'speedrun' | 'coop' | 'social' | 'generic';

// ============================================================================
// Helpers
// ============================================================================

function containsAny(text: string, terms: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return terms.some((term) => lower.includes(term));
}

function preview(text: string, length: number): string {
  return text.length > length ? `${text.slice(0, length)}...` : text;
}

function greetingName(recipient: Pick<OutreachRecipient, 'display_name' | 'username'>): string {
  return recipient.display_name || recipient.username || 'there';
}

// ============================================================================
// Variant Selection
// ============================================================================

/**
 * Feature angle for the body, checked speedrun, co-op, social, then generic
 */
export function selectFeatureAngle(title: string): ContentAngle {
  if (containsAny(title, SPEED_FEATURE_TERMS)) return 'speedrun';
  if (containsAny(title, COOP_TERMS)) return 'coop';
  if (containsAny(title, SOCIAL_TERMS)) return 'social';
  return 'generic';
}

/**
 * Subject angle: speedrun beats co-op beats generic
 */
export function selectSubjectAngle(title: string): Exclude<ContentAngle, 'social'> {
  if (containsAny(title, SPEEDRUN_TERMS)) return 'speedrun';
  if (containsAny(title, SUBJECT_COOP_TERMS)) return 'coop';
  return 'generic';
}

export function buildOpeningLine(recipient: OutreachRecipient): string {
  const lastVideo = recipient.last_video_title;
  const lastGame = recipient.last_game_played ?? '';

  if (lastGame && containsAny(lastGame, SKILL_PLATFORMER_GAMES)) {
    return `I saw you recently played ${lastGame} - clearly you appreciate tight, skill-based platformers!`;
  }
  if (lastVideo && containsAny(lastVideo, SPEEDRUN_TERMS)) {
    return `I loved your speedrun content in "${preview(lastVideo, 45)}" - you're going to love this game!`;
  }
  if (lastGame) {
    return `I saw you recently played ${lastGame}, and thought you might enjoy something a bit different!`;
  }

  const audience = formatFollowerCount(recipient.followers);
  if (lastVideo) {
    return `I loved your recent video "${preview(lastVideo, 50)}" - your ${audience} community clearly appreciates great gaming content!`;
  }
  return `Your ${audience} community clearly appreciates great gaming content!`;
}

const FEATURE_HOOKS: Record<ContentAngle, string> = {
  speedrun:
    "The game was designed with speedrunners in mind - every level has leaderboards and the movement system rewards mastery. Plus, it's mouse-controlled, which adds a unique skill ceiling!",
  coop: 'The 4-player local co-op is perfect for collaborative content - the chaos of coordinating mouse movements with friends is hilarious and challenging!',
  social:
    "The art style and animations have been killing it on social media (check our Instagram/TikTok if you're curious!) - very satisfying movement and visual feedback.",
  generic:
    "It's got that 'one more try' addictiveness that makes for great content - tight controls, leaderboards, and surprising depth despite the simple mouse controls.",
};

function buildSubject(angle: Exclude<ContentAngle, 'social'>, gameName: string): string {
  switch (angle) {
    case 'speedrun':
      return `Speedrunner's dream? ${gameName} key for you`;
    case 'coop':
      return `4-player chaos: ${gameName} key inside`;
    default:
      return `Steam key: ${gameName} (mouse-controlled platformer)`;
  }
}

// ============================================================================
// Templates
// ============================================================================

/**
 * Initial outreach message carrying the recipient's key
 */
export function composeOutreachEmail(
  recipient: OutreachRecipient,
  address: string,
  key: string,
  settings: CampaignSettings
): EmailContent {
  const title = recipient.last_video_title;
  const subject = buildSubject(selectSubjectAngle(title), settings.gameName);
  const featureHook = FEATURE_HOOKS[selectFeatureAngle(title)];

  const body = [
    `Hi ${greetingName(recipient)},`,
    '',
    buildOpeningLine(recipient),
    '',
    `I'm ${settings.senderName} from ${settings.studioName}, and I've been developing ${settings.gameName} - a fast-paced 2D platformer that's fully playable with just a mouse (gamepad support too!). It launches on Steam on ${settings.releaseDate}.`,
    '',
    featureHook,
    '',
    "Here's what makes it special:",
    '• Mouse-only controls (surprisingly challenging and satisfying!)',
    '• Built for speedrunning with leaderboards on every level',
    '• 4-player local co-op (perfect for couch gaming content!)',
    '• Infinite roguelite mode with procedurally generated levels',
    '• Eye-catching art style that performs great on social media',
    '',
    "I'd love for you to check it out before launch. Here's your personal Steam key:",
    '',
    `🔑 ${key}`,
    '',
    "No pressure whatsoever - if you enjoy it and want to share it with your audience, that would be incredible. If it's not your thing, no worries at all! I genuinely appreciate any feedback either way.",
    '',
    'Want to see it in action first?',
    `Steam Page: ${settings.steamPageUrl}`,
    `Press Kit (trailers, screenshots, GIFs): ${settings.pressKitUrl}`,
    '',
    'Our socials if you want a preview of the visual style:',
    `Instagram: ${settings.instagramUrl}`,
    `TikTok: ${settings.tiktokUrl}`,
    '',
    'Happy to answer any questions or provide additional info/assets!',
    '',
    'Best,',
    settings.senderName,
    settings.studioName,
    '',
    "P.S. - If you're into speedrunning, I'd be really curious to see what times you can get on the leaderboards. The movement tech has some surprising depth once you master it!",
  ].join('\n');

  return { subject, body, to: address };
}

/**
 * Gentle reminder for a recipient who has not replied, repeating their key
 */
export function composeFollowUpEmail(recipient: FollowUpRecipient, settings: CampaignSettings): EmailContent {
  const subject = `Quick follow-up: ${settings.gameName} launches ${settings.releaseDate}!`;

  const body = [
    `Hi ${recipient.name || 'there'},`,
    '',
    `Just a quick follow-up on the ${settings.gameName} Steam key I sent recently. The game launches on ${settings.releaseDate}, and I wanted to make sure the key worked for you!`,
    '',
    `Your key again: ${recipient.key}`,
    '',
    "If you've had a chance to try it, I'd love to hear what you think - especially curious if you've climbed any of the leaderboards!",
    '',
    "If you're not interested or don't have time, totally understand - just let me know and I won't bother you again.",
    '',
    'Either way, thanks for your time!',
    '',
    settings.senderName,
    settings.studioName,
    '',
    `Steam Page: ${settings.steamPageUrl}`,
  ].join('\n');

  return { subject, body, to: recipient.address };
}
