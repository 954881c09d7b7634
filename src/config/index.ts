/**
 * Configuration Module
 *
 * Reads the environment once, validates it and returns typed settings for
 * discovery, the campaign templates and file locations.
 * CLI flags are applied on top by the caller.
 */

import { join } from 'path';
import { z } from 'zod';
import type { CampaignSettings, DiscoverySettings } from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

export interface PathSettings {
  keyLedger: string;
  keyPool: string;
  outputDir: string;
  gmailCredentials: string;
  gmailToken: string;
}

export interface AppConfig {
  discovery: DiscoverySettings;
  campaign: CampaignSettings;
  paths: PathSettings;
}

/**
 * Raised when one or more environment values are invalid
 */
export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

// ============================================================================
// Schema
// ============================================================================

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const secret = z.preprocess(blankToUndefined, z.string().trim().optional());

const count = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().nonnegative().default(fallback));

const text = (fallback: string) => z.preprocess(blankToUndefined, z.string().trim().default(fallback));

const url = (fallback: string) => z.preprocess(blankToUndefined, z.string().trim().url().default(fallback));

const EnvSchema = z
  .object({
    YOUTUBE_API_KEY: secret,
    TWITCH_CLIENT_ID: secret,
    TWITCH_CLIENT_SECRET: secret,
    MIN_FOLLOWERS: count(500),
    MAX_FOLLOWERS: count(100_000),
    DAYS_SINCE_LAST_VIDEO: count(60),
    REQUEST_DELAY_MS: count(100),

    GAME_NAME: text('Untitled Platformer'),
    RELEASE_DATE: text('launch day'),
    SENDER_NAME: text('The Team'),
    STUDIO_NAME: text('Our Studio'),
    STEAM_PAGE_URL: url('https://store.steampowered.com/'),
    PRESS_KIT_URL: url('https://example.org/press-kit'),
    INSTAGRAM_URL: url('https://www.instagram.com/'),
    TIKTOK_URL: url('https://www.tiktok.com/'),

    KEY_LEDGER_PATH: text('key_assignments.json'),
    KEY_POOL_PATH: text('steam_keys.txt'),
    OUTPUT_DIR: text('.'),
    GMAIL_CREDENTIALS_PATH: text('credentials.json'),
    GMAIL_TOKEN_PATH: text('token.json'),
  })
  .refine((env) => env.MIN_FOLLOWERS <= env.MAX_FOLLOWERS, {
    message: 'MIN_FOLLOWERS must not exceed MAX_FOLLOWERS',
    path: ['MIN_FOLLOWERS'],
  });

// ============================================================================
// Loading
// ============================================================================

/**
 * Validate environment variables into an AppConfig
 *
 * @throws ConfigError listing every invalid value
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigError(result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`));
  }

  const values = result.data;

  return {
    discovery: {
      youtubeApiKey: values.YOUTUBE_API_KEY ?? null,
      twitchClientId: values.TWITCH_CLIENT_ID ?? null,
      twitchClientSecret: values.TWITCH_CLIENT_SECRET ?? null,
      minFollowers: values.MIN_FOLLOWERS,
      maxFollowers: values.MAX_FOLLOWERS,
      daysSinceLastVideo: values.DAYS_SINCE_LAST_VIDEO,
      requestDelayMs: values.REQUEST_DELAY_MS,
    },
    campaign: {
      gameName: values.GAME_NAME,
      releaseDate: values.RELEASE_DATE,
      senderName: values.SENDER_NAME,
      studioName: values.STUDIO_NAME,
      steamPageUrl: values.STEAM_PAGE_URL,
      pressKitUrl: values.PRESS_KIT_URL,
      instagramUrl: values.INSTAGRAM_URL,
      tiktokUrl: values.TIKTOK_URL,
    },
    paths: {
      keyLedger: values.KEY_LEDGER_PATH,
      keyPool: values.KEY_POOL_PATH,
      outputDir: values.OUTPUT_DIR,
      gmailCredentials: values.GMAIL_CREDENTIALS_PATH,
      gmailToken: values.GMAIL_TOKEN_PATH,
    },
  };
}

/**
 * Resolve a file name inside the configured output directory
 */
export function outputPath(config: Pick<AppConfig, 'paths'>, fileName: string): string {
  return join(config.paths.outputDir, fileName);
}
