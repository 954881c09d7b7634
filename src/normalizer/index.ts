/**
 * Normalizer Module
 *
 * Responsibilities:
 * - Validate raw records handed over by the discovery collectors
 * - Canonicalize them into CreatorSource (trimmed strings, numeric counts,
 *   explicit nulls, empty description instead of a missing one)
 *
 * Everything downstream of this boundary reads typed fields only.
 */

import { z } from 'zod';
import type { ContentItem, CreatorSource, ModuleResult } from '../types/index.js';

const optionalText = z.string().nullable().optional();

const timestamp = z.string().refine((value) => !isNaN(Date.parse(value)), {
  message: 'must be a valid timestamp',
});

const RawContentItemSchema = z.object({
  title: optionalText,
  published_at: timestamp,
  view_count: z.coerce.number().nonnegative().default(0),
  like_count: z.coerce.number().nonnegative().nullable().optional(),
});

/**
 * Zod schema for a raw collector record.
 * Platform APIs return counts as strings, so numbers are coerced.
 */
const RawCreatorSchema = z.object({
  platform: z.enum(['YouTube', 'Twitch']),
  id: z.union([z.string(), z.number()]).transform(String),
  username: z.string().trim().min(1),
  display_name: optionalText,
  url: z.string().trim().url(),
  custom_url: optionalText,
  description: optionalText,
  followers: z.coerce.number().int().nonnegative(),
  total_views: z.coerce.number().int().nonnegative().default(0),
  video_count: z.coerce.number().int().nonnegative().default(0),
  country: optionalText,
  broadcaster_type: optionalText,
  last_video: z
    .object({
      title: optionalText,
      published_at: optionalText,
      url: optionalText,
    })
    .nullable()
    .optional(),
  last_game_played: optionalText,
  recent_content: z.array(RawContentItemSchema).default([]),
});

/**
 * Shape collectors build before handing a record to the normalizer
 */
export type RawCreatorRecord = z.input<typeof RawCreatorSchema>;

/**
 * Trim whitespace; empty strings become null
 */
function trimString(value: string | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/**
 * Validate and canonicalize one raw collector record
 *
 * @param rawRecord - Record as assembled from platform API responses
 * @returns ModuleResult containing the CreatorSource or validation issues
 */
export function normalizeCreatorRecord(rawRecord: unknown): ModuleResult<CreatorSource> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  const parseResult = RawCreatorSchema.safeParse(rawRecord);

  if (!parseResult.success) {
    const errors = parseResult.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    return {
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Creator record validation failed',
        details: errors,
      },
      metadata: {
        module: 'normalizer',
        timestamp,
        duration: Date.now() - startTime,
      },
    };
  }

  const raw = parseResult.data;

  const recentContent: ContentItem[] = raw.recent_content.map((item) => {
    const content: ContentItem = {
      title: trimString(item.title) ?? '',
      published_at: item.published_at.trim(),
      view_count: item.view_count,
    };
    if (item.like_count !== null && item.like_count !== undefined) {
      content.like_count = item.like_count;
    }
    return content;
  });

  const source: CreatorSource = {
    platform: raw.platform,
    id: raw.id,
    username: raw.username,
    display_name: trimString(raw.display_name) ?? raw.username,
    url: raw.url,
    custom_url: trimString(raw.custom_url),
    description: raw.description?.trim() ?? '',
    followers: raw.followers,
    total_views: raw.total_views,
    video_count: raw.video_count,
    country: trimString(raw.country),
    broadcaster_type: trimString(raw.broadcaster_type),
    last_video: {
      title: trimString(raw.last_video?.title) ?? '',
      published_at: trimString(raw.last_video?.published_at) ?? '',
      url: trimString(raw.last_video?.url) ?? '',
    },
    last_game_played: trimString(raw.last_game_played),
    recent_content: recentContent,
  };

  return {
    success: true,
    data: source,
    metadata: {
      module: 'normalizer',
      timestamp,
      duration: Date.now() - startTime,
    },
  };
}
