/**
 * Core type definitions for the creator outreach pipeline
 *
 * This module exports all shared types used across the system.
 */

// ============================================================================
// Creator Records
// ============================================================================

/**
 * Video platforms creators are discovered on
 */
export type Platform = 'YouTube' | 'Twitch';

/**
 * Upload cadence regularity, bucketed from the standard deviation of day gaps
 */
export type UploadConsistency =
  | 'very_consistent'
  | 'consistent'
  | 'somewhat_consistent'
  | 'inconsistent'
  | 'unknown';

/**
 * Stance of a bio toward independent games
 */
export type SentimentCategory =
  | 'very_positive'
  | 'positive'
  | 'neutral'
  | 'negative'
  | 'very_negative';

/**
 * Response likelihood buckets, highest first
 */
export type ResponseLikelihood = 'Very High' | 'High' | 'Medium' | 'Low' | 'Very Low';

/**
 * Social handles found in a bio, one per platform (first match wins)
 */
export interface SocialLinks {
  twitter?: string;
  instagram?: string;
  discord?: string;
  tiktok?: string;
}

export type SocialPlatform = keyof SocialLinks;

/**
 * Result of scoring a bio's stance toward indie games
 */
export interface SentimentAnalysis {
  score: number;
  sentiment: SentimentCategory;
  /** Matched keywords prefixed with + or -, at most five */
  indicators: string[];
}

/**
 * One recent video or VOD used for cadence and view statistics
 */
export interface ContentItem {
  title?: string;
  published_at: string;
  view_count: number;
  like_count?: number;
}

/**
 * Cadence and view statistics derived from recent content
 */
export interface ContentMetrics {
  avg_views_per_video: number;
  avg_likes_per_video: number;
  upload_frequency_days: number;
  upload_consistency: UploadConsistency;
}

/**
 * Engagement rate as a display string and a number
 */
export interface EngagementRate {
  /** e.g. "12.50%", or "N/A" when undefined */
  rate: string;
  numeric: number;
}

/**
 * Lead priority score and its explanation
 */
export interface ResponseAnalysis {
  score: number;
  likelihood: ResponseLikelihood;
  factors: string[];
}

/**
 * Validated creator data handed over by a discovery collaborator
 */
export interface CreatorSource {
  platform: Platform;
  id: string;
  username: string;
  display_name: string;
  url: string;
  custom_url: string | null;
  description: string;
  followers: number;
  total_views: number;
  video_count: number;
  country: string | null;
  broadcaster_type: string | null;
  last_video: {
    title: string;
    published_at: string;
    url: string;
  };
  last_game_played: string | null;
  recent_content: ContentItem[];
}

/**
 * One discovered content creator with derived outreach signals.
 * Produced once per discovery run and never mutated afterwards.
 *
 * email_count always equals emails.length.
 */
export interface InfluencerRecord {
  platform: Platform;
  username: string;
  display_name: string;
  url: string;
  custom_url: string | null;
  followers: number;
  total_views: number;
  video_count: number;
  country: string | null;
  broadcaster_type: string | null;
  last_video_title: string;
  last_video_date: string;
  last_video_url: string;
  last_game_played: string | null;
  emails: string[];
  email_count: number;
  social_links: SocialLinks;
  business_terms: string[];
  bio_snippet: string;
  engagement_rate: string;
  engagement_rate_numeric: number;
  avg_views_per_video: number;
  avg_likes_per_video: number;
  upload_frequency_days: number;
  upload_consistency: UploadConsistency;
  indie_sentiment: SentimentCategory;
  indie_sentiment_score: number;
  indie_sentiment_indicators: string[];
  response_likelihood: ResponseLikelihood;
  response_score: number;
  response_factors: string[];
  icebreaker: string;
}

// ============================================================================
// Discovery
// ============================================================================

/**
 * Platform credentials and creator filters for a discovery run
 */
export interface DiscoverySettings {
  youtubeApiKey: string | null;
  twitchClientId: string | null;
  twitchClientSecret: string | null;
  minFollowers: number;
  maxFollowers: number;
  /** Only creators with content published within this many days */
  daysSinceLastVideo: number;
  /** Fixed pause between consecutive API requests */
  requestDelayMs: number;
}

// ============================================================================
// Key Ledger
// ============================================================================

/**
 * One product key handed to one recipient address.
 *
 * Entries this tool writes carry every field. Older or hand-edited files may
 * hold nulls, numeric strings, missing flags or extra fields; those are kept
 * exactly as stored and only interpreted where read.
 */
export interface KeyAssignment {
  key: string;
  influencer?: string | null;
  platform?: string | null;
  followers?: number | string | null;
  assigned_date?: string;
  sent?: boolean;
  sent_date?: string;
  responded?: boolean;
  draft_created?: boolean;
  [field: string]: unknown;
}

/**
 * Persisted mapping of recipient address to key assignment
 */
export type KeyLedger = Record<string, KeyAssignment>;

// ============================================================================
// Email Content
// ============================================================================

/**
 * Game and sender details filled into outreach templates
 */
export interface CampaignSettings {
  gameName: string;
  releaseDate: string;
  senderName: string;
  studioName: string;
  steamPageUrl: string;
  pressKitUrl: string;
  instagramUrl: string;
  tiktokUrl: string;
}

/**
 * Composed outreach or follow-up message
 */
export interface EmailContent {
  subject: string;
  body: string;
  to: string;
}

// ============================================================================
// Module Results
// ============================================================================

/**
 * Module result wrapper for orchestration
 */
export interface ModuleResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: unknown;
  };
  metadata: {
    module: string;
    timestamp: string;
    duration?: number;
  };
}
