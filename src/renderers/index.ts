/**
 * Renderers Module
 *
 * Influencer records and composed emails are the canonical artifacts.
 * Everything here is a text view derived from them.
 *
 * Responsibilities:
 * - Influencer CSV export with a fixed, stable header row
 * - Draft report: one delimited block per outreach target, used when the
 *   mail-draft collaborator is unavailable
 * - Follow-up report in the same layout
 * - Campaign status text
 */

import type { LedgerStats } from '../ledger/index.js';
import type { InfluencerRecord } from '../types/index.js';

// ============================================================================
// Influencer CSV
// ============================================================================

export const INFLUENCER_CSV_COLUMNS = [
  'platform',
  'username',
  'display_name',
  'url',
  'followers',
  'total_views',
  'video_count',
  'engagement_rate',
  'engagement_rate_numeric',
  'avg_views_per_video',
  'avg_likes_per_video',
  'upload_frequency_days',
  'upload_consistency',
  'last_video_title',
  'last_video_date',
  'last_video_url',
  'last_game_played',
  'indie_sentiment',
  'indie_sentiment_score',
  'indie_sentiment_indicators',
  'response_likelihood',
  'response_score',
  'response_factors',
  'emails',
  'email_count',
  'has_business_terms',
  'business_terms',
  'twitter',
  'instagram',
  'discord',
  'tiktok',
  'country',
  'broadcaster_type',
  'icebreaker',
  'bio_snippet',
] as const;

export type InfluencerCsvColumn = (typeof INFLUENCER_CSV_COLUMNS)[number];

const CSV_LINE_ENDING = '\r\n';

/**
 * Quote a field when it holds a delimiter, quote or line break (RFC 4180)
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Flatten one record into CSV cell values keyed by column
 */
export function toCsvRow(record: InfluencerRecord): Record<InfluencerCsvColumn, string> {
  return {
    platform: record.platform,
    username: record.username,
    display_name: record.display_name,
    url: record.url,
    followers: String(record.followers),
    total_views: String(record.total_views),
    video_count: String(record.video_count),
    engagement_rate: record.engagement_rate,
    engagement_rate_numeric: String(record.engagement_rate_numeric),
    avg_views_per_video: String(record.avg_views_per_video),
    avg_likes_per_video: String(record.avg_likes_per_video),
    upload_frequency_days: String(record.upload_frequency_days),
    upload_consistency: record.upload_consistency,
    last_video_title: record.last_video_title,
    last_video_date: record.last_video_date,
    last_video_url: record.last_video_url,
    last_game_played: record.last_game_played ?? '',
    indie_sentiment: record.indie_sentiment,
    indie_sentiment_score: String(record.indie_sentiment_score),
    indie_sentiment_indicators: record.indie_sentiment_indicators.join(', '),
    response_likelihood: record.response_likelihood,
    response_score: String(record.response_score),
    response_factors: record.response_factors.join(' | '),
    emails: record.emails.length > 0 ? record.emails.join(', ') : 'Not found',
    email_count: String(record.email_count),
    has_business_terms: record.business_terms.length > 0 ? 'Yes' : 'No',
    business_terms: record.business_terms.join(', '),
    twitter: record.social_links.twitter ?? '',
    instagram: record.social_links.instagram ?? '',
    discord: record.social_links.discord ?? '',
    tiktok: record.social_links.tiktok ?? '',
    country: record.country ?? '',
    broadcaster_type: record.broadcaster_type ?? '',
    icebreaker: record.icebreaker,
    bio_snippet: record.bio_snippet,
  };
}

/**
 * Render records as CSV, header first. An empty list yields the header only.
 */
export function renderInfluencerCsv(records: readonly InfluencerRecord[]): string {
  const lines = [INFLUENCER_CSV_COLUMNS.join(',')];

  for (const record of records) {
    const row = toCsvRow(record);
    lines.push(INFLUENCER_CSV_COLUMNS.map((column) => escapeCsvField(row[column])).join(','));
  }

  return lines.join(CSV_LINE_ENDING) + CSV_LINE_ENDING;
}

// ============================================================================
// Draft Reports
// ============================================================================

/**
 * One composed message destined for the text report
 */
export interface ReportEntry {
  to: string;
  influencer: string;
  key: string;
  subject: string;
  body: string;
}

const HEAVY_RULE = '='.repeat(70);
const LIGHT_RULE = '-'.repeat(70);

function renderBlock(entry: ReportEntry, keyLabel: string): string {
  return [
    HEAVY_RULE,
    `TO: ${entry.to}`,
    `INFLUENCER: ${entry.influencer}`,
    `${keyLabel}: ${entry.key}`,
    LIGHT_RULE,
    `SUBJECT: ${entry.subject}`,
    LIGHT_RULE,
    entry.body,
    '',
    '',
    '',
  ].join('\n');
}

/**
 * Delimited blocks for copy-paste sending, one per outreach target
 */
export function renderDraftReport(entries: readonly ReportEntry[]): string {
  return entries.map((entry) => renderBlock(entry, 'STEAM KEY')).join('');
}

/**
 * Follow-up blocks; the key line names the key sent originally
 */
export function renderFollowUpReport(entries: readonly ReportEntry[]): string {
  return entries.map((entry) => renderBlock(entry, 'ORIGINAL KEY')).join('');
}

// ============================================================================
// Campaign Status
// ============================================================================

export interface CampaignStats extends LedgerStats {
  awaitingFollowUp: number;
  followUpDays: number;
}

export function renderCampaignStats(stats: CampaignStats): string {
  return [
    'KEY CAMPAIGN STATUS',
    HEAVY_RULE,
    `Keys assigned: ${stats.assigned}`,
    `Emails sent: ${stats.sent}`,
    `Responses: ${stats.responded}`,
    `Awaiting send: ${stats.awaitingSend}`,
    `Awaiting follow-up (${stats.followUpDays}+ days, no response): ${stats.awaitingFollowUp}`,
    `Keys remaining: ${stats.keysRemaining}`,
    '',
  ].join('\n');
}
