/**
 * Enrichment Module
 *
 * Builds the final InfluencerRecord from a normalized CreatorSource by
 * running every text and metric heuristic over it.
 *
 * Key behaviors:
 * - Pure: no I/O, no logging
 * - Sparse input (no description, no recent content) yields defaults, never an error
 * - email_count is always emails.length
 */

import { calculateContentMetrics, calculateEngagementRate } from '../metrics/index.js';
import { extractBusinessTerms, extractEmails, extractSocialLinks } from '../extractor/index.js';
import { analyzeSentiment } from '../sentiment/index.js';
import { calculateResponseLikelihood } from '../scoring/index.js';
import { generateIcebreaker } from '../icebreaker/index.js';
import type { CreatorSource, InfluencerRecord } from '../types/index.js';

const BIO_SNIPPET_LENGTH = 200;

/**
 * First 200 characters of the description, with an ellipsis when cut
 */
export function buildBioSnippet(description: string): string {
  return description.length > BIO_SNIPPET_LENGTH
    ? `${description.slice(0, BIO_SNIPPET_LENGTH)}...`
    : description;
}

/**
 * Derive contact, cadence, sentiment and priority signals for one creator
 */
export function enrichCreator(source: CreatorSource): InfluencerRecord {
  const description = source.description;

  const emails = extractEmails(description);
  const socialLinks = extractSocialLinks(description);
  const businessTerms = extractBusinessTerms(description);
  const sentiment = analyzeSentiment(description);

  const metrics = calculateContentMetrics(source.recent_content);
  const engagement = calculateEngagementRate(
    metrics.avg_views_per_video,
    source.followers,
    source.recent_content.length
  );

  const response = calculateResponseLikelihood({
    email_count: emails.length,
    business_terms: businessTerms,
    social_links: socialLinks,
    indie_sentiment: sentiment.sentiment,
    upload_frequency_days: metrics.upload_frequency_days,
    engagement_rate_numeric: engagement.numeric,
    followers: source.followers,
  });

  const icebreaker = generateIcebreaker({
    name: source.display_name,
    recentTitle: source.last_video.title,
    audienceSize: source.followers,
    gameName: source.last_game_played,
  });

  return {
    platform: source.platform,
    username: source.username,
    display_name: source.display_name,
    url: source.url,
    custom_url: source.custom_url,
    followers: source.followers,
    total_views: source.total_views,
    video_count: source.video_count,
    country: source.country,
    broadcaster_type: source.broadcaster_type,
    last_video_title: source.last_video.title,
    last_video_date: source.last_video.published_at,
    last_video_url: source.last_video.url,
    last_game_played: source.last_game_played,
    emails,
    email_count: emails.length,
    social_links: socialLinks,
    business_terms: businessTerms,
    bio_snippet: buildBioSnippet(description),
    engagement_rate: engagement.rate,
    engagement_rate_numeric: engagement.numeric,
    avg_views_per_video: metrics.avg_views_per_video,
    avg_likes_per_video: metrics.avg_likes_per_video,
    upload_frequency_days: metrics.upload_frequency_days,
    upload_consistency: metrics.upload_consistency,
    indie_sentiment: sentiment.sentiment,
    indie_sentiment_score: sentiment.score,
    indie_sentiment_indicators: sentiment.indicators,
    response_likelihood: response.likelihood,
    response_score: response.score,
    response_factors: response.factors,
    icebreaker,
  };
}
