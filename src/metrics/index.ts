/**
 * Metrics Calculator
 *
 * Derives upload cadence, cadence consistency and average views/likes from a
 * creator's recent content, plus the engagement rate against audience size.
 */

import type { ContentItem, ContentMetrics, EngagementRate, UploadConsistency } from '../types/index.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const EMPTY_METRICS: ContentMetrics = {
  avg_views_per_video: 0,
  avg_likes_per_video: 0,
  upload_frequency_days: 0,
  upload_consistency: 'unknown',
};

function mean(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Bucket the population standard deviation of upload gaps
 */
export function classifyConsistency(stdDevDays: number): UploadConsistency {
  if (stdDevDays < 3) return 'very_consistent';
  if (stdDevDays < 7) return 'consistent';
  if (stdDevDays < 14) return 'somewhat_consistent';
  return 'inconsistent';
}

/**
 * Whole-day gaps between consecutive publish times, newest first
 */
export function uploadGapsInDays(publishedAt: readonly string[]): number[] {
  const times = publishedAt
    .map((value) => Date.parse(value))
    .filter((time) => !Number.isNaN(time))
    .sort((a, b) => b - a);

  const gaps: number[] = [];
  for (let i = 0; i < times.length - 1; i++) {
    const newer = times[i];
    const older = times[i + 1];
    if (newer === undefined || older === undefined) continue;
    gaps.push(Math.floor((newer - older) / MS_PER_DAY));
  }
  return gaps;
}

/**
 * Compute averages and cadence from recent content.
 *
 * - No items: zeros and "unknown"
 * - One item: averages only, frequency 0 and "unknown"
 * - Two or more: mean gap (one decimal) and consistency bucket
 */
export function calculateContentMetrics(items: readonly ContentItem[]): ContentMetrics {
  if (items.length === 0) {
    return { ...EMPTY_METRICS };
  }

  const avgViews = Math.trunc(mean(items.map((item) => item.view_count)));
  const avgLikes = Math.trunc(mean(items.map((item) => item.like_count ?? 0)));

  const gaps = uploadGapsInDays(items.map((item) => item.published_at));
  if (gaps.length === 0) {
    return {
      avg_views_per_video: avgViews,
      avg_likes_per_video: avgLikes,
      upload_frequency_days: 0,
      upload_consistency: 'unknown',
    };
  }

  const avgGap = mean(gaps);
  const variance = mean(gaps.map((gap) => (gap - avgGap) ** 2));

  return {
    avg_views_per_video: avgViews,
    avg_likes_per_video: avgLikes,
    upload_frequency_days: roundTo(avgGap, 1),
    upload_consistency: classifyConsistency(Math.sqrt(variance)),
  };
}

/**
 * Average views per item as a percentage of audience size.
 * Undefined (audience or item count of zero) yields "N/A" and 0.
 */
export function calculateEngagementRate(avgViews: number, audienceSize: number, itemCount: number): EngagementRate {
  if (audienceSize <= 0 || itemCount <= 0) {
    return { rate: 'N/A', numeric: 0 };
  }

  const numeric = Math.max(0, (avgViews / audienceSize) * 100);
  return {
    rate: `${numeric.toFixed(2)}%`,
    numeric: roundTo(numeric, 2),
  };
}
