/**
 * Response-Likelihood Scorer
 *
 * Combines contact availability, business openness, indie sentiment, upload
 * cadence, engagement and audience size into a 0-100 lead priority score.
 * The weights are empirical and must stay as they are.
 */

import type { InfluencerRecord, ResponseAnalysis, ResponseLikelihood } from '../types/index.js';

/**
 * Record fields the scorer reads
 */
export type ResponseSignals = Pick<
  InfluencerRecord,
  | 'email_count'
  | 'business_terms'
  | 'social_links'
  | 'indie_sentiment'
  | 'upload_frequency_days'
  | 'engagement_rate_numeric'
  | 'followers'
>;

const BASE_SCORE = 50;

/**
 * Map a clamped score onto its likelihood bucket
 */
export function categorizeResponseScore(score: number): ResponseLikelihood {
  if (score >= 75) return 'Very High';
  if (score >= 60) return 'High';
  if (score >= 40) return 'Medium';
  if (score >= 25) return 'Low';
  return 'Very Low';
}

/**
 * Count distinct contact channels among email, twitter, discord and instagram
 */
export function countContactMethods(signals: Pick<ResponseSignals, 'email_count' | 'social_links'>): number {
  return [
    signals.email_count > 0,
    Boolean(signals.social_links.twitter),
    Boolean(signals.social_links.discord),
    Boolean(signals.social_links.instagram),
  ].filter(Boolean).length;
}

/**
 * Score a record. Adjustments apply in a fixed order and each one appends a factor.
 */
export function calculateResponseLikelihood(signals: ResponseSignals): ResponseAnalysis {
  let score = BASE_SCORE;
  const factors: string[] = [];

  // Contact
  if (signals.email_count > 0) {
    score += 20;
    factors.push('✓ Email available');
  } else {
    score -= 15;
    factors.push('✗ No email found');
  }

  if (signals.business_terms.length > 0) {
    score += 15;
    factors.push('✓ Open to business');
  }

  const contactMethods = countContactMethods(signals);
  if (contactMethods >= 3) {
    score += 10;
    factors.push(`✓ ${contactMethods} contact methods`);
  }

  // Sentiment
  switch (signals.indie_sentiment) {
    case 'very_positive':
      score += 10;
      factors.push('✓ Very positive about indies');
      break;
    case 'positive':
      score += 5;
      factors.push('✓ Positive about indies');
      break;
    case 'negative':
    case 'very_negative':
      score -= 10;
      factors.push('✗ Not focused on indies');
      break;
    default:
      break;
  }

  // Cadence; 0 means unknown and falls in no band
  const frequency = signals.upload_frequency_days;
  if (frequency > 0 && frequency <= 3) {
    score += 10;
    factors.push('✓ Very active (posts every few days)');
  } else if (frequency > 0 && frequency <= 7) {
    score += 5;
    factors.push('✓ Active (posts weekly)');
  } else if (frequency > 30) {
    score -= 10;
    factors.push('✗ Inactive creator');
  }

  // Engagement
  const engagement = signals.engagement_rate_numeric;
  if (engagement > 10) {
    score += 10;
    factors.push('✓ High engagement rate');
  } else if (engagement > 5) {
    score += 5;
    factors.push('✓ Good engagement');
  } else if (engagement > 0 && engagement < 1) {
    score -= 5;
    factors.push('~ Low engagement');
  }

  // Audience size
  if (signals.followers >= 5000 && signals.followers <= 100000) {
    score += 10;
    factors.push('✓ Mid-tier size (responsive)');
  } else if (signals.followers > 500000) {
    score -= 10;
    factors.push('~ Very large (less personal)');
  }

  const clamped = Math.max(0, Math.min(100, score));

  return {
    score: clamped,
    likelihood: categorizeResponseScore(clamped),
    factors,
  };
}
