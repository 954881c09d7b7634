/**
 * Text Signal Extractor
 *
 * Pulls contact details and business-intent phrases out of free-form
 * biography and channel description text.
 *
 * - Emails, after undoing common obfuscations ("name [at] mail [dot] com")
 * - Social handles for twitter, instagram, discord and tiktok
 * - Business keywords such as "sponsorships" or "business inquiries"
 */

import keywords from '../data/keywords.json';
import type { SocialLinks, SocialPlatform } from '../types/index.js';

// ============================================================================
// Constants
// ============================================================================

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;

/**
 * Obfuscation rewrites, applied in order.
 * The bracketed forms leave their surrounding spaces, which the last two rules collapse.
 */
const OBFUSCATION_RULES: Array<[RegExp, string]> = [
  [/\[at\]|\(at\)/gi, '@'],
  [/ at /gi, '@'],
  [/\[dot\]|\(dot\)/gi, '.'],
  [/ dot /gi, '.'],
  [/ @ /g, '@'],
  [/ \. /g, '.'],
];

/**
 * Handle patterns, one per platform. Only the first match is kept.
 */
const SOCIAL_PATTERNS: Record<SocialPlatform, RegExp> = {
  twitter: /twitter\.com\/([A-Za-z0-9_]+)/i,
  instagram: /instagram\.com\/([A-Za-z0-9_.]+)/i,
  discord: /discord\.gg\/([A-Za-z0-9]+)/i,
  tiktok: /tiktok\.com\/@([A-Za-z0-9_.]+)/i,
};

const EMAIL_PLACEHOLDERS: readonly string[] = keywords.emailPlaceholders;
const BUSINESS_TERMS: readonly string[] = keywords.businessTerms;

// ============================================================================
// Email Extraction
// ============================================================================

/**
 * Rewrite "[at]", "(dot)", " at " and friends into real email punctuation
 */
export function deobfuscateEmailText(text: string): string {
  return OBFUSCATION_RULES.reduce((current, [pattern, replacement]) => current.replace(pattern, replacement), text);
}

/**
 * True when the address contains a placeholder or no-reply marker
 */
export function isPlaceholderEmail(email: string): boolean {
  const lower = email.toLowerCase();
  return EMAIL_PLACEHOLDERS.some((marker) => lower.includes(marker));
}

/**
 * Extract unique email addresses from text.
 * Order follows first appearance but callers should treat the result as a set.
 */
export function extractEmails(text: string | null | undefined): string[] {
  if (!text) {
    return [];
  }

  const normalized = deobfuscateEmailText(text);
  const found = new Set<string>();

  for (const match of normalized.matchAll(EMAIL_PATTERN)) {
    const email = match[0];
    if (!isPlaceholderEmail(email)) {
      found.add(email);
    }
  }

  return Array.from(found);
}

// ============================================================================
// Social Links
// ============================================================================

/**
 * Extract the first handle per social platform. Platforms without a match are omitted.
 */
export function extractSocialLinks(text: string | null | undefined): SocialLinks {
  const links: SocialLinks = {};
  if (!text) {
    return links;
  }

  for (const [platform, pattern] of Object.entries(SOCIAL_PATTERNS) as Array<[SocialPlatform, RegExp]>) {
    const handle = pattern.exec(text)?.[1];
    if (handle) {
      links[platform] = handle;
    }
  }

  return links;
}

// ============================================================================
// Business Terms
// ============================================================================

/**
 * Case-insensitive substring match against the business keyword list.
 * Results keep the keyword list's order.
 */
export function extractBusinessTerms(text: string | null | undefined): string[] {
  if (!text) {
    return [];
  }

  const lower = text.toLowerCase();
  return BUSINESS_TERMS.filter((term) => lower.includes(term));
}
