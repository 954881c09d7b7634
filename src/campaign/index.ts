/**
 * Campaign Runner Module
 *
 * Orchestrates key distribution for a list of discovered creators:
 *
 * 1. Keep creators with an extractable address (first email is primary)
 * 2. Load the key pool and the ledger; skip addresses already holding a key
 * 3. Truncate to maxDrafts and to the keys still available, warning on shortfall
 * 4. Assign keys and persist the ledger before anything leaves the process
 * 5. Compose each email and create a draft; without a draft adapter, or when
 *    a draft fails, the email goes to the text report instead
 * 6. Persist draft flags and write the report
 *
 * Also covers follow-ups, sent/responded bookkeeping and status counts.
 */

import { join } from 'path';
import { z } from 'zod';
import type { DraftAdapter } from '../adapters/index.js';
import { composeFollowUpEmail, composeOutreachEmail } from '../composer/index.js';
import {
  assignKeys,
  findFollowUpCandidates,
  LedgerCorruptError,
  loadKeyAssignments,
  loadKeyPool,
  markResponded,
  markSent,
  saveKeyAssignments,
  selectAvailableKeys,
  summarizeLedger,
  type LedgerUpdate,
  type OutreachTarget,
} from '../ledger/index.js';
import { createLogger, defaultMetrics, type Logger, type Metrics } from '../logger/index.js';
import { renderDraftReport, renderFollowUpReport, type CampaignStats, type ReportEntry } from '../renderers/index.js';
import { FsFileStore, type FileStore } from '../storage/index.js';
import type { CampaignSettings, InfluencerRecord, KeyLedger, ModuleResult } from '../types/index.js';

const defaultLogger = createLogger('campaign');

export const DRAFT_REPORT_FILE = 'email_drafts.txt';
export const FOLLOW_UP_REPORT_FILE = 'followup_drafts.txt';
export const DEFAULT_FOLLOW_UP_DAYS = 7;

// ============================================================================
// Types
// ============================================================================

/**
 * Shared collaborators; everything defaults to the real filesystem and console
 */
export interface CampaignIO {
  store?: FileStore;
  logger?: Logger;
  metrics?: Metrics;
  now?: () => Date;
}

export interface LedgerFiles {
  ledgerPath: string;
}

export interface CampaignOptions extends CampaignIO, LedgerFiles {
  settings: CampaignSettings;
  keyPoolPath: string;
  outputDir: string;
  /** Cap on new assignments this run; unlimited when absent */
  maxDrafts?: number;
  /** null writes every email to the text report */
  drafts: DraftAdapter | null;
}

export interface CampaignOutcome {
  eligible: number;
  already_assigned: number;
  keys_assigned: number;
  drafts_created: number;
  report_entries: number;
  /** Recipients left out because the pool ran short */
  shortfall: number;
  keys_remaining: number;
  report_path: string | null;
}

export interface FollowUpOptions extends CampaignIO, LedgerFiles {
  settings: CampaignSettings;
  outputDir: string;
  daysSince?: number;
  drafts: DraftAdapter | null;
}

export interface FollowUpOutcome {
  candidates: number;
  drafts_created: number;
  report_entries: number;
  report_path: string | null;
}

export interface StatsOptions extends CampaignIO, LedgerFiles {
  keyPoolPath: string;
  followUpDays?: number;
}

// ============================================================================
// Record Loading
// ============================================================================

const InfluencerRecordSchema = z.object({
  platform: z.enum(['YouTube', 'Twitch']),
  username: z.string(),
  display_name: z.string(),
  url: z.string(),
  custom_url: z.string().nullable(),
  followers: z.number(),
  total_views: z.number(),
  video_count: z.number(),
  country: z.string().nullable(),
  broadcaster_type: z.string().nullable(),
  last_video_title: z.string(),
  last_video_date: z.string(),
  last_video_url: z.string(),
  last_game_played: z.string().nullable(),
  emails: z.array(z.string()),
  email_count: z.number(),
  social_links: z.object({
    twitter: z.string().optional(),
    instagram: z.string().optional(),
    discord: z.string().optional(),
    tiktok: z.string().optional(),
  }),
  business_terms: z.array(z.string()),
  bio_snippet: z.string(),
  engagement_rate: z.string(),
  engagement_rate_numeric: z.number(),
  avg_views_per_video: z.number(),
  avg_likes_per_video: z.number(),
  upload_frequency_days: z.number(),
  upload_consistency: z.enum(['very_consistent', 'consistent', 'somewhat_consistent', 'inconsistent', 'unknown']),
  indie_sentiment: z.enum(['very_positive', 'positive', 'neutral', 'negative', 'very_negative']),
  indie_sentiment_score: z.number(),
  indie_sentiment_indicators: z.array(z.string()),
  response_likelihood: z.enum(['Very High', 'High', 'Medium', 'Low', 'Very Low']),
  response_score: z.number(),
  response_factors: z.array(z.string()),
  icebreaker: z.string(),
});

/**
 * Read a discovery JSON export (priority list or backup)
 */
export async function loadInfluencerRecords(
  path: string,
  io: CampaignIO = {}
): Promise<ModuleResult<InfluencerRecord[]>> {
  const startTime = Date.now();
  const { store } = resolveIO(io);

  const content = await store.readText(path);
  if (content === null) {
    return failure('INPUT_NOT_FOUND', `Creator list not found: ${path}`, startTime);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return failure('INPUT_INVALID', `Creator list is not valid JSON: ${message}`, startTime);
  }

  const parsed = z.array(InfluencerRecordSchema).safeParse(raw);
  if (!parsed.success) {
    const errors = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    return failure('INPUT_INVALID', 'Creator list failed validation', startTime, errors);
  }

  const records: InfluencerRecord[] = parsed.data;
  return succeed(records, startTime);
}

// ============================================================================
// Helpers
// ============================================================================

function resolveIO(io: CampaignIO) {
  return {
    store: io.store ?? new FsFileStore(),
    logger: io.logger ?? defaultLogger,
    metrics: io.metrics ?? defaultMetrics,
    now: io.now ?? (() => new Date()),
  };
}

function failure<T>(code: string, message: string, startTime: number, details?: unknown): ModuleResult<T> {
  return {
    success: false,
    error: details === undefined ? { code, message } : { code, message, details },
    metadata: {
      module: 'campaign',
      timestamp: new Date().toISOString(),
      duration: Date.now() - startTime,
    },
  };
}

function succeed<T>(data: T, startTime: number): ModuleResult<T> {
  return {
    success: true,
    data,
    metadata: {
      module: 'campaign',
      timestamp: new Date().toISOString(),
      duration: Date.now() - startTime,
    },
  };
}

/**
 * First extracted email, when it looks like an address
 */
export function primaryAddress(record: Pick<InfluencerRecord, 'emails'>): string | null {
  const first = record.emails[0]?.trim();
  return first && first.includes('@') ? first : null;
}

/**
 * Load the ledger, turning corruption into an error result
 */
async function loadLedgerOrFail(
  path: string,
  store: FileStore,
  logger: Logger
): Promise<{ ledger: KeyLedger } | { error: LedgerCorruptError }> {
  try {
    return { ledger: await loadKeyAssignments(path, store, logger) };
  } catch (error) {
    if (error instanceof LedgerCorruptError) {
      logger.error('Key ledger is corrupt; refusing to continue', { path, details: error.details });
      return { error };
    }
    throw error;
  }
}

// ============================================================================
// Campaign
// ============================================================================

/**
 * Assign keys and prepare outreach emails for every eligible creator
 */
export async function generateCampaign(
  records: readonly InfluencerRecord[],
  options: CampaignOptions
): Promise<ModuleResult<CampaignOutcome>> {
  const startTime = Date.now();
  const { store, logger, metrics, now } = resolveIO(options);

  // Step 1: Eligible recipients, one per address
  const recipients = new Map<string, InfluencerRecord>();
  for (const record of records) {
    const address = primaryAddress(record);
    if (address && !recipients.has(address)) {
      recipients.set(address, record);
    }
  }
  logger.info('Loaded creators', { total: records.length, withEmail: recipients.size });

  // Step 2: Key pool and ledger
  const pool = await loadKeyPool(options.keyPoolPath, store, logger);
  if (pool.length === 0) {
    return failure('NO_KEYS', `No valid keys found in ${options.keyPoolPath}`, startTime);
  }

  const loaded = await loadLedgerOrFail(options.ledgerPath, store, logger);
  if ('error' in loaded) {
    return failure('LEDGER_CORRUPT', loaded.error.message, startTime, loaded.error.details);
  }
  const ledger = loaded.ledger;

  const fresh: OutreachTarget[] = [];
  for (const [address, record] of recipients) {
    if (ledger[address]) {
      logger.info('Skipping recipient with an existing key', { address, influencer: record.username });
      continue;
    }
    fresh.push({ address, influencer: record.username, platform: record.platform, followers: record.followers });
  }
  const alreadyAssigned = recipients.size - fresh.length;

  // Step 3: Truncate to the requested maximum and the available keys
  const available = selectAvailableKeys(pool, ledger).length;
  const requested = options.maxDrafts !== undefined ? fresh.slice(0, Math.max(0, options.maxDrafts)) : fresh;

  if (requested.length > 0 && available === 0) {
    return failure('NO_KEYS_AVAILABLE', 'Every key in the pool is already assigned', startTime, {
      pool: pool.length,
      assigned: Object.keys(ledger).length,
    });
  }

  let batch = requested;
  let shortfall = 0;
  if (available < requested.length) {
    shortfall = requested.length - available;
    logger.warn('Not enough keys for every recipient', {
      available,
      needed: requested.length,
      alreadyAssigned: Object.keys(ledger).length,
      shortfall,
    });
    batch = requested.slice(0, available);
  }

  // Step 4: Assign and persist before composing anything
  const plan = assignKeys(batch, pool, ledger, now());
  await saveKeyAssignments(plan.ledger, options.ledgerPath, store, logger);
  metrics.increment('campaign.keys_assigned', { count: String(plan.assigned.length) });

  // Step 5: Compose and draft
  const next: KeyLedger = { ...plan.ledger };
  const reportEntries: ReportEntry[] = [];
  let draftsCreated = 0;

  for (const [index, { target, key }] of plan.assigned.entries()) {
    const record = recipients.get(target.address);
    if (!record) {
      continue;
    }

    const email = composeOutreachEmail(record, target.address, key, options.settings);
    logger.info('Prepared outreach email', {
      position: `${index + 1}/${plan.assigned.length}`,
      influencer: target.influencer,
      to: target.address,
    });

    if (options.drafts) {
      const result = await options.drafts.createDraft(email);
      const entry = next[target.address];
      if (result.success && entry) {
        next[target.address] = { ...entry, draft_created: true };
        draftsCreated++;
        metrics.increment('campaign.drafts_created');
        continue;
      }
    }

    reportEntries.push({ to: email.to, influencer: target.influencer, key, subject: email.subject, body: email.body });
  }

  // Step 6: Persist draft flags and the report
  if (draftsCreated > 0) {
    await saveKeyAssignments(next, options.ledgerPath, store, logger);
  }

  let reportPath: string | null = null;
  if (reportEntries.length > 0) {
    reportPath = join(options.outputDir, DRAFT_REPORT_FILE);
    await store.writeText(reportPath, renderDraftReport(reportEntries));
    metrics.increment('campaign.report_entries', { count: String(reportEntries.length) });
    logger.info('Email drafts written to report', { path: reportPath, entries: reportEntries.length });
  }

  const outcome: CampaignOutcome = {
    eligible: recipients.size,
    already_assigned: alreadyAssigned,
    keys_assigned: plan.assigned.length,
    drafts_created: draftsCreated,
    report_entries: reportEntries.length,
    shortfall,
    keys_remaining: Math.max(0, pool.length - Object.keys(next).length),
    report_path: reportPath,
  };

  logger.info('Campaign complete', { ...outcome });
  metrics.timing('campaign.duration', Date.now() - startTime);

  return succeed(outcome, startTime);
}

// ============================================================================
// Follow-ups
// ============================================================================

/**
 * Draft reminders for recipients sent at least daysSince days ago without a response
 */
export async function generateFollowUps(options: FollowUpOptions): Promise<ModuleResult<FollowUpOutcome>> {
  const startTime = Date.now();
  const { store, logger, metrics, now } = resolveIO(options);
  const daysSince = options.daysSince ?? DEFAULT_FOLLOW_UP_DAYS;

  const loaded = await loadLedgerOrFail(options.ledgerPath, store, logger);
  if ('error' in loaded) {
    return failure('LEDGER_CORRUPT', loaded.error.message, startTime, loaded.error.details);
  }

  const candidates = findFollowUpCandidates(loaded.ledger, daysSince, now());
  logger.info('Follow-up candidates found', { candidates: candidates.length, daysSince });

  const reportEntries: ReportEntry[] = [];
  let draftsCreated = 0;

  for (const candidate of candidates) {
    const email = composeFollowUpEmail(
      { name: candidate.influencer, address: candidate.email, key: candidate.key },
      options.settings
    );

    if (options.drafts) {
      const result = await options.drafts.createDraft(email);
      if (result.success) {
        draftsCreated++;
        metrics.increment('campaign.followups_drafted');
        continue;
      }
    }

    reportEntries.push({
      to: email.to,
      influencer: candidate.influencer,
      key: candidate.key,
      subject: email.subject,
      body: email.body,
    });
  }

  let reportPath: string | null = null;
  if (reportEntries.length > 0) {
    reportPath = join(options.outputDir, FOLLOW_UP_REPORT_FILE);
    await store.writeText(reportPath, renderFollowUpReport(reportEntries));
    logger.info('Follow-ups written to report', { path: reportPath, entries: reportEntries.length });
  }

  return succeed(
    {
      candidates: candidates.length,
      drafts_created: draftsCreated,
      report_entries: reportEntries.length,
      report_path: reportPath,
    },
    startTime
  );
}

// ============================================================================
// Status Bookkeeping
// ============================================================================

async function updateLedgerFile(
  options: CampaignIO & LedgerFiles,
  apply: (ledger: KeyLedger, now: Date) => LedgerUpdate
): Promise<ModuleResult<LedgerUpdate>> {
  const startTime = Date.now();
  const { store, logger, now } = resolveIO(options);

  const loaded = await loadLedgerOrFail(options.ledgerPath, store, logger);
  if ('error' in loaded) {
    return failure('LEDGER_CORRUPT', loaded.error.message, startTime, loaded.error.details);
  }

  const update = apply(loaded.ledger, now());
  if (update.unknown.length > 0) {
    logger.warn('Addresses not in the key ledger were ignored', { addresses: update.unknown });
  }
  if (update.updated.length > 0) {
    await saveKeyAssignments(update.ledger, options.ledgerPath, store, logger);
  }

  return succeed(update, startTime);
}

/**
 * Record that outreach emails were sent by hand
 */
export function markSentAndSave(
  addresses: readonly string[],
  options: CampaignIO & LedgerFiles
): Promise<ModuleResult<LedgerUpdate>> {
  return updateLedgerFile(options, (ledger, now) => markSent(addresses, ledger, now));
}

/**
 * Record replies so those recipients drop out of follow-ups
 */
export function markRespondedAndSave(
  addresses: readonly string[],
  options: CampaignIO & LedgerFiles
): Promise<ModuleResult<LedgerUpdate>> {
  return updateLedgerFile(options, (ledger) => markResponded(addresses, ledger));
}

/**
 * Counts for the status report
 */
export async function campaignStats(options: StatsOptions): Promise<ModuleResult<CampaignStats>> {
  const startTime = Date.now();
  const { store, logger, now } = resolveIO(options);
  const followUpDays = options.followUpDays ?? DEFAULT_FOLLOW_UP_DAYS;

  const loaded = await loadLedgerOrFail(options.ledgerPath, store, logger);
  if ('error' in loaded) {
    return failure('LEDGER_CORRUPT', loaded.error.message, startTime, loaded.error.details);
  }

  const pool = await loadKeyPool(options.keyPoolPath, store, logger);

  return succeed(
    {
      ...summarizeLedger(loaded.ledger, pool.length),
      awaitingFollowUp: findFollowUpCandidates(loaded.ledger, followUpDays, now()).length,
      followUpDays,
    },
    startTime
  );
}
