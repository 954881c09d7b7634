/**
 * Key Assignment Ledger
 *
 * Guarantees each recipient address receives at most one product key and
 * that no key is ever handed out twice, across process restarts.
 *
 * - The ledger is a JSON object keyed by recipient address
 * - Keys are drawn from the pool in file order, offset by the number of
 *   persisted assignments, and checked against every key already in the ledger
 * - Entries are created once, then only updated (sent / responded); never deleted
 *
 * Persistence is a whole-file overwrite. Only one process may write at a time.
 */

import { z } from 'zod';
import { createLogger, type Logger } from '../logger/index.js';
import { FsFileStore, type FileStore } from '../storage/index.js';
import type { KeyAssignment, KeyLedger, Platform } from '../types/index.js';

const defaultLogger = createLogger('ledger');
const defaultStore = new FsFileStore();

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Keys of 10 characters or fewer are discarded */
export const MIN_KEY_LENGTH = 11;

// ============================================================================
// Errors
// ============================================================================

/**
 * The ledger file exists but cannot be trusted. Writing over it could
 * re-issue keys, so callers must stop.
 */
export class LedgerCorruptError extends Error {
  constructor(
    message: string,
    readonly path: string,
    readonly details?: unknown
  ) {
    super(message);
    this.name = 'LedgerCorruptError';
  }
}

// ============================================================================
// Schema
// ============================================================================

/**
 * Type checks only: no defaults, no coercion. Unknown fields pass through,
 * so a load followed by a save returns the file unchanged.
 */
const KeyAssignmentSchema = z
  .object({
    key: z.string().min(1),
    influencer: z.string().nullable().optional(),
    platform: z.string().nullable().optional(),
    followers: z.union([z.number(), z.string()]).nullable().optional(),
    assigned_date: z.string().optional(),
    sent: z.boolean().optional(),
    sent_date: z.string().optional(),
    responded: z.boolean().optional(),
    draft_created: z.boolean().optional(),
  })
  .passthrough();

const KeyLedgerSchema = z.record(z.string(), KeyAssignmentSchema);

// ============================================================================
// Persistence
// ============================================================================

/**
 * Parse ledger JSON text
 * @throws LedgerCorruptError when the text is not a valid ledger
 */
export function parseKeyLedger(content: string, path = '<inline>'): KeyLedger {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new LedgerCorruptError(`Key ledger is not valid JSON: ${message}`, path);
  }

  const result = KeyLedgerSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new LedgerCorruptError('Key ledger failed validation', path, issues);
  }

  const ledger: KeyLedger = result.data;
  return ledger;
}

/**
 * Load the ledger. A missing file is an empty ledger.
 *
 * @throws LedgerCorruptError when the file exists but is malformed
 */
export async function loadKeyAssignments(
  path: string,
  store: FileStore = defaultStore,
  logger: Logger = defaultLogger
): Promise<KeyLedger> {
  const content = await store.readText(path);

  if (content === null) {
    logger.info('No key ledger found, starting empty', { path });
    return {};
  }

  if (content.trim() === '') {
    logger.warn('Key ledger is empty, starting empty', { path });
    return {};
  }

  const ledger = parseKeyLedger(content, path);
  logger.info('Key ledger loaded', { path, assignments: Object.keys(ledger).length });
  return ledger;
}

/**
 * Overwrite the ledger file with the full mapping, pretty-printed
 */
export async function saveKeyAssignments(
  ledger: KeyLedger,
  path: string,
  store: FileStore = defaultStore,
  logger: Logger = defaultLogger
): Promise<void> {
  await store.writeText(path, `${JSON.stringify(ledger, null, 2)}\n`);
  logger.info('Key ledger saved', { path, assignments: Object.keys(ledger).length });
}

// ============================================================================
// Key Pool
// ============================================================================

/**
 * Split one delimited line, honouring double-quoted fields
 */
export function splitDelimitedLine(line: string, delimiter: string): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (inQuotes) {
      if (char === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (char === '"') {
        inQuotes = false;
      } else {
        current += char;
      }
    } else if (char === '"') {
      inQuotes = true;
    } else if (char === delimiter) {
      fields.push(current);
      current = '';
    } else {
      current += char;
    }
  }

  fields.push(current);
  return fields;
}

function isValidKey(value: string | undefined): value is string {
  return value !== undefined && value.length >= MIN_KEY_LENGTH;
}

/**
 * Parse a key pool file.
 *
 * - Plain text: one key per line
 * - Tabular (first line holds a comma or tab): the first header column whose
 *   name contains "key" (any case); without one, column 0 and no header row
 *
 * Blank lines and values shorter than 11 characters after trimming are dropped.
 */
export function parseKeyPool(content: string): string[] {
  const lines = content.split(/\r?\n/);
  const firstLine = (lines[0] ?? '').trim();

  if (!firstLine.includes(',') && !firstLine.includes('\t')) {
    return lines.map((line) => line.trim()).filter(isValidKey);
  }

  const delimiter = firstLine.includes(',') ? ',' : '\t';
  const rows = lines.filter((line) => line.trim() !== '').map((line) => splitDelimitedLine(line, delimiter));
  const header = rows[0] ?? [];

  const headerKeyColumn = header.findIndex((column) => column.toLowerCase().includes('key'));
  const keyColumn = headerKeyColumn === -1 ? 0 : headerKeyColumn;
  const dataRows = headerKeyColumn === -1 ? rows : rows.slice(1);

  return dataRows.map((row) => row[keyColumn]?.trim()).filter(isValidKey);
}

/**
 * Load the key pool. A missing file is an empty pool.
 */
export async function loadKeyPool(
  path: string,
  store: FileStore = defaultStore,
  logger: Logger = defaultLogger
): Promise<string[]> {
  const content = await store.readText(path);

  if (content === null) {
    logger.warn('Key pool file not found', { path });
    return [];
  }

  const keys = parseKeyPool(content);
  logger.info('Key pool loaded', { path, keys: keys.length });
  return keys;
}

// ============================================================================
// Assignment
// ============================================================================

/**
 * Recipient about to receive a key
 */
export interface OutreachTarget {
  address: string;
  influencer: string;
  platform: Platform | null;
  followers: number | null;
}

export interface KeyAssignmentPlan {
  ledger: KeyLedger;
  assigned: Array<{ target: OutreachTarget; key: string }>;
  /** Targets skipped because their address already holds a key */
  alreadyAssigned: OutreachTarget[];
  /** Targets left without a key because the pool ran out */
  unassigned: OutreachTarget[];
}

/**
 * Unassigned keys in pool order: skip as many keys as the ledger holds,
 * then drop anything the ledger already references.
 */
export function selectAvailableKeys(pool: readonly string[], ledger: KeyLedger): string[] {
  const entries = Object.values(ledger);
  const taken = new Set(entries.map((entry) => entry.key));

  return pool.slice(entries.length).filter((key) => {
    if (taken.has(key)) {
      return false;
    }
    taken.add(key);
    return true;
  });
}

/**
 * Pair targets with the next available keys. Returns a new ledger; the input is untouched.
 * Targets already in the ledger, or repeated within the batch, never get a second key.
 */
export function assignKeys(
  targets: readonly OutreachTarget[],
  pool: readonly string[],
  ledger: KeyLedger,
  now: Date = new Date()
): KeyAssignmentPlan {
  const next: KeyLedger = { ...ledger };
  const available = selectAvailableKeys(pool, ledger);
  const assigned: KeyAssignmentPlan['assigned'] = [];
  const alreadyAssigned: OutreachTarget[] = [];
  const unassigned: OutreachTarget[] = [];

  for (const target of targets) {
    if (next[target.address]) {
      alreadyAssigned.push(target);
      continue;
    }

    const key = available.shift();
    if (key === undefined) {
      unassigned.push(target);
      continue;
    }

    const entry: KeyAssignment = {
      key,
      influencer: target.influencer,
      platform: target.platform,
      followers: target.followers,
      assigned_date: now.toISOString(),
      sent: false,
    };
    next[target.address] = entry;
    assigned.push({ target, key });
  }

  return { ledger: next, assigned, alreadyAssigned, unassigned };
}

// ============================================================================
// Status Updates
// ============================================================================

export interface LedgerUpdate {
  ledger: KeyLedger;
  updated: string[];
  /** Addresses not present in the ledger; ignored */
  unknown: string[];
}

function updateEntries(
  addresses: readonly string[],
  ledger: KeyLedger,
  apply: (entry: KeyAssignment) => KeyAssignment
): LedgerUpdate {
  const next: KeyLedger = { ...ledger };
  const updated: string[] = [];
  const unknown: string[] = [];

  for (const address of addresses) {
    const entry = next[address];
    if (!entry) {
      unknown.push(address);
      continue;
    }
    next[address] = apply(entry);
    updated.push(address);
  }

  return { ledger: next, updated, unknown };
}

/**
 * Flag entries as sent with a timestamp. Unknown addresses are ignored.
 */
export function markSent(addresses: readonly string[], ledger: KeyLedger, now: Date = new Date()): LedgerUpdate {
  const sentDate = now.toISOString();
  return updateEntries(addresses, ledger, (entry) => ({ ...entry, sent: true, sent_date: sentDate }));
}

/**
 * Flag entries as responded so they drop out of follow-ups
 */
export function markResponded(addresses: readonly string[], ledger: KeyLedger): LedgerUpdate {
  return updateEntries(addresses, ledger, (entry) => ({ ...entry, responded: true }));
}

// ============================================================================
// Follow-up Eligibility
// ============================================================================

export interface FollowUpCandidate {
  email: string;
  influencer: string;
  key: string;
  sent_date: string;
  days_since_sent: number;
}

/**
 * Entries sent at least daysSince whole days ago that have not responded
 */
export function findFollowUpCandidates(
  ledger: KeyLedger,
  daysSince: number,
  now: Date = new Date()
): FollowUpCandidate[] {
  const candidates: FollowUpCandidate[] = [];

  for (const [email, entry] of Object.entries(ledger)) {
    if (entry.sent !== true || entry.responded === true || !entry.sent_date) {
      continue;
    }

    const sentAt = Date.parse(entry.sent_date);
    if (Number.isNaN(sentAt)) {
      continue;
    }

    const daysPassed = Math.floor((now.getTime() - sentAt) / MS_PER_DAY);
    if (daysPassed >= daysSince) {
      candidates.push({
        email,
        influencer: entry.influencer ?? '',
        key: entry.key,
        sent_date: entry.sent_date,
        days_since_sent: daysPassed,
      });
    }
  }

  return candidates;
}

// ============================================================================
// Statistics
// ============================================================================

export interface LedgerStats {
  assigned: number;
  sent: number;
  responded: number;
  awaitingSend: number;
  keysRemaining: number;
}

export function summarizeLedger(ledger: KeyLedger, poolSize: number): LedgerStats {
  const entries = Object.values(ledger);
  const sent = entries.filter((entry) => entry.sent === true).length;

  return {
    assigned: entries.length,
    sent,
    responded: entries.filter((entry) => entry.responded === true).length,
    awaitingSend: entries.length - sent,
    keysRemaining: Math.max(0, poolSize - entries.length),
  };
}
