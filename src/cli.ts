#!/usr/bin/env node
/**
 * Command-line entry point
 *
 * Commands:
 *   discover        [--output-dir <dir>]
 *   campaign        [--input <file.json>] [--keys <file>] [--max <n>] [--no-gmail]
 *   followup        [--days <n>] [--no-gmail]
 *   mark-sent       <address...>
 *   mark-responded  <address...>
 *   stats           [--days <n>]
 *
 * Settings come from the environment (see config); flags override paths and limits.
 * Exit code is 1 on invalid configuration, a corrupt ledger, a missing key pool
 * or when every platform failed during discovery.
 */

import { createGmailAdapterFromFiles, type DraftAdapter } from './adapters/index.js';
import {
  campaignStats,
  generateCampaign,
  generateFollowUps,
  loadInfluencerRecords,
  markRespondedAndSave,
  markSentAndSave,
} from './campaign/index.js';
import { ConfigError, loadConfig, outputPath, type AppConfig } from './config/index.js';
import { DISCOVERY_OUTPUT_FILES, runDiscovery, saveDiscoveryResults } from './discovery/index.js';
import { createLogger, type Logger } from './logger/index.js';
import { renderCampaignStats } from './renderers/index.js';
import { FsFileStore, type FileStore } from './storage/index.js';
import type { ModuleResult } from './types/index.js';

const USAGE = [
  'Usage: creator-outreach <command> [options]',
  '',
  'Commands:',
  '  discover        [--output-dir <dir>]',
  '  campaign        [--input <file.json>] [--keys <file>] [--max <n>] [--no-gmail]',
  '  followup        [--days <n>] [--no-gmail]',
  '  mark-sent       <address...>',
  '  mark-responded  <address...>',
  '  stats           [--days <n>]',
  '',
].join('\n');

/** Flags that never take a value */
const BOOLEAN_FLAGS = new Set(['no-gmail', 'help']);

export interface CliArgs {
  command: string | undefined;
  flags: Record<string, string | boolean>;
  positionals: string[];
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const tokens = argv.slice(2);
  const command = tokens.shift();
  const flags: Record<string, string | boolean> = {};
  const positionals: string[] = [];

  for (let i = 0; i < tokens.length; i += 1) {
    const token = tokens[i];
    if (token === undefined) {
      continue;
    }
    if (!token.startsWith('--')) {
      positionals.push(token);
      continue;
    }

    const key = token.slice(2);
    const next = tokens[i + 1];
    if (BOOLEAN_FLAGS.has(key) || next === undefined || next.startsWith('--')) {
      flags[key] = true;
      continue;
    }
    flags[key] = next;
    i += 1;
  }

  return { command, flags, positionals };
}

function asString(value: string | boolean | undefined): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * @throws ConfigError when the flag is present but not a non-negative integer
 */
export function integerFlag(flags: CliArgs['flags'], name: string): number | undefined {
  const raw = flags[name];
  if (raw === undefined) {
    return undefined;
  }
  const value = typeof raw === 'string' ? Number(raw) : Number.NaN;
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError([`--${name}: expected a non-negative integer`]);
  }
  return value;
}

export interface CliContext {
  env: Record<string, string | undefined>;
  store: FileStore;
  logger: Logger;
  /** Human-readable output */
  write: (text: string) => void;
  /** Draft adapter factory; null disables drafts */
  createDrafts: (config: AppConfig, logger: Logger) => Promise<DraftAdapter | null>;
}

function defaultContext(): CliContext {
  const store = new FsFileStore();
  return {
    env: process.env,
    store,
    logger: createLogger('cli'),
    write: (text) => {
      process.stdout.write(text);
    },
    createDrafts: (config, logger) =>
      createGmailAdapterFromFiles(config.paths.gmailCredentials, config.paths.gmailToken, store, logger),
  };
}

function reportFailure<T>(result: ModuleResult<T>, logger: Logger): number {
  logger.error(result.error?.message ?? 'Command failed', {
    code: result.error?.code,
    details: result.error?.details,
  });
  return 1;
}

async function draftsFor(args: CliArgs, config: AppConfig, ctx: CliContext): Promise<DraftAdapter | null> {
  if (args.flags['no-gmail'] === true) {
    return null;
  }
  const drafts = await ctx.createDrafts(config, ctx.logger);
  if (!drafts) {
    ctx.logger.warn('Gmail unavailable; emails will be written to the text report');
  }
  return drafts;
}

// ============================================================================
// Commands
// ============================================================================

async function discoverCommand(args: CliArgs, config: AppConfig, ctx: CliContext): Promise<number> {
  const outputDir = asString(args.flags['output-dir']) ?? config.paths.outputDir;
  const run = await runDiscovery(config.discovery, { logger: ctx.logger });

  ctx.logger.info('Discovery summary', { ...run.summary });

  if (run.records.length === 0) {
    ctx.logger.warn('No creators found; nothing written');
    return run.platform_errors.length > 0 && run.platforms.length === 0 ? 1 : 0;
  }

  const paths = await saveDiscoveryResults(run.records, outputDir, ctx.store, ctx.logger);
  ctx.write(`${Object.values(paths).join('\n')}\n`);
  return 0;
}

async function campaignCommand(args: CliArgs, config: AppConfig, ctx: CliContext): Promise<number> {
  const inputPath = asString(args.flags.input) ?? outputPath(config, DISCOVERY_OUTPUT_FILES.priorityJson);
  const maxDrafts = integerFlag(args.flags, 'max');

  const loaded = await loadInfluencerRecords(inputPath, { store: ctx.store, logger: ctx.logger });
  if (!loaded.success || !loaded.data) {
    return reportFailure(loaded, ctx.logger);
  }

  const result = await generateCampaign(loaded.data, {
    settings: config.campaign,
    ledgerPath: config.paths.keyLedger,
    keyPoolPath: asString(args.flags.keys) ?? config.paths.keyPool,
    outputDir: config.paths.outputDir,
    ...(maxDrafts === undefined ? {} : { maxDrafts }),
    drafts: await draftsFor(args, config, ctx),
    store: ctx.store,
    logger: ctx.logger,
  });
  if (!result.success || !result.data) {
    return reportFailure(result, ctx.logger);
  }

  const outcome = result.data;
  ctx.write(
    [
      `Keys assigned: ${outcome.keys_assigned}`,
      `Drafts created: ${outcome.drafts_created}`,
      `Report entries: ${outcome.report_entries}${outcome.report_path ? ` (${outcome.report_path})` : ''}`,
      `Keys remaining: ${outcome.keys_remaining}`,
      '',
    ].join('\n')
  );
  return 0;
}

async function followUpCommand(args: CliArgs, config: AppConfig, ctx: CliContext): Promise<number> {
  const daysSince = integerFlag(args.flags, 'days');

  const result = await generateFollowUps({
    settings: config.campaign,
    ledgerPath: config.paths.keyLedger,
    outputDir: config.paths.outputDir,
    ...(daysSince === undefined ? {} : { daysSince }),
    drafts: await draftsFor(args, config, ctx),
    store: ctx.store,
    logger: ctx.logger,
  });
  if (!result.success || !result.data) {
    return reportFailure(result, ctx.logger);
  }

  ctx.write(
    `Follow-ups due: ${result.data.candidates} (drafts: ${result.data.drafts_created}, report: ${result.data.report_entries})\n`
  );
  return 0;
}

async function markCommand(
  args: CliArgs,
  config: AppConfig,
  ctx: CliContext,
  mark: typeof markSentAndSave
): Promise<number> {
  if (args.positionals.length === 0) {
    ctx.logger.error('At least one address is required');
    ctx.write(USAGE);
    return 1;
  }

  const result = await mark(args.positionals, {
    ledgerPath: config.paths.keyLedger,
    store: ctx.store,
    logger: ctx.logger,
  });
  if (!result.success || !result.data) {
    return reportFailure(result, ctx.logger);
  }

  ctx.write(`Updated: ${result.data.updated.length}, not found: ${result.data.unknown.length}\n`);
  return 0;
}

async function statsCommand(args: CliArgs, config: AppConfig, ctx: CliContext): Promise<number> {
  const followUpDays = integerFlag(args.flags, 'days');

  const result = await campaignStats({
    ledgerPath: config.paths.keyLedger,
    keyPoolPath: config.paths.keyPool,
    ...(followUpDays === undefined ? {} : { followUpDays }),
    store: ctx.store,
    logger: ctx.logger,
  });
  if (!result.success || !result.data) {
    return reportFailure(result, ctx.logger);
  }

  ctx.write(renderCampaignStats(result.data));
  return 0;
}

/**
 * Run one command and resolve to the process exit code
 */
export async function run(argv: readonly string[], overrides: Partial<CliContext> = {}): Promise<number> {
  const ctx: CliContext = { ...defaultContext(), ...overrides };
  const args = parseArgs(argv);

  if (!args.command || args.command === 'help' || args.flags.help === true) {
    ctx.write(USAGE);
    return args.command ? 0 : 1;
  }

  try {
    const config = loadConfig(ctx.env);

    switch (args.command) {
      case 'discover':
        return await discoverCommand(args, config, ctx);
      case 'campaign':
        return await campaignCommand(args, config, ctx);
      case 'followup':
        return await followUpCommand(args, config, ctx);
      case 'mark-sent':
        return await markCommand(args, config, ctx, markSentAndSave);
      case 'mark-responded':
        return await markCommand(args, config, ctx, markRespondedAndSave);
      case 'stats':
        return await statsCommand(args, config, ctx);
      default:
        ctx.logger.error('Unknown command', { command: args.command });
        ctx.write(USAGE);
        return 1;
    }
  } catch (error) {
    if (error instanceof ConfigError) {
      ctx.logger.error(error.message, { issues: error.issues });
      return 1;
    }
    throw error;
  }
}

if (require.main === module) {
  run(process.argv).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      createLogger('cli').error('Fatal error', { error: message });
      process.exitCode = 1;
    }
  );
}
