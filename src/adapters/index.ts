/**
 * Mail-Draft Adapters Module
 *
 * Responsibilities:
 * - Define the DraftAdapter contract used by the campaign runner
 * - Create Gmail drafts through the googleapis Gmail v1 client
 * - Build OAuth2 clients from stored client credentials and a stored token
 *
 * A draft failure is reported in the result, never thrown; the campaign then
 * writes that message to the text report instead. The interactive consent flow
 * that produces token.json is not handled here.
 */

import { google, type gmail_v1 } from 'googleapis';
import { z } from 'zod';
import { createLogger, type Logger } from '../logger/index.js';
import { FsFileStore, type FileStore } from '../storage/index.js';
import type { EmailContent } from '../types/index.js';

const defaultLogger = createLogger('adapters');

export const GMAIL_COMPOSE_SCOPE = 'https://www.googleapis.com/auth/gmail.compose';

// ============================================================================
// DRAFT ADAPTER TYPES
// ============================================================================

export interface DraftResult {
  success: boolean;
  draftId?: string;
  error?: string;
}

/**
 * Draft Adapter Interface
 *
 * Accepts a composed message and either creates a draft or reports failure.
 */
export interface DraftAdapter {
  createDraft(message: EmailContent): Promise<DraftResult>;
}

/**
 * The slice of gmail.users.drafts the adapter calls
 */
export interface GmailDraftsApi {
  create(params: gmail_v1.Params$Resource$Users$Drafts$Create): Promise<{ data: gmail_v1.Schema$Draft }>;
}

// ============================================================================
// MESSAGE ENCODING
// ============================================================================

/**
 * RFC 2047 encoded-word for header values outside printable ASCII
 */
export function encodeHeaderValue(value: string): string {
  if (/^[\x20-\x7E]*$/.test(value)) {
    return value;
  }
  return `=?UTF-8?B?${Buffer.from(value, 'utf-8').toString('base64')}?=`;
}

/**
 * Plain-text RFC 822 message with CRLF line endings
 */
export function buildRawMessage(message: EmailContent): string {
  return [
    `To: ${message.to}`,
    `Subject: ${encodeHeaderValue(message.subject)}`,
    'MIME-Version: 1.0',
    'Content-Type: text/plain; charset="UTF-8"',
    'Content-Transfer-Encoding: 8bit',
    '',
    message.body.replace(/\r?\n/g, '\r\n'),
  ].join('\r\n');
}

/**
 * Raw message in the base64url form the Gmail API expects
 */
export function encodeRawMessage(message: EmailContent): string {
  return Buffer.from(buildRawMessage(message), 'utf-8').toString('base64url');
}

// ============================================================================
// GMAIL ADAPTER IMPLEMENTATION
// ============================================================================

/**
 * GmailDraftAdapter
 *
 * Creates one draft per message in the authenticated user's mailbox.
 */
export class GmailDraftAdapter implements DraftAdapter {
  private drafts: GmailDraftsApi;
  private logger: Logger;

  constructor(drafts: GmailDraftsApi, logger: Logger = defaultLogger) {
    this.drafts = drafts;
    this.logger = logger;
  }

  async createDraft(message: EmailContent): Promise<DraftResult> {
    try {
      const response = await this.drafts.create({
        userId: 'me',
        requestBody: {
          message: { raw: encodeRawMessage(message) },
        },
      });

      const draftId = response.data.id ?? undefined;
      this.logger.info('Gmail draft created', { to: message.to, draftId });

      return draftId ? { success: true, draftId } : { success: true };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.error('Failed to create Gmail draft', { to: message.to, error: errorMessage });

      return {
        success: false,
        error: errorMessage,
      };
    }
  }
}

// ============================================================================
// FACTORY
// ============================================================================

const ClientSecretSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  redirect_uris: z.array(z.string()).optional(),
});

const CredentialsFileSchema = z
  .object({
    installed: ClientSecretSchema.optional(),
    web: ClientSecretSchema.optional(),
  })
  .refine((file) => file.installed !== undefined || file.web !== undefined, {
    message: 'expected an "installed" or "web" client section',
  });

/**
 * Stored token; `access_token` and `token` are both accepted for the access token
 */
const TokenFileSchema = z
  .object({
    access_token: z.string().optional(),
    token: z.string().optional(),
    refresh_token: z.string().optional(),
    expiry_date: z.number().optional(),
    scope: z.string().optional(),
    token_type: z.string().optional(),
  })
  .refine((file) => Boolean(file.refresh_token || file.access_token || file.token), {
    message: 'token file holds neither an access token nor a refresh token',
  });

export type GmailOAuthClient = InstanceType<typeof google.auth.OAuth2>;

async function readJson(path: string, store: FileStore): Promise<unknown | null> {
  const content = await store.readText(path);
  return content === null ? null : JSON.parse(content);
}

/**
 * Build an OAuth2 client from stored credentials and token
 *
 * @returns The client, or null when either file is absent or unusable
 */
export async function loadGmailAuth(
  credentialsPath: string,
  tokenPath: string,
  store: FileStore = new FsFileStore(),
  logger: Logger = defaultLogger
): Promise<GmailOAuthClient | null> {
  let credentialsJson: unknown;
  let tokenJson: unknown;
  try {
    credentialsJson = await readJson(credentialsPath, store);
    tokenJson = await readJson(tokenPath, store);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.warn('Gmail credential files could not be parsed', { error: errorMessage });
    return null;
  }

  if (credentialsJson === null) {
    logger.warn('Gmail client credentials not found', { path: credentialsPath });
    return null;
  }
  if (tokenJson === null) {
    logger.warn('Gmail token not found; authorize once to create it', { path: tokenPath });
    return null;
  }

  const credentials = CredentialsFileSchema.safeParse(credentialsJson);
  const token = TokenFileSchema.safeParse(tokenJson);
  if (!credentials.success || !token.success) {
    logger.warn('Gmail credential files are invalid', {
      credentials: credentials.success ? undefined : credentials.error.errors.map((e) => e.message),
      token: token.success ? undefined : token.error.errors.map((e) => e.message),
    });
    return null;
  }

  const client = credentials.data.installed ?? credentials.data.web;
  if (!client) {
    return null;
  }

  const auth = new google.auth.OAuth2(client.client_id, client.client_secret, client.redirect_uris?.[0]);
  auth.setCredentials({
    access_token: token.data.access_token ?? token.data.token ?? null,
    refresh_token: token.data.refresh_token ?? null,
    expiry_date: token.data.expiry_date ?? null,
    scope: token.data.scope ?? GMAIL_COMPOSE_SCOPE,
  });

  return auth;
}

/**
 * Create a Gmail draft adapter from credential files
 *
 * @returns The adapter, or null when Gmail is unavailable
 */
export async function createGmailAdapterFromFiles(
  credentialsPath: string,
  tokenPath: string,
  store: FileStore = new FsFileStore(),
  logger: Logger = defaultLogger
): Promise<DraftAdapter | null> {
  const auth = await loadGmailAuth(credentialsPath, tokenPath, store, logger);
  if (!auth) {
    return null;
  }

  const gmail = google.gmail({ version: 'v1', auth });
  logger.info('Gmail draft adapter ready');
  return new GmailDraftAdapter({ create: (params) => gmail.users.drafts.create(params) }, logger);
}
