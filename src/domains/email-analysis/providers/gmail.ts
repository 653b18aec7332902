/**
 * @fileoverview Gmail mailbox provider.
 *
 * Lists unread inbox messages for the connected account and turns each
 * one into a RawMessage: headers, decoded body (plain text preferred,
 * HTML otherwise), attachment metadata and anchor links.
 *
 * Tokens come from the credential store and are refreshed when close to
 * expiry. Missing or rejected credentials surface as MailboxAuthError;
 * any other listing failure as MailboxTransportError.
 */

import { google, gmail_v1 } from 'googleapis';
import config from '../../../config.js';
import {
  getCredentialStore,
  GOOGLE_PROVIDER,
  MAILBOX_ACCOUNT,
  type CredentialStore,
} from '../../../services/credentials/index.js';
import { errorMessage, MailboxAuthError, MailboxTransportError } from '../../../utils/errors.js';
import { createLogger, type AppLogger } from '../../../utils/observability/index.js';
import type { AttachmentDescriptor, MailboxProvider, RawMessage } from '../types.js';

export const UNREAD_INBOX_QUERY = 'is:unread in:inbox';

// Refresh if the token expires in < 5 minutes
const REFRESH_THRESHOLD_MS = 5 * 60 * 1000;

export type GmailMailboxOptions = {
  store?: CredentialStore;
  account?: string;
  query?: string;
  logger?: AppLogger;
};

function createOAuth2Client() {
  return new google.auth.OAuth2(
    config.google.clientId,
    config.google.clientSecret,
    config.google.redirectUri
  );
}

/**
 * HTTP status carried by a googleapis (gaxios) error, if any.
 */
export function httpStatusOf(error: unknown): number | undefined {
  if (!error || typeof error !== 'object') return undefined;

  if ('response' in error && error.response && typeof error.response === 'object' &&
      'status' in error.response && typeof error.response.status === 'number') {
    return error.response.status;
  }
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('code' in error) {
    const code = error.code;
    if (typeof code === 'number') return code;
    if (typeof code === 'string' && /^\d{3}$/.test(code)) return parseInt(code, 10);
  }
  return undefined;
}

function isAuthFailure(error: unknown): boolean {
  const status = httpStatusOf(error);
  if (status === 401 || status === 403) return true;
  const message = errorMessage(error);
  return message.includes('invalid_grant') || message.includes('insufficient authentication scopes');
}

/**
 * Decode base64url-encoded body data from the Gmail API.
 */
export function decodeBodyData(data: string): string {
  return Buffer.from(data, 'base64url').toString('utf-8');
}

/** href targets of anchor tags, in document order. */
export function extractAnchorLinks(html: string): string[] {
  const links: string[] = [];
  for (const match of html.matchAll(/<a\b[^>]*\bhref\s*=\s*["']([^"']+)["']/gi)) {
    const href = match[1].replace(/&amp;/gi, '&').trim();
    if (/^https?:\/\//i.test(href) && !links.includes(href)) {
      links.push(href);
    }
  }
  return links;
}

/**
 * Walk MIME parts collecting text bodies and attachment metadata.
 */
function walkPayload(payload: gmail_v1.Schema$MessagePart | undefined | null): {
  plainText: string;
  htmlText: string;
  attachments: AttachmentDescriptor[];
} {
  const attachments: AttachmentDescriptor[] = [];
  let plainText = '';
  let htmlText = '';

  function walkParts(part: gmail_v1.Schema$MessagePart): void {
    const mimeType = part.mimeType ?? '';
    const filename = part.filename ?? '';
    const bodyData = part.body?.data;

    if (filename) {
      attachments.push({ filename, mimeType, sizeBytes: part.body?.size ?? 0 });
    } else if (mimeType === 'text/plain' && bodyData) {
      plainText += decodeBodyData(bodyData);
    } else if (mimeType === 'text/html' && bodyData) {
      htmlText += decodeBodyData(bodyData);
    }

    for (const child of part.parts ?? []) {
      walkParts(child);
    }
  }

  if (payload) walkParts(payload);
  return { plainText, htmlText, attachments };
}

/**
 * Convert a full-format Gmail message into a RawMessage.
 */
export function toRawMessage(message: gmail_v1.Schema$Message): RawMessage {
  const headers = message.payload?.headers ?? [];
  const getHeader = (name: string): string | null =>
    headers.find((h) => h.name?.toLowerCase() === name.toLowerCase())?.value ?? null;

  const { plainText, htmlText, attachments } = walkPayload(message.payload);
  const internalDate = message.internalDate ? Number(message.internalDate) : NaN;

  return {
    id: message.id ?? '',
    sender: getHeader('From'),
    subject: getHeader('Subject'),
    date: getHeader('Date') ?? (Number.isFinite(internalDate) ? new Date(internalDate).toISOString() : null),
    body: plainText || htmlText || message.snippet || null,
    attachments,
    links: htmlText ? extractAnchorLinks(htmlText) : [],
  };
}

export class GmailMailbox implements MailboxProvider {
  private readonly store: CredentialStore | undefined;
  private readonly account: string;
  private readonly query: string;
  private readonly log: AppLogger;

  constructor(options: GmailMailboxOptions = {}) {
    this.store = options.store;
    this.account = options.account ?? MAILBOX_ACCOUNT;
    this.query = options.query ?? UNREAD_INBOX_QUERY;
    this.log = options.logger ?? createLogger({ domain: 'gmail' });
  }

  /**
   * Fetch up to `maxCount` unread inbox messages, newest first.
   * A message that fails to load on its own is skipped.
   */
  async fetchUnread(maxCount: number): Promise<RawMessage[]> {
    const gmail = await this.getGmailClient();

    let ids: string[];
    try {
      const response = await gmail.users.messages.list({
        userId: 'me',
        q: this.query,
        maxResults: maxCount,
      });
      ids = (response.data.messages ?? [])
        .map((msg) => msg.id)
        .filter((id): id is string => typeof id === 'string' && id.length > 0)
        .slice(0, maxCount);
    } catch (error) {
      throw this.mapListError(error);
    }

    const messages: RawMessage[] = [];
    for (const id of ids) {
      try {
        const response = await gmail.users.messages.get({ userId: 'me', id, format: 'full' });
        messages.push(toRawMessage(response.data));
      } catch (error) {
        this.log.warn('message_fetch_failed', {
          messageId: id,
          status: httpStatusOf(error),
          error: errorMessage(error),
        });
      }
    }

    this.log.info('mailbox_fetched', { listed: ids.length, fetched: messages.length });
    return messages;
  }

  private credentialStore(): CredentialStore {
    return this.store ?? getCredentialStore();
  }

  private mapListError(error: unknown): Error {
    if (isAuthFailure(error)) {
      return new MailboxAuthError('Mailbox rejected the stored credentials. Reconnect your Google account.', {
        status: httpStatusOf(error),
      });
    }
    return new MailboxTransportError(`Failed to list messages: ${errorMessage(error)}`, {
      status: httpStatusOf(error),
    });
  }

  /**
   * Authenticated Gmail client, refreshing the access token when needed.
   * @throws MailboxAuthError when no usable credentials exist
   */
  private async getGmailClient(): Promise<gmail_v1.Gmail> {
    const store = this.credentialStore();
    let creds = await store.get(this.account, GOOGLE_PROVIDER);

    if (!creds) {
      throw new MailboxAuthError();
    }

    if (creds.expiresAt < Date.now() + REFRESH_THRESHOLD_MS) {
      try {
        const oauth2Client = createOAuth2Client();
        oauth2Client.setCredentials({ refresh_token: creds.refreshToken });
        const { credentials } = await oauth2Client.refreshAccessToken();
        if (!credentials.access_token) {
          throw new Error('Failed to refresh access token');
        }
        creds = {
          ...creds,
          accessToken: credentials.access_token,
          expiresAt: credentials.expiry_date || Date.now() + 3600000,
        };
        await store.set(this.account, GOOGLE_PROVIDER, creds);
        this.log.info('access_token_refreshed');
      } catch (error) {
        if (!isAuthFailure(error)) {
          throw new MailboxTransportError(`Token refresh failed: ${errorMessage(error)}`);
        }
        this.log.warn('access_token_refresh_rejected', { error: errorMessage(error) });
        await store.delete(this.account, GOOGLE_PROVIDER);
        throw new MailboxAuthError('Google rejected the refresh token. Reconnect your Google account.');
      }
    }

    const oauth2Client = createOAuth2Client();
    oauth2Client.setCredentials({ access_token: creds.accessToken });
    return google.gmail({ version: 'v1', auth: oauth2Client });
  }
}
