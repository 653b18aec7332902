/**
 * @fileoverview Message normalization.
 *
 * Converts a raw mailbox message into the plain-text unit the prompt is
 * built from. Total: absent fields become empty strings or lists.
 */

import type { NormalizedUnit, RawMessage } from '../types.js';

export const DEFAULT_BODY_CHAR_BUDGET = 3000;

const TRUNCATION_MARKER = '...';

const URL_PATTERN = /https?:\/\/[^\s<>"'()[\]{}]+/gi;

export type NormalizeOptions = {
  /** Maximum body length in characters, before the truncation marker. */
  bodyCharBudget?: number;
};

/**
 * Normalize a raw message into an analysis unit.
 *
 * The body is stripped of markup, whitespace-collapsed and truncated to
 * the character budget; links are the message's own link descriptors
 * followed by any URLs found in the body, deduplicated.
 */
export function normalizeMessage(raw: RawMessage, options: NormalizeOptions = {}): NormalizedUnit {
  const budget = options.bodyCharBudget ?? DEFAULT_BODY_CHAR_BUDGET;
  const rawBody = raw.body ?? '';

  const attachmentNames = (raw.attachments ?? [])
    .map((attachment) => (typeof attachment?.filename === 'string' ? attachment.filename.trim() : ''))
    .filter((name) => name.length > 0);

  const links = dedupe([
    ...(raw.links ?? []).filter((link): link is string => typeof link === 'string'),
    ...extractUrls(rawBody),
  ]);

  return {
    id: raw.id ?? '',
    sender: singleLine(raw.sender),
    subject: singleLine(raw.subject),
    date: singleLine(raw.date),
    body: truncate(cleanBody(rawBody), budget),
    hasAttachment: attachmentNames.length > 0 || (raw.attachments?.length ?? 0) > 0,
    hasLink: links.length > 0,
    attachmentNames,
    links,
  };
}

/** Find http(s) URLs in free text, trailing sentence punctuation removed. */
export function extractUrls(text: string): string[] {
  const matches = text.match(URL_PATTERN) ?? [];
  return matches
    .map((url) => url.replace(/[.,;:!?]+$/, ''))
    .filter((url) => url.length > 'https://'.length);
}

/**
 * Strip markup and noise from an email body.
 * Handles both plain-text and HTML bodies.
 */
export function cleanBody(body: string): string {
  if (!body) return '';

  let text = body
    .replace(/<(style|script)[^>]*>[\s\S]*?<\/\1>/gi, ' ')
    .replace(/data:image\/[^;]+;base64,[A-Za-z0-9+/=]+/g, '[inline image]')
    .replace(/<img[^>]+alt=["']([^"']*)["'][^>]*>/gi, ' $1 ')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/(p|div|li|tr|h[1-6])>/gi, '\n')
    .replace(/<[^>]+>/g, ' ')
    .replace(/&nbsp;/gi, ' ')
    .replace(/&amp;/gi, '&')
    .replace(/&lt;/gi, '<')
    .replace(/&gt;/gi, '>')
    .replace(/&quot;/gi, '"')
    .replace(/&#39;/gi, "'");

  text = normalizeWhitespace(text);

  // Mailing-list footers: drop an unsubscribe tail in the second half of the text.
  const footerAt = text.search(/\bunsubscribe\b/i);
  if (footerAt > 0 && footerAt >= text.length / 2) {
    text = text.slice(0, footerAt).trim();
  }

  return text;
}

function normalizeWhitespace(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .replace(/[ \t\f\v]+/g, ' ')
    .replace(/ *\n */g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

function truncate(text: string, budget: number): string {
  if (text.length <= budget) return text;
  return `${text.slice(0, budget).trimEnd()}${TRUNCATION_MARKER}`;
}

function singleLine(value: string | null | undefined): string {
  return (value ?? '').replace(/\s+/g, ' ').trim();
}

function dedupe(values: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const trimmed = value.trim();
    if (trimmed.length === 0 || seen.has(trimmed)) continue;
    seen.add(trimmed);
    result.push(trimmed);
  }
  return result;
}
