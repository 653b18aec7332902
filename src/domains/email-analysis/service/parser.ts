/**
 * @fileoverview Model reply parsing and validation.
 *
 * Turns the labeled-line reply requested by the prompt into a Verdict.
 * Formatting noise is tolerated; the tier must be one of the four known
 * values or the whole reply is rejected.
 */

import { MalformedResponseError } from '../../../utils/errors.js';
import { safeSnippet } from '../../../utils/observability/index.js';
import { isTier, type Tier, type Verdict } from '../types.js';
import { extractUrls } from './normalizer.js';

type FieldKey = 'tier' | 'summary' | 'deadlines' | 'links';

const LABEL_PATTERN =
  /^\s*(?:[-*>]\s+|\d+[.)]\s+)?(?:\*\*|__)?\s*(TIER|IMPORTANCE(?:[ _]LEVEL)?|SUMMARY|DEADLINES?|LINKS?|IMPORTANT[ _]LINKS)\s*(?:\*\*|__)?\s*:\s*(?:\*\*|__)?(.*)$/i;

const NONE_PATTERN =
  /^(?:none|n\/a|na|nil|null|unknown|-+|(?:none|nothing) (?:found|mentioned|specified|given|provided|listed|identified|stated)|not (?:mentioned|specified|applicable|provided|given|available|stated|found)|no (?:specific |explicit |clear |important )?(?:deadlines?|links?|urls?|dates?)(?: (?:found|mentioned|specified|given|provided|listed|identified|stated))?)\.?$/i;

const LIST_SEPARATOR = /\s*[;|]\s*/;

function labelToField(label: string): FieldKey {
  const upper = label.toUpperCase().replace(' ', '_');
  if (upper === 'TIER' || upper.startsWith('IMPORTANCE')) return 'tier';
  if (upper === 'SUMMARY') return 'summary';
  if (upper.startsWith('DEADLINE')) return 'deadlines';
  return 'links';
}

function stripCodeFences(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .filter((line) => !/^\s*```/.test(line))
    .join('\n');
}

function stripBullet(line: string): string {
  return line.replace(/^\s*(?:[-*•]\s+|\d+[.)]\s+)/, '').trim();
}

/**
 * Split the reply into labeled fields. Lines without a label continue the
 * most recent field; the first occurrence of a label wins.
 */
function splitFields(text: string): Map<FieldKey, string[]> {
  const fields = new Map<FieldKey, string[]>();
  let current: string[] | null = null;

  for (const line of stripCodeFences(text).split('\n')) {
    const match = LABEL_PATTERN.exec(line);
    if (match) {
      const key = labelToField(match[1]);
      if (fields.has(key)) {
        current = null;
        continue;
      }
      current = [cleanValue(match[2])];
      fields.set(key, current);
      continue;
    }
    if (current && line.trim().length > 0) {
      current.push(stripBullet(line));
    }
  }

  return fields;
}

function cleanValue(value: string): string {
  return value.replace(/(?:\*\*|__)\s*$/, '').trim();
}

/**
 * Map a tier value to the closed enumeration, ignoring case, surrounding
 * quotes/brackets/markdown, trailing punctuation and space/hyphen separators.
 */
export function normalizeTier(value: string): Tier | null {
  const candidate = value
    .trim()
    .replace(/^[\s*`"'“”‘’[(<]+/, '')
    .replace(/[\s*`"'“”‘’\])>.,;:!]+$/, '')
    .toUpperCase()
    .replace(/[\s-]+/g, '_');
  return isTier(candidate) ? candidate : null;
}

function splitList(lines: readonly string[]): string[] {
  const items: string[] = [];
  const seen = new Set<string>();
  for (const line of lines) {
    for (const part of line.split(LIST_SEPARATOR)) {
      const item = stripBullet(part);
      if (item.length === 0 || NONE_PATTERN.test(item) || seen.has(item)) continue;
      seen.add(item);
      items.push(item);
    }
  }
  return items;
}

/** http(s) URLs found in the items; items without one are dropped. */
function toLinks(items: readonly string[]): string[] {
  const links: string[] = [];
  for (const item of items) {
    for (const link of extractUrls(item)) {
      if (!links.includes(link)) links.push(link);
    }
  }
  return links;
}

/**
 * Parse a model reply into a verdict.
 *
 * @throws MalformedResponseError when the reply has no labeled fields, or
 *   the tier is missing or not one of the four known values
 */
export function parseVerdict(rawText: string): Verdict {
  const snippet = safeSnippet(rawText.trim(), 200);
  const fields = splitFields(rawText);

  if (fields.size === 0) {
    throw new MalformedResponseError('Response has no labeled fields', snippet);
  }

  const tierLines = fields.get('tier');
  const tierValue = tierLines?.find((line) => line.length > 0);
  if (!tierValue) {
    throw new MalformedResponseError('Response is missing the TIER field', snippet);
  }

  const tier = normalizeTier(tierValue);
  if (!tier) {
    throw new MalformedResponseError(`Unrecognized tier "${safeSnippet(tierValue, 40)}"`, snippet);
  }

  const summary = (fields.get('summary') ?? [])
    .filter((line) => line.length > 0)
    .join(' ')
    .trim();

  return Object.freeze({
    tier,
    summary,
    deadlines: Object.freeze(splitList(fields.get('deadlines') ?? [])),
    links: Object.freeze(toLinks(splitList(fields.get('links') ?? []))),
  });
}
