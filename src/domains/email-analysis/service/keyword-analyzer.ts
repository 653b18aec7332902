/**
 * @fileoverview Model-free keyword analysis.
 *
 * Used when the language model is disabled in configuration. Results are
 * tagged FALLBACK so the UI can tell them apart from model verdicts.
 */

import * as chrono from 'chrono-node';
import type { NormalizedUnit, Tier, Verdict } from '../types.js';

const SUMMARY_MAX_LENGTH = 200;

/** Checked in order; the first tier with a matching keyword wins. */
const TIER_KEYWORDS: Array<{ tier: Tier; keywords: string[] }> = [
  { tier: 'SPAM', keywords: ['sale', 'discount', 'offer', 'deal', 'promotion', 'buy now', 'limited time'] },
  { tier: 'IMPORTANT', keywords: ['meeting', 'deadline', 'urgent', 'important', 'action required'] },
  { tier: 'VERY_IMPORTANT', keywords: ['today', 'asap', 'immediately', 'critical', 'emergency'] },
];

const DEADLINE_CUE = /\b(deadline|due|by|before)\b/i;

function containsKeyword(text: string, keyword: string): boolean {
  const escaped = keyword.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`\\b${escaped}\\b`, 'i').test(text);
}

export function classifyByKeywords(text: string): Tier {
  for (const { tier, keywords } of TIER_KEYWORDS) {
    if (keywords.some((keyword) => containsKeyword(text, keyword))) {
      return tier;
    }
  }
  return 'UNIMPORTANT';
}

/** First two sentences of the body, capped in length. */
export function summarizeByExtraction(body: string): string {
  const sentences = body
    .split('.')
    .map((sentence) => sentence.replace(/\s+/g, ' ').trim())
    .filter((sentence) => sentence.length > 0)
    .slice(0, 2);

  if (sentences.length === 0) return 'No content available';

  const summary = sentences.join('. ');
  return summary.length > SUMMARY_MAX_LENGTH
    ? `${summary.slice(0, SUMMARY_MAX_LENGTH)}...`
    : summary;
}

/**
 * Date phrases in `text`, only when the text mentions a deadline cue.
 * Order of first appearance, deduplicated.
 */
export function extractDeadlinePhrases(text: string, referenceDate: Date = new Date()): string[] {
  if (!DEADLINE_CUE.test(text)) return [];

  const phrases: string[] = [];
  for (const result of chrono.parse(text, referenceDate, { forwardDate: true })) {
    const phrase = result.text.trim();
    if (phrase.length > 0 && !phrases.includes(phrase)) {
      phrases.push(phrase);
    }
  }
  return phrases;
}

/**
 * Produce a verdict from keyword rules alone.
 */
export function analyzeByKeywords(unit: NormalizedUnit, referenceDate?: Date): Verdict {
  const text = `${unit.subject}\n${unit.body}`;
  return Object.freeze({
    tier: classifyByKeywords(text),
    summary: summarizeByExtraction(unit.body),
    deadlines: Object.freeze(extractDeadlinePhrases(text, referenceDate)),
    links: Object.freeze([...unit.links]),
  });
}
