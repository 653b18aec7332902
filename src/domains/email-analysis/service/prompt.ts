/**
 * @fileoverview Analysis prompt construction.
 *
 * Renders a normalized email into the instruction template sent to the
 * model. The template fixes a labeled line format so the reply can be
 * validated structurally by the parser.
 */

import { TIERS, type NormalizedUnit } from '../types.js';

/** Field labels shared with the parser. */
export const FIELD_LABELS = {
  tier: 'TIER',
  summary: 'SUMMARY',
  deadlines: 'DEADLINES',
  links: 'LINKS',
} as const;

const TIER_RULES = `VERY_IMPORTANT - only if BOTH are true:
  1. there is a SPECIFIC deadline (today, tomorrow, an exact date or time), AND
  2. the recipient must take critical action.
  Examples: "Meeting today at 2PM", "Payment due tomorrow", "Server down - fix now".
IMPORTANT - information the recipient will need later:
  meeting invitations for future dates, booking confirmations and travel details,
  work assignments and course material, bills not due immediately, official notices.
UNIMPORTANT - informational, no action needed:
  newsletters, news updates, social media and non-critical system notifications,
  casual personal email.
SPAM - marketing or promotional content:
  sales, discounts, offers and unsolicited advertisements, even from known companies.`;

function renderAttachments(unit: NormalizedUnit): string {
  if (!unit.hasAttachment) return 'none';
  return unit.attachmentNames.length > 0 ? unit.attachmentNames.join(', ') : 'yes (unnamed)';
}

function renderLinks(unit: NormalizedUnit): string {
  return unit.links.length > 0 ? unit.links.join('\n') : 'none';
}

/**
 * Build the analysis prompt for one email.
 *
 * Pure: identical units always yield identical prompts.
 */
export function buildAnalysisPrompt(unit: NormalizedUnit): string {
  return `You are an email triage assistant. Classify the email below and extract what the recipient must act on.

## Email
From: ${unit.sender || '(unknown sender)'}
Date: ${unit.date || '(unknown date)'}
Subject: ${unit.subject || '(no subject)'}
Attachments: ${renderAttachments(unit)}
Links found:
${renderLinks(unit)}

Body:
${unit.body || '(empty body)'}

## Importance tiers
Pick EXACTLY ONE of: ${TIERS.join(', ')}.

${TIER_RULES}

## Instructions
- ${FIELD_LABELS.summary}: one or two sentences with only actionable content: what to do, specific dates, times, amounts and reference numbers. No greetings or filler.
- ${FIELD_LABELS.deadlines}: explicit dates or times by which something must happen, written as date/time strings (for example 2024-05-01 or 2024-05-01 14:00). Separate several with "; ". Write none if there is no deadline.
- ${FIELD_LABELS.links}: only important links (meeting, booking, payment or action URLs), separated by "; ". Write none if there are none.

## Response format
Reply with exactly these four lines and nothing else:
${FIELD_LABELS.tier}: <${TIERS.join('|')}>
${FIELD_LABELS.summary}: <summary>
${FIELD_LABELS.deadlines}: <deadline>; <deadline> | none
${FIELD_LABELS.links}: <url>; <url> | none`;
}
