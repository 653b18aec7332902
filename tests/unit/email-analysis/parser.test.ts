/**
 * Unit tests for model reply parsing.
 */

import { describe, it, expect } from 'vitest';
import { normalizeTier, parseVerdict } from '../../../src/domains/email-analysis/service/parser.js';
import { MalformedResponseError } from '../../../src/utils/errors.js';

describe('parseVerdict', () => {
  it('parses a well-formed reply', () => {
    const verdict = parseVerdict('TIER: IMPORTANT\nSUMMARY: Pay invoice\nDEADLINE: 2024-05-01\nLINKS: none');

    expect(verdict).toEqual({
      tier: 'IMPORTANT',
      summary: 'Pay invoice',
      deadlines: ['2024-05-01'],
      links: [],
    });
  });

  it('rejects an unrecognized tier', () => {
    expect(() => parseVerdict('TIER: URGENT\nSUMMARY: Do it now')).toThrow(MalformedResponseError);
    expect(() => parseVerdict('TIER: URGENT\nSUMMARY: Do it now')).toThrow('Unrecognized tier "URGENT"');
  });

  it('rejects a reply without labels', () => {
    expect(() => parseVerdict('I think this email is important.')).toThrow('Response has no labeled fields');
  });

  it('rejects a reply without a tier', () => {
    expect(() => parseVerdict('SUMMARY: hello')).toThrow('Response is missing the TIER field');
    expect(() => parseVerdict('TIER:\nSUMMARY: hello')).toThrow('Response is missing the TIER field');
  });

  it('keeps a snippet of the rejected reply', () => {
    try {
      parseVerdict('  TIER: MAYBE  ');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedResponseError);
      if (error instanceof MalformedResponseError) {
        expect(error.rawSnippet).toBe('TIER: MAYBE');
        expect(error.code).toBe('MALFORMED_RESPONSE');
      }
    }
  });

  it('accepts every tier regardless of case and spacing', () => {
    expect(parseVerdict('tier: very important').tier).toBe('VERY_IMPORTANT');
    expect(parseVerdict('Tier:   Important  ').tier).toBe('IMPORTANT');
    expect(parseVerdict('TIER: unimportant').tier).toBe('UNIMPORTANT');
    expect(parseVerdict('TIER:spam').tier).toBe('SPAM');
  });

  it('returns an empty summary and lists when only the tier is present', () => {
    expect(parseVerdict('TIER: SPAM')).toEqual({ tier: 'SPAM', summary: '', deadlines: [], links: [] });
  });

  it('ignores code fences and markdown around labels', () => {
    const verdict = parseVerdict(
      '```\n**TIER:** SPAM\n**SUMMARY:** 50% off everything\n- DEADLINES: none\nLINKS: https://shop.example/sale\n```'
    );

    expect(verdict).toEqual({
      tier: 'SPAM',
      summary: '50% off everything',
      deadlines: [],
      links: ['https://shop.example/sale'],
    });
  });

  it('splits list fields on separators and continuation bullets', () => {
    const verdict = parseVerdict([
      'TIER: IMPORTANT',
      'SUMMARY: Review the contract',
      'DEADLINES:',
      '- 2024-06-01 17:00',
      '- 2024-06-02',
      'LINKS:',
      '* Contract: https://docs.example/contract.',
      '* https://docs.example/sign',
    ].join('\n'));

    expect(verdict.deadlines).toEqual(['2024-06-01 17:00', '2024-06-02']);
    expect(verdict.links).toEqual(['https://docs.example/contract', 'https://docs.example/sign']);
  });

  it('keeps only http(s) URLs as links', () => {
    const verdict = parseVerdict(
      'TIER: SPAM\nSUMMARY: x\nLINKS: javascript:alert(document.cookie); Click here; Offer: https://shop.example/deal'
    );

    expect(verdict.links).toEqual(['https://shop.example/deal']);
  });

  it('returns no links when no item carries a URL', () => {
    expect(parseVerdict('TIER: SPAM\nLINKS: data:text/html,hello | Unsubscribe').links).toEqual([]);
  });

  it.each([
    'None mentioned',
    'Not mentioned.',
    'none specified',
    'Nothing found',
    'No specific deadline',
    'No deadlines mentioned',
    'Unknown',
  ])('treats "%s" as no deadline', (value) => {
    expect(parseVerdict(`TIER: IMPORTANT\nDEADLINES: ${value}`).deadlines).toEqual([]);
  });

  it('keeps real deadlines next to a none-like item', () => {
    expect(parseVerdict('TIER: IMPORTANT\nDEADLINES: Friday 5pm; not specified').deadlines).toEqual(['Friday 5pm']);
  });

  it('splits inline lists on semicolons and pipes', () => {
    const verdict = parseVerdict('TIER: IMPORTANT\nDEADLINES: 2024-05-01; 2024-05-03 | 2024-05-04; 2024-05-01');

    expect(verdict.deadlines).toEqual(['2024-05-01', '2024-05-03', '2024-05-04']);
  });

  it('joins a summary spread over several lines', () => {
    const verdict = parseVerdict('SUMMARY: Pay the invoice\nbefore Friday.\nTIER: IMPORTANT');

    expect(verdict.summary).toBe('Pay the invoice before Friday.');
  });

  it('keeps the first occurrence of a repeated label', () => {
    expect(parseVerdict('TIER: SPAM\nTIER: IMPORTANT').tier).toBe('SPAM');
  });

  it('returns a frozen verdict', () => {
    const verdict = parseVerdict('TIER: IMPORTANT\nDEADLINES: 2024-05-01');

    expect(Object.isFrozen(verdict)).toBe(true);
    expect(Object.isFrozen(verdict.deadlines)).toBe(true);
  });
});

describe('normalizeTier', () => {
  it('strips quotes, brackets and trailing punctuation', () => {
    expect(normalizeTier('"important".')).toBe('IMPORTANT');
    expect(normalizeTier('[SPAM]')).toBe('SPAM');
    expect(normalizeTier('Very-Important')).toBe('VERY_IMPORTANT');
  });

  it('never defaults an unknown value', () => {
    expect(normalizeTier('HIGH')).toBeNull();
    expect(normalizeTier('')).toBeNull();
  });
});
