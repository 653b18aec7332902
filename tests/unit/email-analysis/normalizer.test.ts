/**
 * Unit tests for message normalization.
 */

import { describe, it, expect } from 'vitest';
import { cleanBody, extractUrls, normalizeMessage } from '../../../src/domains/email-analysis/service/normalizer.js';

describe('normalizeMessage', () => {
  it('fills every absent field with an empty value', () => {
    const unit = normalizeMessage({ id: 'm1' });

    expect(unit).toEqual({
      id: 'm1',
      sender: '',
      subject: '',
      date: '',
      body: '',
      hasAttachment: false,
      hasLink: false,
      attachmentNames: [],
      links: [],
    });
  });

  it('treats null fields like missing ones', () => {
    const unit = normalizeMessage({
      id: 'm2',
      sender: null,
      subject: null,
      date: null,
      body: null,
      attachments: null,
      links: null,
    });

    expect(unit.sender).toBe('');
    expect(unit.body).toBe('');
    expect(unit.links).toEqual([]);
  });

  it('collapses header whitespace onto one line', () => {
    const unit = normalizeMessage({ id: 'm3', sender: 'Alice\n  <alice@example.com>', subject: '  Quarterly\treport ' });

    expect(unit.sender).toBe('Alice <alice@example.com>');
    expect(unit.subject).toBe('Quarterly report');
  });

  it('truncates the body to the character budget with a marker', () => {
    const unit = normalizeMessage({ id: 'm4', body: 'a'.repeat(50) }, { bodyCharBudget: 10 });

    expect(unit.body).toBe('aaaaaaaaaa...');
  });

  it('leaves a body within budget untouched', () => {
    const unit = normalizeMessage({ id: 'm5', body: 'Short body.' }, { bodyCharBudget: 10_000 });

    expect(unit.body).toBe('Short body.');
  });

  it('merges link descriptors with URLs found in the body, without duplicates', () => {
    const unit = normalizeMessage({
      id: 'm6',
      body: 'See https://b.example/y. Also https://a.example/x',
      links: ['https://a.example/x'],
    });

    expect(unit.links).toEqual(['https://a.example/x', 'https://b.example/y']);
    expect(unit.hasLink).toBe(true);
  });

  it('reports attachments by name', () => {
    const unit = normalizeMessage({
      id: 'm7',
      attachments: [{ filename: 'invoice.pdf', mimeType: 'application/pdf', sizeBytes: 10 }],
    });

    expect(unit.hasAttachment).toBe(true);
    expect(unit.attachmentNames).toEqual(['invoice.pdf']);
  });

  it('counts an unnamed attachment', () => {
    const unit = normalizeMessage({
      id: 'm8',
      attachments: [{ filename: '  ', mimeType: 'image/png', sizeBytes: 10 }],
    });

    expect(unit.hasAttachment).toBe(true);
    expect(unit.attachmentNames).toEqual([]);
  });
});

describe('cleanBody', () => {
  it('strips style blocks, tags and entities from HTML', () => {
    const html = '<html><head><style>p{color:red}</style></head><body><p>Hello&nbsp;there</p><p>Pay &amp; go</p></body></html>';

    expect(cleanBody(html)).toBe('Hello there\nPay & go');
  });

  it('replaces inline images with their alt text', () => {
    const html = 'Logo <img src="data:image/png;base64,AAAA" alt="Company logo"> end';

    expect(cleanBody(html)).toBe('Logo Company logo end');
  });

  it('drops an unsubscribe footer at the end of the text', () => {
    const body = 'Line one about the meeting schedule.\nUnsubscribe here';

    expect(cleanBody(body)).toBe('Line one about the meeting schedule.');
  });

  it('keeps text that merely starts with unsubscribe', () => {
    expect(cleanBody('Unsubscribe requests are handled by IT.')).toBe('Unsubscribe requests are handled by IT.');
  });

  it('collapses blank lines', () => {
    expect(cleanBody('one\r\n\r\n\r\n\r\ntwo')).toBe('one\n\ntwo');
  });
});

describe('extractUrls', () => {
  it('strips trailing sentence punctuation', () => {
    expect(extractUrls('Visit https://example.com/page, or http://example.org!')).toEqual([
      'https://example.com/page',
      'http://example.org',
    ]);
  });

  it('returns nothing for text without URLs', () => {
    expect(extractUrls('no links here')).toEqual([]);
  });
});
