/**
 * Sanitizer Tests
 */

import { describe, it, expect } from 'vitest';
import { sanitize } from '../src/sanitizer.js';

describe('sanitize', () => {
  it('should redact emails and phone numbers', () => {
    expect(sanitize('call 555-123-4567 or email a@b.com')).toBe('call [PHONE] or email [EMAIL]');
  });

  it.each(['555-123-4567', '555.123.4567', '5551234567'])('should redact phone %s', (phone) => {
    expect(sanitize(phone)).toBe('[PHONE]');
  });

  it('should redact SSNs and card numbers', () => {
    expect(sanitize('SSN 123-45-6789, card 4111-1111-1111-1111')).toBe(
      'SSN [SSN], card [CREDIT_CARD]'
    );
    expect(sanitize('4111 1111 1111 1111')).toBe('[CREDIT_CARD]');
  });

  it('should redact every occurrence', () => {
    expect(sanitize('a@b.com, c@d.org')).toBe('[EMAIL], [EMAIL]');
  });

  it('should leave IP addresses in place', () => {
    expect(sanitize('host 10.0.0.1')).toBe('host 10.0.0.1');
  });

  it('should leave parenthesized phone numbers in place', () => {
    expect(sanitize('(555) 123-4567')).toBe('(555) 123-4567');
  });

  it('should be idempotent', () => {
    const once = sanitize('a@b.com 555-123-4567 123-45-6789 4111-1111-1111-1111');

    expect(once).toBe('[EMAIL] [PHONE] [SSN] [CREDIT_CARD]');
    expect(sanitize(once)).toBe(once);
  });

  it.each([
    '555-123-4567-1234-5678-9012-3456',
    'a@b.c|5551234567',
    '4111111111111111 and 123-45-6789',
    '(555) 123-4567 a@b.com',
    'call 555.123.4567, then 555-12-3456',
  ])('should be idempotent on %s', (text) => {
    const once = sanitize(text);

    expect(sanitize(once)).toBe(once);
  });

  it('should redact adjacent matches in order', () => {
    expect(sanitize('555-123-4567-1234-5678-9012-3456')).toBe('[PHONE]-[CREDIT_CARD]');
    expect(sanitize('a@b.c|5551234567')).toBe('[EMAIL][PHONE]');
  });

  it('should return clean text unchanged', () => {
    expect(sanitize('nothing sensitive')).toBe('nothing sensitive');
    expect(sanitize('')).toBe('');
  });
});
