// src/utils/emailExtractor.test.ts
import { describe, it, expect } from 'vitest';
import { getHeader, getSubject, toRawMessage } from './emailExtractor.js';
import type { RawMessage } from '../types/mail.js';

describe('emailExtractor', () => {
  const message: RawMessage = {
    id: 'msg-1',
    headers: [
      { name: 'From', value: 'Front Desk <desk@example.com>' },
      { name: 'subject', value: 'Registration Confirmation: Open Mat on Sat, Jan 11, 2025 9:00 AM' },
      { name: 'Subject', value: 'second subject' },
    ],
  };

  it('finds headers case-insensitively and returns the first match', () => {
    expect(getSubject(message)).toBe('Registration Confirmation: Open Mat on Sat, Jan 11, 2025 9:00 AM');
    expect(getHeader(message, 'FROM')).toBe('Front Desk <desk@example.com>');
  });

  it('returns undefined for a missing header', () => {
    expect(getHeader(message, 'Date')).toBeUndefined();
    expect(getSubject({ id: 'msg-2', headers: [] })).toBeUndefined();
  });

  it('reduces a Gmail message to id and complete headers', () => {
    const raw = toRawMessage({
      id: 'abc123',
      payload: {
        headers: [
          { name: 'Subject', value: 'Hello' },
          { name: 'X-Empty', value: null },
          { name: null, value: 'orphan' },
        ],
      },
    });

    expect(raw).toEqual({ id: 'abc123', headers: [{ name: 'Subject', value: 'Hello' }] });
  });

  it('handles a message without payload', () => {
    expect(toRawMessage({ id: 'abc123' })).toEqual({ id: 'abc123', headers: [] });
  });
});
