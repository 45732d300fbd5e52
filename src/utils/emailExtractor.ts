// src/utils/emailExtractor.ts
import type { gmail_v1 } from 'googleapis';
import type { MessageHeader, RawMessage } from '../types/mail.js';

/**
 * Find a header value by name (header names are case-insensitive)
 *
 * @returns First matching value, or undefined when the header is absent
 */
export function getHeader(message: RawMessage, name: string): string | undefined {
  const wanted = name.toLowerCase();
  return message.headers.find((h) => h.name.toLowerCase() === wanted)?.value;
}

export function getSubject(message: RawMessage): string | undefined {
  return getHeader(message, 'Subject');
}

/**
 * Reduce a Gmail API message to its id and headers
 *
 * @param message - Gmail message data (any format that includes payload headers)
 */
export function toRawMessage(message: gmail_v1.Schema$Message): RawMessage {
  const headers: MessageHeader[] = [];

  for (const header of message.payload?.headers ?? []) {
    if (typeof header.name === 'string' && typeof header.value === 'string') {
      headers.push({ name: header.name, value: header.value });
    }
  }

  return { id: message.id ?? '', headers };
}
