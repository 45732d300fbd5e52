// src/utils/inboxFetcher.ts
import { google, type gmail_v1 } from 'googleapis';
import type { OAuth2Client } from 'google-auth-library';
import type { MailService, RawMessage } from '../types/mail.js';
import { describeError, httpStatusOf } from '../lib/errors.js';
import { toRawMessage } from './emailExtractor.js';

// Gmail caps maxResults per page at 500
const GMAIL_PAGE_LIMIT = 500;

/**
 * Gmail backed MailService for the authenticated user ('me')
 */
export class GmailInbox implements MailService {
  private readonly gmail: gmail_v1.Gmail;

  constructor(auth: OAuth2Client) {
    this.gmail = google.gmail({ version: 'v1', auth });
  }

  /**
   * List message IDs matching a Gmail search query
   *
   * @param query - Gmail search query (e.g., 'subject:"Registration Confirmation"')
   * @param limit - Maximum number of IDs; 0 makes no API call
   * @returns Message IDs, newest first as Gmail orders them
   */
  async listMessageIds(query: string, limit: number): Promise<string[]> {
    if (limit <= 0) {
      return [];
    }

    const ids: string[] = [];
    let pageToken: string | undefined;

    try {
      do {
        const response = await this.gmail.users.messages.list({
          userId: 'me',
          q: query,
          maxResults: Math.min(limit - ids.length, GMAIL_PAGE_LIMIT),
          pageToken,
        });

        for (const message of response.data.messages ?? []) {
          if (message.id) ids.push(message.id);
        }

        pageToken = response.data.nextPageToken ?? undefined;
      } while (pageToken && ids.length < limit);
    } catch (error) {
      const status = httpStatusOf(error);

      if (status === 429) {
        throw new Error('Gmail API rate limit exceeded. Please try again later.');
      }

      if (status === 403) {
        throw new Error('Insufficient Gmail permissions. Please re-authenticate.');
      }

      throw new Error(`Failed to fetch emails: ${describeError(error)}`);
    }

    return ids.slice(0, limit);
  }

  /**
   * Fetch one message's headers
   */
  async getMessage(id: string): Promise<RawMessage> {
    const response = await this.gmail.users.messages.get({
      userId: 'me',
      id,
      format: 'metadata',
      metadataHeaders: ['Subject', 'From', 'Date'],
    });

    const message = toRawMessage(response.data);
    return { ...message, id: message.id || id };
  }
}
