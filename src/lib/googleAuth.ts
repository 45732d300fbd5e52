// src/lib/googleAuth.ts
import { readFile, rm, writeFile } from 'fs/promises';
import { createInterface } from 'readline/promises';
import { google } from 'googleapis';
import type { Credentials, OAuth2Client } from 'google-auth-library';
import { z } from 'zod';
import { AuthenticationError, describeError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';

/**
 * Gmail read access + calendar write access.
 * Changing these requires deleting the cached token file.
 */
export const GOOGLE_SCOPES = [
  'https://www.googleapis.com/auth/gmail.readonly',
  'https://www.googleapis.com/auth/calendar',
];

const ClientSecretSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  redirect_uris: z.array(z.string().min(1)).nonempty(),
});

// OAuth client JSON as downloaded from Google Cloud Console
const ClientSecretsFileSchema = z.union([
  z.object({ installed: ClientSecretSchema }),
  z.object({ web: ClientSecretSchema }),
]);

const StoredTokenSchema = z.object({
  access_token: z.string().nullish(),
  refresh_token: z.string().nullish(),
  expiry_date: z.number().nullish(),
  scope: z.string().optional(),
  token_type: z.string().nullish(),
  id_token: z.string().nullish(),
});

export type StoredToken = z.infer<typeof StoredTokenSchema>;
export type ClientSecrets = z.infer<typeof ClientSecretSchema>;

/**
 * Shows the consent URL and returns what the user pastes back
 */
export type ConsentPrompt = (authUrl: string) => Promise<string>;

export interface GoogleAuthSessionOptions {
  credentialsPath: string;
  tokenPath: string;
  prompt?: ConsentPrompt;
  logger?: Logger;
}

/**
 * Ask on the terminal for the authorization code
 */
export const terminalConsentPrompt: ConsentPrompt = async (authUrl) => {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    process.stdout.write(`\n1. Open this URL in your browser:\n\n   ${authUrl}\n\n`);
    process.stdout.write('2. Authorize the app, then copy the "code" from the redirect URL.\n\n');
    return await rl.question('Paste the authorization code (or the full redirect URL) here: ');
  } finally {
    rl.close();
  }
};

/**
 * Accept either a bare code or the redirect URL the browser landed on
 */
export function extractAuthorizationCode(input: string): string {
  const trimmed = input.trim();
  if (!/^https?:\/\//i.test(trimmed)) {
    if (!trimmed) throw new AuthenticationError('No authorization code entered');
    return trimmed;
  }

  const code = new URL(trimmed).searchParams.get('code');
  if (!code) {
    throw new AuthenticationError('Redirect URL does not contain a "code" parameter');
  }
  return code;
}

/**
 * Check if token is expired or will expire soon (5min buffer)
 */
export function isTokenExpired(expiryDate: number | null | undefined, now: number = Date.now()): boolean {
  if (!expiryDate) return true;

  const bufferMs = 5 * 60 * 1000;
  return expiryDate - bufferMs < now;
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

/**
 * OAuth 2.0 session for one Google account.
 * Owns the token cache file; callers get an authorized OAuth2Client.
 */
export class GoogleAuthSession {
  private readonly credentialsPath: string;
  private readonly tokenPath: string;
  private readonly prompt: ConsentPrompt;
  private readonly log: Logger;

  constructor(options: GoogleAuthSessionOptions) {
    this.credentialsPath = options.credentialsPath;
    this.tokenPath = options.tokenPath;
    this.prompt = options.prompt ?? terminalConsentPrompt;
    this.log = (options.logger ?? silentLogger).child({ component: 'auth' });
  }

  /**
   * Build an authorized client: cached token, refreshed token, or new consent
   *
   * @throws AuthenticationError when no usable credentials can be obtained
   */
  async authorize(): Promise<OAuth2Client> {
    const secrets = await this.readClientSecrets();
    const client = new google.auth.OAuth2(
      secrets.client_id,
      secrets.client_secret,
      secrets.redirect_uris[0]
    );

    let token = await this.readStoredToken();

    if (token) {
      client.setCredentials(token);

      if (!isTokenExpired(token.expiry_date)) {
        this.log.info('Existing credentials are valid.');
      } else if (token.refresh_token) {
        token = await this.refresh(client, token);
      } else {
        this.log.warn('Cached token is expired and has no refresh token.');
        await this.invalidate();
        token = null;
      }
    }

    if (!token) {
      await this.runConsentFlow(client);
    }

    // Persist access tokens the client refreshes on its own later in the run
    client.on('tokens', (tokens: Credentials) => {
      this.mergeAndSaveToken(tokens).catch((error: unknown) => {
        this.log.error(`Failed to save refreshed token: ${describeError(error)}`);
      });
    });

    return client;
  }

  /**
   * Delete the cached token file so the next authorize() asks for consent
   */
  async invalidate(): Promise<void> {
    await rm(this.tokenPath, { force: true });
    this.log.info(`Deleted the expired or invalid token file: ${this.tokenPath}`);
  }

  private async refresh(client: OAuth2Client, token: StoredToken): Promise<StoredToken | null> {
    try {
      const { credentials } = await client.refreshAccessToken();
      const refreshed: StoredToken = {
        ...token,
        ...credentials,
        // Google omits the refresh token on refresh responses
        refresh_token: credentials.refresh_token ?? token.refresh_token,
      };
      client.setCredentials(refreshed);
      await this.saveToken(refreshed);
      this.log.info('Access token refreshed.');
      return refreshed;
    } catch (error) {
      this.log.warn(`Error refreshing token: ${describeError(error)}`);
      await this.invalidate();
      return null;
    }
  }

  private async runConsentFlow(client: OAuth2Client): Promise<void> {
    this.log.info('No valid credentials found. Starting new authentication flow.');

    const authUrl = client.generateAuthUrl({
      access_type: 'offline',
      scope: GOOGLE_SCOPES,
      prompt: 'consent', // force refresh_token to be returned
    });

    const code = extractAuthorizationCode(await this.prompt(authUrl));

    try {
      const { tokens } = await client.getToken(code);
      client.setCredentials(tokens);
      await this.saveToken(tokens);
    } catch (error) {
      throw new AuthenticationError(
        `Failed to exchange authorization code: ${describeError(error)}`,
        { cause: error }
      );
    }

    this.log.info(`Authentication successful. Credentials saved to ${this.tokenPath}.`);
  }

  private async readClientSecrets(): Promise<ClientSecrets> {
    let raw: string;
    try {
      raw = await readFile(this.credentialsPath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        throw new AuthenticationError(
          `OAuth client file not found: ${this.credentialsPath}. ` +
            'Download an OAuth client ID (Desktop app) JSON from Google Cloud Console.'
        );
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new AuthenticationError(
        `OAuth client file ${this.credentialsPath} is not valid JSON. ` +
          'Download it again from Google Cloud Console.',
        { cause: error }
      );
    }

    const parsed = ClientSecretsFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new AuthenticationError(
        `OAuth client file ${this.credentialsPath} is not a Google client secrets file`
      );
    }

    return 'installed' in parsed.data ? parsed.data.installed : parsed.data.web;
  }

  private async readStoredToken(): Promise<StoredToken | null> {
    let raw: string;
    try {
      raw = await readFile(this.tokenPath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      this.log.warn(`Token file ${this.tokenPath} is not valid JSON; ignoring it.`);
      return null;
    }

    const parsed = StoredTokenSchema.safeParse(json);
    if (!parsed.success || (!parsed.data.access_token && !parsed.data.refresh_token)) {
      this.log.warn(`Token file ${this.tokenPath} has no usable token; ignoring it.`);
      return null;
    }

    return parsed.data;
  }

  private async saveToken(token: StoredToken): Promise<void> {
    await writeFile(this.tokenPath, JSON.stringify(token, null, 2), { mode: 0o600 });
  }

  private async mergeAndSaveToken(tokens: Credentials): Promise<void> {
    const current = (await this.readStoredToken()) ?? {};
    await this.saveToken({
      ...current,
      ...tokens,
      refresh_token: tokens.refresh_token ?? current.refresh_token,
    });
  }
}
