#!/usr/bin/env node
// src/scripts/syncConfirmations.ts
/**
 * Create calendar events from registration confirmation emails
 *
 * Usage:
 *   node dist/scripts/syncConfirmations.js --email1 <email> --email2 <email> \
 *     --query 'subject:"Registration Confirmation: Beginners (White/Orng/Yellow)"' --max-messages 6
 *
 * Environment Variables:
 *   GOOGLE_CREDENTIALS_PATH - OAuth client JSON (default: credentials.json)
 *   GOOGLE_TOKEN_PATH - Cached user token (default: token.json)
 *   EVENT_TIMEZONE - Zone events are created in (default: America/Chicago)
 */

import { main } from '../cli.js';

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exitCode = 1;
  });
