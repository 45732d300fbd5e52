// src/cli.ts
import { Command, InvalidArgumentError } from 'commander';
import { z } from 'zod';
import { loadConfig, type EnvConfig } from './config/env.js';
import { ConfigurationError, describeError } from './lib/errors.js';
import { GoogleAuthSession } from './lib/googleAuth.js';
import { createLogger, type Logger } from './lib/logger.js';
import { GmailInbox } from './utils/inboxFetcher.js';
import { GoogleCalendarClient } from './utils/calendarIntegration.js';
import { EventScheduler, completionMessage, emptyReport } from './utils/eventScheduler.js';
import type { RunOptions, SchedulerReport } from './types/scheduler.js';

export const DEFAULT_QUERY = 'subject:"Registration Confirmation: Beginners (White/Orng/Yellow)"';
export const DEFAULT_MAX_MESSAGES = 6;

export interface CliOptions {
  email1?: string;
  email2?: string;
  query: string;
  maxMessages: number;
}

function parseMaxMessages(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return parsed;
}

/**
 * Define the command line; `action` receives the parsed options
 */
export function buildProgram(action: (options: CliOptions) => Promise<void>): Command {
  const program = new Command();

  program
    .name('registration-calendar-sync')
    .description('Create Google Calendar events from registration confirmation emails in Gmail')
    .option('--email1 <address>', 'First email address to invite to the event (default: ATTENDEE_EMAIL_1)')
    .option('--email2 <address>', 'Second email address to invite to the event (default: ATTENDEE_EMAIL_2)')
    .option(
      '--query <query>',
      'Gmail search query matching the subject line of the confirmation emails',
      DEFAULT_QUERY
    )
    .option(
      '--max-messages <count>',
      'Maximum number of email messages to process',
      parseMaxMessages,
      DEFAULT_MAX_MESSAGES
    )
    .action(async (options: CliOptions) => {
      await action(options);
    });

  return program;
}

/**
 * Merge CLI flags with env defaults and validate the attendees
 *
 * @throws ConfigurationError when an attendee is missing or not an email
 */
export function resolveRunOptions(options: CliOptions, config: EnvConfig): RunOptions {
  const email = z.string().email();
  const attendees = [options.email1 ?? config.ATTENDEE_EMAIL_1, options.email2 ?? config.ATTENDEE_EMAIL_2];

  const problems: string[] = [];
  const valid: string[] = [];
  attendees.forEach((address, index) => {
    const flag = `--email${index + 1}`;
    if (!address) {
      problems.push(`${flag} is required (or set ATTENDEE_EMAIL_${index + 1})`);
    } else if (!email.safeParse(address).success) {
      problems.push(`${flag} is not a valid email address: ${address}`);
    } else {
      valid.push(address);
    }
  });

  if (problems.length > 0) {
    throw new ConfigurationError('Invalid attendees', problems);
  }

  return {
    query: options.query,
    maxMessages: options.maxMessages,
    timeZone: config.EVENT_TIMEZONE,
    durationMinutes: config.EVENT_DURATION_MINUTES,
    attendees: valid,
  };
}

/**
 * Authenticate, then run one sync pass
 */
export async function runSync(
  options: CliOptions,
  config: EnvConfig,
  logger: Logger
): Promise<SchedulerReport> {
  const runOptions = resolveRunOptions(options, config);

  const session = new GoogleAuthSession({
    credentialsPath: config.GOOGLE_CREDENTIALS_PATH,
    tokenPath: config.GOOGLE_TOKEN_PATH,
    logger,
  });
  const auth = await session.authorize();

  const scheduler = new EventScheduler({
    mail: new GmailInbox(auth),
    calendar: new GoogleCalendarClient(auth, config.CALENDAR_ID),
    logger,
  });

  return scheduler.run(runOptions);
}

/**
 * Run one sync pass for parsed options
 *
 * @returns Process exit code
 */
export async function runCommand(options: CliOptions, config: EnvConfig, logger: Logger): Promise<number> {
  try {
    const report = await runSync(options, config, logger);
    return report.aborted ? 1 : 0;
  } catch (error) {
    logger.error(`An unexpected error occurred: ${describeError(error)}`);
    logger.info({ considered: 0, skipped: 0 }, completionMessage(emptyReport()));
    return 1;
  }
}

/**
 * CLI entry point
 *
 * @returns Process exit code
 */
export async function main(argv: string[] = process.argv): Promise<number> {
  let config: EnvConfig;
  try {
    config = loadConfig();
  } catch (error) {
    createLogger().fatal(describeError(error));
    return 1;
  }

  const logger = createLogger(config.LOG_LEVEL, config.NODE_ENV);
  let exitCode = 0;

  const program = buildProgram(async (options) => {
    exitCode = await runCommand(options, config, logger);
  });

  await program.parseAsync(argv);
  return exitCode;
}
