import { z } from 'zod';
import { config } from 'dotenv';
import { existsSync } from 'fs';
import { join } from 'path';
import { ConfigurationError } from '../lib/errors.js';

/**
 * Load environment variables from the appropriate .env file based on NODE_ENV.
 * Priority: .env.{NODE_ENV}.local > .env.{NODE_ENV} > .env.local > .env
 *
 * Since dotenv doesn't override by default, we load highest priority first.
 * The first value set for each variable wins.
 */
export function loadEnvFiles(cwd: string = process.cwd()): void {
  const nodeEnv = process.env.NODE_ENV || 'development';

  const envFiles = [
    `.env.${nodeEnv}.local`,
    `.env.${nodeEnv}`,
    '.env.local',
    '.env',
  ];

  for (const file of envFiles) {
    const filePath = join(cwd, file);
    if (existsSync(filePath)) {
      config({ path: filePath });
    }
  }
}

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

const optionalEmail = z
  .string()
  .trim()
  .transform((value) => (value === '' ? undefined : value))
  .pipe(z.string().email().optional())
  .optional();

/**
 * Environment variable schema using Zod.
 * Validates all settings up front so a bad value fails before any Google call.
 */
export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  // Google OAuth client + cached user token
  GOOGLE_CREDENTIALS_PATH: z.string().min(1).default('credentials.json'),
  GOOGLE_TOKEN_PATH: z.string().min(1).default('token.json'),

  // Calendar target
  CALENDAR_ID: z.string().min(1).default('primary'),
  EVENT_TIMEZONE: z
    .string()
    .default('America/Chicago')
    .refine(isValidTimeZone, 'EVENT_TIMEZONE must be an IANA time zone'),
  EVENT_DURATION_MINUTES: z
    .string()
    .default('60')
    .transform(Number)
    .pipe(z.number().int().positive()),

  // Default attendees (overridden by --email1 / --email2)
  ATTENDEE_EMAIL_1: optionalEmail,
  ATTENDEE_EMAIL_2: optionalEmail,
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Validate an environment map.
 *
 * @param env - Variables to validate (defaults to process.env)
 * @throws ConfigurationError listing every invalid variable
 */
export function parseEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid environment configuration`, problems);
  }
  return result.data;
}

/**
 * Load env files from the working directory, then validate process.env
 */
export function loadConfig(): EnvConfig {
  loadEnvFiles();
  return parseEnv(process.env);
}
