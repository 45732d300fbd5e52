// src/lib/errors.ts

/**
 * Raised when environment or CLI settings are invalid
 */
export class ConfigurationError extends Error {
  readonly problems: string[];

  constructor(message: string, problems: string[] = []) {
    super(problems.length > 0 ? `${message}:\n  - ${problems.join('\n  - ')}` : message);
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

/**
 * Raised when the Google OAuth session cannot be established
 */
export class AuthenticationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuthenticationError';
  }
}

/**
 * Turn any thrown value into a log-friendly message
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

/**
 * Read the HTTP status from a googleapis (gaxios) error, if it carries one
 */
export function httpStatusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;

  if ('response' in error) {
    const response = error.response;
    if (
      typeof response === 'object' &&
      response !== null &&
      'status' in response &&
      typeof response.status === 'number'
    ) {
      return response.status;
    }
  }

  // Older gaxios releases put the status on `code`
  if ('code' in error && typeof error.code === 'number') {
    return error.code;
  }

  return undefined;
}
