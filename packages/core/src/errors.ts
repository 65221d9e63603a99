/**
 * Error types shared by every package, plus helpers that turn any thrown
 * value into something loggable and something a user can read.
 */

/** Missing or invalid configuration. Raised before any entity is processed. */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly missing: readonly string[] = [],
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Bad user input (unknown CSV column, empty entity list, malformed template). */
export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputError';
  }
}

export interface ErrorDetail {
  timestamp: Date;
  errorType: string;
  message: string;
  stack?: string;
  context: Record<string, unknown>;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function describeError(err: unknown, context: Record<string, unknown> = {}): ErrorDetail {
  return {
    timestamp: new Date(),
    errorType: err instanceof Error ? err.name : typeof err,
    message: errorMessage(err),
    stack: err instanceof Error ? err.stack : undefined,
    context,
  };
}

const INPUT_ERROR_TYPES = new Set(['ConfigError', 'InputError', 'ZodError']);
const CONNECTION_PATTERN = /ECONNREFUSED|ECONNRESET|ENOTFOUND|ETIMEDOUT|fetch failed|network|aborted/i;
const AUTH_PATTERN = /\b(401|403)\b|unauthori[sz]ed|forbidden|invalid api key/i;

/**
 * Map an ErrorDetail to a message suitable for a terminal or a results table.
 */
export function formatUserMessage(detail: ErrorDetail): string {
  if (INPUT_ERROR_TYPES.has(detail.errorType)) {
    return `Invalid input: ${detail.message}`;
  }
  if (AUTH_PATTERN.test(detail.message)) {
    return 'Authentication failed. Please check your credentials.';
  }
  if (CONNECTION_PATTERN.test(detail.message)) {
    return 'Connection failed. Please check your internet connection and try again.';
  }
  return 'An unexpected error occurred. Please try again later.';
}
