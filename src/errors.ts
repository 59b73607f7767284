/** Exit code for missing prerequisites (gh CLI, auth) */
export const EXIT_PREREQ = 1;

/** Exit code for invalid or malformed PR URL */
export const EXIT_INVALID_URL = 2;

/** Exit code for GitHub API failures */
export const EXIT_API_ERROR = 3;

/** Exit code for invalid server or repository configuration */
export const EXIT_CONFIG_ERROR = 4;

/** Exit code for a server that failed to start or crashed */
export const EXIT_SERVER_ERROR = 5;

/**
 * Scrub secrets and credentials from a string.
 * Replaces known token/key patterns with [REDACTED].
 */
export function scrubSecrets(text: string): string {
  return text
    // PEM blocks (GitHub App private keys)
    .replace(/-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g, '[REDACTED]')
    // GitHub classic tokens (ghp_, gho_, ghs_, ghr_, ghu_)
    .replace(/\b(ghp_|gho_|ghs_|ghr_|ghu_)[a-zA-Z0-9_]+/g, '[REDACTED]')
    // GitHub fine-grained PATs
    .replace(/\bgithub_pat_[a-zA-Z0-9_]+/g, '[REDACTED]')
    // Webhook signatures
    .replace(/\bsha256=[a-f0-9]+/gi, 'sha256=[REDACTED]')
    // Bearer/token auth headers
    .replace(/(Bearer|token)\s+[a-zA-Z0-9._\-]+/gi, '$1 [REDACTED]')
    // URL-embedded credentials
    .replace(/https?:\/\/[^@\s]+@/g, 'https://[REDACTED]@');
}

/**
 * Extract a safe error message from an unknown error value.
 * Converts to string, then scrubs any embedded secrets.
 */
export function sanitizeError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return scrubSecrets(message);
}

/** Server or repository configuration that could not be loaded or failed validation */
export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Failure of one step while processing a webhook event. The message is the
 * step that failed ("error creating check run"); the original error is the cause.
 */
export class ProcessEventError extends Error {
  constructor(context: string, cause: unknown) {
    super(context, { cause });
    this.name = 'ProcessEventError';
  }
}

/**
 * Run a step and wrap its failure with context.
 */
export async function withContext<T>(context: string, step: () => Promise<T>): Promise<T> {
  try {
    return await step();
  } catch (error: unknown) {
    throw new ProcessEventError(context, error);
  }
}

export type EventErrorKind = 'missing_header' | 'invalid_payload' | 'unsupported_event';

const EVENT_ERROR_MESSAGES: Record<EventErrorKind, string> = {
  missing_header: 'event header missing',
  invalid_payload: 'invalid payload',
  unsupported_event: 'unsupported event',
};

/** A webhook delivery that could not be turned into an event */
export class EventError extends Error {
  readonly kind: EventErrorKind;

  constructor(kind: EventErrorKind) {
    super(EVENT_ERROR_MESSAGES[kind]);
    this.name = 'EventError';
    this.kind = kind;
  }
}

/**
 * Render an error and its chain of causes on one line: "outer: inner: root".
 */
export function describeError(error: unknown): string {
  const parts: string[] = [];
  let current: unknown = error;
  while (current !== undefined && parts.length < 10) {
    parts.push(sanitizeError(current));
    current = current instanceof Error ? current.cause : undefined;
  }
  return parts.join(': ');
}
