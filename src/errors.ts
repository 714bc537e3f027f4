/** Exit code for invalid options or a missing GitHub token */
export const EXIT_CONFIG = 1;

/** Exit code for an unexpected failure while syncing */
export const EXIT_SYNC_ERROR = 3;

/** Invalid or conflicting configuration. Shown to the user as-is. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** A request was issued outside `RateLimitedClient.session()` */
export class SessionError extends Error {
  constructor(message = 'No active client session. Wrap requests in client.session().') {
    super(message);
    this.name = 'SessionError';
  }
}

/** The cache file could not be written */
export class CacheWriteError extends Error {
  constructor(
    readonly filePath: string,
    cause: unknown,
  ) {
    super(`Could not write cache file ${filePath}: ${sanitizeError(cause)}`, { cause });
    this.name = 'CacheWriteError';
  }
}

/**
 * Redact GitHub tokens and credentials from text bound for the terminal.
 * Authorization header values are always redacted; a bare `Bearer`/`token`
 * value only at 20+ characters.
 */
export function scrubSecrets(text: string): string {
  return text
    // ghp_, gho_, ghs_, ghr_, ghu_
    .replace(/\b(ghp_|gho_|ghs_|ghr_|ghu_)[a-zA-Z0-9_]+/g, '[REDACTED]')
    .replace(/\bgithub_pat_[a-zA-Z0-9_]+/g, '[REDACTED]')
    .replace(/(Authorization:\s*(?:Bearer|token))\s+[^\s[]\S*/gi, '$1 [REDACTED]')
    .replace(/\b(Bearer|token)\s+[a-zA-Z0-9._-]{20,}/gi, '$1 [REDACTED]')
    .replace(/https?:\/\/[^@\s]+@/g, 'https://[REDACTED]@');
}

/** Message of any thrown value, scrubbed */
export function sanitizeError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return scrubSecrets(message);
}
