/**
 * errors.ts — Exceptions that cross module boundaries.
 *
 * Classified request failures are NOT exceptions: the retry controller
 * returns them as values (see `RequestOutcome` in types.ts).  Only the
 * conditions below are thrown.
 */

/**
 * The credential collaborator could not produce a usable token pair.
 * Terminal for a harvest run.
 */
export class AuthUnavailableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'AuthUnavailableError';
  }
}

/** Raised by a credential acquirer when it cannot observe a cookie + crumb. */
export class AcquisitionFailedError extends Error {
  /** Which acquirer failed (e.g. "light", "browser"). */
  readonly source: string;

  constructor(source: string, message: string) {
    super(`[${source}] ${message}`);
    this.name = 'AcquisitionFailedError';
    this.source = source;
  }
}

/** Invalid or inconsistent configuration, detected at startup. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
