/**
 * sessionStore.ts — Owner of the cookie + crumb pair used by every request.
 *
 * 1. **Single owned session** — one Session object with explicit
 *    valid / expired / unknown transitions.  Workers never mutate it; they
 *    ask the store to `invalidate()` it.
 * 2. **Serialized acquisition** — while an acquisition is in flight, every
 *    caller of `getValidSession()` awaits the same promise.
 * 3. **Bounded acquisition** — a collaborator that hangs is cut off after
 *    `acquisitionTimeoutMs` and surfaces as AuthUnavailableError.
 * 4. **Cache persistence** — a valid pair is saved to disk and restored on the
 *    next run as `unknown` until it passes validation.
 */

import { readFile, writeFile } from 'fs/promises';
import { z } from 'zod';
import type { CredentialAcquirer } from './credentialAcquirer';
import { AuthUnavailableError, errorMessage } from '../core/errors';
import { Logger } from '../core/logger';
import type { Credentials, Session, SessionState } from '../core/types';

const logger = new Logger('SessionStore');

const cachedSessionSchema = z.object({
  cookie: z.string(),
  crumb: z.string(),
  userAgent: z.string().optional(),
  source: z.string().optional(),
  acquiredAt: z.number(),
});

export interface SessionStoreOptions {
  acquirer: CredentialAcquirer;
  acquisitionTimeoutMs?: number;
  /** Where a valid pair is persisted between runs.  Omit to disable. */
  cacheFile?: string;
  /** Maximum age of a cached pair before it is ignored. */
  ttlHours?: number;
  /** Live check for a restored pair (e.g. the crumb endpoint). */
  probe?: (session: Session) => Promise<boolean>;
  now?: () => number;
}

/**
 * Structural checks on an acquired pair.
 * @returns A description of the problem, or null when the pair looks usable.
 */
export function validateCredentials(credentials: Credentials): string | null {
  const cookie = credentials.cookie.trim();
  const crumb = credentials.crumb.trim();

  if (!cookie) return 'cookie is empty';
  if (!crumb) return 'crumb is empty';
  if (/\s|</.test(crumb)) return 'crumb contains whitespace or markup';
  if (crumb.length > 64) return `crumb is ${crumb.length} characters long`;
  if (!/^[^=;\s]+=[^;]*(;\s*[^=;\s]+=[^;]*)*;?$/.test(cookie)) {
    return 'cookie is not a name=value header string';
  }
  return null;
}

export class SessionStore {
  private readonly acquirer: CredentialAcquirer;
  private readonly acquisitionTimeoutMs: number;
  private readonly cacheFile?: string;
  private readonly ttlHours: number;
  private readonly probe?: (session: Session) => Promise<boolean>;
  private readonly now: () => number;

  private current: Session | null = null;
  private inFlight: Promise<Session> | null = null;
  private nextId = 1;
  private cacheChecked = false;
  private acquisitions = 0;

  constructor(options: SessionStoreOptions) {
    this.acquirer = options.acquirer;
    this.acquisitionTimeoutMs = options.acquisitionTimeoutMs ?? 60_000;
    this.cacheFile = options.cacheFile;
    this.ttlHours = options.ttlHours ?? 12;
    this.probe = options.probe;
    this.now = options.now ?? Date.now;
  }

  // ── Public API ─────────────────────────────────────────

  /** State of the held session; `unknown` when none is held. */
  state(): SessionState {
    return this.current?.state ?? 'unknown';
  }

  /** How many times the acquisition collaborator has been called. */
  acquisitionCount(): number {
    return this.acquisitions;
  }

  /**
   * Resolve with a session in state `valid`, acquiring one if needed.
   * @throws AuthUnavailableError when acquisition fails or times out.
   */
  async getValidSession(): Promise<Session> {
    if (this.current?.state === 'valid') {
      return this.current;
    }

    if (!this.inFlight) {
      this.inFlight = this.obtain().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  /**
   * Mark `session` expired.  A no-op when it is already expired or when a
   * newer session has replaced it.
   */
  invalidate(session: Session): void {
    if (!this.current || this.current.id !== session.id) return;
    if (this.current.state === 'expired') return;

    const expired: Session = { ...this.current, state: 'expired' };
    this.current = Object.freeze(expired);
    logger.warn(
      `Session #${session.id} (${session.source}) invalidated — ` +
        `next request will re-acquire`,
    );
  }

  // ── Internals ──────────────────────────────────────────

  private async obtain(): Promise<Session> {
    if (!this.cacheChecked) {
      this.cacheChecked = true;
      const restored = await this.restoreFromCache();
      if (restored) return restored;
    }

    this.acquisitions += 1;
    logger.info(`Acquiring credentials via "${this.acquirer.name}"…`);

    let credentials: Credentials;
    try {
      credentials = await withTimeout(
        this.acquirer.acquire(),
        this.acquisitionTimeoutMs,
        `acquisition timed out after ${this.acquisitionTimeoutMs} ms`,
      );
    } catch (err) {
      logger.error(`Credential acquisition failed: ${errorMessage(err)}`);
      throw new AuthUnavailableError(
        `Could not acquire credentials: ${errorMessage(err)}`,
        err,
      );
    }

    const problem = validateCredentials(credentials);
    if (problem) {
      logger.error(`Acquired credentials rejected: ${problem}`);
      throw new AuthUnavailableError(`Acquired credentials rejected: ${problem}`);
    }

    const session = this.install(
      credentials,
      credentials.source ?? this.acquirer.name,
      this.now(),
      'valid',
    );
    logger.info(`Session #${session.id} acquired from ${session.source}`);
    await this.persist(session);
    return session;
  }

  private install(
    credentials: Credentials,
    source: string,
    acquiredAt: number,
    state: SessionState,
  ): Session {
    const session: Session = Object.freeze({
      id: this.nextId++,
      cookie: credentials.cookie.trim(),
      crumb: credentials.crumb.trim(),
      userAgent: credentials.userAgent,
      source,
      acquiredAt,
      state,
    });
    this.current = session;
    return session;
  }

  private async restoreFromCache(): Promise<Session | null> {
    if (!this.cacheFile) return null;

    let raw: string;
    try {
      raw = await readFile(this.cacheFile, 'utf-8');
    } catch {
      return null; // No cache yet.
    }

    const parsed = cachedSessionSchema.safeParse(safeJson(raw));
    if (!parsed.success) {
      logger.warn(`Ignoring unreadable session cache ${this.cacheFile}`);
      return null;
    }

    const cached = parsed.data;
    const ageHours = (this.now() - cached.acquiredAt) / (1000 * 60 * 60);
    if (ageHours > this.ttlHours) {
      logger.info(
        `Cached session is ${ageHours.toFixed(1)}h old ` +
          `(TTL: ${this.ttlHours}h) — discarding`,
      );
      return null;
    }
    if (validateCredentials(cached)) {
      logger.warn('Cached session failed validation — discarding');
      return null;
    }

    const restored = this.install(cached, 'cache', cached.acquiredAt, 'unknown');

    if (this.probe) {
      let live = false;
      try {
        live = await this.probe(restored);
      } catch (err) {
        logger.warn(`Cached session probe failed: ${errorMessage(err)}`);
      }
      if (!live) {
        logger.info('Cached session rejected by probe — acquiring a fresh one');
        this.current = null;
        return null;
      }
    }

    const promoted: Session = Object.freeze({ ...restored, state: 'valid' as const });
    this.current = promoted;
    logger.info(
      `Restored cached session #${promoted.id} (${ageHours.toFixed(1)}h old)`,
    );
    return promoted;
  }

  private async persist(session: Session): Promise<void> {
    if (!this.cacheFile) return;
    const data = {
      cookie: session.cookie,
      crumb: session.crumb,
      userAgent: session.userAgent,
      source: session.source,
      acquiredAt: session.acquiredAt,
    };
    try {
      await writeFile(this.cacheFile, JSON.stringify(data, null, 2));
    } catch (err) {
      logger.warn(`Failed to save session cache: ${errorMessage(err)}`);
    }
  }
}

// ─── Helpers ────────────────────────────────────────────────

function safeJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

function withTimeout<T>(promise: Promise<T>, ms: number, message: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new Error(message)), ms);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}
