import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SessionStore, validateCredentials } from '../sessionStore';
import { AuthUnavailableError } from '../../core/errors';
import type { Credentials } from '../../core/types';
import { countingAcquirer } from '../../__tests__/helpers';

describe('validateCredentials', () => {
  it('accepts a cookie header and a plain crumb', () => {
    expect(validateCredentials({ cookie: 'A1=abc; A3=d=xyz&S=1', crumb: 'Xy.z1/abc' })).toBeNull();
  });

  it('rejects empty values', () => {
    expect(validateCredentials({ cookie: '  ', crumb: 'abc' })).toBe('cookie is empty');
    expect(validateCredentials({ cookie: 'A1=abc', crumb: '' })).toBe('crumb is empty');
  });

  it('rejects a crumb that is really an HTML page', () => {
    expect(validateCredentials({ cookie: 'A1=abc', crumb: '<html>' })).toBe(
      'crumb contains whitespace or markup',
    );
  });

  it('rejects an overlong crumb', () => {
    expect(validateCredentials({ cookie: 'A1=abc', crumb: 'x'.repeat(65) })).toBe(
      'crumb is 65 characters long',
    );
  });

  it('rejects a cookie that is not name=value pairs', () => {
    expect(validateCredentials({ cookie: 'just-a-token', crumb: 'abc' })).toBe(
      'cookie is not a name=value header string',
    );
  });
});

describe('SessionStore', () => {
  it('starts in state unknown', () => {
    const store = new SessionStore({ acquirer: countingAcquirer() });
    expect(store.state()).toBe('unknown');
  });

  it('serializes concurrent callers onto a single acquisition', async () => {
    let release: (c: Credentials) => void = () => undefined;
    const acquire = vi.fn(
      () =>
        new Promise<Credentials>((resolve) => {
          release = resolve;
        }),
    );
    const store = new SessionStore({ acquirer: { name: 'slow', acquire } });

    const pending = [store.getValidSession(), store.getValidSession(), store.getValidSession()];
    await vi.waitFor(() => expect(acquire).toHaveBeenCalled());
    release({ cookie: 'A1=abc', crumb: 'crumb' });
    const sessions = await Promise.all(pending);

    expect(acquire).toHaveBeenCalledTimes(1);
    expect(store.acquisitionCount()).toBe(1);
    expect(new Set(sessions.map((s) => s.id))).toEqual(new Set([1]));
    expect(sessions[0].state).toBe('valid');
    expect(sessions[0].source).toBe('slow');
  });

  it('reuses a valid session without acquiring again', async () => {
    const acquirer = countingAcquirer();
    const store = new SessionStore({ acquirer });

    const first = await store.getValidSession();
    const second = await store.getValidSession();

    expect(second).toBe(first);
    expect(acquirer.calls).toBe(1);
  });

  it('hands out frozen sessions', async () => {
    const store = new SessionStore({ acquirer: countingAcquirer() });
    const session = await store.getValidSession();
    expect(Object.isFrozen(session)).toBe(true);
  });

  it('turns an acquisition timeout into AuthUnavailableError', async () => {
    const store = new SessionStore({
      acquirer: { name: 'hung', acquire: () => new Promise<Credentials>(() => undefined) },
      acquisitionTimeoutMs: 20,
    });

    await expect(store.getValidSession()).rejects.toBeInstanceOf(AuthUnavailableError);
    await expect(store.getValidSession()).rejects.toThrow(/timed out after 20 ms/);
  });

  it('turns an acquirer failure into AuthUnavailableError', async () => {
    const store = new SessionStore({ acquirer: countingAcquirer(() => true) });
    await expect(store.getValidSession()).rejects.toThrow(
      'Could not acquire credentials: acquisition 1 refused',
    );
  });

  it('rejects a structurally invalid pair', async () => {
    const store = new SessionStore({
      acquirer: { name: 'bad', acquire: async () => ({ cookie: 'A1=abc', crumb: 'two words' }) },
    });
    await expect(store.getValidSession()).rejects.toThrow(
      'Acquired credentials rejected: crumb contains whitespace or markup',
    );
  });

  describe('invalidate', () => {
    it('expires the current session and re-acquires on the next request', async () => {
      const acquirer = countingAcquirer();
      const store = new SessionStore({ acquirer });

      const first = await store.getValidSession();
      store.invalidate(first);
      expect(store.state()).toBe('expired');
      expect(first.state).toBe('valid');

      const second = await store.getValidSession();
      expect(second.id).toBe(2);
      expect(second.crumb).toBe('crumb-2');
      expect(acquirer.calls).toBe(2);
    });

    it('is idempotent', async () => {
      const acquirer = countingAcquirer();
      const store = new SessionStore({ acquirer });

      const session = await store.getValidSession();
      store.invalidate(session);
      store.invalidate(session);

      expect(store.state()).toBe('expired');
      await store.getValidSession();
      expect(acquirer.calls).toBe(2);
    });

    it('ignores a stale session that was already replaced', async () => {
      const store = new SessionStore({ acquirer: countingAcquirer() });

      const first = await store.getValidSession();
      store.invalidate(first);
      const second = await store.getValidSession();
      store.invalidate(first);

      expect(store.state()).toBe('valid');
      expect(await store.getValidSession()).toBe(second);
    });
  });

  describe('cache file', () => {
    let dir: string;
    let cacheFile: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'session-store-'));
      cacheFile = join(dir, 'session.json');
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('persists an acquired session', async () => {
      const store = new SessionStore({
        acquirer: countingAcquirer(),
        cacheFile,
        now: () => 1_000,
      });
      await store.getValidSession();

      const saved: unknown = JSON.parse(await readFile(cacheFile, 'utf-8'));
      expect(saved).toEqual({
        cookie: 'A1=cookie-1',
        crumb: 'crumb-1',
        source: 'test',
        acquiredAt: 1_000,
      });
    });

    it('restores a fresh cached session without acquiring', async () => {
      await writeFile(
        cacheFile,
        JSON.stringify({ cookie: 'A1=cached', crumb: 'cached-crumb', acquiredAt: 0 }),
      );
      const acquirer = countingAcquirer();
      const probe = vi.fn(async () => true);
      const store = new SessionStore({
        acquirer,
        cacheFile,
        ttlHours: 12,
        probe,
        now: () => 60 * 60 * 1000,
      });

      const session = await store.getValidSession();

      expect(session.crumb).toBe('cached-crumb');
      expect(session.source).toBe('cache');
      expect(session.state).toBe('valid');
      expect(probe).toHaveBeenCalledTimes(1);
      expect(acquirer.calls).toBe(0);
      expect(store.acquisitionCount()).toBe(0);
    });

    it('discards a cached session older than the TTL', async () => {
      await writeFile(
        cacheFile,
        JSON.stringify({ cookie: 'A1=cached', crumb: 'cached-crumb', acquiredAt: 0 }),
      );
      const acquirer = countingAcquirer();
      const store = new SessionStore({
        acquirer,
        cacheFile,
        ttlHours: 12,
        now: () => 13 * 60 * 60 * 1000,
      });

      const session = await store.getValidSession();

      expect(session.crumb).toBe('crumb-1');
      expect(acquirer.calls).toBe(1);
    });

    it('discards a cached session the probe rejects', async () => {
      await writeFile(
        cacheFile,
        JSON.stringify({ cookie: 'A1=cached', crumb: 'cached-crumb', acquiredAt: 0 }),
      );
      const acquirer = countingAcquirer();
      const store = new SessionStore({
        acquirer,
        cacheFile,
        probe: async () => false,
        now: () => 0,
      });

      const session = await store.getValidSession();

      expect(session.source).toBe('test');
      expect(acquirer.calls).toBe(1);
    });

    it('ignores an unreadable cache file', async () => {
      await writeFile(cacheFile, 'not json');
      const acquirer = countingAcquirer();
      const store = new SessionStore({ acquirer, cacheFile });

      await store.getValidSession();
      expect(acquirer.calls).toBe(1);
    });
  });
});
