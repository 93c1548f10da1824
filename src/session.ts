import { setInterval as setIntervalPromise } from 'node:timers/promises';

import { getErrorMessage } from './errors.js';
import { logInfo, logWarn } from './observability.js';

export type SessionValue = string | number | boolean;

export class Session {
  readonly createdAt: number;
  private lastSeenAt: number;
  private readonly values = new Map<string, SessionValue>();

  constructor(
    readonly clientKey: string,
    now: number
  ) {
    this.createdAt = now;
    this.lastSeenAt = now;
  }

  get lastSeen(): number {
    return this.lastSeenAt;
  }

  get(key: string): SessionValue | undefined {
    return this.values.get(key);
  }

  getString(key: string): string | undefined {
    const value = this.values.get(key);
    return typeof value === 'string' ? value : undefined;
  }

  set(key: string, value: SessionValue): void {
    this.values.set(key, value);
  }

  delete(key: string): boolean {
    return this.values.delete(key);
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  /** @internal Only the owning store moves the activity clock. */
  markSeen(now: number): void {
    if (now > this.lastSeenAt) this.lastSeenAt = now;
  }
}

export interface SessionStore {
  /** Returns the live session for `clientKey`, creating it on first contact. */
  resolve: (clientKey: string) => Session;
  get: (clientKey: string) => Session | undefined;
  touch: (session: Session) => void;
  /** `now - lastSeen > ttlSeconds`; uses the store's TTL when omitted. */
  isExpired: (session: Session, ttlSeconds?: number) => boolean;
  remove: (clientKey: string) => Session | undefined;
  size: () => number;
  evictIdle: (idleMs: number) => Session[];
  clear: () => Session[];
}

export interface CreateSessionStoreOptions {
  readonly expirationSeconds: number;
  /** Injectable clock for tests; default is Date.now. */
  readonly nowMs?: () => number;
}

function isBlankClientKey(clientKey: string): boolean {
  return clientKey.length === 0;
}

class InMemorySessionStore implements SessionStore {
  // Mutated only synchronously, so resolve() is atomic per key.
  private readonly sessions = new Map<string, Session>();

  constructor(
    private readonly expirationSeconds: number,
    private readonly nowMs: () => number
  ) {}

  resolve(clientKey: string): Session {
    if (isBlankClientKey(clientKey)) {
      throw new Error('Cannot resolve a session for a blank client key');
    }
    const existing = this.sessions.get(clientKey);
    if (existing) return existing;

    const session = new Session(clientKey, this.nowMs());
    this.sessions.set(clientKey, session);
    return session;
  }

  get(clientKey: string): Session | undefined {
    if (isBlankClientKey(clientKey)) return undefined;
    return this.sessions.get(clientKey);
  }

  touch(session: Session): void {
    session.markSeen(this.nowMs());
  }

  isExpired(session: Session, ttlSeconds = this.expirationSeconds): boolean {
    return this.nowMs() - session.lastSeen > ttlSeconds * 1000;
  }

  remove(clientKey: string): Session | undefined {
    const session = this.sessions.get(clientKey);
    if (!session) return undefined;
    this.sessions.delete(clientKey);
    return session;
  }

  size(): number {
    return this.sessions.size;
  }

  evictIdle(idleMs: number): Session[] {
    const now = this.nowMs();
    const evicted: Session[] = [];

    for (const [clientKey, session] of this.sessions.entries()) {
      if (now - session.lastSeen <= idleMs) continue;
      this.sessions.delete(clientKey);
      evicted.push(session);
    }

    return evicted;
  }

  clear(): Session[] {
    const sessions = [...this.sessions.values()];
    this.sessions.clear();
    return sessions;
  }
}

export function createSessionStore(
  options: CreateSessionStoreOptions
): SessionStore {
  return new InMemorySessionStore(
    options.expirationSeconds,
    options.nowMs ?? Date.now
  );
}

/* -------------------------------------------------------------------------------------------------
 * Idle-session sweep
 * ------------------------------------------------------------------------------------------------- */

const MIN_SWEEP_INTERVAL_MS = 10_000;
const MAX_SWEEP_INTERVAL_MS = 60_000;

function getSweepIntervalMs(retentionMs: number): number {
  return Math.min(
    Math.max(Math.floor(retentionMs / 2), MIN_SWEEP_INTERVAL_MS),
    MAX_SWEEP_INTERVAL_MS
  );
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

function handleSweepError(error: unknown): void {
  if (isAbortError(error)) return;
  logWarn('Session sweep loop failed', { error: getErrorMessage(error) });
}

class SessionSweepLoop {
  constructor(
    private readonly store: SessionStore,
    private readonly retentionMs: number,
    private readonly intervalMs: number
  ) {}

  start(): AbortController {
    const controller = new AbortController();
    void this.run(controller.signal).catch(handleSweepError);
    return controller;
  }

  private async run(signal: AbortSignal): Promise<void> {
    const ticks = setIntervalPromise(this.intervalMs, undefined, {
      signal,
      ref: false,
    });

    for await (const _tick of ticks) {
      const evicted = this.store.evictIdle(this.retentionMs);
      if (evicted.length > 0) {
        logInfo('Idle sessions evicted', {
          evicted: evicted.length,
          remaining: this.store.size(),
        });
      }
    }
  }
}

/**
 * Periodically drops sessions idle longer than `retentionMs`. The retention
 * window is at least the expiration TTL, so a dispatcher still observes an
 * expired session before it disappears.
 */
export function startSessionSweep(
  store: SessionStore,
  retentionMs: number,
  intervalMs = getSweepIntervalMs(retentionMs)
): AbortController {
  return new SessionSweepLoop(store, retentionMs, intervalMs).start();
}
