import { sessionLimitFor } from '../config/resources.js';
import { errorMessage, getLogger, type Logger } from '../monitoring/logger.js';
import type { BrowserSession, SessionPoolStats, SessionProvider } from './types.js';

interface PoolEntry {
  session: BrowserSession;
  busy: boolean;
  consecutiveErrors: number;
}

interface Waiter {
  platform: string;
  wake: () => void;
}

export interface SessionPoolOptions {
  /** Per-platform session ceilings; platforms not listed use the built-in defaults */
  perPlatform?: Record<string, number>;
  /** Consecutive errored check-ins before a session is discarded */
  maxConsecutiveErrors?: number;
  logger?: Logger;
}

export class SessionUnavailableError extends Error {
  constructor(
    public readonly platform: string,
    detail: string,
  ) {
    super(`No browser session available for ${platform}: ${detail}`);
    this.name = 'SessionUnavailableError';
  }
}

/**
 * Bounded pool of browser sessions per platform. A session is either idle
 * or checked out to exactly one holder.
 */
export class SessionPool {
  private readonly entries = new Map<string, PoolEntry[]>();
  private readonly opening = new Map<string, number>();
  private waiters: Waiter[] = [];
  private draining = false;
  private readonly perPlatform: Record<string, number>;
  private readonly maxConsecutiveErrors: number;
  private readonly logger: Logger;

  constructor(
    private readonly provider: SessionProvider,
    opts: SessionPoolOptions = {},
  ) {
    this.perPlatform = opts.perPlatform ?? {};
    this.maxConsecutiveErrors = opts.maxConsecutiveErrors ?? 2;
    this.logger = (opts.logger ?? getLogger()).child({ component: 'session-pool' });
  }

  limitFor(platform: string): number {
    return this.perPlatform[platform] ?? sessionLimitFor(platform);
  }

  /**
   * Check out an idle session (preferring `preferSessionId`), or open a new one
   * if the platform is under its ceiling. Resolves null when the pool is full.
   */
  async tryCheckout(platform: string, opts: { preferSessionId?: string } = {}): Promise<BrowserSession | null> {
    if (this.draining) return null;
    const list = this.listFor(platform);

    const preferred = opts.preferSessionId
      ? list.find((e) => !e.busy && e.session.id === opts.preferSessionId)
      : undefined;
    const idle = preferred ?? list.find((e) => !e.busy);
    if (idle) {
      idle.busy = true;
      return idle.session;
    }

    const pending = this.opening.get(platform) ?? 0;
    if (list.length + pending >= this.limitFor(platform)) return null;

    this.opening.set(platform, pending + 1);
    let session: BrowserSession;
    try {
      session = await this.provider.open(platform);
    } finally {
      this.opening.set(platform, (this.opening.get(platform) ?? 1) - 1);
    }

    if (this.draining) {
      await this.close(session);
      return null;
    }
    this.listFor(platform).push({ session, busy: true, consecutiveErrors: 0 });
    this.logger.info('Session opened', { platform, sessionId: session.id });
    return session;
  }

  /** Like tryCheckout, but waits up to `timeoutMs` for a session to free up. */
  async checkout(platform: string, opts: { timeoutMs: number; preferSessionId?: string }): Promise<BrowserSession> {
    const deadline = Date.now() + opts.timeoutMs;
    for (;;) {
      const session = await this.tryCheckout(platform, opts);
      if (session) return session;
      if (this.draining) throw new SessionUnavailableError(platform, 'pool is draining');

      const remaining = deadline - Date.now();
      if (remaining <= 0) throw new SessionUnavailableError(platform, `timed out after ${opts.timeoutMs}ms`);
      await this.waitForRelease(platform, remaining);
    }
  }

  /**
   * Return a session. An errored check-in counts toward discarding it;
   * a clean one resets the count.
   */
  async checkin(session: BrowserSession, opts: { errored?: boolean } = {}): Promise<void> {
    const list = this.listFor(session.platform);
    const entry = list.find((e) => e.session.id === session.id);
    if (!entry) return;

    entry.consecutiveErrors = opts.errored ? entry.consecutiveErrors + 1 : 0;
    if (entry.consecutiveErrors >= this.maxConsecutiveErrors) {
      this.logger.warn('Discarding session after repeated errors', {
        platform: session.platform,
        sessionId: session.id,
        consecutiveErrors: entry.consecutiveErrors,
      });
      await this.discard(session);
      return;
    }

    entry.busy = false;
    this.notify(session.platform);
  }

  /** Remove a session from the pool and close it. */
  async discard(session: BrowserSession): Promise<void> {
    const list = this.listFor(session.platform);
    const idx = list.findIndex((e) => e.session.id === session.id);
    if (idx === -1) return;
    list.splice(idx, 1);
    this.notify(session.platform);
    await this.close(session);
  }

  /** Close every session and refuse new checkouts. */
  async drain(): Promise<void> {
    this.draining = true;
    const all = [...this.entries.values()].flat();
    this.entries.clear();
    const waiters = this.waiters;
    this.waiters = [];
    for (const w of waiters) w.wake();
    await Promise.all(all.map((e) => this.close(e.session)));
  }

  isBusy(sessionId: string): boolean {
    for (const list of this.entries.values()) {
      const entry = list.find((e) => e.session.id === sessionId);
      if (entry) return entry.busy;
    }
    return false;
  }

  stats(): Record<string, SessionPoolStats> {
    const result: Record<string, SessionPoolStats> = {};
    for (const [platform, list] of this.entries) {
      result[platform] = {
        open: list.length,
        busy: list.filter((e) => e.busy).length,
        limit: this.limitFor(platform),
      };
    }
    return result;
  }

  private listFor(platform: string): PoolEntry[] {
    let list = this.entries.get(platform);
    if (!list) {
      list = [];
      this.entries.set(platform, list);
    }
    return list;
  }

  private notify(platform: string): void {
    const woken = this.waiters.filter((w) => w.platform === platform);
    this.waiters = this.waiters.filter((w) => w.platform !== platform);
    for (const w of woken) w.wake();
  }

  private waitForRelease(platform: string, timeoutMs: number): Promise<void> {
    return new Promise((resolve) => {
      const waiter: Waiter = {
        platform,
        wake: () => {
          clearTimeout(timer);
          resolve();
        },
      };
      const timer = setTimeout(() => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        resolve();
      }, timeoutMs);
      this.waiters.push(waiter);
    });
  }

  private async close(session: BrowserSession): Promise<void> {
    try {
      await this.provider.close(session);
      this.logger.info('Session closed', { platform: session.platform, sessionId: session.id });
    } catch (err) {
      this.logger.warn('Session close failed', {
        platform: session.platform,
        sessionId: session.id,
        error: errorMessage(err),
      });
    }
  }
}
