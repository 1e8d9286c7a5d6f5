import type { BrowserSession, SessionProvider } from './types.js';

/**
 * Session provider for dry runs and tests: sessions are plain records and
 * nothing is launched.
 */
export class InMemorySessionProvider implements SessionProvider {
  private counter = 0;
  readonly live = new Set<string>();
  opened = 0;
  closed = 0;

  async open(platform: string): Promise<BrowserSession> {
    this.counter += 1;
    this.opened += 1;
    const session: BrowserSession = {
      id: `session-${platform}-${this.counter}`,
      platform,
      openedAt: new Date().toISOString(),
    };
    this.live.add(session.id);
    return session;
  }

  async close(session: BrowserSession): Promise<void> {
    if (this.live.delete(session.id)) this.closed += 1;
  }
}
