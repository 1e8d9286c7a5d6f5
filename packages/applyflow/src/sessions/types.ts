/** A live, authenticated browser session bound to one platform. */
export interface BrowserSession {
  id: string;
  platform: string;
  openedAt: string;
}

/** Opens and closes browser sessions. The engine behind it is out of scope here. */
export interface SessionProvider {
  open(platform: string): Promise<BrowserSession>;
  close(session: BrowserSession): Promise<void>;
}

export interface SessionPoolStats {
  open: number;
  busy: number;
  limit: number;
}
