export { SessionPool, SessionUnavailableError, type SessionPoolOptions } from './SessionPool.js';
export { InMemorySessionProvider } from './InMemorySessionProvider.js';
export type { BrowserSession, SessionProvider, SessionPoolStats } from './types.js';
