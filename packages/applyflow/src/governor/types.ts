import type { BrowserSession } from '../sessions/types.js';

/** A resource an executor needs for one stage invocation. */
export type ResourceRequest =
  | { kind: 'budget'; resourceId: string }
  | { kind: 'session'; platform: string };

export interface LeaseHolder {
  applicationId: string;
  stage: string;
}

export interface Lease {
  id: string;
  resourceId: string;
  holder: LeaseHolder;
  acquiredAt: number;
  expiresAt: number;
  /** Whether a budget token was taken (and so can be refunded) */
  tokenTaken: boolean;
  session: BrowserSession | null;
}

export type DenialReason = 'over_concurrency' | 'budget_exhausted' | 'session_unavailable';

export interface Denial {
  ok: false;
  resourceId: string;
  reason: DenialReason;
  /** When the budget refills enough to retry; null when it depends on another holder releasing */
  retryAfterMs: number | null;
}

export type AcquireResult = { ok: true; lease: Lease } | Denial;

export type AcquireAllResult = { ok: true; leases: Lease[]; session: BrowserSession | null } | Denial;

export interface ReleaseOptions {
  /** Give the budget token back; use when the work never reached the external system */
  refund?: boolean;
  /** The stage failed while holding the session */
  sessionErrored?: boolean;
  /** Close the session instead of returning it to the pool */
  discardSession?: boolean;
}

export type Clock = () => number;
