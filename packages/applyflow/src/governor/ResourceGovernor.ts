import { randomUUID } from 'node:crypto';
import { resolveResourcePolicy, type ResourcePolicy } from '../config/resources.js';
import { UnknownResourceError } from '../lifecycle/errors.js';
import { errorMessage, getLogger, type Logger } from '../monitoring/logger.js';
import type { SessionPool } from '../sessions/SessionPool.js';
import type { BrowserSession } from '../sessions/types.js';
import { TokenBucket } from './TokenBucket.js';
import type {
  AcquireAllResult,
  AcquireResult,
  Clock,
  Lease,
  LeaseHolder,
  ReleaseOptions,
  ResourceRequest,
} from './types.js';

export interface ResourceGovernorOptions {
  /** Policy overrides keyed by exact resource id */
  overrides?: Record<string, Partial<ResourcePolicy>>;
  sessionPool?: SessionPool;
  clock?: Clock;
  logger?: Logger;
}

type BudgetRequest = Extract<ResourceRequest, { kind: 'budget' }>;
type SessionRequest = Extract<ResourceRequest, { kind: 'session' }>;

interface ResourceState {
  policy: ResourcePolicy;
  bucket: TokenBucket | null;
}

export function sessionResourceId(platform: string): string {
  return `session:${platform}`;
}

/**
 * Grants and tracks leases on shared external resources. Each resource has a
 * request budget (token bucket) and a concurrency ceiling; session resources
 * are additionally backed by the session pool.
 *
 * All bookkeeping is synchronous, so a check and the grant that follows it
 * cannot interleave with another caller.
 */
export class ResourceGovernor {
  private readonly resources = new Map<string, ResourceState>();
  private readonly leases = new Map<string, Lease>();
  private readonly overrides: Record<string, Partial<ResourcePolicy>>;
  private readonly sessionPool?: SessionPool;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(opts: ResourceGovernorOptions = {}) {
    this.overrides = opts.overrides ?? {};
    this.sessionPool = opts.sessionPool;
    this.clock = opts.clock ?? Date.now;
    this.logger = (opts.logger ?? getLogger()).child({ component: 'governor' });
  }

  policyFor(resourceId: string): ResourcePolicy {
    return this.stateFor(resourceId).policy;
  }

  /** Acquire a budget lease on one resource. */
  acquire(resourceId: string, holder: LeaseHolder): AcquireResult {
    this.sweepExpired();
    const now = this.clock();
    const state = this.stateFor(resourceId);
    const { policy } = state;

    if (policy.maxConcurrent !== -1 && this.outstanding(resourceId) >= policy.maxConcurrent) {
      return { ok: false, resourceId, reason: 'over_concurrency', retryAfterMs: null };
    }

    if (state.bucket && !state.bucket.tryTake(now)) {
      return {
        ok: false,
        resourceId,
        reason: 'budget_exhausted',
        retryAfterMs: state.bucket.msUntilAvailable(now),
      };
    }

    const lease: Lease = {
      id: randomUUID(),
      resourceId,
      holder,
      acquiredAt: now,
      expiresAt: now + policy.leaseTtlMs,
      tokenTaken: state.bucket !== null,
      session: null,
    };
    this.leases.set(lease.id, lease);
    return { ok: true, lease };
  }

  /**
   * Acquire every requested resource or none. Budgets are taken first; the
   * session comes last because opening one is the expensive step. On a
   * partial failure everything already granted is released with a refund.
   */
  async acquireAll(
    requests: readonly ResourceRequest[],
    holder: LeaseHolder,
    opts: { preferSessionId?: string } = {},
  ): Promise<AcquireAllResult> {
    const leases: Lease[] = [];
    const budgets = requests.filter((r): r is BudgetRequest => r.kind === 'budget');
    const sessions = requests.filter((r): r is SessionRequest => r.kind === 'session');

    for (const req of budgets) {
      const result = this.acquire(req.resourceId, holder);
      if (!result.ok) {
        await this.releaseAll(leases, { refund: true });
        return result;
      }
      leases.push(result.lease);
    }

    let session: BrowserSession | null = null;
    for (const req of sessions) {
      const resourceId = sessionResourceId(req.platform);
      if (!this.sessionPool) {
        await this.releaseAll(leases, { refund: true });
        throw new Error(`Resource ${resourceId} requested but no session pool is configured`);
      }

      const granted = this.acquire(resourceId, holder);
      if (!granted.ok) {
        await this.releaseAll(leases, { refund: true });
        return granted;
      }
      leases.push(granted.lease);

      let checkedOut: BrowserSession | null;
      try {
        checkedOut = await this.sessionPool.tryCheckout(req.platform, { preferSessionId: opts.preferSessionId });
      } catch (err) {
        await this.releaseAll(leases, { refund: true });
        throw err;
      }
      if (!checkedOut) {
        await this.releaseAll(leases, { refund: true });
        return { ok: false, resourceId, reason: 'session_unavailable', retryAfterMs: null };
      }
      granted.lease.session = checkedOut;
      session = checkedOut;
    }

    return { ok: true, leases, session };
  }

  /** Return a lease. Releasing an already reclaimed lease is a no-op. */
  async release(lease: Lease, opts: ReleaseOptions = {}): Promise<void> {
    if (!this.leases.delete(lease.id)) return;

    if (opts.refund && lease.tokenTaken) {
      this.resources.get(lease.resourceId)?.bucket?.refund(this.clock());
    }

    if (lease.session && this.sessionPool) {
      if (opts.discardSession) {
        await this.sessionPool.discard(lease.session);
      } else {
        await this.sessionPool.checkin(lease.session, { errored: opts.sessionErrored });
      }
    }
  }

  async releaseAll(leases: readonly Lease[], opts: ReleaseOptions = {}): Promise<void> {
    // Sessions last so a waiting checkout sees the budgets freed too
    const ordered = [...leases].sort((a, b) => Number(a.session !== null) - Number(b.session !== null));
    for (const lease of ordered) {
      await this.release(lease, opts);
    }
  }

  /** Release everything an application holds. Returns the number of leases released. */
  async releaseHolder(applicationId: string, opts: ReleaseOptions = {}): Promise<number> {
    const held = [...this.leases.values()].filter((l) => l.holder.applicationId === applicationId);
    await this.releaseAll(held, opts);
    return held.length;
  }

  outstanding(resourceId: string): number {
    let count = 0;
    for (const lease of this.leases.values()) {
      if (lease.resourceId === resourceId) count++;
    }
    return count;
  }

  leasesHeldBy(applicationId: string): Lease[] {
    return [...this.leases.values()].filter((l) => l.holder.applicationId === applicationId);
  }

  /** Time until the resource's budget can grant another token. */
  refillDelayMs(resourceId: string): number {
    const bucket = this.stateFor(resourceId).bucket;
    return bucket ? bucket.msUntilAvailable(this.clock()) : 0;
  }

  /**
   * Reclaim leases past their TTL. A reclaimed session is discarded since its
   * holder may still be driving it.
   */
  sweepExpired(): number {
    const now = this.clock();
    let reclaimed = 0;
    for (const lease of [...this.leases.values()]) {
      if (lease.expiresAt > now) continue;
      this.leases.delete(lease.id);
      reclaimed++;
      this.logger.warn('Reclaimed expired lease', {
        resourceId: lease.resourceId,
        applicationId: lease.holder.applicationId,
        stage: lease.holder.stage,
      });
      if (lease.session && this.sessionPool) {
        const session = lease.session;
        this.sessionPool.discard(session).catch((err) => {
          this.logger.error('Failed to discard reclaimed session', {
            sessionId: session.id,
            error: errorMessage(err),
          });
        });
      }
    }
    return reclaimed;
  }

  private stateFor(resourceId: string): ResourceState {
    let state = this.resources.get(resourceId);
    if (state) return state;

    const policy = resolveResourcePolicy(resourceId, this.overrides);
    if (!policy) throw new UnknownResourceError(resourceId);
    state = {
      policy,
      bucket: policy.capacity === -1 ? null : new TokenBucket(policy.capacity, policy.windowMs, this.clock()),
    };
    this.resources.set(resourceId, state);
    return state;
  }
}
