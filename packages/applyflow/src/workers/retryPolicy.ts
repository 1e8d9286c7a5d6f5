import type { FailureKind } from '../lifecycle/types.js';

export interface BackoffSettings {
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction of the raw delay added as random jitter (0..1) */
  jitterRatio: number;
}

export interface FailureSignal {
  kind: FailureKind;
  /** Hint from the executor, e.g. a Retry-After header */
  retryAfterMs?: number;
}

export type RetryDecision =
  | { action: 'retry_after'; delayMs: number }
  | { action: 'retry_now' }
  | { action: 'fail' }
  | { action: 'review' };

export interface RetryOptions {
  backoff: BackoffSettings;
  /** [0, 1) source for jitter; defaults to Math.random */
  random?: () => number;
  /** Refill time of the exhausted resource, used when a rate limit carries no hint */
  refillDelayMs?: number;
}

/** Exponential backoff for the n-th attempt (1-based), jittered and capped. */
export function backoffDelay(attempt: number, backoff: BackoffSettings, random: () => number = Math.random): number {
  const raw = backoff.baseDelayMs * 2 ** Math.max(0, attempt - 1);
  const jitter = raw * backoff.jitterRatio * random();
  return Math.min(backoff.maxDelayMs, Math.round(raw + jitter));
}

/**
 * Decide what happens after a failed stage invocation.
 *
 * `attemptCount` is the number of attempts made so far including the one
 * that just failed. Reaching `maxAttempts` fails every retryable kind.
 * Automation detection is not a retry: it goes to review up to and including
 * the last allowed attempt, and fails only past it.
 */
export function decide(
  failure: FailureSignal,
  attemptCount: number,
  maxAttempts: number,
  opts: RetryOptions,
): RetryDecision {
  if (failure.kind === 'automation_detected') {
    return attemptCount > maxAttempts ? { action: 'fail' } : { action: 'review' };
  }
  if (attemptCount >= maxAttempts) return { action: 'fail' };

  switch (failure.kind) {
    case 'transient_network':
    case 'internal_error':
      return { action: 'retry_after', delayMs: backoffDelay(attemptCount, opts.backoff, opts.random) };
    case 'rate_limited':
      return {
        action: 'retry_after',
        delayMs:
          failure.retryAfterMs ?? opts.refillDelayMs ?? backoffDelay(attemptCount, opts.backoff, opts.random),
      };
    case 'timeout':
      return { action: 'retry_now' };
    case 'platform_rejected_input':
      return { action: 'fail' };
  }
}

const KIND_LABELS: Record<FailureKind, string> = {
  transient_network: 'Network error',
  rate_limited: 'Rate limited',
  platform_rejected_input: 'Platform rejected the input',
  automation_detected: 'Automation detected',
  timeout: 'Stage timed out',
  internal_error: 'Unexpected error',
};

/** Human-readable status reason stored on the application. */
export function describeFailure(
  stage: string,
  failure: { kind: FailureKind; message: string },
  attemptCount: number,
  maxAttempts: number,
  decision: RetryDecision,
): string {
  const head = `${KIND_LABELS[failure.kind]} during ${stage} (attempt ${attemptCount}/${maxAttempts}): ${failure.message}`;
  switch (decision.action) {
    case 'retry_after':
      return `${head}; retrying in ${Math.round(decision.delayMs / 1000)}s`;
    case 'retry_now':
      return `${head}; retrying`;
    case 'review':
      return `${head}; waiting for human review`;
    case 'fail':
      return attemptCount >= maxAttempts ? `${head}; giving up after ${attemptCount} attempts` : `${head}; not retryable`;
  }
}
