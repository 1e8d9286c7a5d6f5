import type { FailureKind } from '../lifecycle/types.js';

// --- Error classification ---

const ERROR_CLASSIFICATIONS: Array<{ pattern: RegExp; kind: FailureKind }> = [
  { pattern: /captcha|bot.?detect|automation.?detect|unusual activity|access denied/i, kind: 'automation_detected' },
  { pattern: /rate.?limit|too many requests/i, kind: 'rate_limited' },
  { pattern: /timed?.?out|timeout|ETIMEDOUT|deadline/i, kind: 'timeout' },
  { pattern: /disconnect|connection|ECONNREFUSED|ECONNRESET|ENOTFOUND|EAI_AGAIN|socket hang up/i, kind: 'transient_network' },
  { pattern: /browser.*closed|target.*closed/i, kind: 'transient_network' },
  { pattern: /invalid|rejected|required field|validation/i, kind: 'platform_rejected_input' },
];

export interface ClassifiedError {
  kind: FailureKind;
  message: string;
  retryAfterMs?: number;
}

function statusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

function retryAfterOf(err: unknown): number | undefined {
  if (
    typeof err === 'object' &&
    err !== null &&
    'retryAfterMs' in err &&
    typeof err.retryAfterMs === 'number'
  ) {
    return err.retryAfterMs;
  }
  return undefined;
}

function kindForStatus(status: number): FailureKind | undefined {
  if (status === 429) return 'rate_limited';
  if (status === 408 || status === 504) return 'timeout';
  if (status >= 500) return 'transient_network';
  if (status >= 400) return 'platform_rejected_input';
  return undefined;
}

/** Map a thrown value to a failure kind. Unrecognised errors are internal. */
export function classifyError(err: unknown): ClassifiedError {
  const message = err instanceof Error ? err.message : String(err);

  if (err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError')) {
    return { kind: 'timeout', message };
  }

  const status = statusOf(err);
  const fromStatus = status !== undefined ? kindForStatus(status) : undefined;
  if (fromStatus) {
    const retryAfterMs = retryAfterOf(err);
    return retryAfterMs === undefined ? { kind: fromStatus, message } : { kind: fromStatus, message, retryAfterMs };
  }

  for (const { pattern, kind } of ERROR_CLASSIFICATIONS) {
    if (pattern.test(message)) return { kind, message };
  }
  return { kind: 'internal_error', message };
}
