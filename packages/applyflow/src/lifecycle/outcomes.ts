import type { Application, ApplicationOutcome } from './types.js';

const DAY_MS = 86_400_000;

export const FINAL_OUTCOMES: ReadonlySet<ApplicationOutcome> = new Set<ApplicationOutcome>([
  'rejected',
  'accepted',
  'withdrawn',
  'expired',
]);

/** Days of silence after which a submission is worth chasing, keyed by what is known so far. */
export const FOLLOW_UP_AFTER_DAYS = {
  no_response: 7,
  under_review: 14,
} as const;

/**
 * Whether a submitted application has gone quiet long enough to follow up:
 * more than a week with no response, or more than two weeks under review.
 */
export function requiresFollowUp(app: Application, now: number): boolean {
  if (app.submittedAt === null) return false;
  if (app.state !== 'submitted' && app.state !== 'confirmed') return false;

  const elapsedMs = now - Date.parse(app.submittedAt);
  if (app.outcome === null) return elapsedMs > FOLLOW_UP_AFTER_DAYS.no_response * DAY_MS;
  if (app.outcome === 'under_review') return elapsedMs > FOLLOW_UP_AFTER_DAYS.under_review * DAY_MS;
  return false;
}
