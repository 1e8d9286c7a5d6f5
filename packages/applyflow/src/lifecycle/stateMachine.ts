import { APPLICATION_TRIGGERS, EVENT_CAUSES, type ApplicationTrigger } from '../events/ApplicationEventTypes.js';
import { IllegalTransitionError } from './errors.js';
import {
  isTerminal,
  type ActiveState,
  type Application,
  type ApplicationOutcome,
  type ApplicationState,
  type EventCause,
  type FailureKind,
  type NewApplicationEvent,
} from './types.js';

interface TransitionRule {
  from: readonly ApplicationState[] | 'any_active';
  /** `same` keeps the current state (retries) */
  to: ApplicationState | 'same';
  cause: EventCause;
}

const STAGE_STATES: readonly ActiveState[] = ['discovered', 'analyzed', 'tailored', 'submitting', 'submitted'];

const T = APPLICATION_TRIGGERS;

export const TRANSITIONS: Record<ApplicationTrigger, TransitionRule> = {
  [T.ANALYSIS_SUCCEEDED]: { from: ['discovered'], to: 'analyzed', cause: EVENT_CAUSES.STAGE_SUCCESS },
  [T.TAILORING_SUCCEEDED]: { from: ['analyzed'], to: 'tailored', cause: EVENT_CAUSES.STAGE_SUCCESS },
  [T.AUTO_SUBMIT]: { from: ['tailored'], to: 'submitting', cause: EVENT_CAUSES.POLICY },
  [T.APPROVAL_REQUIRED]: { from: ['tailored'], to: 'needs_review', cause: EVENT_CAUSES.POLICY },
  [T.APPROVED]: { from: ['needs_review'], to: 'submitting', cause: EVENT_CAUSES.MANUAL_OVERRIDE },
  [T.REJECTED]: { from: ['needs_review'], to: 'cancelled', cause: EVENT_CAUSES.MANUAL_OVERRIDE },
  [T.SUBMISSION_CONFIRMED]: { from: ['submitting', 'submitted'], to: 'confirmed', cause: EVENT_CAUSES.STAGE_SUCCESS },
  [T.SUBMISSION_ACCEPTED]: { from: ['submitting'], to: 'submitted', cause: EVENT_CAUSES.STAGE_SUCCESS },
  [T.STAGE_RETRY]: { from: STAGE_STATES, to: 'same', cause: EVENT_CAUSES.STAGE_FAILURE },
  [T.STAGE_FAILED]: { from: STAGE_STATES, to: 'failed', cause: EVENT_CAUSES.STAGE_FAILURE },
  [T.AUTOMATION_DETECTED]: { from: ['submitting'], to: 'needs_review', cause: EVENT_CAUSES.STAGE_FAILURE },
  [T.REVIEW_TIMEOUT]: { from: ['needs_review'], to: 'cancelled', cause: EVENT_CAUSES.TIMEOUT },
  [T.INTERRUPTED]: { from: ['submitting'], to: 'needs_review', cause: EVENT_CAUSES.RECOVERY },
  [T.CANCEL]: { from: 'any_active', to: 'cancelled', cause: EVENT_CAUSES.CANCELLATION },
  [T.OUTCOME_RECORDED]: { from: ['confirmed'], to: 'same', cause: EVENT_CAUSES.MANUAL_OVERRIDE },
};

const SUBMISSION_TRIGGERS: ReadonlySet<string> = new Set<string>([T.SUBMISSION_ACCEPTED, T.SUBMISSION_CONFIRMED]);

/** `submittedAt` after an event: stamped by the first accepted or confirmed submission, then kept. */
export function submittedAtAfter(current: string | null, trigger: string, occurredAt: string): string | null {
  if (current !== null) return current;
  return SUBMISSION_TRIGGERS.has(trigger) ? occurredAt : null;
}

export const ALL_TRIGGERS = Object.keys(TRANSITIONS);

function isKnownTrigger(trigger: string): trigger is ApplicationTrigger {
  return Object.prototype.hasOwnProperty.call(TRANSITIONS, trigger);
}

/** Target state for `trigger` from `from`, or null when the pair is not in the table. */
export function nextState(from: ApplicationState, trigger: string): ApplicationState | null {
  if (!isKnownTrigger(trigger)) return null;
  const rule = TRANSITIONS[trigger];
  const allowed = rule.from === 'any_active' ? !isTerminal(from) : rule.from.includes(from);
  if (!allowed) return null;
  return rule.to === 'same' ? from : rule.to;
}

export function canTransition(from: ApplicationState, trigger: string): boolean {
  return nextState(from, trigger) !== null;
}

/** Triggers accepted from a given state, in table order. */
export function allowedTriggers(from: ApplicationState): ApplicationTrigger[] {
  return Object.values(APPLICATION_TRIGGERS).filter((t) => nextState(from, t) !== null);
}

export interface TransitionInput {
  trigger: string;
  eventId: string;
  occurredAt: string;
  reason?: string | null;
  /** Fields the side effect changes alongside the state */
  attempt?: number;
  lastError?: FailureKind | null;
  resumeId?: string;
  confirmationToken?: string | null;
  outcome?: ApplicationOutcome | null;
  matchScore?: number | null;
}

export interface TransitionResult {
  application: Application;
  event: NewApplicationEvent;
}

/**
 * Apply a trigger to an application and produce the next projection together
 * with the event that records it. Pure: nothing is persisted here.
 *
 * @throws IllegalTransitionError when the (state, trigger) pair is not in the table
 */
export function transition(app: Application, input: TransitionInput): TransitionResult {
  const to = nextState(app.state, input.trigger);
  if (to === null || !isKnownTrigger(input.trigger)) {
    throw new IllegalTransitionError(app.state, input.trigger);
  }
  const cause = TRANSITIONS[input.trigger].cause;

  const application: Application = {
    ...app,
    state: to,
    attempt: input.attempt ?? app.attempt,
    lastError: input.lastError !== undefined ? input.lastError : app.lastError,
    statusReason: input.reason !== undefined ? input.reason : app.statusReason,
    resumeId: input.resumeId ?? app.resumeId,
    confirmationToken:
      input.confirmationToken !== undefined ? input.confirmationToken : app.confirmationToken,
    submittedAt: submittedAtAfter(app.submittedAt, input.trigger, input.occurredAt),
    outcome: input.outcome !== undefined ? input.outcome : app.outcome,
    matchScore: input.matchScore !== undefined ? input.matchScore : app.matchScore,
    version: app.version + 1,
    updatedAt: input.occurredAt,
  };

  const event: NewApplicationEvent = {
    id: input.eventId,
    applicationId: app.id,
    jobId: app.jobId,
    sequence: application.version,
    fromState: app.state,
    toState: to,
    trigger: input.trigger,
    cause,
    attempt: application.attempt,
    lastError: application.lastError,
    reason: application.statusReason,
    resumeId: application.resumeId,
    confirmationToken: application.confirmationToken,
    outcome: application.outcome,
    matchScore: application.matchScore,
    occurredAt: input.occurredAt,
  };

  return { application, event };
}
