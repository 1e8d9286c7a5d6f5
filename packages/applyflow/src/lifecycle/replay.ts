import { ReplayMismatchError } from './errors.js';
import { submittedAtAfter } from './stateMachine.js';
import type { Application, NewApplicationEvent } from './types.js';

export type ApplicationSeed = Pick<
  Application,
  | 'id'
  | 'jobId'
  | 'candidateId'
  | 'baseResumeId'
  | 'tailoringMode'
  | 'automationLevel'
  | 'createdAt'
>;

/** The projection of a freshly created application before any event. */
export function initialApplication(seed: ApplicationSeed): Application {
  return {
    ...seed,
    resumeId: seed.baseResumeId,
    state: 'discovered',
    attempt: 0,
    lastError: null,
    statusReason: null,
    confirmationToken: null,
    submittedAt: null,
    outcome: null,
    matchScore: null,
    version: 0,
    updatedAt: seed.createdAt,
  };
}

export function seedOf(app: Application): ApplicationSeed {
  return {
    id: app.id,
    jobId: app.jobId,
    candidateId: app.candidateId,
    baseResumeId: app.baseResumeId,
    tailoringMode: app.tailoringMode,
    automationLevel: app.automationLevel,
    createdAt: app.createdAt,
  };
}

/**
 * Rebuild an application projection by folding its events over the creation seed.
 * Events must be in sequence order and chain state to state.
 */
export function replayApplication(seed: ApplicationSeed, events: readonly NewApplicationEvent[]): Application {
  let app = initialApplication(seed);
  for (const event of events) {
    if (event.applicationId !== seed.id) {
      throw new ReplayMismatchError(seed.id, `event ${event.id} belongs to ${event.applicationId}`);
    }
    if (event.sequence !== app.version + 1) {
      throw new ReplayMismatchError(seed.id, `expected sequence ${app.version + 1}, got ${event.sequence}`);
    }
    if (event.fromState !== app.state) {
      throw new ReplayMismatchError(
        seed.id,
        `event ${event.sequence} starts from ${event.fromState} but projection is ${app.state}`,
      );
    }
    app = {
      ...app,
      state: event.toState,
      attempt: event.attempt,
      lastError: event.lastError,
      statusReason: event.reason,
      resumeId: event.resumeId,
      confirmationToken: event.confirmationToken,
      submittedAt: submittedAtAfter(app.submittedAt, event.trigger, event.occurredAt),
      outcome: event.outcome,
      matchScore: event.matchScore,
      version: event.sequence,
      updatedAt: event.occurredAt,
    };
  }
  return app;
}

const PROJECTION_FIELDS = [
  'state',
  'attempt',
  'lastError',
  'statusReason',
  'resumeId',
  'confirmationToken',
  'submittedAt',
  'outcome',
  'matchScore',
  'version',
  'updatedAt',
] as const;

/** Names of projection fields that differ between two views of the same application. */
export function projectionDrift(stored: Application, replayed: Application): string[] {
  return PROJECTION_FIELDS.filter((field) => stored[field] !== replayed[field]);
}
