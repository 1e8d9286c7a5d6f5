import type { ApplicationOutcome, ApplicationState } from './types.js';

export type OrchestrationErrorCode =
  | 'illegal_transition'
  | 'application_busy'
  | 'application_not_found'
  | 'resume_not_found'
  | 'resume_ownership'
  | 'concurrent_modification'
  | 'replay_mismatch'
  | 'unknown_resource'
  | 'outcome_closed'
  | 'scheduler_busy';

/** Base class for errors the control surface reports to callers. */
export class OrchestrationError extends Error {
  constructor(
    message: string,
    public readonly code: OrchestrationErrorCode,
    public readonly httpStatus: 404 | 409 | 422 | 500,
  ) {
    super(message);
    this.name = 'OrchestrationError';
  }
}

export class IllegalTransitionError extends OrchestrationError {
  constructor(
    public readonly from: ApplicationState,
    public readonly trigger: string,
  ) {
    super(`Transition '${trigger}' is not allowed from state '${from}'`, 'illegal_transition', 409);
    this.name = 'IllegalTransitionError';
  }
}

export class ApplicationBusyError extends OrchestrationError {
  constructor(public readonly applicationId: string) {
    super(`Application ${applicationId} has a dispatch in flight`, 'application_busy', 409);
    this.name = 'ApplicationBusyError';
  }
}

export class ApplicationNotFoundError extends OrchestrationError {
  constructor(public readonly applicationId: string) {
    super(`Application not found: ${applicationId}`, 'application_not_found', 404);
    this.name = 'ApplicationNotFoundError';
  }
}

export class ResumeNotFoundError extends OrchestrationError {
  constructor(public readonly resumeId: string) {
    super(`Resume not found: ${resumeId}`, 'resume_not_found', 422);
    this.name = 'ResumeNotFoundError';
  }
}

export class ResumeOwnershipError extends OrchestrationError {
  constructor(resumeId: string, candidateId: string) {
    super(`Resume ${resumeId} does not belong to candidate ${candidateId}`, 'resume_ownership', 422);
    this.name = 'ResumeOwnershipError';
  }
}

export class ConcurrentModificationError extends OrchestrationError {
  constructor(applicationId: string, expectedState: ApplicationState, expectedVersion: number) {
    super(
      `Application ${applicationId} changed underneath the scheduler (expected ${expectedState}@${expectedVersion})`,
      'concurrent_modification',
      409,
    );
    this.name = 'ConcurrentModificationError';
  }
}

export class ReplayMismatchError extends OrchestrationError {
  constructor(applicationId: string, detail: string) {
    super(`Event log for ${applicationId} cannot be replayed: ${detail}`, 'replay_mismatch', 500);
    this.name = 'ReplayMismatchError';
  }
}

export class UnknownResourceError extends OrchestrationError {
  constructor(public readonly resourceId: string) {
    super(`No resource policy configured for '${resourceId}'`, 'unknown_resource', 500);
    this.name = 'UnknownResourceError';
  }
}

export class OutcomeClosedError extends OrchestrationError {
  constructor(applicationId: string, public readonly outcome: ApplicationOutcome) {
    super(`Application ${applicationId} already has the final outcome '${outcome}'`, 'outcome_closed', 409);
    this.name = 'OutcomeClosedError';
  }
}

export class SchedulerBusyError extends OrchestrationError {
  constructor(operation: string) {
    super(`Cannot ${operation} while the scheduler is running or dispatching`, 'scheduler_busy', 409);
    this.name = 'SchedulerBusyError';
  }
}
