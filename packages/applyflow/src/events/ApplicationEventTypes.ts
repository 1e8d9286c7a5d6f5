/**
 * ApplicationEventTypes: canonical trigger and cause constants for af_application_events.
 *
 * Every transition written to the event log names one trigger and one cause
 * from this file. Using typed constants prevents typo bugs and enables autocomplete.
 */

export const APPLICATION_TRIGGERS = {
  // Stage outcomes
  ANALYSIS_SUCCEEDED: 'analysis_succeeded',
  TAILORING_SUCCEEDED: 'tailoring_succeeded',
  SUBMISSION_ACCEPTED: 'submission_accepted',
  SUBMISSION_CONFIRMED: 'submission_confirmed',

  // Automation gate
  AUTO_SUBMIT: 'auto_submit',
  APPROVAL_REQUIRED: 'approval_required',

  // Human review
  APPROVED: 'approved',
  REJECTED: 'rejected',
  REVIEW_TIMEOUT: 'review_timeout',

  // Failures
  STAGE_RETRY: 'stage_retry',
  STAGE_FAILED: 'stage_failed',
  AUTOMATION_DETECTED: 'automation_detected',

  // Process restart
  INTERRUPTED: 'interrupted',

  // Employer response after confirmation
  OUTCOME_RECORDED: 'outcome_recorded',

  // Control
  CANCEL: 'cancel',
} as const;

export type ApplicationTrigger = (typeof APPLICATION_TRIGGERS)[keyof typeof APPLICATION_TRIGGERS];

export const EVENT_CAUSES = {
  STAGE_SUCCESS: 'stage_success',
  STAGE_FAILURE: 'stage_failure',
  MANUAL_OVERRIDE: 'manual_override',
  TIMEOUT: 'timeout',
  POLICY: 'policy',
  CANCELLATION: 'cancellation',
  RECOVERY: 'recovery',
} as const;

/** Events that end an application; the Redis stream expires after one of these. */
export const TERMINAL_TRIGGERS: ReadonlySet<string> = new Set<string>([
  APPLICATION_TRIGGERS.SUBMISSION_CONFIRMED,
  APPLICATION_TRIGGERS.STAGE_FAILED,
  APPLICATION_TRIGGERS.REJECTED,
  APPLICATION_TRIGGERS.REVIEW_TIMEOUT,
  APPLICATION_TRIGGERS.CANCEL,
]);
