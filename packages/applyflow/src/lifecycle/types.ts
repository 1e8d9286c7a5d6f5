import type { Platform } from '../config/resources.js';

// --- Lifecycle vocabulary ---

export const APPLICATION_STATES = [
  'discovered',
  'analyzed',
  'tailored',
  'needs_review',
  'submitting',
  'submitted',
  'confirmed',
  'failed',
  'cancelled',
] as const;

export type ApplicationState = (typeof APPLICATION_STATES)[number];

export type TerminalState = 'confirmed' | 'failed' | 'cancelled';
export type ActiveState = Exclude<ApplicationState, TerminalState>;

export const TERMINAL_STATES: ReadonlySet<ApplicationState> = new Set<ApplicationState>([
  'confirmed',
  'failed',
  'cancelled',
]);

export const ACTIVE_STATES: readonly ActiveState[] = [
  'discovered',
  'analyzed',
  'tailored',
  'needs_review',
  'submitting',
  'submitted',
];

export function isTerminal(state: ApplicationState): state is TerminalState {
  return TERMINAL_STATES.has(state);
}

export type TailoringMode = 'conservative' | 'moderate' | 'aggressive';

/** `assisted` parks every application in needs_review before submission. */
export type AutomationLevel = 'full' | 'assisted';

export type StageName = 'discovery' | 'analysis' | 'tailoring' | 'submission' | 'confirmation';

/**
 * What the employer did with a submitted application. `rejected`, `accepted`,
 * `withdrawn` and `expired` are final; the others can still change.
 */
export const APPLICATION_OUTCOMES = [
  'under_review',
  'interview_scheduled',
  'rejected',
  'accepted',
  'withdrawn',
  'expired',
] as const;

export type ApplicationOutcome = (typeof APPLICATION_OUTCOMES)[number];

export type FailureKind =
  | 'transient_network'
  | 'rate_limited'
  | 'platform_rejected_input'
  | 'automation_detected'
  | 'timeout'
  | 'internal_error';

// --- Records ---

export interface JobRequirement {
  category: 'technical' | 'experience' | 'education' | 'other';
  skill: string;
  importance: 'required' | 'preferred' | 'nice_to_have';
  yearsExperience?: number;
}

export interface Requirements {
  skills: string[];
  keywords: string[];
  items: JobRequirement[];
}

export interface Job {
  id: string;
  sourceUrl: string;
  platform: Platform;
  title: string;
  company: string;
  postingText: string;
  /** Set once by the analysis stage */
  requirements: Requirements | null;
  createdAt: string;
}

export interface ResumeLineage {
  jobId: string;
  applicationId: string;
  attempt: number;
}

export interface Resume {
  id: string;
  candidateId: string;
  /** null for an original upload */
  parentId: string | null;
  tailoringMode: TailoringMode | null;
  content: string;
  lineage: ResumeLineage | null;
  createdAt: string;
}

export interface Application {
  id: string;
  jobId: string;
  candidateId: string;
  baseResumeId: string;
  /** Resume that will be (or was) submitted; the tailored version once tailoring succeeds */
  resumeId: string;
  tailoringMode: TailoringMode;
  automationLevel: AutomationLevel;
  state: ApplicationState;
  attempt: number;
  lastError: FailureKind | null;
  statusReason: string | null;
  confirmationToken: string | null;
  /** When the platform first accepted the submission */
  submittedAt: string | null;
  outcome: ApplicationOutcome | null;
  /** Fit between the tailored resume and the job (0..1), when the tailoring stage scored it */
  matchScore: number | null;
  /** Number of events applied; also the sequence of the latest event */
  version: number;
  createdAt: string;
  updatedAt: string;
}

export type EventCause =
  | 'stage_success'
  | 'stage_failure'
  | 'manual_override'
  | 'timeout'
  | 'policy'
  | 'cancellation'
  | 'recovery';

/** An event before the repository assigns its global position. */
export interface NewApplicationEvent {
  id: string;
  applicationId: string;
  jobId: string;
  sequence: number;
  fromState: ApplicationState;
  toState: ApplicationState;
  trigger: string;
  cause: EventCause;
  attempt: number;
  lastError: FailureKind | null;
  reason: string | null;
  resumeId: string;
  confirmationToken: string | null;
  outcome: ApplicationOutcome | null;
  matchScore: number | null;
  occurredAt: string;
}

export interface ApplicationEvent extends NewApplicationEvent {
  /** Global, monotonically increasing across all applications */
  position: number;
}
