import type {
  Application,
  ApplicationEvent,
  ApplicationState,
  Job,
  NewApplicationEvent,
  Requirements,
  Resume,
} from '../lifecycle/types.js';

export interface InsertApplicationResult {
  application: Application;
  /** false when an active application for the same (job, candidate) already existed */
  created: boolean;
}

export interface CommitTransitionInput {
  expectedState: ApplicationState;
  expectedVersion: number;
  application: Application;
  event: NewApplicationEvent;
}

export interface ApplicationFilter {
  states?: readonly ApplicationState[];
}

/**
 * Storage behind the orchestrator. Only the scheduler calls the mutating
 * application methods; everything else reads.
 */
export interface Repository {
  putJob(job: Job): Promise<void>;
  getJob(id: string): Promise<Job | null>;
  findJobBySourceUrl(sourceUrl: string): Promise<Job | null>;
  /** First writer wins; returns the requirements now stored on the job. */
  setJobRequirements(jobId: string, requirements: Requirements): Promise<Requirements>;

  putResume(resume: Resume): Promise<void>;
  getResume(id: string): Promise<Resume | null>;

  /** At most one application per (job, candidate) outside failed/cancelled. */
  insertApplication(application: Application): Promise<InsertApplicationResult>;
  getApplication(id: string): Promise<Application | null>;
  listApplications(filter?: ApplicationFilter): Promise<Application[]>;
  /** Overwrite the projection. Used only to repair drift found during recovery. */
  putApplication(application: Application): Promise<void>;

  /**
   * Compare-and-swap on (state, version), atomic with the event append.
   * Returns the stored event, or null when the application moved on.
   */
  commitTransition(input: CommitTransitionInput): Promise<ApplicationEvent | null>;
  listEvents(applicationId: string): Promise<ApplicationEvent[]>;
  listEventsAfter(position: number, limit: number): Promise<ApplicationEvent[]>;

  /** Persisted in-flight marker. Returns false if another token holds it. */
  claimDispatch(applicationId: string, token: string): Promise<boolean>;
  releaseDispatch(applicationId: string, token: string): Promise<void>;
  /** Drop claims left behind by a previous run of `workerId`; returns the affected application ids. */
  clearDispatchClaims(workerId: string): Promise<string[]>;
}
