import type {
  Application,
  ApplicationEvent,
  Job,
  Requirements,
  Resume,
} from '../lifecycle/types.js';
import type {
  ApplicationFilter,
  CommitTransitionInput,
  InsertApplicationResult,
  Repository,
} from './types.js';

const INACTIVE_STATES = new Set(['failed', 'cancelled']);

/**
 * In-process repository. Every value crossing the boundary is cloned so
 * callers can never mutate stored state by reference.
 */
export class MemoryRepository implements Repository {
  private jobs = new Map<string, Job>();
  private resumes = new Map<string, Resume>();
  private applications = new Map<string, Application>();
  private events: ApplicationEvent[] = [];
  private claims = new Map<string, string>();
  private nextPosition = 1;

  async putJob(job: Job): Promise<void> {
    this.jobs.set(job.id, structuredClone(job));
  }

  async getJob(id: string): Promise<Job | null> {
    const job = this.jobs.get(id);
    return job ? structuredClone(job) : null;
  }

  async findJobBySourceUrl(sourceUrl: string): Promise<Job | null> {
    for (const job of this.jobs.values()) {
      if (job.sourceUrl === sourceUrl) return structuredClone(job);
    }
    return null;
  }

  async setJobRequirements(jobId: string, requirements: Requirements): Promise<Requirements> {
    const job = this.jobs.get(jobId);
    if (!job) throw new Error(`Job not found: ${jobId}`);
    if (job.requirements === null) {
      job.requirements = structuredClone(requirements);
    }
    return structuredClone(job.requirements);
  }

  async putResume(resume: Resume): Promise<void> {
    this.resumes.set(resume.id, structuredClone(resume));
  }

  async getResume(id: string): Promise<Resume | null> {
    const resume = this.resumes.get(id);
    return resume ? structuredClone(resume) : null;
  }

  async insertApplication(application: Application): Promise<InsertApplicationResult> {
    for (const existing of this.applications.values()) {
      if (
        existing.jobId === application.jobId &&
        existing.candidateId === application.candidateId &&
        !INACTIVE_STATES.has(existing.state)
      ) {
        return { application: structuredClone(existing), created: false };
      }
    }
    this.applications.set(application.id, structuredClone(application));
    return { application: structuredClone(application), created: true };
  }

  async getApplication(id: string): Promise<Application | null> {
    const app = this.applications.get(id);
    return app ? structuredClone(app) : null;
  }

  async listApplications(filter: ApplicationFilter = {}): Promise<Application[]> {
    const result: Application[] = [];
    for (const app of this.applications.values()) {
      if (filter.states && !filter.states.includes(app.state)) continue;
      result.push(structuredClone(app));
    }
    return result;
  }

  async putApplication(application: Application): Promise<void> {
    this.applications.set(application.id, structuredClone(application));
  }

  async commitTransition(input: CommitTransitionInput): Promise<ApplicationEvent | null> {
    const current = this.applications.get(input.application.id);
    if (!current || current.state !== input.expectedState || current.version !== input.expectedVersion) {
      return null;
    }
    const stored: ApplicationEvent = { ...structuredClone(input.event), position: this.nextPosition++ };
    this.applications.set(current.id, structuredClone(input.application));
    this.events.push(stored);
    return structuredClone(stored);
  }

  async listEvents(applicationId: string): Promise<ApplicationEvent[]> {
    return this.events
      .filter((e) => e.applicationId === applicationId)
      .sort((a, b) => a.sequence - b.sequence)
      .map((e) => structuredClone(e));
  }

  async listEventsAfter(position: number, limit: number): Promise<ApplicationEvent[]> {
    return this.events
      .filter((e) => e.position > position)
      .slice(0, limit)
      .map((e) => structuredClone(e));
  }

  async claimDispatch(applicationId: string, token: string): Promise<boolean> {
    const holder = this.claims.get(applicationId);
    if (holder !== undefined && holder !== token) return false;
    this.claims.set(applicationId, token);
    return true;
  }

  async releaseDispatch(applicationId: string, token: string): Promise<void> {
    if (this.claims.get(applicationId) === token) {
      this.claims.delete(applicationId);
    }
  }

  async clearDispatchClaims(workerId: string): Promise<string[]> {
    const cleared: string[] = [];
    for (const [applicationId, token] of this.claims) {
      if (token.startsWith(`${workerId}:`)) {
        cleared.push(applicationId);
        this.claims.delete(applicationId);
      }
    }
    return cleared;
  }
}
