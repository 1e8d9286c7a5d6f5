import { randomUUID } from 'node:crypto';
import { detectPlatform, type Platform } from '../config/resources.js';
import { loadSettings, type OrchestratorSettings } from '../config/settings.js';
import type { Repository } from '../db/types.js';
import { EventLog, type EventListener } from '../events/EventLog.js';
import { ResourceGovernor } from '../governor/ResourceGovernor.js';
import type { Clock } from '../governor/types.js';
import type { RedisEventPublisher } from '../lib/redis-streams.js';
import {
  ApplicationNotFoundError,
  ResumeNotFoundError,
  ResumeOwnershipError,
} from '../lifecycle/errors.js';
import { requiresFollowUp } from '../lifecycle/outcomes.js';
import { initialApplication } from '../lifecycle/replay.js';
import type {
  Application,
  ApplicationEvent,
  ApplicationOutcome,
  AutomationLevel,
  Job,
  Resume,
  TailoringMode,
} from '../lifecycle/types.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import { SessionPool } from '../sessions/SessionPool.js';
import type { SessionProvider } from '../sessions/types.js';
import {
  Scheduler,
  type CancelResult,
  type DiscoveryResult,
  type RecoveryReport,
  type SchedulerStats,
} from '../workers/Scheduler.js';
import type { StageExecutorRegistry } from '../workers/stageExecutors/registry.js';
import type { DiscoveryQuery } from '../workers/stageExecutors/types.js';

export interface OrchestratorOptions {
  repo: Repository;
  registry: StageExecutorRegistry;
  sessionProvider: SessionProvider;
  settings?: OrchestratorSettings;
  workerId?: string;
  publisher?: RedisEventPublisher;
  clock?: Clock;
  random?: () => number;
  logger?: Logger;
}

export interface RegisterResumeInput {
  candidateId: string;
  content: string;
}

export interface JobInput {
  sourceUrl: string;
  title: string;
  company: string;
  postingText: string;
  /** Detected from the URL when omitted */
  platform?: Platform;
}

export interface SubmitJobInput {
  job: JobInput;
  candidateId: string;
  resumeId: string;
  tailoringMode?: TailoringMode;
  automationLevel?: AutomationLevel;
}

export interface SubmitJobResult {
  application: Application;
  /** false when an active application for this job and candidate already existed */
  created: boolean;
}

export interface ApplicationStatus {
  application: Application;
  job: Job | null;
  resume: Resume | null;
  events: ApplicationEvent[];
  inFlight: boolean;
}

export type DiscoverDefaults = Omit<SubmitJobInput, 'job'>;

export type DiscoverResult =
  | { status: 'completed'; applications: SubmitJobResult[] }
  | Exclude<DiscoveryResult, { status: 'completed' }>;

/**
 * Entry point for everything outside the scheduler: resume registration,
 * job submission, status queries and the review/cancel controls.
 */
export class Orchestrator {
  readonly repo: Repository;
  readonly settings: OrchestratorSettings;
  readonly eventLog: EventLog;
  readonly sessionPool: SessionPool;
  readonly governor: ResourceGovernor;
  readonly scheduler: Scheduler;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(opts: OrchestratorOptions) {
    this.repo = opts.repo;
    this.settings = opts.settings ?? loadSettings();
    this.clock = opts.clock ?? Date.now;
    this.logger = (opts.logger ?? getLogger()).child({ component: 'orchestrator' });

    this.eventLog = new EventLog(opts.repo, { publisher: opts.publisher, logger: opts.logger });
    this.sessionPool = new SessionPool(opts.sessionProvider, {
      perPlatform: this.settings.sessions.perPlatform,
      maxConsecutiveErrors: this.settings.sessions.maxConsecutiveErrors,
      logger: opts.logger,
    });
    this.governor = new ResourceGovernor({
      overrides: this.settings.resources,
      sessionPool: this.sessionPool,
      clock: this.clock,
      logger: opts.logger,
    });
    this.scheduler = new Scheduler({
      repo: opts.repo,
      eventLog: this.eventLog,
      governor: this.governor,
      registry: opts.registry,
      settings: this.settings,
      workerId: opts.workerId ?? `worker-${randomUUID().slice(0, 8)}`,
      clock: this.clock,
      random: opts.random,
      logger: opts.logger,
    });
  }

  async start(): Promise<RecoveryReport> {
    return this.scheduler.start();
  }

  async stop(drainTimeoutMs?: number): Promise<void> {
    await this.scheduler.stop(drainTimeoutMs);
    await this.sessionPool.drain();
  }

  /** Recovery without starting; rejected with SchedulerBusyError once dispatching has begun. */
  recover(): Promise<RecoveryReport> {
    return this.scheduler.recover();
  }

  // --- Resumes ---

  async registerResume(input: RegisterResumeInput): Promise<Resume> {
    const resume: Resume = {
      id: randomUUID(),
      candidateId: input.candidateId,
      parentId: null,
      tailoringMode: null,
      content: input.content,
      lineage: null,
      createdAt: this.now(),
    };
    await this.repo.putResume(resume);
    return resume;
  }

  // --- Applications ---

  /**
   * Create (or return the existing) application of `candidateId` to a job.
   * Jobs are deduplicated by source URL.
   */
  async submitJob(input: SubmitJobInput): Promise<SubmitJobResult> {
    const resume = await this.repo.getResume(input.resumeId);
    if (!resume) throw new ResumeNotFoundError(input.resumeId);
    if (resume.candidateId !== input.candidateId) {
      throw new ResumeOwnershipError(input.resumeId, input.candidateId);
    }

    const job = await this.findOrCreateJob(input.job);
    const application = initialApplication({
      id: randomUUID(),
      jobId: job.id,
      candidateId: input.candidateId,
      baseResumeId: resume.id,
      tailoringMode: input.tailoringMode ?? this.settings.defaultTailoringMode,
      automationLevel: input.automationLevel ?? this.settings.defaultAutomationLevel,
      createdAt: this.now(),
    });

    const result = await this.repo.insertApplication(application);
    if (result.created) {
      this.logger.info('Application created', {
        applicationId: result.application.id,
        jobId: job.id,
        platform: job.platform,
        automationLevel: result.application.automationLevel,
      });
      this.scheduler.enqueue(result.application.id);
    }
    return result;
  }

  async getStatus(applicationId: string): Promise<ApplicationStatus> {
    const application = await this.repo.getApplication(applicationId);
    if (!application) throw new ApplicationNotFoundError(applicationId);

    const [job, resume, events] = await Promise.all([
      this.repo.getJob(application.jobId),
      this.repo.getResume(application.resumeId),
      this.eventLog.history(applicationId),
    ]);
    return { application, job, resume, events, inFlight: this.scheduler.isInFlight(applicationId) };
  }

  async listApplications(): Promise<Application[]> {
    return this.repo.listApplications();
  }

  approve(applicationId: string, reason?: string): Promise<Application> {
    return this.scheduler.approve(applicationId, reason);
  }

  reject(applicationId: string, reason?: string): Promise<Application> {
    return this.scheduler.reject(applicationId, reason);
  }

  cancel(applicationId: string, reason?: string): Promise<CancelResult> {
    return this.scheduler.cancel(applicationId, reason);
  }

  // --- Outcomes ---

  recordOutcome(applicationId: string, outcome: ApplicationOutcome, reason?: string): Promise<Application> {
    return this.scheduler.recordOutcome(applicationId, outcome, reason);
  }

  /** Submitted applications that have gone quiet, oldest submission first. */
  async listFollowUps(now: number = this.clock()): Promise<Application[]> {
    const apps = await this.repo.listApplications({ states: ['submitted', 'confirmed'] });
    return apps
      .filter((app) => requiresFollowUp(app, now))
      .sort((a, b) => Date.parse(a.submittedAt ?? a.updatedAt) - Date.parse(b.submittedAt ?? b.updatedAt));
  }

  // --- Discovery ---

  /** Run a discovery sweep and submit every posting it finds with `defaults`. */
  async discover(query: DiscoveryQuery, defaults: DiscoverDefaults): Promise<DiscoverResult> {
    const result = await this.scheduler.runDiscovery(query);
    if (result.status !== 'completed') return result;

    const applications: SubmitJobResult[] = [];
    for (const posting of result.postings) {
      applications.push(await this.submitJob({ ...defaults, job: posting }));
    }
    this.logger.info('Discovery completed', {
      source: query.source,
      postings: result.postings.length,
      created: applications.filter((a) => a.created).length,
    });
    return { status: 'completed', applications };
  }

  // --- Events ---

  subscribe(listener: EventListener, filter?: { applicationId?: string }): () => void {
    return this.eventLog.subscribe(listener, filter);
  }

  eventsAfter(position: number, limit?: number): Promise<ApplicationEvent[]> {
    return this.eventLog.after(position, limit);
  }

  stats(): { scheduler: SchedulerStats; sessions: ReturnType<SessionPool['stats']> } {
    return { scheduler: this.scheduler.stats(), sessions: this.sessionPool.stats() };
  }

  private async findOrCreateJob(input: JobInput): Promise<Job> {
    const existing = await this.repo.findJobBySourceUrl(input.sourceUrl);
    if (existing) return existing;

    const job: Job = {
      id: randomUUID(),
      sourceUrl: input.sourceUrl,
      platform: input.platform ?? detectPlatform(input.sourceUrl),
      title: input.title,
      company: input.company,
      postingText: input.postingText,
      requirements: null,
      createdAt: this.now(),
    };
    await this.repo.putJob(job);
    // Another caller may have created it first
    return (await this.repo.findJobBySourceUrl(input.sourceUrl)) ?? job;
  }

  private now(): string {
    return new Date(this.clock()).toISOString();
  }
}
