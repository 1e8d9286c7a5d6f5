import type { Application, Job, Resume } from '../../lifecycle/types.js';
import type { BrowserSession } from '../../sessions/types.js';
import { CATCH_ALL_PLATFORM } from './registry.js';
import {
  defaultSubmissionResources,
  succeeded,
  type ConfirmationCheck,
  type ResourceRequest,
  type StageContext,
  type StageOutcome,
  type SubmissionExecutor,
  type SubmissionReceipt,
} from './types.js';

export interface DryRunSubmissionOptions {
  platform?: string;
  /** When false, submit returns no token and the token arrives on the first confirmation check */
  confirmImmediately?: boolean;
  /** How many recent application ids `submitted` keeps (default 100) */
  historyLimit?: number;
}

/**
 * Submission executor for test mode: records the submission and returns a
 * synthetic confirmation without touching any platform.
 */
export class DryRunSubmissionExecutor implements SubmissionExecutor {
  readonly platform: string;
  private readonly confirmImmediately: boolean;
  private readonly historyLimit: number;
  private readonly recent: string[] = [];
  private total = 0;

  constructor(opts: DryRunSubmissionOptions = {}) {
    this.platform = opts.platform ?? CATCH_ALL_PLATFORM;
    this.confirmImmediately = opts.confirmImmediately ?? true;
    this.historyLimit = opts.historyLimit ?? 100;
  }

  /** Most recent submissions, oldest first */
  get submitted(): readonly string[] {
    return this.recent;
  }

  get submissionCount(): number {
    return this.total;
  }

  resources(job: Job, application: Application): ResourceRequest[] {
    return defaultSubmissionResources(job, application);
  }

  async submit(
    session: BrowserSession | null,
    resume: Resume,
    job: Job,
    ctx: StageContext,
  ): Promise<StageOutcome<SubmissionReceipt>> {
    this.total++;
    this.recent.push(ctx.applicationId);
    if (this.recent.length > this.historyLimit) this.recent.shift();
    ctx.logger.info('Dry-run submission', {
      jobId: job.id,
      platform: job.platform,
      resumeId: resume.id,
      sessionId: session?.id ?? null,
    });
    return succeeded({ confirmationToken: this.confirmImmediately ? tokenFor(ctx.applicationId) : null });
  }

  async confirm(
    _session: BrowserSession | null,
    _job: Job,
    application: Application,
  ): Promise<StageOutcome<ConfirmationCheck>> {
    return succeeded({ confirmed: true, confirmationToken: tokenFor(application.id) });
  }
}

function tokenFor(applicationId: string): string {
  return `DRYRUN-${applicationId}`;
}
