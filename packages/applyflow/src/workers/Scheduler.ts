import { randomUUID } from 'node:crypto';
import type { OrchestratorSettings } from '../config/settings.js';
import type { Repository } from '../db/types.js';
import { APPLICATION_TRIGGERS as T } from '../events/ApplicationEventTypes.js';
import type { EventLog } from '../events/EventLog.js';
import type { ResourceGovernor } from '../governor/ResourceGovernor.js';
import type { AcquireAllResult, Clock, Denial, LeaseHolder, ResourceRequest } from '../governor/types.js';
import {
  ApplicationBusyError,
  ApplicationNotFoundError,
  ConcurrentModificationError,
  IllegalTransitionError,
  OutcomeClosedError,
  ReplayMismatchError,
  SchedulerBusyError,
} from '../lifecycle/errors.js';
import { FINAL_OUTCOMES } from '../lifecycle/outcomes.js';
import { projectionDrift } from '../lifecycle/replay.js';
import { transition, type TransitionInput } from '../lifecycle/stateMachine.js';
import {
  ACTIVE_STATES,
  isTerminal,
  type Application,
  type ApplicationOutcome,
  type ApplicationState,
  type Job,
  type Resume,
  type StageName,
} from '../lifecycle/types.js';
import { errorMessage, getLogger, type Logger } from '../monitoring/logger.js';
import type { BrowserSession } from '../sessions/types.js';
import { classifyError } from './errorClassification.js';
import { decide, describeFailure, type RetryDecision } from './retryPolicy.js';
import type { StageExecutorRegistry } from './stageExecutors/registry.js';
import {
  failed,
  type DiscoveredPosting,
  type DiscoveryQuery,
  type StageContext,
  type StageFailure,
  type StageOutcome,
  type SubmissionExecutor,
} from './stageExecutors/types.js';

// --- Dispatch table ---

type DispatchStep = 'analysis' | 'tailoring' | 'gate' | 'submission' | 'confirmation' | 'none';

/** What the scheduler does with an application in each state. */
export const DISPATCH_TABLE: Record<ApplicationState, DispatchStep> = {
  discovered: 'analysis',
  analyzed: 'tailoring',
  tailored: 'gate',
  submitting: 'submission',
  submitted: 'confirmation',
  needs_review: 'none',
  confirmed: 'none',
  failed: 'none',
  cancelled: 'none',
};

export type DispatchResult =
  | 'dispatched'
  | 'deferred'
  | 'in_flight'
  | 'not_found'
  | 'terminal'
  | 'not_eligible'
  | 'cancelled';

export type DiscoveryResult =
  | { status: 'completed'; postings: DiscoveredPosting[] }
  | { status: 'deferred'; retryAfterMs: number | null; reason: Denial['reason'] }
  | { status: 'failed'; failure: StageFailure };

export interface CancelResult {
  /** `pending` when a stage is running; the cancel lands when it returns */
  status: 'cancelled' | 'pending';
  application: Application;
}

export interface RecoveryReport {
  scanned: number;
  repaired: string[];
  interrupted: string[];
  requeued: number;
}

export interface SchedulerStats {
  running: boolean;
  workers: number;
  active: number;
  queued: number;
  pendingCancels: number;
}

export interface SchedulerOptions {
  repo: Repository;
  eventLog: EventLog;
  governor: ResourceGovernor;
  registry: StageExecutorRegistry;
  settings: OrchestratorSettings;
  workerId: string;
  clock?: Clock;
  /** Jitter source for the retry policy */
  random?: () => number;
  logger?: Logger;
}

const TIMED_OUT = Symbol('timed_out');
const DRAIN_TIMEOUT_MS = 30_000;

type Settled<T> = { outcome: StageOutcome<T> } | { error: unknown };

interface Invocation<T> {
  stage: StageName;
  applicationId: string;
  attempt: number;
  holder: LeaseHolder;
  requests: ResourceRequest[];
  preferSessionId?: string;
  /** Runs once leases are granted; returning false gives them back unused */
  beforeRun?: () => Promise<boolean>;
  run: (session: BrowserSession | null, ctx: StageContext) => Promise<StageOutcome<T>>;
}

type InvocationResult<T> =
  | { status: 'deferred'; denial: Denial }
  | { status: 'aborted' }
  | { status: 'completed'; outcome: StageOutcome<T>; timedOut: boolean };

/**
 * The only component that mutates application state.
 *
 * Applications wait in a ready queue keyed by the time they become due. Up to
 * `settings.workers` dispatches run at once; a dispatch holds both an
 * in-memory marker and a repository claim so no application ever has two
 * stage invocations in flight.
 */
export class Scheduler {
  private readonly repo: Repository;
  private readonly eventLog: EventLog;
  private readonly governor: ResourceGovernor;
  private readonly registry: StageExecutorRegistry;
  private readonly settings: OrchestratorSettings;
  private readonly workerId: string;
  private readonly clock: Clock;
  private readonly random: () => number;
  private readonly logger: Logger;

  private readonly queue = new Map<string, number>();
  private readonly active = new Map<string, Promise<unknown>>();
  private readonly pendingCancels = new Set<string>();
  /** Session each application last used, so the next stage can reuse it */
  private readonly affinity = new Map<string, string>();
  private readonly shutdown = new AbortController();

  private running = false;
  private wakeTimer: ReturnType<typeof setTimeout> | null = null;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(opts: SchedulerOptions) {
    this.repo = opts.repo;
    this.eventLog = opts.eventLog;
    this.governor = opts.governor;
    this.registry = opts.registry;
    this.settings = opts.settings;
    this.workerId = opts.workerId;
    this.clock = opts.clock ?? Date.now;
    this.random = opts.random ?? Math.random;
    this.logger = (opts.logger ?? getLogger()).child({ component: 'scheduler', workerId: opts.workerId });
  }

  // --- Lifecycle ---

  async start(): Promise<RecoveryReport> {
    const report = await this.recover();
    this.running = true;

    this.sweepTimer = setInterval(() => {
      this.sweep().catch((err) => {
        this.logger.warn('Scheduler sweep failed', { error: errorMessage(err) });
      });
    }, this.settings.pollIntervalMs);

    this.logger.info('Scheduler started', {
      workers: this.settings.workers,
      pollIntervalMs: this.settings.pollIntervalMs,
      ...report,
    });
    this.pump();
    return report;
  }

  /**
   * Stop dispatching and wait for in-flight stages. Stages still running after
   * `drainTimeoutMs` are signalled to abort.
   */
  async stop(drainTimeoutMs = DRAIN_TIMEOUT_MS): Promise<void> {
    this.running = false;
    if (this.wakeTimer) {
      clearTimeout(this.wakeTimer);
      this.wakeTimer = null;
    }
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }

    const deadline = Date.now() + drainTimeoutMs;
    while (this.active.size > 0 && Date.now() < deadline) {
      await new Promise((r) => setTimeout(r, 50));
    }
    if (this.active.size > 0) {
      this.logger.warn('Shutdown with stages still running; aborting them', {
        active: [...this.active.keys()],
      });
      this.shutdown.abort();
    }
  }

  get isRunning(): boolean {
    return this.running;
  }

  isInFlight(applicationId: string): boolean {
    return this.active.has(applicationId);
  }

  stats(): SchedulerStats {
    return {
      running: this.running,
      workers: this.settings.workers,
      active: this.active.size,
      queued: this.queue.size,
      pendingCancels: this.pendingCancels.size,
    };
  }

  /** Resolves once nothing is running and nothing due remains queued. */
  async whenIdle(timeoutMs = 10_000): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      const now = this.clock();
      const due = [...this.queue.values()].some((readyAt) => readyAt <= now);
      if (this.active.size === 0 && (!this.running || !due)) return;
      if (Date.now() >= deadline) throw new Error(`Scheduler not idle after ${timeoutMs}ms`);
      await new Promise((r) => setTimeout(r, 5));
    }
  }

  // --- Queue ---

  /** Make an application due after `delayMs`. */
  enqueue(applicationId: string, delayMs = 0): void {
    this.queue.set(applicationId, this.clock() + Math.max(0, delayMs));
    this.pump();
  }

  private pump(): void {
    if (!this.running) return;
    if (this.wakeTimer) {
      clearTimeout(this.wakeTimer);
      this.wakeTimer = null;
    }

    const now = this.clock();
    const due = [...this.queue.entries()]
      .filter(([id, readyAt]) => readyAt <= now && !this.active.has(id))
      .sort((a, b) => a[1] - b[1]);

    for (const [id] of due) {
      if (this.active.size >= this.settings.workers) break;
      this.queue.delete(id);
      this.dispatch(id).catch((err) => {
        this.logger.error('Dispatch failed', { applicationId: id, error: errorMessage(err) });
        if (this.running) this.enqueue(id, this.settings.backoff.maxDelayMs);
      });
    }

    if (this.active.size >= this.settings.workers) return;
    let earliest: number | null = null;
    for (const [id, readyAt] of this.queue) {
      if (readyAt <= now || this.active.has(id)) continue;
      if (earliest === null || readyAt < earliest) earliest = readyAt;
    }
    if (earliest !== null) {
      this.wakeTimer = setTimeout(() => this.pump(), earliest - now);
    }
  }

  // --- Dispatch ---

  /**
   * Run the next step for one application. A second call while the first is
   * still running returns `in_flight` without doing anything.
   */
  async dispatch(applicationId: string): Promise<DispatchResult> {
    if (this.active.has(applicationId)) return 'in_flight';
    const run = this.runDispatch(applicationId);
    this.active.set(applicationId, run);
    try {
      return await run;
    } finally {
      this.active.delete(applicationId);
      this.pump();
    }
  }

  private async runDispatch(applicationId: string): Promise<DispatchResult> {
    const initial = await this.repo.getApplication(applicationId);
    if (!initial) return 'not_found';
    if (isTerminal(initial.state)) {
      this.pendingCancels.delete(applicationId);
      return 'terminal';
    }

    const token = `${this.workerId}:${randomUUID()}`;
    if (!(await this.repo.claimDispatch(applicationId, token))) return 'in_flight';

    try {
      const app = await this.repo.getApplication(applicationId);
      if (!app || isTerminal(app.state)) return 'terminal';

      if (this.pendingCancels.has(applicationId)) {
        await this.applyCancel(app, 'Cancelled before the next stage started');
        return 'cancelled';
      }

      const result = await this.runStep(app);
      if (await this.honourPendingCancel(applicationId)) return 'cancelled';
      return result;
    } finally {
      await this.repo.releaseDispatch(applicationId, token);
    }
  }

  private async runStep(app: Application): Promise<DispatchResult> {
    const step = DISPATCH_TABLE[app.state];
    if (step === 'none') return 'not_eligible';

    const job = await this.repo.getJob(app.jobId);
    if (!job) throw new Error(`Job ${app.jobId} for application ${app.id} not found`);

    switch (step) {
      case 'analysis':
        return this.runAnalysis(app, job);
      case 'tailoring':
        return this.runTailoring(app, job);
      case 'gate':
        return this.runGate(app, job);
      case 'submission':
        return this.runSubmission(app, job, false);
      case 'confirmation':
        return this.runConfirmation(app, job);
    }
  }

  // --- Stages ---

  private async runAnalysis(app: Application, job: Job): Promise<DispatchResult> {
    if (job.requirements) {
      await this.commit(app, T.ANALYSIS_SUCCEEDED, { reason: 'Requirements already extracted for this job' });
      this.enqueue(app.id);
      return 'dispatched';
    }

    const executor = this.registry.getAnalysis();
    if (!executor) {
      await this.applyFailure(app, 'analysis', missingExecutor('analysis'), []);
      return 'dispatched';
    }

    const requests = executor.resources(job);
    const result = await this.invoke({
      stage: 'analysis',
      applicationId: app.id,
      attempt: app.attempt + 1,
      holder: { applicationId: app.id, stage: 'analysis' },
      requests,
      run: (_session, ctx) => executor.analyze(job.postingText, ctx),
    });
    if (result.status !== 'completed') return this.deferOrAbort(app.id, result);

    const latest = await this.stillCurrent(app);
    if (!latest) return 'dispatched';
    if (!result.outcome.ok) {
      await this.applyFailure(latest, 'analysis', result.outcome.failure, requests);
      return 'dispatched';
    }

    const requirements = await this.repo.setJobRequirements(job.id, result.outcome.value);
    await this.commit(latest, T.ANALYSIS_SUCCEEDED, {
      reason: `Extracted ${requirements.skills.length} skills and ${requirements.items.length} requirements`,
    });
    this.enqueue(app.id);
    return 'dispatched';
  }

  private async runTailoring(app: Application, job: Job): Promise<DispatchResult> {
    const executor = this.registry.getTailoring();
    const requirements = job.requirements;
    if (!executor || !requirements) {
      const failure = executor ? missingRequirements(job.id) : missingExecutor('tailoring');
      await this.applyFailure(app, 'tailoring', failure, []);
      return 'dispatched';
    }

    const base = await this.repo.getResume(app.baseResumeId);
    if (!base) {
      await this.applyFailure(
        app,
        'tailoring',
        { kind: 'platform_rejected_input', message: `Base resume ${app.baseResumeId} not found` },
        [],
      );
      return 'dispatched';
    }

    const requests = executor.resources(job, app);
    const result = await this.invoke({
      stage: 'tailoring',
      applicationId: app.id,
      attempt: app.attempt + 1,
      holder: { applicationId: app.id, stage: 'tailoring' },
      requests,
      run: (_session, ctx) => executor.tailor(base, requirements, app.tailoringMode, ctx),
    });
    if (result.status !== 'completed') return this.deferOrAbort(app.id, result);

    const latest = await this.stillCurrent(app);
    if (!latest) return 'dispatched';
    if (!result.outcome.ok) {
      await this.applyFailure(latest, 'tailoring', result.outcome.failure, requests);
      return 'dispatched';
    }

    const draft = result.outcome.value;
    const tailored: Resume = {
      id: randomUUID(),
      candidateId: app.candidateId,
      parentId: base.id,
      tailoringMode: app.tailoringMode,
      content: draft.content,
      lineage: { jobId: job.id, applicationId: app.id, attempt: app.attempt },
      createdAt: new Date(this.clock()).toISOString(),
    };
    await this.repo.putResume(tailored);
    await this.commit(latest, T.TAILORING_SUCCEEDED, {
      resumeId: tailored.id,
      matchScore: draft.matchScore ?? null,
      reason: draft.notes ?? `Resume tailored (${app.tailoringMode})`,
    });
    this.enqueue(app.id);
    return 'dispatched';
  }

  /** Tailored applications either wait for approval or go straight to submission. */
  private async runGate(app: Application, job: Job): Promise<DispatchResult> {
    if (app.automationLevel === 'assisted') {
      await this.commit(app, T.APPROVAL_REQUIRED, { reason: 'Waiting for approval before submission' });
      return 'dispatched';
    }
    return this.runSubmission(app, job, true);
  }

  /**
   * Submit. From `tailored` the submission leases are taken first and the
   * `auto_submit` transition is only committed once they are held.
   */
  private async runSubmission(app: Application, job: Job, fromGate: boolean): Promise<DispatchResult> {
    const executor = this.registry.getSubmission(job.platform);
    let current = app;

    if (!executor) {
      if (fromGate) current = await this.commit(current, T.AUTO_SUBMIT, { reason: 'Automatic submission' });
      await this.applyFailure(current, 'submission', missingExecutor(`submission (${job.platform})`), []);
      return 'dispatched';
    }

    const resume = await this.repo.getResume(app.resumeId);
    if (!resume) throw new Error(`Resume ${app.resumeId} for application ${app.id} not found`);

    const requests = executor.resources(job, app);
    const result = await this.invoke({
      stage: 'submission',
      applicationId: app.id,
      attempt: app.attempt + 1,
      holder: { applicationId: app.id, stage: 'submission' },
      requests,
      preferSessionId: this.affinity.get(app.id),
      beforeRun: fromGate
        ? async () => {
            current = await this.commit(current, T.AUTO_SUBMIT, { reason: 'Automatic submission' });
            return true;
          }
        : undefined,
      run: (session, ctx) => executor.submit(session, resume, job, ctx),
    });
    if (result.status !== 'completed') return this.deferOrAbort(app.id, result);

    const latest = await this.stillCurrent(current);
    if (!latest) return 'dispatched';
    if (!result.outcome.ok) {
      await this.applyFailure(latest, 'submission', result.outcome.failure, requests);
      return 'dispatched';
    }

    const { confirmationToken } = result.outcome.value;
    if (confirmationToken) {
      await this.commit(latest, T.SUBMISSION_CONFIRMED, {
        confirmationToken,
        reason: 'Submission confirmed by the platform',
      });
      return 'dispatched';
    }

    if (!executor.confirm) {
      await this.commit(latest, T.SUBMISSION_CONFIRMED, {
        confirmationToken: null,
        reason: `Submitted; ${job.platform} gives no confirmation token or check`,
      });
      return 'dispatched';
    }

    await this.commit(latest, T.SUBMISSION_ACCEPTED, { reason: 'Submitted; waiting for platform confirmation' });
    this.enqueue(app.id, this.settings.confirmationPollMs);
    return 'dispatched';
  }

  private async runConfirmation(app: Application, job: Job): Promise<DispatchResult> {
    const executor: SubmissionExecutor | undefined = this.registry.getSubmission(job.platform);
    const confirm = executor?.confirm?.bind(executor);
    if (!executor || !confirm) {
      // The platform already accepted it; nothing left that could confirm it
      await this.commit(app, T.SUBMISSION_CONFIRMED, {
        confirmationToken: null,
        reason: `Submitted; no confirmation check available for ${job.platform}`,
      });
      return 'dispatched';
    }

    const waitedMs = this.clock() - Date.parse(app.submittedAt ?? app.updatedAt);
    if (waitedMs >= this.settings.confirmationTimeoutMs) {
      const hours = Math.round(this.settings.confirmationTimeoutMs / 3_600_000);
      await this.commit(app, T.STAGE_FAILED, {
        lastError: 'timeout',
        reason: `No platform confirmation within ${hours}h of submission; check the platform before applying again`,
      });
      await this.governor.releaseHolder(app.id);
      return 'dispatched';
    }

    const requests = executor.confirmationResources?.(job, app) ?? [];
    const result = await this.invoke({
      stage: 'confirmation',
      applicationId: app.id,
      attempt: app.attempt + 1,
      holder: { applicationId: app.id, stage: 'confirmation' },
      requests,
      preferSessionId: this.affinity.get(app.id),
      run: (session, ctx) => confirm(session, job, app, ctx),
    });
    if (result.status !== 'completed') return this.deferOrAbort(app.id, result);

    const latest = await this.stillCurrent(app);
    if (!latest) return 'dispatched';
    if (!result.outcome.ok) {
      await this.applyFailure(latest, 'confirmation', result.outcome.failure, requests);
      return 'dispatched';
    }

    const check = result.outcome.value;
    if (check.confirmed) {
      await this.commit(latest, T.SUBMISSION_CONFIRMED, {
        confirmationToken: check.confirmationToken,
        reason: 'Submission confirmed by the platform',
      });
    } else {
      this.enqueue(app.id, this.settings.confirmationPollMs);
    }
    return 'dispatched';
  }

  /** Run discovery under the governor and a deadline. Nothing is persisted here. */
  async runDiscovery(query: DiscoveryQuery): Promise<DiscoveryResult> {
    const executor = this.registry.getDiscovery();
    if (!executor) return { status: 'failed', failure: missingExecutor('discovery') };

    const result = await this.invoke({
      stage: 'discovery',
      applicationId: '',
      attempt: 1,
      holder: { applicationId: `discovery:${randomUUID()}`, stage: 'discovery' },
      requests: executor.resources(query),
      run: (_session, ctx) => executor.discover(query, ctx),
    });

    switch (result.status) {
      case 'deferred':
        return { status: 'deferred', retryAfterMs: result.denial.retryAfterMs, reason: result.denial.reason };
      case 'aborted':
        return { status: 'failed', failure: { kind: 'internal_error', message: 'Discovery aborted' } };
      case 'completed':
        return result.outcome.ok
          ? { status: 'completed', postings: result.outcome.value }
          : { status: 'failed', failure: result.outcome.failure };
    }
  }

  // --- Invocation ---

  private async invoke<T>(inv: Invocation<T>): Promise<InvocationResult<T>> {
    let acquired: AcquireAllResult;
    try {
      acquired = await this.governor.acquireAll(inv.requests, inv.holder, {
        preferSessionId: inv.preferSessionId,
      });
    } catch (err) {
      // Opening a session is the one acquisition step that talks to the outside world
      return { status: 'completed', outcome: { ok: false, failure: classifyError(err) }, timedOut: false };
    }
    if (!acquired.ok) return { status: 'deferred', denial: acquired };

    if (inv.beforeRun) {
      let proceed: boolean;
      try {
        proceed = await inv.beforeRun();
      } catch (err) {
        await this.governor.releaseAll(acquired.leases, { refund: true });
        throw err;
      }
      if (!proceed) {
        await this.governor.releaseAll(acquired.leases, { refund: true });
        return { status: 'aborted' };
      }
    }

    const { outcome, timedOut } = await this.runWithDeadline(inv, acquired.session);
    await this.governor.releaseAll(acquired.leases, {
      sessionErrored: !outcome.ok,
      discardSession: timedOut,
    });

    if (inv.applicationId) {
      if (acquired.session && !timedOut) this.affinity.set(inv.applicationId, acquired.session.id);
      else if (timedOut) this.affinity.delete(inv.applicationId);
    }
    return { status: 'completed', outcome, timedOut };
  }

  /**
   * Race the executor against the stage deadline. On timeout the signal is
   * aborted and whatever the executor returns later is logged and dropped.
   */
  private async runWithDeadline<T>(
    inv: Invocation<T>,
    session: BrowserSession | null,
  ): Promise<{ outcome: StageOutcome<T>; timedOut: boolean }> {
    const timeoutMs = this.settings.stageTimeoutsMs[inv.stage];
    const controller = new AbortController();
    const onShutdown = () => controller.abort();
    this.shutdown.signal.addEventListener('abort', onShutdown, { once: true });

    const ctx: StageContext = {
      applicationId: inv.applicationId,
      stage: inv.stage,
      attempt: inv.attempt,
      deadline: this.clock() + timeoutMs,
      signal: controller.signal,
      logger: this.logger.child({ applicationId: inv.applicationId, stage: inv.stage }),
    };

    let timedOut = false;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const work = Promise.resolve()
      .then(() => inv.run(session, ctx))
      .then(
        (outcome): Settled<T> => {
          if (timedOut) ctx.logger.warn('Discarding stage result that arrived after the deadline', { ok: outcome.ok });
          return { outcome };
        },
        (error: unknown): Settled<T> => {
          if (timedOut) {
            ctx.logger.warn('Discarding stage error that arrived after the deadline', { error: errorMessage(error) });
          }
          return { error };
        },
      );
    const deadline = new Promise<typeof TIMED_OUT>((resolve) => {
      timer = setTimeout(() => resolve(TIMED_OUT), timeoutMs);
    });

    try {
      const settled = await Promise.race([work, deadline]);
      if (settled === TIMED_OUT) {
        timedOut = true;
        controller.abort();
        ctx.logger.warn('Stage timed out', { timeoutMs });
        return { outcome: failed('timeout', `${inv.stage} did not finish within ${timeoutMs}ms`), timedOut: true };
      }
      if ('error' in settled) {
        ctx.logger.warn('Stage executor threw', { error: errorMessage(settled.error) });
        return { outcome: { ok: false, failure: classifyError(settled.error) }, timedOut: false };
      }
      return { outcome: settled.outcome, timedOut: false };
    } finally {
      clearTimeout(timer);
      this.shutdown.signal.removeEventListener('abort', onShutdown);
    }
  }

  private deferOrAbort(
    applicationId: string,
    result: { status: 'deferred'; denial: Denial } | { status: 'aborted' },
  ): DispatchResult {
    if (result.status === 'aborted') return 'dispatched';
    const delay = result.denial.retryAfterMs ?? this.settings.deferDelayMs;
    this.logger.debug('Dispatch deferred', {
      applicationId,
      resourceId: result.denial.resourceId,
      reason: result.denial.reason,
      delayMs: delay,
    });
    this.enqueue(applicationId, delay);
    return 'deferred';
  }

  // --- Outcomes ---

  private async applyFailure(
    app: Application,
    stage: StageName,
    failure: StageFailure,
    requests: readonly ResourceRequest[],
  ): Promise<void> {
    const attemptsMade = app.attempt + 1;
    const refillDelayMs = failure.kind === 'rate_limited' ? this.refillDelay(requests) : undefined;
    const decision = decide(failure, attemptsMade, this.settings.maxAttempts, {
      backoff: this.settings.backoff,
      random: this.random,
      refillDelayMs,
    });
    // Review only exists for submissions; anywhere else the signal is final
    const effective: RetryDecision =
      decision.action === 'review' && app.state !== 'submitting' ? { action: 'fail' } : decision;
    const reason = describeFailure(stage, failure, attemptsMade, this.settings.maxAttempts, effective);
    const fields = { attempt: attemptsMade, lastError: failure.kind, reason };

    this.logger.info('Stage failed', {
      applicationId: app.id,
      stage,
      kind: failure.kind,
      attempt: attemptsMade,
      decision: effective.action,
    });

    switch (effective.action) {
      case 'retry_after':
        await this.commit(app, T.STAGE_RETRY, fields);
        this.enqueue(app.id, effective.delayMs);
        return;
      case 'retry_now':
        await this.commit(app, T.STAGE_RETRY, fields);
        this.enqueue(app.id);
        return;
      case 'review':
        await this.commit(app, T.AUTOMATION_DETECTED, fields);
        return;
      case 'fail':
        await this.commit(app, T.STAGE_FAILED, fields);
        await this.governor.releaseHolder(app.id);
        return;
    }
  }

  private refillDelay(requests: readonly ResourceRequest[]): number | undefined {
    let longest: number | undefined;
    for (const req of requests) {
      if (req.kind !== 'budget') continue;
      const delay = this.governor.refillDelayMs(req.resourceId);
      if (delay > 0 && (longest === undefined || delay > longest)) longest = delay;
    }
    return longest;
  }

  /**
   * Re-read the application after a stage returns. Null when it moved on in
   * the meantime, in which case the result is dropped.
   */
  private async stillCurrent(app: Application): Promise<Application | null> {
    const latest = await this.repo.getApplication(app.id);
    if (!latest || latest.version !== app.version || isTerminal(latest.state)) {
      this.logger.warn('Discarding stage result for an application that moved on', {
        applicationId: app.id,
        expectedVersion: app.version,
        actualVersion: latest?.version ?? null,
        state: latest?.state ?? null,
      });
      return null;
    }
    return latest;
  }

  /** Apply a trigger and append its event atomically. */
  private async commit(
    app: Application,
    trigger: string,
    fields: Omit<TransitionInput, 'trigger' | 'eventId' | 'occurredAt'> = {},
  ): Promise<Application> {
    const { application, event } = transition(app, {
      ...fields,
      trigger,
      eventId: randomUUID(),
      occurredAt: new Date(this.clock()).toISOString(),
    });

    const stored = await this.eventLog.append({
      expectedState: app.state,
      expectedVersion: app.version,
      application,
      event,
    });
    if (!stored) throw new ConcurrentModificationError(app.id, app.state, app.version);

    if (isTerminal(application.state)) {
      this.affinity.delete(app.id);
      this.queue.delete(app.id);
      this.pendingCancels.delete(app.id);
    }
    this.logger.info('Application transitioned', {
      applicationId: app.id,
      trigger,
      from: app.state,
      to: application.state,
      sequence: stored.sequence,
    });
    return application;
  }

  // --- Control operations ---

  async approve(applicationId: string, reason?: string): Promise<Application> {
    return this.exclusive(applicationId, async (app) => {
      const next = await this.commit(app, T.APPROVED, { reason: reason ?? 'Approved for submission' });
      this.enqueue(applicationId);
      return next;
    });
  }

  async reject(applicationId: string, reason?: string): Promise<Application> {
    return this.exclusive(applicationId, async (app) => {
      const next = await this.commit(app, T.REJECTED, { reason: reason ?? 'Rejected during review' });
      await this.governor.releaseHolder(applicationId);
      return next;
    });
  }

  /**
   * Cancel an application. If a stage is running the cancel is recorded and
   * applied as soon as it returns.
   */
  async cancel(applicationId: string, reason?: string): Promise<CancelResult> {
    if (this.active.has(applicationId)) {
      const app = await this.repo.getApplication(applicationId);
      if (!app) throw new ApplicationNotFoundError(applicationId);
      if (isTerminal(app.state)) throw new IllegalTransitionError(app.state, T.CANCEL);
      this.pendingCancels.add(applicationId);
      this.logger.info('Cancellation pending until the running stage returns', { applicationId });
      return { status: 'pending', application: app };
    }

    const application = await this.exclusive(applicationId, (app) =>
      this.applyCancel(app, reason ?? 'Cancelled by request'),
    );
    return { status: 'cancelled', application };
  }

  /**
   * Record what the employer did with a confirmed application. A final
   * outcome (rejected, accepted, withdrawn, expired) cannot be replaced.
   */
  async recordOutcome(applicationId: string, outcome: ApplicationOutcome, reason?: string): Promise<Application> {
    return this.exclusive(applicationId, async (app) => {
      if (app.outcome !== null && FINAL_OUTCOMES.has(app.outcome)) {
        throw new OutcomeClosedError(applicationId, app.outcome);
      }
      return this.commit(app, T.OUTCOME_RECORDED, {
        outcome,
        reason: reason ?? `Outcome recorded: ${outcome}`,
      });
    });
  }

  private async applyCancel(app: Application, reason: string): Promise<Application> {
    const next = await this.commit(app, T.CANCEL, { reason });
    await this.governor.releaseHolder(app.id);
    return next;
  }

  private async honourPendingCancel(applicationId: string): Promise<boolean> {
    if (!this.pendingCancels.has(applicationId)) return false;
    this.pendingCancels.delete(applicationId);
    const app = await this.repo.getApplication(applicationId);
    if (!app || isTerminal(app.state)) return false;
    await this.applyCancel(app, 'Cancelled while a stage was running');
    return true;
  }

  /** Run `fn` holding the same markers a dispatch holds. */
  private async exclusive<R>(applicationId: string, fn: (app: Application) => Promise<R>): Promise<R> {
    if (this.active.has(applicationId)) throw new ApplicationBusyError(applicationId);

    const run = (async () => {
      const token = `${this.workerId}:${randomUUID()}`;
      if (!(await this.repo.getApplication(applicationId))) throw new ApplicationNotFoundError(applicationId);
      if (!(await this.repo.claimDispatch(applicationId, token))) throw new ApplicationBusyError(applicationId);
      try {
        const app = await this.repo.getApplication(applicationId);
        if (!app) throw new ApplicationNotFoundError(applicationId);
        return await fn(app);
      } finally {
        await this.repo.releaseDispatch(applicationId, token);
      }
    })();

    this.active.set(applicationId, run);
    try {
      return await run;
    } finally {
      this.active.delete(applicationId);
      this.pump();
    }
  }

  // --- Recovery and sweeps ---

  /**
   * Rebuild every live application from its events, repair projection drift,
   * and queue the ones with work left. A submission cut off by a restart is
   * not retried blind: it goes to review.
   *
   * Only valid before dispatching starts: with work in flight, this worker's
   * live claims would look stale.
   *
   * @throws SchedulerBusyError while the scheduler runs or a dispatch is active
   */
  async recover(): Promise<RecoveryReport> {
    if (this.running || this.active.size > 0) throw new SchedulerBusyError('recover');
    const stale = new Set(await this.repo.clearDispatchClaims(this.workerId));
    const apps = await this.repo.listApplications({ states: ACTIVE_STATES });
    const report: RecoveryReport = { scanned: apps.length, repaired: [], interrupted: [], requeued: 0 };

    for (const stored of apps) {
      let app: Application;
      try {
        app = await this.eventLog.rebuild(stored);
      } catch (err) {
        if (!(err instanceof ReplayMismatchError)) throw err;
        this.logger.error('Event log does not replay; leaving application untouched', {
          applicationId: stored.id,
          error: err.message,
        });
        continue;
      }

      const drift = projectionDrift(stored, app);
      if (drift.length > 0) {
        this.logger.warn('Repairing projection drift from event log', { applicationId: app.id, fields: drift });
        await this.repo.putApplication(app);
        report.repaired.push(app.id);
      }
      if (isTerminal(app.state)) continue;

      if (app.state === 'submitting' && stale.has(app.id)) {
        await this.commit(app, T.INTERRUPTED, {
          reason: 'Submission was interrupted by a restart; verify on the platform before approving',
        });
        report.interrupted.push(app.id);
        continue;
      }

      if (DISPATCH_TABLE[app.state] !== 'none') {
        this.queue.set(app.id, this.clock());
        report.requeued++;
      }
    }

    return report;
  }

  /**
   * Periodic housekeeping: reclaim expired leases, time out stale reviews and
   * pick up live applications that are neither queued nor running.
   */
  async sweep(): Promise<void> {
    this.governor.sweepExpired();
    const now = this.clock();

    const apps = await this.repo.listApplications({ states: ACTIVE_STATES });
    for (const app of apps) {
      if (this.active.has(app.id)) continue;

      if (app.state === 'needs_review') {
        const waitedMs = now - Date.parse(app.updatedAt);
        if (waitedMs >= this.settings.reviewTimeoutMs) await this.expireReview(app.id);
        continue;
      }

      if (!this.queue.has(app.id) && DISPATCH_TABLE[app.state] !== 'none') {
        this.queue.set(app.id, now);
      }
    }
    this.pump();
  }

  private async expireReview(applicationId: string): Promise<void> {
    try {
      await this.exclusive(applicationId, async (app) => {
        if (app.state !== 'needs_review') return app;
        const hours = Math.round(this.settings.reviewTimeoutMs / 3_600_000);
        const next = await this.commit(app, T.REVIEW_TIMEOUT, {
          reason: `No review decision within ${hours}h; cancelled automatically`,
        });
        await this.governor.releaseHolder(applicationId);
        return next;
      });
    } catch (err) {
      if (!(err instanceof ApplicationBusyError)) throw err;
      this.logger.debug('Review timeout skipped; application busy', { applicationId });
    }
  }
}

function missingExecutor(stage: string): StageFailure {
  return { kind: 'platform_rejected_input', message: `No executor registered for ${stage}` };
}

function missingRequirements(jobId: string): StageFailure {
  return { kind: 'internal_error', message: `Job ${jobId} has no extracted requirements` };
}
