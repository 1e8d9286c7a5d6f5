import { randomUUID } from 'node:crypto';
import { vi } from 'vitest';
import { parseEnv } from '../../src/config/env.js';
import { loadSettings, type SettingsInput } from '../../src/config/settings.js';
import { MemoryRepository } from '../../src/db/memoryRepository.js';
import type { EventLog } from '../../src/events/EventLog.js';
import type { Clock } from '../../src/governor/types.js';
import { transition } from '../../src/lifecycle/stateMachine.js';
import type {
  Application,
  ApplicationState,
  AutomationLevel,
  Job,
  Requirements,
  Resume,
  TailoringMode,
} from '../../src/lifecycle/types.js';
import { Orchestrator } from '../../src/orchestrator/Orchestrator.js';
import { InMemorySessionProvider } from '../../src/sessions/InMemorySessionProvider.js';
import type { BrowserSession } from '../../src/sessions/types.js';
import { StageExecutorRegistry } from '../../src/workers/stageExecutors/registry.js';
import {
  defaultSubmissionResources,
  failed,
  succeeded,
  type AnalysisExecutor,
  type ConfirmationCheck,
  type DiscoveredPosting,
  type DiscoveryExecutor,
  type DiscoveryQuery,
  type ResourceRequest,
  type ResumeDraft,
  type StageContext,
  type StageOutcome,
  type SubmissionExecutor,
  type SubmissionReceipt,
  type TailoringExecutor,
} from '../../src/workers/stageExecutors/types.js';

// ── Scripted outcomes ──────────────────────────────────────────────────────

export type Step<T> = StageOutcome<T> | ((ctx: StageContext) => Promise<StageOutcome<T>>);

/** Plays queued steps in order, then the fallback forever. */
export class Script<T> {
  private readonly steps: Step<T>[] = [];
  calls = 0;

  constructor(private readonly fallback: () => StageOutcome<T>) {}

  queue(...steps: Step<T>[]): this {
    this.steps.push(...steps);
    return this;
  }

  async next(ctx: StageContext): Promise<StageOutcome<T>> {
    this.calls += 1;
    const step = this.steps.shift();
    if (step === undefined) return this.fallback();
    return typeof step === 'function' ? step(ctx) : step;
  }
}

/** A step that waits for `release()` before returning `outcome`. */
export function gate<T>(outcome: StageOutcome<T>): { step: Step<T>; release: () => void } {
  let release: () => void = () => {};
  const released = new Promise<void>((resolve) => {
    release = resolve;
  });
  return {
    step: async () => {
      await released;
      return outcome;
    },
    release,
  };
}

/** A step that only returns once its invocation is aborted. */
export function untilAborted<T>(): Step<T> {
  return (ctx) =>
    new Promise<StageOutcome<T>>((resolve) => {
      ctx.signal.addEventListener('abort', () => resolve(failed<T>('internal_error', 'aborted')), { once: true });
    });
}

export function after<T>(ms: number, outcome: StageOutcome<T>): Step<T> {
  return async () => {
    await new Promise<void>((resolve) => setTimeout(resolve, ms));
    return outcome;
  };
}

// ── Fake executors ─────────────────────────────────────────────────────────

export const REQUIREMENTS: Requirements = {
  skills: ['TypeScript', 'Postgres'],
  keywords: ['backend'],
  items: [{ category: 'technical', skill: 'Postgres', importance: 'required', yearsExperience: 3 }],
};

export const CONFIRMATION_TOKEN = 'CNF-123';

export class FakeDiscovery implements DiscoveryExecutor {
  readonly name = 'fake-discovery';
  readonly script = new Script<DiscoveredPosting[]>(() => succeeded([]));

  resources(query: DiscoveryQuery): ResourceRequest[] {
    return [{ kind: 'budget', resourceId: `discovery:${query.source}` }];
  }

  discover(_query: DiscoveryQuery, ctx: StageContext): Promise<StageOutcome<DiscoveredPosting[]>> {
    return this.script.next(ctx);
  }
}

export class FakeAnalysis implements AnalysisExecutor {
  readonly name = 'fake-analysis';
  readonly script = new Script<Requirements>(() => succeeded(REQUIREMENTS));

  resources(): ResourceRequest[] {
    return [{ kind: 'budget', resourceId: 'llm:fake' }];
  }

  analyze(_postingText: string, ctx: StageContext): Promise<StageOutcome<Requirements>> {
    return this.script.next(ctx);
  }
}

export class FakeTailoring implements TailoringExecutor {
  readonly name = 'fake-tailoring';
  readonly script = new Script<ResumeDraft>(() => succeeded({ content: 'Tailored resume', notes: null }));

  resources(): ResourceRequest[] {
    return [{ kind: 'budget', resourceId: 'llm:fake' }];
  }

  tailor(_resume: Resume, _requirements: Requirements, _mode: TailoringMode, ctx: StageContext): Promise<StageOutcome<ResumeDraft>> {
    return this.script.next(ctx);
  }
}

export class FakeSubmission implements SubmissionExecutor {
  readonly platform = '*';
  readonly submitScript = new Script<SubmissionReceipt>(() => succeeded({ confirmationToken: CONFIRMATION_TOKEN }));
  readonly confirmScript = new Script<ConfirmationCheck>(() =>
    succeeded({ confirmed: true, confirmationToken: CONFIRMATION_TOKEN }),
  );
  readonly sessions: (string | null)[] = [];
  inFlight = 0;
  maxInFlight = 0;

  resources(job: Job, application: Application): ResourceRequest[] {
    return defaultSubmissionResources(job, application);
  }

  async submit(
    session: BrowserSession | null,
    _resume: Resume,
    _job: Job,
    ctx: StageContext,
  ): Promise<StageOutcome<SubmissionReceipt>> {
    this.sessions.push(session?.id ?? null);
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      return await this.submitScript.next(ctx);
    } finally {
      this.inFlight -= 1;
    }
  }

  confirm(
    _session: BrowserSession | null,
    _job: Job,
    _application: Application,
    ctx: StageContext,
  ): Promise<StageOutcome<ConfirmationCheck>> {
    return this.confirmScript.next(ctx);
  }
}

/** The fake's submit path only, as for a platform with no way to check a submission. */
function withoutConfirmation(fake: FakeSubmission): SubmissionExecutor {
  return {
    platform: fake.platform,
    resources: (job, application) => fake.resources(job, application),
    submit: (session, resume, job, ctx) => fake.submit(session, resume, job, ctx),
  };
}

// ── Harness ────────────────────────────────────────────────────────────────

const TEST_SETTINGS: SettingsInput = {
  pollIntervalMs: 60_000,
  deferDelayMs: 5,
  backoff: { baseDelayMs: 1, maxDelayMs: 5, jitterRatio: 0 },
  confirmationPollMs: 5,
};

export interface HarnessOptions {
  settings?: SettingsInput;
  clock?: Clock;
  /** Leave these executors out of the registry */
  withoutSubmission?: boolean;
  withoutDiscovery?: boolean;
  /** Register a submission executor that cannot check for confirmation */
  withoutConfirmation?: boolean;
}

export function createHarness(opts: HarnessOptions = {}) {
  const repo = new MemoryRepository();
  const discovery = new FakeDiscovery();
  const analysis = new FakeAnalysis();
  const tailoring = new FakeTailoring();
  const submission = new FakeSubmission();

  const registry = new StageExecutorRegistry();
  if (!opts.withoutDiscovery) registry.registerDiscovery(discovery);
  registry.registerAnalysis(analysis);
  registry.registerTailoring(tailoring);
  if (!opts.withoutSubmission) {
    registry.registerSubmission(opts.withoutConfirmation ? withoutConfirmation(submission) : submission);
  }

  const sessionProvider = new InMemorySessionProvider();
  const orchestrator = new Orchestrator({
    repo,
    registry,
    sessionProvider,
    settings: loadSettings({ ...TEST_SETTINGS, ...opts.settings }, parseEnv({})),
    workerId: 'worker-test',
    clock: opts.clock,
    random: () => 0,
  });

  return { repo, registry, discovery, analysis, tailoring, submission, sessionProvider, orchestrator };
}

export type Harness = ReturnType<typeof createHarness>;

export interface SubmitOptions {
  sourceUrl?: string;
  automationLevel?: AutomationLevel;
  tailoringMode?: TailoringMode;
}

/** Register a resume for cand-1 and submit one job with it. */
export async function submitApplication(h: Harness, opts: SubmitOptions = {}): Promise<Application> {
  const resume = await h.orchestrator.registerResume({
    candidateId: 'cand-1',
    content: 'Jane Doe\nSoftware engineer. TypeScript, Node.js, Postgres.',
  });
  const { application } = await h.orchestrator.submitJob({
    candidateId: 'cand-1',
    resumeId: resume.id,
    automationLevel: opts.automationLevel ?? 'full',
    tailoringMode: opts.tailoringMode,
    job: {
      sourceUrl: opts.sourceUrl ?? 'https://boards.greenhouse.io/acme/jobs/123',
      title: 'Backend Engineer',
      company: 'Acme',
      postingText: 'We need a TypeScript engineer with 3 years of Postgres experience.',
    },
  });
  return application;
}

/**
 * Poll until the application rests in `state` with no dispatch running for it.
 * Only wait for states it rests in.
 */
export function waitForState(h: Harness, id: string, state: ApplicationState): Promise<Application> {
  return vi.waitFor(
    async () => {
      const app = await h.repo.getApplication(id);
      if (!app || app.state !== state) {
        throw new Error(`application ${id} is ${app?.state ?? 'missing'}, waiting for ${state}`);
      }
      if (h.orchestrator.scheduler.isInFlight(id)) throw new Error(`application ${id} is still in flight`);
      return app;
    },
    { timeout: 5_000, interval: 5 },
  );
}

export async function triggersOf(h: Harness, id: string): Promise<string[]> {
  return (await h.orchestrator.getStatus(id)).events.map((e) => e.trigger);
}

/** Commit a chain of triggers directly through the event log. */
export async function advance(eventLog: EventLog, app: Application, triggers: readonly string[]): Promise<Application> {
  let current = app;
  for (const trigger of triggers) {
    const { application, event } = transition(current, {
      trigger,
      eventId: randomUUID(),
      occurredAt: new Date().toISOString(),
    });
    const stored = await eventLog.append({
      expectedState: current.state,
      expectedVersion: current.version,
      application,
      event,
    });
    if (!stored) throw new Error(`could not commit ${trigger} for ${app.id}`);
    current = application;
  }
  return current;
}
