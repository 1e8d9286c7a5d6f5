import type { ResourceRequest } from '../../governor/types.js';
import type {
  Application,
  FailureKind,
  Job,
  Requirements,
  Resume,
  StageName,
  TailoringMode,
} from '../../lifecycle/types.js';
import type { Logger } from '../../monitoring/logger.js';
import type { BrowserSession } from '../../sessions/types.js';

export type { ResourceRequest };

export interface StageFailure {
  kind: FailureKind;
  message: string;
  retryAfterMs?: number;
}

/** What an executor returns. Executors may also throw; the scheduler classifies it. */
export type StageOutcome<T> = { ok: true; value: T } | { ok: false; failure: StageFailure };

export function succeeded<T>(value: T): StageOutcome<T> {
  return { ok: true, value };
}

export function failed<T = never>(kind: FailureKind, message: string, retryAfterMs?: number): StageOutcome<T> {
  return { ok: false, failure: retryAfterMs === undefined ? { kind, message } : { kind, message, retryAfterMs } };
}

export interface StageContext {
  /** Empty for discovery, which runs outside any application */
  applicationId: string;
  stage: StageName;
  attempt: number;
  /** Epoch ms after which the scheduler abandons the invocation */
  deadline: number;
  /** Aborted when the deadline passes or the orchestrator shuts down */
  signal: AbortSignal;
  logger: Logger;
}

// --- Discovery ---

export interface DiscoveryQuery {
  source: string;
  keywords: string[];
  location?: string;
  limit?: number;
}

export interface DiscoveredPosting {
  sourceUrl: string;
  title: string;
  company: string;
  postingText: string;
}

export interface DiscoveryExecutor {
  readonly name: string;
  resources(query: DiscoveryQuery): ResourceRequest[];
  discover(query: DiscoveryQuery, ctx: StageContext): Promise<StageOutcome<DiscoveredPosting[]>>;
}

// --- Analysis ---

export interface AnalysisExecutor {
  readonly name: string;
  resources(job: Job): ResourceRequest[];
  analyze(postingText: string, ctx: StageContext): Promise<StageOutcome<Requirements>>;
}

// --- Tailoring ---

export interface ResumeDraft {
  content: string;
  /** Short summary of what changed, kept in the status reason */
  notes: string | null;
  /** How well the tailored resume fits the job, 0..1 */
  matchScore?: number | null;
}

export interface TailoringExecutor {
  readonly name: string;
  resources(job: Job, application: Application): ResourceRequest[];
  tailor(
    resume: Resume,
    requirements: Requirements,
    mode: TailoringMode,
    ctx: StageContext,
  ): Promise<StageOutcome<ResumeDraft>>;
}

// --- Submission ---

export interface SubmissionReceipt {
  /** Present when the platform confirmed on the spot */
  confirmationToken: string | null;
}

export interface ConfirmationCheck {
  confirmed: boolean;
  confirmationToken: string | null;
}

export interface SubmissionExecutor {
  /** Platform this executor submits to, or '*' for a catch-all */
  readonly platform: string;
  resources(job: Job, application: Application): ResourceRequest[];
  submit(
    session: BrowserSession | null,
    resume: Resume,
    job: Job,
    ctx: StageContext,
  ): Promise<StageOutcome<SubmissionReceipt>>;
  /** Resources for a confirmation check; none when omitted */
  confirmationResources?(job: Job, application: Application): ResourceRequest[];
  confirm?(
    session: BrowserSession | null,
    job: Job,
    application: Application,
    ctx: StageContext,
  ): Promise<StageOutcome<ConfirmationCheck>>;
}

// --- LLM capability ---

export type ModelHint = 'analysis' | 'generation';

export interface CompletionOptions {
  signal?: AbortSignal;
  maxTokens?: number;
  system?: string;
}

export interface LLMCapability {
  /** Provider name; budgets are tracked under `llm:<provider>` */
  readonly provider: string;
  complete(prompt: string, modelHint: ModelHint, opts?: CompletionOptions): Promise<string>;
}

/** Platform budget, candidate daily cap and a browser session. */
export function defaultSubmissionResources(job: Job, application: Application): ResourceRequest[] {
  return [
    { kind: 'budget', resourceId: `platform:${job.platform}` },
    { kind: 'budget', resourceId: `candidate:${application.candidateId}` },
    { kind: 'session', platform: job.platform },
  ];
}
