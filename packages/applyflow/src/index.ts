export * from './lifecycle/index.js';
export * from './events/index.js';
export * from './config/index.js';
export * from './db/index.js';
export * from './sessions/index.js';
export { ResourceGovernor, sessionResourceId, TokenBucket, type ResourceGovernorOptions } from './governor/index.js';
export type {
  ResourceRequest,
  LeaseHolder,
  Lease,
  DenialReason,
  Denial,
  AcquireResult,
  AcquireAllResult,
  ReleaseOptions,
  Clock,
} from './governor/index.js';
export {
  StageExecutorRegistry,
  CATCH_ALL_PLATFORM,
  LLMAnalysisExecutor,
  LLMTailoringExecutor,
  DryRunSubmissionExecutor,
  succeeded,
  failed,
  defaultSubmissionResources,
  type DryRunSubmissionOptions,
  type StageFailure,
  type StageOutcome,
  type StageContext,
  type DiscoveryQuery,
  type DiscoveredPosting,
  type DiscoveryExecutor,
  type AnalysisExecutor,
  type ResumeDraft,
  type TailoringExecutor,
  type SubmissionReceipt,
  type ConfirmationCheck,
  type SubmissionExecutor,
  type ModelHint,
  type CompletionOptions,
  type LLMCapability,
} from './workers/stageExecutors/index.js';
export { Scheduler, DISPATCH_TABLE } from './workers/Scheduler.js';
export type {
  DispatchResult,
  DiscoveryResult,
  CancelResult,
  RecoveryReport,
  SchedulerStats,
  SchedulerOptions,
} from './workers/Scheduler.js';
export { decide, backoffDelay, describeFailure } from './workers/retryPolicy.js';
export type { BackoffSettings, FailureSignal, RetryDecision, RetryOptions } from './workers/retryPolicy.js';
export { classifyError, type ClassifiedError } from './workers/errorClassification.js';
export * from './orchestrator/index.js';
export { AnthropicLLMCapability, LLMRateLimitError, type AnthropicLLMOptions } from './llm/anthropic.js';
export { RedisEventPublisher } from './lib/redis-streams.js';
export { Logger, getLogger, type LoggerOptions, type LogLevel } from './monitoring/logger.js';
export { createApp, startServer } from './api/index.js';
