export * from './types.js';
export { StageExecutorRegistry, CATCH_ALL_PLATFORM } from './registry.js';
export { LLMAnalysisExecutor, requirementsSchema, buildAnalysisPrompt } from './llmAnalysis.js';
export { LLMTailoringExecutor, buildTailoringPrompt } from './llmTailoring.js';
export { DryRunSubmissionExecutor, type DryRunSubmissionOptions } from './dryRunSubmission.js';
