import type {
  AnalysisExecutor,
  DiscoveryExecutor,
  SubmissionExecutor,
  TailoringExecutor,
} from './types.js';

export const CATCH_ALL_PLATFORM = '*';

export class StageExecutorRegistry {
  private discovery: DiscoveryExecutor | undefined;
  private analysis: AnalysisExecutor | undefined;
  private tailoring: TailoringExecutor | undefined;
  private submission = new Map<string, SubmissionExecutor>();

  registerDiscovery(executor: DiscoveryExecutor): void {
    if (this.discovery) {
      throw new Error(`Discovery executor already registered: ${this.discovery.name}`);
    }
    this.discovery = executor;
  }

  registerAnalysis(executor: AnalysisExecutor): void {
    if (this.analysis) {
      throw new Error(`Analysis executor already registered: ${this.analysis.name}`);
    }
    this.analysis = executor;
  }

  registerTailoring(executor: TailoringExecutor): void {
    if (this.tailoring) {
      throw new Error(`Tailoring executor already registered: ${this.tailoring.name}`);
    }
    this.tailoring = executor;
  }

  registerSubmission(executor: SubmissionExecutor): void {
    if (this.submission.has(executor.platform)) {
      throw new Error(`SubmissionExecutor already registered for platform: ${executor.platform}`);
    }
    this.submission.set(executor.platform, executor);
  }

  getDiscovery(): DiscoveryExecutor | undefined {
    return this.discovery;
  }

  getAnalysis(): AnalysisExecutor | undefined {
    return this.analysis;
  }

  getTailoring(): TailoringExecutor | undefined {
    return this.tailoring;
  }

  /** Executor for `platform`, falling back to the catch-all. */
  getSubmission(platform: string): SubmissionExecutor | undefined {
    return this.submission.get(platform) ?? this.submission.get(CATCH_ALL_PLATFORM);
  }

  listPlatforms(): string[] {
    return Array.from(this.submission.keys());
  }
}
