export { Orchestrator } from './Orchestrator.js';
export type {
  OrchestratorOptions,
  RegisterResumeInput,
  JobInput,
  SubmitJobInput,
  SubmitJobResult,
  ApplicationStatus,
  DiscoverDefaults,
  DiscoverResult,
} from './Orchestrator.js';
