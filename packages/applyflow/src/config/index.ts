export { getEnv, parseEnv, type Env } from './env.js';
export { loadSettings, settingsSchema, type OrchestratorSettings, type SettingsInput } from './settings.js';
export {
  RESOURCE_POLICIES,
  PLATFORMS,
  resolveResourcePolicy,
  sessionLimitFor,
  detectPlatform,
  splitResourceId,
} from './resources.js';
export type { Platform, ResourcePolicy } from './resources.js';
