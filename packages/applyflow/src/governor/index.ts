export { ResourceGovernor, sessionResourceId, type ResourceGovernorOptions } from './ResourceGovernor.js';
export { TokenBucket } from './TokenBucket.js';
export type * from './types.js';
