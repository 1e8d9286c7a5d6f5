export * from './types.js';
export * from './errors.js';
export { transition, nextState, canTransition, allowedTriggers, TRANSITIONS, ALL_TRIGGERS } from './stateMachine.js';
export type { TransitionInput, TransitionResult } from './stateMachine.js';
export { replayApplication, initialApplication, seedOf, projectionDrift } from './replay.js';
export type { ApplicationSeed } from './replay.js';
export { requiresFollowUp, FINAL_OUTCOMES, FOLLOW_UP_AFTER_DAYS } from './outcomes.js';
