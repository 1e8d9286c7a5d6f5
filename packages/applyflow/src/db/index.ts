export type {
  Repository,
  InsertApplicationResult,
  CommitTransitionInput,
  ApplicationFilter,
} from './types.js';
export { MemoryRepository } from './memoryRepository.js';
export { PgRepository, type PgRepositoryOptions } from './pgRepository.js';
export { getPool, closePool } from './client.js';
