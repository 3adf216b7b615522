export type { DatabaseBackend } from './database-backend.js';
export { StorageError, StorageConnectionError } from './types.js';
export { InMemoryBackend } from './in-memory.js';
export { PostgresBackend } from './postgresql.js';
