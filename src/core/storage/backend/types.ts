/**
 * Storage Backend Error Classes
 *
 * @module storage/backend/types
 */

export type { DatabaseBackend } from './database-backend.js';

export type {
	DatabaseBackendConfig,
	InMemoryBackendConfig,
	PostgresBackendConfig,
} from '../config.js';

/**
 * Base Storage Error Class
 *
 * All storage-related errors extend from this base class.
 *
 * @example
 * ```typescript
 * throw new StorageError('Failed to save data', 'set', originalError);
 * ```
 */
export class StorageError extends Error {
	constructor(
		message: string,
		/** The operation that failed (e.g., 'get', 'set', 'delete', 'connection') */
		public readonly operation: string,
		/** The underlying error that caused this error, if any */
		public override readonly cause?: Error
	) {
		super(message);
		this.name = 'StorageError';
	}
}

/**
 * Storage Connection Error
 *
 * Thrown when a storage backend fails to connect or loses connection.
 */
export class StorageConnectionError extends StorageError {
	constructor(
		message: string,
		/** The type of backend that failed to connect (e.g., 'postgres') */
		public readonly backendType: string,
		cause?: Error
	) {
		super(message, 'connection', cause);
		this.name = 'StorageConnectionError';
	}
}

export const toError = (value: unknown): Error =>
	value instanceof Error ? value : new Error(String(value));
