/**
 * Database Backend Interface
 *
 * Contract for the durable keyed store behind the conversation context store.
 * Values are opaque serialized strings; callers own (de)serialization.
 *
 * @module storage/backend/database-backend
 */

export interface DatabaseBackend {
	/**
	 * Retrieves the stored value for a key
	 *
	 * @returns The stored value, or undefined when no record exists
	 */
	get(key: string): Promise<string | undefined>;

	/**
	 * Inserts or fully replaces the value for a key (last writer wins)
	 */
	set(key: string, value: string): Promise<void>;

	/**
	 * Removes the record for a key. Deleting a missing key is not an error.
	 */
	delete(key: string): Promise<void>;

	/**
	 * Prepares the backend for use. May create schema objects.
	 *
	 * @throws {StorageConnectionError} If the backend cannot be reached
	 */
	connect(): Promise<void>;

	/** Releases every connection held by the backend */
	disconnect(): Promise<void>;

	isConnected(): boolean;

	/** Backend type identifier (e.g., 'postgres', 'in-memory') */
	getBackendType(): string;
}
