/**
 * Storage Module Constants
 *
 * @module storage/constants
 */

export const LOG_PREFIXES = {
	FACTORY: '[StorageFactory]',
	POSTGRES: '[PostgresBackend]',
	MEMORY: '[InMemoryBackend]',
} as const;

export const ERROR_MESSAGES = {
	NOT_CONNECTED: 'Storage backend is not connected',
	INVALID_CONFIG: 'Invalid storage configuration',
} as const;

export const BACKEND_TYPES = {
	IN_MEMORY: 'in-memory',
	POSTGRES: 'postgres',
} as const;

export const DEFAULTS = {
	POSTGRES_PORT: 5432,
	POSTGRES_TABLE: 'user_context',
	MAX_CONNECTIONS: 10,
	IDLE_TIMEOUT_MILLIS: 30000,
	CONNECTION_TIMEOUT_MILLIS: 10000,
} as const;
