/**
 * Storage Factory
 *
 * Creates the database backend described by the configuration and connects it.
 *
 * @module storage/factory
 */

import { DatabaseBackendSchema, type DatabaseBackendConfig } from './config.js';
import type { DatabaseBackend } from './backend/database-backend.js';
import { InMemoryBackend } from './backend/in-memory.js';
import { PostgresBackend } from './backend/postgresql.js';
import { StorageError } from './backend/types.js';
import { ERROR_MESSAGES, LOG_PREFIXES } from './constants.js';
import { logger as defaultLogger, type Logger } from '../logger/index.js';

/**
 * Builds an unconnected backend after validating its configuration.
 *
 * @throws {StorageError} If the configuration is invalid
 */
export function createDatabaseBackend(
	config: DatabaseBackendConfig,
	logger: Logger = defaultLogger
): DatabaseBackend {
	const validation = DatabaseBackendSchema.safeParse(config);
	if (!validation.success) {
		throw new StorageError(
			`${ERROR_MESSAGES.INVALID_CONFIG}: ${validation.error.errors
				.map(e => `${e.path.join('.')}: ${e.message}`)
				.join(', ')}`,
			'configure'
		);
	}

	const validated = validation.data;
	switch (validated.type) {
		case 'postgres':
			return new PostgresBackend(validated, logger);
		case 'in-memory':
			return new InMemoryBackend(logger);
	}
}

/**
 * Creates and connects the configured backend.
 *
 * @example
 * ```typescript
 * const backend = await connectDatabaseBackend({ type: 'in-memory' });
 * await backend.set('42', '[]');
 * await backend.disconnect();
 * ```
 */
export async function connectDatabaseBackend(
	config: DatabaseBackendConfig,
	logger: Logger = defaultLogger
): Promise<DatabaseBackend> {
	logger.debug(`${LOG_PREFIXES.FACTORY} Creating database backend`, { type: config.type });

	const backend = createDatabaseBackend(config, logger);
	await backend.connect();

	logger.info(`${LOG_PREFIXES.FACTORY} Database backend ready`, {
		type: backend.getBackendType(),
	});
	return backend;
}
