/**
 * PostgreSQL Database Backend Implementation
 *
 * Stores one row per chat: `chat_id` (primary key) and `context`, the serialized
 * history. Writes are upserts keyed by `chat_id`, so a later write fully replaces
 * an earlier one.
 *
 * Connections come from a `pg.Pool`; `pool.query` acquires a client for the
 * statement and releases it on success and on failure.
 *
 * @module storage/backend/postgresql
 */

import pg from 'pg';
import type { Pool as PgPool, PoolConfig } from 'pg';
import type { DatabaseBackend } from './database-backend.js';
import type { PostgresBackendConfig } from '../config.js';
import { StorageError, StorageConnectionError, toError } from './types.js';
import { createLogger, type Logger } from '../../logger/index.js';
import { BACKEND_TYPES, DEFAULTS, ERROR_MESSAGES, LOG_PREFIXES } from '../constants.js';

const { Pool } = pg;

// `context` is selected as text; any other value is serialized back to JSON
type ContextRow = {
	context: unknown;
};

/**
 * PostgreSQL Database Backend
 *
 * @example
 * ```typescript
 * const backend = new PostgresBackend({
 *   type: 'postgres',
 *   host: 'localhost',
 *   port: 5432,
 *   database: 'relay',
 *   user: 'postgres',
 *   password: 'test-secret',
 * });
 *
 * await backend.connect();
 * await backend.set('42', '[]');
 * const history = await backend.get('42');
 * await backend.disconnect();
 * ```
 */
export class PostgresBackend implements DatabaseBackend {
	private pool: PgPool | undefined;
	private connected = false;
	private schemaReady = false;
	private schemaSetup: Promise<void> | undefined;
	private readonly config: PostgresBackendConfig;
	private readonly logger: Logger;
	private readonly table: string;

	// Statement cache
	private readonly statements: {
		get: string;
		set: string;
		delete: string;
		ensureSchema: string;
	};

	constructor(config: PostgresBackendConfig, logger: Logger = createLogger()) {
		this.config = config;
		this.logger = logger;
		this.table = config.table ?? DEFAULTS.POSTGRES_TABLE;
		this.statements = {
			get: `SELECT context::text AS context FROM ${this.table} WHERE chat_id = $1`,
			set: `
				INSERT INTO ${this.table} (chat_id, context, updated_at)
				VALUES ($1, $2, $3)
				ON CONFLICT (chat_id) DO UPDATE SET
					context = EXCLUDED.context,
					updated_at = EXCLUDED.updated_at
			`,
			delete: `DELETE FROM ${this.table} WHERE chat_id = $1`,
			// Tables created by earlier deployments hold only chat_id and context
			ensureSchema: `
				CREATE TABLE IF NOT EXISTS ${this.table} (
					chat_id TEXT PRIMARY KEY,
					context TEXT,
					updated_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW()
				);
				ALTER TABLE ${this.table}
					ADD COLUMN IF NOT EXISTS updated_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW();
			`,
		};
	}

	/**
	 * Creates the pool and the history table.
	 *
	 * A database that is down at startup does not prevent the pool from being
	 * created; table creation is then retried before the next statement.
	 */
	async connect(): Promise<void> {
		if (this.connected) {
			this.logger.debug(`${LOG_PREFIXES.POSTGRES} Already connected`);
			return;
		}

		try {
			this.pool = new Pool(this.buildPoolConfig());
		} catch (error) {
			throw new StorageConnectionError(
				'Failed to create PostgreSQL pool',
				BACKEND_TYPES.POSTGRES,
				toError(error)
			);
		}

		// Idle clients can fail when the server restarts; without a listener the
		// pool would emit an unhandled 'error' event
		this.pool.on('error', error => {
			this.logger.error(`${LOG_PREFIXES.POSTGRES} Idle client error`, { error: error.message });
		});
		this.connected = true;

		try {
			await this.ensureSchema();
			this.logger.info(`${LOG_PREFIXES.POSTGRES} Connected`, {
				host: this.config.host || 'localhost',
				database: this.config.database,
				table: this.table,
			});
		} catch (error) {
			this.logger.warn(`${LOG_PREFIXES.POSTGRES} Database unreachable, schema setup deferred`, {
				error: toError(error).message,
			});
		}
	}

	async disconnect(): Promise<void> {
		if (!this.connected || !this.pool) {
			return;
		}

		const pool = this.pool;
		this.pool = undefined;
		this.connected = false;
		this.schemaReady = false;
		this.schemaSetup = undefined;
		try {
			await pool.end();
			this.logger.info(`${LOG_PREFIXES.POSTGRES} Disconnected`);
		} catch (error) {
			throw new StorageError('Failed to disconnect from PostgreSQL', 'disconnect', toError(error));
		}
	}

	isConnected(): boolean {
		return this.connected && this.pool !== undefined;
	}

	getBackendType(): string {
		return BACKEND_TYPES.POSTGRES;
	}

	async get(key: string): Promise<string | undefined> {
		const pool = await this.ready('get');

		try {
			const result = await pool.query<ContextRow>(this.statements.get, [key]);
			return toContextText(result.rows[0]?.context);
		} catch (error) {
			throw new StorageError('Failed to get value from PostgreSQL', 'get', toError(error));
		}
	}

	async set(key: string, value: string): Promise<void> {
		const pool = await this.ready('set');

		try {
			await pool.query(this.statements.set, [key, value, new Date()]);
		} catch (error) {
			throw new StorageError('Failed to set value in PostgreSQL', 'set', toError(error));
		}
	}

	async delete(key: string): Promise<void> {
		const pool = await this.ready('delete');

		try {
			await pool.query(this.statements.delete, [key]);
		} catch (error) {
			throw new StorageError('Failed to delete value from PostgreSQL', 'delete', toError(error));
		}
	}

	// Private helper methods

	private buildPoolConfig(): PoolConfig {
		const shared: PoolConfig = {
			max: this.config.maxConnections ?? DEFAULTS.MAX_CONNECTIONS,
			idleTimeoutMillis: this.config.idleTimeoutMillis ?? DEFAULTS.IDLE_TIMEOUT_MILLIS,
			connectionTimeoutMillis:
				this.config.connectionTimeoutMillis ?? DEFAULTS.CONNECTION_TIMEOUT_MILLIS,
			ssl: this.config.ssl ?? false,
		};

		if (this.config.url) {
			return { ...shared, connectionString: this.config.url };
		}

		return {
			...shared,
			host: this.config.host || 'localhost',
			port: this.config.port ?? DEFAULTS.POSTGRES_PORT,
			database: this.config.database,
			user: this.config.user,
			password: this.config.password,
		};
	}

	// Concurrent callers share one in-flight setup; a failed setup is retried by the next caller
	private ensureSchema(): Promise<void> {
		if (this.schemaReady) return Promise.resolve();
		if (this.schemaSetup) return this.schemaSetup;

		const pool = this.pool;
		if (!pool) {
			return Promise.reject(new StorageError(ERROR_MESSAGES.NOT_CONNECTED, 'createTable'));
		}
		this.schemaSetup = pool
			.query(this.statements.ensureSchema)
			.then(() => {
				this.schemaReady = true;
				this.logger.debug(`${LOG_PREFIXES.POSTGRES} Table ${this.table} ready`);
			})
			.finally(() => {
				this.schemaSetup = undefined;
			});
		return this.schemaSetup;
	}

	private async ready(operation: string): Promise<PgPool> {
		const pool = this.pool;
		if (!this.connected || !pool) {
			throw new StorageError(ERROR_MESSAGES.NOT_CONNECTED, operation);
		}
		try {
			await this.ensureSchema();
		} catch (error) {
			throw new StorageConnectionError(
				'PostgreSQL is unreachable',
				BACKEND_TYPES.POSTGRES,
				toError(error)
			);
		}
		return pool;
	}
}

function toContextText(value: unknown): string | undefined {
	if (value === null || value === undefined) return undefined;
	return typeof value === 'string' ? value : JSON.stringify(value);
}
