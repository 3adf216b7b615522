/**
 * Storage Configuration Module
 *
 * Zod schemas for the database backends that hold conversation histories.
 *
 * Supported backends:
 * - PostgreSQL: durable storage, one row per chat
 * - In-Memory: process-local storage for development and tests
 *
 * @module storage/config
 */

import { z } from 'zod';

/**
 * Base Backend Configuration Schema
 *
 * Common configuration options shared by all backend types.
 */
const BaseBackendSchema = z.object({
	/** Maximum number of concurrent connections to the backend */
	maxConnections: z.number().int().positive().optional().describe('Maximum connections'),

	/** Time in milliseconds before an idle connection is closed */
	idleTimeoutMillis: z
		.number()
		.int()
		.positive()
		.optional()
		.describe('Idle timeout in milliseconds'),

	/** Time in milliseconds to wait for a connection to be established */
	connectionTimeoutMillis: z
		.number()
		.int()
		.positive()
		.optional()
		.describe('Connection timeout in milliseconds'),
});

/**
 * In-Memory Backend Configuration
 *
 * Data is lost when the process exits.
 */
const InMemoryBackendSchema = BaseBackendSchema.extend({
	type: z.literal('in-memory'),
}).strict();

export type InMemoryBackendConfig = z.infer<typeof InMemoryBackendSchema>;

/**
 * PostgreSQL Backend Configuration
 *
 * Supports both a connection URL and individual connection parameters.
 *
 * @example
 * ```typescript
 * const config: PostgresBackendConfig = {
 *   type: 'postgres',
 *   host: 'localhost',
 *   port: 5432,
 *   database: 'relay',
 *   user: 'postgres',
 *   password: 'test-secret',
 * };
 * ```
 */
const PostgresBackendSchema = BaseBackendSchema.extend({
	type: z.literal('postgres'),

	/** PostgreSQL connection URL (postgresql://...) - overrides individual params if provided */
	url: z.string().optional().describe('PostgreSQL connection URL (postgresql://...)'),

	/** PostgreSQL server hostname */
	host: z.string().optional().describe('PostgreSQL host'),

	/** PostgreSQL server port (default: 5432) */
	port: z.number().int().positive().optional().describe('PostgreSQL port'),

	/** Database name */
	database: z.string().optional().describe('Database name'),

	/** Username for authentication */
	user: z.string().optional().describe('Username'),

	/** Password for authentication */
	password: z.string().optional().describe('Password'),

	/** Enable SSL connection */
	ssl: z.boolean().optional().describe('Enable SSL connection'),

	/** Table holding one history row per chat (default: user_context) */
	table: z
		.string()
		.regex(/^[A-Za-z_][A-Za-z0-9_]*$/)
		.optional()
		.describe('History table name'),
}).strict();

export type PostgresBackendConfig = z.infer<typeof PostgresBackendSchema>;

/**
 * Database Backend Configuration Union
 */
export const DatabaseBackendSchema = z
	.discriminatedUnion('type', [InMemoryBackendSchema, PostgresBackendSchema], {
		errorMap: (issue, ctx) => {
			if (issue.code === z.ZodIssueCode.invalid_union_discriminator) {
				return {
					message: `Invalid database type. Expected 'in-memory' or 'postgres'.`,
				};
			}
			return { message: ctx.defaultError };
		},
	})
	.describe('Database backend configuration');

export type DatabaseBackendConfig = z.infer<typeof DatabaseBackendSchema>;
