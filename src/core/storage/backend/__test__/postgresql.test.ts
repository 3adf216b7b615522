/**
 * PostgreSQL Backend Tests
 *
 * `pg` is replaced by an in-process pool so no server is needed.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { PostgresBackend } from '../postgresql.js';
import { StorageConnectionError, StorageError } from '../types.js';
import type { PostgresBackendConfig } from '../../config.js';
import { BACKEND_TYPES, ERROR_MESSAGES } from '../../constants.js';
import { createLogger } from '../../../logger/index.js';

type QueryResult = { rows: Array<{ context: unknown }> };

const pgMock = vi.hoisted(() => {
	const configs: unknown[] = [];
	const state = {
		configs,
		query: vi.fn<(text: string, params?: unknown[]) => Promise<QueryResult>>(),
		end: vi.fn<() => Promise<void>>(),
		on: vi.fn<(event: string, listener: (error: Error) => void) => void>(),
	};

	class FakePool {
		query = state.query;
		end = state.end;
		on = state.on;

		constructor(config: unknown) {
			state.configs.push(config);
		}
	}

	return { state, FakePool };
});

vi.mock('pg', () => ({ default: { Pool: pgMock.FakePool } }));

const { query, end, on, configs } = pgMock.state;

describe('PostgresBackend', () => {
	let backend: PostgresBackend;
	let config: PostgresBackendConfig;

	beforeEach(() => {
		vi.clearAllMocks();
		configs.length = 0;
		query.mockResolvedValue({ rows: [] });
		end.mockResolvedValue(undefined);

		config = {
			type: 'postgres',
			host: 'localhost',
			port: 5432,
			database: 'relay_test',
			user: 'postgres',
			password: 'test-secret',
		};
		backend = new PostgresBackend(config, createLogger({ silent: true }));
	});

	describe('Connection Management', () => {
		it('should create a pool from individual parameters', async () => {
			await backend.connect();

			expect(backend.isConnected()).toBe(true);
			expect(configs).toEqual([
				{
					max: 10,
					idleTimeoutMillis: 30000,
					connectionTimeoutMillis: 10000,
					ssl: false,
					host: 'localhost',
					port: 5432,
					database: 'relay_test',
					user: 'postgres',
					password: 'test-secret',
				},
			]);
		});

		it('should prefer a connection URL', async () => {
			backend = new PostgresBackend(
				{ type: 'postgres', url: 'postgresql://postgres:test-secret@db:5432/relay' },
				createLogger({ silent: true })
			);
			await backend.connect();

			expect(configs[0]).toMatchObject({
				connectionString: 'postgresql://postgres:test-secret@db:5432/relay',
			});
		});

		it('should create the history table on connect', async () => {
			await backend.connect();

			expect(query).toHaveBeenCalledTimes(1);
			expect(query.mock.calls[0]?.[0]).toContain('CREATE TABLE IF NOT EXISTS user_context');
		});

		it('should add the updated_at column to an existing table', async () => {
			await backend.connect();

			expect(query.mock.calls[0]?.[0]).toContain(
				'ADD COLUMN IF NOT EXISTS updated_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW()'
			);
		});

		it('should set up the table once for concurrent first operations', async () => {
			query.mockRejectedValueOnce(new Error('ECONNREFUSED'));
			await backend.connect();

			await Promise.all([backend.get('1'), backend.get('2'), backend.set('3', '[]')]);

			const setups = query.mock.calls.filter(([text]) => text.includes('CREATE TABLE'));
			expect(setups).toHaveLength(2);
		});

		it('should listen for idle client errors', async () => {
			await backend.connect();
			expect(on).toHaveBeenCalledWith('error', expect.any(Function));
		});

		it('should handle multiple connect calls gracefully', async () => {
			await backend.connect();
			await backend.connect();
			expect(configs).toHaveLength(1);
		});

		it('should stay usable when the database is down at startup', async () => {
			query.mockRejectedValueOnce(new Error('ECONNREFUSED'));
			await backend.connect();
			expect(backend.isConnected()).toBe(true);

			query.mockResolvedValueOnce({ rows: [] }).mockResolvedValueOnce({
				rows: [{ context: '[]' }],
			});
			await expect(backend.get('1')).resolves.toBe('[]');
			expect(query.mock.calls[1]?.[0]).toContain('CREATE TABLE IF NOT EXISTS');
		});

		it('should report an unreachable database on use', async () => {
			query.mockRejectedValue(new Error('ECONNREFUSED'));
			await backend.connect();

			await expect(backend.get('1')).rejects.toBeInstanceOf(StorageConnectionError);
		});

		it('should end the pool on disconnect', async () => {
			await backend.connect();
			await backend.disconnect();

			expect(end).toHaveBeenCalledTimes(1);
			expect(backend.isConnected()).toBe(false);
		});

		it('should return correct backend type', () => {
			expect(backend.getBackendType()).toBe(BACKEND_TYPES.POSTGRES);
		});
	});

	describe('Basic Operations', () => {
		beforeEach(async () => {
			await backend.connect();
			query.mockClear();
		});

		it('should read the context column by chat id', async () => {
			query.mockResolvedValueOnce({ rows: [{ context: '[{"role":"user","content":"hi"}]' }] });

			await expect(backend.get('42')).resolves.toBe('[{"role":"user","content":"hi"}]');
			expect(query).toHaveBeenCalledWith(
				'SELECT context::text AS context FROM user_context WHERE chat_id = $1',
				['42']
			);
		});

		it('should return undefined when no row exists', async () => {
			await expect(backend.get('42')).resolves.toBeUndefined();
		});

		it('should return undefined for a null context', async () => {
			query.mockResolvedValueOnce({ rows: [{ context: null }] });
			await expect(backend.get('42')).resolves.toBeUndefined();
		});

		it('should serialize a context that arrives as a parsed value', async () => {
			query.mockResolvedValueOnce({ rows: [{ context: [{ role: 'user', content: 'hi' }] }] });

			await expect(backend.get('42')).resolves.toBe('[{"role":"user","content":"hi"}]');
		});

		it('should upsert on set', async () => {
			await backend.set('42', '[]');

			const [text, params] = query.mock.calls[0] ?? [];
			expect(text).toContain('ON CONFLICT (chat_id) DO UPDATE');
			expect(params?.slice(0, 2)).toEqual(['42', '[]']);
			expect(params?.[2]).toBeInstanceOf(Date);
		});

		it('should delete by chat id', async () => {
			await backend.delete('42');
			expect(query).toHaveBeenCalledWith('DELETE FROM user_context WHERE chat_id = $1', ['42']);
		});

		it('should wrap query failures', async () => {
			const cause = new Error('syntax error');
			query.mockRejectedValueOnce(cause);

			await expect(backend.set('42', '[]')).rejects.toMatchObject({
				name: 'StorageError',
				operation: 'set',
				cause,
			});
		});
	});

	describe('Configuration', () => {
		it('should use a custom table name', async () => {
			backend = new PostgresBackend({ ...config, table: 'chat_history' }, createLogger({ silent: true }));
			await backend.connect();
			await backend.delete('1');

			expect(query).toHaveBeenLastCalledWith('DELETE FROM chat_history WHERE chat_id = $1', ['1']);
		});
	});

	describe('Error Handling', () => {
		it('should throw when not connected', async () => {
			await expect(backend.get('1')).rejects.toThrow(StorageError);
			await expect(backend.set('1', '[]')).rejects.toThrow(ERROR_MESSAGES.NOT_CONNECTED);
		});

		it('should wrap failures to close the pool', async () => {
			await backend.connect();
			end.mockRejectedValueOnce(new Error('already closed'));

			await expect(backend.disconnect()).rejects.toMatchObject({ operation: 'disconnect' });
		});
	});
});
