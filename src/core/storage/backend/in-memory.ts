/**
 * In-Memory Backend Implementation
 *
 * Map-backed DatabaseBackend for development and tests. All data is lost when
 * the process exits.
 *
 * @module storage/backend/in-memory
 */

import type { DatabaseBackend } from './database-backend.js';
import { StorageError } from './types.js';
import { BACKEND_TYPES, ERROR_MESSAGES, LOG_PREFIXES } from '../constants.js';
import { createLogger, type Logger } from '../../logger/index.js';

export interface InMemoryStats {
	hits: number;
	misses: number;
	sets: number;
	deletes: number;
}

export class InMemoryBackend implements DatabaseBackend {
	private readonly store = new Map<string, string>();
	private connected = false;
	private readonly logger: Logger;

	// Statistics
	private stats: InMemoryStats = {
		hits: 0,
		misses: 0,
		sets: 0,
		deletes: 0,
	};

	constructor(logger: Logger = createLogger()) {
		this.logger = logger;
	}

	async connect(): Promise<void> {
		if (this.connected) {
			this.logger.debug(`${LOG_PREFIXES.MEMORY} Already connected`);
			return;
		}
		this.connected = true;
		this.logger.info(`${LOG_PREFIXES.MEMORY} Connected`);
	}

	/**
	 * Clears all data.
	 */
	async disconnect(): Promise<void> {
		if (!this.connected) {
			return;
		}
		this.store.clear();
		this.connected = false;
		this.logger.info(`${LOG_PREFIXES.MEMORY} Disconnected`, { stats: this.stats });
	}

	isConnected(): boolean {
		return this.connected;
	}

	getBackendType(): string {
		return BACKEND_TYPES.IN_MEMORY;
	}

	async get(key: string): Promise<string | undefined> {
		this.checkConnection('get');
		const value = this.store.get(key);
		if (value === undefined) {
			this.stats.misses++;
		} else {
			this.stats.hits++;
		}
		return value;
	}

	async set(key: string, value: string): Promise<void> {
		this.checkConnection('set');
		this.store.set(key, value);
		this.stats.sets++;
	}

	async delete(key: string): Promise<void> {
		this.checkConnection('delete');
		if (this.store.delete(key)) {
			this.stats.deletes++;
		}
	}

	getStats(): InMemoryStats & { size: number } {
		return { ...this.stats, size: this.store.size };
	}

	private checkConnection(operation: string): void {
		if (!this.connected) {
			throw new StorageError(ERROR_MESSAGES.NOT_CONNECTED, operation);
		}
	}
}
