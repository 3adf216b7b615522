import type { DatabaseBackend } from '../storage/backend/database-backend.js';
import { toError } from '../storage/backend/types.js';
import { logger as defaultLogger, type Logger } from '../logger/index.js';
import { parseHistory, serializeHistory } from './history.js';
import { ok, err, type ChatId, type History, type StoreResult } from './types.js';

/**
 * Durable per-chat histories on top of a DatabaseBackend.
 *
 * Failures come back as `{ ok: false }` results, already logged; the caller
 * decides how to degrade.
 */
export class ContextStore {
	constructor(
		private readonly backend: DatabaseBackend,
		private readonly logger: Logger = defaultLogger
	) {}

	private getKey(chatId: ChatId): string {
		return String(chatId);
	}

	/**
	 * A chat without a record has an empty history. Unreachable storage and
	 * unreadable records give an error result.
	 */
	async load(chatId: ChatId): Promise<StoreResult<History>> {
		try {
			const raw = await this.backend.get(this.getKey(chatId));
			if (raw === undefined || raw === '') {
				this.logger.debug(`[ContextStore] No context for chat ${chatId}`);
				return ok([]);
			}
			const history = parseHistory(raw);
			this.logger.debug(`[ContextStore] Loaded ${history.length} turns for chat ${chatId}`);
			return ok(history);
		} catch (error) {
			const cause = toError(error);
			this.logger.error(`[ContextStore] Failed to load context for chat ${chatId}`, {
				error: cause.message,
			});
			return err(cause);
		}
	}

	/**
	 * Replaces the stored history of the chat.
	 */
	async save(chatId: ChatId, history: History): Promise<StoreResult<void>> {
		try {
			await this.backend.set(this.getKey(chatId), serializeHistory(history));
			this.logger.info(`[ContextStore] Context saved for chat ${chatId}`, {
				turns: history.length,
			});
			return ok(undefined);
		} catch (error) {
			const cause = toError(error);
			this.logger.error(`[ContextStore] Failed to save context for chat ${chatId}`, {
				error: cause.message,
			});
			return err(cause);
		}
	}

	async delete(chatId: ChatId): Promise<StoreResult<void>> {
		try {
			await this.backend.delete(this.getKey(chatId));
			this.logger.info(`[ContextStore] Context deleted for chat ${chatId}`);
			return ok(undefined);
		} catch (error) {
			const cause = toError(error);
			this.logger.error(`[ContextStore] Failed to delete context for chat ${chatId}`, {
				error: cause.message,
			});
			return err(cause);
		}
	}
}
