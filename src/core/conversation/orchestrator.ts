import { v4 as uuidv4 } from 'uuid';
import { logger as defaultLogger, truncateForLog, type Logger } from '../logger/index.js';
import type { CompletionService } from '../brain/llm/services/types.js';
import type { ContextStore } from './context-store.js';
import { ChatLock } from './chat-lock.js';
import { chunkText, TELEGRAM_MESSAGE_LIMIT } from './chunker.js';
import { formatReply, stripEscapes } from './formatter.js';
import { appendTurn, toRequestMessages } from './history.js';
import { REPLIES, type ReplyTexts } from './messages.js';
import type { ChatId, ChatTransport, DeliveryHandle, History, InboundMessage } from './types.js';

export const ExchangeStates = {
	RECEIVED: 'Received',
	CONTEXT_LOADED: 'ContextLoaded',
	REQUEST_BUILT: 'RequestBuilt',
	AWAITING_REPLY: 'AwaitingReply',
	FORMATTED: 'Formatted',
	DISPATCHING: 'Dispatching',
	PERSISTED: 'Persisted',
	NO_RESPONSE: 'NoResponse',
	FAILED: 'Failed',
} as const;

export type ExchangeState = (typeof ExchangeStates)[keyof typeof ExchangeStates];

export type TerminalState =
	| typeof ExchangeStates.PERSISTED
	| typeof ExchangeStates.NO_RESPONSE
	| typeof ExchangeStates.FAILED;

export interface ExchangeOutcome {
	exchangeId: string;
	state: TerminalState;
	/** Delivery calls that succeeded, fallback chunks included */
	chunksSent: number;
	/** True when the raw reply was sent because the formatted one failed or had no visible text */
	usedFallback: boolean;
	historySaved: boolean;
}

export interface OrchestratorOptions {
	/** Transport size ceiling for one message */
	maxMessageLength?: number;
	/** Queue exchanges of the same chat instead of letting them race */
	serializePerChat?: boolean;
	replies?: Partial<ReplyTexts>;
	logger?: Logger;
}

interface Exchange {
	id: string;
	chatId: ChatId;
	chunksSent: number;
	usedFallback: boolean;
}

/**
 * Runs one request-response cycle per inbound message: load the chat's history,
 * ask the model, deliver the reply in chunks and store the extended history.
 *
 * `handleMessage` never rejects. Every failure ends in a terminal state and a
 * message to the user; a failed exchange leaves the stored history as it was.
 */
export class ConversationOrchestrator {
	private readonly maxMessageLength: number;
	private readonly replies: ReplyTexts;
	private readonly logger: Logger;
	private readonly lock: ChatLock | undefined;

	constructor(
		private readonly store: ContextStore,
		private readonly llm: CompletionService,
		private readonly transport: ChatTransport,
		options: OrchestratorOptions = {}
	) {
		this.maxMessageLength = options.maxMessageLength ?? TELEGRAM_MESSAGE_LIMIT;
		this.replies = { ...REPLIES, ...options.replies };
		this.logger = options.logger ?? defaultLogger;
		this.lock = options.serializePerChat ? new ChatLock() : undefined;
	}

	async handleMessage(message: InboundMessage): Promise<ExchangeOutcome> {
		if (this.lock) {
			return this.lock.run(message.chatId, () => this.runExchange(message));
		}
		return this.runExchange(message);
	}

	/**
	 * Deletes the stored history of a chat and tells the user how it went.
	 */
	async clearHistory(chatId: ChatId): Promise<boolean> {
		const result = await this.store.delete(chatId);
		if (result.ok) {
			this.logger.info(`[Orchestrator] History cleared for chat ${chatId}`);
			await this.notify(chatId, this.replies.HISTORY_CLEARED);
			return true;
		}
		await this.notify(chatId, this.replies.HISTORY_CLEAR_FAILED);
		return false;
	}

	async greet(chatId: ChatId): Promise<boolean> {
		return this.notify(chatId, this.replies.GREETING);
	}

	private async runExchange({ chatId, text }: InboundMessage): Promise<ExchangeOutcome> {
		const exchange: Exchange = { id: uuidv4(), chatId, chunksSent: 0, usedFallback: false };
		let indicator: DeliveryHandle | undefined;

		try {
			this.trace(exchange, ExchangeStates.RECEIVED, { text: truncateForLog(text) });

			const loaded = await this.store.load(chatId);
			let history: History = loaded.ok ? loaded.value : [];
			if (!loaded.ok) {
				this.logger.warn(`[Orchestrator] Continuing chat ${chatId} with an empty history`, {
					exchangeId: exchange.id,
					error: loaded.error.message,
				});
			}
			this.trace(exchange, ExchangeStates.CONTEXT_LOADED, { turns: history.length });

			const userText = stripEscapes(text);
			history = appendTurn(history, 'user', userText);
			const messages = toRequestMessages(history);
			this.trace(exchange, ExchangeStates.REQUEST_BUILT, { messages: messages.length });

			indicator = await this.showIndicator(chatId);
			this.trace(exchange, ExchangeStates.AWAITING_REPLY);
			const reply = await this.llm.complete({ prompt: userText, messages });

			if (!reply.ok) {
				this.logger.warn(`[Orchestrator] No usable reply for chat ${chatId}`, {
					exchangeId: exchange.id,
					reason: reply.reason,
				});
				await this.transport.sendText(chatId, this.replies.NO_RESPONSE);
				return this.finish(exchange, ExchangeStates.NO_RESPONSE, false);
			}

			const formatted = formatReply(reply.text);
			this.trace(exchange, ExchangeStates.FORMATTED, { length: formatted.length });

			this.trace(exchange, ExchangeStates.DISPATCHING);
			let fallbackReason: string | undefined;
			try {
				if ((await this.dispatch(exchange, formatted)) === 0) {
					fallbackReason = 'formatted reply has no visible text';
				}
			} catch (error) {
				fallbackReason = error instanceof Error ? error.message : String(error);
			}

			if (fallbackReason !== undefined) {
				this.logger.error(`[Orchestrator] Formatted delivery failed, sending raw reply`, {
					exchangeId: exchange.id,
					error: fallbackReason,
				});
				exchange.usedFallback = true;
				if ((await this.dispatch(exchange, reply.text)) === 0) {
					this.logger.warn(`[Orchestrator] Reply for chat ${chatId} has no visible text`, {
						exchangeId: exchange.id,
					});
					await this.transport.sendText(chatId, this.replies.NO_RESPONSE);
					return this.finish(exchange, ExchangeStates.NO_RESPONSE, false);
				}
			}

			history = appendTurn(history, 'assistant', formatted);
			const saved = await this.store.save(chatId, history);
			if (!saved.ok) {
				await this.notify(chatId, this.replies.HISTORY_NOT_SAVED);
			}
			return this.finish(exchange, ExchangeStates.PERSISTED, saved.ok);
		} catch (error) {
			this.logger.error(`[Orchestrator] Exchange failed for chat ${chatId}`, {
				exchangeId: exchange.id,
				error: error instanceof Error ? error.message : String(error),
				stack: error instanceof Error ? error.stack : undefined,
			});
			await this.notify(chatId, this.replies.FAILURE);
			return this.finish(exchange, ExchangeStates.FAILED, false);
		} finally {
			if (indicator) {
				await this.hideIndicator(indicator);
			}
		}
	}

	/**
	 * Sends the chunks of `text` in order, each after the previous one was
	 * accepted, and returns how many were sent.
	 */
	private async dispatch(exchange: Exchange, text: string): Promise<number> {
		let sent = 0;
		for (const chunk of chunkText(text, this.maxMessageLength)) {
			// Telegram rejects messages without visible text, so the sent chunks
			// may not join back into `text` (e.g. a lone trailing newline is dropped)
			if (chunk.trim() === '') continue;
			await this.transport.sendText(exchange.chatId, chunk);
			exchange.chunksSent++;
			sent++;
		}
		return sent;
	}

	private async showIndicator(chatId: ChatId): Promise<DeliveryHandle | undefined> {
		try {
			return await this.transport.sendText(chatId, this.replies.WORKING);
		} catch (error) {
			this.logger.warn(`[Orchestrator] Could not show working indicator in chat ${chatId}`, {
				error: error instanceof Error ? error.message : String(error),
			});
			return undefined;
		}
	}

	private async hideIndicator(handle: DeliveryHandle): Promise<void> {
		try {
			await this.transport.deleteMessage(handle);
		} catch (error) {
			this.logger.warn(`[Orchestrator] Could not remove working indicator in chat ${handle.chatId}`, {
				error: error instanceof Error ? error.message : String(error),
			});
		}
	}

	private async notify(chatId: ChatId, text: string): Promise<boolean> {
		try {
			await this.transport.sendText(chatId, text);
			return true;
		} catch (error) {
			this.logger.error(`[Orchestrator] Could not notify chat ${chatId}`, {
				error: error instanceof Error ? error.message : String(error),
			});
			return false;
		}
	}

	private trace(exchange: Exchange, state: ExchangeState, meta: Record<string, unknown> = {}): void {
		this.logger.debug(`[Orchestrator] ${state}`, {
			exchangeId: exchange.id,
			chatId: exchange.chatId,
			...meta,
		});
	}

	private finish(exchange: Exchange, state: TerminalState, historySaved: boolean): ExchangeOutcome {
		this.trace(exchange, state, { chunksSent: exchange.chunksSent });
		return {
			exchangeId: exchange.id,
			state,
			chunksSent: exchange.chunksSent,
			usedFallback: exchange.usedFallback,
			historySaved,
		};
	}
}
