/**
 * Conversation types shared by the store, the history model and the orchestrator.
 */

export type TurnRole = 'user' | 'assistant';

/** One message of a conversation. */
export type Turn = Readonly<{
	role: TurnRole;
	content: string;
}>;

/** Turns of one chat in insertion order. */
export type History = readonly Turn[];

/** Chat identifier supplied by the transport. */
export type ChatId = number | string;

export type StoreResult<T> = { ok: true; value: T } | { ok: false; error: Error };

export const ok = <T>(value: T): StoreResult<T> => ({ ok: true, value });
export const err = <T = never>(error: Error): StoreResult<T> => ({ ok: false, error });

/** Handle of a message the transport delivered, usable to delete it later. */
export interface DeliveryHandle {
	chatId: ChatId;
	messageId: number;
}

/**
 * Outbound side of the chat platform.
 */
export interface ChatTransport {
	sendText(chatId: ChatId, text: string): Promise<DeliveryHandle>;
	deleteMessage(handle: DeliveryHandle): Promise<void>;
}

/** A text message received from a user. */
export interface InboundMessage {
	chatId: ChatId;
	text: string;
}
