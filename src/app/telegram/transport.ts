import type { ChatId, ChatTransport, DeliveryHandle } from '../../core/index.js';

/**
 * The parts of the Bot API client the relay calls. Telegraf's `Telegram` class
 * satisfies it.
 */
export interface TelegramApi {
	sendMessage(chatId: number | string, text: string): Promise<{ message_id: number }>;
	deleteMessage(chatId: number | string, messageId: number): Promise<unknown>;
}

/**
 * ChatTransport over the Telegram Bot API. Text is sent as plain text, without
 * a parse mode, so model output is never interpreted as markup.
 */
export class TelegramTransport implements ChatTransport {
	constructor(private readonly telegram: TelegramApi) {}

	async sendText(chatId: ChatId, text: string): Promise<DeliveryHandle> {
		const sent = await this.telegram.sendMessage(chatId, text);
		return { chatId, messageId: sent.message_id };
	}

	async deleteMessage(handle: DeliveryHandle): Promise<void> {
		await this.telegram.deleteMessage(handle.chatId, handle.messageId);
	}
}
