import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Telegraf } from 'telegraf';
import type { MessageEntity, Update } from 'telegraf/types';
import { isCommandMessage, registerRelayHandlers } from '../bot.js';
import {
	ContextStore,
	ConversationOrchestrator,
	createLogger,
	Storage,
	type ChatTransport,
	type CompletionService,
} from '../../../core/index.js';

const logger = createLogger({ silent: true });

const textUpdate = (text: string, entities?: MessageEntity[]): Update => ({
	update_id: 1,
	message: {
		message_id: 10,
		date: 0,
		chat: { id: 5, type: 'private', first_name: 'Test' },
		from: { id: 5, is_bot: false, first_name: 'Test' },
		text,
		...(entities ? { entities } : {}),
	},
});

const command = (name: string): Update =>
	textUpdate(`/${name}`, [{ type: 'bot_command', offset: 0, length: name.length + 1 }]);

describe('isCommandMessage', () => {
	it('detects a command at the start of the text', () => {
		expect(isCommandMessage([{ type: 'bot_command', offset: 0 }])).toBe(true);
	});

	it('ignores commands further into the text', () => {
		expect(isCommandMessage([{ type: 'bot_command', offset: 6 }])).toBe(false);
	});

	it('treats messages without entities as plain text', () => {
		expect(isCommandMessage(undefined)).toBe(false);
		expect(isCommandMessage([{ type: 'bold', offset: 0 }])).toBe(false);
	});
});

describe('registerRelayHandlers', () => {
	let bot: Telegraf;
	let orchestrator: ConversationOrchestrator;

	beforeEach(() => {
		const transport: ChatTransport = {
			sendText: async chatId => ({ chatId, messageId: 1 }),
			deleteMessage: async () => undefined,
		};
		const llm: CompletionService = {
			complete: async () => ({ ok: true, text: 'unused' }),
			getConfig: () => ({ provider: 'fake', appId: 'test-app' }),
		};
		orchestrator = new ConversationOrchestrator(
			new ContextStore(new Storage.InMemoryBackend(logger), logger),
			llm,
			transport,
			{ logger }
		);

		bot = new Telegraf('test-token');
		bot.botInfo = {
			id: 1,
			is_bot: true,
			first_name: 'Relay',
			username: 'relay_test_bot',
			can_join_groups: true,
			can_read_all_group_messages: false,
			supports_inline_queries: false,
		};
		registerRelayHandlers(bot, orchestrator, logger);
	});

	it('relays plain text to the orchestrator', async () => {
		const handleMessage = vi.spyOn(orchestrator, 'handleMessage').mockResolvedValue({
			exchangeId: 'test-exchange',
			state: 'Persisted',
			chunksSent: 1,
			usedFallback: false,
			historySaved: true,
		});

		await bot.handleUpdate(textUpdate('Hello'));

		expect(handleMessage).toHaveBeenCalledWith({ chatId: 5, text: 'Hello' });
	});

	it('greets on /start', async () => {
		const greet = vi.spyOn(orchestrator, 'greet').mockResolvedValue(true);
		const handleMessage = vi.spyOn(orchestrator, 'handleMessage');

		await bot.handleUpdate(command('start'));

		expect(greet).toHaveBeenCalledWith(5);
		expect(handleMessage).not.toHaveBeenCalled();
	});

	it('clears the history on /clearhistory', async () => {
		const clearHistory = vi.spyOn(orchestrator, 'clearHistory').mockResolvedValue(true);

		await bot.handleUpdate(command('clearhistory'));

		expect(clearHistory).toHaveBeenCalledWith(5);
	});

	it('does not relay unknown commands', async () => {
		const handleMessage = vi.spyOn(orchestrator, 'handleMessage');

		await bot.handleUpdate(command('unknown'));

		expect(handleMessage).not.toHaveBeenCalled();
	});
});
