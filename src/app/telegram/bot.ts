import type { Telegraf } from 'telegraf';
import { message } from 'telegraf/filters';
import { logger as defaultLogger, type ConversationOrchestrator, type Logger } from '../../core/index.js';

export const CLEAR_HISTORY_COMMAND = 'clearhistory';

interface EntityLike {
	type: string;
	offset: number;
}

/**
 * True when the message starts with a bot command such as `/start` or `/foo@bot`.
 */
export function isCommandMessage(entities: readonly EntityLike[] | undefined): boolean {
	return (entities ?? []).some(entity => entity.type === 'bot_command' && entity.offset === 0);
}

/**
 * Wires Telegram updates to the orchestrator. Commands are answered directly;
 * every other text message is relayed to the assistant.
 */
export function registerRelayHandlers(
	bot: Telegraf,
	orchestrator: ConversationOrchestrator,
	logger: Logger = defaultLogger
): Telegraf {
	bot.start(async ctx => {
		await orchestrator.greet(ctx.chat.id);
	});

	bot.help(async ctx => {
		await orchestrator.greet(ctx.chat.id);
	});

	bot.command(CLEAR_HISTORY_COMMAND, async ctx => {
		logger.info(`[TelegramBot] /${CLEAR_HISTORY_COMMAND} from chat ${ctx.chat.id}`);
		await orchestrator.clearHistory(ctx.chat.id);
	});

	bot.on(message('text'), ctx => {
		if (isCommandMessage(ctx.message.entities)) {
			logger.debug(`[TelegramBot] Ignoring unknown command in chat ${ctx.chat.id}`);
			return;
		}

		// Detached; polling continues while the model replies
		orchestrator
			.handleMessage({ chatId: ctx.chat.id, text: ctx.message.text })
			.then(outcome => {
				logger.debug(`[TelegramBot] Exchange ${outcome.exchangeId} ended in ${outcome.state}`);
			})
			.catch((error: unknown) => {
				logger.error(`[TelegramBot] Unhandled exchange error in chat ${ctx.chat.id}`, {
					error: error instanceof Error ? error.message : String(error),
				});
			});
	});

	bot.catch((error, ctx) => {
		logger.error(`[TelegramBot] Error while handling update ${ctx.update.update_id}`, {
			error: error instanceof Error ? error.message : String(error),
		});
	});

	return bot;
}
