#!/usr/bin/env node

import { Command } from 'commander';
import { Telegraf } from 'telegraf';
import pkg from '../../package.json' with { type: 'json' };
import {
	ConfigError,
	ContextStore,
	ConversationOrchestrator,
	DashScopeApplicationService,
	loadConfig,
	loadEnvFile,
	logger,
	setGlobalLogLevel,
	Storage,
	type AppConfig,
} from '../core/index.js';
import { registerRelayHandlers } from './telegram/bot.js';
import { TelegramTransport } from './telegram/transport.js';

interface CliOptions {
	envFile?: string;
	logLevel?: string;
}

async function startRelay(config: AppConfig): Promise<void> {
	const backend = await Storage.connectDatabaseBackend(config.storage, logger);
	const bot = new Telegraf(config.telegram.botToken);

	const orchestrator = new ConversationOrchestrator(
		new ContextStore(backend, logger),
		new DashScopeApplicationService(config.llm, { logger }),
		new TelegramTransport(bot.telegram),
		{
			maxMessageLength: config.relay.maxMessageLength,
			serializePerChat: config.relay.serializePerChat,
			logger,
		}
	);
	registerRelayHandlers(bot, orchestrator, logger);

	let stopping = false;
	const shutdown = async (signal: string): Promise<void> => {
		if (stopping) return;
		stopping = true;
		logger.info(`Received ${signal}, shutting down`);
		bot.stop(signal);
		try {
			await backend.disconnect();
		} catch (error) {
			logger.error('Failed to close storage', {
				error: error instanceof Error ? error.message : String(error),
			});
		}
		process.exit(0);
	};
	process.once('SIGINT', () => void shutdown('SIGINT'));
	process.once('SIGTERM', () => void shutdown('SIGTERM'));

	logger.info('Starting Telegram polling', {
		appId: config.llm.appId,
		storage: config.storage.type,
	});
	await bot.launch(() => {
		logger.info('Relay is running');
	});
}

const program = new Command();

program
	.name('qwen-relay')
	.description('Relays Telegram chats to a DashScope (Qwen) application with per-chat history')
	.version(pkg.version, '-v, --version', 'output the current version')
	.option('--env-file <path>', 'Load environment variables from this file (default: .env)')
	.option('--log-level <level>', 'Override RELAY_LOG_LEVEL (error, warn, info, debug, ...)')
	.action(async (opts: CliOptions) => {
		loadEnvFile(opts.envFile);

		let config: AppConfig;
		try {
			config = loadConfig();
		} catch (error) {
			if (error instanceof ConfigError) {
				logger.error(error.message);
				process.exit(1);
			}
			throw error;
		}

		setGlobalLogLevel(opts.logLevel ?? config.logLevel);
		if (config.logFile) {
			logger.redirectToFile(config.logFile);
		}

		await startRelay(config);
	});

program.parseAsync(process.argv).catch((error: unknown) => {
	logger.error('Relay stopped with an error', {
		error: error instanceof Error ? error.message : String(error),
		stack: error instanceof Error ? error.stack : undefined,
	});
	process.exit(1);
});
