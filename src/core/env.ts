import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import type { DatabaseBackendConfig } from './storage/config.js';
import type { LogLevel } from './logger/index.js';

export const DEFAULT_DASHSCOPE_BASE_URL = 'https://dashscope-intl.aliyuncs.com/api/v1';
export const DEFAULT_MAX_MESSAGE_LENGTH = 4096;

// Unset and empty variables are treated the same way
const blankToUndefined = (value: unknown) =>
	typeof value === 'string' && value.trim() === '' ? undefined : value;

const required = (name: string) =>
	z.preprocess(blankToUndefined, z.string({ required_error: `${name} is required` }));
const optional = () => z.preprocess(blankToUndefined, z.string().optional());
const positiveInt = (fallback: number) =>
	z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));
const flag = (fallback: boolean) =>
	z.preprocess(
		blankToUndefined,
		z
			.enum(['true', 'false', '1', '0'])
			.default(fallback ? 'true' : 'false')
			.transform(value => value === 'true' || value === '1')
	);

const POSTGRES_CONNECTION_VARS = [
	'POSTGRES_HOST',
	'POSTGRES_PORT',
	'POSTGRES_USER',
	'POSTGRES_PASSWORD',
	'POSTGRES_DB',
] as const;

const envSchema = z
	.object({
		TELEGRAM_BOT_TOKEN: required('TELEGRAM_BOT_TOKEN'),
		QWEN_APP_ID: required('QWEN_APP_ID'),
		QWEN_API_KEY: required('QWEN_API_KEY'),
		DASHSCOPE_BASE_URL: z.preprocess(
			blankToUndefined,
			z.string().url().default(DEFAULT_DASHSCOPE_BASE_URL)
		),
		LLM_TIMEOUT_MS: positiveInt(60000),
		LLM_MAX_RETRIES: positiveInt(3),
		// Storage Configuration
		STORAGE_DATABASE_TYPE: z.preprocess(
			blankToUndefined,
			z.enum(['postgres', 'in-memory']).default('postgres')
		),
		POSTGRES_HOST: optional(),
		POSTGRES_PORT: z.preprocess(blankToUndefined, z.coerce.number().int().positive().optional()),
		POSTGRES_USER: optional(),
		POSTGRES_PASSWORD: optional(),
		POSTGRES_DB: optional(),
		POSTGRES_SSL: flag(false),
		POSTGRES_TABLE: z.preprocess(
			blankToUndefined,
			z
				.string()
				.regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'POSTGRES_TABLE must be a plain SQL identifier')
				.default('user_context')
		),
		POSTGRES_POOL_MAX: positiveInt(10),
		// Relay behaviour
		MAX_MESSAGE_LENGTH: positiveInt(DEFAULT_MAX_MESSAGE_LENGTH),
		SERIALIZE_PER_CHAT: flag(false),
		// Logging
		RELAY_LOG_LEVEL: z.preprocess(
			blankToUndefined,
			z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info')
		),
		RELAY_LOG_FILE: optional(),
	});

export interface AppConfig {
	logLevel: LogLevel;
	logFile?: string;
	telegram: {
		botToken: string;
	};
	llm: {
		appId: string;
		apiKey: string;
		baseUrl: string;
		timeoutMs: number;
		maxRetries: number;
	};
	storage: DatabaseBackendConfig;
	relay: {
		maxMessageLength: number;
		serializePerChat: boolean;
	};
}

/**
 * Raised when the process environment cannot produce a complete configuration.
 * `issues` holds one line per missing or invalid variable.
 */
export class ConfigError extends Error {
	constructor(public readonly issues: string[]) {
		super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
		this.name = 'ConfigError';
	}
}

/**
 * Loads a `.env` file into `process.env` without overriding variables that are
 * already set.
 */
export function loadEnvFile(path?: string): void {
	loadDotenv(path ? { path, override: false } : { override: false });
}

/**
 * Builds the application configuration once, at startup. Every component receives
 * the parts it needs from the returned object instead of reading the environment.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
	const issues: string[] = [];
	const parsed = envSchema.safeParse(source);
	if (!parsed.success) {
		issues.push(
			...parsed.error.errors.map(issue =>
				issue.message.includes(String(issue.path[0]))
					? issue.message
					: `${issue.path.join('.')}: ${issue.message}`
			)
		);
	}

	// Checked against the raw source so these are reported alongside any other issue
	const storageType = blankToUndefined(source.STORAGE_DATABASE_TYPE) ?? 'postgres';
	if (storageType === 'postgres') {
		for (const name of POSTGRES_CONNECTION_VARS) {
			if (blankToUndefined(source[name]) === undefined) {
				issues.push(`${name} is required when STORAGE_DATABASE_TYPE is postgres`);
			}
		}
	}

	if (!parsed.success || issues.length > 0) {
		throw new ConfigError(issues);
	}

	const env = parsed.data;
	const storage: DatabaseBackendConfig =
		env.STORAGE_DATABASE_TYPE === 'in-memory'
			? { type: 'in-memory' }
			: {
					type: 'postgres',
					host: env.POSTGRES_HOST,
					port: env.POSTGRES_PORT,
					user: env.POSTGRES_USER,
					password: env.POSTGRES_PASSWORD,
					database: env.POSTGRES_DB,
					ssl: env.POSTGRES_SSL,
					table: env.POSTGRES_TABLE,
					maxConnections: env.POSTGRES_POOL_MAX,
				};

	const appConfig: AppConfig = {
		logLevel: env.RELAY_LOG_LEVEL,
		telegram: { botToken: env.TELEGRAM_BOT_TOKEN },
		llm: {
			appId: env.QWEN_APP_ID,
			apiKey: env.QWEN_API_KEY,
			baseUrl: env.DASHSCOPE_BASE_URL,
			timeoutMs: env.LLM_TIMEOUT_MS,
			maxRetries: env.LLM_MAX_RETRIES,
		},
		storage,
		relay: {
			maxMessageLength: env.MAX_MESSAGE_LENGTH,
			serializePerChat: env.SERIALIZE_PER_CHAT,
		},
	};
	if (env.RELAY_LOG_FILE) {
		appConfig.logFile = env.RELAY_LOG_FILE;
	}
	return appConfig;
}
