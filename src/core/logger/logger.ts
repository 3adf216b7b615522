import winston from 'winston';
import chalk from 'chalk';
import fs from 'fs';
import path from 'path';

// ===== 1. Foundation Layer: Winston Configuration =====

export const logLevels = {
	error: 0, // Highest priority
	warn: 1,
	info: 2,
	http: 3,
	verbose: 4,
	debug: 5,
	silly: 6, // Lowest priority
} as const;

export type LogLevel = keyof typeof logLevels;

export const isLogLevel = (value: string): value is LogLevel =>
	Object.prototype.hasOwnProperty.call(logLevels, value);

// ===== 2. Security Layer: Data Redaction =====

const SENSITIVE_KEYS = ['apiKey', 'password', 'secret', 'token', 'auth', 'key', 'credential'];
const MASK_REGEX = new RegExp(
	`(${SENSITIVE_KEYS.join('|')})(["']?\\s*[:=]\\s*)(?:(["'])(?:.*?)\\3|[^\\s,;}]+)`,
	'gi'
);

export const redactSensitiveData = (message: string): string =>
	message.replace(MASK_REGEX, (_match, key: string, separator: string, quote?: string) => {
		const quoteMark = quote || '';
		return `${key}${separator}${quoteMark}***REDACTED***${quoteMark}`;
	});

// ===== 3. Visual Formatting Layer =====

const levelColorMap: Record<string, (text: string) => string> = {
	error: chalk.red,
	warn: chalk.yellow,
	info: chalk.blue,
	http: chalk.cyan,
	verbose: chalk.magenta,
	debug: chalk.gray,
	silly: chalk.gray.dim,
};

const maskFormat = winston.format(info => {
	if (typeof info.message === 'string') {
		info.message = redactSensitiveData(info.message);
	}
	return info;
});

// Metadata other than the timestamp is appended as JSON
const renderMeta = (meta: Record<string, unknown>): string => {
	const rest = Object.entries(meta).filter(
		([key, value]) => key !== 'timestamp' && value !== undefined
	);
	if (rest.length === 0) return '';
	try {
		return ' ' + JSON.stringify(Object.fromEntries(rest));
	} catch {
		return ' [unserializable metadata]';
	}
};

const consoleFormat = winston.format.printf(({ level, message, timestamp, ...meta }) => {
	const colorize = levelColorMap[level] || chalk.white;

	return `${chalk.dim(String(timestamp))} ${colorize(level.toUpperCase())}: ${String(message)}${renderMeta(meta)}`;
});

// File formatting (no colors)
const fileFormat = winston.format.printf(({ level, message, timestamp, ...meta }) => {
	return `${String(timestamp)} [${level.toUpperCase()}]: ${String(message)}${renderMeta(meta)}`;
});

// ===== 4. Logger Options Interface =====

export interface LoggerOptions {
	level?: LogLevel;
	silent?: boolean;
	file?: string;
}

export type LogMeta = Record<string, unknown>;

// ===== 5. Core Logger Class =====

export class Logger {
	private logger: winston.Logger;
	private readonly isSilent: boolean;

	constructor(options: LoggerOptions = {}) {
		this.isSilent = options.silent ?? false;

		this.logger = winston.createLogger({
			levels: logLevels,
			level: options.level ?? 'info',
			format: winston.format.combine(
				winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
				maskFormat()
			),
			transports: [this.createTransport(options.file)],
			silent: this.isSilent,
		});
	}

	private createTransport(filePath?: string): winston.transport {
		if (filePath) {
			fs.mkdirSync(path.dirname(filePath), { recursive: true });
			return new winston.transports.File({
				filename: filePath,
				format: winston.format.combine(
					winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
					maskFormat(),
					fileFormat
				),
			});
		}

		return new winston.transports.Console({
			format: winston.format.combine(
				winston.format.timestamp({ format: 'HH:mm:ss' }),
				maskFormat(),
				consoleFormat
			),
			stderrLevels: Object.keys(logLevels), // Redirect all log levels to stderr
		});
	}

	// ===== Core Logging Methods =====

	error(message: string, meta?: LogMeta): void {
		this.logger.error(message, meta);
	}

	warn(message: string, meta?: LogMeta): void {
		this.logger.warn(message, meta);
	}

	info(message: string, meta?: LogMeta): void {
		this.logger.info(message, meta);
	}

	debug(message: string, meta?: LogMeta): void {
		this.logger.debug(message, meta);
	}

	// ===== Runtime Configuration Management =====

	setLevel(level: string): void {
		const normalized = level.toLowerCase();
		if (isLogLevel(normalized)) {
			this.logger.level = normalized;
		} else {
			this.error(`Invalid log level: ${level}. Valid levels: ${Object.keys(logLevels).join(', ')}`);
		}
	}

	getLevel(): string {
		return this.logger.level;
	}

	redirectToFile(filePath: string): void {
		try {
			this.logger.clear();
			this.logger.add(this.createTransport(filePath));
		} catch (error) {
			this.error(`Failed to redirect logger to file: ${String(error)}`);
		}
	}

	createChild(options: LoggerOptions = {}): Logger {
		const childOptions: LoggerOptions = {
			silent: options.silent ?? this.isSilent,
		};
		const level = options.level ?? this.getLevel();
		if (isLogLevel(level)) {
			childOptions.level = level;
		}
		if (options.file !== undefined) {
			childOptions.file = options.file;
		}

		return new Logger(childOptions);
	}
}

// ===== 6. Singleton Pattern =====

export const logger = new Logger({ silent: process.env.NODE_ENV === 'test' });

// ===== Utility Functions =====

export const createLogger = (options: LoggerOptions = {}): Logger => {
	return new Logger(options);
};

export const setGlobalLogLevel = (level: string): void => {
	logger.setLevel(level);
};

export const getGlobalLogLevel = (): string => {
	return logger.getLevel();
};

/**
 * Shortens user content before it reaches debug logs.
 */
export const truncateForLog = (content: string, maxLength = 100): string =>
	content.length > maxLength ? content.slice(0, maxLength) + '...' : content;
