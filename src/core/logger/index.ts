export {
	Logger,
	logger,
	createLogger,
	setGlobalLogLevel,
	getGlobalLogLevel,
	redactSensitiveData,
	truncateForLog,
	isLogLevel,
	logLevels,
} from './logger.js';
export type { LoggerOptions, LogLevel, LogMeta } from './logger.js';
