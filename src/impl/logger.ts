import pino, {type Logger} from "pino";
import {
	DEFAULT_LOG_LEVEL,
	ENV_KEYS,
	LogLevelSchema,
	type LogLevel,
} from "./config.js";

const loggers = new Set<Logger>();

let level: LogLevel = (() => {
	const parsed = LogLevelSchema.safeParse(process.env[ENV_KEYS.logLevel]);
	return parsed.success ? parsed.data : DEFAULT_LOG_LEVEL;
})();

/**
 * Create a module logger named `sqlseed:<name>`.
 *
 * The level starts from SQLSEED_LOG_LEVEL; an unset or unknown level
 * falls back to "warn". setLogLevel() changes it for every logger.
 */
export function createLogger(name: string): Logger {
	const logger = pino({name: `sqlseed:${name}`, level});
	loggers.add(logger);
	return logger;
}

/**
 * Set the level of every sqlseed logger, including ones created later.
 */
export function setLogLevel(next: LogLevel): void {
	level = next;
	for (const logger of loggers) {
		logger.level = next;
	}
}

export function getLogLevel(): LogLevel {
	return level;
}
