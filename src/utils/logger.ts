/**
 * Logger utility module for the Modwarden bot.
 * Provides structured logging with Winston, including file rotation,
 * console output, and specialized handlers for errors and rejections.
 *
 * @module utils/logger
 */

import * as fs from "fs";
import * as path from "path";
import * as winston from "winston";
import { LOG_DIR } from "./paths";

/** Log files go to `logs/` at the project root. */
const logDir = LOG_DIR;

/** File transports stay off under the test runner. */
const fileLogging = process.env.NODE_ENV !== "test";

if (fileLogging && !fs.existsSync(logDir)) {
	fs.mkdirSync(logDir, { recursive: true });
}

/**
 * Custom format for log entries.
 * Combines timestamp, error stack traces, and metadata into a readable format.
 */
const logFormat = winston.format.combine(
	winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
	winston.format.errors({ stack: true }),
	winston.format.printf(({ timestamp, level, message, ...meta }) => {
		let msg = `[${timestamp}] [${level.toUpperCase()}] ${message}`;
		if (Object.keys(meta).length > 0 && meta.stack) {
			msg += `\n${meta.stack}`;
		} else if (Object.keys(meta).length > 0) {
			msg += ` ${JSON.stringify(meta)}`;
		}
		return msg;
	}),
);

/**
 * Initial level, read from process.env because the config module imports this one.
 * Startup applies `config.logLevel` through {@link updateLogLevel}.
 */
const getLogLevel = (): string => {
	return process.env.LOG_LEVEL || "info";
};

const consoleTransport = new winston.transports.Console({
	format: winston.format.combine(winston.format.colorize(), logFormat),
});

const fileTransports = fileLogging
	? [
			new winston.transports.File({
				filename: path.join(logDir, "combined.log"),
				maxsize: 10485760, // 10MB
				maxFiles: 5,
				tailable: true,
			}),
			new winston.transports.File({
				filename: path.join(logDir, "error.log"),
				level: "error",
				maxsize: 10485760, // 10MB
				maxFiles: 5,
				tailable: true,
			}),
		]
	: [];

/**
 * Main Winston logger instance.
 *
 * - Console output with color coding
 * - Combined and error log files with 10MB rotation
 * - Handlers for uncaught exceptions and unhandled rejections
 *
 * @example
 * ```typescript
 * logger.info('Warning recorded', { chatId: -100123, userId: 42 });
 * ```
 */
export const logger = winston.createLogger({
	level: getLogLevel(),
	format: logFormat,
	transports: [consoleTransport, ...fileTransports],
	exceptionHandlers: fileLogging
		? [
				new winston.transports.File({
					filename: path.join(logDir, "exceptions.log"),
					maxsize: 10485760,
					maxFiles: 3,
				}),
			]
		: [],
	rejectionHandlers: fileLogging
		? [
				new winston.transports.File({
					filename: path.join(logDir, "rejections.log"),
					maxsize: 10485760,
					maxFiles: 3,
				}),
			]
		: [],
});

/**
 * Updates the logger's level at runtime.
 *
 * @param level - The new log level (error, warn, info, debug)
 */
export const updateLogLevel = (level: string): void => {
	logger.level = level;
};

/**
 * Context metadata for structured logging.
 */
export interface LogContext {
	/** Telegram user ID of the actor */
	userId?: number;
	/** Username of the actor */
	username?: string;
	/** Chat the event happened in */
	chatId?: number;
	/** Operation type */
	operation?: string;
	/** Additional metadata */
	[key: string]: unknown;
}

/**
 * Helper class for structured logging with consistent context.
 */
export class StructuredLogger {
	/**
	 * Logs a user action with context.
	 *
	 * @example
	 * ```typescript
	 * StructuredLogger.logUserAction('Warnings viewed', {
	 *   userId: 12345,
	 *   chatId: -100987,
	 *   operation: 'view_warnings'
	 * });
	 * ```
	 */
	static logUserAction(action: string, context: LogContext): void {
		logger.info(action, this.sanitizeContext(context));
	}

	/**
	 * Logs a moderation action that was applied or recorded.
	 * Every audit record passes through here, whether or not a log channel exists.
	 */
	static logModerationAction(action: string, context: LogContext): void {
		logger.info(`[MODERATION] ${action}`, this.sanitizeContext(context));
	}

	/**
	 * Logs a security event (denied commands, hierarchy violations).
	 */
	static logSecurityEvent(event: string, context: LogContext): void {
		logger.warn(`[SECURITY] ${event}`, this.sanitizeContext(context));
	}

	/**
	 * Logs an error with full context and stack trace.
	 */
	static logError(error: Error | string, context: LogContext = {}): void {
		if (error instanceof Error) {
			logger.error(error.message, {
				...this.sanitizeContext(context),
				stack: error.stack,
			});
		} else {
			logger.error(error, this.sanitizeContext(context));
		}
	}

	static logDebug(message: string, context: LogContext = {}): void {
		logger.debug(message, this.sanitizeContext(context));
	}

	/**
	 * Masks fields that must never reach a log file.
	 */
	private static sanitizeContext(context: LogContext): LogContext {
		const sanitized = { ...context };
		const sensitiveKeys = ["token", "botToken", "password", "secret"];

		for (const key of sensitiveKeys) {
			if (key in sanitized) {
				sanitized[key] = "[REDACTED]";
			}
		}

		return sanitized;
	}
}
