/**
 * Configuration module for the Modwarden bot.
 * Loads environment variables and provides a typed configuration object.
 *
 * @module config
 */

import * as dotenv from "dotenv";
import { logger } from "./utils/logger";
import { ENV_FILE } from "./utils/paths";

dotenv.config({ path: ENV_FILE });

/**
 * Configuration interface defining all bot settings.
 *
 * @interface Config
 */
interface Config {
	/** Telegram bot API token from BotFather */
	botToken: string;

	/** Telegram user ID(s) allowed to bypass permission and hierarchy checks */
	ownerIds: number[];

	/** Path of the persisted moderation document */
	configFilePath: string;

	/** Logging level (error, warn, info, debug) */
	logLevel: string;

	/** Length of the timeout applied when a warning threshold triggers one */
	autoTimeoutMinutes: number;

	/** Bot replies in groups are deleted after this many seconds */
	replyTtlSeconds: number;
}

const parsePositiveInt = (value: string | undefined, fallback: number): number => {
	const parsed = parseInt(value ?? "", 10);
	return Number.isNaN(parsed) || parsed <= 0 ? fallback : parsed;
};

/**
 * Main configuration object populated from environment variables.
 * Falls back to default values where appropriate.
 */
export const config: Config = {
	botToken: process.env.BOT_TOKEN || "",
	ownerIds: (process.env.OWNER_ID || "")
		.split(",")
		.map((id) => parseInt(id.trim(), 10))
		.filter((id) => !Number.isNaN(id)),
	configFilePath: process.env.CONFIG_FILE || "./config.json",
	logLevel: process.env.LOG_LEVEL || "info",
	autoTimeoutMinutes: parsePositiveInt(process.env.AUTO_TIMEOUT_MINUTES, 60),
	replyTtlSeconds: parsePositiveInt(process.env.REPLY_TTL_SECONDS, 30),
};

/**
 * Validates that required configuration values are present.
 * Called at bot startup before anything connects to Telegram.
 *
 * @throws {Error} If BOT_TOKEN is not set
 */
export function validateConfig(): void {
	if (!config.botToken) {
		throw new Error("BOT_TOKEN is required in environment variables");
	}

	if (config.ownerIds.length === 0) {
		logger.warn(
			"OWNER_ID not set - only chat creators and administrators can moderate",
		);
	}
}
