/**
 * Main entry point for the moderation bot.
 * Loads the moderation document, wires the services and command handlers, and
 * manages graceful shutdown.
 *
 * @module bot
 */

import { Telegraf } from "telegraf";
import { registerHelpCommand } from "./commands/help";
import { registerModerationCommands } from "./commands/moderation";
import { registerSetupCommand } from "./commands/setup";
import { registerWarningCommands } from "./commands/warnings";
import { config, validateConfig } from "./config";
import { ConfigCorruptError } from "./errors";
import { trackActivity } from "./services/chatActivity";
import { ConfigStore } from "./services/configStore";
import { createServices } from "./services/container";
import { clearAllScheduledDeletes } from "./utils/autoDelete";
import { logger, updateLogLevel } from "./utils/logger";

/**
 * Startup sequence:
 * 1. Validates configuration from environment variables
 * 2. Loads (or creates) the moderation document; a corrupt file aborts startup
 * 3. Creates the Telegraf bot and the moderation services
 * 4. Registers middleware and command handlers
 * 5. Configures graceful shutdown and launches long polling
 */
async function main(): Promise<void> {
	try {
		validateConfig();
		updateLogLevel(config.logLevel);

		const store = new ConfigStore(config.configFilePath);
		await store.load();

		const bot = new Telegraf(config.botToken);
		const services = createServices(bot.telegram, store);

		// Runs before commands so /clear sees every message
		bot.use(trackActivity(services.activity));

		registerHelpCommand(bot, store);
		registerSetupCommand(bot, services);
		registerModerationCommands(bot, services);
		registerWarningCommands(bot, services);

		bot.catch((err, ctx) => {
			logger.error("Bot error", { error: err, update: ctx.update });
		});

		const shutdown = (signal: string) => {
			logger.info("Shutting down", { signal });
			clearAllScheduledDeletes();
			bot.stop(signal);
		};
		process.once("SIGINT", () => shutdown("SIGINT"));
		process.once("SIGTERM", () => shutdown("SIGTERM"));

		await bot.launch(() => {
			logger.info("Bot started successfully", {
				configFile: store.filePath,
			});
		});
	} catch (error) {
		if (error instanceof ConfigCorruptError) {
			logger.error("Refusing to start with a corrupt config file", {
				filePath: error.filePath,
				error: error.message,
			});
		} else {
			logger.error("Failed to start bot", error);
		}
		process.exit(1);
	}
}

void main();
