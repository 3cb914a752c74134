/**
 * Help command handler.
 * Lists the moderation commands and the warning thresholds in force.
 *
 * @module commands/help
 */

import type { Context, Telegraf } from "telegraf";
import { bold, code, type FmtString, fmt } from "telegraf/format";
import type { ConfigStore } from "../services/configStore";
import type { ThresholdEntry } from "../types";
import { replyWithAutoDelete } from "../utils/autoDelete";
import { MODERATION_HELP } from "./moderation";
import { WARNING_HELP } from "./warnings";

const SETUP_HELP = fmt`${bold("Setup")}
${code("/setup <chatId>")} - Send moderation logs to another chat`;

/** "3 warnings: timeout, 5 warnings: kick" as separate lines */
export function describeThresholds(table: readonly ThresholdEntry[]): string {
	if (table.length === 0) return "No automatic actions configured.";
	return table
		.map((entry) => `${entry.count} warnings: ${entry.action}`)
		.join("\n");
}

export function buildHelpText(store: Pick<ConfigStore, "getThresholdTable">): FmtString {
	return fmt`${bold("Moderation Bot - Command Reference")}

${SETUP_HELP}

${MODERATION_HELP}

${WARNING_HELP}

${bold("Automatic actions")}
${describeThresholds(store.getThresholdTable())}

Target a member by replying to their message, or with their numeric id or @username.`;
}

/**
 * Registers the help command with the bot.
 *
 * Command:
 * - /help - Display the command reference
 *
 * @example
 * ```typescript
 * registerHelpCommand(bot, store);
 * ```
 */
export function registerHelpCommand(
	bot: Telegraf<Context>,
	store: ConfigStore,
): void {
	bot.command("help", async (ctx) => {
		await replyWithAutoDelete(ctx, buildHelpText(store));
	});
}
