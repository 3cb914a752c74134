/**
 * Log channel setup.
 *
 * @module commands/setup
 */

import type { Context, Telegraf } from "telegraf";
import { code, fmt } from "telegraf/format";
import { requireRights } from "../middleware/index";
import type { ModerationServices } from "../services/container";
import { replyWithAutoDelete } from "../utils/autoDelete";
import { replyWithError } from "../utils/commandErrors";
import { ChannelIdSchema, communityId } from "../utils/ids";
import { StructuredLogger } from "../utils/logger";
import { getCommandArgs } from "../utils/targetResolver";

const CHAT_ID = /^-?[1-9]\d*$/;

/**
 * Command: /setup
 * Registers the chat that receives this group's moderation log.
 *
 * Permission: can_change_info
 * Syntax: /setup <chatId>
 *
 * @example
 * User: /setup -1001234567890
 * Bot: Setup complete. Moderation logs will be sent to -1001234567890.
 */
export const createSetupHandler =
	({ store }: Pick<ModerationServices, "store">) =>
	async (ctx: Context): Promise<void> => {
		const chatId = ctx.chat?.id;
		if (chatId === undefined) return;

		const [rawChannel] = getCommandArgs(ctx);
		const parsed = ChannelIdSchema.safeParse(
			rawChannel && CHAT_ID.test(rawChannel) ? Number(rawChannel) : Number.NaN,
		);
		if (!parsed.success) {
			await replyWithAutoDelete(
				ctx,
				fmt`Usage: ${code("/setup <chatId>")}\nAdd the bot to the log channel first, then pass the channel's numeric id.`,
			);
			return;
		}

		const channel = parsed.data;
		try {
			await store.runExclusive(async () => {
				store.setLogChannel(communityId(chatId), channel);
				await store.save();
			});
		} catch (error) {
			await replyWithError(ctx, error, "setup");
			return;
		}

		StructuredLogger.logUserAction("Log channel configured", {
			userId: ctx.from?.id,
			chatId,
			channel,
		});
		await replyWithAutoDelete(
			ctx,
			fmt`Setup complete. Moderation logs will be sent to ${code(String(channel))}.`,
		);
	};

export function registerSetupCommand(
	bot: Telegraf<Context>,
	services: ModerationServices,
): void {
	bot.command("setup", requireRights("can_change_info"), createSetupHandler(services));
}
