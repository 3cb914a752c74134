/** Permission middleware for moderation commands */

import type { Context, MiddlewareFn } from "telegraf";
import type { ChatMember } from "telegraf/types";
import { replyWithAutoDelete } from "../utils/autoDelete";
import { hasRight, isBotOwner, type ModerationRight } from "../utils/hierarchy";
import { logger, StructuredLogger } from "../utils/logger";

const isGroup = (ctx: Context): boolean =>
	ctx.chat?.type === "group" || ctx.chat?.type === "supergroup";

/**
 * Fetches the caller's membership, replying with an error when the lookup fails.
 * Returns undefined when the handler chain should stop.
 */
async function callerMembership(ctx: Context): Promise<ChatMember | undefined> {
	const userId = ctx.from?.id;
	const chatId = ctx.chat?.id;
	if (userId === undefined || chatId === undefined) return undefined;

	try {
		return await ctx.telegram.getChatMember(chatId, userId);
	} catch (error) {
		logger.error("Failed to fetch caller membership", { userId, chatId, error });
		await replyWithAutoDelete(ctx, "Could not verify your permissions.");
		return undefined;
	}
}

/**
 * Middleware that restricts a command to group members holding `right`.
 * Bot owners and the chat creator always pass.
 *
 * @example
 * ```typescript
 * bot.command("ban", requireRights("can_restrict_members"), banHandler);
 * ```
 */
export const requireRights =
	(right: ModerationRight): MiddlewareFn<Context> =>
	async (ctx, next) => {
		const userId = ctx.from?.id;
		if (!userId) return;

		if (!isGroup(ctx)) {
			await replyWithAutoDelete(ctx, "This command can only be used in groups.");
			return;
		}

		if (isBotOwner(userId)) {
			return next();
		}

		const member = await callerMembership(ctx);
		if (!member) return;

		if (hasRight(member, right)) {
			return next();
		}

		StructuredLogger.logSecurityEvent("Command denied", {
			userId,
			username: ctx.from?.username,
			chatId: ctx.chat?.id,
			requiredRight: right,
		});
		await replyWithAutoDelete(
			ctx,
			"You do not have permission to use this command.",
		);
	};

/**
 * Middleware that restricts a command to the chat creator and bot owners.
 */
export const creatorOrOwner: MiddlewareFn<Context> = async (ctx, next) => {
	const userId = ctx.from?.id;
	if (!userId) return;

	if (!isGroup(ctx)) {
		await replyWithAutoDelete(ctx, "This command can only be used in groups.");
		return;
	}

	if (isBotOwner(userId)) {
		return next();
	}

	const member = await callerMembership(ctx);
	if (!member) return;

	if (member.status === "creator") {
		return next();
	}

	StructuredLogger.logSecurityEvent("Command denied", {
		userId,
		username: ctx.from?.username,
		chatId: ctx.chat?.id,
		requiredRole: "creator",
	});
	await replyWithAutoDelete(
		ctx,
		"Only the chat owner can use this command.",
	);
};
