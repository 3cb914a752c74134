/**
 * Moderation command handlers.
 * Provides commands for banning, unbanning, kicking and timing out members, and
 * for bulk-deleting recent messages.
 *
 * @module commands/moderation
 */

import type { Context, Telegraf } from "telegraf";
import { bold, code, fmt } from "telegraf/format";
import { requireRights } from "../middleware/index";
import { displayName } from "../services/chatActivity";
import type { ModerationServices } from "../services/container";
import {
	classifyTelegramError,
	type ModerationResult,
} from "../services/moderationExecutor";
import { DEFAULT_REASON, type EscalationAction } from "../types";
import { replyWithAutoDelete } from "../utils/autoDelete";
import { resolveCommandTarget } from "../utils/commandHelper";
import { formatDuration, parseDuration } from "../utils/duration";
import { communityId, subjectId } from "../utils/ids";
import { StructuredLogger } from "../utils/logger";
import { describeFailure, ok } from "../utils/result";
import { getCommandArgs, resolveIdentifier } from "../utils/targetResolver";

/** Telegram refuses to delete messages older than this */
export const DELETE_WINDOW_SECONDS = 48 * 60 * 60;
export const MAX_CLEAR = 100;
const DELETE_BATCH = 100;

const REVOKE_FLAG = "--revoke";

const joinReason = (words: string[]): string => words.join(" ").trim();

const chunk = <T>(items: readonly T[], size: number): T[][] => {
	const chunks: T[][] = [];
	for (let i = 0; i < items.length; i += size) {
		chunks.push(items.slice(i, i + size));
	}
	return chunks;
};

const ACTION_LABELS: Record<EscalationAction, { past: string; audit: string }> = {
	timeout: { past: "timed out", audit: "Timeout" },
	kick: { past: "kicked", audit: "Kick" },
	ban: { past: "banned", audit: "Ban" },
};

/**
 * Builds the handler for /ban and /kick, which differ only in the action.
 */
export const createRemovalHandler =
	(services: ModerationServices, action: "ban" | "kick") =>
	async (ctx: Context): Promise<void> => {
		const usage =
			action === "ban"
				? "Usage: /ban <@username|userId> [--revoke] [reason] or reply to a message with /ban [reason]"
				: "Usage: /kick <@username|userId> [reason] or reply to a message with /kick [reason]";

		const resolved = await resolveCommandTarget(ctx, services.activity, {
			usage,
			verb: action,
		});
		if (!resolved) return;
		const { chatId, moderator, target } = resolved;

		let rest = resolved.rest;
		const revokeMessages = action === "ban" && rest[0] === REVOKE_FLAG;
		if (revokeMessages) rest = rest.slice(1);
		const reason = joinReason(rest) || DEFAULT_REASON;

		const result = await services.executor.execute({
			action,
			community: communityId(chatId),
			subject: subjectId(target.userId),
			reason,
			revokeMessages,
		});
		if (result.status !== "ok") {
			await replyWithAutoDelete(ctx, describeFailure(result));
			return;
		}

		const labels = ACTION_LABELS[action];
		await replyWithAutoDelete(
			ctx,
			fmt`User ${target.display} has been ${labels.past}.\n${bold("Reason:")} ${reason}`,
		);
		await services.audit.log(communityId(chatId), {
			action: labels.audit,
			target: { id: target.userId, display: target.display },
			moderator: { id: moderator.id, display: displayName(moderator) },
			reason,
		});
	};

/**
 * Command: /timeout
 * Mutes a member for a fixed duration.
 *
 * Permission: can_restrict_members
 * Syntax: /timeout <@username|userId> <duration> [reason]
 *
 * @example
 * User: /timeout @alice 30m flooding
 * Bot: User @alice has been timed out for 30 minutes.
 *      Reason: flooding
 */
export const createTimeoutHandler =
	(services: ModerationServices) =>
	async (ctx: Context): Promise<void> => {
		const usage =
			"Usage: /timeout <@username|userId> <duration> [reason] (e.g., 30m, 1h, 1d)";
		const resolved = await resolveCommandTarget(ctx, services.activity, {
			usage,
			verb: "timeout",
		});
		if (!resolved) return;
		const { chatId, moderator, target, rest } = resolved;

		const [rawDuration, ...reasonWords] = rest;
		if (!rawDuration) {
			await replyWithAutoDelete(ctx, usage);
			return;
		}

		const duration = parseDuration(rawDuration);
		if (duration.status !== "ok") {
			await replyWithAutoDelete(ctx, describeFailure(duration));
			return;
		}
		if (duration.value.clamped) {
			await replyWithAutoDelete(
				ctx,
				"Duration exceeded maximum of 28 days. Setting timeout to 28 days.",
			);
		}

		const seconds = duration.value.seconds;
		const reason = joinReason(reasonWords) || DEFAULT_REASON;
		const result = await services.executor.execute({
			action: "timeout",
			community: communityId(chatId),
			subject: subjectId(target.userId),
			reason,
			durationSeconds: seconds,
		});
		if (result.status !== "ok") {
			await replyWithAutoDelete(ctx, describeFailure(result));
			return;
		}

		const length = formatDuration(seconds);
		await replyWithAutoDelete(
			ctx,
			fmt`User ${target.display} has been timed out for ${length}.\n${bold("Reason:")} ${reason}`,
		);
		await services.audit.log(communityId(chatId), {
			action: "Timeout",
			target: { id: target.userId, display: target.display },
			moderator: { id: moderator.id, display: displayName(moderator) },
			reason,
			duration: length,
		});
	};

/**
 * Command: /unban
 * Lifts a ban. Banned users cannot post, so the target is always a numeric id.
 *
 * Permission: can_restrict_members
 * Syntax: /unban <userId> [reason]
 */
export const createUnbanHandler =
	(services: ModerationServices) =>
	async (ctx: Context): Promise<void> => {
		const chatId = ctx.chat?.id;
		const moderator = ctx.from;
		if (chatId === undefined || !moderator) return;

		const [rawId, ...reasonWords] = getCommandArgs(ctx);
		const target =
			rawId && /^\d+$/.test(rawId)
				? resolveIdentifier(chatId, rawId, services.activity)
				: null;
		if (!target) {
			await replyWithAutoDelete(ctx, "Please provide a valid user ID.");
			return;
		}

		const reason = joinReason(reasonWords) || DEFAULT_REASON;
		const result = await services.executor.unban(
			communityId(chatId),
			subjectId(target.userId),
		);
		if (result.status !== "ok") {
			await replyWithAutoDelete(ctx, describeFailure(result));
			return;
		}

		await replyWithAutoDelete(
			ctx,
			fmt`User ${target.display} has been unbanned.\n${bold("Reason:")} ${reason}`,
		);
		await services.audit.log(communityId(chatId), {
			action: "Unban",
			target: { id: target.userId, display: target.display },
			moderator: { id: moderator.id, display: displayName(moderator) },
			reason,
		});
	};

/**
 * Command: /clear
 * Deletes recent messages the bot has seen in this chat, optionally only those
 * from one member. Messages older than 48 hours are skipped.
 *
 * Permission: can_delete_messages
 * Syntax: /clear <1-100> [@username|userId]
 */
export const createClearHandler =
	(services: ModerationServices, now: () => number = () => Math.floor(Date.now() / 1000)) =>
	async (ctx: Context): Promise<void> => {
		const chatId = ctx.chat?.id;
		const moderator = ctx.from;
		if (chatId === undefined || !moderator) return;

		const [rawAmount, identifier] = getCommandArgs(ctx);
		const amount = rawAmount && /^\d+$/.test(rawAmount) ? Number(rawAmount) : 0;
		if (amount < 1 || amount > MAX_CLEAR) {
			await replyWithAutoDelete(ctx, "Please provide a number between 1 and 100.");
			return;
		}

		const user = identifier
			? resolveIdentifier(chatId, identifier, services.activity)
			: null;
		if (identifier && !user) {
			await replyWithAutoDelete(
				ctx,
				"User not found. Use their numeric id or an @username that has posted here.",
			);
			return;
		}

		const commandId = ctx.message?.message_id;
		const cutoff = now() - DELETE_WINDOW_SECONDS;
		const ids = services.activity
			.recent(chatId, Number.MAX_SAFE_INTEGER)
			.filter((message) => message.messageId !== commandId)
			.slice(-amount)
			.filter((message) => !user || message.userId === user.userId)
			.filter((message) => message.date >= cutoff)
			.map((message) => message.messageId);

		const deleted = await deleteInBatches(ctx, chatId, ids);
		if (deleted.status !== "ok") {
			await replyWithAutoDelete(
				ctx,
				deleted.status === "domain_error" && deleted.kind === "forbidden"
					? "I don't have permission to delete messages."
					: describeFailure(deleted),
			);
			return;
		}
		services.activity.forget(chatId, ids);

		const scope = user ? ` from ${user.display}` : "";
		await replyWithAutoDelete(ctx, `Deleted ${ids.length} messages${scope}.`);
		await services.audit.log(communityId(chatId), {
			action: "Clear",
			target: user
				? { id: user.userId, display: user.display }
				: { display: chatTitle(ctx) },
			moderator: { id: moderator.id, display: displayName(moderator) },
			reason: `Cleared ${ids.length} messages${user ? ` from ${user.display}` : ` from ${chatTitle(ctx)}`}`,
		});
	};

const chatTitle = (ctx: Context): string =>
	ctx.chat && "title" in ctx.chat ? ctx.chat.title : "this chat";

async function deleteInBatches(
	ctx: Context,
	chatId: number,
	ids: number[],
): Promise<ModerationResult> {
	try {
		for (const batch of chunk(ids, DELETE_BATCH)) {
			await ctx.telegram.deleteMessages(chatId, batch);
		}
		return ok(undefined);
	} catch (error) {
		const result = classifyTelegramError(error, "delete messages for");
		if (result.status === "fault") {
			StructuredLogger.logError(result.cause, { chatId, operation: "clear" });
		}
		return result;
	}
}

/**
 * Registers all moderation commands with the bot.
 *
 * Commands registered:
 * - /ban - Ban a member (can_restrict_members)
 * - /unban - Lift a ban by user id (can_restrict_members)
 * - /kick - Remove a member who may rejoin (can_restrict_members)
 * - /timeout - Mute a member for a duration (can_restrict_members)
 * - /clear - Delete recent messages (can_delete_messages)
 *
 * @example
 * ```typescript
 * registerModerationCommands(bot, services);
 * ```
 */
export function registerModerationCommands(
	bot: Telegraf<Context>,
	services: ModerationServices,
): void {
	const restrict = requireRights("can_restrict_members");

	bot.command("ban", restrict, createRemovalHandler(services, "ban"));
	bot.command("kick", restrict, createRemovalHandler(services, "kick"));
	bot.command("unban", restrict, createUnbanHandler(services));
	bot.command("timeout", restrict, createTimeoutHandler(services));
	bot.command(
		"clear",
		requireRights("can_delete_messages"),
		createClearHandler(services),
	);
}

/** Shown by /help; kept next to the handlers so the two stay in sync. */
export const MODERATION_HELP = fmt`${bold("Moderation")}
${code("/ban <user> [--revoke] [reason]")} - Ban a member
${code("/unban <userId> [reason]")} - Lift a ban
${code("/kick <user> [reason]")} - Remove a member (they may rejoin)
${code("/timeout <user> <duration> [reason]")} - Mute for 30s, 5m, 2h, 1d...
${code("/clear <1-100> [user]")} - Delete recent messages`;
