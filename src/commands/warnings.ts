/**
 * Warning command handlers: issuing, listing and clearing warnings, plus the
 * automatic escalation a new warning can trigger.
 *
 * @module commands/warnings
 */

import type { Context, Telegraf } from "telegraf";
import { bold, code, type FmtString, fmt } from "telegraf/format";
import { config } from "../config";
import { creatorOrOwner, requireRights } from "../middleware/index";
import { displayName } from "../services/chatActivity";
import type { ModerationServices } from "../services/container";
import type { WarningOutcome } from "../services/warningEngine";
import type { EscalationAction, ThresholdEntry, WarningRecord } from "../types";
import { replyWithAutoDelete } from "../utils/autoDelete";
import { replyWithError } from "../utils/commandErrors";
import { resolveCommandTarget } from "../utils/commandHelper";
import { formatDuration } from "../utils/duration";
import { communityId, moderatorId, subjectId } from "../utils/ids";
import { logger } from "../utils/logger";
import type { ResolvedTarget } from "../utils/targetResolver";

const AUTO_ACTIONS: Record<
	EscalationAction,
	{ audit: string; describe: (count: number, length: string) => string }
> = {
	timeout: {
		audit: "Auto-Timeout",
		describe: (count, length) =>
			`has been automatically timed out for ${length} after receiving ${count} warnings.`,
	},
	kick: {
		audit: "Auto-Kick",
		describe: (count) =>
			`has been automatically kicked after receiving ${count} warnings.`,
	},
	ban: {
		audit: "Auto-Ban",
		describe: (count) =>
			`has been automatically banned after receiving ${count} warnings.`,
	},
};

/**
 * "2024-05-01T12:30:00.000Z" -> "2024-05-01 12:30:00". Timestamps are shown as
 * stored; anything that does not look like ISO-8601 is shown verbatim.
 */
export function formatWarningTime(timestamp: string): string {
	const match = /^(\d{4}-\d{2}-\d{2})T(\d{2}:\d{2}:\d{2})/.exec(timestamp);
	return match ? `${match[1]} ${match[2]}` : timestamp;
}

/**
 * Applies the escalation a warning count triggered and announces the outcome in
 * the chat. Announcements are not auto-deleted.
 */
async function applyAutomaticAction(
	ctx: Context,
	services: ModerationServices,
	chatId: number,
	target: ResolvedTarget,
	triggered: ThresholdEntry,
): Promise<void> {
	const { action, count } = triggered;
	const reason = `Automatic ${action} after ${count} warnings`;
	const durationSeconds =
		action === "timeout" ? config.autoTimeoutMinutes * 60 : undefined;

	const result = await services.executor.execute({
		action,
		community: communityId(chatId),
		subject: subjectId(target.userId),
		reason,
		durationSeconds,
	});

	if (result.status !== "ok") {
		const detail =
			result.status === "fault"
				? result.cause.message
				: result.kind === "forbidden"
					? "Missing permissions."
					: result.message;
		await ctx.reply(`Failed to ${action} ${target.display}: ${detail}`);
		return;
	}

	const length =
		durationSeconds !== undefined ? formatDuration(durationSeconds) : "";
	const auto = AUTO_ACTIONS[action];
	await ctx.reply(
		fmt`${bold("Automatic Action")}\n${target.display} ${auto.describe(count, length)}`,
	);
	await services.audit.log(communityId(chatId), {
		action: auto.audit,
		target: { id: target.userId, display: target.display },
		moderator: {
			id: ctx.botInfo.id,
			display: displayName(ctx.botInfo),
		},
		reason,
		duration: durationSeconds !== undefined ? length : undefined,
	});
}

/**
 * Command: /warn
 * Records a warning and applies any escalation the new count triggers.
 *
 * Permission: can_restrict_members
 * Syntax: /warn <@username|userId> [reason]
 *
 * @example
 * User: /warn @alice spamming
 * Bot: @alice has been warned.
 *      Reason: spamming
 *      Warning count: 3
 *      Automatic Action
 *      @alice has been automatically timed out for 1 hour after receiving 3 warnings.
 */
export const createWarnHandler =
	(services: ModerationServices) =>
	async (ctx: Context): Promise<void> => {
		const resolved = await resolveCommandTarget(ctx, services.activity, {
			usage:
				"Usage: /warn <@username|userId> [reason] or reply to a message with /warn [reason]",
			verb: "warn",
		});
		if (!resolved) return;
		const { chatId, moderator, target, rest } = resolved;

		let outcome: WarningOutcome;
		try {
			outcome = await services.engine.recordWarning(
				communityId(chatId),
				subjectId(target.userId),
				moderatorId(moderator.id),
				rest.join(" "),
			);
		} catch (error) {
			await replyWithError(ctx, error, "warn");
			return;
		}

		await ctx.reply(
			fmt`${target.display} has been warned.\n${bold("Reason:")} ${outcome.record.reason}\n${bold("Warning count:")} ${outcome.newCount}`,
		);
		await services.audit.log(communityId(chatId), {
			...outcome.audit,
			target: { id: target.userId, display: target.display },
			moderator: { id: moderator.id, display: displayName(moderator) },
		});

		if (outcome.triggered) {
			await applyAutomaticAction(ctx, services, chatId, target, outcome.triggered);
		}
	};

function describeWarning(
	services: ModerationServices,
	chatId: number,
	warning: WarningRecord,
	index: number,
): FmtString {
	const known = services.activity.lookup(chatId, warning.moderatorId);
	const moderator = known
		? displayName({ username: known.username, first_name: known.firstName })
		: `Unknown Moderator (${warning.moderatorId})`;
	return fmt`\n\n${bold(`Warning ${index}`)}\n${bold("Reason:")} ${warning.reason}\n${bold("Moderator:")} ${moderator}\n${bold("Date:")} ${formatWarningTime(warning.timestamp)}`;
}

/**
 * Command: /warnings
 * Lists a member's warnings, oldest first.
 *
 * Permission: can_restrict_members
 * Syntax: /warnings <@username|userId>
 */
export const createWarningsHandler =
	(services: ModerationServices) =>
	async (ctx: Context): Promise<void> => {
		const resolved = await resolveCommandTarget(ctx, services.activity, {
			usage:
				"Usage: /warnings <@username|userId> or reply to a message with /warnings",
		});
		if (!resolved) return;
		const { chatId, target } = resolved;

		const warnings = services.engine.viewWarnings(
			communityId(chatId),
			subjectId(target.userId),
		);
		if (warnings.length === 0) {
			await replyWithAutoDelete(ctx, `${target.display} has no warnings.`);
			return;
		}

		const body = warnings.reduce<FmtString>(
			(text, warning, i) =>
				fmt`${text}${describeWarning(services, chatId, warning, i + 1)}`,
			fmt`${bold(`Warnings for ${target.display}`)}\n${target.display} has ${warnings.length} warning(s).`,
		);
		await replyWithAutoDelete(ctx, body);
	};

/**
 * Command: /clearwarnings
 * Empties a member's warning ledger.
 *
 * Permission: chat creator or bot owner
 * Syntax: /clearwarnings <@username|userId>
 */
export const createClearWarningsHandler =
	(services: ModerationServices) =>
	async (ctx: Context): Promise<void> => {
		const resolved = await resolveCommandTarget(ctx, services.activity, {
			usage:
				"Usage: /clearwarnings <@username|userId> or reply to a message with /clearwarnings",
		});
		if (!resolved) return;
		const { chatId, moderator, target } = resolved;
		const { store, engine } = services;

		let cleared: number;
		try {
			cleared = await store.runExclusive(async () => {
				const count = engine.clearWarnings(
					communityId(chatId),
					subjectId(target.userId),
				);
				if (count > 0) {
					await store.save();
				}
				return count;
			});
		} catch (error) {
			await replyWithError(ctx, error, "clearwarnings");
			return;
		}

		if (cleared === 0) {
			await replyWithAutoDelete(ctx, `${target.display} has no warnings to clear.`);
			return;
		}

		logger.info("Warnings cleared", {
			chatId,
			targetUserId: target.userId,
			adminId: moderator.id,
			cleared,
		});
		await replyWithAutoDelete(
			ctx,
			`Cleared ${cleared} warning(s) for ${target.display}.`,
		);
		await services.audit.log(communityId(chatId), {
			action: "Clear Warnings",
			target: { id: target.userId, display: target.display },
			moderator: { id: moderator.id, display: displayName(moderator) },
			reason: `Cleared ${cleared} warnings`,
		});
	};

export function registerWarningCommands(
	bot: Telegraf<Context>,
	services: ModerationServices,
): void {
	const restrict = requireRights("can_restrict_members");

	bot.command("warn", restrict, createWarnHandler(services));
	bot.command("warnings", restrict, createWarningsHandler(services));
	bot.command("clearwarnings", creatorOrOwner, createClearWarningsHandler(services));
}

export const WARNING_HELP = fmt`${bold("Warnings")}
${code("/warn <user> [reason]")} - Warn a member
${code("/warnings <user>")} - List a member's warnings
${code("/clearwarnings <user>")} - Clear a member's warnings (chat owner)`;
