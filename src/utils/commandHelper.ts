/** Shared preamble for commands aimed at a single member */

import type { Context } from "telegraf";
import type { User } from "telegraf/types";
import type { ChatActivityTracker } from "../services/chatActivity";
import { replyWithAutoDelete } from "./autoDelete";
import { checkHierarchy } from "./hierarchy";
import { StructuredLogger } from "./logger";
import { describeFailure } from "./result";
import {
	getCommandArgs,
	getRemainingArgs,
	type ResolvedTarget,
	resolveTargetUser,
} from "./targetResolver";

export interface CommandTarget {
	chatId: number;
	moderator: User;
	target: ResolvedTarget;
	/** Arguments after the user identifier */
	rest: string[];
}

export interface TargetOptions {
	/** Shown when no target can be resolved */
	usage: string;
	/** Enforces the role hierarchy; used in the refusal text */
	verb?: string;
}

/**
 * Resolves the command's target and, when `verb` is given, checks that the caller
 * outranks them. Replies and returns undefined when the command should stop.
 */
export async function resolveCommandTarget(
	ctx: Context,
	activity: ChatActivityTracker,
	options: TargetOptions,
): Promise<CommandTarget | undefined> {
	const chatId = ctx.chat?.id;
	const moderator = ctx.from;
	if (chatId === undefined || !moderator) return undefined;

	const args = getCommandArgs(ctx);
	const target = resolveTargetUser(ctx, args, activity);
	if (!target) {
		await replyWithAutoDelete(
			ctx,
			args.length > 0
				? `User not found. Reply to one of their messages or use their numeric id.\n${options.usage}`
				: options.usage,
		);
		return undefined;
	}

	if (options.verb) {
		const allowed = await checkHierarchy(
			ctx.telegram,
			chatId,
			moderator.id,
			target.userId,
			options.verb,
		);
		if (allowed.status !== "ok") {
			StructuredLogger.logSecurityEvent("Hierarchy check failed", {
				userId: moderator.id,
				chatId,
				targetUserId: target.userId,
				operation: options.verb,
			});
			await replyWithAutoDelete(ctx, describeFailure(allowed));
			return undefined;
		}
	}

	return { chatId, moderator, target, rest: getRemainingArgs(args, target) };
}
