/** Resolves the member a moderation command is aimed at */

import type { Context } from "telegraf";
import {
	type ChatActivityTracker,
	displayName,
	type KnownUser,
} from "../services/chatActivity";

export interface ResolvedTarget {
	userId: number;
	/** `@username`, first name, or the bare id when the bot has never seen them */
	display: string;
	source: "reply" | "args";
}

const NUMERIC_ID = /^[1-9]\d*$/;

const describeKnown = (user: KnownUser): string =>
	displayName({ username: user.username, first_name: user.firstName });

/** Words after the command, split on whitespace. */
export function getCommandArgs(ctx: Context): string[] {
	if (!ctx.message || !("text" in ctx.message)) {
		return [];
	}
	return ctx.message.text.trim().split(/\s+/).slice(1);
}

/**
 * Resolve the target of a command.
 *
 * Priority:
 * 1. The author of the replied-to message (bots excluded)
 * 2. A numeric user id in the first argument
 * 3. An `@username` in the first argument that the activity tracker has seen
 */
export function resolveTargetUser(
	ctx: Context,
	args: string[],
	activity: ChatActivityTracker,
): ResolvedTarget | null {
	const replyTo =
		ctx.message && "reply_to_message" in ctx.message
			? ctx.message.reply_to_message
			: undefined;

	if (replyTo?.from && !replyTo.from.is_bot) {
		return {
			userId: replyTo.from.id,
			display: displayName(replyTo.from),
			source: "reply",
		};
	}

	const identifier = args[0];
	const chatId = ctx.chat?.id;
	if (!identifier || chatId === undefined) {
		return null;
	}

	return resolveIdentifier(chatId, identifier, activity);
}

/** Resolves a numeric id or a tracked `@username` typed as an argument. */
export function resolveIdentifier(
	chatId: number,
	identifier: string,
	activity: ChatActivityTracker,
): ResolvedTarget | null {
	if (NUMERIC_ID.test(identifier)) {
		const userId = Number(identifier);
		if (!Number.isSafeInteger(userId)) return null;
		const known = activity.lookup(chatId, userId);
		return {
			userId,
			display: known ? describeKnown(known) : String(userId),
			source: "args",
		};
	}

	if (identifier.startsWith("@")) {
		const known = activity.resolveUsername(chatId, identifier);
		if (known) {
			return { userId: known.id, display: describeKnown(known), source: "args" };
		}
	}

	return null;
}

/**
 * Arguments left after the user identifier.
 * Replies consume no argument, so everything is returned.
 */
export function getRemainingArgs(
	args: string[],
	target: ResolvedTarget | null,
): string[] {
	if (!target || target.source === "reply") {
		return args;
	}
	return args.slice(1);
}
