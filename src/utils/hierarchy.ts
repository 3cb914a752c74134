/**
 * Chat role hierarchy and admin-right checks.
 *
 * Rank: creator > administrator > member/restricted > left/kicked.
 * A moderator may act on a member only when they rank strictly higher, unless
 * they are the chat creator or a configured bot owner.
 *
 * @module utils/hierarchy
 */

import type { Telegram } from "telegraf";
import type { ChatMember } from "telegraf/types";
import { config } from "../config";
import { logger } from "./logger";
import { domainError, ok, type Result } from "./result";

export type MemberStatus = ChatMember["status"];

/** Administrator rights the command layer gates on */
export type ModerationRight =
	| "can_restrict_members"
	| "can_delete_messages"
	| "can_change_info";

type MemberLookup = Pick<Telegram, "getChatMember">;

const RANKS: Record<MemberStatus, number> = {
	creator: 3,
	administrator: 2,
	member: 1,
	restricted: 1,
	left: 0,
	kicked: 0,
};

export const rankOf = (status: MemberStatus): number => RANKS[status];

export const isBotOwner = (userId: number): boolean =>
	config.ownerIds.includes(userId);

/** Creator always holds every right; administrators only the ones granted. */
export function hasRight(member: ChatMember, right: ModerationRight): boolean {
	if (member.status === "creator") return true;
	if (member.status === "administrator") return member[right];
	return false;
}

export interface Standing {
	userId: number;
	status: MemberStatus;
}

/**
 * Decides whether `actor` may moderate `target`.
 *
 * @param verb - Used in the refusal text, e.g. "ban" or "warn"
 */
export function canModerate(
	actor: Standing,
	target: Standing,
	verb: string,
): Result<void, "hierarchy"> {
	if (isBotOwner(actor.userId) || actor.status === "creator") {
		return ok(undefined);
	}

	if (rankOf(target.status) >= rankOf(actor.status)) {
		return domainError(
			"hierarchy",
			`You cannot ${verb} someone with a role higher than or equal to yours.`,
		);
	}

	return ok(undefined);
}

/**
 * Fetches a member's status. Users Telegram cannot find in the chat count as
 * having left, which still allows banning them by id.
 */
export async function fetchStanding(
	telegram: MemberLookup,
	chatId: number,
	userId: number,
): Promise<Standing> {
	try {
		const member = await telegram.getChatMember(chatId, userId);
		return { userId, status: member.status };
	} catch (error) {
		logger.debug("Member lookup failed, treating as absent", {
			chatId,
			userId,
			error,
		});
		return { userId, status: "left" };
	}
}

/** Looks up both parties and applies {@link canModerate}. */
export async function checkHierarchy(
	telegram: MemberLookup,
	chatId: number,
	actorId: number,
	targetId: number,
	verb: string,
): Promise<Result<void, "hierarchy">> {
	const [actor, target] = await Promise.all([
		fetchStanding(telegram, chatId, actorId),
		fetchStanding(telegram, chatId, targetId),
	]);
	return canModerate(actor, target, verb);
}
