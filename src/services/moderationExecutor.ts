/**
 * Applies escalation actions to Telegram chat members.
 *
 * Telegram has no native "timeout" or "kick": a timeout is a restriction with an
 * expiry, and a kick is a ban followed by an immediate unban so the user can rejoin.
 *
 * @module services/moderationExecutor
 */

import { type Telegram, TelegramError } from "telegraf";
import type { ChatPermissions } from "telegraf/types";
import type { EscalationAction, ModerationRequest } from "../types";
import type { CommunityId, SubjectId } from "../utils/ids";
import { StructuredLogger } from "../utils/logger";
import { domainError, fault, ok, type Result } from "../utils/result";

export type ModerationErrorKind = "forbidden" | "bad_request" | "not_banned";

export type ModerationResult = Result<void, ModerationErrorKind>;

/** Collaborator that performs platform moderation calls */
export interface ModerationExecutor {
	execute(request: ModerationRequest): Promise<ModerationResult>;
	unban(community: CommunityId, subject: SubjectId): Promise<ModerationResult>;
}

export type ModerationGateway = Pick<
	Telegram,
	"restrictChatMember" | "banChatMember" | "unbanChatMember" | "getChatMember"
>;

/** Telegram treats restrictions shorter than this as permanent */
export const MIN_RESTRICT_SECONDS = 30;

export const MUTED_PERMISSIONS: ChatPermissions = {
	can_send_messages: false,
	can_send_audios: false,
	can_send_documents: false,
	can_send_photos: false,
	can_send_videos: false,
	can_send_video_notes: false,
	can_send_voice_notes: false,
	can_send_polls: false,
	can_send_other_messages: false,
	can_add_web_page_previews: false,
	can_change_info: false,
	can_invite_users: false,
	can_pin_messages: false,
	can_manage_topics: false,
};

const VERBS: Record<EscalationAction | "unban", string> = {
	timeout: "timeout",
	kick: "kick",
	ban: "ban",
	unban: "unban",
};

const MISSING_RIGHTS =
	/not enough rights|CHAT_ADMIN_REQUIRED|can't remove chat owner|user is an administrator|method is available only for supergroups/i;

/**
 * Maps a failed Telegram call onto the result taxonomy. Rights problems come back
 * as 403 or as 400 with a descriptive message; other 400s are bad requests.
 */
export function classifyTelegramError(
	error: unknown,
	verb: string,
): ModerationResult {
	if (error instanceof TelegramError) {
		if (error.code === 403 || MISSING_RIGHTS.test(error.description)) {
			return domainError(
				"forbidden",
				`I don't have permission to ${verb} that user.`,
			);
		}
		if (error.code === 400) {
			return domainError(
				"bad_request",
				`Telegram rejected the request: ${error.description}`,
			);
		}
	}
	return fault(error);
}

export interface TelegramModerationExecutorOptions {
	/** Timeout length when the request carries none */
	defaultTimeoutSeconds: number;
	/** Unix time in seconds; defaults to the system clock */
	now?: () => number;
}

export class TelegramModerationExecutor implements ModerationExecutor {
	private readonly now: () => number;

	constructor(
		private readonly telegram: ModerationGateway,
		private readonly options: TelegramModerationExecutorOptions,
	) {
		this.now = options.now ?? (() => Math.floor(Date.now() / 1000));
	}

	async execute(request: ModerationRequest): Promise<ModerationResult> {
		const { action, community, subject } = request;
		try {
			switch (action) {
				case "timeout": {
					const seconds = Math.max(
						request.durationSeconds ?? this.options.defaultTimeoutSeconds,
						MIN_RESTRICT_SECONDS,
					);
					await this.telegram.restrictChatMember(community, subject, {
						permissions: MUTED_PERMISSIONS,
						until_date: this.now() + seconds,
					});
					break;
				}
				case "kick":
					await this.telegram.banChatMember(community, subject);
					await this.telegram.unbanChatMember(community, subject, {
						only_if_banned: true,
					});
					break;
				case "ban":
					await this.telegram.banChatMember(community, subject, undefined, {
						revoke_messages: request.revokeMessages ?? false,
					});
					break;
			}
		} catch (error) {
			return this.failure(error, VERBS[action], request);
		}

		StructuredLogger.logModerationAction(`Member ${action} applied`, {
			chatId: community,
			targetUserId: subject,
			reason: request.reason,
			durationSeconds: request.durationSeconds,
		});
		return ok(undefined);
	}

	async unban(
		community: CommunityId,
		subject: SubjectId,
	): Promise<ModerationResult> {
		try {
			const member = await this.telegram.getChatMember(community, subject);
			if (member.status !== "kicked") {
				return domainError("not_banned", "This user is not banned.");
			}
			await this.telegram.unbanChatMember(community, subject, {
				only_if_banned: true,
			});
		} catch (error) {
			return this.failure(error, VERBS.unban, { community, subject });
		}

		StructuredLogger.logModerationAction("Member unbanned", {
			chatId: community,
			targetUserId: subject,
		});
		return ok(undefined);
	}

	private failure(
		error: unknown,
		verb: string,
		context: { community: CommunityId; subject: SubjectId },
	): ModerationResult {
		const result = classifyTelegramError(error, verb);
		if (result.status === "fault") {
			StructuredLogger.logError(result.cause, {
				chatId: context.community,
				targetUserId: context.subject,
				operation: verb,
			});
		} else {
			StructuredLogger.logSecurityEvent(`Could not ${verb} member`, {
				chatId: context.community,
				targetUserId: context.subject,
				reason: result.status === "domain_error" ? result.kind : undefined,
			});
		}
		return result;
	}
}
