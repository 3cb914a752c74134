/**
 * Posts moderation actions to a chat's configured log channel.
 *
 * @module services/auditLogger
 */

import type { Telegram } from "telegraf";
import { bold, code, FmtString, fmt } from "telegraf/format";
import { type AuditRecord, DEFAULT_REASON } from "../types";
import type { CommunityId } from "../utils/ids";
import { StructuredLogger } from "../utils/logger";
import type { ConfigStore } from "./configStore";

export interface AuditLogger {
	log(community: CommunityId, record: AuditRecord): Promise<void>;
}

type ChannelSender = Pick<Telegram, "sendMessage">;

/**
 * Renders an audit record as a log-channel post.
 *
 * @example
 * ```
 * Moderation Action: Ban
 * User: @spammer (42)
 * Moderator: @alice
 * Reason: Spam links
 *
 * User ID: 42
 * ```
 */
export function formatAuditMessage(record: AuditRecord): FmtString {
	const duration = record.duration
		? fmt`\nDuration: ${record.duration}`
		: new FmtString("");
	const footer =
		record.target.id !== undefined
			? fmt`\n\n${code`User ID: ${record.target.id}`}`
			: new FmtString("");

	return fmt`${bold`Moderation Action: ${record.action}`}\nUser: ${record.target.display}\nModerator: ${record.moderator.display}\nReason: ${record.reason ?? DEFAULT_REASON}${duration}${footer}`;
}

export class TelegramAuditLogger implements AuditLogger {
	constructor(
		private readonly telegram: ChannelSender,
		private readonly store: ConfigStore,
	) {}

	/** Never throws; a failed post is logged and dropped. */
	async log(community: CommunityId, record: AuditRecord): Promise<void> {
		StructuredLogger.logModerationAction(record.action, {
			chatId: community,
			targetUserId: record.target.id,
			target: record.target.display,
			moderator: record.moderator.display,
			reason: record.reason,
			duration: record.duration,
		});

		const channel = this.store.getLogChannel(community);
		if (channel === undefined) return;

		try {
			await this.telegram.sendMessage(channel, formatAuditMessage(record));
		} catch (error) {
			StructuredLogger.logError(
				error instanceof Error ? error : String(error),
				{ chatId: community, channel, operation: "audit_log" },
			);
		}
	}
}
