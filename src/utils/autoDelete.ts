/**
 * Auto-delete utility for bot replies in groups.
 * Command messages and the bot's answers are removed after REPLY_TTL_SECONDS so
 * moderation chatter does not pile up in the chat.
 *
 * @module utils/autoDelete
 */

import type { Context, Telegram } from "telegraf";
import type { Message } from "telegraf/types";
import { config } from "../config";
import { logger, StructuredLogger } from "./logger";

function isGroupChat(ctx: Context): boolean {
	const chatType = ctx.chat?.type;
	return chatType === "group" || chatType === "supergroup";
}

const defaultTimeoutMs = (): number => config.replyTtlSeconds * 1000;

// Track scheduled deletions so shutdown can cancel them
const scheduledDeletions = new Map<string, NodeJS.Timeout>();

/**
 * Schedule a message for deletion after a timeout.
 * @returns Cancel function to abort the scheduled deletion
 */
export function scheduleDelete(
	telegram: Pick<Telegram, "deleteMessage">,
	chatId: number,
	messageId: number,
	timeoutMs: number = defaultTimeoutMs(),
): () => void {
	const key = `${chatId}_${messageId}`;

	const existing = scheduledDeletions.get(key);
	if (existing) {
		clearTimeout(existing);
	}

	const timeout = setTimeout(() => {
		scheduledDeletions.delete(key);
		telegram.deleteMessage(chatId, messageId).catch((error: unknown) => {
			// Message may be gone already, or the bot lacks delete rights
			StructuredLogger.logDebug("Scheduled delete failed", {
				chatId,
				messageId,
				error: error instanceof Error ? error.message : String(error),
			});
		});
	}, timeoutMs);
	timeout.unref();

	scheduledDeletions.set(key, timeout);

	return () => {
		clearTimeout(timeout);
		scheduledDeletions.delete(key);
	};
}

/**
 * Schedule cleanup for group chats only; DMs are left alone.
 * Deletes both the moderator's command and the bot's response.
 */
export function autoDeleteInGroup(
	ctx: Context,
	botMessageId: number,
	timeoutMs: number = defaultTimeoutMs(),
	deleteUserMsg: boolean = true,
): void {
	const chatId = ctx.chat?.id;
	if (!isGroupChat(ctx) || chatId === undefined) return;

	scheduleDelete(ctx.telegram, chatId, botMessageId, timeoutMs);

	const userMsgId = ctx.message?.message_id;
	if (deleteUserMsg && userMsgId) {
		scheduleDelete(ctx.telegram, chatId, userMsgId, timeoutMs);
	}
}

/**
 * Sends a reply and schedules it for deletion in group chats.
 *
 * @example
 * ```typescript
 * await replyWithAutoDelete(ctx, "Usage: /warn <user> [reason]");
 * ```
 */
export async function replyWithAutoDelete(
	ctx: Context,
	content: Parameters<Context["reply"]>[0],
	extra?: Parameters<Context["reply"]>[1],
): Promise<Message.TextMessage> {
	const sentMessage = await ctx.reply(content, extra);
	autoDeleteInGroup(ctx, sentMessage.message_id);
	return sentMessage;
}

/** Number of pending deletions */
export function getScheduledDeleteCount(): number {
	return scheduledDeletions.size;
}

/** Cancels every pending deletion (shutdown). */
export function clearAllScheduledDeletes(): void {
	for (const timeout of scheduledDeletions.values()) {
		clearTimeout(timeout);
	}
	scheduledDeletions.clear();
	logger.info("Cleared all scheduled message deletions");
}
