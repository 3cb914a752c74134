/**
 * In-memory record of recent messages per chat.
 *
 * The Bot API offers no message history, so `/clear` can only delete what the bot
 * has seen, and `@username` targets can only resolve to users who have spoken
 * since startup.
 *
 * @module services/chatActivity
 */

import type { Context, MiddlewareFn } from "telegraf";
import type { User } from "telegraf/types";

export const MAX_TRACKED_MESSAGES = 200;

export interface TrackedMessage {
	messageId: number;
	userId: number;
	/** Unix seconds, as Telegram reports it */
	date: number;
}

export interface KnownUser {
	id: number;
	username?: string;
	firstName: string;
}

/** `@username` when the user has one, otherwise their first name. */
export function displayName(user: Pick<User, "username" | "first_name">): string {
	return user.username ? `@${user.username}` : user.first_name;
}

export class ChatActivityTracker {
	private readonly messages = new Map<number, TrackedMessage[]>();
	/** chat id -> lowercased username -> user */
	private readonly usernames = new Map<number, Map<string, KnownUser>>();

	constructor(private readonly limit: number = MAX_TRACKED_MESSAGES) {}

	record(chatId: number, messageId: number, from: User, date: number): void {
		let buffer = this.messages.get(chatId);
		if (!buffer) {
			buffer = [];
			this.messages.set(chatId, buffer);
		}
		buffer.push({ messageId, userId: from.id, date });
		if (buffer.length > this.limit) {
			buffer.splice(0, buffer.length - this.limit);
		}

		this.remember(chatId, from);
	}

	/** Remembers a user's username without tracking a message. */
	remember(chatId: number, user: User): void {
		if (!user.username) return;
		let known = this.usernames.get(chatId);
		if (!known) {
			known = new Map();
			this.usernames.set(chatId, known);
		}
		known.set(user.username.toLowerCase(), {
			id: user.id,
			username: user.username,
			firstName: user.first_name,
		});
	}

	/** Most recent `count` messages, oldest first. */
	recent(chatId: number, count: number): TrackedMessage[] {
		const buffer = this.messages.get(chatId) ?? [];
		return count > 0 ? buffer.slice(-count) : [];
	}

	/** Drops deleted messages from the buffer. */
	forget(chatId: number, messageIds: readonly number[]): void {
		const buffer = this.messages.get(chatId);
		if (!buffer) return;
		const removed = new Set(messageIds);
		this.messages.set(
			chatId,
			buffer.filter((message) => !removed.has(message.messageId)),
		);
	}

	resolveUsername(chatId: number, username: string): KnownUser | undefined {
		const normalized = username.replace(/^@/, "").toLowerCase();
		return this.usernames.get(chatId)?.get(normalized);
	}

	lookup(chatId: number, userId: number): KnownUser | undefined {
		for (const user of this.usernames.get(chatId)?.values() ?? []) {
			if (user.id === userId) return user;
		}
		return undefined;
	}
}

/**
 * Records every group message before handlers run.
 *
 * @example
 * ```typescript
 * bot.use(trackActivity(tracker));
 * ```
 */
export const trackActivity =
	(tracker: ChatActivityTracker): MiddlewareFn<Context> =>
	(ctx, next) => {
		const chat = ctx.chat;
		const message = ctx.message;
		if (
			message &&
			message.from &&
			(chat?.type === "group" || chat?.type === "supergroup")
		) {
			tracker.record(chat.id, message.message_id, message.from, message.date);
			if ("reply_to_message" in message && message.reply_to_message?.from) {
				tracker.remember(chat.id, message.reply_to_message.from);
			}
		}
		return next();
	};
