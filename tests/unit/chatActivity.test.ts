import type { Context } from "telegraf";
import { beforeEach, describe, expect, it, vi } from "vitest";
import {
	ChatActivityTracker,
	displayName,
	trackActivity,
} from "../../src/services/chatActivity";
import {
	getCommandArgs,
	getRemainingArgs,
	resolveTargetUser,
} from "../../src/utils/targetResolver";
import { CHAT_ID, createMockContext, createUser } from "../helpers/mockContext";

describe("ChatActivityTracker", () => {
	let tracker: ChatActivityTracker;

	beforeEach(() => {
		tracker = new ChatActivityTracker(3);
	});

	it("keeps only the most recent messages per chat", () => {
		const alice = createUser(1, "alice");
		for (let id = 1; id <= 5; id++) {
			tracker.record(-100, id, alice, 1000 + id);
		}

		expect(tracker.recent(-100, 10).map((m) => m.messageId)).toEqual([3, 4, 5]);
		expect(tracker.recent(-100, 2).map((m) => m.messageId)).toEqual([4, 5]);
		expect(tracker.recent(-200, 2)).toEqual([]);
	});

	it("resolves usernames case-insensitively within the chat", () => {
		tracker.record(-100, 1, createUser(1, "Alice", "Alice"), 1000);

		expect(tracker.resolveUsername(-100, "@alice")).toEqual({
			id: 1,
			username: "Alice",
			firstName: "Alice",
		});
		expect(tracker.resolveUsername(-200, "@alice")).toBeUndefined();
	});

	it("forgets deleted messages", () => {
		const alice = createUser(1, "alice");
		tracker.record(-100, 1, alice, 1000);
		tracker.record(-100, 2, alice, 1001);
		tracker.forget(-100, [1]);

		expect(tracker.recent(-100, 10).map((m) => m.messageId)).toEqual([2]);
	});

	it("looks users up by id", () => {
		tracker.remember(-100, createUser(5, "bob"));
		expect(tracker.lookup(-100, 5)?.username).toBe("bob");
		expect(tracker.lookup(-100, 6)).toBeUndefined();
	});
});

describe("displayName", () => {
	it("prefers the username", () => {
		expect(displayName({ username: "alice", first_name: "Alice" })).toBe("@alice");
		expect(displayName({ first_name: "Alice" })).toBe("Alice");
	});
});

describe("trackActivity", () => {
	it("records group messages and the author of the replied message", async () => {
		const tracker = new ChatActivityTracker();
		const { ctx } = createMockContext({
			messageId: 10,
			replyTo: createUser(77, "target"),
		});
		const next = vi.fn().mockResolvedValue(undefined);

		await trackActivity(tracker)(ctx, next);

		expect(next).toHaveBeenCalled();
		expect(tracker.recent(CHAT_ID, 5).map((m) => m.messageId)).toEqual([10]);
		expect(tracker.resolveUsername(CHAT_ID, "target")?.id).toBe(77);
	});

	it("ignores private chats", async () => {
		const tracker = new ChatActivityTracker();
		const { ctx } = createMockContext({ chatType: "private", chatId: 5 });

		await trackActivity(tracker)(ctx, vi.fn().mockResolvedValue(undefined));

		expect(tracker.recent(5, 5)).toEqual([]);
	});
});

describe("target resolution", () => {
	const tracker = new ChatActivityTracker();
	tracker.remember(CHAT_ID, createUser(55, "carol"));

	const contextWith = (text: string, replyTo?: ReturnType<typeof createUser>): Context =>
		createMockContext({ messageText: text, replyTo }).ctx;

	it("splits arguments on whitespace", () => {
		expect(getCommandArgs(contextWith("/warn  @carol   being rude"))).toEqual([
			"@carol",
			"being",
			"rude",
		]);
		expect(getCommandArgs(contextWith("/warn"))).toEqual([]);
	});

	it("prefers the replied-to author and keeps every argument", () => {
		const ctx = contextWith("/warn spamming", createUser(9, "dave"));
		const args = getCommandArgs(ctx);
		const target = resolveTargetUser(ctx, args, tracker);

		expect(target).toEqual({ userId: 9, display: "@dave", source: "reply" });
		expect(getRemainingArgs(args, target)).toEqual(["spamming"]);
	});

	it("resolves a numeric id, naming the user when known", () => {
		const ctx = contextWith("/ban 55 spam");
		const args = getCommandArgs(ctx);
		const target = resolveTargetUser(ctx, args, tracker);

		expect(target).toEqual({ userId: 55, display: "@carol", source: "args" });
		expect(getRemainingArgs(args, target)).toEqual(["spam"]);
	});

	it("shows unknown numeric ids as-is", () => {
		const ctx = contextWith("/ban 123");
		expect(resolveTargetUser(ctx, getCommandArgs(ctx), tracker)?.display).toBe("123");
	});

	it("resolves a tracked @username", () => {
		const ctx = contextWith("/kick @Carol");
		expect(resolveTargetUser(ctx, getCommandArgs(ctx), tracker)?.userId).toBe(55);
	});

	it("returns null for unknown usernames and missing arguments", () => {
		const unknown = contextWith("/kick @nobody");
		expect(resolveTargetUser(unknown, getCommandArgs(unknown), tracker)).toBeNull();
		const empty = contextWith("/kick");
		expect(resolveTargetUser(empty, [], tracker)).toBeNull();
	});

	it("ignores replies to bots", () => {
		const bot = { ...createUser(99, "somebot"), is_bot: true };
		const ctx = contextWith("/warn 55", bot);
		expect(resolveTargetUser(ctx, getCommandArgs(ctx), tracker)?.userId).toBe(55);
	});
});
