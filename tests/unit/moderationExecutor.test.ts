import { TelegramError } from "telegraf";
import { beforeEach, describe, expect, it, vi } from "vitest";
import {
	classifyTelegramError,
	MUTED_PERMISSIONS,
	TelegramModerationExecutor,
} from "../../src/services/moderationExecutor";
import { communityId, subjectId } from "../../src/utils/ids";
import { createMockContext, type MockTelegram } from "../helpers/mockContext";

const CHAT = communityId(-1001);
const MEMBER = subjectId(42);
const NOW = 1_700_000_000;

const telegramError = (code: number, description: string) =>
	new TelegramError({ error_code: code, description });

describe("classifyTelegramError", () => {
	it("maps 403 to forbidden", () => {
		expect(classifyTelegramError(telegramError(403, "Forbidden: bot was kicked"), "ban")).toEqual({
			status: "domain_error",
			kind: "forbidden",
			message: "I don't have permission to ban that user.",
		});
	});

	it("maps a missing-rights 400 to forbidden", () => {
		const result = classifyTelegramError(
			telegramError(400, "Bad Request: not enough rights to restrict/unrestrict chat member"),
			"timeout",
		);
		expect(result.status === "domain_error" && result.kind).toBe("forbidden");
	});

	it("maps other 400s to bad_request", () => {
		expect(classifyTelegramError(telegramError(400, "Bad Request: user not found"), "kick")).toEqual({
			status: "domain_error",
			kind: "bad_request",
			message: "Telegram rejected the request: Bad Request: user not found",
		});
	});

	it("treats anything else as a fault", () => {
		const result = classifyTelegramError(new Error("ETIMEDOUT"), "ban");
		expect(result.status).toBe("fault");
		expect(result.status === "fault" && result.cause.message).toBe("ETIMEDOUT");
	});
});

describe("TelegramModerationExecutor", () => {
	let telegram: MockTelegram;
	let executor: TelegramModerationExecutor;

	beforeEach(() => {
		telegram = createMockContext().telegram;
		executor = new TelegramModerationExecutor(telegram, {
			defaultTimeoutSeconds: 3600,
			now: () => NOW,
		});
	});

	it("restricts a member until now plus the duration", async () => {
		const result = await executor.execute({
			action: "timeout",
			community: CHAT,
			subject: MEMBER,
			reason: "flood",
			durationSeconds: 600,
		});

		expect(result).toEqual({ status: "ok", value: undefined });
		expect(telegram.restrictChatMember).toHaveBeenCalledWith(CHAT, MEMBER, {
			permissions: MUTED_PERMISSIONS,
			until_date: NOW + 600,
		});
	});

	it("uses the default timeout length when none is given", async () => {
		await executor.execute({ action: "timeout", community: CHAT, subject: MEMBER, reason: "x" });

		expect(telegram.restrictChatMember.mock.calls[0][2].until_date).toBe(NOW + 3600);
	});

	it("raises very short timeouts to 30 seconds", async () => {
		await executor.execute({
			action: "timeout",
			community: CHAT,
			subject: MEMBER,
			reason: "x",
			durationSeconds: 5,
		});

		expect(telegram.restrictChatMember.mock.calls[0][2].until_date).toBe(NOW + 30);
	});

	it("kicks by banning and immediately unbanning", async () => {
		await executor.execute({ action: "kick", community: CHAT, subject: MEMBER, reason: "x" });

		expect(telegram.banChatMember).toHaveBeenCalledWith(CHAT, MEMBER);
		expect(telegram.unbanChatMember).toHaveBeenCalledWith(CHAT, MEMBER, {
			only_if_banned: true,
		});
	});

	it("bans, optionally revoking messages", async () => {
		await executor.execute({ action: "ban", community: CHAT, subject: MEMBER, reason: "x" });
		await executor.execute({
			action: "ban",
			community: CHAT,
			subject: MEMBER,
			reason: "x",
			revokeMessages: true,
		});

		expect(telegram.banChatMember).toHaveBeenNthCalledWith(1, CHAT, MEMBER, undefined, {
			revoke_messages: false,
		});
		expect(telegram.banChatMember).toHaveBeenNthCalledWith(2, CHAT, MEMBER, undefined, {
			revoke_messages: true,
		});
		expect(telegram.unbanChatMember).not.toHaveBeenCalled();
	});

	it("returns forbidden when Telegram refuses", async () => {
		telegram.banChatMember.mockRejectedValueOnce(
			telegramError(400, "Bad Request: can't remove chat owner"),
		);

		const result = await executor.execute({ action: "ban", community: CHAT, subject: MEMBER, reason: "x" });
		expect(result).toEqual({
			status: "domain_error",
			kind: "forbidden",
			message: "I don't have permission to ban that user.",
		});
	});

	it("returns a fault for network errors", async () => {
		telegram.restrictChatMember.mockRejectedValueOnce(new Error("socket hang up"));

		const result = await executor.execute({ action: "timeout", community: CHAT, subject: MEMBER, reason: "x" });
		expect(result.status).toBe("fault");
	});

	describe("unban", () => {
		it("lifts a ban on a banned member", async () => {
			telegram.getChatMember.mockResolvedValueOnce({ status: "kicked", until_date: 0 });

			const result = await executor.unban(CHAT, MEMBER);

			expect(result.status).toBe("ok");
			expect(telegram.unbanChatMember).toHaveBeenCalledWith(CHAT, MEMBER, {
				only_if_banned: true,
			});
		});

		it("reports members who are not banned", async () => {
			const result = await executor.unban(CHAT, MEMBER);

			expect(result).toEqual({
				status: "domain_error",
				kind: "not_banned",
				message: "This user is not banned.",
			});
			expect(telegram.unbanChatMember).not.toHaveBeenCalled();
		});

		it("maps lookup failures", async () => {
			telegram.getChatMember.mockRejectedValueOnce(
				telegramError(400, "Bad Request: PARTICIPANT_ID_INVALID"),
			);

			const result = await executor.unban(CHAT, MEMBER);
			expect(result.status === "domain_error" && result.kind).toBe("bad_request");
		});
	});

	it("falls back to the system clock", async () => {
		const spy = vi.spyOn(Date, "now").mockReturnValue(NOW * 1000 + 999);
		const plain = new TelegramModerationExecutor(telegram, { defaultTimeoutSeconds: 60 });

		await plain.execute({ action: "timeout", community: CHAT, subject: MEMBER, reason: "x" });

		expect(telegram.restrictChatMember.mock.calls[0][2].until_date).toBe(NOW + 60);
		spy.mockRestore();
	});
});
