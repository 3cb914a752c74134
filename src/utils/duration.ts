/** Duration strings for timeouts: "30s", "5m", "2h", "1d" */

import { domainError, ok, type Result } from "./result";

/** Telegram's longest timeout the bot will apply (28 days) */
export const MAX_TIMEOUT_SECONDS = 28 * 24 * 60 * 60;

const UNIT_SECONDS: Record<string, number> = {
	s: 1,
	m: 60,
	h: 60 * 60,
	d: 24 * 60 * 60,
};

export interface Duration {
	seconds: number;
	/** True when the requested length exceeded the maximum and was cut down */
	clamped: boolean;
	/** The text the moderator typed */
	label: string;
}

export type DurationErrorKind = "malformed" | "non_positive";

export function parseDuration(
	input: string,
): Result<Duration, DurationErrorKind> {
	const label = input.trim();
	const match = /^(\d+)([smhd])$/i.exec(label);
	if (!match) {
		return domainError(
			"malformed",
			`Invalid duration format: '${label}'. Use numbers followed by s, m, h, or d (e.g., 30m, 1h, 1d).`,
		);
	}

	const amount = parseInt(match[1], 10);
	const seconds = amount * UNIT_SECONDS[match[2].toLowerCase()];
	if (seconds <= 0) {
		return domainError("non_positive", "Duration must be positive.");
	}

	if (seconds > MAX_TIMEOUT_SECONDS) {
		return ok({ seconds: MAX_TIMEOUT_SECONDS, clamped: true, label });
	}

	return ok({ seconds, clamped: false, label });
}

/** "3600" → "1 hour", "5400" → "90 minutes" */
export function formatDuration(seconds: number): string {
	const units: Array<[number, string]> = [
		[UNIT_SECONDS.d, "day"],
		[UNIT_SECONDS.h, "hour"],
		[UNIT_SECONDS.m, "minute"],
	];

	for (const [size, name] of units) {
		if (seconds >= size && seconds % size === 0) {
			const value = seconds / size;
			return `${value} ${name}${value === 1 ? "" : "s"}`;
		}
	}

	return `${seconds} second${seconds === 1 ? "" : "s"}`;
}
