/**
 * Typed outcome for operations that touch Telegram or parse user input.
 *
 * Three cases, discriminated by `status`:
 * - `ok`: the operation succeeded and carries a value.
 * - `domain_error`: an expected refusal (user not banned, malformed duration,
 *   missing rights). Carries a machine-readable `kind` and a message fit for a reply.
 * - `fault`: something unexpected broke. Carries the original cause for logging.
 *
 * ```ts
 * const res = await executor.unban(chatId, userId);
 * if (res.status === "domain_error" && res.kind === "not_banned") {
 *   return ctx.reply("This user is not banned.");
 * }
 * ```
 *
 * @module utils/result
 */

export interface Ok<T> {
	readonly status: "ok";
	readonly value: T;
}

export interface DomainError<K extends string> {
	readonly status: "domain_error";
	readonly kind: K;
	readonly message: string;
}

export interface Fault {
	readonly status: "fault";
	readonly cause: Error;
}

export type Result<T, K extends string = string> = Ok<T> | DomainError<K> | Fault;

/** Creates a successful result. */
export const ok = <T>(value: T): Ok<T> => ({ status: "ok", value });

/** Creates an expected, user-facing failure. */
export const domainError = <K extends string>(
	kind: K,
	message: string,
): DomainError<K> => ({ status: "domain_error", kind, message });

/** Wraps an unexpected failure, normalizing non-Error throwables. */
export const fault = (cause: unknown): Fault => ({
	status: "fault",
	cause: cause instanceof Error ? cause : new Error(String(cause)),
});

export const isOk = <T, K extends string>(result: Result<T, K>): result is Ok<T> =>
	result.status === "ok";

/**
 * Message suitable for showing to the moderator who issued the command.
 * Faults only expose the cause's message.
 */
export function describeFailure<K extends string>(
	result: DomainError<K> | Fault,
): string {
	return result.status === "domain_error"
		? result.message
		: `An error occurred: ${result.cause.message}`;
}
