/** Turns unexpected command failures into a logged error and a short reply */

import type { Context } from "telegraf";
import { replyWithAutoDelete } from "./autoDelete";
import { StructuredLogger } from "./logger";

export async function replyWithError(
	ctx: Context,
	error: unknown,
	operation: string,
): Promise<void> {
	const cause = error instanceof Error ? error : new Error(String(error));
	StructuredLogger.logError(cause, {
		userId: ctx.from?.id,
		chatId: ctx.chat?.id,
		operation,
	});
	await replyWithAutoDelete(ctx, `An error occurred: ${cause.message}`);
}
