/**
 * Wires the moderation services together for the command layer.
 *
 * @module services/container
 */

import type { Telegram } from "telegraf";
import { config } from "../config";
import { type AuditLogger, TelegramAuditLogger } from "./auditLogger";
import { ChatActivityTracker } from "./chatActivity";
import type { ConfigStore } from "./configStore";
import {
	type ModerationExecutor,
	TelegramModerationExecutor,
} from "./moderationExecutor";
import { WarningEngine } from "./warningEngine";

export interface ModerationServices {
	store: ConfigStore;
	engine: WarningEngine;
	executor: ModerationExecutor;
	audit: AuditLogger;
	activity: ChatActivityTracker;
}

/** Builds the Telegram-backed services around an already loaded store. */
export function createServices(
	telegram: Telegram,
	store: ConfigStore,
): ModerationServices {
	return {
		store,
		engine: new WarningEngine(store),
		executor: new TelegramModerationExecutor(telegram, {
			defaultTimeoutSeconds: config.autoTimeoutMinutes * 60,
		}),
		audit: new TelegramAuditLogger(telegram, store),
		activity: new ChatActivityTracker(),
	};
}
