/**
 * Progressive-discipline engine.
 *
 * Appends warnings through the ConfigStore, persists them, and decides which
 * escalation (if any) the new count triggers. The decision is returned as data;
 * applying it is the moderation executor's job, so the engine never talks to
 * Telegram and holds no state of its own.
 *
 * @module services/warningEngine
 */

import {
	type AuditRecord,
	DEFAULT_REASON,
	type ThresholdEntry,
	type WarningRecord,
} from "../types";
import type { CommunityId, ModeratorId, SubjectId } from "../utils/ids";
import { StructuredLogger } from "../utils/logger";
import type { ConfigStore } from "./configStore";

export interface WarningOutcome {
	/** Ledger length after the append */
	newCount: number;
	record: WarningRecord;
	/** Threshold whose count equals `newCount` */
	triggered?: ThresholdEntry;
	/** Entry for the audit log describing the warning itself */
	audit: AuditRecord;
}

export interface WarningEngineOptions {
	/** Source of the current instant; defaults to the system clock */
	now?: () => Date;
}

/** Blank or missing reasons become the placeholder text; others are kept as given. */
export function normalizeReason(reason: string | undefined | null): string {
	return reason?.trim() ? reason : DEFAULT_REASON;
}

/**
 * Exact-match threshold lookup. A count that skips past a threshold triggers
 * nothing for it.
 */
export function evaluateThreshold(
	table: readonly ThresholdEntry[],
	count: number,
): ThresholdEntry | undefined {
	return table.find((entry) => entry.count === count);
}

export class WarningEngine {
	private readonly now: () => Date;

	constructor(
		private readonly store: ConfigStore,
		options: WarningEngineOptions = {},
	) {
		this.now = options.now ?? (() => new Date());
	}

	/**
	 * Records a warning and persists the document before resolving.
	 *
	 * Append and save run under the store lock, so concurrent warnings for the same
	 * member get consecutive counts. If the save fails the append stays in memory
	 * and the PersistenceWriteError propagates.
	 */
	async recordWarning(
		community: CommunityId,
		subject: SubjectId,
		moderator: ModeratorId,
		reason?: string,
	): Promise<WarningOutcome> {
		const record: WarningRecord = {
			reason: normalizeReason(reason),
			moderatorId: moderator,
			timestamp: this.now().toISOString(),
		};

		const newCount = await this.store.runExclusive(async () => {
			const count = this.store.appendWarning(community, subject, record);
			await this.store.save();
			return count;
		});

		const triggered = evaluateThreshold(this.store.getThresholdTable(), newCount);

		StructuredLogger.logModerationAction("Warning recorded", {
			chatId: community,
			userId: moderator,
			targetUserId: subject,
			warningCount: newCount,
			triggered: triggered?.action,
		});

		return {
			newCount,
			record,
			triggered,
			audit: {
				action: "Warning",
				target: { id: subject, display: String(subject) },
				moderator: { id: moderator, display: String(moderator) },
				reason: record.reason,
			},
		};
	}

	viewWarnings(community: CommunityId, subject: SubjectId): WarningRecord[] {
		return this.store.listWarnings(community, subject);
	}

	/** Clears the ledger in memory only; the caller persists. */
	clearWarnings(community: CommunityId, subject: SubjectId): number {
		return this.store.clearWarnings(community, subject);
	}
}
