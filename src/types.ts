/** Domain types shared by the store, the warning engine and the command layer */

import type { ChannelId, CommunityId, ModeratorId, SubjectId } from "./utils/ids";

/** Automated escalation applied when a warning count hits a threshold */
export type EscalationAction = "timeout" | "kick" | "ban";

/** Exact warning count that triggers an action */
export interface ThresholdEntry {
	count: number;
	action: EscalationAction;
}

/** One warning in a member's ledger. Never edited once appended. */
export interface WarningRecord {
	readonly reason: string;
	readonly moderatorId: ModeratorId;
	/** ISO-8601, kept verbatim from when it was recorded or loaded */
	readonly timestamp: string;
	/** Members of the stored entry that are not modelled here; written back as-is */
	readonly extra?: Readonly<Record<string, unknown>>;
}

/** In-memory form of the persisted moderation document */
export interface ConfigDocument {
	logChannels: Map<CommunityId, ChannelId>;
	/** Ascending by count */
	thresholds: ThresholdEntry[];
	warnings: Map<CommunityId, Map<SubjectId, WarningRecord[]>>;
	/** Top-level members of the file that are not modelled here */
	extra: Record<string, unknown>;
}

/** Who or what an audit entry is about */
export interface AuditTarget {
	id?: number;
	display: string;
}

/** Structured record handed to the audit logger */
export interface AuditRecord {
	/** Label such as "Ban", "Warning" or "Auto-Timeout" */
	action: string;
	target: AuditTarget;
	moderator: AuditTarget;
	reason?: string;
	duration?: string;
}

/** Request for the moderation executor */
export interface ModerationRequest {
	action: EscalationAction;
	community: CommunityId;
	subject: SubjectId;
	reason: string;
	/** Timeout length; executor default applies when absent */
	durationSeconds?: number;
	/** Ban only: also delete everything the member posted */
	revokeMessages?: boolean;
}

/** Reason stored when a moderator gives none */
export const DEFAULT_REASON = "No reason provided";
