/**
 * Persisted layout of the moderation document and its conversion to the
 * in-memory ConfigDocument.
 *
 * @module services/configSchema
 */

import { z } from "zod";
import type { ConfigDocument, ThresholdEntry, WarningRecord } from "../types";
import {
	ChannelIdSchema,
	type CommunityId,
	CommunityKeySchema,
	ModeratorIdSchema,
	type SubjectId,
	SubjectKeySchema,
} from "../utils/ids";

const ActionSchema = z.enum(["timeout", "kick", "ban"]);

const PersistedWarningSchema = z
	.object({
		reason: z.string(),
		moderator: z.number().int(),
		timestamp: z.string(),
	})
	.passthrough();

/**
 * On-disk shape: ids are string keys, channel and moderator ids are integers.
 * Members outside this shape (top level or on a warning entry) are kept and written
 * back unchanged.
 */
export const PersistedConfigSchema = z
	.object({
		log_channels: z.record(z.string(), z.number().int()),
		warn_thresholds: z.record(z.string(), ActionSchema),
		warnings: z.record(
			z.string(),
			z.record(z.string(), z.array(PersistedWarningSchema)),
		),
	})
	.passthrough();

export type PersistedConfig = z.infer<typeof PersistedConfigSchema>;

const ThresholdKeySchema = z
	.string()
	.regex(/^[1-9]\d*$/, "must be a positive integer without leading zeros")
	.transform(Number)
	.pipe(z.number().int().positive());

export const DEFAULT_THRESHOLDS: readonly ThresholdEntry[] = [
	{ count: 3, action: "timeout" },
	{ count: 5, action: "kick" },
	{ count: 7, action: "ban" },
];

export function createDefaultDocument(): ConfigDocument {
	return {
		logChannels: new Map(),
		thresholds: DEFAULT_THRESHOLDS.map((entry) => ({ ...entry })),
		warnings: new Map(),
		extra: {},
	};
}

/**
 * Converts a structurally valid persisted document into typed maps.
 * Keys that are not integers are a structural problem and throw a ZodError.
 */
export function toDocument(persisted: PersistedConfig): ConfigDocument {
	const { log_channels, warn_thresholds, warnings: ledgers, ...extra } = persisted;

	const logChannels = new Map(
		Object.entries(log_channels).map(
			([key, channel]) =>
				[CommunityKeySchema.parse(key), ChannelIdSchema.parse(channel)] as const,
		),
	);

	const thresholds = Object.entries(warn_thresholds)
		.map(([key, action]) => ({ count: ThresholdKeySchema.parse(key), action }))
		.sort((a, b) => a.count - b.count);

	const warnings = new Map<CommunityId, Map<SubjectId, WarningRecord[]>>();
	for (const [communityKey, subjects] of Object.entries(ledgers)) {
		const ledger = new Map<SubjectId, WarningRecord[]>();
		for (const [subjectKey, entries] of Object.entries(subjects)) {
			ledger.set(
				SubjectKeySchema.parse(subjectKey),
				entries.map(toWarningRecord),
			);
		}
		warnings.set(CommunityKeySchema.parse(communityKey), ledger);
	}

	return { logChannels, thresholds, warnings, extra };
}

type PersistedWarning = z.infer<typeof PersistedWarningSchema>;

function toWarningRecord(entry: PersistedWarning): WarningRecord {
	const { reason, moderator, timestamp, ...extra } = entry;
	const record = { reason, moderatorId: ModeratorIdSchema.parse(moderator), timestamp };
	return Object.keys(extra).length > 0 ? { ...record, extra } : record;
}

/** Inverse of {@link toDocument}; thresholds are written in ascending order. */
export function toPersisted(document: ConfigDocument): PersistedConfig {
	const warnings: PersistedConfig["warnings"] = {};
	for (const [community, ledger] of document.warnings) {
		const subjects: Record<string, PersistedConfig["warnings"][string][string]> =
			{};
		for (const [subject, records] of ledger) {
			subjects[String(subject)] = records.map((record) =>
				Object.assign(
					{
						reason: record.reason,
						moderator: record.moderatorId,
						timestamp: record.timestamp,
					},
					record.extra ?? {},
				),
			);
		}
		warnings[String(community)] = subjects;
	}

	return Object.assign(
		{
			log_channels: Object.fromEntries(
				[...document.logChannels].map(([community, channel]) => [
					String(community),
					channel,
				]),
			),
			warn_thresholds: Object.fromEntries(
				[...document.thresholds]
					.sort((a, b) => a.count - b.count)
					.map((entry) => [String(entry.count), entry.action]),
			),
			warnings,
		},
		document.extra,
	);
}
