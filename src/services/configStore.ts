/**
 * File-backed store for the moderation document: log channels, warning
 * thresholds and the per-chat warning ledger.
 *
 * The store owns the only copy of the document. Accessors and mutators are
 * synchronous and never persist on their own; callers batch mutations and then
 * call {@link ConfigStore.save}. Read-modify-write sequences that span an `await`
 * belong inside {@link ConfigStore.runExclusive}.
 *
 * @module services/configStore
 */

import * as fs from "fs";
import * as path from "path";
import { ConfigCorruptError, PersistenceWriteError } from "../errors";
import type { ConfigDocument, ThresholdEntry, WarningRecord } from "../types";
import type { ChannelId, CommunityId, SubjectId } from "../utils/ids";
import { logger } from "../utils/logger";
import { Mutex } from "../utils/mutex";
import {
	createDefaultDocument,
	type PersistedConfig,
	PersistedConfigSchema,
	toDocument,
	toPersisted,
} from "./configSchema";

const isMissingFile = (error: unknown): boolean =>
	error instanceof Error && "code" in error && error.code === "ENOENT";

export class ConfigStore {
	private document: ConfigDocument = createDefaultDocument();
	/** Guards the document across async sections */
	private readonly lock = new Mutex();
	/** Keeps two writes from interleaving on disk */
	private readonly writer = new Mutex();

	constructor(readonly filePath: string) {}

	/**
	 * Loads the document from disk. A missing file is replaced by the default
	 * document, which is written out before this resolves.
	 *
	 * @throws {ConfigCorruptError} If the file exists but cannot be read or validated
	 * @throws {PersistenceWriteError} If the default document cannot be written
	 */
	async load(): Promise<void> {
		let raw: string;
		try {
			raw = await fs.promises.readFile(this.filePath, "utf8");
		} catch (error) {
			if (isMissingFile(error)) {
				this.document = createDefaultDocument();
				await this.save();
				logger.info("Created default moderation config", {
					filePath: this.filePath,
				});
				return;
			}
			throw new ConfigCorruptError(
				`Config file ${this.filePath} exists but could not be read`,
				this.filePath,
				{ cause: error },
			);
		}

		let json: unknown;
		try {
			json = JSON.parse(raw);
		} catch (error) {
			throw new ConfigCorruptError(
				`Config file ${this.filePath} is not valid JSON`,
				this.filePath,
				{ cause: error },
			);
		}

		const parsed = PersistedConfigSchema.safeParse(json);
		if (!parsed.success) {
			const issue = parsed.error.issues[0];
			throw new ConfigCorruptError(
				`Config file ${this.filePath} has an invalid structure at "${issue?.path.join(".") ?? ""}": ${issue?.message ?? "unknown issue"}`,
				this.filePath,
				{ cause: parsed.error },
			);
		}

		try {
			this.document = toDocument(parsed.data);
		} catch (error) {
			throw new ConfigCorruptError(
				`Config file ${this.filePath} contains an invalid identifier or threshold`,
				this.filePath,
				{ cause: error },
			);
		}

		logger.info("Loaded moderation config", {
			filePath: this.filePath,
			communities: this.document.warnings.size,
		});
	}

	/**
	 * Writes the full document, replacing the file atomically (temp file + rename).
	 * The content written is the document as it stood when `save` was called.
	 *
	 * @throws {PersistenceWriteError} If the write or rename fails
	 */
	async save(): Promise<void> {
		const contents = JSON.stringify(this.snapshot(), null, 4);
		await this.writer.runExclusive(() => this.writeAtomically(contents));
	}

	/** Runs `task` while holding the document-wide lock. Not reentrant. */
	runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
		return this.lock.runExclusive(task);
	}

	getLogChannel(community: CommunityId): ChannelId | undefined {
		return this.document.logChannels.get(community);
	}

	setLogChannel(community: CommunityId, channel: ChannelId): void {
		this.document.logChannels.set(community, channel);
	}

	/** Threshold table in ascending count order */
	getThresholdTable(): ThresholdEntry[] {
		return this.document.thresholds.map((entry) => ({ ...entry }));
	}

	/** Appends to the member's ledger and returns the new warning count. */
	appendWarning(
		community: CommunityId,
		subject: SubjectId,
		record: WarningRecord,
	): number {
		let ledger = this.document.warnings.get(community);
		if (!ledger) {
			ledger = new Map();
			this.document.warnings.set(community, ledger);
		}

		let records = ledger.get(subject);
		if (!records) {
			records = [];
			ledger.set(subject, records);
		}

		records.push(record);
		return records.length;
	}

	listWarnings(community: CommunityId, subject: SubjectId): WarningRecord[] {
		return [...(this.document.warnings.get(community)?.get(subject) ?? [])];
	}

	/** Empties the member's ledger and returns how many warnings it held. */
	clearWarnings(community: CommunityId, subject: SubjectId): number {
		const ledger = this.document.warnings.get(community);
		const previous = ledger?.get(subject)?.length ?? 0;
		if (ledger && previous > 0) {
			ledger.set(subject, []);
		}
		return previous;
	}

	/** The document in its persisted layout */
	snapshot(): PersistedConfig {
		return toPersisted(this.document);
	}

	private async writeAtomically(contents: string): Promise<void> {
		const tempPath = `${this.filePath}.tmp`;
		try {
			await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
			await fs.promises.writeFile(tempPath, contents, "utf8");
			await fs.promises.rename(tempPath, this.filePath);
		} catch (error) {
			throw new PersistenceWriteError(
				`Failed to write config file ${this.filePath}`,
				this.filePath,
				{ cause: error },
			);
		}
	}
}
