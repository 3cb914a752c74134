/** Errors raised by the persisted moderation document */

/** The persisted document exists but cannot be read, parsed or validated. */
export class ConfigCorruptError extends Error {
	readonly code = "CONFIG_CORRUPT";

	constructor(
		message: string,
		public readonly filePath: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "ConfigCorruptError";
	}
}

/** Writing the persisted document failed. In-memory mutations are not rolled back. */
export class PersistenceWriteError extends Error {
	readonly code = "PERSISTENCE_WRITE";

	constructor(
		message: string,
		public readonly filePath: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "PersistenceWriteError";
	}
}
