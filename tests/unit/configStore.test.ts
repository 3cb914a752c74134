import * as fs from "fs";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigCorruptError, PersistenceWriteError } from "../../src/errors";
import { ConfigStore } from "../../src/services/configStore";
import { channelId, communityId, moderatorId, subjectId } from "../../src/utils/ids";
import { createTempDir, removeTempDir } from "../helpers/services";

const GUILD = communityId(-1001);
const MEMBER = subjectId(42);
const MOD = moderatorId(7);

const record = (reason: string) => ({
	reason,
	moderatorId: MOD,
	timestamp: "2024-05-01T12:30:00.000Z",
});

describe("ConfigStore", () => {
	let dir: string;
	let filePath: string;

	beforeEach(() => {
		dir = createTempDir();
		filePath = path.join(dir, "config.json");
	});

	afterEach(() => {
		removeTempDir(dir);
	});

	describe("load", () => {
		it("creates the default document when the file is missing", async () => {
			const store = new ConfigStore(filePath);
			await store.load();

			expect(store.getThresholdTable()).toEqual([
				{ count: 3, action: "timeout" },
				{ count: 5, action: "kick" },
				{ count: 7, action: "ban" },
			]);
			expect(JSON.parse(fs.readFileSync(filePath, "utf8"))).toEqual({
				log_channels: {},
				warn_thresholds: { "3": "timeout", "5": "kick", "7": "ban" },
				warnings: {},
			});
		});

		it("reloads the freshly written defaults unchanged", async () => {
			const first = new ConfigStore(filePath);
			await first.load();
			const written = fs.readFileSync(filePath, "utf8");

			const second = new ConfigStore(filePath);
			await second.load();

			expect(second.snapshot()).toEqual(first.snapshot());
			expect(second.snapshot()).toEqual({
				log_channels: {},
				warn_thresholds: { "3": "timeout", "5": "kick", "7": "ban" },
				warnings: {},
			});
			expect(fs.readFileSync(filePath, "utf8")).toBe(written);
		});

		it("writes the default document with 4-space indentation", async () => {
			await new ConfigStore(filePath).load();
			const lines = fs.readFileSync(filePath, "utf8").split("\n");
			expect(lines[1]).toBe('    "log_channels": {},');
		});

		it("creates missing parent directories", async () => {
			const nested = path.join(dir, "a", "b", "config.json");
			await new ConfigStore(nested).load();
			expect(fs.existsSync(nested)).toBe(true);
		});

		it("rejects a file that is not JSON", async () => {
			fs.writeFileSync(filePath, "{ not json");
			const store = new ConfigStore(filePath);

			await expect(store.load()).rejects.toBeInstanceOf(ConfigCorruptError);
			await expect(store.load()).rejects.toThrow(
				`Config file ${filePath} is not valid JSON`,
			);
		});

		it("rejects a document with a missing top-level key", async () => {
			fs.writeFileSync(
				filePath,
				JSON.stringify({ log_channels: {}, warn_thresholds: {} }),
			);

			await expect(new ConfigStore(filePath).load()).rejects.toBeInstanceOf(
				ConfigCorruptError,
			);
		});

		it("rejects an unknown escalation action", async () => {
			fs.writeFileSync(
				filePath,
				JSON.stringify({
					log_channels: {},
					warn_thresholds: { "3": "mute" },
					warnings: {},
				}),
			);

			await expect(new ConfigStore(filePath).load()).rejects.toBeInstanceOf(
				ConfigCorruptError,
			);
		});

		it("rejects a non-integer chat key", async () => {
			fs.writeFileSync(
				filePath,
				JSON.stringify({
					log_channels: { general: 5 },
					warn_thresholds: {},
					warnings: {},
				}),
			);

			const error = await new ConfigStore(filePath).load().catch((e: unknown) => e);
			expect(error).toBeInstanceOf(ConfigCorruptError);
			expect(error).toMatchObject({ filePath, code: "CONFIG_CORRUPT" });
		});

		it("rejects a threshold key with leading zeros", async () => {
			fs.writeFileSync(
				filePath,
				JSON.stringify({
					log_channels: {},
					warn_thresholds: { "03": "timeout" },
					warnings: {},
				}),
			);

			await expect(new ConfigStore(filePath).load()).rejects.toBeInstanceOf(
				ConfigCorruptError,
			);
		});

		it("does not overwrite a corrupt file", async () => {
			fs.writeFileSync(filePath, "corrupt");
			await new ConfigStore(filePath).load().catch(() => undefined);
			expect(fs.readFileSync(filePath, "utf8")).toBe("corrupt");
		});

		it("sorts thresholds read from disk", async () => {
			fs.writeFileSync(
				filePath,
				JSON.stringify({
					log_channels: {},
					warn_thresholds: { "10": "ban", "2": "timeout" },
					warnings: {},
				}),
			);
			const store = new ConfigStore(filePath);
			await store.load();

			expect(store.getThresholdTable()).toEqual([
				{ count: 2, action: "timeout" },
				{ count: 10, action: "ban" },
			]);
		});

		it("keeps timestamps and extra precision exactly as stored", async () => {
			fs.writeFileSync(
				filePath,
				JSON.stringify({
					log_channels: { "-1001": 555 },
					warn_thresholds: {},
					warnings: {
						"-1001": {
							"42": [
								{ reason: "spam", moderator: 7, timestamp: "2023-01-02T03:04:05.678901" },
							],
						},
					},
				}),
			);
			const store = new ConfigStore(filePath);
			await store.load();

			expect(store.listWarnings(GUILD, MEMBER)).toEqual([
				{ reason: "spam", moderatorId: 7, timestamp: "2023-01-02T03:04:05.678901" },
			]);
			expect(store.getLogChannel(GUILD)).toBe(555);
		});
	});

	describe("save", () => {
		it("round-trips every field", async () => {
			const store = new ConfigStore(filePath);
			await store.load();
			store.setLogChannel(GUILD, channelId(-1009));
			store.appendWarning(GUILD, MEMBER, record("first"));
			store.appendWarning(GUILD, MEMBER, record("second"));
			await store.save();

			const reloaded = new ConfigStore(filePath);
			await reloaded.load();

			expect(reloaded.snapshot()).toEqual(store.snapshot());
			expect(reloaded.listWarnings(GUILD, MEMBER).map((w) => w.reason)).toEqual([
				"first",
				"second",
			]);
		});

		it("writes back members it does not model", async () => {
			fs.writeFileSync(
				filePath,
				JSON.stringify({
					log_channels: {},
					warn_thresholds: { "3": "timeout" },
					warnings: {
						"-1001": {
							"42": [
								{
									reason: "spam",
									moderator: 7,
									timestamp: "2024-05-01T12:30:00.000Z",
									note: "appealed",
								},
							],
						},
					},
					prefix: "!",
				}),
			);
			const store = new ConfigStore(filePath);
			await store.load();
			store.appendWarning(GUILD, MEMBER, record("again"));
			await store.save();

			const onDisk = JSON.parse(fs.readFileSync(filePath, "utf8"));
			expect(onDisk.prefix).toBe("!");
			expect(onDisk.warnings["-1001"]["42"]).toEqual([
				{
					reason: "spam",
					moderator: 7,
					timestamp: "2024-05-01T12:30:00.000Z",
					note: "appealed",
				},
				{ reason: "again", moderator: 7, timestamp: "2024-05-01T12:30:00.000Z" },
			]);
			expect(store.listWarnings(GUILD, MEMBER)[0].reason).toBe("spam");
		});

		it("leaves no temp file behind", async () => {
			const store = new ConfigStore(filePath);
			await store.load();
			await store.save();

			expect(fs.readdirSync(dir)).toEqual(["config.json"]);
		});

		it("raises PersistenceWriteError when the directory cannot be created", async () => {
			const blocker = path.join(dir, "blocker");
			fs.writeFileSync(blocker, "");
			const store = new ConfigStore(path.join(blocker, "config.json"));

			await expect(store.save()).rejects.toBeInstanceOf(PersistenceWriteError);
		});

		it("keeps in-memory changes when the write fails", async () => {
			const blocker = path.join(dir, "blocker");
			fs.writeFileSync(blocker, "");
			const store = new ConfigStore(path.join(blocker, "config.json"));

			store.appendWarning(GUILD, MEMBER, record("kept"));
			await store.save().catch(() => undefined);

			expect(store.listWarnings(GUILD, MEMBER)).toHaveLength(1);
		});
	});

	describe("warnings ledger", () => {
		it("returns the new count from appendWarning", () => {
			const store = new ConfigStore(filePath);
			expect(store.appendWarning(GUILD, MEMBER, record("a"))).toBe(1);
			expect(store.appendWarning(GUILD, MEMBER, record("b"))).toBe(2);
		});

		it("keeps ledgers separate per chat and per member", () => {
			const store = new ConfigStore(filePath);
			store.appendWarning(GUILD, MEMBER, record("a"));

			expect(store.appendWarning(communityId(-2002), MEMBER, record("b"))).toBe(1);
			expect(store.appendWarning(GUILD, subjectId(43), record("c"))).toBe(1);
		});

		it("returns a copy from listWarnings", () => {
			const store = new ConfigStore(filePath);
			store.appendWarning(GUILD, MEMBER, record("a"));
			store.listWarnings(GUILD, MEMBER).pop();

			expect(store.listWarnings(GUILD, MEMBER)).toHaveLength(1);
		});

		it("clears a ledger and reports the previous size", () => {
			const store = new ConfigStore(filePath);
			store.appendWarning(GUILD, MEMBER, record("a"));
			store.appendWarning(GUILD, MEMBER, record("b"));

			expect(store.clearWarnings(GUILD, MEMBER)).toBe(2);
			expect(store.listWarnings(GUILD, MEMBER)).toEqual([]);
			expect(store.snapshot().warnings).toEqual({ "-1001": { "42": [] } });
		});

		it("reports the size once and zero on a repeated clear, leaving the file unchanged", async () => {
			const store = new ConfigStore(filePath);
			await store.load();
			store.appendWarning(GUILD, MEMBER, record("a"));
			store.appendWarning(GUILD, MEMBER, record("b"));
			store.appendWarning(GUILD, MEMBER, record("c"));
			await store.save();

			expect(store.clearWarnings(GUILD, MEMBER)).toBe(3);
			await store.save();
			const afterFirst = fs.readFileSync(filePath, "utf8");

			expect(store.clearWarnings(GUILD, MEMBER)).toBe(0);
			await store.save();

			expect(fs.readFileSync(filePath, "utf8")).toBe(afterFirst);
			expect(store.listWarnings(GUILD, MEMBER)).toEqual([]);
		});

		it("reports zero and leaves the document untouched for an unknown member", () => {
			const store = new ConfigStore(filePath);

			expect(store.clearWarnings(GUILD, MEMBER)).toBe(0);
			expect(store.snapshot().warnings).toEqual({});
		});
	});

	it("returns a copy of the threshold table", () => {
		const store = new ConfigStore(filePath);
		const table = store.getThresholdTable();
		table[0].count = 99;

		expect(store.getThresholdTable()[0].count).toBe(3);
	});
});
