import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { PersistenceError } from "../shared/errors.js";
import { accountKey } from "../shared/identifiers.js";
import { FileLedgerStore } from "./file-ledger-store.js";

describe("FileLedgerStore", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "ledger-store-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("returns null for an account with no snapshot", async () => {
		const store = FileLedgerStore.create({ directory: dir });
		expect(await store.read(accountKey("42"))).toBeNull();
	});

	it("writes and reads back a snapshot", async () => {
		const store = FileLedgerStore.create({ directory: dir });
		await store.write(accountKey("42"), '{"realizedPnl":"1"}');

		expect(await store.read(accountKey("42"))).toBe('{"realizedPnl":"1"}');
		expect(await readFile(join(dir, "42.json"), "utf-8")).toBe('{"realizedPnl":"1"}');
	});

	it("replaces the previous snapshot and leaves no temp files", async () => {
		const store = FileLedgerStore.create({ directory: dir });
		await store.write(accountKey("42"), "first");
		await store.write(accountKey("42"), "second");

		expect(await store.read(accountKey("42"))).toBe("second");
		expect(await readdir(dir)).toEqual(["42.json"]);
	});

	it("creates the directory on first write", async () => {
		const nested = join(dir, "a", "b");
		const store = FileLedgerStore.create({ directory: nested });
		await store.write(accountKey("7"), "{}");
		expect(await readdir(nested)).toEqual(["7.json"]);
	});

	it("encodes account keys into safe file names", async () => {
		const store = FileLedgerStore.create({ directory: dir });
		const key = accountKey("team/alpha");
		await store.write(key, "{}");

		expect(store.pathFor(key)).toBe(join(dir, "team%2Falpha.json"));
		expect(await store.keys()).toEqual([key]);
	});

	it("lists only snapshot files", async () => {
		const store = FileLedgerStore.create({ directory: dir });
		await store.write(accountKey("1"), "{}");
		await writeFile(join(dir, "notes.txt"), "ignore me");

		expect(await store.keys()).toEqual([accountKey("1")]);
	});

	it("lists nothing when the directory does not exist", async () => {
		const store = FileLedgerStore.create({ directory: join(dir, "missing") });
		expect(await store.keys()).toEqual([]);
	});

	it("removes snapshots and ignores missing ones", async () => {
		const store = FileLedgerStore.create({ directory: dir });
		await store.write(accountKey("1"), "{}");
		await store.remove(accountKey("1"));
		await store.remove(accountKey("1"));

		expect(await store.read(accountKey("1"))).toBeNull();
	});

	it("reports write failures as PersistenceError", async () => {
		const blocker = join(dir, "blocker");
		await writeFile(blocker, "not a directory");
		const store = FileLedgerStore.create({ directory: blocker });

		const error = await store.write(accountKey("1"), "{}").catch((e: unknown) => e);
		expect(error).toBeInstanceOf(PersistenceError);
		if (error instanceof PersistenceError) {
			expect(error.isRetryable).toBe(true);
			expect(error.context["operation"]).toBe("write");
		}
	});
});
