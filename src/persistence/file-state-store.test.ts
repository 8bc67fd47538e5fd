import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { PersistenceError } from "../shared/errors.js";
import { FileStateStore } from "./file-state-store.js";

describe("FileStateStore", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "state-store-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("returns null before the first write", async () => {
		const store = FileStateStore.create({ path: join(dir, "state.json") });
		expect(await store.read()).toBeNull();
	});

	it("replaces the document and leaves no temp files", async () => {
		const store = FileStateStore.create({ path: join(dir, "nested", "state.json") });
		await store.write('{"cursorMs":1}');
		await store.write('{"cursorMs":2}');

		expect(await store.read()).toBe('{"cursorMs":2}');
		expect(await readdir(join(dir, "nested"))).toEqual(["state.json"]);
	});

	it("reports write failures as PersistenceError", async () => {
		const blocker = join(dir, "blocker");
		await writeFile(blocker, "not a directory");
		const store = FileStateStore.create({ path: join(blocker, "state.json") });

		const error = await store.write("{}").catch((e: unknown) => e);
		expect(error).toBeInstanceOf(PersistenceError);
		if (error instanceof PersistenceError) {
			expect(error.context["operation"]).toBe("write");
		}
	});
});
