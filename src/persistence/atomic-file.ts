/**
 * File helpers shared by the file-backed stores.
 */

import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { PersistenceError } from "../shared/errors.js";

let tmpCounter = 0;

/** @returns the file contents, or null when it does not exist */
export async function readIfExists(path: string): Promise<string | null> {
	try {
		return await readFile(path, "utf-8");
	} catch (err: unknown) {
		if (isNodeError(err) && err.code === "ENOENT") {
			return null;
		}
		throw err;
	}
}

/** Writes to a temporary sibling and renames it over `path`; a crash mid-write leaves the old file. */
export async function writeAtomic(path: string, contents: string): Promise<void> {
	tmpCounter += 1;
	const tmp = `${path}.${process.pid}.${tmpCounter}.tmp`;
	await mkdir(dirname(path), { recursive: true });
	await writeFile(tmp, contents, "utf-8");
	await rename(tmp, path);
}

export function persistenceFailure(store: string, operation: string, path: string, err: unknown): PersistenceError {
	const code = isNodeError(err) ? err.code : "UNKNOWN";
	const msg = err instanceof Error ? err.message : String(err);
	return new PersistenceError(`${store} ${operation} of ${path} failed: [${code}] ${msg}`, {
		operation,
		path,
		errno: code,
		cause: err,
	});
}

export function isNodeError(err: unknown): err is NodeJS.ErrnoException {
	return err instanceof Error && "code" in err;
}
