// ---------------------------------------------------------------------------
// JSON file persistence — validated reads, atomic writes (tmp + rename)
// ---------------------------------------------------------------------------

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { z } from "zod";
import { StorageError, errorMessage } from "../errors";

function isMissingFile(err: unknown): boolean {
	return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Read and validate a JSON document.
 * Returns `null` when the file does not exist yet.
 *
 * @throws {StorageError} when the file cannot be read or fails validation
 */
export async function readJsonFile<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
	let content: string;
	try {
		content = await fs.readFile(filePath, "utf-8");
	} catch (err) {
		if (isMissingFile(err)) return null;
		throw new StorageError(`Failed to read ${filePath}: ${errorMessage(err)}`, filePath, { cause: err });
	}

	let raw: unknown;
	try {
		raw = JSON.parse(content);
	} catch (err) {
		throw new StorageError(`Corrupt JSON in ${filePath}: ${errorMessage(err)}`, filePath, { cause: err });
	}

	const parsed = schema.safeParse(raw);
	if (!parsed.success) {
		const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ");
		throw new StorageError(`Invalid contents in ${filePath}: ${issues}`, filePath);
	}
	return parsed.data;
}

/**
 * Write a JSON document atomically (tmp + rename).
 *
 * @throws {StorageError} when any filesystem step fails
 */
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
	const tmpPath = `${filePath}.tmp`;
	try {
		await fs.mkdir(path.dirname(filePath), { recursive: true });
		await fs.writeFile(tmpPath, JSON.stringify(data, null, 2), "utf-8");
		await fs.rename(tmpPath, filePath);
	} catch (err) {
		throw new StorageError(`Failed to write ${filePath}: ${errorMessage(err)}`, filePath, { cause: err });
	}
}
