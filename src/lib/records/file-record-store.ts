// ---------------------------------------------------------------------------
// File-backed Record Store
// The whole record set lives in one JSON document, rewritten atomically on
// every change.
// ---------------------------------------------------------------------------

import { readJsonFile, writeJsonAtomic } from "../utils/json-file";
import { BaseRecordStore } from "./record-store";
import { StoredRecordsSchema } from "./schemas";
import type { HealthRecord, StoredRecords } from "./types";

export class FileRecordStore extends BaseRecordStore {
	private constructor(
		private readonly filePath: string,
		initial: readonly HealthRecord[],
	) {
		super(initial);
	}

	/**
	 * Open the store at `filePath`, starting empty when the file is absent.
	 *
	 * @throws {StorageError} when an existing file is unreadable or invalid
	 */
	static async open(filePath: string): Promise<FileRecordStore> {
		const stored = await readJsonFile(filePath, StoredRecordsSchema);
		return new FileRecordStore(filePath, stored?.records ?? []);
	}

	get path(): string {
		return this.filePath;
	}

	protected async persist(records: HealthRecord[]): Promise<void> {
		const document: StoredRecords = { version: 1, records };
		await writeJsonAtomic(this.filePath, document);
	}
}
