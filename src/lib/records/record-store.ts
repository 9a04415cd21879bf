// ---------------------------------------------------------------------------
// Record Store
// Durable id → record mapping with an idempotent synced flag. Every operation
// runs under one mutex so readers never see a half-applied change.
// ---------------------------------------------------------------------------

import { RecordValidationError } from "../errors";
import { Mutex } from "../utils/mutex";
import { cloneRecord } from "./record";
import { HealthRecordSchema } from "./schemas";
import type { HealthRecord } from "./types";

export interface RecordStore {
	/**
	 * Append records in order. Ids already stored are left untouched.
	 *
	 * @returns number of records that were new to the store
	 * @throws {RecordValidationError} when any record could not be read back; nothing is stored
	 * @throws {StorageError} when the change cannot be persisted
	 */
	ingest(records: readonly HealthRecord[]): Promise<number>;
	/** Unsynced records in insertion order; each call reflects the latest state. */
	unsynced(): AsyncIterable<HealthRecord>;
	/**
	 * Flag the given ids as synced. Unknown or already-synced ids are ignored.
	 *
	 * @returns number of records that changed
	 */
	markSynced(ids: Iterable<string>): Promise<number>;
	countUnsynced(): Promise<number>;
	/** Drop synced records whose timestamp is older than `syncedBefore`. */
	prune(syncedBefore: number): Promise<number>;
}

/**
 * Shared copy-on-write implementation. Subclasses decide how a new record set
 * is made durable; the in-memory view only advances once `persist` resolves.
 */
export abstract class BaseRecordStore implements RecordStore {
	private records: Map<string, HealthRecord>;
	private readonly mutex = new Mutex();

	protected constructor(initial: readonly HealthRecord[] = []) {
		this.records = new Map(initial.map((r) => [r.id, cloneRecord(r)]));
	}

	protected abstract persist(records: HealthRecord[]): Promise<void>;

	async ingest(records: readonly HealthRecord[]): Promise<number> {
		if (records.length === 0) return 0;
		assertStorable(records);

		return this.mutex.runExclusive(async () => {
			const next = new Map(this.records);
			let inserted = 0;
			for (const record of records) {
				if (next.has(record.id)) continue;
				next.set(record.id, { ...cloneRecord(record), synced: false });
				inserted++;
			}
			if (inserted === 0) return 0;

			await this.commit(next);
			return inserted;
		});
	}

	async *unsynced(): AsyncGenerator<HealthRecord> {
		const snapshot = await this.mutex.runExclusive(() =>
			[...this.records.values()].filter((r) => !r.synced).map(cloneRecord),
		);
		yield* snapshot;
	}

	async markSynced(ids: Iterable<string>): Promise<number> {
		const wanted = new Set(ids);
		if (wanted.size === 0) return 0;

		return this.mutex.runExclusive(async () => {
			const next = new Map(this.records);
			let changed = 0;
			for (const id of wanted) {
				const record = next.get(id);
				if (!record || record.synced) continue;
				next.set(id, { ...record, synced: true });
				changed++;
			}
			if (changed === 0) return 0;

			await this.commit(next);
			return changed;
		});
	}

	async countUnsynced(): Promise<number> {
		return this.mutex.runExclusive(() => {
			let count = 0;
			for (const record of this.records.values()) {
				if (!record.synced) count++;
			}
			return count;
		});
	}

	async prune(syncedBefore: number): Promise<number> {
		return this.mutex.runExclusive(async () => {
			const next = new Map(this.records);
			let removed = 0;
			for (const [id, record] of this.records) {
				if (record.synced && record.timestamp < syncedBefore) {
					next.delete(id);
					removed++;
				}
			}
			if (removed === 0) return 0;

			await this.commit(next);
			return removed;
		});
	}

	private async commit(next: Map<string, HealthRecord>): Promise<void> {
		await this.persist([...next.values()]);
		this.records = next;
	}
}

/** Reject the whole call if any record would not read back from storage. */
function assertStorable(records: readonly HealthRecord[]): void {
	const issues: string[] = [];
	records.forEach((record, index) => {
		const parsed = HealthRecordSchema.safeParse(record);
		if (parsed.success) return;
		for (const issue of parsed.error.issues) {
			issues.push(`${index}.${issue.path.join(".")}: ${issue.message}`);
		}
	});
	if (issues.length > 0) {
		throw new RecordValidationError(`Invalid record: ${issues.join(", ")}`, issues);
	}
}

/** Volatile store for tests and hosts that persist records elsewhere. */
export class MemoryRecordStore extends BaseRecordStore {
	constructor(initial: readonly HealthRecord[] = []) {
		super(initial);
	}

	protected async persist(): Promise<void> {}
}
