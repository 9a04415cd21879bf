// ---------------------------------------------------------------------------
// Batch serialisation for the fallback link
// A batch is the UTF-8 JSON array of wire records; mixed kinds travel together.
// ---------------------------------------------------------------------------

import { RecordValidationError } from "../errors";
import { fromWireRecord, toWireRecord } from "./record";
import { WireBatchSchema } from "./schemas";
import type { HealthRecord, RecordKindType } from "./types";

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

export function serializeBatch(records: readonly HealthRecord[]): Uint8Array {
	return encoder.encode(JSON.stringify(records.map(toWireRecord)));
}

/**
 * @throws {RecordValidationError} when the bytes are not a valid record batch
 */
export function parseBatch(bytes: Uint8Array): HealthRecord[] {
	let raw: unknown;
	try {
		raw = JSON.parse(decoder.decode(bytes));
	} catch (err) {
		throw new RecordValidationError(
			`Batch is not valid UTF-8 JSON: ${err instanceof Error ? err.message : String(err)}`,
		);
	}

	const parsed = WireBatchSchema.safeParse(raw);
	if (!parsed.success) {
		const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
		throw new RecordValidationError(`Batch failed validation: ${issues.join(", ")}`, issues);
	}
	return parsed.data.map(fromWireRecord);
}

/**
 * The most frequent kind in a batch; ties go to the kind seen first.
 * Empty batches report `daily_metrics`.
 */
export function dominantKind(records: readonly HealthRecord[]): RecordKindType {
	const counts = new Map<RecordKindType, number>();
	for (const record of records) {
		counts.set(record.kind, (counts.get(record.kind) ?? 0) + 1);
	}

	// Map keeps first-seen order; strict > keeps the earlier kind on ties
	let best: RecordKindType = "daily_metrics";
	let bestCount = 0;
	for (const [kind, count] of counts) {
		if (count > bestCount) {
			best = kind;
			bestCount = count;
		}
	}
	return best;
}
