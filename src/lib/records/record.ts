// ---------------------------------------------------------------------------
// Record construction and wire mapping
// ---------------------------------------------------------------------------

import { v4 as uuidv4 } from "uuid";
import { RecordValidationError } from "../errors";
import { NewRecordInputSchema } from "./schemas";
import type { HealthRecord, NewRecordInput, WireRecord } from "./types";

export const DEFAULT_SOURCE = "Wearable";

/**
 * Build an unsynced record from producer input. Generates a uuid when the
 * caller supplies no id and falls back to `defaultSource` for the origin label.
 *
 * @throws {RecordValidationError} when the input does not match the record shape
 */
export function createRecord(input: NewRecordInput, defaultSource = DEFAULT_SOURCE): HealthRecord {
	const parsed = NewRecordInputSchema.safeParse(input);
	if (!parsed.success) {
		const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "record"}: ${i.message}`);
		throw new RecordValidationError(`Invalid record: ${issues.join(", ")}`, issues);
	}

	return {
		id: parsed.data.id ?? uuidv4(),
		timestamp: parsed.data.timestamp,
		kind: parsed.data.kind,
		payload: parsed.data.payload,
		source: parsed.data.source ?? defaultSource,
		synced: false,
	};
}

/** Copy a record so callers never share mutable payloads with the store. */
export function cloneRecord(record: HealthRecord): HealthRecord {
	return { ...record, payload: structuredClone(record.payload) };
}

export function toWireRecord(record: HealthRecord): WireRecord {
	return {
		id: record.id,
		timestamp: record.timestamp,
		type: record.kind,
		data: record.payload,
		source: record.source,
		synced: record.synced,
	};
}

/** An empty wire `source` takes the default label. */
export function fromWireRecord(wire: WireRecord): HealthRecord {
	return {
		id: wire.id,
		timestamp: wire.timestamp,
		kind: wire.type,
		payload: wire.data,
		source: wire.source || DEFAULT_SOURCE,
		synced: wire.synced,
	};
}
