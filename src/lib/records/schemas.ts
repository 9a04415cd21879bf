// ---------------------------------------------------------------------------
// Health Records — Zod Validation Schemas
// In-engine record shape, caller input, and the snake_case wire form shared
// with the companion server and the fallback batch encoding.
// ---------------------------------------------------------------------------

import { z } from "zod";

export const RecordKind = z.enum(["daily_metrics", "sleep_session", "heart_rate", "steps", "workout"]);

/** Opaque, JSON-serialisable payload; the engine never interprets it. */
export const RecordPayloadSchema = z.record(z.unknown());

export const HealthRecordSchema = z.object({
	id: z.string().min(1),
	timestamp: z.number().int().nonnegative(),
	kind: RecordKind,
	payload: RecordPayloadSchema,
	source: z.string().min(1),
	synced: z.boolean(),
});

/** What a producer hands to `createRecord`; id and source are optional. */
export const NewRecordInputSchema = z.object({
	id: z.string().min(1).optional(),
	timestamp: z.number().int().nonnegative(),
	kind: RecordKind,
	payload: RecordPayloadSchema.default({}),
	source: z.string().min(1).optional(),
});

// --- Wire form ---

export const WireRecordSchema = z.object({
	id: z.string().min(1),
	timestamp: z.number().int().nonnegative(),
	type: RecordKind,
	data: RecordPayloadSchema,
	source: z.string(),
	synced: z.boolean().default(false),
});

export const WireBatchSchema = z.array(WireRecordSchema);

// --- Persisted store file ---

export const StoredRecordsSchema = z.object({
	version: z.literal(1),
	records: z.array(HealthRecordSchema),
});
