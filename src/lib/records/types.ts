// ---------------------------------------------------------------------------
// Health Records — TypeScript Types (Inferred from Zod Schemas)
// ---------------------------------------------------------------------------

import type { z } from "zod";
import type {
	HealthRecordSchema,
	NewRecordInputSchema,
	RecordKind,
	StoredRecordsSchema,
	WireRecordSchema,
} from "./schemas";

export type RecordKindType = z.infer<typeof RecordKind>;

export type HealthRecord = z.infer<typeof HealthRecordSchema>;
export type NewRecordInput = z.input<typeof NewRecordInputSchema>;
export type WireRecord = z.infer<typeof WireRecordSchema>;
export type StoredRecords = z.infer<typeof StoredRecordsSchema>;
