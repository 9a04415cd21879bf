// ---------------------------------------------------------------------------
// Companion Server API — Zod Validation Schemas
// Wire shapes of /api/v1/health and /api/v1/data (snake_case).
// ---------------------------------------------------------------------------

import { z } from "zod";
import { WireRecordSchema } from "../records/schemas";

// --- GET /api/v1/health ---

export const HealthResponseSchema = z.object({
	status: z.string(),
	server_time: z.number().int(),
	version: z.string(),
});

// --- POST /api/v1/data ---

export const SyncRequestSchema = z.object({
	device_id: z.string().min(1),
	data: z.array(WireRecordSchema),
	last_sync_timestamp: z.number().int().nonnegative(),
});

// --- POST /api/v1/data response, also returned by GET /api/v1/data ---

export const SyncResponseSchema = z.object({
	success: z.boolean(),
	message: z.string(),
	last_sync_timestamp: z.number().int(),
	synced_count: z.number().int().nonnegative(),
	/** Present on pull-style retrieval only */
	data: z.array(WireRecordSchema).optional(),
});
