// ---------------------------------------------------------------------------
// Sync Orchestrator — Zod Validation Schemas
// ---------------------------------------------------------------------------

import { z } from "zod";

/** Companion server base URL; only plain HTTP(S) origins are accepted. */
export const EndpointSchema = z
	.string()
	.url()
	.refine((url) => /^https?:\/\//i.test(url), "endpoint must use http or https");

// --- Persisted settings (settings.json) ---

export const SyncSettingsSchema = z.object({
	deviceId: z.string().min(1),
	endpoint: EndpointSchema,
	lastSyncTimestamp: z.number().int().nonnegative(),
});
