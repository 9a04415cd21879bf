// ---------------------------------------------------------------------------
// Sync Orchestrator — Types
// ---------------------------------------------------------------------------

import type { z } from "zod";
import type { SyncSettingsSchema } from "./schemas";

export type SyncMethod = "none" | "primary" | "fallback";

/** Published after every sync attempt and every ingestion. */
export interface SyncState {
	/** Non-decreasing; only advanced after a transport confirmed delivery */
	lastSyncTimestamp: number;
	pendingCount: number;
	lastMethod: SyncMethod;
	lastSuccess: boolean;
	/** Cleared on success */
	lastError?: string;
}

/** Identity and checkpoint surviving restarts. */
export type SyncSettings = z.infer<typeof SyncSettingsSchema>;

export interface SyncStats {
	pendingCount: number;
	lastSyncTimestamp: number;
	deviceId: string;
	endpoint: string;
	primaryAvailable: boolean;
}
