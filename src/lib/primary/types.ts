// ---------------------------------------------------------------------------
// Primary Transport — TypeScript Types
// ---------------------------------------------------------------------------

import type { z } from "zod";
import type { HealthRecord } from "../records/types";
import type { HealthResponseSchema, SyncRequestSchema, SyncResponseSchema } from "./schemas";

export type HealthResponse = z.infer<typeof HealthResponseSchema>;
export type SyncRequest = z.infer<typeof SyncRequestSchema>;
export type SyncResponse = z.infer<typeof SyncResponseSchema>;

export type NetworkErrorKind = "timeout" | "refused" | "dns" | "socket" | "aborted" | "unknown";

export type SubmitOutcome =
	| { status: "accepted"; syncedCount: number; message: string }
	| { status: "rejected"; message: string; httpStatus?: number }
	| { status: "unreachable"; cause: NetworkErrorKind; message: string };

export interface PullResult {
	message: string;
	lastSyncTimestamp: number;
	syncedCount: number;
	records: HealthRecord[];
}
