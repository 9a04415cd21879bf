// ---------------------------------------------------------------------------
// Fallback Transport — Zod Validation Schemas
// Wire forms exchanged over the data and status channels.
// ---------------------------------------------------------------------------

import { z } from "zod";
import { RecordKind } from "../records/schemas";

const Base64 = z.string().regex(/^[A-Za-z0-9+/]*={0,2}$/, "payload must be base64");

/** `{"sequence","total","kind","payload":<base64>,"checksum"}` */
export const PacketWireSchema = z.object({
	sequence: z.number().int().nonnegative(),
	total: z.number().int().positive(),
	kind: RecordKind,
	payload: Base64,
	checksum: z.string().regex(/^[0-9a-f]{32}$/, "checksum must be an MD5 hex digest"),
});

export const TransferStatusSchema = z.object({
	pendingCount: z.number().int().nonnegative(),
	transferState: z.enum(["idle", "preparing", "transferring", "completed", "error"]),
	connectionState: z.enum(["disconnected", "connecting", "connected"]),
});
