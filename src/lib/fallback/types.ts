// ---------------------------------------------------------------------------
// Fallback Transport — TypeScript Types
// ---------------------------------------------------------------------------

import type { z } from "zod";
import type { HealthRecord, RecordKindType } from "../records/types";
import type { TransferStatusSchema } from "./schemas";

export type ConnectionState = "disconnected" | "connecting" | "connected";

export type TransferState = "idle" | "preparing" | "transferring" | "completed" | "error";

/** One checksummed fragment of a serialized batch. */
export interface Packet {
	sequence: number;
	total: number;
	kind: RecordKindType;
	payload: Uint8Array;
	/** MD5 hex digest of `payload` */
	checksum: string;
}

export type Channel = "data" | "control" | "status";

export const ControlCommand = {
	START_SYNC: "START_SYNC",
	RESET: "RESET",
} as const;

export type ControlCommandType = (typeof ControlCommand)[keyof typeof ControlCommand];

/** What the driver answers to a peer read or write. */
export interface LinkResponse {
	ok: boolean;
	value: Uint8Array;
	/** Failure reason, set when `ok` is false */
	error?: string;
}

export type LinkEvent =
	| { type: "advertisingStarted" }
	| { type: "advertisingStopped" }
	| { type: "peerAttached" }
	| { type: "peerDetached" }
	| { type: "readRequest"; channel: Channel }
	| { type: "writeRequest"; channel: Channel; value: Uint8Array }
	| { type: "enqueue"; records: readonly HealthRecord[] };

export interface DriverSnapshot {
	readonly advertising: boolean;
	readonly connection: ConnectionState;
	readonly transfer: TransferState;
	/** Batch handed over by the last `enqueue` */
	readonly pending: readonly HealthRecord[];
	/** Incremented on every `enqueue` */
	readonly batch: number;
	/** Batch the current (or last) transfer was prepared from */
	readonly transferBatch: number | null;
	readonly packets: readonly Packet[];
	readonly cursor: number;
	readonly maxUnitSize: number;
}

export interface TransitionResult {
	snapshot: DriverSnapshot;
	/** Reply for read and write requests; absent for link lifecycle events */
	response?: LinkResponse;
	/** Transfer states passed through on the way to `snapshot.transfer` */
	visited: TransferState[];
}

export type TransferStatus = z.infer<typeof TransferStatusSchema>;
