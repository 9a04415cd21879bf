// ---------------------------------------------------------------------------
// Sync Engine — Error Taxonomy
// Every failure the engine raises carries a machine-readable code and whether
// the operation may be retried as-is.
// ---------------------------------------------------------------------------

export type SyncErrorCode =
	| "STORAGE_IO"
	| "RECORD_INVALID"
	| "PACKET_INVALID"
	| "CHECKSUM_MISMATCH"
	| "INCOMPLETE_SEQUENCE"
	| "INCONSISTENT_TOTAL"
	| "INCONSISTENT_KIND"
	| "CAPABILITY_UNAVAILABLE"
	| "TRANSFER_FAILED"
	| "TRANSPORT_UNREACHABLE"
	| "TRANSPORT_REJECTED"
	| "SYNC_CANCELLED"
	| "CONFIG_INVALID";

export class SyncEngineError extends Error {
	constructor(
		public readonly code: SyncErrorCode,
		message: string,
		public readonly retryable: boolean,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "SyncEngineError";
	}
}

/** Raised when the durable record or settings storage cannot be read or written. */
export class StorageError extends SyncEngineError {
	constructor(
		message: string,
		public readonly path?: string,
		options?: { cause?: unknown },
	) {
		super("STORAGE_IO", message, true, options);
		this.name = "StorageError";
	}
}

export class RecordValidationError extends SyncEngineError {
	constructor(
		message: string,
		public readonly issues: string[] = [],
	) {
		super("RECORD_INVALID", message, false);
		this.name = "RecordValidationError";
	}
}

// ── Packet integrity ──────────────────────────────────────────────────────

/**
 * Base class for fallback-transport corruption. A batch that fails with any of
 * these is aborted and retransmitted from the first packet.
 */
export class PacketCodecError extends SyncEngineError {
	constructor(
		code: Extract<
			SyncErrorCode,
			"PACKET_INVALID" | "CHECKSUM_MISMATCH" | "INCOMPLETE_SEQUENCE" | "INCONSISTENT_TOTAL" | "INCONSISTENT_KIND"
		>,
		message: string,
	) {
		super(code, message, true);
		this.name = "PacketCodecError";
	}
}

export class ChecksumMismatchError extends PacketCodecError {
	constructor(
		public readonly sequence: number,
		public readonly expected: string,
		public readonly actual: string,
	) {
		super("CHECKSUM_MISMATCH", `Checksum mismatch in packet ${sequence} (expected ${expected}, got ${actual})`);
		this.name = "ChecksumMismatchError";
	}
}

export class IncompleteSequenceError extends PacketCodecError {
	constructor(
		public readonly missing: number[],
		detail?: string,
	) {
		super(
			"INCOMPLETE_SEQUENCE",
			detail ?? `Packet sequence incomplete, missing: ${missing.join(", ")}`,
		);
		this.name = "IncompleteSequenceError";
	}
}

export class InconsistentTotalError extends PacketCodecError {
	constructor(public readonly totals: number[]) {
		super("INCONSISTENT_TOTAL", `Packets disagree on total count: ${totals.join(", ")}`);
		this.name = "InconsistentTotalError";
	}
}

// ── Transports ────────────────────────────────────────────────────────────

/** The point-to-point radio is switched off or could not be opened. */
export class CapabilityUnavailableError extends SyncEngineError {
	constructor(message: string, options?: { cause?: unknown }) {
		super("CAPABILITY_UNAVAILABLE", message, true, options);
		this.name = "CapabilityUnavailableError";
	}
}

/** The peer or the local driver refused a fallback transfer step. */
export class FallbackTransferError extends SyncEngineError {
	constructor(message: string) {
		super("TRANSFER_FAILED", message, true);
		this.name = "FallbackTransferError";
	}
}

export class PrimaryTransportError extends SyncEngineError {
	constructor(
		code: Extract<SyncErrorCode, "TRANSPORT_UNREACHABLE" | "TRANSPORT_REJECTED">,
		message: string,
		public readonly status?: number,
		options?: { cause?: unknown },
	) {
		super(code, message, true, options);
		this.name = "PrimaryTransportError";
	}
}

export class SyncCancelledError extends SyncEngineError {
	constructor(message = "Sync cancelled") {
		super("SYNC_CANCELLED", message, true);
		this.name = "SyncCancelledError";
	}
}

export class ConfigError extends SyncEngineError {
	constructor(message: string) {
		super("CONFIG_INVALID", message, false);
		this.name = "ConfigError";
	}
}

/** Render any thrown value as a single-line message. */
export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
