// ---------------------------------------------------------------------------
// Fallback Transport Driver
// Owns the link lifecycle and the single writable copy of the transfer
// state; readers observe it through the published state streams.
// ---------------------------------------------------------------------------

import { CapabilityUnavailableError } from "../errors";
import { createLogger, type SyncLogger } from "../monitoring/logger";
import type { HealthRecord } from "../records/types";
import { type ReadonlyStateStream, StateStream } from "../utils/state-stream";
import type { PeripheralLink } from "./link";
import { DEFAULT_MAX_UNIT_SIZE } from "./packet-codec";
import { initialSnapshot, statusOf, transition } from "./state-machine";
import type { ConnectionState, DriverSnapshot, LinkEvent, LinkResponse, TransferState, TransferStatus } from "./types";

export interface FallbackTransportOptions {
	link: PeripheralLink;
	/** Largest packet payload the link carries (default: 512) */
	maxUnitSize?: number;
	logger?: SyncLogger;
}

export class FallbackTransport {
	private readonly link: PeripheralLink;
	private readonly logger: SyncLogger;
	private snapshot: DriverSnapshot;
	private readonly connection = new StateStream<ConnectionState>("disconnected");
	private readonly transfer = new StateStream<TransferState>("idle");

	constructor(options: FallbackTransportOptions) {
		this.link = options.link;
		this.logger = options.logger ?? createLogger("fallback");
		this.snapshot = initialSnapshot(options.maxUnitSize ?? DEFAULT_MAX_UNIT_SIZE);
	}

	get connectionState(): ReadonlyStateStream<ConnectionState> {
		return this.connection.asReadonly();
	}

	get transferState(): ReadonlyStateStream<TransferState> {
		return this.transfer.asReadonly();
	}

	get isAdvertising(): boolean {
		return this.snapshot.advertising;
	}

	/** Batch number of the last transfer that reached `completed`, if any. */
	get completedBatch(): number | null {
		return this.snapshot.transfer === "completed" ? this.snapshot.transferBatch : null;
	}

	/**
	 * Make the peripheral discoverable. Returns false when the radio is
	 * disabled or the link cannot be opened; never throws.
	 */
	startAdvertising(): boolean {
		if (this.snapshot.advertising) return true;

		if (!this.link.enabled) {
			const err = new CapabilityUnavailableError("Peripheral link is disabled");
			this.logger.warn("Cannot start advertising", { code: err.code, reason: err.message });
			return false;
		}

		try {
			this.link.open((event) => this.handleEvent(event));
		} catch (err) {
			this.logger.error("Failed to start advertising", err);
			return false;
		}

		this.handleEvent({ type: "advertisingStarted" });
		this.logger.info("Advertising started");
		return true;
	}

	/** Idempotent. Leaves the driver disconnected and idle. */
	stopAdvertising(): void {
		if (this.snapshot.advertising) {
			try {
				this.link.close();
			} catch (err) {
				this.logger.error("Failed to close peripheral link", err);
			}
			this.logger.info("Advertising stopped");
		}
		this.handleEvent({ type: "advertisingStopped" });
	}

	/**
	 * Replace the batch served by the next `START_SYNC`.
	 *
	 * @returns the batch number, matched against `completedBatch`
	 */
	enqueue(records: readonly HealthRecord[]): number {
		this.handleEvent({ type: "enqueue", records: [...records] });
		return this.snapshot.batch;
	}

	status(): TransferStatus {
		return statusOf(this.snapshot);
	}

	/** Apply one link event and publish the resulting states. */
	handleEvent(event: LinkEvent): LinkResponse | undefined {
		const result = transition(this.snapshot, event);
		this.snapshot = result.snapshot;

		if (result.response && !result.response.ok) {
			this.logger.warn("Rejected peer request", { event: event.type, reason: result.response.error });
		}

		for (const state of result.visited) {
			this.transfer.set(state);
		}
		this.connection.set(result.snapshot.connection);
		this.transfer.set(result.snapshot.transfer);
		return result.response;
	}
}
