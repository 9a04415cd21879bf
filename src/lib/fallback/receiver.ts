// ---------------------------------------------------------------------------
// Companion Receiver
// Peer side of the fallback protocol: requests a transfer, drains the data
// channel and rebuilds the batch. A corrupted transfer is reset and fetched
// again from the first packet.
// ---------------------------------------------------------------------------

import { FallbackTransferError, PacketCodecError, errorMessage } from "../errors";
import { createLogger, type SyncLogger } from "../monitoring/logger";
import { parseBatch } from "../records/batch";
import type { HealthRecord } from "../records/types";
import { decodePackets, parsePacket } from "./packet-codec";
import { TransferStatusSchema } from "./schemas";
import {
	type Channel,
	ControlCommand,
	type ControlCommandType,
	type LinkResponse,
	type Packet,
	type TransferStatus,
} from "./types";

/** A connected session with the wearable's fallback service. */
export interface PeerSession {
	read(channel: Channel): Promise<LinkResponse>;
	write(channel: Channel, value: Uint8Array): Promise<LinkResponse>;
}

export interface CompanionReceiverOptions {
	session: PeerSession;
	/** Transfers attempted before giving up on corruption (default: 3) */
	maxAttempts?: number;
	logger?: SyncLogger;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export class CompanionReceiver {
	private readonly session: PeerSession;
	private readonly maxAttempts: number;
	private readonly logger: SyncLogger;

	constructor(options: CompanionReceiverOptions) {
		this.session = options.session;
		this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
		this.logger = options.logger ?? createLogger("companion-receiver");
	}

	/**
	 * Pull the wearable's pending batch.
	 *
	 * @throws {PacketCodecError} when every attempt arrived corrupted
	 * @throws {FallbackTransferError} when the wearable refuses a command or read
	 * @throws {RecordValidationError} when the reassembled bytes are not a batch
	 */
	async receive(): Promise<HealthRecord[]> {
		let lastError: PacketCodecError | undefined;

		for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
			try {
				const records = await this.transferOnce();
				this.logger.info("Batch received", { records: records.length, attempt });
				return records;
			} catch (err) {
				if (!(err instanceof PacketCodecError)) throw err;
				lastError = err;
				this.logger.warn("Corrupted transfer, resetting", { attempt, code: err.code, reason: err.message });
				await this.command(ControlCommand.RESET);
			}
		}

		throw lastError ?? new FallbackTransferError("No transfer attempted");
	}

	async readStatus(): Promise<TransferStatus> {
		const response = await this.session.read("status");
		if (!response.ok) {
			throw new FallbackTransferError(`Status read refused: ${response.error ?? "unknown reason"}`);
		}

		let raw: unknown;
		try {
			raw = JSON.parse(decoder.decode(response.value));
		} catch (err) {
			throw new FallbackTransferError(`Status is not valid JSON: ${errorMessage(err)}`);
		}
		const parsed = TransferStatusSchema.safeParse(raw);
		if (!parsed.success) {
			throw new FallbackTransferError(`Status failed validation: ${parsed.error.message}`);
		}
		return parsed.data;
	}

	private async transferOnce(): Promise<HealthRecord[]> {
		await this.command(ControlCommand.START_SYNC);

		const packets: Packet[] = [];
		for (;;) {
			const response = await this.session.read("data");
			if (!response.ok) {
				throw new FallbackTransferError(`Data read refused: ${response.error ?? "unknown reason"}`);
			}
			if (response.value.length === 0) break;

			packets.push(parsePacket(response.value));
			// More packets than announced: stop draining and let decoding report it
			if (packets.length > packets[0].total) break;
		}

		return parseBatch(decodePackets(packets));
	}

	private async command(command: ControlCommandType): Promise<void> {
		const response = await this.session.write("control", encoder.encode(command));
		if (!response.ok) {
			throw new FallbackTransferError(`${command} refused: ${response.error ?? "unknown reason"}`);
		}
	}
}
