// ---------------------------------------------------------------------------
// Packet Codec
// Splits a batch into MD5-checksummed packets no larger than the link's unit
// size and reassembles them. Reassembly is all-or-nothing.
// ---------------------------------------------------------------------------

import { createHash } from "node:crypto";
import {
	ChecksumMismatchError,
	errorMessage,
	IncompleteSequenceError,
	InconsistentTotalError,
	PacketCodecError,
} from "../errors";
import type { RecordKindType } from "../records/types";
import { PacketWireSchema } from "./schemas";
import type { Packet } from "./types";

export const DEFAULT_MAX_UNIT_SIZE = 512;

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

export function packetChecksum(payload: Uint8Array): string {
	return createHash("md5").update(payload).digest("hex");
}

/**
 * Fragment `bytes` into `ceil(bytes.length / maxUnitSize)` packets.
 *
 * @throws {PacketCodecError} when `maxUnitSize` is not a positive integer
 */
export function encodePackets(
	bytes: Uint8Array,
	kind: RecordKindType,
	maxUnitSize: number = DEFAULT_MAX_UNIT_SIZE,
): Packet[] {
	if (!Number.isInteger(maxUnitSize) || maxUnitSize <= 0) {
		throw new PacketCodecError("PACKET_INVALID", `maxUnitSize must be a positive integer, got ${maxUnitSize}`);
	}

	const total = Math.ceil(bytes.length / maxUnitSize);
	const packets: Packet[] = [];
	for (let sequence = 0; sequence < total; sequence++) {
		const payload = bytes.slice(sequence * maxUnitSize, (sequence + 1) * maxUnitSize);
		packets.push({ sequence, total, kind, payload, checksum: packetChecksum(payload) });
	}
	return packets;
}

/**
 * Validate and reassemble packets in any order.
 *
 * @throws {InconsistentTotalError} packets disagree on `total`
 * @throws {PacketCodecError} packets disagree on `kind` (`INCONSISTENT_KIND`)
 * @throws {IncompleteSequenceError} an index is missing, repeated or out of range
 * @throws {ChecksumMismatchError} a payload does not match its checksum
 */
export function decodePackets(packets: readonly Packet[]): Uint8Array {
	if (packets.length === 0) return new Uint8Array(0);

	const totals = [...new Set(packets.map((p) => p.total))];
	if (totals.length > 1) {
		throw new InconsistentTotalError(totals.sort((a, b) => a - b));
	}
	const kinds = [...new Set(packets.map((p) => p.kind))];
	if (kinds.length > 1) {
		throw new PacketCodecError("INCONSISTENT_KIND", `Packets disagree on kind: ${kinds.join(", ")}`);
	}

	const total = totals[0];
	const sorted = [...packets].sort((a, b) => a.sequence - b.sequence);

	const seen = new Set<number>();
	const duplicates: number[] = [];
	const outOfRange: number[] = [];
	for (const { sequence } of sorted) {
		if (!Number.isInteger(sequence) || sequence < 0 || sequence >= total) {
			outOfRange.push(sequence);
		} else if (seen.has(sequence)) {
			duplicates.push(sequence);
		} else {
			seen.add(sequence);
		}
	}
	const missing: number[] = [];
	for (let i = 0; i < total; i++) {
		if (!seen.has(i)) missing.push(i);
	}

	if (outOfRange.length > 0) {
		throw new IncompleteSequenceError(
			missing,
			`Packet sequence out of range 0..${total - 1}: ${outOfRange.join(", ")}`,
		);
	}
	if (duplicates.length > 0) {
		throw new IncompleteSequenceError(missing, `Duplicate packet sequence: ${duplicates.join(", ")}`);
	}
	if (missing.length > 0) {
		throw new IncompleteSequenceError(missing);
	}

	for (const packet of sorted) {
		const actual = packetChecksum(packet.payload);
		if (actual !== packet.checksum) {
			throw new ChecksumMismatchError(packet.sequence, packet.checksum, actual);
		}
	}

	const length = sorted.reduce((sum, p) => sum + p.payload.length, 0);
	const bytes = new Uint8Array(length);
	let offset = 0;
	for (const packet of sorted) {
		bytes.set(packet.payload, offset);
		offset += packet.payload.length;
	}
	return bytes;
}

// ── Wire form ─────────────────────────────────────────────────────────────

export function serializePacket(packet: Packet): Uint8Array {
	return encoder.encode(
		JSON.stringify({
			sequence: packet.sequence,
			total: packet.total,
			kind: packet.kind,
			payload: Buffer.from(packet.payload).toString("base64"),
			checksum: packet.checksum,
		}),
	);
}

/**
 * Parse one data-channel read. The checksum is carried as-is; it is only
 * verified by `decodePackets`.
 *
 * @throws {PacketCodecError} when the bytes are not a packet (`PACKET_INVALID`)
 */
export function parsePacket(bytes: Uint8Array): Packet {
	let raw: unknown;
	try {
		raw = JSON.parse(decoder.decode(bytes));
	} catch (err) {
		throw new PacketCodecError("PACKET_INVALID", `Packet is not valid JSON: ${errorMessage(err)}`);
	}

	const parsed = PacketWireSchema.safeParse(raw);
	if (!parsed.success) {
		const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ");
		throw new PacketCodecError("PACKET_INVALID", `Packet failed validation: ${issues}`);
	}

	const { payload, ...header } = parsed.data;
	return { ...header, payload: new Uint8Array(Buffer.from(payload, "base64")) };
}
