// ---------------------------------------------------------------------------
// Unit Tests: Packet Codec
// Fragmentation, reassembly, corruption detection, wire form
// ---------------------------------------------------------------------------

import { createHash } from "node:crypto";
import {
	ChecksumMismatchError,
	IncompleteSequenceError,
	InconsistentTotalError,
	PacketCodecError,
} from "@/lib/errors";
import {
	decodePackets,
	encodePackets,
	packetChecksum,
	parsePacket,
	serializePacket,
} from "@/lib/fallback/packet-codec";
import type { Packet } from "@/lib/fallback/types";
import { describe, expect, it } from "vitest";

function bytesOf(length: number): Uint8Array {
	return Uint8Array.from({ length }, (_, i) => (i * 7) % 256);
}

function thrownBy(fn: () => unknown): unknown {
	try {
		fn();
	} catch (err) {
		return err;
	}
	return undefined;
}

function corrupt(packet: Packet, index = 0): Packet {
	const payload = packet.payload.slice();
	payload[index] ^= 0xff;
	return { ...packet, payload };
}

describe("encodePackets", () => {
	it("splits into ceil(length / maxUnitSize) packets", () => {
		const packets = encodePackets(bytesOf(1300), "steps", 512);

		expect(packets.map((p) => p.sequence)).toEqual([0, 1, 2]);
		expect(packets.map((p) => p.total)).toEqual([3, 3, 3]);
		expect(packets.map((p) => p.payload.length)).toEqual([512, 512, 276]);
		expect(packets.every((p) => p.kind === "steps")).toBe(true);
	});

	it("produces a single packet when the batch fits one unit", () => {
		const packets = encodePackets(bytesOf(512), "workout", 512);
		expect(packets).toHaveLength(1);
		expect(packets[0].total).toBe(1);
	});

	it("uses the MD5 hex digest of each payload as checksum", () => {
		const [packet] = encodePackets(new TextEncoder().encode("hello"), "heart_rate", 512);
		expect(packet.checksum).toBe(createHash("md5").update("hello").digest("hex"));
		expect(packet.checksum).toBe("5d41402abc4b2a76b9719d911017c592");
	});

	it("is deterministic", () => {
		const bytes = bytesOf(2000);
		expect(encodePackets(bytes, "steps", 100)).toEqual(encodePackets(bytes, "steps", 100));
	});

	it("defaults to a 512-byte unit", () => {
		expect(encodePackets(bytesOf(1025), "steps")).toHaveLength(3);
	});

	it.each([0, -1, 1.5, Number.NaN])("rejects maxUnitSize %s", (size) => {
		expect(() => encodePackets(bytesOf(10), "steps", size)).toThrow(PacketCodecError);
	});
});

describe("decodePackets", () => {
	it("reassembles the original bytes", () => {
		const bytes = bytesOf(1300);
		expect(decodePackets(encodePackets(bytes, "steps", 512))).toEqual(bytes);
	});

	it("reassembles packets delivered out of order", () => {
		const bytes = bytesOf(1000);
		const packets = encodePackets(bytes, "sleep_session", 128).reverse();
		expect(decodePackets(packets)).toEqual(bytes);
	});

	it("round-trips across unit sizes", () => {
		const bytes = bytesOf(777);
		for (const size of [1, 2, 7, 64, 776, 777, 778, 4096]) {
			expect(decodePackets(encodePackets(bytes, "daily_metrics", size))).toEqual(bytes);
		}
	});

	it("returns empty bytes for no packets", () => {
		expect(decodePackets([])).toEqual(new Uint8Array(0));
	});

	it("identifies the corrupted packet by sequence", () => {
		const packets = encodePackets(bytesOf(1300), "steps", 512);
		packets[2] = corrupt(packets[2]);

		const caught = thrownBy(() => decodePackets(packets));
		expect(caught).toBeInstanceOf(ChecksumMismatchError);
		expect(caught).toMatchObject({ code: "CHECKSUM_MISMATCH", sequence: 2 });
	});

	it("reports the first corrupted packet when several are damaged", () => {
		const packets = encodePackets(bytesOf(1300), "steps", 512);
		packets[1] = corrupt(packets[1], 10);
		packets[2] = corrupt(packets[2]);
		expect(() => decodePackets(packets)).toThrow("Checksum mismatch in packet 1");
	});

	it("lists missing indices", () => {
		const packets = encodePackets(bytesOf(2000), "steps", 400);
		const partial = packets.filter((p) => p.sequence !== 1 && p.sequence !== 3);

		expect(() => decodePackets(partial)).toThrow(IncompleteSequenceError);
		expect(() => decodePackets(partial)).toThrow("Packet sequence incomplete, missing: 1, 3");
	});

	it("treats duplicate sequences as incomplete", () => {
		const packets = encodePackets(bytesOf(1000), "steps", 500);
		expect(() => decodePackets([packets[0], packets[0]])).toThrow("Duplicate packet sequence: 0");
	});

	it("treats out-of-range sequences as incomplete", () => {
		const packets = encodePackets(bytesOf(1000), "steps", 500);
		const stray = { ...packets[1], sequence: 5 };
		expect(() => decodePackets([packets[0], packets[1], stray])).toThrow(
			"Packet sequence out of range 0..1: 5",
		);
	});

	it("rejects packets that disagree on total", () => {
		const packets = encodePackets(bytesOf(1000), "steps", 500);
		const mismatched = [packets[0], { ...packets[1], total: 3 }];

		expect(() => decodePackets(mismatched)).toThrow(InconsistentTotalError);
		expect(() => decodePackets(mismatched)).toThrow("Packets disagree on total count: 2, 3");
	});

	it("rejects packets that disagree on kind", () => {
		const packets = encodePackets(bytesOf(1000), "steps", 500);
		const mixed = [packets[0], { ...packets[1], kind: "workout" as const }];

		expect(thrownBy(() => decodePackets(mixed))).toMatchObject({ code: "INCONSISTENT_KIND" });
	});
});

describe("packet wire form", () => {
	it("serializes payload as base64 JSON", () => {
		const [packet] = encodePackets(new TextEncoder().encode("hi"), "steps", 512);
		const json = JSON.parse(new TextDecoder().decode(serializePacket(packet)));

		expect(json).toEqual({
			sequence: 0,
			total: 1,
			kind: "steps",
			payload: "aGk=",
			checksum: packetChecksum(new TextEncoder().encode("hi")),
		});
	});

	it("parses what it serializes", () => {
		const [packet] = encodePackets(bytesOf(300), "workout", 512);
		expect(parsePacket(serializePacket(packet))).toEqual(packet);
	});

	it("keeps a tampered payload so decoding can detect it", () => {
		const [packet] = encodePackets(bytesOf(10), "steps", 512);
		const parsed = parsePacket(serializePacket(corrupt(packet)));
		expect(() => decodePackets([parsed])).toThrow(ChecksumMismatchError);
	});

	it("rejects bytes that are not JSON", () => {
		const caught = thrownBy(() => parsePacket(new TextEncoder().encode("not json")));
		expect(caught).toBeInstanceOf(PacketCodecError);
		expect(caught).toMatchObject({ code: "PACKET_INVALID" });
	});

	it("rejects JSON without the packet fields", () => {
		const bytes = new TextEncoder().encode(JSON.stringify({ sequence: 0, total: 1 }));
		expect(() => parsePacket(bytes)).toThrow(PacketCodecError);
	});
});
