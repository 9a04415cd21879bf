// ---------------------------------------------------------------------------
// Unit Tests: Fallback state machine
// Pure transitions of the connection/transfer machines and the peer protocol
// ---------------------------------------------------------------------------

import { decodePackets, parsePacket } from "@/lib/fallback/packet-codec";
import { initialSnapshot, transition } from "@/lib/fallback/state-machine";
import type { Channel, DriverSnapshot, LinkEvent, LinkResponse, Packet } from "@/lib/fallback/types";
import { parseBatch } from "@/lib/records/batch";
import { createRecord } from "@/lib/records/record";
import { describe, expect, it } from "vitest";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

const records = Array.from({ length: 6 }, (_, i) =>
	createRecord({ id: `rec-${i}`, timestamp: 1000 + i, kind: "heart_rate", payload: { bpm: 60 + i } }),
);

function run(snapshot: DriverSnapshot, ...events: LinkEvent[]): DriverSnapshot {
	return events.reduce((s, e) => transition(s, e).snapshot, snapshot);
}

function write(command: string): LinkEvent {
	return { type: "writeRequest", channel: "control", value: encoder.encode(command) };
}

function read(channel: Channel): LinkEvent {
	return { type: "readRequest", channel };
}

function responseOf(snapshot: DriverSnapshot, event: LinkEvent): LinkResponse | undefined {
	return transition(snapshot, event).response;
}

/** Advertising, peer attached, batch enqueued. */
function connected(maxUnitSize = 128): DriverSnapshot {
	return run(
		initialSnapshot(maxUnitSize),
		{ type: "advertisingStarted" },
		{ type: "peerAttached" },
		{ type: "enqueue", records },
	);
}

describe("connection machine", () => {
	it("moves to connecting when advertising starts", () => {
		const s = run(initialSnapshot(512), { type: "advertisingStarted" });
		expect(s.connection).toBe("connecting");
		expect(s.advertising).toBe(true);
	});

	it("only connects on a peer attach", () => {
		const advertising = run(initialSnapshot(512), { type: "advertisingStarted" });
		expect(run(advertising, read("status")).connection).toBe("connecting");
		expect(run(advertising, { type: "peerAttached" }).connection).toBe("connected");
	});

	it("ignores a peer attach while not advertising", () => {
		expect(run(initialSnapshot(512), { type: "peerAttached" }).connection).toBe("disconnected");
	});

	it("disconnects on peer detach and accepts a new peer while still advertising", () => {
		const detached = run(connected(), { type: "peerDetached" });
		expect(detached.connection).toBe("disconnected");
		expect(run(detached, { type: "peerAttached" }).connection).toBe("connected");
	});

	it("returns to disconnected and idle when advertising stops", () => {
		const s = run(connected(), write("START_SYNC"), { type: "advertisingStopped" });
		expect(s).toMatchObject({ advertising: false, connection: "disconnected", transfer: "idle", cursor: 0 });
		expect(s.packets).toEqual([]);
	});
});

describe("transfer machine", () => {
	it("passes through preparing on START_SYNC and ends transferring", () => {
		const result = transition(connected(), write("START_SYNC"));
		expect(result.visited).toEqual(["preparing"]);
		expect(result.snapshot.transfer).toBe("transferring");
		expect(result.response?.ok).toBe(true);
		expect(result.snapshot.transferBatch).toBe(1);
	});

	it("serves packets in order and completes on the zero-length read", () => {
		let s = run(connected(), write("START_SYNC"));
		const total = s.packets.length;
		expect(total).toBeGreaterThan(1);

		const received: Packet[] = [];
		for (let i = 0; i < total; i++) {
			const result = transition(s, read("data"));
			s = result.snapshot;
			expect(result.response?.ok).toBe(true);
			received.push(parsePacket(result.response?.value ?? new Uint8Array(0)));
		}
		expect(received.map((p) => p.sequence)).toEqual([...Array(total).keys()]);
		expect(s.transfer).toBe("transferring");

		const end = transition(s, read("data"));
		expect(end.response).toEqual({ ok: true, value: new Uint8Array(0) });
		expect(end.snapshot.transfer).toBe("completed");
		expect(parseBatch(decodePackets(received))).toEqual(records);
	});

	it("tags packets with the dominant kind", () => {
		const s = run(connected(), write("START_SYNC"));
		expect(s.packets.every((p) => p.kind === "heart_rate")).toBe(true);
	});

	it("rejects START_SYNC while a transfer is running", () => {
		const s = run(connected(), write("START_SYNC"));
		const result = transition(s, write("START_SYNC"));
		expect(result.response).toMatchObject({ ok: false, error: "Transfer already transferring" });
		expect(result.snapshot).toBe(s);
	});

	it("allows START_SYNC again after completion", () => {
		let s = run(connected(), write("START_SYNC"));
		while (s.transfer === "transferring") s = run(s, read("data"));
		expect(s.transfer).toBe("completed");

		const restarted = transition(s, write("START_SYNC"));
		expect(restarted.response?.ok).toBe(true);
		expect(restarted.snapshot).toMatchObject({ transfer: "transferring", cursor: 0 });
	});

	it("ends in error when the batch cannot be encoded", () => {
		const broken = { ...connected(), maxUnitSize: 0 };
		const result = transition(broken, write("START_SYNC"));
		expect(result.visited).toEqual(["preparing"]);
		expect(result.snapshot.transfer).toBe("error");
		expect(result.response?.ok).toBe(false);
		expect(result.response?.error).toBe("Failed to prepare batch: maxUnitSize must be a positive integer, got 0");
	});

	it("discards the transfer on RESET", () => {
		const s = run(connected(), write("START_SYNC"), read("data"), write("RESET"));
		expect(s).toMatchObject({ transfer: "idle", cursor: 0 });
		expect(s.packets).toEqual([]);
		expect(s.pending).toHaveLength(6);
	});

	it("falls back to idle when the peer detaches mid-transfer", () => {
		const s = run(connected(), write("START_SYNC"), read("data"), { type: "peerDetached" });
		expect(s.transfer).toBe("idle");
	});

	it("keeps a completed transfer when the peer detaches afterwards", () => {
		let s = run(connected(), write("START_SYNC"));
		while (s.transfer === "transferring") s = run(s, read("data"));
		expect(run(s, { type: "peerDetached" }).transfer).toBe("completed");
	});

	it("replaces the pending batch on enqueue and clears a finished transfer", () => {
		let s = run(connected(), write("START_SYNC"));
		while (s.transfer === "transferring") s = run(s, read("data"));

		const next = run(s, { type: "enqueue", records: records.slice(0, 2) });
		expect(next).toMatchObject({ transfer: "idle", batch: 2 });
		expect(next.pending.map((r) => r.id)).toEqual(["rec-0", "rec-1"]);
	});

	it("leaves a running transfer alone on enqueue", () => {
		const s = run(connected(), write("START_SYNC"));
		const next = run(s, { type: "enqueue", records: [] });
		expect(next).toMatchObject({ transfer: "transferring", transferBatch: 1, batch: 2 });
		expect(next.packets).toBe(s.packets);
	});
});

describe("peer protocol", () => {
	it("answers unknown commands with a failure ack", () => {
		expect(responseOf(connected(), write("SELF_DESTRUCT"))).toEqual({
			ok: false,
			value: new Uint8Array(0),
			error: "Unknown command: SELF_DESTRUCT",
		});
	});

	it("rejects data reads without an active transfer", () => {
		expect(responseOf(connected(), read("data"))?.error).toBe("No active transfer");
	});

	it("rejects writes to read-only channels", () => {
		const event: LinkEvent = { type: "writeRequest", channel: "data", value: encoder.encode("START_SYNC") };
		expect(responseOf(connected(), event)?.error).toBe("Channel data is read-only");
	});

	it("rejects reads of the control channel", () => {
		expect(responseOf(connected(), read("control"))?.ok).toBe(false);
	});

	it("rejects requests without an attached peer", () => {
		const advertising = run(initialSnapshot(512), { type: "advertisingStarted" });
		expect(responseOf(advertising, read("status"))?.error).toBe("No peer attached");
	});

	it("reports status as JSON", () => {
		const s = run(connected(), write("START_SYNC"));
		const response = responseOf(s, read("status"));
		expect(JSON.parse(decoder.decode(response?.value))).toEqual({
			pendingCount: 6,
			transferState: "transferring",
			connectionState: "connected",
		});
	});

	it("accepts commands with surrounding whitespace", () => {
		expect(responseOf(connected(), write(" START_SYNC\n"))?.ok).toBe(true);
	});
});
