// ---------------------------------------------------------------------------
// Fallback Transport — State Machine
// Pure (snapshot, event) → (snapshot, response) transitions for the
// connection and transfer machines and the three-channel peer protocol.
// ---------------------------------------------------------------------------

import { errorMessage } from "../errors";
import { dominantKind, serializeBatch } from "../records/batch";
import { encodePackets, serializePacket } from "./packet-codec";
import {
	type Channel,
	ControlCommand,
	type DriverSnapshot,
	type LinkEvent,
	type LinkResponse,
	type TransferStatus,
	type TransitionResult,
} from "./types";

const encoder = new TextEncoder();
const decoder = new TextDecoder();
const EMPTY = new Uint8Array(0);

export function initialSnapshot(maxUnitSize: number): DriverSnapshot {
	return {
		advertising: false,
		connection: "disconnected",
		transfer: "idle",
		pending: [],
		batch: 0,
		transferBatch: null,
		packets: [],
		cursor: 0,
		maxUnitSize,
	};
}

export function statusOf(snapshot: DriverSnapshot): TransferStatus {
	return {
		pendingCount: snapshot.pending.length,
		transferState: snapshot.transfer,
		connectionState: snapshot.connection,
	};
}

function success(value: Uint8Array = EMPTY): LinkResponse {
	return { ok: true, value };
}

function failure(error: string): LinkResponse {
	return { ok: false, value: EMPTY, error };
}

/** Drop the in-flight transfer and return to idle. */
function resetTransfer(snapshot: DriverSnapshot): DriverSnapshot {
	return { ...snapshot, transfer: "idle", packets: [], cursor: 0 };
}

export function transition(snapshot: DriverSnapshot, event: LinkEvent): TransitionResult {
	switch (event.type) {
		case "advertisingStarted":
			return {
				snapshot: {
					...snapshot,
					advertising: true,
					connection: snapshot.connection === "disconnected" ? "connecting" : snapshot.connection,
				},
				visited: [],
			};

		case "advertisingStopped":
			return {
				snapshot: { ...resetTransfer(snapshot), advertising: false, connection: "disconnected" },
				visited: [],
			};

		case "peerAttached":
			// Only an advertising peripheral can be attached to
			if (!snapshot.advertising) return { snapshot, visited: [] };
			return { snapshot: { ...snapshot, connection: "connected" }, visited: [] };

		case "peerDetached": {
			const interrupted = snapshot.transfer === "preparing" || snapshot.transfer === "transferring";
			const next = interrupted ? resetTransfer(snapshot) : snapshot;
			return { snapshot: { ...next, connection: "disconnected" }, visited: [] };
		}

		case "enqueue": {
			// A finished transfer belongs to the superseded batch
			const stale = snapshot.transfer === "completed" || snapshot.transfer === "error";
			const next = stale ? resetTransfer(snapshot) : snapshot;
			return { snapshot: { ...next, pending: event.records, batch: snapshot.batch + 1 }, visited: [] };
		}

		case "readRequest":
			if (snapshot.connection !== "connected") {
				return { snapshot, response: failure("No peer attached"), visited: [] };
			}
			return onRead(snapshot, event.channel);

		case "writeRequest":
			if (snapshot.connection !== "connected") {
				return { snapshot, response: failure("No peer attached"), visited: [] };
			}
			return onWrite(snapshot, event.channel, event.value);
	}
}

function onRead(snapshot: DriverSnapshot, channel: Channel): TransitionResult {
	switch (channel) {
		case "status":
			return {
				snapshot,
				response: success(encoder.encode(JSON.stringify(statusOf(snapshot)))),
				visited: [],
			};

		case "data": {
			if (snapshot.transfer !== "transferring") {
				return { snapshot, response: failure("No active transfer"), visited: [] };
			}
			const packet = snapshot.packets[snapshot.cursor];
			if (!packet) {
				// Zero-length read marks the end of the sequence
				return { snapshot: { ...snapshot, transfer: "completed" }, response: success(), visited: [] };
			}
			return {
				snapshot: { ...snapshot, cursor: snapshot.cursor + 1 },
				response: success(serializePacket(packet)),
				visited: [],
			};
		}

		case "control":
			return { snapshot, response: failure("Control channel is write-only"), visited: [] };
	}
}

function onWrite(snapshot: DriverSnapshot, channel: Channel, value: Uint8Array): TransitionResult {
	if (channel !== "control") {
		return { snapshot, response: failure(`Channel ${channel} is read-only`), visited: [] };
	}

	const command = decoder.decode(value).trim();
	switch (command) {
		case ControlCommand.START_SYNC:
			return startSync(snapshot);
		case ControlCommand.RESET:
			return { snapshot: resetTransfer(snapshot), response: success(), visited: [] };
		default:
			return { snapshot, response: failure(`Unknown command: ${command}`), visited: [] };
	}
}

function startSync(snapshot: DriverSnapshot): TransitionResult {
	if (snapshot.transfer === "preparing" || snapshot.transfer === "transferring") {
		return { snapshot, response: failure(`Transfer already ${snapshot.transfer}`), visited: [] };
	}

	try {
		const packets = encodePackets(
			serializeBatch(snapshot.pending),
			dominantKind(snapshot.pending),
			snapshot.maxUnitSize,
		);
		return {
			snapshot: {
				...snapshot,
				transfer: "transferring",
				transferBatch: snapshot.batch,
				packets,
				cursor: 0,
			},
			response: success(),
			visited: ["preparing"],
		};
	} catch (err) {
		return {
			snapshot: { ...snapshot, transfer: "error", transferBatch: snapshot.batch, packets: [], cursor: 0 },
			response: failure(`Failed to prepare batch: ${errorMessage(err)}`),
			visited: ["preparing"],
		};
	}
}
