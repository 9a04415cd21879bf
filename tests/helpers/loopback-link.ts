// ---------------------------------------------------------------------------
// Test helper: in-process peripheral link
// Stands in for the radio stack; a test plays the companion through the
// PeerSession returned by attachPeer().
// ---------------------------------------------------------------------------

import type { LinkEventHandler, PeripheralLink } from "@/lib/fallback/link";
import type { PeerSession } from "@/lib/fallback/receiver";
import type { Channel, LinkEvent, LinkResponse } from "@/lib/fallback/types";

export class LoopbackLink implements PeripheralLink {
	enabled = true;
	/** Make the next open() throw */
	failOpen = false;
	openCount = 0;
	closeCount = 0;
	/** Called after every successful open() */
	onOpen: (() => void) | null = null;

	private handler: LinkEventHandler | null = null;

	get isOpen(): boolean {
		return this.handler !== null;
	}

	open(handler: LinkEventHandler): void {
		if (this.failOpen) throw new Error("advertiser failed to start");
		this.handler = handler;
		this.openCount++;
		this.onOpen?.();
	}

	close(): void {
		this.handler = null;
		this.closeCount++;
	}

	attachPeer(): PeerSession {
		this.dispatch({ type: "peerAttached" });
		return {
			read: async (channel: Channel) => this.dispatch({ type: "readRequest", channel }),
			write: async (channel: Channel, value: Uint8Array) => this.dispatch({ type: "writeRequest", channel, value }),
		};
	}

	detachPeer(): void {
		this.dispatch({ type: "peerDetached" });
	}

	private dispatch(event: LinkEvent): LinkResponse {
		if (!this.handler) return { ok: false, value: new Uint8Array(0), error: "Link closed" };
		return this.handler(event) ?? { ok: true, value: new Uint8Array(0) };
	}
}
