// ---------------------------------------------------------------------------
// Peripheral link port
// The radio stack lives outside the engine. A host adapter implements
// `PeripheralLink`, advertises the service below and forwards peer activity
// to the handler it was opened with.
// ---------------------------------------------------------------------------

import type { LinkEvent, LinkResponse } from "./types";

/** GATT service and characteristic UUIDs advertised by the wearable. */
export const GATT_PROFILE = {
	service: "6E400001-B5A3-F393-E0A9-E50E24DCCA9E",
	data: "6E400002-B5A3-F393-E0A9-E50E24DCCA9E",
	control: "6E400003-B5A3-F393-E0A9-E50E24DCCA9E",
	status: "6E400004-B5A3-F393-E0A9-E50E24DCCA9E",
} as const;

export type LinkEventHandler = (event: LinkEvent) => LinkResponse | undefined;

export interface PeripheralLink {
	/** False when the radio is switched off or missing. */
	readonly enabled: boolean;
	/**
	 * Start advertising and route peer events to `handler`. Must not block;
	 * throws when the link cannot be set up.
	 */
	open(handler: LinkEventHandler): void;
	/** Stop advertising and drop any attached peer. Safe to call repeatedly. */
	close(): void;
}
