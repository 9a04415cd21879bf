// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export { type AppConfig, loadConfig, resetConfig } from "./lib/config";
export * from "./lib/errors";

export { createLogger, SyncLogger } from "./lib/monitoring/logger";
export { ErrorSeverity, type ErrorContext, flushRollbar, reportError } from "./lib/monitoring/rollbar";

export { dominantKind, parseBatch, serializeBatch } from "./lib/records/batch";
export { FileRecordStore } from "./lib/records/file-record-store";
export { cloneRecord, createRecord, DEFAULT_SOURCE, fromWireRecord, toWireRecord } from "./lib/records/record";
export { BaseRecordStore, MemoryRecordStore, type RecordStore } from "./lib/records/record-store";
export type { HealthRecord, NewRecordInput, RecordKindType, WireRecord } from "./lib/records/types";

export { FallbackTransport, type FallbackTransportOptions } from "./lib/fallback/driver";
export { GATT_PROFILE, type LinkEventHandler, type PeripheralLink } from "./lib/fallback/link";
export {
	DEFAULT_MAX_UNIT_SIZE,
	decodePackets,
	encodePackets,
	packetChecksum,
	parsePacket,
	serializePacket,
} from "./lib/fallback/packet-codec";
export { CompanionReceiver, type CompanionReceiverOptions, type PeerSession } from "./lib/fallback/receiver";
export { initialSnapshot, transition } from "./lib/fallback/state-machine";
export {
	type Channel,
	type ConnectionState,
	ControlCommand,
	type DriverSnapshot,
	type LinkEvent,
	type LinkResponse,
	type Packet,
	type TransferState,
	type TransferStatus,
} from "./lib/fallback/types";

export { PrimaryTransport, type PrimaryTransportOptions } from "./lib/primary/client";
export { createPrimaryTransport } from "./lib/primary/factory";
export { classifyNetworkError } from "./lib/primary/network-errors";
export type { NetworkErrorKind, PullResult, SubmitOutcome } from "./lib/primary/types";

export { createHybridSync, type CreateHybridSyncOptions } from "./lib/sync/factory";
export { DEFAULT_ENDPOINT, HybridSyncOrchestrator, type HybridSyncOptions } from "./lib/sync/orchestrator";
export { FileSettingsStore, generateDeviceId, MemorySettingsStore, type SettingsStore } from "./lib/sync/settings-store";
export type { SyncMethod, SyncSettings, SyncState, SyncStats } from "./lib/sync/types";

export type { ReadonlyStateStream, StateListener, WaitOptions } from "./lib/utils/state-stream";
