// ---------------------------------------------------------------------------
// Hybrid Sync Factory
// Wires file-backed stores under SYNC_DATA_DIR and a configured primary
// transport from environment configuration.
// ---------------------------------------------------------------------------

import * as path from "node:path";
import { type AppConfig, loadConfig } from "@/lib/config";
import type { PeripheralLink } from "@/lib/fallback/link";
import { createPrimaryTransport } from "@/lib/primary/factory";
import { FileRecordStore } from "@/lib/records/file-record-store";
import { HybridSyncOrchestrator } from "./orchestrator";
import { FileSettingsStore } from "./settings-store";

export interface CreateHybridSyncOptions {
	link: PeripheralLink;
	/** Custom fetch implementation (for testing) */
	fetchFn?: typeof fetch;
	/** Defaults to `loadConfig()` */
	config?: AppConfig;
}

/**
 * Open a HybridSyncOrchestrator persisting `records.json` and
 * `settings.json` in the configured data directory.
 */
export async function createHybridSync(options: CreateHybridSyncOptions): Promise<HybridSyncOrchestrator> {
	const config = options.config ?? loadConfig();
	const dataDir = path.resolve(config.SYNC_DATA_DIR);

	const records = await FileRecordStore.open(path.join(dataDir, "records.json"));

	return HybridSyncOrchestrator.open({
		records,
		settings: new FileSettingsStore(path.join(dataDir, "settings.json")),
		link: options.link,
		defaultEndpoint: config.SYNC_SERVER_URL,
		deviceIdPrefix: config.DEVICE_ID_PREFIX,
		deviceLabel: config.DEVICE_LABEL,
		fallbackTimeoutMs: config.FALLBACK_TIMEOUT_MS,
		pollIntervalMs: config.SYNC_CHECK_INTERVAL_MS,
		retentionDays: config.DATA_RETENTION_DAYS,
		maxUnitSize: config.FALLBACK_MAX_UNIT_SIZE,
		createPrimary: (endpoint) =>
			createPrimaryTransport(endpoint, options.fetchFn ? { fetchFn: options.fetchFn } : {}, config),
	});
}
