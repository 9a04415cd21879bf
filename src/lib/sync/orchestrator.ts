// ---------------------------------------------------------------------------
// Hybrid Sync Orchestrator
// Primary transport first, fallback link second. The orchestrator is the only
// writer of synced flags and of the last-sync checkpoint.
// ---------------------------------------------------------------------------

import { ConfigError, SyncCancelledError, errorMessage } from "@/lib/errors";
import { FallbackTransport } from "@/lib/fallback/driver";
import type { PeripheralLink } from "@/lib/fallback/link";
import { createLogger, type SyncLogger } from "@/lib/monitoring/logger";
import { reportError } from "@/lib/monitoring/rollbar";
import { PrimaryTransport } from "@/lib/primary/client";
import type { SubmitOutcome } from "@/lib/primary/types";
import { createRecord, DEFAULT_SOURCE } from "@/lib/records/record";
import type { RecordStore } from "@/lib/records/record-store";
import type { HealthRecord, NewRecordInput } from "@/lib/records/types";
import { DeadlineExceededError, isAbortError, sleep } from "@/lib/utils/abort";
import { Mutex } from "@/lib/utils/mutex";
import { type ReadonlyStateStream, StateStream } from "@/lib/utils/state-stream";
import { EndpointSchema } from "./schemas";
import { generateDeviceId, type SettingsStore } from "./settings-store";
import type { SyncMethod, SyncSettings, SyncState, SyncStats } from "./types";

export const DEFAULT_ENDPOINT = "http://192.168.1.100:3000";
const DAY_MS = 24 * 60 * 60 * 1000;

export interface HybridSyncOptions {
	records: RecordStore;
	settings: SettingsStore;
	link: PeripheralLink;
	/** Endpoint used until one is persisted */
	defaultEndpoint?: string;
	deviceIdPrefix?: string;
	/** Source label for records built with `newRecord` */
	deviceLabel?: string;
	/** Wait for a completed fallback transfer (default: 60000) */
	fallbackTimeoutMs?: number;
	/** Availability poll interval; 0 disables polling (default: 30000) */
	pollIntervalMs?: number;
	/** Synced records older than this are dropped by `pruneSynced` (default: 30) */
	retentionDays?: number;
	maxUnitSize?: number;
	/** Builds the primary transport for an endpoint */
	createPrimary?: (endpoint: string) => PrimaryTransport;
	/** Clock (for testing) */
	now?: () => number;
	logger?: SyncLogger;
}

type FallbackResult = { ok: true } | { ok: false; reason: string };

export class HybridSyncOrchestrator {
	private readonly records: RecordStore;
	private readonly settingsStore: SettingsStore;
	private readonly fallbackTransport: FallbackTransport;
	private readonly createPrimary: (endpoint: string) => PrimaryTransport;
	private readonly fallbackTimeoutMs: number;
	private readonly retentionDays: number;
	private readonly deviceLabel: string;
	private readonly now: () => number;
	private readonly logger: SyncLogger;

	private settings: SyncSettings;
	private primary: PrimaryTransport;
	private primaryAvailable = false;
	private readonly syncState: StateStream<SyncState>;
	private readonly syncMutex = new Mutex();
	private readonly settingsMutex = new Mutex();
	private readonly lifetime = new AbortController();
	private poller: Promise<void> = Promise.resolve();
	private closing: Promise<void> | null = null;

	private constructor(options: HybridSyncOptions, settings: SyncSettings) {
		this.records = options.records;
		this.settingsStore = options.settings;
		this.settings = settings;
		this.createPrimary = options.createPrimary ?? ((endpoint) => new PrimaryTransport({ baseUrl: endpoint }));
		this.primary = this.createPrimary(settings.endpoint);
		this.fallbackTimeoutMs = options.fallbackTimeoutMs ?? 60_000;
		this.retentionDays = options.retentionDays ?? 30;
		this.deviceLabel = options.deviceLabel ?? DEFAULT_SOURCE;
		this.now = options.now ?? Date.now;
		this.logger = (options.logger ?? createLogger("sync")).withDevice(settings.deviceId);
		this.fallbackTransport = new FallbackTransport({
			link: options.link,
			maxUnitSize: options.maxUnitSize,
			logger: this.logger,
		});
		this.syncState = new StateStream<SyncState>({
			lastSyncTimestamp: settings.lastSyncTimestamp,
			pendingCount: 0,
			lastMethod: "none",
			lastSuccess: false,
		});
	}

	/**
	 * Load (or create) persisted settings, publish the initial state and start
	 * the availability poller.
	 *
	 * @throws {StorageError} when settings or records cannot be read
	 */
	static async open(options: HybridSyncOptions): Promise<HybridSyncOrchestrator> {
		let settings = await options.settings.load();
		if (!settings) {
			settings = {
				deviceId: generateDeviceId(options.deviceIdPrefix ?? "wearable"),
				endpoint: options.defaultEndpoint ?? DEFAULT_ENDPOINT,
				lastSyncTimestamp: 0,
			};
			await options.settings.save(settings);
		}

		const orchestrator = new HybridSyncOrchestrator(options, settings);
		await orchestrator.refreshPending();

		const interval = options.pollIntervalMs ?? 30_000;
		if (interval > 0) {
			orchestrator.poller = orchestrator.pollLoop(interval).catch((err) => {
				orchestrator.logger.error("Availability poller stopped", err);
				reportError(err instanceof Error ? err : String(err), { component: "sync", operation: "poll" });
			});
		}
		orchestrator.logger.info("Sync engine ready", { endpoint: settings.endpoint });
		return orchestrator;
	}

	get state(): ReadonlyStateStream<SyncState> {
		return this.syncState.asReadonly();
	}

	/** The fallback driver, for host adapters that surface its status. */
	get fallback(): FallbackTransport {
		return this.fallbackTransport;
	}

	get deviceId(): string {
		return this.settings.deviceId;
	}

	get endpoint(): string {
		return this.settings.endpoint;
	}

	/** Build a record stamped with this device's source label. */
	newRecord(input: NewRecordInput): HealthRecord {
		return createRecord(input, this.deviceLabel);
	}

	/**
	 * Store records for the next sync.
	 *
	 * @returns number of records that were new
	 * @throws {StorageError} when the records could not be persisted
	 */
	async addRecords(records: readonly HealthRecord[]): Promise<number> {
		const inserted = await this.records.ingest(records);
		await this.refreshPending();
		return inserted;
	}

	/**
	 * Deliver every unsynced record through the primary transport, or the
	 * fallback link when that fails. Never throws; resolves false on failure
	 * or cancellation.
	 */
	async sync(): Promise<boolean> {
		if (this.lifetime.signal.aborted) return false;
		return this.syncMutex.runExclusive(() => this.runSync());
	}

	private async runSync(): Promise<boolean> {
		const signal = this.lifetime.signal;
		if (signal.aborted) return false;

		const batch: HealthRecord[] = [];
		for await (const record of this.records.unsynced()) {
			batch.push(record);
		}

		if (batch.length === 0) {
			this.publish({ lastSuccess: true, lastError: undefined });
			return true;
		}

		// Captured so a concurrent setEndpoint only affects later calls
		const primary = this.primary;
		const outcome = await primary.submit(batch, this.settings.deviceId, this.settings.lastSyncTimestamp, signal);
		if (outcome.status === "accepted") {
			if (outcome.syncedCount !== batch.length) {
				this.logger.warn("Server count differs from batch size", {
					batch: batch.length,
					syncedCount: outcome.syncedCount,
				});
			}
			return this.complete(batch, "primary");
		}

		const primaryFailure = describeOutcome(outcome);
		if (signal.aborted) return this.fail(new SyncCancelledError().message);
		this.logger.info("Primary transport failed, trying fallback", { reason: primaryFailure });

		const fallback = await this.runFallback(batch, signal);
		if (fallback.ok) {
			return this.complete(batch, "fallback");
		}
		if (signal.aborted) return this.fail(new SyncCancelledError().message);

		return this.fail(`All sync methods failed (primary: ${primaryFailure}; fallback: ${fallback.reason})`);
	}

	private async runFallback(batch: HealthRecord[], signal: AbortSignal): Promise<FallbackResult> {
		if (!this.fallbackTransport.startAdvertising()) {
			return { ok: false, reason: "link unavailable" };
		}

		try {
			const ticket = this.fallbackTransport.enqueue(batch);
			await this.fallbackTransport.transferState.waitFor(
				(state) => state === "completed" && this.fallbackTransport.completedBatch === ticket,
				{ signal, timeoutMs: this.fallbackTimeoutMs },
			);
			return { ok: true };
		} catch (err) {
			if (err instanceof DeadlineExceededError) {
				return { ok: false, reason: `no completed transfer within ${this.fallbackTimeoutMs}ms` };
			}
			return { ok: false, reason: errorMessage(err) };
		} finally {
			this.fallbackTransport.stopAdvertising();
		}
	}

	/** Mark the whole batch synced and advance the checkpoint. */
	private async complete(batch: HealthRecord[], method: Exclude<SyncMethod, "none">): Promise<boolean> {
		try {
			await this.records.markSynced(batch.map((r) => r.id));
		} catch (err) {
			this.logger.error("Failed to mark batch synced", err, { method, records: batch.length });
			reportError(err instanceof Error ? err : String(err), { component: "sync", operation: "markSynced" });
			return this.fail(`Delivered via ${method} but could not record it: ${errorMessage(err)}`);
		}

		const lastSyncTimestamp = Math.max(this.settings.lastSyncTimestamp, this.now());
		try {
			await this.updateSettings({ lastSyncTimestamp });
		} catch (err) {
			// The records are already flagged; the checkpoint catches up on the next success
			this.logger.error("Failed to persist sync checkpoint", err);
			reportError(err instanceof Error ? err : String(err), { component: "sync", operation: "saveSettings" });
		}

		this.publish({
			lastSyncTimestamp,
			pendingCount: await this.records.countUnsynced(),
			lastMethod: method,
			lastSuccess: true,
			lastError: undefined,
		});
		this.logger.info("Sync completed", { method, records: batch.length });
		return true;
	}

	private fail(reason: string): boolean {
		this.publish({ lastMethod: "none", lastSuccess: false, lastError: reason });
		this.logger.warn("Sync failed", { reason });
		return false;
	}

	/**
	 * Point the primary transport at a new server. A sync already in flight
	 * keeps using the previous one.
	 *
	 * @throws {ConfigError} when `url` is not an http(s) URL
	 * @throws {StorageError} when the endpoint cannot be persisted
	 */
	async setEndpoint(url: string): Promise<void> {
		const parsed = EndpointSchema.safeParse(url);
		if (!parsed.success) {
			throw new ConfigError(`Invalid endpoint "${url}": ${parsed.error.issues.map((i) => i.message).join(", ")}`);
		}

		await this.updateSettings({ endpoint: parsed.data });
		this.primary = this.createPrimary(parsed.data);
		this.primaryAvailable = false;
		this.logger.info("Endpoint updated", { endpoint: parsed.data });
	}

	stats(): SyncStats {
		return {
			pendingCount: this.syncState.value.pendingCount,
			lastSyncTimestamp: this.settings.lastSyncTimestamp,
			deviceId: this.settings.deviceId,
			endpoint: this.settings.endpoint,
			primaryAvailable: this.primaryAvailable,
		};
	}

	/** Probe the primary endpoint and remember the answer for `stats`. */
	async checkAvailability(): Promise<boolean> {
		this.primaryAvailable = await this.primary.probe(this.lifetime.signal);
		return this.primaryAvailable;
	}

	startFallbackAdvertising(): boolean {
		return this.fallbackTransport.startAdvertising();
	}

	stopFallbackAdvertising(): void {
		this.fallbackTransport.stopAdvertising();
	}

	/** Drop synced records older than the retention window. */
	async pruneSynced(): Promise<number> {
		const cutoff = this.now() - this.retentionDays * DAY_MS;
		const removed = await this.records.prune(cutoff);
		if (removed > 0) this.logger.info("Pruned synced records", { removed });
		return removed;
	}

	/**
	 * Cancel the poller and any in-flight sync, wait for both to settle and
	 * stop advertising. Safe to call more than once.
	 */
	shutdown(): Promise<void> {
		this.closing ??= this.close();
		return this.closing;
	}

	private async close(): Promise<void> {
		this.lifetime.abort(new SyncCancelledError("Sync engine shut down"));
		await this.poller;
		await this.syncMutex.runExclusive(() => undefined);
		this.fallbackTransport.stopAdvertising();
		this.logger.info("Sync engine stopped");
	}

	private async pollLoop(intervalMs: number): Promise<void> {
		const signal = this.lifetime.signal;
		while (!signal.aborted) {
			await this.checkAvailability();
			try {
				await sleep(intervalMs, signal);
			} catch (err) {
				if (isAbortError(err)) return;
				throw err;
			}
		}
	}

	private async refreshPending(): Promise<void> {
		this.publish({ pendingCount: await this.records.countUnsynced() });
	}

	private async updateSettings(patch: Partial<SyncSettings>): Promise<void> {
		await this.settingsMutex.runExclusive(async () => {
			const next = { ...this.settings, ...patch };
			await this.settingsStore.save(next);
			this.settings = next;
		});
	}

	private publish(patch: Partial<SyncState>): void {
		const next: SyncState = { ...this.syncState.value, ...patch };
		if (next.lastError === undefined) delete next.lastError;
		this.syncState.set(next);
	}
}

function describeOutcome(outcome: Exclude<SubmitOutcome, { status: "accepted" }>): string {
	switch (outcome.status) {
		case "rejected":
			return outcome.httpStatus === undefined
				? `rejected: ${outcome.message}`
				: `rejected (${outcome.httpStatus}): ${outcome.message}`;
		case "unreachable":
			return `unreachable (${outcome.cause})`;
	}
}
