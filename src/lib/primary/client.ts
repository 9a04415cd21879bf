// ---------------------------------------------------------------------------
// Primary Transport — Companion Server HTTP Client
// Throttling (p-throttle), retry on 5xx/network errors (p-retry), and one
// deadline covering every attempt of a call.
// ---------------------------------------------------------------------------

import pRetry from "p-retry";
import pThrottle from "p-throttle";
import { PrimaryTransportError, errorMessage } from "../errors";
import { createLogger, type SyncLogger } from "../monitoring/logger";
import { fromWireRecord, toWireRecord } from "../records/record";
import type { HealthRecord } from "../records/types";
import { linkSignals } from "../utils/abort";
import { classifyNetworkError } from "./network-errors";
import { HealthResponseSchema, SyncResponseSchema } from "./schemas";
import type { PullResult, SubmitOutcome, SyncRequest, SyncResponse } from "./types";

export interface PrimaryTransportOptions {
	baseUrl: string;
	/** Deadline for a whole call, retries included (default: 5000) */
	timeoutMs?: number;
	/** Retries after the first attempt (default: 3) */
	maxRetries?: number;
	/** First retry delay; doubles per attempt (default: 250) */
	retryDelayMs?: number;
	/** Requests per second (default: 10) */
	rateLimit?: number;
	/** Custom fetch implementation (for testing) */
	fetchFn?: typeof fetch;
	logger?: SyncLogger;
}

/** Non-2xx status that is worth another attempt. */
class RetryableStatusError extends Error {
	constructor(
		public readonly status: number,
		public readonly body: string,
	) {
		super(`Server error ${status}`);
		this.name = "RetryableStatusError";
	}
}

/**
 * HTTP client for the companion server.
 *
 * - `probe` and `submit` never throw; failures become `false` or an outcome
 * - 5xx and network errors are retried with exponential backoff and jitter
 * - Other statuses are final
 * - Responses are validated with Zod
 */
export class PrimaryTransport {
	private readonly baseUrl: string;
	private readonly timeoutMs: number;
	private readonly maxRetries: number;
	private readonly retryDelayMs: number;
	private readonly fetchFn: typeof fetch;
	private readonly throttledFetch: (url: string, init: RequestInit) => Promise<Response>;
	private readonly logger: SyncLogger;

	constructor(options: PrimaryTransportOptions) {
		this.baseUrl = options.baseUrl.replace(/\/+$/, "");
		this.timeoutMs = options.timeoutMs ?? 5000;
		this.maxRetries = options.maxRetries ?? 3;
		this.retryDelayMs = options.retryDelayMs ?? 250;
		this.fetchFn = options.fetchFn ?? globalThis.fetch;
		this.logger = options.logger ?? createLogger("primary");

		const throttle = pThrottle({
			limit: options.rateLimit ?? 10,
			interval: 1000,
		});
		this.throttledFetch = throttle((url: string, init: RequestInit) => this.fetchFn(url, init));
	}

	get endpoint(): string {
		return this.baseUrl;
	}

	/** True only for a well-formed health response within the deadline. */
	async probe(signal?: AbortSignal): Promise<boolean> {
		try {
			await this.call("/api/v1/health", { method: "GET" }, signal, async (res) => {
				if (!res.ok) {
					throw new PrimaryTransportError("TRANSPORT_REJECTED", `Health check returned ${res.status}`, res.status);
				}
				return HealthResponseSchema.parse(await res.json());
			});
			return true;
		} catch (err) {
			this.logger.debug("Server unavailable", { reason: errorMessage(err) });
			return false;
		}
	}

	/**
	 * Post a batch. Anything the server answered is `rejected` unless it is a
	 * 2xx with `success: true`; anything it never answered is `unreachable`.
	 */
	async submit(
		batch: readonly HealthRecord[],
		deviceId: string,
		lastSyncTimestamp: number,
		signal?: AbortSignal,
	): Promise<SubmitOutcome> {
		const request: SyncRequest = {
			device_id: deviceId,
			data: batch.map(toWireRecord),
			last_sync_timestamp: lastSyncTimestamp,
		};

		try {
			return await this.call(
				"/api/v1/data",
				{
					method: "POST",
					headers: { "Content-Type": "application/json", Accept: "application/json" },
					body: JSON.stringify(request),
				},
				signal,
				async (res): Promise<SubmitOutcome> => {
					if (!res.ok) {
						const body = await res.text();
						return { status: "rejected", message: body || `HTTP ${res.status}`, httpStatus: res.status };
					}
					const parsed = SyncResponseSchema.safeParse(await res.json().catch(() => undefined));
					if (!parsed.success) {
						return { status: "rejected", message: "Malformed sync response", httpStatus: res.status };
					}
					if (!parsed.data.success) {
						return { status: "rejected", message: parsed.data.message, httpStatus: res.status };
					}
					return { status: "accepted", syncedCount: parsed.data.synced_count, message: parsed.data.message };
				},
			);
		} catch (err) {
			if (err instanceof RetryableStatusError) {
				this.logger.warn("Server sync failed", { status: err.status });
				return { status: "rejected", message: err.body || err.message, httpStatus: err.status };
			}
			const cause = classifyNetworkError(err);
			this.logger.warn("Server unreachable", { cause, reason: errorMessage(err) });
			return { status: "unreachable", cause, message: errorMessage(err) };
		}
	}

	/**
	 * Pull-style retrieval of what the server holds for a device.
	 *
	 * @throws {PrimaryTransportError} on any failure
	 */
	async fetchSince(deviceId: string, since: number, signal?: AbortSignal): Promise<PullResult> {
		const query = new URLSearchParams({ device_id: deviceId, since: String(since) });
		let response: SyncResponse;
		try {
			response = await this.call(`/api/v1/data?${query.toString()}`, { method: "GET" }, signal, async (res) => {
				if (!res.ok) {
					throw new PrimaryTransportError("TRANSPORT_REJECTED", `Retrieval returned ${res.status}`, res.status);
				}
				const parsed = SyncResponseSchema.safeParse(await res.json().catch(() => undefined));
				if (!parsed.success) {
					throw new PrimaryTransportError("TRANSPORT_REJECTED", "Malformed retrieval response", res.status);
				}
				return parsed.data;
			});
		} catch (err) {
			if (err instanceof PrimaryTransportError) throw err;
			if (err instanceof RetryableStatusError) {
				throw new PrimaryTransportError("TRANSPORT_REJECTED", err.message, err.status, { cause: err });
			}
			throw new PrimaryTransportError(
				"TRANSPORT_UNREACHABLE",
				`Server unreachable (${classifyNetworkError(err)}): ${errorMessage(err)}`,
				undefined,
				{ cause: err },
			);
		}

		if (!response.success) {
			throw new PrimaryTransportError("TRANSPORT_REJECTED", response.message);
		}
		return {
			message: response.message,
			lastSyncTimestamp: response.last_sync_timestamp,
			syncedCount: response.synced_count,
			records: (response.data ?? []).map(fromWireRecord),
		};
	}

	/**
	 * Run one request, retries included, and read its body, all under a
	 * single deadline of `timeoutMs`.
	 */
	private async call<T>(
		path: string,
		init: RequestInit,
		signal: AbortSignal | undefined,
		read: (res: Response) => Promise<T>,
	): Promise<T> {
		const url = `${this.baseUrl}${path}`;
		const deadline = linkSignals([signal], this.timeoutMs);

		try {
			const response = await pRetry(
				async () => {
					const res = await this.throttledFetch(url, { ...init, signal: deadline.signal });
					if (res.status >= 500) {
						throw new RetryableStatusError(res.status, await res.text());
					}
					return res;
				},
				{
					retries: this.maxRetries,
					minTimeout: this.retryDelayMs,
					factor: 2,
					randomize: true,
					signal: deadline.signal,
					onFailedAttempt: (error) => {
						this.logger.debug("Request attempt failed", {
							url,
							attempt: error.attemptNumber,
							retriesLeft: error.retriesLeft,
							reason: error.message,
						});
					},
				},
			);
			return await read(response);
		} finally {
			deadline.dispose();
		}
	}
}
