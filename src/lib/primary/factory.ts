// ---------------------------------------------------------------------------
// Primary Transport Factory
// ---------------------------------------------------------------------------

import { type AppConfig, loadConfig } from "../config";
import { PrimaryTransport, type PrimaryTransportOptions } from "./client";

/**
 * Create a PrimaryTransport from environment configuration.
 *
 * @param baseUrl Overrides SYNC_SERVER_URL (e.g. a persisted endpoint)
 */
export function createPrimaryTransport(
	baseUrl?: string,
	overrides: Partial<Omit<PrimaryTransportOptions, "baseUrl">> = {},
	config: AppConfig = loadConfig(),
): PrimaryTransport {
	return new PrimaryTransport({
		baseUrl: baseUrl ?? config.SYNC_SERVER_URL,
		timeoutMs: config.SYNC_SERVER_TIMEOUT_MS,
		maxRetries: config.SYNC_MAX_RETRIES,
		retryDelayMs: config.SYNC_RETRY_DELAY_MS,
		rateLimit: config.SYNC_RATE_LIMIT,
		...overrides,
	});
}
