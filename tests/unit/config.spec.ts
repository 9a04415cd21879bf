// ---------------------------------------------------------------------------
// Unit Tests: Environment configuration
// ---------------------------------------------------------------------------

import { loadConfig, resetConfig } from "@/lib/config";
import { ConfigError } from "@/lib/errors";
import { beforeEach, describe, expect, it } from "vitest";

describe("loadConfig", () => {
	beforeEach(() => {
		resetConfig();
	});

	it("applies defaults to an empty environment", () => {
		expect(loadConfig({})).toMatchObject({
			SYNC_SERVER_URL: "http://192.168.1.100:3000",
			SYNC_SERVER_TIMEOUT_MS: 5000,
			SYNC_CHECK_INTERVAL_MS: 30_000,
			SYNC_MAX_RETRIES: 3,
			FALLBACK_TIMEOUT_MS: 60_000,
			FALLBACK_MAX_UNIT_SIZE: 512,
			SYNC_DATA_DIR: "data",
			DEVICE_ID_PREFIX: "wearable",
			DATA_RETENTION_DAYS: 30,
			ROLLBAR_ENABLED: false,
			TELEMETRY_CONSENT: false,
		});
	});

	it("coerces numeric and boolean strings", () => {
		const config = loadConfig({
			SYNC_MAX_RETRIES: "0",
			SYNC_CHECK_INTERVAL_MS: "0",
			FALLBACK_MAX_UNIT_SIZE: "185",
			TELEMETRY_CONSENT: "true",
		});

		expect(config.SYNC_MAX_RETRIES).toBe(0);
		expect(config.SYNC_CHECK_INTERVAL_MS).toBe(0);
		expect(config.FALLBACK_MAX_UNIT_SIZE).toBe(185);
		expect(config.TELEMETRY_CONSENT).toBe(true);
	});

	it("caches the first successful load", () => {
		const first = loadConfig({ DEVICE_LABEL: "Ring" });
		expect(loadConfig({ DEVICE_LABEL: "Watch" })).toBe(first);

		resetConfig();
		expect(loadConfig({ DEVICE_LABEL: "Watch" }).DEVICE_LABEL).toBe("Watch");
	});

	it("lists every invalid variable", () => {
		let message = "";
		try {
			loadConfig({ SYNC_SERVER_URL: "not-a-url", FALLBACK_MAX_UNIT_SIZE: "0" });
		} catch (err) {
			expect(err).toBeInstanceOf(ConfigError);
			message = err instanceof Error ? err.message : "";
		}

		expect(message).toMatch(/^Environment configuration invalid:\n/);
		expect(message).toContain("  SYNC_SERVER_URL: ");
		expect(message).toContain("  FALLBACK_MAX_UNIT_SIZE: ");
	});

	it("requires a token when Rollbar is enabled", () => {
		expect(() => loadConfig({ ROLLBAR_ENABLED: "1" })).toThrow(
			"ROLLBAR_SERVER_TOKEN: ROLLBAR_SERVER_TOKEN required when ROLLBAR_ENABLED=true",
		);
	});

	it("rejects boolean flags it cannot read", () => {
		expect(() => loadConfig({ TELEMETRY_CONSENT: "yes" })).toThrow(ConfigError);
	});

	it("rejects a device id prefix with separators", () => {
		expect(() => loadConfig({ DEVICE_ID_PREFIX: "my device" })).toThrow(
			"DEVICE_ID_PREFIX may only contain letters, digits, '_' and '-'",
		);
	});
});
