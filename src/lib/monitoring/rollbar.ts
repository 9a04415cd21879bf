// ---------------------------------------------------------------------------
// Rollbar Configuration
// Singleton instance with environment detection, test no-op, PII filtering,
// sampling rates, and structured error reporting.
// ---------------------------------------------------------------------------

import Rollbar from "rollbar";
import { isTelemetryConsentGranted } from "./privacy";

/** The subset of the Rollbar API the engine reports through. */
export interface MonitoringSink {
	critical(message: string | Error, extra?: Record<string, unknown>): void;
	error(message: string | Error, extra?: Record<string, unknown>): void;
	warning(message: string | Error, extra?: Record<string, unknown>): void;
	info(message: string | Error, extra?: Record<string, unknown>): void;
	debug(message: string | Error, extra?: Record<string, unknown>): void;
	wait(callback: () => void): void;
}

// ── Enablement rules ──────────────────────────────────────────────────────

const isTestMode =
	process.env.NODE_ENV === "test" ||
	// Vitest sets VITEST / VITEST_POOL_ID
	typeof process.env.VITEST !== "undefined";
const isExplicitlyEnabled = process.env.ROLLBAR_ENABLED === "1" || process.env.ROLLBAR_ENABLED === "true";

function readNumberEnv(name: string, fallback: number): number {
	const v = process.env[name];
	if (!v) return fallback;
	const n = Number(v);
	return Number.isFinite(n) ? n : fallback;
}

const baseConfig = {
	captureUncaught: false,
	captureUnhandledRejections: false,
	environment: process.env.NODE_ENV || "development",
	enabled: isExplicitlyEnabled && !isTestMode,
};

const noop = (): void => {};

// In test mode, export a no-op instance to avoid network calls.
export const serverInstance: MonitoringSink = isTestMode
	? {
			critical: noop,
			error: noop,
			warning: noop,
			info: noop,
			debug: noop,
			wait: (cb: () => void) => cb(),
		}
	: new Rollbar({
			accessToken: process.env.ROLLBAR_SERVER_TOKEN || "disabled",
			...baseConfig,
			payload: {
				server: { root: process.cwd() },
			},
			// Always scrub secrets; scrub device identifiers unless consent is granted
			scrubFields: [
				"password",
				"apiKey",
				"api_key",
				"secret",
				"token",
				"authorization",
				...(isTelemetryConsentGranted() ? [] : ["deviceId", "device_id", "person"]),
			],
		});

// ── Severity ──────────────────────────────────────────────────────────────

export const ErrorSeverity = {
	CRITICAL: "critical",
	ERROR: "error",
	WARNING: "warning",
	INFO: "info",
	DEBUG: "debug",
} as const;

export type ErrorSeverityType = (typeof ErrorSeverity)[keyof typeof ErrorSeverity];

export interface ErrorContext {
	component?: string;
	operation?: string;
	timestamp?: Date;
	additionalData?: Record<string, unknown>;
}

// ── Structured error reporting with sampling ──────────────────────────────

export function reportError(
	error: Error | string,
	context?: ErrorContext,
	severity: ErrorSeverityType = ErrorSeverity.ERROR,
): void {
	if (!baseConfig.enabled) return;

	const rateAll = readNumberEnv("ROLLBAR_SAMPLE_RATE_ALL", 1);
	const rates: Record<ErrorSeverityType, number> = {
		critical: readNumberEnv("ROLLBAR_SAMPLE_RATE_CRITICAL", 1),
		error: readNumberEnv("ROLLBAR_SAMPLE_RATE_ERROR", 1),
		warning: readNumberEnv("ROLLBAR_SAMPLE_RATE_WARN", 0.05),
		info: readNumberEnv("ROLLBAR_SAMPLE_RATE_INFO", 0.05),
		debug: readNumberEnv("ROLLBAR_SAMPLE_RATE_INFO", 0.05),
	};
	const pick = (rate: number) =>
		Math.random() < Math.max(0, Math.min(1, rate)) && Math.random() < rateAll;
	if (!pick(rates[severity])) return;

	const rollbarContext: Record<string, unknown> = {
		component: context?.component,
		operation: context?.operation,
		custom: {
			timestamp: (context?.timestamp ?? new Date()).toISOString(),
			...context?.additionalData,
		},
	};

	serverInstance[severity](error, rollbarContext);
}

// ── Flush helper ──────────────────────────────────────────────────────────

export function flushRollbar(): Promise<void> {
	return new Promise((resolve) => {
		if (!baseConfig.enabled) return resolve();
		serverInstance.wait(() => resolve());
	});
}
