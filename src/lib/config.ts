// ---------------------------------------------------------------------------
// Environment Configuration Loader
// Validates all sync-engine env vars once using Zod
// ---------------------------------------------------------------------------
//
// Recommended flag values per environment:
//
// ┌──────────────────────────────┬──────────┬──────────┬──────────┐
// │ Flag                         │ Local    │ CI/Test  │ Device   │
// ├──────────────────────────────┼──────────┼──────────┼──────────┤
// │ ROLLBAR_ENABLED              │ 0        │ 0        │ 1        │
// │ TELEMETRY_CONSENT            │ 0        │ 0        │ 0 *      │
// │ ROLLBAR_ALLOW_PII            │ 0        │ 0        │ 0 *      │
// │ ROLLBAR_SAMPLE_RATE_INFO     │ 1        │ —        │ 0.05     │
// │ ROLLBAR_SAMPLE_RATE_WARN     │ 1        │ —        │ 0.05     │
// │ ROLLBAR_SAMPLE_RATE_ERROR    │ 1        │ —        │ 1        │
// │ ROLLBAR_SAMPLE_RATE_CRITICAL │ 1        │ —        │ 1        │
// └──────────────────────────────┴──────────┴──────────┴──────────┘
// * Set to 1 only with explicit user consent: device ids are personal data.
// ---------------------------------------------------------------------------

import { z } from "zod";
import { ConfigError } from "./errors";

/**
 * Coerce environment variable strings to booleans for use in Zod schemas.
 *
 * Truthy values: `"1"`, `1`, `true`, `"true"`
 * Falsy values:  `"0"`, `0`, `false`, `"false"`; anything else fails validation.
 */
const envBool = (defaultValue: boolean) =>
	z
		.preprocess((v) => {
			if (v == null || v === "") return undefined;
			if (v === "1" || v === 1 || v === true || v === "true") return true;
			if (v === "0" || v === 0 || v === false || v === "false") return false;
			return v;
		}, z.boolean().optional())
		.transform((v) => v ?? defaultValue);

const EnvSchema = z
	.object({
		// Primary transport — local companion server
		SYNC_SERVER_URL: z.string().url().default("http://192.168.1.100:3000"),
		SYNC_SERVER_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
		// 0 disables the availability poller
		SYNC_CHECK_INTERVAL_MS: z.coerce.number().int().nonnegative().default(30_000),
		SYNC_MAX_RETRIES: z.coerce.number().int().nonnegative().default(3),
		SYNC_RETRY_DELAY_MS: z.coerce.number().int().positive().default(250),
		SYNC_RATE_LIMIT: z.coerce.number().int().positive().default(10),

		// Fallback transport — point-to-point link
		FALLBACK_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
		FALLBACK_MAX_UNIT_SIZE: z.coerce.number().int().positive().max(65_535).default(512),

		// Storage & identity
		SYNC_DATA_DIR: z.string().min(1).default("data"),
		DEVICE_ID_PREFIX: z
			.string()
			.regex(/^[a-z0-9_-]+$/i, "DEVICE_ID_PREFIX may only contain letters, digits, '_' and '-'")
			.default("wearable"),
		DEVICE_LABEL: z.string().min(1).default("Wearable"),
		DATA_RETENTION_DAYS: z.coerce.number().int().positive().default(30),

		// Rollbar
		ROLLBAR_SERVER_TOKEN: z.string().default(""),
		ROLLBAR_ENABLED: envBool(false),
		ROLLBAR_SAMPLE_RATE_ALL: z.coerce.number().min(0).max(1).default(1),
		ROLLBAR_SAMPLE_RATE_INFO: z.coerce.number().min(0).max(1).default(0.05),
		ROLLBAR_SAMPLE_RATE_WARN: z.coerce.number().min(0).max(1).default(0.05),
		ROLLBAR_SAMPLE_RATE_ERROR: z.coerce.number().min(0).max(1).default(1),
		ROLLBAR_SAMPLE_RATE_CRITICAL: z.coerce.number().min(0).max(1).default(1),

		// Privacy
		TELEMETRY_CONSENT: envBool(false),
		ROLLBAR_ALLOW_PII: envBool(false),
	})
	// Rollbar token validation: require token if enabled
	.refine((env) => !env.ROLLBAR_ENABLED || env.ROLLBAR_SERVER_TOKEN.length > 0, {
		message: "ROLLBAR_SERVER_TOKEN required when ROLLBAR_ENABLED=true",
		path: ["ROLLBAR_SERVER_TOKEN"],
	});

export type AppConfig = z.infer<typeof EnvSchema>;

let _config: AppConfig | null = null;

/**
 * Load and validate environment configuration.
 * Throws a ConfigError listing every invalid variable.
 * Result is cached after first successful load.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
	if (_config) return _config;

	const result = EnvSchema.safeParse(env);
	if (!result.success) {
		const issues = result.error.issues.map((i) => `  ${i.path.join(".")}: ${i.message}`).join("\n");
		throw new ConfigError(`Environment configuration invalid:\n${issues}`);
	}

	_config = result.data;
	return _config;
}

/** Reset cached config (for testing). */
export function resetConfig(): void {
	_config = null;
}
