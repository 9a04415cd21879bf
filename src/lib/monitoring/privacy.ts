// ---------------------------------------------------------------------------
// Privacy & Consent helpers for telemetry/monitoring.
// Default: device identifiers are not attached unless consent is explicit.
// ---------------------------------------------------------------------------

/**
 * Returns whether telemetry consent is granted.
 * Environment-driven so it can be read before configuration is validated.
 */
export function isTelemetryConsentGranted(): boolean {
	return process.env.TELEMETRY_CONSENT === "1" || process.env.ROLLBAR_ALLOW_PII === "1";
}

/** Replace a device identifier with a marker unless consent was granted. */
export function redactDeviceId(deviceId: string): string {
	return isTelemetryConsentGranted() ? deviceId : "[redacted]";
}
