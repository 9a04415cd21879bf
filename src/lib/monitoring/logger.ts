// ---------------------------------------------------------------------------
// Structured logging for engine components, backed by Rollbar
// ---------------------------------------------------------------------------

import { redactDeviceId } from "./privacy";
import { serverInstance } from "./rollbar";

export interface LogContext {
	component: string;
	deviceId?: string;
}

/**
 * Component-scoped logger. Every entry carries the component name, an ISO
 * timestamp and, when known, the (redacted) device identifier.
 */
export class SyncLogger {
	constructor(private context: LogContext) {}

	/** Attach a device identity to every subsequent entry. */
	withDevice(deviceId: string): SyncLogger {
		return new SyncLogger({ ...this.context, deviceId });
	}

	private safeContext(): LogContext {
		if (this.context.deviceId === undefined) return this.context;
		return { ...this.context, deviceId: redactDeviceId(this.context.deviceId) };
	}

	error(message: string, error?: unknown, data?: Record<string, unknown>): void {
		serverInstance.error(`[${this.context.component}] ${message}`, {
			error: error instanceof Error ? error.message : error === undefined ? undefined : String(error),
			stack: error instanceof Error ? error.stack : undefined,
			data,
			context: this.safeContext(),
			timestamp: new Date().toISOString(),
		});
	}

	warn(message: string, data?: Record<string, unknown>): void {
		serverInstance.warning(`[${this.context.component}] ${message}`, {
			data,
			context: this.safeContext(),
			timestamp: new Date().toISOString(),
		});
	}

	info(message: string, data?: Record<string, unknown>): void {
		serverInstance.info(`[${this.context.component}] ${message}`, {
			data,
			context: this.safeContext(),
			timestamp: new Date().toISOString(),
		});
	}

	/** Debug output is only forwarded in development. */
	debug(message: string, data?: Record<string, unknown>): void {
		if (process.env.NODE_ENV !== "development") return;
		serverInstance.debug(`[${this.context.component}] ${message}`, {
			data,
			context: this.safeContext(),
			timestamp: new Date().toISOString(),
		});
	}
}

export function createLogger(component: string): SyncLogger {
	return new SyncLogger({ component });
}
