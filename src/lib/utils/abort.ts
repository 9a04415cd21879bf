// ---------------------------------------------------------------------------
// Cancellation helpers shared by the transports and the orchestrator
// ---------------------------------------------------------------------------

import { SyncCancelledError } from "../errors";

export interface LinkedSignal {
	signal: AbortSignal;
	/** Detach from the parent signals and clear any pending deadline. */
	dispose(): void;
}

/** Error used as the abort reason when a deadline elapses. */
export class DeadlineExceededError extends Error {
	constructor(public readonly timeoutMs: number) {
		super(`Timed out after ${timeoutMs}ms`);
		this.name = "TimeoutError";
	}
}

/**
 * Derive a signal that aborts when any parent aborts or, if `timeoutMs` is
 * given, when the deadline elapses. The derived signal carries the reason of
 * whichever source fired first.
 */
export function linkSignals(parents: Array<AbortSignal | undefined>, timeoutMs?: number): LinkedSignal {
	const controller = new AbortController();
	const cleanups: Array<() => void> = [];

	for (const parent of parents) {
		if (!parent) continue;
		if (parent.aborted) {
			controller.abort(parent.reason);
			break;
		}
		const onAbort = () => controller.abort(parent.reason);
		parent.addEventListener("abort", onAbort, { once: true });
		cleanups.push(() => parent.removeEventListener("abort", onAbort));
	}

	if (timeoutMs !== undefined && !controller.signal.aborted) {
		const timer = setTimeout(() => controller.abort(new DeadlineExceededError(timeoutMs)), timeoutMs);
		cleanups.push(() => clearTimeout(timer));
	}

	return {
		signal: controller.signal,
		dispose: () => {
			for (const cleanup of cleanups) cleanup();
		},
	};
}

/** Reason to report when a signal aborted without one of its own. */
export function abortReason(signal: AbortSignal): unknown {
	return signal.reason ?? new SyncCancelledError();
}

export function isAbortError(err: unknown): boolean {
	return (
		err instanceof Error &&
		(err.name === "AbortError" || err.name === "TimeoutError" || err instanceof SyncCancelledError)
	);
}

/** Resolve after `ms`, or reject early with the signal's reason. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(abortReason(signal));
			return;
		}
		const onAbort = () => {
			clearTimeout(timer);
			reject(signal ? abortReason(signal) : new SyncCancelledError());
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}
