// ---------------------------------------------------------------------------
// State Stream
// Single-writer, multiple-reader holder of a current value. Readers subscribe
// to transitions or wait for a predicate without polling.
// ---------------------------------------------------------------------------

import { createLogger } from "../monitoring/logger";
import { abortReason, DeadlineExceededError } from "./abort";

export type StateListener<T> = (value: T, previous: T) => void;

export interface WaitOptions {
	signal?: AbortSignal;
	timeoutMs?: number;
}

export interface ReadonlyStateStream<T> {
	readonly value: T;
	subscribe(listener: StateListener<T>): () => void;
	waitFor(predicate: (value: T) => boolean, options?: WaitOptions): Promise<T>;
}

const logger = createLogger("state-stream");

export class StateStream<T> implements ReadonlyStateStream<T> {
	private current: T;
	private readonly listeners = new Set<StateListener<T>>();

	constructor(
		initial: T,
		private readonly equals: (a: T, b: T) => boolean = Object.is,
	) {
		this.current = initial;
	}

	get value(): T {
		return this.current;
	}

	/** Publish a new value. Equal values are not republished. */
	set(next: T): void {
		if (this.equals(this.current, next)) return;
		const previous = this.current;
		this.current = next;
		for (const listener of [...this.listeners]) {
			try {
				listener(next, previous);
			} catch (err) {
				logger.error("State listener threw", err);
			}
		}
	}

	subscribe(listener: StateListener<T>): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	/**
	 * Resolve with the first value (current or future) matching `predicate`.
	 * Rejects with the signal's reason on abort, or a TimeoutError after
	 * `timeoutMs`.
	 */
	waitFor(predicate: (value: T) => boolean, options: WaitOptions = {}): Promise<T> {
		if (predicate(this.current)) return Promise.resolve(this.current);
		const { signal, timeoutMs } = options;
		if (signal?.aborted) return Promise.reject(abortReason(signal));

		return new Promise<T>((resolve, reject) => {
			let timer: ReturnType<typeof setTimeout> | undefined;
			const cleanup = () => {
				unsubscribe();
				if (timer) clearTimeout(timer);
				signal?.removeEventListener("abort", onAbort);
			};
			const onAbort = () => {
				cleanup();
				reject(signal ? abortReason(signal) : new Error("aborted"));
			};
			const unsubscribe = this.subscribe((value) => {
				if (!predicate(value)) return;
				cleanup();
				resolve(value);
			});
			if (timeoutMs !== undefined) {
				timer = setTimeout(() => {
					cleanup();
					reject(new DeadlineExceededError(timeoutMs));
				}, timeoutMs);
			}
			signal?.addEventListener("abort", onAbort, { once: true });
		});
	}

	/** View for readers; only the owner keeps the writable instance. */
	asReadonly(): ReadonlyStateStream<T> {
		return this;
	}
}
