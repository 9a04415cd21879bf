// ---------------------------------------------------------------------------
// Promise-based mutex for critical sections
// Waiters are served in FIFO order.
// ---------------------------------------------------------------------------

export class Mutex {
	private locked = false;
	private queue: Array<() => void> = [];

	async acquire(): Promise<void> {
		return new Promise((resolve) => {
			if (!this.locked) {
				this.locked = true;
				resolve();
			} else {
				this.queue.push(() => {
					this.locked = true;
					resolve();
				});
			}
		});
	}

	release(): void {
		const next = this.queue.shift();
		if (next) {
			next();
		} else {
			this.locked = false;
		}
	}

	get isLocked(): boolean {
		return this.locked;
	}

	async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
		await this.acquire();
		try {
			return await fn();
		} finally {
			this.release();
		}
	}
}
