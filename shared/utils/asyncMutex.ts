/**
 * Async Mutex
 *
 * Promise-chain mutual exclusion for serialising async sections within
 * one Node.js process. Callers run in FIFO order; a failing section
 * releases the lock like a succeeding one.
 */

export class AsyncMutex {
	private queue: Promise<void> = Promise.resolve();

	async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
		let release: () => void = () => undefined;
		const gate = new Promise<void>((resolve) => {
			release = resolve;
		});

		const prev = this.queue;
		this.queue = gate;

		await prev;
		try {
			return await fn();
		} finally {
			release();
		}
	}
}
