export class QueueClosedError extends Error {
	constructor() {
		super("Queue is closed");
		this.name = "QueueClosedError";
	}
}

interface Waiter<T> {
	resolve: (item: T) => void;
	reject: (error: Error) => void;
	detach: () => void;
}

/**
 * FIFO with a hard capacity. `push` never waits: when the queue is full the
 * oldest item is discarded to make room for the new one.
 */
export class BoundedQueue<T> {
	private readonly items: T[] = [];
	private readonly waiters: Waiter<T>[] = [];
	private closed = false;
	private dropped = 0;

	constructor(readonly capacity: number) {
		if (!Number.isInteger(capacity) || capacity <= 0) {
			throw new Error("BoundedQueue capacity must be a positive integer");
		}
	}

	get size(): number {
		return this.items.length;
	}

	get droppedCount(): number {
		return this.dropped;
	}

	get isClosed(): boolean {
		return this.closed;
	}

	/** Returns how many items were discarded to fit `item` (0 or 1). */
	push(item: T): number {
		if (this.closed) {
			return 0;
		}
		const waiter = this.waiters.shift();
		if (waiter) {
			waiter.detach();
			waiter.resolve(item);
			return 0;
		}
		this.items.push(item);
		if (this.items.length > this.capacity) {
			this.items.shift();
			this.dropped += 1;
			return 1;
		}
		return 0;
	}

	/**
	 * Resolves with the oldest item, waiting for one if needed. Items queued
	 * before `close()` are still handed out; after that `take` rejects.
	 */
	take(signal?: AbortSignal): Promise<T> {
		if (this.items.length > 0) {
			const item = this.items.shift();
			if (item !== undefined) {
				return Promise.resolve(item);
			}
		}
		if (this.closed) {
			return Promise.reject(new QueueClosedError());
		}
		if (signal?.aborted) {
			return Promise.reject(new Error("take aborted"));
		}

		return new Promise<T>((resolve, reject) => {
			const onAbort = () => {
				const index = this.waiters.indexOf(waiter);
				if (index >= 0) {
					this.waiters.splice(index, 1);
				}
				reject(new Error("take aborted"));
			};
			const waiter: Waiter<T> = {
				resolve,
				reject,
				detach: () => signal?.removeEventListener("abort", onAbort),
			};
			signal?.addEventListener("abort", onAbort, { once: true });
			this.waiters.push(waiter);
		});
	}

	close(): void {
		if (this.closed) {
			return;
		}
		this.closed = true;
		for (const waiter of this.waiters.splice(0)) {
			waiter.detach();
			waiter.reject(new QueueClosedError());
		}
	}

	/** Drops everything still queued and returns how many items that was. */
	clear(): number {
		return this.items.splice(0).length;
	}
}
