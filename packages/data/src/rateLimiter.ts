import { Clock, systemClock } from "@papertape/core";
import { sleep } from "./utils/sleep";

/**
 * Spaces upstream calls at least `minIntervalMs` apart. Slots are reserved
 * synchronously, so callers from different symbols queue up in call order.
 */
export class RateLimiter {
	private nextSlotAt = 0;

	constructor(
		private readonly minIntervalMs: number,
		private readonly clock: Clock = systemClock
	) {
		if (!Number.isFinite(minIntervalMs) || minIntervalMs < 0) {
			throw new Error("RateLimiter minIntervalMs must be >= 0");
		}
	}

	async acquire(signal?: AbortSignal): Promise<void> {
		const now = this.clock();
		const slot = Math.max(now, this.nextSlotAt);
		this.nextSlotAt = slot + this.minIntervalMs;
		const wait = slot - now;
		if (wait > 0) {
			await sleep(wait, signal);
		}
	}
}
