import {
	Clock,
	ProviderEvent,
	createLogger,
	systemClock,
} from "@papertape/core";
import type {
	ProviderEventHandler,
	TickProvider,
	TickSubscriptionOptions,
} from "./types";

const subscriptionLogger = createLogger("data:subscription");

interface TickSubscriptionConfig extends TickSubscriptionOptions {
	provider: TickProvider;
	clock?: Clock;
}

/**
 * Restartable polling loop for one symbol. The next poll is scheduled only
 * after every handler has finished with the previous event, so one symbol
 * never has two events in flight.
 */
export class TickSubscription {
	readonly symbol: string;
	private readonly listeners = new Set<ProviderEventHandler>();
	private readonly clock: Clock;
	private timer: ReturnType<typeof setTimeout> | null = null;
	private controller: AbortController | null = null;
	private running = false;
	private generation = 0;

	constructor(private readonly options: TickSubscriptionConfig) {
		if (!Number.isFinite(options.intervalMs) || options.intervalMs <= 0) {
			throw new Error("Tick subscription intervalMs must be > 0");
		}
		this.symbol = options.symbol;
		this.clock = options.clock ?? systemClock;
	}

	get isRunning(): boolean {
		return this.running;
	}

	start(): void {
		if (this.running) {
			return;
		}
		this.running = true;
		this.generation += 1;
		void this.poll(this.generation);
	}

	stop(): void {
		if (!this.running) {
			return;
		}
		this.running = false;
		this.generation += 1;
		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = null;
		}
		this.controller?.abort();
		this.controller = null;
	}

	onEvent(handler: ProviderEventHandler): () => void {
		this.listeners.add(handler);
		return () => this.listeners.delete(handler);
	}

	/** Fetches and dispatches one event. Returns null when the call was aborted. */
	async runOnce(): Promise<ProviderEvent | null> {
		return this.fetchAndEmit(this.generation);
	}

	private async poll(generation: number): Promise<void> {
		if (generation !== this.generation) {
			return;
		}

		await this.fetchAndEmit(generation);

		if (this.running && generation === this.generation) {
			this.timer = setTimeout(() => {
				this.timer = null;
				void this.poll(generation);
			}, this.options.intervalMs);
		}
	}

	private async fetchAndEmit(generation: number): Promise<ProviderEvent | null> {
		const controller = new AbortController();
		this.controller = controller;
		let event: ProviderEvent;
		try {
			const tick = await this.options.provider.next(
				this.symbol,
				controller.signal
			);
			if (controller.signal.aborted || generation !== this.generation) {
				return null;
			}
			event =
				Number.isFinite(tick.price) && tick.price > 0
					? { type: "tick", tick }
					: this.errorEvent(`Provider returned invalid price ${tick.price}`);
		} catch (error) {
			if (controller.signal.aborted || generation !== this.generation) {
				return null;
			}
			const message = error instanceof Error ? error.message : String(error);
			subscriptionLogger.warn("provider_request_failed", {
				symbol: this.symbol,
				message,
			});
			event = this.errorEvent(message);
		} finally {
			if (this.controller === controller) {
				this.controller = null;
			}
		}

		await this.emit(event);
		return event;
	}

	private errorEvent(error: string): ProviderEvent {
		return {
			type: "error",
			symbol: this.symbol,
			error,
			timestamp: this.clock(),
		};
	}

	private async emit(event: ProviderEvent): Promise<void> {
		if (!this.listeners.size) {
			return;
		}
		const listeners = Array.from(this.listeners);
		await Promise.allSettled(
			listeners.map(async (listener) => {
				try {
					await listener(event);
				} catch (error) {
					subscriptionLogger.error("subscription_listener_error", {
						symbol: this.symbol,
						message: error instanceof Error ? error.message : String(error),
					});
				}
			})
		);
	}
}
