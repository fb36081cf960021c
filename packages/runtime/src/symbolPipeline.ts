import {
	Clock,
	ProviderEvent,
	buildErrorMessage,
	systemClock,
} from "@papertape/core";
import { TickProvider, TickSubscription } from "@papertape/data";
import { AccountWriterViolationError } from "@papertape/execution-engine";
import { runTick } from "./loop/runTick";
import { errorMessage, runtimeLogger } from "./runtimeShared";
import type { PipelineComponents, TickResult } from "./types";

export interface SymbolPipelineOptions extends PipelineComponents {
	symbol: string;
	intervalMs: number;
	provider: TickProvider;
	clock?: Clock;
	onFatal?: (error: AccountWriterViolationError) => void;
}

/**
 * Owns one symbol's polling loop. Because the subscription awaits the handler,
 * a tick finishes every stage before the next one is fetched.
 */
export class SymbolPipeline {
	readonly symbol: string;
	private readonly subscription: TickSubscription;
	private readonly clock: Clock;
	private unsubscribe: (() => void) | null = null;
	private cancel = new AbortController();
	private last: TickResult | null = null;

	constructor(private readonly options: SymbolPipelineOptions) {
		this.symbol = options.symbol;
		this.clock = options.clock ?? systemClock;
		this.subscription = new TickSubscription({
			symbol: options.symbol,
			intervalMs: options.intervalMs,
			provider: options.provider,
			clock: this.clock,
		});
	}

	get isRunning(): boolean {
		return this.subscription.isRunning;
	}

	get lastResult(): TickResult | null {
		return this.last;
	}

	start(): void {
		if (this.subscription.isRunning) {
			return;
		}
		this.cancel = new AbortController();
		this.unsubscribe = this.subscription.onEvent((event) =>
			this.handle(event)
		);
		this.subscription.start();
		runtimeLogger.info("pipeline_started", {
			symbol: this.symbol,
			intervalMs: this.options.intervalMs,
		});
	}

	/**
	 * Stops polling and drops the symbol's indicator and strategy state. A tick
	 * already past the broker stage is not published.
	 */
	stop(): void {
		this.cancel.abort();
		this.subscription.stop();
		this.unsubscribe?.();
		this.unsubscribe = null;
		this.options.indicatorEngine.reset(this.symbol);
		this.options.strategyEngine.reset(this.symbol);
		this.last = null;
		runtimeLogger.info("pipeline_stopped", { symbol: this.symbol });
	}

	async handle(event: ProviderEvent): Promise<void> {
		const { signal } = this.cancel;
		if (signal.aborted) {
			return;
		}
		if (event.type === "error") {
			this.options.hub.publish(
				buildErrorMessage(event.symbol, event.error, event.timestamp)
			);
			return;
		}

		try {
			const result = await runTick({
				tick: event.tick,
				indicatorEngine: this.options.indicatorEngine,
				strategyEngine: this.options.strategyEngine,
				broker: this.options.broker,
				hub: this.options.hub,
				signal,
			});
			if (!result.published) {
				runtimeLogger.debug("tick_discarded", {
					symbol: this.symbol,
					signal: result.signal.kind,
				});
				return;
			}
			this.last = result;
		} catch (error) {
			if (error instanceof AccountWriterViolationError) {
				runtimeLogger.error("pipeline_halted", {
					symbol: this.symbol,
					message: error.message,
				});
				this.stop();
				this.options.onFatal?.(error);
				return;
			}
			const message = errorMessage(error);
			runtimeLogger.error("pipeline_stage_failed", {
				symbol: this.symbol,
				message,
			});
			if (signal.aborted) {
				return;
			}
			this.options.hub.publish(
				buildErrorMessage(this.symbol, message, this.clock())
			);
		}
	}
}
