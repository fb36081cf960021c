import { BroadcastHub } from "@papertape/broadcast";
import {
	Clock,
	SnapshotPayload,
	TraderConfig,
	systemClock,
	toIsoTimestamp,
} from "@papertape/core";
import { TickProvider, createTickProvider } from "@papertape/data";
import {
	AccountWriterViolationError,
	PaperAccount,
	PaperBroker,
	createSizingPolicy,
} from "@papertape/execution-engine";
import { IndicatorEngine } from "@papertape/indicators";
import { StrategyEngine, buildStrategy } from "@papertape/strategy-engine";
import { SymbolPipeline } from "./symbolPipeline";
import { errorMessage, runtimeLogger } from "./runtimeShared";
import type { SessionHealth } from "./types";

export interface TradingSessionOptions {
	provider?: TickProvider;
	hub?: BroadcastHub;
	clock?: Clock;
}

/**
 * Everything one running trader owns: the provider, the engines, the broker,
 * the hub and a pipeline per symbol. Symbols run independently; the broker
 * serializes their account updates.
 */
export class TradingSession {
	readonly provider: TickProvider;
	readonly hub: BroadcastHub;
	readonly broker: PaperBroker;
	readonly indicatorEngine: IndicatorEngine;
	readonly strategyEngine: StrategyEngine;
	private readonly clock: Clock;
	private readonly symbolList: string[] = [];
	private readonly pipelines = new Map<string, SymbolPipeline>();
	private running = false;
	private fatalError: AccountWriterViolationError | null = null;

	constructor(
		readonly config: TraderConfig,
		options: TradingSessionOptions = {}
	) {
		this.clock = options.clock ?? systemClock;
		this.provider =
			options.provider ??
			createTickProvider(config.provider, { clock: this.clock });
		this.hub =
			options.hub ??
			new BroadcastHub({ ...config.broadcast, clock: this.clock });
		this.indicatorEngine = new IndicatorEngine(config.indicators);
		this.strategyEngine = new StrategyEngine(buildStrategy(config.strategy));
		this.broker = new PaperBroker({
			account: new PaperAccount(config.broker.startingCash),
			sizing: createSizingPolicy(config.broker.sizing),
			lotSize: config.broker.lotSize,
			allowPyramiding: config.broker.allowPyramiding,
			clock: this.clock,
			onOrder: (_order, account) => this.hub.recordAccount(account),
		});

		this.hub.recordAccount(this.broker.view());
		for (const symbol of config.symbols) {
			this.addSymbol(symbol);
		}
	}

	get isRunning(): boolean {
		return this.running;
	}

	get fatal(): AccountWriterViolationError | null {
		return this.fatalError;
	}

	symbols(): string[] {
		return [...this.symbolList];
	}

	start(): void {
		if (this.running) {
			return;
		}
		if (this.fatalError) {
			throw this.fatalError;
		}
		this.running = true;
		for (const symbol of this.symbolList) {
			this.startPipeline(symbol);
		}
		runtimeLogger.info("session_started", {
			symbols: this.symbols(),
			provider: this.provider.kind,
			strategy: this.strategyEngine.strategyId,
			intervalMs: this.config.intervalMs,
		});
	}

	stop(): void {
		if (!this.running) {
			return;
		}
		this.running = false;
		for (const pipeline of this.pipelines.values()) {
			pipeline.stop();
		}
		this.pipelines.clear();
		runtimeLogger.info("session_stopped", { symbols: this.symbols() });
	}

	/** Stops the session and releases the provider and every client. */
	async shutdown(): Promise<void> {
		this.stop();
		await this.hub.shutdown();
		try {
			await this.provider.close();
		} catch (error) {
			runtimeLogger.warn("provider_close_failed", {
				message: errorMessage(error),
			});
		}
	}

	/** Returns false when the symbol is already tracked. */
	addSymbol(rawSymbol: string): boolean {
		const symbol = rawSymbol.trim();
		if (!symbol) {
			throw new Error("Symbol must be a non-empty string");
		}
		if (this.symbolList.includes(symbol)) {
			return false;
		}
		this.symbolList.push(symbol);
		this.hub.trackSymbol(symbol);
		if (this.running) {
			this.startPipeline(symbol);
		}
		return true;
	}

	removeSymbol(symbol: string): boolean {
		const index = this.symbolList.indexOf(symbol);
		if (index < 0) {
			return false;
		}
		this.symbolList.splice(index, 1);
		this.pipelines.get(symbol)?.stop();
		this.pipelines.delete(symbol);
		this.indicatorEngine.reset(symbol);
		this.strategyEngine.reset(symbol);
		this.hub.untrackSymbol(symbol);
		return true;
	}

	getPipeline(symbol: string): SymbolPipeline | undefined {
		return this.pipelines.get(symbol);
	}

	snapshot(): SnapshotPayload {
		return this.hub.snapshot();
	}

	health(): SessionHealth {
		const { provider_health: providerHealth } = this.hub.snapshot();
		return {
			ts: toIsoTimestamp(this.clock()),
			running: this.running,
			symbols: this.symbols(),
			lastOkTs: providerHealth.last_ok_ts,
			lastError: providerHealth.last_error,
			tickCount: providerHealth.tick_count,
			clients: this.hub.clientCount(),
		};
	}

	private startPipeline(symbol: string): void {
		const pipeline = new SymbolPipeline({
			symbol,
			intervalMs: this.config.intervalMs,
			provider: this.provider,
			indicatorEngine: this.indicatorEngine,
			strategyEngine: this.strategyEngine,
			broker: this.broker,
			hub: this.hub,
			clock: this.clock,
			onFatal: (error) => this.handleFatal(error),
		});
		this.pipelines.set(symbol, pipeline);
		pipeline.start();
	}

	private handleFatal(error: AccountWriterViolationError): void {
		if (!this.fatalError) {
			this.fatalError = error;
			runtimeLogger.error("session_halted", { message: error.message });
		}
		this.stop();
	}
}
