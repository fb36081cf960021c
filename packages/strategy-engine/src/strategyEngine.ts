import {
	IndicatorSnapshot,
	Signal,
	StrategyConfig,
	Tick,
	createLogger,
	toIsoTimestamp,
} from "@papertape/core";
import { MaCrossoverStrategy } from "./strategies/MaCrossoverStrategy";
import { RsiThresholdStrategy } from "./strategies/RsiThresholdStrategy";
import type { StrategyMemory, TickStrategy } from "./types";

const strategyLogger = createLogger("strategy-engine");

export const buildStrategy = (config: StrategyConfig): TickStrategy => {
	switch (config.type) {
		case "ma_crossover":
			return new MaCrossoverStrategy({
				shortPeriod: config.shortPeriod,
				longPeriod: config.longPeriod,
			});
		case "rsi_threshold":
			return new RsiThresholdStrategy({
				period: config.period,
				oversold: config.oversold,
				overbought: config.overbought,
			});
		default: {
			const unreachable: never = config;
			throw new Error(`Unknown strategy config: ${JSON.stringify(unreachable)}`);
		}
	}
};

/**
 * Turns indicator snapshots into signals, one per tick. Memory is kept per
 * symbol so a crossing is only reported on the tick where it happens.
 */
export class StrategyEngine {
	private readonly memory = new Map<string, StrategyMemory>();

	constructor(private readonly strategy: TickStrategy) {}

	get strategyId(): TickStrategy["id"] {
		return this.strategy.id;
	}

	evaluate(tick: Tick, indicators: IndicatorSnapshot): Signal {
		const memory = this.ensureMemory(tick.symbol);
		const decision = this.strategy.decide(indicators, memory.lastIndicators);

		memory.lastIndicators = { ...indicators };
		if (decision.kind !== "HOLD") {
			memory.lastSignal = decision.kind;
			memory.lastSignalAt = tick.timestamp;
		}

		const signal: Signal = {
			symbol: tick.symbol,
			kind: decision.kind,
			trigger: decision.trigger,
			reason: decision.reason,
			timestamp: tick.timestamp,
		};
		strategyLogger.log(
			decision.kind === "HOLD" ? "debug" : "info",
			"strategy_decision",
			{
				strategy: this.strategy.id,
				symbol: tick.symbol,
				timestamp: toIsoTimestamp(tick.timestamp),
				price: tick.price,
				signal: signal.kind,
				trigger: signal.trigger,
				reason: signal.reason,
			}
		);
		return signal;
	}

	getMemory(symbol: string): StrategyMemory | null {
		const memory = this.memory.get(symbol);
		return memory ? { ...memory } : null;
	}

	reset(symbol: string): boolean {
		return this.memory.delete(symbol);
	}

	clear(): void {
		this.memory.clear();
	}

	private ensureMemory(symbol: string): StrategyMemory {
		let memory = this.memory.get(symbol);
		if (!memory) {
			memory = { lastIndicators: null, lastSignal: null, lastSignalAt: null };
			this.memory.set(symbol, memory);
		}
		return memory;
	}
}
