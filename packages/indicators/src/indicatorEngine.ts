import type { IndicatorSnapshot, Tick } from "@papertape/core";
import { WilderRsi } from "./rsi";
import { sma } from "./sma";

export interface IndicatorEngineOptions {
	shortPeriod: number;
	longPeriod: number;
	rsiPeriod: number;
}

interface SymbolIndicatorState {
	history: number[];
	rsi: WilderRsi;
	latest: IndicatorSnapshot;
}

export const EMPTY_INDICATORS: IndicatorSnapshot = {
	maShort: null,
	maLong: null,
	rsi: null,
};

/**
 * Rolling per-symbol indicator state. Price history is bounded to
 * `max(longPeriod, rsiPeriod) + 1` entries; RSI is updated incrementally so
 * each tick costs O(window) for the averages and O(1) for RSI.
 */
export class IndicatorEngine {
	readonly capacity: number;
	private readonly states = new Map<string, SymbolIndicatorState>();

	constructor(private readonly options: IndicatorEngineOptions) {
		for (const [field, value] of Object.entries(options)) {
			if (!Number.isInteger(value) || value <= 0) {
				throw new Error(`Indicator ${field} must be a positive integer`);
			}
		}
		this.capacity = Math.max(options.longPeriod, options.rsiPeriod) + 1;
	}

	update(tick: Tick): IndicatorSnapshot {
		if (!Number.isFinite(tick.price) || tick.price <= 0) {
			throw new Error(
				`Indicator update for ${tick.symbol} requires a positive price, got ${tick.price}`
			);
		}
		const state = this.ensureState(tick.symbol);
		state.history.push(tick.price);
		while (state.history.length > this.capacity) {
			state.history.shift();
		}

		state.latest = {
			maShort: sma(state.history, this.options.shortPeriod),
			maLong: sma(state.history, this.options.longPeriod),
			rsi: state.rsi.update(tick.price),
		};
		return { ...state.latest };
	}

	snapshot(symbol: string): IndicatorSnapshot | null {
		const state = this.states.get(symbol);
		return state ? { ...state.latest } : null;
	}

	history(symbol: string): number[] {
		return [...(this.states.get(symbol)?.history ?? [])];
	}

	/** Releases everything held for `symbol`; the next tick starts cold. */
	reset(symbol: string): boolean {
		return this.states.delete(symbol);
	}

	clear(): void {
		this.states.clear();
	}

	trackedSymbols(): string[] {
		return Array.from(this.states.keys());
	}

	private ensureState(symbol: string): SymbolIndicatorState {
		let state = this.states.get(symbol);
		if (!state) {
			state = {
				history: [],
				rsi: new WilderRsi(this.options.rsiPeriod),
				latest: { ...EMPTY_INDICATORS },
			};
			this.states.set(symbol, state);
		}
		return state;
	}
}
