import { describe, expect, it } from "vitest";
import type { IndicatorSnapshot, Tick } from "@papertape/core";
import { IndicatorEngine } from "@papertape/indicators";
import { StrategyEngine, buildStrategy } from "./strategyEngine";
import { MaCrossoverStrategy } from "./strategies/MaCrossoverStrategy";
import { RsiThresholdStrategy } from "./strategies/RsiThresholdStrategy";

const tick = (price: number, timestamp: number, symbol = "AAPL"): Tick => ({
	symbol,
	price,
	timestamp,
});

const rsiSnapshot = (rsi: number | null): IndicatorSnapshot => ({
	maShort: null,
	maLong: null,
	rsi,
});

describe("StrategyEngine with MaCrossoverStrategy", () => {
	const run = (prices: number[]) => {
		const indicators = new IndicatorEngine({
			shortPeriod: 2,
			longPeriod: 3,
			rsiPeriod: 14,
		});
		const engine = new StrategyEngine(
			new MaCrossoverStrategy({ shortPeriod: 2, longPeriod: 3 })
		);
		const signals = prices.map((price, index) => {
			const next = tick(price, index + 1);
			return engine.evaluate(next, indicators.update(next));
		});
		return { engine, signals };
	};

	it("buys only on the tick where the short average crosses above", () => {
		const { signals } = run([10, 10, 10, 12, 14]);

		expect(signals.map((signal) => signal.kind)).toEqual([
			"HOLD",
			"HOLD",
			"HOLD",
			"BUY",
			"HOLD",
		]);
		expect(signals[0]?.trigger).toBe("insufficient_data");
		expect(signals[1]?.reason).toBe(
			"insufficient_data ma_short=10.0000 ma_long=n/a"
		);
		expect(signals[2]?.reason).toBe("no_cross ma_short=10.0000 ma_long=10.0000");
		expect(signals[3]).toEqual({
			symbol: "AAPL",
			kind: "BUY",
			trigger: "ma_cross_up",
			reason:
				"ma_cross_up ma_short=11.0000 ma_long=10.6667 prev_ma_short=10.0000 prev_ma_long=10.0000",
			timestamp: 4,
		});
		expect(signals[4]?.reason).toBe("no_cross ma_short=13.0000 ma_long=12.0000");
	});

	it("sells once when the short average crosses below", () => {
		const { engine, signals } = run([10, 10, 10, 12, 14, 9, 8, 7]);
		const kinds = signals.map((signal) => signal.kind);

		// 6th tick: short 11.5 < long 11.6667 after 13 > 12
		expect(kinds).toEqual([
			"HOLD",
			"HOLD",
			"HOLD",
			"BUY",
			"HOLD",
			"SELL",
			"HOLD",
			"HOLD",
		]);
		expect(signals[5]?.trigger).toBe("ma_cross_down");
		expect(engine.getMemory("AAPL")?.lastSignal).toBe("SELL");
		expect(engine.getMemory("AAPL")?.lastSignalAt).toBe(6);
	});

	it("keeps memory per symbol and drops it on reset", () => {
		const engine = new StrategyEngine(
			new MaCrossoverStrategy({ shortPeriod: 2, longPeriod: 3 })
		);
		const crossedBefore: IndicatorSnapshot = { maShort: 9, maLong: 10, rsi: null };
		const crossedAfter: IndicatorSnapshot = { maShort: 11, maLong: 10, rsi: null };

		engine.evaluate(tick(10, 1, "AAPL"), crossedBefore);
		expect(engine.evaluate(tick(10, 2, "MSFT"), crossedAfter).kind).toBe("HOLD");
		expect(engine.evaluate(tick(10, 3, "AAPL"), crossedAfter).kind).toBe("BUY");

		engine.evaluate(tick(10, 4, "AAPL"), crossedBefore);
		expect(engine.reset("AAPL")).toBe(true);
		expect(engine.getMemory("AAPL")).toBeNull();
		expect(engine.evaluate(tick(10, 5, "AAPL"), crossedAfter).kind).toBe("HOLD");
	});
});

describe("RsiThresholdStrategy", () => {
	const strategy = new RsiThresholdStrategy({
		period: 14,
		oversold: 30,
		overbought: 70,
	});

	it("holds while rsi is undefined", () => {
		expect(strategy.decide(rsiSnapshot(null), null)).toEqual({
			kind: "HOLD",
			trigger: "insufficient_data",
			reason: "insufficient_data rsi=n/a",
		});
	});

	it("buys on a downward cross below oversold", () => {
		expect(strategy.decide(rsiSnapshot(25), rsiSnapshot(35))).toEqual({
			kind: "BUY",
			trigger: "rsi_cross_below_oversold",
			reason:
				"rsi_cross_below_oversold rsi=25.0000 prev_rsi=35.0000 oversold=30.0000",
		});
	});

	it("does not re-signal while rsi stays below oversold", () => {
		expect(strategy.decide(rsiSnapshot(20), rsiSnapshot(25)).kind).toBe("HOLD");
	});

	it("sells on an upward cross above overbought", () => {
		const decision = strategy.decide(rsiSnapshot(72.5), rsiSnapshot(70));
		expect(decision.kind).toBe("SELL");
		expect(decision.reason).toBe(
			"rsi_cross_above_overbought rsi=72.5000 prev_rsi=70.0000 overbought=70.0000"
		);
	});

	it("holds when the first defined reading is already beyond a threshold", () => {
		expect(strategy.decide(rsiSnapshot(10), rsiSnapshot(null))).toEqual({
			kind: "HOLD",
			trigger: "no_cross",
			reason: "no_cross rsi=10.0000",
		});
	});
});

describe("buildStrategy", () => {
	it("selects the variant from config", () => {
		expect(
			buildStrategy({ type: "ma_crossover", shortPeriod: 2, longPeriod: 5 }).id
		).toBe("ma_crossover");
		expect(
			buildStrategy({
				type: "rsi_threshold",
				period: 14,
				oversold: 30,
				overbought: 70,
			}).id
		).toBe("rsi_threshold");
	});

	it("rejects inverted windows", () => {
		expect(() =>
			buildStrategy({ type: "ma_crossover", shortPeriod: 5, longPeriod: 5 })
		).toThrowError(/shortPeriod to be below longPeriod/);
	});
});
