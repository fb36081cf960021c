import { describe, expect, it } from "vitest";
import type { Tick } from "@papertape/core";
import { IndicatorEngine } from "./indicatorEngine";
import { sma } from "./sma";

const tick = (price: number, symbol = "AAPL", timestamp = 0): Tick => ({
	symbol,
	price,
	timestamp,
});

describe("sma", () => {
	it("averages the trailing window", () => {
		expect(sma([1, 2, 3, 4], 2)).toBe(3.5);
		expect(sma([1, 2, 3, 4], 4)).toBe(2.5);
	});

	it("is null until the window is full", () => {
		expect(sma([1, 2], 3)).toBeNull();
		expect(sma([1, 2], 0)).toBeNull();
	});
});

describe("IndicatorEngine", () => {
	const createEngine = (): IndicatorEngine =>
		new IndicatorEngine({ shortPeriod: 2, longPeriod: 3, rsiPeriod: 3 });

	it("defines each indicator exactly when its window fills", () => {
		const engine = createEngine();
		const snapshots = [10, 10, 10, 12, 14].map((price) =>
			engine.update(tick(price))
		);

		expect(snapshots[0]).toEqual({ maShort: null, maLong: null, rsi: null });
		expect(snapshots[1]).toEqual({ maShort: 10, maLong: null, rsi: null });
		expect(snapshots[2]).toEqual({ maShort: 10, maLong: 10, rsi: null });
		expect(snapshots[3]?.maShort).toBe(11);
		expect(snapshots[3]?.maLong).toBeCloseTo(32 / 3, 9);
		expect(snapshots[3]?.rsi).toBe(100);
		expect(snapshots[4]).toEqual({ maShort: 13, maLong: 12, rsi: 100 });
	});

	it("bounds history to max(long, rsi) + 1 and evicts the oldest", () => {
		const engine = createEngine();
		expect(engine.capacity).toBe(4);
		[1, 2, 3, 4, 5, 6].forEach((price) => engine.update(tick(price)));
		expect(engine.history("AAPL")).toEqual([3, 4, 5, 6]);
	});

	it("keeps symbols independent", () => {
		const engine = createEngine();
		engine.update(tick(10, "AAPL"));
		engine.update(tick(20, "MSFT"));
		engine.update(tick(30, "MSFT"));

		expect(engine.snapshot("AAPL")?.maShort).toBeNull();
		expect(engine.snapshot("MSFT")?.maShort).toBe(25);
		expect(engine.trackedSymbols()).toEqual(["AAPL", "MSFT"]);
	});

	it("releases symbol state on reset", () => {
		const engine = createEngine();
		engine.update(tick(10));
		engine.update(tick(11));
		expect(engine.reset("AAPL")).toBe(true);
		expect(engine.snapshot("AAPL")).toBeNull();
		expect(engine.update(tick(12)).maShort).toBeNull();
	});

	it("rejects non-positive prices", () => {
		const engine = createEngine();
		expect(() => engine.update(tick(0))).toThrowError(/positive price/);
	});

	it("rejects invalid periods", () => {
		expect(
			() => new IndicatorEngine({ shortPeriod: 0, longPeriod: 3, rsiPeriod: 3 })
		).toThrowError(/shortPeriod must be a positive integer/);
	});
});
