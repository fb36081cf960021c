import type { IndicatorSnapshot } from "@papertape/core";
import {
	StrategyDecision,
	TickStrategy,
	formatIndicatorValue as fmt,
} from "../types";

export interface MaCrossoverParams {
	shortPeriod: number;
	longPeriod: number;
}

export class MaCrossoverStrategy implements TickStrategy {
	readonly id = "ma_crossover" as const;

	constructor(readonly params: MaCrossoverParams) {
		if (params.shortPeriod >= params.longPeriod) {
			throw new Error(
				"MaCrossoverStrategy requires shortPeriod to be below longPeriod"
			);
		}
	}

	decide(
		current: IndicatorSnapshot,
		previous: IndicatorSnapshot | null
	): StrategyDecision {
		const { maShort, maLong } = current;
		const values = `ma_short=${fmt(maShort)} ma_long=${fmt(maLong)}`;
		if (maShort === null || maLong === null) {
			return {
				kind: "HOLD",
				trigger: "insufficient_data",
				reason: `insufficient_data ${values}`,
			};
		}

		const prevShort = previous?.maShort ?? null;
		const prevLong = previous?.maLong ?? null;
		if (prevShort === null || prevLong === null) {
			return {
				kind: "HOLD",
				trigger: "no_cross",
				reason: `no_cross ${values}`,
			};
		}

		const crossed = `${values} prev_ma_short=${fmt(prevShort)} prev_ma_long=${fmt(prevLong)}`;
		if (prevShort <= prevLong && maShort > maLong) {
			return {
				kind: "BUY",
				trigger: "ma_cross_up",
				reason: `ma_cross_up ${crossed}`,
			};
		}
		if (prevShort >= prevLong && maShort < maLong) {
			return {
				kind: "SELL",
				trigger: "ma_cross_down",
				reason: `ma_cross_down ${crossed}`,
			};
		}
		return {
			kind: "HOLD",
			trigger: "no_cross",
			reason: `no_cross ${values}`,
		};
	}
}
