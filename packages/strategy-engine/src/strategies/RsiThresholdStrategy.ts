import type { IndicatorSnapshot } from "@papertape/core";
import {
	StrategyDecision,
	TickStrategy,
	formatIndicatorValue as fmt,
} from "../types";

export interface RsiThresholdParams {
	period: number;
	oversold: number;
	overbought: number;
}

/**
 * Reversal entries: a downward cross below `oversold` buys, an upward cross
 * above `overbought` sells.
 */
export class RsiThresholdStrategy implements TickStrategy {
	readonly id = "rsi_threshold" as const;

	constructor(readonly params: RsiThresholdParams) {
		if (params.oversold >= params.overbought) {
			throw new Error(
				"RsiThresholdStrategy requires oversold to be below overbought"
			);
		}
	}

	decide(
		current: IndicatorSnapshot,
		previous: IndicatorSnapshot | null
	): StrategyDecision {
		const { rsi } = current;
		const { oversold, overbought } = this.params;
		if (rsi === null) {
			return {
				kind: "HOLD",
				trigger: "insufficient_data",
				reason: "insufficient_data rsi=n/a",
			};
		}

		const prevRsi = previous?.rsi ?? null;
		if (prevRsi !== null && prevRsi >= oversold && rsi < oversold) {
			return {
				kind: "BUY",
				trigger: "rsi_cross_below_oversold",
				reason: `rsi_cross_below_oversold rsi=${fmt(rsi)} prev_rsi=${fmt(prevRsi)} oversold=${fmt(oversold)}`,
			};
		}
		if (prevRsi !== null && prevRsi <= overbought && rsi > overbought) {
			return {
				kind: "SELL",
				trigger: "rsi_cross_above_overbought",
				reason: `rsi_cross_above_overbought rsi=${fmt(rsi)} prev_rsi=${fmt(prevRsi)} overbought=${fmt(overbought)}`,
			};
		}
		return {
			kind: "HOLD",
			trigger: "no_cross",
			reason: `no_cross rsi=${fmt(rsi)}`,
		};
	}
}
