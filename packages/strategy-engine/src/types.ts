import type {
	ActionSignalKind,
	IndicatorSnapshot,
	SignalKind,
	SignalTrigger,
	StrategyType,
} from "@papertape/core";

export interface StrategyDecision {
	kind: SignalKind;
	trigger: SignalTrigger;
	reason: string;
}

/**
 * Edge-triggered strategies compare the current indicator snapshot against
 * the previous tick's. They hold no state of their own; `StrategyEngine`
 * owns the per-symbol memory.
 */
export interface TickStrategy {
	readonly id: StrategyType;
	decide(
		current: IndicatorSnapshot,
		previous: IndicatorSnapshot | null
	): StrategyDecision;
}

export interface StrategyMemory {
	lastIndicators: IndicatorSnapshot | null;
	lastSignal: ActionSignalKind | null;
	lastSignalAt: number | null;
}

export const formatIndicatorValue = (value: number | null): string =>
	value === null ? "n/a" : value.toFixed(4);
