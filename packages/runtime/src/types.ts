import type { BroadcastHub } from "@papertape/broadcast";
import type {
	IndicatorSnapshot,
	Signal,
	Tick,
	TickMessage,
} from "@papertape/core";
import type {
	ExecutionResult,
	PaperBroker,
} from "@papertape/execution-engine";
import type { IndicatorEngine } from "@papertape/indicators";
import type { StrategyEngine } from "@papertape/strategy-engine";

/** Components every symbol pipeline shares. */
export interface PipelineComponents {
	indicatorEngine: IndicatorEngine;
	strategyEngine: StrategyEngine;
	broker: PaperBroker;
	hub: BroadcastHub;
}

export interface TickInput extends PipelineComponents {
	tick: Tick;
	/** Once aborted, a tick still settles with the broker but is not published. */
	signal?: AbortSignal;
}

export interface TickResult {
	indicators: IndicatorSnapshot;
	signal: Signal;
	execution: ExecutionResult;
	message: TickMessage;
	published: boolean;
}

export interface SessionHealth {
	ts: string;
	running: boolean;
	symbols: string[];
	lastOkTs: Record<string, string | null>;
	lastError: Record<string, string | null>;
	tickCount: Record<string, number>;
	clients: number;
}
