import type {
	AccountView,
	IndicatorSnapshot,
	OrderRecord,
	Position,
	Signal,
	SignalKind,
	SignalTrigger,
} from "./types";
import { toIsoTimestamp } from "./time";

/**
 * JSON shapes pushed over the live channel and served by the pull endpoint.
 * Field names are snake_case on the wire.
 */

export const LIVE_CHANNEL_PATH = "/ws";

export const CloseCode = {
	normal: 1000,
	abnormal: 1006,
	serviceRestart: 1012,
	keepaliveTimeout: 4000,
} as const;

export type CloseCodeValue = (typeof CloseCode)[keyof typeof CloseCode];

export interface WireIndicators {
	ma_short: number | null;
	ma_long: number | null;
	rsi: number | null;
}

export interface WirePosition {
	symbol: string;
	qty: number;
	avg_price: number;
}

export interface WireOrder {
	id: string;
	symbol: string;
	side: string;
	qty: number;
	price: number;
	status: string;
	reason: string | null;
	ts: string;
}

export interface WireBroker {
	cash: number;
	equity: number;
	positions: WirePosition[];
	last_order: WireOrder | null;
}

export interface TickMessage {
	type: "tick";
	ts: string;
	symbol: string;
	price: number;
	indicators: WireIndicators;
	signal: SignalKind;
	signal_meta: {
		reason: string;
		trigger: SignalTrigger;
	};
	broker: WireBroker;
}

export interface ErrorMessage {
	type: "error";
	ts: string;
	symbol: string;
	error: string;
}

export interface ProviderHealth {
	last_ok_ts: Record<string, string | null>;
	last_error: Record<string, string | null>;
	tick_count: Record<string, number>;
}

export interface SymbolSnapshotEntry {
	tick: { symbol: string; ts: string; price: number } | null;
	indicators: WireIndicators | null;
	signal: SignalKind | null;
}

export interface SnapshotPayload {
	ts: string;
	symbols: string[];
	cash: number;
	equity: number;
	positions: WirePosition[];
	last_order: WireOrder | null;
	last: Record<string, SymbolSnapshotEntry>;
	provider_health: ProviderHealth;
}

export interface SnapshotMessage {
	type: "snapshot";
	data: SnapshotPayload;
}

export interface AckMessage {
	type: "ack";
	ts: string;
	received: string;
}

export type OutboundMessage =
	| SnapshotMessage
	| TickMessage
	| ErrorMessage
	| AckMessage;

export const toWireIndicators = (
	indicators: IndicatorSnapshot
): WireIndicators => ({
	ma_short: indicators.maShort,
	ma_long: indicators.maLong,
	rsi: indicators.rsi,
});

export const toWirePosition = (position: Position): WirePosition => ({
	symbol: position.symbol,
	qty: position.qty,
	avg_price: position.avgPrice,
});

export const toWireOrder = (order: OrderRecord): WireOrder => ({
	id: order.id,
	symbol: order.symbol,
	side: order.side,
	qty: order.qty,
	price: order.price,
	status: order.status,
	reason: order.reason,
	ts: toIsoTimestamp(order.timestamp),
});

export const toWireBroker = (account: AccountView): WireBroker => ({
	cash: account.cash,
	equity: account.equity,
	positions: account.positions.map(toWirePosition),
	last_order: account.lastOrder ? toWireOrder(account.lastOrder) : null,
});

export interface TickMessageInput {
	symbol: string;
	price: number;
	timestamp: number;
	indicators: IndicatorSnapshot;
	signal: Signal;
	account: AccountView;
}

export const buildTickMessage = (input: TickMessageInput): TickMessage => ({
	type: "tick",
	ts: toIsoTimestamp(input.timestamp),
	symbol: input.symbol,
	price: input.price,
	indicators: toWireIndicators(input.indicators),
	signal: input.signal.kind,
	signal_meta: {
		reason: input.signal.reason,
		trigger: input.signal.trigger,
	},
	broker: toWireBroker(input.account),
});

export const buildErrorMessage = (
	symbol: string,
	error: string,
	timestamp: number
): ErrorMessage => ({
	type: "error",
	ts: toIsoTimestamp(timestamp),
	symbol,
	error,
});
