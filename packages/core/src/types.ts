export * from "./time";

export interface Tick {
	readonly symbol: string;
	readonly price: number;
	/** UTC epoch milliseconds */
	readonly timestamp: number;
}

export interface TickEvent {
	type: "tick";
	tick: Tick;
}

export interface ProviderErrorEvent {
	type: "error";
	symbol: string;
	error: string;
	timestamp: number;
}

export type ProviderEvent = TickEvent | ProviderErrorEvent;

/**
 * Latest indicator values for one symbol. `null` means the window has not
 * filled yet; it is never coerced to zero.
 */
export interface IndicatorSnapshot {
	maShort: number | null;
	maLong: number | null;
	rsi: number | null;
}

export type SignalKind = "BUY" | "SELL" | "HOLD";
export type ActionSignalKind = Exclude<SignalKind, "HOLD">;

export type SignalTrigger =
	| "ma_cross_up"
	| "ma_cross_down"
	| "rsi_cross_below_oversold"
	| "rsi_cross_above_overbought"
	| "insufficient_data"
	| "no_cross";

export interface Signal {
	symbol: string;
	kind: SignalKind;
	trigger: SignalTrigger;
	reason: string;
	timestamp: number;
}

export interface Position {
	symbol: string;
	qty: number;
	avgPrice: number;
}

export type OrderSide = "BUY" | "SELL";
export type OrderStatus = "filled" | "rejected";

export type OrderRejectReason =
	| "insufficient_cash"
	| "no_position"
	| "position_already_open";

export interface OrderRecord {
	id: string;
	symbol: string;
	side: OrderSide;
	qty: number;
	price: number;
	status: OrderStatus;
	reason: string | null;
	timestamp: number;
}

export interface AccountView {
	cash: number;
	equity: number;
	positions: Position[];
	lastOrder: OrderRecord | null;
}
