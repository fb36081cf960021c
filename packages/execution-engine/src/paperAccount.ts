import type { AccountView, OrderRecord, Position } from "@papertape/core";

export interface ClosedTrade {
	symbol: string;
	qty: number;
	entryPrice: number;
	exitPrice: number;
	realizedPnl: number;
	timestamp: number;
}

export interface PaperAccountSnapshot {
	startingCash: number;
	cash: number;
	equity: number;
	realizedPnl: number;
	positions: Position[];
	lastOrder: OrderRecord | null;
	trades: {
		total: number;
		wins: number;
		losses: number;
		breakeven: number;
	};
	lastTrade?: ClosedTrade;
}

/**
 * Long-only cash account. Equity is never stored: it is derived from cash
 * and the latest mark of every held symbol each time it is read.
 */
export class PaperAccount {
	private cash: number;
	private readonly positions = new Map<string, Position>();
	private readonly marks = new Map<string, number>();
	private lastOrder: OrderRecord | null = null;
	private realizedPnl = 0;
	private trades = {
		total: 0,
		wins: 0,
		losses: 0,
		breakeven: 0,
	};
	private lastTrade?: ClosedTrade;

	constructor(private readonly startingCash: number) {
		if (!Number.isFinite(startingCash) || startingCash < 0) {
			throw new Error("PaperAccount starting cash must be >= 0");
		}
		this.cash = startingCash;
	}

	get availableCash(): number {
		return this.cash;
	}

	markPrice(symbol: string, price: number): void {
		this.marks.set(symbol, price);
	}

	latestPrice(symbol: string): number | null {
		return this.marks.get(symbol) ?? null;
	}

	getPosition(symbol: string): Position {
		const position = this.positions.get(symbol);
		return position ? { ...position } : { symbol, qty: 0, avgPrice: 0 };
	}

	equity(): number {
		let equity = this.cash;
		for (const position of this.positions.values()) {
			const mark = this.marks.get(position.symbol) ?? position.avgPrice;
			equity += position.qty * mark;
		}
		return equity;
	}

	applyBuy(symbol: string, qty: number, price: number): Position {
		const cost = qty * price;
		const current = this.getPosition(symbol);
		const nextQty = current.qty + qty;
		const next: Position = {
			symbol,
			qty: nextQty,
			avgPrice: (current.avgPrice * current.qty + cost) / nextQty,
		};
		this.positions.set(symbol, next);
		this.cash -= cost;
		return { ...next };
	}

	applySell(symbol: string, price: number, timestamp: number): ClosedTrade {
		const current = this.getPosition(symbol);
		const realizedPnl = (price - current.avgPrice) * current.qty;
		this.cash += current.qty * price;
		this.positions.set(symbol, { symbol, qty: 0, avgPrice: 0 });

		const trade: ClosedTrade = {
			symbol,
			qty: current.qty,
			entryPrice: current.avgPrice,
			exitPrice: price,
			realizedPnl,
			timestamp,
		};
		this.registerClosedTrade(trade);
		return trade;
	}

	recordOrder(order: OrderRecord): void {
		this.lastOrder = { ...order };
	}

	view(): AccountView {
		return {
			cash: this.cash,
			equity: this.equity(),
			positions: Array.from(this.positions.values(), (position) => ({
				...position,
			})),
			lastOrder: this.lastOrder ? { ...this.lastOrder } : null,
		};
	}

	snapshot(): PaperAccountSnapshot {
		const view = this.view();
		return {
			startingCash: this.startingCash,
			cash: view.cash,
			equity: view.equity,
			realizedPnl: this.realizedPnl,
			positions: view.positions,
			lastOrder: view.lastOrder,
			trades: { ...this.trades },
			lastTrade: this.lastTrade ? { ...this.lastTrade } : undefined,
		};
	}

	private registerClosedTrade(trade: ClosedTrade): void {
		this.realizedPnl += trade.realizedPnl;
		this.trades.total += 1;

		if (trade.realizedPnl > 0) {
			this.trades.wins += 1;
		} else if (trade.realizedPnl < 0) {
			this.trades.losses += 1;
		} else {
			this.trades.breakeven += 1;
		}

		this.lastTrade = trade;
	}
}
