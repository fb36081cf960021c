import {
	AccountView,
	Clock,
	OrderRecord,
	OrderRejectReason,
	OrderSide,
	Signal,
	createLogger,
	systemClock,
	toIsoTimestamp,
} from "@papertape/core";
import { PaperAccount, PaperAccountSnapshot } from "./paperAccount";
import type { SizingPolicy } from "./sizing";

const paperLogger = createLogger("execution-engine:paper");

/**
 * Raised when a second mutation starts while one is in flight. This is a
 * programming error; the broker refuses all further work once it is seen.
 */
export class AccountWriterViolationError extends Error {
	constructor(detail: string) {
		super(`Account single-writer invariant violated: ${detail}`);
		this.name = "AccountWriterViolationError";
	}
}

export type OrderHook = (order: OrderRecord, account: AccountView) => void;

export interface PaperBrokerOptions {
	account: PaperAccount;
	sizing: SizingPolicy;
	lotSize?: number;
	allowPyramiding?: boolean;
	clock?: Clock;
	/** Called inside the mutation with every filled or rejected order. */
	onOrder?: OrderHook;
}

export interface ExecutionResult {
	signal: Signal;
	price: number;
	order: OrderRecord | null;
	account: AccountView;
}

/**
 * Sole writer of the paper account. Every mutation, including the per-tick
 * mark, goes through `submit()`, which chains onto one promise so symbol
 * pipelines running side by side never interleave account updates.
 */
export class PaperBroker {
	private readonly account: PaperAccount;
	private readonly sizing: SizingPolicy;
	private readonly lotSize: number;
	private readonly allowPyramiding: boolean;
	private readonly clock: Clock;
	private queue: Promise<void> = Promise.resolve();
	private writing = false;
	private halted: AccountWriterViolationError | null = null;
	private orderSeq = 0;

	constructor(private readonly options: PaperBrokerOptions) {
		this.account = options.account;
		this.sizing = options.sizing;
		this.lotSize = options.lotSize ?? 1;
		this.allowPyramiding = options.allowPyramiding ?? false;
		this.clock = options.clock ?? systemClock;
	}

	get isHalted(): boolean {
		return this.halted !== null;
	}

	submit(signal: Signal, price: number): Promise<ExecutionResult> {
		if (this.halted) {
			return Promise.reject(this.halted);
		}
		const run = this.queue.then(() => this.execute(signal, price));
		// the caller receives run's rejection; the chain itself must keep going
		this.queue = run.then(
			() => undefined,
			() => undefined
		);
		return run;
	}

	/**
	 * Applies one signal synchronously. Prefer `submit()`; calling this while
	 * another mutation is running trips the single-writer check.
	 */
	execute(signal: Signal, price: number): ExecutionResult {
		if (this.halted) {
			throw this.halted;
		}
		if (this.writing) {
			this.halt(
				new AccountWriterViolationError(
					`${signal.kind} ${signal.symbol} started during another mutation`
				)
			);
		}

		this.writing = true;
		try {
			this.account.markPrice(signal.symbol, price);
			let order: OrderRecord | null = null;
			if (signal.kind === "BUY") {
				order = this.buy(signal, price);
			} else if (signal.kind === "SELL") {
				order = this.sell(signal, price);
			}
			if (order) {
				this.account.recordOrder(order);
				this.logOrder(order);
				this.options.onOrder?.(order, this.account.view());
			}
			return { signal, price, order, account: this.account.view() };
		} finally {
			this.writing = false;
		}
	}

	view(): AccountView {
		return this.account.view();
	}

	snapshot(): PaperAccountSnapshot {
		return this.account.snapshot();
	}

	private buy(signal: Signal, price: number): OrderRecord {
		const position = this.account.getPosition(signal.symbol);
		if (position.qty > 0 && !this.allowPyramiding) {
			return this.reject(signal, "BUY", 0, price, "position_already_open");
		}

		const cash = this.account.availableCash;
		const qty = this.sizing.quantityFor({
			cash,
			price,
			lotSize: this.lotSize,
		});
		if (qty <= 0 || qty * price > cash) {
			return this.reject(signal, "BUY", qty, price, "insufficient_cash");
		}

		this.account.applyBuy(signal.symbol, qty, price);
		return this.fill(signal, "BUY", qty, price);
	}

	private sell(signal: Signal, price: number): OrderRecord {
		const position = this.account.getPosition(signal.symbol);
		if (position.qty <= 0) {
			return this.reject(signal, "SELL", 0, price, "no_position");
		}

		const trade = this.account.applySell(signal.symbol, price, this.clock());
		const order = this.fill(signal, "SELL", trade.qty, price);
		paperLogger.info("paper_account_snapshot", {
			symbol: signal.symbol,
			snapshot: this.account.snapshot(),
		});
		return order;
	}

	private fill(
		signal: Signal,
		side: OrderSide,
		qty: number,
		price: number
	): OrderRecord {
		return this.buildOrder(signal, side, qty, price, "filled", null);
	}

	private reject(
		signal: Signal,
		side: OrderSide,
		qty: number,
		price: number,
		reason: OrderRejectReason
	): OrderRecord {
		return this.buildOrder(signal, side, qty, price, "rejected", reason);
	}

	private buildOrder(
		signal: Signal,
		side: OrderSide,
		qty: number,
		price: number,
		status: OrderRecord["status"],
		reason: string | null
	): OrderRecord {
		this.orderSeq += 1;
		return {
			id: `ord-${this.orderSeq}`,
			symbol: signal.symbol,
			side,
			qty,
			price,
			status,
			reason,
			timestamp: this.clock(),
		};
	}

	private halt(error: AccountWriterViolationError): never {
		this.halted = error;
		paperLogger.error("account_writer_violation", {
			message: error.message,
			stack: error.stack,
		});
		throw error;
	}

	private logOrder(order: OrderRecord): void {
		paperLogger.info("order_result", {
			orderId: order.id,
			symbol: order.symbol,
			side: order.side,
			qty: order.qty,
			price: order.price,
			status: order.status,
			reason: order.reason,
			timestamp: toIsoTimestamp(order.timestamp),
		});
	}
}
