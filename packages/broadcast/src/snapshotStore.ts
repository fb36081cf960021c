import {
	AccountView,
	Clock,
	ErrorMessage,
	SnapshotPayload,
	SymbolSnapshotEntry,
	TickMessage,
	WireBroker,
	systemClock,
	toIsoTimestamp,
	toWireBroker,
} from "@papertape/core";

interface SymbolHealth {
	lastOkTs: string | null;
	lastError: string | null;
	tickCount: number;
}

const emptyEntry = (): SymbolSnapshotEntry => ({
	tick: null,
	indicators: null,
	signal: null,
});

/**
 * Latest composite state for the pull endpoint and for the first message of
 * every new connection. Each tick overwrites the symbol's entry.
 */
export class SnapshotStore {
	private readonly symbols: string[] = [];
	private readonly entries = new Map<string, SymbolSnapshotEntry>();
	private readonly health = new Map<string, SymbolHealth>();
	private account: WireBroker = {
		cash: 0,
		equity: 0,
		positions: [],
		last_order: null,
	};

	constructor(private readonly clock: Clock = systemClock) {}

	trackSymbol(symbol: string): void {
		if (this.symbols.includes(symbol)) {
			return;
		}
		this.symbols.push(symbol);
		this.entries.set(symbol, emptyEntry());
		this.health.set(symbol, { lastOkTs: null, lastError: null, tickCount: 0 });
	}

	untrackSymbol(symbol: string): void {
		const index = this.symbols.indexOf(symbol);
		if (index >= 0) {
			this.symbols.splice(index, 1);
		}
		this.entries.delete(symbol);
		this.health.delete(symbol);
	}

	trackedSymbols(): string[] {
		return [...this.symbols];
	}

	/** Ticks for symbols that are not tracked are ignored. */
	recordTick(message: TickMessage): void {
		if (!this.symbols.includes(message.symbol)) {
			return;
		}
		this.entries.set(message.symbol, {
			tick: { symbol: message.symbol, ts: message.ts, price: message.price },
			indicators: { ...message.indicators },
			signal: message.signal,
		});
		const health = this.ensureHealth(message.symbol);
		health.lastOkTs = message.ts;
		health.lastError = null;
		health.tickCount += 1;
		this.account = message.broker;
	}

	recordError(message: ErrorMessage): void {
		if (!this.symbols.includes(message.symbol)) {
			return;
		}
		this.ensureHealth(message.symbol).lastError = message.error;
	}

	recordAccount(view: AccountView): void {
		this.account = toWireBroker(view);
	}

	toJSON(): SnapshotPayload {
		const last: Record<string, SymbolSnapshotEntry> = {};
		const lastOkTs: Record<string, string | null> = {};
		const lastError: Record<string, string | null> = {};
		const tickCount: Record<string, number> = {};

		for (const symbol of this.symbols) {
			last[symbol] = this.entries.get(symbol) ?? emptyEntry();
			const health = this.ensureHealth(symbol);
			lastOkTs[symbol] = health.lastOkTs;
			lastError[symbol] = health.lastError;
			tickCount[symbol] = health.tickCount;
		}

		return {
			ts: toIsoTimestamp(this.clock()),
			symbols: [...this.symbols],
			cash: this.account.cash,
			equity: this.account.equity,
			positions: this.account.positions.map((position) => ({ ...position })),
			last_order: this.account.last_order,
			last,
			provider_health: {
				last_ok_ts: lastOkTs,
				last_error: lastError,
				tick_count: tickCount,
			},
		};
	}

	clear(): void {
		for (const symbol of this.symbols) {
			this.entries.set(symbol, emptyEntry());
			this.health.set(symbol, { lastOkTs: null, lastError: null, tickCount: 0 });
		}
		this.account = { cash: 0, equity: 0, positions: [], last_order: null };
	}

	private ensureHealth(symbol: string): SymbolHealth {
		let health = this.health.get(symbol);
		if (!health) {
			health = { lastOkTs: null, lastError: null, tickCount: 0 };
			this.health.set(symbol, health);
		}
		return health;
	}
}
