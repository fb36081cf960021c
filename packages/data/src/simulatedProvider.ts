import {
	Clock,
	SimulatedProviderConfig,
	Tick,
	systemClock,
} from "@papertape/core";
import type { TickProvider } from "./types";
import { abortError } from "./utils/sleep";

const MIN_PRICE = 0.01;

type Random = () => number;

const hashSymbol = (symbol: string): number => {
	// FNV-1a
	let hash = 0x811c9dc5;
	for (let i = 0; i < symbol.length; i += 1) {
		hash ^= symbol.charCodeAt(i);
		hash = Math.imul(hash, 0x01000193);
	}
	return hash >>> 0;
};

/** mulberry32: uniform in [0, 1) from a 32-bit seed. */
export const createSeededRandom = (seed: number): Random => {
	let state = seed >>> 0;
	return () => {
		state = (state + 0x6d2b79f5) >>> 0;
		let t = state;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4_294_967_296;
	};
};

const gaussian = (random: Random, mean: number, stdDev: number): number => {
	const u1 = 1 - random();
	const u2 = random();
	const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
	return mean + stdDev * z;
};

interface SymbolWalk {
	price: number;
	random: Random;
}

/**
 * Geometric random walk per symbol. Each symbol draws from its own generator
 * seeded by `seed` and the symbol, so a path does not depend on how calls for
 * different symbols interleave.
 */
export class SimulatedTickProvider implements TickProvider {
	readonly kind = "simulated" as const;
	private readonly walks = new Map<string, SymbolWalk>();
	private readonly baseSeed: number;

	constructor(
		private readonly config: Omit<SimulatedProviderConfig, "type">,
		private readonly clock: Clock = systemClock
	) {
		if (!(config.startPrice > 0)) {
			throw new Error("Simulated provider startPrice must be > 0");
		}
		if (!(config.volatility >= 0)) {
			throw new Error("Simulated provider volatility must be >= 0");
		}
		this.baseSeed =
			config.seed ?? Math.floor(Math.random() * 4_294_967_296);
	}

	async next(symbol: string, signal?: AbortSignal): Promise<Tick> {
		if (signal?.aborted) {
			throw abortError(signal);
		}
		const walk = this.ensureWalk(symbol);
		const change = gaussian(
			walk.random,
			this.config.drift,
			this.config.volatility
		);
		walk.price = Math.max(MIN_PRICE, walk.price * Math.exp(change));
		return { symbol, price: walk.price, timestamp: this.clock() };
	}

	async close(): Promise<void> {
		this.walks.clear();
	}

	private ensureWalk(symbol: string): SymbolWalk {
		let walk = this.walks.get(symbol);
		if (!walk) {
			walk = {
				price: this.config.startPrice,
				random: createSeededRandom(this.baseSeed ^ hashSymbol(symbol)),
			};
			this.walks.set(symbol, walk);
		}
		return walk;
	}
}
