import type { ProviderEvent, ProviderType, Tick } from "@papertape/core";

/**
 * Source of the latest price for one symbol per call. Implementations must
 * honour `signal`: an aborted call rejects without touching shared state.
 */
export interface TickProvider {
	readonly kind: ProviderType;
	next(symbol: string, signal?: AbortSignal): Promise<Tick>;
	close(): Promise<void>;
}

export type ProviderEventHandler = (event: ProviderEvent) => void | Promise<void>;

export interface TickSubscriptionOptions {
	symbol: string;
	intervalMs: number;
}
