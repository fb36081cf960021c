import axios, { AxiosAdapter, AxiosInstance } from "axios";
import {
	Clock,
	PolledHttpProviderConfig,
	Tick,
	createLogger,
	systemClock,
} from "@papertape/core";
import { ProviderRequestError } from "./errors";
import { RateLimiter } from "./rateLimiter";
import { withRetry } from "./retry";
import { toSecId } from "./symbols";
import type { TickProvider } from "./types";

const QUOTE_FIELDS = "f43,f57,f58";
// quotes above this are integer prices scaled by 100
const SCALED_PRICE_THRESHOLD = 10_000;

const httpLogger = createLogger("data:polled-http");

interface QuoteResponse {
	data?: {
		f43?: number | string | null;
	} | null;
}

export interface PolledHttpProviderOptions {
	clock?: Clock;
	/** Replaces the network transport, e.g. with an in-process fake. */
	adapter?: AxiosAdapter;
	rateLimiter?: RateLimiter;
}

export const normalizeQuotePrice = (raw: unknown): number => {
	const price = typeof raw === "string" ? Number(raw) : raw;
	if (typeof price !== "number" || !Number.isFinite(price) || price <= 0) {
		throw new ProviderRequestError(
			`Quote has no usable price: ${JSON.stringify(raw)}`,
			false
		);
	}
	return price > SCALED_PRICE_THRESHOLD ? price / 100 : price;
};

const toProviderError = (error: unknown): unknown => {
	if (!axios.isAxiosError(error) || axios.isCancel(error)) {
		return error;
	}
	const status = error.response?.status ?? null;
	if (status === null) {
		return new ProviderRequestError(error.message, true);
	}
	const retryable = status === 429 || status >= 500;
	return new ProviderRequestError(
		`Quote request failed with HTTP ${status}`,
		retryable,
		status
	);
};

const isRetryable = (error: unknown): boolean =>
	error instanceof ProviderRequestError && error.retryable;

/**
 * Latest price per call from a polled quote endpoint. All symbols share one
 * rate limiter, and each attempt (retries included) takes a slot from it.
 */
export class PolledHttpTickProvider implements TickProvider {
	readonly kind = "polled_http" as const;
	private readonly http: AxiosInstance;
	private readonly limiter: RateLimiter;
	private readonly clock: Clock;

	constructor(
		private readonly config: Omit<PolledHttpProviderConfig, "type">,
		options: PolledHttpProviderOptions = {}
	) {
		this.clock = options.clock ?? systemClock;
		this.limiter =
			options.rateLimiter ?? new RateLimiter(config.minIntervalMs, this.clock);
		this.http = axios.create({
			baseURL: config.baseUrl,
			timeout: config.timeoutMs,
			headers: {
				Accept: "application/json,text/plain,*/*",
				...config.headers,
			},
			adapter: options.adapter,
		});
	}

	async next(symbol: string, signal?: AbortSignal): Promise<Tick> {
		const secid = toSecId(symbol);
		const price = await withRetry(() => this.fetchPrice(secid, signal), {
			maxRetries: this.config.maxRetries,
			baseDelayMs: this.config.retryBaseDelayMs,
			maxDelayMs: this.config.retryMaxDelayMs,
			signal,
			isRetryable,
			onRetry: (error, attempt, delayMs) => {
				httpLogger.warn("quote_request_retry", {
					symbol,
					attempt,
					delayMs,
					message: error instanceof Error ? error.message : String(error),
				});
			},
		});
		return { symbol, price, timestamp: this.clock() };
	}

	async close(): Promise<void> {
		// axios keeps no connection state of its own
	}

	private async fetchPrice(
		secid: string,
		signal?: AbortSignal
	): Promise<number> {
		await this.limiter.acquire(signal);
		let body: QuoteResponse;
		try {
			const response = await this.http.get<QuoteResponse>(
				this.config.quotePath,
				{
					params: { secid, fields: QUOTE_FIELDS },
					signal,
				}
			);
			body = response.data;
		} catch (error) {
			throw toProviderError(error);
		}

		const quote = body?.data;
		if (!quote) {
			throw new ProviderRequestError(
				`Empty quote data for ${secid}`,
				false
			);
		}
		return normalizeQuotePrice(quote.f43);
	}
}
