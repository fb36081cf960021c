export type ProviderType = "simulated" | "polled_http";
export type StrategyType = "ma_crossover" | "rsi_threshold";

export interface SimulatedProviderConfig {
	type: "simulated";
	startPrice: number;
	drift: number;
	volatility: number;
	/** `null` seeds from the wall clock, so runs are not reproducible. */
	seed: number | null;
}

export interface PolledHttpProviderConfig {
	type: "polled_http";
	baseUrl: string;
	quotePath: string;
	timeoutMs: number;
	/** Minimum spacing between two upstream calls, across all symbols. */
	minIntervalMs: number;
	maxRetries: number;
	retryBaseDelayMs: number;
	retryMaxDelayMs: number;
	headers: Record<string, string>;
}

export type ProviderConfig = SimulatedProviderConfig | PolledHttpProviderConfig;

export interface MaCrossoverConfig {
	type: "ma_crossover";
	shortPeriod: number;
	longPeriod: number;
}

export interface RsiThresholdConfig {
	type: "rsi_threshold";
	period: number;
	oversold: number;
	overbought: number;
}

export type StrategyConfig = MaCrossoverConfig | RsiThresholdConfig;

export interface IndicatorConfig {
	shortPeriod: number;
	longPeriod: number;
	rsiPeriod: number;
}

export type SizingPolicyConfig =
	| { type: "fraction_of_cash"; fraction: number }
	| { type: "fixed_quantity"; quantity: number };

export interface BrokerConfig {
	startingCash: number;
	sizing: SizingPolicyConfig;
	/** Quantities are floored to a multiple of this unit. */
	lotSize: number;
	/** When false a BUY against an open position is rejected. */
	allowPyramiding: boolean;
}

export interface BroadcastConfig {
	queueCapacity: number;
	keepaliveTimeoutMs: number;
	sweepIntervalMs: number;
}

export interface TraderConfig {
	symbols: string[];
	intervalMs: number;
	provider: ProviderConfig;
	strategy: StrategyConfig;
	indicators: IndicatorConfig;
	broker: BrokerConfig;
	broadcast: BroadcastConfig;
}

type Settings<T> = { [K in keyof Omit<T, "type">]?: unknown };

export interface TraderConfigInput {
	symbols?: unknown;
	intervalMs?: unknown;
	provider?: {
		type?: unknown;
		simulated?: Settings<SimulatedProviderConfig>;
		polledHttp?: Settings<PolledHttpProviderConfig>;
	};
	strategy?: {
		type?: unknown;
		maCrossover?: Settings<MaCrossoverConfig>;
		rsi?: Settings<RsiThresholdConfig>;
	};
	broker?: {
		startingCash?: unknown;
		lotSize?: unknown;
		allowPyramiding?: unknown;
		sizing?: { type?: unknown; fraction?: unknown; quantity?: unknown };
	};
	broadcast?: Settings<BroadcastConfig>;
}

export const DEFAULT_SYMBOLS = ["AAPL"];
export const DEFAULT_INTERVAL_MS = 1_000;

export const DEFAULT_SIMULATED_PROVIDER: SimulatedProviderConfig = {
	type: "simulated",
	startPrice: 100,
	drift: 0,
	volatility: 0.01,
	seed: null,
};

export const DEFAULT_POLLED_HTTP_PROVIDER: PolledHttpProviderConfig = {
	type: "polled_http",
	baseUrl: "https://push2.eastmoney.com",
	quotePath: "/api/qt/stock/get",
	timeoutMs: 5_000,
	minIntervalMs: 250,
	maxRetries: 2,
	retryBaseDelayMs: 200,
	retryMaxDelayMs: 2_000,
	headers: {},
};

export const DEFAULT_MA_CROSSOVER: MaCrossoverConfig = {
	type: "ma_crossover",
	shortPeriod: 10,
	longPeriod: 30,
};

export const DEFAULT_RSI_THRESHOLD: RsiThresholdConfig = {
	type: "rsi_threshold",
	period: 14,
	oversold: 30,
	overbought: 70,
};

export const DEFAULT_BROKER: BrokerConfig = {
	startingCash: 100_000,
	sizing: { type: "fraction_of_cash", fraction: 0.5 },
	lotSize: 1,
	allowPyramiding: false,
};

export const DEFAULT_BROADCAST: BroadcastConfig = {
	queueCapacity: 256,
	keepaliveTimeoutMs: 60_000,
	sweepIntervalMs: 5_000,
};

export class ConfigValidationError extends Error {
	constructor(readonly issues: string[]) {
		super(`Invalid trader config: ${issues.join("; ")}`);
		this.name = "ConfigValidationError";
	}
}

type NumberCheck = (value: number) => string | null;

const positive: NumberCheck = (value) => (value > 0 ? null : "must be > 0");
const nonNegative: NumberCheck = (value) =>
	value >= 0 ? null : "must be >= 0";
const positiveInteger: NumberCheck = (value) =>
	Number.isInteger(value) && value > 0 ? null : "must be a positive integer";
const nonNegativeInteger: NumberCheck = (value) =>
	Number.isInteger(value) && value >= 0
		? null
		: "must be a non-negative integer";
const percentage: NumberCheck = (value) =>
	value >= 0 && value <= 100 ? null : "must be within [0, 100]";

class IssueCollector {
	readonly issues: string[] = [];

	number(
		value: unknown,
		fallback: number,
		field: string,
		check?: NumberCheck
	): number {
		if (value === undefined) {
			return fallback;
		}
		if (typeof value !== "number" || !Number.isFinite(value)) {
			this.issues.push(`${field} must be a finite number`);
			return fallback;
		}
		const problem = check?.(value) ?? null;
		if (problem) {
			this.issues.push(`${field} ${problem}`);
			return fallback;
		}
		return value;
	}

	string(value: unknown, fallback: string, field: string): string {
		if (value === undefined) {
			return fallback;
		}
		if (typeof value !== "string" || !value.trim()) {
			this.issues.push(`${field} must be a non-empty string`);
			return fallback;
		}
		return value.trim();
	}

	boolean(value: unknown, fallback: boolean, field: string): boolean {
		if (value === undefined) {
			return fallback;
		}
		if (typeof value !== "boolean") {
			this.issues.push(`${field} must be a boolean`);
			return fallback;
		}
		return value;
	}

	oneOf<T extends string>(
		value: unknown,
		allowed: readonly T[],
		fallback: T,
		field: string
	): T {
		if (value === undefined) {
			return fallback;
		}
		const match = allowed.find((candidate) => candidate === value);
		if (!match) {
			this.issues.push(`${field} must be one of ${allowed.join(", ")}`);
			return fallback;
		}
		return match;
	}

	add(issue: string): void {
		this.issues.push(issue);
	}
}

const resolveSymbols = (value: unknown, issues: IssueCollector): string[] => {
	if (value === undefined) {
		return [...DEFAULT_SYMBOLS];
	}
	if (!Array.isArray(value)) {
		issues.add("symbols must be an array of strings");
		return [...DEFAULT_SYMBOLS];
	}
	const symbols: string[] = [];
	for (const entry of value) {
		if (typeof entry !== "string" || !entry.trim()) {
			issues.add("symbols must only contain non-empty strings");
			continue;
		}
		const symbol = entry.trim();
		if (!symbols.includes(symbol)) {
			symbols.push(symbol);
		}
	}
	if (!symbols.length) {
		issues.add("symbols must list at least one symbol");
	}
	return symbols;
};

const resolveHeaders = (
	value: unknown,
	issues: IssueCollector
): Record<string, string> => {
	if (value === undefined) {
		return {};
	}
	if (!value || typeof value !== "object" || Array.isArray(value)) {
		issues.add("provider.polledHttp.headers must be an object");
		return {};
	}
	const headers: Record<string, string> = {};
	for (const [key, header] of Object.entries(value)) {
		if (typeof header !== "string") {
			issues.add(`provider.polledHttp.headers.${key} must be a string`);
			continue;
		}
		headers[key] = header;
	}
	return headers;
};

const resolveProvider = (
	input: TraderConfigInput["provider"],
	issues: IssueCollector
): ProviderConfig => {
	const type = issues.oneOf<ProviderType>(
		input?.type,
		["simulated", "polled_http"],
		"simulated",
		"provider.type"
	);

	if (type === "simulated") {
		const raw = input?.simulated ?? {};
		const defaults = DEFAULT_SIMULATED_PROVIDER;
		const seed =
			raw.seed === undefined || raw.seed === null
				? null
				: issues.number(raw.seed, 0, "provider.simulated.seed", (value) =>
						Number.isInteger(value) ? null : "must be an integer"
				  );
		return {
			type,
			startPrice: issues.number(
				raw.startPrice,
				defaults.startPrice,
				"provider.simulated.startPrice",
				positive
			),
			drift: issues.number(raw.drift, defaults.drift, "provider.simulated.drift"),
			volatility: issues.number(
				raw.volatility,
				defaults.volatility,
				"provider.simulated.volatility",
				nonNegative
			),
			seed,
		};
	}

	const raw = input?.polledHttp ?? {};
	const defaults = DEFAULT_POLLED_HTTP_PROVIDER;
	const retryBaseDelayMs = issues.number(
		raw.retryBaseDelayMs,
		defaults.retryBaseDelayMs,
		"provider.polledHttp.retryBaseDelayMs",
		positive
	);
	const retryMaxDelayMs = issues.number(
		raw.retryMaxDelayMs,
		defaults.retryMaxDelayMs,
		"provider.polledHttp.retryMaxDelayMs",
		positive
	);
	if (retryMaxDelayMs < retryBaseDelayMs) {
		issues.add(
			"provider.polledHttp.retryMaxDelayMs must be >= retryBaseDelayMs"
		);
	}
	return {
		type,
		baseUrl: issues.string(
			raw.baseUrl,
			defaults.baseUrl,
			"provider.polledHttp.baseUrl"
		),
		quotePath: issues.string(
			raw.quotePath,
			defaults.quotePath,
			"provider.polledHttp.quotePath"
		),
		timeoutMs: issues.number(
			raw.timeoutMs,
			defaults.timeoutMs,
			"provider.polledHttp.timeoutMs",
			positive
		),
		minIntervalMs: issues.number(
			raw.minIntervalMs,
			defaults.minIntervalMs,
			"provider.polledHttp.minIntervalMs",
			nonNegative
		),
		maxRetries: issues.number(
			raw.maxRetries,
			defaults.maxRetries,
			"provider.polledHttp.maxRetries",
			nonNegativeInteger
		),
		retryBaseDelayMs,
		retryMaxDelayMs,
		headers: resolveHeaders(raw.headers, issues),
	};
};

const resolveStrategies = (
	input: TraderConfigInput["strategy"],
	issues: IssueCollector
): { strategy: StrategyConfig; indicators: IndicatorConfig } => {
	const type = issues.oneOf<StrategyType>(
		input?.type,
		["ma_crossover", "rsi_threshold"],
		"ma_crossover",
		"strategy.type"
	);

	const ma = input?.maCrossover ?? {};
	const maCrossover: MaCrossoverConfig = {
		type: "ma_crossover",
		shortPeriod: issues.number(
			ma.shortPeriod,
			DEFAULT_MA_CROSSOVER.shortPeriod,
			"strategy.maCrossover.shortPeriod",
			positiveInteger
		),
		longPeriod: issues.number(
			ma.longPeriod,
			DEFAULT_MA_CROSSOVER.longPeriod,
			"strategy.maCrossover.longPeriod",
			positiveInteger
		),
	};
	if (maCrossover.shortPeriod >= maCrossover.longPeriod) {
		issues.add("strategy.maCrossover.shortPeriod must be < longPeriod");
	}

	const rsi = input?.rsi ?? {};
	const rsiThreshold: RsiThresholdConfig = {
		type: "rsi_threshold",
		period: issues.number(
			rsi.period,
			DEFAULT_RSI_THRESHOLD.period,
			"strategy.rsi.period",
			positiveInteger
		),
		oversold: issues.number(
			rsi.oversold,
			DEFAULT_RSI_THRESHOLD.oversold,
			"strategy.rsi.oversold",
			percentage
		),
		overbought: issues.number(
			rsi.overbought,
			DEFAULT_RSI_THRESHOLD.overbought,
			"strategy.rsi.overbought",
			percentage
		),
	};
	if (rsiThreshold.oversold >= rsiThreshold.overbought) {
		issues.add("strategy.rsi.oversold must be < overbought");
	}

	return {
		strategy: type === "ma_crossover" ? maCrossover : rsiThreshold,
		indicators: {
			shortPeriod: maCrossover.shortPeriod,
			longPeriod: maCrossover.longPeriod,
			rsiPeriod: rsiThreshold.period,
		},
	};
};

const resolveSizing = (
	input: NonNullable<TraderConfigInput["broker"]>["sizing"],
	issues: IssueCollector
): SizingPolicyConfig => {
	if (input === undefined) {
		return { ...DEFAULT_BROKER.sizing };
	}
	const type = issues.oneOf(
		input.type,
		["fraction_of_cash", "fixed_quantity"] as const,
		"fraction_of_cash",
		"broker.sizing.type"
	);
	if (type === "fixed_quantity") {
		return {
			type,
			quantity: issues.number(
				input.quantity,
				1,
				"broker.sizing.quantity",
				positive
			),
		};
	}
	return {
		type,
		fraction: issues.number(
			input.fraction,
			0.5,
			"broker.sizing.fraction",
			(value) => (value > 0 && value <= 1 ? null : "must be within (0, 1]")
		),
	};
};

/**
 * Validates a structured config object and fills every omitted field with
 * its default. Throws a single `ConfigValidationError` naming all problems.
 */
export const resolveTraderConfig = (
	input: TraderConfigInput = {}
): TraderConfig => {
	const issues = new IssueCollector();
	const symbols = resolveSymbols(input.symbols, issues);
	const intervalMs = issues.number(
		input.intervalMs,
		DEFAULT_INTERVAL_MS,
		"intervalMs",
		positive
	);
	const provider = resolveProvider(input.provider, issues);
	const { strategy, indicators } = resolveStrategies(input.strategy, issues);

	const broker: BrokerConfig = {
		startingCash: issues.number(
			input.broker?.startingCash,
			DEFAULT_BROKER.startingCash,
			"broker.startingCash",
			nonNegative
		),
		sizing: resolveSizing(input.broker?.sizing, issues),
		lotSize: issues.number(
			input.broker?.lotSize,
			DEFAULT_BROKER.lotSize,
			"broker.lotSize",
			positive
		),
		allowPyramiding: issues.boolean(
			input.broker?.allowPyramiding,
			DEFAULT_BROKER.allowPyramiding,
			"broker.allowPyramiding"
		),
	};

	const broadcast: BroadcastConfig = {
		queueCapacity: issues.number(
			input.broadcast?.queueCapacity,
			DEFAULT_BROADCAST.queueCapacity,
			"broadcast.queueCapacity",
			positiveInteger
		),
		keepaliveTimeoutMs: issues.number(
			input.broadcast?.keepaliveTimeoutMs,
			DEFAULT_BROADCAST.keepaliveTimeoutMs,
			"broadcast.keepaliveTimeoutMs",
			positive
		),
		sweepIntervalMs: issues.number(
			input.broadcast?.sweepIntervalMs,
			DEFAULT_BROADCAST.sweepIntervalMs,
			"broadcast.sweepIntervalMs",
			positive
		),
	};

	if (issues.issues.length) {
		throw new ConfigValidationError(issues.issues);
	}

	return {
		symbols,
		intervalMs,
		provider,
		strategy,
		indicators,
		broker,
		broadcast,
	};
};
