export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogRecord {
	level: LogLevel;
	event: string;
	module: string;
	ts?: string;
	[key: string]: unknown;
}

/** Where formatted lines end up. Defaults to the console. */
export interface LogSink {
	line(text: string): void;
	table(rows: Record<string, unknown>[]): void;
}

const consoleSink: LogSink = {
	line: (text) => console.log(text),
	table: (rows) => console.table(rows),
};

let sink: LogSink = consoleSink;

export const setLogSink = (next: LogSink | null): void => {
	sink = next ?? consoleSink;
};

const LEVELS: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

interface LoggerSettings {
	minLevel: LogLevel;
	modules: Set<string> | null;
	pretty: boolean;
	json: boolean;
}

export const readLoggerSettings = (
	env: NodeJS.ProcessEnv = process.env
): LoggerSettings => {
	const level = (env.LOG_LEVEL ?? "").trim().toLowerCase();
	const modules = (env.LOG_MODULE ?? "")
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	const pretty = env.LOG_PRETTY === "true" || env.NODE_ENV === "development";
	return {
		minLevel: isLogLevel(level) ? level : "info",
		modules: modules.length ? new Set(modules) : null,
		pretty,
		json: env.LOG_JSON === "true" || !pretty,
	};
};

let settings = readLoggerSettings();

/** Re-reads LOG_* variables, e.g. after `.env` files have been applied. */
export const refreshLoggerSettings = (
	env: NodeJS.ProcessEnv = process.env
): void => {
	settings = readLoggerSettings(env);
};

const enabled = (level: LogLevel, moduleName: string): boolean =>
	LEVELS[level] >= LEVELS[settings.minLevel] &&
	(settings.modules === null || settings.modules.has(moduleName));

export function log(record: LogRecord): void {
	if (!enabled(record.level, record.module)) {
		return;
	}
	const stamped: LogRecord = { ts: new Date().toISOString(), ...record };

	if (settings.pretty) {
		writePretty(stamped);
	}
	if (settings.json) {
		writeJson(stamped);
	}
}

export interface ModuleLogger {
	log: (level: LogLevel, event: string, data?: Record<string, unknown>) => void;
	debug: (event: string, data?: Record<string, unknown>) => void;
	info: (event: string, data?: Record<string, unknown>) => void;
	warn: (event: string, data?: Record<string, unknown>) => void;
	error: (event: string, data?: Record<string, unknown>) => void;
}

export const createLogger = (moduleName: string): ModuleLogger => {
	const emit = (
		level: LogLevel,
		event: string,
		data: Record<string, unknown> = {}
	): void => log({ ...data, level, event, module: moduleName });
	return {
		log: emit,
		debug: (event, data) => emit("debug", event, data),
		info: (event, data) => emit("info", event, data),
		warn: (event, data) => emit("warn", event, data),
		error: (event, data) => emit("error", event, data),
	};
};

const writeJson = (record: LogRecord): void => {
	try {
		sink.line(JSON.stringify(toLoggable(record, new WeakSet())));
	} catch (err) {
		sink.line(
			JSON.stringify({
				ts: record.ts,
				level: "error",
				event: "logging_error",
				module: "logger",
				error: err instanceof Error ? err.message : "serialization_failed",
			})
		);
	}
};

const toLoggable = (value: unknown, seen: WeakSet<object>): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (value === null || typeof value !== "object") {
		return value;
	}
	if (seen.has(value)) {
		return "[circular]";
	}
	seen.add(value);
	const result = Array.isArray(value)
		? value.map((item) => toLoggable(item, seen))
		: Object.fromEntries(
				Object.entries(value).map(([key, nested]) => [
					key,
					toLoggable(nested, seen),
				])
			);
	seen.delete(value);
	return result;
};

// pretty mode renders a one-row table for the events worth eyeballing
const PRETTY_TABLES: Record<string, (data: Record<string, unknown>) => Record<string, unknown>> = {
	strategy_decision: (data) =>
		pick(data, ["symbol", "timestamp", "price", "signal", "trigger", "reason"]),
	order_result: (data) => ({
		...pick(data, ["symbol", "side", "qty", "price", "status"]),
		reason: data.reason ?? "-",
	}),
	paper_account_snapshot: (data) => {
		const snapshot = asRecord(data.snapshot);
		const trades = asRecord(snapshot.trades);
		return {
			...pick(snapshot, ["startingCash", "cash", "equity", "realizedPnl"]),
			tradesTotal: trades.total,
			tradesWins: trades.wins,
			tradesLosses: trades.losses,
			tradesBreakeven: trades.breakeven,
		};
	},
};

const writePretty = (record: LogRecord): void => {
	const { level, event, module, ts, ...rest } = record;
	sink.line(`[${ts}] [${level.toUpperCase()}] ${module}:${event}`);
	const render = PRETTY_TABLES[event];
	if (!render) {
		return;
	}
	try {
		sink.table([render(rest)]);
	} catch (error) {
		sink.line(
			`[logger] pretty render error: ${
				error instanceof Error ? error.message : "unknown"
			}`
		);
	}
};

const pick = (
	data: Record<string, unknown>,
	keys: readonly string[]
): Record<string, unknown> =>
	Object.fromEntries(keys.map((key) => [key, data[key]]));

const asRecord = (value: unknown): Record<string, unknown> =>
	value !== null && typeof value === "object" && !Array.isArray(value)
		? Object.fromEntries(Object.entries(value))
		: {};
