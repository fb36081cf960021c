import { readFileSync } from "node:fs";
import path from "node:path";
import {
	TraderConfig,
	TraderConfigInput,
	resolveTraderConfig,
} from "@papertape/core";

export const DEFAULT_PORT = 3000;

export interface ServerConfig {
	trader: TraderConfig;
	port: number;
	configPath: string | null;
}

export interface LoadServerConfigOptions {
	env?: NodeJS.ProcessEnv;
	cwd?: string;
	readFile?: (filePath: string) => string;
}

type JsonRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonRecord =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const asRecord = (value: unknown): JsonRecord | undefined =>
	isRecord(value) ? value : undefined;

/** Maps parsed JSON onto the resolver's input shape; values stay unchecked. */
export const toConfigInput = (raw: unknown): TraderConfigInput => {
	if (!isRecord(raw)) {
		throw new Error("Trader config file must contain a JSON object");
	}
	const provider = asRecord(raw.provider);
	const strategy = asRecord(raw.strategy);
	const broker = asRecord(raw.broker);
	return {
		symbols: raw.symbols,
		intervalMs: raw.intervalMs,
		provider: provider && {
			type: provider.type,
			simulated: asRecord(provider.simulated),
			polledHttp: asRecord(provider.polledHttp),
		},
		strategy: strategy && {
			type: strategy.type,
			maCrossover: asRecord(strategy.maCrossover),
			rsi: asRecord(strategy.rsi),
		},
		broker: broker && {
			startingCash: broker.startingCash,
			lotSize: broker.lotSize,
			allowPyramiding: broker.allowPyramiding,
			sizing: asRecord(broker.sizing),
		},
		broadcast: asRecord(raw.broadcast),
	};
};

const parseNumber = (value: string): number =>
	value.trim() === "" ? Number.NaN : Number(value);

/** Environment variables win over the file for the fields they name. */
export const applyEnvOverrides = (
	input: TraderConfigInput,
	env: NodeJS.ProcessEnv
): TraderConfigInput => {
	const next: TraderConfigInput = { ...input };
	if (env.TRADER_SYMBOLS !== undefined) {
		next.symbols = env.TRADER_SYMBOLS.split(",")
			.map((symbol) => symbol.trim())
			.filter(Boolean);
	}
	if (env.TRADER_INTERVAL_MS !== undefined) {
		next.intervalMs = parseNumber(env.TRADER_INTERVAL_MS);
	}
	if (env.TRADER_STRATEGY !== undefined) {
		next.strategy = { ...input.strategy, type: env.TRADER_STRATEGY.trim() };
	}
	if (env.TRADER_PROVIDER !== undefined) {
		next.provider = { ...input.provider, type: env.TRADER_PROVIDER.trim() };
	}
	return next;
};

export const resolvePort = (raw: string | undefined): number => {
	if (raw === undefined || raw.trim() === "") {
		return DEFAULT_PORT;
	}
	const port = Number(raw);
	if (!Number.isInteger(port) || port < 0 || port > 65_535) {
		throw new Error(`PORT must be an integer within [0, 65535], got ${raw}`);
	}
	return port;
};

export const loadServerConfig = (
	options: LoadServerConfigOptions = {}
): ServerConfig => {
	const env = options.env ?? process.env;
	const readFile =
		options.readFile ?? ((filePath: string) => readFileSync(filePath, "utf8"));

	let input: TraderConfigInput = {};
	let configPath: string | null = null;
	const configured = env.PAPERTAPE_CONFIG?.trim();
	if (configured) {
		configPath = path.resolve(options.cwd ?? process.cwd(), configured);
		let parsed: unknown;
		try {
			parsed = JSON.parse(readFile(configPath));
		} catch (error) {
			throw new Error(
				`Unable to read trader config ${configPath}: ${
					error instanceof Error ? error.message : String(error)
				}`
			);
		}
		input = toConfigInput(parsed);
	}

	return {
		trader: resolveTraderConfig(applyEnvOverrides(input, env)),
		port: resolvePort(env.PORT),
		configPath,
	};
};
