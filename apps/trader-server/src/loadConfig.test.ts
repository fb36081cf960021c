import { describe, expect, it } from "vitest";
import { ConfigValidationError } from "@papertape/core";
import {
	DEFAULT_PORT,
	applyEnvOverrides,
	loadServerConfig,
	resolvePort,
	toConfigInput,
} from "./loadConfig";

const fileContents = JSON.stringify({
	symbols: ["600000.SH"],
	intervalMs: 3_000,
	provider: {
		type: "polled_http",
		polledHttp: { minIntervalMs: 500 },
	},
	strategy: { type: "rsi_threshold", rsi: { period: 6 } },
	broker: { startingCash: 50_000, sizing: { type: "fixed_quantity", quantity: 100 } },
});

describe("loadServerConfig", () => {
	it("uses defaults without a config file", () => {
		const { trader, port, configPath } = loadServerConfig({ env: {} });
		expect(trader.symbols).toEqual(["AAPL"]);
		expect(trader.provider.type).toBe("simulated");
		expect(port).toBe(DEFAULT_PORT);
		expect(configPath).toBeNull();
	});

	it("reads the file named by PAPERTAPE_CONFIG", () => {
		const reads: string[] = [];
		const { trader, configPath } = loadServerConfig({
			env: { PAPERTAPE_CONFIG: "config/trader.json" },
			cwd: "/srv/papertape",
			readFile: (filePath) => {
				reads.push(filePath);
				return fileContents;
			},
		});

		expect(reads).toEqual(["/srv/papertape/config/trader.json"]);
		expect(configPath).toBe("/srv/papertape/config/trader.json");
		expect(trader.symbols).toEqual(["600000.SH"]);
		expect(trader.intervalMs).toBe(3_000);
		expect(trader.strategy).toEqual({
			type: "rsi_threshold",
			period: 6,
			oversold: 30,
			overbought: 70,
		});
		expect(trader.broker.startingCash).toBe(50_000);
		expect(trader.broker.sizing).toEqual({ type: "fixed_quantity", quantity: 100 });
		if (trader.provider.type === "polled_http") {
			expect(trader.provider.minIntervalMs).toBe(500);
		}
	});

	it("lets environment variables override the file", () => {
		const { trader, port } = loadServerConfig({
			env: {
				PAPERTAPE_CONFIG: "/etc/trader.json",
				TRADER_SYMBOLS: "AAPL, MSFT,,",
				TRADER_INTERVAL_MS: "250",
				TRADER_STRATEGY: "ma_crossover",
				TRADER_PROVIDER: "simulated",
				PORT: "8080",
			},
			readFile: () => fileContents,
		});

		expect(trader.symbols).toEqual(["AAPL", "MSFT"]);
		expect(trader.intervalMs).toBe(250);
		expect(trader.strategy.type).toBe("ma_crossover");
		expect(trader.provider.type).toBe("simulated");
		expect(trader.indicators.rsiPeriod).toBe(6);
		expect(port).toBe(8080);
	});

	it("reports unreadable files and invalid values", () => {
		expect(() =>
			loadServerConfig({
				env: { PAPERTAPE_CONFIG: "/etc/trader.json" },
				readFile: () => "{ not json",
			})
		).toThrowError(/^Unable to read trader config \/etc\/trader\.json: /);

		expect(() =>
			loadServerConfig({ env: { TRADER_INTERVAL_MS: "soon" } })
		).toThrowError(ConfigValidationError);
	});
});

describe("toConfigInput", () => {
	it("rejects non-object documents", () => {
		expect(() => toConfigInput(["AAPL"])).toThrowError(
			"Trader config file must contain a JSON object"
		);
	});

	it("drops nested sections that are not objects", () => {
		expect(toConfigInput({ provider: "simulated", symbols: ["AAPL"] })).toEqual({
			symbols: ["AAPL"],
			intervalMs: undefined,
			provider: undefined,
			strategy: undefined,
			broker: undefined,
			broadcast: undefined,
		});
	});
});

describe("applyEnvOverrides", () => {
	it("keeps nested settings when only the type changes", () => {
		const next = applyEnvOverrides(
			{ strategy: { type: "ma_crossover", rsi: { period: 9 } } },
			{ TRADER_STRATEGY: "rsi_threshold" }
		);
		expect(next.strategy).toEqual({ type: "rsi_threshold", rsi: { period: 9 } });
	});
});

describe("resolvePort", () => {
	it("validates the port", () => {
		expect(resolvePort(undefined)).toBe(3_000);
		expect(resolvePort("0")).toBe(0);
		expect(() => resolvePort("http")).toThrowError(
			"PORT must be an integer within [0, 65535], got http"
		);
	});
});
