import { afterEach, describe, expect, it } from "vitest";
import {
	createLogger,
	readLoggerSettings,
	refreshLoggerSettings,
	setLogSink,
} from "./logger";

const capture = () => {
	const lines: string[] = [];
	const tables: Record<string, unknown>[][] = [];
	setLogSink({
		line: (text) => lines.push(text),
		table: (rows) => tables.push(rows),
	});
	return { lines, tables };
};

afterEach(() => {
	setLogSink(null);
	refreshLoggerSettings();
});

describe("readLoggerSettings", () => {
	it("defaults to info level json output", () => {
		expect(readLoggerSettings({})).toEqual({
			minLevel: "info",
			modules: null,
			pretty: false,
			json: true,
		});
	});

	it("parses level, module filter and pretty mode", () => {
		const settings = readLoggerSettings({
			LOG_LEVEL: " WARN ",
			LOG_MODULE: "broker, hub,,",
			LOG_PRETTY: "true",
		});
		expect(settings.minLevel).toBe("warn");
		expect(settings.modules).toEqual(new Set(["broker", "hub"]));
		expect(settings.pretty).toBe(true);
		expect(settings.json).toBe(false);
	});

	it("falls back to info for an unknown level", () => {
		expect(readLoggerSettings({ LOG_LEVEL: "verbose" }).minLevel).toBe("info");
	});
});

describe("createLogger", () => {
	it("writes one json line per event with module and level", () => {
		refreshLoggerSettings({ LOG_LEVEL: "debug" });
		const { lines } = capture();

		createLogger("broker").info("order_result", {
			ts: "2024-01-01T00:00:00.000Z",
			qty: 5,
		});

		expect(lines).toHaveLength(1);
		expect(JSON.parse(lines[0])).toEqual({
			ts: "2024-01-01T00:00:00.000Z",
			qty: 5,
			level: "info",
			event: "order_result",
			module: "broker",
		});
	});

	it("drops events below the minimum level or outside the module filter", () => {
		refreshLoggerSettings({ LOG_LEVEL: "warn", LOG_MODULE: "hub" });
		const { lines } = capture();

		createLogger("hub").info("client_connected");
		createLogger("broker").error("account_writer_violation");
		createLogger("hub").warn("client_queue_overflow");

		expect(lines.map((line) => JSON.parse(line).event)).toEqual([
			"client_queue_overflow",
		]);
	});

	it("does not let event data override the reserved fields", () => {
		refreshLoggerSettings({});
		const { lines } = capture();

		createLogger("hub").info("client_closed", { module: "other", level: "debug" });

		const parsed = JSON.parse(lines[0]);
		expect(parsed.module).toBe("hub");
		expect(parsed.level).toBe("info");
	});

	it("serializes errors, bigints and circular references", () => {
		refreshLoggerSettings({});
		const { lines } = capture();
		const loop: Record<string, unknown> = { name: "loop" };
		loop.self = loop;

		createLogger("core").error("pipeline_stage_failed", {
			cause: new Error("boom"),
			big: 12n,
			loop,
		});

		const parsed = JSON.parse(lines[0]);
		expect(parsed.cause.message).toBe("boom");
		expect(parsed.big).toBe("12");
		expect(parsed.loop).toEqual({ name: "loop", self: "[circular]" });
	});

	it("renders order results as a table in pretty mode", () => {
		refreshLoggerSettings({ LOG_PRETTY: "true" });
		const { lines, tables } = capture();

		createLogger("broker").info("order_result", {
			ts: "2024-01-01T00:00:00.000Z",
			symbol: "AAPL",
			side: "BUY",
			qty: 10,
			price: 50,
			status: "filled",
			reason: null,
		});

		expect(lines).toEqual(["[2024-01-01T00:00:00.000Z] [INFO] broker:order_result"]);
		expect(tables).toEqual([
			[
				{
					symbol: "AAPL",
					side: "BUY",
					qty: 10,
					price: 50,
					status: "filled",
					reason: "-",
				},
			],
		]);
	});
});
