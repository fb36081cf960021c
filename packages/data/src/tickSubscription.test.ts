import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ProviderEvent, Tick } from "@papertape/core";
import { TickSubscription } from "./tickSubscription";
import type { TickProvider } from "./types";

const NOW = 1_700_000_000_000;

type Step = number | Error | "hang";

class ScriptedProvider implements TickProvider {
	readonly kind = "simulated" as const;
	readonly signals: AbortSignal[] = [];
	calls = 0;

	constructor(private readonly steps: Step[]) {}

	next(symbol: string, signal?: AbortSignal): Promise<Tick> {
		this.calls += 1;
		if (signal) {
			this.signals.push(signal);
		}
		const step = this.steps.shift() ?? 1;
		if (step === "hang") {
			return new Promise((_resolve, reject) => {
				signal?.addEventListener("abort", () => reject(new Error("aborted")));
			});
		}
		if (step instanceof Error) {
			return Promise.reject(step);
		}
		return Promise.resolve({ symbol, price: step, timestamp: NOW });
	}

	async close(): Promise<void> {}
}

const subscribe = (provider: TickProvider, intervalMs = 1_000) => {
	const subscription = new TickSubscription({
		symbol: "AAPL",
		intervalMs,
		provider,
		clock: () => NOW,
	});
	const events: ProviderEvent[] = [];
	subscription.onEvent((event) => {
		events.push(event);
	});
	return { subscription, events };
};

describe("TickSubscription", () => {
	beforeEach(() => {
		vi.useFakeTimers();
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it("polls immediately and then once per interval", async () => {
		const provider = new ScriptedProvider([10, 11, 12]);
		const { subscription, events } = subscribe(provider);

		subscription.start();
		await vi.advanceTimersByTimeAsync(0);
		expect(events).toEqual([
			{ type: "tick", tick: { symbol: "AAPL", price: 10, timestamp: NOW } },
		]);

		await vi.advanceTimersByTimeAsync(999);
		expect(provider.calls).toBe(1);
		await vi.advanceTimersByTimeAsync(1);
		expect(provider.calls).toBe(2);

		subscription.stop();
	});

	it("waits for the handler before scheduling the next poll", async () => {
		const provider = new ScriptedProvider([10, 11]);
		const subscription = new TickSubscription({
			symbol: "AAPL",
			intervalMs: 1_000,
			provider,
		});
		subscription.onEvent(
			() => new Promise<void>((resolve) => setTimeout(resolve, 5_000))
		);

		subscription.start();
		await vi.advanceTimersByTimeAsync(5_500);
		expect(provider.calls).toBe(1);
		await vi.advanceTimersByTimeAsync(500);
		expect(provider.calls).toBe(2);

		subscription.stop();
	});

	it("turns provider failures into error events and keeps polling", async () => {
		const provider = new ScriptedProvider([new Error("upstream down"), 0, 12]);
		const { subscription, events } = subscribe(provider);

		subscription.start();
		await vi.advanceTimersByTimeAsync(2_000);

		expect(events).toEqual([
			{ type: "error", symbol: "AAPL", error: "upstream down", timestamp: NOW },
			{
				type: "error",
				symbol: "AAPL",
				error: "Provider returned invalid price 0",
				timestamp: NOW,
			},
			{ type: "tick", tick: { symbol: "AAPL", price: 12, timestamp: NOW } },
		]);

		subscription.stop();
	});

	it("aborts the in-flight call and leaves no timer after stop", async () => {
		const provider = new ScriptedProvider(["hang"]);
		const { subscription, events } = subscribe(provider);

		subscription.start();
		await vi.advanceTimersByTimeAsync(0);
		subscription.stop();
		await vi.advanceTimersByTimeAsync(5_000);

		expect(provider.signals[0].aborted).toBe(true);
		expect(events).toEqual([]);
		expect(provider.calls).toBe(1);
		expect(vi.getTimerCount()).toBe(0);
		expect(subscription.isRunning).toBe(false);
	});

	it("restarts after stop", async () => {
		const provider = new ScriptedProvider([10, 20]);
		const { subscription, events } = subscribe(provider);

		subscription.start();
		await vi.advanceTimersByTimeAsync(0);
		subscription.stop();
		expect(vi.getTimerCount()).toBe(0);

		subscription.start();
		await vi.advanceTimersByTimeAsync(0);

		expect(events.map((event) => event.type === "tick" && event.tick.price)).toEqual([
			10, 20,
		]);
		subscription.stop();
	});

	it("keeps polling when a handler throws", async () => {
		const provider = new ScriptedProvider([10, 11]);
		const subscription = new TickSubscription({
			symbol: "AAPL",
			intervalMs: 1_000,
			provider,
		});
		subscription.onEvent(() => {
			throw new Error("handler failed");
		});

		subscription.start();
		await vi.advanceTimersByTimeAsync(1_000);
		expect(provider.calls).toBe(2);
		subscription.stop();
	});

	it("rejects a non-positive interval", () => {
		expect(
			() =>
				new TickSubscription({
					symbol: "AAPL",
					intervalMs: 0,
					provider: new ScriptedProvider([]),
				})
		).toThrowError("Tick subscription intervalMs must be > 0");
	});

	it("fetches a single event on demand without starting the loop", async () => {
		const provider = new ScriptedProvider([10, -1]);
		const { subscription, events } = subscribe(provider);

		await expect(subscription.runOnce()).resolves.toEqual({
			type: "tick",
			tick: { symbol: "AAPL", price: 10, timestamp: NOW },
		});
		await expect(subscription.runOnce()).resolves.toEqual({
			type: "error",
			symbol: "AAPL",
			error: "Provider returned invalid price -1",
			timestamp: NOW,
		});

		expect(events).toHaveLength(2);
		expect(subscription.isRunning).toBe(false);
		expect(vi.getTimerCount()).toBe(0);
	});
});
