import { describe, expect, it } from "vitest";
import { ReconnectBackoff } from "./reconnectBackoff";

describe("ReconnectBackoff", () => {
	it("reconnects only after abnormal, restart and keepalive closes", () => {
		const backoff = new ReconnectBackoff({ initialMs: 500, maxMs: 8_000 });
		expect(backoff.shouldReconnect(1006)).toBe(true);
		expect(backoff.shouldReconnect(1012)).toBe(true);
		expect(backoff.shouldReconnect(4000)).toBe(true);
		expect(backoff.shouldReconnect(1000)).toBe(false);
	});

	it("doubles up to the cap and resets", () => {
		const backoff = new ReconnectBackoff({ initialMs: 500, maxMs: 3_000 });
		const delays = Array.from({ length: 5 }, () => backoff.nextDelay());
		expect(delays).toEqual([500, 1_000, 2_000, 3_000, 3_000]);
		expect(backoff.attempts).toBe(5);

		backoff.reset();
		expect(backoff.nextDelay()).toBe(500);
	});

	it("validates its bounds", () => {
		expect(() => new ReconnectBackoff({ initialMs: 0, maxMs: 10 })).toThrowError(
			"ReconnectBackoff requires 0 < initialMs <= maxMs"
		);
	});
});
