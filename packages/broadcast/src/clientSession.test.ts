import { describe, expect, it } from "vitest";
import {
	ClientSession,
	InvalidSessionTransitionError,
} from "./clientSession";
import type { ClientTransport } from "./types";

const flush = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

class RecordingTransport implements ClientTransport {
	readonly sent: string[] = [];
	closed: { code: number; reason: string } | null = null;
	failWith: Error | null = null;

	async send(payload: string): Promise<void> {
		if (this.failWith) {
			throw this.failWith;
		}
		this.sent.push(payload);
	}

	close(code: number, reason: string): void {
		this.closed = { code, reason };
	}
}

const createSession = (now = { value: 1_700_000_000_000 }) => {
	const transport = new RecordingTransport();
	const session = new ClientSession({
		id: "client-1",
		transport,
		queueCapacity: 4,
		clock: () => now.value,
	});
	return { session, transport, now };
};

describe("ClientSession", () => {
	it("delivers queued messages in order once open", async () => {
		const { session, transport } = createSession();
		session.enqueue("first");
		expect(session.state).toBe("CONNECTING");

		session.open();
		session.enqueue("second");
		await flush();

		expect(transport.sent).toEqual(["first", "second"]);
		expect(session.sentCount).toBe(2);
	});

	it("acknowledges keepalive frames and refreshes liveness", async () => {
		const { session, transport, now } = createSession();
		session.open();
		now.value = 1_700_000_030_000;

		session.receive(" ping \n");
		session.receive("subscribe AAPL");
		await flush();

		expect(session.lastSeenAt).toBe(1_700_000_030_000);
		expect(transport.sent.map((payload) => JSON.parse(payload))).toEqual([
			{ type: "ack", ts: "2023-11-14T22:13:50.000Z", received: "ping" },
		]);
	});

	it("ignores other frames without touching liveness", () => {
		const { session, now } = createSession();
		session.open();
		now.value += 10_000;
		session.receive("{\"type\":\"subscribe\"}");
		expect(session.lastSeenAt).toBe(1_700_000_000_000);
		expect(session.queuedCount).toBe(0);
	});

	it("closes once and stops accepting messages", async () => {
		const { session, transport } = createSession();
		session.open();

		await session.close(1000, "bye");
		await session.close(4000, "again");

		expect(session.state).toBe("CLOSED");
		expect(transport.closed).toEqual({ code: 1000, reason: "bye" });
		expect(session.enqueue("late")).toBe(0);
		await flush();
		expect(transport.sent).toEqual([]);
	});

	it("marks itself closed when a send fails", async () => {
		const { session, transport } = createSession();
		transport.failWith = new Error("socket reset");
		session.open();
		session.enqueue("lost");

		await session.done;

		expect(session.state).toBe("CLOSED");
		expect(transport.closed).toBeNull();
	});

	it("rejects illegal transitions", () => {
		const { session } = createSession();
		session.open();
		expect(() => session.open()).toThrowError(InvalidSessionTransitionError);
		expect(() => session.open()).toThrowError(
			"Session client-1 cannot move from OPEN to OPEN"
		);
	});
});
