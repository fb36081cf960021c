import {
	AckMessage,
	Clock,
	createLogger,
	systemClock,
	toIsoTimestamp,
} from "@papertape/core";
import { BoundedQueue, QueueClosedError } from "./boundedQueue";
import type { ClientTransport, SessionState } from "./types";

const sessionLogger = createLogger("broadcast:session");

const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
	CONNECTING: ["OPEN", "CLOSING", "CLOSED"],
	OPEN: ["CLOSING", "CLOSED"],
	CLOSING: ["CLOSED"],
	CLOSED: [],
};

const KEEPALIVE_FRAMES = new Set(["ping", "hello"]);

export class InvalidSessionTransitionError extends Error {
	constructor(
		readonly sessionId: string,
		readonly from: SessionState,
		readonly to: SessionState
	) {
		super(`Session ${sessionId} cannot move from ${from} to ${to}`);
		this.name = "InvalidSessionTransitionError";
	}
}

export interface ClientSessionOptions {
	id: string;
	transport: ClientTransport;
	queueCapacity: number;
	clock?: Clock;
}

/**
 * One connected viewer. Messages are queued without waiting and written out by
 * a single delivery loop, so a slow socket only ever backs up its own queue.
 */
export class ClientSession {
	readonly id: string;
	readonly connectedAt: number;
	private readonly transport: ClientTransport;
	private readonly queue: BoundedQueue<string>;
	private readonly clock: Clock;
	private currentState: SessionState = "CONNECTING";
	private seenAt: number;
	private sent = 0;
	private delivery: Promise<void> = Promise.resolve();

	constructor(options: ClientSessionOptions) {
		this.id = options.id;
		this.transport = options.transport;
		this.queue = new BoundedQueue<string>(options.queueCapacity);
		this.clock = options.clock ?? systemClock;
		this.connectedAt = this.clock();
		this.seenAt = this.connectedAt;
	}

	get state(): SessionState {
		return this.currentState;
	}

	get lastSeenAt(): number {
		return this.seenAt;
	}

	get sentCount(): number {
		return this.sent;
	}

	get droppedCount(): number {
		return this.queue.droppedCount;
	}

	get queuedCount(): number {
		return this.queue.size;
	}

	get isLive(): boolean {
		return this.currentState === "CONNECTING" || this.currentState === "OPEN";
	}

	/** Resolves once the delivery loop has exited. */
	get done(): Promise<void> {
		return this.delivery;
	}

	/** Returns the number of older messages dropped to make room. */
	enqueue(payload: string): number {
		if (!this.isLive) {
			return 0;
		}
		return this.queue.push(payload);
	}

	open(): void {
		this.transition("OPEN");
		this.delivery = this.deliver();
	}

	receive(frame: string): void {
		const text = frame.trim();
		if (!KEEPALIVE_FRAMES.has(text)) {
			sessionLogger.debug("client_frame_ignored", {
				sessionId: this.id,
				length: frame.length,
			});
			return;
		}
		this.seenAt = this.clock();
		const ack: AckMessage = {
			type: "ack",
			ts: toIsoTimestamp(this.seenAt),
			received: text,
		};
		this.enqueue(JSON.stringify(ack));
	}

	/**
	 * Server-initiated close. Safe to call more than once. Resolves once the
	 * session is CLOSED; a send still in flight is left to settle on its own.
	 */
	async close(code: number, reason: string): Promise<void> {
		if (this.currentState === "CLOSING" || this.currentState === "CLOSED") {
			return;
		}
		this.transition("CLOSING");
		this.queue.close();
		this.queue.clear();
		try {
			this.transport.close(code, reason);
		} catch (error) {
			sessionLogger.warn("client_close_failed", {
				sessionId: this.id,
				code,
				message: error instanceof Error ? error.message : String(error),
			});
		}
		this.transition("CLOSED");
		sessionLogger.info("client_closed", {
			sessionId: this.id,
			code,
			reason,
			sent: this.sent,
			dropped: this.queue.droppedCount,
		});
	}

	/** The peer went away; no close frame is sent. */
	markClosed(): void {
		if (this.currentState === "CLOSED") {
			return;
		}
		this.queue.close();
		this.queue.clear();
		this.transition("CLOSED");
	}

	private transition(next: SessionState): void {
		if (!TRANSITIONS[this.currentState].includes(next)) {
			throw new InvalidSessionTransitionError(
				this.id,
				this.currentState,
				next
			);
		}
		this.currentState = next;
	}

	private async deliver(): Promise<void> {
		while (this.currentState === "OPEN") {
			let payload: string;
			try {
				payload = await this.queue.take();
			} catch (error) {
				if (!(error instanceof QueueClosedError)) {
					sessionLogger.error("client_queue_failed", {
						sessionId: this.id,
						message: error instanceof Error ? error.message : String(error),
					});
				}
				return;
			}
			if (this.currentState !== "OPEN") {
				return;
			}
			try {
				await this.transport.send(payload);
				this.sent += 1;
			} catch (error) {
				sessionLogger.warn("client_send_failed", {
					sessionId: this.id,
					message: error instanceof Error ? error.message : String(error),
				});
				this.markClosed();
				return;
			}
		}
	}
}
