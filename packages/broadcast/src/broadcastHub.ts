import {
	AccountView,
	Clock,
	CloseCode,
	SnapshotMessage,
	SnapshotPayload,
	createLogger,
	systemClock,
} from "@papertape/core";
import { ClientSession } from "./clientSession";
import { SnapshotStore } from "./snapshotStore";
import type { BroadcastMessage, ClientTransport } from "./types";

const hubLogger = createLogger("broadcast:hub");

export interface BroadcastHubOptions {
	queueCapacity: number;
	keepaliveTimeoutMs: number;
	sweepIntervalMs: number;
	clock?: Clock;
	store?: SnapshotStore;
}

/**
 * Fans pipeline output out to every connected client. Publishing only pushes
 * onto per-client queues; it never waits on a socket.
 */
export class BroadcastHub {
	readonly store: SnapshotStore;
	private readonly sessions = new Map<string, ClientSession>();
	private readonly clock: Clock;
	private sweepTimer: ReturnType<typeof setInterval> | null = null;
	private sessionSeq = 0;
	private stopped = false;

	constructor(private readonly options: BroadcastHubOptions) {
		this.clock = options.clock ?? systemClock;
		this.store = options.store ?? new SnapshotStore(this.clock);
	}

	get isShutDown(): boolean {
		return this.stopped;
	}

	/**
	 * Registers a client. The snapshot is queued before the session opens, so
	 * it is always the first message the client receives.
	 */
	connect(transport: ClientTransport): ClientSession {
		if (this.stopped) {
			throw new Error("BroadcastHub is shut down");
		}
		this.sessionSeq += 1;
		const session = new ClientSession({
			id: `client-${this.sessionSeq}`,
			transport,
			queueCapacity: this.options.queueCapacity,
			clock: this.clock,
		});
		const snapshot: SnapshotMessage = {
			type: "snapshot",
			data: this.store.toJSON(),
		};
		session.enqueue(JSON.stringify(snapshot));
		session.open();
		this.sessions.set(session.id, session);
		this.ensureSweep();

		hubLogger.info("client_connected", {
			sessionId: session.id,
			clients: this.clientCount(),
		});
		return session;
	}

	/** Called when the peer has gone away. */
	handleClosed(sessionId: string): void {
		const session = this.sessions.get(sessionId);
		if (!session) {
			return;
		}
		session.markClosed();
		this.sessions.delete(sessionId);
		hubLogger.info("client_disconnected", {
			sessionId,
			clients: this.clientCount(),
		});
	}

	async disconnect(
		sessionId: string,
		code: number = CloseCode.normal,
		reason = "normal closure"
	): Promise<void> {
		const session = this.sessions.get(sessionId);
		if (!session) {
			return;
		}
		this.sessions.delete(sessionId);
		await session.close(code, reason);
	}

	publish(message: BroadcastMessage): void {
		if (message.type === "tick") {
			this.store.recordTick(message);
		} else {
			this.store.recordError(message);
		}

		const payload = JSON.stringify(message);
		for (const session of this.sessions.values()) {
			const dropped = session.enqueue(payload);
			if (dropped > 0) {
				hubLogger.debug("client_queue_overflow", {
					sessionId: session.id,
					dropped: session.droppedCount,
				});
			}
		}
	}

	recordAccount(view: AccountView): void {
		this.store.recordAccount(view);
	}

	trackSymbol(symbol: string): void {
		this.store.trackSymbol(symbol);
	}

	untrackSymbol(symbol: string): void {
		this.store.untrackSymbol(symbol);
	}

	/** Pull accessor for clients that cannot hold a live connection. */
	snapshot(): SnapshotPayload {
		return this.store.toJSON();
	}

	clientCount(): number {
		let count = 0;
		for (const session of this.sessions.values()) {
			if (session.isLive) {
				count += 1;
			}
		}
		return count;
	}

	getSession(sessionId: string): ClientSession | undefined {
		return this.sessions.get(sessionId);
	}

	/** Closes every session that has not sent a keepalive frame in time. */
	async sweep(): Promise<string[]> {
		const now = this.clock();
		const stale: ClientSession[] = [];
		for (const session of this.sessions.values()) {
			if (!session.isLive) {
				this.sessions.delete(session.id);
				continue;
			}
			if (now - session.lastSeenAt > this.options.keepaliveTimeoutMs) {
				stale.push(session);
			}
		}

		for (const session of stale) {
			this.sessions.delete(session.id);
			hubLogger.warn("client_keepalive_timeout", {
				sessionId: session.id,
				idleMs: now - session.lastSeenAt,
			});
		}
		await Promise.all(
			stale.map((session) =>
				session.close(CloseCode.keepaliveTimeout, "keepalive timeout")
			)
		);
		return stale.map((session) => session.id);
	}

	async shutdown(): Promise<void> {
		if (this.stopped) {
			return;
		}
		this.stopped = true;
		if (this.sweepTimer) {
			clearInterval(this.sweepTimer);
			this.sweepTimer = null;
		}
		const sessions = Array.from(this.sessions.values());
		this.sessions.clear();
		await Promise.all(
			sessions.map((session) =>
				session.close(CloseCode.serviceRestart, "server shutting down")
			)
		);
		this.store.clear();
		hubLogger.info("broadcast_hub_stopped", { closed: sessions.length });
	}

	private ensureSweep(): void {
		if (this.sweepTimer || this.options.sweepIntervalMs <= 0) {
			return;
		}
		this.sweepTimer = setInterval(() => {
			void this.sweep();
		}, this.options.sweepIntervalMs);
		this.sweepTimer.unref?.();
	}
}
