import type { ErrorMessage, TickMessage } from "@papertape/core";

/** Outbound side of one connected client, implemented over the real socket. */
export interface ClientTransport {
	send(payload: string): Promise<void>;
	close(code: number, reason: string): void;
}

export type SessionState = "CONNECTING" | "OPEN" | "CLOSING" | "CLOSED";

export type BroadcastMessage = TickMessage | ErrorMessage;
