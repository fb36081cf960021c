import type { BroadcastHub, ClientTransport } from "@papertape/broadcast";
import { CloseCode, createLogger } from "@papertape/core";

const wsLogger = createLogger("trader-server:ws");

const OPEN = 1;

/** The part of a `ws` socket the transport needs. */
export interface LiveSocket {
	readonly readyState: number;
	send(data: string, cb: (error?: Error) => void): void;
	close(code: number, reason: string): void;
}

export const createSocketTransport = (socket: LiveSocket): ClientTransport => ({
	send: (payload) =>
		new Promise<void>((resolve, reject) => {
			if (socket.readyState !== OPEN) {
				reject(new Error(`Socket is not open (state ${socket.readyState})`));
				return;
			}
			socket.send(payload, (error) => {
				if (error) {
					reject(error);
					return;
				}
				resolve();
			});
		}),
	close: (code, reason) => {
		socket.close(code, reason);
	},
});

export interface SocketHandlers {
	message(text: string, isBinary: boolean): void;
	close(code: number): void;
	error(error: Error): void;
}

/**
 * Registers a freshly accepted socket with the hub. The caller routes the
 * socket's events to the returned handlers. Returns null, after closing the
 * socket with the restart code, once the hub has shut down.
 */
export const attachSocket = (
	hub: BroadcastHub,
	socket: LiveSocket
): { sessionId: string; handlers: SocketHandlers } | null => {
	if (hub.isShutDown) {
		wsLogger.info("socket_rejected_shutdown");
		socket.close(CloseCode.serviceRestart, "server shutting down");
		return null;
	}
	const session = hub.connect(createSocketTransport(socket));

	const handlers: SocketHandlers = {
		message: (text, isBinary) => {
			if (isBinary) {
				return;
			}
			session.receive(text);
		},
		close: (code) => {
			wsLogger.debug("socket_closed", { sessionId: session.id, code });
			hub.handleClosed(session.id);
		},
		error: (error) => {
			wsLogger.warn("socket_error", {
				sessionId: session.id,
				message: error.message,
			});
		},
	};
	return { sessionId: session.id, handlers };
};
