import http from "node:http";
import { WebSocketServer } from "ws";
import { LIVE_CHANNEL_PATH, createLogger } from "@papertape/core";
import type { TradingSession } from "@papertape/runtime";
import { routeRequest } from "./routes";
import { attachSocket } from "./wsTransport";

const logger = createLogger("trader-server");

export interface TraderServer {
	readonly httpServer: http.Server;
	readonly wss: WebSocketServer;
	listen(port: number): Promise<number>;
	close(): Promise<void>;
}

export const createTraderServer = (session: TradingSession): TraderServer => {
	const httpServer = http.createServer((req, res) => {
		const { status, body } = routeRequest(req.method, req.url, {
			snapshot: () => session.snapshot(),
			health: () => session.health(),
			clientCount: () => session.hub.clientCount(),
		});
		if (body === null) {
			res.writeHead(status, { "Cache-Control": "no-store" });
			res.end();
			return;
		}
		res.writeHead(status, {
			"Content-Type": "application/json",
			"Cache-Control": "no-store",
		});
		res.end(req.method === "HEAD" ? undefined : JSON.stringify(body));
	});

	const wss = new WebSocketServer({ server: httpServer, path: LIVE_CHANNEL_PATH });
	wss.on("connection", (socket, req) => {
		const attached = attachSocket(session.hub, socket);
		if (!attached) {
			return;
		}
		const { sessionId, handlers } = attached;
		logger.info("ws_client_connected", {
			sessionId,
			remote: req.socket.remoteAddress ?? null,
		});
		socket.on("message", (data, isBinary) => {
			handlers.message(data.toString(), isBinary);
		});
		socket.on("close", (code) => handlers.close(code));
		socket.on("error", (error) => handlers.error(error));
	});
	wss.on("error", (error) => {
		logger.error("ws_server_error", { message: error.message });
	});

	return {
		httpServer,
		wss,
		listen: (port) =>
			new Promise<number>((resolve, reject) => {
				httpServer.once("error", reject);
				httpServer.listen(port, () => {
					httpServer.off("error", reject);
					const address = httpServer.address();
					resolve(typeof address === "object" && address ? address.port : port);
				});
			}),
		close: () =>
			new Promise<void>((resolve, reject) => {
				wss.close();
				httpServer.close((error) => {
					if (error) {
						reject(error);
						return;
					}
					resolve();
				});
				httpServer.closeIdleConnections();
			}),
	};
};
