import type { SnapshotPayload } from "@papertape/core";
import type { SessionHealth } from "@papertape/runtime";

export interface RouteContext {
	snapshot(): SnapshotPayload;
	health(): SessionHealth;
	clientCount(): number;
}

export interface RouteResponse {
	status: number;
	body: unknown;
}

export const routeRequest = (
	method: string | undefined,
	rawUrl: string | undefined,
	context: RouteContext
): RouteResponse => {
	const pathname = new URL(rawUrl ?? "/", "http://localhost").pathname;
	if (method !== "GET" && method !== "HEAD") {
		return { status: 405, body: { error: "method_not_allowed", method } };
	}

	switch (pathname) {
		case "/":
			return { status: 200, body: { status: "ok" } };
		case "/favicon.ico":
			return { status: 204, body: null };
		case "/api/snapshot":
			return { status: 200, body: context.snapshot() };
		case "/api/health":
			return { status: 200, body: context.health() };
		case "/api/ws_clients":
			return { status: 200, body: { clients: context.clientCount() } };
		default:
			return { status: 404, body: { error: "not_found", path: pathname } };
	}
};
