import { CloseCode } from "@papertape/core";

export interface ReconnectBackoffOptions {
	initialMs: number;
	maxMs: number;
}

const RECONNECT_CODES: ReadonlySet<number> = new Set([
	CloseCode.abnormal,
	CloseCode.serviceRestart,
	CloseCode.keepaliveTimeout,
]);

/** Delay schedule for live-channel consumers that reconnect after a drop. */
export class ReconnectBackoff {
	private attempt = 0;

	constructor(private readonly options: ReconnectBackoffOptions) {
		if (!(options.initialMs > 0) || options.maxMs < options.initialMs) {
			throw new Error("ReconnectBackoff requires 0 < initialMs <= maxMs");
		}
	}

	get attempts(): number {
		return this.attempt;
	}

	shouldReconnect(code: number): boolean {
		return RECONNECT_CODES.has(code);
	}

	nextDelay(): number {
		const delay = Math.min(
			this.options.maxMs,
			this.options.initialMs * 2 ** this.attempt
		);
		this.attempt += 1;
		return delay;
	}

	reset(): void {
		this.attempt = 0;
	}
}
