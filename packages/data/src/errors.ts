/**
 * Failure of one upstream quote request. `retryable` marks transient causes
 * (network, timeout, HTTP 429 or 5xx); everything else fails the call at once.
 */
export class ProviderRequestError extends Error {
	constructor(
		message: string,
		readonly retryable: boolean,
		readonly status: number | null = null
	) {
		super(message);
		this.name = "ProviderRequestError";
	}
}
