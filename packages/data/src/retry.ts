import { sleep } from "./utils/sleep";

export interface RetryOptions {
	maxRetries: number;
	baseDelayMs: number;
	maxDelayMs: number;
	signal?: AbortSignal;
	isRetryable: (error: unknown) => boolean;
	onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export const backoffDelay = (
	attempt: number,
	baseDelayMs: number,
	maxDelayMs: number
): number => Math.min(maxDelayMs, baseDelayMs * 2 ** attempt);

export const withRetry = async <T>(
	operation: (attempt: number) => Promise<T>,
	options: RetryOptions
): Promise<T> => {
	for (let attempt = 0; ; attempt += 1) {
		try {
			return await operation(attempt);
		} catch (error) {
			if (
				attempt >= options.maxRetries ||
				options.signal?.aborted ||
				!options.isRetryable(error)
			) {
				throw error;
			}
			const delayMs = backoffDelay(
				attempt,
				options.baseDelayMs,
				options.maxDelayMs
			);
			options.onRetry?.(error, attempt + 1, delayMs);
			await sleep(delayMs, options.signal);
		}
	}
};
