import { ErrorCode, HarnessError } from "../domain/errors";
import { sleep } from "./timing";

export type RetryOptions = {
	/** The number of attempts to make. Unlimited when omitted. */
	attempts?: number;
	/** The base delay in milliseconds. */
	delay: number;
	/** Upper bound for the backoff delay in milliseconds. */
	maxDelay?: number;
	/** Stops retrying once aborted. */
	signal?: AbortSignal;
	/** Errors for which this returns false are re-thrown without retrying. */
	shouldRetry?: (error: unknown) => boolean;
	/** Called before each backoff wait. */
	onRetry?: (error: unknown, attempt: number, backoffMs: number) => void;
};

const DEFAULT_MAX_DELAY = 30_000;

/**
 * Retries a function until it succeeds or the maximum number of attempts is reached.
 *
 * @param fn - The function to retry.
 * @param options - The retry options.
 * @returns The result of the function.
 */
export async function retry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
	const attempts = options.attempts ?? Number.POSITIVE_INFINITY;
	const maxDelay = options.maxDelay ?? DEFAULT_MAX_DELAY;

	for (let attempt = 0; attempt < attempts; attempt++) {
		if (options.signal?.aborted) {
			throw new HarnessError(ErrorCode.ABORTED, "Retry aborted.");
		}
		try {
			return await fn();
		} catch (error) {
			const retryable = options.shouldRetry?.(error) ?? true;
			if (!retryable || attempt === attempts - 1) {
				throw error; // Re-throw last error
			}
			const backoff = Math.min(options.delay * 2 ** attempt, maxDelay);
			options.onRetry?.(error, attempt + 1, backoff);
			await sleep(backoff, options.signal);
		}
	}
	// Only reachable with zero attempts
	throw new HarnessError(ErrorCode.UNKNOWN, "Retry logic failed unexpectedly.");
}
