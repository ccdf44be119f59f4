/**
 * Retry coordinator with exponential backoff and jitter.
 *
 * Decides whether a failed remote call may be retried and how long to wait
 * before the next attempt. A server-provided Retry-After hint always wins over
 * the computed backoff.
 */

import { getLog } from "../shared/logger";
import { RetryExhaustedError } from "./Errors";

const log = getLog(import.meta);

/** HTTP statuses that are treated as transient */
export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

export type FailureClass = "rate_limited" | "server_error" | "network" | "client_error";

export interface RetryPolicy {
	/** Total attempts including the first call */
	maxAttempts: number;
	/** Base delay in milliseconds for exponential backoff */
	baseDelayMs: number;
	/** Maximum delay in milliseconds */
	maxDelayMs: number;
	/** Scale each delay to 50-100% of its computed value */
	jitter: boolean;
}

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
	maxAttempts: 5,
	baseDelayMs: 1000,
	maxDelayMs: 60000,
	jitter: true,
});

/**
 * Options for configuring retry behavior.
 */
export interface RetryOptions extends Partial<RetryPolicy> {
	/**
	 * Predicate to determine if an error is retryable.
	 * If not provided, all errors are considered retryable.
	 */
	isRetryable?: (error: unknown) => boolean;
	/** Server-provided delay for this error, if any */
	retryAfterMs?: (error: unknown) => number | undefined;
	/** HTTP status carried by the error, reported when attempts run out */
	statusOf?: (error: unknown) => number | undefined;
	/** Called before sleeping ahead of the next attempt */
	onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
	sleep?: (ms: number) => Promise<void>;
	random?: () => number;
	/** Label for log messages */
	label?: string;
}

export function sleep(ms: number): Promise<void> {
	return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Classifies a failed call by HTTP status, or as a network failure when no
 * response was received.
 */
export function classifyFailure(status: number | undefined): FailureClass {
	if (status === undefined) {
		return "network";
	}
	if (status === 429) {
		return "rate_limited";
	}
	if (status >= 500) {
		return "server_error";
	}
	return "client_error";
}

export function isRetryableStatus(status: number): boolean {
	return RETRYABLE_STATUSES.has(status);
}

/**
 * Calculates the backoff delay for a given attempt number using exponential backoff.
 *
 * @param attemptNumber - The attempt number (1-based)
 * @param baseDelayMs - Base delay in milliseconds
 * @param maxDelayMs - Maximum delay cap in milliseconds
 * @returns The delay in milliseconds (without jitter)
 */
export function calculateBackoffDelay(attemptNumber: number, baseDelayMs: number, maxDelayMs: number): number {
	return Math.min(baseDelayMs * 2 ** (attemptNumber - 1), maxDelayMs);
}

/**
 * Scales a delay to a random value between 50% and 100% of itself.
 */
export function addJitter(delayMs: number, random: () => number = Math.random): number {
	return Math.floor(delayMs * (0.5 + 0.5 * random()));
}

/**
 * Delay before the attempt following `attemptNumber`.
 */
export function computeRetryDelay(
	attemptNumber: number,
	policy: RetryPolicy,
	retryAfterMs?: number,
	random: () => number = Math.random,
): number {
	if (retryAfterMs !== undefined) {
		return retryAfterMs;
	}
	const delay = calculateBackoffDelay(attemptNumber, policy.baseDelayMs, policy.maxDelayMs);
	return policy.jitter ? addJitter(delay, random) : delay;
}

/**
 * Parses a Retry-After header, given either as delay seconds or an HTTP date.
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
	if (header === null || header.trim() === "") {
		return;
	}
	const seconds = Number(header);
	if (Number.isFinite(seconds)) {
		return Math.max(0, Math.round(seconds * 1000));
	}
	const date = Date.parse(header);
	if (Number.isNaN(date)) {
		return;
	}
	return Math.max(0, date - now);
}

/**
 * Retries an async operation with exponential backoff.
 *
 * Non-retryable errors are rethrown as they are. When every attempt fails with a
 * retryable error a RetryExhaustedError is thrown carrying the attempt count,
 * the last observed status and the last error as its cause.
 *
 * @example
 * ```typescript
 * await withRetry(() => fetch(url), {
 *   label: "GET /blocks",
 *   isRetryable: err => err instanceof NetworkError,
 * });
 * ```
 */
export async function withRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
	const policy: RetryPolicy = {
		maxAttempts: options.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
		baseDelayMs: options.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs,
		maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs,
		jitter: options.jitter ?? DEFAULT_RETRY_POLICY.jitter,
	};
	const wait = options.sleep ?? sleep;
	const label = options.label ?? "operation";

	for (let attempt = 1; ; attempt++) {
		try {
			return await operation(attempt);
		} catch (error) {
			if (options.isRetryable && !options.isRetryable(error)) {
				throw error;
			}

			const errorMessage = error instanceof Error ? error.message : String(error);

			if (attempt >= policy.maxAttempts) {
				throw new RetryExhaustedError(
					`${label} failed after ${attempt} attempts: ${errorMessage}`,
					attempt,
					options.statusOf?.(error),
					error,
				);
			}

			const delayMs = computeRetryDelay(attempt, policy, options.retryAfterMs?.(error), options.random);

			log.warn(
				{ attempt, maxAttempts: policy.maxAttempts, delayMs, error: errorMessage },
				"Retrying %s after error (attempt %d/%d, retry in %dms): %s",
				label,
				attempt,
				policy.maxAttempts,
				delayMs,
				errorMessage,
			);

			options.onRetry?.(attempt, delayMs, error);
			await wait(delayMs);
		}
	}
}
