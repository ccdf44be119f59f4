import { createMutex } from "./Mutex";
import { sleep as defaultSleep } from "./Retry";

export interface RateLimiterOptions {
	/** Steady-state refill rate */
	ratePerSecond: number;
	/** Maximum tokens held, i.e. how many calls may go out back to back */
	burst: number;
	now?: () => number;
	sleep?: (ms: number) => Promise<void>;
}

export interface RateLimiter {
	/**
	 * Waits for a token and consumes it. Resolves with the time spent waiting in ms.
	 * Concurrent callers are served in the order they called.
	 */
	acquire(): Promise<number>;
	/** Tokens currently available, after refill */
	available(): number;
}

/**
 * Token bucket shared by every remote call. The counter is owned by a single
 * mutex so concurrent callers never observe a half-updated bucket.
 */
export function createRateLimiter(options: RateLimiterOptions): RateLimiter {
	const { ratePerSecond, burst } = options;
	if (!(ratePerSecond > 0) || !(burst >= 1)) {
		throw new RangeError(`Invalid rate limiter settings: rate=${ratePerSecond} burst=${burst}`);
	}
	const now = options.now ?? Date.now;
	const sleep = options.sleep ?? defaultSleep;
	const mutex = createMutex();

	let tokens = burst;
	let lastRefill = now();

	return { acquire, available };

	function refill(): void {
		const current = now();
		const elapsed = Math.max(0, current - lastRefill);
		tokens = Math.min(burst, tokens + (elapsed * ratePerSecond) / 1000);
		lastRefill = current;
	}

	function available(): number {
		refill();
		return tokens;
	}

	function acquire(): Promise<number> {
		return mutex.runExclusive(async () => {
			refill();
			let waited = 0;
			if (tokens < 1) {
				waited = Math.ceil(((1 - tokens) / ratePerSecond) * 1000);
				await sleep(waited);
				refill();
			}
			tokens -= 1;
			return waited;
		});
	}
}
