import { createMutex } from "./Mutex";
import { createRateLimiter } from "./RateLimiter";
import { describe, expect, it } from "vitest";

function createClock() {
	let time = 0;
	return {
		now: () => time,
		sleep: (ms: number) => {
			time += ms;
			return Promise.resolve();
		},
		advance: (ms: number) => {
			time += ms;
		},
	};
}

describe("Mutex", () => {
	it("runs tasks one at a time in call order", async () => {
		const mutex = createMutex();
		const events: Array<string> = [];
		const task = (name: string) => async () => {
			events.push(`start ${name}`);
			await new Promise(resolve => setTimeout(resolve, 1));
			events.push(`end ${name}`);
			return name;
		};

		const results = await Promise.all([mutex.runExclusive(task("a")), mutex.runExclusive(task("b"))]);

		expect(results).toEqual(["a", "b"]);
		expect(events).toEqual(["start a", "end a", "start b", "end b"]);
	});

	it("keeps serving after a task fails", async () => {
		const mutex = createMutex();
		const failing = mutex.runExclusive(() => Promise.reject(new Error("boom")));
		const next = mutex.runExclusive(() => Promise.resolve("next"));

		await expect(failing).rejects.toThrow("boom");
		await expect(next).resolves.toBe("next");
	});
});

describe("RateLimiter", () => {
	it("lets a burst through and then paces at the configured rate", async () => {
		const clock = createClock();
		const limiter = createRateLimiter({ ratePerSecond: 10, burst: 2, now: clock.now, sleep: clock.sleep });
		const grantedAt: Array<number> = [];

		await Promise.all(
			Array.from({ length: 6 }, async () => {
				await limiter.acquire();
				grantedAt.push(clock.now());
			}),
		);

		expect(grantedAt).toEqual([0, 0, 100, 200, 300, 400]);
	});

	it("never exceeds rate plus burst over a sustained window", async () => {
		const clock = createClock();
		const rate = 5;
		const burst = 3;
		const limiter = createRateLimiter({ ratePerSecond: rate, burst, now: clock.now, sleep: clock.sleep });
		const grantedAt: Array<number> = [];

		await Promise.all(
			Array.from({ length: 40 }, async () => {
				await limiter.acquire();
				grantedAt.push(clock.now());
			}),
		);

		const windowMs = 2000;
		for (const start of grantedAt) {
			const inWindow = grantedAt.filter(t => t >= start && t < start + windowMs).length;
			expect(inWindow).toBeLessThanOrEqual(burst + (rate * windowMs) / 1000);
		}
	});

	it("reports how long the caller waited", async () => {
		const clock = createClock();
		const limiter = createRateLimiter({ ratePerSecond: 4, burst: 1, now: clock.now, sleep: clock.sleep });

		expect(await limiter.acquire()).toBe(0);
		expect(await limiter.acquire()).toBe(250);
	});

	it("refills tokens as time passes, up to the burst", () => {
		const clock = createClock();
		const limiter = createRateLimiter({ ratePerSecond: 2, burst: 3, now: clock.now, sleep: clock.sleep });

		clock.advance(60000);
		expect(limiter.available()).toBe(3);
	});

	it("rejects invalid settings", () => {
		expect(() => createRateLimiter({ ratePerSecond: 0, burst: 1 })).toThrow(RangeError);
		expect(() => createRateLimiter({ ratePerSecond: 1, burst: 0 })).toThrow(RangeError);
	});
});
