export interface Mutex {
	/** Runs `fn` once every previously queued task has settled. Tasks run in FIFO order. */
	runExclusive<T>(fn: () => Promise<T>): Promise<T>;
}

export function createMutex(): Mutex {
	let tail: Promise<void> = Promise.resolve();

	return { runExclusive };

	function runExclusive<T>(fn: () => Promise<T>): Promise<T> {
		const result = tail.then(fn);
		// The tail only orders tasks; the caller observes failures through `result`.
		tail = result.then(
			() => undefined,
			() => undefined,
		);
		return result;
	}
}
