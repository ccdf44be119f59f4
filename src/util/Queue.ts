import { ValidationFailure } from "./Errors";

export interface Queue<T> {
	add(item: T): void;
	/** Resolves once every accepted item has been processed or skipped. */
	close(): Promise<void>;
}

export interface QueueOptions<T> {
	/** Once aborted no further items are started; items already running finish on their own. */
	signal?: AbortSignal | undefined;
	/** Receives every item that was never started because the signal aborted. */
	onSkipped?: (item: T) => void;
	/** Receives failures from the processor. */
	onError: (item: T, error: unknown) => void;
}

export function createQueue<T>(
	concurrency: number,
	processor: (item: T) => Promise<void>,
	options: QueueOptions<T>,
): Queue<T> {
	if (!Number.isInteger(concurrency) || concurrency < 1) {
		throw new ValidationFailure(`Queue concurrency must be a positive integer, got ${concurrency}`);
	}
	const promises = new Set<Promise<void>>();
	const queue: Array<T> = [];
	const { signal, onSkipped, onError } = options;

	return { add, close };

	function add(item: T): void {
		queue.push(item);
		process();
	}

	async function close(): Promise<void> {
		while (queue.length > 0 || promises.size > 0) {
			if (promises.size > 0) {
				await Promise.race(promises);
			}
			process();
		}
	}

	function process(): void {
		if (signal?.aborted) {
			for (const item of queue.splice(0)) {
				onSkipped?.(item);
			}
			return;
		}
		while (queue.length > 0 && promises.size < concurrency) {
			const item = queue[0];
			queue.shift();

			const promise = processor(item)
				.catch(error => onError(item, error))
				.finally(() => {
					promises.delete(promise);
					process();
				});
			promises.add(promise);
		}
	}
}
