export type MetricTags = Record<string, string>;

/**
 * Observability hook injected at construction. Implementations forward to
 * whatever sink the caller uses; the default does nothing.
 */
export interface MetricsHook {
	increment(name: string, value?: number, tags?: MetricTags): void;
	timing(name: string, valueMs: number, tags?: MetricTags): void;
	gauge(name: string, value: number, tags?: MetricTags): void;
}

export const NOOP_METRICS: MetricsHook = {
	increment: () => undefined,
	timing: () => undefined,
	gauge: () => undefined,
};

export const METRIC = {
	requests: "sync.requests_total",
	retries: "sync.retries_total",
	rateLimited: "sync.rate_limited_total",
	requestDuration: "sync.request_duration_ms",
	rateLimitWait: "sync.rate_limit_wait_ms",
	diffOps: "sync.diff_ops_total",
	uploadSuccess: "sync.upload_success_total",
	uploadFailure: "sync.upload_failure_total",
	uploadsInFlight: "sync.uploads_in_flight",
} as const;

export interface MetricSample {
	kind: "increment" | "timing" | "gauge";
	name: string;
	value: number;
	tags: MetricTags;
}

export interface InMemoryMetrics extends MetricsHook {
	readonly samples: Array<MetricSample>;
	/** Sum of every increment recorded under `name` whose tags include `tags` */
	count(name: string, tags?: MetricTags): number;
}

/**
 * Records every sample in memory. Useful for diagnostics and assertions.
 */
export function createInMemoryMetrics(): InMemoryMetrics {
	const samples: Array<MetricSample> = [];

	return {
		samples,
		increment: (name, value = 1, tags = {}) => {
			samples.push({ kind: "increment", name, value, tags });
		},
		timing: (name, valueMs, tags = {}) => {
			samples.push({ kind: "timing", name, value: valueMs, tags });
		},
		gauge: (name, value, tags = {}) => {
			samples.push({ kind: "gauge", name, value, tags });
		},
		count,
	};

	function count(name: string, tags: MetricTags = {}): number {
		return samples
			.filter(s => s.kind === "increment" && s.name === name)
			.filter(s => Object.entries(tags).every(([key, value]) => s.tags[key] === value))
			.reduce((sum, s) => sum + s.value, 0);
	}
}
