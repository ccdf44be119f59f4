import { getLog } from "../shared/logger";
import {
	AuthError,
	NetworkError,
	NotFoundError,
	PermissionError,
	RateLimitedError,
	RemoteConflictError,
	ServerError,
	SyncError,
	ValidationFailure,
} from "../util/Errors";
import { METRIC, type MetricsHook, NOOP_METRICS } from "../util/Metrics";
import type { RateLimiter } from "../util/RateLimiter";
import { classifyFailure, isRetryableStatus, parseRetryAfter, type RetryPolicy, withRetry } from "../util/Retry";
import type { z } from "zod";

const log = getLog(import.meta);

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

/** Page size used when following cursors */
export const DEFAULT_PAGE_SIZE = 100;

export interface TransportOptions {
	baseUrl: string;
	token: string;
	/** Shared by every call made through this transport */
	limiter: RateLimiter;
	retry: RetryPolicy;
	timeoutMs: number;
	metrics?: MetricsHook;
	/** Log JSON request bodies at debug level */
	debugDumpPayload?: boolean;
	sleep?: (ms: number) => Promise<void>;
	random?: () => number;
}

export interface RequestOptions {
	/** JSON body */
	body?: unknown;
	/** Raw bytes, sent instead of `body` */
	bytes?: Uint8Array;
	contentType?: string;
	query?: Record<string, string | number | undefined>;
}

type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface Page<T> {
	results: Array<T>;
	nextCursor?: string | null | undefined;
}

export interface Transport {
	/** Issues a call and validates the JSON response against `schema`. */
	request<T>(method: HttpMethod, path: string, schema: ResponseSchema<T>, options?: RequestOptions): Promise<T>;
	/** Issues a call whose response body is ignored. */
	send(method: HttpMethod, path: string, options?: RequestOptions): Promise<void>;
	/** Follows `nextCursor` until exhausted and returns every result in order. */
	paginate<T>(path: string, schema: ResponseSchema<Page<T>>, pageSize?: number): Promise<Array<T>>;
}

/**
 * Every remote call goes through here: one limiter slot per attempt, bounded
 * retries for 429, transient 5xx and network failures, and typed errors for
 * everything else.
 */
export function createTransport(options: TransportOptions): Transport {
	const { baseUrl, token, limiter, retry, timeoutMs } = options;
	const metrics = options.metrics ?? NOOP_METRICS;

	return { request, send, paginate };

	async function request<T>(
		method: HttpMethod,
		path: string,
		schema: ResponseSchema<T>,
		requestOptions: RequestOptions = {},
	): Promise<T> {
		const response = await call(method, path, requestOptions);
		const text = await response.text();
		let data: unknown = {};
		if (text) {
			try {
				data = JSON.parse(text);
			} catch (error) {
				throw new ValidationFailure(`Malformed JSON in response to ${method} ${path}`, { method, path }, error);
			}
		}
		const parsed = schema.safeParse(data);
		if (!parsed.success) {
			throw new ValidationFailure(
				`Unexpected response shape from ${method} ${path}: ${parsed.error.message}`,
				{ method, path, issues: parsed.error.issues },
				parsed.error,
			);
		}
		return parsed.data;
	}

	async function send(method: HttpMethod, path: string, requestOptions: RequestOptions = {}): Promise<void> {
		const response = await call(method, path, requestOptions);
		// Drain so the connection can be reused
		await response.arrayBuffer();
	}

	async function paginate<T>(
		path: string,
		schema: ResponseSchema<Page<T>>,
		pageSize: number = DEFAULT_PAGE_SIZE,
	): Promise<Array<T>> {
		const results: Array<T> = [];
		let cursor: string | undefined;
		do {
			const page = await request("GET", path, schema, { query: { cursor, pageSize } });
			results.push(...page.results);
			cursor = page.nextCursor ?? undefined;
		} while (cursor);
		return results;
	}

	function call(method: HttpMethod, path: string, requestOptions: RequestOptions): Promise<Response> {
		const label = `${method} ${path}`;
		const url = buildUrl(path, requestOptions.query);
		const init = createRequest(method, requestOptions);

		if (options.debugDumpPayload && requestOptions.body !== undefined) {
			log.debug({ method, path, body: requestOptions.body }, "Request payload for %s", label);
		}

		return withRetry(attempt => attemptOnce(method, path, url, init, attempt), {
			...retry,
			label,
			isRetryable,
			retryAfterMs: error => (error instanceof RateLimitedError ? error.retryAfterMs : undefined),
			statusOf,
			onRetry: (_attempt, _delayMs, error) =>
				metrics.increment(METRIC.retries, 1, { method, reason: classifyFailure(statusOf(error)) }),
			sleep: options.sleep,
			random: options.random,
		});
	}

	async function attemptOnce(
		method: HttpMethod,
		path: string,
		url: string,
		init: RequestInit,
		attempt: number,
	): Promise<Response> {
		const waited = await limiter.acquire();
		if (waited > 0) {
			metrics.timing(METRIC.rateLimitWait, waited);
			log.debug("Waited %dms for a rate limiter slot before %s %s", waited, method, path);
		}

		const started = Date.now();
		let response: Response;
		try {
			response = await fetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
		} catch (error) {
			metrics.increment(METRIC.requests, 1, { method, status: "network" });
			const message = error instanceof Error ? error.message : String(error);
			throw new NetworkError(`${method} ${path} failed: ${message}`, { method, path, attempt }, error);
		} finally {
			metrics.timing(METRIC.requestDuration, Date.now() - started, { method });
		}

		metrics.increment(METRIC.requests, 1, { method, status: String(response.status) });
		if (response.ok) {
			return response;
		}
		throw await toHttpError(method, path, response);
	}

	function createRequest(method: HttpMethod, requestOptions: RequestOptions): RequestInit {
		const headers: Record<string, string> = {
			Accept: "application/json",
			Authorization: `Bearer ${token}`,
		};
		if (requestOptions.bytes) {
			headers["Content-Type"] = requestOptions.contentType ?? "application/octet-stream";
			return { method, headers, body: requestOptions.bytes };
		}
		if (requestOptions.body !== undefined) {
			headers["Content-Type"] = "application/json";
			return { method, headers, body: JSON.stringify(requestOptions.body) };
		}
		return { method, headers };
	}

	function buildUrl(path: string, query: RequestOptions["query"]): string {
		const params = new URLSearchParams();
		for (const [key, value] of Object.entries(query ?? {})) {
			if (value !== undefined) {
				params.set(key, String(value));
			}
		}
		const search = params.toString();
		return `${baseUrl}${path}${search ? `?${search}` : ""}`;
	}

	async function toHttpError(method: HttpMethod, path: string, response: Response): Promise<SyncError> {
		const status = response.status;
		const detail = await readErrorDetail(response);
		const message = `${method} ${path} returned ${status}${detail ? `: ${detail}` : ""}`;
		const context = { method, path, status };

		if (status === 429) {
			metrics.increment(METRIC.rateLimited, 1, { method });
			return new RateLimitedError(message, parseRetryAfter(response.headers.get("retry-after")), context);
		}
		if (status >= 500) {
			return new ServerError(message, status, context);
		}
		switch (status) {
			case 401:
				return new AuthError(message, context);
			case 403:
				return new PermissionError(message, context);
			case 404:
				return new NotFoundError(message, context);
			case 409:
				return new RemoteConflictError(message, context);
			default:
				return new ValidationFailure(message, context);
		}
	}
}

function isRetryable(error: unknown): boolean {
	if (error instanceof RateLimitedError || error instanceof NetworkError) {
		return true;
	}
	return error instanceof ServerError && isRetryableStatus(error.status);
}

function statusOf(error: unknown): number | undefined {
	if (error instanceof SyncError && typeof error.context.status === "number") {
		return error.context.status;
	}
	return;
}

async function readErrorDetail(response: Response): Promise<string> {
	let text: string;
	try {
		text = await response.text();
	} catch (error) {
		log.debug("Could not read error body: %s", error instanceof Error ? error.message : String(error));
		return "";
	}
	return messageFromJson(text) ?? text.slice(0, 200);
}

function messageFromJson(text: string): string | undefined {
	let body: unknown;
	try {
		body = JSON.parse(text);
	} catch {
		return;
	}
	if (typeof body === "object" && body !== null && "message" in body && typeof body.message === "string") {
		return body.message;
	}
	return;
}
