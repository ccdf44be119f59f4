/**
 * Error taxonomy for the sync core. Every error raised by this library extends
 * `SyncError` and carries a machine-readable `code` plus structured `context`.
 */

import type { ExecutionResult } from "../types/DiffOp";

export type SyncErrorCode =
	| "VALIDATION_ERROR"
	| "AUTH_ERROR"
	| "PERMISSION_ERROR"
	| "NOT_FOUND"
	| "REMOTE_CONFLICT"
	| "SERVER_ERROR"
	| "RATE_LIMITED"
	| "RETRY_EXHAUSTED"
	| "NETWORK_ERROR"
	| "DIFF_CONFLICT"
	| "EXECUTION_FAILED"
	| "UPLOAD_EXPIRED"
	| "UPLOAD_TRANSPORT_ERROR"
	| "UPLOAD_STATE_MISMATCH"
	| "ATTACHMENT_REJECTED"
	| "ILLEGAL_STATE_TRANSITION"
	| "CANCELLED";

export type ErrorContext = Record<string, unknown>;

export class SyncError extends Error {
	readonly code: SyncErrorCode;
	readonly context: ErrorContext;

	constructor(code: SyncErrorCode, message: string, context: ErrorContext = {}, cause?: unknown) {
		super(message, cause === undefined ? undefined : { cause });
		this.name = "SyncError";
		this.code = code;
		this.context = context;
	}
}

/**
 * Narrows an unknown value to a SyncError, optionally of a specific code.
 */
export function isSyncError(err: unknown, code?: SyncErrorCode): err is SyncError {
	return err instanceof SyncError && (code === undefined || err.code === code);
}

/** Malformed input to the planner or executor, or a bad request (HTTP 400 / other 4xx). Never retried. */
export class ValidationFailure extends SyncError {
	constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
		super("VALIDATION_ERROR", message, context, cause);
		this.name = "ValidationFailure";
	}
}

export class AuthError extends SyncError {
	constructor(message: string, context: ErrorContext = {}) {
		super("AUTH_ERROR", message, context);
		this.name = "AuthError";
	}
}

export class PermissionError extends SyncError {
	constructor(message: string, context: ErrorContext = {}) {
		super("PERMISSION_ERROR", message, context);
		this.name = "PermissionError";
	}
}

export class NotFoundError extends SyncError {
	constructor(message: string, context: ErrorContext = {}) {
		super("NOT_FOUND", message, context);
		this.name = "NotFoundError";
	}
}

/** HTTP 409 from the remote. Distinct from a detected DiffConflict. */
export class RemoteConflictError extends SyncError {
	constructor(message: string, context: ErrorContext = {}) {
		super("REMOTE_CONFLICT", message, context);
		this.name = "RemoteConflictError";
	}
}

/** 5xx from the remote. Retried by Transport when the status is transient. */
export class ServerError extends SyncError {
	readonly status: number;

	constructor(message: string, status: number, context: ErrorContext = {}) {
		super("SERVER_ERROR", message, { ...context, status });
		this.name = "ServerError";
		this.status = status;
	}
}

/**
 * Raised for a single 429 response. Transport handles it internally and only
 * the wrapping RetryExhaustedError escapes once attempts run out.
 */
export class RateLimitedError extends SyncError {
	readonly retryAfterMs: number | undefined;

	constructor(message: string, retryAfterMs: number | undefined, context: ErrorContext = {}) {
		super("RATE_LIMITED", message, { ...context, retryAfterMs });
		this.name = "RateLimitedError";
		this.retryAfterMs = retryAfterMs;
	}
}

export class NetworkError extends SyncError {
	constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
		super("NETWORK_ERROR", message, context, cause);
		this.name = "NetworkError";
	}
}

export class RetryExhaustedError extends SyncError {
	readonly attempts: number;
	readonly lastStatus: number | undefined;

	constructor(message: string, attempts: number, lastStatus: number | undefined, cause?: unknown) {
		super("RETRY_EXHAUSTED", message, { attempts, lastStatus }, cause);
		this.name = "RetryExhaustedError";
		this.attempts = attempts;
		this.lastStatus = lastStatus;
	}
}

/** The remote resource changed between the two snapshots. */
export class DiffConflictError extends SyncError {
	constructor(resourceId: string, context: ErrorContext = {}) {
		super("DIFF_CONFLICT", `Resource ${resourceId} changed since it was observed`, { ...context, resourceId });
		this.name = "DiffConflictError";
	}
}

/**
 * A plan stopped part way. `partial` counts the operations that landed before
 * the failure; `cause` is the error that stopped it.
 */
export class ExecutionFailedError extends SyncError {
	readonly partial: ExecutionResult;

	constructor(partial: ExecutionResult, cause: unknown) {
		const reason = cause instanceof Error ? cause.message : String(cause);
		super("EXECUTION_FAILED", `Plan execution stopped after partial progress: ${reason}`, { ...partial }, cause);
		this.name = "ExecutionFailedError";
		this.partial = partial;
	}
}

export class UploadExpiredError extends SyncError {
	constructor(key: string, context: ErrorContext = {}) {
		super("UPLOAD_EXPIRED", `Upload ${key} expired before it was attached`, { ...context, key });
		this.name = "UploadExpiredError";
	}
}

export class UploadTransportFailure extends SyncError {
	constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
		super("UPLOAD_TRANSPORT_ERROR", message, context, cause);
		this.name = "UploadTransportFailure";
	}
}

export class UploadStateMismatchError extends SyncError {
	constructor(key: string, state: string) {
		super("UPLOAD_STATE_MISMATCH", `Upload ${key} cannot be attached in state ${state}`, { key, state });
		this.name = "UploadStateMismatchError";
	}
}

export class AttachmentRejectedError extends SyncError {
	constructor(message: string, context: ErrorContext = {}) {
		super("ATTACHMENT_REJECTED", message, context);
		this.name = "AttachmentRejectedError";
	}
}

/** Programming error: the requested transition is not in the upload transition table. */
export class IllegalStateTransitionError extends SyncError {
	readonly from: string;
	readonly to: string;

	constructor(from: string, to: string) {
		super("ILLEGAL_STATE_TRANSITION", `Illegal upload state transition ${from} -> ${to}`, { from, to });
		this.name = "IllegalStateTransitionError";
		this.from = from;
		this.to = to;
	}
}

export class SyncCancelledError extends SyncError {
	constructor(message = "Synchronization was cancelled") {
		super("CANCELLED", message);
		this.name = "SyncCancelledError";
	}
}
