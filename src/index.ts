export { type BlockClient, createBlockClient, type ObservedTree } from "./core/BlockClient";
export {
	type CreateUploadRequest,
	createFileUploadClient,
	type FileUploadClient,
	type UploadedPart,
} from "./core/FileUploadClient";
export { createTransport, type HttpMethod, type Transport, type TransportOptions } from "./core/Transport";
export { detectConflict, snapshotFromTree } from "./diff/ConflictDetector";
export { createDiffExecutor, type DiffExecutor, type DiffExecutorOptions, MAX_BATCH_SIZE } from "./diff/DiffExecutor";
export { DEFAULT_MIN_MATCH_RATIO, type PlanOptions, planDiff, planFullReplace, summarizePlan } from "./diff/DiffPlanner";
export { type MatchResult, matchBy, matchSequences } from "./diff/SequenceMatcher";
export { type BlockSignature, computeSignature, normalizeText, signaturesEqual } from "./diff/Signature";
export { type Config, getConfig, resetConfig } from "./shared/config";
export { getLog, type Logger, type LogLevel } from "./shared/logger";
export {
	type AttachmentFailurePolicy,
	type ConflictPolicy,
	resolveSyncOptions,
	type SyncOptions,
	type SyncOptionsInput,
	SyncOptionsSchema,
} from "./shared/options";
export {
	createDocumentSync,
	type DocumentSync,
	type DocumentSyncDependencies,
	type SyncRequest,
	type SyncResult,
	type SyncStrategy,
	syncDocument,
} from "./sync/DocumentSync";
export type { Attachment, Block } from "./types/Block";
export type { DiffOp, DiffOpType, ExecutionResult, InsertPosition } from "./types/DiffOp";
export type { PageSnapshot } from "./types/Snapshot";
export type { WireBlock } from "./types/Wire";
export {
	type AttachmentPolicy,
	DEFAULT_ALLOWED_MEDIA_TYPES,
	DEFAULT_MAX_ATTACHMENT_BYTES,
	detectMediaType,
	validateAttachment,
} from "./upload/AttachmentValidator";
export {
	type AttachmentResolver,
	collectAttachments,
	createUploadOrchestrator,
	type UploadOrchestrator,
	type UploadOutcome,
} from "./upload/UploadOrchestrator";
export { type UploadRecord, type UploadState, UploadStateMachine } from "./upload/UploadStateMachine";
export * from "./util/Errors";
export { createInMemoryMetrics, METRIC, type MetricsHook, NOOP_METRICS } from "./util/Metrics";
export { createRateLimiter, type RateLimiter } from "./util/RateLimiter";
export { DEFAULT_RETRY_POLICY, type RetryPolicy, withRetry } from "./util/Retry";
