import { type BlockClient, createBlockClient } from "../core/BlockClient";
import { createFileUploadClient, type FileUploadClient } from "../core/FileUploadClient";
import { createTransport, type Transport } from "../core/Transport";
import { detectConflict } from "../diff/ConflictDetector";
import { createDiffExecutor } from "../diff/DiffExecutor";
import { planDiff, planFullReplace, summarizePlan } from "../diff/DiffPlanner";
import { getLog, logError } from "../shared/logger";
import { type ConflictPolicy, resolveSyncOptions, type SyncOptions, type SyncOptionsInput } from "../shared/options";
import type { Block } from "../types/Block";
import type { DiffOp, ExecutionResult } from "../types/DiffOp";
import {
	collectAttachments,
	createUploadOrchestrator,
	dropFailedAttachments,
	type UploadOrchestrator,
	type UploadOutcome,
} from "../upload/UploadOrchestrator";
import { DiffConflictError, SyncCancelledError } from "../util/Errors";
import { type MetricsHook, NOOP_METRICS } from "../util/Metrics";
import { createRateLimiter } from "../util/RateLimiter";

const log = getLog(import.meta);

export type SyncStrategy = "diff" | "full_replace";

export type SyncRequest = {
	resourceId: string;
	/** Desired state of the resource's top-level blocks */
	blocks: ReadonlyArray<Block>;
	/** Overrides the instance's conflict policy for this call */
	onConflict?: ConflictPolicy;
	/** `full_replace` deletes every top-level block and writes `blocks` from scratch. Defaults to `diff`. */
	strategy?: SyncStrategy;
	/** Aborting stops new uploads and prevents any block mutation that has not started */
	signal?: AbortSignal;
};

export type SyncResult = ExecutionResult & {
	strategy: SyncStrategy;
	conflictDetected: boolean;
	uploads: Array<UploadOutcome>;
};

export type DocumentSyncDependencies = {
	transport?: Transport;
	blockClient?: BlockClient;
	uploadClient?: FileUploadClient;
	metrics?: MetricsHook;
	now?: () => number;
};

/** Attachment keys already sent through the orchestrator, and those that failed */
interface AttachmentProgress {
	prepared: Set<string>;
	failed: Set<string>;
}

export interface DocumentSync {
	readonly options: SyncOptions;
	sync(request: SyncRequest): Promise<SyncResult>;
}

/**
 * Wires the planner, uploads, conflict check and executor behind one call.
 * Every remote call shares one transport and therefore one rate limiter.
 */
export function createDocumentSync(input: SyncOptionsInput, deps: DocumentSyncDependencies = {}): DocumentSync {
	const options = resolveSyncOptions(input);
	const metrics = deps.metrics ?? NOOP_METRICS;
	const transport =
		deps.transport ??
		createTransport({
			baseUrl: options.baseUrl,
			token: options.token,
			limiter: createRateLimiter({ ratePerSecond: options.rateLimitRps, burst: options.rateLimitBurst }),
			retry: {
				maxAttempts: options.retryMaxAttempts,
				baseDelayMs: options.retryBaseDelayMs,
				maxDelayMs: options.retryMaxDelayMs,
				jitter: options.retryJitter,
			},
			timeoutMs: options.timeoutMs,
			metrics,
			debugDumpPayload: options.debugDumpPayload,
		});
	const blockClient = deps.blockClient ?? createBlockClient(transport);
	const uploadClient = deps.uploadClient ?? createFileUploadClient(transport);
	const executor = createDiffExecutor({ client: blockClient, maxBatchSize: options.maxBatchSize, metrics });

	return { options, sync };

	async function sync(request: SyncRequest): Promise<SyncResult> {
		try {
			return await run(request);
		} catch (error) {
			logError(log, error, `Sync of ${request.resourceId} failed`);
			throw error;
		}
	}

	async function run(request: SyncRequest): Promise<SyncResult> {
		const { resourceId, blocks: desired, signal } = request;
		const onConflict = request.onConflict ?? options.onConflict;
		const orchestrator = createUploadOrchestrator({
			client: uploadClient,
			policy: { allowedMediaTypes: options.allowedMediaTypes, maxBytes: options.maxAttachmentBytes },
			multipartThresholdBytes: options.multipartThresholdBytes,
			chunkSizeBytes: options.uploadChunkSizeBytes,
			attachTtlMs: options.attachTtlMs,
			metrics,
			now: deps.now,
		});
		const attachments: AttachmentProgress = { prepared: new Set(), failed: new Set() };
		let strategy: SyncStrategy = request.strategy ?? "diff";

		const before = await blockClient.observe(resourceId);
		throwIfAborted(signal);

		let plan =
			strategy === "full_replace"
				? planFullReplace(before.tree, desired)
				: planDiff(before.tree, desired, { minMatchRatio: options.minMatchRatio });
		log.info({ resourceId, strategy, ...summarizePlan(plan) }, "Planned %d operations for %s", plan.length, resourceId);

		plan = await uploadAttachments(plan, orchestrator, attachments, signal);
		throwIfAborted(signal);

		const after = await blockClient.observe(resourceId);
		const conflictDetected = detectConflict(before.snapshot, after.snapshot);

		if (conflictDetected) {
			if (onConflict === "fail") {
				log.warn({ resourceId }, "Resource %s changed while the sync was being prepared", resourceId);
				throw new DiffConflictError(resourceId, {
					before: before.snapshot.lastModified,
					after: after.snapshot.lastModified,
				});
			}
			log.warn({ resourceId }, "Resource %s changed concurrently, overwriting with a full replace", resourceId);
			plan = planFullReplace(after.tree, desired);
			strategy = "full_replace";
			plan = await uploadAttachments(plan, orchestrator, attachments, signal);
			throwIfAborted(signal);
		}

		const execution = await executor.execute(resourceId, plan, orchestrator, signal);
		return { ...execution, strategy, conflictDetected, uploads: orchestrator.outcomes() };
	}

	/**
	 * Validates and uploads every attachment the plan writes that has not been
	 * handled yet, and returns the plan without the blocks whose attachment
	 * failed. Under the `fail` policy the first failure is thrown instead, with
	 * every upload outcome so far in its context.
	 */
	async function uploadAttachments(
		plan: Array<DiffOp>,
		orchestrator: UploadOrchestrator,
		progress: AttachmentProgress,
		signal: AbortSignal | undefined,
	): Promise<Array<DiffOp>> {
		const attachments = collectAttachments(plan).filter(attachment => !progress.prepared.has(attachment.key));
		if (attachments.length > 0) {
			for (const attachment of attachments) {
				progress.prepared.add(attachment.key);
			}

			const { pending, rejected } = orchestrator.prepare(attachments);
			const outcomes = await orchestrator.uploadAll(pending, options.uploadMaxConcurrent, signal);
			log.debug("Uploaded %d of %d attachments", outcomes.length - countFailed(outcomes), attachments.length);

			for (const outcome of [...rejected, ...outcomes]) {
				if (outcome.status === "uploaded") {
					continue;
				}
				if (options.onAttachmentFailure === "fail") {
					Object.assign(outcome.error.context, { uploads: orchestrator.outcomes().map(describeOutcome) });
					throw outcome.error;
				}
				log.warn(
					{ key: outcome.key, reason: outcome.reason },
					"Leaving out blocks that reference attachment %s: %s",
					outcome.key,
					outcome.error.message,
				);
				progress.failed.add(outcome.key);
			}
		}
		return progress.failed.size > 0 ? dropFailedAttachments(plan, progress.failed) : plan;
	}
}

/**
 * One-shot convenience over `createDocumentSync`.
 */
export function syncDocument(
	input: SyncOptionsInput,
	request: SyncRequest,
	deps?: DocumentSyncDependencies,
): Promise<SyncResult> {
	return createDocumentSync(input, deps).sync(request);
}

function throwIfAborted(signal: AbortSignal | undefined): void {
	if (signal?.aborted) {
		throw new SyncCancelledError();
	}
}

function countFailed(outcomes: ReadonlyArray<UploadOutcome>): number {
	return outcomes.filter(outcome => outcome.status === "failed").length;
}

/** Upload outcome without its error object, for error context */
function describeOutcome(outcome: UploadOutcome): Record<string, string> {
	return outcome.status === "uploaded"
		? { key: outcome.key, status: outcome.status, uploadId: outcome.uploadId }
		: { key: outcome.key, status: outcome.status, reason: outcome.reason };
}
