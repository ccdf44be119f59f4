import type { FileUploadClient, UploadedPart } from "../core/FileUploadClient";
import { getLog } from "../shared/logger";
import type { Attachment, Block } from "../types/Block";
import type { DiffOp } from "../types/DiffOp";
import {
	AttachmentRejectedError,
	RetryExhaustedError,
	SyncCancelledError,
	type SyncError,
	UploadExpiredError,
	UploadTransportFailure,
	ValidationFailure,
} from "../util/Errors";
import { METRIC, type MetricsHook, NOOP_METRICS } from "../util/Metrics";
import { createQueue } from "../util/Queue";
import { type AttachmentPolicy, validateAttachment } from "./AttachmentValidator";
import { UploadStateMachine } from "./UploadStateMachine";

const log = getLog(import.meta);

export const DEFAULT_CHUNK_SIZE_BYTES = 5 * 1024 * 1024;
export const DEFAULT_ATTACH_TTL_MS = 60 * 60 * 1000;

/** An attachment that passed validation and is waiting to be transferred */
export interface PendingUpload {
	key: string;
	name: string;
	mediaType: string;
	size: number;
	data: Uint8Array;
	machine: UploadStateMachine;
}

export type UploadFailureReason = "transport" | "retry_exhausted" | "expired" | "cancelled" | "invalid";

export type UploadOutcome =
	| { key: string; status: "uploaded"; uploadId: string; reuploads: number }
	| { key: string; status: "failed"; reason: UploadFailureReason; error: SyncError };

/**
 * What the executor needs from the upload side: a usable upload id for an
 * attachment key, and a way to report that the reference was consumed.
 */
export interface AttachmentResolver {
	resolve(key: string): Promise<string>;
	markAttached(key: string): void;
}

export interface UploadOrchestratorOptions {
	client: FileUploadClient;
	policy: AttachmentPolicy;
	/** Sizes above this go through multi-part transfer */
	multipartThresholdBytes: number;
	chunkSizeBytes?: number;
	/** How long an uploaded file may wait before it has to be attached */
	attachTtlMs?: number;
	metrics?: MetricsHook;
	now?: () => number;
}

export interface PreparedUploads {
	pending: Array<PendingUpload>;
	rejected: Array<UploadOutcome>;
}

export interface UploadOrchestrator extends AttachmentResolver {
	/** Validates attachments and registers the valid ones as pending uploads. */
	prepare(attachments: ReadonlyArray<Attachment>): PreparedUploads;
	/**
	 * Transfers every pending upload, at most `maxConcurrent` at a time. Outcomes
	 * come back in input order. Once `signal` aborts no further transfers start.
	 */
	uploadAll(pending: ReadonlyArray<PendingUpload>, maxConcurrent: number, signal?: AbortSignal): Promise<Array<UploadOutcome>>;
	/** Latest outcome of every attachment seen so far */
	outcomes(): Array<UploadOutcome>;
}

/**
 * Every attachment the plan writes, once per key. Inserted and replaced blocks
 * are written with their whole subtree; an updated block's children have ops of
 * their own.
 */
export function collectAttachments(ops: ReadonlyArray<DiffOp>): Array<Attachment> {
	const found = new Map<string, Attachment>();
	const visit = (block: Block, withChildren: boolean) => {
		if (block.attachment && !found.has(block.attachment.key)) {
			found.set(block.attachment.key, block.attachment);
		}
		if (withChildren) {
			for (const child of block.children ?? []) {
				visit(child, true);
			}
		}
	};
	for (const op of ops) {
		if (op.type === "insert" || op.type === "replace") {
			visit(op.block, true);
		} else if (op.type === "update") {
			visit(op.block, false);
		}
	}
	return [...found.values()];
}

/**
 * Leaves every block that references a failed attachment out of the plan.
 * Inserted and replaced subtrees lose only the offending blocks. A replaced
 * block whose own attachment failed is still deleted, and an updated block
 * whose own attachment failed keeps its remote content.
 */
export function dropFailedAttachments(ops: ReadonlyArray<DiffOp>, failed: ReadonlySet<string>): Array<DiffOp> {
	const isFailed = (block: Block) => block.attachment !== undefined && failed.has(block.attachment.key);
	const prune = (block: Block): Block | undefined => {
		if (isFailed(block)) {
			return;
		}
		if (!block.children) {
			return block;
		}
		return { ...block, children: block.children.flatMap(child => prune(child) ?? []) };
	};

	const kept: Array<DiffOp> = [];
	for (const op of ops) {
		switch (op.type) {
			case "keep":
			case "delete":
				kept.push(op);
				break;
			case "update":
				kept.push(
					isFailed(op.block) ? { type: "keep", existingId: op.existingId, parentId: op.parentId, depth: op.depth } : op,
				);
				break;
			case "insert": {
				const block = prune(op.block);
				if (block) {
					kept.push({ ...op, block });
				}
				break;
			}
			case "replace": {
				const block = prune(op.block);
				kept.push(
					block
						? { ...op, block }
						: { type: "delete", existingId: op.existingId, parentId: op.parentId, depth: op.depth },
				);
				break;
			}
			default: {
				const unreachable: never = op;
				throw new ValidationFailure(`Unknown operation ${JSON.stringify(unreachable)}`);
			}
		}
	}
	return kept;
}

export function splitIntoChunks(data: Uint8Array, chunkSize: number): Array<Uint8Array> {
	const chunks: Array<Uint8Array> = [];
	for (let offset = 0; offset < data.length; offset += chunkSize) {
		chunks.push(data.subarray(offset, offset + chunkSize));
	}
	return chunks;
}

export function createUploadOrchestrator(options: UploadOrchestratorOptions): UploadOrchestrator {
	const { client, policy, multipartThresholdBytes } = options;
	const chunkSizeBytes = options.chunkSizeBytes ?? DEFAULT_CHUNK_SIZE_BYTES;
	const attachTtlMs = options.attachTtlMs ?? DEFAULT_ATTACH_TTL_MS;
	const metrics = options.metrics ?? NOOP_METRICS;
	const now = options.now ?? Date.now;

	const entries = new Map<string, PendingUpload>();
	const latest = new Map<string, UploadOutcome>();

	return { prepare, uploadAll, outcomes, resolve, markAttached };

	function prepare(attachments: ReadonlyArray<Attachment>): PreparedUploads {
		const pending: Array<PendingUpload> = [];
		const rejected: Array<UploadOutcome> = [];

		for (const attachment of attachments) {
			const result = validateAttachment(attachment, policy);
			if (!result.valid) {
				const outcome: UploadOutcome = {
					key: attachment.key,
					status: "failed",
					reason: "invalid",
					error: new AttachmentRejectedError(`Attachment ${attachment.name} rejected: ${result.error}`, {
						key: attachment.key,
					}),
				};
				latest.set(attachment.key, outcome);
				rejected.push(outcome);
				continue;
			}
			const upload: PendingUpload = {
				key: attachment.key,
				name: attachment.name,
				mediaType: result.mediaType,
				size: attachment.data.length,
				data: attachment.data,
				machine: new UploadStateMachine(attachment.key, now),
			};
			entries.set(upload.key, upload);
			pending.push(upload);
		}

		return { pending, rejected };
	}

	async function uploadAll(
		pending: ReadonlyArray<PendingUpload>,
		maxConcurrent: number,
		signal?: AbortSignal,
	): Promise<Array<UploadOutcome>> {
		const results = new Map<PendingUpload, UploadOutcome>();
		let fatal: unknown;
		let inFlight = 0;

		const queue = createQueue<PendingUpload>(
			maxConcurrent,
			async upload => {
				metrics.gauge(METRIC.uploadsInFlight, ++inFlight);
				try {
					results.set(upload, await transfer(upload));
				} finally {
					metrics.gauge(METRIC.uploadsInFlight, --inFlight);
				}
			},
			{
				signal,
				onSkipped: upload => {
					const outcome: UploadOutcome = {
						key: upload.key,
						status: "failed",
						reason: "cancelled",
						error: new SyncCancelledError(`Upload ${upload.key} was not started`),
					};
					latest.set(upload.key, outcome);
					results.set(upload, outcome);
				},
				onError: (_upload, error) => {
					fatal ??= error;
				},
			},
		);

		for (const upload of pending) {
			entries.set(upload.key, upload);
			queue.add(upload);
		}
		await queue.close();

		if (fatal !== undefined) {
			throw fatal;
		}

		return pending.map(upload => {
			const outcome = results.get(upload);
			if (!outcome) {
				throw new ValidationFailure(`Upload ${upload.key} finished without an outcome`);
			}
			return outcome;
		});
	}

	async function transfer(upload: PendingUpload): Promise<UploadOutcome> {
		const { key, machine } = upload;
		machine.transition("uploading");
		log.debug({ key, size: upload.size }, "Uploading %s (%d bytes)", upload.name, upload.size);

		let outcome: UploadOutcome;
		try {
			const { uploadId, partTags } = upload.size > multipartThresholdBytes ? await sendMultiPart(upload) : await sendSinglePart(upload);
			machine.markUploaded(uploadId, partTags);
			metrics.increment(METRIC.uploadSuccess, 1);
			outcome = { key, status: "uploaded", uploadId, reuploads: machine.record.reuploads };
		} catch (error) {
			machine.transition("failed");
			metrics.increment(METRIC.uploadFailure, 1);
			const reason: UploadFailureReason = error instanceof RetryExhaustedError ? "retry_exhausted" : "transport";
			const message = error instanceof Error ? error.message : String(error);
			log.warn({ key, reason }, "Upload of %s failed: %s", upload.name, message);
			outcome = {
				key,
				status: "failed",
				reason,
				error: new UploadTransportFailure(`Upload ${key} failed: ${message}`, { key, reason }, error),
			};
		}
		latest.set(key, outcome);
		return outcome;
	}

	async function sendSinglePart(upload: PendingUpload): Promise<{ uploadId: string; partTags: Array<string> }> {
		const slot = await client.createUpload({ name: upload.name, mediaType: upload.mediaType, mode: "single_part" });
		await client.sendContent(slot.id, upload.data, upload.mediaType);
		return { uploadId: slot.id, partTags: [] };
	}

	async function sendMultiPart(upload: PendingUpload): Promise<{ uploadId: string; partTags: Array<string> }> {
		const chunks = splitIntoChunks(upload.data, chunkSizeBytes);
		const slot = await client.createUpload({
			name: upload.name,
			mediaType: upload.mediaType,
			mode: "multi_part",
			partCount: chunks.length,
		});
		const parts: Array<UploadedPart> = [];
		for (const [index, chunk] of chunks.entries()) {
			const partNumber = index + 1;
			parts.push({ partNumber, tag: await client.sendPart(slot.id, partNumber, chunk, upload.mediaType) });
		}
		const completed = await client.completeUpload(slot.id, parts);
		if (completed.status !== "uploaded") {
			throw new UploadTransportFailure(`Upload ${upload.key} was not finalized (status ${completed.status})`, {
				key: upload.key,
				status: completed.status,
			});
		}
		return { uploadId: slot.id, partTags: parts.map(part => part.tag) };
	}

	async function hasExpired(upload: PendingUpload): Promise<boolean> {
		if (!upload.machine.isAttachWindowOpen(attachTtlMs)) {
			return true;
		}
		const { uploadId } = upload.machine.record;
		if (uploadId === undefined) {
			return true;
		}
		const slot = await client.retrieveUpload(uploadId);
		return slot.status === "expired";
	}

	async function resolve(key: string): Promise<string> {
		const upload = entries.get(key);
		if (!upload) {
			throw new ValidationFailure(`No upload is registered for attachment ${key}`, { key });
		}
		const { machine } = upload;

		if (machine.state === "uploaded" && (await hasExpired(upload))) {
			log.info({ key }, "Upload %s expired before it was attached", key);
			machine.transition("expired");
		}

		if (machine.state === "expired") {
			if (machine.record.reuploads > 0) {
				const error = new UploadExpiredError(key, { reuploads: machine.record.reuploads });
				latest.set(key, { key, status: "failed", reason: "expired", error });
				throw error;
			}
			log.info({ key }, "Re-uploading %s after expiry", key);
			const outcome = await transfer(upload);
			if (outcome.status === "failed") {
				throw outcome.error;
			}
		}

		const { uploadId } = machine.record;
		if (machine.state === "attached" && uploadId !== undefined) {
			return uploadId;
		}
		machine.assertCanAttach();
		if (uploadId === undefined) {
			throw new ValidationFailure(`Upload ${key} has no remote id`, { key });
		}
		return uploadId;
	}

	function markAttached(key: string): void {
		const upload = entries.get(key);
		if (upload?.machine.state === "uploaded") {
			upload.machine.transition("attached");
		}
	}

	function outcomes(): Array<UploadOutcome> {
		return [...latest.values()];
	}
}
