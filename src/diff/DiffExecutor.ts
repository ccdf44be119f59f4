import type { BlockClient } from "../core/BlockClient";
import { getLog } from "../shared/logger";
import type { Block } from "../types/Block";
import { type DiffOp, type ExecutionResult, emptyExecutionResult, type InsertOp, type InsertPosition } from "../types/DiffOp";
import type { WireBlock } from "../types/Wire";
import type { AttachmentResolver } from "../upload/UploadOrchestrator";
import { ExecutionFailedError, SyncCancelledError, ValidationFailure } from "../util/Errors";
import { METRIC, type MetricsHook, NOOP_METRICS } from "../util/Metrics";

const log = getLog(import.meta);

/** Largest number of blocks the remote accepts in one append call */
export const MAX_BATCH_SIZE = 100;

export interface DiffExecutorOptions {
	client: BlockClient;
	maxBatchSize?: number;
	metrics?: MetricsHook;
}

export interface DiffExecutor {
	/**
	 * Applies `ops` to the resource in plan order. Attachment references are
	 * resolved through `attachments` right before the op that writes them.
	 * `signal` is checked before every op; a call already issued is never aborted.
	 *
	 * @throws ValidationFailure before any call when the plan references
	 * attachments and no resolver is given
	 * @throws ExecutionFailedError when a call fails part way through the plan, or
	 * with a SyncCancelledError cause when `signal` aborts before the plan is done
	 */
	execute(
		resourceId: string,
		ops: ReadonlyArray<DiffOp>,
		attachments?: AttachmentResolver,
		signal?: AbortSignal,
	): Promise<ExecutionResult>;
}

export function createDiffExecutor(options: DiffExecutorOptions): DiffExecutor {
	const { client } = options;
	const maxBatchSize = options.maxBatchSize ?? MAX_BATCH_SIZE;
	const metrics = options.metrics ?? NOOP_METRICS;

	if (!Number.isInteger(maxBatchSize) || maxBatchSize < 1 || maxBatchSize > MAX_BATCH_SIZE) {
		throw new ValidationFailure(`maxBatchSize must be an integer between 1 and ${MAX_BATCH_SIZE}, got ${maxBatchSize}`);
	}

	return { execute };

	async function execute(
		resourceId: string,
		ops: ReadonlyArray<DiffOp>,
		attachments?: AttachmentResolver,
		signal?: AbortSignal,
	): Promise<ExecutionResult> {
		if (!attachments) {
			const key = findAttachmentKey(ops);
			if (key !== undefined) {
				throw new ValidationFailure(`Plan references attachment ${key} but no attachment resolver was given`, {
					key,
				});
			}
		}

		const result = emptyExecutionResult();
		// Last block positioned under each parent, for afterPrevious insertions
		const lastPlaced = new Map<string, string>();

		const append = async (parent: string, after: string | null, blocks: ReadonlyArray<Block>) => {
			const keys: Array<string> = [];
			const children: Array<WireBlock> = [];
			for (const block of blocks) {
				children.push(await toWireBlock(block, true, attachments, keys));
			}
			const ids = await client.appendChildren(parent, after, children);
			result.callCount++;
			markAttached(attachments, keys);
			const last = ids.at(-1);
			if (last !== undefined) {
				lastPlaced.set(parent, last);
			}
			return last ?? after;
		};

		let index = 0;
		try {
			while (index < ops.length) {
				if (signal?.aborted) {
					throw new SyncCancelledError(`Sync of ${resourceId} was cancelled with ${ops.length - index} operations left`);
				}
				const op = ops[index];
				const parent = op.parentId ?? resourceId;
				let applied = 1;

				switch (op.type) {
					case "keep":
						lastPlaced.set(parent, op.existingId);
						result.kept++;
						break;
					case "update": {
						const keys: Array<string> = [];
						await client.patchBlock(op.existingId, await toWireBlock(op.block, false, attachments, keys));
						result.callCount++;
						markAttached(attachments, keys);
						lastPlaced.set(parent, op.existingId);
						result.updated++;
						break;
					}
					case "delete":
						await client.deleteBlock(op.existingId);
						result.callCount++;
						result.deleted++;
						break;
					case "replace":
						await client.deleteBlock(op.existingId);
						result.callCount++;
						// Reported as a delete until the new block lands
						result.deleted++;
						await append(parent, afterFor(op.position, parent, lastPlaced), [op.block]);
						result.deleted--;
						result.replaced++;
						break;
					case "insert": {
						const run = takeInsertRun(ops, index, op);
						let after = afterFor(op.position, parent, lastPlaced);
						for (let start = 0; start < run.length; start += maxBatchSize) {
							const chunk = run.slice(start, start + maxBatchSize);
							after = await append(
								parent,
								after,
								chunk.map(insert => insert.block),
							);
							result.inserted += chunk.length;
						}
						applied = run.length;
						break;
					}
					default: {
						const unreachable: never = op;
						throw new ValidationFailure(`Unknown operation ${JSON.stringify(unreachable)}`);
					}
				}

				log.debug({ resourceId, parent, count: applied }, "Applied %s x%d", op.type, applied);
				metrics.increment(METRIC.diffOps, applied, { type: op.type });
				index += applied;
			}
		} catch (error) {
			const partial = { ...result };
			log.warn({ resourceId, index, partial }, "Plan execution stopped at op %d of %d", index + 1, ops.length);
			throw new ExecutionFailedError(partial, error);
		}

		log.info(
			{ resourceId, ...result },
			"Applied %d operations to %s with %d calls",
			ops.length,
			resourceId,
			result.callCount,
		);
		return result;
	}
}

/**
 * The insert at `start` plus every following insert under the same parent that
 * chains onto it.
 */
function takeInsertRun(ops: ReadonlyArray<DiffOp>, start: number, first: InsertOp): Array<InsertOp> {
	const run = [first];
	for (let i = start + 1; i < ops.length; i++) {
		const next = ops[i];
		if (next.type !== "insert" || next.parentId !== first.parentId || next.position.type !== "afterPrevious") {
			break;
		}
		run.push(next);
	}
	return run;
}

function afterFor(position: InsertPosition, parent: string, lastPlaced: ReadonlyMap<string, string>): string | null {
	switch (position.type) {
		case "start":
			return null;
		case "after":
			return position.blockId;
		case "afterPrevious":
			return lastPlaced.get(parent) ?? null;
	}
}

/**
 * Serializes a block for the wire, resolving attachment references on the way.
 * Resolved keys are appended to `keys` so they can be marked once the call lands.
 */
async function toWireBlock(
	block: Block,
	withChildren: boolean,
	attachments: AttachmentResolver | undefined,
	keys: Array<string>,
): Promise<WireBlock> {
	const wire: WireBlock = { kind: block.kind, text: block.text, attributes: block.attributes ?? {} };
	if (block.payload) {
		wire.payload = block.payload;
	}
	if (block.attachment) {
		if (!attachments) {
			throw new ValidationFailure(`Block references attachment ${block.attachment.key} but no resolver was given`);
		}
		wire.attachmentId = await attachments.resolve(block.attachment.key);
		keys.push(block.attachment.key);
	}
	if (withChildren && block.children && block.children.length > 0) {
		const children: Array<WireBlock> = [];
		for (const child of block.children) {
			children.push(await toWireBlock(child, true, attachments, keys));
		}
		wire.children = children;
	}
	return wire;
}

function markAttached(attachments: AttachmentResolver | undefined, keys: ReadonlyArray<string>): void {
	for (const key of keys) {
		attachments?.markAttached(key);
	}
}

function findAttachmentKey(ops: ReadonlyArray<DiffOp>): string | undefined {
	const search = (block: Block): string | undefined =>
		block.attachment?.key ?? block.children?.map(search).find(key => key !== undefined);
	for (const op of ops) {
		if (op.type === "insert" || op.type === "update" || op.type === "replace") {
			const key = search(op.type === "update" ? { ...op.block, children: [] } : op.block);
			if (key !== undefined) {
				return key;
			}
		}
	}
	return;
}
