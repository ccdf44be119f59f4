import type { Block } from "../types/Block";
import type { DiffOp, DiffOpType, InsertPosition } from "../types/DiffOp";
import { ValidationFailure } from "../util/Errors";
import { matchBy, matchSequences } from "./SequenceMatcher";
import { computeSignature, textHashOf } from "./Signature";

/** Below this share of exact matches a level is rebuilt instead of diffed */
export const DEFAULT_MIN_MATCH_RATIO = 0.3;

export interface PlanOptions {
	minMatchRatio?: number;
}

type PairKind = "keep" | "content";

interface AlignedPair {
	oldIndex: number;
	newIndex: number;
	kind: PairKind;
}

/**
 * Tracks where the next insertion at one level goes.
 */
class LevelCursor {
	private position: InsertPosition = { type: "start" };

	next(): InsertPosition {
		const current = this.position;
		this.position = { type: "afterPrevious" };
		return current;
	}

	anchorAt(blockId: string): void {
		this.position = { type: "after", blockId };
	}
}

/**
 * Plans the operations that turn `existing` (the remote tree) into `desired`.
 *
 * Ops are ordered for execution: each level's ops appear in sibling order and
 * the child plan of a kept or updated block follows right after that block's op.
 */
export function planDiff(
	existing: ReadonlyArray<Block>,
	desired: ReadonlyArray<Block>,
	options: PlanOptions = {},
): Array<DiffOp> {
	const minMatchRatio = options.minMatchRatio ?? DEFAULT_MIN_MATCH_RATIO;
	if (!(minMatchRatio >= 0 && minMatchRatio <= 1)) {
		throw new ValidationFailure(`minMatchRatio must be between 0 and 1, got ${minMatchRatio}`);
	}
	return planLevel(existing, desired, undefined, 0, minMatchRatio);
}

/**
 * Deletes every existing top-level block and inserts every desired one.
 */
export function planFullReplace(existing: ReadonlyArray<Block>, desired: ReadonlyArray<Block>): Array<DiffOp> {
	const existingIds = requireIds(existing, 0);
	validateDesired(desired, 0);
	return rebuildLevel(existingIds, desired, undefined, 0);
}

export function summarizePlan(ops: ReadonlyArray<DiffOp>): Record<DiffOpType, number> {
	const counts: Record<DiffOpType, number> = { keep: 0, update: 0, replace: 0, insert: 0, delete: 0 };
	for (const op of ops) {
		counts[op.type]++;
	}
	return counts;
}

function planLevel(
	existing: ReadonlyArray<Block>,
	desired: ReadonlyArray<Block>,
	parentId: string | undefined,
	depth: number,
	minMatchRatio: number,
): Array<DiffOp> {
	const existingIds = requireIds(existing, depth);
	validateDesired(desired, depth);

	if (existing.length === 0 || desired.length === 0) {
		return rebuildLevel(existingIds, desired, parentId, depth);
	}

	const match = matchSequences(
		existing.map(block => computeSignature(block, depth)),
		desired.map(block => computeSignature(block, depth)),
	);
	const ratio = match.pairs.length / Math.max(existing.length, desired.length);
	if (ratio < minMatchRatio) {
		return rebuildLevel(existingIds, desired, parentId, depth);
	}

	const ops: Array<DiffOp> = [];
	const cursor = new LevelCursor();
	let oldIndex = 0;
	let newIndex = 0;

	for (const pair of alignLevel(existing, desired, match.pairs)) {
		for (; oldIndex < pair.oldIndex; oldIndex++) {
			ops.push({ type: "delete", existingId: existingIds[oldIndex], parentId, depth });
		}
		for (; newIndex < pair.newIndex; newIndex++) {
			ops.push({ type: "insert", block: desired[newIndex], position: cursor.next(), parentId, depth });
		}

		const before = existing[pair.oldIndex];
		const after = desired[pair.newIndex];
		const existingId = existingIds[pair.oldIndex];

		if (pair.kind === "content" && before.kind !== after.kind) {
			// A kind change is never patched in place; the new block is rebuilt with its children.
			ops.push({ type: "replace", existingId, block: after, position: cursor.next(), parentId, depth });
		} else {
			ops.push(
				pair.kind === "keep"
					? { type: "keep", existingId, parentId, depth }
					: { type: "update", existingId, block: after, parentId, depth },
			);
			cursor.anchorAt(existingId);
			ops.push(...planLevel(before.children ?? [], after.children ?? [], existingId, depth + 1, minMatchRatio));
		}

		oldIndex = pair.oldIndex + 1;
		newIndex = pair.newIndex + 1;
	}

	for (; oldIndex < existing.length; oldIndex++) {
		ops.push({ type: "delete", existingId: existingIds[oldIndex], parentId, depth });
	}
	for (; newIndex < desired.length; newIndex++) {
		ops.push({ type: "insert", block: desired[newIndex], position: cursor.next(), parentId, depth });
	}

	return ops;
}

/**
 * Combines the exact signature matches with a second pass inside each gap
 * between them that pairs blocks whose normalized text is identical. Those
 * secondary pairs become updates (same kind) or replacements (kind changed).
 */
function alignLevel(
	existing: ReadonlyArray<Block>,
	desired: ReadonlyArray<Block>,
	exactPairs: ReadonlyArray<[number, number]>,
): Array<AlignedPair> {
	const aligned: Array<AlignedPair> = [];
	let oldStart = 0;
	let newStart = 0;

	const pairGap = (oldEnd: number, newEnd: number) => {
		const oldGap = existing.slice(oldStart, oldEnd);
		const newGap = desired.slice(newStart, newEnd);
		if (oldGap.length === 0 || newGap.length === 0) {
			return;
		}
		const { pairs } = matchBy(oldGap.map(textHashOf), newGap.map(textHashOf), (a, b) => a === b);
		for (const [i, j] of pairs) {
			aligned.push({ oldIndex: oldStart + i, newIndex: newStart + j, kind: "content" });
		}
	};

	for (const [oldIndex, newIndex] of exactPairs) {
		pairGap(oldIndex, newIndex);
		aligned.push({ oldIndex, newIndex, kind: "keep" });
		oldStart = oldIndex + 1;
		newStart = newIndex + 1;
	}
	pairGap(existing.length, desired.length);

	return aligned;
}

/**
 * Rebuilds one level: every existing child is deleted, then every desired child
 * is inserted in one chain so the executor can batch the appends.
 */
function rebuildLevel(
	existingIds: ReadonlyArray<string>,
	desired: ReadonlyArray<Block>,
	parentId: string | undefined,
	depth: number,
): Array<DiffOp> {
	const cursor = new LevelCursor();
	return [
		...existingIds.map((existingId): DiffOp => ({ type: "delete", existingId, parentId, depth })),
		...desired.map((block): DiffOp => ({ type: "insert", block, position: cursor.next(), parentId, depth })),
	];
}

function requireIds(existing: ReadonlyArray<Block>, depth: number): Array<string> {
	return existing.map((block, index) => {
		if (!block.id) {
			throw new ValidationFailure(`Existing block at depth ${depth}, index ${index} has no remote id`, {
				depth,
				index,
				kind: block.kind,
			});
		}
		return block.id;
	});
}

function validateDesired(desired: ReadonlyArray<Block>, depth: number): void {
	desired.forEach((block, index) => {
		if (!block.kind) {
			throw new ValidationFailure(`Desired block at depth ${depth}, index ${index} has no kind`, { depth, index });
		}
	});
}
