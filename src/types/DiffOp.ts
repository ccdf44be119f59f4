import type { Block } from "./Block";

/** Where an inserted block goes among its siblings */
export type InsertPosition =
	| { type: "start" }
	| { type: "after"; blockId: string }
	/** Right after the block inserted by the preceding op at the same level */
	| { type: "afterPrevious" };

interface OpBase {
	/** Remote id of the containing block; absent at the resource root */
	parentId?: string | undefined;
	depth: number;
}

/** Existing block already matches. No remote call. */
export interface KeepOp extends OpBase {
	type: "keep";
	existingId: string;
}

/** Same kind, different content: patched in place. */
export interface UpdateOp extends OpBase {
	type: "update";
	existingId: string;
	block: Block;
}

/** Kind changed: the existing block is deleted and the new one inserted at `position`. */
export interface ReplaceOp extends OpBase {
	type: "replace";
	existingId: string;
	block: Block;
	position: InsertPosition;
}

export interface InsertOp extends OpBase {
	type: "insert";
	block: Block;
	position: InsertPosition;
}

export interface DeleteOp extends OpBase {
	type: "delete";
	existingId: string;
}

export type DiffOp = KeepOp | UpdateOp | ReplaceOp | InsertOp | DeleteOp;

export type DiffOpType = DiffOp["type"];

/**
 * Counts of applied operations. `callCount` is the number of remote calls issued.
 */
export interface ExecutionResult {
	kept: number;
	updated: number;
	inserted: number;
	deleted: number;
	replaced: number;
	callCount: number;
}

export function emptyExecutionResult(): ExecutionResult {
	return { kept: 0, updated: 0, inserted: 0, deleted: 0, replaced: 0, callCount: 0 };
}
