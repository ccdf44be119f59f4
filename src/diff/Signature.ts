import type { Block } from "../types/Block";
import { stableStringify } from "../util/JsonUtils";
import { wyhash_str } from "wyhash";

/** Fixed seed so fingerprints agree across processes */
const DEFAULT_SEED = 0n;

/**
 * Structural fingerprint of a block. Two blocks with equal signatures are
 * interchangeable for diffing.
 */
export interface BlockSignature {
	readonly kind: string;
	readonly textHash: string;
	/** Child count plus each direct child's kind */
	readonly shapeHash: string;
	readonly attributesHash: string;
	readonly depth: number;
}

/**
 * Hashes content using wyhash.
 * @returns The hash as a hexadecimal string.
 */
export function contentHash(content: string): string {
	return wyhash_str(content, DEFAULT_SEED).toString(16);
}

/**
 * Unicode NFC with every line ending turned into LF.
 */
export function normalizeText(text: string): string {
	return text.replace(/\r\n?/g, "\n").normalize("NFC");
}

export function textHashOf(block: Block): string {
	return contentHash(normalizeText(block.text));
}

export function computeSignature(block: Block, depth: number = block.depth ?? 0): BlockSignature {
	const children = block.children ?? [];
	return {
		kind: block.kind,
		textHash: textHashOf(block),
		shapeHash: contentHash(stableStringify({ count: children.length, kinds: children.map(child => child.kind) })),
		attributesHash: contentHash(stableStringify(block.attributes ?? {})),
		depth,
	};
}

export function signaturesEqual(a: BlockSignature, b: BlockSignature): boolean {
	return (
		a.kind === b.kind &&
		a.textHash === b.textHash &&
		a.shapeHash === b.shapeHash &&
		a.attributesHash === b.attributesHash &&
		a.depth === b.depth
	);
}
