import { type BlockSignature, signaturesEqual } from "./Signature";

export interface MatchResult {
	/** Matched index pairs `[oldIndex, newIndex]`, strictly increasing on both sides */
	pairs: Array<[number, number]>;
	unmatchedOld: Array<number>;
	unmatchedNew: Array<number>;
}

/**
 * Maximum product of sequence lengths before giving up on matching.
 * Beyond this the caller sees no pairs and falls back to a full rebuild.
 */
export const MAX_LCS_MATRIX_CELLS = 1_000_000;

/**
 * Longest common subsequence of two sequences under `equals`. Among equally long
 * match sets the one with the earliest-starting matches wins.
 */
export function matchBy<T>(
	oldItems: ReadonlyArray<T>,
	newItems: ReadonlyArray<T>,
	equals: (a: T, b: T) => boolean,
): MatchResult {
	const oldLen = oldItems.length;
	const newLen = newItems.length;
	const pairs: Array<[number, number]> = [];

	if (oldLen * newLen <= MAX_LCS_MATRIX_CELLS) {
		const lcs: Array<Array<number>> = Array.from({ length: oldLen + 1 }, () => new Array(newLen + 1).fill(0));

		for (let i = oldLen - 1; i >= 0; i--) {
			for (let j = newLen - 1; j >= 0; j--) {
				if (equals(oldItems[i], newItems[j])) {
					lcs[i][j] = lcs[i + 1][j + 1] + 1;
				} else {
					lcs[i][j] = Math.max(lcs[i + 1][j], lcs[i][j + 1]);
				}
			}
		}

		let i = 0;
		let j = 0;
		while (i < oldLen && j < newLen) {
			if (equals(oldItems[i], newItems[j])) {
				pairs.push([i, j]);
				i++;
				j++;
			} else if (lcs[i + 1][j] >= lcs[i][j + 1]) {
				i++;
			} else {
				j++;
			}
		}
	}

	const matchedOld = new Set(pairs.map(([i]) => i));
	const matchedNew = new Set(pairs.map(([, j]) => j));
	return {
		pairs,
		unmatchedOld: range(oldLen).filter(i => !matchedOld.has(i)),
		unmatchedNew: range(newLen).filter(j => !matchedNew.has(j)),
	};
}

/**
 * Exact-signature matching of two sibling lists.
 */
export function matchSequences(
	oldSignatures: ReadonlyArray<BlockSignature>,
	newSignatures: ReadonlyArray<BlockSignature>,
): MatchResult {
	return matchBy(oldSignatures, newSignatures, signaturesEqual);
}

function range(length: number): Array<number> {
	return Array.from({ length }, (_, i) => i);
}
