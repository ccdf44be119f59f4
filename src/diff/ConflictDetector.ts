import type { Block } from "../types/Block";
import type { PageSnapshot } from "../types/Snapshot";
import { ValidationFailure } from "../util/Errors";

/**
 * Captures the modification markers of a fetched tree, at every depth.
 */
export function snapshotFromTree(resourceId: string, lastModified: string, tree: ReadonlyArray<Block>): PageSnapshot {
	const blocks = new Map<string, string>();
	const visit = (nodes: ReadonlyArray<Block>) => {
		for (const node of nodes) {
			if (!node.id || node.lastModified === undefined) {
				throw new ValidationFailure("Fetched block is missing its id or modification marker", {
					resourceId,
					kind: node.kind,
				});
			}
			blocks.set(node.id, node.lastModified);
			visit(node.children ?? []);
		}
	};
	visit(tree);
	return Object.freeze({ resourceId, lastModified, blocks: readonlyView(blocks) });
}

/**
 * Frozen read-only view over a private copy of `source`.
 */
function readonlyView<K, V>(source: ReadonlyMap<K, V>): ReadonlyMap<K, V> {
	const map = new Map(source);
	const view: ReadonlyMap<K, V> = Object.freeze({
		get size() {
			return map.size;
		},
		get: (key: K) => map.get(key),
		has: (key: K) => map.has(key),
		forEach: (callback: (value: V, key: K, map: ReadonlyMap<K, V>) => void, thisArg?: unknown) => {
			map.forEach((value, key) => callback.call(thisArg, value, key, view));
		},
		entries: () => map.entries(),
		keys: () => map.keys(),
		values: () => map.values(),
		[Symbol.iterator]: () => map[Symbol.iterator](),
	});
	return view;
}

/**
 * True when the remote changed between the two snapshots: the resource marker
 * moved, a block's marker moved, or a block exists on one side only.
 */
export function detectConflict(before: PageSnapshot, after: PageSnapshot): boolean {
	if (before.lastModified !== after.lastModified) {
		return true;
	}
	if (before.blocks.size !== after.blocks.size) {
		return true;
	}
	for (const [id, marker] of before.blocks) {
		if (after.blocks.get(id) !== marker) {
			return true;
		}
	}
	return false;
}
