import { snapshotFromTree } from "../diff/ConflictDetector";
import type { Block } from "../types/Block";
import type { PageSnapshot } from "../types/Snapshot";
import {
	AppendResponseSchema,
	ChildrenPageSchema,
	type RemoteBlock,
	type RemoteResource,
	ResourceSchema,
	type WireBlock,
} from "../types/Wire";
import { ValidationFailure } from "../util/Errors";
import type { Transport } from "./Transport";
import { z } from "zod";

const EmptySchema = z.object({}).passthrough();

export interface ObservedTree {
	snapshot: PageSnapshot;
	tree: Array<Block>;
}

export interface BlockClient {
	getResource(resourceId: string): Promise<RemoteResource>;
	/**
	 * Fetches the whole block tree under a resource, following pagination at every level.
	 */
	fetchTree(resourceId: string): Promise<Array<Block>>;
	/**
	 * Fetches the resource marker and the tree, and captures both as a snapshot.
	 */
	observe(resourceId: string): Promise<ObservedTree>;
	patchBlock(blockId: string, block: WireBlock): Promise<void>;
	deleteBlock(blockId: string): Promise<void>;
	/**
	 * Appends children under `parentId`, after `after` or at the start when it is null.
	 * @returns the new block ids in order
	 */
	appendChildren(parentId: string, after: string | null, children: Array<WireBlock>): Promise<Array<string>>;
}

export function createBlockClient(transport: Transport): BlockClient {
	return {
		getResource,
		fetchTree,
		observe,
		patchBlock,
		deleteBlock,
		appendChildren,
	};

	function getResource(resourceId: string): Promise<RemoteResource> {
		return transport.request("GET", `/resources/${encodeURIComponent(resourceId)}`, ResourceSchema);
	}

	function fetchTree(resourceId: string): Promise<Array<Block>> {
		return fetchChildren(resourceId, 0);
	}

	async function fetchChildren(parentId: string, depth: number): Promise<Array<Block>> {
		const remote = await transport.paginate<RemoteBlock>(
			`/blocks/${encodeURIComponent(parentId)}/children`,
			ChildrenPageSchema,
		);
		const blocks: Array<Block> = [];
		for (const item of remote) {
			const block: Block = {
				id: item.id,
				kind: item.kind,
				text: item.text,
				depth,
				lastModified: item.lastModified,
			};
			if (item.attributes) {
				block.attributes = item.attributes;
			}
			if (item.payload) {
				block.payload = item.payload;
			}
			if (item.hasChildren) {
				block.children = await fetchChildren(item.id, depth + 1);
			}
			blocks.push(block);
		}
		return blocks;
	}

	async function observe(resourceId: string): Promise<ObservedTree> {
		const resource = await getResource(resourceId);
		const tree = await fetchTree(resourceId);
		return { snapshot: snapshotFromTree(resourceId, resource.lastModified, tree), tree };
	}

	async function patchBlock(blockId: string, block: WireBlock): Promise<void> {
		await transport.request("PATCH", `/blocks/${encodeURIComponent(blockId)}`, EmptySchema, { body: block });
	}

	function deleteBlock(blockId: string): Promise<void> {
		return transport.send("DELETE", `/blocks/${encodeURIComponent(blockId)}`);
	}

	async function appendChildren(
		parentId: string,
		after: string | null,
		children: Array<WireBlock>,
	): Promise<Array<string>> {
		const response = await transport.request(
			"POST",
			`/blocks/${encodeURIComponent(parentId)}/children`,
			AppendResponseSchema,
			{ body: { after, children } },
		);
		if (response.results.length !== children.length) {
			throw new ValidationFailure(
				`Append under ${parentId} returned ${response.results.length} ids for ${children.length} blocks`,
				{ parentId, sent: children.length, received: response.results.length },
			);
		}
		return response.results.map(result => result.id);
	}
}
