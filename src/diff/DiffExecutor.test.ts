import type { BlockClient } from "../core/BlockClient";
import type { Attachment, Block } from "../types/Block";
import type { DiffOp } from "../types/DiffOp";
import type { WireBlock } from "../types/Wire";
import type { AttachmentResolver } from "../upload/UploadOrchestrator";
import { ExecutionFailedError, ServerError, SyncCancelledError, ValidationFailure } from "../util/Errors";
import { createInMemoryMetrics, METRIC } from "../util/Metrics";
import { createDiffExecutor } from "./DiffExecutor";
import { planDiff } from "./DiffPlanner";
import { describe, expect, it } from "vitest";

function createFakeClient(options: { failOn?: string; onCall?: (call: string) => void } = {}) {
	const calls: Array<string> = [];
	const appended: Array<Array<WireBlock>> = [];
	const patched: Array<WireBlock> = [];
	let next = 0;

	const record = (call: string) => {
		calls.push(call);
		options.onCall?.(call);
		if (call === options.failOn) {
			return Promise.reject(new ServerError(`${call} returned 500`, 500));
		}
		return Promise.resolve();
	};

	const client: BlockClient = {
		getResource: () => Promise.reject(new Error("not used")),
		fetchTree: () => Promise.reject(new Error("not used")),
		observe: () => Promise.reject(new Error("not used")),
		patchBlock: async (blockId, block) => {
			patched.push(block);
			await record(`patch ${blockId}`);
		},
		deleteBlock: blockId => record(`delete ${blockId}`),
		appendChildren: async (parentId, after, children) => {
			appended.push(children);
			await record(`append ${parentId} after=${after ?? "start"} [${children.map(child => child.text).join(",")}]`);
			return children.map(() => `n${++next}`);
		},
	};

	return { client, calls, appended, patched };
}

function createRecordingResolver(calls: Array<string>): AttachmentResolver {
	return {
		resolve: key => {
			calls.push(`resolve ${key}`);
			return Promise.resolve(`upload-${key}`);
		},
		markAttached: key => {
			calls.push(`attached ${key}`);
		},
	};
}

const p = (text: string, id?: string): Block => ({ kind: "paragraph", text, ...(id ? { id } : {}) });

const attachment = (key: string): Attachment => ({ key, name: `${key}.png`, data: new Uint8Array([1]) });

describe("DiffExecutor", () => {
	it("applies a planned keep/delete/insert with one call per mutation", async () => {
		const { client, calls } = createFakeClient();
		const ops = planDiff([p("A", "a"), p("B", "b"), p("C", "c")], [p("A"), p("C"), p("D")]);

		const result = await createDiffExecutor({ client }).execute("page", ops);

		expect(calls).toEqual(["delete b", "append page after=c [D]"]);
		expect(result).toEqual({ kept: 2, updated: 0, inserted: 1, deleted: 1, replaced: 0, callCount: 2 });
	});

	it("coalesces chained inserts and splits them at the batch ceiling", async () => {
		const { client, calls } = createFakeClient();
		const ops = planDiff([], ["1", "2", "3", "4", "5"].map(text => p(text)));

		const result = await createDiffExecutor({ client, maxBatchSize: 2 }).execute("page", ops);

		expect(calls).toEqual([
			"append page after=start [1,2]",
			"append page after=n2 [3,4]",
			"append page after=n4 [5]",
		]);
		expect(result.inserted).toBe(5);
		expect(result.callCount).toBe(3);
	});

	it("replaces by deleting and inserting at the recorded position", async () => {
		const { client, calls, appended } = createFakeClient();
		const ops: Array<DiffOp> = [
			{ type: "keep", existingId: "a", depth: 0 },
			{
				type: "replace",
				existingId: "b",
				block: { kind: "paragraph", text: "Intro" },
				position: { type: "after", blockId: "a" },
				depth: 0,
			},
			{ type: "insert", block: p("tail"), position: { type: "afterPrevious" }, depth: 0 },
		];

		const result = await createDiffExecutor({ client }).execute("page", ops);

		expect(calls).toEqual(["delete b", "append page after=a [Intro]", "append page after=n1 [tail]"]);
		expect(appended[0]).toEqual([{ kind: "paragraph", text: "Intro", attributes: {} }]);
		expect(result).toEqual({ kept: 1, updated: 0, inserted: 1, deleted: 0, replaced: 1, callCount: 3 });
	});

	it("tracks insertion points separately per parent", async () => {
		const { client, calls } = createFakeClient();
		const ops: Array<DiffOp> = [
			{ type: "keep", existingId: "parent", depth: 0 },
			{ type: "update", existingId: "c1", block: p("child one"), parentId: "parent", depth: 1 },
			{ type: "insert", block: p("child two"), position: { type: "afterPrevious" }, parentId: "parent", depth: 1 },
			{ type: "insert", block: p("sibling"), position: { type: "afterPrevious" }, depth: 0 },
		];

		await createDiffExecutor({ client }).execute("page", ops);

		expect(calls).toEqual([
			"patch c1",
			"append parent after=c1 [child two]",
			"append page after=parent [sibling]",
		]);
	});

	it("sends an inserted subtree in one call and resolves its attachments first", async () => {
		const { client, calls, appended } = createFakeClient();
		const ops: Array<DiffOp> = [
			{
				type: "insert",
				block: {
					kind: "toggle",
					text: "T",
					attributes: { open: true },
					children: [{ kind: "image", text: "", attachment: attachment("img") }, p("p")],
				},
				position: { type: "start" },
				depth: 0,
			},
		];

		await createDiffExecutor({ client }).execute("page", ops, createRecordingResolver(calls));

		expect(calls).toEqual(["resolve img", "append page after=start [T]", "attached img"]);
		expect(appended[0]).toEqual([
			{
				kind: "toggle",
				text: "T",
				attributes: { open: true },
				children: [
					{ kind: "image", text: "", attributes: {}, attachmentId: "upload-img" },
					{ kind: "paragraph", text: "p", attributes: {} },
				],
			},
		]);
	});

	it("patches an updated block without its children", async () => {
		const { client, calls, patched } = createFakeClient();
		const ops: Array<DiffOp> = [
			{
				type: "update",
				existingId: "img1",
				block: { kind: "image", text: "", payload: { caption: "new" }, attachment: attachment("hero"), children: [p("x")] },
				depth: 0,
			},
		];

		const result = await createDiffExecutor({ client }).execute("page", ops, createRecordingResolver(calls));

		expect(calls).toEqual(["resolve hero", "patch img1", "attached hero"]);
		expect(patched).toEqual([
			{ kind: "image", text: "", attributes: {}, payload: { caption: "new" }, attachmentId: "upload-hero" },
		]);
		expect(result.updated).toBe(1);
	});

	it("fails before any call when attachments cannot be resolved", async () => {
		const { client, calls } = createFakeClient();
		const ops: Array<DiffOp> = [
			{ type: "delete", existingId: "old", depth: 0 },
			{ type: "insert", block: { kind: "image", text: "", attachment: attachment("img") }, position: { type: "start" }, depth: 0 },
		];

		await expect(createDiffExecutor({ client }).execute("page", ops)).rejects.toBeInstanceOf(ValidationFailure);
		expect(calls).toEqual([]);
	});

	it("reports partial progress when a call fails mid-plan", async () => {
		const { client, calls } = createFakeClient({ failOn: "delete b" });
		const ops: Array<DiffOp> = [
			{ type: "keep", existingId: "k", depth: 0 },
			{ type: "delete", existingId: "a", depth: 0 },
			{ type: "delete", existingId: "b", depth: 0 },
			{ type: "delete", existingId: "c", depth: 0 },
		];

		const promise = createDiffExecutor({ client }).execute("page", ops);

		await expect(promise).rejects.toBeInstanceOf(ExecutionFailedError);
		const error = await promise.catch((e: unknown) => e);
		if (!(error instanceof ExecutionFailedError)) {
			throw new Error("expected ExecutionFailedError");
		}
		expect(error.partial).toEqual({ kept: 1, updated: 0, inserted: 0, deleted: 1, replaced: 0, callCount: 1 });
		expect(error.cause).toBeInstanceOf(ServerError);
		expect(calls).toEqual(["delete a", "delete b"]);
	});

	it("reports a replaced block as deleted when its new block never lands", async () => {
		const { client, calls } = createFakeClient({ failOn: "append page after=a [Intro]" });
		const ops: Array<DiffOp> = [
			{ type: "keep", existingId: "a", depth: 0 },
			{ type: "replace", existingId: "b", block: p("Intro"), position: { type: "after", blockId: "a" }, depth: 0 },
		];

		const error = await createDiffExecutor({ client })
			.execute("page", ops)
			.catch((e: unknown) => e);

		if (!(error instanceof ExecutionFailedError)) {
			throw new Error("expected ExecutionFailedError");
		}
		expect(error.partial).toEqual({ kept: 1, updated: 0, inserted: 0, deleted: 1, replaced: 0, callCount: 1 });
		expect(calls).toEqual(["delete b", "append page after=a [Intro]"]);
	});

	it("stops before the next operation once the signal aborts", async () => {
		const controller = new AbortController();
		const { client, calls } = createFakeClient({
			onCall: call => {
				if (call === "delete a") {
					controller.abort();
				}
			},
		});
		const ops: Array<DiffOp> = [
			{ type: "delete", existingId: "a", depth: 0 },
			{ type: "delete", existingId: "b", depth: 0 },
			{ type: "insert", block: p("new"), position: { type: "start" }, depth: 0 },
		];

		const error = await createDiffExecutor({ client })
			.execute("page", ops, undefined, controller.signal)
			.catch((e: unknown) => e);

		if (!(error instanceof ExecutionFailedError)) {
			throw new Error("expected ExecutionFailedError");
		}
		expect(error.cause).toBeInstanceOf(SyncCancelledError);
		expect(error.partial).toEqual({ kept: 0, updated: 0, inserted: 0, deleted: 1, replaced: 0, callCount: 1 });
		expect(calls).toEqual(["delete a"]);
	});

	it("rewrites a mostly retyped level with one batched append", async () => {
		const { client, calls } = createFakeClient();
		const existing = Array.from({ length: 10 }, (_, i) => p(`line ${i}`, `b${i}`));
		const desired = existing.map((block, i): Block => (i === 0 ? p(block.text) : { kind: "heading", text: block.text }));

		const result = await createDiffExecutor({ client }).execute("page", planDiff(existing, desired));

		expect(calls).toHaveLength(11);
		expect(calls.slice(0, 10)).toEqual(existing.map(block => `delete ${block.id}`));
		expect(calls[10]).toBe(`append page after=start [${desired.map(block => block.text).join(",")}]`);
		expect(result).toEqual({ kept: 0, updated: 0, inserted: 10, deleted: 10, replaced: 0, callCount: 11 });
	});

	it("counts applied operations by type", async () => {
		const { client } = createFakeClient();
		const metrics = createInMemoryMetrics();
		const ops = planDiff([p("A", "a"), p("B", "b")], [p("A"), p("X"), p("Y")]);

		await createDiffExecutor({ client, metrics }).execute("page", ops);

		expect(metrics.count(METRIC.diffOps, { type: "keep" })).toBe(1);
		expect(metrics.count(METRIC.diffOps, { type: "delete" })).toBe(1);
		expect(metrics.count(METRIC.diffOps, { type: "insert" })).toBe(2);
	});

	it("rejects a batch size above the remote ceiling", () => {
		expect(() => createDiffExecutor({ client: createFakeClient().client, maxBatchSize: 101 })).toThrow(ValidationFailure);
	});
});
