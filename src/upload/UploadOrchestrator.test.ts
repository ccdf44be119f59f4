import type { CreateUploadRequest, FileUploadClient, UploadedPart } from "../core/FileUploadClient";
import type { Attachment, Block } from "../types/Block";
import type { DiffOp } from "../types/DiffOp";
import type { UploadSlot } from "../types/Wire";
import {
	RetryExhaustedError,
	UploadExpiredError,
	UploadStateMismatchError,
	ValidationFailure,
} from "../util/Errors";
import { createInMemoryMetrics, METRIC } from "../util/Metrics";
import { DEFAULT_ALLOWED_MEDIA_TYPES } from "./AttachmentValidator";
import {
	collectAttachments,
	createUploadOrchestrator,
	dropFailedAttachments,
	splitIntoChunks,
	type UploadOrchestratorOptions,
} from "./UploadOrchestrator";
import { describe, expect, it } from "vitest";

const PNG = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

function png(key: string, size = 16): Attachment {
	const data = new Uint8Array(size);
	data.set(PNG);
	return { key, name: `${key}.png`, data };
}

interface FakeSlot {
	status: UploadSlot["status"];
	parts: Array<UploadedPart>;
}

/**
 * In-memory upload endpoint recording every call.
 */
function createFakeUploadClient(hooks: { onContent?: (name: string) => Promise<void> } = {}) {
	const slots = new Map<string, FakeSlot & { request: CreateUploadRequest }>();
	const calls: Array<string> = [];
	let next = 0;

	const slot = (id: string) => {
		const found = slots.get(id);
		if (!found) {
			throw new Error(`unknown slot ${id}`);
		}
		return found;
	};

	const client: FileUploadClient = {
		createUpload: request => {
			const id = `u${++next}`;
			slots.set(id, { status: "pending", parts: [], request });
			calls.push(`create ${request.mode} ${request.name}${request.partCount ? ` parts=${request.partCount}` : ""}`);
			return Promise.resolve({ id, status: "pending" });
		},
		sendContent: async (id, bytes) => {
			calls.push(`content ${id} ${bytes.length}`);
			await hooks.onContent?.(slot(id).request.name);
			slot(id).status = "uploaded";
		},
		sendPart: (id, partNumber, bytes) => {
			calls.push(`part ${id} #${partNumber} ${bytes.length}`);
			return Promise.resolve(`tag-${partNumber}`);
		},
		completeUpload: (id, parts) => {
			calls.push(`complete ${id} ${parts.map(part => `${part.partNumber}:${part.tag}`).join(",")}`);
			slot(id).status = "uploaded";
			slot(id).parts = parts;
			return Promise.resolve({ id, status: "uploaded" });
		},
		retrieveUpload: id => {
			calls.push(`retrieve ${id}`);
			return Promise.resolve({ id, status: slot(id).status });
		},
	};

	return { client, calls, slots };
}

function create(client: FileUploadClient, overrides: Partial<UploadOrchestratorOptions> = {}) {
	return createUploadOrchestrator({
		client,
		policy: { allowedMediaTypes: DEFAULT_ALLOWED_MEDIA_TYPES, maxBytes: 1024 },
		multipartThresholdBytes: 64,
		...overrides,
	});
}

describe("UploadOrchestrator", () => {
	describe("collectAttachments", () => {
		it("finds attachments in written blocks and their subtrees, once per key", () => {
			const image = (key: string): Block => ({ kind: "image", text: "", attachment: png(key) });
			const ops: Array<DiffOp> = [
				{ type: "keep", existingId: "x", depth: 0 },
				{ type: "insert", block: image("a"), position: { type: "start" }, depth: 0 },
				{ type: "insert", block: { kind: "toggle", text: "t", children: [image("b")] }, position: { type: "afterPrevious" }, depth: 0 },
				{ type: "update", existingId: "y", block: { ...image("c"), children: [image("d")] }, depth: 0 },
				{ type: "replace", existingId: "z", block: image("a"), position: { type: "afterPrevious" }, depth: 0 },
			];

			expect(collectAttachments(ops).map(attachment => attachment.key)).toEqual(["a", "b", "c"]);
		});
	});

	describe("dropFailedAttachments", () => {
		const image = (key: string): Block => ({ kind: "image", text: key, attachment: png(key) });

		it("leaves out blocks that reference a failed attachment", () => {
			const ops: Array<DiffOp> = [
				{ type: "keep", existingId: "x", depth: 0 },
				{ type: "insert", block: image("bad"), position: { type: "after", blockId: "x" }, depth: 0 },
				{ type: "insert", block: image("good"), position: { type: "afterPrevious" }, depth: 0 },
				{ type: "update", existingId: "y", block: image("bad"), depth: 0 },
				{ type: "replace", existingId: "z", block: image("bad"), position: { type: "after", blockId: "y" }, depth: 0 },
			];

			expect(dropFailedAttachments(ops, new Set(["bad"]))).toEqual([
				{ type: "keep", existingId: "x", depth: 0 },
				{ type: "insert", block: image("good"), position: { type: "afterPrevious" }, depth: 0 },
				{ type: "keep", existingId: "y", depth: 0 },
				{ type: "delete", existingId: "z", depth: 0 },
			]);
		});

		it("prunes only the offending blocks of an inserted subtree", () => {
			const toggle: Block = { kind: "toggle", text: "t", children: [image("bad"), image("good")] };
			const ops: Array<DiffOp> = [{ type: "insert", block: toggle, position: { type: "start" }, depth: 0 }];

			expect(dropFailedAttachments(ops, new Set(["bad"]))).toEqual([
				{
					type: "insert",
					block: { kind: "toggle", text: "t", children: [image("good")] },
					position: { type: "start" },
					depth: 0,
				},
			]);
		});
	});

	it("splits data into fixed-size chunks", () => {
		const chunks = splitIntoChunks(new Uint8Array(10), 4);
		expect(chunks.map(chunk => chunk.length)).toEqual([4, 4, 2]);
	});

	it("rejects invalid attachments before anything is uploaded", () => {
		const { client, calls } = createFakeUploadClient();
		const orchestrator = create(client);

		const { pending, rejected } = orchestrator.prepare([
			png("good"),
			{ key: "bad", name: "notes.txt", data: new TextEncoder().encode("hello") },
		]);

		expect(pending.map(upload => [upload.key, upload.mediaType, upload.size])).toEqual([["good", "image/png", 16]]);
		expect(rejected).toHaveLength(1);
		expect(rejected[0]).toMatchObject({ key: "bad", status: "failed", reason: "invalid" });
		expect(calls).toEqual([]);
	});

	it("rejects a concurrency limit that would never start a transfer", async () => {
		const { client, calls } = createFakeUploadClient();
		const orchestrator = create(client);
		const { pending } = orchestrator.prepare([png("a")]);

		await expect(orchestrator.uploadAll(pending, 0)).rejects.toBeInstanceOf(ValidationFailure);
		expect(calls).toEqual([]);
		expect(pending[0].machine.state).toBe("pending");
	});

	it("sends small files in a single part", async () => {
		const { client, calls } = createFakeUploadClient();
		const orchestrator = create(client);
		const { pending } = orchestrator.prepare([png("a")]);

		const outcomes = await orchestrator.uploadAll(pending, 2);

		expect(outcomes).toEqual([{ key: "a", status: "uploaded", uploadId: "u1", reuploads: 0 }]);
		expect(calls).toEqual(["create single_part a.png", "content u1 16"]);
		expect(pending[0].machine.state).toBe("uploaded");
	});

	it("sends large files in ordered parts and finalizes with every tag", async () => {
		const { client, calls } = createFakeUploadClient();
		const orchestrator = create(client, { multipartThresholdBytes: 10, chunkSizeBytes: 8 });
		const { pending } = orchestrator.prepare([png("big", 20)]);

		await orchestrator.uploadAll(pending, 1);

		expect(calls).toEqual([
			"create multi_part big.png parts=3",
			"part u1 #1 8",
			"part u1 #2 8",
			"part u1 #3 4",
			"complete u1 1:tag-1,2:tag-2,3:tag-3",
		]);
		expect(pending[0].machine.record.partTags).toEqual(["tag-1", "tag-2", "tag-3"]);
	});

	it("reports each failure without cancelling the other transfers", async () => {
		const { client } = createFakeUploadClient({
			onContent: name =>
				name === "b.png" ? Promise.reject(new RetryExhaustedError("gave up", 5, 503)) : Promise.resolve(),
		});
		const metrics = createInMemoryMetrics();
		const orchestrator = create(client, { metrics });
		const { pending } = orchestrator.prepare([png("a"), png("b"), png("c")]);

		const outcomes = await orchestrator.uploadAll(pending, 3);

		expect(outcomes.map(outcome => [outcome.key, outcome.status])).toEqual([
			["a", "uploaded"],
			["b", "failed"],
			["c", "uploaded"],
		]);
		expect(outcomes[1]).toMatchObject({ reason: "retry_exhausted", error: { code: "UPLOAD_TRANSPORT_ERROR" } });
		expect(pending[1].machine.state).toBe("failed");
		expect(metrics.count(METRIC.uploadSuccess)).toBe(2);
		expect(metrics.count(METRIC.uploadFailure)).toBe(1);
	});

	it("keeps at most maxConcurrent transfers in flight", async () => {
		let running = 0;
		let peak = 0;
		const { client } = createFakeUploadClient({
			onContent: async () => {
				running++;
				peak = Math.max(peak, running);
				await new Promise(resolve => setTimeout(resolve, 2));
				running--;
			},
		});
		const metrics = createInMemoryMetrics();
		const orchestrator = create(client, { metrics });
		const { pending } = orchestrator.prepare(["a", "b", "c", "d", "e"].map(key => png(key)));

		await orchestrator.uploadAll(pending, 2);

		const inFlight = metrics.samples.filter(sample => sample.name === METRIC.uploadsInFlight).map(sample => sample.value);
		expect(peak).toBe(2);
		expect(Math.max(...inFlight)).toBe(2);
		expect(inFlight.at(-1)).toBe(0);
	});

	it("starts no new transfers once cancelled", async () => {
		const controller = new AbortController();
		const { client, calls } = createFakeUploadClient({
			onContent: () => {
				controller.abort();
				return Promise.resolve();
			},
		});
		const orchestrator = create(client);
		const { pending } = orchestrator.prepare([png("a"), png("b"), png("c")]);

		const outcomes = await orchestrator.uploadAll(pending, 1, controller.signal);

		expect(outcomes.map(outcome => (outcome.status === "failed" ? outcome.reason : outcome.status))).toEqual([
			"uploaded",
			"cancelled",
			"cancelled",
		]);
		expect(calls).toEqual(["create single_part a.png", "content u1 16"]);
		expect(pending[1].machine.state).toBe("pending");
	});

	describe("resolve", () => {
		it("returns the upload id while the attach window is open", async () => {
			const { client, calls } = createFakeUploadClient();
			const orchestrator = create(client);
			const { pending } = orchestrator.prepare([png("a")]);
			await orchestrator.uploadAll(pending, 1);

			await expect(orchestrator.resolve("a")).resolves.toBe("u1");
			orchestrator.markAttached("a");

			expect(pending[0].machine.state).toBe("attached");
			await expect(orchestrator.resolve("a")).resolves.toBe("u1");
			expect(calls.filter(call => call.startsWith("retrieve"))).toEqual(["retrieve u1"]);
		});

		it("re-uploads once after the attach window elapses, then gives up", async () => {
			let time = 0;
			const { client, calls } = createFakeUploadClient();
			const orchestrator = create(client, { attachTtlMs: 1000, now: () => time });
			const { pending } = orchestrator.prepare([png("a")]);
			await orchestrator.uploadAll(pending, 1);

			time = 5000;
			await expect(orchestrator.resolve("a")).resolves.toBe("u2");

			expect(pending[0].machine.record).toMatchObject({ state: "uploaded", uploadId: "u2", reuploads: 1 });
			expect(calls.filter(call => call.startsWith("create"))).toHaveLength(2);
			expect(orchestrator.outcomes()).toEqual([{ key: "a", status: "uploaded", uploadId: "u2", reuploads: 1 }]);

			time = 10000;
			await expect(orchestrator.resolve("a")).rejects.toBeInstanceOf(UploadExpiredError);
			expect(pending[0].machine.state).toBe("expired");
			expect(calls.filter(call => call.startsWith("create"))).toHaveLength(2);
			expect(orchestrator.outcomes()[0]).toMatchObject({ key: "a", status: "failed", reason: "expired" });
		});

		it("treats a slot the remote reports as expired like an elapsed window", async () => {
			const { client, slots } = createFakeUploadClient();
			const orchestrator = create(client);
			const { pending } = orchestrator.prepare([png("a")]);
			await orchestrator.uploadAll(pending, 1);
			const first = slots.get("u1");
			if (first) {
				first.status = "expired";
			}

			await expect(orchestrator.resolve("a")).resolves.toBe("u2");
		});

		it("rejects unknown keys", async () => {
			const orchestrator = create(createFakeUploadClient().client);

			await expect(orchestrator.resolve("missing")).rejects.toBeInstanceOf(ValidationFailure);
		});

		it("refuses to attach a failed upload", async () => {
			const { client } = createFakeUploadClient({ onContent: () => Promise.reject(new Error("connection reset")) });
			const orchestrator = create(client);
			const { pending } = orchestrator.prepare([png("a")]);
			await orchestrator.uploadAll(pending, 1);

			await expect(orchestrator.resolve("a")).rejects.toBeInstanceOf(UploadStateMismatchError);
		});
	});
});
