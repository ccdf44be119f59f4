import type { RateLimiter } from "../util/RateLimiter";
import { createFileUploadClient } from "./FileUploadClient";
import { createTransport } from "./Transport";
import { beforeEach, describe, expect, it, vi } from "vitest";

function json(body: unknown, status = 200): Response {
	return new Response(JSON.stringify(body), { status });
}

const limiter: RateLimiter = { acquire: () => Promise.resolve(0), available: () => 1 };

describe("FileUploadClient", () => {
	const fetchMock = vi.fn();

	function create() {
		return createFileUploadClient(
			createTransport({
				baseUrl: "https://api.example.test",
				token: "test-token",
				limiter,
				retry: { maxAttempts: 1, baseDelayMs: 1, maxDelayMs: 1, jitter: false },
				timeoutMs: 1000,
			}),
		);
	}

	beforeEach(() => {
		fetchMock.mockReset();
		global.fetch = fetchMock;
	});

	it("creates a slot with name, type and mode", async () => {
		fetchMock.mockResolvedValueOnce(json({ id: "u1", status: "pending" }));

		const slot = await create().createUpload({ name: "a.png", mediaType: "image/png", mode: "single_part" });

		expect(slot).toEqual({ id: "u1", status: "pending" });
		const [url, init] = fetchMock.mock.calls[0];
		expect(url).toBe("https://api.example.test/uploads");
		expect(JSON.parse(init.body)).toEqual({ name: "a.png", mediaType: "image/png", mode: "single_part" });
	});

	it("sends a part and returns its tag", async () => {
		fetchMock.mockResolvedValueOnce(json({ tag: "etag-1" }));

		const tag = await create().sendPart("u1", 2, new Uint8Array([1]), "image/png");

		expect(tag).toBe("etag-1");
		expect(fetchMock.mock.calls[0][0]).toBe("https://api.example.test/uploads/u1/parts/2");
		expect(fetchMock.mock.calls[0][1].method).toBe("PUT");
	});

	it("finalizes with the ordered part tags", async () => {
		fetchMock.mockResolvedValueOnce(json({ id: "u1", status: "uploaded" }));
		const parts = [
			{ partNumber: 1, tag: "t1" },
			{ partNumber: 2, tag: "t2" },
		];

		const slot = await create().completeUpload("u1", parts);

		expect(slot.status).toBe("uploaded");
		expect(JSON.parse(fetchMock.mock.calls[0][1].body)).toEqual({ parts });
	});

	it("retrieves the slot status", async () => {
		fetchMock.mockResolvedValueOnce(json({ id: "u1", status: "expired", expiresAt: "2026-01-01T00:00:00Z" }));

		await expect(create().retrieveUpload("u1")).resolves.toEqual({
			id: "u1",
			status: "expired",
			expiresAt: "2026-01-01T00:00:00Z",
		});
	});
});
