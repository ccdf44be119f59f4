import { PartResultSchema, type UploadMode, type UploadSlot, UploadSlotSchema } from "../types/Wire";
import type { Transport } from "./Transport";

const BASE_PATH = "/uploads";

export interface CreateUploadRequest {
	name: string;
	mediaType: string;
	mode: UploadMode;
	/** Number of parts, multi-part mode only */
	partCount?: number;
}

export interface UploadedPart {
	partNumber: number;
	tag: string;
}

export interface FileUploadClient {
	/** Creates an upload slot for a named, typed binary. */
	createUpload(request: CreateUploadRequest): Promise<UploadSlot>;
	/** Transfers the whole content of a single-part slot. */
	sendContent(uploadId: string, bytes: Uint8Array, mediaType: string): Promise<void>;
	/**
	 * Transfers one chunk of a multi-part slot.
	 * @returns the transfer tag the remote assigned to this part
	 */
	sendPart(uploadId: string, partNumber: number, bytes: Uint8Array, mediaType: string): Promise<string>;
	/** Finalizes a multi-part slot with every part tag, in part order. */
	completeUpload(uploadId: string, parts: Array<UploadedPart>): Promise<UploadSlot>;
	retrieveUpload(uploadId: string): Promise<UploadSlot>;
}

export function createFileUploadClient(transport: Transport): FileUploadClient {
	return {
		createUpload,
		sendContent,
		sendPart,
		completeUpload,
		retrieveUpload,
	};

	function slotPath(uploadId: string): string {
		return `${BASE_PATH}/${encodeURIComponent(uploadId)}`;
	}

	function createUpload(request: CreateUploadRequest): Promise<UploadSlot> {
		return transport.request("POST", BASE_PATH, UploadSlotSchema, { body: request });
	}

	function sendContent(uploadId: string, bytes: Uint8Array, mediaType: string): Promise<void> {
		return transport.send("PUT", `${slotPath(uploadId)}/content`, { bytes, contentType: mediaType });
	}

	async function sendPart(uploadId: string, partNumber: number, bytes: Uint8Array, mediaType: string): Promise<string> {
		const result = await transport.request("PUT", `${slotPath(uploadId)}/parts/${partNumber}`, PartResultSchema, {
			bytes,
			contentType: mediaType,
		});
		return result.tag;
	}

	function completeUpload(uploadId: string, parts: Array<UploadedPart>): Promise<UploadSlot> {
		return transport.request("POST", `${slotPath(uploadId)}/complete`, UploadSlotSchema, { body: { parts } });
	}

	function retrieveUpload(uploadId: string): Promise<UploadSlot> {
		return transport.request("GET", slotPath(uploadId), UploadSlotSchema);
	}
}
