import type { JsonObject } from "../util/JsonUtils";

/**
 * Binary data referenced from a block. Uploaded out of band before the block
 * that references it is written.
 */
export interface Attachment {
	/** Stable key the executor uses to look up the uploaded reference */
	key: string;
	/** Source file name */
	name: string;
	data: Uint8Array;
	/** Media type claimed by the producer; verified against the content before upload */
	mediaType?: string;
}

/**
 * One node of a document tree. Desired-state blocks come from the conversion
 * layer; current-state blocks are fetched from the remote and carry `id` and
 * `lastModified`.
 */
export interface Block {
	kind: string;
	/** Plain text content used for fingerprinting */
	text: string;
	/** Kind-specific attributes such as a code language or checkbox state */
	attributes?: JsonObject;
	children?: Array<Block>;
	id?: string;
	depth?: number;
	/** Opaque payload forwarded to the remote unchanged */
	payload?: JsonObject;
	attachment?: Attachment;
	lastModified?: string;
}
