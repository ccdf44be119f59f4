/**
 * Attachment checks run before anything is uploaded: size limit, allow-list,
 * and a magic-byte check that the content really is what it claims to be.
 */

import { getLog } from "../shared/logger";
import type { Attachment } from "../types/Block";

const log = getLog(import.meta);

/**
 * Media types recognized from content, with their file extensions.
 */
export const KNOWN_MEDIA_TYPES = {
	"image/png": { extension: "png", magicBytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] },
	"image/jpeg": { extension: "jpg", magicBytes: [0xff, 0xd8, 0xff] },
	"image/gif": { extension: "gif", magicBytes: [0x47, 0x49, 0x46, 0x38] }, // GIF87a or GIF89a
	"image/webp": { extension: "webp", magicBytes: [0x52, 0x49, 0x46, 0x46] }, // RIFF header, need to check for WEBP
	"image/svg+xml": { extension: "svg", magicBytes: [] },
} as const;

export type KnownMediaType = keyof typeof KNOWN_MEDIA_TYPES;

/** Default allow-list. Copied into each resolved options object. */
export const DEFAULT_ALLOWED_MEDIA_TYPES: ReadonlyArray<string> = Object.freeze(Object.keys(KNOWN_MEDIA_TYPES));

export const DEFAULT_MAX_ATTACHMENT_BYTES = 20 * 1024 * 1024;

export interface AttachmentPolicy {
	allowedMediaTypes: ReadonlyArray<string>;
	maxBytes: number;
}

export type AttachmentValidationResult =
	| { valid: true; mediaType: KnownMediaType; extension: string }
	| { valid: false; error: string };

function startsWith(bytes: Uint8Array, magicBytes: ReadonlyArray<number>, offset = 0): boolean {
	if (bytes.length < offset + magicBytes.length) {
		return false;
	}
	for (let i = 0; i < magicBytes.length; i++) {
		if (bytes[offset + i] !== magicBytes[i]) {
			return false;
		}
	}
	return true;
}

/**
 * WebP files have a RIFF header followed by file size, then "WEBP" at bytes 8-11.
 */
function isWebP(bytes: Uint8Array): boolean {
	return startsWith(bytes, KNOWN_MEDIA_TYPES["image/webp"].magicBytes) && startsWith(bytes, [0x57, 0x45, 0x42, 0x50], 8);
}

function isSvg(bytes: Uint8Array): boolean {
	const head = new TextDecoder().decode(bytes.subarray(0, 512)).trimStart().toLowerCase();
	return head.startsWith("<svg") || ((head.startsWith("<?xml") || head.startsWith("<!doctype svg")) && head.includes("<svg"));
}

/**
 * Detects the media type from content. Returns null if the format is not recognized.
 */
export function detectMediaType(bytes: Uint8Array): KnownMediaType | null {
	if (startsWith(bytes, KNOWN_MEDIA_TYPES["image/png"].magicBytes)) {
		return "image/png";
	}
	if (startsWith(bytes, KNOWN_MEDIA_TYPES["image/jpeg"].magicBytes)) {
		return "image/jpeg";
	}
	if (startsWith(bytes, KNOWN_MEDIA_TYPES["image/gif"].magicBytes)) {
		return "image/gif";
	}
	if (isWebP(bytes)) {
		return "image/webp";
	}
	if (isSvg(bytes)) {
		return "image/svg+xml";
	}
	return null;
}

/**
 * Validates an attachment against a policy. When the producer claimed a media
 * type it must match what the content says.
 */
export function validateAttachment(attachment: Attachment, policy: AttachmentPolicy): AttachmentValidationResult {
	const { key, data, mediaType: claimed } = attachment;

	if (data.length === 0) {
		log.warn({ key }, "Attachment %s rejected: empty content", key);
		return { valid: false, error: "Attachment is empty" };
	}

	if (data.length > policy.maxBytes) {
		const maxSizeMB = (policy.maxBytes / (1024 * 1024)).toFixed(1);
		const actualSizeMB = (data.length / (1024 * 1024)).toFixed(2);
		log.warn({ key, actualSize: data.length, maxSize: policy.maxBytes }, "Attachment %s rejected: too large", key);
		return {
			valid: false,
			error: `File size (${actualSizeMB} MB) exceeds maximum allowed size (${maxSizeMB} MB)`,
		};
	}

	const detected = detectMediaType(data);
	if (!detected) {
		log.warn({ key, claimed }, "Attachment %s rejected: unrecognized content", key);
		return { valid: false, error: "Could not detect the file type from its content" };
	}

	if (claimed !== undefined && claimed !== detected) {
		log.warn({ key, claimed, detected }, "Attachment %s rejected: claimed %s, detected %s", key, claimed, detected);
		return {
			valid: false,
			error: `File content does not match claimed type. Claimed: ${claimed}, Detected: ${detected}`,
		};
	}

	if (!policy.allowedMediaTypes.includes(detected)) {
		log.warn({ key, detected }, "Attachment %s rejected: type %s is not allowed", key, detected);
		return {
			valid: false,
			error: `File type '${detected}' is not allowed. Allowed types: ${policy.allowedMediaTypes.join(", ")}`,
		};
	}

	return { valid: true, mediaType: detected, extension: KNOWN_MEDIA_TYPES[detected].extension };
}
