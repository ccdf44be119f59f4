import { MAX_BATCH_SIZE } from "../diff/DiffExecutor";
import { DEFAULT_MIN_MATCH_RATIO } from "../diff/DiffPlanner";
import { DEFAULT_ALLOWED_MEDIA_TYPES, DEFAULT_MAX_ATTACHMENT_BYTES } from "../upload/AttachmentValidator";
import { DEFAULT_ATTACH_TTL_MS, DEFAULT_CHUNK_SIZE_BYTES } from "../upload/UploadOrchestrator";
import { ValidationFailure } from "../util/Errors";
import { getConfig } from "./config";
import { z } from "zod";

/** Files larger than this are sent in parts */
export const DEFAULT_MULTIPART_THRESHOLD_BYTES = 10 * 1024 * 1024;

const LOCAL_HOSTS = new Set(["localhost", "127.0.0.1", "[::1]"]);

/** Plain http is only accepted for local endpoints. */
function isAcceptedBaseUrl(value: string): boolean {
	if (!URL.canParse(value)) {
		return false;
	}
	const url = new URL(value);
	return url.protocol === "https:" || (url.protocol === "http:" && LOCAL_HOSTS.has(url.hostname));
}

const PositiveInt = z.number().int().positive();

export const SyncOptionsSchema = z.object({
	baseUrl: z
		.string()
		.url()
		.refine(isAcceptedBaseUrl, { message: "baseUrl must use https unless it points at a local host" })
		.transform(url => url.replace(/\/+$/, "")),
	token: z.string().min(1, "token is required"),

	rateLimitRps: z.number().positive(),
	rateLimitBurst: PositiveInt,

	retryMaxAttempts: PositiveInt,
	retryBaseDelayMs: PositiveInt,
	retryMaxDelayMs: PositiveInt,
	retryJitter: z.boolean(),
	timeoutMs: PositiveInt,

	maxBatchSize: PositiveInt.max(MAX_BATCH_SIZE),
	minMatchRatio: z.number().min(0).max(1),
	onConflict: z.enum(["fail", "overwrite"]),

	uploadMaxConcurrent: PositiveInt,
	uploadChunkSizeBytes: PositiveInt,
	multipartThresholdBytes: PositiveInt,
	attachTtlMs: PositiveInt,
	maxAttachmentBytes: PositiveInt,
	allowedMediaTypes: z.array(z.string().min(1)),
	/** `skip` leaves blocks whose attachment failed out of the sync; `fail` aborts it */
	onAttachmentFailure: z.enum(["skip", "fail"]),

	debugDumpPayload: z.boolean(),
});

export type SyncOptions = z.infer<typeof SyncOptionsSchema>;

export type ConflictPolicy = SyncOptions["onConflict"];

export type AttachmentFailurePolicy = SyncOptions["onAttachmentFailure"];

/** What callers pass: a token plus any overrides of the defaults */
export type SyncOptionsInput = Partial<SyncOptions> & Pick<SyncOptions, "token">;

/**
 * Resolves per-instance options over the environment configuration.
 *
 * @throws ValidationFailure listing every invalid field
 */
export function resolveSyncOptions(input: SyncOptionsInput): SyncOptions {
	const config = getConfig();
	const defaults: Omit<SyncOptions, "token"> = {
		baseUrl: config.SYNC_API_URL,
		rateLimitRps: config.SYNC_RATE_LIMIT_RPS,
		rateLimitBurst: config.SYNC_RATE_LIMIT_BURST,
		retryMaxAttempts: config.SYNC_RETRY_MAX_ATTEMPTS,
		retryBaseDelayMs: config.SYNC_RETRY_BASE_DELAY_MS,
		retryMaxDelayMs: config.SYNC_RETRY_MAX_DELAY_MS,
		retryJitter: true,
		timeoutMs: config.SYNC_TIMEOUT_MS,
		maxBatchSize: MAX_BATCH_SIZE,
		minMatchRatio: DEFAULT_MIN_MATCH_RATIO,
		onConflict: "fail",
		uploadMaxConcurrent: config.SYNC_UPLOAD_MAX_CONCURRENT,
		uploadChunkSizeBytes: DEFAULT_CHUNK_SIZE_BYTES,
		multipartThresholdBytes: DEFAULT_MULTIPART_THRESHOLD_BYTES,
		attachTtlMs: DEFAULT_ATTACH_TTL_MS,
		maxAttachmentBytes: DEFAULT_MAX_ATTACHMENT_BYTES,
		allowedMediaTypes: [...DEFAULT_ALLOWED_MEDIA_TYPES],
		onAttachmentFailure: "skip",
		debugDumpPayload: config.SYNC_DEBUG_DUMP_PAYLOAD,
	};

	const overrides = Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
	const parsed = SyncOptionsSchema.safeParse({ ...defaults, ...overrides });
	if (!parsed.success) {
		const fields = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`);
		throw new ValidationFailure(`Invalid sync options: ${fields.join("; ")}`, { fields }, parsed.error);
	}
	return parsed.data;
}
