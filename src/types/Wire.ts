import type { JsonValue } from "../util/JsonUtils";
import { z } from "zod";

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
	z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)]),
);

export const JsonObjectSchema = z.record(JsonValueSchema);

export const ResourceSchema = z.object({
	id: z.string(),
	lastModified: z.string(),
});

export type RemoteResource = z.infer<typeof ResourceSchema>;

export const RemoteBlockSchema = z.object({
	id: z.string(),
	kind: z.string(),
	text: z.string().default(""),
	attributes: JsonObjectSchema.optional(),
	payload: JsonObjectSchema.optional(),
	lastModified: z.string(),
	hasChildren: z.boolean().default(false),
});

export type RemoteBlock = z.infer<typeof RemoteBlockSchema>;

export const ChildrenPageSchema = z.object({
	results: z.array(RemoteBlockSchema),
	nextCursor: z.string().nullish(),
});

export const AppendResponseSchema = z.object({
	results: z.array(z.object({ id: z.string() }).passthrough()),
});

export const UploadModeSchema = z.enum(["single_part", "multi_part"]);

export type UploadMode = z.infer<typeof UploadModeSchema>;

export const UploadSlotSchema = z.object({
	id: z.string(),
	status: z.enum(["pending", "uploaded", "expired", "failed"]),
	expiresAt: z.string().optional(),
});

export type UploadSlot = z.infer<typeof UploadSlotSchema>;

export const PartResultSchema = z.object({
	tag: z.string(),
});

/** Outgoing representation of a block for patch and append calls */
export interface WireBlock {
	kind: string;
	text: string;
	attributes: Record<string, JsonValue>;
	payload?: Record<string, JsonValue>;
	attachmentId?: string;
	children?: Array<WireBlock>;
}
