import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";

/**
 * Boolean schema that accepts string "true"/"false" or boolean values
 */
const BooleanSchema = z.union([z.boolean(), z.string().transform(s => s === "true")]).default(false);

const PositiveInt = z.coerce.number().int().positive();

/**
 * Configuration schema definition
 */
const configSchema = z.object({
	// Remote API base URL (trailing slash stripped after validation)
	SYNC_API_URL: z
		.string()
		.url()
		.default("http://localhost:8080")
		.transform(url => url.replace(/\/+$/, "")),

	// Log level for pino logger
	LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).default("warn"),

	// Client-side pacing (requests per second, burst allowance)
	SYNC_RATE_LIMIT_RPS: z.coerce.number().positive().default(3),
	SYNC_RATE_LIMIT_BURST: PositiveInt.default(10),

	// Retry policy for transient failures
	SYNC_RETRY_MAX_ATTEMPTS: PositiveInt.default(5),
	SYNC_RETRY_BASE_DELAY_MS: PositiveInt.default(1000),
	SYNC_RETRY_MAX_DELAY_MS: PositiveInt.default(60000),

	// Per-request timeout
	SYNC_TIMEOUT_MS: PositiveInt.default(30000),

	// Number of attachment transfers in flight at once
	SYNC_UPLOAD_MAX_CONCURRENT: PositiveInt.default(4),

	// Log request bodies at debug level
	SYNC_DEBUG_DUMP_PAYLOAD: BooleanSchema,
});

export type Config = z.infer<typeof configSchema>;

const CONFIG_KEYS = configSchema.keyof().options;

/**
 * Parse a .env file content into key-value pairs.
 * Supports basic .env format: KEY=value, with optional quotes.
 */
export function parseEnvFile(content: string): Record<string, string> {
	const result: Record<string, string> = {};

	for (const line of content.split("\n")) {
		const trimmed = line.trim();
		if (!trimmed || trimmed.startsWith("#")) {
			continue;
		}

		const eqIndex = trimmed.indexOf("=");
		if (eqIndex === -1) {
			continue;
		}

		const key = trimmed.slice(0, eqIndex).trim();
		let value = trimmed.slice(eqIndex + 1).trim();

		if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
			value = value.slice(1, -1);
		}

		result[key] = value;
	}

	return result;
}

/**
 * Load .env file from a path, returning empty object if file doesn't exist.
 */
function loadEnvFile(path: string): Record<string, string> {
	let content: string;
	try {
		content = readFileSync(path, "utf-8");
	} catch {
		return {};
	}
	return parseEnvFile(content);
}

/**
 * Load environment variables from .env files.
 * Priority (highest to lowest):
 * 1. Process environment variables
 * 2. .env in current working directory
 * 3. ~/.blocksync/.env
 */
function loadEnvFiles(): Record<string, string> {
	const userEnv = loadEnvFile(join(homedir(), ".blocksync", ".env"));
	const localEnv = loadEnvFile(join(process.cwd(), ".env"));
	return { ...userEnv, ...localEnv };
}

/**
 * Parse environment variables and return validated config
 */
function createConfig(): Config {
	const envFromFiles = loadEnvFiles();
	const raw: Record<string, string | undefined> = {};

	for (const key of CONFIG_KEYS) {
		const envValue = process.env[key] ?? envFromFiles[key];
		// Treat empty string as undefined so defaults apply
		raw[key] = envValue === "" ? undefined : envValue;
	}

	return configSchema.parse(raw);
}

let currentConfig: Config | undefined;

/**
 * Gets the current configuration object.
 * Config is created on first access and cached.
 */
export function getConfig(): Config {
	if (!currentConfig) {
		currentConfig = createConfig();
	}
	return currentConfig;
}

/**
 * Resets the config cache (useful for testing)
 */
export function resetConfig(): void {
	currentConfig = undefined;
}
