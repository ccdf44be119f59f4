/**
 * A type that represents all valid JSON values.
 */
export type JsonValue = string | number | boolean | null | JsonObject | JsonArray;

/**
 * An object whose keys are strings and values are JsonValues.
 */
export interface JsonObject {
	[key: string]: JsonValue;
}

/**
 *  An array containing JsonValues.
 */
export interface JsonArray extends Array<JsonValue> {}

// Type predicates
export const isJsonObject = (val: unknown): val is JsonObject =>
	typeof val === "object" && val !== null && !Array.isArray(val);

const isArray = (val: unknown): val is JsonArray => Array.isArray(val);

/**
 * Serializes a JSON value with object keys sorted at every level, so that two
 * deeply equal values always produce the same string.
 */
export function stableStringify(value: JsonValue): string {
	if (isArray(value)) {
		return `[${value.map(stableStringify).join(",")}]`;
	}
	if (isJsonObject(value)) {
		const keys = Object.keys(value).sort();
		return `{${keys.map(key => `${JSON.stringify(key)}:${stableStringify(value[key])}`).join(",")}}`;
	}
	return JSON.stringify(value);
}
