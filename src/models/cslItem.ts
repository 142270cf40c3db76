// JSON value tree used for CSL data and schema repair.
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject { [key: string]: JsonValue | undefined }

export type JsonPathSegment = string | number;
export type JsonPath = JsonPathSegment[];

/**
 * CSL-Data item: at least `id` and `type` once reconciled, optionally `note`,
 * plus arbitrary bibliographic fields. Field values are narrowed where read.
 */
export type CslItem = JsonObject;

/** Key/value pairs carried in a CSL item's note ("cheater syntax"). */
export type NoteDictionary = Record<string, string>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
