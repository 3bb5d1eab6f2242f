/**
 * JSON Types
 *
 * Values that may be written into replicated state or carried in a
 * payload. Everything replicated must round-trip through canonical JSON.
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue =
  | JsonPrimitive
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue };

export type JsonObject = { readonly [key: string]: JsonValue };
