/**
 * @tessera/portfolio — Token map wire format.
 *
 * Token values and adjustments travel between rounds as canonical JSON
 * (RFC 8785): sorted keys, shortest number form. Equal maps therefore
 * serialize to equal strings and count as the same vote.
 */

import { canonicalize } from "json-canonicalize";
import { isTokenMap } from "@tessera/types";
import { TokenMapError } from "./types.js";

/**
 * @throws TokenMapError INVALID_TOKEN_MAP for empty keys or non-finite values
 */
export function serializeTokenMap(map: Readonly<Record<string, number>>): string {
  if (!isTokenMap(map)) {
    throw new TokenMapError("INVALID_TOKEN_MAP", "Token maps hold finite numbers under non-empty keys");
  }
  return canonicalize(map);
}

/**
 * @throws TokenMapError on malformed JSON or a value that is not a token map
 */
export function parseTokenMap(json: string): Readonly<Record<string, number>> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new TokenMapError("INVALID_JSON", `Token map is not valid JSON: ${reason}`);
  }
  if (!isTokenMap(parsed)) {
    throw new TokenMapError("INVALID_TOKEN_MAP", "Expected an object of token → finite number");
  }
  return parsed;
}
