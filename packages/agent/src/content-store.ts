/**
 * @tessera/agent — Content store.
 *
 * Where the rebalancing report is published. The IPFS store talks to a
 * node's HTTP API; the in-memory store keeps everything in process and
 * addresses content by the SHA-256 of its canonical JSON.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import { z } from "zod";

// =============================================================================
// Interface
// =============================================================================

export interface ContentStore {
  /**
   * Store `object` as JSON under the file name `name`.
   *
   * @returns content identifier
   * @throws ContentStoreError when the content cannot be stored
   */
  store(name: string, object: unknown, signal?: AbortSignal): Promise<string>;
}

export type ContentStoreErrorCode = "HTTP_ERROR" | "INVALID_RESPONSE" | "TIMEOUT";

export class ContentStoreError extends Error {
  constructor(
    public readonly code: ContentStoreErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "ContentStoreError";
  }
}

/**
 * Public link to stored content.
 */
export function gatewayLink(gatewayUrl: string, contentId: string): string {
  return `${gatewayUrl.replace(/\/+$/, "")}/ipfs/${contentId}`;
}

// =============================================================================
// IPFS
// =============================================================================

const AddResponseSchema = z.object({
  Name: z.string().optional(),
  Hash: z.string().min(1),
});

export interface IpfsContentStoreOptions {
  /** Base URL of the IPFS HTTP API, e.g. http://localhost:5001 */
  readonly apiUrl: string;

  /** Default: 30000 */
  readonly timeoutMs?: number;

  /** Custom fetch function (for testing) */
  readonly fetchFn?: typeof fetch;
}

export class IpfsContentStore implements ContentStore {
  private readonly apiUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(options: IpfsContentStoreOptions) {
    this.apiUrl = options.apiUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.fetchFn = options.fetchFn ?? globalThis.fetch;
  }

  async store(name: string, object: unknown, signal?: AbortSignal): Promise<string> {
    signal?.throwIfAborted();
    const form = new FormData();
    form.append(
      "file",
      new Blob([JSON.stringify(object, null, 2)], { type: "application/json" }),
      name,
    );

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    let response: Response;
    try {
      response = await this.fetchFn(`${this.apiUrl}/api/v0/add?pin=true`, {
        method: "POST",
        body: form,
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError" && signal?.aborted !== true) {
        throw new ContentStoreError("TIMEOUT", `IPFS add timed out after ${this.timeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onAbort);
    }

    if (!response.ok) {
      throw new ContentStoreError("HTTP_ERROR", `IPFS add returned HTTP ${response.status}`);
    }

    const body: unknown = await response.json().catch(() => null);
    const parsed = AddResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ContentStoreError("INVALID_RESPONSE", "IPFS add response has no Hash");
    }
    return parsed.data.Hash;
  }
}

// =============================================================================
// In-memory
// =============================================================================

export interface StoredContent {
  readonly name: string;
  readonly object: unknown;
}

export class InMemoryContentStore implements ContentStore {
  private readonly entries = new Map<string, StoredContent>();

  async store(name: string, object: unknown): Promise<string> {
    const id = createHash("sha256").update(canonicalize(object)).digest("hex");
    this.entries.set(id, { name, object });
    return id;
  }

  get(id: string): StoredContent | undefined {
    return this.entries.get(id);
  }

  get size(): number {
    return this.entries.size;
  }
}
