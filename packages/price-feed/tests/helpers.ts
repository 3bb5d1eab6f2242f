/**
 * Mock fetch for price feed tests.
 */

import { vi } from "vitest";
import type { Mock } from "vitest";

export interface MockResponse {
  readonly status?: number;
  readonly body?: unknown;
  readonly text?: string;
  readonly error?: Error;
}

export function createMockFetch(responses: readonly MockResponse[]): Mock<typeof fetch> {
  let callIndex = 0;

  return vi.fn<typeof fetch>(async () => {
    const config = responses[callIndex];
    callIndex++;

    if (config === undefined) {
      throw new Error(`Mock fetch called more times than expected (call ${callIndex})`);
    }
    if (config.error !== undefined) {
      throw config.error;
    }

    const body = config.text ?? (config.body !== undefined ? JSON.stringify(config.body) : "");
    return new Response(body, { status: config.status ?? 200 });
  });
}

export const noopSleep = async (_ms: number): Promise<void> => {};

export const FAST_RETRY = {
  maxAttempts: 3,
  baseDelayMs: 1,
  maxDelayMs: 10,
  jitterMs: 0,
};
