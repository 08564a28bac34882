import { vi } from 'vitest';
import type { Mock } from 'vitest';
import { Deta } from '../../src/client/deta.js';
import type { DetaBase } from '../../src/client/base.js';
import type { DetaConfig, FetchLike } from '../../src/client/config.js';

export const TEST_KEY = 'a0test_test-secret';

export function jsonResponse(status: number, body: unknown): Response {
  return new Response(body === undefined ? null : JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

/** A fetch stub answering each call with the next [status, body] pair. */
export function makeFetch(...responses: Array<[number, unknown]>): Mock<FetchLike> {
  const fetch = vi.fn<FetchLike>();
  for (const [status, body] of responses) {
    fetch.mockImplementationOnce(async () => jsonResponse(status, body));
  }
  return fetch;
}

export function makeBase(
  fetch: FetchLike,
  overrides: Partial<Omit<DetaConfig, 'fetch'>> = {},
): DetaBase {
  return new Deta({
    projectKey: TEST_KEY,
    fetch,
    retryDelayMs: 0,
    onRetry: () => undefined,
    ...overrides,
  }).base('users');
}

export interface RecordedCall {
  url: string;
  method: string | undefined;
  headers: Headers;
  body: unknown;
}

export function callAt(fetch: Mock<FetchLike>, index: number): RecordedCall {
  const call = fetch.mock.calls[index];
  if (call === undefined) {
    throw new Error(`fetch was called ${fetch.mock.calls.length} time(s); no call #${index}`);
  }
  const [url, init] = call;
  return {
    url,
    method: init.method,
    headers: new Headers(init.headers),
    body: typeof init.body === 'string' ? JSON.parse(init.body) : undefined,
  };
}
