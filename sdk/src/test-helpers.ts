import { vi, type Mock } from "vitest";

export type FetchMock = Mock<typeof globalThis.fetch>;

export const BASE_URL = "http://localhost:8090";

export function jsonResponse(status: number, body?: unknown): Response {
  if (body === undefined) {
    return new Response(null, { status });
  }
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/** A fetch stub answering every call with a fresh copy of the same response. */
export function mockFetch(status: number, body?: unknown): FetchMock {
  return vi.fn<typeof globalThis.fetch>(() => Promise.resolve(jsonResponse(status, body)));
}

/** A fetch stub answering calls in order; extra calls fail the test. */
export function mockFetchSequence(...responses: Array<[status: number, body?: unknown]>): FetchMock {
  let index = 0;
  return vi.fn<typeof globalThis.fetch>(() => {
    const next = responses[index++];
    if (!next) {
      return Promise.reject(new Error(`unexpected request #${index}`));
    }
    return Promise.resolve(jsonResponse(next[0], next[1]));
  });
}

export interface CapturedRequest {
  href: string;
  url: URL;
  method: string | undefined;
  headers: Headers;
  body: unknown;
  signal: AbortSignal | null | undefined;
}

export function requestAt(fetchFn: FetchMock, index = 0): CapturedRequest {
  const call = fetchFn.mock.calls[index];
  if (!call) {
    throw new Error(`fetch was called ${fetchFn.mock.calls.length} time(s), wanted #${index + 1}`);
  }
  const [input, init] = call;
  return {
    href: String(input),
    url: new URL(String(input)),
    method: init?.method,
    headers: new Headers(init?.headers),
    body: init?.body,
    signal: init?.signal,
  };
}

export function jsonBodyAt(fetchFn: FetchMock, index = 0): unknown {
  return JSON.parse(String(requestAt(fetchFn, index).body));
}

export function record(id: string, fields: Record<string, unknown> = {}) {
  return { id, collectionId: "pbc_posts", collectionName: "posts", ...fields };
}

export function listBody(items: unknown[], extra: Record<string, unknown> = {}) {
  return { page: 1, perPage: 30, totalItems: items.length, totalPages: 1, items, ...extra };
}

export function authBody(token: string, id = "user1") {
  return {
    token,
    record: {
      id,
      collectionId: "_pb_users_auth_",
      collectionName: "users",
      created: "2024-05-01 10:00:00.000Z",
      updated: "2024-05-01 10:00:00.000Z",
      email: `${id}@example.com`,
      emailVisibility: false,
      verified: true,
    },
  };
}
