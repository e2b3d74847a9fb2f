import { type Mock, vi } from 'vitest';

export type FetchMock = Mock<typeof fetch>;

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export function createFetchMock(respond: (url: string) => Response): FetchMock {
  return vi.fn<typeof fetch>(async (input) => respond(String(input)));
}

export function requestUrl(fetchMock: FetchMock, index = 0): string {
  return String(fetchMock.mock.calls[index]?.[0]);
}

export function requestInit(fetchMock: FetchMock, index = 0): RequestInit | undefined {
  return fetchMock.mock.calls[index]?.[1];
}

export function requestJson(fetchMock: FetchMock, index = 0): unknown {
  const body = requestInit(fetchMock, index)?.body;
  return typeof body === 'string' ? JSON.parse(body) : undefined;
}

export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
