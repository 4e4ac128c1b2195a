import type { FetchFn } from '../src/clients/api-client.js';

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Headers;
  body: string | undefined;
}

export interface StubResponse {
  status?: number;
  body?: unknown;
}

/**
 * fetch replacement answering from a queue and recording every request
 */
export function fetchStub(responses: StubResponse[]): { fetch: FetchFn; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const queue = [...responses];

  const stub: FetchFn = async (input, init) => {
    requests.push({
      url: input,
      method: init?.method ?? 'GET',
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? init.body : undefined,
    });
    const next = queue.shift() ?? { status: 200, body: {} };
    const status = next.status ?? 200;
    // Response refuses a body on 204
    const payload = status === 204 ? null : typeof next.body === 'string' ? next.body : JSON.stringify(next.body ?? {});
    return new Response(payload, {
      status,
      headers: { 'content-type': 'application/json' },
    });
  };

  return { fetch: stub, requests };
}
