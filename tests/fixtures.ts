import { vi } from 'vitest';
import type { HttpTransport } from '../src/providers/chat/IChatProvider.js';

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export function mockTransport(response: Response | (() => Response)) {
  return vi.fn<HttpTransport>(async () => (typeof response === 'function' ? response() : response));
}

export function sentBody(transport: ReturnType<typeof mockTransport>, call = 0): unknown {
  const init = transport.mock.calls[call]?.[1];
  return JSON.parse(String(init?.body));
}

// Never settles on its own; rejects with the signal's reason once aborted
export const hangingTransport: HttpTransport = (_url, init) =>
  new Promise<Response>((_resolve, reject) => {
    init.signal?.addEventListener('abort', () => reject(init.signal?.reason));
  });
