// Tests for the HTTP transport

import { describe, it, expect, vi } from 'vitest';
import { createHttpTransport } from './transport.js';

// --- Test Fixtures ---

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function createFetchMock(response: Response | Error) {
  return vi.fn(async (_url: string | URL | Request, _init?: RequestInit): Promise<Response> => {
    if (response instanceof Error) {
      throw response;
    }
    return response;
  });
}

// --- Tests ---

describe('createHttpTransport', () => {
  it('resolves paths against the base URL and asks for JSON', async () => {
    const fetchMock = createFetchMock(jsonResponse({ id: 1 }));
    const transport = createHttpTransport({
      baseUrl: 'https://registry.example.org',
      userAgent: 'ietfdata-tests',
      fetch: fetchMock,
    });

    const result = await transport.fetch('/api/v1/person/person/1/');

    expect(result).toEqual({ success: true, body: '{"id":1}' });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(String(url)).toBe('https://registry.example.org/api/v1/person/person/1/');
    expect(init?.headers).toEqual({ Accept: 'application/json', 'User-Agent': 'ietfdata-tests' });
  });

  it('keeps query strings of next-page links', async () => {
    const fetchMock = createFetchMock(jsonResponse({}));
    const transport = createHttpTransport({ baseUrl: 'https://registry.example.org', fetch: fetchMock });

    await transport.fetch('/api/v1/person/person/?limit=20&offset=40');

    expect(String(fetchMock.mock.calls[0]?.[0])).toBe(
      'https://registry.example.org/api/v1/person/person/?limit=20&offset=40'
    );
  });

  it('maps 404 to not_found', async () => {
    const transport = createHttpTransport({ fetch: createFetchMock(jsonResponse({}, 404)) });

    const result = await transport.fetch('/api/v1/person/person/0/');

    expect(result).toEqual({
      success: false,
      error: { kind: 'not_found', path: '/api/v1/person/person/0/' },
    });
  });

  it('maps other error statuses to http_status', async () => {
    const transport = createHttpTransport({
      fetch: createFetchMock(new Response('busy', { status: 503, statusText: 'Service Unavailable' })),
    });

    const result = await transport.fetch('/x/');

    expect(result).toEqual({
      success: false,
      error: { kind: 'http_status', path: '/x/', status: 503, statusText: 'Service Unavailable' },
    });
  });

  it('maps thrown errors to network failures', async () => {
    const cause = new TypeError('fetch failed');
    const transport = createHttpTransport({ fetch: createFetchMock(cause) });

    const result = await transport.fetch('/x/');

    expect(result).toEqual({
      success: false,
      error: { kind: 'network', path: '/x/', message: 'fetch failed', cause },
    });
  });

  it('reports a timeout when the request outlives timeoutMs', async () => {
    vi.useFakeTimers();
    try {
      const hanging = vi.fn(
        (_url: string | URL | Request, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
          })
      );
      const transport = createHttpTransport({ timeoutMs: 50, fetch: hanging });

      const pending = transport.fetch('/slow/');
      await vi.advanceTimersByTimeAsync(50);

      expect(await pending).toEqual({
        success: false,
        error: { kind: 'timeout', path: '/slow/', timeoutMs: 50 },
      });
    } finally {
      vi.useRealTimers();
    }
  });

  it('aborts when the caller signal fires', async () => {
    const controller = new AbortController();
    const hanging = vi.fn(
      (_url: string | URL | Request, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted by caller')));
        })
    );
    const transport = createHttpTransport({ fetch: hanging });

    const pending = transport.fetch('/x/', { signal: controller.signal });
    controller.abort();

    const result = await pending;
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe('network');
      expect(result.error.kind === 'network' && result.error.message).toBe('aborted by caller');
    }
  });
});
