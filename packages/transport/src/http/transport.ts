// HTTP transport over the global fetch API

import type {
  Transport,
  TransportFailure,
  TransportRequestOptions,
  TransportResult,
} from '../interfaces/index.js';

export const DEFAULT_BASE_URL = 'https://datatracker.ietf.org';
export const DEFAULT_TIMEOUT_MS = 30_000;

export type HttpTransportConfig = {
  /**
   * Service root that relative paths are resolved against
   */
  baseUrl?: string;

  /**
   * Per-request timeout in milliseconds
   */
  timeoutMs?: number;

  userAgent?: string;

  /**
   * Fetch implementation (defaults to the global one)
   */
  fetch?: typeof globalThis.fetch;
};

/**
 * Create a transport that fetches documents over HTTP.
 *
 * Usage:
 * ```ts
 * const transport = createHttpTransport({ timeoutMs: 10_000 });
 * const result = await transport.fetch('/api/v1/person/person/20209/');
 * ```
 */
export function createHttpTransport(config: HttpTransportConfig = {}): Transport {
  const baseUrl = config.baseUrl ?? DEFAULT_BASE_URL;
  const timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const fetchImpl = config.fetch ?? globalThis.fetch;

  const headers: Record<string, string> = { Accept: 'application/json' };
  if (config.userAgent) {
    headers['User-Agent'] = config.userAgent;
  }

  return {
    async fetch(path: string, options: TransportRequestOptions = {}): Promise<TransportResult> {
      const url = new URL(path, baseUrl);
      const controller = new AbortController();
      let timedOut = false;

      const timer = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, timeoutMs);

      const onAbort = () => controller.abort();
      options.signal?.addEventListener('abort', onAbort, { once: true });
      if (options.signal?.aborted) {
        controller.abort();
      }

      try {
        const response = await fetchImpl(url, { headers, signal: controller.signal });

        if (response.status === 404) {
          return failure({ kind: 'not_found', path });
        }

        if (!response.ok) {
          return failure({
            kind: 'http_status',
            path,
            status: response.status,
            statusText: response.statusText,
          });
        }

        return { success: true, body: await response.text() };
      } catch (error) {
        if (timedOut) {
          return failure({ kind: 'timeout', path, timeoutMs });
        }
        return failure({
          kind: 'network',
          path,
          message: error instanceof Error ? error.message : String(error),
          cause: error,
        });
      } finally {
        clearTimeout(timer);
        options.signal?.removeEventListener('abort', onAbort);
      }
    },
  };
}

function failure(error: TransportFailure): TransportResult {
  return { success: false, error };
}
