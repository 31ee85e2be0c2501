// In-memory transport for development and testing
//
// Serves canned documents by path, useful for:
// - Fast unit testing without network access
// - Reproducing service edge cases (missing records, timeouts, bad bodies)
//
// Data does not persist between restarts.

import type {
  Transport,
  TransportFailure,
  TransportRequestOptions,
  TransportResult,
} from '../interfaces/index.js';

/**
 * A failure to serve for a path; the path itself is filled in on fetch
 */
export type CannedFailure =
  | { kind: 'not_found' }
  | { kind: 'timeout'; timeoutMs: number }
  | { kind: 'network'; message: string }
  | { kind: 'http_status'; status: number; statusText: string };

type CannedResponse =
  | { type: 'body'; body: string }
  | { type: 'failure'; failure: CannedFailure };

/**
 * In-memory transport with access to its canned responses and request log
 */
export interface InMemoryTransport extends Transport {
  /** Canned responses by normalized path (for debugging/testing) */
  _data: Map<string, CannedResponse>;

  /**
   * Every path fetched, in order, as requested
   */
  readonly requests: string[];

  /**
   * Serve a document at `path`. Objects are serialized as JSON;
   * strings are served verbatim (for malformed bodies).
   */
  serve(path: string, document: unknown): void;

  serveFailure(path: string, failure: CannedFailure): void;

  /** Clear all canned responses and the request log */
  clear(): void;
}

/**
 * Normalize a path so that query parameter order does not matter
 */
export function normalizePath(path: string): string {
  const queryStart = path.indexOf('?');
  if (queryStart === -1) {
    return path;
  }

  const params = new URLSearchParams(path.slice(queryStart + 1));
  params.sort();
  const query = params.toString();
  return query ? `${path.slice(0, queryStart)}?${query}` : path.slice(0, queryStart);
}

/**
 * Create an in-memory transport.
 *
 * Paths with no canned response answer `not_found`, like the service does.
 */
export function createInMemoryTransport(): InMemoryTransport {
  const data = new Map<string, CannedResponse>();
  const requests: string[] = [];

  return {
    _data: data,
    requests,

    serve(path: string, document: unknown): void {
      const body = typeof document === 'string' ? document : JSON.stringify(document);
      data.set(normalizePath(path), { type: 'body', body });
    },

    serveFailure(path: string, failure: CannedFailure): void {
      data.set(normalizePath(path), { type: 'failure', failure });
    },

    clear(): void {
      data.clear();
      requests.length = 0;
    },

    async fetch(path: string, options: TransportRequestOptions = {}): Promise<TransportResult> {
      requests.push(path);

      if (options.signal?.aborted) {
        return {
          success: false,
          error: { kind: 'network', path, message: 'Request aborted' },
        };
      }

      const canned = data.get(normalizePath(path));
      if (!canned) {
        return { success: false, error: { kind: 'not_found', path } };
      }

      if (canned.type === 'failure') {
        return { success: false, error: withPath(canned.failure, path) };
      }

      return { success: true, body: canned.body };
    },
  };
}

function withPath(failure: CannedFailure, path: string): TransportFailure {
  switch (failure.kind) {
    case 'not_found':
      return { kind: 'not_found', path };
    case 'timeout':
      return { kind: 'timeout', path, timeoutMs: failure.timeoutMs };
    case 'network':
      return { kind: 'network', path, message: failure.message };
    case 'http_status':
      return { kind: 'http_status', path, status: failure.status, statusText: failure.statusText };
  }
}
