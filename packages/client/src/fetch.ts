// Document fetching
//
// The single place where transport failures become client errors and a raw
// body becomes a parsed document. Both the pagination engine and the
// resolver fetch through here.

import {
  DecodeError,
  FetchError,
  NotFoundError,
  parseDocument,
  type Result,
} from '@ietfdata/protocol';
import type { Transport, TransportFailure } from '@ietfdata/transport';

export type FetchDocumentError = FetchError | NotFoundError | DecodeError;

/**
 * Map a transport failure to the client error a caller sees
 */
export function errorFromFailure(failure: TransportFailure): FetchError | NotFoundError {
  switch (failure.kind) {
    case 'not_found':
      return new NotFoundError(failure.path);
    case 'timeout':
      return new FetchError(failure.path, 'timeout', `timed out after ${failure.timeoutMs}ms`);
    case 'network':
      return new FetchError(failure.path, 'network', failure.message, { cause: failure.cause });
    case 'http_status':
      return new FetchError(
        failure.path,
        'http_status',
        `HTTP ${failure.status} ${failure.statusText}`.trimEnd(),
        { status: failure.status }
      );
  }
}

/**
 * Fetch one document and parse it as JSON
 */
export async function fetchDocument(
  transport: Transport,
  path: string,
  signal?: AbortSignal
): Promise<Result<unknown, FetchDocumentError>> {
  const response = await transport.fetch(path, signal ? { signal } : undefined);
  if (!response.success) {
    return { success: false, error: errorFromFailure(response.error) };
  }

  const parsed = parseDocument(response.body);
  if (!parsed.success) {
    return { success: false, error: new DecodeError(path, parsed.error) };
  }
  return parsed;
}
