/**
 * Why a fetch produced no document.
 *
 * `not_found` is the service confirming absence; the others are
 * transport conditions a caller may retry.
 */
export type TransportFailure =
  | { kind: 'not_found'; path: string }
  | { kind: 'timeout'; path: string; timeoutMs: number }
  | { kind: 'network'; path: string; message: string; cause?: unknown }
  | { kind: 'http_status'; path: string; status: number; statusText: string };

/**
 * Result of fetching one document
 */
export type TransportResult =
  | { success: true; body: string }
  | { success: false; error: TransportFailure };

/**
 * Per-request options
 */
export type TransportRequestOptions = {
  /**
   * Abort the request early (in addition to the transport's own timeout)
   */
  signal?: AbortSignal;
};

/**
 * Transport interface for reaching the registry.
 *
 * The client only ever passes paths relative to the service root
 * (e.g. "/api/v1/person/person/20209/" or a next-page link); turning them
 * into network addresses is the transport's job. Implementations must never
 * throw for transport conditions and must be safe for concurrent use.
 *
 * Swap implementations (HTTP, in-memory) without changing the consuming code.
 */
export interface Transport {
  fetch(path: string, options?: TransportRequestOptions): Promise<TransportResult>;
}

/**
 * Factory type for creating a Transport.
 */
export type TransportFactory<TConfig = unknown> = (config: TConfig) => Transport;
