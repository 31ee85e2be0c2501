// Shared state of one client instance

import type { Transport } from '@ietfdata/transport';
import type { ClientLogger } from './logger.js';

/**
 * What every operation needs: where documents come from, where logs go,
 * and the traversal limits from configuration.
 */
export type ClientContext = {
  transport: Transport;
  logger: ClientLogger;

  /**
   * Records per page requested from list endpoints; service default when unset
   */
  pageSize?: number;

  maxPages: number;

  /**
   * Aborts in-flight requests of every operation run with this context
   */
  signal?: AbortSignal;
};
