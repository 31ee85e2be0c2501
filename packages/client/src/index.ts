// @ietfdata/client
// Typed traversal of the IETF Datatracker registry.
//
// Key concepts:
// - Pagination: list endpoints become lazy sequences that fetch on demand
// - Resolver: one fetch per URI, or list-then-first for natural keys
// - History: historical records become timelines answering "what was true at t"
//
// Every operation returns a Result; nothing throws for service conditions.

export {
  createDatatracker,
  type Datatracker,
  type DatatrackerOptions,
} from './client.js';

export {
  loadConfig,
  ClientConfigSchema,
  DEFAULT_MAX_PAGES,
  type ClientConfig,
  type ClientConfigInput,
} from './config.js';

export type { ClientContext } from './context.js';

export { fetchDocument, errorFromFailure, type FetchDocumentError } from './fetch.js';

export {
  consoleLogger,
  silentLogger,
  createCapturingLogger,
  type ClientLogger,
  type LogEntry,
} from './logger.js';

export * from './pagination/index.js';
export * from './resources/index.js';
export * from './resolver/index.js';
export * from './history/index.js';
