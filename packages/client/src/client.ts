// Datatracker client
//
// Binds configuration, a transport and a logger into one object exposing
// every operation. The operations themselves are plain functions over a
// ClientContext; this facade only supplies the context.

import {
  parseUri,
  type Document,
  type Email,
  type EntityOf,
  type Group,
  type HistoricalKind,
  type InvalidUriError,
  type Person,
  type ResourceKind,
  type Result,
  type Uri,
  type ValidationError,
} from '@ietfdata/protocol';
import { createHttpTransport, type Transport } from '@ietfdata/transport';
import { loadConfig, type ClientConfig, type ClientConfigInput } from './config.js';
import type { ClientContext } from './context.js';
import {
  at,
  between,
  current,
  history,
  type HistoryOf,
  type IdentityHistory,
  type SnapshotError,
  type SnapshotOf,
} from './history/history.js';
import { consoleLogger, type ClientLogger } from './logger.js';
import type { ListError, ListSequence } from './pagination/paginate.js';
import type { FilterOf, TimeRange } from './resources/filters.js';
import { listEntities, type ListOptions } from './resources/list.js';
import {
  documentByName,
  emailByAddress,
  groupByAcronym,
  personByEmail,
  personByName,
  type LookupError,
} from './resolver/lookups.js';
import {
  resolve,
  resolveByKey,
  resolveMany,
  type ResolveByKeyError,
  type ResolveError,
} from './resolver/resolve.js';

export type DatatrackerOptions = {
  /**
   * Where documents come from (default: HTTP transport built from config)
   */
  transport?: Transport;

  config?: ClientConfigInput;

  /**
   * Environment to read DATATRACKER_* settings from (default: process.env)
   */
  env?: Record<string, string | undefined>;

  logger?: ClientLogger;

  /**
   * Aborts every in-flight request of this client
   */
  signal?: AbortSignal;
};

/**
 * Typed access to the registry
 */
export interface Datatracker {
  readonly config: ClientConfig;

  /**
   * Parse a URI string of a known kind; pure, no fetch
   */
  parse<K extends ResourceKind>(kind: K, input: string): Result<Uri<K>, InvalidUriError>;

  resolve<K extends ResourceKind>(uri: Uri<K>): Promise<Result<EntityOf<K>, ResolveError>>;

  resolveMany<K extends ResourceKind>(
    uris: readonly Uri<K>[]
  ): Promise<Result<EntityOf<K>, ResolveError>[]>;

  resolveByKey<K extends ResourceKind>(
    kind: K,
    filter: FilterOf<K>
  ): Promise<Result<EntityOf<K>, ResolveByKeyError>>;

  /**
   * Lazily list every entity of a kind matching `filter`
   */
  list<K extends ResourceKind>(
    kind: K,
    filter: FilterOf<K>,
    options?: ListOptions
  ): ListSequence<EntityOf<K>>;

  history<K extends HistoricalKind>(identity: Uri<K>): Promise<Result<HistoryOf<K>, ListError>>;

  at<K extends HistoricalKind>(identity: Uri<K>, t: Date): Promise<Result<SnapshotOf<K>, SnapshotError>>;

  current<K extends HistoricalKind>(identity: Uri<K>): Promise<Result<SnapshotOf<K>, SnapshotError>>;

  between<K extends HistoricalKind>(
    kind: K,
    range: Required<TimeRange>
  ): Promise<Result<IdentityHistory<K>[], ListError>>;

  personByName(name: string): Promise<Result<Person, LookupError>>;
  personByEmail(address: string): Promise<Result<Person, ResolveError | ValidationError>>;
  email(address: string): Promise<Result<Email, ResolveError | ValidationError>>;
  groupByAcronym(acronym: string): Promise<Result<Group, LookupError>>;
  documentByName(name: string): Promise<Result<Document, LookupError>>;
}

/**
 * Create a client.
 *
 * Usage:
 * ```ts
 * const client = createDatatracker({ config: { timeoutMs: 10_000 } });
 * if (!client.success) throw client.error;
 * const person = await client.value.personByName('Jane Doe');
 * ```
 */
export function createDatatracker(
  options: DatatrackerOptions = {}
): Result<Datatracker, ValidationError> {
  const loaded = loadConfig(options.config, options.env);
  if (!loaded.success) {
    return loaded;
  }
  const config = loaded.value;

  const ctx: ClientContext = {
    transport:
      options.transport ??
      createHttpTransport({
        baseUrl: config.baseUrl,
        timeoutMs: config.timeoutMs,
        userAgent: config.userAgent,
      }),
    logger: options.logger ?? consoleLogger,
    pageSize: config.pageSize,
    maxPages: config.maxPages,
    signal: options.signal,
  };

  const client: Datatracker = {
    config,
    parse: (kind, input) => parseUri(kind, input),
    resolve: (uri) => resolve(ctx, uri),
    resolveMany: (uris) => resolveMany(ctx, uris),
    resolveByKey: (kind, filter) => resolveByKey(ctx, kind, filter),
    list: (kind, filter, listOptions) => listEntities(ctx, kind, filter, listOptions),
    history: (identity) => history(ctx, identity),
    at: (identity, t) => at(ctx, identity, t),
    current: (identity) => current(ctx, identity),
    between: (kind, range) => between(ctx, kind, range),
    personByName: (name) => personByName(ctx, name),
    personByEmail: (address) => personByEmail(ctx, address),
    email: (address) => emailByAddress(ctx, address),
    groupByAcronym: (acronym) => groupByAcronym(ctx, acronym),
    documentByName: (name) => documentByName(ctx, name),
  };
  return { success: true, value: client };
}
