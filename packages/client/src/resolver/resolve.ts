// Entity resolver
//
// Turns a typed URI into the entity it names with exactly one fetch, and a
// natural key (name, acronym, address) into an entity by listing its kind
// with a filter and taking the first match.

import {
  DecodeError,
  NotFoundError,
  decodeEntity,
  formatUri,
  type EntityOf,
  type ResourceKind,
  type Result,
  type Uri,
} from '@ietfdata/protocol';
import type { ClientContext } from '../context.js';
import { fetchDocument, type FetchDocumentError } from '../fetch.js';
import { first } from '../pagination/collect.js';
import type { ListError } from '../pagination/paginate.js';
import type { FilterOf } from '../resources/filters.js';
import { listEntities } from '../resources/list.js';

export type ResolveError = FetchDocumentError;

export type ResolveByKeyError = ListError;

/**
 * Fetch and decode the entity a URI names.
 *
 * The decoded entity must carry the requested URI; a document for some
 * other record is a DecodeError.
 */
export async function resolve<K extends ResourceKind>(
  ctx: ClientContext,
  uri: Uri<K>
): Promise<Result<EntityOf<K>, ResolveError>> {
  const path = formatUri(uri);
  const fetched = await fetchDocument(ctx.transport, path, ctx.signal);
  if (!fetched.success) {
    ctx.logger.debug('Resolve failed', { path, code: fetched.error.code });
    return fetched;
  }

  const decoded = decodeEntity(uri.kind, fetched.value);
  if (!decoded.success) {
    ctx.logger.warn('Undecodable document', { path, issues: decoded.error });
    return { success: false, error: new DecodeError(path, decoded.error) };
  }

  const received = decoded.value.resourceUri.path;
  if (received !== path) {
    return {
      success: false,
      error: new DecodeError(path, [
        { path: 'resource_uri', message: `Expected ${path}, received ${received}` },
      ]),
    };
  }

  return decoded;
}

/**
 * The first entity of `kind` matching `filter`; NotFoundError when none does
 */
export async function resolveByKey<K extends ResourceKind>(
  ctx: ClientContext,
  kind: K,
  filter: FilterOf<K>
): Promise<Result<EntityOf<K>, ResolveByKeyError>> {
  const found = await first(listEntities(ctx, kind, filter));
  if (!found.success) {
    return found;
  }
  if (found.value === null) {
    return {
      success: false,
      error: new NotFoundError(kind, `No ${kind} matches ${describeFilter(filter)}`),
    };
  }
  return { success: true, value: found.value };
}

/**
 * Resolve several URIs one after another, keeping each outcome
 */
export async function resolveMany<K extends ResourceKind>(
  ctx: ClientContext,
  uris: readonly Uri<K>[]
): Promise<Result<EntityOf<K>, ResolveError>[]> {
  const results: Result<EntityOf<K>, ResolveError>[] = [];
  for (const uri of uris) {
    results.push(await resolve(ctx, uri));
  }
  return results;
}

function describeFilter(filter: object): string {
  const parts = Object.entries(filter)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${describeValue(value)}`);
  return parts.length > 0 ? parts.join(', ') : 'an empty filter';
}

function describeValue(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'object' && value !== null && 'path' in value) {
    return String(value.path);
  }
  return String(value);
}
