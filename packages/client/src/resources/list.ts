// Generic listing
//
// The one composition of registry, filters and pagination engine that every
// kind shares.

import type { EntityOf, ResourceKind } from '@ietfdata/protocol';
import type { ClientContext } from '../context.js';
import { paginate, type ListSequence } from '../pagination/paginate.js';
import { buildListPath } from '../pagination/query.js';
import { validateFilter, type FilterOf } from './filters.js';
import { getResource } from './registry.js';

export type ListOptions = {
  /**
   * Overrides the configured page size for this listing
   */
  pageSize?: number;
};

/**
 * Lazily list every entity of `kind` matching `filter`
 */
export async function* listEntities<K extends ResourceKind>(
  ctx: ClientContext,
  kind: K,
  filter: FilterOf<K>,
  options: ListOptions = {}
): ListSequence<EntityOf<K>> {
  const valid = validateFilter(filter);
  if (!valid.success) {
    yield valid;
    return;
  }

  const resource = getResource(kind);
  const path = buildListPath(
    resource.listPath,
    resource.encodeFilter(filter),
    options.pageSize ?? ctx.pageSize
  );
  ctx.logger.debug('Listing', { kind, path });

  yield* paginate(ctx.transport, path, resource.decode, {
    maxPages: ctx.maxPages,
    logger: ctx.logger,
    signal: ctx.signal,
  });
}
