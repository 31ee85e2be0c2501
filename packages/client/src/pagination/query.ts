// List query construction

import type { QueryParams } from '../resources/filters.js';

/**
 * Build the path of the first page of a list query.
 *
 * Parameters are sorted by name and undefined values dropped, so equal
 * queries always produce the same path. `pageSize` becomes `limit`.
 */
export function buildListPath(listPath: string, params: QueryParams, pageSize?: number): string {
  const search = new URLSearchParams();
  for (const [name, value] of Object.entries(params)) {
    if (value !== undefined) {
      search.append(name, value);
    }
  }
  if (pageSize !== undefined) {
    search.set('limit', String(pageSize));
  }
  search.sort();

  const query = search.toString();
  return query ? `${listPath}?${query}` : listPath;
}

/**
 * Reduce a next-page link to a path relative to the service root.
 * The service normally sends relative links; absolute ones keep only
 * their path and query.
 */
export function relativeLink(link: string): string {
  if (link.startsWith('/')) {
    return link;
  }
  try {
    const url = new URL(link);
    return `${url.pathname}${url.search}`;
  } catch {
    return link;
  }
}
