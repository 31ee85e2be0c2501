// URI parsing and formatting
//
// Every kind's canonical URI is an API path of the form
// "/api/v1/<app>/<model>/<segment>/". Parsing is pure: a string either
// matches its kind's pattern and becomes a Uri, or yields InvalidUriError.

import { InvalidUriError } from '../errors.js';
import type { ResourceKind, Result } from '../types/common.js';
import type { Uri } from '../types/uris.js';

/**
 * Shape of the identifying segment of a URI
 */
export type SegmentType = 'numeric' | 'address' | 'slug' | 'name';

/**
 * Pattern for one kind of URI
 */
export type UriPattern = {
  /**
   * Path up to and including the slash before the segment
   */
  prefix: string;
  segment: SegmentType;
};

export const URI_PATTERNS: { readonly [K in ResourceKind]: UriPattern } = {
  person: { prefix: '/api/v1/person/person/', segment: 'numeric' },
  'person-alias': { prefix: '/api/v1/person/alias/', segment: 'numeric' },
  'historical-person': { prefix: '/api/v1/person/historicalperson/', segment: 'numeric' },
  email: { prefix: '/api/v1/person/email/', segment: 'address' },
  'historical-email': { prefix: '/api/v1/person/historicalemail/', segment: 'numeric' },
  group: { prefix: '/api/v1/group/group/', segment: 'numeric' },
  'group-type': { prefix: '/api/v1/name/grouptypename/', segment: 'slug' },
  'group-state': { prefix: '/api/v1/name/groupstatename/', segment: 'slug' },
  document: { prefix: '/api/v1/doc/document/', segment: 'name' },
  'document-state': { prefix: '/api/v1/doc/state/', segment: 'numeric' },
  'document-state-type': { prefix: '/api/v1/doc/statetype/', segment: 'slug' },
  submission: { prefix: '/api/v1/submit/submission/', segment: 'numeric' },
};

const SEGMENT_PATTERNS: Record<SegmentType, RegExp> = {
  numeric: /^\d+$/,
  address: /^[^\s/@]+@[^\s/@]+$/,
  slug: /^[a-z0-9][a-z0-9_-]*$/,
  name: /^[a-z0-9][a-z0-9._+-]*$/,
};

/**
 * List endpoint for a kind: the URI prefix with no segment
 */
export function listPathFor(kind: ResourceKind): string {
  return URI_PATTERNS[kind].prefix;
}

/**
 * Parse a string into a URI of the given kind.
 *
 * Surrounding whitespace is ignored and a missing trailing slash is added;
 * any other deviation from the kind's pattern is an error.
 */
export function parseUri<K extends ResourceKind>(
  kind: K,
  input: string
): Result<Uri<K>, InvalidUriError> {
  const pattern = URI_PATTERNS[kind];
  let path = input.trim();
  if (!path.endsWith('/')) {
    path += '/';
  }

  if (!path.startsWith(pattern.prefix)) {
    return { success: false, error: new InvalidUriError(kind, input) };
  }

  const segment = path.slice(pattern.prefix.length, -1);
  if (!SEGMENT_PATTERNS[pattern.segment].test(segment)) {
    return { success: false, error: new InvalidUriError(kind, input) };
  }

  return { success: true, value: brand(kind, path) };
}

/**
 * Build the canonical URI of a kind from its identifying value
 * (numeric id, email address, slug, or document name).
 */
export function buildUri<K extends ResourceKind>(
  kind: K,
  segment: string | number
): Result<Uri<K>, InvalidUriError> {
  return parseUri(kind, `${URI_PATTERNS[kind].prefix}${segment}/`);
}

/**
 * Normalized string form of a URI; parsing it again yields an equal URI.
 */
export function formatUri(uri: Uri<ResourceKind>): string {
  return uri.path;
}

/**
 * The identifying segment of a URI, e.g. "20209" or "csp@example.org"
 */
export function uriSegment(uri: Uri<ResourceKind>): string {
  return uri.path.slice(URI_PATTERNS[uri.kind].prefix.length, -1);
}

/**
 * Numeric identifier of a URI whose kind uses numeric segments, else null
 */
export function uriId(uri: Uri<ResourceKind>): number | null {
  return URI_PATTERNS[uri.kind].segment === 'numeric' ? Number(uriSegment(uri)) : null;
}

/**
 * Structural equality within one kind
 */
export function uriEquals<K extends ResourceKind, L extends K>(a: Uri<K>, b: Uri<L>): boolean {
  return a.kind === b.kind && a.path === b.path;
}

/**
 * Order two URIs of one kind: numeric identifiers numerically, others lexically
 */
export function compareUris<K extends ResourceKind, L extends K>(a: Uri<K>, b: Uri<L>): number {
  const aId = uriId(a);
  const bId = uriId(b);
  if (aId !== null && bId !== null) {
    return aId - bId;
  }
  const aSegment = uriSegment(a);
  const bSegment = uriSegment(b);
  return aSegment < bSegment ? -1 : aSegment > bSegment ? 1 : 0;
}

/**
 * Check whether a string is a valid URI of the given kind
 */
export function isUriOf(kind: ResourceKind, input: string): boolean {
  return parseUri(kind, input).success;
}

// The only place a Uri value is created
function brand<K extends ResourceKind>(kind: K, path: string): Uri<K> {
  return Object.freeze({ kind, path }) as Uri<K>;
}
