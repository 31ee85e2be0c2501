// URI derivation from decoded entities

import type { InvalidUriError } from '../errors.js';
import type { ResourceKind, Result } from '../types/common.js';
import type { EntityByKind } from '../types/entities.js';
import type { Uri } from '../types/uris.js';
import { buildUri } from './parse.js';

/**
 * The field(s) that identify an entity of each kind
 */
const IDENTIFYING_SEGMENT: {
  readonly [K in ResourceKind]: (entity: EntityByKind[K]) => string | number;
} = {
  person: (e) => e.id,
  'person-alias': (e) => e.id,
  'historical-person': (e) => e.historyId,
  email: (e) => e.address,
  'historical-email': (e) => e.historyId,
  group: (e) => e.id,
  'group-type': (e) => e.slug,
  'group-state': (e) => e.slug,
  document: (e) => e.name,
  'document-state': (e) => e.id,
  'document-state-type': (e) => e.slug,
  submission: (e) => e.id,
};

/**
 * Compute the canonical URI of an entity from its identifying fields.
 *
 * For a well-formed document this equals the entity's decoded `resourceUri`.
 */
export function deriveUri<K extends ResourceKind>(
  kind: K,
  entity: EntityByKind[K]
): Result<Uri<K>, InvalidUriError> {
  const segment: (entity: EntityByKind[K]) => string | number = IDENTIFYING_SEGMENT[kind];
  return buildUri(kind, segment(entity));
}
