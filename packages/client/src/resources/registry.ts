// Resource registry
//
// One descriptor per kind pairs the list endpoint, the element decoder and
// the filter encoder. Generic operations (listing, lookup by key) are written
// once against descriptors instead of once per kind.

import {
  entityDecoder,
  listPathFor,
  type ElementDecoder,
  type EntityOf,
  type ResourceKind,
} from '@ietfdata/protocol';
import { FILTER_PARAMS, type FilterByKind, type QueryParams } from './filters.js';

export type ResourceDescriptor<K extends ResourceKind> = {
  kind: K;

  /**
   * List endpoint, e.g. "/api/v1/person/person/"
   */
  listPath: string;

  decode: ElementDecoder<EntityOf<K>>;
  encodeFilter: (filter: FilterByKind[K]) => QueryParams;
};

function describeResource<K extends ResourceKind>(
  kind: K,
  encodeFilter: (filter: FilterByKind[K]) => QueryParams
): ResourceDescriptor<K> {
  return {
    kind,
    listPath: listPathFor(kind),
    decode: entityDecoder(kind),
    encodeFilter,
  };
}

export const RESOURCES: { readonly [K in ResourceKind]: ResourceDescriptor<K> } = {
  person: describeResource('person', FILTER_PARAMS.person),
  'person-alias': describeResource('person-alias', FILTER_PARAMS['person-alias']),
  'historical-person': describeResource('historical-person', FILTER_PARAMS['historical-person']),
  email: describeResource('email', FILTER_PARAMS.email),
  'historical-email': describeResource('historical-email', FILTER_PARAMS['historical-email']),
  group: describeResource('group', FILTER_PARAMS.group),
  'group-type': describeResource('group-type', FILTER_PARAMS['group-type']),
  'group-state': describeResource('group-state', FILTER_PARAMS['group-state']),
  document: describeResource('document', FILTER_PARAMS.document),
  'document-state': describeResource('document-state', FILTER_PARAMS['document-state']),
  'document-state-type': describeResource(
    'document-state-type',
    FILTER_PARAMS['document-state-type']
  ),
  submission: describeResource('submission', FILTER_PARAMS.submission),
};

export function getResource<K extends ResourceKind>(kind: K): ResourceDescriptor<K> {
  return RESOURCES[kind];
}

