// List filters
//
// Each kind accepts its own filter shape. Filters become query parameters
// on the kind's list endpoint; what they mean is up to the service.

import {
  ValidationError,
  formatTimestamp,
  isValidDate,
  uriSegment,
  type DocumentStateTypeUri,
  type GroupStateUri,
  type GroupTypeUri,
  type GroupUri,
  type PersonUri,
  type ResourceKind,
  type Result,
  type Uri,
} from '@ietfdata/protocol';

/**
 * Query parameters; undefined values are dropped
 */
export type QueryParams = Record<string, string | undefined>;

/**
 * Inclusive time bounds
 */
export type TimeRange = {
  since?: Date;
  until?: Date;
};

export type PersonFilter = TimeRange & {
  /** Exact name */
  name?: string;
  nameContains?: string;
};

export type PersonAliasFilter = {
  name?: string;
  person?: PersonUri;
};

/**
 * Time bounds apply to when each historical state took effect
 */
export type HistoricalPersonFilter = TimeRange & {
  person?: PersonUri;
  name?: string;
};

export type EmailFilter = {
  address?: string;
  person?: PersonUri;
  primary?: boolean;
};

export type HistoricalEmailFilter = TimeRange & {
  address?: string;
  person?: PersonUri;
};

export type GroupFilter = TimeRange & {
  acronym?: string;
  nameContains?: string;
  type?: GroupTypeUri;
  state?: GroupStateUri;
  parent?: GroupUri;
};

export type GroupTypeFilter = {
  used?: boolean;
};

export type GroupStateFilter = {
  used?: boolean;
};

export type DocumentFilter = TimeRange & {
  name?: string;
  titleContains?: string;
  group?: GroupUri;
};

export type DocumentStateFilter = {
  type?: DocumentStateTypeUri;
  slug?: string;
};

export type DocumentStateTypeFilter = Record<string, never>;

export type SubmissionFilter = {
  name?: string;
  group?: GroupUri;
};

export type FilterByKind = {
  person: PersonFilter;
  'person-alias': PersonAliasFilter;
  'historical-person': HistoricalPersonFilter;
  email: EmailFilter;
  'historical-email': HistoricalEmailFilter;
  group: GroupFilter;
  'group-type': GroupTypeFilter;
  'group-state': GroupStateFilter;
  document: DocumentFilter;
  'document-state': DocumentStateFilter;
  'document-state-type': DocumentStateTypeFilter;
  submission: SubmissionFilter;
};

export type FilterOf<K extends ResourceKind> = FilterByKind[K];

// --- Parameter encoding ---

function flag(value: boolean | undefined): string | undefined {
  return value === undefined ? undefined : String(value);
}

function segment(uri: Uri<ResourceKind> | undefined): string | undefined {
  return uri === undefined ? undefined : uriSegment(uri);
}

function timeBounds(range: TimeRange, field: string): QueryParams {
  return {
    [`${field}__gte`]: range.since && formatTimestamp(range.since),
    [`${field}__lte`]: range.until && formatTimestamp(range.until),
  };
}

/**
 * Query parameters for each kind's filter
 */
export const FILTER_PARAMS: {
  readonly [K in ResourceKind]: (filter: FilterByKind[K]) => QueryParams;
} = {
  person: (f) => ({
    name: f.name,
    name__contains: f.nameContains,
    ...timeBounds(f, 'time'),
  }),
  'person-alias': (f) => ({
    name: f.name,
    person: segment(f.person),
  }),
  'historical-person': (f) => ({
    id: segment(f.person),
    name: f.name,
    ...timeBounds(f, 'history_date'),
  }),
  email: (f) => ({
    address: f.address,
    person: segment(f.person),
    primary: flag(f.primary),
  }),
  'historical-email': (f) => ({
    address: f.address,
    person: segment(f.person),
    ...timeBounds(f, 'history_date'),
  }),
  group: (f) => ({
    acronym: f.acronym,
    name__contains: f.nameContains,
    type: segment(f.type),
    state: segment(f.state),
    parent: segment(f.parent),
    ...timeBounds(f, 'time'),
  }),
  'group-type': (f) => ({ used: flag(f.used) }),
  'group-state': (f) => ({ used: flag(f.used) }),
  document: (f) => ({
    name: f.name,
    title__contains: f.titleContains,
    group: segment(f.group),
    ...timeBounds(f, 'time'),
  }),
  'document-state': (f) => ({
    type: segment(f.type),
    slug: f.slug,
  }),
  'document-state-type': () => ({}),
  submission: (f) => ({
    name: f.name,
    group: segment(f.group),
  }),
};

/**
 * Reject filters with an invalid date or an inverted time range
 */
export function validateFilter(filter: object): Result<void, ValidationError> {
  if (!hasTimeRange(filter)) {
    return { success: true, value: undefined };
  }

  for (const field of ['since', 'until'] as const) {
    const date = filter[field];
    if (date !== undefined && !isValidDate(date)) {
      return {
        success: false,
        error: new ValidationError(`Filter "${field}" is not a valid date`, { field }),
      };
    }
  }

  if (filter.since && filter.until && filter.since.getTime() > filter.until.getTime()) {
    return {
      success: false,
      error: new ValidationError('Filter "since" is after "until"', {
        field: 'since',
        details: { since: filter.since.toISOString(), until: filter.until.toISOString() },
      }),
    };
  }
  return { success: true, value: undefined };
}

function hasTimeRange(filter: object): filter is TimeRange {
  return 'since' in filter || 'until' in filter;
}
