// History queries
//
// Loads historical records from the service and shapes them into timelines.
// People are tracked by their person URI (historical records carry the
// person's id); email addresses by their email URI.

import {
  ok,
  uriSegment,
  type EmailUri,
  type HistoricalEmail,
  type HistoricalKind,
  type HistoricalPerson,
  type HistoryFields,
  type InvariantViolationError,
  type NotFoundError,
  type PersonUri,
  type ResourceKind,
  type Result,
  type Uri,
} from '@ietfdata/protocol';
import type { ClientContext } from '../context.js';
import { collect } from '../pagination/collect.js';
import type { ListError } from '../pagination/paginate.js';
import { listEntities } from '../resources/list.js';
import { validateFilter, type TimeRange } from '../resources/filters.js';
import {
  buildTimeline,
  currentSnapshot,
  snapshotAt,
  type Snapshot,
  type Timeline,
} from './timeline.js';

/**
 * The historical record type of each tracked kind
 */
export type HistoricalRecordByKind = {
  person: HistoricalPerson;
  email: HistoricalEmail;
};

export type HistoryOf<K extends HistoricalKind> = Timeline<HistoricalRecordByKind[K], Uri<K>>;

export type SnapshotOf<K extends HistoricalKind> = Snapshot<HistoricalRecordByKind[K], Uri<K>>;

/**
 * One identity's part in a time range
 */
export type IdentityHistory<K extends HistoricalKind> = {
  identity: Uri<K>;

  /**
   * Records up to the end of the range, in the order the service returned them
   */
  records: HistoricalRecordByKind[K][];

  /**
   * Snapshots overlapping the range, oldest first
   */
  snapshots: SnapshotOf<K>[];
};

export type SnapshotError = ListError | NotFoundError | InvariantViolationError;

/**
 * Every recorded state of a person or email address
 */
export function history<K extends HistoricalKind>(
  ctx: ClientContext,
  identity: Uri<K>
): Promise<Result<HistoryOf<K>, ListError>>;
export async function history(
  ctx: ClientContext,
  identity: PersonUri | EmailUri
): Promise<Result<HistoryOf<'person'> | HistoryOf<'email'>, ListError>> {
  if (identity.kind === 'person') {
    const records = await collect(
      listEntities(ctx, 'historical-person', { person: identity })
    );
    return records.success ? ok(buildTimeline(identity, records.value)) : records;
  }

  const records = await collect(
    listEntities(ctx, 'historical-email', { address: uriSegment(identity) })
  );
  return records.success ? ok(buildTimeline(identity, records.value)) : records;
}

/**
 * The state of an identity at time `t`
 */
export async function at<K extends HistoricalKind>(
  ctx: ClientContext,
  identity: Uri<K>,
  t: Date
): Promise<Result<SnapshotOf<K>, SnapshotError>> {
  const timeline = await history(ctx, identity);
  return timeline.success ? snapshotAt(timeline.value, t) : timeline;
}

/**
 * The current state of an identity
 */
export async function current<K extends HistoricalKind>(
  ctx: ClientContext,
  identity: Uri<K>
): Promise<Result<SnapshotOf<K>, SnapshotError>> {
  const timeline = await history(ctx, identity);
  return timeline.success ? currentSnapshot(timeline.value) : timeline;
}

/**
 * Every identity of `kind` with at least one snapshot overlapping
 * [since, until] (both inclusive), in order of first appearance.
 *
 * Records up to `until` are fetched, since a state that began before
 * `since` may still be in effect during the range.
 */
export function between<K extends HistoricalKind>(
  ctx: ClientContext,
  kind: K,
  range: Required<TimeRange>
): Promise<Result<IdentityHistory<K>[], ListError>>;
export async function between(
  ctx: ClientContext,
  kind: HistoricalKind,
  range: Required<TimeRange>
): Promise<Result<IdentityHistory<'person'>[] | IdentityHistory<'email'>[], ListError>> {
  const valid = validateFilter(range);
  if (!valid.success) {
    return valid;
  }
  const upToEnd = { until: range.until };

  if (kind === 'person') {
    const records = await collect(listEntities(ctx, 'historical-person', upToEnd));
    return records.success
      ? ok(overlapping(groupByIdentity(records.value, (r) => r.person), range))
      : records;
  }

  const records = await collect(listEntities(ctx, 'historical-email', upToEnd));
  return records.success
    ? ok(overlapping(groupByIdentity(records.value, (r) => r.email), range))
    : records;
}

function overlapping<R extends HistoryFields, K extends ResourceKind>(
  groups: { identity: Uri<K>; records: R[] }[],
  range: Required<TimeRange>
): { identity: Uri<K>; records: R[]; snapshots: Snapshot<R, Uri<K>>[] }[] {
  const since = range.since.getTime();
  const until = range.until.getTime();
  const result: { identity: Uri<K>; records: R[]; snapshots: Snapshot<R, Uri<K>>[] }[] = [];

  for (const group of groups) {
    const snapshots = buildTimeline(group.identity, group.records).snapshots.filter(
      (snapshot) =>
        snapshot.validFrom.getTime() <= until &&
        (snapshot.validUntil === null || snapshot.validUntil.getTime() > since)
    );
    if (snapshots.length > 0) {
      result.push({ ...group, snapshots });
    }
  }
  return result;
}

function groupByIdentity<R, K extends ResourceKind>(
  records: readonly R[],
  identityOf: (record: R) => Uri<K>
): { identity: Uri<K>; records: R[] }[] {
  const groups = new Map<string, { identity: Uri<K>; records: R[] }>();
  for (const record of records) {
    const identity = identityOf(record);
    const group = groups.get(identity.path);
    if (group) {
      group.records.push(record);
    } else {
      groups.set(identity.path, { identity, records: [record] });
    }
  }
  return [...groups.values()];
}
