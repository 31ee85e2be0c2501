// Historical version index
//
// Rebuilds the sequence of states an identity passed through from its
// historical records. Each record starts a snapshot that lasts until the
// next record's date; the last one stays open (current) unless the identity
// was deleted.
//
// Validity intervals are half-open: a snapshot is in effect from its start
// (inclusive) to its end (exclusive).

import {
  InvariantViolationError,
  NotFoundError,
  ValidationError,
  formatTimestamp,
  isValidDate,
  type HistoryFields,
  type ResourceKind,
  type Result,
  type Uri,
} from '@ietfdata/protocol';

/**
 * One state of an identity and the interval it was in effect
 */
export type Snapshot<R, I> = {
  identity: I;
  validFrom: Date;

  /**
   * End of validity (exclusive); null while the state is current
   */
  validUntil: Date | null;

  record: R;
};

/**
 * Every known state of one identity, oldest first
 */
export type Timeline<R, I> = {
  identity: I;
  snapshots: Snapshot<R, I>[];

  /**
   * Dates of deletion records; a snapshot ending on one may be followed by a gap
   */
  deletions: Date[];

  /**
   * Set when the identity is currently deleted
   */
  deletedAt: Date | null;
};

function compareRecords(a: HistoryFields, b: HistoryFields): number {
  const byDate = a.historyDate.getTime() - b.historyDate.getTime();
  return byDate !== 0 ? byDate : a.historyId - b.historyId;
}

/**
 * Build the timeline of `identity` from its historical records, in any order.
 * Ties on date are broken by history id.
 */
export function buildTimeline<R extends HistoryFields, I>(
  identity: I,
  records: readonly R[]
): Timeline<R, I> {
  const ordered = [...records].sort(compareRecords);
  const snapshots: Snapshot<R, I>[] = [];
  const deletions: Date[] = [];
  let deletedAt: Date | null = null;

  for (const record of ordered) {
    const previous = snapshots.at(-1);
    if (previous && previous.validUntil === null) {
      previous.validUntil = record.historyDate;
    }

    if (record.historyType === '-') {
      deletions.push(record.historyDate);
      deletedAt = record.historyDate;
      continue;
    }

    deletedAt = null;
    snapshots.push({ identity, validFrom: record.historyDate, validUntil: null, record });
  }

  return { identity, snapshots, deletions, deletedAt };
}

function contains(snapshot: Snapshot<unknown, unknown>, t: Date): boolean {
  const time = t.getTime();
  return (
    snapshot.validFrom.getTime() <= time &&
    (snapshot.validUntil === null || time < snapshot.validUntil.getTime())
  );
}

/**
 * The snapshot in effect at `t`.
 *
 * Before the first snapshot, after a deletion, or in a gap: NotFoundError.
 * More than one snapshot containing `t` means the service history overlaps.
 */
export function snapshotAt<R, I extends Uri<ResourceKind>>(
  timeline: Timeline<R, I>,
  t: Date
): Result<Snapshot<R, I>, ValidationError | NotFoundError | InvariantViolationError> {
  if (!isValidDate(t)) {
    return {
      success: false,
      error: new ValidationError('Snapshot time is not a valid date', { field: 't' }),
    };
  }

  const matches = timeline.snapshots.filter((snapshot) => contains(snapshot, t));

  if (matches.length === 0) {
    return {
      success: false,
      error: new NotFoundError(
        timeline.identity.path,
        `No snapshot of ${timeline.identity.path} at ${formatTimestamp(t)}`
      ),
    };
  }
  if (matches.length > 1) {
    return {
      success: false,
      error: new InvariantViolationError(
        'snapshots-disjoint',
        `${matches.length} snapshots of ${timeline.identity.path} contain ${formatTimestamp(t)}`,
        { identity: timeline.identity.path, at: t.toISOString(), matches: matches.length }
      ),
    };
  }
  return { success: true, value: matches[0] };
}

/**
 * The open-ended snapshot of a timeline.
 *
 * A deleted identity is NotFoundError. Zero or several open snapshots
 * otherwise, including an empty history, is an InvariantViolationError.
 */
export function currentSnapshot<R, I extends Uri<ResourceKind>>(
  timeline: Timeline<R, I>
): Result<Snapshot<R, I>, NotFoundError | InvariantViolationError> {
  const path = timeline.identity.path;
  const open = timeline.snapshots.filter((snapshot) => snapshot.validUntil === null);

  if (open.length === 1) {
    return { success: true, value: open[0] };
  }
  if (open.length > 1) {
    return {
      success: false,
      error: new InvariantViolationError(
        'single-current',
        `${open.length} current snapshots of ${path}`,
        { identity: path, open: open.length }
      ),
    };
  }
  if (timeline.deletedAt !== null) {
    return {
      success: false,
      error: new NotFoundError(
        path,
        `${path} was deleted at ${formatTimestamp(timeline.deletedAt)}`
      ),
    };
  }
  return {
    success: false,
    error: new InvariantViolationError('single-current', `No current snapshot of ${path}`, {
      identity: path,
    }),
  };
}

/**
 * Check a timeline's structure: snapshots ordered and non-overlapping,
 * adjacent unless separated by a deletion, and only the last one open.
 * Returns every violation found.
 */
export function verifyTimeline<R, I extends Uri<ResourceKind>>(
  timeline: Timeline<R, I>
): InvariantViolationError[] {
  const violations: InvariantViolationError[] = [];
  const path = timeline.identity.path;
  const deletions = new Set(timeline.deletions.map((date) => date.getTime()));
  const violation = (invariant: string, message: string, index: number) =>
    violations.push(new InvariantViolationError(invariant, message, { identity: path, index }));

  timeline.snapshots.forEach((snapshot, index) => {
    const from = snapshot.validFrom.getTime();
    const until = snapshot.validUntil === null ? null : snapshot.validUntil.getTime();

    if (until !== null && until < from) {
      violation('snapshot-interval', `Snapshot ${index} of ${path} ends before it starts`, index);
    }

    const next = timeline.snapshots[index + 1];
    if (next === undefined) {
      return;
    }

    if (until === null) {
      violation('single-current', `Snapshot ${index} of ${path} is open but not last`, index);
      return;
    }

    const nextFrom = next.validFrom.getTime();
    if (nextFrom < from) {
      violation('snapshots-ordered', `Snapshot ${index + 1} of ${path} starts too early`, index + 1);
    } else if (nextFrom < until) {
      violation('snapshots-disjoint', `Snapshots ${index} and ${index + 1} of ${path} overlap`, index);
    } else if (nextFrom > until && !deletions.has(until)) {
      violation('snapshots-contiguous', `Gap after snapshot ${index} of ${path}`, index);
    }
  });

  return violations;
}
