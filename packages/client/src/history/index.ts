export {
  buildTimeline,
  snapshotAt,
  currentSnapshot,
  verifyTimeline,
  type Snapshot,
  type Timeline,
} from './timeline.js';
export {
  history,
  at,
  current,
  between,
  type HistoricalRecordByKind,
  type HistoryOf,
  type SnapshotOf,
  type IdentityHistory,
  type SnapshotError,
} from './history.js';
