export {
  FILTER_PARAMS,
  validateFilter,
  type QueryParams,
  type TimeRange,
  type FilterByKind,
  type FilterOf,
  type PersonFilter,
  type PersonAliasFilter,
  type HistoricalPersonFilter,
  type EmailFilter,
  type HistoricalEmailFilter,
  type GroupFilter,
  type GroupTypeFilter,
  type GroupStateFilter,
  type DocumentFilter,
  type DocumentStateFilter,
  type DocumentStateTypeFilter,
  type SubmissionFilter,
} from './filters.js';
export { RESOURCES, getResource, type ResourceDescriptor } from './registry.js';
export { listEntities, type ListOptions } from './list.js';
