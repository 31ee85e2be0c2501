export {
  resolve,
  resolveByKey,
  resolveMany,
  type ResolveError,
  type ResolveByKeyError,
} from './resolve.js';
export {
  personByName,
  personByEmail,
  emailByAddress,
  groupByAcronym,
  documentByName,
  type LookupError,
} from './lookups.js';
