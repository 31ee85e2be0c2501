export {
  paginate,
  type ListError,
  type ListItem,
  type ListSequence,
  type PaginateOptions,
} from './paginate.js';
export { collect, first, take } from './collect.js';
export { buildListPath, relativeLink } from './query.js';
