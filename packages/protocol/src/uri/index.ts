export {
  URI_PATTERNS,
  listPathFor,
  parseUri,
  buildUri,
  formatUri,
  uriSegment,
  uriId,
  uriEquals,
  compareUris,
  isUriOf,
  type SegmentType,
  type UriPattern,
} from './parse.js';
export { deriveUri } from './derive.js';
