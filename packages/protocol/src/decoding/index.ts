export { parseTimestamp, formatTimestamp, isValidDate } from './time.js';
export {
  ENTITY_SCHEMAS,
  PageSchema,
  PersonSchema,
  HistoricalPersonSchema,
  PersonAliasSchema,
  EmailSchema,
  HistoricalEmailSchema,
  GroupSchema,
  GroupTypeSchema,
  GroupStateSchema,
  DocumentSchema,
  DocumentStateSchema,
  DocumentStateTypeSchema,
  SubmissionSchema,
  uriField,
  timestampField,
} from './schemas.js';
export {
  issuesFromZod,
  parseDocument,
  decodeEntity,
  decodePage,
  entityDecoder,
  type ElementDecoder,
} from './decode.js';
