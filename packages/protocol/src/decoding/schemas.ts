// Zod schemas for service documents
//
// Each schema validates the snake_case shape the service returns and
// transforms it into the matching entity. Fields the client does not model
// are ignored; nested URIs are parsed into typed URIs of their kind.

import { z } from 'zod';
import type { ResourceKind } from '../types/common.js';
import type { Document, DocumentState, DocumentStateType, Submission } from '../types/documents.js';
import type { EntityByKind } from '../types/entities.js';
import type { Group, GroupState, GroupType } from '../types/groups.js';
import type { Page } from '../types/pages.js';
import type { Email, HistoricalEmail, HistoricalPerson, Person, PersonAlias } from '../types/people.js';
import type { Uri } from '../types/uris.js';
import { buildUri, parseUri } from '../uri/parse.js';
import { parseTimestamp } from './time.js';

// --- Field helpers ---

/**
 * A string field holding a URI of the given kind
 */
export function uriField<K extends ResourceKind>(kind: K) {
  return z.string().transform((value, ctx): Uri<K> => {
    const parsed = parseUri(kind, value);
    if (!parsed.success) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error.message });
      return z.NEVER;
    }
    return parsed.value;
  });
}

export const timestampField = z.string().transform((value, ctx): Date => {
  const parsed = parseTimestamp(value);
  if (!parsed.success) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error });
    return z.NEVER;
  }
  return parsed.value;
});

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? null);

const optionalCount = z
  .number()
  .int()
  .nonnegative()
  .nullish()
  .transform((value) => value ?? null);

const id = z.number().int().nonnegative();

const historyFields = {
  history_id: id,
  history_date: timestampField,
  history_type: z.enum(['+', '~', '-']),
  history_user: optionalText,
  history_change_reason: optionalText,
};

/**
 * Canonical URI of the identity behind a historical record
 */
function identityUri<K extends ResourceKind>(
  kind: K,
  segment: string | number,
  ctx: z.RefinementCtx
): Uri<K> {
  const built = buildUri(kind, segment);
  if (!built.success) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: built.error.message });
    return z.NEVER;
  }
  return built.value;
}

// --- People ---

const personFields = {
  id,
  name: z.string(),
  name_from_draft: optionalText,
  biography: z.string(),
  ascii: z.string(),
  ascii_short: optionalText,
  time: timestampField,
  photo: optionalText,
  photo_thumb: optionalText,
  user: optionalText,
  consent: z
    .boolean()
    .nullish()
    .transform((value) => value ?? null),
};

type RawPersonFields = {
  id: number;
  name: string;
  name_from_draft: string | null;
  biography: string;
  ascii: string;
  ascii_short: string | null;
  time: Date;
  photo: string | null;
  photo_thumb: string | null;
  user: string | null;
  consent: boolean | null;
};

function toPersonFields(raw: RawPersonFields): Omit<Person, 'resourceUri'> {
  return {
    id: raw.id,
    name: raw.name,
    nameFromDraft: raw.name_from_draft,
    biography: raw.biography,
    ascii: raw.ascii,
    asciiShort: raw.ascii_short,
    time: raw.time,
    photo: raw.photo,
    photoThumb: raw.photo_thumb,
    user: raw.user,
    consent: raw.consent,
  };
}

export const PersonSchema = z
  .object({ resource_uri: uriField('person'), ...personFields })
  .transform((raw): Person => ({ resourceUri: raw.resource_uri, ...toPersonFields(raw) }));

export const HistoricalPersonSchema = z
  .object({ resource_uri: uriField('historical-person'), ...personFields, ...historyFields })
  .transform(
    (raw, ctx): HistoricalPerson => ({
      resourceUri: raw.resource_uri,
      ...toPersonFields(raw),
      historyId: raw.history_id,
      historyDate: raw.history_date,
      historyType: raw.history_type,
      historyUser: raw.history_user,
      historyChangeReason: raw.history_change_reason,
      person: identityUri('person', raw.id, ctx),
    })
  );

export const PersonAliasSchema = z
  .object({
    id,
    resource_uri: uriField('person-alias'),
    person: uriField('person'),
    name: z.string(),
  })
  .transform(
    (raw): PersonAlias => ({
      id: raw.id,
      resourceUri: raw.resource_uri,
      person: raw.person,
      name: raw.name,
    })
  );

const emailFields = {
  address: z.string(),
  person: uriField('person').nullable(),
  time: timestampField,
  origin: z.string(),
  primary: z.boolean(),
  active: z.boolean(),
};

export const EmailSchema = z
  .object({ resource_uri: uriField('email'), ...emailFields })
  .transform(
    (raw): Email => ({
      resourceUri: raw.resource_uri,
      address: raw.address,
      person: raw.person,
      time: raw.time,
      origin: raw.origin,
      primary: raw.primary,
      active: raw.active,
    })
  );

export const HistoricalEmailSchema = z
  .object({ resource_uri: uriField('historical-email'), ...emailFields, ...historyFields })
  .transform(
    (raw, ctx): HistoricalEmail => ({
      resourceUri: raw.resource_uri,
      address: raw.address,
      person: raw.person,
      time: raw.time,
      origin: raw.origin,
      primary: raw.primary,
      active: raw.active,
      historyId: raw.history_id,
      historyDate: raw.history_date,
      historyType: raw.history_type,
      historyUser: raw.history_user,
      historyChangeReason: raw.history_change_reason,
      email: identityUri('email', raw.address, ctx),
    })
  );

// --- Groups ---

export const GroupSchema = z
  .object({
    id,
    resource_uri: uriField('group'),
    acronym: z.string(),
    name: z.string(),
    description: z.string(),
    charter: uriField('document').nullable(),
    ad: uriField('person').nullable(),
    time: timestampField,
    type: uriField('group-type'),
    comments: z.string(),
    parent: uriField('group').nullable(),
    state: uriField('group-state'),
    unused_states: z.array(uriField('document-state')),
    unused_tags: z.array(z.string()),
    list_email: z.string(),
    list_subscribe: z.string(),
    list_archive: z.string(),
  })
  .transform(
    (raw): Group => ({
      id: raw.id,
      resourceUri: raw.resource_uri,
      acronym: raw.acronym,
      name: raw.name,
      description: raw.description,
      charter: raw.charter,
      ad: raw.ad,
      time: raw.time,
      type: raw.type,
      comments: raw.comments,
      parent: raw.parent,
      state: raw.state,
      unusedStates: raw.unused_states,
      unusedTags: raw.unused_tags,
      listEmail: raw.list_email,
      listSubscribe: raw.list_subscribe,
      listArchive: raw.list_archive,
    })
  );

export const GroupTypeSchema = z
  .object({
    resource_uri: uriField('group-type'),
    slug: z.string(),
    name: z.string(),
    verbose_name: z.string(),
    desc: z.string(),
    used: z.boolean(),
    order: z.number().int(),
  })
  .transform(
    (raw): GroupType => ({
      resourceUri: raw.resource_uri,
      slug: raw.slug,
      name: raw.name,
      verboseName: raw.verbose_name,
      desc: raw.desc,
      used: raw.used,
      order: raw.order,
    })
  );

export const GroupStateSchema = z
  .object({
    resource_uri: uriField('group-state'),
    slug: z.string(),
    name: z.string(),
    desc: z.string(),
    used: z.boolean(),
    order: z.number().int(),
  })
  .transform(
    (raw): GroupState => ({
      resourceUri: raw.resource_uri,
      slug: raw.slug,
      name: raw.name,
      desc: raw.desc,
      used: raw.used,
      order: raw.order,
    })
  );

// --- Documents ---

export const DocumentSchema = z
  .object({
    id,
    resource_uri: uriField('document'),
    name: z.string(),
    title: z.string(),
    pages: optionalCount,
    words: optionalCount,
    time: timestampField,
    notify: z.string(),
    expires: timestampField.nullish().transform((value) => value ?? null),
    type: optionalText,
    rfc: optionalCount,
    rev: z.string(),
    abstract: z.string(),
    internal_comments: z.string(),
    order: z.number().int(),
    note: z.string(),
    ad: uriField('person').nullable(),
    shepherd: uriField('email').nullable(),
    group: uriField('group').nullable(),
    stream: optionalText,
    std_level: optionalText,
    intended_std_level: optionalText,
    states: z.array(uriField('document-state')),
    submissions: z.array(uriField('submission')),
    tags: z.array(z.string()),
    uploaded_filename: z.string(),
    external_url: z.string(),
  })
  .transform(
    (raw): Document => ({
      id: raw.id,
      resourceUri: raw.resource_uri,
      name: raw.name,
      title: raw.title,
      pages: raw.pages,
      words: raw.words,
      time: raw.time,
      notify: raw.notify,
      expires: raw.expires,
      type: raw.type,
      rfc: raw.rfc,
      rev: raw.rev,
      abstract: raw.abstract,
      internalComments: raw.internal_comments,
      order: raw.order,
      note: raw.note,
      ad: raw.ad,
      shepherd: raw.shepherd,
      group: raw.group,
      stream: raw.stream,
      stdLevel: raw.std_level,
      intendedStdLevel: raw.intended_std_level,
      states: raw.states,
      submissions: raw.submissions,
      tags: raw.tags,
      uploadedFilename: raw.uploaded_filename,
      externalUrl: raw.external_url,
    })
  );

export const DocumentStateSchema = z
  .object({
    id,
    resource_uri: uriField('document-state'),
    slug: z.string(),
    name: z.string(),
    desc: z.string(),
    next_states: z.array(uriField('document-state')),
    used: z.boolean(),
    order: z.number().int(),
    type: uriField('document-state-type'),
  })
  .transform(
    (raw): DocumentState => ({
      id: raw.id,
      resourceUri: raw.resource_uri,
      slug: raw.slug,
      name: raw.name,
      desc: raw.desc,
      nextStates: raw.next_states,
      used: raw.used,
      order: raw.order,
      type: raw.type,
    })
  );

export const DocumentStateTypeSchema = z
  .object({
    resource_uri: uriField('document-state-type'),
    slug: z.string(),
    label: z.string(),
  })
  .transform(
    (raw): DocumentStateType => ({
      resourceUri: raw.resource_uri,
      slug: raw.slug,
      label: raw.label,
    })
  );

export const SubmissionSchema = z
  .object({
    id,
    resource_uri: uriField('submission'),
    name: z.string(),
    rev: z.string(),
    title: z.string(),
    group: uriField('group').nullable(),
    submission_date: timestampField,
    state: z.string(),
    draft: uriField('document').nullish().transform((value) => value ?? null),
  })
  .transform(
    (raw): Submission => ({
      id: raw.id,
      resourceUri: raw.resource_uri,
      name: raw.name,
      rev: raw.rev,
      title: raw.title,
      group: raw.group,
      submissionDate: raw.submission_date,
      state: raw.state,
      document: raw.draft,
    })
  );

/**
 * Decoder for each resource kind
 */
export const ENTITY_SCHEMAS: {
  readonly [K in ResourceKind]: z.ZodType<EntityByKind[K], z.ZodTypeDef, unknown>;
} = {
  person: PersonSchema,
  'person-alias': PersonAliasSchema,
  'historical-person': HistoricalPersonSchema,
  email: EmailSchema,
  'historical-email': HistoricalEmailSchema,
  group: GroupSchema,
  'group-type': GroupTypeSchema,
  'group-state': GroupStateSchema,
  document: DocumentSchema,
  'document-state': DocumentStateSchema,
  'document-state-type': DocumentStateTypeSchema,
  submission: SubmissionSchema,
};

// --- Pages ---

const nullableCount = z
  .number()
  .int()
  .nullish()
  .transform((value) => value ?? null);

/**
 * List response envelope: `{ meta: {...}, objects: [...] }`
 */
export const PageSchema = z
  .object({
    meta: z.object({
      next: z
        .string()
        .nullish()
        .transform((value) => value ?? null),
      previous: z
        .string()
        .nullish()
        .transform((value) => value ?? null),
      limit: nullableCount,
      offset: nullableCount,
      total_count: nullableCount,
    }),
    objects: z.array(z.unknown()),
  })
  .transform(
    (raw): Page => ({
      meta: {
        next: raw.meta.next,
        previous: raw.meta.previous,
        limit: raw.meta.limit,
        offset: raw.meta.offset,
        totalCount: raw.meta.total_count,
      },
      objects: raw.objects,
    })
  );
