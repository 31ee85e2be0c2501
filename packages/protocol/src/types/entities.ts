// Entity map - the record type behind each resource kind

import type { ResourceKind } from './common.js';
import type { Document, DocumentState, DocumentStateType, Submission } from './documents.js';
import type { Group, GroupState, GroupType } from './groups.js';
import type { Email, HistoricalEmail, HistoricalPerson, Person, PersonAlias } from './people.js';

/**
 * Maps each resource kind to the entity a URI of that kind resolves to
 */
export type EntityByKind = {
  person: Person;
  'person-alias': PersonAlias;
  'historical-person': HistoricalPerson;
  email: Email;
  'historical-email': HistoricalEmail;
  group: Group;
  'group-type': GroupType;
  'group-state': GroupState;
  document: Document;
  'document-state': DocumentState;
  'document-state-type': DocumentStateType;
  submission: Submission;
};

export type EntityOf<K extends ResourceKind> = EntityByKind[K];

/**
 * Any decoded entity
 */
export type AnyEntity = EntityByKind[ResourceKind];
