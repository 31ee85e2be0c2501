// Typed URI definitions
//
// A URI names exactly one record of one kind. The kind is carried both as a
// literal-typed field and as a brand, so a person URI can never be passed
// where a group URI is expected, and a URI can only be obtained from the
// parser (never from an object literal).

import type { ResourceKind } from './common.js';

declare const validatedUri: unique symbol;

/**
 * A validated, normalized identifier for a record of kind `K`.
 */
export type Uri<K extends ResourceKind> = {
  readonly kind: K;

  /**
   * Normalized API path, always with a trailing slash,
   * e.g. "/api/v1/person/person/20209/"
   */
  readonly path: string;

  readonly [validatedUri]: K;
};

/**
 * Any URI regardless of kind
 */
export type AnyUri = { [K in ResourceKind]: Uri<K> }[ResourceKind];

export type PersonUri = Uri<'person'>;
export type PersonAliasUri = Uri<'person-alias'>;
export type HistoricalPersonUri = Uri<'historical-person'>;
export type EmailUri = Uri<'email'>;
export type HistoricalEmailUri = Uri<'historical-email'>;
export type GroupUri = Uri<'group'>;
export type GroupTypeUri = Uri<'group-type'>;
export type GroupStateUri = Uri<'group-state'>;
export type DocumentUri = Uri<'document'>;
export type DocumentStateUri = Uri<'document-state'>;
export type DocumentStateTypeUri = Uri<'document-state-type'>;
export type SubmissionUri = Uri<'submission'>;
