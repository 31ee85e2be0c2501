// Person and email types

import type {
  EmailUri,
  HistoricalEmailUri,
  HistoricalPersonUri,
  PersonAliasUri,
  PersonUri,
} from './uris.js';

/**
 * How a historical record came to exist:
 * '+' created, '~' changed, '-' deleted
 */
export type HistoryType = '+' | '~' | '-';

/**
 * Bookkeeping fields present on every historical record
 */
export type HistoryFields = {
  historyId: number;

  /**
   * When the recorded state took effect
   */
  historyDate: Date;

  historyType: HistoryType;
  historyUser: string | null;
  historyChangeReason: string | null;
};

/**
 * A person in the registry.
 *
 * The `id` is stable for the lifetime of the person; name and
 * biography may change, and those changes are kept as HistoricalPerson records.
 */
export type Person = {
  id: number;
  resourceUri: PersonUri;
  name: string;
  nameFromDraft: string | null;
  biography: string;

  /**
   * Name transliterated to ASCII
   */
  ascii: string;

  asciiShort: string | null;
  time: Date;

  /** Photo URL */
  photo: string | null;

  /** Thumbnail URL */
  photoThumb: string | null;

  user: string | null;
  consent: boolean | null;
};

/**
 * One past state of a person
 */
export type HistoricalPerson = Omit<Person, 'resourceUri'> &
  HistoryFields & {
    resourceUri: HistoricalPersonUri;

    /**
     * The stable identity this record is a state of
     */
    person: PersonUri;
  };

/**
 * An alternative name a person is known by
 */
export type PersonAlias = {
  id: number;
  resourceUri: PersonAliasUri;
  person: PersonUri;
  name: string;
};

/**
 * A mapping from an email address to the person who uses it
 */
export type Email = {
  resourceUri: EmailUri;
  address: string;

  /**
   * Owning person; null for addresses not (yet) attributed
   */
  person: PersonUri | null;

  time: Date;

  /**
   * Where the registry learned of the address,
   * e.g. "author: draft-ietf-mmusic-rfc4566bis"
   */
  origin: string;

  primary: boolean;
  active: boolean;
};

/**
 * One past state of an email address, e.g. its association with a person
 */
export type HistoricalEmail = Omit<Email, 'resourceUri'> &
  HistoryFields & {
    resourceUri: HistoricalEmailUri;

    /**
     * The stable identity this record is a state of
     */
    email: EmailUri;
  };
