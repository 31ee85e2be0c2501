// Document types

import type {
  DocumentStateTypeUri,
  DocumentStateUri,
  DocumentUri,
  EmailUri,
  GroupUri,
  PersonUri,
  SubmissionUri,
} from './uris.js';

/**
 * An Internet-Draft, RFC, charter, or other document tracked by the registry
 */
export type Document = {
  id: number;
  resourceUri: DocumentUri;

  /**
   * Canonical name, e.g. "draft-ietf-mmusic-rfc4566bis"
   */
  name: string;

  title: string;
  pages: number | null;
  words: number | null;
  time: Date;
  notify: string;
  expires: Date | null;

  /**
   * Document type URI as returned by the service
   */
  type: string | null;

  rfc: number | null;
  rev: string;
  abstract: string;
  internalComments: string;
  order: number;
  note: string;
  ad: PersonUri | null;
  shepherd: EmailUri | null;
  group: GroupUri | null;
  stream: string | null;
  stdLevel: string | null;
  intendedStdLevel: string | null;
  states: DocumentStateUri[];
  submissions: SubmissionUri[];
  tags: string[];
  uploadedFilename: string;
  externalUrl: string;
};

/**
 * A state a document can be in within one state machine
 */
export type DocumentState = {
  id: number;
  resourceUri: DocumentStateUri;
  slug: string;
  name: string;
  desc: string;
  nextStates: DocumentStateUri[];
  used: boolean;
  order: number;
  type: DocumentStateTypeUri;
};

/**
 * A document state machine, e.g. "draft-iesg"
 */
export type DocumentStateType = {
  resourceUri: DocumentStateTypeUri;
  slug: string;
  label: string;
};

/**
 * An upload of a document revision through the submission tool
 */
export type Submission = {
  id: number;
  resourceUri: SubmissionUri;
  name: string;
  rev: string;
  title: string;
  group: GroupUri | null;
  submissionDate: Date;

  /**
   * Submission state URI as returned by the service
   */
  state: string;

  document: DocumentUri | null;
};
