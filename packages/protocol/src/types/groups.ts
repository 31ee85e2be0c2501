// Group types

import type {
  DocumentStateUri,
  DocumentUri,
  GroupStateUri,
  GroupTypeUri,
  GroupUri,
  PersonUri,
} from './uris.js';

/**
 * A working group, research group, area, directorate or similar body
 */
export type Group = {
  id: number;
  resourceUri: GroupUri;

  /**
   * Short name, e.g. "mmusic"
   */
  acronym: string;

  name: string;
  description: string;
  charter: DocumentUri | null;

  /**
   * Responsible area director
   */
  ad: PersonUri | null;

  time: Date;
  type: GroupTypeUri;
  comments: string;
  parent: GroupUri | null;
  state: GroupStateUri;
  unusedStates: DocumentStateUri[];
  unusedTags: string[];
  listEmail: string;
  listSubscribe: string;
  listArchive: string;
};

/**
 * A kind of group, e.g. "wg" or "rg"
 */
export type GroupType = {
  resourceUri: GroupTypeUri;
  slug: string;
  name: string;
  verboseName: string;
  desc: string;
  used: boolean;
  order: number;
};

/**
 * A lifecycle state of a group, e.g. "active" or "conclude"
 */
export type GroupState = {
  resourceUri: GroupStateUri;
  slug: string;
  name: string;
  desc: string;
  used: boolean;
  order: number;
};
