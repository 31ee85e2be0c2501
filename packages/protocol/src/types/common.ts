// Common types used across the protocol

/**
 * Every kind of record the registry exposes through its API.
 * Each kind has its own URI shape and its own entity type.
 */
export const RESOURCE_KINDS = [
  'person',
  'person-alias',
  'historical-person',
  'email',
  'historical-email',
  'group',
  'group-type',
  'group-state',
  'document',
  'document-state',
  'document-state-type',
  'submission',
] as const;

export type ResourceKind = (typeof RESOURCE_KINDS)[number];

/**
 * Kinds whose records carry a change history on a separate endpoint.
 */
export type HistoricalKind = 'person' | 'email';

/**
 * Outcome of an operation that can fail without throwing.
 *
 * Every public operation in the client returns one of these so that
 * callers can discriminate failures by inspecting `error`.
 */
export type Result<T, E = Error> =
  | { success: true; value: T }
  | { success: false; error: E };

export function ok<T>(value: T): { success: true; value: T } {
  return { success: true, value };
}

export function err<E>(error: E): { success: false; error: E } {
  return { success: false, error };
}

/**
 * Check whether a string names a resource kind
 */
export function isResourceKind(value: string): value is ResourceKind {
  return RESOURCE_KINDS.some((kind) => kind === value);
}
