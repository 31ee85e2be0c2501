// Lookups by natural key

import {
  NotFoundError,
  buildUri,
  type Document,
  type Email,
  type Group,
  type Person,
  type Result,
  type ValidationError,
} from '@ietfdata/protocol';
import type { ClientContext } from '../context.js';
import { resolve, resolveByKey, type ResolveByKeyError, type ResolveError } from './resolve.js';

export type LookupError = ResolveByKeyError;

/**
 * The person with exactly this name
 */
export function personByName(
  ctx: ClientContext,
  name: string
): Promise<Result<Person, LookupError>> {
  return resolveByKey(ctx, 'person', { name });
}

/**
 * The email record for an address
 */
export async function emailByAddress(
  ctx: ClientContext,
  address: string
): Promise<Result<Email, ResolveError | ValidationError>> {
  const uri = buildUri('email', address);
  if (!uri.success) {
    return uri;
  }
  return resolve(ctx, uri.value);
}

/**
 * The person an email address belongs to.
 * An address not attributed to anyone is NotFoundError.
 */
export async function personByEmail(
  ctx: ClientContext,
  address: string
): Promise<Result<Person, ResolveError | ValidationError>> {
  const email = await emailByAddress(ctx, address);
  if (!email.success) {
    return email;
  }
  if (email.value.person === null) {
    return {
      success: false,
      error: new NotFoundError(email.value.resourceUri.path, `No person uses ${address}`),
    };
  }
  return resolve(ctx, email.value.person);
}

export function groupByAcronym(
  ctx: ClientContext,
  acronym: string
): Promise<Result<Group, LookupError>> {
  return resolveByKey(ctx, 'group', { acronym });
}

/**
 * The document with this name, e.g. "draft-ietf-quic-transport"
 */
export function documentByName(
  ctx: ClientContext,
  name: string
): Promise<Result<Document, LookupError>> {
  return resolveByKey(ctx, 'document', { name });
}
