// Document decoding
//
// Turns a raw response body into a typed value. Nothing here throws:
// malformed JSON and schema mismatches both come back as DecodeIssues.

import type { z } from 'zod';
import type { DecodeIssue } from '../errors.js';
import type { ResourceKind, Result } from '../types/common.js';
import type { EntityOf } from '../types/entities.js';
import type { Page } from '../types/pages.js';
import { ENTITY_SCHEMAS, PageSchema } from './schemas.js';

/**
 * Convert zod issues to decode issues with dotted paths
 */
export function issuesFromZod(error: z.ZodError): DecodeIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Parse a raw response body as JSON
 */
export function parseDocument(body: string): Result<unknown, DecodeIssue[]> {
  try {
    const value: unknown = JSON.parse(body);
    return { success: true, value };
  } catch (error) {
    return {
      success: false,
      error: [
        {
          path: '',
          message: `Malformed JSON: ${error instanceof Error ? error.message : String(error)}`,
        },
      ],
    };
  }
}

/**
 * Decode a parsed document into the entity for `kind`
 */
export function decodeEntity<K extends ResourceKind>(
  kind: K,
  document: unknown
): Result<EntityOf<K>, DecodeIssue[]> {
  const parsed = ENTITY_SCHEMAS[kind].safeParse(document);
  if (!parsed.success) {
    return { success: false, error: issuesFromZod(parsed.error) };
  }
  return { success: true, value: parsed.data };
}

/**
 * Decode a parsed list response into a page of undecoded elements
 */
export function decodePage(document: unknown): Result<Page, DecodeIssue[]> {
  const parsed = PageSchema.safeParse(document);
  if (!parsed.success) {
    return { success: false, error: issuesFromZod(parsed.error) };
  }
  return { success: true, value: parsed.data };
}

/**
 * A function that decodes one element of a list
 */
export type ElementDecoder<T> = (document: unknown) => Result<T, DecodeIssue[]>;

/**
 * Element decoder for the entities of one kind
 */
export function entityDecoder<K extends ResourceKind>(kind: K): ElementDecoder<EntityOf<K>> {
  return (document) => decodeEntity(kind, document);
}
