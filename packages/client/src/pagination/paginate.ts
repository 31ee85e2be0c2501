// Paginated query engine
//
// Walks a list endpoint page by page and yields decoded elements in service
// order. The cursor is the generator's own state: a page is fetched only
// when the previous one has been consumed, and abandoning the iteration
// (break, return) fetches nothing more.
//
// Failures are yielded, not thrown. A sequence yields at most one error
// item and ends right after it; elements already yielded stay valid.

import {
  DecodeError,
  PaginationLoopError,
  decodePage,
  type ValidationError,
  type DecodeIssue,
  type ElementDecoder,
  type Result,
} from '@ietfdata/protocol';
import { normalizePath, type Transport } from '@ietfdata/transport';
import { DEFAULT_MAX_PAGES } from '../config.js';
import { fetchDocument, type FetchDocumentError } from '../fetch.js';
import { silentLogger, type ClientLogger } from '../logger.js';
import { relativeLink } from './query.js';

/**
 * Why a sequence ended early. ValidationError only arises before the first
 * fetch, from a filter that cannot be encoded.
 */
export type ListError = ValidationError | FetchDocumentError | PaginationLoopError;

/**
 * One item of a lazy sequence: an element or the error that ended it
 */
export type ListItem<T> = Result<T, ListError>;

/**
 * A lazy, finite sequence of list elements
 */
export type ListSequence<T> = AsyncGenerator<ListItem<T>, void, undefined>;

export type PaginateOptions = {
  /**
   * Upper bound on pages fetched before the walk is treated as a loop
   */
  maxPages?: number;

  logger?: ClientLogger;
  signal?: AbortSignal;
};

/**
 * Lazily iterate every element of a list query.
 *
 * Usage:
 * ```ts
 * for await (const item of paginate(transport, '/api/v1/person/person/', decode)) {
 *   if (!item.success) break;
 *   console.log(item.value.name);
 * }
 * ```
 */
export async function* paginate<T>(
  transport: Transport,
  initialPath: string,
  decode: ElementDecoder<T>,
  options: PaginateOptions = {}
): ListSequence<T> {
  const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
  const logger = options.logger ?? silentLogger;
  const visited = new Set<string>();
  let path: string | null = initialPath;
  let pagesFetched = 0;

  while (path !== null) {
    const key = normalizePath(path);
    if (visited.has(key)) {
      logger.warn('Next-page link revisits a fetched page', { path, pagesFetched });
      yield { success: false, error: new PaginationLoopError(pagesFetched, path) };
      return;
    }
    if (pagesFetched >= maxPages) {
      logger.warn('Page cap reached', { path, maxPages });
      yield { success: false, error: new PaginationLoopError(pagesFetched) };
      return;
    }
    visited.add(key);

    const fetched = await fetchDocument(transport, path, options.signal);
    pagesFetched++;
    if (!fetched.success) {
      yield fetched;
      return;
    }

    const page = decodePage(fetched.value);
    if (!page.success) {
      yield { success: false, error: new DecodeError(path, page.error) };
      return;
    }

    logger.debug('Fetched page', {
      path,
      elements: page.value.objects.length,
      totalCount: page.value.meta.totalCount,
    });

    for (const [index, element] of page.value.objects.entries()) {
      const decoded = decode(element);
      if (!decoded.success) {
        yield {
          success: false,
          error: new DecodeError(path, elementIssues(index, decoded.error)),
        };
        return;
      }
      yield decoded;
    }

    path = page.value.meta.next === null ? null : relativeLink(page.value.meta.next);
  }
}

function elementIssues(index: number, issues: DecodeIssue[]): DecodeIssue[] {
  return issues.map((issue) => ({
    path: issue.path ? `objects.${index}.${issue.path}` : `objects.${index}`,
    message: issue.message,
  }));
}
