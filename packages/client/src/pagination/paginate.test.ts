// Tests for the paginated query engine

import { describe, it, expect, beforeEach } from 'vitest';
import {
  DecodeError,
  FetchError,
  NotFoundError,
  PaginationLoopError,
  entityDecoder,
  type ElementDecoder,
} from '@ietfdata/protocol';
import { rawPage, rawPerson } from '@ietfdata/protocol/testing';
import { createInMemoryTransport, type InMemoryTransport } from '@ietfdata/transport';
import { createCapturingLogger } from '../logger.js';
import { collect, first, take } from './collect.js';
import { paginate, type ListItem } from './paginate.js';
import { buildListPath, relativeLink } from './query.js';

// --- Test Fixtures ---

const LIST = '/api/v1/person/person/';
const PAGE_2 = '/api/v1/person/person/?offset=2';
const PAGE_3 = '/api/v1/person/person/?offset=4';

const numbers: ElementDecoder<number> = (document) =>
  typeof document === 'number'
    ? { success: true, value: document }
    : { success: false, error: [{ path: '', message: 'Expected a number' }] };

function servePages(transport: InMemoryTransport): void {
  transport.serve(LIST, rawPage([1, 2], PAGE_2));
  transport.serve(PAGE_2, rawPage([3, 4], PAGE_3));
  transport.serve(PAGE_3, rawPage([5], null));
}

async function drain<T>(sequence: AsyncIterable<ListItem<T>>): Promise<ListItem<T>[]> {
  const items: ListItem<T>[] = [];
  for await (const item of sequence) {
    items.push(item);
  }
  return items;
}

describe('paginate', () => {
  let transport: InMemoryTransport;

  beforeEach(() => {
    transport = createInMemoryTransport();
  });

  it('yields every element of every page in order', async () => {
    servePages(transport);

    const result = await collect(paginate(transport, LIST, numbers));

    expect(result).toEqual({ success: true, value: [1, 2, 3, 4, 5] });
    expect(transport.requests).toEqual([LIST, PAGE_2, PAGE_3]);
  });

  it('yields nothing for an empty result', async () => {
    transport.serve(LIST, rawPage([]));

    const items = await drain(paginate(transport, LIST, numbers));

    expect(items).toEqual([]);
    expect(transport.requests).toEqual([LIST]);
  });

  it('fetches nothing until the first element is requested', async () => {
    servePages(transport);

    const sequence = paginate(transport, LIST, numbers);

    expect(transport.requests).toEqual([]);
    await sequence.next();
    expect(transport.requests).toEqual([LIST]);
  });

  it('fetches the next page only when the current one is consumed', async () => {
    servePages(transport);
    const sequence = paginate(transport, LIST, numbers);

    await sequence.next();
    await sequence.next();
    expect(transport.requests).toEqual([LIST]);

    await sequence.next();
    expect(transport.requests).toEqual([LIST, PAGE_2]);
  });

  it('issues no further fetches once abandoned', async () => {
    servePages(transport);

    for await (const item of paginate(transport, LIST, numbers)) {
      expect(item).toEqual({ success: true, value: 1 });
      break;
    }

    expect(transport.requests).toEqual([LIST]);
  });

  it('follows pages that are empty but not last', async () => {
    transport.serve(LIST, rawPage([], PAGE_2));
    transport.serve(PAGE_2, rawPage([7]));

    const result = await collect(paginate(transport, LIST, numbers));

    expect(result).toEqual({ success: true, value: [7] });
  });

  it('follows absolute next-page links by their path', async () => {
    transport.serve(LIST, rawPage([1], `https://datatracker.ietf.org${PAGE_2}`));
    transport.serve(PAGE_2, rawPage([2]));

    const result = await collect(paginate(transport, LIST, numbers));

    expect(result).toEqual({ success: true, value: [1, 2] });
    expect(transport.requests).toEqual([LIST, PAGE_2]);
  });

  describe('errors', () => {
    it('ends with a FetchError after the elements already delivered', async () => {
      transport.serve(LIST, rawPage([1, 2], PAGE_2));
      transport.serveFailure(PAGE_2, { kind: 'timeout', timeoutMs: 30_000 });

      const items = await drain(paginate(transport, LIST, numbers));

      expect(items).toHaveLength(3);
      expect(items[0]).toEqual({ success: true, value: 1 });
      expect(items[1]).toEqual({ success: true, value: 2 });
      const last = items[2];
      expect(last.success).toBe(false);
      if (!last.success) {
        expect(last.error).toBeInstanceOf(FetchError);
        expect(last.error.retryable).toBe(true);
        expect(last.error.message).toBe(
          `Fetch of ${PAGE_2} failed: timed out after 30000ms`
        );
      }
    });

    it('reports a missing list endpoint as NotFoundError', async () => {
      const items = await drain(paginate(transport, LIST, numbers));

      expect(items).toHaveLength(1);
      const only = items[0];
      expect(only.success).toBe(false);
      if (!only.success) {
        expect(only.error).toBeInstanceOf(NotFoundError);
      }
    });

    it('reports a malformed body as DecodeError', async () => {
      transport.serve(LIST, '<html>Service Unavailable</html>');

      const result = await collect(paginate(transport, LIST, numbers));

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(DecodeError);
        expect(result.error.code).toBe('DECODE_ERROR');
      }
    });

    it('reports a page without an envelope as DecodeError', async () => {
      transport.serve(LIST, { objects: 'none' });

      const result = await collect(paginate(transport, LIST, numbers));

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(DecodeError);
      }
    });

    it('locates an undecodable element within its page', async () => {
      transport.serve(LIST, rawPage([1, 'two', 3]));

      const items = await drain(paginate(transport, LIST, numbers));

      expect(items).toHaveLength(2);
      const last = items[1];
      expect(last.success).toBe(false);
      if (!last.success && last.error instanceof DecodeError) {
        expect(last.error.path).toBe(LIST);
        expect(last.error.issues).toEqual([{ path: 'objects.1', message: 'Expected a number' }]);
      }
    });

    it('prefixes field issues with the element index', async () => {
      transport.serve(LIST, rawPage([rawPerson(), rawPerson({ id: 1002, name: 42 })]));

      const result = await collect(paginate(transport, LIST, entityDecoder('person')));

      expect(result.success).toBe(false);
      if (!result.success && result.error instanceof DecodeError) {
        expect(result.error.issues.map((issue) => issue.path)).toEqual(['objects.1.name']);
      }
    });
  });

  describe('loop detection', () => {
    it('stops when a next-page link revisits a fetched page', async () => {
      transport.serve(LIST, rawPage([1], PAGE_2));
      transport.serve(PAGE_2, rawPage([2], LIST));
      const logger = createCapturingLogger();

      const items = await drain(paginate(transport, LIST, numbers, { logger }));

      expect(items.slice(0, 2)).toEqual([
        { success: true, value: 1 },
        { success: true, value: 2 },
      ]);
      const last = items[2];
      expect(last.success).toBe(false);
      if (!last.success && last.error instanceof PaginationLoopError) {
        expect(last.error.code).toBe('PAGINATION_LOOP');
        expect(last.error.pagesFetched).toBe(2);
        expect(last.error.repeatedPath).toBe(LIST);
      }
      expect(transport.requests).toEqual([LIST, PAGE_2]);
      expect(logger.entries.map((entry) => entry.level)).toEqual(['debug', 'debug', 'warn']);
    });

    it('treats reordered query parameters as the same page', async () => {
      const next = '/api/v1/person/person/?limit=1&offset=1';
      transport.serve(LIST, rawPage([1], next));
      transport.serve(next, rawPage([2], '/api/v1/person/person/?offset=1&limit=1'));

      const result = await collect(paginate(transport, LIST, numbers));

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(PaginationLoopError);
      }
    });

    it('stops after maxPages pages', async () => {
      servePages(transport);

      const result = await collect(paginate(transport, LIST, numbers, { maxPages: 2 }));

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(PaginationLoopError);
        expect(result.error.message).toBe('Pagination loop suspected: more than 2 pages');
      }
      expect(transport.requests).toEqual([LIST, PAGE_2]);
    });
  });
});

describe('first', () => {
  it('returns the first element and fetches one page', async () => {
    const transport = createInMemoryTransport();
    servePages(transport);

    const result = await first(paginate(transport, LIST, numbers));

    expect(result).toEqual({ success: true, value: 1 });
    expect(transport.requests).toEqual([LIST]);
  });

  it('returns null for an empty sequence', async () => {
    const transport = createInMemoryTransport();
    transport.serve(LIST, rawPage([]));

    const result = await first(paginate(transport, LIST, numbers));

    expect(result).toEqual({ success: true, value: null });
  });
});

describe('take', () => {
  it('stops fetching once enough elements are taken', async () => {
    const transport = createInMemoryTransport();
    servePages(transport);

    const result = await take(paginate(transport, LIST, numbers), 3);

    expect(result).toEqual({ success: true, value: [1, 2, 3] });
    expect(transport.requests).toEqual([LIST, PAGE_2]);
  });

  it('returns everything when the sequence is shorter', async () => {
    const transport = createInMemoryTransport();
    servePages(transport);

    const result = await take(paginate(transport, LIST, numbers), 10);

    expect(result).toEqual({ success: true, value: [1, 2, 3, 4, 5] });
  });

  it('fetches nothing for a count of zero', async () => {
    const transport = createInMemoryTransport();
    servePages(transport);

    const result = await take(paginate(transport, LIST, numbers), 0);

    expect(result).toEqual({ success: true, value: [] });
    expect(transport.requests).toEqual([]);
  });
});

describe('buildListPath', () => {
  it('sorts parameters, drops undefined ones and adds the page size', () => {
    const path = buildListPath(LIST, { name: 'Jane Doe', time__gte: undefined }, 50);

    expect(path).toBe('/api/v1/person/person/?limit=50&name=Jane+Doe');
  });

  it('returns the bare list path without parameters', () => {
    expect(buildListPath(LIST, { name: undefined })).toBe(LIST);
  });

  it('encodes reserved characters', () => {
    expect(buildListPath('/api/v1/person/email/', { address: 'a+b@example.org' })).toBe(
      '/api/v1/person/email/?address=a%2Bb%40example.org'
    );
  });
});

describe('relativeLink', () => {
  it('keeps relative links', () => {
    expect(relativeLink(PAGE_2)).toBe(PAGE_2);
  });

  it('strips the origin from absolute links', () => {
    expect(relativeLink('https://datatracker.ietf.org/api/v1/doc/document/?offset=20')).toBe(
      '/api/v1/doc/document/?offset=20'
    );
  });
});
