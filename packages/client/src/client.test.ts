// Tests for the client facade

import { describe, it, expect, beforeEach } from 'vitest';
import { ValidationError } from '@ietfdata/protocol';
import {
  rawGroup,
  rawHistoricalPerson,
  rawPage,
  rawPerson,
  testUri,
} from '@ietfdata/protocol/testing';
import { createInMemoryTransport, type InMemoryTransport } from '@ietfdata/transport';
import { createDatatracker, type Datatracker } from './client.js';
import { createCapturingLogger, silentLogger } from './logger.js';
import { collect } from './pagination/collect.js';

// --- Test Fixtures ---

function createClient(
  transport: InMemoryTransport,
  env: Record<string, string | undefined> = {}
): Datatracker {
  const client = createDatatracker({ transport, env, logger: silentLogger });
  if (!client.success) {
    throw client.error;
  }
  return client.value;
}

describe('createDatatracker', () => {
  it('rejects invalid configuration', () => {
    const result = createDatatracker({ config: { timeoutMs: -5 }, env: {} });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(ValidationError);
      expect(result.error.field).toBe('timeoutMs');
    }
  });

  it('exposes the resolved configuration', () => {
    const result = createDatatracker({
      transport: createInMemoryTransport(),
      env: { DATATRACKER_MAX_PAGES: '25' },
    });

    expect(result.success && result.value.config.maxPages).toBe(25);
  });
});

describe('Datatracker', () => {
  let transport: InMemoryTransport;
  let client: Datatracker;

  beforeEach(() => {
    transport = createInMemoryTransport();
    client = createClient(transport);
  });

  it('parses URIs without fetching', () => {
    const result = client.parse('group', '/api/v1/group/group/42');

    expect(result.success && result.value.path).toBe('/api/v1/group/group/42/');
    expect(transport.requests).toEqual([]);
  });

  it('resolves a URI', async () => {
    transport.serve('/api/v1/group/group/42/', rawGroup());

    const result = await client.resolve(testUri('group', '/api/v1/group/group/42/'));

    expect(result.success && result.value.acronym).toBe('examplewg');
  });

  it('lists entities matching a filter', async () => {
    transport.serve(
      '/api/v1/person/person/?name__contains=Doe',
      rawPage([rawPerson(), rawPerson({ id: 1003, name: 'John Doe' })])
    );

    const result = await collect(client.list('person', { nameContains: 'Doe' }));

    expect(result.success && result.value.map((person) => person.name)).toEqual([
      'Jane Doe',
      'John Doe',
    ]);
  });

  it('applies the configured page size to listings', async () => {
    client = createClient(transport, { DATATRACKER_PAGE_SIZE: '2' });
    transport.serve('/api/v1/group/group/?acronym=examplewg&limit=2', rawPage([rawGroup()]));

    const result = await collect(client.list('group', { acronym: 'examplewg' }));

    expect(result.success && result.value).toHaveLength(1);
  });

  it('lets a listing override the page size', async () => {
    client = createClient(transport, { DATATRACKER_PAGE_SIZE: '2' });
    transport.serve('/api/v1/group/group/?acronym=examplewg&limit=50', rawPage([rawGroup()]));

    const result = await collect(client.list('group', { acronym: 'examplewg' }, { pageSize: 50 }));

    expect(result.success).toBe(true);
    expect(transport.requests).toEqual(['/api/v1/group/group/?acronym=examplewg&limit=50']);
  });

  it('yields a single ValidationError for an inverted filter', async () => {
    const result = await collect(
      client.list('document', {
        since: new Date('2021-01-01T00:00:00Z'),
        until: new Date('2020-01-01T00:00:00Z'),
      })
    );

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('Filter "since" is after "until"');
    }
    expect(transport.requests).toEqual([]);
  });

  it('yields a ValidationError for an invalid date instead of throwing', async () => {
    const result = await collect(client.list('person', { since: new Date('nope') }));

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(ValidationError);
      expect(result.error.message).toBe('Filter "since" is not a valid date');
    }
    expect(transport.requests).toEqual([]);
  });

  it('answers the current state of a person', async () => {
    transport.serve(
      '/api/v1/person/historicalperson/?id=1001',
      rawPage([
        rawHistoricalPerson({ history_id: 1, history_date: '2010-01-01T00:00:00', name: 'Jane Smith' }),
        rawHistoricalPerson({ history_id: 2, history_date: '2014-01-01T00:00:00' }),
      ])
    );

    const result = await client.current(testUri('person', '/api/v1/person/person/1001/'));

    expect(result.success && result.value.record.name).toBe('Jane Doe');
  });

  it('logs each listing and page at debug level', async () => {
    const logger = createCapturingLogger();
    const logged = createDatatracker({ transport, env: {}, logger });
    if (!logged.success) {
      throw logged.error;
    }
    transport.serve('/api/v1/name/grouptypename/', rawPage([]));

    await collect(logged.value.list('group-type', {}));

    expect(logger.entries.map((entry) => [entry.level, entry.message])).toEqual([
      ['debug', 'Listing'],
      ['debug', 'Fetched page'],
    ]);
  });
});
