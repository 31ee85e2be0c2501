// Tests for filter encoding and the resource registry

import { describe, it, expect } from 'vitest';
import { ValidationError, listPathFor, RESOURCE_KINDS } from '@ietfdata/protocol';
import { rawPerson, testUri } from '@ietfdata/protocol/testing';
import { FILTER_PARAMS, validateFilter } from './filters.js';
import { RESOURCES, getResource } from './registry.js';

describe('FILTER_PARAMS', () => {
  it('encodes person time bounds in the service format', () => {
    const params = FILTER_PARAMS.person({
      name: 'Jane Doe',
      since: new Date('2012-01-01T00:00:00Z'),
      until: new Date('2012-12-31T23:59:59.500Z'),
    });

    expect(params).toEqual({
      name: 'Jane Doe',
      name__contains: undefined,
      time__gte: '2012-01-01T00:00:00',
      time__lte: '2012-12-31T23:59:59.500',
    });
  });

  it('encodes URIs by their identifying segment', () => {
    const params = FILTER_PARAMS.group({
      type: testUri('group-type', '/api/v1/name/grouptypename/wg/'),
      parent: testUri('group', '/api/v1/group/group/7/'),
    });

    expect(params.type).toBe('wg');
    expect(params.parent).toBe('7');
  });

  it('filters historical people by the person id', () => {
    const params = FILTER_PARAMS['historical-person']({
      person: testUri('person', '/api/v1/person/person/1001/'),
    });

    expect(params.id).toBe('1001');
  });

  it('encodes booleans as words', () => {
    expect(FILTER_PARAMS.email({ primary: false }).primary).toBe('false');
  });
});

describe('validateFilter', () => {
  it('accepts an open-ended range', () => {
    expect(validateFilter({ since: new Date('2020-01-01T00:00:00Z') })).toEqual({
      success: true,
      value: undefined,
    });
  });

  it('accepts equal bounds', () => {
    const t = new Date('2020-01-01T00:00:00Z');

    expect(validateFilter({ since: t, until: t }).success).toBe(true);
  });

  it('rejects an invalid date', () => {
    const result = validateFilter({ until: new Date('nope') });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.field).toBe('until');
      expect(result.error.message).toBe('Filter "until" is not a valid date');
    }
  });

  it('rejects since after until', () => {
    const result = validateFilter({
      since: new Date('2020-01-02T00:00:00Z'),
      until: new Date('2020-01-01T00:00:00Z'),
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(ValidationError);
      expect(result.error.field).toBe('since');
    }
  });
});

describe('RESOURCES', () => {
  it('has a descriptor for every kind', () => {
    for (const kind of RESOURCE_KINDS) {
      expect(RESOURCES[kind].kind).toBe(kind);
      expect(RESOURCES[kind].listPath).toBe(listPathFor(kind));
    }
  });

  it('decodes elements with the kind decoder', () => {
    const decoded = getResource('person').decode(rawPerson());

    expect(decoded.success && decoded.value.id).toBe(1001);
  });
});
