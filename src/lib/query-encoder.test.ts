import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { action, encodeQuery, encodeQueryComponent, filter, sorter } from './query-encoder';

describe('encodeQuery', () => {
  it('renders an empty option list as a bare question mark', () => {
    expect(encodeQuery([])).toBe('?');
  });

  it('renders paging options', () => {
    expect(
      encodeQuery([
        { type: 'pageSize', value: 10 },
        { type: 'pageNumber', value: 2 },
      ])
    ).toBe('?pageSize=10&pageNumber=2');
  });

  it('keeps the order options were given in', () => {
    expect(
      encodeQuery([
        { type: 'deep', value: true },
        { type: 'pageSize', value: 5 },
        { type: 'relatedObjects', value: false },
        { type: 'returnObject', value: true },
      ])
    ).toBe('?deep=true&pageSize=5&relatedObjects=false&returnObject=true');
  });

  it('renders search verbatim', () => {
    expect(encodeQuery([{ type: 'search', value: 'a b&c' }])).toBe('?search=a b&c');
  });

  it('renders exclude as a raw comma-joined list without duplicates', () => {
    expect(
      encodeQuery([{ type: 'exclude', value: ['__metadata', 'totalRows', '__metadata'] }])
    ).toBe('?exclude=__metadata,totalRows');
  });

  it('renders sorters as percent-encoded JSON', () => {
    expect(encodeQuery([{ type: 'sort', value: [sorter('name', 'desc')] }])).toBe(
      '?sorter=%5B%7B%22fieldName%22%3A%22name%22%2C%22order%22%3A%22desc%22%7D%5D'
    );
  });

  it('renders filters that decode back to the given constraints', () => {
    const filters = [
      filter('name', 'startsWith', 'Tom & Jerry?'),
      filter('age', 'greaterThanOrEqualsTo', 21),
      filter('status', 'in', ['active', 'pending']),
      filter('deletedAt', 'empty', null),
    ];

    const query = encodeQuery([{ type: 'filter', value: filters }]);
    expect(query.startsWith('?filter=')).toBe(true);

    const encoded = query.slice('?filter='.length);
    expect(encoded).not.toMatch(/[&?#\s]/);
    expect(JSON.parse(decodeURIComponent(encoded))).toEqual([
      { fieldName: 'name', operator: 'startsWith', value: 'Tom & Jerry?' },
      { fieldName: 'age', operator: 'greaterThanOrEqualsTo', value: 21 },
      { fieldName: 'status', operator: 'in', value: ['active', 'pending'] },
      { fieldName: 'deletedAt', operator: 'empty', value: null },
    ]);
  });

  it('renders one segment per option', () => {
    const query = encodeQuery([
      { type: 'filter', value: [filter('name', 'equals', 'a&b')] },
      { type: 'sort', value: [sorter('name')] },
      { type: 'pageSize', value: 1 },
    ]);
    expect(query.slice(1).split('&')).toHaveLength(3);
  });

  it('rejects filters without a field name', () => {
    expect(() =>
      encodeQuery([{ type: 'filter', value: [{ fieldName: '', operator: 'equals', value: 1 }] }])
    ).toThrow(ZodError);
  });
});

describe('encodeQueryComponent', () => {
  it('encodes reserved characters and keeps unreserved ones', () => {
    expect(encodeQueryComponent("a b!'()*~-._")).toBe('a%20b%21%27%28%29%2A~-._');
    expect(encodeQueryComponent('?/#[]@$&+,;=')).toBe('%3F%2F%23%5B%5D%40%24%26%2B%2C%3B%3D');
  });
});

describe('option helpers', () => {
  it('builds filters and sorters', () => {
    expect(filter('age', 'lessThan', 30)).toEqual({ fieldName: 'age', operator: 'lessThan', value: 30 });
    expect(sorter('name')).toEqual({ fieldName: 'name', order: 'asc' });
  });

  it('rejects numbers JSON cannot carry', () => {
    expect(() => filter('age', 'lessThan', Infinity)).toThrow(ZodError);
    expect(() => filter('age', 'in', [1, NaN])).toThrow(ZodError);
  });

  it('validates field names', () => {
    expect(() => filter('', 'equals', 1)).toThrow(ZodError);
    expect(() => sorter('', 'desc')).toThrow(ZodError);
  });

  it('builds bulk actions with and without data', () => {
    expect(action('POST', '/1/objects/cats', { name: 'Tom' })).toEqual({
      method: 'POST',
      url: '/1/objects/cats',
      data: { name: 'Tom' },
    });
    expect(action('DELETE', '/1/objects/cats/7')).toEqual({ method: 'DELETE', url: '/1/objects/cats/7' });
  });
});
