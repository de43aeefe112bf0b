import { describe, expect, it } from 'vitest';
import { parsePath, queryPath } from '../../src/json-path.js';

describe('parsePath', () => {
  it('parses dotted, indexed and quoted segments', () => {
    expect(parsePath('$.data.items[2].name')).toEqual(['data', 'items', 2, 'name']);
    expect(parsePath("$['odd key'][0]")).toEqual(['odd key', 0]);
    expect(parsePath('items[1]')).toEqual(['items', 1]);
    expect(parsePath('$')).toEqual([]);
  });

  it('rejects malformed brackets', () => {
    expect(() => parsePath('$.items[')).toThrow(/Unclosed bracket/);
    expect(() => parsePath('$.items[x]')).toThrow(/Invalid index/);
  });
});

describe('queryPath', () => {
  const body = { data: { items: [{ name: 'a' }, { name: 'b' }], empty: null } };

  it('finds nested values', () => {
    expect(queryPath(body, '$.data.items[1].name')).toEqual({ found: true, value: 'b' });
    expect(queryPath(body, '$.data.empty')).toEqual({ found: true, value: null });
    expect(queryPath(body, '$')).toEqual({ found: true, value: body });
  });

  it('reports where resolution stopped', () => {
    expect(queryPath(body, '$.data.items[5].name')).toEqual({ found: false, at: '$.data.items[5]' });
    expect(queryPath(body, '$.data.missing.x')).toEqual({ found: false, at: '$.data.missing' });
    expect(queryPath(undefined, '$.a')).toEqual({ found: false, at: '$' });
  });
});
