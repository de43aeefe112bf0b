import { describe, expect, it } from 'vitest';
import { defineSuite, focus, retry, skip, tag, timeout, type StepInput } from '../../src/helpers.js';
import { suiteFileSchema, toTestCase } from '../../src/schemas.js';

const steps: StepInput[] = [
  { name: 'list', request: { url: '/users' }, tags: 'users' },
  { name: 'get', request: { url: '/users/1' } },
];

describe('suite helpers', () => {
  it('return modified copies', () => {
    expect(focus(steps).map((s) => s.focus)).toEqual([true, true]);
    expect(skip(steps).map((s) => s.skip)).toEqual([true, true]);
    expect(tag(steps, 'smoke', 'users').map((s) => s.tags)).toEqual([['users', 'smoke'], ['smoke', 'users']]);
    expect(steps[0]).toEqual({ name: 'list', request: { url: '/users' }, tags: 'users' });
  });

  it('produce suites the loader accepts', () => {
    const suite = defineSuite({
      name: 'users',
      tests: timeout(retry(steps, { attempts: 2, backoff: '500ms' }), '2s'),
    });
    const parsed = suiteFileSchema.parse(suite);
    expect(toTestCase(parsed.tests[1])).toMatchObject({
      name: 'get',
      request: { method: 'GET', url: '/users/1' },
      retry: { attempts: 2, backoff: 500 },
      timeout: 2_000,
    });
  });
});
