import type { Plugin } from '../plugin-api.js';
import type { Suite, TestCase } from '../types.js';

export interface FilterOptions {
  tags?: string[];
  /** Case-insensitive pattern matched against test names */
  filter?: string;
  randomize?: boolean;
}

function filterTestsByTags(tests: TestCase[], tags?: string[]) {
  if (!tags || tags.length === 0) {
    return tests;
  }
  const normalizedTags = tags.map((t) => t.toLowerCase());
  return tests.filter((test) => {
    const testTags = (test.tags ?? []).map((t) => t.toLowerCase());
    return testTags.some((tag) => normalizedTags.includes(tag));
  });
}

function filterTestsByName(tests: TestCase[], pattern?: string) {
  if (!pattern) {
    return tests;
  }
  const regex = new RegExp(pattern, 'i');
  return tests.filter((test) => regex.test(test.name));
}

function shuffle<T>(arr: T[]) {
  for (let i = arr.length - 1; i > 0; i -= 1) {
    const j = Math.floor(Math.random() * (i + 1));
    [arr[i], arr[j]] = [arr[j], arr[i]];
  }
}

/**
 * Narrows each suite's main tests. Focus applies across all suites: when any
 * test is focused, only focused tests run. Setup and teardown are untouched,
 * and suites left without tests are dropped.
 */
export function selectTests(suites: Suite[], options: FilterOptions): Suite[] {
  const anyFocused = suites.some((s) => s.tests.some((t) => t.focus));
  return suites
    .map((suite) => {
      let tests = anyFocused ? suite.tests.filter((t) => t.focus) : suite.tests;
      tests = filterTestsByTags(tests, options.tags);
      tests = filterTestsByName(tests, options.filter);
      if (options.randomize) {
        tests = [...tests];
        shuffle(tests);
      }
      return { ...suite, tests };
    })
    .filter((suite) => suite.tests.length > 0);
}

export const coreFilterPlugin = (options: FilterOptions): Plugin => ({
  name: 'core-filter',
  setup(ctx) {
    ctx.onPrepare((suites) => selectTests(suites, options));
  },
});
