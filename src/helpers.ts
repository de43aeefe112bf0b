import type { z } from 'zod';
import type { stepSchema, suiteFileSchema } from './schemas.js';

/** A step as written in a `.stampede.js` suite */
export type StepInput = z.input<typeof stepSchema>;
export type SuiteInput = z.input<typeof suiteFileSchema>;
type RetryInput = NonNullable<StepInput['retry']>;

/** Identity helper that types a suite module's default export */
function defineSuite(suite: SuiteInput): SuiteInput {
  return suite;
}

function focus(tests: StepInput[]): StepInput[] {
  return tests.map((test) => ({ ...test, focus: true }));
}

function skip(tests: StepInput[]): StepInput[] {
  return tests.map((test) => ({ ...test, skip: true }));
}

function tag(tests: StepInput[], ...tags: string[]): StepInput[] {
  return tests.map((test) => {
    const existing = test.tags === undefined ? [] : Array.isArray(test.tags) ? test.tags : [test.tags];
    return { ...test, tags: [...new Set([...existing, ...tags])] };
  });
}

function retry(tests: StepInput[], policy: RetryInput): StepInput[] {
  return tests.map((test) => ({ ...test, retry: policy }));
}

function timeout(tests: StepInput[], ms: number | string): StepInput[] {
  return tests.map((test) => ({ ...test, timeout: ms }));
}

export {
  defineSuite,
  focus,
  skip,
  tag,
  retry,
  timeout,
};
