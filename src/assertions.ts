import { isDeepStrictEqual } from 'util';
import { Ajv, type ValidateFunction } from 'ajv';
import { queryPath } from './json-path.js';
import type { Check, JsonSchema, JsonValue, Mismatch } from './types.js';

export interface ResponseView {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export type Verdict = { passed: true } | { passed: false; mismatches: Mismatch[] };

type ParsedBody = { ok: true; value: JsonValue } | { ok: false };

const ajv = new Ajv({ allErrors: false, strict: false });
const validators = new WeakMap<object, ValidateFunction>();
const booleanValidators = new Map<boolean, ValidateFunction>();

function compile(schema: JsonSchema): ValidateFunction {
  if (typeof schema === 'boolean') {
    let fn = booleanValidators.get(schema);
    if (!fn) {
      fn = ajv.compile(schema);
      booleanValidators.set(schema, fn);
    }
    return fn;
  }
  let fn = validators.get(schema);
  if (!fn) {
    fn = ajv.compile(schema);
    validators.set(schema, fn);
  }
  return fn;
}

function parseBody(body: string): ParsedBody {
  if (!body.trim()) return { ok: false };
  try {
    return { ok: true, value: JSON.parse(body) };
  } catch {
    return { ok: false };
  }
}

function format(value: unknown): string {
  return typeof value === 'string' ? `'${value}'` : JSON.stringify(value);
}

function findHeader(headers: Record<string, string>, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) return value;
  }
  return undefined;
}

function checkStatus(expected: Array<number | string>, response: ResponseView): Mismatch | null {
  if (expected.includes(response.status)) return null;
  const shown = expected.length === 1 ? expected[0] : expected;
  return {
    check: 'status',
    locator: 'status',
    reason: 'unequal',
    expected: shown,
    actual: response.status,
    message: `Status mismatch: expected ${format(shown)}, got ${response.status}`,
  };
}

function checkHeader(name: string, expected: string | true, response: ResponseView): Mismatch | null {
  const actual = findHeader(response.headers, name);
  if (actual === undefined) {
    return {
      check: 'header',
      locator: name,
      reason: 'missing',
      expected,
      actual: null,
      message: `Header '${name}' is missing`,
    };
  }
  if (expected === true || actual === expected) return null;
  return {
    check: 'header',
    locator: name,
    reason: 'unequal',
    expected,
    actual,
    message: `Header '${name}' mismatch: expected ${format(expected)}, got ${format(actual)}`,
  };
}

function checkPath(path: string, expected: JsonValue, body: ParsedBody): Mismatch | null {
  const lookup = body.ok ? queryPath(body.value, path) : { found: false as const, at: '$' };
  if (!lookup.found) {
    return {
      check: 'path',
      locator: path,
      reason: 'missing',
      expected,
      actual: undefined,
      message: body.ok
        ? `Path '${path}' does not exist (stopped at ${lookup.at})`
        : `Path '${path}' does not exist: body is not JSON`,
    };
  }
  if (isDeepStrictEqual(lookup.value, expected)) return null;
  return {
    check: 'path',
    locator: path,
    reason: 'unequal',
    expected,
    actual: lookup.value,
    message: `Path '${path}' mismatch: expected ${format(expected)}, got ${format(lookup.value)}`,
  };
}

function checkSchema(schema: JsonSchema, path: string | undefined, body: ParsedBody): Mismatch | null {
  const locatorBase = path ?? '$';
  if (!body.ok) {
    return {
      check: 'schema',
      locator: locatorBase,
      reason: 'invalid',
      expected: 'JSON body',
      actual: 'unparseable body',
      message: 'Schema check failed: body is not JSON',
    };
  }
  let target: JsonValue = body.value;
  if (path) {
    const lookup = queryPath(body.value, path);
    if (!lookup.found) {
      return {
        check: 'schema',
        locator: path,
        reason: 'missing',
        expected: 'value to validate',
        actual: undefined,
        message: `Schema check failed: path '${path}' does not exist`,
      };
    }
    target = lookup.value;
  }

  const validate = compile(schema);
  if (validate(target)) return null;

  const [first] = validate.errors ?? [];
  const where = first?.instancePath ? `${locatorBase}${first.instancePath.replace(/\//g, '.')}` : locatorBase;
  const rule = first ? `${first.schemaPath}` : '#';
  return {
    check: 'schema',
    locator: rule,
    reason: 'invalid',
    expected: first ? { keyword: first.keyword, params: first.params } : schema,
    actual: where,
    message: `Schema violation at ${where}: ${first?.message ?? 'invalid'} (${rule})`,
  };
}

/**
 * Evaluates every check in declaration order. Checks must already be
 * resolved; the evaluator compares values as given. Without declared checks a
 * response passes when its status is below 400.
 */
export function evaluate(response: ResponseView, checks: Check[]): Verdict {
  if (checks.length === 0) {
    if (response.status < 400) return { passed: true };
    return {
      passed: false,
      mismatches: [{
        check: 'status',
        locator: 'status',
        reason: 'unequal',
        expected: '< 400',
        actual: response.status,
        message: `HTTP ${response.status}`,
      }],
    };
  }

  const needsBody = checks.some((c) => c.kind === 'path' || c.kind === 'schema');
  const body: ParsedBody = needsBody ? parseBody(response.body) : { ok: false };
  const mismatches: Mismatch[] = [];

  for (const check of checks) {
    let mismatch: Mismatch | null;
    switch (check.kind) {
      case 'status':
        mismatch = checkStatus(check.expected, response);
        break;
      case 'header':
        mismatch = checkHeader(check.name, check.expected, response);
        break;
      case 'path':
        mismatch = checkPath(check.path, check.expected, body);
        break;
      case 'schema':
        mismatch = checkSchema(check.schema, check.path, body);
        break;
    }
    if (mismatch) mismatches.push(mismatch);
  }

  return mismatches.length === 0 ? { passed: true } : { passed: false, mismatches };
}
