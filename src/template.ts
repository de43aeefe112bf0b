import type { Check, DatasetRow, JsonValue, RequestTemplate, ResolvedRequest } from './types.js';

const VAR_PATTERN = /\{\{\s*(\w+)\s*\}\}/g;
const ENV_PATTERN = /\$\{([^:}]+)(?::([^}]*))?\}/g;

export type Env = Record<string, string | undefined>;

export interface VariableSources {
  env?: Env;
  suiteVars?: Record<string, string>;
  /** Name of the selected environment, bound as STAMPEDE_ENV */
  envName?: string;
  captures?: Record<string, string>;
  row?: DatasetRow;
}

/**
 * Substitutes `{{name}}` from `vars` and `${NAME:default}` from the process
 * environment, then `vars`, then the default. Unknown `{{name}}` placeholders
 * are left untouched.
 */
export function substitute(text: string, vars: Record<string, string>, env: Env = {}): string {
  const withVars = text.replace(VAR_PATTERN, (match, name: string) =>
    Object.prototype.hasOwnProperty.call(vars, name) ? vars[name] : match
  );
  return withVars.replace(ENV_PATTERN, (_match, name: string, fallback: string | undefined) => {
    const fromEnv = env[name];
    if (fromEnv !== undefined) return fromEnv;
    if (Object.prototype.hasOwnProperty.call(vars, name)) return vars[name];
    return fallback ?? '';
  });
}

/**
 * Builds the variable map for one unit. Later sources win: process
 * environment, suite vars (each may reference the ones declared before it),
 * the environment name, setup captures, then the dataset row.
 */
export function buildVariables(sources: VariableSources): Record<string, string> {
  const env = sources.env ?? {};
  const vars: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) vars[key] = value;
  }
  for (const [key, value] of Object.entries(sources.suiteVars ?? {})) {
    vars[key] = substitute(value, vars, env);
  }
  if (sources.envName) {
    vars.STAMPEDE_ENV = sources.envName;
  }
  Object.assign(vars, sources.captures ?? {}, sources.row ?? {});
  return vars;
}

export function substituteJson(value: JsonValue, vars: Record<string, string>, env: Env = {}): JsonValue {
  if (typeof value === 'string') return substitute(value, vars, env);
  if (Array.isArray(value)) return value.map((item) => substituteJson(item, vars, env));
  if (value !== null && typeof value === 'object') {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      out[substitute(key, vars, env)] = substituteJson(item, vars, env);
    }
    return out;
  }
  return value;
}

/**
 * Substitutes, then coerces integer-looking strings to numbers and
 * `true`/`false` to booleans so they compare against parsed JSON.
 */
export function resolveExpected(value: JsonValue, vars: Record<string, string>, env: Env = {}): JsonValue {
  if (typeof value !== 'string') return substituteJson(value, vars, env);
  const text = substitute(value, vars, env);
  if (/^-?\d+$/.test(text) && Number.isSafeInteger(Number(text))) return Number(text);
  if (text === 'true') return true;
  if (text === 'false') return false;
  return text;
}

export function resolveRequest(
  template: RequestTemplate,
  vars: Record<string, string>,
  options: { baseUrl?: string; env?: Env } = {}
): ResolvedRequest {
  const env = options.env ?? {};
  const rawUrl = substitute(template.url, vars, env);
  const url = options.baseUrl && !/^[a-z][a-z0-9+.-]*:\/\//i.test(rawUrl)
    ? new URL(rawUrl.replace(/^\/+/, ''), options.baseUrl.endsWith('/') ? options.baseUrl : `${options.baseUrl}/`)
    : new URL(rawUrl);

  for (const [key, value] of Object.entries(template.params ?? {})) {
    url.searchParams.append(substitute(key, vars, env), substitute(value, vars, env));
  }

  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(template.headers ?? {})) {
    headers[substitute(key, vars, env)] = substitute(value, vars, env);
  }

  let body: string | undefined;
  if (typeof template.body === 'string') {
    body = substitute(template.body, vars, env);
  } else if (template.body !== undefined) {
    body = JSON.stringify(substituteJson(template.body, vars, env));
    if (!Object.keys(headers).some((h) => h.toLowerCase() === 'content-type')) {
      headers['Content-Type'] = 'application/json';
    }
  }

  return {
    method: substitute(template.method, vars, env).toUpperCase(),
    url: url.toString(),
    headers,
    body,
  };
}

/**
 * Resolves placeholders in expected values so the evaluator can compare them
 * directly.
 */
export function resolveChecks(checks: Check[], vars: Record<string, string>, env: Env = {}): Check[] {
  return checks.map((check): Check => {
    switch (check.kind) {
      case 'status':
        return {
          ...check,
          expected: check.expected.map((code) => {
            if (typeof code === 'number') return code;
            const text = substitute(code, vars, env).trim();
            return /^\d{3}$/.test(text) ? Number(text) : text;
          }),
        };
      case 'header':
        return check.expected === true
          ? check
          : { ...check, expected: substitute(check.expected, vars, env) };
      case 'path':
        return { ...check, path: substitute(check.path, vars, env), expected: resolveExpected(check.expected, vars, env) };
      default:
        return check;
    }
  });
}
