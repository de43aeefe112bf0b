import type { JsonValue } from './types.js';

export type PathSegment = string | number;

export type PathLookup = { found: true; value: JsonValue } | { found: false; at: string };

/**
 * Parses the JSONPath subset suites use: `$`, `$.a.b`, `$[0].id`,
 * `items[2].name`, `$['odd key']`. The leading `$` is optional.
 */
export function parsePath(path: string): PathSegment[] {
  const segments: PathSegment[] = [];
  let rest = path.trim();
  if (rest.startsWith('$')) rest = rest.slice(1);

  let i = 0;
  while (i < rest.length) {
    const ch = rest[i];
    if (ch === '.') {
      i += 1;
      continue;
    }
    if (ch === '[') {
      const close = rest.indexOf(']', i);
      if (close === -1) throw new Error(`Unclosed bracket in path '${path}'`);
      const inner = rest.slice(i + 1, close).trim();
      const quoted = /^(['"])(.*)\1$/.exec(inner);
      if (quoted) {
        segments.push(quoted[2]);
      } else if (/^\d+$/.test(inner)) {
        segments.push(Number(inner));
      } else {
        throw new Error(`Invalid index '${inner}' in path '${path}'`);
      }
      i = close + 1;
      continue;
    }
    let end = i;
    while (end < rest.length && rest[end] !== '.' && rest[end] !== '[') end += 1;
    segments.push(rest.slice(i, end));
    i = end;
  }
  return segments;
}

export function queryPath(root: JsonValue | undefined, path: string): PathLookup {
  const segments = parsePath(path);
  if (root === undefined) return { found: false, at: '$' };

  let current: JsonValue = root;
  let at = '$';
  for (const segment of segments) {
    if (typeof segment === 'number') {
      at += `[${segment}]`;
      if (!Array.isArray(current) || segment >= current.length) return { found: false, at };
      current = current[segment];
    } else {
      at += `.${segment}`;
      if (current === null || typeof current !== 'object' || Array.isArray(current)) {
        return { found: false, at };
      }
      if (!Object.prototype.hasOwnProperty.call(current, segment)) return { found: false, at };
      current = current[segment];
    }
  }
  return { found: true, value: current };
}
