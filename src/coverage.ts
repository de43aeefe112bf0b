import type { CatalogEntry, CoverageEntry, CoverageReport, ExecutedTuple, Outcome } from './types.js';

function splitPath(path: string): string[] {
  return path.split('/').filter((segment) => segment.length > 0);
}

/** Drops query and fragment, collapses slashes and the trailing slash */
export function normalizePath(path: string, basePath = ''): string {
  let clean = path.split(/[?#]/, 1)[0];
  const base = `/${splitPath(basePath).join('/')}`;
  clean = `/${splitPath(clean).join('/')}`;
  if (base !== '/' && (clean === base || clean.startsWith(`${base}/`))) {
    clean = clean.slice(base.length) || '/';
  }
  return clean;
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

function isParam(segment: string): boolean {
  return /^\{[^}]+\}$/.test(segment) || segment.startsWith(':');
}

/**
 * Structural match: same segment count, literal segments equal, templated
 * segments (`{id}` or `:id`) match any single concrete segment. Returns the
 * number of literal segments so the most specific template can win.
 */
export function matchTemplate(template: string, concrete: string): number | null {
  const expected = splitPath(template);
  const actual = splitPath(concrete);
  if (expected.length !== actual.length) return null;
  let literals = 0;
  for (let i = 0; i < expected.length; i += 1) {
    if (isParam(expected[i])) continue;
    if (expected[i] !== decodeSegment(actual[i])) return null;
    literals += 1;
  }
  return literals;
}

export function evaluateCoverage(
  executed: ExecutedTuple[],
  catalog: CatalogEntry[],
  options: { basePath?: string } = {}
): CoverageReport {
  const entries = catalog.map((entry) => ({
    entry,
    method: entry.method.toUpperCase(),
    statuses: new Set<number>(),
  }));
  const uncatalogued: ExecutedTuple[] = [];
  const seenUncatalogued = new Set<string>();

  for (const tuple of executed) {
    const method = tuple.method.toUpperCase();
    const path = normalizePath(tuple.path, options.basePath);
    let best: (typeof entries)[number] | null = null;
    let bestScore = -1;
    for (const candidate of entries) {
      if (candidate.method !== method) continue;
      const score = matchTemplate(candidate.entry.path, path);
      if (score !== null && score > bestScore) {
        best = candidate;
        bestScore = score;
      }
    }
    if (best) {
      best.statuses.add(tuple.status);
    } else {
      const key = `${method} ${path} ${tuple.status}`;
      if (!seenUncatalogued.has(key)) {
        seenUncatalogued.add(key);
        uncatalogued.push({ method, path, status: tuple.status });
      }
    }
  }

  let hit = 0;
  let total = 0;
  const report: CoverageEntry[] = entries.map(({ entry, method, statuses }) => {
    const executedStatuses = [...statuses].sort((a, b) => a - b);
    const expected = [...entry.statuses].sort((a, b) => a - b);
    const hitStatuses = expected.length > 0
      ? executedStatuses.filter((s) => expected.includes(s))
      : executedStatuses;
    const missed = expected.filter((s) => !statuses.has(s));
    const unexpected = expected.length > 0 ? executedStatuses.filter((s) => !expected.includes(s)) : [];

    // An entry without declared statuses counts as one pair.
    total += Math.max(1, expected.length);
    hit += expected.length > 0 ? hitStatuses.length : Math.min(1, hitStatuses.length);

    return {
      method,
      path: entry.path,
      expected,
      hit: hitStatuses,
      missed,
      unexpected,
      covered: hitStatuses.length > 0,
    };
  });

  return {
    entries: report,
    uncatalogued,
    hit,
    total,
    percent: total > 0 ? Math.round((hit / total) * 10000) / 100 : 0,
  };
}

/** Tuples for every outcome whose last attempt received a response */
export function executedTuples(outcomes: Outcome[]): ExecutedTuple[] {
  const tuples: ExecutedTuple[] = [];
  for (const outcome of outcomes) {
    const snapshot = outcome.snapshot;
    if (!snapshot?.response) continue;
    tuples.push({
      method: snapshot.request.method,
      path: new URL(snapshot.request.url).pathname,
      status: snapshot.response.status,
    });
  }
  return tuples;
}
