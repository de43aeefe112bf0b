import { ConfigurationError, TransportError, errorMessage } from './errors.js';
import { evaluate } from './assertions.js';
import { ResultCollator } from './collator.js';
import { evaluateCoverage, executedTuples } from './coverage.js';
import { queryPath } from './json-path.js';
import { MetricsAggregator } from './metrics.js';
import type RateLimiter from './rate-limiter.js';
import { Redactor, type RedactionPolicy } from './redact.js';
import { DEFAULT_RETRY_POLICY, mergePolicy, withRetry, type RetryPolicy } from './retry.js';
import { WorkerPool } from './scheduler.js';
import { buildVariables, resolveChecks, resolveRequest, type Env } from './template.js';
import type { Transport, TransportResponse } from './transport.js';
import type {
  CancelMode,
  CatalogEntry,
  Dataset,
  ExecutionUnit,
  FailureDetail,
  JsonValue,
  Outcome,
  Phase,
  PlannedUnit,
  RunCounts,
  RunResult,
  Sample,
  Suite,
} from './types.js';

export const DEFAULT_TIMEOUT_MS = 30_000;

export interface RunHooks {
  onUnitStart?: (unit: ExecutionUnit) => void;
  /** Called once per unit, in completion order, with the counts so far */
  onOutcome?: (outcome: Outcome, counts: RunCounts) => void;
}

/** What a single unit needs besides itself */
export interface UnitContext {
  transport: Transport;
  timeoutMs: number;
  retry: RetryPolicy;
  redactor: Redactor;
  env: Env;
  rateLimiter?: RateLimiter;
  wait?: (ms: number, signal?: AbortSignal) => Promise<boolean>;
}

export interface RunOptions {
  transport: Transport;
  concurrency: number;
  bail?: boolean;
  /** Prefix for relative request urls */
  baseUrl?: string;
  timeoutMs?: number;
  retry?: Partial<RetryPolicy>;
  /** Replaces the suite's own dataset */
  dataset?: Dataset;
  env?: Env;
  envName?: string;
  signal?: AbortSignal;
  cancelMode?: CancelMode;
  redaction?: RedactionPolicy;
  rateLimiter?: RateLimiter;
  catalog?: { entries: CatalogEntry[]; basePath?: string };
  hooks?: RunHooks;
  /** Backoff wait, replaceable in tests */
  wait?: (ms: number, signal?: AbortSignal) => Promise<boolean>;
}

export interface UnitExecution {
  outcome: Outcome;
  /** Variables captured from the response, for setup units that declare them */
  captures: Record<string, string>;
  /** Body bytes over every attempt */
  bytes?: { sent: number; received: number };
}

/** The metrics sample for an executed unit; units that never sent have none */
export function sampleOf(execution: UnitExecution, timestamp: number = Date.now()): Sample | undefined {
  const { outcome, bytes } = execution;
  if (outcome.attempts === 0) return undefined;
  return {
    timestamp,
    latency: outcome.durationMs,
    success: outcome.status === 'passed' || outcome.status === 'flaky',
    status: outcome.snapshot?.response?.status,
    connectionError: outcome.failures.some(
      (f) => f.kind === 'transport' && (f.reason === 'connection' || f.reason === 'timeout')
    ),
    bytesSent: bytes?.sent,
    bytesReceived: bytes?.received,
  };
}

export interface UnitPlan {
  setup: PlannedUnit[];
  main: PlannedUnit[];
  teardown: PlannedUnit[];
  all: PlannedUnit[];
}

/**
 * Assigns sequence indices: setup steps first, then every test once per
 * dataset row (row-major), then teardown. A suite without rows runs each test
 * once.
 */
export function planUnits(suite: Suite, dataset?: Dataset): UnitPlan {
  let index = 0;
  const unit = (phase: Phase, testCase: Suite['tests'][number], rowIndex?: number): PlannedUnit => ({
    index: index++,
    suiteName: suite.name,
    phase,
    testCase,
    ...(rowIndex !== undefined && dataset ? { row: dataset.rows[rowIndex], rowIndex } : {}),
  });

  const setup = suite.setup.map((t) => unit('setup', t));
  const main: PlannedUnit[] = [];
  if (dataset && dataset.rows.length > 0) {
    dataset.rows.forEach((_row, rowIndex) => {
      suite.tests.forEach((t) => main.push(unit('main', t, rowIndex)));
    });
  } else {
    suite.tests.forEach((t) => main.push(unit('main', t)));
  }
  const teardown = suite.teardown.map((t) => unit('teardown', t));
  return { setup, main, teardown, all: [...setup, ...main, ...teardown] };
}

function outcomeOf(unit: PlannedUnit, fields: Pick<Outcome, 'status' | 'failures'> & Partial<Outcome>): Outcome {
  return {
    index: unit.index,
    name: unit.testCase.name,
    suiteName: unit.suiteName,
    phase: unit.phase,
    rowIndex: unit.rowIndex,
    attempts: 0,
    durationMs: 0,
    ...fields,
  };
}

export function skippedOutcome(unit: PlannedUnit, reason: string): Outcome {
  return outcomeOf(unit, { status: 'skipped', failures: [{ kind: 'not-started', message: reason }] });
}

export function cancelledOutcome(unit: PlannedUnit, reason: string): Outcome {
  return outcomeOf(unit, { status: 'cancelled', failures: [{ kind: 'cancelled', message: `Cancelled: ${reason}` }] });
}

function transportFailure(error: unknown): FailureDetail {
  if (error instanceof TransportError) {
    return { kind: 'transport', reason: error.kind, message: error.message };
  }
  return { kind: 'transport', reason: 'protocol', message: errorMessage(error) };
}

function parseJson(body: string): JsonValue | undefined {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

/** Pulls `capture` paths out of a passing response body */
function captureValues(
  capture: Record<string, string>,
  response: TransportResponse
): { values: Record<string, string>; failures: FailureDetail[] } {
  const values: Record<string, string> = {};
  const failures: FailureDetail[] = [];
  const body = parseJson(response.body);
  for (const [name, path] of Object.entries(capture)) {
    const lookup = queryPath(body, path);
    if (!lookup.found) {
      const message = `Capture '${name}': path '${path}' does not exist (stopped at ${lookup.at})`;
      failures.push({
        kind: 'assertion',
        message,
        mismatch: { check: 'path', locator: path, reason: 'missing', expected: name, actual: undefined, message },
      });
      continue;
    }
    values[name] = typeof lookup.value === 'string' ? lookup.value : JSON.stringify(lookup.value);
  }
  return { values, failures };
}

/**
 * Runs one resolved unit to its terminal outcome: rate limiting, send,
 * evaluation and retries. Never rejects; transport errors become failures.
 */
export async function runUnit(unit: ExecutionUnit, ctx: UnitContext, signal?: AbortSignal): Promise<UnitExecution> {
  const startTime = Date.now();
  const checks = resolveChecks(unit.testCase.checks, unit.vars, ctx.env);
  const policy = mergePolicy(ctx.retry, unit.testCase.retry);
  const timeoutMs = unit.testCase.timeout ?? ctx.timeoutMs;
  let captures: Record<string, string> = {};
  const bytes = { sent: 0, received: 0 };

  const result = await withRetry<TransportResponse>(async () => {
    if (ctx.rateLimiter && !(await ctx.rateLimiter.acquire(signal))) {
      return { ok: false, failures: [{ kind: 'cancelled', message: 'Cancelled while waiting for rate limit' }] };
    }
    let response: TransportResponse;
    bytes.sent += Buffer.byteLength(unit.request.body ?? '');
    try {
      response = await ctx.transport.send({ ...unit.request, timeoutMs, signal });
    } catch (error) {
      return { ok: false, failures: [transportFailure(error)] };
    }
    bytes.received += Buffer.byteLength(response.body);
    const verdict = evaluate(response, checks);
    if (!verdict.passed) {
      return {
        ok: false,
        status: response.status,
        value: response,
        failures: verdict.mismatches.map((mismatch) => ({ kind: 'assertion' as const, message: mismatch.message, mismatch })),
      };
    }
    if (unit.testCase.capture) {
      const captured = captureValues(unit.testCase.capture, response);
      if (captured.failures.length > 0) {
        return { ok: false, status: response.status, value: response, failures: captured.failures };
      }
      captures = captured.values;
    }
    return { ok: true, value: response };
  }, policy, { signal, wait: ctx.wait });

  const response = result.last.value;
  const failures = result.last.ok ? [] : result.last.failures;
  const outcome = outcomeOf(unit, {
    status: result.status,
    attempts: result.attempts,
    durationMs: Date.now() - startTime,
    failures: failures.map((f) => ctx.redactor.failure(f)),
    snapshot: ctx.redactor.snapshot({ request: unit.request, response }),
  });
  return { outcome, captures: result.status === 'failed' || result.status === 'cancelled' ? {} : captures, bytes };
}

function validateOptions(options: RunOptions): void {
  const issues: string[] = [];
  if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
    issues.push(`concurrency must be a positive integer, got ${options.concurrency}`);
  }
  if (options.timeoutMs !== undefined && !(options.timeoutMs > 0)) {
    issues.push(`timeout must be positive, got ${options.timeoutMs}`);
  }
  const dataset = options.dataset;
  if (dataset?.concurrency !== undefined && (!Number.isInteger(dataset.concurrency) || dataset.concurrency < 1)) {
    issues.push(`dataset concurrency must be a positive integer, got ${dataset.concurrency}`);
  }
  if (issues.length > 0) throw new ConfigurationError('Invalid run options', issues);
}

/**
 * Executes one suite: setup steps one at a time, then every test (per dataset
 * row) on a bounded pool, then teardown. Setup captures feed the units that
 * follow. A failed setup skips the main phase; teardown runs unless the run
 * was aborted.
 */
export async function execute(suite: Suite, options: RunOptions): Promise<RunResult> {
  validateOptions(options);
  const dataset = options.dataset ?? suite.dataset;
  const plan = planUnits(suite, dataset);
  const collator = new ResultCollator(plan.all);
  const metrics = new MetricsAggregator({ expectedSamples: plan.all.length });
  const env = options.env ?? {};
  const ctx: UnitContext = {
    transport: options.transport,
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    retry: { ...DEFAULT_RETRY_POLICY, ...options.retry },
    redactor: new Redactor(options.redaction),
    env,
    rateLimiter: options.rateLimiter,
    wait: options.wait,
  };
  const captures: Record<string, string> = {};
  const startTime = Date.now();
  metrics.markStart(startTime);

  const publish = (outcome: Outcome, bytes?: UnitExecution['bytes']) => {
    collator.record(outcome);
    const sample = sampleOf({ outcome, captures: {}, bytes });
    if (sample) metrics.record(sample);
    options.hooks?.onOutcome?.(outcome, collator.snapshot().counts);
  };

  // Resolved at dispatch so captures from earlier setup steps are visible.
  const resolveUnit = (unit: PlannedUnit): ExecutionUnit | UnitExecution => {
    const vars = buildVariables({ env, suiteVars: suite.vars, envName: options.envName, captures, row: unit.row });
    try {
      const request = resolveRequest(unit.testCase.request, vars, { baseUrl: options.baseUrl, env });
      return { ...unit, request, vars };
    } catch (error) {
      const outcome = outcomeOf(unit, {
        status: 'failed',
        failures: [{ kind: 'transport', reason: 'protocol', message: `Invalid request: ${errorMessage(error)}` }],
      });
      return { outcome, captures: {} };
    }
  };

  const dispatch = async (unit: PlannedUnit, signal: AbortSignal): Promise<UnitExecution> => {
    if (unit.testCase.skip) return { outcome: skippedOutcome(unit, 'skipped'), captures: {} };
    const resolved = resolveUnit(unit);
    if ('outcome' in resolved) return resolved;
    options.hooks?.onUnitStart?.(resolved);
    return runUnit(resolved, ctx, signal);
  };

  const runPhase = async (units: PlannedUnit[], concurrency: number, bail: boolean) => {
    const pool = new WorkerPool<PlannedUnit, UnitExecution>({
      concurrency,
      bail,
      isFailure: (result) => result.outcome.status === 'failed',
      signal: options.signal,
      cancelMode: options.cancelMode,
    });
    let failed = false;
    await pool.run(units, dispatch, (completion) => {
      const { unit } = completion;
      switch (completion.state) {
        case 'done':
          Object.assign(captures, completion.result.captures);
          publish(completion.result.outcome, completion.result.bytes);
          break;
        case 'error':
          publish(outcomeOf(unit, {
            status: 'failed',
            failures: [{ kind: 'transport', reason: 'protocol', message: errorMessage(completion.error) }],
          }));
          break;
        case 'skipped':
          publish(skippedOutcome(unit, completion.reason));
          break;
        case 'cancelled':
          publish(cancelledOutcome(unit, completion.reason));
          break;
      }
    });
    for (const unit of units) {
      const status = collator.outcome(unit.index)?.status;
      if (status === 'failed' || status === 'cancelled') failed = true;
    }
    return { failed, cancelReason: pool.cancelReason };
  };

  let cancelReason: string | undefined;
  const setup = await runPhase(plan.setup, 1, true);
  cancelReason = setup.cancelReason === 'bail' ? undefined : setup.cancelReason;

  if (setup.failed) {
    plan.main.forEach((unit) => publish(skippedOutcome(unit, 'setup failed')));
  } else {
    const main = await runPhase(plan.main, dataset?.concurrency ?? options.concurrency, options.bail ?? false);
    cancelReason ??= main.cancelReason;
  }

  const teardown = await runPhase(plan.teardown, 1, false);
  cancelReason ??= teardown.cancelReason;

  const durationMs = Date.now() - startTime;
  const collated = collator.snapshot();
  const coverage = options.catalog
    ? evaluateCoverage(executedTuples(collated.outcomes), options.catalog.entries, { basePath: options.catalog.basePath })
    : undefined;

  return {
    final: true,
    passed: collated.passed && collated.counts.failed === 0 && collated.counts.cancelled === 0 && cancelReason !== 'aborted',
    counts: collated.counts,
    durationMs,
    outcomes: collated.outcomes,
    suites: collated.suites,
    latency: metrics.finalize(durationMs),
    coverage,
    cancelReason,
  };
}
