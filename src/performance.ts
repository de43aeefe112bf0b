import { ConfigurationError, errorMessage } from './errors.js';
import { LoadDriver } from './load-pattern.js';
import { MetricsAggregator } from './metrics.js';
import RateLimiter from './rate-limiter.js';
import { Redactor, type RedactionPolicy } from './redact.js';
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from './retry.js';
import { DEFAULT_TIMEOUT_MS, runUnit, sampleOf, type UnitContext, type UnitExecution } from './runner.js';
import { WorkerPool } from './scheduler.js';
import { formatIssues, loadPlanSchema } from './schemas.js';
import { buildVariables, resolveRequest, type Env } from './template.js';
import type { Transport } from './transport.js';
import type {
  ExecutionUnit,
  LoadPhase,
  LoadPlan,
  PerformanceResult,
  PerformanceSnapshot,
  UnitTemplate,
} from './types.js';

export const DEFAULT_REPORT_INTERVAL_MS = 1000;

export interface PerformanceOptions {
  transport: Transport;
  baseUrl?: string;
  timeoutMs?: number;
  retry?: Partial<RetryPolicy>;
  env?: Env;
  envName?: string;
  /** Stops dispatch and lets in-flight operations finish */
  signal?: AbortSignal;
  redaction?: RedactionPolicy;
  onSnapshot?: (snapshot: PerformanceSnapshot) => void;
  onPhase?: (phase: LoadPhase, atMs: number) => void;
}

export function parseLoadPlan(plan: unknown): LoadPlan {
  const parsed = loadPlanSchema.safeParse(plan);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid load plan', formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Generates load from `template` following `plan` until its duration passes
 * or `signal` aborts. Each dispatched operation cycles through the template's
 * cases and contributes one sample to the statistics.
 */
export async function executePerformance(
  plan: LoadPlan,
  template: UnitTemplate,
  options: PerformanceOptions
): Promise<PerformanceResult> {
  const validPlan = parseLoadPlan(plan);
  if (template.cases.length === 0) {
    throw new ConfigurationError(`Suite '${template.suiteName}' has no test cases to drive load with`);
  }

  const env = options.env ?? {};
  const vars = buildVariables({ env, suiteVars: template.vars, envName: options.envName });
  const requests = template.cases.map((testCase) => {
    try {
      return resolveRequest(testCase.request, vars, { baseUrl: options.baseUrl, env });
    } catch (error) {
      throw new ConfigurationError(`Invalid request in '${testCase.name}'`, [errorMessage(error)]);
    }
  });

  const rateLimiter = new RateLimiter(validPlan.rps);
  const ctx: UnitContext = {
    transport: options.transport,
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    retry: { ...DEFAULT_RETRY_POLICY, ...options.retry },
    redactor: new Redactor(options.redaction),
    env,
    rateLimiter,
  };
  const metrics = new MetricsAggregator({
    maxSamples: validPlan.maxSamples,
    expectedSamples: validPlan.concurrency * Math.ceil(validPlan.durationMs / 100),
  });
  const pool = new WorkerPool<ExecutionUnit, UnitExecution>({ concurrency: 0 });
  const driver = new LoadDriver(validPlan, pool, { onPhase: options.onPhase });

  let cancelReason: string | undefined;
  const onAbort = () => {
    cancelReason = 'aborted';
    driver.drain();
  };

  function* units(): Generator<ExecutionUnit> {
    for (let index = 0; driver.phase !== 'draining' && driver.phase !== 'done'; index += 1) {
      const slot = index % template.cases.length;
      yield {
        index,
        suiteName: template.suiteName,
        phase: 'main',
        testCase: template.cases[slot],
        request: requests[slot],
        vars,
      };
    }
  }

  const report = () => {
    options.onSnapshot?.({
      ...metrics.snapshot(),
      phase: driver.phase,
      description: driver.description,
      target: driver.target,
      inFlight: pool.inFlight,
    });
  };

  metrics.markStart();
  const reporter = setInterval(report, validPlan.reportIntervalMs ?? DEFAULT_REPORT_INTERVAL_MS);
  if (options.signal?.aborted) onAbort();
  options.signal?.addEventListener('abort', onAbort, { once: true });
  try {
    driver.start();
    await pool.run(
      units(),
      (unit, signal) => runUnit(unit, ctx, signal),
      (completion) => {
        if (completion.state === 'done') {
          const sample = sampleOf(completion.result);
          if (sample) metrics.record(sample);
        } else if (completion.state === 'error') {
          metrics.record({ timestamp: Date.now(), latency: 0, success: false });
        }
      }
    );
  } finally {
    options.signal?.removeEventListener('abort', onAbort);
    clearInterval(reporter);
    driver.finish();
    rateLimiter.dispose();
  }

  return {
    plan: validPlan,
    stats: metrics.finalize(),
    phases: [...driver.transitions],
    peakInFlight: pool.peakInFlight,
    cancelReason,
  };
}
