export * from './types.js';
export { ConfigurationError, SuiteLoadError, TransportError } from './errors.js';
export { substitute, buildVariables, resolveRequest, resolveChecks, resolveExpected, type Env } from './template.js';
export { parsePath, queryPath } from './json-path.js';
export { evaluate, type ResponseView, type Verdict } from './assertions.js';
export {
  DEFAULT_RETRY_POLICY,
  backoffDelay,
  classify,
  mergePolicy,
  withRetry,
  type AttemptResult,
  type RetryPolicy,
  type RetryResult,
} from './retry.js';
export { WorkerPool, type Completion, type PoolOptions, type Worker } from './scheduler.js';
export { LoadDriver, targetAt, describePhase } from './load-pattern.js';
export { MetricsAggregator, percentile } from './metrics.js';
export { ResultCollator } from './collator.js';
export { evaluateCoverage, executedTuples, matchTemplate, normalizePath } from './coverage.js';
export { DEFAULT_REDACTION, Redactor, type RedactionPolicy } from './redact.js';
export type { Transport, TransportRequest, TransportResponse } from './transport.js';
export { HttpClient } from './http-client.js';
export { default as RateLimiter } from './rate-limiter.js';
export { execute, planUnits, runUnit, type RunHooks, type RunOptions } from './runner.js';
export { executePerformance, parseLoadPlan, type PerformanceOptions } from './performance.js';
export { parseDuration } from './schemas.js';
export { loadConfig, type StampedeConfig } from './config.js';
export { PluginHost } from './plugin-host.js';
export type { Plugin, StampedeContext } from './plugin-api.js';
export { loadSuite, loadCatalog } from './plugins/core-loader.js';
export * from './helpers.js';
