export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonSchema = boolean | { [key: string]: JsonValue };

export interface RequestTemplate {
  /** HTTP method, upper-cased by the loader */
  method: string;
  /** Absolute url, or a path relative to the base url */
  url: string;
  headers?: Record<string, string>;
  /** Query parameters appended to the url */
  params?: Record<string, string>;
  /** Raw string body, or a JSON value serialized on send */
  body?: JsonValue;
}

export type Check =
  /** Strings are templates resolved to integer codes before evaluation */
  | { kind: 'status'; expected: Array<number | string> }
  /** `true` asserts presence only */
  | { kind: 'header'; name: string; expected: string | true }
  | { kind: 'path'; path: string; expected: JsonValue }
  /** Validates the whole body, or the value at `path` */
  | { kind: 'schema'; schema: JsonSchema; path?: string };

export type CheckKind = Check['kind'];

export interface RetryOverrides {
  /** Total attempts including the first one */
  attempts?: number;
  /** Delay before the second attempt, in milliseconds */
  backoff?: number;
  multiplier?: number;
  /** Response statuses treated as transient */
  retryOn?: number[];
  /** Also retry assertion mismatches */
  assertions?: boolean;
}

export interface TestCase {
  name: string;
  request: RequestTemplate;
  checks: Check[];
  retry?: RetryOverrides;
  /** Per-attempt timeout in milliseconds */
  timeout?: number;
  /** Variables captured from the response body, by JSONPath */
  capture?: Record<string, string>;
  tags?: string[];
  skip?: boolean;
  focus?: boolean;
}

export type DatasetRow = Record<string, string>;

export interface Dataset {
  rows: DatasetRow[];
  /** Overrides the run concurrency for dataset-driven units */
  concurrency?: number;
}

export interface Suite {
  name: string;
  vars: Record<string, string>;
  setup: TestCase[];
  tests: TestCase[];
  teardown: TestCase[];
  dataset?: Dataset;
  /** Path the suite was loaded from */
  loadPath?: string;
}

export type Phase = 'setup' | 'main' | 'teardown';

export interface ResolvedRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

export interface PlannedUnit {
  /** Sequence index, assigned once at plan time */
  index: number;
  suiteName: string;
  phase: Phase;
  testCase: TestCase;
  row?: DatasetRow;
  rowIndex?: number;
}

export interface ExecutionUnit extends PlannedUnit {
  request: ResolvedRequest;
  /** Variables the request was resolved with, used for expected values */
  vars: Record<string, string>;
}

export type OutcomeStatus = 'passed' | 'failed' | 'skipped' | 'flaky' | 'cancelled';

export interface Mismatch {
  check: CheckKind;
  /** `status`, a header name, a path expression or a schema keyword location */
  locator: string;
  /** `missing` when the header or path is absent from the response */
  reason: 'unequal' | 'missing' | 'invalid';
  expected: unknown;
  actual: unknown;
  message: string;
}

export type TransportErrorKind = 'connection' | 'timeout' | 'protocol';

export type FailureDetail =
  | { kind: 'assertion'; message: string; mismatch: Mismatch }
  | { kind: 'transport'; message: string; reason: TransportErrorKind }
  | { kind: 'not-started'; message: string }
  | { kind: 'cancelled'; message: string };

export interface ExchangeSnapshot {
  request: ResolvedRequest;
  response?: {
    status: number;
    headers: Record<string, string>;
    body: string;
  };
}

export interface Outcome {
  index: number;
  name: string;
  suiteName: string;
  phase: Phase;
  rowIndex?: number;
  status: OutcomeStatus;
  attempts: number;
  durationMs: number;
  failures: FailureDetail[];
  /** Redacted request/response of the last attempt */
  snapshot?: ExchangeSnapshot;
}

export interface RunCounts {
  total: number;
  passed: number;
  failed: number;
  skipped: number;
  flaky: number;
  cancelled: number;
  pending: number;
}

export interface CaseSummary {
  suiteName: string;
  name: string;
  phase: Phase;
  counts: RunCounts;
  status: OutcomeStatus | 'pending';
}

export interface SuiteSummary {
  name: string;
  /** AND of case outcomes, skipped cases excluded */
  passed: boolean;
  counts: RunCounts;
  cases: CaseSummary[];
}

export interface Sample {
  timestamp: number;
  latency: number;
  success: boolean;
  status?: number;
  /** The exchange failed on a refused, dropped or timed-out connection */
  connectionError?: boolean;
  bytesSent?: number;
  bytesReceived?: number;
}

export interface MetricsSnapshot {
  /** Live snapshots are never final */
  final: boolean;
  elapsedMs: number;
  count: number;
  errorCount: number;
  /** Errors on the connection itself, a subset of `errorCount` */
  connectionErrors: number;
  errorRate: number;
  /** Operations per second, trailing window for live snapshots, whole run for final ones */
  throughput: number;
  meanLatency: number;
  minLatency: number;
  maxLatency: number;
  p50: number;
  p95: number;
  p99: number;
  /** Percentiles come from the histogram estimator */
  approximate: boolean;
  statusCodes: Record<string, number>;
  bytesSent: number;
  bytesReceived: number;
  /** Byte rates over the elapsed time */
  bytesSentPerSecond: number;
  bytesReceivedPerSecond: number;
}

export interface ExecutedTuple {
  method: string;
  path: string;
  status: number;
}

export interface CatalogEntry {
  method: string;
  /** Path template, e.g. `/users/{id}` */
  path: string;
  statuses: number[];
}

export interface CoverageEntry {
  method: string;
  path: string;
  expected: number[];
  hit: number[];
  missed: number[];
  /** Executed statuses the catalog does not declare */
  unexpected: number[];
  covered: boolean;
}

export interface CoverageReport {
  entries: CoverageEntry[];
  /** Executed tuples no catalog entry matches */
  uncatalogued: ExecutedTuple[];
  hit: number;
  total: number;
  percent: number;
}

export interface RunResult {
  final: boolean;
  passed: boolean;
  counts: RunCounts;
  durationMs: number;
  /** Terminal outcomes in sequence-index order */
  outcomes: Outcome[];
  suites: SuiteSummary[];
  latency: MetricsSnapshot;
  coverage?: CoverageReport;
  cancelReason?: string;
}

/** Everything one CLI invocation ran, suite by suite */
export interface RunReport {
  runs: RunResult[];
  passed: boolean;
  durationMs: number;
  coverage?: CoverageReport;
}

export type CancelMode = 'graceful' | 'abandon';

export interface SpikeOptions {
  /** Concurrency during a spike, defaults to twice the baseline */
  peak?: number;
  /** Length of one steady+spike cycle */
  everyMs?: number;
  lengthMs?: number;
}

interface LoadPlanBase {
  /** Target (baseline for spike) concurrency */
  concurrency: number;
  durationMs: number;
  /** Upper clamp for the driver's target */
  maxConcurrency?: number;
  tickMs?: number;
  reportIntervalMs?: number;
  /** Optional requests-per-second cap */
  rps?: number;
  /** Exact-percentile sample cap before the estimator takes over */
  maxSamples?: number;
}

export type LoadPlan =
  | (LoadPlanBase & { pattern: 'constant' })
  | (LoadPlanBase & { pattern: 'ramp-up'; rampMs: number })
  | (LoadPlanBase & { pattern: 'spike'; spike?: SpikeOptions });

export type LoadPattern = LoadPlan['pattern'];

export type LoadPhase = 'idle' | 'ramping' | 'steady' | 'spiking' | 'draining' | 'done';

export interface PerformanceSnapshot extends MetricsSnapshot {
  phase: LoadPhase;
  /** e.g. `Ramping up (40%)`, `Spike at 20 concurrent` */
  description: string;
  target: number;
  inFlight: number;
}

export interface UnitTemplate {
  suiteName: string;
  /** Cycled round-robin, one per dispatched operation */
  cases: TestCase[];
  vars: Record<string, string>;
}

export interface PerformanceResult {
  plan: LoadPlan;
  stats: MetricsSnapshot;
  phases: Array<{ phase: LoadPhase; atMs: number }>;
  peakInFlight: number;
  cancelReason?: string;
}
