import { build, type Histogram } from 'hdr-histogram-js';
import type { MetricsSnapshot, Sample } from './types.js';

export const DEFAULT_MAX_SAMPLES = 50_000;
export const DEFAULT_WINDOW_MS = 10_000;

export interface MetricsOptions {
  /** Expected sample count, used to size the exact store up front */
  expectedSamples?: number;
  /** Exact latencies retained before switching to the estimator */
  maxSamples?: number;
  /** Trailing window for live throughput */
  windowMs?: number;
  now?: () => number;
}

/**
 * Nearest-rank percentile over ascending values: the smallest value with at
 * least `p` percent of the data at or below it.
 */
export function percentile(sorted: ArrayLike<number>, p: number): number {
  if (sorted.length === 0) return 0;
  const rank = Math.ceil((p / 100) * sorted.length);
  const index = Math.min(sorted.length - 1, Math.max(0, rank - 1));
  return sorted[index];
}

// Latencies are recorded in microseconds so sub-millisecond values keep precision.
const MICROS = 1000;

/**
 * Streaming latency/outcome statistics. Latencies are kept exactly in a
 * preallocated buffer up to `maxSamples`; past that the buffer is folded into
 * an HDR histogram and percentiles become approximate.
 */
export class MetricsAggregator {
  private values: Float64Array;
  private size = 0;
  private histogram: Histogram | null = null;
  private sum = 0;
  private min = Infinity;
  private max = 0;
  private count = 0;
  private errors = 0;
  private connectionErrors = 0;
  private bytesSent = 0;
  private bytesReceived = 0;
  private statusCodes: Record<string, number> = {};
  private buckets = new Map<number, number>();
  private startedAt: number;
  private readonly maxSamples: number;
  private readonly windowMs: number;
  private readonly now: () => number;

  constructor(options: MetricsOptions = {}) {
    this.maxSamples = Math.max(1, options.maxSamples ?? DEFAULT_MAX_SAMPLES);
    this.windowMs = Math.max(1000, options.windowMs ?? DEFAULT_WINDOW_MS);
    this.now = options.now ?? Date.now;
    const initial = Math.min(this.maxSamples, Math.max(16, options.expectedSamples ?? 1024));
    this.values = new Float64Array(initial);
    this.startedAt = this.now();
  }

  get approximate(): boolean {
    return this.histogram !== null;
  }

  get total(): number {
    return this.count;
  }

  /** Restarts the clock used for elapsed time and final throughput */
  markStart(at: number = this.now()): void {
    this.startedAt = at;
  }

  record(sample: Sample): void {
    const latency = Math.max(0, sample.latency);
    this.count += 1;
    this.sum += latency;
    this.min = Math.min(this.min, latency);
    this.max = Math.max(this.max, latency);
    if (!sample.success) this.errors += 1;
    if (sample.connectionError) this.connectionErrors += 1;
    this.bytesSent += sample.bytesSent ?? 0;
    this.bytesReceived += sample.bytesReceived ?? 0;
    if (sample.status !== undefined) {
      const key = String(sample.status);
      this.statusCodes[key] = (this.statusCodes[key] ?? 0) + 1;
    }

    const second = Math.floor(sample.timestamp / 1000);
    this.buckets.set(second, (this.buckets.get(second) ?? 0) + 1);
    this.pruneBuckets(second);

    if (this.histogram) {
      this.histogram.recordValue(Math.round(latency * MICROS));
      return;
    }
    if (this.size === this.maxSamples) {
      this.downgrade();
      this.histogram?.recordValue(Math.round(latency * MICROS));
      return;
    }
    if (this.size === this.values.length) {
      const grown = new Float64Array(Math.min(this.maxSamples, this.values.length * 2));
      grown.set(this.values);
      this.values = grown;
    }
    this.values[this.size] = latency;
    this.size += 1;
  }

  /** Live view; throughput covers the trailing window only */
  snapshot(): MetricsSnapshot {
    const now = this.now();
    const currentSecond = Math.floor(now / 1000);
    const windowSeconds = Math.ceil(this.windowMs / 1000);
    let inWindow = 0;
    for (const [second, n] of this.buckets) {
      if (second > currentSecond - windowSeconds) inWindow += n;
    }
    const elapsedMs = Math.max(0, now - this.startedAt);
    const span = Math.min(this.windowMs, Math.max(elapsedMs, 1));
    return this.build(false, elapsedMs, (inWindow / span) * 1000);
  }

  /** Final statistics over the whole retained distribution */
  finalize(elapsedMs: number = this.now() - this.startedAt): MetricsSnapshot {
    const elapsed = Math.max(0, elapsedMs);
    const throughput = elapsed > 0 ? (this.count / elapsed) * 1000 : 0;
    return this.build(true, elapsed, throughput);
  }

  private build(final: boolean, elapsedMs: number, throughput: number): MetricsSnapshot {
    const [p50, p95, p99] = this.percentiles([50, 95, 99]);
    const perSecond = (n: number) => (elapsedMs > 0 ? (n / elapsedMs) * 1000 : 0);
    return {
      final,
      elapsedMs,
      count: this.count,
      errorCount: this.errors,
      connectionErrors: this.connectionErrors,
      errorRate: this.count > 0 ? this.errors / this.count : 0,
      throughput,
      meanLatency: this.count > 0 ? this.sum / this.count : 0,
      minLatency: this.count > 0 ? this.min : 0,
      maxLatency: this.max,
      p50,
      p95,
      p99,
      approximate: this.approximate,
      statusCodes: { ...this.statusCodes },
      bytesSent: this.bytesSent,
      bytesReceived: this.bytesReceived,
      bytesSentPerSecond: perSecond(this.bytesSent),
      bytesReceivedPerSecond: perSecond(this.bytesReceived),
    };
  }

  private percentiles(ps: number[]): number[] {
    if (this.histogram) {
      const histogram = this.histogram;
      return ps.map((p) => histogram.getValueAtPercentile(p) / MICROS);
    }
    const sorted = this.values.slice(0, this.size).sort();
    return ps.map((p) => percentile(sorted, p));
  }

  private downgrade(): void {
    const histogram = build({ lowestDiscernibleValue: 1, numberOfSignificantValueDigits: 3, autoResize: true });
    for (let i = 0; i < this.size; i += 1) {
      histogram.recordValue(Math.round(this.values[i] * MICROS));
    }
    this.histogram = histogram;
    this.values = new Float64Array(0);
    this.size = 0;
  }

  private pruneBuckets(currentSecond: number): void {
    const oldest = currentSecond - Math.ceil(this.windowMs / 1000);
    for (const second of this.buckets.keys()) {
      if (second <= oldest) this.buckets.delete(second);
    }
  }
}
