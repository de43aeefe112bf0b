import { performance } from 'perf_hooks';
import type { LoadPhase, LoadPlan } from './types.js';

export const DEFAULT_TICK_MS = 100;
export const DEFAULT_SPIKE_EVERY_MS = 30_000;
export const DEFAULT_SPIKE_LENGTH_MS = 5_000;

export interface TargetPoint {
  phase: LoadPhase;
  target: number;
}

export interface ConcurrencyControl {
  setLimit(limit: number): void;
  close(): void;
}

export function spikeShape(plan: Extract<LoadPlan, { pattern: 'spike' }>) {
  return {
    peak: plan.spike?.peak ?? plan.concurrency * 2,
    everyMs: plan.spike?.everyMs ?? DEFAULT_SPIKE_EVERY_MS,
    lengthMs: plan.spike?.lengthMs ?? DEFAULT_SPIKE_LENGTH_MS,
  };
}

export function maxConcurrencyOf(plan: LoadPlan): number {
  if (plan.maxConcurrency !== undefined) return plan.maxConcurrency;
  if (plan.pattern === 'spike') return Math.max(plan.concurrency, spikeShape(plan).peak);
  return plan.concurrency;
}

function clamp(value: number, max: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(max, Math.max(0, Math.round(value)));
}

/**
 * Target concurrency at `elapsedMs` into the run. Late or skewed readings
 * (negative, NaN) are treated as the start; the result is clamped to
 * `[0, maxConcurrency]`.
 */
export function targetAt(plan: LoadPlan, elapsedMs: number): TargetPoint {
  const max = maxConcurrencyOf(plan);
  const t = Number.isFinite(elapsedMs) ? Math.max(0, elapsedMs) : 0;
  if (t >= plan.durationMs) return { phase: 'draining', target: 0 };

  switch (plan.pattern) {
    case 'constant':
      return { phase: 'steady', target: clamp(plan.concurrency, max) };
    case 'ramp-up':
      if (plan.rampMs > 0 && t < plan.rampMs) {
        return { phase: 'ramping', target: clamp((plan.concurrency * t) / plan.rampMs, max) };
      }
      return { phase: 'steady', target: clamp(plan.concurrency, max) };
    case 'spike': {
      const { peak, everyMs, lengthMs } = spikeShape(plan);
      const position = everyMs > 0 ? t % everyMs : 0;
      if (position >= everyMs - lengthMs) {
        return { phase: 'spiking', target: clamp(peak, max) };
      }
      return { phase: 'steady', target: clamp(plan.concurrency, max) };
    }
  }
}

export function describePhase(plan: LoadPlan, elapsedMs: number): string {
  const point = targetAt(plan, elapsedMs);
  switch (point.phase) {
    case 'ramping': {
      const rampMs = plan.pattern === 'ramp-up' ? plan.rampMs : 1;
      return `Ramping up (${Math.floor((elapsedMs / rampMs) * 100)}%)`;
    }
    case 'spiking':
      return `Spike at ${point.target} concurrent`;
    case 'steady':
      return plan.pattern === 'ramp-up' ? 'Full load' : `Steady at ${point.target} concurrent`;
    default:
      return point.phase;
  }
}

/**
 * Drives a pool's concurrency limit from wall-clock time. Each tick reads the
 * elapsed time, computes the target and pushes it to the pool; once the plan's
 * duration has passed the pool is closed and the driver enters `draining`.
 */
export class LoadDriver {
  private state: LoadPhase = 'idle';
  private startedAt = 0;
  private timer: NodeJS.Timeout | null = null;
  private lastTarget = 0;
  private lastTickAt = 0;
  readonly transitions: Array<{ phase: LoadPhase; atMs: number }> = [];

  constructor(
    private plan: LoadPlan,
    private pool: ConcurrencyControl,
    private options: {
      now?: () => number;
      onPhase?: (phase: LoadPhase, atMs: number) => void;
    } = {}
  ) {}

  get phase(): LoadPhase {
    return this.state;
  }

  get target(): number {
    return this.lastTarget;
  }

  /** Label for the phase as of the last tick */
  get description(): string {
    if (this.state === 'ramping' || this.state === 'steady' || this.state === 'spiking') {
      return describePhase(this.plan, this.lastTickAt);
    }
    return this.state;
  }

  elapsed(): number {
    return this.state === 'idle' ? 0 : this.now() - this.startedAt;
  }

  start(): void {
    if (this.state !== 'idle') return;
    this.startedAt = this.now();
    this.tick();
    if (this.state !== 'draining') {
      this.timer = setInterval(() => this.tick(), this.plan.tickMs ?? DEFAULT_TICK_MS);
    }
  }

  tick(): TargetPoint {
    if (this.state === 'draining' || this.state === 'done') {
      return { phase: this.state, target: 0 };
    }
    this.lastTickAt = this.elapsed();
    const point = targetAt(this.plan, this.lastTickAt);
    this.lastTarget = point.target;
    this.enter(point.phase);
    if (point.phase === 'draining') {
      this.clearTimer();
      this.pool.close();
    } else {
      this.pool.setLimit(point.target);
    }
    return point;
  }

  /** Ends load generation early, e.g. on user abort */
  drain(): void {
    if (this.state === 'draining' || this.state === 'done') return;
    this.lastTarget = 0;
    this.enter('draining');
    this.clearTimer();
    this.pool.close();
  }

  finish(): void {
    this.clearTimer();
    this.enter('done');
  }

  private enter(phase: LoadPhase): void {
    if (phase === this.state) return;
    this.state = phase;
    const atMs = this.elapsed();
    this.transitions.push({ phase, atMs });
    this.options.onPhase?.(phase, atMs);
  }

  private clearTimer(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private now(): number {
    return this.options.now ? this.options.now() : performance.now();
  }
}
