import { ConfigurationError } from './errors.js';
import type { CancelMode } from './types.js';

export type Completion<U, R> =
  | { unit: U; state: 'done'; result: R }
  | { unit: U; state: 'error'; error: unknown }
  | { unit: U; state: 'skipped'; reason: string }
  | { unit: U; state: 'cancelled'; reason: string };

export type Worker<U, R> = (unit: U, signal: AbortSignal) => Promise<R>;

export interface PoolOptions<R> {
  concurrency: number;
  /** Stop dispatching after the first failed result */
  bail?: boolean;
  isFailure?: (result: R) => boolean;
  /** Run-level abort, applied with `cancelMode` */
  signal?: AbortSignal;
  cancelMode?: CancelMode;
}

interface Cancellation {
  reason: string;
  mode: CancelMode;
}

/**
 * Bounded worker pool. Units are pulled from the input lazily, in order, and
 * at most `limit` are in flight at any instant. The limit may change while a
 * run is in progress: raising it dispatches immediately, lowering it lets the
 * excess finish without replacement.
 */
export class WorkerPool<U extends { index: number }, R> {
  private limit: number;
  private active = 0;
  private peak = 0;
  private closed = false;
  private cancellation: Cancellation | null = null;
  private wakers: Array<() => void> = [];
  private abandon = new AbortController();
  private dispatched = new Set<number>();

  constructor(private options: PoolOptions<R>) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 0) {
      throw new ConfigurationError(`Invalid concurrency bound ${options.concurrency}`);
    }
    this.limit = options.concurrency;
  }

  get inFlight(): number {
    return this.active;
  }

  get peakInFlight(): number {
    return this.peak;
  }

  get currentLimit(): number {
    return this.limit;
  }

  get cancelReason(): string | undefined {
    return this.cancellation?.reason;
  }

  setLimit(limit: number): void {
    this.limit = Number.isFinite(limit) ? Math.max(0, Math.floor(limit)) : 0;
    this.wake();
  }

  /** Stops pulling units without marking the rest of the input skipped */
  close(): void {
    this.closed = true;
    this.wake();
  }

  /**
   * Stops new dispatch immediately. `abandon` additionally settles every
   * in-flight unit as cancelled and aborts the signal its worker received.
   */
  cancel(reason: string, mode: CancelMode = 'graceful'): void {
    if (!this.cancellation) {
      this.cancellation = { reason, mode };
    } else if (mode === 'abandon') {
      this.cancellation.mode = 'abandon';
    }
    if (mode === 'abandon' && !this.abandon.signal.aborted) {
      this.abandon.abort(reason);
    }
    this.wake();
  }

  async run(
    units: Iterable<U>,
    worker: Worker<U, R>,
    onCompletion?: (completion: Completion<U, R>) => void
  ): Promise<Array<Completion<U, R>>> {
    const completions: Array<Completion<U, R>> = [];
    const emit = (completion: Completion<U, R>) => {
      completions.push(completion);
      onCompletion?.(completion);
    };

    const external = this.options.signal;
    const onAbort = () => this.cancel('aborted', this.options.cancelMode ?? 'graceful');
    if (external?.aborted) onAbort();
    external?.addEventListener('abort', onAbort, { once: true });

    const running = new Set<Promise<void>>();
    const iterator = units[Symbol.iterator]();
    try {
      for (;;) {
        await this.waitForSlot();
        if (this.cancellation || this.closed) break;
        const next = iterator.next();
        if (next.done) break;
        const unit = next.value;
        if (this.dispatched.has(unit.index)) {
          throw new Error(`Unit ${unit.index} was already dispatched`);
        }
        this.dispatched.add(unit.index);
        const task = this.launch(unit, worker, emit);
        running.add(task);
        void task.then(() => running.delete(task));
      }

      if (this.cancellation && !this.closed) {
        const reason = `not started: ${this.cancellation.reason}`;
        for (let next = iterator.next(); !next.done; next = iterator.next()) {
          emit({ unit: next.value, state: 'skipped', reason });
        }
      }

      await Promise.all(running);
    } finally {
      external?.removeEventListener('abort', onAbort);
    }
    return completions;
  }

  private async waitForSlot(): Promise<void> {
    while (!this.cancellation && !this.closed && this.active >= this.limit) {
      await new Promise<void>((resolve) => {
        this.wakers.push(resolve);
      });
    }
  }

  private wake(): void {
    const wakers = this.wakers;
    this.wakers = [];
    wakers.forEach((resolve) => resolve());
  }

  private async launch(unit: U, worker: Worker<U, R>, emit: (c: Completion<U, R>) => void): Promise<void> {
    this.active += 1;
    this.peak = Math.max(this.peak, this.active);
    const signal = this.abandon.signal;

    // First settlement wins, so an abandoned unit yields exactly one completion.
    const completion = await new Promise<Completion<U, R>>((resolve) => {
      const onAbandon = () => {
        resolve({ unit, state: 'cancelled', reason: this.cancellation?.reason ?? 'abandoned' });
      };
      if (signal.aborted) {
        onAbandon();
        return;
      }
      signal.addEventListener('abort', onAbandon, { once: true });
      worker(unit, signal).then(
        (result) => {
          signal.removeEventListener('abort', onAbandon);
          resolve({ unit, state: 'done', result });
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbandon);
          resolve({ unit, state: 'error', error });
        }
      );
    });

    this.active -= 1;
    emit(completion);

    if (this.options.bail && !this.cancellation) {
      const failed = completion.state === 'error'
        || (completion.state === 'done' && (this.options.isFailure?.(completion.result) ?? false));
      if (failed) this.cancel('bail');
    }
    this.wake();
  }
}
