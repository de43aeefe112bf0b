/**
 * Token bucket refilled once per second. A non-positive or non-finite rate
 * disables limiting.
 */
class RateLimiter {
  private capacity: number;
  private tokens: number;
  private queue: Array<(granted: boolean) => void> = [];
  private intervalId: NodeJS.Timeout | null = null;

  constructor(rps?: number) {
    if (!rps || rps <= 0 || !Number.isFinite(rps)) {
      this.capacity = Infinity;
      this.tokens = Infinity;
      return;
    }
    this.capacity = rps;
    this.tokens = rps;
  }

  private ensureTimer() {
    if (this.intervalId || this.capacity === Infinity) return;
    this.intervalId = setInterval(() => {
      this.tokens = this.capacity;
      this.processQueue();
      if (this.queue.length === 0) this.stop();
    }, 1000);
  }

  private processQueue() {
    while (this.tokens > 0 && this.queue.length > 0) {
      this.tokens -= 1;
      const resolve = this.queue.shift();
      resolve?.(true);
    }
  }

  /** Resolves `false` when `signal` aborts before a token is granted */
  async acquire(signal?: AbortSignal): Promise<boolean> {
    if (this.capacity === Infinity) {
      return true;
    }
    this.ensureTimer();
    if (this.tokens > 0) {
      this.tokens -= 1;
      return true;
    }
    if (signal?.aborted) return false;
    return new Promise<boolean>((resolve) => {
      const onAbort = () => {
        this.queue = this.queue.filter((entry) => entry !== grant);
        resolve(false);
      };
      const grant = (granted: boolean) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(granted);
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.queue.push(grant);
    });
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
  }

  /** Releases every waiter without a token */
  dispose(): void {
    this.stop();
    const waiting = this.queue;
    this.queue = [];
    waiting.forEach((resolve) => resolve(false));
  }
}

export default RateLimiter;
