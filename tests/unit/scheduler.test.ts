import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../../src/errors.js';
import { WorkerPool, type Completion } from '../../src/scheduler.js';

interface Unit {
  index: number;
  name: string;
}

function units(...names: string[]): Unit[] {
  return names.map((name, index) => ({ index, name }));
}

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

function summary(completions: Array<Completion<Unit, string>>): string[] {
  return completions.map((c) => {
    switch (c.state) {
      case 'done':
        return `${c.unit.name}:${c.result}`;
      case 'error':
        return `${c.unit.name}:error`;
      default:
        return `${c.unit.name}:${c.state}:${c.reason}`;
    }
  });
}

describe('WorkerPool', () => {
  it('never exceeds the concurrency bound', async () => {
    let active = 0;
    let peak = 0;
    const pool = new WorkerPool<Unit, string>({ concurrency: 3 });
    const completions = await pool.run(units('a', 'b', 'c', 'd', 'e', 'f', 'g', 'h', 'i', 'j'), async (unit) => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 2 + (unit.index % 3)));
      active -= 1;
      return 'ok';
    });
    expect(completions).toHaveLength(10);
    expect(peak).toBe(3);
    expect(pool.peakInFlight).toBe(3);
    expect(pool.inFlight).toBe(0);
  });

  it('stops dispatch after the first failure in bail mode', async () => {
    const gates = new Map<string, ReturnType<typeof deferred<string>>>();
    const started: string[] = [];
    const pool = new WorkerPool<Unit, string>({
      concurrency: 2,
      bail: true,
      isFailure: (result) => result === 'fail',
    });
    const run = pool.run(units('A', 'B', 'C', 'D'), (unit) => {
      started.push(unit.name);
      const gate = deferred<string>();
      gates.set(unit.name, gate);
      return gate.promise;
    });

    await tick();
    expect(started).toEqual(['A', 'B']);

    gates.get('B')?.resolve('ok');
    await tick();
    expect(started).toEqual(['A', 'B', 'C']);

    gates.get('A')?.resolve('fail');
    await tick();
    gates.get('C')?.resolve('ok');

    const completions = await run;
    expect(started).toEqual(['A', 'B', 'C']);
    expect(summary(completions)).toEqual(['B:ok', 'A:fail', 'D:skipped:not started: bail', 'C:ok']);
    expect(pool.cancelReason).toBe('bail');
  });

  it('settles in-flight units as cancelled when abandoned', async () => {
    const controller = new AbortController();
    const seenSignals: AbortSignal[] = [];
    const pool = new WorkerPool<Unit, string>({ concurrency: 2, signal: controller.signal, cancelMode: 'abandon' });
    const run = pool.run(units('a', 'b', 'c'), (_unit, signal) => {
      seenSignals.push(signal);
      return new Promise<string>(() => undefined);
    });

    await tick();
    controller.abort();
    const completions = await run;

    expect(summary(completions).sort()).toEqual([
      'a:cancelled:aborted',
      'b:cancelled:aborted',
      'c:skipped:not started: aborted',
    ]);
    expect(seenSignals.every((s) => s.aborted)).toBe(true);
  });

  it('lets in-flight units finish on graceful cancellation', async () => {
    const gate = deferred<string>();
    const pool = new WorkerPool<Unit, string>({ concurrency: 1 });
    const run = pool.run(units('a', 'b'), () => gate.promise);

    await tick();
    pool.cancel('user');
    gate.resolve('ok');

    expect(summary(await run).sort()).toEqual(['a:ok', 'b:skipped:not started: user']);
  });

  it('reports worker rejections as errors', async () => {
    const pool = new WorkerPool<Unit, string>({ concurrency: 1 });
    const completions = await pool.run(units('a'), () => Promise.reject(new Error('boom')));
    expect(summary(completions)).toEqual(['a:error']);
  });

  it('dispatches more work when the limit is raised', async () => {
    const started: string[] = [];
    const pool = new WorkerPool<Unit, string>({ concurrency: 0 });
    const run = pool.run(units('a', 'b', 'c'), async (unit) => {
      started.push(unit.name);
      return 'ok';
    });

    await tick();
    expect(started).toEqual([]);
    pool.setLimit(2);
    await tick();
    pool.close();
    await run;
    expect(started.slice(0, 2)).toEqual(['a', 'b']);
  });

  it('refuses to dispatch the same index twice', async () => {
    const pool = new WorkerPool<Unit, string>({ concurrency: 2 });
    const duplicate = [{ index: 0, name: 'a' }, { index: 0, name: 'b' }];
    await expect(pool.run(duplicate, async () => 'ok')).rejects.toThrow(/already dispatched/);
  });

  it('rejects an invalid bound', () => {
    expect(() => new WorkerPool<Unit, string>({ concurrency: -1 })).toThrow(ConfigurationError);
    expect(() => new WorkerPool<Unit, string>({ concurrency: 1.5 })).toThrow(ConfigurationError);
  });
});
