import type { Plugin, StampedeContext } from './plugin-api.js';
import type {
  ExecutionUnit,
  Outcome,
  PerformanceResult,
  PerformanceSnapshot,
  RunCounts,
  RunReport,
  Suite,
} from './types.js';

type LoadCallback = (args: { path: string }) => Promise<{ suites: Suite[] } | null>;

export class PluginHost {
  private plugins: Plugin[] = [];

  // Callbacks
  private loaders: Array<{ filter: RegExp; callback: LoadCallback }> = [];
  private onPrepareCbs: ((suites: Suite[]) => Promise<Suite[]> | Suite[])[] = [];
  private onFetchCbs: ((req: Request) => Promise<Request> | Request)[] = [];
  private onRunStartCbs: ((suites: Suite[]) => Promise<void> | void)[] = [];
  private onRunEndCbs: ((report: RunReport) => Promise<void> | void)[] = [];
  private onTestStartCbs: ((unit: ExecutionUnit) => void)[] = [];
  private onTestEndCbs: ((outcome: Outcome, counts: RunCounts) => void)[] = [];
  private onPerfSnapshotCbs: ((snapshot: PerformanceSnapshot) => void)[] = [];
  private onPerfEndCbs: ((result: PerformanceResult) => Promise<void> | void)[] = [];

  public context: StampedeContext = {
    onLoad: (options, callback) => {
      this.loaders.push({ filter: options.filter, callback });
    },
    onPrepare: (callback) => {
      this.onPrepareCbs.push(callback);
    },
    onFetch: (callback) => {
      this.onFetchCbs.push(callback);
    },
    onRunStart: (callback) => {
      this.onRunStartCbs.push(callback);
    },
    onRunEnd: (callback) => {
      this.onRunEndCbs.push(callback);
    },
    onTestStart: (callback) => {
      this.onTestStartCbs.push(callback);
    },
    onTestEnd: (callback) => {
      this.onTestEndCbs.push(callback);
    },
    onPerfSnapshot: (callback) => {
      this.onPerfSnapshotCbs.push(callback);
    },
    onPerfEnd: (callback) => {
      this.onPerfEndCbs.push(callback);
    },
  };

  constructor(plugins: Plugin[]) {
    this.plugins = plugins;
  }

  public async setup(): Promise<void> {
    for (const plugin of this.plugins) {
      await plugin.setup(this.context);
    }
  }

  /** The first loader whose filter matches `path` wins */
  public async loadSuites(path: string): Promise<Suite[]> {
    const loader = this.loaders.find((l) => l.filter.test(path));
    if (!loader) return [];
    const result = await loader.callback({ path });
    return result?.suites || [];
  }

  public async prepareSuites(suites: Suite[]): Promise<Suite[]> {
    let result = suites;
    for (const cb of this.onPrepareCbs) {
      result = await cb(result);
    }
    return result;
  }

  public async transformRequest(req: Request): Promise<Request> {
    let result = req;
    for (const cb of this.onFetchCbs) {
      result = await cb(result);
    }
    return result;
  }

  public async dispatch(event: 'onRunStart', arg: Suite[]): Promise<void>;
  public async dispatch(event: 'onRunEnd', arg: RunReport): Promise<void>;
  public async dispatch(event: 'onPerfEnd', arg: PerformanceResult): Promise<void>;
  public async dispatch(
    event: 'onRunStart' | 'onRunEnd' | 'onPerfEnd',
    arg: Suite[] | RunReport | PerformanceResult
  ): Promise<void> {
    switch (event) {
      case 'onRunStart':
        if (Array.isArray(arg)) for (const cb of this.onRunStartCbs) await cb(arg);
        break;
      case 'onRunEnd':
        if ('runs' in arg) for (const cb of this.onRunEndCbs) await cb(arg);
        break;
      case 'onPerfEnd':
        if ('stats' in arg) for (const cb of this.onPerfEndCbs) await cb(arg);
        break;
    }
  }

  // Unit events fire from the scheduler's completion path and stay synchronous.
  public notifyTestStart(unit: ExecutionUnit): void {
    this.onTestStartCbs.forEach((cb) => cb(unit));
  }

  public notifyTestEnd(outcome: Outcome, counts: RunCounts): void {
    this.onTestEndCbs.forEach((cb) => cb(outcome, counts));
  }

  public notifyPerfSnapshot(snapshot: PerformanceSnapshot): void {
    this.onPerfSnapshotCbs.forEach((cb) => cb(snapshot));
  }
}
