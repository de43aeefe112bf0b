import type {
  ExecutionUnit,
  Outcome,
  PerformanceResult,
  PerformanceSnapshot,
  RunCounts,
  RunReport,
  Suite,
} from './types.js';

export interface StampedeContext {
  // Discovery Phase
  onLoad(options: { filter: RegExp }, callback: (args: { path: string }) => Promise<{ suites: Suite[] } | null>): void;

  // Preparation Phase: Modify/Filter suites before running
  onPrepare(callback: (suites: Suite[]) => Promise<Suite[]> | Suite[]): void;

  // Network Phase: Transform the native Request object before execution
  onFetch(callback: (req: Request) => Promise<Request> | Request): void;

  // Execution Lifecycle
  onRunStart(callback: (suites: Suite[]) => Promise<void> | void): void;
  onRunEnd(callback: (report: RunReport) => Promise<void> | void): void;

  // Unit Granularity
  onTestStart(callback: (unit: ExecutionUnit) => void): void;
  onTestEnd(callback: (outcome: Outcome, counts: RunCounts) => void): void;

  // Load runs
  onPerfSnapshot(callback: (snapshot: PerformanceSnapshot) => void): void;
  onPerfEnd(callback: (result: PerformanceResult) => Promise<void> | void): void;
}

export interface Plugin {
  name: string;
  setup: (ctx: StampedeContext) => void | Promise<void>;
}
