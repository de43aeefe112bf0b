#!/usr/bin/env node
import { realpathSync, type Stats } from 'fs';
import { readdir, stat } from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';

import { HttpClient } from './http-client.js';
import { loadConfig, loadPlanOf, retryPolicyOf, type StampedeConfig } from './config.js';
import { evaluateCoverage, executedTuples } from './coverage.js';
import { ConfigurationError, SuiteLoadError, errorMessage } from './errors.js';
import { executePerformance } from './performance.js';
import RateLimiter from './rate-limiter.js';
import { execute } from './runner.js';
import { PluginHost } from './plugin-host.js';
import { coreLoaderPlugin, loadCatalog, loadDatasetFile, type Catalog } from './plugins/core-loader.js';
import { coreFilterPlugin } from './plugins/core-filter.js';
import { consoleReporterPlugin } from './plugins/console-reporter.js';
import type { Dataset, RunReport, RunResult, Suite } from './types.js';

export const EXIT_PASSED = 0;
export const EXIT_FAILED = 1;
export const EXIT_CONFIG = 2;

/** A file target is used as is; a directory is scanned (not recursively) with `filePattern`. */
export async function discoverSuitePaths(cfg: Pick<StampedeConfig, 'projectRoot' | 'testDir' | 'filePattern' | 'suiteFile'>): Promise<string[]> {
  const target = path.resolve(cfg.projectRoot, cfg.suiteFile ?? cfg.testDir);
  let info: Stats;
  try {
    info = await stat(target);
  } catch (error) {
    throw new ConfigurationError(`Cannot read ${target}`, [errorMessage(error)]);
  }
  if (info.isFile()) return [target];

  const pattern = new RegExp(cfg.filePattern);
  const files = await readdir(target);
  return files
    .filter((f) => pattern.test(f))
    .sort()
    .map((f) => path.join(target, f));
}

async function prepare(cfg: StampedeConfig) {
  const host = new PluginHost([
    coreLoaderPlugin,
    coreFilterPlugin(cfg),
    consoleReporterPlugin(cfg),
  ]);
  await host.setup();

  let suites: Suite[] = [];
  for (const p of await discoverSuitePaths(cfg)) {
    const loaded = await host.loadSuites(p);
    suites.push(...loaded);
  }
  if (suites.length === 0) {
    throw new ConfigurationError(`No suites found in ${cfg.suiteFile ?? cfg.testDir}`);
  }
  suites = await host.prepareSuites(suites);

  const api = new HttpClient({
    headers: cfg.headers,
    transform: (req) => host.transformRequest(req),
  });
  return { host, suites, api };
}

function abortOnInterrupt(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once('SIGINT', onInterrupt);
  return { signal: controller.signal, dispose: () => process.off('SIGINT', onInterrupt) };
}

async function runAllTests(cfg: StampedeConfig): Promise<number> {
  let catalog: Catalog | undefined;
  if (cfg.command === 'coverage' && !cfg.catalog) {
    throw new ConfigurationError('The coverage command needs --catalog <file>');
  }
  if (cfg.catalog) {
    catalog = await loadCatalog(path.resolve(cfg.projectRoot, cfg.catalog));
  }
  let dataset: Dataset | undefined;
  if (cfg.data) {
    const dataPath = path.resolve(cfg.projectRoot, cfg.data);
    try {
      dataset = { rows: await loadDatasetFile(dataPath) };
    } catch (error) {
      throw new SuiteLoadError(dataPath, errorMessage(error));
    }
  }

  const { host, suites, api } = await prepare(cfg);
  const rateLimiter = new RateLimiter(cfg.rps || Infinity);
  const interrupt = abortOnInterrupt();
  const startTime = Date.now();

  await host.dispatch('onRunStart', suites);
  const runs: RunResult[] = [];
  try {
    for (const suite of suites) {
      if (interrupt.signal.aborted) break;
      const result = await execute(suite, {
        transport: api,
        concurrency: cfg.concurrency,
        bail: cfg.bail,
        baseUrl: cfg.baseUrl,
        timeoutMs: cfg.timeout,
        retry: retryPolicyOf(cfg),
        dataset,
        env: process.env,
        envName: cfg.env,
        signal: interrupt.signal,
        cancelMode: cfg.cancelMode,
        rateLimiter,
        hooks: {
          onUnitStart: (unit) => host.notifyTestStart(unit),
          onOutcome: (outcome, counts) => host.notifyTestEnd(outcome, counts),
        },
      });
      runs.push(result);
      if (cfg.bail && !result.passed) break;
    }
  } finally {
    interrupt.dispose();
    rateLimiter.dispose();
  }

  const report: RunReport = {
    runs,
    passed: runs.length === suites.length && runs.every((r) => r.passed),
    durationMs: Date.now() - startTime,
    coverage: catalog
      ? evaluateCoverage(executedTuples(runs.flatMap((r) => r.outcomes)), catalog.entries, { basePath: catalog.basePath })
      : undefined,
  };
  await host.dispatch('onRunEnd', report);
  return report.passed ? EXIT_PASSED : EXIT_FAILED;
}

async function runPerformance(cfg: StampedeConfig): Promise<number> {
  const { host, suites, api } = await prepare(cfg);
  const plan = loadPlanOf(cfg);
  const interrupt = abortOnInterrupt();
  let exitCode = EXIT_PASSED;
  try {
    for (const suite of suites) {
      if (interrupt.signal.aborted) break;
      console.log(`🚀 Load testing ${suite.name}: ${plan.pattern}, ${plan.concurrency} users`);
      const result = await executePerformance(plan, { suiteName: suite.name, cases: suite.tests, vars: suite.vars }, {
        transport: api,
        baseUrl: cfg.baseUrl,
        timeoutMs: cfg.timeout,
        retry: retryPolicyOf(cfg),
        env: process.env,
        envName: cfg.env,
        signal: interrupt.signal,
        onSnapshot: (snapshot) => host.notifyPerfSnapshot(snapshot),
      });
      await host.dispatch('onPerfEnd', result);
      if (result.cancelReason) exitCode = EXIT_FAILED;
    }
  } finally {
    interrupt.dispose();
  }
  return exitCode;
}

export async function main(argv: string[] = process.argv, projectRoot: string = process.cwd()): Promise<number> {
  try {
    const cfg = await loadConfig(argv, projectRoot);
    return cfg.command === 'perf' ? await runPerformance(cfg) : await runAllTests(cfg);
  } catch (error) {
    if (error instanceof ConfigurationError || error instanceof SuiteLoadError) {
      console.error(`❌ ${error.message}`);
      return EXIT_CONFIG;
    }
    throw error;
  }
}

if (process.argv[1] && fileURLToPath(import.meta.url) === realpathSync(process.argv[1])) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = EXIT_FAILED;
    }
  );
}
