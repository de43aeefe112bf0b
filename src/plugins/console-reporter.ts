import type { Plugin } from '../plugin-api.js';
import type {
  CoverageReport,
  FailureDetail,
  MetricsSnapshot,
  Outcome,
  PerformanceSnapshot,
  RunCounts,
  RunReport,
} from '../types.js';

export interface ReporterOptions {
  baseUrl?: string;
  verbose?: boolean;
  /** Defaults to stdout */
  write?: (text: string) => void;
}

function red(text: string): string {
  return `\u001b[31m${text}\u001b[39m`;
}

function green(text: string): string {
  return `\u001b[32m${text}\u001b[39m`;
}

function yellow(text: string): string {
  return `\u001b[33m${text}\u001b[39m`;
}

export function drawProgressBar(
  passed: number,
  failed: number,
  skipped: number,
  total: number,
  width: number = 30
): string {
  const passedWidth = Math.round((passed / total) * width) || 0;
  const failedWidth = Math.round((failed / total) * width) || 0;
  const skippedWidth = Math.min(Math.round((skipped / total) * width) || 0, Math.max(0, width - passedWidth - failedWidth));
  const pendingWidth = Math.max(0, width - passedWidth - failedWidth - skippedWidth);

  const passedBar = green('█'.repeat(passedWidth));
  const failedBar = red('█'.repeat(failedWidth));
  const skippedBar = '▒'.repeat(skippedWidth);
  const pendingBar = '░'.repeat(pendingWidth);

  return `[${passedBar}${failedBar}${skippedBar}${pendingBar}]`;
}

export function statusIcon(outcome: Outcome): string {
  switch (outcome.status) {
    case 'passed':
      return '✅';
    case 'flaky':
      return '⚠️';
    case 'skipped':
      return '⏭️';
    case 'cancelled':
      return '🛑';
    default:
      return outcome.failures.some((f) => f.kind === 'transport' && f.reason === 'timeout') ? '⏰' : '❌';
  }
}

function describeFailure(failure: FailureDetail): string {
  return failure.kind === 'transport' ? `${failure.reason}: ${failure.message}` : failure.message;
}

function outcomeLabel(outcome: Outcome): string {
  const row = outcome.rowIndex !== undefined ? ` [row ${outcome.rowIndex + 1}]` : '';
  const phase = outcome.phase === 'main' ? '' : ` (${outcome.phase})`;
  const attempts = outcome.attempts > 1 ? `, ${outcome.attempts} attempts` : '';
  return `${outcome.name}${row}${phase} (${outcome.durationMs}ms${attempts})`;
}

function kb(bytesPerSecond: number): string {
  return (bytesPerSecond / 1024).toFixed(1);
}

function ms(value: number): string {
  return `${Number(value.toFixed(2))}ms`;
}

export function formatLatency(stats: MetricsSnapshot): string {
  const approx = stats.approximate ? ' (approximate)' : '';
  return `⏱️  Latency: min ${ms(stats.minLatency)}; avg ${ms(stats.meanLatency)}; max ${ms(stats.maxLatency)}; `
    + `p50 ${ms(stats.p50)}; p95 ${ms(stats.p95)}; p99 ${ms(stats.p99)}${approx}`;
}

export function formatCoverage(coverage: CoverageReport): string[] {
  const lines = [`\n🧭 Coverage: ${coverage.hit}/${coverage.total} (${coverage.percent}%)`];
  for (const entry of coverage.entries) {
    const icon = entry.covered ? '✅' : '❌';
    const missed = entry.missed.length > 0 ? red(` missed ${entry.missed.join(', ')}`) : '';
    const unexpected = entry.unexpected.length > 0 ? yellow(` unexpected ${entry.unexpected.join(', ')}`) : '';
    const hit = entry.hit.length > 0 ? ` hit ${entry.hit.join(', ')}` : '';
    lines.push(`  [${icon}] ${entry.method} ${entry.path}${hit}${missed}${unexpected}`);
  }
  if (coverage.uncatalogued.length > 0) {
    lines.push(`  Uncatalogued:`);
    coverage.uncatalogued.forEach((t) => lines.push(`    - ${t.method} ${t.path} → ${t.status}`));
  }
  return lines;
}

function countsLine(counts: RunCounts): string {
  const parts = [`${counts.passed + counts.flaky}/${counts.total - counts.skipped} passed`];
  if (counts.flaky > 0) parts.push(`${counts.flaky} flaky`);
  if (counts.failed > 0) parts.push(`${counts.failed} failed`);
  if (counts.skipped > 0) parts.push(`${counts.skipped} skipped`);
  if (counts.cancelled > 0) parts.push(`${counts.cancelled} cancelled`);
  return parts.join(', ');
}

export function formatPerfLine(snapshot: PerformanceSnapshot): string {
  const seconds = (snapshot.elapsedMs / 1000).toFixed(1);
  const errors = (snapshot.errorRate * 100).toFixed(1);
  return `  [${seconds}s] ${snapshot.description} target ${snapshot.target} in-flight ${snapshot.inFlight} | `
    + `${snapshot.count} req, ${snapshot.throughput.toFixed(1)} req/s, p95 ${ms(snapshot.p95)}, errors ${errors}%`;
}

export const consoleReporterPlugin = (cfg: ReporterOptions): Plugin => ({
  name: 'console-reporter',
  setup(ctx) {
    const write = cfg.write ?? ((text: string) => process.stdout.write(text));
    const log = (text: string) => write(`${text}\n`);
    let totalTests = 0;

    ctx.onRunStart((suites) => {
      log(`🚀 Starting API tests against ${cfg.baseUrl ?? 'the configured endpoints'}`);
      log('='.repeat(50));
      totalTests = suites.reduce((n, s) => {
        const rows = s.dataset && s.dataset.rows.length > 0 ? s.dataset.rows.length : 1;
        return n + s.setup.length + s.tests.length * rows + s.teardown.length;
      }, 0);
    });

    let passedTests = 0;
    let failedTests = 0;
    let skippedTests = 0;
    ctx.onTestEnd((outcome) => {
      if (outcome.status === 'passed' || outcome.status === 'flaky') {
        passedTests++;
      } else if (outcome.status === 'skipped') {
        skippedTests++;
      } else {
        failedTests++;
      }
      const progress = passedTests + failedTests + skippedTests;
      const total = Math.max(totalTests, progress);
      const bar = drawProgressBar(passedTests, failedTests, skippedTests, total);
      const percentage = ((progress / total) * 100).toFixed(0);
      write(`  Progress: ${bar} ${percentage}% (${progress}/${total})\r`);
    });

    ctx.onRunEnd((report) => {
      write('\n'); // Clear progress bar line

      log('\n📊 Test Summary:');
      for (const run of report.runs) {
        for (const suite of run.suites) {
          log(`\n🗂️  Suite: ${suite.name}`);
          run.outcomes
            .filter((o) => o.suiteName === suite.name)
            .forEach((outcome) => {
              log(`  [${statusIcon(outcome)}] ${outcomeLabel(outcome)}`);
              if (outcome.status === 'failed' || outcome.status === 'cancelled') {
                outcome.failures.forEach((f) => log(red(`    - ${describeFailure(f)}`)));
              } else if (outcome.status === 'skipped' && cfg.verbose) {
                outcome.failures.forEach((f) => log(`    - ${f.message}`));
              }
              if (cfg.verbose && outcome.snapshot) {
                const { request, response } = outcome.snapshot;
                log(`    → ${request.method} ${request.url}`);
                if (response) log(`    ← ${response.status} ${response.body.slice(0, 200)}`);
              }
            });
        }
        if (run.cancelReason) log(yellow(`  Run stopped early: ${run.cancelReason}`));
      }

      const counts = report.runs.reduce<RunCounts>((acc, run) => {
        acc.total += run.counts.total;
        acc.passed += run.counts.passed;
        acc.failed += run.counts.failed;
        acc.skipped += run.counts.skipped;
        acc.flaky += run.counts.flaky;
        acc.cancelled += run.counts.cancelled;
        acc.pending += run.counts.pending;
        return acc;
      }, { total: 0, passed: 0, failed: 0, skipped: 0, flaky: 0, cancelled: 0, pending: 0 });

      log('\n' + '='.repeat(50));
      log(`✨ Tests completed: ${countsLine(counts)}`);
      report.runs.forEach((run) => {
        if (run.latency.count > 0 && report.runs.length > 1) {
          log(`  ${run.suites.map((s) => s.name).join(', ')}`);
        }
        if (run.latency.count > 0) log(formatLatency(run.latency));
      });
      if (report.coverage) formatCoverage(report.coverage).forEach(log);
      log(`⏱️  Testing time: ${(report.durationMs / 1000).toFixed(2)}s`);
    });

    ctx.onPerfSnapshot((snapshot) => {
      log(formatPerfLine(snapshot));
    });

    ctx.onPerfEnd((result) => {
      const { stats } = result;
      log('\n📈 Performance Summary:');
      log(`  Pattern: ${result.plan.pattern}, ${result.plan.concurrency} users for ${(result.plan.durationMs / 1000).toFixed(1)}s`);
      log(`  Requests: ${stats.count} (${stats.throughput.toFixed(2)} req/s)`);
      log(`  Errors: ${stats.errorCount} (${(stats.errorRate * 100).toFixed(2)}%), ${stats.connectionErrors} connection`);
      log(`  Transfer: ${kb(stats.bytesSentPerSecond)} KB/s sent, ${kb(stats.bytesReceivedPerSecond)} KB/s received`);
      log(`  Peak in flight: ${result.peakInFlight}`);
      const codes = Object.entries(stats.statusCodes).map(([code, n]) => `${code}×${n}`).join(', ');
      if (codes) log(`  Status codes: ${codes}`);
      log(formatLatency(stats));
      if (result.cancelReason) log(yellow(`  Stopped early: ${result.cancelReason}`));
    });
  },
});
