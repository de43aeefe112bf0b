import { describe, expect, it } from 'vitest';
import { PluginHost } from '../../src/plugin-host.js';
import {
  consoleReporterPlugin,
  drawProgressBar,
  formatCoverage,
  formatLatency,
  formatPerfLine,
  statusIcon,
} from '../../src/plugins/console-reporter.js';
import type { MetricsSnapshot, Outcome, RunReport } from '../../src/types.js';

const stats: MetricsSnapshot = {
  final: true,
  elapsedMs: 1_000,
  count: 4,
  errorCount: 0,
  connectionErrors: 0,
  errorRate: 0,
  throughput: 4,
  meanLatency: 2.5,
  minLatency: 1,
  maxLatency: 10,
  p50: 2,
  p95: 9,
  p99: 10,
  approximate: false,
  statusCodes: { '200': 4 },
  bytesSent: 0,
  bytesReceived: 4_096,
  bytesSentPerSecond: 0,
  bytesReceivedPerSecond: 4_096,
};

function outcome(fields: Partial<Outcome>): Outcome {
  return {
    index: 0,
    name: 'a',
    suiteName: 'users',
    phase: 'main',
    status: 'passed',
    attempts: 1,
    durationMs: 5,
    failures: [],
    ...fields,
  };
}

describe('formatting helpers', () => {
  it('formats latency statistics', () => {
    expect(formatLatency(stats)).toBe('⏱️  Latency: min 1ms; avg 2.5ms; max 10ms; p50 2ms; p95 9ms; p99 10ms');
    expect(formatLatency({ ...stats, approximate: true }).endsWith(' (approximate)')).toBe(true);
  });

  it('lists coverage per catalog entry', () => {
    expect(formatCoverage({
      entries: [{ method: 'GET', path: '/users/{id}', expected: [200, 404], hit: [200], missed: [404], unexpected: [], covered: true }],
      uncatalogued: [{ method: 'DELETE', path: '/users/1', status: 204 }],
      hit: 1,
      total: 2,
      percent: 50,
    })).toEqual([
      '\n🧭 Coverage: 1/2 (50%)',
      '  [✅] GET /users/{id} hit 200\u001b[31m missed 404\u001b[39m',
      '  Uncatalogued:',
      '    - DELETE /users/1 → 204',
    ]);
  });

  it('picks an icon per outcome', () => {
    expect(statusIcon(outcome({ status: 'flaky' }))).toBe('⚠️');
    expect(statusIcon(outcome({
      status: 'failed',
      failures: [{ kind: 'transport', reason: 'timeout', message: 'Timeout after 50ms' }],
    }))).toBe('⏰');
    expect(statusIcon(outcome({ status: 'failed' }))).toBe('❌');
  });

  it('draws a fixed-width progress bar', () => {
    expect(drawProgressBar(0, 0, 0, 4, 4)).toBe('[\u001b[32m\u001b[39m\u001b[31m\u001b[39m░░░░]');
    expect(drawProgressBar(2, 1, 0, 4, 4)).toBe('[\u001b[32m██\u001b[39m\u001b[31m█\u001b[39m░]');
  });

  it('keeps skipped work out of the passed segment', () => {
    expect(drawProgressBar(1, 0, 2, 4, 4)).toBe('[\u001b[32m█\u001b[39m\u001b[31m\u001b[39m▒▒░]');
  });

  it('prints the phase description on perf lines', () => {
    expect(formatPerfLine({
      ...stats,
      final: false,
      elapsedMs: 2_500,
      phase: 'ramping',
      description: 'Ramping up (25%)',
      target: 3,
      inFlight: 2,
    })).toBe('  [2.5s] Ramping up (25%) target 3 in-flight 2 | 4 req, 4.0 req/s, p95 9ms, errors 0.0%');
  });
});

describe('consoleReporterPlugin', () => {
  it('prints a summary when the run ends', async () => {
    let output = '';
    const host = new PluginHost([consoleReporterPlugin({ baseUrl: 'http://api.test', write: (text) => { output += text; } })]);
    await host.setup();

    await host.dispatch('onRunStart', [{ name: 'users', vars: {}, setup: [], tests: [], teardown: [] }]);
    const failure = 'Status mismatch: expected 200, got 500';
    const report: RunReport = {
      passed: false,
      durationMs: 1_500,
      runs: [{
        final: true,
        passed: false,
        counts: { total: 2, passed: 1, failed: 1, skipped: 0, flaky: 0, cancelled: 0, pending: 0 },
        durationMs: 1_500,
        outcomes: [
          outcome({}),
          outcome({
            index: 1,
            name: 'b',
            status: 'failed',
            attempts: 2,
            durationMs: 7,
            failures: [{
              kind: 'assertion',
              message: failure,
              mismatch: { check: 'status', locator: 'status', reason: 'unequal', expected: 200, actual: 500, message: failure },
            }],
          }),
        ],
        suites: [{ name: 'users', passed: false, counts: { total: 2, passed: 1, failed: 1, skipped: 0, flaky: 0, cancelled: 0, pending: 0 }, cases: [] }],
        latency: { ...stats, count: 0 },
      }],
    };
    await host.dispatch('onRunEnd', report);

    const lines = output.split('\n');
    expect(lines[0]).toBe('🚀 Starting API tests against http://api.test');
    expect(lines).toContain('  [✅] a (5ms)');
    expect(lines).toContain('  [❌] b (7ms, 2 attempts)');
    expect(lines).toContain(`\u001b[31m    - ${failure}\u001b[39m`);
    expect(lines).toContain('✨ Tests completed: 1/2 passed, 1 failed');
    expect(lines).toContain('⏱️  Testing time: 1.50s');
  });

  it('prints a performance summary', async () => {
    let output = '';
    const host = new PluginHost([consoleReporterPlugin({ write: (text) => { output += text; } })]);
    await host.setup();

    await host.dispatch('onPerfEnd', {
      plan: { pattern: 'constant', concurrency: 2, durationMs: 1_000 },
      stats: { ...stats, errorCount: 1, connectionErrors: 1, errorRate: 0.25 },
      phases: [],
      peakInFlight: 2,
    });

    const lines = output.split('\n');
    expect(lines).toContain('  Pattern: constant, 2 users for 1.0s');
    expect(lines).toContain('  Errors: 1 (25.00%), 1 connection');
    expect(lines).toContain('  Transfer: 0.0 KB/s sent, 4.0 KB/s received');
  });
});
