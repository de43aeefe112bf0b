import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { afterAll, describe, expect, it } from 'vitest';
import { loadConfig, loadPlanOf, parseArgs, retryPolicyOf } from '../../src/config.js';
import { ConfigurationError } from '../../src/errors.js';

const argv = (...args: string[]) => ['node', 'stampede', ...args];

function projectDir(config?: string): string {
  const dir = mkdtempSync(path.join(os.tmpdir(), 'stampede-config-'));
  writeFileSync(path.join(dir, 'package.json'), '{ "type": "module" }');
  if (config) writeFileSync(path.join(dir, 'stampede.config.js'), config);
  dirs.push(dir);
  return dir;
}

const dirs: string[] = [];
afterAll(() => dirs.forEach((dir) => rmSync(dir, { recursive: true, force: true })));

describe('parseArgs', () => {
  it('reads the command, the suite file and flags', () => {
    expect(parseArgs(argv('perf', 'users.stampede.yaml', '--users=5', '--bail', '--tags', 'smoke, auth', '--grep', 'login')))
      .toEqual({
        command: 'perf',
        suiteFile: 'users.stampede.yaml',
        users: '5',
        bail: true,
        tags: ['smoke', 'auth'],
        filter: 'login',
      });
  });

  it('treats a first positional that is not a command as the suite file', () => {
    expect(parseArgs(argv('suite.json', '--verbose=false'))).toEqual({ suiteFile: 'suite.json', verbose: false });
  });

  it('rejects unknown flags, missing values and extra arguments', () => {
    expect(() => parseArgs(argv('--nope'))).toThrow('Unknown option --nope');
    expect(() => parseArgs(argv('--timeout'))).toThrow('Option --timeout needs a value');
    expect(() => parseArgs(argv('--timeout', '--bail'))).toThrow('Option --timeout needs a value');
    expect(() => parseArgs(argv('a.json', 'b.json'))).toThrow('Unexpected argument b.json');
  });
});

describe('loadConfig', () => {
  it('applies defaults and coerces flag values', async () => {
    const root = projectDir();
    const cfg = await loadConfig(
      argv('--concurrency', '4', '--timeout', '5s', '--retries', '2', '--retry-on', '502,503'),
      root
    );
    expect(cfg).toMatchObject({
      command: 'run',
      concurrency: 4,
      timeout: 5_000,
      retries: 2,
      retryOn: [502, 503],
      testDir: './test',
      cancelMode: 'graceful',
      projectRoot: root,
    });
    expect(retryPolicyOf(cfg)).toEqual({
      maxAttempts: 3,
      baseBackoff: 200,
      backoffMultiplier: 2,
      retryableStatuses: [502, 503],
      retryAssertions: false,
    });
  });

  it('layers the project config under command-line flags', async () => {
    const root = projectDir(
      "export default { concurrency: 3, baseUrl: 'http://api.test', headers: { 'x-team': 'qa' } };\n"
    );
    const cfg = await loadConfig(argv('--concurrency', '6'), root);
    expect(cfg.concurrency).toBe(6);
    expect(cfg.baseUrl).toBe('http://api.test');
    expect(cfg.headers).toEqual({ 'x-team': 'qa' });
  });

  it('reads an explicit config file relative to the project', async () => {
    const root = projectDir();
    writeFileSync(path.join(root, 'ci.config.js'), 'export default { bail: true, verbose: true };\n');
    const cfg = await loadConfig(argv('--config', 'ci.config.js'), root);
    expect(cfg.bail).toBe(true);
    expect(cfg.verbose).toBe(true);
  });

  it('rejects invalid values with every issue', async () => {
    const root = projectDir();
    await expect(loadConfig(argv('--concurrency', '0'), root)).rejects.toThrow(ConfigurationError);
    await expect(loadConfig(argv('--filter', '('), root)).rejects.toThrow(/filter: /);
    await expect(loadConfig(argv('--duration', 'soon'), root)).rejects.toThrow("duration: Invalid duration 'soon'");
    await expect(loadConfig(argv('--pattern', 'wave'), root)).rejects.toThrow(/pattern: /);
  });
});

describe('loadPlanOf', () => {
  it('ramps over the first third of the run by default', async () => {
    const cfg = await loadConfig(argv('perf', '--pattern', 'ramp-up', '--users', '9', '--duration', '30s'), projectDir());
    expect(loadPlanOf(cfg)).toEqual({
      pattern: 'ramp-up',
      concurrency: 9,
      durationMs: 30_000,
      reportIntervalMs: 1_000,
      rampMs: 10_000,
    });
  });

  it('passes spike options through', async () => {
    const cfg = await loadConfig(
      argv('perf', '--pattern', 'spike', '--users', '2', '--spike-peak', '8', '--spike-every', '10s', '--spike-length', '2s'),
      projectDir()
    );
    expect(loadPlanOf(cfg)).toMatchObject({
      pattern: 'spike',
      concurrency: 2,
      spike: { peak: 8, everyMs: 10_000, lengthMs: 2_000 },
    });
  });
});
