import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { createServer, type Server } from 'http';
import type { AddressInfo } from 'net';
import os from 'os';
import path from 'path';
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { EXIT_CONFIG, EXIT_FAILED, EXIT_PASSED, discoverSuitePaths, main } from '../../src/cli.js';

const root = mkdtempSync(path.join(os.tmpdir(), 'stampede-cli-'));
const testDir = path.join(root, 'test');
mkdirSync(testDir);
writeFileSync(path.join(testDir, 'health.stampede.yaml'), [
  'tests:',
  '  - name: health',
  '    request:',
  '      url: /health',
  '    expect:',
  '      status: 200',
  '      jsonpath:',
  '        $.status: ok',
].join('\n'));
writeFileSync(path.join(testDir, 'notes.txt'), 'not a suite');
writeFileSync(path.join(root, 'created.stampede.json'), JSON.stringify([
  { name: 'create', request: { method: 'POST', url: '/health' }, expect: { status: 201 } },
]));

let server: Server;
let baseUrl = '';

beforeAll(async () => {
  server = createServer((_req, res) => {
    res.writeHead(200, { 'content-type': 'application/json' });
    res.end('{"status":"ok"}');
  });
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address: AddressInfo | string | null = server.address();
  baseUrl = `http://127.0.0.1:${address !== null && typeof address === 'object' ? address.port : 0}`;
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
  rmSync(root, { recursive: true, force: true });
});

beforeEach(() => {
  vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

const argv = (...args: string[]) => ['node', 'stampede', ...args];

describe('discoverSuitePaths', () => {
  it('lists matching files of a directory in name order', async () => {
    const paths = await discoverSuitePaths({
      projectRoot: root,
      testDir: 'test',
      filePattern: '\\.stampede\\.(json|ya?ml)$',
    });
    expect(paths).toEqual([path.join(testDir, 'health.stampede.yaml')]);
  });

  it('uses a file target as is', async () => {
    const paths = await discoverSuitePaths({
      projectRoot: root,
      testDir: 'test',
      filePattern: 'never',
      suiteFile: 'created.stampede.json',
    });
    expect(paths).toEqual([path.join(root, 'created.stampede.json')]);
  });
});

describe('main', () => {
  it('exits cleanly when every suite passes', async () => {
    expect(await main(argv('--base-url', baseUrl, '--test-dir', 'test'), root)).toBe(EXIT_PASSED);
  });

  it('exits with a failure code when a test fails', async () => {
    expect(await main(argv('created.stampede.json', '--base-url', baseUrl), root)).toBe(EXIT_FAILED);
  });

  it('exits with the configuration code on bad input', async () => {
    expect(await main(argv('--concurrency', '0'), root)).toBe(EXIT_CONFIG);
    expect(await main(argv('--test-dir', 'missing'), root)).toBe(EXIT_CONFIG);
    expect(await main(argv('coverage', '--test-dir', 'test'), root)).toBe(EXIT_CONFIG);
    expect(console.error).toHaveBeenCalledWith('❌ The coverage command needs --catalog <file>');
  });
});
