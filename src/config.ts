import path from 'path';
import { existsSync } from 'fs';
import { pathToFileURL } from 'url';
import { z } from 'zod';
import defaultConfig from './default.config.js';
import { ConfigurationError, errorMessage } from './errors.js';
import type { RetryPolicy } from './retry.js';
import { durationSchema, formatIssues } from './schemas.js';
import type { LoadPlan } from './types.js';

export const COMMANDS = ['run', 'perf', 'coverage'] as const;
export type Command = (typeof COMMANDS)[number];

export const PROJECT_CONFIG_FILE = 'stampede.config.js';

type FlagKind = 'string' | 'boolean' | 'list';

const FLAGS: Record<string, { key: string; kind: FlagKind }> = {
  config: { key: 'configFile', kind: 'string' },
  'base-url': { key: 'baseUrl', kind: 'string' },
  'test-dir': { key: 'testDir', kind: 'string' },
  'file-pattern': { key: 'filePattern', kind: 'string' },
  concurrency: { key: 'concurrency', kind: 'string' },
  parallel: { key: 'concurrency', kind: 'string' },
  bail: { key: 'bail', kind: 'boolean' },
  timeout: { key: 'timeout', kind: 'string' },
  retries: { key: 'retries', kind: 'string' },
  backoff: { key: 'backoff', kind: 'string' },
  'backoff-multiplier': { key: 'backoffMultiplier', kind: 'string' },
  'retry-on': { key: 'retryOn', kind: 'list' },
  env: { key: 'env', kind: 'string' },
  data: { key: 'data', kind: 'string' },
  filter: { key: 'filter', kind: 'string' },
  grep: { key: 'filter', kind: 'string' },
  tags: { key: 'tags', kind: 'list' },
  randomize: { key: 'randomize', kind: 'boolean' },
  rps: { key: 'rps', kind: 'string' },
  catalog: { key: 'catalog', kind: 'string' },
  'cancel-mode': { key: 'cancelMode', kind: 'string' },
  verbose: { key: 'verbose', kind: 'boolean' },
  pattern: { key: 'pattern', kind: 'string' },
  users: { key: 'users', kind: 'string' },
  concurrent: { key: 'users', kind: 'string' },
  duration: { key: 'duration', kind: 'string' },
  ramp: { key: 'ramp', kind: 'string' },
  'spike-peak': { key: 'spikePeak', kind: 'string' },
  'spike-every': { key: 'spikeEvery', kind: 'string' },
  'spike-length': { key: 'spikeLength', kind: 'string' },
  'report-interval': { key: 'reportInterval', kind: 'string' },
  'max-samples': { key: 'maxSamples', kind: 'string' },
};

const configSchema = z.object({
  command: z.enum(COMMANDS).default('run'),
  configFile: z.string().optional(),
  suiteFile: z.string().optional(),
  baseUrl: z.string().url().optional(),
  testDir: z.string(),
  filePattern: z.string(),
  concurrency: z.coerce.number().int().min(1),
  bail: z.boolean(),
  timeout: durationSchema.pipe(z.number().positive()),
  /** Extra attempts after the first */
  retries: z.coerce.number().int().min(0),
  backoff: durationSchema,
  backoffMultiplier: z.coerce.number().min(1),
  retryOn: z.array(z.coerce.number().int().min(100).max(599)),
  env: z.string().optional(),
  data: z.string().optional(),
  filter: z.string().optional(),
  tags: z.array(z.string()),
  randomize: z.boolean(),
  rps: z.coerce.number().positive().optional(),
  catalog: z.string().optional(),
  cancelMode: z.enum(['graceful', 'abandon']),
  verbose: z.boolean(),
  headers: z.record(z.string()),
  pattern: z.enum(['constant', 'ramp-up', 'spike']),
  users: z.coerce.number().int().min(1),
  duration: durationSchema.pipe(z.number().positive()),
  ramp: durationSchema.optional(),
  spikePeak: z.coerce.number().int().min(1).optional(),
  spikeEvery: durationSchema.optional(),
  spikeLength: durationSchema.optional(),
  reportInterval: durationSchema.pipe(z.number().min(1)),
  maxSamples: z.coerce.number().int().min(1).optional(),
}).superRefine((cfg, ctx) => {
  if (cfg.filter) {
    try {
      new RegExp(cfg.filter, 'i');
    } catch (error) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['filter'], message: errorMessage(error) });
    }
  }
  try {
    new RegExp(cfg.filePattern);
  } catch (error) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['filePattern'], message: errorMessage(error) });
  }
});

export type StampedeConfig = z.output<typeof configSchema> & { projectRoot: string };

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function splitList(value: string): string[] {
  return value.split(',').map((t) => t.trim()).filter(Boolean);
}

export function parseArgs(argv: string[]): RawConfig {
  const args = argv.slice(2);
  const raw: RawConfig = {};
  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const [key, ...rest] = arg.slice(2).split('=');
      const flag = FLAGS[key];
      if (!flag) {
        throw new ConfigurationError(`Unknown option --${key}`);
      }
      let value: string | undefined = rest.length > 0 ? rest.join('=') : undefined;
      if (flag.kind === 'boolean') {
        raw[flag.key] = value === undefined ? true : value !== 'false';
      } else {
        if (value === undefined) {
          const next = args[i + 1];
          if (next === undefined || next.startsWith('--')) {
            throw new ConfigurationError(`Option --${key} needs a value`);
          }
          value = next;
          i += 1;
        }
        raw[flag.key] = flag.kind === 'list' ? splitList(value) : value;
      }
    } else if (raw.command === undefined && raw.suiteFile === undefined && COMMANDS.some((c) => c === arg)) {
      raw.command = arg;
    } else if (raw.suiteFile === undefined) {
      raw.suiteFile = arg;
    } else {
      throw new ConfigurationError(`Unexpected argument ${arg}`);
    }
    i += 1;
  }
  return raw;
}

async function importConfig(filePath: string): Promise<RawConfig> {
  let mod: { default?: unknown };
  try {
    mod = await import(pathToFileURL(filePath).href);
  } catch (error) {
    throw new ConfigurationError(`Cannot load config ${filePath}`, [errorMessage(error)]);
  }
  const exported = mod.default ?? mod;
  if (!isRecord(exported)) {
    throw new ConfigurationError(`Config ${filePath} must export an object`);
  }
  return exported;
}

/**
 * Defaults, then the project's `stampede.config.js`, then `--config`, then
 * command-line flags. The merged result is validated before anything runs.
 */
export async function loadConfig(argv = process.argv, projectRoot = process.cwd()): Promise<StampedeConfig> {
  const cliOpts = parseArgs(argv);
  // first load default config.
  let cfg: RawConfig = { ...defaultConfig };

  // then load project config.
  const projectCfgPath = path.join(projectRoot, PROJECT_CONFIG_FILE);
  if (existsSync(projectCfgPath)) {
    cfg = { ...cfg, ...(await importConfig(projectCfgPath)) };
  }

  // then load invocation-time project config.
  if (typeof cliOpts.configFile === 'string') {
    cfg = { ...cfg, ...(await importConfig(path.resolve(projectRoot, cliOpts.configFile))) };
  }

  // then apply cli options over the configs.
  cfg = { ...cfg, ...cliOpts };

  const parsed = configSchema.safeParse(cfg);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid configuration', formatIssues(parsed.error));
  }
  return { ...parsed.data, projectRoot };
}

export function retryPolicyOf(cfg: StampedeConfig): RetryPolicy {
  return {
    maxAttempts: cfg.retries + 1,
    baseBackoff: cfg.backoff,
    backoffMultiplier: cfg.backoffMultiplier,
    retryableStatuses: cfg.retryOn,
    retryAssertions: false,
  };
}

export function loadPlanOf(cfg: StampedeConfig): LoadPlan {
  const base = {
    concurrency: cfg.users,
    durationMs: cfg.duration,
    reportIntervalMs: cfg.reportInterval,
    rps: cfg.rps,
    maxSamples: cfg.maxSamples,
  };
  switch (cfg.pattern) {
    case 'ramp-up':
      // Ramp over the first third of the run unless told otherwise.
      return { ...base, pattern: 'ramp-up', rampMs: cfg.ramp ?? Math.round(cfg.duration / 3) };
    case 'spike':
      return {
        ...base,
        pattern: 'spike',
        spike: { peak: cfg.spikePeak, everyMs: cfg.spikeEvery, lengthMs: cfg.spikeLength },
      };
    default:
      return { ...base, pattern: 'constant' };
  }
}
