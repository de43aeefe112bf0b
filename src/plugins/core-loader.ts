import { readFile } from 'fs/promises';
import path from 'path';
import { pathToFileURL } from 'url';
import { parse as parseCsv } from 'csv-parse/sync';
import { load as parseYaml } from 'js-yaml';
import { SuiteLoadError, errorMessage } from '../errors.js';
import type { Plugin } from '../plugin-api.js';
import {
  catalogSchema,
  datasetFileSchema,
  formatIssues,
  jsonValueSchema,
  suiteFileSchema,
  toTestCase,
  type StepDeclaration,
  type SuiteFile,
} from '../schemas.js';
import type { CatalogEntry, Dataset, DatasetRow, JsonValue, Suite } from '../types.js';

export const SUITE_FILE_PATTERN = /\.(js|mjs|json|yaml|yml)$/;

async function readStructured(filePath: string): Promise<unknown> {
  const raw = await readFile(filePath, 'utf8');
  if (filePath.endsWith('.json')) return JSON.parse(raw);
  if (filePath.endsWith('.yaml') || filePath.endsWith('.yml')) return parseYaml(raw);
  throw new Error(`Unsupported file type ${path.extname(filePath) || filePath}`);
}

async function readDeclaration(filePath: string): Promise<unknown> {
  if (/\.(json|ya?ml)$/.test(filePath)) return readStructured(filePath);
  const mod: { default?: unknown } = await import(pathToFileURL(filePath).href);
  return mod.default ?? mod;
}

function schemaRefs(steps: StepDeclaration[]): string[] {
  return steps.flatMap((step) => (typeof step.expect?.schema === 'string' ? [step.expect.schema] : []));
}

async function loadSchemas(refs: string[], baseDir: string): Promise<Record<string, JsonValue>> {
  const schemas: Record<string, JsonValue> = {};
  for (const ref of new Set(refs)) {
    const parsed = jsonValueSchema.safeParse(await readStructured(path.resolve(baseDir, ref)));
    if (!parsed.success) throw new Error(`Schema ${ref} is not valid JSON`);
    schemas[ref] = parsed.data;
  }
  return schemas;
}

/** CSV rows keyed by the header line; blank lines are dropped */
async function readCsv(filePath: string): Promise<unknown> {
  const raw = await readFile(filePath, 'utf8');
  return parseCsv(raw, { columns: true, skip_empty_lines: true, trim: true, bom: true });
}

/** Rows from a CSV file or a JSON or YAML array of flat objects */
export async function loadDatasetFile(filePath: string): Promise<DatasetRow[]> {
  const data = filePath.endsWith('.csv') ? await readCsv(filePath) : await readStructured(filePath);
  const parsed = datasetFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new Error(`Dataset ${filePath}: ${formatIssues(parsed.error).join('; ')}`);
  }
  return parsed.data;
}

async function loadDataset(declared: NonNullable<SuiteFile['dataset']>, baseDir: string): Promise<Dataset> {
  let rows = declared.rows ?? [];
  if (declared.file) {
    rows = [...rows, ...(await loadDatasetFile(path.resolve(baseDir, declared.file)))];
  }
  return { rows, concurrency: declared.concurrency ?? declared.parallel };
}

export async function loadSuite(filePath: string): Promise<Suite> {
  let declaration: unknown;
  try {
    declaration = await readDeclaration(filePath);
  } catch (error) {
    throw new SuiteLoadError(filePath, errorMessage(error));
  }

  // A bare list is shorthand for a suite with only tests.
  const parsed = suiteFileSchema.safeParse(Array.isArray(declaration) ? { tests: declaration } : declaration);
  if (!parsed.success) {
    throw new SuiteLoadError(filePath, formatIssues(parsed.error).join('; '));
  }
  const data = parsed.data;
  const baseDir = path.dirname(filePath);

  try {
    const schemas = await loadSchemas(schemaRefs([...data.setup, ...data.tests, ...data.teardown]), baseDir);
    const name = data.name ?? path.parse(path.basename(filePath)).name.replace(/\.stampede$/, '');
    return {
      name,
      vars: data.vars,
      setup: data.setup.map((step) => toTestCase(step, schemas)),
      tests: data.tests.map((step) => toTestCase(step, schemas)),
      teardown: data.teardown.map((step) => toTestCase(step, schemas)),
      dataset: data.dataset ? await loadDataset(data.dataset, baseDir) : undefined,
      loadPath: filePath,
    };
  } catch (error) {
    throw new SuiteLoadError(filePath, errorMessage(error));
  }
}

export interface Catalog {
  entries: CatalogEntry[];
  basePath?: string;
}

/** Reads an endpoint catalog: a list of `{method, path, statuses}` or `{basePath, operations}` */
export async function loadCatalog(filePath: string): Promise<Catalog> {
  let raw: unknown;
  try {
    raw = await readStructured(filePath);
  } catch (error) {
    throw new SuiteLoadError(filePath, errorMessage(error));
  }
  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SuiteLoadError(filePath, formatIssues(parsed.error).join('; '));
  }
  const data = parsed.data;
  return Array.isArray(data) ? { entries: data } : { entries: data.operations, basePath: data.basePath };
}

export const coreLoaderPlugin: Plugin = {
  name: 'core-loader',
  setup(ctx) {
    ctx.onLoad({ filter: SUITE_FILE_PATTERN }, async ({ path }) => {
      const suite = await loadSuite(path);
      return { suites: [suite] };
    });
  },
};
