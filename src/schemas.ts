import { z } from 'zod';
import { parsePath } from './json-path.js';
import type { Check, JsonSchema, JsonValue, LoadPlan, TestCase } from './types.js';

/** `250`, `'250ms'`, `'30s'`, `'2m'` → milliseconds. Plain numbers are milliseconds. */
export function parseDuration(value: string | number): number {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) throw new Error(`Invalid duration ${value}`);
    return value;
  }
  const match = /^\s*(\d+(?:\.\d+)?)\s*(ms|s|m)?\s*$/.exec(value);
  if (!match) throw new Error(`Invalid duration '${value}'`);
  const amount = Number(match[1]);
  switch (match[2]) {
    case 's':
      return amount * 1000;
    case 'm':
      return amount * 60_000;
    default:
      return amount;
  }
}

export const durationSchema = z.union([z.number(), z.string()]).transform((value, ctx) => {
  try {
    return parseDuration(value);
  } catch (error) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: error instanceof Error ? error.message : String(error) });
    return z.NEVER;
  }
});

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

/** A path expression; ones with placeholders are checked after substitution */
const jsonPathSchema = z.string().superRefine((path, ctx) => {
  if (path.includes('{{')) return;
  try {
    parsePath(path);
  } catch (error) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: error instanceof Error ? error.message : String(error) });
  }
});

const scalarString = z.union([z.string(), z.number(), z.boolean()]).transform(String);

export const retrySchema = z.object({
  attempts: z.number().int().min(1).optional(),
  backoff: durationSchema.optional(),
  multiplier: z.number().min(1).optional(),
  retryOn: z.array(z.number().int().min(100).max(599)).optional(),
  assertions: z.boolean().optional(),
}).strict();

const requestSchema = z.object({
  method: z.string().default('GET'),
  url: z.string().min(1),
  headers: z.record(scalarString).optional(),
  params: z.record(scalarString).optional(),
  body: jsonValueSchema.optional(),
});

const statusSchema = z.union([
  z.number().int(),
  z.string(),
  z.array(z.union([z.number().int(), z.string()])).min(1),
]);

const schemaDocument = z.union([z.boolean(), z.record(jsonValueSchema), z.string()]);

/** The loosely-typed `expect` map suite files declare */
export const expectSchema = z.object({
  status: statusSchema.optional(),
  headers: z.record(z.union([z.literal(true), scalarString])).optional(),
  jsonpath: z.record(jsonPathSchema, jsonValueSchema).optional(),
  schema: schemaDocument.optional(),
  schemaPath: jsonPathSchema.optional(),
}).strict();

export type ExpectDeclaration = z.infer<typeof expectSchema>;

export const stepSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  request: requestSchema,
  expect: expectSchema.optional(),
  retry: retrySchema.optional(),
  timeout: durationSchema.optional(),
  capture: z.record(jsonPathSchema).optional(),
  tags: z.union([z.string(), z.array(z.string())]).optional(),
  skip: z.boolean().optional(),
  focus: z.boolean().optional(),
});

export type StepDeclaration = z.infer<typeof stepSchema>;

const datasetRowSchema = z.record(scalarString);

export const suiteFileSchema = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  env: z.string().optional(),
  vars: z.record(scalarString).default({}),
  setup: z.array(stepSchema).default([]),
  tests: z.array(stepSchema).default([]),
  teardown: z.array(stepSchema).default([]),
  dataset: z.object({
    file: z.string().optional(),
    rows: z.array(datasetRowSchema).optional(),
    concurrency: z.number().int().min(1).optional(),
    /** Alias kept for older suites */
    parallel: z.number().int().min(1).optional(),
  }).refine((d) => d.file !== undefined || d.rows !== undefined, {
    message: 'dataset needs either file or rows',
  }).optional(),
});

export type SuiteFile = z.infer<typeof suiteFileSchema>;

export const datasetFileSchema = z.array(datasetRowSchema);

export const catalogSchema = z.union([
  z.array(z.object({
    method: z.string(),
    path: z.string(),
    statuses: z.array(z.number().int()).default([]),
  })),
  z.object({
    basePath: z.string().optional(),
    operations: z.array(z.object({
      method: z.string(),
      path: z.string(),
      statuses: z.array(z.number().int()).default([]),
    })),
  }),
]);

function asSchema(value: JsonValue | undefined): JsonSchema | undefined {
  if (typeof value === 'boolean') return value;
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) return value;
  return undefined;
}

/**
 * Maps an `expect` declaration onto tagged checks, one per asserted item,
 * in a stable order: status, headers, paths, schema.
 */
export function toChecks(expect: ExpectDeclaration | undefined, schemas: Record<string, JsonValue> = {}): Check[] {
  if (!expect) return [];
  const checks: Check[] = [];
  if (expect.status !== undefined) {
    const expected = Array.isArray(expect.status) ? expect.status : [expect.status];
    checks.push({ kind: 'status', expected });
  }
  for (const [name, value] of Object.entries(expect.headers ?? {})) {
    checks.push({ kind: 'header', name, expected: value });
  }
  for (const [path, expected] of Object.entries(expect.jsonpath ?? {})) {
    checks.push({ kind: 'path', path, expected });
  }
  if (expect.schema !== undefined) {
    const schema = typeof expect.schema === 'string' ? asSchema(schemas[expect.schema]) : expect.schema;
    if (schema === undefined) throw new Error(`Schema '${String(expect.schema)}' was not loaded`);
    checks.push({ kind: 'schema', schema, path: expect.schemaPath });
  }
  return checks;
}

export function toTestCase(step: StepDeclaration, schemas: Record<string, JsonValue> = {}): TestCase {
  const tags = step.tags === undefined ? undefined : Array.isArray(step.tags) ? step.tags : [step.tags];
  return {
    name: step.name,
    request: {
      method: step.request.method.toUpperCase(),
      url: step.request.url,
      headers: step.request.headers,
      params: step.request.params,
      body: step.request.body,
    },
    checks: toChecks(step.expect, schemas),
    retry: step.retry,
    timeout: step.timeout,
    capture: step.capture,
    tags,
    skip: step.skip,
    focus: step.focus,
  };
}

const planBase = {
  concurrency: z.number().int().min(1),
  durationMs: z.number().positive(),
  maxConcurrency: z.number().int().min(1).optional(),
  tickMs: z.number().int().min(1).optional(),
  reportIntervalMs: z.number().int().min(1).optional(),
  rps: z.number().positive().optional(),
  maxSamples: z.number().int().min(1).optional(),
};

export const loadPlanSchema: z.ZodType<LoadPlan, z.ZodTypeDef, unknown> = z.discriminatedUnion('pattern', [
  z.object({ pattern: z.literal('constant'), ...planBase }).strict(),
  z.object({ pattern: z.literal('ramp-up'), rampMs: z.number().min(0), ...planBase }).strict(),
  z.object({
    pattern: z.literal('spike'),
    spike: z.object({
      peak: z.number().int().min(1).optional(),
      everyMs: z.number().positive().optional(),
      lengthMs: z.number().positive().optional(),
    }).strict().refine((s) => s.lengthMs === undefined || s.everyMs === undefined || s.lengthMs <= s.everyMs, {
      message: 'spike length must not exceed the cycle',
    }).optional(),
    ...planBase,
  }).strict(),
]).superRefine((plan, ctx) => {
  if (plan.maxConcurrency !== undefined && plan.maxConcurrency < plan.concurrency) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['maxConcurrency'], message: 'must be at least concurrency' });
  }
});

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}
