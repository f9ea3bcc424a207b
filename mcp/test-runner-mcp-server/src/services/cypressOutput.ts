import { z } from 'zod';
import { ERR_NO_JSON } from '../constants.js';

// Schemas mirror the JSON reporter Cypress uses (mocha's `json` reporter).

export const CypressStatsSchema = z.object({
  suites: z.number().int().nonnegative(),
  tests: z.number().int().nonnegative(),
  passes: z.number().int().nonnegative(),
  pending: z.number().int().nonnegative(),
  failures: z.number().int().nonnegative(),
  start: z.string(),
  end: z.string(),
  duration: z.number().nonnegative(),
});

export const CypressCodeFrameSchema = z.object({
  line: z.number().int(),
  column: z.number().int(),
  originalFile: z.string(),
  relativeFile: z.string(),
  absoluteFile: z.string(),
  frame: z.string(),
  language: z.string(),
});

export const CypressTestErrorSchema = z.object({
  message: z.string(),
  name: z.string(),
  codeFrame: CypressCodeFrameSchema.optional(),
});

// Passing tests are reported with `"err": {}`
const emptyObjectToUndefined = (value: unknown) =>
  typeof value === 'object' && value !== null && Object.keys(value).length === 0
    ? undefined
    : value;

export const CypressTestSchema = z.object({
  title: z.string(),
  fullTitle: z.string(),
  file: z.string().nullable().optional(),
  duration: z.number().nullable().optional(),
  currentRetry: z.number().int().nonnegative(),
  err: z.preprocess(emptyObjectToUndefined, CypressTestErrorSchema.optional()),
});

export const CypressResultsSchema = z.object({
  stats: CypressStatsSchema,
  tests: z.array(CypressTestSchema),
  pending: z.array(CypressTestSchema),
  failures: z.array(CypressTestSchema),
  passes: z.array(CypressTestSchema),
});

export type CypressStats = z.infer<typeof CypressStatsSchema>;
export type CypressCodeFrame = z.infer<typeof CypressCodeFrameSchema>;
export type CypressTestError = z.infer<typeof CypressTestErrorSchema>;
export type CypressTest = z.infer<typeof CypressTestSchema>;
export type CypressResults = z.infer<typeof CypressResultsSchema>;

export type PipelineError =
  | { stage: 'extract'; reason: 'no-json-found' }
  | { stage: 'parse'; message: string };

export type StageResult<T> = { ok: true; value: T } | { ok: false; error: PipelineError };

export type PipelineResult =
  | { ok: true; results: CypressResults; text: string }
  | { ok: false; error: PipelineError };

/**
 * The electron runtime prints warnings and dbus errors before the reporter
 * writes its JSON, so everything before the first `{` is dropped.
 */
export function extractJson(output: string): StageResult<string> {
  const start = output.indexOf('{');
  if (start === -1) {
    return { ok: false, error: { stage: 'extract', reason: 'no-json-found' } };
  }
  return { ok: true, value: output.slice(start) };
}

export function parseResults(json: string): StageResult<CypressResults> {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    return {
      ok: false,
      error: { stage: 'parse', message: err instanceof Error ? err.message : String(err) },
    };
  }

  const parsed = CypressResultsSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: { stage: 'parse', message: formatIssues(parsed.error) } };
  }
  return { ok: true, value: parsed.data };
}

/**
 * Re-projects every test record onto the fields we report. Currently that is
 * the full record; narrowing the report means editing `projectTest`.
 */
export function filterResults(results: CypressResults): CypressResults {
  return {
    stats: { ...results.stats },
    tests: results.tests.map(projectTest),
    pending: results.pending.map(projectTest),
    failures: results.failures.map(projectTest),
    passes: results.passes.map(projectTest),
  };
}

export function serializeResults(results: CypressResults): string {
  return JSON.stringify(results, null, 2);
}

export function processCypressOutput(stdout: string): PipelineResult {
  const extracted = extractJson(stdout);
  if (!extracted.ok) return extracted;

  const parsed = parseResults(extracted.value);
  if (!parsed.ok) return parsed;

  const results = filterResults(parsed.value);
  return { ok: true, results, text: serializeResults(results) };
}

export function describePipelineError(error: PipelineError): string {
  switch (error.stage) {
    case 'extract':
      return ERR_NO_JSON;
    case 'parse':
      return `Failed to parse Cypress JSON: ${error.message}`;
  }
}

function projectTest(test: CypressTest): CypressTest {
  return {
    title: test.title,
    fullTitle: test.fullTitle,
    file: test.file,
    duration: test.duration,
    currentRetry: test.currentRetry,
    err: test.err && {
      message: test.err.message,
      name: test.err.name,
      codeFrame: test.err.codeFrame && { ...test.err.codeFrame },
    },
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
