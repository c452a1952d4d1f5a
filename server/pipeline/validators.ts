import { z } from 'zod';
import type { StructuredRecord } from '../../shared/types';
import { parseModelJson } from '../utils/jsonExtract';

const stringListSchema = z
  .union([z.array(z.unknown()), z.string()])
  .transform((value) => (Array.isArray(value) ? value : [value]))
  .transform((items) =>
    items
      .filter((item): item is string => typeof item === 'string')
      .map((item) => item.trim())
      .filter(Boolean),
  );

const validFlagSchema = z.union([
  z.boolean(),
  z.enum(['true', 'false']).transform((value) => value === 'true'),
]);

/**
 * Wire shape of the model's answer. Every field is optional; defaults are
 * applied in `parseStructuredRecord`.
 */
export const ModelRecordSchema = z.object({
  valid: validFlagSchema.nullish(),
  title: z.string().nullish(),
  summary: z.string().nullish(),
  key_points: stringListSchema.nullish(),
  code_snippets: stringListSchema.nullish(),
  source_url: z.string().nullish(),
});

export type RecordParseOutcome =
  | { status: 'ok'; record: StructuredRecord }
  | { status: 'invalid' }
  | { status: 'malformed'; error: string };

export interface RecordDefaults {
  /** Candidate link; always becomes the record's sourceUrl. */
  link: string;
  /** Used when the model leaves the title empty. */
  title?: string;
}

const describeIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');

/**
 * Clean, parse and validate one raw model response.
 *
 * `valid: false` is reported as `invalid` so the caller can drop the page
 * without retrying. A payload that is not a JSON object or breaks the schema is
 * `malformed`. Missing strings default to `''` and missing lists to `[]`.
 */
export const parseStructuredRecord = (raw: string, defaults: RecordDefaults): RecordParseOutcome => {
  const parsed = parseModelJson(raw);
  if (!parsed.ok) {
    return { status: 'malformed', error: parsed.error };
  }

  const result = ModelRecordSchema.safeParse(parsed.value);
  if (!result.success) {
    return { status: 'malformed', error: describeIssues(result.error) };
  }

  const data = result.data;
  if (data.valid === false) {
    return { status: 'invalid' };
  }

  return {
    status: 'ok',
    record: {
      valid: true,
      title: data.title?.trim() || defaults.title?.trim() || defaults.link,
      summary: data.summary?.trim() ?? '',
      keyPoints: data.key_points ?? [],
      codeSnippets: data.code_snippets ?? [],
      sourceUrl: defaults.link,
    },
  };
};
