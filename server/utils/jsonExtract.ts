import JSON5 from 'json5';

/**
 * JSON extraction helpers for model responses. Models wrap payloads in code
 * fences, prepend reasoning traces, or stop mid-object; these helpers recover
 * the object before it is parsed.
 */

const REASONING_TRACE_RE = /<think(?:ing)?>[\s\S]*?<\/think(?:ing)?>/gi;

/**
 * Remove `<think>...</think>` blocks emitted by reasoning models.
 */
export const stripReasoningTrace = (value: string): string => value.replace(REASONING_TRACE_RE, '');

/**
 * Remove a leading and trailing markdown code fence from a string.
 */
export const stripCodeFence = (value: string): string =>
  value
    .trim()
    .replace(/^```(?:json|json5|javascript|js|text)?[ \t]*\r?\n?/i, '')
    .replace(/\r?\n?```[\s]*$/, '')
    .trim();

/**
 * Full cleanup applied to a raw model response before parsing.
 */
export const cleanModelResponse = (raw: string): string => stripCodeFence(stripReasoningTrace(raw));

const buildClosers = (stack: string[]): string =>
  stack
    .slice()
    .reverse()
    .map((token) => (token === '{' ? '}' : token === '[' ? ']' : ''))
    .join('');

/**
 * Extract a JSON object/array from a string, handling nested braces/brackets.
 * A payload missing its closing braces is auto-closed from the stack of
 * unmatched openers.
 */
export const extractBalancedJson = (value: string): string | null => {
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }

  let start = -1;
  let end = -1;
  let inString = false;
  let escapeNext = false;
  const stack: string[] = [];

  for (let i = 0; i < trimmed.length; i += 1) {
    const char = trimmed[i];

    if (inString) {
      if (escapeNext) {
        escapeNext = false;
        continue;
      }
      if (char === '\\') {
        escapeNext = true;
        continue;
      }
      if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
      continue;
    }

    if (char === '{' || char === '[') {
      if (stack.length === 0) {
        start = i;
      }
      stack.push(char);
      continue;
    }

    if (char === '}' || char === ']') {
      if (stack.length === 0) {
        continue;
      }
      const top = stack[stack.length - 1];
      const expected = top === '{' ? '}' : top === '[' ? ']' : '';
      // A mismatched closer still pops so the scan cannot get stuck.
      stack.pop();
      if (char === expected && stack.length === 0) {
        end = i;
        break;
      }
    }
  }

  if (start === -1) {
    return null;
  }

  let candidate = end !== -1 ? trimmed.slice(start, end + 1) : trimmed.slice(start);

  if (end === -1 && inString) {
    if (escapeNext) {
      candidate = candidate.slice(0, -1);
    }
    candidate += '"';
  }

  if (stack.length > 0) {
    candidate = `${candidate}${buildClosers(stack)}`;
  }

  return candidate.trim();
};

/**
 * Naive extraction from the first '{' to the last '}'.
 */
export const extractJsonObjectNaive = (value: string): string => {
  const start = value.indexOf('{');
  const end = value.lastIndexOf('}');
  if (start === -1 || end === -1 || end < start) {
    return value.trim();
  }
  return value.slice(start, end + 1).trim();
};

/**
 * Clean a model response and return the JSON text it carries, or null.
 */
export const extractJson = (rawResponse: string): string | null => {
  const cleaned = cleanModelResponse(rawResponse);

  const balanced = extractBalancedJson(cleaned);
  if (balanced) {
    return balanced;
  }

  const naive = extractJsonObjectNaive(cleaned);
  if (naive && naive !== cleaned) {
    return naive;
  }

  return null;
};

export type JsonParseOutcome = { ok: true; value: unknown } | { ok: false; error: string };

/**
 * Extract and parse the JSON payload of a model response. JSON5 accepts the
 * trailing commas and single quotes models occasionally emit.
 */
export const parseModelJson = (rawResponse: string): JsonParseOutcome => {
  const extracted = extractJson(rawResponse);
  if (!extracted) {
    return { ok: false, error: 'No JSON found in response' };
  }
  try {
    const value: unknown = JSON5.parse(extracted);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
};
