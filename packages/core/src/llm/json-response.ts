/**
 * LLM response parsing
 *
 * Models wrap JSON in markdown fences, leave trailing commas and put raw
 * newlines inside strings. These helpers clean that up and validate the
 * result against a zod schema; a mismatch is an ordinary failed result.
 */
import type { z } from 'zod';

export type ParseResult<T> = { success: true; data: T } | { success: false; error: string };

/**
 * Lone surrogates and U+FFFD mean the provider handed back undecodable bytes.
 */
export function hasMalformedEncoding(text: string): boolean {
  return /\uFFFD|[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/.test(text);
}

export function stripCodeFences(content: string): string {
  let text = content.trim();
  if (text.startsWith('```')) {
    text = text.replace(/^```[a-zA-Z]*\s*/u, '');
    text = text.replace(/```\s*$/u, '').trim();
  }
  return text;
}

/**
 * Fix trailing commas and unescaped newlines inside double-quoted strings.
 */
export function repairJson(jsonText: string): string {
  const out = jsonText.replace(/,(\s*[}\]])/g, '$1');

  let inString = false;
  let escape = false;
  const result: string[] = [];
  for (const c of out) {
    if (escape) {
      result.push(c);
      escape = false;
      continue;
    }
    if (c === '\\' && inString) {
      result.push(c);
      escape = true;
      continue;
    }
    if (c === '"') {
      inString = !inString;
      result.push(c);
      continue;
    }
    if (inString && (c === '\n' || c === '\r')) {
      result.push(' ');
      continue;
    }
    result.push(c);
  }
  return result.join('');
}

/**
 * Isolate the outermost JSON object in a model response.
 */
export function extractJsonObject(content: string): string | null {
  const text = stripCodeFences(content);
  const firstBrace = text.indexOf('{');
  const lastBrace = text.lastIndexOf('}');
  if (firstBrace === -1 || lastBrace === -1 || lastBrace <= firstBrace) return null;
  return text.slice(firstBrace, lastBrace + 1);
}

function tryParse(text: string): ParseResult<unknown> {
  try {
    return { success: true, data: JSON.parse(text) };
  } catch (error) {
    return { success: false, error: error instanceof Error ? error.message : String(error) };
  }
}

export function parseJsonResponse<S extends z.ZodTypeAny>(content: string, schema: S): ParseResult<z.infer<S>> {
  const jsonText = extractJsonObject(content);
  if (jsonText === null) {
    return { success: false, error: 'No JSON object found in response' };
  }

  let parsed = tryParse(jsonText);
  if (!parsed.success) {
    parsed = tryParse(repairJson(jsonText));
  }
  if (!parsed.success) {
    return { success: false, error: `Invalid JSON: ${parsed.error}` };
  }

  const validated = schema.safeParse(parsed.data);
  if (!validated.success) {
    const issue = validated.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    return { success: false, error: `Schema mismatch${where}: ${issue?.message ?? 'unknown'}` };
  }
  return { success: true, data: validated.data };
}
