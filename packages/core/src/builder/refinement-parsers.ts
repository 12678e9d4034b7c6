/**
 * Refinement response parsing
 *
 * - cleanSuggestedName: first line of a rename response, quotes stripped
 * - parseMergeSuggestions: `SRC1 + SRC2 -> NAME` lines, `NO_MERGES` sentinel
 * - parseSubstructure: `{"subcategories":[{"name","files"}]}` JSON
 *
 * Unrecognised lines are skipped; the grammar is best-effort by nature.
 */
import { z } from 'zod';
import { parseJsonResponse, type ParseResult } from '../llm/json-response';

export interface ParsedMerge {
  sources: string[];
  mergedName: string;
}

export const NO_MERGES_SENTINEL = 'NO_MERGES';

export function cleanSuggestedName(response: string): string | null {
  const firstLine = response
    .trim()
    .replace(/["“”]/g, '')
    .split('\n')[0]
    ?.trim();
  if (!firstLine) return null;
  // Models sometimes echo a label or end with a period
  const name = firstLine.replace(/^(suggested name|name)\s*:\s*/i, '').replace(/\.$/, '').trim();
  return name.length > 0 ? name : null;
}

export function parseMergeSuggestions(response: string, limit: number = Number.POSITIVE_INFINITY): ParsedMerge[] {
  const suggestions: ParsedMerge[] = [];
  const lines = response
    .split('\n')
    .map((line) => line.trim().replace(/^[-*•]\s*/, '').replace(/^\d+[.)]\s*/, ''))
    .filter((line) => line.length > 0 && line.replace(/"/g, '') !== NO_MERGES_SENTINEL);

  for (const line of lines) {
    const arrow = line.match(/->|→/);
    if (!arrow || arrow.index === undefined) continue;

    const left = line.slice(0, arrow.index);
    const mergedName = line.slice(arrow.index + arrow[0].length).trim();
    const sources = left
      .split('+')
      .map((source) => source.trim())
      .filter((source) => source.length > 0);

    if (sources.length >= 2 && mergedName.length > 0) {
      suggestions.push({ sources, mergedName });
    }
    if (suggestions.length >= limit) break;
  }
  return suggestions;
}

export const SubstructureResponseSchema = z.object({
  subcategories: z
    .array(
      z.object({
        name: z.string().trim().min(1),
        files: z.array(z.string()),
      }),
    )
    .min(1),
});

export type SubstructureResponse = z.infer<typeof SubstructureResponseSchema>;

export function parseSubstructure(response: string): ParseResult<SubstructureResponse> {
  return parseJsonResponse(response, SubstructureResponseSchema);
}
