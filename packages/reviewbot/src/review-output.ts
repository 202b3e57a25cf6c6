/**
 * Parsing of the model's JSON review into typed suggestions.
 */

import { z } from 'zod';
import { SUGGESTION_CATEGORIES, type Suggestion, type SuggestionCategory } from '@anchorbot/shared';
import type { Logger } from './infrastructure/logger.js';

export interface ParsedReviewOutput {
  summary: string;
  suggestions: Suggestion[];
}

export const UNPARSEABLE_SUMMARY = 'Could not parse review output.';

const lineNumber = z.coerce.number().int();

const RawSuggestionSchema = z.object({
  file_name: z.string().min(1),
  start_line: lineNumber.optional(),
  end_line: lineNumber.optional(),
  line: lineNumber.optional(),
  side: z.string().optional(),
  category: z.string().optional(),
  comment: z.string(),
  suggested_code: z.string().default(''),
  existing_code: z.string().nullish(),
});

const ReviewOutputSchema = z.object({
  summary: z.string().default('Review completed.'),
  code_suggestions: z.array(z.unknown()).default([]),
});

function isCategory(value: string): value is SuggestionCategory {
  return SUGGESTION_CATEGORIES.some((c) => c === value);
}

/** Pull a JSON object out of a fenced block, or the outermost braces. */
export function extractJSON(text: string): string | null {
  const fenced = /```(?:json)?\s*([\s\S]*?)\s*```/.exec(text)?.[1];
  if (fenced !== undefined && fenced.trim().startsWith('{')) return fenced;

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  return start !== -1 && end > start ? text.slice(start, end + 1) : null;
}

function toSuggestion(raw: z.infer<typeof RawSuggestionSchema>): Suggestion | null {
  const endLine = raw.end_line ?? raw.line ?? raw.start_line;
  if (endLine === undefined) return null;

  const category = raw.category?.toLowerCase() ?? '';
  const side = raw.side?.toUpperCase();

  return {
    fileName: raw.file_name,
    startLine: raw.start_line ?? endLine,
    endLine,
    ...(side === 'LEFT' || side === 'RIGHT' ? { side } : {}),
    comment: raw.comment,
    category: isCategory(category) ? category : 'improvement',
    suggestedCode: raw.suggested_code,
    ...(raw.existing_code ? { existingCode: raw.existing_code } : {}),
  };
}

export function parseReviewOutput(text: string, logger: Logger): ParsedReviewOutput {
  const json = extractJSON(text);
  if (json === null) {
    logger.warn({ length: text.length }, 'No JSON object in review output');
    return { summary: UNPARSEABLE_SUMMARY, suggestions: [] };
  }

  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (err) {
    logger.warn({ err: err instanceof Error ? err.message : String(err) }, 'Review output is not valid JSON');
    return { summary: UNPARSEABLE_SUMMARY, suggestions: [] };
  }

  const output = ReviewOutputSchema.safeParse(data);
  if (!output.success) {
    logger.warn({ errors: output.error.issues }, 'Review output has an unexpected shape');
    return { summary: UNPARSEABLE_SUMMARY, suggestions: [] };
  }

  const suggestions: Suggestion[] = [];
  output.data.code_suggestions.forEach((item, index) => {
    const raw = RawSuggestionSchema.safeParse(item);
    const suggestion = raw.success ? toSuggestion(raw.data) : null;
    if (suggestion) {
      suggestions.push(suggestion);
    } else {
      logger.warn({ index }, 'Skipping invalid suggestion in review output');
    }
  });

  return { summary: output.data.summary, suggestions };
}
