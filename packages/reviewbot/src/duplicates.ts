/**
 * Duplicate detection against review comments already on the PR, so a
 * re-review after a push does not repeat findings the author has seen.
 */

import type { Side, Suggestion } from '@anchorbot/shared';
import type { PRReviewComment } from '@anchorbot/core/git';
import { stripGitPrefix } from './diff-parser.js';
import { sequenceRatio, tokenSortRatio } from './similarity.js';

export interface DuplicateOptions {
  lineTolerance: number;
  codeSimilarity: number;
  commentSimilarity: number;
  commentSimilarityStrict: number;
  /** Side assumed for a suggestion that names none */
  defaultSide: Side;
}

export const DEFAULT_DUPLICATE_OPTIONS: DuplicateOptions = {
  lineTolerance: 3,
  codeSimilarity: 0.85,
  commentSimilarity: 0.7,
  commentSimilarityStrict: 0.6,
  defaultSide: 'RIGHT',
};

const SUGGESTION_BLOCK = /```suggestion[^\n]*\n([\s\S]*?)```/;

export function extractSuggestionCode(body: string): string | null {
  const match = SUGGESTION_BLOCK.exec(body);
  return match?.[1]?.trim() ?? null;
}

/** Comment prose with any suggestion block removed. */
function commentText(body: string): string {
  return body.replace(SUGGESTION_BLOCK, ' ');
}

function normalizeText(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, ' ');
}

export function textSimilarity(a: string, b: string): number {
  if (!a || !b) return 0;
  return Math.max(sequenceRatio(a, b), tokenSortRatio(a, b));
}

function linesOverlap(start: number, end: number, otherStart: number, otherEnd: number, tolerance = 0): boolean {
  return start - tolerance <= otherEnd && end + tolerance >= otherStart;
}

export function isDuplicate(
  suggestion: Suggestion,
  existing: readonly PRReviewComment[],
  options: DuplicateOptions = DEFAULT_DUPLICATE_OPTIONS,
): boolean {
  const path = stripGitPrefix(suggestion.fileName);
  const side = suggestion.side ?? options.defaultSide;

  for (const comment of existing) {
    if (comment.path !== path || comment.line === null) continue;
    // GitHub reports RIGHT for comments posted without an explicit side
    if ((comment.side ?? 'RIGHT') !== side) continue;

    const commentStart = comment.startLine ?? comment.line;
    const { startLine, endLine } = suggestion;
    if (!linesOverlap(startLine, endLine, commentStart, comment.line, options.lineTolerance)) continue;

    const postedCode = extractSuggestionCode(comment.body);
    if (postedCode && suggestion.suggestedCode) {
      const codeScore = textSimilarity(normalizeText(suggestion.suggestedCode), normalizeText(postedCode));
      if (codeScore >= options.codeSimilarity) return true;
    }

    const commentScore = textSimilarity(normalizeText(suggestion.comment), normalizeText(commentText(comment.body)));
    const exactOverlap = linesOverlap(startLine, endLine, commentStart, comment.line);
    if (exactOverlap && commentScore >= options.commentSimilarityStrict) return true;
    if (commentScore >= options.commentSimilarity) return true;
  }
  return false;
}

/** Drop suggestions that repeat an existing review comment. */
export function filterDuplicateSuggestions(
  suggestions: readonly Suggestion[],
  existing: readonly PRReviewComment[],
  options: DuplicateOptions = DEFAULT_DUPLICATE_OPTIONS,
): { kept: Suggestion[]; duplicates: Suggestion[] } {
  const kept: Suggestion[] = [];
  const duplicates: Suggestion[] = [];
  for (const s of suggestions) {
    (isDuplicate(s, existing, options) ? duplicates : kept).push(s);
  }
  return { kept, duplicates };
}
