/**
 * SuggestionFilter — removes suggestions that give the author nothing to act on:
 * empty ones, no-op rewrites, praise, and remarks with no request in them.
 */

import type { Suggestion } from '@anchorbot/shared';
import type { MissingExistingCodePolicy } from './config/schema.js';
import type { Logger } from './infrastructure/logger.js';
import { normalizeCode } from './normalize.js';
import { vaderScorer, type SentimentScorer } from './sentiment.js';
import { sequenceRatio } from './similarity.js';

// ── Patterns ───────────────────────────────────────────────────

const POSITIVE_PATTERNS = [
  /\b(good|great|excellent|nice|well done|perfect|correctly|properly)\b/,
  /\b(looks good|lgtm|ship it|no issues|no problems)\b/,
  /\b(appropriate|suitable|adequate|sufficient)\b/,
  /\bthis is (a )?(good|great|correct|proper)\b/,
  /\b(already|currently) (correct|good|proper|fine)\b/,
  /\bno (changes?|improvements?|modifications?) (needed|required|necessary)\b/,
  /\bkeep (it |this )?(as is|unchanged)\b/,
];

const NEGATIVE_INDICATORS = [
  /\b(bug|error|issue|problem|flaw|vulnerability)\b/,
  /\b(should|could|might|consider|recommend|suggest)\b/,
  /\b(missing|lacks?|needs?|requires?)\b/,
  /\b(incorrect|wrong|invalid|broken|fails?)\b/,
  /\b(improve|fix|refactor|optimize|simplify)\b/,
  /\b(avoid|don'?t|shouldn'?t|never)\b/,
  /\b(instead|rather|better|prefer)\b/,
  /\b(risk|dangerous|unsafe|insecure)\b/,
  /\b(redundant|unnecessary|unused|dead)\b/,
  /\b(inconsistent|confusing|unclear|ambiguous)\b/,
];

const ACTIONABLE_VERBS = [
  /\b(add|guard|validate|handle|ensure|remove)\b/,
  /\b(rename|extract|split|inline)\b/,
  /\b(catch|raise|throw|document)\b/,
  /\b(check|return|log|move)\s+\w+/,
  /\b(replace|reorder|restructure)\b/,
  /\buse\s+(a|an|the|\w+ing)\b/,
];

function anyMatch(patterns: readonly RegExp[], text: string): boolean {
  const lower = text.toLowerCase();
  return patterns.some((p) => p.test(lower));
}

export function hasNegativeIndicators(comment: string): boolean {
  return anyMatch(NEGATIVE_INDICATORS, comment);
}

export function hasActionableVerbs(comment: string): boolean {
  return anyMatch(ACTIONABLE_VERBS, comment);
}

/**
 * Praise with no criticism and no request attached. A sentiment score at or
 * above the threshold counts as praise even without a praise phrase.
 */
export function isPositiveOnly(comment: string, sentiment?: { compound: number; threshold: number }): boolean {
  if (hasNegativeIndicators(comment) || hasActionableVerbs(comment)) return false;
  if (sentiment && sentiment.compound >= sentiment.threshold) return true;
  return anyMatch(POSITIVE_PATTERNS, comment);
}

/** Same code after normalization, or nearly so. */
export function isCodeIdentical(existing: string | undefined, suggested: string | undefined): boolean {
  if (!existing || !suggested) return false;
  const a = normalizeCode(existing);
  const b = normalizeCode(suggested);
  return a === b || sequenceRatio(a, b) > 0.95;
}

// ── Filter ─────────────────────────────────────────────────────

export interface SuggestionFilterOptions {
  missingExistingCodePolicy?: MissingExistingCodePolicy;
  /** Compound score at or above which an unqualified remark counts as praise */
  positiveSentimentThreshold?: number;
  /** Compound score at or below which a remark counts as a complaint */
  negativeSentimentThreshold?: number;
  scorer?: SentimentScorer;
}

export interface FilterResult {
  kept: Suggestion[];
  removed: Suggestion[];
}

export class SuggestionFilter {
  private readonly policy: MissingExistingCodePolicy;
  private readonly positiveThreshold: number;
  private readonly negativeThreshold: number;
  private readonly scorer: SentimentScorer;

  constructor(
    private readonly logger: Logger,
    options: SuggestionFilterOptions = {},
  ) {
    this.policy = options.missingExistingCodePolicy ?? 'warn';
    this.positiveThreshold = options.positiveSentimentThreshold ?? 0.3;
    this.negativeThreshold = options.negativeSentimentThreshold ?? -0.05;
    this.scorer = options.scorer ?? vaderScorer;
  }

  filter(suggestions: readonly Suggestion[]): FilterResult {
    const result: FilterResult = { kept: [], removed: [] };

    for (const suggestion of suggestions) {
      const reason = this.rejectionReason(suggestion);
      if (reason === null) {
        result.kept.push(suggestion);
      } else {
        this.logger.info(
          { file: suggestion.fileName, line: suggestion.startLine, reason },
          'Filtered out suggestion',
        );
        result.removed.push(suggestion);
      }
    }

    this.logger.info(
      { kept: result.kept.length, removed: result.removed.length, total: suggestions.length },
      'Suggestion filter complete',
    );
    return result;
  }

  /** Why a suggestion is not actionable, or null when it is. */
  rejectionReason(suggestion: Suggestion): string | null {
    if (!suggestion.comment.trim()) return 'empty comment';
    if (!suggestion.suggestedCode.trim()) return 'no suggested code';

    if (!suggestion.existingCode) {
      if (this.policy === 'drop') return 'missing existing code';
      if (this.policy === 'warn') {
        this.logger.warn(
          { file: suggestion.fileName, line: suggestion.startLine },
          'Suggestion has no existing code, keeping it per policy',
        );
      }
    }

    if (isCodeIdentical(suggestion.existingCode, suggestion.suggestedCode)) {
      return 'suggested code identical to existing code';
    }

    const compound = this.scorer.compound(suggestion.comment);
    if (isPositiveOnly(suggestion.comment, { compound, threshold: this.positiveThreshold })) {
      return 'positive-only comment';
    }
    const negative = compound <= this.negativeThreshold;
    if (!negative && !hasNegativeIndicators(suggestion.comment) && !hasActionableVerbs(suggestion.comment)) {
      return 'informational comment without actionable feedback';
    }
    return null;
  }
}
