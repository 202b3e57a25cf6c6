/**
 * Review verdict and GitHub markdown formatting.
 */

import {
  SUGGESTION_CATEGORIES,
  type MappedSuggestion,
  type MappingStats,
  type ReviewEvent,
  type ReviewStatus,
  type Suggestion,
  type SuggestionCategory,
} from '@anchorbot/shared';

const BLOCKING_CATEGORIES = new Set<SuggestionCategory>(['bug', 'security']);
const SECURITY_KEYWORDS = ['vulnerability', 'exploit', 'injection'];

const CATEGORY_LABELS: Record<SuggestionCategory, string> = {
  bug: 'Bugs',
  security: 'Security',
  performance: 'Performance',
  style: 'Style',
  refactor: 'Refactoring',
  improvement: 'Improvements',
  documentation: 'Documentation',
};

const STATUS_BY_EVENT: Record<ReviewEvent, ReviewStatus> = {
  APPROVE: 'approved',
  REQUEST_CHANGES: 'changes_requested',
  COMMENT: 'commented',
};

function isBlocking(suggestion: Suggestion): boolean {
  if (BLOCKING_CATEGORIES.has(suggestion.category)) return true;
  const comment = suggestion.comment.toLowerCase();
  return SECURITY_KEYWORDS.some((k) => comment.includes(k));
}

export function decideReviewEvent(suggestions: readonly Suggestion[]): ReviewEvent {
  if (suggestions.length === 0) return 'APPROVE';
  return suggestions.some(isBlocking) ? 'REQUEST_CHANGES' : 'COMMENT';
}

export function reviewStatusFor(event: ReviewEvent): ReviewStatus {
  return STATUS_BY_EVENT[event];
}

export function formatMappingStats(stats: MappingStats): string {
  return `Line mapping: ${stats.exact} exact, ${stats.found} found, ${stats.corrected} corrected, ${stats.adjusted} adjusted, ${stats.unresolved} unresolved`;
}

/** Top-level review body: summary, findings grouped by category, mapping footer. */
export function formatReviewBody(
  summary: string,
  findings: readonly MappedSuggestion[],
  stats: MappingStats,
): string {
  const lines = ['## Code review', '', summary.trim()];

  if (findings.length > 0) {
    lines.push('', `### Findings (${findings.length})`);
    for (const category of SUGGESTION_CATEGORIES) {
      const group = findings.filter((f) => f.suggestion.category === category);
      if (group.length === 0) continue;
      lines.push('', `**${CATEGORY_LABELS[category]}**`);
      for (const { suggestion, anchor } of group) {
        const [headline = ''] = suggestion.comment.trim().split('\n');
        lines.push(`- \`${anchor.filePath}:${anchor.line}\` ${headline}`);
      }
    }
  } else {
    lines.push('', 'No issues found.');
  }

  lines.push('', '---', `<sub>${formatMappingStats(stats)}</sub>`);
  return lines.join('\n');
}

export interface InlineCommentOptions {
  /**
   * Whether the comment covers every line the suggested code replaces.
   * When it does not, the code is shown in a plain block that cannot be applied.
   */
  applicable?: boolean;
}

/** Inline comment body with a one-click `suggestion` block. */
export function formatInlineComment(suggestion: Suggestion, options: InlineCommentOptions = {}): string {
  const code = suggestion.suggestedCode.replace(/\n+$/, '');
  const fence = (options.applicable ?? true) ? '```suggestion' : '```';
  return `${suggestion.comment.trim()}\n\n${fence}\n${code}\n\`\`\``;
}
