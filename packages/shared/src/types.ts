// ─── Diff sides ──────────────────────────────────────────

/** LEFT = old/source file numbering, RIGHT = new/target file numbering. */
export type Side = 'LEFT' | 'RIGHT';

export const SIDES: readonly Side[] = ['LEFT', 'RIGHT'];

export function oppositeSide(side: Side): Side {
  return side === 'LEFT' ? 'RIGHT' : 'LEFT';
}

// ─── Suggestions ─────────────────────────────────────────

export type SuggestionCategory =
  | 'bug'
  | 'security'
  | 'performance'
  | 'style'
  | 'refactor'
  | 'improvement'
  | 'documentation';

export const SUGGESTION_CATEGORIES: readonly SuggestionCategory[] = [
  'bug',
  'security',
  'performance',
  'style',
  'refactor',
  'improvement',
  'documentation',
];

/** A review comment as produced by the language model, before anchoring. */
export interface Suggestion {
  fileName: string;
  startLine: number;
  endLine: number;
  /** Falls back to the mapper's configured default side when absent */
  side?: Side;
  comment: string;
  category: SuggestionCategory;
  suggestedCode: string;
  /** The code the replacement is meant to replace, as quoted by the model */
  existingCode?: string;
}

// ─── Anchors ─────────────────────────────────────────────

/**
 * How an anchor was derived, from most to least confident.
 * `unresolved` never appears on an anchor; it only counts dropped suggestions.
 */
export type AnchorProvenance = 'exact' | 'found' | 'corrected' | 'adjusted' | 'unresolved';

export interface ResolvedAnchor {
  filePath: string;
  /** Position inside the file's diff, as used by review comment APIs */
  position: number;
  line: number;
  side: Side;
  /**
   * First line of a multi-line range ending at `line`, shifted the same way
   * as `line`. Set only when it lies in the same hunk on the same side.
   */
  startLine?: number;
  provenance: Exclude<AnchorProvenance, 'unresolved'>;
  reason: string;
}

export interface MappedSuggestion {
  suggestion: Suggestion;
  anchor: ResolvedAnchor;
}

export type MappingStats = Record<AnchorProvenance, number>;

// ─── Review results ──────────────────────────────────────

export type ReviewEvent = 'APPROVE' | 'REQUEST_CHANGES' | 'COMMENT';

export type ReviewStatus = 'approved' | 'changes_requested' | 'commented';

export interface CodeReviewResult {
  prNumber: number;
  status: ReviewStatus;
  summary: string;
  findings: MappedSuggestion[];
  /** Suggestions removed by filtering, duplicate detection or failed anchoring */
  droppedCount: number;
  mappingStats: MappingStats;
  posted: boolean;
  duration_ms: number;
  model: string;
}
