/**
 * LineMapper — reconciles the line numbers a model claims with the lines a
 * parsed diff can actually take a review comment on.
 *
 * Resolution runs in tiers, each tagged on the result as its provenance:
 *
 *   exact      the claimed (line, side) is commentable and its content
 *              matches the first line of the quoted code
 *   found      the claimed (line, side) is commentable, content unverified
 *   corrected  the quoted code was located elsewhere in the diff
 *   adjusted   the nearest commentable line within the search radius
 *
 * Strict mode stops after `corrected`; posting paths use it so a comment is
 * never placed on a line the model did not point at.
 */

import { oppositeSide, type AnchorProvenance, type MappedSuggestion, type MappingStats, type ResolvedAnchor, type Side, type Suggestion } from '@anchorbot/shared';
import { stripGitPrefix, type ParsedFileDiff, type LineRef } from './diff-parser.js';
import type { Logger } from './infrastructure/logger.js';
import { normalizeCodeLine, snippetReadings } from './normalize.js';
import { sequenceRatio } from './similarity.js';

// ── Types ──────────────────────────────────────────────────────

export interface LineMapperOptions {
  similarityThreshold?: number;
  searchRadius?: number;
  defaultSide?: Side;
}

export interface MappingResult {
  mapped: MappedSuggestion[];
  dropped: Suggestion[];
  stats: MappingStats;
}

interface WindowMatch {
  score: number;
  /** Last commentable line inside the best window, if any */
  anchor: LineRef | null;
}

export const DEFAULT_LINE_MAPPER_OPTIONS: Required<LineMapperOptions> = {
  similarityThreshold: 0.6,
  searchRadius: 5,
  defaultSide: 'RIGHT',
};

export function emptyMappingStats(): MappingStats {
  return { exact: 0, found: 0, corrected: 0, adjusted: 0, unresolved: 0 };
}

// ── LineMapper ─────────────────────────────────────────────────

export class LineMapper {
  private readonly files = new Map<string, ParsedFileDiff>();
  private readonly options: Required<LineMapperOptions>;

  constructor(
    private readonly parsedFiles: readonly ParsedFileDiff[],
    private readonly logger: Logger,
    options: LineMapperOptions = {},
  ) {
    for (const file of parsedFiles) this.files.set(file.filePath, file);
    this.options = { ...DEFAULT_LINE_MAPPER_OPTIONS, ...options };
  }

  /** Resolve a suggestion to a postable anchor, or null when none is acceptable. */
  resolve(suggestion: Suggestion, strict = false): ResolvedAnchor | null {
    if (!suggestion.fileName || suggestion.endLine <= 0) {
      this.logger.warn(
        { file: suggestion.fileName, line: suggestion.endLine },
        'Suggestion has no file name or end line',
      );
      return null;
    }

    const filePath = stripGitPrefix(suggestion.fileName);
    const file = this.files.get(filePath);
    if (!file) {
      this.logger.warn(
        { file: suggestion.fileName, knownFiles: [...this.files.keys()] },
        'Suggested file is not part of the diff',
      );
      return null;
    }

    const claimed: LineRef = { line: suggestion.endLine, side: suggestion.side ?? this.options.defaultSide };
    const readings = snippetReadings(suggestion.existingCode).filter((r) => r.length > 0);
    const span = Math.max(suggestion.endLine - suggestion.startLine, 0);

    // Exact line, verified against the quoted code
    if (readings.length > 0 && file.isCommentable(claimed.line, claimed.side)) {
      const record = file.recordFor(claimed.line, claimed.side);
      const content = record ? normalizeCodeLine(record.content) : null;
      if (readings.some(([first]) => first === content)) {
        return this.accept(file, claimed, span, 'exact', 'exact match');
      }
    }

    // Content correction
    let working = claimed;
    let corrected = false;
    if (readings.length > 0) {
      const match = this.bestWindowOf(file, readings);
      if (match?.anchor) {
        corrected = match.anchor.line !== claimed.line || match.anchor.side !== claimed.side;
        working = match.anchor;
      } else {
        this.logger.warn(
          { file: filePath, line: claimed.line, side: claimed.side, score: match?.score ?? 0 },
          'Quoted code not located in the diff, keeping the claimed line',
        );
      }
    }

    if (file.isCommentable(working.line, working.side)) {
      return corrected
        ? this.accept(file, working, span, 'corrected', `corrected from ${claimed.line} to ${working.line}`)
        : this.accept(file, working, span, 'found', 'line number match');
    }

    if (strict) {
      this.logger.error(
        { file: filePath, line: working.line, side: working.side },
        'No commentable line matches the suggestion in strict mode',
      );
      return null;
    }

    const nearest = this.findNearest(file, working);
    if (nearest) {
      return this.accept(file, nearest, span, 'adjusted', `adjusted from ${working.line} to ${nearest.line}`);
    }

    this.logger.error(
      { file: filePath, line: working.line, side: working.side },
      'Could not map suggestion to any commentable line',
    );
    return null;
  }

  resolveAll(suggestions: readonly Suggestion[], strict = false): MappingResult {
    const result: MappingResult = { mapped: [], dropped: [], stats: emptyMappingStats() };

    for (const suggestion of suggestions) {
      const anchor = this.resolve(suggestion, strict);
      if (anchor) {
        result.mapped.push({ suggestion, anchor });
        result.stats[anchor.provenance]++;
      } else {
        result.dropped.push(suggestion);
        result.stats.unresolved++;
      }
    }

    this.logger.info({ ...result.stats, total: suggestions.length }, 'Line mapping complete');
    return result;
  }

  /** Markdown overview of every file's commentable lines and their positions. */
  generateLineMappingReport(): string {
    const report = ['# Line Mapping Report', ''];

    for (const file of this.parsedFiles) {
      report.push(`## File: ${file.filePath}`);
      report.push(`- Commentable lines: ${file.changedLineCount}`);
      report.push(`- Total lines in diff: ${file.lines.length}`);
      report.push(`- Hunks: ${file.hunks.length}`);

      const ranges = file.hunkRanges.map(
        (r) => `-${r.sourceStart}..${r.sourceEnd} +${r.targetStart}..${r.targetEnd}`,
      );
      if (ranges.length > 0) report.push(`- Hunk ranges: ${ranges.join(', ')}`);

      const commentable = file.commentableLines();
      if (commentable.length > 0) {
        report.push('', '### Commentable lines');
        for (const ref of commentable) {
          const position = file.positionFor(ref.line, ref.side);
          const record = position === undefined ? undefined : file.recordAt(position);
          report.push(`- Line ${ref.line} (${ref.side}) -> Position ${position ?? '?'}: \`${record?.raw ?? ''}\``);
        }
      }
      report.push('');
    }

    return report.join('\n');
  }

  // ── Internals ────────────────────────────────────────────────

  private accept(
    file: ParsedFileDiff,
    ref: LineRef,
    span: number,
    provenance: Exclude<AnchorProvenance, 'unresolved'>,
    reason: string,
  ): ResolvedAnchor | null {
    const position = file.positionFor(ref.line, ref.side);
    if (position === undefined) {
      this.logger.error({ file: file.filePath, line: ref.line, side: ref.side }, 'Commentable line has no position');
      return null;
    }
    const startLine = this.rangeStart(file, ref, span);

    const fields = { file: file.filePath, line: ref.line, side: ref.side, position, provenance };
    if (provenance === 'exact' || provenance === 'found') {
      this.logger.info(fields, 'Suggestion anchored');
    } else {
      this.logger.warn({ ...fields, reason }, 'Suggestion anchor moved');
    }

    return {
      filePath: file.filePath,
      position,
      line: ref.line,
      side: ref.side,
      ...(startLine === undefined ? {} : { startLine }),
      provenance,
      reason,
    };
  }

  /** Start of a multi-line range ending at `ref`, if the whole range sits in one hunk. */
  private rangeStart(file: ParsedFileDiff, ref: LineRef, span: number): number | undefined {
    if (span <= 0) return undefined;
    const start = ref.line - span;
    const first = file.recordFor(start, ref.side);
    const last = file.recordFor(ref.line, ref.side);
    if (!first || !last || first.hunkIndex !== last.hunkIndex) return undefined;
    return start;
  }

  /** Best window across every reading of the snippet; earlier readings win ties. */
  private bestWindowOf(file: ParsedFileDiff, readings: string[][]): WindowMatch | null {
    let best: WindowMatch | null = null;
    for (const snippet of readings) {
      const match = this.findBestWindow(file, snippet);
      if (match && (!best || match.score > best.score)) best = match;
    }
    return best;
  }

  /** Slide a window of the snippet's size over the diff and keep the best-scoring one. */
  private findBestWindow(file: ParsedFileDiff, snippet: string[]): WindowMatch | null {
    const target = snippet.join('\n');
    const size = snippet.length;
    const lines = file.lines;
    let best: { start: number; score: number } | null = null;

    for (let start = 0; start + size <= lines.length; start++) {
      const window = lines
        .slice(start, start + size)
        .map((l) => normalizeCodeLine(l.content))
        .join('\n');
      const score = sequenceRatio(window, target);
      if (!best || score > best.score) best = { start, score };
    }

    if (!best) return null;
    if (best.score < this.options.similarityThreshold) return { score: best.score, anchor: null };

    let anchor: LineRef | null = null;
    for (const record of lines.slice(best.start, best.start + size)) {
      if (record.kind === 'added' && record.targetLine !== null) {
        anchor = { line: record.targetLine, side: 'RIGHT' };
      } else if (record.kind === 'removed' && record.sourceLine !== null) {
        anchor = { line: record.sourceLine, side: 'LEFT' };
      }
    }

    this.logger.debug(
      { file: file.filePath, score: best.score, windowStart: best.start, anchor },
      'Best content window',
    );
    return { score: best.score, anchor };
  }

  /** Nearest commentable line on the same side (lower line first), then the other side. */
  private findNearest(file: ParsedFileDiff, ref: LineRef): LineRef | null {
    for (let offset = 1; offset <= this.options.searchRadius; offset++) {
      for (const line of [ref.line - offset, ref.line + offset]) {
        if (line > 0 && file.isCommentable(line, ref.side)) return { line, side: ref.side };
      }
    }

    const other = oppositeSide(ref.side);
    if (file.isCommentable(ref.line, other)) return { line: ref.line, side: other };
    return null;
  }
}
