/**
 * DiffParser — unified diff text → one ParsedFileDiff per changed file.
 *
 * Each ParsedFileDiff keeps every diff line once, in diff order, and indexes
 * it by (line, side) and by diff position. Positions follow the review-comment
 * scheme of the hosting API: the first line below the file's first `@@`
 * header is position 1, and numbering runs on through later hunks, each later
 * `@@` header taking one position of its own.
 */

import parseDiffText from 'parse-diff';
import type { Chunk, File } from 'parse-diff';
import type { Side } from '@anchorbot/shared';
import type { Logger } from './infrastructure/logger.js';

// ── Types ──────────────────────────────────────────────────────

export type LineKind = 'added' | 'removed' | 'context';

export interface DiffLine {
  kind: LineKind;
  /** Line text without its diff marker */
  content: string;
  /** Line text as it appears in the diff, marker included */
  raw: string;
  position: number;
  /** Old-file line number; null for added lines */
  sourceLine: number | null;
  /** New-file line number; null for removed lines */
  targetLine: number | null;
  hunkIndex: number;
}

export interface Hunk {
  header: string;
  sourceStart: number;
  sourceLength: number;
  targetStart: number;
  targetLength: number;
  lines: readonly DiffLine[];
}

export interface HunkRange {
  sourceStart: number;
  sourceEnd: number;
  targetStart: number;
  targetEnd: number;
}

export interface LineRef {
  line: number;
  side: Side;
}

const DEV_NULL = '/dev/null';

/** Drop the `a/` or `b/` prefix git puts on diff paths. */
export function stripGitPrefix(fileName: string): string {
  return fileName.startsWith('a/') || fileName.startsWith('b/') ? fileName.slice(2) : fileName;
}

function keyOf(line: number, side: Side): string {
  return `${side}:${line}`;
}

function rangeEnd(start: number, length: number): number {
  return start + Math.max(length - 1, 0);
}

// ── ParsedFileDiff ─────────────────────────────────────────────

export class ParsedFileDiff {
  readonly filePath: string;
  readonly oldPath: string | null;
  readonly hunks: readonly Hunk[];
  /** Every diff line of the file in diff order */
  readonly lines: readonly DiffLine[];

  private readonly commentableIndex = new Map<string, number>();
  private readonly allIndex = new Map<string, number>();
  private readonly positionIndex = new Map<number, number>();

  constructor(filePath: string, oldPath: string | null, hunks: Hunk[], logger: Logger) {
    this.filePath = filePath;
    this.oldPath = oldPath;
    this.hunks = hunks;
    this.lines = hunks.flatMap((h) => h.lines);

    this.lines.forEach((record, index) => {
      this.positionIndex.set(record.position, index);

      if (record.kind === 'added' && record.targetLine !== null) {
        this.indexCommentable(record.targetLine, 'RIGHT', index, logger);
      } else if (record.kind === 'removed' && record.sourceLine !== null) {
        this.indexCommentable(record.sourceLine, 'LEFT', index, logger);
      } else {
        if (record.sourceLine !== null) this.indexLine(record.sourceLine, 'LEFT', index);
        if (record.targetLine !== null) this.indexLine(record.targetLine, 'RIGHT', index);
      }
    });
  }

  private indexCommentable(line: number, side: Side, index: number, logger: Logger): void {
    const key = keyOf(line, side);
    if (this.commentableIndex.has(key)) {
      logger.warn({ file: this.filePath, line, side }, 'Duplicate diff line key, keeping the first occurrence');
      return;
    }
    this.commentableIndex.set(key, index);
    this.indexLine(line, side, index);
  }

  private indexLine(line: number, side: Side, index: number): void {
    const key = keyOf(line, side);
    if (!this.allIndex.has(key)) this.allIndex.set(key, index);
  }

  /** True for added (RIGHT) and removed (LEFT) lines; context lines never qualify. */
  isCommentable(line: number, side: Side): boolean {
    return this.commentableIndex.has(keyOf(line, side));
  }

  /** Diff position of a commentable line. */
  positionFor(line: number, side: Side): number | undefined {
    const index = this.commentableIndex.get(keyOf(line, side));
    return index === undefined ? undefined : this.lines[index]?.position;
  }

  /** The line shown at a position. Context lines report their RIGHT-side number. */
  lineAt(position: number): LineRef | undefined {
    const record = this.recordAt(position);
    if (!record) return undefined;
    if (record.targetLine !== null) return { line: record.targetLine, side: 'RIGHT' };
    if (record.sourceLine !== null) return { line: record.sourceLine, side: 'LEFT' };
    return undefined;
  }

  recordAt(position: number): DiffLine | undefined {
    const index = this.positionIndex.get(position);
    return index === undefined ? undefined : this.lines[index];
  }

  /** Any line, context included, by (line, side). Not a valid comment anchor by itself. */
  recordFor(line: number, side: Side): DiffLine | undefined {
    const index = this.allIndex.get(keyOf(line, side));
    return index === undefined ? undefined : this.lines[index];
  }

  /** Every commentable (line, side) in diff order. */
  commentableLines(): LineRef[] {
    const refs: LineRef[] = [];
    for (const record of this.lines) {
      if (record.kind === 'added' && record.targetLine !== null && this.isCommentable(record.targetLine, 'RIGHT')) {
        refs.push({ line: record.targetLine, side: 'RIGHT' });
      } else if (record.kind === 'removed' && record.sourceLine !== null && this.isCommentable(record.sourceLine, 'LEFT')) {
        refs.push({ line: record.sourceLine, side: 'LEFT' });
      }
    }
    return refs;
  }

  get changedLineCount(): number {
    return this.commentableIndex.size;
  }

  get hunkRanges(): HunkRange[] {
    return this.hunks.map((h) => ({
      sourceStart: h.sourceStart,
      sourceEnd: rangeEnd(h.sourceStart, h.sourceLength),
      targetStart: h.targetStart,
      targetEnd: rangeEnd(h.targetStart, h.targetLength),
    }));
  }

  /** The file's diff segment, re-rendered as unified diff text. */
  get rawDiffText(): string {
    const out = [
      `--- ${this.oldPath === null ? DEV_NULL : `a/${this.oldPath}`}`,
      `+++ ${this.hunks.every((h) => h.targetLength === 0) ? DEV_NULL : `b/${this.filePath}`}`,
    ];
    for (const hunk of this.hunks) {
      out.push(hunk.header);
      for (const line of hunk.lines) out.push(line.raw);
    }
    return out.join('\n');
  }

  /**
   * Prompt-oriented rendering: per hunk, the new-side view with target line
   * numbers, then the old-side view with source line numbers when the hunk
   * removes anything.
   */
  toDecoupledFormat(): string {
    const out: string[] = [`## File: '${this.filePath}'`, ''];

    for (const hunk of this.hunks) {
      out.push(hunk.header);
      out.push('__new hunk__');
      for (const line of hunk.lines) {
        if (line.kind !== 'removed') out.push(`${line.targetLine ?? ''} ${line.raw}`);
      }

      if (hunk.lines.some((l) => l.kind === 'removed')) {
        out.push('__old hunk__');
        for (const line of hunk.lines) {
          if (line.kind !== 'added') out.push(`${line.sourceLine ?? ''} ${line.raw}`);
        }
      }
      out.push('');
    }

    return out.join('\n').trimEnd();
  }
}

// ── Parsing ────────────────────────────────────────────────────

class MalformedDiffError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedDiffError';
  }
}

function resolvePaths(file: File): { filePath: string; oldPath: string | null } | null {
  const to = file.to && file.to !== DEV_NULL ? file.to : null;
  const from = file.from && file.from !== DEV_NULL ? file.from : null;
  const filePath = to ?? from;
  if (!filePath) return null;
  return { filePath, oldPath: from };
}

function buildHunk(chunk: Chunk, hunkIndex: number, startPosition: number): Hunk {
  const lines: DiffLine[] = [];
  let position = startPosition;

  for (const change of chunk.changes) {
    // "\ No newline at end of file" annotates the previous line
    if (change.content.startsWith('\\')) continue;

    position++;
    const content = change.content.slice(1);
    switch (change.type) {
      case 'add':
        lines.push({ kind: 'added', content, raw: `+${content}`, position, sourceLine: null, targetLine: change.ln, hunkIndex });
        break;
      case 'del':
        lines.push({ kind: 'removed', content, raw: `-${content}`, position, sourceLine: change.ln, targetLine: null, hunkIndex });
        break;
      case 'normal':
        lines.push({ kind: 'context', content, raw: ` ${content}`, position, sourceLine: change.ln1, targetLine: change.ln2, hunkIndex });
        break;
    }
  }

  const sourceCount = lines.filter((l) => l.kind !== 'added').length;
  const targetCount = lines.filter((l) => l.kind !== 'removed').length;
  if (sourceCount !== chunk.oldLines || targetCount !== chunk.newLines) {
    throw new MalformedDiffError(
      `Hunk "${chunk.content}" declares -${chunk.oldLines} +${chunk.newLines} lines but contains -${sourceCount} +${targetCount}`,
    );
  }

  return {
    header: chunk.content,
    sourceStart: chunk.oldStart,
    sourceLength: chunk.oldLines,
    targetStart: chunk.newStart,
    targetLength: chunk.newLines,
    lines,
  };
}

function buildFile(file: File, logger: Logger): ParsedFileDiff | null {
  const paths = resolvePaths(file);

  if (file.chunks.length === 0) {
    logger.debug({ file: paths?.filePath }, 'Skipping diff entry without hunks');
    return null;
  }

  if (!paths) {
    throw new MalformedDiffError('Diff entry has neither a source nor a target path');
  }

  const hunks: Hunk[] = [];
  let position = 0;
  file.chunks.forEach((chunk, index) => {
    // Later hunk headers occupy a position of their own
    if (index > 0) position++;
    const hunk = buildHunk(chunk, index, position);
    position = hunk.lines.at(-1)?.position ?? position;
    hunks.push(hunk);
  });

  return new ParsedFileDiff(paths.filePath, paths.oldPath, hunks, logger);
}

/**
 * Parse unified diff text. Never throws: malformed input yields an empty
 * list and a warning, so callers treat it as "nothing to review".
 */
export function parseDiff(diffText: string, logger: Logger): ParsedFileDiff[] {
  if (!diffText.trim()) return [];

  let result: ParsedFileDiff[];
  try {
    result = parseDiffText(diffText)
      .map((file) => buildFile(file, logger))
      .filter((f): f is ParsedFileDiff => f !== null);
  } catch (err) {
    logger.warn(
      { err: err instanceof Error ? err.message : String(err) },
      'Unparseable diff, treating it as empty',
    );
    return [];
  }

  if (result.length === 0) {
    logger.warn({ length: diffText.length }, 'Diff text contained no reviewable file entries');
  }

  logger.debug(
    { files: result.length, changedLines: result.reduce((n, f) => n + f.changedLineCount, 0) },
    'Parsed diff',
  );
  return result;
}
