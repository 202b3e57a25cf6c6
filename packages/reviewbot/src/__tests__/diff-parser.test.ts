import { describe, it, expect, vi } from 'vitest';

import { parseDiff } from '../diff-parser.js';
import { DELETED_FILE_DIFF, NEW_FILE_DIFF, TWO_HUNK_DIFF, silentLogger } from './fixtures.js';

describe('parseDiff', () => {
  // ── File entries ────────────────────────────────────────────

  it('returns one entry per changed file with hunks and lines', () => {
    const [file, ...rest] = parseDiff(TWO_HUNK_DIFF, silentLogger());

    expect(rest).toHaveLength(0);
    expect(file?.filePath).toBe('src/app.py');
    expect(file?.oldPath).toBe('src/app.py');
    expect(file?.hunks).toHaveLength(2);
    expect(file?.lines).toHaveLength(8);
  });

  it('returns [] for empty or whitespace-only input without warning', () => {
    const logger = silentLogger();
    const warn = vi.spyOn(logger, 'warn');

    expect(parseDiff('', logger)).toEqual([]);
    expect(parseDiff('  \n\n', logger)).toEqual([]);
    expect(warn).not.toHaveBeenCalled();
  });

  it('handles added and deleted files', () => {
    const files = parseDiff(`${NEW_FILE_DIFF}${DELETED_FILE_DIFF}`, silentLogger());

    expect(files.map((f) => f.filePath)).toEqual(['docs/new.md', 'old.txt']);

    const [added, deleted] = files;
    expect(added?.oldPath).toBeNull();
    expect(added?.positionFor(1, 'RIGHT')).toBe(1);
    expect(added?.positionFor(2, 'RIGHT')).toBe(2);

    expect(deleted?.isCommentable(1, 'LEFT')).toBe(true);
    expect(deleted?.isCommentable(1, 'RIGHT')).toBe(false);
    expect(deleted?.positionFor(2, 'LEFT')).toBe(2);
  });

  it('skips "No newline at end of file" markers', () => {
    const diff = [
      '--- a/x.txt',
      '+++ b/x.txt',
      '@@ -1 +1 @@',
      '-old',
      '\\ No newline at end of file',
      '+new',
      '\\ No newline at end of file',
      '',
    ].join('\n');

    const [file] = parseDiff(diff, silentLogger());

    expect(file?.lines.map((l) => l.raw)).toEqual(['-old', '+new']);
    expect(file?.positionFor(1, 'LEFT')).toBe(1);
    expect(file?.positionFor(1, 'RIGHT')).toBe(2);
  });

  it('skips files without hunks', () => {
    const binary = [
      'diff --git a/img.png b/img.png',
      'index 1111111..2222222 100644',
      'Binary files a/img.png and b/img.png differ',
      '',
    ].join('\n');

    const files = parseDiff(`${binary}${NEW_FILE_DIFF}`, silentLogger());

    expect(files.map((f) => f.filePath)).toEqual(['docs/new.md']);
  });

  it('returns [] and warns when a hunk disagrees with its header', () => {
    const logger = silentLogger();
    const warn = vi.spyOn(logger, 'warn');
    const diff = [
      '--- a/x.txt',
      '+++ b/x.txt',
      '@@ -1,3 +1,3 @@',
      ' a',
      '-b',
      '+c',
      '',
    ].join('\n');

    expect(parseDiff(diff, logger)).toEqual([]);
    expect(warn).toHaveBeenCalled();
  });

  it('warns when non-empty input contains no file entries', () => {
    const logger = silentLogger();
    const warn = vi.spyOn(logger, 'warn');

    expect(parseDiff('just some text\n', logger)).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe('ParsedFileDiff', () => {
  const [file] = parseDiff(TWO_HUNK_DIFF, silentLogger());
  if (!file) throw new Error('fixture did not parse');

  // ── Positions ───────────────────────────────────────────────

  it('numbers positions from the first hunk header, counting later headers', () => {
    expect(file.lines.map((l) => l.position)).toEqual([1, 2, 3, 4, 5, 7, 8, 9]);
    expect(file.positionFor(2, 'LEFT')).toBe(2);
    expect(file.positionFor(2, 'RIGHT')).toBe(3);
    expect(file.positionFor(3, 'RIGHT')).toBe(4);
    expect(file.positionFor(12, 'RIGHT')).toBe(8);
  });

  it('tracks source and target line numbers per record', () => {
    expect(file.recordAt(7)).toMatchObject({ kind: 'context', sourceLine: 10, targetLine: 11, hunkIndex: 1 });
    expect(file.recordAt(2)).toMatchObject({ kind: 'removed', sourceLine: 2, targetLine: null, content: '    print("hello")' });
    expect(file.recordAt(6)).toBeUndefined();
  });

  it('maps positions back to lines, reporting context lines on RIGHT', () => {
    expect(file.lineAt(1)).toEqual({ line: 1, side: 'RIGHT' });
    expect(file.lineAt(2)).toEqual({ line: 2, side: 'LEFT' });
    expect(file.lineAt(5)).toEqual({ line: 4, side: 'RIGHT' });
    expect(file.lineAt(6)).toBeUndefined();
    expect(file.lineAt(7)).toEqual({ line: 11, side: 'RIGHT' });
  });

  // ── Commentable lines ───────────────────────────────────────

  it('never treats context lines as commentable', () => {
    expect(file.isCommentable(1, 'RIGHT')).toBe(false);
    expect(file.isCommentable(1, 'LEFT')).toBe(false);
    expect(file.positionFor(4, 'RIGHT')).toBeUndefined();
    expect(file.recordFor(4, 'RIGHT')?.content).toBe('    return None');
    expect(file.recordFor(3, 'LEFT')?.content).toBe('    return None');
  });

  it('lists commentable lines in diff order', () => {
    expect(file.commentableLines()).toEqual([
      { line: 2, side: 'LEFT' },
      { line: 2, side: 'RIGHT' },
      { line: 3, side: 'RIGHT' },
      { line: 12, side: 'RIGHT' },
    ]);
    expect(file.changedLineCount).toBe(4);
  });

  it('round-trips every commentable line through its position', () => {
    for (const ref of file.commentableLines()) {
      const position = file.positionFor(ref.line, ref.side);
      expect(position).toBeDefined();
      expect(position === undefined ? undefined : file.lineAt(position)).toEqual(ref);
    }
  });

  it('reports hunk ranges', () => {
    expect(file.hunkRanges).toEqual([
      { sourceStart: 1, sourceEnd: 3, targetStart: 1, targetEnd: 4 },
      { sourceStart: 10, sourceEnd: 11, targetStart: 11, targetEnd: 13 },
    ]);
  });

  // ── Rendering ───────────────────────────────────────────────

  it('re-renders the file segment as unified diff text', () => {
    const [added] = parseDiff(NEW_FILE_DIFF, silentLogger());

    expect(added?.rawDiffText).toBe(
      ['--- /dev/null', '+++ b/docs/new.md', '@@ -0,0 +1,2 @@', '+# Title', '+Body'].join('\n'),
    );
  });

  it('renders the decoupled new/old hunk format', () => {
    expect(file.toDecoupledFormat()).toBe(
      [
        "## File: 'src/app.py'",
        '',
        '@@ -1,3 +1,4 @@',
        '__new hunk__',
        '1  def hello():',
        '2 +    print("hi")',
        '3 +    print("world")',
        '4      return None',
        '__old hunk__',
        '1  def hello():',
        '2 -    print("hello")',
        '3      return None',
        '',
        '@@ -10,2 +11,3 @@ def other():',
        '__new hunk__',
        '11      x = 1',
        '12 +    y = 2',
        '13      return x',
      ].join('\n'),
    );
  });
});
