/**
 * Code-text normalization shared by the line mapper, the suggestion filter
 * and duplicate detection. Models quote code loosely: elided regions,
 * re-indented lines and stray diff markers must not defeat a comparison.
 */

const ELLIPSIS_ONLY = /^(?:\/\/|#|\/\*|\*|<!--)?\s*(?:\.{3,}|…)\s*(?:\*\/|-->)?$/;
const TRAILING_ELLIPSIS = /\s*(?:\.{3,}|…)$/;
const DIFF_MARKER = /^[+\- ]/;

/** Remove the leading `+`, `-` or space of a diff line. */
export function stripDiffMarker(line: string): string {
  return DIFF_MARKER.test(line) ? line.slice(1) : line;
}

/** Normalize one line of code; returns '' for lines that carry no content. */
export function normalizeCodeLine(line: string): string {
  const trimmed = line.trim();
  if (ELLIPSIS_ONLY.test(trimmed)) return '';
  return trimmed.replace(TRAILING_ELLIPSIS, '').split(/\s+/).filter(Boolean).join(' ');
}

/**
 * True when every non-blank line starts with a diff marker and at least one
 * of them is `+` or `-`, i.e. the text was pasted straight out of a diff.
 */
function looksLikeDiffExcerpt(lines: string[]): boolean {
  const nonBlank = lines.filter((l) => l.trim() !== '');
  return (
    nonBlank.length > 0 &&
    nonBlank.every((l) => DIFF_MARKER.test(l)) &&
    nonBlank.some((l) => l.startsWith('+') || l.startsWith('-'))
  );
}

export interface SnippetOptions {
  /** Keep leading `+`/`-` even when the snippet looks like a diff excerpt */
  keepMarkers?: boolean;
}

/** Normalize a code snippet into its non-blank lines. */
export function normalizeSnippet(code: string | undefined, options: SnippetOptions = {}): string[] {
  if (!code) return [];
  let lines = code.split(/\r?\n/);
  if (!options.keepMarkers && looksLikeDiffExcerpt(lines)) {
    lines = lines.map(stripDiffMarker);
  }
  return lines.map(normalizeCodeLine).filter((l) => l !== '');
}

/**
 * Every plausible reading of a quoted snippet. Code such as a YAML list item
 * or `--count;` looks like a diff excerpt, so a snippet whose markers would be
 * stripped is also offered verbatim. The stripped reading comes first.
 */
export function snippetReadings(code: string | undefined): string[][] {
  const stripped = normalizeSnippet(code);
  const verbatim = normalizeSnippet(code, { keepMarkers: true });
  const same = stripped.length === verbatim.length && stripped.every((line, i) => line === verbatim[i]);
  return same ? [stripped] : [stripped, verbatim];
}

/** Normalize a snippet into the single string used for similarity scoring. */
export function normalizeCode(code: string | undefined): string {
  return normalizeSnippet(code).join('\n');
}
