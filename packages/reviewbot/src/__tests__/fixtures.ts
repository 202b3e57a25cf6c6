import { pino } from 'pino';
import type { Suggestion } from '@anchorbot/shared';

export function silentLogger() {
  return pino({ level: 'silent' });
}

/**
 * Positions: 1 ` def hello():`, 2 `-print("hello")`, 3 `+print("hi")`,
 * 4 `+print("world")`, 5 ` return None`, 6 second `@@` header,
 * 7 ` x = 1`, 8 `+y = 2`, 9 ` return x`.
 */
export const TWO_HUNK_DIFF = [
  'diff --git a/src/app.py b/src/app.py',
  'index 1111111..2222222 100644',
  '--- a/src/app.py',
  '+++ b/src/app.py',
  '@@ -1,3 +1,4 @@',
  ' def hello():',
  '-    print("hello")',
  '+    print("hi")',
  '+    print("world")',
  '     return None',
  '@@ -10,2 +11,3 @@ def other():',
  '     x = 1',
  '+    y = 2',
  '     return x',
  '',
].join('\n');

export const NEW_FILE_DIFF = [
  'diff --git a/docs/new.md b/docs/new.md',
  'new file mode 100644',
  'index 0000000..3333333',
  '--- /dev/null',
  '+++ b/docs/new.md',
  '@@ -0,0 +1,2 @@',
  '+# Title',
  '+Body',
  '',
].join('\n');

export const DELETED_FILE_DIFF = [
  'diff --git a/old.txt b/old.txt',
  'deleted file mode 100644',
  'index 4444444..0000000',
  '--- a/old.txt',
  '+++ /dev/null',
  '@@ -1,2 +0,0 @@',
  '-first',
  '-second',
  '',
].join('\n');

/** One added line, RIGHT 3 at position 3, with no removals. */
export const SINGLE_ADD_DIFF = [
  'diff --git a/src/util.py b/src/util.py',
  '--- a/src/util.py',
  '+++ b/src/util.py',
  '@@ -1,3 +1,4 @@',
  ' a = 1',
  ' b = 2',
  '+c = 3',
  ' d = 4',
  '',
].join('\n');

/**
 * A three-line block replaced by two, which shifts every later new-file line
 * up by one. `return default()` is RIGHT 5 at position 9, `log(c)` RIGHT 6.
 */
export const SHIFTED_BLOCK_DIFF = [
  'diff --git a/src/run.py b/src/run.py',
  '--- a/src/run.py',
  '+++ b/src/run.py',
  '@@ -1,6 +1,6 @@',
  ' def run():',
  '-    a = load()',
  '-    b = parse(a)',
  '-    c = check(b)',
  '+    data = parse(load())',
  '+    c = check(data)',
  '     if not c:',
  '-        return None',
  '+        return default()',
  '+    log(c)',
  '',
].join('\n');

/** A YAML list item added at RIGHT 2, position 2. */
export const YAML_LIST_DIFF = [
  'diff --git a/ci.yml b/ci.yml',
  '--- a/ci.yml',
  '+++ b/ci.yml',
  '@@ -1,2 +1,3 @@',
  ' steps:',
  '+- name: build',
  ' - name: test',
  '',
].join('\n');

export function suggestion(overrides: Partial<Suggestion> = {}): Suggestion {
  return {
    fileName: 'src/app.py',
    startLine: 2,
    endLine: 2,
    comment: 'This could throw when the list is empty; guard it.',
    category: 'bug',
    suggestedCode: 'if items:\n    first = items[0]',
    existingCode: 'first = items[0]',
    ...overrides,
  };
}
