/**
 * GitHub CLI wrappers (github.ts)
 *
 * Tests getPRInfo, getPRDiff, fetchPRReviewComments and postPRReview
 * by mocking the process execution layer.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../git/process.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../git/process.js')>();
  return { ...actual, execute: vi.fn() };
});

import { execute, ProcessExecutionError } from '../git/process.js';
import {
  getPRInfo,
  getPRDiff,
  fetchPRReviewComments,
  postPRReview,
} from '../git/github.js';

const mockExecute = vi.mocked(execute);

function ok(stdout: string) {
  return { exitCode: 0, stdout, stderr: '' };
}

describe('GitHub CLI wrappers', () => {
  beforeEach(() => {
    mockExecute.mockReset();
  });

  // ── getPRInfo ─────────────────────────────────────────────

  describe('getPRInfo', () => {
    it('maps gh pr view output onto PRInfo', async () => {
      mockExecute.mockResolvedValueOnce(ok(JSON.stringify({
        number: 42,
        title: 'Add retry logic',
        body: 'Retries flaky uploads.',
        author: { login: 'alice' },
        headRefName: 'feature/retry',
        baseRefName: 'main',
        headRefOid: 'abc123',
        additions: 10,
        deletions: 2,
        changedFiles: 3,
      })));

      const result = await getPRInfo('/repo', 42);

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value).toEqual({
          number: 42,
          title: 'Add retry logic',
          body: 'Retries flaky uploads.',
          author: 'alice',
          headBranch: 'feature/retry',
          baseBranch: 'main',
          headSha: 'abc123',
          additions: 10,
          deletions: 2,
          changedFiles: 3,
        });
      }
      expect(mockExecute).toHaveBeenCalledWith(
        'gh',
        ['pr', 'view', '42', '--json',
          'number,title,body,author,headRefName,baseRefName,headRefOid,additions,deletions,changedFiles'],
        { cwd: '/repo', timeout: 30_000, reject: false },
      );
    });

    it('fills defaults for missing fields', async () => {
      mockExecute.mockResolvedValueOnce(ok(JSON.stringify({ body: null })));

      const result = await getPRInfo('/repo', 7);

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value.number).toBe(7);
        expect(result.value.title).toBe('');
        expect(result.value.body).toBe('');
        expect(result.value.author).toBe('');
      }
    });

    it('returns an INTERNAL error when gh exits non-zero', async () => {
      mockExecute.mockResolvedValueOnce({ exitCode: 1, stdout: '', stderr: 'no pull requests found' });

      const result = await getPRInfo('/repo', 1);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.type).toBe('INTERNAL');
        expect(result.error.message).toBe('gh pr view failed: no pull requests found');
      }
    });

    it('returns a VALIDATION error for unexpected JSON', async () => {
      mockExecute.mockResolvedValueOnce(ok(JSON.stringify({ title: 42 })));

      const result = await getPRInfo('/repo', 1);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.type).toBe('VALIDATION');
      }
    });
  });

  // ── getPRDiff ─────────────────────────────────────────────

  describe('getPRDiff', () => {
    it('returns stdout as the diff text', async () => {
      mockExecute.mockResolvedValueOnce(ok('diff --git a/x b/x\n'));

      const result = await getPRDiff('/repo', 3);

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value).toBe('diff --git a/x b/x\n');
      }
    });

    it('maps ProcessExecutionError to PROCESS_ERROR', async () => {
      mockExecute.mockRejectedValueOnce(
        new ProcessExecutionError('"gh pr diff 3" timed out after 60000ms', 'gh pr diff 3', -1, ''),
      );

      const result = await getPRDiff('/repo', 3);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toEqual({
          type: 'PROCESS_ERROR',
          message: '"gh pr diff 3" timed out after 60000ms',
          exitCode: -1,
          stderr: '',
        });
      }
    });
  });

  // ── fetchPRReviewComments ─────────────────────────────────

  describe('fetchPRReviewComments', () => {
    it('maps REST review comments printed one per line', async () => {
      mockExecute.mockResolvedValueOnce(ok([
        JSON.stringify({
          id: 11,
          user: { login: 'anchorbot[bot]' },
          body: 'Guard against null.',
          path: 'src/app.ts',
          line: 12,
          start_line: 10,
          side: 'RIGHT',
        }),
        JSON.stringify({ id: 12, user: null, body: null, path: 'README.md', line: null }),
        '',
      ].join('\n')));

      const result = await fetchPRReviewComments('/repo', 5);

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value).toEqual([
          {
            id: 11,
            author: 'anchorbot[bot]',
            body: 'Guard against null.',
            path: 'src/app.ts',
            line: 12,
            startLine: 10,
            side: 'RIGHT',
          },
          {
            id: 12,
            author: '',
            body: '',
            path: 'README.md',
            line: null,
            startLine: null,
            side: null,
          },
        ]);
      }
      expect(mockExecute.mock.calls[0]?.[1]).toEqual([
        'api',
        '--paginate',
        '--jq',
        '.[]',
        'repos/{owner}/{repo}/pulls/5/comments?per_page=100',
      ]);
    });

    it('returns an empty list when the PR has no comments', async () => {
      mockExecute.mockResolvedValueOnce(ok(''));

      const result = await fetchPRReviewComments('/repo', 5);

      expect(result.isOk() && result.value).toEqual([]);
    });

    it('maps a non-zero exit to a process error', async () => {
      mockExecute.mockResolvedValueOnce({ exitCode: 1, stdout: '', stderr: 'HTTP 404' });

      const result = await fetchPRReviewComments('/repo', 5);

      expect(result.isErr()).toBe(true);
    });
  });

  // ── postPRReview ──────────────────────────────────────────

  describe('postPRReview', () => {
    it('sends the review as JSON on stdin', async () => {
      mockExecute.mockResolvedValueOnce(ok(JSON.stringify({ id: 901 })));

      const result = await postPRReview('/repo', 8, {
        body: 'Summary',
        event: 'COMMENT',
        comments: [{ path: 'src/app.ts', body: 'Rename this.', position: 4 }],
        commitId: 'abc123',
      });

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value).toBe(901);
      }

      expect(mockExecute).toHaveBeenCalledWith(
        'gh',
        ['api', '--method', 'POST', 'repos/{owner}/{repo}/pulls/8/reviews', '--input', '-'],
        expect.objectContaining({ cwd: '/repo', timeout: 30_000 }),
      );
      const input = mockExecute.mock.calls[0]?.[2]?.input ?? '';
      expect(JSON.parse(input)).toEqual({
        body: 'Summary',
        event: 'COMMENT',
        comments: [{ path: 'src/app.ts', body: 'Rename this.', position: 4 }],
        commit_id: 'abc123',
      });
    });

    it('sends multi-line comments with start_line and start_side', async () => {
      mockExecute.mockResolvedValueOnce(ok(JSON.stringify({ id: 2 })));

      await postPRReview('/repo', 8, {
        body: 'Summary',
        event: 'COMMENT',
        comments: [
          { path: 'src/app.ts', body: 'Merge these.', line: 3, side: 'RIGHT', startLine: 2, startSide: 'RIGHT' },
          { path: 'src/app.ts', body: 'Typo.', line: 9, side: 'LEFT' },
        ],
      });

      const input = mockExecute.mock.calls[0]?.[2]?.input ?? '';
      expect(JSON.parse(input).comments).toEqual([
        { path: 'src/app.ts', body: 'Merge these.', line: 3, side: 'RIGHT', start_line: 2, start_side: 'RIGHT' },
        { path: 'src/app.ts', body: 'Typo.', line: 9, side: 'LEFT' },
      ]);
    });

    it('omits commit_id when none is given', async () => {
      mockExecute.mockResolvedValueOnce(ok(JSON.stringify({ id: 1 })));

      await postPRReview('/repo', 8, { body: 'LGTM', event: 'APPROVE', comments: [] });

      const input = mockExecute.mock.calls[0]?.[2]?.input ?? '';
      expect(JSON.parse(input)).toEqual({
        body: 'LGTM',
        event: 'APPROVE',
        comments: [],
      });
    });
  });
});
