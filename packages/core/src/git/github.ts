/**
 * GitHub CLI wrappers for PR review operations.
 *
 * Uses `gh` CLI via `execute()` from process.ts.
 * Returns ResultAsync<T, DomainError> per codebase convention.
 */

import { ResultAsync } from 'neverthrow';
import { z } from 'zod';
import { processError, internal, validationErr, type DomainError } from '@anchorbot/shared/errors';
import type { ReviewEvent, Side } from '@anchorbot/shared';
import { execute, ProcessExecutionError } from './process.js';

// ── Types ────────────────────────────────────────────────────

export interface PRInfo {
  number: number;
  title: string;
  body: string;
  author: string;
  headBranch: string;
  baseBranch: string;
  headSha: string;
  additions: number;
  deletions: number;
  changedFiles: number;
}

export interface PRReviewComment {
  id: number;
  author: string;
  body: string;
  path: string;
  line: number | null;
  startLine: number | null;
  side: Side | null;
}

/**
 * An inline comment on a review. GitHub accepts either the legacy diff
 * `position` or an explicit `line` + `side`; only the latter can span
 * several lines, from `startLine` to `line`.
 */
export type ReviewComment =
  | { path: string; body: string; position: number }
  | { path: string; body: string; line: number; side: Side; startLine?: number; startSide?: Side };

export interface ReviewSubmission {
  body: string;
  event: ReviewEvent;
  comments: ReviewComment[];
  /** Pin the review to a head commit so positions stay valid */
  commitId?: string;
}

// ── Wire schemas ─────────────────────────────────────────────

const PRViewSchema = z.object({
  number: z.number().optional(),
  title: z.string().nullish(),
  body: z.string().nullish(),
  author: z.object({ login: z.string() }).nullish(),
  headRefName: z.string().nullish(),
  baseRefName: z.string().nullish(),
  headRefOid: z.string().nullish(),
  additions: z.number().nullish(),
  deletions: z.number().nullish(),
  changedFiles: z.number().nullish(),
});

const ReviewCommentSchema = z.object({
  id: z.number(),
  user: z.object({ login: z.string() }).nullish(),
  body: z.string().nullish(),
  path: z.string().nullish(),
  line: z.number().nullish(),
  start_line: z.number().nullish(),
  side: z.enum(['LEFT', 'RIGHT']).nullish(),
});

const PostedReviewSchema = z.object({ id: z.number() });

// ── Helpers ──────────────────────────────────────────────────

function toDomainError(error: unknown): DomainError {
  if (error instanceof ProcessExecutionError) {
    return processError(error.message, error.exitCode, error.stderr);
  }
  if (error instanceof z.ZodError) {
    return validationErr(`Unexpected gh output: ${error.issues.map((i) => i.message).join('; ')}`);
  }
  return internal(error instanceof Error ? error.message : String(error));
}

function toWireComment(comment: ReviewComment) {
  if ('position' in comment) return comment;
  const { startLine, startSide, ...rest } = comment;
  return {
    ...rest,
    ...(startLine === undefined ? {} : { start_line: startLine, start_side: startSide ?? comment.side }),
  };
}

function parseJSON(stdout: string): unknown {
  return JSON.parse(stdout) as unknown;
}

/** One JSON value per non-blank line, as `gh api --jq '.[]'` prints them. */
function parseJSONLines(stdout: string): unknown[] {
  return stdout
    .split('\n')
    .filter((line) => line.trim() !== '')
    .map(parseJSON);
}

// ── Functions ────────────────────────────────────────────────

/**
 * Fetch PR metadata via `gh pr view --json`.
 */
export function getPRInfo(cwd: string, prNumber: number): ResultAsync<PRInfo, DomainError> {
  return ResultAsync.fromPromise(
    (async () => {
      const result = await execute(
        'gh',
        ['pr', 'view', String(prNumber), '--json',
          'number,title,body,author,headRefName,baseRefName,headRefOid,additions,deletions,changedFiles'],
        { cwd, timeout: 30_000, reject: false },
      );

      if (result.exitCode !== 0) {
        throw new Error(`gh pr view failed: ${result.stderr || result.stdout}`);
      }

      const data = PRViewSchema.parse(parseJSON(result.stdout));
      return {
        number: data.number ?? prNumber,
        title: data.title ?? '',
        body: data.body ?? '',
        author: data.author?.login ?? '',
        headBranch: data.headRefName ?? '',
        baseBranch: data.baseRefName ?? '',
        headSha: data.headRefOid ?? '',
        additions: data.additions ?? 0,
        deletions: data.deletions ?? 0,
        changedFiles: data.changedFiles ?? 0,
      };
    })(),
    toDomainError,
  );
}

/**
 * Fetch the unified diff of a PR via `gh pr diff`.
 */
export function getPRDiff(cwd: string, prNumber: number): ResultAsync<string, DomainError> {
  return ResultAsync.fromPromise(
    (async () => {
      const result = await execute(
        'gh',
        ['pr', 'diff', String(prNumber)],
        { cwd, timeout: 60_000, reject: false },
      );

      if (result.exitCode !== 0) {
        throw new Error(`gh pr diff failed: ${result.stderr || result.stdout}`);
      }

      return result.stdout;
    })(),
    toDomainError,
  );
}

/**
 * Fetch inline review comments already on the PR via `gh api`, following
 * every page. Used to avoid re-posting the same finding on every push.
 */
export function fetchPRReviewComments(
  cwd: string,
  prNumber: number,
): ResultAsync<PRReviewComment[], DomainError> {
  return ResultAsync.fromPromise(
    (async () => {
      const result = await execute(
        'gh',
        ['api', '--paginate', '--jq', '.[]', `repos/{owner}/{repo}/pulls/${prNumber}/comments?per_page=100`],
        { cwd, timeout: 60_000, reject: false },
      );

      if (result.exitCode !== 0) {
        throw new Error(`gh api pulls/${prNumber}/comments failed: ${result.stderr || result.stdout}`);
      }

      return parseJSONLines(result.stdout).map((line) => ReviewCommentSchema.parse(line)).map((c) => ({
        id: c.id,
        author: c.user?.login ?? '',
        body: c.body ?? '',
        path: c.path ?? '',
        line: c.line ?? null,
        startLine: c.start_line ?? null,
        side: c.side ?? null,
      }));
    })(),
    toDomainError,
  );
}

/**
 * Post a review with inline comments via `gh api`. The payload goes over
 * stdin so comment bodies never hit the argument list.
 *
 * @returns the id of the created review
 */
export function postPRReview(
  cwd: string,
  prNumber: number,
  submission: ReviewSubmission,
): ResultAsync<number, DomainError> {
  const payload = {
    body: submission.body,
    event: submission.event,
    comments: submission.comments.map(toWireComment),
    ...(submission.commitId ? { commit_id: submission.commitId } : {}),
  };

  return ResultAsync.fromPromise(
    execute(
      'gh',
      ['api', '--method', 'POST', `repos/{owner}/{repo}/pulls/${prNumber}/reviews`, '--input', '-'],
      { cwd, timeout: 30_000, input: JSON.stringify(payload) },
    ).then((r) => PostedReviewSchema.parse(parseJSON(r.stdout)).id),
    toDomainError,
  );
}
