/**
 * Internal types for the ReviewBot package.
 */

import type { ResultAsync } from 'neverthrow';
import type { DomainError } from '@anchorbot/shared/errors';
import type { PRInfo, PRReviewComment, ReviewSubmission } from '@anchorbot/core/git';

export interface ReviewOptions {
  /** Whether to post the review to GitHub (default: config `review.post`) */
  post?: boolean;
  /** Refuse nearest-line adjustments when anchoring (default: config `review.strict`) */
  strict?: boolean;
}

/** The GitHub operations the reviewer needs; defaults to the `gh` CLI wrappers. */
export interface GitHubGateway {
  getPRInfo(cwd: string, prNumber: number): ResultAsync<PRInfo, DomainError>;
  getPRDiff(cwd: string, prNumber: number): ResultAsync<string, DomainError>;
  fetchPRReviewComments(cwd: string, prNumber: number): ResultAsync<PRReviewComment[], DomainError>;
  postPRReview(cwd: string, prNumber: number, submission: ReviewSubmission): ResultAsync<number, DomainError>;
}
