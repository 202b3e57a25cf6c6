export {
  getPRInfo,
  getPRDiff,
  fetchPRReviewComments,
  postPRReview,
} from './github.js';
export type {
  PRInfo,
  PRReviewComment,
  ReviewComment,
  ReviewSubmission,
} from './github.js';
export { execute, ProcessExecutionError } from './process.js';
export type { ExecuteOptions, ExecuteResult } from './process.js';
