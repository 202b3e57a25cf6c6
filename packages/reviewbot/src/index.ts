/**
 * @anchorbot/reviewbot — Automated code review for GitHub PRs.
 *
 * Fetch PR diff → LLM review → anchor each finding to a commentable diff
 * line → post the review.
 */

export { PRReviewer } from './reviewer.js';
export type { PRReviewerDeps } from './reviewer.js';
export { parseDiff, ParsedFileDiff, stripGitPrefix } from './diff-parser.js';
export type { DiffLine, Hunk, HunkRange, LineKind, LineRef } from './diff-parser.js';
export { LineMapper, DEFAULT_LINE_MAPPER_OPTIONS, emptyMappingStats } from './line-mapper.js';
export type { LineMapperOptions, MappingResult } from './line-mapper.js';
export { sequenceRatio, tokenSortRatio } from './similarity.js';
export { normalizeCode, normalizeSnippet, normalizeCodeLine, snippetReadings } from './normalize.js';
export { SuggestionFilter } from './suggestion-filter.js';
export type { FilterResult, SuggestionFilterOptions } from './suggestion-filter.js';
export { vaderScorer } from './sentiment.js';
export type { SentimentScorer } from './sentiment.js';
export { filterDuplicateSuggestions, DEFAULT_DUPLICATE_OPTIONS } from './duplicates.js';
export type { DuplicateOptions } from './duplicates.js';
export { buildReviewSystemPrompt, buildReviewUserPrompt } from './prompts.js';
export { parseReviewOutput } from './review-output.js';
export type { ParsedReviewOutput } from './review-output.js';
export { formatReviewBody, formatInlineComment, decideReviewEvent } from './formatter.js';
export type { InlineCommentOptions } from './formatter.js';
export { AnthropicClient } from './llm-client.js';
export type { ReviewLLM, AnthropicClientOptions } from './llm-client.js';
export { loadConfig } from './config/loader.js';
export { ReviewBotConfigSchema, defaultConfig } from './config/schema.js';
export type { ReviewBotConfig } from './config/schema.js';
export { createLogger } from './infrastructure/logger.js';
export type { Logger, LogLevel } from './infrastructure/logger.js';
export type { ReviewOptions, GitHubGateway } from './types.js';
