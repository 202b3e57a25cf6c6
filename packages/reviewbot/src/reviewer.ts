/**
 * PRReviewer — core ReviewBot flow.
 *
 * Single pass: fetch PR → analyze with LLM → filter → anchor → post review.
 * The model only reads the diff, which is passed as context.
 */

import {
  getPRInfo,
  getPRDiff,
  fetchPRReviewComments,
  postPRReview,
  type PRReviewComment,
  type ReviewComment,
} from '@anchorbot/core/git';
import { describeError } from '@anchorbot/shared/errors';
import type { CodeReviewResult, MappedSuggestion } from '@anchorbot/shared';
import { loadConfig } from './config/loader.js';
import { defaultConfig, type ReviewBotConfig } from './config/schema.js';
import { parseDiff } from './diff-parser.js';
import { filterDuplicateSuggestions } from './duplicates.js';
import { decideReviewEvent, formatInlineComment, formatReviewBody, reviewStatusFor } from './formatter.js';
import { createLogger, type Logger, type LogLevel } from './infrastructure/logger.js';
import { LineMapper, emptyMappingStats } from './line-mapper.js';
import { AnthropicClient, type ReviewLLM } from './llm-client.js';
import { buildReviewSystemPrompt, buildReviewUserPrompt } from './prompts.js';
import { parseReviewOutput } from './review-output.js';
import { SuggestionFilter } from './suggestion-filter.js';
import type { GitHubGateway, ReviewOptions } from './types.js';

const ghGateway: GitHubGateway = { getPRInfo, getPRDiff, fetchPRReviewComments, postPRReview };

export interface PRReviewerDeps {
  llm: ReviewLLM;
  logger: Logger;
  config?: ReviewBotConfig;
  github?: GitHubGateway;
}

export class PRReviewer {
  private readonly llm: ReviewLLM;
  private readonly logger: Logger;
  private readonly config: ReviewBotConfig;
  private readonly github: GitHubGateway;

  constructor(deps: PRReviewerDeps) {
    this.llm = deps.llm;
    this.logger = deps.logger;
    this.config = deps.config ?? defaultConfig();
    this.github = deps.github ?? ghGateway;
  }

  /**
   * Build a reviewer from `<projectPath>/.anchorbot/config.yaml`, with the
   * Anthropic client and a pino logger. `LOG_LEVEL` overrides the configured level.
   */
  static async fromProject(projectPath: string, env: NodeJS.ProcessEnv = process.env): Promise<PRReviewer> {
    const envLevel = parseLogLevel(env.LOG_LEVEL);
    const logger = createLogger(envLevel ?? 'info', env);
    const config = await loadConfig(projectPath, logger, env);
    logger.level = envLevel ?? config.logging.level;

    const llm = new AnthropicClient({
      model: config.llm.model,
      apiKey: env[config.llm.api_key_env],
      baseUrl: config.llm.base_url,
      maxTokens: config.llm.max_tokens,
    });
    return new PRReviewer({ llm, logger, config });
  }

  /**
   * Run a full code review on a PR.
   *
   * @param cwd - Working directory (must be inside a git repo with `gh` configured)
   */
  async review(cwd: string, prNumber: number, options: ReviewOptions = {}): Promise<CodeReviewResult> {
    const shouldPost = options.post ?? this.config.review.post;
    const strict = options.strict ?? this.config.review.strict;
    const startTime = Date.now();
    const log = this.logger.child({ prNumber });

    const [infoResult, diffResult] = await Promise.all([
      this.github.getPRInfo(cwd, prNumber),
      this.github.getPRDiff(cwd, prNumber),
    ]);

    const prInfo = infoResult.match(
      (val) => val,
      (err) => { throw new Error(`Failed to fetch PR info: ${describeError(err)}`); },
    );
    const diff = diffResult.match(
      (val) => val,
      (err) => { throw new Error(`Failed to fetch PR diff: ${describeError(err)}`); },
    );

    const files = parseDiff(diff, log);
    if (files.length === 0) {
      log.info('Nothing to review');
      return {
        prNumber,
        status: 'approved',
        summary: diff.trim() ? 'No reviewable changes in the diff.' : 'Empty diff, nothing to review.',
        findings: [],
        droppedCount: 0,
        mappingStats: emptyMappingStats(),
        posted: false,
        duration_ms: Date.now() - startTime,
        model: this.llm.model,
      };
    }

    // Analyze
    const llmOutput = await this.llm.complete(
      buildReviewSystemPrompt(),
      buildReviewUserPrompt(prInfo.title, prInfo.body, files),
    );
    const parsed = parseReviewOutput(llmOutput, log);

    // Filter
    const filter = new SuggestionFilter(log, {
      missingExistingCodePolicy: this.config.review.missing_existing_code_policy,
      positiveSentimentThreshold: this.config.review.positive_sentiment_threshold,
      negativeSentimentThreshold: this.config.review.negative_sentiment_threshold,
    });
    const { kept } = filter.filter(parsed.suggestions);

    const existing = await this.existingComments(cwd, prNumber, log);
    const { kept: fresh, duplicates } = filterDuplicateSuggestions(kept, existing, {
      lineTolerance: this.config.duplicates.line_tolerance,
      codeSimilarity: this.config.duplicates.code_similarity,
      commentSimilarity: this.config.duplicates.comment_similarity,
      commentSimilarityStrict: this.config.duplicates.comment_similarity_strict,
      defaultSide: this.config.review.default_side,
    });
    if (duplicates.length > 0) {
      log.info({ duplicates: duplicates.length }, 'Dropped suggestions already posted on the PR');
    }

    // Anchor
    const mapper = new LineMapper(files, log, {
      similarityThreshold: this.config.line_mapping.similarity_threshold,
      searchRadius: this.config.line_mapping.search_radius,
      defaultSide: this.config.review.default_side,
    });
    const { mapped, stats } = mapper.resolveAll(fresh, strict);
    log.debug({ report: mapper.generateLineMappingReport() }, 'Line mapping report');

    // Post
    const event = decideReviewEvent(mapped.map((m) => m.suggestion));
    const body = formatReviewBody(parsed.summary, mapped, stats);

    if (shouldPost) {
      const postResult = await this.github.postPRReview(cwd, prNumber, {
        body,
        event,
        comments: mapped.map((m) => this.toReviewComment(m)),
        ...(prInfo.headSha ? { commitId: prInfo.headSha } : {}),
      });
      const reviewId = postResult.match(
        (id) => id,
        (err) => { throw new Error(`Failed to post review: ${describeError(err)}`); },
      );
      log.info({ reviewId, event, comments: mapped.length }, 'Review posted');
    }

    return {
      prNumber,
      status: reviewStatusFor(event),
      summary: parsed.summary,
      findings: mapped,
      droppedCount: parsed.suggestions.length - mapped.length,
      mappingStats: stats,
      posted: shouldPost,
      duration_ms: Date.now() - startTime,
      model: this.llm.model,
    };
  }

  private async existingComments(cwd: string, prNumber: number, log: Logger): Promise<PRReviewComment[]> {
    const result = await this.github.fetchPRReviewComments(cwd, prNumber);
    return result.match(
      (comments) => comments,
      (err) => {
        log.warn({ err: describeError(err) }, 'Could not fetch existing review comments, skipping duplicate check');
        return [];
      },
    );
  }

  /**
   * A suggestion spanning several lines can only be applied from a `line`
   * comment that covers the whole range; anything else gets a plain code block.
   */
  private toReviewComment({ suggestion, anchor }: MappedSuggestion): ReviewComment {
    const multiLine = suggestion.startLine < suggestion.endLine;

    if (this.config.review.anchor_mode === 'line') {
      const range = anchor.startLine === undefined ? {} : { startLine: anchor.startLine, startSide: anchor.side };
      const body = formatInlineComment(suggestion, { applicable: !multiLine || anchor.startLine !== undefined });
      return { path: anchor.filePath, body, line: anchor.line, side: anchor.side, ...range };
    }

    const body = formatInlineComment(suggestion, { applicable: !multiLine });
    return { path: anchor.filePath, body, position: anchor.position };
  }
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'silent':
      return value;
    default:
      return undefined;
  }
}
