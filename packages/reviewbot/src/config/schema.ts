/**
 * Zod schema for `.anchorbot/config.yaml`.
 *
 * Every field is optional; parsing `{}` yields the full default config.
 */

import { z } from 'zod';

export const ReviewBotConfigSchema = z.object({
  llm: z
    .object({
      provider: z.enum(['anthropic']).default('anthropic'),
      model: z.string().default('claude-sonnet-4-5-20250929'),
      /** Name of the env var holding the API key, never the key itself */
      api_key_env: z.string().default('ANTHROPIC_API_KEY'),
      base_url: z.string().default('https://api.anthropic.com'),
      max_tokens: z.number().int().min(1).default(8192),
    })
    .default({}),

  review: z
    .object({
      post: z.boolean().default(true),
      /** Drop suggestions that cannot be anchored without guessing a nearby line */
      strict: z.boolean().default(false),
      /** `position` posts diff positions, `line` posts line + side */
      anchor_mode: z.enum(['position', 'line']).default('position'),
      default_side: z.enum(['LEFT', 'RIGHT']).default('RIGHT'),
      missing_existing_code_policy: z.enum(['drop', 'warn', 'keep']).default('warn'),
      /** VADER compound score at or above which a remark without a request is praise */
      positive_sentiment_threshold: z.number().min(-1).max(1).default(0.3),
      /** VADER compound score at or below which a remark is treated as a complaint */
      negative_sentiment_threshold: z.number().min(-1).max(1).default(-0.05),
    })
    .default({}),

  line_mapping: z
    .object({
      similarity_threshold: z.number().min(0).max(1).default(0.6),
      search_radius: z.number().int().min(0).default(5),
    })
    .default({}),

  duplicates: z
    .object({
      line_tolerance: z.number().int().min(0).default(3),
      code_similarity: z.number().min(0).max(1).default(0.85),
      comment_similarity: z.number().min(0).max(1).default(0.7),
      comment_similarity_strict: z.number().min(0).max(1).default(0.6),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
    })
    .default({}),
});

export type ReviewBotConfig = z.infer<typeof ReviewBotConfigSchema>;

export type MissingExistingCodePolicy = ReviewBotConfig['review']['missing_existing_code_policy'];

export function defaultConfig(): ReviewBotConfig {
  return ReviewBotConfigSchema.parse({});
}
