/**
 * Config loader — reads `.anchorbot/config.yaml`, resolves env vars, validates.
 *
 * If the config file doesn't exist, returns all defaults.
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import { parse as parseYAML } from 'yaml';
import type { Logger } from '../infrastructure/logger.js';
import { ReviewBotConfigSchema, defaultConfig, type ReviewBotConfig } from './schema.js';

export const CONFIG_DIR = '.anchorbot';
export const CONFIG_FILE = 'config.yaml';

/**
 * Recursively resolve `${VAR_NAME}` patterns in config values.
 */
export function resolveEnvVars(obj: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof obj === 'string') {
    return obj.replace(/\$\{(\w+)\}/g, (_, key: string) => env[key] ?? '');
  }
  if (Array.isArray(obj)) {
    return obj.map((v) => resolveEnvVars(v, env));
  }
  if (obj !== null && typeof obj === 'object') {
    return Object.fromEntries(
      Object.entries(obj).map(([k, v]) => [k, resolveEnvVars(v, env)]),
    );
  }
  return obj;
}

async function readConfigText(configPath: string): Promise<string | null> {
  try {
    return await readFile(configPath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
    throw err;
  }
}

/**
 * Load and validate the review bot configuration.
 *
 * Reads `.anchorbot/config.yaml` if present, otherwise uses all defaults.
 * Environment variables in `${VAR}` format are resolved from `env` before validation.
 * Unparseable YAML and failed validation also fall back to defaults.
 */
export async function loadConfig(
  projectPath: string,
  logger: Logger,
  env: NodeJS.ProcessEnv = process.env,
): Promise<ReviewBotConfig> {
  const configPath = join(projectPath, CONFIG_DIR, CONFIG_FILE);

  const text = await readConfigText(configPath);
  if (text === null) {
    logger.info({ configPath }, 'No .anchorbot/config.yaml found, using defaults');
    return defaultConfig();
  }

  let rawConfig: unknown = {};
  try {
    const parsed: unknown = parseYAML(text);
    if (parsed && typeof parsed === 'object') {
      rawConfig = resolveEnvVars(parsed, env);
    }
    logger.info({ configPath }, 'Loaded review config from YAML');
  } catch (err) {
    logger.error(
      { err: err instanceof Error ? err.message : String(err), configPath },
      'Failed to parse config.yaml, using defaults',
    );
    return defaultConfig();
  }

  const result = ReviewBotConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    logger.error({ errors: result.error.issues }, 'Config validation failed, using defaults');
    return defaultConfig();
  }

  return result.data;
}
