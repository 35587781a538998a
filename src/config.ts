/**
 * Configuration Loader
 * Loads config from .env and config.json with sensible defaults.
 * Environment variables win over config.json, config.json wins over defaults.
 */

import { readFileSync, existsSync } from 'fs';
import { resolve, dirname, basename } from 'path';
import { fileURLToPath } from 'url';
import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { logger } from './utils/logger.js';
import { AI_PROVIDERS, type Config } from './types/index.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Project root for a module directory: `src/` under tsx,
 * `dist/src/` once built.
 */
export function projectRoot(moduleDir: string): string {
  const parent = resolve(moduleDir, '..');
  return basename(parent) === 'dist' ? resolve(parent, '..') : parent;
}

export const ROOT_DIR = projectRoot(__dirname);

type Env = Record<string, string | undefined>;

const FileConfigSchema = z.object({
  drupal: z.object({
    base_url: z.string().url(),
    username: z.string(),
    password: z.string(),
    graphql_path: z.string(),
    timeout_ms: z.number().int().positive(),
  }).partial(),
  ai: z.object({
    default_provider: z.string(),
    ollama_base_url: z.string(),
    models: z.object({
      anthropic: z.string(),
      openai: z.string(),
      ollama: z.string(),
    }).partial(),
    timeout_ms: z.number().int().positive(),
    classify_fallback: z.boolean(),
    classify_timeout_ms: z.number().int().positive(),
  }).partial(),
  tools: z.object({
    drush: z.string(),
    ddev: z.string(),
    lando: z.string(),
    composer: z.string(),
    drush_root: z.string(),
  }).partial(),
  sites: z.object({
    root: z.string(),
    drupal_version: z.string(),
    admin_user: z.string(),
    admin_pass: z.string(),
  }).partial(),
  shell: z.object({
    timeout_ms: z.number().int().positive(),
    max_output_chars: z.number().int().positive(),
  }).partial(),
}).partial();

export type FileConfig = z.infer<typeof FileConfigSchema>;

function intFromEnv(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function boolFromEnv(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return /^(1|true|yes|on)$/i.test(value);
}

/**
 * Build a configuration from an environment and a parsed config.json.
 * Pure, so tests can hand in their own environment.
 */
export function buildConfig(env: Env, file: FileConfig = {}): Config {
  const models = {
    anthropic: 'claude-3-5-haiku-latest',
    openai: 'gpt-4o-mini',
    ollama: 'llama3.2:3b',
    ...file.ai?.models,
  };

  return {
    drupal: {
      base_url: env.DRUPAL_BASE_URL || file.drupal?.base_url || 'http://localhost:8080',
      username: env.DRUPAL_USERNAME || file.drupal?.username || 'admin',
      password: env.DRUPAL_PASSWORD || file.drupal?.password || '',
      graphql_path: env.GRAPHQL_ENDPOINT || file.drupal?.graphql_path || '/graphql',
      timeout_ms: intFromEnv(env.DRUPAL_TIMEOUT_MS) ?? file.drupal?.timeout_ms ?? 30000,
    },
    ai: {
      default_provider: env.DEFAULT_AI_PROVIDER || file.ai?.default_provider || 'anthropic',
      anthropic_api_key: env.ANTHROPIC_API_KEY || '',
      openai_api_key: env.OPENAI_API_KEY || '',
      ollama_base_url: env.OLLAMA_BASE_URL || file.ai?.ollama_base_url || '',
      models: {
        ...models,
        ...(env.OLLAMA_MODEL && { ollama: env.OLLAMA_MODEL }),
      },
      timeout_ms: intFromEnv(env.AI_TIMEOUT_MS) ?? file.ai?.timeout_ms ?? 120000,
      classify_fallback: boolFromEnv(env.AI_CLASSIFY_FALLBACK) ?? file.ai?.classify_fallback ?? true,
      classify_timeout_ms: intFromEnv(env.AI_CLASSIFY_TIMEOUT_MS) ?? file.ai?.classify_timeout_ms ?? 15000,
    },
    tools: {
      drush: env.DRUSH_PATH || file.tools?.drush || 'drush',
      ddev: env.DDEV_PATH || file.tools?.ddev || 'ddev',
      lando: env.LANDO_PATH || file.tools?.lando || 'lando',
      composer: env.COMPOSER_PATH || file.tools?.composer || 'composer',
      drush_root: env.DRUSH_ROOT || file.tools?.drush_root || '.',
    },
    sites: {
      root: env.DEFAULT_SITE_DIRECTORY || file.sites?.root || './sites',
      drupal_version: env.DEFAULT_DRUPAL_VERSION || file.sites?.drupal_version || 'drupal10',
      admin_user: env.SITE_ADMIN_USER || file.sites?.admin_user || 'admin',
      admin_pass: env.SITE_ADMIN_PASS || file.sites?.admin_pass || 'admin',
    },
    shell: {
      timeout_ms: intFromEnv(env.SHELL_TIMEOUT_MS) ?? file.shell?.timeout_ms ?? 300000,
      max_output_chars: file.shell?.max_output_chars ?? 50000,
    },
  };
}

/**
 * Parse config.json contents. Invalid files are reported and ignored.
 */
export function parseFileConfig(raw: string): FileConfig {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    logger.warn('[config] config.json is not valid JSON, using defaults', { error: String(error) });
    return {};
  }

  const parsed = FileConfigSchema.safeParse(json);
  if (!parsed.success) {
    logger.warn('[config] config.json failed validation, using defaults', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
    return {};
  }
  return parsed.data;
}

/**
 * Load configuration from .env and config.json at the project root
 */
export function loadConfig(): Config {
  dotenvConfig({ path: resolve(ROOT_DIR, '.env') });

  const configPath = resolve(ROOT_DIR, 'config.json');
  if (!existsSync(configPath)) {
    return buildConfig(process.env);
  }

  return buildConfig(process.env, parseFileConfig(readFileSync(configPath, 'utf-8')));
}

// Export singleton config
export const config = loadConfig();

// Validate critical configuration
export function validateConfig(cfg: Config): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!cfg.drupal.base_url) {
    errors.push('DRUPAL_BASE_URL is required');
  }

  if (!cfg.drupal.password) {
    errors.push('DRUPAL_PASSWORD is not set; content operations will be rejected by Drupal');
  }

  const provider = cfg.ai.default_provider;
  if (!AI_PROVIDERS.some((known) => known === provider)) {
    errors.push(`DEFAULT_AI_PROVIDER "${provider}" is not one of ${AI_PROVIDERS.join(', ')}`);
  } else if (provider === 'anthropic' && !cfg.ai.anthropic_api_key) {
    errors.push('ANTHROPIC_API_KEY environment variable is required for the anthropic provider');
  } else if (provider === 'openai' && !cfg.ai.openai_api_key) {
    errors.push('OPENAI_API_KEY environment variable is required for the openai provider');
  } else if (provider === 'ollama' && !cfg.ai.ollama_base_url) {
    errors.push('OLLAMA_BASE_URL environment variable is required for the ollama provider');
  }

  return {
    valid: errors.length === 0,
    errors
  };
}
