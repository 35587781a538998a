/**
 * Setup and connectivity checks behind the `setup` and `test` CLI commands.
 */

import { copyFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { logger } from '../utils/logger.js';
import { CommandError, summarizeError } from '../core/errors.js';
import { ok, fail } from '../core/result.js';
import { sampleCommands } from '../core/pattern-table.js';
import { toolFailure } from '../sites/lifecycle.js';
import type { TextGenerator } from './ai.js';
import type { DrupalJsonApi } from './jsonapi.js';
import type { Drush } from '../core/commands/base.js';
import type { ResultEnvelope } from '../types/index.js';

export type CheckName = 'ai' | 'drush' | 'drupal';

export interface CheckOutcome {
  name: CheckName;
  ok: boolean;
  detail: string;
}

export interface ConnectivityDeps {
  ai: TextGenerator;
  drush: Drush;
  drupal: Pick<DrupalJsonApi, 'ping'>;
  signal?: AbortSignal;
}

// ==========================================
// SETUP
// ==========================================

/** Copy `.env.example` to `.env` unless an `.env` is already there. */
export function writeEnvFile(root: string): { created: boolean; path: string } {
  const target = resolve(root, '.env');
  if (existsSync(target)) {
    return { created: false, path: target };
  }

  const template = resolve(root, '.env.example');
  if (!existsSync(template)) {
    throw new CommandError('NotFoundFailure', `No .env.example in ${root}`);
  }
  copyFileSync(template, target);
  logger.info('[setup] Created .env', { path: target });
  return { created: true, path: target };
}

// ==========================================
// CONNECTIVITY
// ==========================================

async function checkAi(ai: TextGenerator, signal?: AbortSignal): Promise<CheckOutcome> {
  const result = await ai.generate({
    prompt: 'Reply with the single word: ready',
    system: 'You answer connectivity checks.',
    maxTokens: 10,
    temperature: 0,
    signal,
  });
  return result.success
    ? { name: 'ai', ok: true, detail: `${result.provider} answered` }
    : { name: 'ai', ok: false, detail: result.error };
}

async function checkDrush(drush: Drush, signal?: AbortSignal): Promise<CheckOutcome> {
  const result = await drush.run({ command: 'status' }, {}, signal);
  if (result.success) {
    return { name: 'drush', ok: true, detail: 'drush status succeeded' };
  }
  return { name: 'drush', ok: false, detail: toolFailure(result, 'drush', 'drush status').message };
}

async function checkDrupal(drupal: ConnectivityDeps['drupal'], signal?: AbortSignal): Promise<CheckOutcome> {
  try {
    await drupal.ping(signal);
    return { name: 'drupal', ok: true, detail: 'JSON:API answered' };
  } catch (error) {
    return { name: 'drupal', ok: false, detail: summarizeError(error) };
  }
}

/**
 * One generation, one `drush status`, one JSON:API request. Every check
 * runs even when an earlier one fails.
 */
export async function runConnectivityChecks(deps: ConnectivityDeps): Promise<CheckOutcome[]> {
  const checks = [
    await checkAi(deps.ai, deps.signal),
    await checkDrush(deps.drush, deps.signal),
    await checkDrupal(deps.drupal, deps.signal),
  ];
  logger.debug('[diagnostics] Checks complete', { checks });
  return checks;
}

export function summarizeChecks(checks: CheckOutcome[]): ResultEnvelope {
  const failed = checks.filter((check) => !check.ok).map((check) => check.name);
  const data = { checks, sample_commands: sampleCommands() };
  return failed.length === 0
    ? ok('All connectivity checks passed', data)
    : fail('ProviderFailure', `Connectivity check failed: ${failed.join(', ')}`, data);
}
