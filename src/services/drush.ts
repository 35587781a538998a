/**
 * Drush Runner
 * Drush either through a site's platform (`ddev drush …` inside the site
 * directory) or through the configured drush binary in `drush_root`.
 */

import { logger } from '../utils/logger.js';
import type { Config, Platform, ShellCommandResult, ShellRunner } from '../types/index.js';

/** Commands that prompt for confirmation unless given --yes */
export const CONFIRMING_COMMANDS = new Set([
  'updatedb',
  'updb',
  'config:import',
  'cim',
  'config:export',
  'cex',
  'pm:enable',
  'en',
  'pm:uninstall',
  'pmu',
  'cache:clear',
]);

/** Commands no chat-style request may run */
export const BLOCKED_COMMANDS = new Set([
  'sql:drop',
  'sql-drop',
  'site:install',
  'site-install',
  'si',
  'sin',
  'php:eval',
  'php-eval',
  'eval',
  'ev',
  'php:script',
  'php-script',
  'scr',
  'sql:cli',
  'sql-cli',
  'sqlc',
  'sql:query',
  'sql-query',
  'sqlq',
  'sql:create',
  'sql-create',
  'sql:sync',
  'sql-sync',
]);

export interface DrushInvocation {
  command: string;
  module?: string;
  args?: string[];
}

export interface DrushTarget {
  /** Site directory and platform, when the command targets a local site */
  site?: { directory: string; platform: Platform };
}

export function buildDrushArgs(invocation: DrushInvocation): string[] {
  const args = [invocation.command];
  if (invocation.module) args.push(invocation.module);
  args.push(...(invocation.args ?? []));
  if (CONFIRMING_COMMANDS.has(invocation.command) && !args.includes('--yes') && !args.includes('-y')) {
    args.push('--yes');
  }
  return args;
}

export class DrushRunner {
  constructor(
    private readonly runner: ShellRunner,
    private readonly tools: Config['tools']
  ) {}

  run(invocation: DrushInvocation, target: DrushTarget = {}, signal?: AbortSignal): Promise<ShellCommandResult> {
    const args = buildDrushArgs(invocation);

    if (target.site) {
      const executable = target.site.platform === 'ddev' ? this.tools.ddev : this.tools.lando;
      logger.info('[drush] Running through platform', { platform: target.site.platform, args: args.join(' ') });
      return this.runner(executable, ['drush', ...args], { cwd: target.site.directory, signal });
    }

    logger.info('[drush] Running', { args: args.join(' '), root: this.tools.drush_root });
    return this.runner(this.tools.drush, args, { cwd: this.tools.drush_root, signal });
  }
}
