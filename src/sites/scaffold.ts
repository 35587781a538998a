/**
 * Site Scaffold
 * Creates a new local Drupal site: composer project, platform config,
 * first start, then a standard install.
 */

import { existsSync, mkdirSync, readdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { stringify as yamlStringify } from 'yaml';
import { logger } from '../utils/logger.js';
import { CommandError, summarizeError } from '../core/errors.js';
import { toProjectName } from '../core/parameter-extractor.js';
import { PLATFORM_COMMANDS, siteDirectory, siteUrl } from './platform.js';
import { platformExecutable, toolFailure } from './lifecycle.js';
import type { Config, Platform, ShellRunner } from '../types/index.js';

export interface ScaffoldDeps {
  runner: ShellRunner;
  root: string;
  tools: Config['tools'];
  sites: Config['sites'];
}

export interface ScaffoldOutcome {
  site: string;
  platform: Platform;
  url: string;
  directory: string;
  admin_user: string;
  warnings: string[];
  next_steps: string[];
}

const COMPOSER_TIMEOUT_MS = 600000;

/** `drupal10` -> `10` */
function recipeVersion(drupalVersion: string): string {
  return drupalVersion.replace(/^drupal/i, '') || '10';
}

export function landoConfig(project: string, drupalVersion: string): string {
  const recipe = `drupal${recipeVersion(drupalVersion)}`;
  return yamlStringify(
    {
      name: project,
      recipe,
      config: {
        webroot: 'web',
        database: 'mariadb:10.6',
        php: '8.3',
      },
      proxy: {
        appserver: [`${project}.lndo.site`],
      },
      tooling: {
        drush: {
          service: 'appserver',
          cmd: '/app/vendor/bin/drush',
        },
      },
    },
    { lineWidth: 120 }
  );
}

export class SiteScaffold {
  constructor(private readonly deps: ScaffoldDeps) {}

  /**
   * Everything that can fail without side effects is checked before the
   * directory is created.
   */
  private async preflight(platform: Platform, directory: string, signal?: AbortSignal): Promise<void> {
    if (existsSync(directory) && readdirSync(directory).length > 0) {
      throw new CommandError('ValidationFailure', `Target directory ${directory} already exists and is not empty`, {
        suggestions: ['choose another site name, or remove the directory first'],
        details: { directory },
      });
    }

    const composer = await this.deps.runner(this.deps.tools.composer, ['--version'], { signal, timeout: 30000 });
    if (!composer.success) throw toolFailure(composer, 'composer', 'composer --version');

    const tool = await this.deps.runner(platformExecutable(platform, this.deps.tools), ['version'], { signal, timeout: 30000 });
    if (!tool.success) throw toolFailure(tool, platform, `${platform} version`);
  }

  async create(name: string, platform: Platform, signal?: AbortSignal): Promise<ScaffoldOutcome> {
    const project = toProjectName(name);
    const directory = siteDirectory(project, this.deps.root);
    const { runner, tools, sites } = this.deps;
    const executable = platformExecutable(platform, tools);

    await this.preflight(platform, directory, signal);

    logger.info(`[sites] Creating ${platform} site ${project}`, { directory });
    mkdirSync(directory, { recursive: true });

    const composer = await runner(
      tools.composer,
      ['create-project', 'drupal/recommended-project', '.', '--no-interaction', '--prefer-dist'],
      { cwd: directory, signal, timeout: COMPOSER_TIMEOUT_MS }
    );
    if (!composer.success) throw toolFailure(composer, 'composer', 'composer create-project');

    if (platform === 'ddev') {
      const configured = await runner(
        executable,
        ['config', `--project-type=${sites.drupal_version}`, `--project-name=${project}`, '--docroot=web'],
        { cwd: directory, signal }
      );
      if (!configured.success) throw toolFailure(configured, platform, 'ddev config');
    } else {
      writeFileSync(join(directory, '.lando.yml'), landoConfig(project, sites.drupal_version));
    }

    const started = await runner(executable, [...PLATFORM_COMMANDS[platform].start], { cwd: directory, signal });
    if (!started.success) throw toolFailure(started, platform, `${platform} start`);

    const warnings: string[] = [];
    const installed = await runner(
      executable,
      [
        'drush',
        'site:install',
        'standard',
        '--yes',
        `--site-name=${project}`,
        `--account-name=${sites.admin_user}`,
        `--account-pass=${sites.admin_pass}`,
      ],
      { cwd: directory, signal }
    );
    if (!installed.success) {
      const reason = summarizeError(installed.stderr || installed.stdout || `exit code ${installed.exitCode}`);
      logger.warn('[sites] Drupal installation had issues', { site: project, reason });
      warnings.push(`drush site:install reported a problem: ${reason}`);
    }

    const url = siteUrl(project, platform);
    return {
      site: project,
      platform,
      url,
      directory,
      admin_user: sites.admin_user,
      warnings,
      next_steps: [
        `Open ${url}/user/login and sign in as ${sites.admin_user}`,
        `start site ${project} / stop site ${project} to manage it`,
        `${platform} drush uli (inside ${directory}) for a one-time login link`,
      ],
    };
  }
}
