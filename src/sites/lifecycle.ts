/**
 * Site Lifecycle
 * start / stop / restart / status for an existing local site. The platform
 * is detected on every call from the files in the site directory.
 */

import { logger } from '../utils/logger.js';
import { CommandError, summarizeError } from '../core/errors.js';
import {
  INSTALL_GUIDANCE,
  PLATFORM_COMMANDS,
  describeSite,
  parseStatus,
  type Tool,
} from './platform.js';
import type {
  Config,
  LifecycleAction,
  Platform,
  ShellCommandResult,
  ShellRunner,
  SiteDescriptor,
  SiteState,
  SiteStatus,
} from '../types/index.js';

export interface LifecycleOutcome {
  site: SiteDescriptor & { platform: Platform };
  state: SiteState;
  status?: SiteStatus;
  duration_ms: number;
}

export interface LifecycleDeps {
  runner: ShellRunner;
  root: string;
  tools: Config['tools'];
}

const ACTION_STATE: Record<Exclude<LifecycleAction, 'status'>, SiteState> = {
  start: 'running',
  restart: 'running',
  stop: 'stopped',
};

export function platformExecutable(platform: Platform, tools: Config['tools']): string {
  return platform === 'ddev' ? tools.ddev : tools.lando;
}

/**
 * Translate a failed tool run into the matching CommandError.
 */
export function toolFailure(result: ShellCommandResult, tool: Tool, what: string): CommandError {
  if (result.notFound) {
    return new CommandError('PlatformFailure', `${tool} is not installed or not on PATH`, {
      suggestions: [INSTALL_GUIDANCE[tool]],
      details: { install: INSTALL_GUIDANCE[tool] },
    });
  }
  if (result.timedOut) {
    return new CommandError('PlatformFailure', `${what} timed out`, { details: { timed_out: true } });
  }
  if (result.aborted) {
    return new CommandError('PlatformFailure', `${what} was aborted`, { details: { aborted: true } });
  }
  const reason = summarizeError(result.stderr || result.stdout || `exit code ${result.exitCode}`);
  return new CommandError('PlatformFailure', `${what} failed: ${reason}`, {
    details: { exit_code: result.exitCode, state: 'error' },
  });
}

export class SiteLifecycle {
  constructor(private readonly deps: LifecycleDeps) {}

  /** Descriptor for an existing site with a known platform, or a CommandError */
  locate(name: string): SiteDescriptor & { platform: Platform } {
    const site = describeSite(name, this.deps.root);
    if (!site.exists) {
      throw new CommandError('NotFoundFailure', `Site "${site.name}" not found in ${this.deps.root}`, {
        suggestions: [`create site named ${site.name} using ddev`],
        details: { directory: site.directory },
      });
    }
    const { platform } = site;
    if (platform === 'unknown') {
      throw new CommandError(
        'PlatformFailure',
        `cannot determine platform for "${site.name}": no .ddev/config.yaml or .lando.yml in ${site.directory}`,
        { details: { directory: site.directory } }
      );
    }
    return { ...site, platform };
  }

  private async run(site: SiteDescriptor & { platform: Platform }, action: LifecycleAction, signal?: AbortSignal) {
    const executable = platformExecutable(site.platform, this.deps.tools);
    return this.deps.runner(executable, [...PLATFORM_COMMANDS[site.platform][action]], {
      cwd: site.directory,
      signal,
    });
  }

  async perform(name: string, action: Exclude<LifecycleAction, 'status'>, signal?: AbortSignal): Promise<LifecycleOutcome> {
    const site = this.locate(name);
    logger.info(`[sites] ${action} ${site.name}`, { platform: site.platform });

    const result = await this.run(site, action, signal);
    if (!result.success) {
      throw toolFailure(result, site.platform, `${site.platform} ${action}`);
    }
    return { site, state: ACTION_STATE[action], duration_ms: result.duration_ms };
  }

  start(name: string, signal?: AbortSignal): Promise<LifecycleOutcome> {
    return this.perform(name, 'start', signal);
  }

  stop(name: string, signal?: AbortSignal): Promise<LifecycleOutcome> {
    return this.perform(name, 'stop', signal);
  }

  restart(name: string, signal?: AbortSignal): Promise<LifecycleOutcome> {
    return this.perform(name, 'restart', signal);
  }

  /** Read-only: never starts or stops anything. */
  async status(name: string, signal?: AbortSignal): Promise<LifecycleOutcome> {
    const site = this.locate(name);
    const result = await this.run(site, 'status', signal);

    if (result.notFound || result.timedOut || result.aborted) {
      throw toolFailure(result, site.platform, `${site.platform} status`);
    }

    // A stopped project makes some tools exit non-zero; the output still says why
    const status = parseStatus(site.platform, result.stdout || result.stderr);
    logger.debug('[sites] status', { site: site.name, state: status.state, exitCode: result.exitCode });
    return { site, state: status.state, status, duration_ms: result.duration_ms };
  }
}
