/**
 * Local site commands: create, start, stop, restart, status.
 */

import { BaseCommand } from './base.js';
import { ok } from '../result.js';
import { toProjectName } from '../parameter-extractor.js';
import { siteUrl } from '../../sites/platform.js';
import type { LifecycleOutcome } from '../../sites/lifecycle.js';
import { PLATFORMS, type FailureKind, type Platform, type ResultEnvelope } from '../../types/index.js';
import type { CreateSiteInput, SiteInput } from './params.js';

function isPlatform(value: string): value is Platform {
  return PLATFORMS.some((platform) => platform === value);
}

function siteNameProblems(site: string): string[] {
  return toProjectName(site) === '' ? [`site "${site}" is not a usable project name`] : [];
}

export class CreateSiteCommand extends BaseCommand<CreateSiteInput> {
  readonly operation = 'create-site';
  protected readonly failureKind: FailureKind = 'PlatformFailure';

  problems(): string[] {
    const problems = siteNameProblems(this.params.site);
    if (!isPlatform(this.params.platform)) {
      problems.push(`platform "${this.params.platform}" is not one of ${PLATFORMS.join(', ')}`);
    }
    return problems;
  }

  protected describe(): string {
    return `create site ${this.params.site}`;
  }

  protected async run(): Promise<ResultEnvelope> {
    const { platform } = this.params;
    // validate() has already rejected anything else
    const target: Platform = isPlatform(platform) ? platform : 'ddev';
    const outcome = await this.context.scaffold.create(this.params.site, target, this.context.signal);

    return ok(`Created ${outcome.platform} site ${outcome.site} at ${outcome.url}`, {
      site: outcome.site,
      platform: outcome.platform,
      url: outcome.url,
      directory: outcome.directory,
      admin_user: outcome.admin_user,
      next_steps: outcome.next_steps,
      ...(outcome.warnings.length > 0 && { warnings: outcome.warnings }),
    });
  }
}

// ============================================================================
// Lifecycle
// ============================================================================

function outcomeData(outcome: LifecycleOutcome): Record<string, unknown> {
  const { site, state, status } = outcome;
  return {
    site: site.name,
    platform: site.platform,
    state,
    directory: site.directory,
    url: status?.url ?? siteUrl(site.name, site.platform),
    ...(status && status.services.length > 0 && { services: status.services }),
    duration_ms: outcome.duration_ms,
  };
}

abstract class SiteLifecycleCommand extends BaseCommand<SiteInput> {
  protected readonly failureKind: FailureKind = 'PlatformFailure';
  protected abstract readonly verb: string;

  problems(): string[] {
    return siteNameProblems(this.params.site);
  }

  protected describe(): string {
    return `${this.verb} site ${this.params.site}`;
  }
}

export class StartSiteCommand extends SiteLifecycleCommand {
  readonly operation = 'start-site';
  protected readonly verb = 'start';

  protected async run(): Promise<ResultEnvelope> {
    const outcome = await this.context.lifecycle.start(this.params.site, this.context.signal);
    return ok(`Started ${outcome.site.name} (${outcome.site.platform})`, outcomeData(outcome));
  }
}

export class StopSiteCommand extends SiteLifecycleCommand {
  readonly operation = 'stop-site';
  protected readonly verb = 'stop';

  protected async run(): Promise<ResultEnvelope> {
    const outcome = await this.context.lifecycle.stop(this.params.site, this.context.signal);
    return ok(`Stopped ${outcome.site.name} (${outcome.site.platform})`, outcomeData(outcome));
  }
}

export class RestartSiteCommand extends SiteLifecycleCommand {
  readonly operation = 'restart-site';
  protected readonly verb = 'restart';

  protected async run(): Promise<ResultEnvelope> {
    const outcome = await this.context.lifecycle.restart(this.params.site, this.context.signal);
    return ok(`Restarted ${outcome.site.name} (${outcome.site.platform})`, outcomeData(outcome));
  }
}

export class StatusSiteCommand extends SiteLifecycleCommand {
  readonly operation = 'status-site';
  protected readonly verb = 'check';

  protected async run(): Promise<ResultEnvelope> {
    const outcome = await this.context.lifecycle.status(this.params.site, this.context.signal);
    return ok(`${outcome.site.name} is ${outcome.state} (${outcome.site.platform})`, outcomeData(outcome));
  }
}
