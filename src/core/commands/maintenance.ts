/**
 * run-drush: cache rebuilds, cron, database updates, config sync, modules,
 * or any Drush command that is not blocked.
 */

import { BaseCommand, MACHINE_NAME } from './base.js';
import { ok } from '../result.js';
import { toProjectName } from '../parameter-extractor.js';
import { BLOCKED_COMMANDS, buildDrushArgs, type DrushTarget } from '../../services/drush.js';
import { toolFailure } from '../../sites/lifecycle.js';
import type { FailureKind, ResultEnvelope } from '../../types/index.js';
import type { RunDrushInput } from './params.js';

const DRUSH_COMMAND = /^[a-z][\w:.-]*$/i;
const MAX_OUTPUT_IN_RESULT = 4000;

export class RunDrushCommand extends BaseCommand<RunDrushInput> {
  readonly operation = 'run-drush';
  protected readonly failureKind: FailureKind = 'PlatformFailure';

  problems(): string[] {
    const { command, module, site } = this.params;
    const problems: string[] = [];
    if (!DRUSH_COMMAND.test(command)) {
      problems.push(`"${command}" is not a Drush command name`);
    } else if (BLOCKED_COMMANDS.has(command.toLowerCase())) {
      problems.push(`drush ${command} is blocked: run it by hand if you really mean it`);
    }
    if (module !== undefined && !MACHINE_NAME.test(module)) {
      problems.push(`module "${module}" is not a machine name`);
    }
    if (site !== undefined && toProjectName(site) === '') {
      problems.push(`site "${site}" is not a usable project name`);
    }
    return problems;
  }

  protected describe(): string {
    return `run drush ${this.params.command}`;
  }

  protected async run(): Promise<ResultEnvelope> {
    const { command, module, args, site } = this.params;
    const { drush, lifecycle, signal } = this.context;

    const target: DrushTarget = site === undefined ? {} : { site: lifecycle.locate(site) };
    const result = await drush.run({ command, module, args }, target, signal);
    const commandLine = ['drush', ...buildDrushArgs({ command, module, args })].join(' ');

    if (!result.success) {
      throw toolFailure(result, target.site?.platform ?? 'drush', commandLine);
    }

    return ok(`Ran ${commandLine}`, {
      command: commandLine,
      ...(site !== undefined && { site: toProjectName(site) }),
      output: result.stdout.slice(0, MAX_OUTPUT_IN_RESULT),
      duration_ms: result.duration_ms,
    });
  }
}
