/**
 * Wires the real collaborators from configuration.
 */

import { DrupalJsonApi } from './jsonapi.js';
import { DrupalGraphQL } from './graphql.js';
import { AiTextGenerator } from './ai.js';
import { DrushRunner } from './drush.js';
import { SiteLifecycle } from '../sites/lifecycle.js';
import { SiteScaffold } from '../sites/scaffold.js';
import { createShellRunner } from '../sites/shell.js';
import { AiIntentClassifier } from '../core/classifier.js';
import { IntentResolver } from '../core/intent-resolver.js';
import { Dispatcher } from '../core/dispatcher.js';
import type { ConnectivityDeps } from './diagnostics.js';
import type { CommandContext } from '../core/commands/base.js';
import type { Config, ShellRunner } from '../types/index.js';

export function createContext(cfg: Config, runner: ShellRunner = createShellRunner(cfg.tools, cfg.shell)): Omit<CommandContext, 'signal'> {
  const deps = { runner, root: cfg.sites.root, tools: cfg.tools };
  return {
    content: new DrupalJsonApi(cfg.drupal),
    queries: new DrupalGraphQL(cfg.drupal),
    ai: new AiTextGenerator(cfg.ai),
    drush: new DrushRunner(runner, cfg.tools),
    lifecycle: new SiteLifecycle(deps),
    scaffold: new SiteScaffold({ ...deps, sites: cfg.sites }),
  };
}

export function createDispatcher(cfg: Config): Dispatcher {
  const context = createContext(cfg);
  const resolver = new IntentResolver({
    classifier: new AiIntentClassifier(context.ai, cfg.ai.classify_fallback),
    classifyTimeoutMs: cfg.ai.classify_timeout_ms,
  });
  return new Dispatcher({ resolver, context });
}

export function createConnectivityDeps(cfg: Config, signal?: AbortSignal): ConnectivityDeps {
  const runner = createShellRunner(cfg.tools, cfg.shell);
  return {
    ai: new AiTextGenerator(cfg.ai),
    drush: new DrushRunner(runner, cfg.tools),
    drupal: new DrupalJsonApi(cfg.drupal),
    signal,
  };
}
