/**
 * Dispatcher
 * text -> Intent -> Command -> validate -> execute -> Result Envelope.
 * Never rejects: every stage's failure ends up in the envelope.
 */

import { logger } from '../utils/logger.js';
import { CommandFactory } from './command-factory.js';
import { IntentResolver } from './intent-resolver.js';
import { sampleCommands } from './pattern-table.js';
import { fail, fromError } from './result.js';
import type { Command, CommandContext } from './commands/base.js';
import type { Intent, ResultEnvelope } from '../types/index.js';

export interface DispatchOptions {
  /** AI provider override for create-post */
  provider?: string;
  signal?: AbortSignal;
}

export interface Dispatch {
  intent: Intent;
  result: ResultEnvelope;
}

export interface DispatcherDeps {
  resolver: IntentResolver;
  context: Omit<CommandContext, 'signal'>;
  factory?: CommandFactory;
}

export class Dispatcher {
  private readonly resolver: IntentResolver;
  private readonly factory: CommandFactory;
  private readonly context: Omit<CommandContext, 'signal'>;

  constructor(deps: DispatcherDeps) {
    this.resolver = deps.resolver;
    this.factory = deps.factory ?? new CommandFactory();
    this.context = deps.context;
  }

  async dispatch(text: string, options: DispatchOptions = {}): Promise<Dispatch> {
    const resolved = await this.resolver.resolve(text, options.signal);
    const intent = applyProvider(resolved, options.provider);

    if (intent.operation === 'unknown') {
      logger.info('[dispatch] Could not understand command', { text });
      return {
        intent,
        result: fail('ParseFailure', `Could not understand: "${text.trim()}"`, {
          suggestions: sampleCommands(),
        }),
      };
    }

    logger.dispatch.resolved(intent.operation, intent.source, intent.ruleId);

    let command: Command;
    try {
      command = this.factory.create(intent.operation, intent.parameters, { ...this.context, signal: options.signal });
    } catch (error) {
      return { intent, result: fromError(error, 'ValidationFailure', `Cannot build ${intent.operation}`) };
    }

    if (!command.validate()) {
      const problems = command.problems();
      logger.info('[dispatch] Validation failed', { operation: intent.operation, problems });
      return {
        intent,
        result: fail('ValidationFailure', `Invalid ${intent.operation}: ${problems[0]}`, { problems }),
      };
    }

    return { intent, result: await command.execute() };
  }
}

function applyProvider(intent: Intent, provider: string | undefined): Intent {
  if (provider === undefined || intent.operation !== 'create-post') return intent;
  return { ...intent, parameters: { ...intent.parameters, ai_provider: provider } };
}
