/**
 * Command Registry
 * One entry per operation: the parameter schema plus a constructor. Built
 * once at module load; the registry type is read-only.
 */

import { z } from 'zod';
import { CommandError } from './errors.js';
import { PATTERN_TABLE, type PatternRule } from './pattern-table.js';
import type { Command, CommandContext } from './commands/base.js';
import { CreatePostCommand, DeleteNodeCommand, EditNodeCommand, UploadMediaCommand } from './commands/content.js';
import { RunDrushCommand } from './commands/maintenance.js';
import { QueryContentCommand } from './commands/query.js';
import {
  CreateSiteCommand,
  RestartSiteCommand,
  StartSiteCommand,
  StatusSiteCommand,
  StopSiteCommand,
} from './commands/sites.js';
import {
  CreatePostParams,
  CreateSiteParams,
  DeleteNodeParams,
  EditNodeParams,
  QueryLatestParams,
  QuerySearchParams,
  QueryTaggedParams,
  QueryUsersParams,
  RunDrushParams,
  SiteParams,
  UploadMediaParams,
} from './commands/params.js';
import { isOperationId, type OperationId, type ParamValue } from '../types/index.js';

export interface CommandRegistration {
  /** Parses raw intent parameters; failure = ValidationFailure */
  create(parameters: Record<string, ParamValue>, context: CommandContext): Command;
}

/**
 * Ties a schema to a constructor taking exactly the schema's output type.
 */
function register<S extends z.ZodTypeAny>(
  operation: OperationId,
  schema: S,
  build: (params: z.infer<S>, context: CommandContext) => Command
): CommandRegistration {
  return {
    create(parameters, context) {
      const parsed = schema.safeParse(parameters);
      if (!parsed.success) {
        throw validationError(operation, parsed.error);
      }
      return build(parsed.data, context);
    },
  };
}

function validationError(operation: OperationId, error: z.ZodError): CommandError {
  const fields = [...new Set(error.issues.map((issue) => issue.path.join('.') || '(parameters)'))];
  const problems = error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
  return new CommandError('ValidationFailure', `Invalid parameters for ${operation}: ${fields.join(', ')}`, {
    details: { operation, fields, problems },
  });
}

const ENTRIES: ReadonlyArray<readonly [OperationId, CommandRegistration]> = [
  ['create-post', register('create-post', CreatePostParams, (p, ctx) => new CreatePostCommand(p, ctx))],
  ['edit-node', register('edit-node', EditNodeParams, (p, ctx) => new EditNodeCommand(p, ctx))],
  ['delete-node', register('delete-node', DeleteNodeParams, (p, ctx) => new DeleteNodeCommand(p, ctx))],
  ['upload-media', register('upload-media', UploadMediaParams, (p, ctx) => new UploadMediaCommand(p, ctx))],
  ['run-drush', register('run-drush', RunDrushParams, (p, ctx) => new RunDrushCommand(p, ctx))],
  [
    'query-latest',
    register('query-latest', QueryLatestParams, (p, ctx) => new QueryContentCommand({ kind: 'query-latest', ...p }, ctx)),
  ],
  [
    'query-search',
    register('query-search', QuerySearchParams, (p, ctx) => new QueryContentCommand({ kind: 'query-search', ...p }, ctx)),
  ],
  [
    'query-tagged',
    register('query-tagged', QueryTaggedParams, (p, ctx) => new QueryContentCommand({ kind: 'query-tagged', ...p }, ctx)),
  ],
  [
    'query-users',
    register('query-users', QueryUsersParams, (p, ctx) => new QueryContentCommand({ kind: 'query-users', ...p }, ctx)),
  ],
  ['create-site', register('create-site', CreateSiteParams, (p, ctx) => new CreateSiteCommand(p, ctx))],
  ['start-site', register('start-site', SiteParams, (p, ctx) => new StartSiteCommand(p, ctx))],
  ['stop-site', register('stop-site', SiteParams, (p, ctx) => new StopSiteCommand(p, ctx))],
  ['restart-site', register('restart-site', SiteParams, (p, ctx) => new RestartSiteCommand(p, ctx))],
  ['status-site', register('status-site', SiteParams, (p, ctx) => new StatusSiteCommand(p, ctx))],
];

export type CommandRegistry = ReadonlyMap<OperationId, CommandRegistration>;

export const COMMAND_REGISTRY: CommandRegistry = new Map(ENTRIES);

/**
 * Every operation with a rule needs a command, and every command needs a
 * rule. Throws on startup otherwise.
 */
export function assertRegistryConsistency(
  table: readonly PatternRule[] = PATTERN_TABLE,
  registry: CommandRegistry = COMMAND_REGISTRY
): void {
  const ruled = new Set(table.map((rule) => rule.operation));
  const registered = new Set(registry.keys());

  const withoutCommand = [...ruled].filter((operation) => !registered.has(operation));
  const withoutRule = [...registered].filter((operation) => !ruled.has(operation));

  const errors = [
    ...withoutCommand.map((operation) => `rule for ${operation} has no registered command`),
    ...withoutRule.map((operation) => `command ${operation} has no pattern rule`),
  ];
  if (errors.length > 0) {
    throw new Error(`Command registry is inconsistent:\n  - ${errors.join('\n  - ')}`);
  }
}

export class CommandFactory {
  constructor(private readonly registry: CommandRegistry = COMMAND_REGISTRY) {}

  create(operation: string, parameters: Record<string, ParamValue>, context: CommandContext): Command {
    const registration = isOperationId(operation) ? this.registry.get(operation) : undefined;
    if (!registration) {
      throw new CommandError('UnknownOperationFailure', `No command registered for operation "${operation}"`, {
        details: { operation },
      });
    }
    return registration.create(parameters, context);
  }
}
