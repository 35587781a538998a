/**
 * Read-only content queries over GraphQL. One command class serves all
 * four query operations; `kind` says which.
 */

import { BaseCommand, MACHINE_NAME, type CommandContext } from './base.js';
import { ok } from '../result.js';
import type { FailureKind, ResultEnvelope } from '../../types/index.js';
import type { QueryLatestInput, QuerySearchInput, QueryTaggedInput, QueryUsersInput } from './params.js';

export type QueryRequest =
  | ({ kind: 'query-latest' } & QueryLatestInput)
  | ({ kind: 'query-search' } & QuerySearchInput)
  | ({ kind: 'query-tagged' } & QueryTaggedInput)
  | ({ kind: 'query-users' } & QueryUsersInput);

export type QueryOperation = QueryRequest['kind'];

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`;
}

export class QueryContentCommand extends BaseCommand<QueryRequest> {
  readonly operation: QueryOperation;
  protected readonly failureKind: FailureKind = 'ProviderFailure';

  constructor(request: QueryRequest, context: CommandContext) {
    super(request, context);
    this.operation = request.kind;
  }

  problems(): string[] {
    const request = this.params;
    if (request.kind === 'query-users') {
      return MACHINE_NAME.test(request.role) ? [] : [`role "${request.role}" is not a machine name`];
    }
    return MACHINE_NAME.test(request.content_type)
      ? []
      : [`content_type "${request.content_type}" is not a machine name`];
  }

  protected describe(): string {
    return `run ${this.operation.replace('-', ' ')}`;
  }

  protected async run(): Promise<ResultEnvelope> {
    const { queries, signal } = this.context;
    const request = this.params;

    switch (request.kind) {
      case 'query-latest': {
        const items = await queries.latestNodes(request.content_type, request.count, signal);
        return ok(`Found ${plural(items.length, request.content_type)}`, {
          query_type: 'latest',
          content_type: request.content_type,
          count: items.length,
          items,
        });
      }
      case 'query-search': {
        const items = await queries.searchNodes(request.term, request.content_type, request.count, signal);
        return ok(`Found ${plural(items.length, request.content_type)} matching "${request.term}"`, {
          query_type: 'search',
          term: request.term,
          content_type: request.content_type,
          count: items.length,
          items,
        });
      }
      case 'query-tagged': {
        const items = await queries.nodesWithTags(request.tags, request.content_type, request.count, signal);
        return ok(`Found ${plural(items.length, request.content_type)} tagged ${request.tags.join(', ')}`, {
          query_type: 'tagged',
          tags: request.tags,
          content_type: request.content_type,
          count: items.length,
          items,
        });
      }
      case 'query-users': {
        const items = await queries.usersByRole(request.role, request.count, signal);
        return ok(`Found ${plural(items.length, 'user')} with role ${request.role}`, {
          query_type: 'users',
          role: request.role,
          count: items.length,
          items,
        });
      }
    }
  }
}
