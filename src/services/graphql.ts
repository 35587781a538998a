/**
 * Drupal GraphQL client
 * Read-only content queries. User input only ever travels as variables.
 */

import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { CommandError } from '../core/errors.js';
import { DrupalHttp, firstErrorMessage, parseResponse, type FetchLike } from './http.js';
import type { Config } from '../types/index.js';

export interface ContentItem {
  id: string;
  title: string;
  created: string | null;
  url: string | null;
}

export interface UserItem {
  id: string;
  name: string;
  mail: string | null;
}

export interface TermItem {
  id: string;
  name: string;
}

// ==========================================
// QUERIES
// ==========================================

const NODE_FIELDS = `
      entities {
        entityId
        entityLabel
        entityCreated
        entityUrl { path }
      }`;

const LATEST_NODES = `
query LatestNodes($type: String!, $limit: Int!) {
  nodeQuery(
    filter: { conditions: [
      { field: "type", value: [$type] },
      { field: "status", value: ["1"] }
    ] },
    sort: [{ field: "created", direction: DESC }],
    limit: $limit
  ) {${NODE_FIELDS}
  }
}`;

const SEARCH_NODES = `
query SearchNodes($type: String!, $term: String!, $limit: Int!) {
  nodeQuery(
    filter: { conditions: [
      { field: "type", value: [$type] },
      { field: "title", value: [$term], operator: LIKE },
      { field: "status", value: ["1"] }
    ] },
    sort: [{ field: "created", direction: DESC }],
    limit: $limit
  ) {${NODE_FIELDS}
  }
}`;

const TAGGED_NODES = `
query TaggedNodes($type: String!, $tags: [String]!, $limit: Int!) {
  nodeQuery(
    filter: { conditions: [
      { field: "type", value: [$type] },
      { field: "field_tags.entity.name", value: $tags, operator: IN },
      { field: "status", value: ["1"] }
    ] },
    sort: [{ field: "created", direction: DESC }],
    limit: $limit
  ) {${NODE_FIELDS}
  }
}`;

const USERS_BY_ROLE = `
query UsersByRole($role: String!, $limit: Int!) {
  userQuery(
    filter: { conditions: [{ field: "roles", value: [$role] }] },
    limit: $limit
  ) {
    entities {
      entityId
      entityLabel
      ... on User { mail }
    }
  }
}`;

const TAXONOMY_TERMS = `
query TaxonomyTerms($vocabulary: String!, $limit: Int!) {
  taxonomyTermQuery(
    filter: { conditions: [{ field: "vid", value: [$vocabulary] }] },
    limit: $limit
  ) {
    entities {
      entityId
      entityLabel
    }
  }
}`;

// ==========================================
// RESPONSE SHAPES
// ==========================================

const Entity = z.object({
  entityId: z.union([z.string(), z.number()]).transform(String),
  entityLabel: z.string().nullish(),
  entityCreated: z.string().nullish(),
  entityUrl: z.object({ path: z.string() }).nullish(),
  mail: z.string().nullish(),
});

const EntityList = z.object({ entities: z.array(Entity.nullable()) }).nullish();

const QueryResponse = z.object({
  data: z.record(EntityList).nullish(),
});

type EntityRow = z.infer<typeof Entity>;

export class DrupalGraphQL {
  private readonly http: DrupalHttp;

  constructor(
    private readonly cfg: Config['drupal'],
    fetchImpl?: FetchLike
  ) {
    this.http = new DrupalHttp(cfg, fetchImpl);
  }

  /** Raw query; GraphQL errors become ProviderFailure. */
  async execute(query: string, variables: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> {
    const response = await this.http.request('POST', this.cfg.graphql_path, {
      body: JSON.stringify({ query, variables }),
      headers: { 'Content-Type': 'application/json', 'Accept': 'application/json' },
      signal,
      subject: `GraphQL endpoint ${this.cfg.graphql_path}`,
    });

    const error = firstErrorMessage(response);
    if (error) {
      throw new CommandError('ProviderFailure', `GraphQL error: ${error}`, {
        suggestions: ['check that the graphql module is enabled and the schema exposes nodeQuery/userQuery'],
      });
    }
    return response;
  }

  private async entities(
    root: string,
    query: string,
    variables: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<EntityRow[]> {
    const response = parseResponse(QueryResponse, await this.execute(query, variables, signal), root);
    const rows = response.data?.[root]?.entities ?? [];
    logger.debug('[graphql] Query complete', { root, rows: rows.length });
    return rows.filter((row): row is EntityRow => row !== null);
  }

  private toContent(row: EntityRow): ContentItem {
    return {
      id: row.entityId,
      title: row.entityLabel ?? '',
      created: row.entityCreated ?? null,
      url: row.entityUrl ? `${this.http.baseUrl}${row.entityUrl.path}` : null,
    };
  }

  async latestNodes(contentType: string, limit: number, signal?: AbortSignal): Promise<ContentItem[]> {
    const rows = await this.entities('nodeQuery', LATEST_NODES, { type: contentType, limit }, signal);
    return rows.map((row) => this.toContent(row));
  }

  async searchNodes(term: string, contentType: string, limit: number, signal?: AbortSignal): Promise<ContentItem[]> {
    const rows = await this.entities('nodeQuery', SEARCH_NODES, { type: contentType, term: `%${term}%`, limit }, signal);
    return rows.map((row) => this.toContent(row));
  }

  async nodesWithTags(tags: string[], contentType: string, limit: number, signal?: AbortSignal): Promise<ContentItem[]> {
    const rows = await this.entities('nodeQuery', TAGGED_NODES, { type: contentType, tags, limit }, signal);
    return rows.map((row) => this.toContent(row));
  }

  async usersByRole(role: string, limit: number, signal?: AbortSignal): Promise<UserItem[]> {
    const rows = await this.entities('userQuery', USERS_BY_ROLE, { role, limit }, signal);
    return rows.map((row) => ({ id: row.entityId, name: row.entityLabel ?? '', mail: row.mail ?? null }));
  }

  async taxonomyTerms(vocabulary: string, limit = 50, signal?: AbortSignal): Promise<TermItem[]> {
    const rows = await this.entities('taxonomyTermQuery', TAXONOMY_TERMS, { vocabulary, limit }, signal);
    return rows.map((row) => ({ id: row.entityId, name: row.entityLabel ?? '' }));
  }
}
