/**
 * Command contract
 * One instance per dispatch: typed parameters plus the collaborators it may
 * call. `execute()` never rejects; whatever `run()` throws becomes a
 * failure envelope.
 */

import { logger } from '../../utils/logger.js';
import { fromError } from '../result.js';
import type { DrupalJsonApi } from '../../services/jsonapi.js';
import type { DrupalGraphQL } from '../../services/graphql.js';
import type { TextGenerator } from '../../services/ai.js';
import type { DrushRunner } from '../../services/drush.js';
import type { SiteLifecycle } from '../../sites/lifecycle.js';
import type { SiteScaffold } from '../../sites/scaffold.js';
import type { FailureKind, OperationId, ResultEnvelope } from '../../types/index.js';

export interface Command {
  readonly operation: OperationId;
  /** Pure: no I/O */
  validate(): boolean;
  /** Why validate() is false; empty when it is true */
  problems(): string[];
  execute(): Promise<ResultEnvelope>;
}

export type ContentStore = Pick<DrupalJsonApi, 'createNode' | 'updateNode' | 'deleteNode' | 'findTermIds' | 'uploadImage'>;
export type ContentQueries = Pick<DrupalGraphQL, 'latestNodes' | 'searchNodes' | 'nodesWithTags' | 'usersByRole'>;
export type Lifecycle = Pick<SiteLifecycle, 'start' | 'stop' | 'restart' | 'status' | 'locate'>;
export type Scaffold = Pick<SiteScaffold, 'create'>;
export type Drush = Pick<DrushRunner, 'run'>;

export interface CommandContext {
  content: ContentStore;
  queries: ContentQueries;
  ai: TextGenerator;
  drush: Drush;
  lifecycle: Lifecycle;
  scaffold: Scaffold;
  signal?: AbortSignal;
}

export const MACHINE_NAME = /^[a-z][a-z0-9_]*$/;

export abstract class BaseCommand<P> implements Command {
  abstract readonly operation: OperationId;
  /** Kind reported for errors that are not CommandErrors */
  protected abstract readonly failureKind: FailureKind;

  constructor(
    readonly params: P,
    protected readonly context: CommandContext
  ) {}

  problems(): string[] {
    return [];
  }

  validate(): boolean {
    return this.problems().length === 0;
  }

  /** "create post", "start site" … used in failure messages */
  protected abstract describe(): string;

  protected abstract run(): Promise<ResultEnvelope>;

  async execute(): Promise<ResultEnvelope> {
    const startTime = Date.now();
    logger.info(`Executing ${this.operation}`);
    try {
      const result = await this.run();
      logger.dispatch.completed(this.operation, result.success, Date.now() - startTime);
      return result;
    } catch (error) {
      const result = fromError(error, this.failureKind, `Failed to ${this.describe()}`);
      logger.warn(`${this.operation} failed`, { error: result.error, message: result.message });
      logger.dispatch.completed(this.operation, false, Date.now() - startTime);
      return result;
    }
  }
}
