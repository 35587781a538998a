/**
 * Intent Resolver
 * Raw command text -> Intent. Rules first, then the AI classifier (when one
 * is available), then the `unknown` sentinel. Never rejects.
 */

import { PATTERN_TABLE, type PatternRule } from './pattern-table.js';
import { extractParameters } from './parameter-extractor.js';
import { runWithFallback } from './fallback.js';
import type { IntentClassifier } from './classifier.js';
import { withDeadline, raceAbort } from '../utils/abort.js';
import { logger } from '../utils/logger.js';
import type { Intent } from '../types/index.js';

export interface ResolverOptions {
  table?: readonly PatternRule[];
  classifier?: IntentClassifier;
  classifyTimeoutMs?: number;
}

export function unresolved(text: string): Intent {
  return { operation: 'unknown', parameters: { raw_command: text }, source: 'unresolved' };
}

/**
 * First rule whose pattern matches and whose required roles are all filled.
 * A structural match with missing roles is skipped.
 */
export function matchRules(text: string, table: readonly PatternRule[] = PATTERN_TABLE): Intent | null {
  const trimmed = text.trim();
  if (!trimmed) return null;

  for (const rule of table) {
    const match = rule.pattern.exec(trimmed);
    if (!match) continue;

    const { values, missing } = extractParameters(match.groups ?? {}, rule.roles);
    if (missing.length > 0) {
      logger.debug('[resolver] Rule matched but roles missing', { rule: rule.id, missing });
      continue;
    }

    return {
      operation: rule.operation,
      parameters: { ...values, ...rule.fixed },
      source: 'rule-matched',
      ruleId: rule.id,
    };
  }
  return null;
}

export class IntentResolver {
  private readonly table: readonly PatternRule[];
  private readonly classifier?: IntentClassifier;
  private readonly classifyTimeoutMs: number;

  constructor(options: ResolverOptions = {}) {
    this.table = options.table ?? PATTERN_TABLE;
    this.classifier = options.classifier;
    this.classifyTimeoutMs = options.classifyTimeoutMs ?? 15000;
  }

  async resolve(text: string, signal?: AbortSignal): Promise<Intent> {
    const trimmed = text.trim();
    if (!trimmed) return unresolved(text);

    const { result, stepUsed } = await runWithFallback<Intent>({
      primary: {
        name: 'rules',
        fn: async () => {
          const intent = matchRules(trimmed, this.table);
          if (!intent) throw new Error('no rule matched');
          return intent;
        },
      },
      fallbacks: [
        {
          name: 'ai',
          enabled: () => this.classifier?.isAvailable() ?? false,
          fn: () => this.classify(trimmed, signal),
        },
      ],
      onAllFailed: () => unresolved(trimmed),
    });

    logger.debug('[resolver] Resolved', { operation: result.operation, step: stepUsed });
    return result;
  }

  private async classify(text: string, signal?: AbortSignal): Promise<Intent> {
    const classifier = this.classifier;
    if (!classifier) throw new Error('no classifier');

    const deadline = withDeadline(this.classifyTimeoutMs, signal);
    try {
      const classified = await raceAbort(classifier.classify(text, deadline.signal), deadline.signal);
      if (!classified) throw new Error('classifier found no operation');
      return { operation: classified.operation, parameters: classified.parameters, source: 'ai-inferred' };
    } catch (error) {
      if (deadline.timedOut()) {
        throw new Error(`classifier timed out after ${this.classifyTimeoutMs}ms`);
      }
      throw error;
    } finally {
      deadline.clear();
    }
  }
}
