/**
 * Fallback Chain
 * Try the primary step; when it fails, try each fallback in order.
 * A step fails by throwing (or rejecting). If every step fails,
 * `onAllFailed` receives the collected errors and supplies the answer.
 */

import { logger } from '../utils/logger.js';

export interface FallbackStep<T> {
  name: string;
  fn: () => Promise<T>;
  /** Skip the step without counting it as a failure */
  enabled?: () => boolean;
}

export interface FallbackOptions<T> {
  primary: FallbackStep<T>;
  fallbacks: FallbackStep<T>[];
  onAllFailed: (errors: Error[]) => T;
}

export interface FallbackOutcome<T> {
  result: T;
  /** Name of the step that produced `result`, or 'none' */
  stepUsed: string;
  errors: Error[];
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export async function runWithFallback<T>(options: FallbackOptions<T>): Promise<FallbackOutcome<T>> {
  const { primary, fallbacks, onAllFailed } = options;
  const errors: Error[] = [];

  for (const step of [primary, ...fallbacks]) {
    if (step.enabled && !step.enabled()) {
      logger.debug(`[fallback] ${step.name} skipped`);
      continue;
    }
    try {
      const result = await step.fn();
      return { result, stepUsed: step.name, errors };
    } catch (e) {
      const error = toError(e);
      logger.debug(`[fallback] ${step.name} failed`, { error: error.message });
      errors.push(error);
    }
  }

  return { result: onAllFailed(errors), stepUsed: 'none', errors };
}
