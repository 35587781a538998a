/**
 * Failure taxonomy
 * Every failure a command or the resolver can hit maps onto one FailureKind.
 */

import type { FailureKind } from '../types/index.js';

export interface CommandErrorOptions {
  suggestions?: string[];
  details?: Record<string, unknown>;
}

export class CommandError extends Error {
  readonly kind: FailureKind;
  readonly suggestions: string[];
  readonly details: Record<string, unknown>;

  constructor(kind: FailureKind, message: string, options: CommandErrorOptions = {}) {
    super(message);
    this.name = 'CommandError';
    this.kind = kind;
    this.suggestions = options.suggestions ?? [];
    this.details = options.details ?? {};
  }
}

export function isCommandError(error: unknown): error is CommandError {
  return error instanceof CommandError;
}

/** First line of an error, without stack or wrapped output. */
export function summarizeError(error: unknown): string {
  const text = error instanceof Error ? error.message : String(error);
  const firstLine = text.split('\n').find((line) => line.trim().length > 0) ?? '';
  return firstLine.trim().slice(0, 200) || 'unknown error';
}
