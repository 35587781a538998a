/**
 * Result Envelope helpers
 */

import type { FailureKind, ResultEnvelope } from '../types/index.js';
import { isCommandError, summarizeError } from './errors.js';

export function ok(message: string, data: Record<string, unknown> = {}): ResultEnvelope {
  return { success: true, message, data };
}

export function fail(
  kind: FailureKind,
  message: string,
  data: Record<string, unknown> = {}
): ResultEnvelope {
  return { success: false, message, data, error: kind };
}

/**
 * Convert anything thrown into a failure envelope. CommandErrors keep their
 * kind and suggestions; anything else is reported as `fallbackKind` with a
 * one-line summary under `context`.
 */
export function fromError(error: unknown, fallbackKind: FailureKind, context: string): ResultEnvelope {
  if (isCommandError(error)) {
    const data: Record<string, unknown> = { ...error.details };
    if (error.suggestions.length > 0) {
      data.suggestions = error.suggestions;
    }
    return fail(error.kind, error.message, data);
  }
  return fail(fallbackKind, `${context}: ${summarizeError(error)}`);
}
