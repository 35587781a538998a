/**
 * Render a Result Envelope for the terminal.
 */

import type { OutputFormat, ResultEnvelope } from '../types/index.js';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'text', 'table'];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/** Scalars as-is, lists of scalars comma-joined, anything else as JSON */
export function formatValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (Array.isArray(value) && value.every((item) => typeof item === 'string' || typeof item === 'number')) {
    return value.join(', ');
  }
  return JSON.stringify(value);
}

function formatText(result: ResultEnvelope): string {
  const lines = [`${result.success ? '✅' : '❌'} ${result.message}`];
  for (const [key, value] of Object.entries(result.data)) {
    lines.push(`   ${key}: ${formatValue(value)}`);
  }
  return lines.join('\n');
}

function formatTable(result: ResultEnvelope): string {
  if (Object.keys(result.data).length === 0) return formatText(result);

  const lines = [
    `Status: ${result.success ? 'SUCCESS' : 'FAILED'}`,
    `Message: ${result.message}`,
    '-'.repeat(50),
  ];
  for (const [key, value] of Object.entries(result.data)) {
    lines.push(`${key.padEnd(20)}: ${formatValue(value)}`);
  }
  return lines.join('\n');
}

export function formatResult(result: ResultEnvelope, format: OutputFormat = 'text'): string {
  switch (format) {
    case 'json':
      return JSON.stringify(result, null, 2);
    case 'table':
      return formatTable(result);
    case 'text':
      return formatText(result);
  }
}
