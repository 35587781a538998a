/**
 * Parameter Extractor
 * Turns the named captures of a matched pattern into typed parameter values.
 * Pure: no I/O, no logging.
 */

import type { ParamValue } from '../types/index.js';

export type RoleKind = 'identifier' | 'integer' | 'quoted' | 'free' | 'enum' | 'list' | 'args';

export interface ParameterRole {
  /** Parameter name in the resulting mapping */
  name: string;
  kind: RoleKind;
  /** Named capture group to read from; defaults to `name` */
  slot?: string;
  required?: boolean;
  default?: ParamValue;
  /** enum only: lower-case alias -> canonical value */
  vocabulary?: Record<string, string>;
}

export interface ExtractionResult {
  values: Record<string, ParamValue>;
  missing: string[];
}

const WRAPPING_PUNCTUATION = /^[\s"'`.,;:!?()[\]{}<>]+|[\s"'`.,;:!?()[\]{}<>]+$/g;
const QUOTED = /"([^"]*)"|'([^']*)'/;

function collapseWhitespace(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(' ');
}

function stripWrappingQuotes(text: string): string {
  const trimmed = text.trim();
  if (trimmed.length >= 2) {
    const first = trimmed[0];
    const last = trimmed[trimmed.length - 1];
    if ((first === '"' || first === "'") && first === last) {
      return trimmed.slice(1, -1).trim();
    }
  }
  return trimmed;
}

export function extractIdentifier(span: string): string | undefined {
  const cleaned = span.replace(WRAPPING_PUNCTUATION, '');
  return cleaned.length > 0 ? cleaned : undefined;
}

export function extractInteger(span: string): number | undefined {
  const match = span.match(/-?\d+/);
  if (!match) return undefined;
  const value = parseInt(match[0], 10);
  return Number.isFinite(value) ? value : undefined;
}

export function extractQuoted(span: string): string | undefined {
  const match = span.match(QUOTED);
  if (match) {
    const inner = (match[1] ?? match[2] ?? '').trim();
    if (inner.length > 0) return inner;
  }
  const fallback = collapseWhitespace(stripWrappingQuotes(span));
  return fallback.length > 0 ? fallback : undefined;
}

export function extractFreeText(span: string): string | undefined {
  let text = collapseWhitespace(span);
  text = text.replace(/^about\s+/i, '');
  text = text.replace(/\s+using\s+\S+\s*$/i, '');
  text = stripWrappingQuotes(text).replace(/[.!?]+$/, '').trim();
  return text.length > 0 ? text : undefined;
}

export function extractEnum(span: string, vocabulary: Record<string, string> = {}): string | undefined {
  const key = collapseWhitespace(span.replace(WRAPPING_PUNCTUATION, '')).toLowerCase();
  if (!key) return undefined;
  return vocabulary[key] ?? key;
}

export function extractList(span: string): string[] | undefined {
  const items = stripWrappingQuotes(span)
    .split(/\s*[,;|]\s*|\s+and\s+/i)
    .map((item) => item.replace(/^["'\s]+|["'\s]+$/g, ''))
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
}

/** Shell-style words; quotes group words and are dropped. */
export function extractArgs(span: string): string[] | undefined {
  const words = (span.match(/"[^"]*"|'[^']*'|\S+/g) ?? [])
    .map((word) => stripWrappingQuotes(word))
    .filter((word) => word.length > 0);
  return words.length > 0 ? words : undefined;
}

function extractOne(role: ParameterRole, span: string): ParamValue | undefined {
  switch (role.kind) {
    case 'identifier':
      return extractIdentifier(span);
    case 'integer':
      return extractInteger(span);
    case 'quoted':
      return extractQuoted(span);
    case 'free':
      return extractFreeText(span);
    case 'enum':
      return extractEnum(span, role.vocabulary);
    case 'list':
      return extractList(span);
    case 'args':
      return extractArgs(span);
  }
}

/**
 * Extract every role from the captured spans. Absent optional roles take
 * their default; absent required roles are reported in `missing`.
 */
export function extractParameters(
  captures: Record<string, string | undefined>,
  roles: readonly ParameterRole[]
): ExtractionResult {
  const values: Record<string, ParamValue> = {};
  const missing: string[] = [];

  for (const role of roles) {
    const span = captures[role.slot ?? role.name];
    const value = span !== undefined ? extractOne(role, span) : undefined;

    if (value !== undefined) {
      values[role.name] = value;
    } else if (role.default !== undefined) {
      values[role.name] = role.default;
    } else if (role.required) {
      missing.push(role.name);
    }
  }

  return { values, missing };
}

// ============================================================================
// Normalizers used by commands
// ============================================================================

/** "AI in drupal" -> "AI In Drupal" */
export function topicToTitle(topic: string): string {
  return collapseWhitespace(stripWrappingQuotes(topic))
    .split(' ')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

/** "/tmp/hero_banner-v2.jpg" -> "Hero Banner V2" */
export function filenameToTitle(filePath: string): string {
  const base = filePath.split(/[\\/]/).pop() ?? filePath;
  const withoutExt = base.includes('.') ? base.slice(0, base.lastIndexOf('.')) : base;
  return topicToTitle(withoutExt.replace(/[_-]+/g, ' '));
}

/** "My Blog!" -> "my-blog" */
export function toProjectName(name: string): string {
  return stripWrappingQuotes(name)
    .toLowerCase()
    .replace(/[^a-z0-9-]/g, '-')
    .replace(/-+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/** Plain text paragraphs become <p> blocks; markup passes through. */
export function toHtmlBody(text: string): string {
  const body = stripWrappingQuotes(text);
  if (/<[^>]+>/.test(body)) return body;
  return body
    .split(/\n\s*\n/)
    .map((paragraph) => paragraph.trim())
    .filter(Boolean)
    .map((paragraph) => `<p>${paragraph}</p>`)
    .join('');
}
