/**
 * Drupal HTTP transport shared by the JSON:API and GraphQL clients:
 * Basic auth, a deadline per request, and HTTP status -> FailureKind mapping.
 */

import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { withDeadline, isAbortError } from '../utils/abort.js';
import { CommandError, summarizeError } from '../core/errors.js';
import type { Config } from '../types/index.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface RequestOptions {
  body?: RequestInit['body'];
  headers?: Record<string, string>;
  signal?: AbortSignal;
  /** What the caller was looking for, for 404 messages */
  subject?: string;
}

const ErrorDocument = z.object({
  errors: z.array(
    z.object({
      title: z.string().optional(),
      detail: z.string().optional(),
      message: z.string().optional(),
    })
  ),
});

export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** First error of a JSON:API or GraphQL error document, if `value` is one */
export function firstErrorMessage(value: unknown): string | null {
  const parsed = ErrorDocument.safeParse(value);
  if (!parsed.success || parsed.data.errors.length === 0) return null;
  const first = parsed.data.errors[0];
  return first.detail ?? first.message ?? first.title ?? null;
}

export class DrupalHttp {
  readonly baseUrl: string;

  constructor(
    private readonly cfg: Config['drupal'],
    private readonly fetchImpl: FetchLike = fetch
  ) {
    this.baseUrl = cfg.base_url.replace(/\/+$/, '');
  }

  private authHeaders(): Record<string, string> {
    return {
      'Authorization': 'Basic ' + Buffer.from(`${this.cfg.username}:${this.cfg.password}`).toString('base64'),
    };
  }

  async request(method: string, path: string, options: RequestOptions = {}): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    const deadline = withDeadline(this.cfg.timeout_ms, options.signal);

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method,
        headers: {
          ...this.authHeaders(),
          ...options.headers,
        },
        body: options.body,
        signal: deadline.signal,
      });
    } catch (error) {
      if (deadline.timedOut()) {
        throw new CommandError('ProviderFailure', `Drupal did not answer within ${this.cfg.timeout_ms}ms`, {
          details: { timed_out: true },
        });
      }
      if (isAbortError(error) || options.signal?.aborted) {
        throw new CommandError('ProviderFailure', 'Drupal request aborted', { details: { aborted: true } });
      }
      throw new CommandError('ProviderFailure', `Cannot reach Drupal at ${this.baseUrl}: ${summarizeError(error)}`, {
        suggestions: ['check DRUPAL_BASE_URL and that the site is running'],
      });
    } finally {
      deadline.clear();
    }

    logger.debug('[drupal] Response', { method, path, status: res.status });

    if (res.status === 401 || res.status === 403) {
      throw new CommandError('ProviderFailure', `Drupal rejected the request (HTTP ${res.status})`, {
        suggestions: ['check DRUPAL_USERNAME / DRUPAL_PASSWORD and the account permissions'],
        details: { status: res.status },
      });
    }
    if (res.status === 404) {
      throw new CommandError('NotFoundFailure', `${options.subject ?? path} not found`, { details: { status: 404 } });
    }

    const text = res.status === 204 ? '' : await res.text().catch(() => '');
    const json = text ? parseJson(text) : {};

    if (!res.ok) {
      const detail = firstErrorMessage(json) ?? summarizeError(text || res.statusText);
      throw new CommandError('ProviderFailure', `Drupal returned HTTP ${res.status}: ${detail}`, {
        details: { status: res.status },
      });
    }
    if (json === undefined) {
      throw new CommandError('ProviderFailure', `Drupal returned a non-JSON response for ${path}`);
    }
    return json;
  }
}

/** Validate a response body, or fail with the paths zod complained about. */
export function parseResponse<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.infer<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new CommandError('ProviderFailure', `Unexpected Drupal response for ${what}`, {
      details: { issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`) },
    });
  }
  return parsed.data;
}
