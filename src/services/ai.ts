/**
 * AI text generation
 * One entry point over three providers: Anthropic, OpenAI, and a local
 * Ollama server through its OpenAI-compatible endpoint.
 */

import { generateText, APICallError, type LanguageModel } from 'ai';
import { createAnthropic } from '@ai-sdk/anthropic';
import { createOpenAI } from '@ai-sdk/openai';
import { logger } from '../utils/logger.js';
import { withDeadline, isAbortError } from '../utils/abort.js';
import { summarizeError } from '../core/errors.js';
import {
  AI_PROVIDERS,
  type AiProvider,
  type Config,
  type GenerationRequest,
  type GenerationResult,
} from '../types/index.js';

export interface TextGenerator {
  isConfigured(provider?: string): boolean;
  /** Setting an operator must supply before `provider` works, or null */
  missingSetting(provider?: string): string | null;
  defaultProvider(): string;
  generate(request: GenerationRequest): Promise<GenerationResult>;
  suggestTags(content: string, provider?: string, signal?: AbortSignal): Promise<string[]>;
}

const CONTENT_SYSTEM_PROMPT =
  'You write web content for a Drupal site. Answer with the body only, as simple HTML ' +
  '(<p>, <h2>, <ul>, <li>, <strong>). No preamble, no title, no markdown fences.';

const TAG_PROMPT = `Suggest up to 5 short taxonomy tags for this content.
Respond with a comma-separated list and nothing else.

CONTENT:
{content}`;

export function isAiProvider(value: string): value is AiProvider {
  return AI_PROVIDERS.some((provider) => provider === value);
}

export function buildContentPrompt(topic: string, contentType = 'article'): string {
  const kind = contentType === 'page' ? 'a web page' : 'a blog article';
  return `Write ${kind} about: ${topic}\n\nAim for 4-6 paragraphs with one or two subheadings.`;
}

/** "Drupal, PHP;  cms" -> ["Drupal", "PHP", "cms"] */
export function parseTagList(text: string): string[] {
  const seen = new Set<string>();
  const tags: string[] = [];
  for (const raw of text.split(/[,;\n]/)) {
    const tag = raw.replace(/^[\s\-*#"'\d.]+|["'.\s]+$/g, '').trim();
    if (!tag || tag.length > 40 || seen.has(tag.toLowerCase())) continue;
    seen.add(tag.toLowerCase());
    tags.push(tag);
    if (tags.length === 5) break;
  }
  return tags;
}

export class AiTextGenerator implements TextGenerator {
  constructor(private readonly cfg: Config['ai']) {}

  defaultProvider(): string {
    return this.cfg.default_provider;
  }

  missingSetting(provider: string = this.cfg.default_provider): string | null {
    switch (provider) {
      case 'anthropic':
        return this.cfg.anthropic_api_key ? null : 'ANTHROPIC_API_KEY';
      case 'openai':
        return this.cfg.openai_api_key ? null : 'OPENAI_API_KEY';
      case 'ollama':
        return this.cfg.ollama_base_url ? null : 'OLLAMA_BASE_URL';
      default:
        return 'DEFAULT_AI_PROVIDER';
    }
  }

  isConfigured(provider: string = this.cfg.default_provider): boolean {
    return this.missingSetting(provider) === null;
  }

  private model(provider: AiProvider): LanguageModel {
    const modelId = this.cfg.models[provider];
    switch (provider) {
      case 'anthropic':
        return createAnthropic({ apiKey: this.cfg.anthropic_api_key })(modelId);
      case 'openai':
        return createOpenAI({ apiKey: this.cfg.openai_api_key })(modelId);
      case 'ollama':
        return createOpenAI({
          baseURL: `${this.cfg.ollama_base_url.replace(/\/+$/, '')}/v1`,
          apiKey: 'ollama',
          compatibility: 'compatible',
        })(modelId);
    }
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const provider = request.provider ?? this.cfg.default_provider;
    const missing = this.missingSetting(provider);
    if (missing !== null || !isAiProvider(provider)) {
      return {
        success: false,
        reason: 'not-configured',
        error: `AI provider "${provider}" is not configured: set ${missing ?? 'DEFAULT_AI_PROVIDER'}`,
        provider,
      };
    }

    const deadline = withDeadline(this.cfg.timeout_ms, request.signal);
    const startTime = Date.now();
    try {
      const { text } = await generateText({
        model: this.model(provider),
        system: request.system ?? CONTENT_SYSTEM_PROMPT,
        prompt: request.prompt,
        maxTokens: request.maxTokens ?? 1500,
        temperature: request.temperature ?? 0.7,
        maxRetries: 1,
        abortSignal: deadline.signal,
      });
      logger.debug('[ai] Generation complete', { provider, duration_ms: Date.now() - startTime });
      return { success: true, text: text.trim(), provider };
    } catch (error) {
      if (deadline.timedOut() || isAbortError(error)) {
        return {
          success: false,
          reason: 'timeout',
          error: deadline.timedOut()
            ? `${provider} did not answer within ${this.cfg.timeout_ms}ms`
            : `${provider} request aborted`,
          provider,
        };
      }
      if (APICallError.isInstance(error) && (error.statusCode === 401 || error.statusCode === 403)) {
        return {
          success: false,
          reason: 'unauthorized',
          error: `${provider} rejected the credentials: check ${this.missingSettingName(provider)}`,
          provider,
        };
      }
      logger.warn('[ai] Generation failed', { provider, error: summarizeError(error) });
      return { success: false, reason: 'unavailable', error: `${provider} unavailable: ${summarizeError(error)}`, provider };
    } finally {
      deadline.clear();
    }
  }

  private missingSettingName(provider: AiProvider): string {
    return provider === 'anthropic' ? 'ANTHROPIC_API_KEY' : provider === 'openai' ? 'OPENAI_API_KEY' : 'OLLAMA_BASE_URL';
  }

  /** Best effort: any failure yields no tags. */
  async suggestTags(content: string, provider?: string, signal?: AbortSignal): Promise<string[]> {
    const result = await this.generate({
      prompt: TAG_PROMPT.replace('{content}', content.slice(0, 4000)),
      system: 'You label content with taxonomy tags.',
      provider,
      maxTokens: 60,
      temperature: 0,
      signal,
    });
    if (!result.success) {
      logger.debug('[ai] Tag suggestion skipped', { reason: result.reason });
      return [];
    }
    return parseTagList(result.text);
  }
}
