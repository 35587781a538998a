/**
 * Content commands: posts, node edits and deletes, media uploads (JSON:API).
 */

import { existsSync } from 'fs';
import { basename, resolve } from 'path';
import { BaseCommand, MACHINE_NAME } from './base.js';
import { CommandError } from '../errors.js';
import { ok } from '../result.js';
import { logger } from '../../utils/logger.js';
import { filenameToTitle, toHtmlBody, topicToTitle } from '../parameter-extractor.js';
import { buildContentPrompt, isAiProvider } from '../../services/ai.js';
import { isImageFile } from '../../services/jsonapi.js';
import { AI_PROVIDERS, type FailureKind, type ResultEnvelope } from '../../types/index.js';
import type { CreatePostInput, DeleteNodeInput, EditNodeInput, UploadMediaInput } from './params.js';

function contentTypeProblems(contentType: string): string[] {
  return MACHINE_NAME.test(contentType) ? [] : [`content_type "${contentType}" is not a machine name`];
}

// ============================================================================
// create-post
// ============================================================================

export class CreatePostCommand extends BaseCommand<CreatePostInput> {
  readonly operation = 'create-post';
  protected readonly failureKind: FailureKind = 'ProviderFailure';

  problems(): string[] {
    const problems = contentTypeProblems(this.params.content_type);
    const provider = this.params.ai_provider;
    if (provider !== undefined && !isAiProvider(provider)) {
      problems.push(`ai_provider "${provider}" is not one of ${AI_PROVIDERS.join(', ')}`);
    }
    if (this.title().length > 255) {
      problems.push('title is longer than 255 characters');
    }
    return problems;
  }

  protected describe(): string {
    return 'create post';
  }

  private title(): string {
    return this.params.title ?? topicToTitle(this.params.topic ?? '');
  }

  /** Body and AI tag suggestions */
  private async composeBody(): Promise<{ body: string; suggested: string[] }> {
    const { body, topic, content_type: contentType } = this.params;
    if (body !== undefined) return { body: toHtmlBody(body), suggested: [] };
    if (topic === undefined) return { body: '', suggested: [] };

    const { ai, signal } = this.context;
    const provider = this.params.ai_provider ?? ai.defaultProvider();
    const missing = ai.missingSetting(provider);
    if (missing) {
      throw new CommandError('ProviderFailure', `AI provider "${provider}" is not configured: set ${missing}`, {
        suggestions: [`set ${missing} in .env`, 'or choose another provider with --provider'],
        details: { provider, missing_setting: missing },
      });
    }

    logger.info('[content] Generating body', { provider, topic });
    const generated = await ai.generate({ prompt: buildContentPrompt(topic, contentType), contentType, provider, signal });
    if (!generated.success) {
      throw new CommandError('ProviderFailure', `Content generation failed: ${generated.error}`, {
        details: { provider, reason: generated.reason },
      });
    }

    const suggested = await ai.suggestTags(generated.text, provider, signal);
    return { body: generated.text, suggested };
  }

  /** Best effort; unknown or unreachable terms leave the post untagged. */
  private async resolveTags(names: string[]): Promise<string[]> {
    if (names.length === 0) return [];
    try {
      return await this.context.content.findTermIds(names, 'tags', this.context.signal);
    } catch (error) {
      logger.warn('[content] Tag lookup failed, creating without tags', { error: String(error) });
      return [];
    }
  }

  protected async run(): Promise<ResultEnvelope> {
    const title = this.title();
    const { body, suggested } = await this.composeBody();
    const tags = [...new Set([...this.params.tags, ...suggested])];
    const tagIds = await this.resolveTags(tags);

    const node = await this.context.content.createNode(
      { title, body, contentType: this.params.content_type, tagIds },
      this.context.signal
    );

    return ok(`Created ${this.params.content_type}: ${title}`, {
      node_id: node.nid,
      uuid: node.uuid,
      url: node.url,
      title,
      content_type: this.params.content_type,
      tags,
    });
  }
}

// ============================================================================
// edit-node
// ============================================================================

export class EditNodeCommand extends BaseCommand<EditNodeInput> {
  readonly operation = 'edit-node';
  protected readonly failureKind: FailureKind = 'ProviderFailure';

  problems(): string[] {
    return contentTypeProblems(this.params.content_type);
  }

  protected describe(): string {
    return `edit node ${this.params.node_id}`;
  }

  protected async run(): Promise<ResultEnvelope> {
    const { node_id: nodeId, title, body, content_type: contentType } = this.params;
    const result = await this.context.content.updateNode(
      nodeId,
      { title, body: body === undefined ? undefined : toHtmlBody(body) },
      contentType,
      this.context.signal
    );
    return ok(`Updated node ${nodeId}`, { node_id: nodeId, url: result.url, updated: result.updated });
  }
}

// ============================================================================
// delete-node
// ============================================================================

export class DeleteNodeCommand extends BaseCommand<DeleteNodeInput> {
  readonly operation = 'delete-node';
  protected readonly failureKind: FailureKind = 'ProviderFailure';

  problems(): string[] {
    return contentTypeProblems(this.params.content_type);
  }

  protected describe(): string {
    return `delete node ${this.params.node_id}`;
  }

  protected async run(): Promise<ResultEnvelope> {
    await this.context.content.deleteNode(this.params.node_id, this.params.content_type, this.context.signal);
    return ok(`Deleted node ${this.params.node_id}`, { node_id: this.params.node_id });
  }
}

// ============================================================================
// upload-media
// ============================================================================

export class UploadMediaCommand extends BaseCommand<UploadMediaInput> {
  readonly operation = 'upload-media';
  protected readonly failureKind: FailureKind = 'ProviderFailure';

  problems(): string[] {
    return isImageFile(this.params.file_path)
      ? []
      : [`${this.params.file_path} is not an image (jpg, jpeg, png, gif, webp)`];
  }

  protected describe(): string {
    return 'upload media';
  }

  protected async run(): Promise<ResultEnvelope> {
    const filePath = resolve(this.params.file_path);
    if (!existsSync(filePath)) {
      throw new CommandError('NotFoundFailure', `File not found: ${this.params.file_path}`, {
        details: { file_path: filePath },
      });
    }

    const title = this.params.title ?? filenameToTitle(filePath);
    const alt = this.params.alt_text ?? basename(filePath);
    const media = await this.context.content.uploadImage(filePath, { alt, title }, this.context.signal);

    return ok(`Uploaded ${media.filename}`, {
      media_id: media.mid,
      uuid: media.uuid,
      filename: media.filename,
    });
  }
}
