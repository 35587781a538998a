/**
 * Drupal JSON:API client
 * Content writes: nodes, taxonomy lookups and media uploads.
 * Authenticates with HTTP Basic on every request.
 */

import { readFile } from 'fs/promises';
import { basename, extname } from 'path';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { CommandError } from '../core/errors.js';
import { DrupalHttp, parseResponse, type FetchLike, type RequestOptions } from './http.js';
import type { Config } from '../types/index.js';

export interface NodeInput {
  title: string;
  body: string;
  contentType: string;
  tagIds?: string[];
}

export interface NodeRef {
  nid: number;
  uuid: string;
  url: string;
}

export interface MediaRef {
  mid: number;
  uuid: string;
  filename: string;
}

const JSONAPI_TYPE = 'application/vnd.api+json';

const NodeDocument = z.object({
  data: z.object({
    id: z.string(),
    attributes: z.object({ drupal_internal__nid: z.number() }),
  }),
});

const FileDocument = z.object({
  data: z.object({ id: z.string() }),
});

const MediaDocument = z.object({
  data: z.object({
    id: z.string(),
    attributes: z.object({ drupal_internal__mid: z.number() }),
  }),
});

const CollectionDocument = z.object({
  data: z.array(
    z.object({
      id: z.string(),
      attributes: z.object({ name: z.string().optional() }).optional(),
    })
  ),
});

// Extensions the default image media type accepts
const IMAGE_EXTENSIONS = new Set(['.jpg', '.jpeg', '.png', '.gif', '.webp']);

export function isImageFile(filePath: string): boolean {
  return IMAGE_EXTENSIONS.has(extname(filePath).toLowerCase());
}

export class DrupalJsonApi {
  private readonly http: DrupalHttp;

  constructor(cfg: Config['drupal'], fetchImpl?: FetchLike) {
    this.http = new DrupalHttp(cfg, fetchImpl);
  }

  nodeUrl(nid: number): string {
    return `${this.http.baseUrl}/node/${nid}`;
  }

  private request(method: string, path: string, options: RequestOptions = {}): Promise<unknown> {
    return this.http.request(method, path, {
      ...options,
      headers: { 'Accept': JSONAPI_TYPE, ...options.headers },
    });
  }

  /** GET the JSON:API entry point; rejects the way any other request would. */
  async ping(signal?: AbortSignal): Promise<void> {
    await this.request('GET', '/jsonapi', { signal, subject: 'JSON:API entry point' });
  }

  // ---------- Nodes ----------

  async createNode(input: NodeInput, signal?: AbortSignal): Promise<NodeRef> {
    const document = {
      data: {
        type: `node--${input.contentType}`,
        attributes: {
          title: input.title,
          body: { value: input.body, format: 'full_html' },
          status: true,
        },
        ...(input.tagIds && input.tagIds.length > 0 && {
          relationships: {
            field_tags: {
              data: input.tagIds.map((id) => ({ type: 'taxonomy_term--tags', id })),
            },
          },
        }),
      },
    };

    const response = await this.request('POST', `/jsonapi/node/${input.contentType}`, {
      body: JSON.stringify(document),
      headers: { 'Content-Type': JSONAPI_TYPE },
      signal,
      subject: `Content type "${input.contentType}"`,
    });
    const { data } = parseResponse(NodeDocument, response, 'node creation');
    const nid = data.attributes.drupal_internal__nid;
    logger.info('[jsonapi] Node created', { nid, contentType: input.contentType });
    return { nid, uuid: data.id, url: this.nodeUrl(nid) };
  }

  /** JSON:API addresses nodes by UUID; look it up from the numeric id. */
  async findNodeUuid(nid: number, contentType: string, signal?: AbortSignal): Promise<string | null> {
    const query = new URLSearchParams();
    query.set('filter[drupal_internal__nid]', String(nid));
    query.set(`fields[node--${contentType}]`, 'title');
    const response = await this.request('GET', `/jsonapi/node/${contentType}?${query.toString()}`, {
      signal,
      subject: `Content type "${contentType}"`,
    });
    const { data } = parseResponse(CollectionDocument, response, 'node lookup');
    return data[0]?.id ?? null;
  }

  private async requireNodeUuid(nid: number, contentType: string, signal?: AbortSignal): Promise<string> {
    const uuid = await this.findNodeUuid(nid, contentType, signal);
    if (!uuid) {
      throw new CommandError('NotFoundFailure', `Node ${nid} not found`, {
        suggestions: [`check the id, or that node ${nid} is a "${contentType}"`],
        details: { node_id: nid },
      });
    }
    return uuid;
  }

  async updateNode(
    nid: number,
    changes: { title?: string; body?: string },
    contentType: string,
    signal?: AbortSignal
  ): Promise<{ nid: number; url: string; updated: string[] }> {
    const uuid = await this.requireNodeUuid(nid, contentType, signal);
    const attributes: Record<string, unknown> = {};
    if (changes.title !== undefined) attributes.title = changes.title;
    if (changes.body !== undefined) attributes.body = { value: changes.body, format: 'full_html' };

    await this.request('PATCH', `/jsonapi/node/${contentType}/${uuid}`, {
      body: JSON.stringify({ data: { type: `node--${contentType}`, id: uuid, attributes } }),
      headers: { 'Content-Type': JSONAPI_TYPE },
      signal,
      subject: `Node ${nid}`,
    });
    logger.info('[jsonapi] Node updated', { nid, fields: Object.keys(attributes) });
    return { nid, url: this.nodeUrl(nid), updated: Object.keys(attributes) };
  }

  async deleteNode(nid: number, contentType: string, signal?: AbortSignal): Promise<void> {
    const uuid = await this.requireNodeUuid(nid, contentType, signal);
    await this.request('DELETE', `/jsonapi/node/${contentType}/${uuid}`, { signal, subject: `Node ${nid}` });
    logger.info('[jsonapi] Node deleted', { nid });
  }

  // ---------- Taxonomy ----------

  /** UUIDs of the terms that already exist; unknown names are skipped. */
  async findTermIds(names: string[], vocabulary = 'tags', signal?: AbortSignal): Promise<string[]> {
    if (names.length === 0) return [];
    const query = new URLSearchParams();
    query.set('filter[tag][condition][path]', 'name');
    query.set('filter[tag][condition][operator]', 'IN');
    names.forEach((name, i) => query.set(`filter[tag][condition][value][${i + 1}]`, name));

    const response = await this.request('GET', `/jsonapi/taxonomy_term/${vocabulary}?${query.toString()}`, {
      signal,
      subject: `Vocabulary "${vocabulary}"`,
    });
    return parseResponse(CollectionDocument, response, 'term lookup').data.map((term) => term.id);
  }

  // ---------- Media ----------

  async uploadImage(
    filePath: string,
    meta: { alt: string; title: string },
    signal?: AbortSignal
  ): Promise<MediaRef> {
    const filename = basename(filePath);
    const content = await readFile(filePath);

    const fileResponse = await this.request('POST', '/jsonapi/media/image/field_media_image', {
      body: content,
      headers: {
        'Content-Type': 'application/octet-stream',
        'Content-Disposition': `file; filename="${filename.replace(/"/g, '')}"`,
      },
      signal,
      subject: 'Media type "image"',
    });
    const file = parseResponse(FileDocument, fileResponse, 'file upload').data;

    const mediaResponse = await this.request('POST', '/jsonapi/media/image', {
      body: JSON.stringify({
        data: {
          type: 'media--image',
          attributes: { name: meta.title, status: true },
          relationships: {
            field_media_image: {
              data: { type: 'file--file', id: file.id, meta: { alt: meta.alt, title: meta.title } },
            },
          },
        },
      }),
      headers: { 'Content-Type': JSONAPI_TYPE },
      signal,
      subject: 'Media type "image"',
    });
    const { data } = parseResponse(MediaDocument, mediaResponse, 'media creation');
    logger.info('[jsonapi] Media created', { mid: data.attributes.drupal_internal__mid, filename });
    return { mid: data.attributes.drupal_internal__mid, uuid: data.id, filename };
  }
}
