/**
 * Parameter schemas, one per operation. The factory parses raw intent
 * parameters through these; commands receive the inferred types.
 */

import { z } from 'zod';

export const MAX_QUERY_COUNT = 100;

const text = z.string().trim().min(1);

/** A list arrives either as an array or as "a, b, c" */
const stringList = z.union([
  z.array(z.string()),
  z.string().transform((value) => value.split(/\s*,\s*/)),
]).transform((items) => items.map((item) => item.trim()).filter((item) => item.length > 0));

const nodeId = z.coerce.number().int().positive();

const count = z.coerce
  .number()
  .int()
  .positive()
  .transform((value) => Math.min(value, MAX_QUERY_COUNT))
  .default(10);

const contentType = z.string().trim().toLowerCase().default('article');

export const CreatePostParams = z
  .object({
    title: text.optional(),
    topic: text.optional(),
    body: z.string().optional(),
    ai_provider: z.string().trim().toLowerCase().optional(),
    content_type: contentType,
    tags: stringList.default([]),
  })
  .refine((params) => params.title !== undefined || params.topic !== undefined, {
    message: 'title or topic is required',
    path: ['title'],
  });

export const EditNodeParams = z
  .object({
    node_id: nodeId,
    title: text.optional(),
    body: z.string().optional(),
    content_type: contentType,
  })
  .refine((params) => params.title !== undefined || params.body !== undefined, {
    message: 'title or body is required',
    path: ['title'],
  });

export const DeleteNodeParams = z.object({
  node_id: nodeId,
  content_type: contentType,
});

export const UploadMediaParams = z.object({
  file_path: text,
  alt_text: z.string().optional(),
  title: z.string().optional(),
});

export const RunDrushParams = z.object({
  command: text,
  module: text.optional(),
  args: stringList.default([]),
  site: text.optional(),
});

export const QueryLatestParams = z.object({
  count,
  content_type: contentType,
});

export const QuerySearchParams = z.object({
  term: text,
  count,
  content_type: contentType,
});

export const QueryTaggedParams = z.object({
  tags: stringList.refine((tags) => tags.length > 0, 'at least one tag is required'),
  count,
  content_type: contentType,
});

export const QueryUsersParams = z.object({
  role: text,
  count,
});

export const CreateSiteParams = z.object({
  site: text,
  platform: z.string().trim().toLowerCase().default('ddev'),
});

export const SiteParams = z.object({
  site: text,
});

export type CreatePostInput = z.infer<typeof CreatePostParams>;
export type EditNodeInput = z.infer<typeof EditNodeParams>;
export type DeleteNodeInput = z.infer<typeof DeleteNodeParams>;
export type UploadMediaInput = z.infer<typeof UploadMediaParams>;
export type RunDrushInput = z.infer<typeof RunDrushParams>;
export type QueryLatestInput = z.infer<typeof QueryLatestParams>;
export type QuerySearchInput = z.infer<typeof QuerySearchParams>;
export type QueryTaggedInput = z.infer<typeof QueryTaggedParams>;
export type QueryUsersInput = z.infer<typeof QueryUsersParams>;
export type CreateSiteInput = z.infer<typeof CreateSiteParams>;
export type SiteInput = z.infer<typeof SiteParams>;
