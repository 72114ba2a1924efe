import { z, type ZodType } from 'zod';

import type { ArticleDocument, DeleteResult, PublishResult } from '@pressroom/shared';

import { ResponseDecodingError } from './errors.js';

const publishResponseSchema = z.object({
  article_id: z.string(),
  published_id: z.string(),
  web_url: z.string(),
  images: z.record(z.string()).optional(),
  created_at: z.string(),
});

const deleteResponseSchema = z.object({
  article_id: z.string(),
  published_id: z.string(),
  deleted_at: z.string(),
  archived: z.boolean().optional(),
});

const articleDocumentSchema = z.record(z.unknown());

function decode<T>(schema: ZodType<T>, body: unknown, what: string): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(body)'}: ${issue.message}`)
      .join('; ');
    throw new ResponseDecodingError(`Unexpected ${what} response: ${issues}`, body);
  }
  return parsed.data;
}

export function decodePublishResult(body: unknown): PublishResult {
  const data = decode(publishResponseSchema, body, 'publish');
  return {
    articleId: data.article_id,
    publishedId: data.published_id,
    webUrl: data.web_url,
    images: data.images ?? {},
    createdAt: data.created_at,
  };
}

export function decodeDeleteResult(body: unknown): DeleteResult {
  const data = decode(deleteResponseSchema, body, 'delete');
  return {
    articleId: data.article_id,
    publishedId: data.published_id,
    deletedAt: data.deleted_at,
    archived: data.archived ?? true,
  };
}

export function decodeArticleDocument(body: unknown): ArticleDocument {
  return decode(articleDocumentSchema, body, 'article');
}
