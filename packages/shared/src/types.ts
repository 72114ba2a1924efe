import { ERROR_KINDS } from './constants.js';

/**
 * Kind tag carried by every client error
 * Type derived from ERROR_KINDS in constants.ts (single source of truth)
 */
export type ErrorKind = (typeof ERROR_KINDS)[keyof typeof ERROR_KINDS];

/**
 * Structured payload echoed from the platform on error responses
 * Non-JSON bodies are wrapped as { error: <raw text> }
 */
export type ErrorPayload = Record<string, unknown>;

/**
 * Result of a successful publish
 */
export interface PublishResult {
  readonly articleId: string;
  readonly publishedId: string;
  readonly webUrl: string;
  readonly images: Readonly<Record<string, string>>; // filename -> hosted URL
  readonly createdAt: string; // ISO-8601 by convention, not parsed
}

/**
 * Result of a successful delete
 */
export interface DeleteResult {
  readonly articleId: string;
  readonly publishedId: string;
  readonly deletedAt: string;
  readonly archived: boolean; // true = soft delete
}

/**
 * Article document returned by the platform
 * Left open: the platform does not commit to a schema for this endpoint
 */
export type ArticleDocument = Record<string, unknown>;

/**
 * Article metadata as authored in frontmatter
 */
export interface ArticleMetadata {
  title: string;
  tags: string[];
  category: string;
  difficulty: string;
  author: string;
  frontmatter: Record<string, unknown>; // additional fields
}

/**
 * Raw image bytes keyed by filename
 */
export type ArticleImages = Record<string, Uint8Array>;

/**
 * Logger interface (compatible with winston)
 * Uses Record<string, unknown> for type-safe metadata
 */
export interface Logger {
  debug?: (message: string, meta?: Record<string, unknown>) => void;
  info?: (message: string, meta?: Record<string, unknown>) => void;
  warn?: (message: string, meta?: Record<string, unknown>) => void;
  error?: (message: string, meta?: Record<string, unknown>) => void;
}
