import type { AxiosAdapter } from 'axios';

import type { ArticleImages, Logger } from '@pressroom/shared';

/**
 * Configuration for the API client
 */
export interface ApiClientConfig {
  apiKey: string; // must start with sk_
  baseURL?: string; // Default: DEFAULTS.BASE_URL
  verifyTls?: boolean; // Default: true
  timeout?: number; // Default: DEFAULTS.REQUEST_TIMEOUT_MS
  authTimeout?: number; // Default: DEFAULTS.AUTH_TIMEOUT_MS
  logger?: Logger;
  /**
   * Replace the HTTP transport (in-process stand-ins, custom networking)
   */
  adapter?: AxiosAdapter;
}

/**
 * A file part of a multipart body
 */
export interface MultipartFile {
  filename: string;
  content: Uint8Array;
}

/**
 * Multipart body: scalar form fields plus named file parts
 */
export interface MultipartBody {
  fields: Record<string, string>;
  files: Record<string, MultipartFile>;
}

/**
 * Per-request options
 * json and multipart are mutually exclusive
 */
export interface RequestOptions {
  json?: Record<string, unknown>;
  multipart?: MultipartBody;
  timeout?: number;
}

/**
 * Input to ApiClient.publish
 */
export interface PublishArticleInput {
  title: string;
  content: string; // processed markdown
  frontmatter: Record<string, unknown>;
  images?: ArticleImages;
  filePath: string; // original source path, for traceability
}
