// Core API client
export { ApiClient, createApiClient, withApiClient } from './core/apiClient.js';
export { ErrorHandler } from './core/errorHandler.js';
export {
  ApiError,
  AuthenticationError,
  ValidationError,
  NotFoundError,
  RateLimitError,
  NetworkError,
  ResponseDecodingError,
  isApiError,
} from './core/errors.js';
export { decodePublishResult, decodeDeleteResult, decodeArticleDocument } from './core/decoders.js';
export { loadClientConfigFromEnv } from './config.js';

export type {
  ApiClientConfig,
  MultipartBody,
  MultipartFile,
  RequestOptions,
  PublishArticleInput,
} from './types.js';

// Re-export shared types
export type {
  ErrorKind,
  ErrorPayload,
  PublishResult,
  DeleteResult,
  ArticleDocument,
  ArticleMetadata,
  ArticleImages,
  Logger,
} from '@pressroom/shared';

export { ERROR_KINDS, ENDPOINTS, DEFAULTS, metadataToFrontmatter, validateFrontmatter } from '@pressroom/shared';
