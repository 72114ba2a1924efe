// Types
export type {
  ErrorKind,
  ErrorPayload,
  PublishResult,
  DeleteResult,
  ArticleDocument,
  ArticleMetadata,
  ArticleImages,
  Logger,
} from './types.js';

// Constants
export { ERROR_KINDS, ENDPOINTS, API_KEY_PREFIXES, DEFAULTS } from './constants.js';

// API key helpers
export {
  generateApiKey,
  generateApiKeys,
  isValidApiKeyFormat,
  maskApiKey,
  describeApiKey,
} from './apiKeys.js';
export type { ApiKeyInfo } from './apiKeys.js';

// Frontmatter
export { isPlainObject, validateFrontmatter, metadataToFrontmatter } from './frontmatter.js';
export type { FrontmatterValidation } from './frontmatter.js';
