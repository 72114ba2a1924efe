/**
 * Error kinds produced by the API client
 * Type is derived from these constants in types.ts (single source of truth)
 */
export const ERROR_KINDS = {
  AUTHENTICATION: 'authentication',
  VALIDATION: 'validation',
  RATE_LIMIT: 'rate_limit',
  NOT_FOUND: 'not_found',
  NETWORK: 'network',
  API: 'api',
} as const;

/**
 * Platform endpoints consumed by the client
 */
export const ENDPOINTS = {
  AUTH_VERIFY: '/api/auth/verify',
  PUBLISH: '/api/articles/publish',
  ARTICLES: '/api/articles',
} as const;

/**
 * API key prefixes
 */
export const API_KEY_PREFIXES = {
  LIVE: 'sk_',
  TEST: 'sk_test_',
} as const;

/**
 * Default configuration values
 */
export const DEFAULTS = {
  /**
   * Production API base URL
   */
  BASE_URL: 'https://api.pressroom.dev',

  /**
   * Sent as User-Agent on every request
   */
  USER_AGENT: 'Pressroom-SDK/1.0',

  /**
   * Default request timeout: 30 seconds
   */
  REQUEST_TIMEOUT_MS: 30 * 1000,

  /**
   * Authentication probe timeout: 5 seconds
   * Shorter than the request timeout since the probe is a liveness check
   */
  AUTH_TIMEOUT_MS: 5 * 1000,

  /**
   * Where users manage their API keys
   */
  API_KEY_SETTINGS_URL: 'https://pressroom.dev/settings/api-keys',

  /**
   * Random part length of generated API keys
   */
  API_KEY_LENGTH: 32,

  /**
   * Minimum random part length accepted by isValidApiKeyFormat
   */
  API_KEY_MIN_SECRET_LENGTH: 8,

  /**
   * Trailing characters left visible by maskApiKey
   */
  API_KEY_VISIBLE_CHARS: 4,
} as const;
