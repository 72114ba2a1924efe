import { randomInt } from 'node:crypto';

import { API_KEY_PREFIXES, DEFAULTS } from './constants.js';

const CHARSET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';
const ALPHANUMERIC = /^[A-Za-z0-9]+$/;

/**
 * Information extracted from an API key, safe to log
 */
export interface ApiKeyInfo {
  isValid: boolean;
  length: number;
  masked: string;
  type: 'secret_key' | 'invalid';
  prefix: string | null;
  environment?: 'test' | 'production';
  createdAt: string; // ISO timestamp of when this description was made
}

/**
 * Generate a random API key
 *
 * @param test - Generate a test key (sk_test_*) instead of a production key (sk_*)
 */
export function generateApiKey(test: boolean = true): string {
  const prefix = test ? API_KEY_PREFIXES.TEST : API_KEY_PREFIXES.LIVE;
  let secret = '';
  for (let i = 0; i < DEFAULTS.API_KEY_LENGTH; i += 1) {
    secret += CHARSET[randomInt(CHARSET.length)];
  }
  return prefix + secret;
}

export function generateApiKeys(count: number = 5, test: boolean = true): string[] {
  return Array.from({ length: count }, () => generateApiKey(test));
}

/**
 * Strip the key prefix, preferring the longer test prefix
 * Returns null when the key has no recognised prefix
 */
function secretPart(key: string): string | null {
  if (key.startsWith(API_KEY_PREFIXES.TEST)) {
    return key.slice(API_KEY_PREFIXES.TEST.length);
  }
  if (key.startsWith(API_KEY_PREFIXES.LIVE)) {
    return key.slice(API_KEY_PREFIXES.LIVE.length);
  }
  return null;
}

/**
 * Check a key against the full platform key format
 * Stricter than the client's construction check, which only looks at the prefix
 */
export function isValidApiKeyFormat(key: unknown): key is string {
  if (typeof key !== 'string' || !key) {
    return false;
  }
  const secret = secretPart(key);
  if (secret === null || secret.length < DEFAULTS.API_KEY_MIN_SECRET_LENGTH) {
    return false;
  }
  return ALPHANUMERIC.test(secret);
}

/**
 * Mask a key for logging: keeps the sk_ prefix and the last few characters
 *
 * @example
 * maskApiKey('sk_abcdefgh1234') // 'sk_********1234'
 */
export function maskApiKey(key: string, visibleChars: number = DEFAULTS.API_KEY_VISIBLE_CHARS): string {
  if (!key) {
    return '';
  }
  if (key.length <= visibleChars) {
    return '*'.repeat(key.length);
  }
  const prefixLength = API_KEY_PREFIXES.LIVE.length;
  if (key.length <= prefixLength + visibleChars) {
    return key;
  }
  const hiddenLength = key.length - prefixLength - visibleChars;
  return API_KEY_PREFIXES.LIVE + '*'.repeat(hiddenLength) + key.slice(-visibleChars);
}

export function describeApiKey(key: string): ApiKeyInfo {
  const isValid = isValidApiKeyFormat(key);
  const info: ApiKeyInfo = {
    isValid,
    length: key.length,
    masked: maskApiKey(key),
    type: isValid ? 'secret_key' : 'invalid',
    prefix: isValid ? API_KEY_PREFIXES.LIVE : null,
    createdAt: new Date().toISOString(),
  };
  if (isValid) {
    info.environment = key.startsWith(API_KEY_PREFIXES.TEST) ? 'test' : 'production';
  }
  return info;
}
