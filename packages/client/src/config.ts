import { ValidationError } from './core/errors.js';
import type { ApiClientConfig } from './types.js';

const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

function definedValues<T extends object>(values: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key in values) {
    if (values[key] !== undefined) {
      result[key] = values[key];
    }
  }
  return result;
}

function readOptionalEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value && value.length ? value : undefined;
}

/**
 * Build client configuration from environment variables
 *
 * - PRESSROOM_API_KEY (required)
 * - PRESSROOM_API_URL (default: DEFAULTS.BASE_URL)
 * - PRESSROOM_VERIFY_TLS (false/0/no/off disables certificate verification)
 * - PRESSROOM_TIMEOUT_MS (default: DEFAULTS.REQUEST_TIMEOUT_MS)
 *
 * @param env - Environment to read, process.env unless given
 * @param overrides - Values that win over the environment (logger, adapter, ...); undefined entries are ignored
 *
 * @example
 * const client = await createApiClient(loadClientConfigFromEnv(process.env, { logger }));
 */
export function loadClientConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides?: Partial<ApiClientConfig>,
): ApiClientConfig {
  const apiKey = overrides?.apiKey ?? readOptionalEnv(env, 'PRESSROOM_API_KEY');
  if (!apiKey) {
    throw new ValidationError('Missing required environment variable: PRESSROOM_API_KEY');
  }

  const config: ApiClientConfig = { apiKey };

  const baseURL = readOptionalEnv(env, 'PRESSROOM_API_URL');
  if (baseURL) {
    config.baseURL = baseURL;
  }

  const verifyTls = readOptionalEnv(env, 'PRESSROOM_VERIFY_TLS');
  if (verifyTls) {
    config.verifyTls = !FALSE_VALUES.has(verifyTls.toLowerCase());
  }

  const timeout = readOptionalEnv(env, 'PRESSROOM_TIMEOUT_MS');
  if (timeout) {
    const parsed = Number(timeout);
    if (!Number.isFinite(parsed) || parsed <= 0) {
      throw new ValidationError(`PRESSROOM_TIMEOUT_MS must be a positive number, got '${timeout}'`);
    }
    config.timeout = parsed;
  }

  return { ...config, ...definedValues(overrides ?? {}), apiKey };
}
