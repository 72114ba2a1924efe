import http from 'node:http';
import https from 'node:https';

import axios, {
  type AxiosInstance,
  type AxiosRequestConfig,
  type AxiosResponse,
  type Method,
} from 'axios';

import { API_KEY_PREFIXES, DEFAULTS, ENDPOINTS, isPlainObject, maskApiKey } from '@pressroom/shared';
import type { ArticleDocument, DeleteResult, Logger, PublishResult } from '@pressroom/shared';

import type {
  ApiClientConfig,
  MultipartBody,
  MultipartFile,
  PublishArticleInput,
  RequestOptions,
} from '../types.js';
import { decodeArticleDocument, decodeDeleteResult, decodePublishResult } from './decoders.js';
import { ErrorHandler } from './errorHandler.js';
import { ApiError, AuthenticationError, NetworkError, ValidationError } from './errors.js';

/**
 * Encode a multipart body as FormData
 * Content-Type is left to the transport so it can generate the boundary
 */
function buildFormData({ fields, files }: MultipartBody): FormData {
  const form = new FormData();
  for (const [name, value] of Object.entries(fields)) {
    form.append(name, value);
  }
  for (const [name, file] of Object.entries(files)) {
    form.append(name, new Blob([file.content]), file.filename);
  }
  return form;
}

/**
 * Client for the publishing platform API
 *
 * The constructor validates the API key and builds the transport without any I/O;
 * verify() runs the authentication probe. Use createApiClient() to get a client
 * that is already verified.
 *
 * Operations are single-attempt: nothing is retried. The underlying axios instance
 * and its agents are the only shared state, so concurrent calls on one client are
 * as safe as axios makes them; coordinating them is up to the caller.
 */
export class ApiClient {
  readonly baseURL: string;
  readonly verifyTls: boolean;
  private readonly apiKey: string;
  private readonly timeout: number;
  private readonly authTimeout: number;
  private readonly logger?: Logger;
  private readonly errorHandler: ErrorHandler;
  private readonly httpAgent: http.Agent;
  private readonly httpsAgent: https.Agent;
  private readonly transport: AxiosInstance;
  private closed = false;

  constructor(config: ApiClientConfig) {
    const {
      apiKey,
      baseURL = DEFAULTS.BASE_URL,
      verifyTls = true,
      timeout = DEFAULTS.REQUEST_TIMEOUT_MS,
      authTimeout = DEFAULTS.AUTH_TIMEOUT_MS,
      logger,
      adapter,
    } = config;

    if (!apiKey || typeof apiKey !== 'string') {
      throw new ValidationError('API key must be a non-empty string');
    }
    if (!apiKey.startsWith(API_KEY_PREFIXES.LIVE)) {
      throw new ValidationError(`Invalid API key format. Must start with '${API_KEY_PREFIXES.LIVE}'`);
    }

    this.apiKey = apiKey;
    this.baseURL = baseURL.replace(/\/+$/, '');
    this.verifyTls = verifyTls;
    this.timeout = timeout;
    this.authTimeout = authTimeout;
    this.logger = logger;
    this.errorHandler = new ErrorHandler();

    this.httpAgent = new http.Agent({ keepAlive: true });
    this.httpsAgent = new https.Agent({ keepAlive: true, rejectUnauthorized: verifyTls });

    this.transport = axios.create({
      baseURL: this.baseURL,
      timeout,
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        'User-Agent': DEFAULTS.USER_AGENT,
        Accept: 'application/json',
      },
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      // Status handling is ours: see ErrorHandler.classifyResponse
      validateStatus: () => true,
      ...(adapter ? { adapter } : {}),
    });

    this.logger?.debug?.('API client created', {
      event: 'api_client_created',
      baseURL: this.baseURL,
      apiKey: maskApiKey(this.apiKey),
      verifyTls,
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Probe the verification endpoint with the short auth timeout
   * Transport failures surface as NetworkError, any non-200 status as AuthenticationError
   */
  async verify(): Promise<void> {
    const response = await this.request('GET', ENDPOINTS.AUTH_VERIFY, {
      timeout: this.authTimeout,
    }).catch((error: unknown) => {
      throw this.toVerificationError(error);
    });

    if (response.status !== 200) {
      throw this.toVerificationError(
        new ApiError(`HTTP ${response.status}`, response.status, this.errorHandler.toPayload(response.data)),
      );
    }

    this.logger?.info?.('API key verified', {
      event: 'auth_verified',
      apiKey: maskApiKey(this.apiKey),
    });
  }

  private toVerificationError(error: unknown): Error {
    if (error instanceof NetworkError) {
      this.logger?.error?.('Authentication probe could not reach the platform', {
        event: 'auth_verification_unreachable',
        error: error.message,
      });
      return new NetworkError(`Failed to verify authentication: ${error.message}`, error.originalError ?? error);
    }
    if (error instanceof ApiError) {
      this.logger?.error?.('Authentication probe rejected the API key', {
        event: 'auth_verification_failed',
        statusCode: error.statusCode,
        apiKey: maskApiKey(this.apiKey),
      });
      return new AuthenticationError(
        `Invalid API key. Verify at: ${DEFAULTS.API_KEY_SETTINGS_URL}`,
        error.statusCode,
        error.response,
      );
    }
    return error instanceof Error ? error : new Error(String(error));
  }

  /**
   * Send an authenticated request
   *
   * @returns the raw response when status < 400
   * @throws NetworkError on transport failure, a classified ApiError on status >= 400
   */
  async request(method: Method, endpoint: string, options: RequestOptions = {}): Promise<AxiosResponse> {
    const { json, multipart, timeout = this.timeout } = options;

    if (json && multipart) {
      throw new ValidationError('A request carries either a JSON body or a multipart body, not both');
    }
    if (this.closed) {
      throw new NetworkError('Client is closed');
    }

    const requestConfig: AxiosRequestConfig = { method, url: endpoint, timeout };
    if (multipart) {
      requestConfig.data = buildFormData(multipart);
    } else if (json) {
      requestConfig.data = json;
      requestConfig.headers = { 'Content-Type': 'application/json' };
    }

    this.logger?.debug?.('Sending platform request', {
      event: 'api_request',
      method,
      endpoint,
      encoding: multipart ? 'multipart' : json ? 'json' : 'none',
    });

    let response: AxiosResponse;
    try {
      response = await this.transport.request(requestConfig);
    } catch (error) {
      const networkError = this.errorHandler.wrapTransportError(error, timeout);
      this.logger?.warn?.('Platform request failed in transport', {
        event: 'api_request_network_error',
        method,
        endpoint,
        error: networkError.message,
      });
      throw networkError;
    }

    if (response.status >= 400) {
      const apiError = this.errorHandler.classifyResponse(response);
      this.logger?.warn?.('Platform returned an error response', {
        event: 'api_request_failed',
        method,
        endpoint,
        statusCode: response.status,
        kind: apiError.kind,
      });
      throw apiError;
    }

    return response;
  }

  /**
   * Publish a new article
   * Switches to multipart when images are attached; frontmatter always travels as a JSON string
   */
  async publish(input: PublishArticleInput): Promise<PublishResult> {
    const { title, content, frontmatter, images = {}, filePath } = input;

    if (!title || !content) {
      throw new ValidationError('Title and content are required');
    }
    if (!isPlainObject(frontmatter)) {
      throw new ValidationError('Frontmatter must be a key-value object');
    }

    const fields: Record<string, string> = {
      title,
      content,
      frontmatter: JSON.stringify(frontmatter),
      file_path: filePath,
    };
    const files: Record<string, MultipartFile> = {};
    for (const [filename, bytes] of Object.entries(images)) {
      files[`images[${filename}]`] = { filename, content: bytes };
    }

    const response = await this.request(
      'POST',
      ENDPOINTS.PUBLISH,
      Object.keys(files).length > 0 ? { multipart: { fields, files } } : { json: fields },
    );
    const result = decodePublishResult(response.data);

    this.logger?.info?.('Article published', {
      event: 'article_published',
      articleId: result.articleId,
      publishedId: result.publishedId,
      imageCount: Object.keys(files).length,
    });
    return result;
  }

  /**
   * Fetch an article by its published id
   * The document is returned as sent; the platform does not fix its schema
   */
  async getArticle(publishedId: string): Promise<ArticleDocument> {
    const response = await this.request('GET', this.articlePath(publishedId));
    return decodeArticleDocument(response.data);
  }

  /**
   * Delete an article
   * The platform archives by default (soft delete); archived is true when it does not say
   */
  async deleteArticle(publishedId: string): Promise<DeleteResult> {
    const response = await this.request('DELETE', this.articlePath(publishedId));
    const result = decodeDeleteResult(response.data);

    this.logger?.info?.('Article deleted', {
      event: 'article_deleted',
      publishedId: result.publishedId,
      archived: result.archived,
    });
    return result;
  }

  private articlePath(publishedId: string): string {
    if (!publishedId) {
      throw new ValidationError('Published ID is required');
    }
    return `${ENDPOINTS.ARTICLES}/${encodeURIComponent(publishedId)}`;
  }

  /**
   * Release the transport. Safe to call more than once
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
    this.logger?.debug?.('API client closed', { event: 'api_client_closed' });
  }

  /**
   * Run fn with this client and close it afterwards, whether fn resolves or throws
   */
  async use<T>(fn: (client: ApiClient) => T | Promise<T>): Promise<T> {
    try {
      return await fn(this);
    } finally {
      this.close();
    }
  }
}

/**
 * Create a verified API client
 * Resolves only once the API key has passed the authentication probe
 *
 * @example
 * const client = await createApiClient({ apiKey: process.env.PRESSROOM_API_KEY ?? '' });
 * const result = await client.publish({ title, content, frontmatter, filePath });
 */
export async function createApiClient(config: ApiClientConfig): Promise<ApiClient> {
  const client = new ApiClient(config);
  try {
    await client.verify();
  } catch (error) {
    client.close();
    throw error;
  }
  return client;
}

/**
 * Create a verified client, run fn with it, then close it
 */
export async function withApiClient<T>(
  config: ApiClientConfig,
  fn: (client: ApiClient) => T | Promise<T>,
): Promise<T> {
  const client = await createApiClient(config);
  return client.use(fn);
}
