import {
  AxiosError,
  type AxiosAdapter,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from 'axios';

import { ENDPOINTS } from '@pressroom/shared';

/**
 * Reply from a mock route: a response, or an error to throw from the transport
 */
export type MockReply = { status: number; data?: unknown } | Error;

export type MockHandler = (config: InternalAxiosRequestConfig) => MockReply | Promise<MockReply>;

/**
 * In-process axios adapter that records every request it sees
 */
export interface MockTransport {
  adapter: AxiosAdapter;
  requests: InternalAxiosRequestConfig[];
}

export function createMockTransport(handler: MockHandler): MockTransport {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    const reply = await handler(config);
    if (reply instanceof Error) {
      throw reply;
    }
    const response: AxiosResponse = {
      data: reply.data ?? '',
      status: reply.status,
      statusText: '',
      headers: {},
      config,
    };
    return response;
  };
  return { adapter, requests };
}

/**
 * Answer the authentication probe with 200 and hand every other request to handler
 */
export function withAuthOk(handler?: MockHandler): MockHandler {
  return (config) => {
    if (config.url === ENDPOINTS.AUTH_VERIFY) {
      return { status: 200, data: { authenticated: true } };
    }
    return handler ? handler(config) : { status: 404, data: { error: 'No route' } };
  };
}

/**
 * Transport failure as axios reports it (ECONNREFUSED, ECONNABORTED, ...)
 */
export function transportError(code: string, message: string): AxiosError {
  return new AxiosError(message, code);
}
