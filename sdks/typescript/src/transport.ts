/**
 * HTTP transport for the jdb client.
 *
 * This module provides the axios-backed implementation of {@link HttpTransport}
 * and the translation of axios failures into jdb errors.
 */

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { DeadlineExceededError, TransportError } from '@jdb/client/errors';
import type { HttpHeaders, HttpTransport, TransportRequest, TransportResponse } from '@jdb/client/types';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Normalize axios response headers to a plain object.
 */
function toHeaders(headers: AxiosResponse['headers'] | undefined): HttpHeaders {
  const result: HttpHeaders = {};
  if (!headers) {
    return result;
  }
  for (const [name, value] of Object.entries(headers)) {
    if (value !== undefined && value !== null) {
      result[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
    }
  }
  return result;
}

function toBody(data: unknown): string | undefined {
  if (typeof data === 'string') {
    return data;
  }
  if (data === undefined || data === null) {
    return undefined;
  }
  return String(data);
}

/**
 * Convert an axios failure to a jdb transport error.
 *
 * Responses with an error status keep their status, headers and body so the
 * caller can decode the server's error description.
 */
export function fromAxiosError(error: unknown, timeoutMs: number): TransportError {
  if (!axios.isAxiosError(error)) {
    const message = error instanceof Error ? error.message : String(error);
    return new TransportError(message, { cause: error });
  }

  if (error.response) {
    return new TransportError(`Request failed with status ${error.response.status}`, {
      status: error.response.status,
      body: toBody(error.response.data),
      headers: toHeaders(error.response.headers),
      cause: error,
    });
  }

  if (error.code !== undefined && TIMEOUT_CODES.has(error.code)) {
    return new DeadlineExceededError(`Request timed out after ${timeoutMs}ms`, timeoutMs, error);
  }

  return new TransportError(error.message, { cause: error });
}

/**
 * Create a transport backed by an axios instance.
 *
 * Bodies are returned as text without JSON transformation, error statuses
 * reject, and redirects are followed.
 */
export function createAxiosTransport(instance: AxiosInstance = axios.create()): HttpTransport {
  return async (request: TransportRequest): Promise<TransportResponse> => {
    const { options } = request;
    // axios has a single timeout covering connect and response
    const timeoutMs = Math.max(options.socketTimeoutMs, options.connectTimeoutMs);

    try {
      const response = await instance.get<string>(request.url, {
        params: request.params,
        timeout: timeoutMs,
        responseType: options.responseType,
        transformResponse: (data: unknown) => data,
        maxRedirects: options.followRedirects ? options.maxRedirects : 0,
        validateStatus: (status) => !options.throwOnErrorStatus || (status >= 200 && status < 300),
        proxy: false,
      });

      return {
        status: response.status,
        headers: toHeaders(response.headers),
        body: toBody(response.data),
      };
    } catch (err) {
      throw fromAxiosError(err, timeoutMs);
    }
  };
}
