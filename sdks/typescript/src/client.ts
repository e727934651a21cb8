/**
 * Main jdb client implementation.
 *
 * This is the primary entry point for talking to a jdb server.
 */

import { InvalidArgumentError } from '@jdb/client/errors';
import { toCallOptions } from '@jdb/client/request-options';
import {
  decodeResponse,
  extractField,
  requireBody,
  withErrorNormalization,
} from '@jdb/client/response';
import { createAxiosTransport } from '@jdb/client/transport';
import { baseUrl, buildUrl } from '@jdb/client/url';
import type {
  ClientConfig,
  ConnectOptions,
  DecodedResponse,
  HttpTransport,
  JsonValue,
  Key,
  KeySeq,
  Logger,
  Operation,
  QueryParams,
  RequestOptions,
  TransportResponse,
  Value,
} from '@jdb/client/types';

/** Default request timeout in milliseconds. */
export const DEFAULT_TIMEOUT_MS = 1000;

/** Default number of redirects followed per request. */
export const DEFAULT_MAX_REDIRECTS = 5;

const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Client configuration with defaults applied.
 */
interface ResolvedConfig {
  endpoint: string;
  clientId: string;
  timeout: number;
  maxRedirects: number;
  transport: HttpTransport;
  logger: Logger;
}

/**
 * Client for a jdb server.
 *
 * Every operation is one HTTP GET against `<endpoint>/<operation>` carrying
 * the client id, a fresh request id and the operation's arguments as query
 * parameters. There are no retries: a failed call rejects immediately.
 *
 * @example
 * ```ts
 * const client = new JdbClient({
 *   endpoint: 'http://127.0.0.1:6001',
 *   clientId: 'worker-1',
 * });
 *
 * await client.put('x', '1');
 * const replaced = await client.cas('x', '1', '2'); // true
 * const value = await client.get('x');              // '2'
 * await client.append('x', '3');
 * await client.delete('x');
 * ```
 */
export class JdbClient {
  private readonly config: ResolvedConfig;
  private requestCounter = 0;

  constructor(config: ClientConfig) {
    if (!config.clientId) {
      throw new InvalidArgumentError('A client id is required');
    }

    this.config = {
      endpoint: normalizeEndpoint(config.endpoint),
      clientId: config.clientId,
      timeout: config.timeout ?? DEFAULT_TIMEOUT_MS,
      maxRedirects: config.maxRedirects ?? DEFAULT_MAX_REDIRECTS,
      transport: config.transport ?? createAxiosTransport(),
      logger: config.logger ?? silentLogger,
    };

    if (!Number.isFinite(this.config.timeout) || this.config.timeout <= 0) {
      throw new InvalidArgumentError(`Timeout must be a positive number of milliseconds, got ${this.config.timeout}`);
    }
  }

  get endpoint(): string {
    return this.config.endpoint;
  }

  get clientId(): string {
    return this.config.clientId;
  }

  /** Default timeout in milliseconds. */
  get timeout(): number {
    return this.config.timeout;
  }

  /** The most recently issued request id, 0 before the first request. */
  get lastRequestId(): number {
    return this.requestCounter;
  }

  /**
   * Allocate the next request id.
   *
   * Ids start at 1 and increase by one per call. The counter belongs to this
   * client alone.
   */
  nextRequestId(): number {
    this.requestCounter += 1;
    return this.requestCounter;
  }

  /**
   * The base URL for all requests of this client.
   */
  baseUrl(): string {
    return baseUrl(this.config.endpoint);
  }

  /**
   * The URL for a key sequence under this client's endpoint.
   */
  url(keySeq: KeySeq): string {
    return buildUrl(this.config.endpoint, keySeq);
  }

  /**
   * Get the value of a key.
   *
   * @returns The `value` field of the response, or null if the server sent none
   * @throws TransportError if the request fails
   * @throws MissingBodyError if the response has no body
   * @throws InvalidJsonResponseError if the body is not JSON
   */
  async get(key: Key, options: RequestOptions = {}): Promise<JsonValue> {
    const response = await this.getResponse(key, options);
    return extractField(decodeResponse(response).value, 'value');
  }

  /**
   * Get the raw response body for a key, without decoding it.
   */
  async getRaw(key: Key, options: RequestOptions = {}): Promise<string> {
    return requireBody(await this.getResponse(key, options));
  }

  /**
   * Put a new value for a key.
   *
   * @returns The decoded response
   * @throws RemoteError if the server answers with a decodable error body
   */
  async put(key: Key, value: Value, options: RequestOptions = {}): Promise<DecodedResponse> {
    return withErrorNormalization(() =>
      this.dispatch('put', { key, value: String(value) }, options)
    );
  }

  /**
   * Delete a key.
   *
   * @returns The decoded response
   * @throws RemoteError if the server answers with a decodable error body
   */
  async delete(key: Key, options: RequestOptions = {}): Promise<DecodedResponse> {
    return withErrorNormalization(() => this.dispatch('delete', { key }, options));
  }

  /**
   * Compare-and-swap: store `next` under `key` if its current value equals
   * `current`.
   *
   * This is a single remote attempt; the comparison happens on the server.
   *
   * @returns true if the swap happened
   *
   * @example
   * ```ts
   * await client.put('k', 'a');
   * await client.cas('k', 'a', 'b'); // true
   * await client.cas('k', 'a', 'c'); // false
   * ```
   */
  async cas(key: Key, current: Value, next: Value, options: RequestOptions = {}): Promise<boolean> {
    const response = await this.casResponse(key, current, next, options);
    return extractField(decodeResponse(response).value, 'replaced') === true;
  }

  /**
   * Send a compare-and-swap and return the raw response body.
   */
  async casRaw(key: Key, current: Value, next: Value, options: RequestOptions = {}): Promise<string> {
    return requireBody(await this.casResponse(key, current, next, options));
  }

  /**
   * Append a value to a key.
   *
   * @returns The decoded response
   * @throws RemoteError if the server answers with a decodable error body
   */
  async append(key: Key, value: Value, options: RequestOptions = {}): Promise<DecodedResponse> {
    return withErrorNormalization(() =>
      this.dispatch('append', { key, value: String(value) }, options)
    );
  }

  private getResponse(key: Key, options: RequestOptions): Promise<TransportResponse> {
    return this.dispatch('get', { key }, options);
  }

  private casResponse(
    key: Key,
    current: Value,
    next: Value,
    options: RequestOptions
  ): Promise<TransportResponse> {
    return this.dispatch('cas', { key, current: String(current), new: String(next) }, options);
  }

  /**
   * Issue one request for an operation.
   *
   * Operation parameters take precedence over forwarded option entries.
   */
  private async dispatch(
    operation: Operation,
    params: QueryParams,
    options: RequestOptions
  ): Promise<TransportResponse> {
    const callOptions = toCallOptions(this.config, options);
    const id = this.nextRequestId();
    const url = this.url([operation]);

    const query: QueryParams = {
      ...callOptions.queryParams,
      client: this.config.clientId,
      id: String(id),
      ...params,
    };

    this.config.logger.debug('jdb request', { operation, id, url });
    try {
      const response = await this.config.transport({ url, params: query, options: callOptions });
      this.config.logger.debug('jdb response', { operation, id, status: response.status });
      return response;
    } catch (err) {
      this.config.logger.debug('jdb request failed', {
        operation,
        id,
        error: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }
  }
}

/**
 * Validate an endpoint URL and strip trailing slashes.
 */
function normalizeEndpoint(endpoint: string): string {
  try {
    new URL(endpoint);
  } catch {
    throw new InvalidArgumentError(`Invalid endpoint URL: ${endpoint}`);
  }
  return endpoint.replace(/\/+$/, '');
}

/**
 * Create a client for a jdb server. No network I/O happens here.
 *
 * @example
 * ```ts
 * const client = connect('http://127.0.0.1:6001', 'client-id', { timeout: 500 });
 * ```
 */
export function connect(endpoint: string, clientId: string, options: ConnectOptions = {}): JdbClient {
  return new JdbClient({ ...options, endpoint, clientId });
}
