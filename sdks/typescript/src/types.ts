/**
 * TypeScript type definitions for the jdb client.
 */

/**
 * Any value a JSON document can hold.
 */
export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject;

/**
 * A JSON object.
 */
export interface JsonObject {
  [field: string]: JsonValue;
}

/**
 * Key type. Keys travel as query parameters.
 */
export type Key = string;

/**
 * Value type for writes and CAS comparisons.
 */
export type Value = string | number;

/**
 * A hierarchical key, one path segment per element.
 */
export type KeySeq = readonly string[];

/**
 * Operations exposed by a jdb server, one per URL path.
 */
export type Operation = 'get' | 'put' | 'delete' | 'cas' | 'append';

/**
 * A decoded response body together with the HTTP status it arrived with.
 *
 * The status is kept beside the JSON value, never merged into it.
 */
export interface DecodedResponse<T = JsonValue> {
  /** Parsed JSON body */
  value: T;

  /** HTTP status code */
  status: number;
}

/**
 * Per-call options.
 *
 * `timeout` overrides the client timeout for this call and `root-key` is
 * reserved. Every other entry is forwarded verbatim as a query parameter.
 */
export interface RequestOptions {
  /** Socket and connect timeout in milliseconds */
  timeout?: number;

  /** Reserved; never forwarded */
  'root-key'?: string;

  [param: string]: string | number | boolean | undefined;
}

/**
 * Query parameters of a single request.
 */
export type QueryParams = Record<string, string>;

/**
 * Transport-level options for one call, produced from {@link RequestOptions}.
 */
export interface CallOptions {
  socketTimeoutMs: number;
  connectTimeoutMs: number;
  queryParams: QueryParams;
  responseType: 'text';
  throwOnErrorStatus: true;
  followRedirects: true;
  maxRedirects: number;
}

/**
 * A request handed to the transport.
 */
export interface TransportRequest {
  url: string;
  params: QueryParams;
  options: CallOptions;
}

/**
 * Response headers, lower-cased names.
 */
export type HttpHeaders = Record<string, string>;

/**
 * A response as returned by the transport.
 */
export interface TransportResponse {
  status: number;
  headers: HttpHeaders;
  /** Body text; absent when the server sent none */
  body?: string | null;
}

/**
 * The HTTP capability the client depends on: perform a GET with query
 * parameters, timeout and redirect-following.
 *
 * Implementations reject with a `TransportError` on failure, including
 * non-2xx statuses (with `status` and `body` set).
 */
export type HttpTransport = (request: TransportRequest) => Promise<TransportResponse>;

export type LoggerMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

/**
 * Configuration for JdbClient.
 */
export interface ClientConfig {
  /** Server URL, e.g. `http://127.0.0.1:6001` */
  endpoint: string;

  /** Identifier sent with every request as the `client` parameter */
  clientId: string;

  /** Default request timeout in milliseconds (default: 1000) */
  timeout?: number;

  /** Maximum redirects followed per request (default: 5) */
  maxRedirects?: number;

  /** HTTP transport (default: axios) */
  transport?: HttpTransport;

  /** Request tracing sink (default: silent) */
  logger?: Logger;
}

/**
 * Options accepted by `connect()`.
 */
export type ConnectOptions = Omit<ClientConfig, 'endpoint' | 'clientId'>;
