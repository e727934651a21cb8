/**
 * jdb TypeScript Client
 *
 * A client for jdb, a Raft-replicated key-value store served over HTTP.
 *
 * @example
 * ```ts
 * import { connect } from '@jdb/client';
 *
 * const client = connect('http://127.0.0.1:6001', 'client-1');
 *
 * await client.put('user:123', 'Alice');
 * console.log(await client.get('user:123')); // 'Alice'
 * await client.cas('user:123', 'Alice', 'Bob'); // true
 * ```
 *
 * @packageDocumentation
 */

// Main client
export { JdbClient, connect, DEFAULT_TIMEOUT_MS, DEFAULT_MAX_REDIRECTS } from '@jdb/client/client';

// Ephemeral (in-memory) server for testing
export {
  EphemeralJdb,
  createEphemeral,
  EphemeralServerError,
  type EphemeralOptions,
  type EphemeralRequest,
} from '@jdb/client/ephemeral';

// Types
export type {
  JsonValue,
  JsonObject,
  Key,
  Value,
  KeySeq,
  Operation,
  DecodedResponse,
  RequestOptions,
  QueryParams,
  CallOptions,
  TransportRequest,
  TransportResponse,
  HttpHeaders,
  HttpTransport,
  Logger,
  LoggerMeta,
  ClientConfig,
  ConnectOptions,
} from '@jdb/client/types';

// Errors
export {
  JdbError,
  MissingBodyError,
  InvalidJsonResponseError,
  RemoteError,
  TransportError,
  DeadlineExceededError,
  InvalidArgumentError,
  type RemoteErrorDetails,
  type TransportErrorOptions,
} from '@jdb/client/errors';

// Building blocks (advanced usage)
export { baseUrl, encodeKeySeq, buildUrl } from '@jdb/client/url';
export { toCallOptions, extraParams, RESERVED_OPTION_KEYS, type CallDefaults } from '@jdb/client/request-options';
export {
  parseJson,
  decodeResponse,
  normalizeError,
  withErrorNormalization,
  extractField,
} from '@jdb/client/response';
export { createAxiosTransport, fromAxiosError } from '@jdb/client/transport';

// Version constant
export const VERSION = '0.1.0';
