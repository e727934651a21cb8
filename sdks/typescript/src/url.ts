/**
 * URL construction for jdb requests.
 */

import type { KeySeq } from '@jdb/client/types';

/**
 * The base URL for all jdb requests: the configured endpoint.
 */
export function baseUrl(endpoint: string): string {
  return endpoint;
}

/**
 * Percent-encode each segment of a key sequence and join them with `/`.
 *
 * @example
 * ```ts
 * encodeKeySeq(['a', 'b c']); // 'a/b%20c'
 * ```
 */
export function encodeKeySeq(keySeq: KeySeq): string {
  return keySeq.map((segment) => encodeURIComponent(segment)).join('/');
}

/**
 * The URL for a key sequence under the endpoint.
 *
 * @example
 * ```ts
 * buildUrl('http://127.0.0.1:6001', ['put']); // 'http://127.0.0.1:6001/put'
 * buildUrl('http://127.0.0.1:6001', []);      // 'http://127.0.0.1:6001/'
 * ```
 */
export function buildUrl(endpoint: string, keySeq: KeySeq): string {
  return `${baseUrl(endpoint)}/${encodeKeySeq(keySeq)}`;
}
