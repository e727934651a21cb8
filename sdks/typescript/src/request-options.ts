/**
 * Translation of per-call request options into transport call options.
 */

import { InvalidArgumentError } from '@jdb/client/errors';
import type { CallOptions, QueryParams, RequestOptions } from '@jdb/client/types';

/**
 * Option keys consumed by the client and never sent to the server.
 */
export const RESERVED_OPTION_KEYS: readonly string[] = ['timeout', 'root-key'];

/**
 * The part of the client configuration the translator reads.
 */
export interface CallDefaults {
  timeout: number;
  maxRedirects: number;
}

/**
 * Build transport call options for one request.
 *
 * The timeout applies to both socket and connect phases. All option entries
 * except the reserved keys are forwarded as query parameters.
 *
 * @throws InvalidArgumentError if the timeout override is not a positive number
 */
export function toCallOptions(defaults: CallDefaults, options: RequestOptions = {}): CallOptions {
  const timeout = options.timeout ?? defaults.timeout;
  if (!Number.isFinite(timeout) || timeout <= 0) {
    throw new InvalidArgumentError(`Timeout must be a positive number of milliseconds, got ${timeout}`);
  }

  return {
    socketTimeoutMs: timeout,
    connectTimeoutMs: timeout,
    queryParams: extraParams(options),
    responseType: 'text',
    throwOnErrorStatus: true,
    followRedirects: true,
    maxRedirects: defaults.maxRedirects,
  };
}

/**
 * Option entries forwarded verbatim as query parameters.
 */
export function extraParams(options: RequestOptions): QueryParams {
  const params: QueryParams = {};
  for (const [name, value] of Object.entries(options)) {
    if (RESERVED_OPTION_KEYS.includes(name) || value === undefined) {
      continue;
    }
    params[name] = String(value);
  }
  return params;
}
