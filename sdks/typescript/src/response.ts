/**
 * Response decoding and error normalization.
 *
 * Successful responses are decoded into a {@link DecodedResponse}. Error
 * responses from the transport are rewritten into a {@link RemoteError}
 * carrying the server's JSON error body and the HTTP status.
 */

import {
  InvalidJsonResponseError,
  MissingBodyError,
  RemoteError,
  TransportError,
} from '@jdb/client/errors';
import type { DecodedResponse, JsonObject, JsonValue, TransportResponse } from '@jdb/client/types';

/**
 * Parse a string as JSON.
 *
 * @throws SyntaxError on malformed input
 */
export function parseJson(text: string): JsonValue {
  const parsed: JsonValue = JSON.parse(text);
  return parsed;
}

export function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * The body of a response, or MissingBodyError when it has none.
 */
export function requireBody(response: TransportResponse): string {
  if (response.body === undefined || response.body === null || response.body === '') {
    throw new MissingBodyError(response);
  }
  return response.body;
}

/**
 * Decode a transport response: parse its body as JSON and keep the HTTP
 * status beside it.
 *
 * @throws MissingBodyError if the response has no body
 * @throws InvalidJsonResponseError if the body is not JSON
 */
export function decodeResponse(response: TransportResponse): DecodedResponse {
  const body = requireBody(response);

  let value: JsonValue;
  try {
    value = parseJson(body);
  } catch (err) {
    throw new InvalidJsonResponseError(response, err);
  }

  return { value, status: response.status };
}

/**
 * Read one field of a decoded JSON object. Missing fields, and bodies that
 * are not objects, read as `null`.
 */
export function extractField(value: JsonValue, field: string): JsonValue {
  if (!isJsonObject(value)) {
    return null;
  }
  return value[field] ?? null;
}

/**
 * Rewrite a transport error into the structured error for its body.
 *
 * Returns the original error when it has no status or body, or when the
 * body is not JSON.
 */
export function normalizeError(error: unknown): unknown {
  if (!(error instanceof TransportError) || error.status === undefined || error.body === undefined) {
    return error;
  }

  let body: JsonValue;
  try {
    body = parseJson(error.body);
  } catch {
    return error;
  }

  const status = error.status;
  if (typeof body === 'string') {
    return new RemoteError({ message: body, status });
  }
  if (isJsonObject(body)) {
    return new RemoteError({ fields: body, status });
  }
  return new RemoteError({ body, status });
}

/**
 * Run a transport invocation and decode its response, rewriting error
 * responses via {@link normalizeError}.
 *
 * @example
 * ```ts
 * const decoded = await withErrorNormalization(() => transport(request));
 * ```
 */
export async function withErrorNormalization(
  invoke: () => Promise<TransportResponse>
): Promise<DecodedResponse> {
  let response: TransportResponse;
  try {
    response = await invoke();
  } catch (err) {
    throw normalizeError(err);
  }
  return decodeResponse(response);
}
