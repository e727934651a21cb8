/**
 * Custom error classes for the jdb client.
 */

import type { HttpHeaders, JsonObject, JsonValue, TransportResponse } from '@jdb/client/types';

/**
 * Base error class for all jdb errors.
 */
export class JdbError extends Error {
  constructor(message: string, public readonly code?: string) {
    super(message);
    this.name = 'JdbError';
    Object.setPrototypeOf(this, JdbError.prototype);
  }
}

/**
 * The transport response carried no body at all.
 */
export class MissingBodyError extends JdbError {
  constructor(public readonly response: TransportResponse) {
    super(`Response with status ${response.status} has no body`, 'MISSING_BODY');
    this.name = 'MissingBodyError';
    Object.setPrototypeOf(this, MissingBodyError.prototype);
  }
}

/**
 * The response body is not valid JSON.
 */
export class InvalidJsonResponseError extends JdbError {
  constructor(
    /** The raw response, for diagnostics */
    public readonly response: TransportResponse,
    public readonly cause?: unknown
  ) {
    super(`Response with status ${response.status} is not valid JSON`, 'INVALID_JSON_RESPONSE');
    this.name = 'InvalidJsonResponseError';
    Object.setPrototypeOf(this, InvalidJsonResponseError.prototype);
  }
}

/**
 * Fields of a structured remote error.
 */
export interface RemoteErrorDetails {
  status: number;
  /** Set when the error body was a JSON string */
  message?: string;
  /** Set when the error body was JSON but neither a string nor an object */
  body?: JsonValue;
  /** Server-provided fields, when the error body was a JSON object */
  fields?: JsonObject;
}

/**
 * The server answered with an error status and a decodable body.
 */
export class RemoteError extends JdbError {
  public readonly status: number;
  public readonly body?: JsonValue;
  public readonly fields: JsonObject;
  private readonly structured: JsonObject;

  constructor(details: RemoteErrorDetails) {
    super(remoteMessage(details), 'REMOTE_ERROR');
    this.name = 'RemoteError';
    this.status = details.status;
    this.body = details.body;
    this.fields = details.fields ?? {};

    if (details.fields !== undefined) {
      this.structured = { ...details.fields, status: details.status };
    } else if (details.message !== undefined) {
      this.structured = { message: details.message, status: details.status };
    } else {
      this.structured = { body: details.body ?? null, status: details.status };
    }
    Object.setPrototypeOf(this, RemoteError.prototype);
  }

  /**
   * The structured error: server fields (or `message`, or `body`) with the
   * HTTP `status`.
   */
  toJSON(): JsonObject {
    return { ...this.structured };
  }
}

function remoteMessage(details: RemoteErrorDetails): string {
  if (details.message !== undefined) {
    return details.message;
  }
  const fieldMessage = details.fields?.message ?? details.fields?.error;
  if (typeof fieldMessage === 'string') {
    return fieldMessage;
  }
  return `Remote error (status ${details.status})`;
}

/**
 * Options for TransportError.
 */
export interface TransportErrorOptions {
  /** HTTP status, when a response arrived */
  status?: number;
  /** Response body text, when a response arrived */
  body?: string;
  headers?: HttpHeaders;
  cause?: unknown;
}

/**
 * The HTTP call failed: network error, timeout, or an error status.
 */
export class TransportError extends JdbError {
  public readonly status?: number;
  public readonly body?: string;
  public readonly headers?: HttpHeaders;
  public readonly cause?: unknown;

  constructor(message: string, options: TransportErrorOptions = {}, code = 'TRANSPORT_ERROR') {
    super(message, code);
    this.name = 'TransportError';
    this.status = options.status;
    this.body = options.body;
    this.headers = options.headers;
    this.cause = options.cause;
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

/**
 * The request did not complete within its timeout.
 */
export class DeadlineExceededError extends TransportError {
  constructor(message: string, public readonly timeoutMs: number, cause?: unknown) {
    super(message, { cause }, 'DEADLINE_EXCEEDED');
    this.name = 'DeadlineExceededError';
    Object.setPrototypeOf(this, DeadlineExceededError.prototype);
  }
}

/**
 * Error indicating invalid configuration or request options.
 */
export class InvalidArgumentError extends JdbError {
  constructor(message: string) {
    super(message, 'INVALID_ARGUMENT');
    this.name = 'InvalidArgumentError';
    Object.setPrototypeOf(this, InvalidArgumentError.prototype);
  }
}
