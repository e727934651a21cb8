/**
 * Ephemeral (in-memory) jdb server for testing and development.
 *
 * This module runs a single-node jdb stand-in inside the current process. It
 * speaks the same HTTP interface as a real server, keeps its data in memory,
 * and can load and save that data from a YAML file.
 *
 * @example
 * ```typescript
 * import { createEphemeral } from '@jdb/client';
 *
 * async function main() {
 *   const server = await createEphemeral();
 *   const client = server.getClient('example');
 *
 *   await client.put('key', 'value');
 *   console.log(await client.get('key')); // 'value'
 *   await server.stop();
 * }
 * ```
 */

import * as fs from 'fs';
import * as http from 'http';
import * as yaml from 'yaml';
import { JdbClient } from '@jdb/client/client';
import type { ConnectOptions, JsonValue, Operation } from '@jdb/client/types';

/**
 * Error thrown when ephemeral server operations fail.
 */
export class EphemeralServerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EphemeralServerError';
    Object.setPrototypeOf(this, EphemeralServerError.prototype);
  }
}

/**
 * Options for creating an ephemeral server.
 */
export interface EphemeralOptions {
  /** Optional port number. If not specified, an available port is auto-assigned. */
  port?: number;

  /**
   * Optional YAML file mapping keys to values. Loaded on start when it
   * exists, written on stop.
   */
  dataFile?: string;

  /**
   * Answer side-effecting operations with a 307 redirect to the leader path,
   * the way a follower forwards writes (default: false).
   */
  redirectWrites?: boolean;
}

/**
 * One request as seen by the ephemeral server.
 */
export interface EphemeralRequest {
  operation: string;
  params: Record<string, string>;
}

const OPERATIONS: readonly Operation[] = ['get', 'put', 'delete', 'cas', 'append'];
const WRITE_OPERATIONS: readonly Operation[] = ['put', 'delete', 'cas', 'append'];
const LEADER_PREFIX = 'leader';

function isOperation(name: string): name is Operation {
  return OPERATIONS.some((op) => op === name);
}

class MissingParameterError extends Error {
  constructor(public readonly parameter: string) {
    super(`missing parameter: ${parameter}`);
    this.name = 'MissingParameterError';
  }
}

/**
 * Manages an ephemeral jdb server instance.
 *
 * @example
 * ```typescript
 * const server = new EphemeralJdb({ redirectWrites: true });
 * await server.start();
 * const client = server.getClient('c1');
 * await client.put('key', 'value');
 * await server.stop();
 * ```
 */
export class EphemeralJdb {
  private port?: number;
  private readonly dataFile?: string;
  private readonly redirectWrites: boolean;

  // Runtime state
  private server?: http.Server;
  private store = new Map<string, string>();
  private requests: EphemeralRequest[] = [];
  private started = false;

  constructor(options: EphemeralOptions = {}) {
    this.port = options.port;
    this.dataFile = options.dataFile;
    this.redirectWrites = options.redirectWrites ?? false;
  }

  /**
   * Start the ephemeral server.
   *
   * @throws {EphemeralServerError} If the data file is malformed or the
   *   server cannot listen
   */
  async start(): Promise<void> {
    if (this.started) {
      throw new EphemeralServerError('Server already started');
    }

    if (this.dataFile && fs.existsSync(this.dataFile)) {
      this.store = await loadDataFile(this.dataFile);
    }

    const server = http.createServer((req, res) => this.handle(req, res));
    await new Promise<void>((resolve, reject) => {
      server.once('error', (err) => {
        reject(new EphemeralServerError(`Failed to start server: ${err.message}`));
      });
      server.listen(this.port ?? 0, '127.0.0.1', () => {
        const address = server.address();
        if (address && typeof address === 'object') {
          this.port = address.port;
          resolve();
        } else {
          reject(new EphemeralServerError('Failed to get port from server'));
        }
      });
    });

    this.server = server;
    this.started = true;
  }

  /**
   * The endpoint URL clients should connect to.
   *
   * @throws {EphemeralServerError} If server is not started
   */
  getEndpoint(): string {
    if (!this.started || this.port === undefined) {
      throw new EphemeralServerError('Server not started. Call start() first.');
    }
    return `http://127.0.0.1:${this.port}`;
  }

  /**
   * Get a client configured to talk to this ephemeral server.
   *
   * @throws {EphemeralServerError} If server is not started
   */
  getClient(clientId: string, options: ConnectOptions = {}): JdbClient {
    return new JdbClient({ ...options, endpoint: this.getEndpoint(), clientId });
  }

  /**
   * Current value of a key, bypassing HTTP.
   */
  getStoreValue(key: string): string | undefined {
    return this.store.get(key);
  }

  /**
   * Requests served so far, in arrival order. Redirected requests appear
   * once, under the leader path they were served on.
   */
  getRequestLog(): EphemeralRequest[] {
    return this.requests.map((r) => ({ operation: r.operation, params: { ...r.params } }));
  }

  /**
   * Stop the server and write the data file, if configured.
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!this.started || !server) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
    this.server = undefined;
    this.started = false;

    if (this.dataFile) {
      await fs.promises.writeFile(this.dataFile, yaml.stringify(Object.fromEntries(this.store)));
    }
  }

  private handle(req: http.IncomingMessage, res: http.ServerResponse): void {
    try {
      const url = new URL(req.url ?? '/', 'http://127.0.0.1');
      const segments = url.pathname.split('/').filter((s) => s.length > 0);
      const params = Object.fromEntries(url.searchParams.entries());

      const leader = segments.length === 2 && segments[0] === LEADER_PREFIX;
      const name = leader ? segments[1] : segments.length === 1 ? segments[0] : '';

      if (req.method !== 'GET') {
        sendJson(res, 405, { error: `method not allowed: ${req.method ?? ''}` });
        return;
      }
      if (!isOperation(name)) {
        sendJson(res, 404, { error: `unknown operation: ${url.pathname}` });
        return;
      }

      if (this.redirectWrites && !leader && WRITE_OPERATIONS.includes(name)) {
        res.writeHead(307, { Location: `/${LEADER_PREFIX}/${name}${url.search}` });
        res.end();
        return;
      }

      this.requests.push({ operation: name, params });
      sendJson(res, 200, this.apply(name, params));
    } catch (err) {
      if (err instanceof MissingParameterError) {
        sendJson(res, 400, err.message);
        return;
      }
      console.error('Ephemeral server handler error:', err);
      sendJson(res, 500, { error: err instanceof Error ? err.message : String(err) });
    }
  }

  private apply(operation: Operation, params: Record<string, string>): JsonValue {
    const key = requireParam(params, 'key');

    switch (operation) {
      case 'get':
        return { value: this.store.get(key) ?? null };

      case 'put':
        this.store.set(key, requireParam(params, 'value'));
        return { ok: true };

      case 'delete':
        return { ok: true, deleted: this.store.delete(key) };

      case 'cas': {
        const current = requireParam(params, 'current');
        const next = requireParam(params, 'new');
        if (this.store.get(key) !== current) {
          return { replaced: false };
        }
        this.store.set(key, next);
        return { replaced: true };
      }

      case 'append': {
        const value = (this.store.get(key) ?? '') + requireParam(params, 'value');
        this.store.set(key, value);
        return { ok: true, value };
      }
    }
  }
}

function requireParam(params: Record<string, string>, name: string): string {
  const value = params[name];
  if (value === undefined) {
    throw new MissingParameterError(name);
  }
  return value;
}

function sendJson(res: http.ServerResponse, status: number, body: JsonValue): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

/**
 * Read a YAML mapping of keys to scalar values.
 */
async function loadDataFile(file: string): Promise<Map<string, string>> {
  const text = await fs.promises.readFile(file, 'utf8');
  const data: unknown = yaml.parse(text);
  const store = new Map<string, string>();

  if (data === null || data === undefined) {
    return store;
  }
  if (typeof data !== 'object' || Array.isArray(data)) {
    throw new EphemeralServerError(`Data file ${file} must contain a mapping of keys to values`);
  }

  for (const [key, value] of Object.entries(data)) {
    if (typeof value !== 'string' && typeof value !== 'number' && typeof value !== 'boolean') {
      throw new EphemeralServerError(`Data file ${file}: value for "${key}" must be a scalar`);
    }
    store.set(key, String(value));
  }
  return store;
}

/**
 * Create and start an ephemeral jdb server.
 *
 * @param options - Configuration options for the ephemeral server
 * @returns EphemeralJdb instance that is started and ready to use
 */
export async function createEphemeral(options: EphemeralOptions = {}): Promise<EphemeralJdb> {
  const server = new EphemeralJdb(options);
  await server.start();
  return server;
}
