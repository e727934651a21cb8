/**
 * Unit tests for JdbClient against an in-memory transport.
 */

import { describe, it, expect, vi } from 'vitest';
import { JdbClient, connect, DEFAULT_TIMEOUT_MS } from '@jdb/client/client';
import {
  InvalidArgumentError,
  InvalidJsonResponseError,
  MissingBodyError,
  RemoteError,
  TransportError,
} from '@jdb/client/errors';
import type { HttpTransport, Logger, TransportResponse } from '@jdb/client/types';

const ENDPOINT = 'http://127.0.0.1:6001';

function ok(body: string, status = 200): TransportResponse {
  return { status, headers: {}, body };
}

function fakeTransport(body = '{"ok":true}') {
  return vi.fn<HttpTransport>(async () => ok(body));
}

function lastRequest(transport: ReturnType<typeof fakeTransport>) {
  const call = transport.mock.calls[transport.mock.calls.length - 1];
  if (!call) {
    throw new Error('transport was not called');
  }
  return call[0];
}

describe('JdbClient', () => {
  describe('constructor', () => {
    it('should apply the default timeout', () => {
      const client = connect(ENDPOINT, 'c1');
      expect(client.timeout).toBe(DEFAULT_TIMEOUT_MS);
      expect(client.timeout).toBe(1000);
      expect(client.clientId).toBe('c1');
      expect(client.endpoint).toBe(ENDPOINT);
    });

    it('should accept a timeout option', () => {
      expect(connect(ENDPOINT, 'c1', { timeout: 250 }).timeout).toBe(250);
    });

    it('should reject an invalid endpoint', () => {
      expect(() => connect('not a url', 'c1')).toThrow(InvalidArgumentError);
    });

    it('should reject an empty client id', () => {
      expect(() => new JdbClient({ endpoint: ENDPOINT, clientId: '' })).toThrow(InvalidArgumentError);
    });

    it('should reject a non-positive timeout', () => {
      expect(() => connect(ENDPOINT, 'c1', { timeout: -1 })).toThrow(InvalidArgumentError);
    });

    it('should not call the transport', () => {
      const transport = fakeTransport();
      connect(ENDPOINT, 'c1', { transport });
      expect(transport).not.toHaveBeenCalled();
    });
  });

  describe('request ids', () => {
    it('should start at zero and increase by one', () => {
      const client = connect(ENDPOINT, 'c1', { transport: fakeTransport() });
      expect(client.lastRequestId).toBe(0);
      expect(client.nextRequestId()).toBe(1);
      expect(client.nextRequestId()).toBe(2);
      expect(client.nextRequestId()).toBe(3);
      expect(client.lastRequestId).toBe(3);
    });

    it('should keep counters of different clients independent', () => {
      const a = connect(ENDPOINT, 'a', { transport: fakeTransport() });
      const b = connect(ENDPOINT, 'b', { transport: fakeTransport() });

      a.nextRequestId();
      a.nextRequestId();

      expect(b.nextRequestId()).toBe(1);
      expect(a.nextRequestId()).toBe(3);
    });

    it('should hand out exactly 1..N to N concurrent operations', async () => {
      const transport = vi.fn<HttpTransport>(async () => {
        await new Promise((resolve) => setTimeout(resolve, Math.floor(Math.random() * 5)));
        return ok('{"ok":true}');
      });
      const client = connect(ENDPOINT, 'c1', { transport });
      const n = 50;

      await Promise.all(
        Array.from({ length: n }, (_, i) =>
          i % 2 === 0 ? client.put(`k${i}`, i) : client.append(`k${i}`, i)
        )
      );

      const ids = transport.mock.calls.map(([request]) => Number(request.params.id));
      expect(new Set(ids).size).toBe(n);
      expect([...ids].sort((x, y) => x - y)).toEqual(Array.from({ length: n }, (_, i) => i + 1));
    });

    it('should not consume an id when options are rejected', async () => {
      const transport = fakeTransport();
      const client = connect(ENDPOINT, 'c1', { transport });

      await expect(client.put('k', 'v', { timeout: 0 })).rejects.toBeInstanceOf(InvalidArgumentError);
      expect(client.lastRequestId).toBe(0);
      expect(transport).not.toHaveBeenCalled();
    });
  });

  describe('get', () => {
    it('should send client, id and key to /get', async () => {
      const transport = fakeTransport('{"value":"42"}');
      const client = connect(ENDPOINT, 'c1', { transport });

      await client.get('x');

      expect(lastRequest(transport)).toEqual({
        url: 'http://127.0.0.1:6001/get',
        params: { client: 'c1', id: '1', key: 'x' },
        options: {
          socketTimeoutMs: 1000,
          connectTimeoutMs: 1000,
          queryParams: {},
          responseType: 'text',
          throwOnErrorStatus: true,
          followRedirects: true,
          maxRedirects: 5,
        },
      });
    });

    it('should return the value field', async () => {
      const client = connect(ENDPOINT, 'c1', { transport: fakeTransport('{"value":"42"}') });
      expect(await client.get('x')).toBe('42');
    });

    it('should return null when the body has no value', async () => {
      const client = connect(ENDPOINT, 'c1', { transport: fakeTransport('{}') });
      expect(await client.get('x')).toBeNull();
    });

    it('should return the raw body from getRaw', async () => {
      const client = connect(ENDPOINT, 'c1', { transport: fakeTransport('{"value":"42"}') });
      expect(await client.getRaw('x')).toBe('{"value":"42"}');
    });

    it('should fail on an empty body', async () => {
      const client = connect(ENDPOINT, 'c1', { transport: fakeTransport('') });
      await expect(client.get('x')).rejects.toBeInstanceOf(MissingBodyError);
    });

    it('should fail on a malformed body', async () => {
      const client = connect(ENDPOINT, 'c1', { transport: fakeTransport('{"value":') });
      await expect(client.get('x')).rejects.toBeInstanceOf(InvalidJsonResponseError);
    });

    it('should propagate transport errors without rewriting them', async () => {
      const failure = new TransportError('Request failed with status 404', {
        status: 404,
        body: '{"error":"no such key"}',
      });
      const client = connect(ENDPOINT, 'c1', {
        transport: async () => {
          throw failure;
        },
      });

      await expect(client.get('x')).rejects.toBe(failure);
    });
  });

  describe('put', () => {
    it('should send the value and return the decoded response', async () => {
      const transport = fakeTransport('{"ok":true}');
      const client = connect(ENDPOINT, 'c1', { transport });

      const result = await client.put('x', 7);

      expect(result).toEqual({ value: { ok: true }, status: 200 });
      expect(lastRequest(transport).url).toBe('http://127.0.0.1:6001/put');
      expect(lastRequest(transport).params).toEqual({ client: 'c1', id: '1', key: 'x', value: '7' });
    });

    it('should rewrite error responses into RemoteError', async () => {
      const client = connect(ENDPOINT, 'c1', {
        transport: async () => {
          throw new TransportError('Request failed with status 503', {
            status: 503,
            body: '{"error":"not leader","leader":"n2"}',
          });
        },
      });

      try {
        await client.put('x', 'v');
        expect.unreachable('Should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(RemoteError);
        expect((err as RemoteError).toJSON()).toEqual({ error: 'not leader', leader: 'n2', status: 503 });
      }
    });
  });

  describe('delete', () => {
    it('should send client, id and key to /delete', async () => {
      const transport = fakeTransport('{"ok":true,"deleted":true}');
      const client = connect(ENDPOINT, 'c1', { transport });

      const result = await client.delete('x');

      expect(result.value).toEqual({ ok: true, deleted: true });
      expect(lastRequest(transport).url).toBe('http://127.0.0.1:6001/delete');
      expect(lastRequest(transport).params).toEqual({ client: 'c1', id: '1', key: 'x' });
    });
  });

  describe('cas', () => {
    it('should send current and new values to /cas', async () => {
      const transport = fakeTransport('{"replaced":true}');
      const client = connect(ENDPOINT, 'c1', { transport });

      await client.cas('x', 1, 2);

      expect(lastRequest(transport).url).toBe('http://127.0.0.1:6001/cas');
      expect(lastRequest(transport).params).toEqual({
        client: 'c1',
        id: '1',
        key: 'x',
        current: '1',
        new: '2',
      });
    });

    it('should return true when the server replaced the value', async () => {
      const client = connect(ENDPOINT, 'c1', { transport: fakeTransport('{"replaced":true}') });
      expect(await client.cas('x', '1', '2')).toBe(true);
    });

    it('should return false when the server did not replace the value', async () => {
      const client = connect(ENDPOINT, 'c1', { transport: fakeTransport('{"replaced":false}') });
      expect(await client.cas('x', '1', '2')).toBe(false);
    });

    it('should make exactly one request per call', async () => {
      const transport = fakeTransport('{"replaced":false}');
      const client = connect(ENDPOINT, 'c1', { transport });

      await client.cas('x', '1', '2');

      expect(transport).toHaveBeenCalledTimes(1);
    });

    it('should return the raw body from casRaw', async () => {
      const client = connect(ENDPOINT, 'c1', { transport: fakeTransport('{"replaced":true}') });
      expect(await client.casRaw('x', '1', '2')).toBe('{"replaced":true}');
    });
  });

  describe('append', () => {
    it('should send the value to /append', async () => {
      const transport = fakeTransport('{"ok":true,"value":"ab"}');
      const client = connect(ENDPOINT, 'c1', { transport });

      const result = await client.append('x', 'b');

      expect(result).toEqual({ value: { ok: true, value: 'ab' }, status: 200 });
      expect(lastRequest(transport).url).toBe('http://127.0.0.1:6001/append');
      expect(lastRequest(transport).params).toEqual({ client: 'c1', id: '1', key: 'x', value: 'b' });
    });
  });

  describe('request options', () => {
    it('should forward extras and keep operation parameters authoritative', async () => {
      const transport = fakeTransport();
      const client = connect(ENDPOINT, 'c1', { transport });

      await client.put('k', 'v', { timeout: 50, 'root-key': 'r', trace: 't', key: 'other', id: '99' });

      const request = lastRequest(transport);
      expect(request.params).toEqual({ client: 'c1', id: '1', key: 'k', value: 'v', trace: 't' });
      expect(request.options.socketTimeoutMs).toBe(50);
      expect(request.options.connectTimeoutMs).toBe(50);
    });

    it('should use a fresh id for every operation', async () => {
      const transport = fakeTransport('{"value":null,"replaced":false}');
      const client = connect(ENDPOINT, 'c1', { transport });

      await client.get('k');
      await client.put('k', 'v');
      await client.cas('k', 'v', 'w');

      expect(transport.mock.calls.map(([request]) => request.params.id)).toEqual(['1', '2', '3']);
    });
  });

  describe('logging', () => {
    it('should trace requests and responses at debug level', async () => {
      const logger: Logger = {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
      };
      const client = connect(ENDPOINT, 'c1', { transport: fakeTransport(), logger });

      await client.put('k', 'v');

      expect(logger.debug).toHaveBeenNthCalledWith(1, 'jdb request', {
        operation: 'put',
        id: 1,
        url: 'http://127.0.0.1:6001/put',
      });
      expect(logger.debug).toHaveBeenNthCalledWith(2, 'jdb response', {
        operation: 'put',
        id: 1,
        status: 200,
      });
      expect(logger.info).not.toHaveBeenCalled();
    });

    it('should trace failed requests', async () => {
      const logger: Logger = {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
      };
      const client = connect(ENDPOINT, 'c1', {
        logger,
        transport: async () => {
          throw new TransportError('socket hang up');
        },
      });

      await expect(client.get('k')).rejects.toThrow('socket hang up');
      expect(logger.debug).toHaveBeenLastCalledWith('jdb request failed', {
        operation: 'get',
        id: 1,
        error: 'socket hang up',
      });
    });
  });
});
