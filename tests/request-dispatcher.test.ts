import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Readable } from 'stream';

const { mockRequest, mockCreate } = vi.hoisted(() => {
  const mockRequest = vi.fn();
  return { mockRequest, mockCreate: vi.fn(() => ({ request: mockRequest })) };
});

vi.mock('axios', () => ({
  default: {
    create: mockCreate,
  },
}));

vi.mock('../src/config/logger.js', () => ({
  default: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

import { RequestDispatcher, parseStreamLine } from '../src/client/request-dispatcher.js';
import { consumeStream } from '../src/client/stream-handlers.js';
import { InMemoryTokenStore } from '../src/auth/token-store.js';
import { ConfigurationError, RequestError } from '../src/errors/index.js';
import type { StreamMessage } from '../src/types/index.js';

const BASE_URL = 'https://sim-api.tradestation.com/v3';

async function collect(stream: AsyncIterable<StreamMessage>): Promise<StreamMessage[]> {
  const messages: StreamMessage[] = [];
  for await (const message of stream) {
    messages.push(message);
  }
  return messages;
}

describe('RequestDispatcher', () => {
  let tokenStore: InMemoryTokenStore;
  let dispatcher: RequestDispatcher;

  beforeEach(() => {
    vi.clearAllMocks();
    tokenStore = new InMemoryTokenStore();
    tokenStore.save({ accessToken: 'test-token', refreshToken: 'test-refresh', expiresAt: Date.now() + 60_000 });
    dispatcher = new RequestDispatcher(BASE_URL, tokenStore);
  });

  it('should create its client against the base URL', () => {
    expect(mockCreate).toHaveBeenCalledWith({ baseURL: BASE_URL, timeout: 30000 });
  });

  describe('buildHeaders', () => {
    it('should send the bearer token by default', () => {
      expect(dispatcher.buildHeaders()).toEqual({ Authorization: 'Bearer test-token' });
    });

    it('should send nothing without a token', () => {
      tokenStore.clear();
      expect(dispatcher.buildHeaders()).toEqual({});
    });

    it('should let explicit headers replace the defaults', () => {
      expect(dispatcher.buildHeaders({ 'X-Trace': 'abc' })).toEqual({ 'X-Trace': 'abc' });
      expect(dispatcher.buildHeaders({})).toEqual({ Authorization: 'Bearer test-token' });
    });
  });

  describe('request', () => {
    it('should resolve with the parsed body of a 200', async () => {
      mockRequest.mockResolvedValueOnce({ status: 200, data: '{"Accounts":[{"AccountID":"123"}]}' });

      const result = await dispatcher.request({ endpoint: 'brokerage/accounts' });

      expect(result).toEqual({ Accounts: [{ AccountID: '123' }] });
      expect(mockRequest).toHaveBeenCalledWith(
        expect.objectContaining({
          url: 'brokerage/accounts',
          method: 'GET',
          headers: { Authorization: 'Bearer test-token' },
          responseType: 'text',
        })
      );
    });

    it('should read the token at call time', async () => {
      mockRequest
        .mockResolvedValueOnce({ status: 200, data: '{}' })
        .mockResolvedValueOnce({ status: 200, data: '{}' });

      await dispatcher.request({ endpoint: 'brokerage/accounts' });
      tokenStore.save({ accessToken: 'rotated-token' });
      await dispatcher.request({ endpoint: 'brokerage/accounts' });

      expect(mockRequest.mock.calls[1][0].headers).toEqual({ Authorization: 'Bearer rotated-token' });
    });

    it('should prefer an absolute url over the endpoint', async () => {
      mockRequest.mockResolvedValueOnce({ status: 200, data: '{}' });

      await dispatcher.request({ url: 'https://example.test/x', endpoint: 'ignored' });

      expect(mockRequest.mock.calls[0][0].url).toBe('https://example.test/x');
    });

    it('should send method, payload and timeout as given', async () => {
      mockRequest.mockResolvedValueOnce({ status: 200, data: '{"OrderID":"1"}' });

      await dispatcher.request({ method: 'POST', endpoint: 'brokerage/accounts/orders', payload: { Symbol: 'MSFT' }, timeoutMs: 500 });

      const config = mockRequest.mock.calls[0][0];
      expect(config.method).toBe('POST');
      expect(config.data).toEqual({ Symbol: 'MSFT' });
      expect(config.timeout).toBe(500);
    });

    it('should drop undefined query values', async () => {
      mockRequest.mockResolvedValueOnce({ status: 200, data: '{}' });

      await dispatcher.request({ endpoint: 'x', params: { a: 1, b: undefined, c: 'y' } });

      expect(mockRequest.mock.calls[0][0].params).toEqual({ a: 1, c: 'y' });
    });

    it('should reject without endpoint or url and send nothing', async () => {
      await expect(dispatcher.request({})).rejects.toThrow(ConfigurationError);
      await expect(dispatcher.request({})).rejects.toThrow('Either endpoint or url must be provided.');
      expect(mockRequest).not.toHaveBeenCalled();
    });

    it('should turn a non-200 into a RequestError carrying status and body', async () => {
      mockRequest.mockResolvedValueOnce({ status: 401, data: 'Unauthorized' });

      const error = await dispatcher.request({ endpoint: 'brokerage/accounts' }).catch((e) => e);

      expect(error).toBeInstanceOf(RequestError);
      expect(error.message).toBe('Request failed with status code 401 and message: "Unauthorized"');
      expect(error.status).toBe(401);
      expect(error.responseText).toBe('Unauthorized');
    });

    it('should reject a 200 whose body is not JSON', async () => {
      mockRequest.mockResolvedValueOnce({ status: 200, data: '<html>' });

      await expect(dispatcher.request({ endpoint: 'x' })).rejects.toThrow('Invalid JSON received: <html>');
    });
  });

  describe('stream', () => {
    it('should yield one message per line and skip blank lines', async () => {
      mockRequest.mockResolvedValueOnce({
        status: 200,
        data: Readable.from(['{"Heartbeat":1}\n\n{"Bar":"X"}\n', '{"Bar":"Y"}']),
      });

      const messages = await collect(dispatcher.stream({ endpoint: 'marketdata/stream/barcharts/MSFT' }));

      expect(messages).toEqual([{ Heartbeat: 1 }, { Bar: 'X' }, { Bar: 'Y' }]);
      expect(mockRequest.mock.calls[0][0].responseType).toBe('stream');
    });

    it('should join a line split across chunks', async () => {
      mockRequest.mockResolvedValueOnce({
        status: 200,
        data: Readable.from(['{"Bar":', '"X"}\n{"Ba', 'r":"Y"}\n']),
      });

      const messages = await collect(dispatcher.stream({ endpoint: 'x' }));

      expect(messages).toEqual([{ Bar: 'X' }, { Bar: 'Y' }]);
    });

    it('should decode a multi-byte character split across buffers', async () => {
      const bytes = Buffer.from('{"Name":"café"}\n', 'utf8');
      const cut = bytes.indexOf(0xc3) + 1;
      mockRequest.mockResolvedValueOnce({
        status: 200,
        data: Readable.from([bytes.subarray(0, cut), bytes.subarray(cut)]),
      });

      const messages = await collect(dispatcher.stream({ endpoint: 'x' }));

      expect(messages).toEqual([{ Name: 'café' }]);
    });

    it('should route messages and stop at the first malformed line', async () => {
      mockRequest.mockResolvedValueOnce({
        status: 200,
        data: Readable.from(['{"Heartbeat":1}\n\n{"Bar":"X"}\nnot-json\n{"Bar":"Y"}\n']),
      });
      const onHeartbeat = vi.fn();
      const onData = vi.fn();

      const error = await consumeStream(dispatcher.stream({ endpoint: 'x' }), { onHeartbeat, onData }).catch((e) => e);

      expect(onHeartbeat).toHaveBeenCalledTimes(1);
      expect(onData).toHaveBeenCalledTimes(1);
      expect(onData).toHaveBeenCalledWith({ Bar: 'X' });
      expect(error).toBeInstanceOf(RequestError);
      expect(error.message).toBe('Invalid JSON received: not-json');
      expect(error.responseText).toBe('not-json');
    });

    it('should fail on a non-200 with the full body', async () => {
      mockRequest.mockResolvedValueOnce({ status: 403, data: Readable.from(['Forb', 'idden']) });

      const error = await collect(dispatcher.stream({ endpoint: 'x' })).catch((e) => e);

      expect(error).toBeInstanceOf(RequestError);
      expect(error.status).toBe(403);
      expect(error.message).toBe('Request failed with status code 403 and message: "Forbidden"');
    });

    it('should release the connection when the consumer stops early', async () => {
      const body = Readable.from(['{"a":1}\n{"b":2}\n{"c":3}\n']);
      mockRequest.mockResolvedValueOnce({ status: 200, data: body });

      for await (const message of dispatcher.stream({ endpoint: 'x' })) {
        expect(message).toEqual({ a: 1 });
        break;
      }

      expect(body.destroyed).toBe(true);
    });
  });
});

describe('parseStreamLine', () => {
  it('should return null for blank lines', () => {
    expect(parseStreamLine('')).toBeNull();
    expect(parseStreamLine('  \r')).toBeNull();
  });

  it('should parse a JSON object', () => {
    expect(parseStreamLine('{"Symbol":"MSFT"}\r')).toEqual({ Symbol: 'MSFT' });
  });

  it('should reject values that are not objects', () => {
    expect(() => parseStreamLine('[1,2]')).toThrow('Invalid JSON received: [1,2]');
    expect(() => parseStreamLine('42')).toThrow(RequestError);
  });
});
