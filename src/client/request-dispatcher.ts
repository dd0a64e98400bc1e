import axios, { AxiosInstance } from 'axios';
import type { Readable } from 'stream';
import { StringDecoder } from 'string_decoder';
import type { HttpMethod, JsonObject, QueryParams, StreamMessage, TokenStore } from '../types/index.js';
import { ConfigurationError, RequestError } from '../errors/index.js';
import logger from '../config/logger.js';

export interface DispatchOptions {
  /** Path relative to the API base URL, e.g. "brokerage/accounts" */
  endpoint?: string;
  /** Absolute URL; wins over endpoint */
  url?: string;
  params?: QueryParams;
  method?: HttpMethod;
  /** Replaces the default Authorization header when non-empty */
  headers?: Record<string, string>;
  payload?: unknown;
  timeoutMs?: number;
}

/**
 * Single chokepoint for REST and streaming calls. Reads the bearer token at
 * call time and never refreshes it: a 401 surfaces as a RequestError.
 */
export class RequestDispatcher {
  protected client: AxiosInstance;
  private tokenStore: TokenStore;

  constructor(baseURL: string, tokenStore: TokenStore, timeoutMs: number = 30000) {
    this.tokenStore = tokenStore;
    this.client = axios.create({ baseURL, timeout: timeoutMs });
  }

  buildHeaders(headers?: Record<string, string>): Record<string, string> {
    if (headers && Object.keys(headers).length > 0) {
      return headers;
    }
    const { accessToken } = this.tokenStore.snapshot();
    return accessToken ? { 'Authorization': `Bearer ${accessToken}` } : {};
  }

  /**
   * Send one request and resolve with the parsed JSON body of a 200
   */
  async request<T = JsonObject>(options: DispatchOptions): Promise<T> {
    const url = this.resolveUrl(options);
    const method = options.method ?? 'GET';

    const response = await this.client.request({
      url,
      method,
      params: compactParams(options.params),
      headers: this.buildHeaders(options.headers),
      data: options.payload,
      timeout: options.timeoutMs,
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
    });

    const text = typeof response.data === 'string' ? response.data : JSON.stringify(response.data);

    if (response.status !== 200) {
      logger.warn({ method, url, status: response.status }, 'Request failed');
      throw new RequestError(
        `Request failed with status code ${response.status} and message: "${text}"`,
        response.status,
        text
      );
    }

    try {
      return JSON.parse(text);
    } catch {
      throw new RequestError(`Invalid JSON received: ${text}`, response.status, text);
    }
  }

  /**
   * Open a streaming request and yield one decoded object per line.
   * Breaking out of the loop drops the connection.
   */
  async *stream(options: DispatchOptions): AsyncGenerator<StreamMessage> {
    const url = this.resolveUrl(options);
    const method = options.method ?? 'GET';

    const response = await this.client.request<Readable>({
      url,
      method,
      params: compactParams(options.params),
      headers: this.buildHeaders(options.headers),
      data: options.payload,
      timeout: options.timeoutMs,
      responseType: 'stream',
      validateStatus: () => true,
    });
    const body = response.data;

    try {
      if (response.status !== 200) {
        const text = await readAll(body);
        logger.warn({ method, url, status: response.status }, 'Stream request failed');
        throw new RequestError(
          `Request failed with status code ${response.status} and message: "${text}"`,
          response.status,
          text
        );
      }

      logger.debug({ url }, 'Stream opened');

      const decoder = new StringDecoder('utf8');
      let buffer = '';
      for await (const chunk of body) {
        buffer += typeof chunk === 'string' ? chunk : decoder.write(chunk);
        const lines = buffer.split('\n');
        buffer = lines.pop() || '';

        for (const line of lines) {
          const message = parseStreamLine(line);
          if (message) yield message;
        }
      }

      const message = parseStreamLine(buffer + decoder.end());
      if (message) yield message;
    } finally {
      body.destroy();
    }
  }

  private resolveUrl(options: DispatchOptions): string {
    if (options.url) {
      return options.url;
    }
    if (!options.endpoint) {
      throw new ConfigurationError('Either endpoint or url must be provided.');
    }
    return options.endpoint;
  }
}

/**
 * Decode one line of a newline-delimited JSON stream. Blank lines give null.
 */
export function parseStreamLine(line: string): StreamMessage | null {
  const trimmed = line.trim();
  if (!trimmed) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    throw new RequestError(`Invalid JSON received: ${trimmed}`, 200, trimmed);
  }

  if (!isJsonObject(parsed)) {
    throw new RequestError(`Invalid JSON received: ${trimmed}`, 200, trimmed);
  }
  return parsed;
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function compactParams(params?: QueryParams): QueryParams | undefined {
  if (!params) return undefined;
  const entries = Object.entries(params).filter(([, value]) => value !== undefined);
  return Object.fromEntries(entries);
}

async function readAll(body: Readable): Promise<string> {
  let text = '';
  for await (const chunk of body) {
    text += chunk.toString();
  }
  return text;
}
