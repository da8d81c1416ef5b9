import { createHmac } from 'node:crypto';
import fetch, { type RequestInit, type Response } from 'node-fetch';
import { ExchangeError } from './errors';
import type {
  ExchangeClient,
  ExchangeInfo,
  FuturesAccount,
  FuturesBalance,
  FuturesOrder,
  FuturesOrderParams,
} from './interfaces';
import { getConfig, getLogger } from './utils';

// Contains methods for interacting with the futures REST API

const logger = getLogger();
const { recvWindow, timeoutMS } = getConfig().exchange;

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface FuturesClientOptions {
  apiKey: string;
  apiSecret: string;
  apiRoot: string;
  recvWindow?: number;
  timeoutMS?: number;
  fetchFn?: FetchFn;
  now?: () => number;
}

interface ApiErrorBody {
  code: number;
  msg: string;
}

const isApiErrorBody = (body: unknown): body is ApiErrorBody =>
  typeof body === 'object' && body !== null && 'msg' in body && typeof body.msg === 'string';

/**
 * Hex encoded HMAC-SHA256 of the query string, keyed by the API secret
 */
export const signQuery = (query: string, secret: string): string =>
  createHmac('sha256', secret).update(query).digest('hex');

const toSearchParams = (params: object): URLSearchParams => {
  const search = new URLSearchParams();
  Object.entries(params).forEach(([key, value]) => {
    if (value !== undefined && value !== null) {
      search.append(key, String(value));
    }
  });
  return search;
};

export class FuturesRestClient implements ExchangeClient {
  private readonly apiKey: string;
  private readonly apiSecret: string;
  private readonly apiRoot: string;
  private readonly recvWindow: number;
  private readonly timeoutMS: number;
  private readonly fetchFn: FetchFn;
  private readonly now: () => number;

  constructor(options: FuturesClientOptions) {
    this.apiKey = options.apiKey;
    this.apiSecret = options.apiSecret;
    this.apiRoot = options.apiRoot;
    this.recvWindow = options.recvWindow ?? recvWindow;
    this.timeoutMS = options.timeoutMS ?? timeoutMS;
    this.fetchFn = options.fetchFn ?? fetch;
    this.now = options.now ?? Date.now;
  }

  async ping(): Promise<void> {
    await this.request<Record<string, never>>('GET', '/fapi/v1/ping');
  }

  async getServerTime(): Promise<number> {
    const { serverTime } = await this.request<{ serverTime: number }>('GET', '/fapi/v1/time');
    return serverTime;
  }

  getAccount(): Promise<FuturesAccount> {
    return this.request<FuturesAccount>('GET', '/fapi/v2/account', {}, true);
  }

  getBalances(): Promise<FuturesBalance[]> {
    return this.request<FuturesBalance[]>('GET', '/fapi/v2/balance', {}, true);
  }

  getExchangeInfo(): Promise<ExchangeInfo> {
    return this.request<ExchangeInfo>('GET', '/fapi/v1/exchangeInfo');
  }

  /**
   * Submit a new order. The futures API takes order fields in the query
   * string even for POST
   */
  createOrder(params: FuturesOrderParams): Promise<FuturesOrder> {
    return this.request<FuturesOrder>('POST', '/fapi/v1/order', params, true);
  }

  private async request<T>(method: 'GET' | 'POST', path: string, params: object = {}, signed = false): Promise<T> {
    const search = toSearchParams(params);
    const headers: Record<string, string> = {};
    if (signed) {
      search.append('timestamp', String(this.now()));
      search.append('recvWindow', String(this.recvWindow));
      search.append('signature', signQuery(search.toString(), this.apiSecret));
      headers['X-MBX-APIKEY'] = this.apiKey;
    }
    const query = search.toString();
    const url = `${this.apiRoot}${path}${query ? `?${query}` : ''}`;

    logger.debug(`${method} ${path}`);
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method,
        headers,
        signal: AbortSignal.timeout(this.timeoutMS),
      });
    } catch (error) {
      throw new ExchangeError((error as Error).message);
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new ExchangeError((error as Error).message);
    }
    let body: unknown = undefined;
    if (text) {
      try {
        body = JSON.parse(text);
      } catch (error) {
        if (response.ok) {
          throw new ExchangeError(`Malformed response from ${path}: ${(error as Error).message}`, response.status);
        }
      }
    }

    if (!response.ok) {
      if (isApiErrorBody(body)) {
        throw new ExchangeError(body.msg, response.status, body.code);
      }
      throw new ExchangeError(text || response.statusText, response.status);
    }
    return body as T;
  }
}
