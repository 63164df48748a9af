import { BrokerRequestError } from '../core/errors';
import { TokenProvider } from './tokenStore';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface TradeStationClientConfig {
  baseUrl: string;
  tokens: TokenProvider;
  fetchImpl?: typeof fetch;
}

export interface RequestOptions {
  params?: Record<string, string>;
  body?: unknown;
  /** Included in error messages, e.g. the account or symbols involved. */
  context?: Record<string, string | number | undefined>;
}

export class TradeStationClient {
  private readonly baseUrl: string;
  private readonly tokens: TokenProvider;
  private readonly fetchImpl: typeof fetch;

  constructor(config: TradeStationClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.tokens = config.tokens;
    this.fetchImpl = config.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  buildUrl(pathname: string, params?: Record<string, string>): string {
    const u = new URL(`${this.baseUrl}${pathname}`);
    for (const [k, v] of Object.entries(params ?? {})) u.searchParams.set(k, v);
    return u.toString();
  }

  /** Sends an authorized request and returns the decoded JSON body (`{}` for an empty body). */
  async request(method: HttpMethod, pathname: string, opts: RequestOptions = {}): Promise<unknown> {
    const url = this.buildUrl(pathname, opts.params);
    const context = { operation: `${method} ${pathname}`, ...opts.context };
    const token = await this.tokens.getAccessToken();
    let resp: Response;
    try {
      resp = await this.fetchImpl(url, {
        method,
        headers: {
          Authorization: `Bearer ${token}`,
          Accept: 'application/json',
          ...(opts.body !== undefined ? { 'Content-Type': 'application/json' } : {})
        },
        body: opts.body !== undefined ? JSON.stringify(opts.body) : undefined
      });
    } catch (err) {
      throw new BrokerRequestError('Brokerage request failed', context, { cause: err });
    }
    const text = await resp.text();
    if (!resp.ok) {
      throw new BrokerRequestError(`Brokerage returned ${resp.status}: ${text.slice(0, 400)}`, {
        ...context,
        status: resp.status
      });
    }
    if (!text) return {};
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new BrokerRequestError(`Brokerage response parse error: ${text.slice(0, 200)}`, context, { cause: err });
    }
  }
}
