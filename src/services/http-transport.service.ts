import axios, { type AxiosInstance } from 'axios';
import { load } from 'cheerio';
import type { TransportSettings } from '../config';
import type { QueryParams, Transport } from '../types/listing.types';
import { TransientFetchError } from '../types/errors';
import { UserAgentPool } from './user-agent-pool';

const ACCEPT = 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8';
const MAX_REDIRECTS = 5;
const ERROR_TEXT_LIMIT = 300;

export interface HttpTransportOptions extends TransportSettings {
  acceptLanguage: string;
  userAgents?: UserAgentPool;
  client?: AxiosInstance;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

class HttpStatusError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'HttpStatusError';
    this.status = status;
  }
}

/**
 * Visible text of an HTML document, scripts and styles removed and whitespace collapsed
 */
export function visibleText(html: string): string {
  const $ = load(html);
  $('script, style, noscript, template').remove();
  return $.root().text().replace(/\s+/g, ' ').trim();
}

function errorPageMessage(body: string, status: number, statusText: string): string {
  const text = visibleText(body);
  if (!text) {
    return `HTTP ${status}${statusText ? ` ${statusText}` : ''}`;
  }
  return text.length > ERROR_TEXT_LIMIT ? `${text.slice(0, ERROR_TEXT_LIMIT)}…` : text;
}

function describeError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * HttpTransport
 * GETs a page with a rotating browser identity, retrying every failure with a random backoff
 */
export class HttpTransport implements Transport {
  private readonly client: AxiosInstance;
  private readonly userAgents: UserAgentPool;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(private readonly options: HttpTransportOptions) {
    if (options.maxAttempts < 1) {
      throw new Error('maxAttempts must be at least 1');
    }
    if (options.backoffMinMs > options.backoffMaxMs) {
      throw new Error('backoffMinMs must not exceed backoffMaxMs');
    }
    this.client = options.client ?? axios.create();
    this.userAgents = options.userAgents ?? new UserAgentPool();
    this.sleep = options.sleep ?? delay;
    this.random = options.random ?? Math.random;
  }

  async fetch(url: string, params: QueryParams = {}): Promise<string> {
    const { maxAttempts } = this.options;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        return await this.attempt(url, params);
      } catch (error) {
        lastError = error;
        console.warn(`⚠️  GET ${url} ${JSON.stringify(params)} attempt ${attempt}/${maxAttempts} failed: ${describeError(error)}`);

        if (attempt < maxAttempts) {
          await this.sleep(this.backoffDelay());
        }
      }
    }

    throw new TransientFetchError(
      `GET ${url} failed after ${maxAttempts} attempt(s): ${describeError(lastError)}`,
      {
        url,
        attempts: maxAttempts,
        status: lastError instanceof HttpStatusError ? lastError.status : undefined,
        cause: lastError,
      }
    );
  }

  /**
   * Uniform delay in [backoffMinMs, backoffMaxMs]
   */
  backoffDelay(): number {
    const { backoffMinMs, backoffMaxMs } = this.options;
    return Math.round(backoffMinMs + this.random() * (backoffMaxMs - backoffMinMs));
  }

  private async attempt(url: string, params: QueryParams): Promise<string> {
    const response = await this.client.get<unknown>(url, {
      params,
      headers: {
        'User-Agent': this.userAgents.pick(),
        Accept: ACCEPT,
        'Accept-Language': this.options.acceptLanguage,
      },
      responseType: 'text',
      timeout: this.options.timeoutMs,
      maxRedirects: MAX_REDIRECTS,
      // Status classification happens below so error pages can be read
      validateStatus: () => true,
    });

    const body = typeof response.data === 'string' ? response.data : JSON.stringify(response.data ?? '');

    if (response.status >= 400) {
      throw new HttpStatusError(response.status, errorPageMessage(body, response.status, response.statusText));
    }

    return body;
  }
}
