/**
 * Gateway Client
 *
 * Thin JSON client for the management API of the API gateway. Every call
 * is scoped to one organization.
 */

import { ApiException, ClientErrorException } from './errors.js';
import type { GatewayConfig, GatewayErrorBody } from './types.js';

export interface GatewayClientOptions extends GatewayConfig {
  /** Fetch implementation (defaults to global fetch) */
  fetch?: typeof fetch;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface RequestOptions {
  query?: Record<string, string>;
  body?: unknown;
  /** Content type of `body`; JSON unless given */
  contentType?: string;
}

function isErrorBody(value: unknown): value is GatewayErrorBody {
  return typeof value === 'object' && value !== null;
}

/**
 * Parse the management API's error body, which is JSON on most endpoints
 * and plain text on a few.
 */
function parseErrorBody(text: string): GatewayErrorBody {
  try {
    const parsed: unknown = JSON.parse(text);
    if (isErrorBody(parsed)) {
      return {
        code: typeof parsed.code === 'string' ? parsed.code : undefined,
        message: typeof parsed.message === 'string' ? parsed.message : undefined,
      };
    }
  } catch {
    // Not JSON; fall through to the raw text
  }
  return { message: text || undefined };
}

export class GatewayClient {
  private config: GatewayConfig;
  private fetchFn: typeof fetch;
  private baseUrl: string;

  constructor(options: GatewayClientOptions) {
    const { fetch: fetchFn, ...config } = options;
    this.config = config;
    this.fetchFn = fetchFn || globalThis.fetch;
    this.baseUrl = `${config.endpoint.replace(/\/+$/, '')}/organizations/${encodeURIComponent(config.organization)}`;
  }

  getOrganization(): string {
    return this.config.organization;
  }

  /**
   * Absolute URL of an organization-relative path.
   */
  url(path: string, query?: Record<string, string>): string {
    const url = `${this.baseUrl}${path}`;
    if (!query || Object.keys(query).length === 0) {
      return url;
    }
    return `${url}?${new URLSearchParams(query).toString()}`;
  }

  private getHeaders(contentType?: string): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
    };
    if (contentType) {
      headers['Content-Type'] = contentType;
    }

    const { auth } = this.config;
    if (auth.type === 'basic') {
      const credentials = Buffer.from(`${auth.username}:${auth.password}`).toString('base64');
      headers.Authorization = `Basic ${credentials}`;
    } else {
      headers.Authorization = `Bearer ${auth.accessToken}`;
    }
    return headers;
  }

  /**
   * Send a request and decode the JSON response.
   * Empty responses decode to null.
   */
  async request<T>(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<T | null> {
    const url = this.url(path, options.query);
    const hasBody = options.body !== undefined;
    const contentType = hasBody ? options.contentType ?? 'application/json' : undefined;

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method,
        headers: this.getHeaders(contentType),
        body: hasBody
          ? typeof options.body === 'string'
            ? options.body
            : JSON.stringify(options.body)
          : undefined,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ApiException(`${method} ${url} failed: ${message}`, { cause: error });
    }

    const text = await response.text();

    if (!response.ok) {
      const body = parseErrorBody(text);
      const message = body.message ?? `${method} ${url} returned ${response.status}`;
      const details = { status: response.status, code: body.code, body: text };
      if (response.status >= 400 && response.status < 500) {
        throw new ClientErrorException(message, details);
      }
      throw new ApiException(message, details);
    }

    if (!text) {
      return null;
    }

    try {
      return JSON.parse(text) as T;
    } catch (error) {
      throw new ApiException(`${method} ${url} returned invalid JSON`, {
        status: response.status,
        body: text,
        cause: error,
      });
    }
  }

  /**
   * Like request(), for endpoints that always return a body.
   */
  async requestJson<T>(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<T> {
    const result = await this.request<T>(method, path, options);
    if (result === null) {
      throw new ApiException(`${method} ${this.url(path, options.query)} returned an empty response`);
    }
    return result;
  }
}
