// src/core/http/ResourceClient.ts

import type { HttpCore } from './HttpCore';
import type { HttpMethod, HttpResponse, TokenSource } from './types';
import type { Logger } from '../../observability/Logger';
import { AuthenticationFailedError } from '../../utils/errors';

const VERSION_PREFIX = /^\/(v1\.0|beta)(?=\/|$)/;
const MAX_PAGES = 100;

/**
 * Reduce any resource reference (absolute URL, versioned or bare path) to a
 * root-relative path below the API version segment.
 */
export function normalizeResourcePath(path: string): string {
  let normalized = path.trim();

  if (/^https?:\/\//i.test(normalized)) {
    const url = new URL(normalized);
    normalized = `${url.pathname}${url.search}`;
  }

  if (!normalized.startsWith('/')) {
    normalized = `/${normalized}`;
  }

  normalized = normalized.replace(VERSION_PREFIX, '');
  return normalized === '' ? '/' : normalized;
}

function isPage(data: unknown): data is { value: unknown[]; '@odata.nextLink'?: unknown } {
  return typeof data === 'object' && data !== null && 'value' in data && Array.isArray(data.value);
}

export interface ResourceClientOptions {
  baseUrl: string;
}

interface Sent<T> {
  response: HttpResponse<T>;
  token: string;
}

export class ResourceClient {
  private baseUrl: string;

  constructor(
    private http: HttpCore,
    private tokens: TokenSource,
    options: ResourceClientOptions,
    private logger: Logger
  ) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  resolveUrl(path: string): string {
    return `${this.baseUrl}${normalizeResourcePath(path)}`;
  }

  /**
   * Authenticated request against the resource API.
   * A 401 is answered once by forcing a refresh for `userId` and replaying the call.
   */
  async fetch<T = unknown>(
    method: HttpMethod,
    path: string,
    token: string,
    userId?: string
  ): Promise<HttpResponse<T>> {
    const { response } = await this.send<T>(method, path, token, userId);
    return response;
  }

  /**
   * Collect every item of a paged collection by following `@odata.nextLink`.
   */
  async listAll(path: string, token: string, userId?: string): Promise<unknown[]> {
    const items: unknown[] = [];
    let next: string | undefined = path;
    let currentToken = token;
    let pages = 0;

    while (next && pages < MAX_PAGES) {
      const sent: Sent<unknown> = await this.send<unknown>('GET', next, currentToken, userId);
      currentToken = sent.token;
      pages++;

      const data = sent.response.data;
      if (!isPage(data)) {
        break;
      }
      items.push(...data.value);

      const link = data['@odata.nextLink'];
      next = typeof link === 'string' && link.length > 0 ? link : undefined;
    }

    if (next) {
      this.logger.warn('Stopped following nextLink', { path, pages, items: items.length });
    }

    return items;
  }

  private async send<T>(
    method: HttpMethod,
    path: string,
    token: string,
    userId?: string
  ): Promise<Sent<T>> {
    const url = this.resolveUrl(path);

    try {
      return { response: await this.request<T>(method, url, token), token };
    } catch (error: unknown) {
      if (!(error instanceof AuthenticationFailedError) || !userId) {
        throw error;
      }

      this.logger.info('Access token rejected, refreshing once', { userId, url });
      const fresh = await this.tokens.getValidToken(userId, {
        forceRefresh: true,
        rejectedToken: token,
      });

      try {
        return { response: await this.request<T>(method, url, fresh), token: fresh };
      } catch (retryError: unknown) {
        if (retryError instanceof AuthenticationFailedError) {
          throw new AuthenticationFailedError('Upstream rejected the refreshed access token', {
            userId,
            url,
          });
        }
        throw retryError;
      }
    }
  }

  private request<T>(method: HttpMethod, url: string, token: string): Promise<HttpResponse<T>> {
    return this.http.request<T>({
      url,
      method,
      headers: { Authorization: `Bearer ${token}` },
    });
  }
}
