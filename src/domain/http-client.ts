/**
 * HTTP client for the geocoding, weather and shortening providers
 *
 * One GET per call: no timeout, no retry.
 */

import { randomUUID } from 'node:crypto';
import { handleHttpError, handleNetworkError } from './error-handler.js';
import { logger } from './logger.js';
import { getRequestId } from './request-context.js';

export interface GetOptions {
  /** Provider label used in logs and errors (the URL may hold an API key) */
  provider: string;
  /** Query string parameters */
  params?: Record<string, string>;
  headers?: Record<string, string>;
}

export class HttpClient {
  private readonly userAgent: string;

  constructor(userAgent = 'skycast-weather/0.1.0') {
    this.userAgent = userAgent;
  }

  /**
   * GET a URL and parse the body as JSON
   *
   * @throws TransportError on HTTP errors or network failures
   */
  async getJson(url: string, options: GetOptions): Promise<unknown> {
    const response = await this.get(url, options, 'application/json');
    return response.json();
  }

  /**
   * GET a URL and return the body as text
   *
   * @throws TransportError on HTTP errors or network failures
   */
  async getText(url: string, options: GetOptions): Promise<string> {
    const response = await this.get(url, options, 'text/plain');
    return response.text();
  }

  private async get(url: string, options: GetOptions, accept: string): Promise<Response> {
    const requestId = getRequestId() || randomUUID();
    const target = new URL(url);
    for (const [name, value] of Object.entries(options.params ?? {})) {
      target.searchParams.set(name, value);
    }

    const startTime = Date.now();
    logger.debug('Upstream request starting', {
      requestId,
      provider: options.provider,
      host: target.host,
    });

    let response: Response;
    try {
      response = await fetch(target, {
        method: 'GET',
        headers: {
          Accept: accept,
          'User-Agent': this.userAgent,
          ...options.headers,
        },
      });
    } catch (error) {
      throw handleNetworkError(
        options.provider,
        error instanceof Error ? error : new Error(String(error)),
        requestId
      );
    }

    logger.logUpstreamCall(
      options.provider,
      target.host,
      response.status,
      Date.now() - startTime,
      requestId
    );

    if (!response.ok) {
      throw handleHttpError(options.provider, response.status, response.statusText, requestId);
    }

    return response;
  }
}

