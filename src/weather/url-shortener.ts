/**
 * Best-effort URL shortening for the link at the end of a weather line
 */

import type { HttpClient } from '../domain/http-client.js';
import { logger } from '../domain/logger.js';

export const ISGD_API_URL = 'https://is.gd/create.php';

export interface UrlShortener {
  /** Shortened URL, or the input unchanged when shortening is not possible */
  tryShorten(url: string): Promise<string>;
}

/**
 * is.gd shortener; any failure falls back to the original URL
 */
export class IsgdShortener implements UrlShortener {
  private readonly http: HttpClient;
  private readonly baseUrl: string;

  constructor(http: HttpClient, baseUrl = ISGD_API_URL) {
    this.http = http;
    this.baseUrl = baseUrl;
  }

  async tryShorten(url: string): Promise<string> {
    try {
      const short = (
        await this.http.getText(this.baseUrl, {
          provider: 'is.gd',
          params: { format: 'simple', url },
        })
      ).trim();
      return short.startsWith('http') ? short : url;
    } catch (error) {
      logger.warn('URL shortening failed, using original URL', {
        error: error instanceof Error ? error.message : String(error),
      });
      return url;
    }
  }
}

export class PassthroughShortener implements UrlShortener {
  async tryShorten(url: string): Promise<string> {
    return url;
  }
}
