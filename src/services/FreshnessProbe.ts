/**
 * Reads upstream freshness metadata (ETag / Last-Modified / Content-Length)
 * with a HEAD request
 */

import * as mime from 'mime-types';
import { FreshnessInfo } from '../models/ArchiveTypes';
import { HttpClient, isTimeoutError, ResponseHeaders } from './HttpClient';
import { LoggingService } from './LoggingService';

/** HEAD attempts before giving up on a timing-out URL */
export const DEFAULT_PROBE_ATTEMPTS = 5;

export class FreshnessProbe {
  constructor(
    private readonly http: HttpClient,
    private readonly logger: LoggingService,
    private readonly maxAttempts: number = DEFAULT_PROBE_ATTEMPTS
  ) {}

  /**
   * Probe a URL. Returns null when no metadata could be obtained; the
   * caller then proceeds without a cache key.
   */
  async probe(url: string): Promise<FreshnessInfo | null> {
    let headers: ResponseHeaders;
    try {
      headers = await this.headWithRetry(url);
    } catch (error) {
      this.logger.warn(`${url} > HEAD request failed: ${(error as Error).message}`);
      return null;
    }
    return freshnessFromHeaders(headers);
  }

  private async headWithRetry(url: string): Promise<ResponseHeaders> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        return await this.http.head(url);
      } catch (error) {
        if (!isTimeoutError(error)) {
          throw error;
        }
        this.logger.warn(`${url} > HEAD request timed out (${attempt}/${this.maxAttempts})`);
      }
    }
    throw new Error('Max retries exceeded');
  }
}

/**
 * Pick the freshness token and guess the extension from response headers
 */
export function freshnessFromHeaders(headers: ResponseHeaders): FreshnessInfo {
  const contentType = headers['content-type'];
  const guessed = contentType ? mime.extension(contentType.split(';', 1)[0].trim()) : false;

  return {
    token: headers['etag'] ?? headers['last-modified'] ?? headers['content-length'],
    extension: guessed || undefined,
  };
}
