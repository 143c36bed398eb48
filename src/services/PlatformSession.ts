/**
 * Authenticated access to the course platform
 */

import { RequiredResourceError } from '../domain/models/errors';
import { HttpClient } from './HttpClient';
import { LoggingService } from './LoggingService';

/**
 * What the archiver needs from a logged-in session
 */
export interface PageSource {
  /** Page markup, or null once the bounded attempts are exhausted */
  getPage(url: string): Promise<string | null>;
  /**
   * Parsed JSON of an API path on the instance
   * @throws RequiredResourceError when the API cannot be read
   */
  getApiJson(apiPath: string): Promise<unknown>;
}

export interface PlatformSessionOptions {
  /** Attempts per request */
  maxAttempts?: number;
}

export class PlatformSession implements PageSource {
  private readonly maxAttempts: number;
  private readonly origin: string;

  /**
   * @param http - Client already carrying the session cookie and CSRF header
   * @param instanceOrigin - Scheme and host of the instance
   */
  constructor(
    private readonly http: HttpClient,
    instanceOrigin: string,
    private readonly logger: LoggingService,
    options: PlatformSessionOptions = {}
  ) {
    this.origin = instanceOrigin.replace(/\/+$/, '');
    this.maxAttempts = options.maxAttempts ?? 2;
  }

  async getPage(url: string): Promise<string | null> {
    try {
      return await this.fetchText(url, {});
    } catch (error) {
      this.logger.error(`Max attempts exceeded for ${url}`, error);
      return null;
    }
  }

  async getApiJson(apiPath: string): Promise<unknown> {
    const url = `${this.origin}${apiPath}`;
    let body: string;
    try {
      body = await this.fetchText(url, {
        Accept: 'application/json, text/javascript, */*; q=0.01',
        'X-Requested-With': 'XMLHttpRequest',
      });
    } catch (error) {
      throw new RequiredResourceError('API resource', url, error);
    }

    try {
      return JSON.parse(body);
    } catch (error) {
      throw new RequiredResourceError('API resource (invalid JSON)', url, error);
    }
  }

  private async fetchText(url: string, headers: Record<string, string>): Promise<string> {
    let lastError: unknown;
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        return await this.http.getText(url, headers);
      } catch (error) {
        lastError = error;
        if (attempt < this.maxAttempts) {
          this.logger.debug(`Error opening ${url}: ${(error as Error).message}, retrying`);
        }
      }
    }
    throw lastError;
  }
}
