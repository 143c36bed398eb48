/**
 * HTTP access used by the archiver, backed by axios
 */

import axios, { AxiosInstance } from 'axios';
import * as fs from 'fs';
import * as path from 'path';
import { pipeline } from 'stream/promises';
import { Readable } from 'stream';
import { URL } from 'url';
import { LoggingService } from './LoggingService';

/**
 * Response headers with lowercase names
 */
export type ResponseHeaders = Record<string, string>;

/**
 * Minimal HTTP surface the archiver depends on
 */
export interface HttpClient {
  /** HEAD request following redirects */
  head(url: string): Promise<ResponseHeaders>;
  /** GET request returning the body as text */
  getText(url: string, headers?: Record<string, string>): Promise<string>;
  /** Stream a GET response body into a file */
  downloadToFile(url: string, filePath: string): Promise<void>;
}

export interface AxiosHttpClientOptions {
  timeoutMs?: number;
  userAgent?: string;
  /** Headers sent with every request */
  headers?: Record<string, string>;
  /** Session cookie and CSRF headers, only sent to the instance host */
  session?: SessionHeaders;
}

export interface SessionHeaders {
  host: string;
  headers: Record<string, string>;
}

/**
 * Check whether an error is a request timeout
 */
export function isTimeoutError(error: unknown): boolean {
  if (axios.isAxiosError(error)) {
    return error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';
  }
  return (error as NodeJS.ErrnoException | undefined)?.code === 'ETIMEDOUT';
}

export class AxiosHttpClient implements HttpClient {
  private client: AxiosInstance;
  private logger: LoggingService;

  constructor(logger: LoggingService, options: AxiosHttpClientOptions = {}) {
    this.logger = logger;
    this.client = axios.create({
      timeout: options.timeoutMs ?? 30000,
      maxRedirects: 5,
      headers: {
        'User-Agent': options.userAgent ?? 'CourseArchiver/1.0 (offline course copy)',
        ...options.headers,
      },
    });

    const session = options.session;
    if (session) {
      this.client.interceptors.request.use((config) => {
        if (config.url && requestHost(config.url) === session.host) {
          config.headers.set(session.headers);
        }
        return config;
      });
    }
  }

  async head(url: string): Promise<ResponseHeaders> {
    const response = await this.client.head(url);
    const headers: ResponseHeaders = {};
    for (const [name, value] of Object.entries(response.headers)) {
      if (typeof value === 'string') {
        headers[name.toLowerCase()] = value;
      } else if (typeof value === 'number') {
        headers[name.toLowerCase()] = String(value);
      }
    }
    return headers;
  }

  async getText(url: string, headers: Record<string, string> = {}): Promise<string> {
    const response = await this.client.get<string>(url, {
      headers,
      responseType: 'text',
      transformResponse: (data: string) => data,
    });
    return response.data;
  }

  async downloadToFile(url: string, filePath: string): Promise<void> {
    const response = await this.client.get<Readable>(url, {
      responseType: 'stream',
      timeout: 0,
    });

    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    try {
      await pipeline(response.data, fs.createWriteStream(filePath));
    } catch (error) {
      fs.rmSync(filePath, { force: true });
      throw error;
    }
    this.logger.debug(`Downloaded ${url} -> ${filePath}`);
  }
}

function requestHost(url: string): string | null {
  try {
    return new URL(url).hostname;
  } catch {
    return null;
  }
}
