/**
 * Object store for the optimization cache, kept on a local or shared
 * filesystem: each object is a blob plus a JSON entry holding its key
 * and metadata
 */

import { copyFile, mkdir, readFile, rename, stat, writeFile } from 'fs/promises';
import * as path from 'path';
import { CacheError } from '../domain/models/errors';
import {
  MetadataQuery,
  metadataMatches,
  OptimizationCacheStore,
} from '../domain/cache/OptimizationCache';
import { stableHash } from '../utils/hashing';
import { LoggingService } from './LoggingService';

/**
 * Stored next to each blob as <hash>.json
 */
export interface ObjectEntry {
  key: string;
  metadata: Record<string, string>;
  sizeBytes: number;
  uploadedAt: number;
}

export class LocalObjectStore implements OptimizationCacheStore {
  private logger: LoggingService;
  private objectDir: string;

  /**
   * @param rootDir - Directory holding the objects
   * @param logger - LoggingService instance for error logging
   */
  constructor(rootDir: string, logger: LoggingService) {
    this.logger = logger;
    this.objectDir = path.join(rootDir, 'objects');
  }

  async hasObject(key: string): Promise<boolean> {
    return (await this.readEntry(key)) !== null;
  }

  async hasObjectMatching(key: string, meta: MetadataQuery): Promise<boolean> {
    const entry = await this.readEntry(key);
    return entry !== null && metadataMatches(entry.metadata, meta);
  }

  async downloadFile(key: string, filePath: string): Promise<void> {
    const entry = await this.readEntry(key);
    if (!entry) {
      throw new CacheError(key, 'download');
    }
    try {
      await mkdir(path.dirname(filePath), { recursive: true });
      await copyFile(this.blobPath(key), filePath);
    } catch (error) {
      throw new CacheError(key, 'download', error);
    }
  }

  /**
   * Store a file under a key; an existing entry is replaced (last writer wins)
   */
  async uploadFile(filePath: string, key: string, meta: Record<string, string>): Promise<void> {
    const blobPath = this.blobPath(key);
    const staging = `${blobPath}.${process.pid}.tmp`;
    try {
      await mkdir(this.objectDir, { recursive: true });
      await copyFile(filePath, staging);
      await rename(staging, blobPath);

      const { size } = await stat(blobPath);
      const entry: ObjectEntry = { key, metadata: { ...meta }, sizeBytes: size, uploadedAt: Date.now() };
      await writeFile(this.entryPath(key), JSON.stringify(entry, null, 2), 'utf-8');
    } catch (error) {
      throw new CacheError(key, 'upload', error);
    }
  }

  private blobPath(key: string): string {
    return path.join(this.objectDir, stableHash(key));
  }

  private entryPath(key: string): string {
    return `${this.blobPath(key)}.json`;
  }

  /**
   * Entry of a key; null when absent or unreadable
   */
  private async readEntry(key: string): Promise<ObjectEntry | null> {
    let content: string;
    try {
      content = await readFile(this.entryPath(key), 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        this.logger.warn(`Cannot read cache entry for ${key}: ${(error as Error).message}`);
      }
      return null;
    }

    try {
      const parsed: unknown = JSON.parse(content);
      if (!isRecord(parsed) || parsed.key !== key || !isRecord(parsed.metadata)) {
        return null;
      }
      const metadata: Record<string, string> = {};
      for (const [name, value] of Object.entries(parsed.metadata)) {
        if (typeof value === 'string') {
          metadata[name] = value;
        }
      }
      return {
        key,
        metadata,
        sizeBytes: typeof parsed.sizeBytes === 'number' ? parsed.sizeBytes : 0,
        uploadedAt: typeof parsed.uploadedAt === 'number' ? parsed.uploadedAt : 0,
      };
    } catch (error) {
      this.logger.warn(`Unreadable cache entry for ${key}: ${(error as Error).message}`);
      return null;
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
