/**
 * Optimization cache: optimized media stored in an object store, keyed by
 * source URL and validated against upstream freshness and the optimizer
 * version. Every failure in here is a miss, never an error.
 */

import { CacheEntryMetadata } from '../../models/ArchiveTypes';
import { LoggingService } from '../../services/LoggingService';
import { buildCacheKey, fileTypeOf } from './CacheKey';

/**
 * Metadata filter; undefined values match anything
 */
export type MetadataQuery = Record<string, string | undefined>;

/**
 * Object-store style interface of the external cache
 */
export interface OptimizationCacheStore {
  hasObject(key: string): Promise<boolean>;
  hasObjectMatching(key: string, meta: MetadataQuery): Promise<boolean>;
  downloadFile(key: string, filePath: string): Promise<void>;
  uploadFile(filePath: string, key: string, meta: Record<string, string>): Promise<void>;
}

export interface OptimizationCacheOptions {
  /** Current optimizer version per file type */
  optimizerVersions: Record<string, string>;
  /** Accept artifacts produced by any optimizer version */
  useAnyOptimizedVersion: boolean;
  /** Video encodes use the low-quality preset */
  lowQuality: boolean;
  videoFormats: readonly string[];
}

/**
 * Whether stored metadata satisfies a query
 */
export function metadataMatches(stored: Record<string, string>, query: MetadataQuery): boolean {
  return Object.entries(query).every(
    ([name, expected]) => expected === undefined || stored[name] === expected
  );
}

export class OptimizationCache {
  constructor(
    private readonly store: OptimizationCacheStore,
    private readonly options: OptimizationCacheOptions,
    private readonly logger: LoggingService
  ) {}

  /**
   * Cache key of a download; null when none can be built, which only
   * disables the cache for that file
   */
  keyFor(url: string, targetPath: string): string | null {
    try {
      return buildCacheKey(url, targetPath, this.options.videoFormats, this.options.lowQuality);
    } catch (error) {
      this.logger.warn(`No cache key for ${url}: ${(error as Error).message}`);
      return null;
    }
  }

  /**
   * Current optimizer version for a target file, undefined when the type
   * has no optimizer
   */
  optimizerVersionFor(targetPath: string): string | undefined {
    return this.options.optimizerVersions[fileTypeOf(targetPath)];
  }

  /**
   * Download a cached artifact to targetPath when a current one exists
   * @returns whether targetPath was filled from the cache
   */
  async fetch(key: string, targetPath: string, freshnessToken: string | undefined): Promise<boolean> {
    if (!freshnessToken) {
      return false;
    }

    const query: MetadataQuery = {
      version: freshnessToken,
      optimizer_version: this.options.useAnyOptimizedVersion
        ? undefined
        : this.optimizerVersionFor(targetPath),
    };
    if (!this.options.useAnyOptimizedVersion && query.optimizer_version === undefined) {
      return false;
    }

    try {
      if (!(await this.store.hasObject(key))) {
        return false;
      }
      if (!(await this.store.hasObjectMatching(key, query))) {
        this.logger.debug(`Stale cache entry at ${key}`);
        return false;
      }
      await this.store.downloadFile(key, targetPath);
    } catch (error) {
      this.logger.warn(`${key} failed to download from cache: ${(error as Error).message}`);
      return false;
    }

    this.logger.info(`Downloaded ${targetPath} from cache at ${key}`);
    return true;
  }

  /**
   * Upload an optimized artifact with current metadata
   * @returns whether the upload succeeded
   */
  async put(key: string, targetPath: string, freshnessToken: string | undefined): Promise<boolean> {
    const optimizerVersion = this.optimizerVersionFor(targetPath);
    if (!freshnessToken || optimizerVersion === undefined) {
      return false;
    }

    const meta: CacheEntryMetadata = {
      version: freshnessToken,
      optimizer_version: optimizerVersion,
    };
    try {
      await this.store.uploadFile(targetPath, key, { ...meta });
    } catch (error) {
      this.logger.warn(`${key} failed to upload to cache: ${(error as Error).message}`);
      return false;
    }

    this.logger.info(`Uploaded ${targetPath} to cache at ${key}`);
    return true;
  }
}
