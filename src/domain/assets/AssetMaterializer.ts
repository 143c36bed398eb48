/**
 * Materializes remote resources as local files: deterministic naming,
 * at-most-once download per target path, optimization and the
 * optimization cache.
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { URL } from 'url';
import { LocalAsset, MaterializeOptions } from '../../models/ArchiveTypes';
import { FreshnessProbe } from '../../services/FreshnessProbe';
import { HttpClient } from '../../services/HttpClient';
import { LoggingService } from '../../services/LoggingService';
import { stableHash } from '../../utils/hashing';
import { OptimizationCache } from '../cache/OptimizationCache';
import { fileTypeOf } from '../cache/CacheKey';
import { MediaOptimizer } from '../media/MediaOptimizer';
import { isStreamingVideoUrl, VideoExtractor } from '../media/VideoExtractor';
import { prepareUrl } from '../urls/UrlResolver';

export interface LocalFilename {
  filename: string;
  /** Extension with leading dot, '' when there is none */
  extension: string;
}

/**
 * Local name of a resource: the URL's basename with its extension replaced
 * by `withExtension`, or a hash of the URL when the basename has none.
 */
export function localFilenameFor(absoluteUrl: string, withExtension?: string): LocalFilename {
  const basename = safeBasename(absoluteUrl);
  const ownExtension = path.posix.extname(basename);
  const extension = withExtension ?? ownExtension;

  if (ownExtension) {
    return { filename: basename.slice(0, -ownExtension.length) + extension, extension };
  }
  return { filename: stableHash(absoluteUrl) + extension, extension };
}

function safeBasename(absoluteUrl: string): string {
  let pathname: string;
  try {
    pathname = new URL(absoluteUrl).pathname;
  } catch {
    pathname = absoluteUrl.split(/[?#]/, 1)[0];
  }
  const raw = pathname.split('/').pop() ?? '';
  let decoded = raw;
  try {
    decoded = decodeURIComponent(raw);
  } catch {
    decoded = raw;
  }
  return /[\\/]/.test(decoded) || decoded === '..' ? raw : decoded;
}

export interface AssetMaterializerDeps {
  http: HttpClient;
  probe: FreshnessProbe;
  optimizer: MediaOptimizer;
  videos: VideoExtractor;
  /** Null when no optimization cache is configured */
  cache: OptimizationCache | null;
  /** Substrings of URLs downloaded through the video extractor */
  videoHostPatterns: readonly string[];
  logger: LoggingService;
}

export class AssetMaterializer {
  private readonly inFlight = new Map<string, Promise<boolean>>();
  private readonly logger: LoggingService;

  constructor(private readonly deps: AssetMaterializerDeps) {
    this.logger = deps.logger;
  }

  /**
   * Make `sourceUrl` available in `targetDir`.
   * @returns the local asset, or null when the reference stays unresolved
   */
  async materialize(
    sourceUrl: string,
    targetDir: string,
    options: MaterializeOptions
  ): Promise<LocalAsset | null> {
    let absoluteUrl: string;
    try {
      absoluteUrl = prepareUrl(sourceUrl, options.location);
    } catch (error) {
      this.logger.warn(`Cannot resolve ${sourceUrl}: ${(error as Error).message}`);
      return null;
    }

    const derived = localFilenameFor(absoluteUrl, options.withExtension);
    const filename = options.filename ?? derived.filename;
    const extension = options.filename ? path.extname(options.filename) : derived.extension;
    if (
      options.allowedExtensions &&
      !options.allowedExtensions.includes(extension.toLowerCase())
    ) {
      return null;
    }

    const targetPath = path.join(targetDir, filename);
    const pending = this.inFlight.get(targetPath);
    if (pending) {
      return (await pending) ? { filename, freshlyDownloaded: false } : null;
    }
    if (fs.existsSync(targetPath)) {
      return { filename, freshlyDownloaded: false };
    }

    const download = this.downloadFile(absoluteUrl, targetPath);
    this.inFlight.set(targetPath, download);
    try {
      return (await download) ? { filename, freshlyDownloaded: true } : null;
    } finally {
      this.inFlight.delete(targetPath);
    }
  }

  /**
   * Fetch `url` into `targetPath`, through the cache when possible.
   * Resolves to false on any failure, leaving no partial file behind.
   */
  private async downloadFile(url: string, targetPath: string): Promise<boolean> {
    let downloaded: string | null = null;
    try {
      await fs.promises.mkdir(path.dirname(targetPath), { recursive: true });

      const freshness = await this.deps.probe.probe(url);
      const cache = this.deps.cache;
      const cacheKey = cache ? cache.keyFor(url, targetPath) : null;
      if (cache && cacheKey && (await cache.fetch(cacheKey, targetPath, freshness?.token))) {
        return true;
      }

      downloaded = isStreamingVideoUrl(url, this.deps.videoHostPatterns)
        ? await this.deps.videos.download(url, targetPath)
        : await this.downloadFromUrl(url, targetPath, freshness?.extension);
      if (!downloaded) {
        this.logger.error(`Error while downloading file from URL ${url}`);
        return false;
      }

      const optimized = await this.deps.optimizer.optimize(downloaded, targetPath);
      if (optimized && cache && cacheKey) {
        await cache.put(cacheKey, targetPath, freshness?.token);
      }
      return true;
    } catch (error) {
      this.logger.error(`Error while materializing ${url} into ${targetPath}`, error);
      if (downloaded) {
        await fs.promises.rm(downloaded, { force: true });
      }
      await fs.promises.rm(targetPath, { force: true });
      return false;
    }
  }

  /**
   * Plain HTTP download into a temporary sibling, named after the served
   * type when it disagrees with the target extension. The optimizer moves
   * it into place, so the target never holds a partial body.
   */
  private async downloadFromUrl(
    url: string,
    targetPath: string,
    servedExtension: string | undefined
  ): Promise<string | null> {
    const targetExtension = path.extname(targetPath);
    const extension =
      servedExtension && fileTypeOf(`x.${servedExtension}`) !== fileTypeOf(targetPath)
        ? `.${servedExtension}`
        : targetExtension;
    const stem = path.basename(targetPath, targetExtension);
    const downloadPath = path.join(path.dirname(targetPath), `.${stem}-${crypto.randomUUID()}${extension}`);

    try {
      await this.deps.http.downloadToFile(url, downloadPath);
      return downloadPath;
    } catch (error) {
      this.logger.error(`Error while downloading ${url}`, error);
      await fs.promises.rm(downloadPath, { force: true });
      return null;
    }
  }
}
