// src/models/ArchiveTypes.ts

import { NetworkLocation } from '../domain/models/types';

/**
 * Categories of references the HTML localizer scans for
 */
export type AssetCategory =
  | 'image'
  | 'document'
  | 'stylesheet'
  | 'script'
  | 'source'
  | 'iframe'
  | 'link';

/**
 * Reference discovered while scanning a document
 */
export interface AssetReference {
  /** URL as written in the markup */
  sourceUrl: string;
  category: AssetCategory;
  /** Where the referencing document was served from (origin + server path) */
  documentLocation: string;
  /** Directory the asset is written to */
  targetDir: string;
}

/**
 * Result of a successful materialization
 */
export interface LocalAsset {
  /** Filename inside the target directory */
  filename: string;
  /** False when the file was already on disk */
  freshlyDownloaded: boolean;
}

/**
 * Options for a single materialization
 */
export interface MaterializeOptions {
  /** Location the reference is resolved against */
  location: NetworkLocation;
  /** Force this extension (with leading dot) on the local file */
  withExtension?: string;
  /** Use this local name instead of the one derived from the URL */
  filename?: string;
  /** Only download when the extension is one of these */
  allowedExtensions?: readonly string[];
}

/**
 * Upstream freshness data for a remote resource
 */
export interface FreshnessInfo {
  /** ETag, Last-Modified or Content-Length, in that preference order */
  token?: string;
  /** Extension guessed from Content-Type, without dot */
  extension?: string;
}

/**
 * Metadata stored next to an optimized artifact
 */
export interface CacheEntryMetadata {
  version: string;
  optimizer_version: string;
}

/**
 * Per-category change flags reported by one localization pass
 */
export type LocalizationReport = Record<AssetCategory, boolean>;
