/**
 * Key layout of the optimization cache:
 *   {extension}/{host}/{quote_plus(rest of URL)}/{quality}
 */

import * as path from 'path';
import { URL } from 'url';

export type QualityTier = 'low' | 'high' | 'default';

/**
 * Percent-encode everything but [A-Za-z0-9_.~-], spaces become "+"
 */
export function quotePlus(value: string): string {
  return encodeURIComponent(value)
    .replace(/[!'()*]/g, (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`)
    .replace(/%20/g, '+');
}

/**
 * Extension of a local file as used in keys and optimizer version lookups
 */
export function fileTypeOf(filePath: string): string {
  const ext = path.extname(filePath).slice(1).toLowerCase();
  return ext === 'jpg' ? 'jpeg' : ext;
}

/**
 * Quality tier of an artifact: videos depend on the encoding preset,
 * everything else has a single tier
 */
export function qualityTierFor(
  fileType: string,
  videoFormats: readonly string[],
  lowQuality: boolean
): QualityTier {
  if (videoFormats.includes(fileType)) {
    return lowQuality ? 'low' : 'high';
  }
  return 'default';
}

/**
 * Cache key for the artifact stored at `targetPath` downloaded from `url`
 */
export function buildCacheKey(
  url: string,
  targetPath: string,
  videoFormats: readonly string[],
  lowQuality: boolean
): string {
  const parsed = new URL(url);
  const prefix = `${parsed.protocol}//${parsed.host}/`;
  const rest = url.startsWith(prefix) ? url.slice(prefix.length) : parsed.href.slice(prefix.length);
  const extension = path.extname(targetPath).slice(1);
  const quality = qualityTierFor(fileTypeOf(targetPath), videoFormats, lowQuality);

  return `${extension}/${parsed.host}/${quotePlus(rest)}/${quality}`;
}
