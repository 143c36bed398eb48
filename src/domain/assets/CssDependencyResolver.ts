import * as fs from 'fs';
import * as path from 'path';
import { NetworkLocation } from '../models/types';
import { LoggingService } from '../../services/LoggingService';
import { locationOf, prepareUrl } from '../urls/UrlResolver';
import { joinFromDocument } from '../paths/PathAlgebra';
import { AssetMaterializer } from './AssetMaterializer';

/** Splits a stylesheet into literal text (even) and url() arguments (odd) */
const URL_TOKEN = /url\((.+?)\)/;

const KEEP_AS_IS = /^(:\/\/|data:|#)/;

/**
 * Remove one pair of matching surrounding quotes
 */
export function stripQuotes(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length >= 2) {
    const first = trimmed[0];
    if ((first === '"' || first === "'") && trimmed[trimmed.length - 1] === first) {
      return trimmed.slice(1, -1);
    }
  }
  return trimmed;
}

/**
 * Downloads everything a stylesheet references through url(), recursing
 * into @import-ed stylesheets, and rewrites the references in place.
 */
export class CssDependencyResolver {
  constructor(
    private readonly materializer: AssetMaterializer,
    private readonly logger: LoggingService
  ) {}

  /**
   * @param cssSourceUrl - URL the stylesheet was downloaded from
   * @param cssFilePath - On-disk path of the stylesheet
   * @param pathFromCssToTargetDir - Where its dependencies go, relative to the stylesheet ('' = beside it)
   * @param location - Location `cssSourceUrl` is resolved against
   */
  async resolve(
    cssSourceUrl: string,
    cssFilePath: string,
    pathFromCssToTargetDir: string,
    location: NetworkLocation
  ): Promise<void> {
    let content: string;
    let cssLocation: NetworkLocation;
    try {
      cssLocation = locationOf(prepareUrl(cssSourceUrl, location));
      content = await fs.promises.readFile(cssFilePath, 'utf-8');
    } catch (error) {
      this.logger.warn(`Cannot process stylesheet ${cssFilePath}: ${(error as Error).message}`);
      return;
    }

    const outputDir = pathFromCssToTargetDir
      ? path.join(path.dirname(cssFilePath), pathFromCssToTargetDir)
      : path.dirname(cssFilePath);

    const parts = content.split(URL_TOKEN);
    for (let index = 1; index < parts.length; index += 2) {
      const original = parts[index];
      const argument = stripQuotes(original);
      if (argument === '' || KEEP_AS_IS.test(argument)) {
        parts[index] = `url(${original})`;
        continue;
      }

      let resolved: string;
      try {
        resolved = prepareUrl(argument, cssLocation);
      } catch {
        this.logger.warn(`Unresolvable url(${argument}) in ${cssFilePath}`);
        parts[index] = `url(${original})`;
        continue;
      }

      const isImport = /@import\s*$/.test(parts[index - 1]);
      const asset = await this.materializer.materialize(resolved, outputDir, {
        location: cssLocation,
        withExtension: isImport ? '.css' : undefined,
      });

      if (!asset) {
        this.logger.warn(`Could not localize url(${argument}) from ${cssSourceUrl}`);
        parts[index] = `url(${original})`;
        continue;
      }

      // a stylesheet already on disk has been processed by whoever fetched it
      if (isImport && asset.freshlyDownloaded) {
        await this.resolve(
          resolved,
          path.join(outputDir, asset.filename),
          '',
          locationOf(resolved)
        );
      }

      parts[index] = `url(${joinFromDocument(pathFromCssToTargetDir, asset.filename)})`;
    }

    await fs.promises.writeFile(cssFilePath, parts.join(''), 'utf-8');
  }
}
