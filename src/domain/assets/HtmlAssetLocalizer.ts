/**
 * Localizes everything an HTML fragment references: downloads images,
 * documents, stylesheets, scripts, media sources and iframes, rewrites the
 * references relative to the fragment's final location, then rewrites
 * links to other course pages.
 */

import * as cheerio from 'cheerio';
import * as fs from 'fs';
import * as path from 'path';
import { URL } from 'url';
import {
  AssetCategory,
  AssetReference,
  LocalAsset,
  LocalizationReport,
} from '../../models/ArchiveTypes';
import { LoggingService } from '../../services/LoggingService';
import { PageSource } from '../../services/PlatformSession';
import { TemplateRenderer } from '../../services/TemplateRenderer';
import { stableHash } from '../../utils/hashing';
import { InternalLinkResolver } from '../content/ContentLinkResolver';
import { subtitlesBeside } from '../media/Subtitles';
import { isStreamingVideoUrl } from '../media/VideoExtractor';
import { VideoFormat } from '../models/types';
import { RelativePathContext } from '../paths/RelativePathContext';
import { locationOf, resolveReference } from '../urls/UrlResolver';
import { AssetMaterializer } from './AssetMaterializer';
import { CssDependencyResolver } from './CssDependencyResolver';

const FULL_DOCUMENT = /^\s*(<!doctype|<html[\s>])/i;

/** <link> relations that do not point at a resource to download */
const NON_RESOURCE_RELS = ['canonical', 'alternate', 'preconnect', 'dns-prefetch', 'next', 'prev'];

export interface LocalizerSettings {
  /** Extensions (with dot) an anchor may point at to be downloaded */
  downloadableExtensions: readonly string[];
  /** Extensions (without dot) wrapped in an audio player page */
  audioFormats: readonly string[];
  videoHostPatterns: readonly string[];
  videoFormat: VideoFormat;
  autoplay: boolean;
  /** Host of the archived instance, tells internal references from external ones */
  instanceHost: string;
}

export interface HtmlAssetLocalizerDeps {
  materializer: AssetMaterializer;
  css: CssDependencyResolver;
  pages: PageSource;
  renderer: TemplateRenderer;
  /** Null when course links are left alone */
  links: InternalLinkResolver | null;
  settings: LocalizerSettings;
  logger: LoggingService;
}

export class HtmlAssetLocalizer {
  private readonly subDocumentsInProgress = new Set<string>();
  private readonly unresolvedReferences: AssetReference[] = [];
  private readonly logger: LoggingService;

  constructor(private readonly deps: HtmlAssetLocalizerDeps) {
    this.logger = deps.logger;
  }

  /**
   * Localize a fragment or a full document written at `context`
   * @returns the rewritten markup; the input itself when nothing changed
   */
  async localize(content: string, context: RelativePathContext): Promise<string> {
    const $ = FULL_DOCUMENT.test(content) ? cheerio.load(content) : cheerio.load(content, null, false);

    const report: LocalizationReport = {
      image: await this.localizeImages($, context),
      document: await this.localizeDocuments($, context),
      stylesheet: await this.localizeStylesheets($, context),
      script: await this.localizeSources($, 'script', context),
      source: await this.localizeSources($, 'source', context),
      iframe: await this.localizeIframes($, context),
      link: this.rewriteInternalLinks($, context),
    };

    return Object.values(report).some(Boolean) ? $.html() : content;
  }

  /**
   * References that could not be localized so far
   */
  unresolved(): AssetReference[] {
    return [...this.unresolvedReferences];
  }

  private async localizeImages($: cheerio.CheerioAPI, context: RelativePathContext): Promise<boolean> {
    let changed = false;
    for (const element of $('img[src]').toArray()) {
      const img = $(element);
      const asset = await this.fetchReference(img.attr('src'), 'image', context);
      if (!asset) {
        continue;
      }
      img.attr('src', context.reference(asset.filename));
      img.attr('style', `${img.attr('style') ?? ''} max-width:100%`);
      changed = true;
    }
    return changed;
  }

  /**
   * Anchors to downloadable files; audio files get a player page
   */
  private async localizeDocuments($: cheerio.CheerioAPI, context: RelativePathContext): Promise<boolean> {
    const { downloadableExtensions, audioFormats } = this.deps.settings;
    let changed = false;

    for (const element of $('a[href]').toArray()) {
      const anchor = $(element);
      const asset = await this.fetchReference(anchor.attr('href'), 'document', context, {
        allowedExtensions: downloadableExtensions,
      });
      if (!asset) {
        continue;
      }

      let filename = asset.filename;
      const format = path.extname(filename).slice(1).toLowerCase();
      if (audioFormats.includes(format)) {
        const wrapper = `${path.parse(filename).name}.html`;
        const wrapperPath = context.assetPath(wrapper);
        if (!fs.existsSync(wrapperPath)) {
          await this.deps.renderer.renderToFile(wrapperPath, 'audio_player', {
            audioPath: filename,
            format,
            title: anchor.text().trim() || filename,
            pathToRoot: context.rootFromTargetDir(),
          });
        }
        filename = wrapper;
      }

      anchor.attr('href', context.reference(filename));
      changed = true;
    }
    return changed;
  }

  private async localizeStylesheets($: cheerio.CheerioAPI, context: RelativePathContext): Promise<boolean> {
    let changed = false;
    for (const element of $('link[href]').toArray()) {
      const link = $(element);
      const rel = (link.attr('rel') ?? '').toLowerCase().split(/\s+/);
      if (rel.some((value) => NON_RESOURCE_RELS.includes(value))) {
        continue;
      }

      const href = link.attr('href') ?? '';
      const asset = await this.fetchReference(href, 'stylesheet', context);
      if (!asset) {
        continue;
      }

      const isStylesheet = rel.includes('stylesheet') || path.extname(asset.filename) === '.css';
      if (asset.freshlyDownloaded && isStylesheet) {
        await this.deps.css.resolve(href.trim(), context.assetPath(asset.filename), '', context.location);
      }

      link.attr('href', context.reference(asset.filename));
      changed = true;
    }
    return changed;
  }

  private async localizeSources(
    $: cheerio.CheerioAPI,
    tag: 'script' | 'source',
    context: RelativePathContext
  ): Promise<boolean> {
    let changed = false;
    for (const element of $(`${tag}[src]`).toArray()) {
      const node = $(element);
      const asset = await this.fetchReference(node.attr('src'), tag, context);
      if (!asset) {
        continue;
      }
      node.attr('src', context.reference(asset.filename));
      changed = true;
    }
    return changed;
  }

  /**
   * Streaming videos become inline players, PDFs plain assets, anything
   * else an archived sub-document
   */
  private async localizeIframes($: cheerio.CheerioAPI, context: RelativePathContext): Promise<boolean> {
    const { videoHostPatterns, videoFormat, autoplay } = this.deps.settings;
    let changed = false;

    for (const element of $('iframe[src]').toArray()) {
      const iframe = $(element);
      const src = (iframe.attr('src') ?? '').trim();
      const resolved = resolveReference(src, context.location, this.deps.settings.instanceHost);
      if (resolved === null) {
        this.recordUnresolved(src, 'iframe', context);
        continue;
      }
      if (resolved.kind === 'passthrough') {
        continue;
      }

      if (isStreamingVideoUrl(src, videoHostPatterns)) {
        const asset = await this.fetchReference(src, 'iframe', context, {
          withExtension: `.${videoFormat}`,
        });
        if (!asset) {
          continue;
        }
        const subtitles = await subtitlesBeside(context.assetPath(asset.filename));
        const player = await this.deps.renderer.render('video', {
          format: videoFormat,
          videoPath: context.reference(asset.filename),
          title: '',
          autoplay,
          subtitles: subtitles.map((subtitle) => ({
            src: context.reference(subtitle.filename),
            srclang: subtitle.lang,
            label: subtitle.lang,
          })),
        });
        iframe.replaceWith(player);
        changed = true;
        continue;
      }

      if (isPdfUrl(resolved.url)) {
        const asset = await this.fetchReference(src, 'iframe', context);
        if (!asset) {
          continue;
        }
        iframe.attr('src', context.reference(asset.filename));
        changed = true;
        continue;
      }

      const filename = await this.localizeSubDocument(resolved.url, src, context);
      if (filename) {
        iframe.attr('src', context.reference(filename));
        changed = true;
      }
    }
    return changed;
  }

  /**
   * Fetch and localize an embedded page, saved as <hash>.html in the
   * asset directory
   * @returns its filename, or null when it could not be fetched
   */
  private async localizeSubDocument(
    absoluteUrl: string,
    src: string,
    context: RelativePathContext
  ): Promise<string | null> {
    const filename = `${stableHash(absoluteUrl)}.html`;
    const filePath = context.assetPath(filename);
    if (fs.existsSync(filePath) || this.subDocumentsInProgress.has(filePath)) {
      return filename;
    }

    this.subDocumentsInProgress.add(filePath);
    try {
      const page = await this.deps.pages.getPage(absoluteUrl);
      if (page === null) {
        this.recordUnresolved(src, 'iframe', context);
        return null;
      }

      const localized = await this.localize(page, context.forSubDocument(locationOf(absoluteUrl)));
      await fs.promises.mkdir(context.targetDir, { recursive: true });
      await fs.promises.writeFile(filePath, localized, 'utf-8');
      return filename;
    } finally {
      this.subDocumentsInProgress.delete(filePath);
    }
  }

  private rewriteInternalLinks($: cheerio.CheerioAPI, context: RelativePathContext): boolean {
    const links = this.deps.links;
    if (!links) {
      return false;
    }

    let changed = false;
    for (const element of $('a[href]').toArray()) {
      const anchor = $(element);
      const href = anchor.attr('href') ?? '';
      const rewritten = links.resolveInternalLink(href, context.pathToRoot);
      if (rewritten !== null && rewritten !== href) {
        anchor.attr('href', rewritten);
        changed = true;
      }
    }
    return changed;
  }

  private async fetchReference(
    raw: string | undefined,
    category: AssetCategory,
    context: RelativePathContext,
    options: { withExtension?: string; allowedExtensions?: readonly string[] } = {}
  ): Promise<LocalAsset | null> {
    const reference = (raw ?? '').trim();
    const resolved = resolveReference(reference, context.location, this.deps.settings.instanceHost);
    if (resolved?.kind === 'passthrough') {
      return null;
    }
    if (resolved === null) {
      if (!options.allowedExtensions) {
        this.recordUnresolved(reference, category, context);
      }
      return null;
    }

    const asset = await this.deps.materializer.materialize(resolved.url, context.targetDir, {
      location: context.location,
      ...options,
    });
    if (!asset && !options.allowedExtensions) {
      this.recordUnresolved(reference, category, context);
    }
    return asset;
  }

  private recordUnresolved(sourceUrl: string, category: AssetCategory, context: RelativePathContext): void {
    const { origin, serverPath } = context.location;
    this.unresolvedReferences.push({
      sourceUrl,
      category,
      documentLocation: `${origin}${serverPath}`,
      targetDir: context.targetDir,
    });
    this.logger.warn(`Could not localize ${category} ${sourceUrl}, keeping the original reference`);
  }
}

function isPdfUrl(src: string): boolean {
  try {
    return path.posix.extname(new URL(src).pathname).toLowerCase() === '.pdf';
  } catch {
    return false;
  }
}
