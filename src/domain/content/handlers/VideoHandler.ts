import * as cheerio from 'cheerio';
import * as fs from 'fs';
import * as path from 'path';
import {
  StoredSubtitle,
  SubtitleSource,
  subtitlesFromBlock,
  subtitlesFromPage,
  toWebVtt,
} from '../../media/Subtitles';
import { ArchiveError } from '../../models/errors';
import { RawCourseBlock } from '../../models/types';
import { prepareUrl } from '../../urls/UrlResolver';
import { ContentUnit } from '../ContentUnit';
import { UnitContext, UnitHandler } from './UnitHandler';

/** Encoded video profiles, best first */
const PROFILE_PREFERENCE = ['fallback', 'desktop_mp4', 'desktop_webm', 'mobile_high', 'mobile_low', 'youtube'];

/**
 * Video URL advertised by the blocks API
 */
export function videoUrlFromBlock(block: RawCourseBlock): string | null {
  const encoded = block.student_view_data?.encoded_videos;
  if (!encoded) {
    return null;
  }
  for (const profile of PROFILE_PREFERENCE) {
    const url = encoded[profile]?.url;
    if (url) {
      return url;
    }
  }
  return null;
}

/**
 * Video URL found in a unit's student view
 */
export function videoUrlFromPage(page: string): string | null {
  const $ = cheerio.load(page);
  const source = $('video source[src]').first().attr('src') ?? $('video[src]').first().attr('src');
  if (source) {
    return source;
  }
  const iframe = $('iframe[src]')
    .toArray()
    .map((element) => $(element).attr('src') ?? '')
    .find((src) => src.includes('youtube') || src.includes('youtu.be'));
  return iframe ?? null;
}

/**
 * video and libcast_xblock units: the video is stored as video.<format> in
 * the unit directory, its subtitles as <lang>.vtt beside it, and shown with
 * the video player
 */
export class VideoHandler implements UnitHandler {
  readonly pageProducing = false;
  private readonly subtitles = new Map<string, StoredSubtitle[]>();

  async download(unit: ContentUnit, ctx: UnitContext): Promise<void> {
    let url = videoUrlFromBlock(unit.block);
    let sources = subtitlesFromBlock(unit.block);
    if (!url || sources.length === 0) {
      const page = await ctx.pages.getPage(unit.studentViewUrl);
      if (page !== null) {
        url = url ?? videoUrlFromPage(page);
        sources = sources.length > 0 ? sources : subtitlesFromPage(page);
      }
    }
    if (!url) {
      throw new ArchiveError(`No video source found for ${unit.studentViewUrl}`);
    }

    const unitDir = path.join(ctx.archiveRoot, unit.relativePath);
    const asset = await ctx.materializer.materialize(url, unitDir, {
      location: ctx.instanceLocation,
      filename: this.filename(ctx),
    });
    if (!asset) {
      throw new ArchiveError(`Failed to download video ${url}`);
    }

    this.subtitles.set(unit.blockId, await this.downloadSubtitles(sources, unitDir, ctx));
  }

  async render(unit: ContentUnit, ctx: UnitContext): Promise<string> {
    const page = unit.owningPage() ?? unit;
    const videoPath = path.posix.join(
      path.posix.relative(page.relativePath, unit.relativePath),
      this.filename(ctx)
    );
    const player = await ctx.renderer.render('video', {
      format: ctx.videoFormat,
      videoPath,
      title: unit.displayName,
      autoplay: ctx.autoplay,
      subtitles: (this.subtitles.get(unit.blockId) ?? []).map((subtitle) => ({
        src: path.posix.join(path.posix.dirname(videoPath), subtitle.filename),
        srclang: subtitle.lang,
        label: subtitle.lang,
      })),
    });
    return ctx.renderer.render('unit_fragment', { token: unit.token, type: unit.type, content: player });
  }

  /**
   * Store each source as <lang>.vtt; a subtitle that cannot be fetched is
   * left out
   */
  private async downloadSubtitles(
    sources: SubtitleSource[],
    unitDir: string,
    ctx: UnitContext
  ): Promise<StoredSubtitle[]> {
    const stored: StoredSubtitle[] = [];
    for (const source of sources) {
      const filename = `${source.lang}.vtt`;
      const filePath = path.join(unitDir, filename);
      if (fs.existsSync(filePath)) {
        stored.push({ lang: source.lang, filename });
        continue;
      }

      try {
        const raw = await ctx.pages.getPage(prepareUrl(source.url, ctx.instanceLocation));
        if (raw === null) {
          ctx.logger.error(`Failed to get subtitle from ${source.url}`);
          continue;
        }
        await fs.promises.writeFile(filePath, toWebVtt(raw), 'utf-8');
        stored.push({ lang: source.lang, filename });
      } catch (error) {
        ctx.logger.error(`Error while converting subtitle ${source.url}`, error);
      }
    }
    return stored;
  }

  private filename(ctx: UnitContext): string {
    return `video.${ctx.videoFormat}`;
  }
}
