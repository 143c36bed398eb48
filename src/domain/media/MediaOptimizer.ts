/**
 * Format-specific optimization of downloaded media: video re-encoding with
 * ffmpeg, lossy recompression of images with the usual command line tools.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ArchiveError } from '../models/errors';
import { VideoFormat } from '../models/types';
import { fileTypeOf } from '../cache/CacheKey';
import { LoggingService } from '../../services/LoggingService';
import { ProcessResult, ToolRunner } from '../../services/ProcessRunner';

/**
 * ffmpeg output arguments per target container and quality
 */
const VIDEO_PRESETS: Record<VideoFormat, { low: string[]; high: string[] }> = {
  mp4: {
    low: [
      '-codec:v', 'h264', '-b:v', '300k', '-maxrate', '300k', '-minrate', '300k',
      '-bufsize', '1000k', '-qmin', '30', '-qmax', '42',
      '-vf', "scale='480:trunc(ow/a/2)*2'",
      '-codec:a', 'aac', '-ar', '44100', '-b:a', '128k', '-movflags', '+faststart',
    ],
    high: ['-codec:v', 'h264', '-codec:a', 'aac', '-movflags', '+faststart'],
  },
  webm: {
    low: [
      '-codec:v', 'libvpx', '-quality', 'best', '-b:v', '300k', '-maxrate', '300k',
      '-minrate', '300k', '-bufsize', '1000k', '-qmin', '30', '-qmax', '42',
      '-codec:a', 'libvorbis', '-ar', '44100', '-b:a', '48k',
    ],
    high: ['-codec:v', 'libvpx', '-b:v', '1M', '-codec:a', 'libvorbis'],
  },
};

export interface MediaOptimizerOptions {
  videoFormat: VideoFormat;
  lowQuality: boolean;
  /** Extensions (without dot) handled as video */
  videoFormats: readonly string[];
  /** Extensions (without dot) handled as images */
  imageFormats: readonly string[];
}

export class MediaOptimizer {
  constructor(
    private readonly tools: ToolRunner,
    private readonly options: MediaOptimizerOptions,
    private readonly logger: LoggingService
  ) {}

  /**
   * Optimize `src` and leave the result at `dst`. Files of other types are
   * only moved into place.
   * @returns whether an optimization ran
   * @throws ArchiveError when a required encoder fails
   */
  async optimize(src: string, dst: string): Promise<boolean> {
    const fileType = fileTypeOf(src);

    if (this.options.videoFormats.includes(fileType)) {
      return this.convertVideo(src, dst);
    }
    if (this.options.imageFormats.includes(fileType)) {
      return this.optimizeImage(src, dst);
    }

    await moveFile(src, dst);
    return false;
  }

  private async convertVideo(src: string, dst: string): Promise<boolean> {
    const { videoFormat, lowQuality } = this.options;
    if (fileTypeOf(src) === videoFormat && !lowQuality) {
      await moveFile(src, dst);
      return false;
    }

    // ffmpeg cannot read and write the same file
    let input = src;
    if (path.resolve(src) === path.resolve(dst)) {
      input = `${dst}.source${path.extname(src)}`;
      await fs.promises.rename(src, input);
    }

    const preset = VIDEO_PRESETS[videoFormat][lowQuality ? 'low' : 'high'];
    const result = await this.tools.run('ffmpeg', ['-y', '-i', input, ...preset, dst], {
      timeout: 0,
    });
    if (result.error) {
      await fs.promises.rm(input, { force: true });
      await fs.promises.rm(dst, { force: true });
      throw new ArchiveError(`Video re-encoding failed for ${dst}: ${describeFailure(result)}`);
    }

    await fs.promises.rm(input, { force: true });
    this.logger.debug(`Re-encoded ${src} -> ${dst}`);
    return true;
  }

  private async optimizeImage(src: string, dst: string): Promise<boolean> {
    let optimized = false;

    switch (fileTypeOf(src)) {
      case 'jpeg': {
        const result = await this.tools.run('jpegoptim', ['--strip-all', '-m50', src], {
          timeout: 10000,
        });
        optimized = result.exitCode === 0;
        break;
      }
      case 'png': {
        const quantized = await this.tools.run(
          'pngquant',
          ['--nofs', '--force', '--ext=.png', src],
          { timeout: 10000 }
        );
        if (quantized.error) {
          this.logger.debug(`pngquant skipped ${src}: ${describeFailure(quantized)}`);
        }
        await this.tools.run('advdef', ['-q', '-z', '-4', '-i', '5', src], { timeout: 50000 });
        optimized = true;
        break;
      }
      case 'gif': {
        const result = await this.tools.run('gifsicle', ['--batch', '-O3', '-i', src], {
          timeout: 10000,
        });
        optimized = result.exitCode === 0;
        break;
      }
      default:
        break;
    }

    await moveFile(src, dst);
    return optimized;
  }
}

function describeFailure(result: ProcessResult): string {
  const detail = result.stderr.trim().split('\n').pop();
  return detail ? `${result.error?.message ?? 'failed'} (${detail})` : result.error?.message ?? 'failed';
}

/**
 * Move a file, doing nothing when source and destination are the same
 */
export async function moveFile(src: string, dst: string): Promise<void> {
  if (path.resolve(src) === path.resolve(dst)) {
    return;
  }
  await fs.promises.mkdir(path.dirname(dst), { recursive: true });
  await fs.promises.rename(src, dst);
}
