/**
 * Downloads videos from streaming platforms through yt-dlp
 */

import * as fs from 'fs';
import * as path from 'path';
import { VideoFormat } from '../models/types';
import { LoggingService } from '../../services/LoggingService';
import { ToolRunner } from '../../services/ProcessRunner';

/**
 * Check whether a URL points at a streaming video platform
 * @param patterns - Substrings identifying such URLs (e.g. "youtube")
 */
export function isStreamingVideoUrl(url: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => url.includes(pattern));
}

const FORMAT_SELECTORS: Record<VideoFormat, string> = {
  mp4: 'best[ext=mp4]/bestvideo[ext=mp4]+bestaudio[ext=m4a]/best',
  webm: 'best[ext=webm]/bestvideo[ext=webm]+bestaudio[ext=webm]/best',
};

export class VideoExtractor {
  constructor(
    private readonly tools: ToolRunner,
    private readonly videoFormat: VideoFormat,
    private readonly logger: LoggingService
  ) {}

  /**
   * Download `url` next to `targetPath`. The platform decides the container,
   * so the returned file may carry another extension than the target.
   * Subtitles land beside it as <stem>.<lang>.vtt.
   * @returns path of the downloaded file, or null on failure
   */
  async download(url: string, targetPath: string): Promise<string | null> {
    const dir = path.dirname(targetPath);
    const stem = path.basename(targetPath, path.extname(targetPath));
    await fs.promises.mkdir(dir, { recursive: true });

    const result = await this.tools.run(
      'yt-dlp',
      [
        '--no-progress',
        '--retries', '20',
        '--fragment-retries', '50',
        '-f', FORMAT_SELECTORS[this.videoFormat],
        '--write-subs',
        '--sub-langs', 'all,-live_chat',
        '--sub-format', 'vtt',
        '-o', path.join(dir, `${stem}.%(ext)s`),
        url,
      ],
      { timeout: 0 }
    );
    if (result.error) {
      this.logger.error(`yt-dlp failed for ${url}`, result.error, { stderr: result.stderr });
      return null;
    }

    const entries = await fs.promises.readdir(dir);
    const produced = entries.find(
      (entry) => entry.startsWith(`${stem}.`) && !entry.endsWith('.part') && !entry.endsWith('.vtt')
    );
    if (!produced) {
      this.logger.error(`yt-dlp produced no file for ${url}`);
      return null;
    }
    return path.join(dir, produced);
  }
}
