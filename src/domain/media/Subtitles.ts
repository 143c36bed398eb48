/**
 * Video subtitles: discovery in the blocks API and in student views, and
 * storage as WebVTT files beside the video they belong to.
 */

import * as cheerio from 'cheerio';
import * as fs from 'fs';
import * as path from 'path';
import { RawCourseBlock } from '../models/types';

export interface SubtitleSource {
  lang: string;
  url: string;
}

export interface StoredSubtitle {
  lang: string;
  /** Filename inside the video's directory */
  filename: string;
}

const WEBVTT_HEADER = /^\uFEFF?WEBVTT/;
const SRT_TIMESTAMP = /(\d{2}:\d{2}:\d{2}),(\d{3})/g;

/**
 * Transcripts advertised by the blocks API
 */
export function subtitlesFromBlock(block: RawCourseBlock): SubtitleSource[] {
  const transcripts = block.student_view_data?.transcripts ?? {};
  return Object.entries(transcripts).map(([lang, url]) => ({ lang, url }));
}

/**
 * <track> elements of the first video in a student view
 */
export function subtitlesFromPage(page: string): SubtitleSource[] {
  const $ = cheerio.load(page);
  const sources: SubtitleSource[] = [];
  for (const element of $('video').first().find('track[src]').toArray()) {
    const track = $(element);
    const lang = (track.attr('srclang') ?? '').trim();
    const url = (track.attr('src') ?? '').trim();
    if (lang && url && !sources.some((source) => source.lang === lang)) {
      sources.push({ lang, url });
    }
  }
  return sources;
}

/**
 * Convert SubRip text to WebVTT; WebVTT input is returned as is
 */
export function toWebVtt(raw: string): string {
  if (WEBVTT_HEADER.test(raw)) {
    return raw;
  }
  const cues = raw
    .replace(/\r\n?/g, '\n')
    // some platforms number cues from 0
    .replace(/^0$/gm, '1')
    .replace(SRT_TIMESTAMP, '$1.$2')
    .trim();
  return `WEBVTT\n\n${cues}\n`;
}

/**
 * Subtitles written by yt-dlp next to `videoPath` as <stem>.<lang>.vtt
 */
export async function subtitlesBeside(videoPath: string): Promise<StoredSubtitle[]> {
  const dir = path.dirname(videoPath);
  const stem = path.basename(videoPath, path.extname(videoPath));
  let entries: string[];
  try {
    entries = await fs.promises.readdir(dir);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  return entries
    .filter((entry) => entry.startsWith(`${stem}.`) && entry.endsWith('.vtt'))
    .map((filename) => ({ lang: filename.slice(stem.length + 1, -'.vtt'.length), filename }))
    .filter((subtitle) => subtitle.lang !== '')
    .sort((a, b) => a.lang.localeCompare(b.lang));
}
