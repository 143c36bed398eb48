// src/domain/media/__tests__/Subtitles.test.ts
import * as fs from 'fs';
import * as path from 'path';
import { subtitlesBeside, subtitlesFromBlock, subtitlesFromPage, toWebVtt } from '../Subtitles';
import { block, BLOCK_IDS } from '../../../__tests__/fixtures';
import { freshDir } from '../../../__tests__/fakes';

describe('Subtitles', () => {
  it('should read transcripts from the blocks API', () => {
    const video = block(BLOCK_IDS.video, 'video', 'Intro', undefined, {
      student_view_data: { transcripts: { en: 'https://lms.example.org/t/en', fr: 'https://lms.example.org/t/fr' } },
    });

    expect(subtitlesFromBlock(video)).toEqual([
      { lang: 'en', url: 'https://lms.example.org/t/en' },
      { lang: 'fr', url: 'https://lms.example.org/t/fr' },
    ]);
    expect(subtitlesFromBlock(block(BLOCK_IDS.video, 'video', 'Intro'))).toEqual([]);
  });

  it('should read the tracks of the first video of a page', () => {
    const page =
      '<video><source src="/v.mp4"><track src="/subs/en.srt" srclang="en"><track src="/subs/x.srt">' +
      '<track src="/subs/en-2.srt" srclang="en"></video>' +
      '<video><track src="/other/de.srt" srclang="de"></video>';

    expect(subtitlesFromPage(page)).toEqual([{ lang: 'en', url: '/subs/en.srt' }]);
  });

  it('should convert SubRip cues to WebVTT', () => {
    const srt = '0\r\n00:00:01,000 --> 00:00:02,500\r\nHello\r\n\r\n1\r\n00:00:03,000 --> 00:00:04,000\r\nBye\r\n';

    expect(toWebVtt(srt)).toBe(
      'WEBVTT\n\n1\n00:00:01.000 --> 00:00:02.500\nHello\n\n1\n00:00:03.000 --> 00:00:04.000\nBye\n'
    );
  });

  it('should keep WebVTT input as is', () => {
    const vtt = 'WEBVTT\n\n00:01.000 --> 00:02.000\nHi\n';

    expect(toWebVtt(vtt)).toBe(vtt);
  });

  it('should list the subtitles stored beside a video', async () => {
    const dir = freshDir('subtitles');
    try {
      for (const name of ['clip.mp4', 'clip.fr.vtt', 'clip.en.vtt', 'other.de.vtt', 'clip.vtt']) {
        fs.writeFileSync(path.join(dir, name), '');
      }

      expect(await subtitlesBeside(path.join(dir, 'clip.mp4'))).toEqual([
        { lang: 'en', filename: 'clip.en.vtt' },
        { lang: 'fr', filename: 'clip.fr.vtt' },
      ]);
      expect(await subtitlesBeside(path.join(dir, 'missing', 'clip.mp4'))).toEqual([]);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
