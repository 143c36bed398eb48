// src/domain/media/__tests__/VideoExtractor.test.ts
import * as fs from 'fs';
import * as path from 'path';
import { isStreamingVideoUrl, VideoExtractor } from '../VideoExtractor';
import { FakeToolRunner, freshDir, silentLogger } from '../../../__tests__/fakes';

describe('VideoExtractor', () => {
  let dir: string;

  beforeEach(() => {
    dir = freshDir('video-extractor');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should recognize streaming platforms by substring', () => {
    const patterns = ['youtube', 'youtu.be'];

    expect(isStreamingVideoUrl('https://www.youtube.com/embed/abc', patterns)).toBe(true);
    expect(isStreamingVideoUrl('https://youtu.be/abc', patterns)).toBe(true);
    expect(isStreamingVideoUrl('https://cdn.example.org/video.mp4', patterns)).toBe(false);
  });

  it('should return the file yt-dlp produced', async () => {
    const tools = new FakeToolRunner(
      {},
      {
        'yt-dlp': (args) => {
          const template = args[args.indexOf('-o') + 1];
          fs.writeFileSync(template.replace('%(ext)s', 'webm.part'), 'partial');
          fs.writeFileSync(template.replace('%(ext)s', 'en.vtt'), 'WEBVTT');
          fs.writeFileSync(template.replace('%(ext)s', 'webm'), 'video');
        },
      }
    );
    const extractor = new VideoExtractor(tools, 'mp4', silentLogger());

    const produced = await extractor.download('https://youtu.be/abc', path.join(dir, 'unit', 'video.mp4'));

    expect(produced).toBe(path.join(dir, 'unit', 'video.webm'));
    expect(tools.calls[0].args).toEqual([
      '--no-progress',
      '--retries', '20',
      '--fragment-retries', '50',
      '-f', 'best[ext=mp4]/bestvideo[ext=mp4]+bestaudio[ext=m4a]/best',
      '--write-subs',
      '--sub-langs', 'all,-live_chat',
      '--sub-format', 'vtt',
      '-o', path.join(dir, 'unit', 'video.%(ext)s'),
      'https://youtu.be/abc',
    ]);
  });

  it('should return null when yt-dlp fails', async () => {
    const extractor = new VideoExtractor(new FakeToolRunner({ 'yt-dlp': 1 }), 'webm', silentLogger());

    expect(await extractor.download('https://youtu.be/abc', path.join(dir, 'video.webm'))).toBeNull();
  });

  it('should return null when nothing was produced', async () => {
    const extractor = new VideoExtractor(new FakeToolRunner(), 'webm', silentLogger());

    expect(await extractor.download('https://youtu.be/abc', path.join(dir, 'video.webm'))).toBeNull();
  });
});
