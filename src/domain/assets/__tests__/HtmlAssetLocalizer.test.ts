// src/domain/assets/__tests__/HtmlAssetLocalizer.test.ts
import * as fs from 'fs';
import * as path from 'path';
import { CssDependencyResolver } from '../CssDependencyResolver';
import { HtmlAssetLocalizer } from '../HtmlAssetLocalizer';
import { InternalLinkResolver } from '../../content/ContentLinkResolver';
import { RelativePathContext } from '../../paths/RelativePathContext';
import { TemplateRenderer } from '../../../services/TemplateRenderer';
import { stableHash } from '../../../utils/hashing';
import {
  createTestMaterializer,
  FakeHttpClient,
  FakePageSource,
  FakeToolRunner,
  freshDir,
  silentLogger,
} from '../../../__tests__/fakes';

describe('HtmlAssetLocalizer', () => {
  const location = { origin: 'https://lms.example.org', serverPath: '' };
  let dir: string;
  let http: FakeHttpClient;
  let pages: FakePageSource;
  let tools: FakeToolRunner;

  const createLocalizer = (links: InternalLinkResolver | null = null): HtmlAssetLocalizer => {
    const materializer = createTestMaterializer(http, tools);
    return new HtmlAssetLocalizer({
      materializer,
      css: new CssDependencyResolver(materializer, silentLogger()),
      pages,
      renderer: new TemplateRenderer(),
      links,
      settings: {
        downloadableExtensions: ['.pdf', '.mp3'],
        audioFormats: ['mp3'],
        videoHostPatterns: ['youtube', 'youtu.be'],
        videoFormat: 'mp4',
        autoplay: false,
        instanceHost: 'lms.example.org',
      },
      logger: silentLogger(),
    });
  };

  const contextAt = (pathToRoot = ''): RelativePathContext =>
    RelativePathContext.create({ targetDir: dir, pathToTargetDir: '', pathToRoot, location });

  beforeEach(() => {
    dir = freshDir('html-localizer');
    http = new FakeHttpClient({
      'https://lms.example.org/static/a.png': { body: 'PNG' },
      'https://lms.example.org/files/notes.pdf': { body: 'PDF' },
      'https://lms.example.org/media/talk.mp3': { body: 'MP3' },
      'https://lms.example.org/static/css/main.css': { body: 'a { background: url(../img/bg.png); }' },
      'https://lms.example.org/static/img/bg.png': { body: 'BG' },
      'https://lms.example.org/static/js/app.js': { body: 'JS' },
      'https://lms.example.org/embed/tool/pic.png': { body: 'PIC' },
      'https://cdn.example.com/x.png': { body: 'CDN' },
    });
    pages = new FakePageSource({
      'https://lms.example.org/embed/tool': '<html><body><img src="pic.png"></body></html>',
    });
    tools = new FakeToolRunner(
      {},
      {
        'yt-dlp': (args) => {
          fs.writeFileSync(args[args.indexOf('-o') + 1].replace('%(ext)s', 'mp4'), 'VIDEO');
        },
      }
    );
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should download images and constrain their width', async () => {
    const output = await createLocalizer().localize('<img src="/static/a.png">', contextAt());

    expect(output).toBe('<img src="a.png" style=" max-width:100%">');
    expect(fs.readFileSync(path.join(dir, 'a.png'), 'utf-8')).toBe('PNG');
  });

  it('should return the input untouched when nothing changed', async () => {
    const content = '<p>Hello <b>world</b></p>';

    expect(await createLocalizer().localize(content, contextAt())).toBe(content);
  });

  it('should only download anchors to allowed extensions', async () => {
    const output = await createLocalizer().localize(
      '<a href="/files/notes.pdf">Notes</a><a href="/about">About</a>',
      contextAt()
    );

    expect(output).toBe('<a href="notes.pdf">Notes</a><a href="/about">About</a>');
  });

  it('should wrap audio files in a player page', async () => {
    const output = await createLocalizer().localize('<a href="/media/talk.mp3">Talk</a>', contextAt());

    expect(output).toBe('<a href="talk.html">Talk</a>');
    const player = fs.readFileSync(path.join(dir, 'talk.html'), 'utf-8');
    expect(player).toContain('<source src="talk.mp3" type="audio/mp3" />');
    expect(player).toContain('<title>Talk</title>');
  });

  it('should localize stylesheets and their dependencies', async () => {
    const output = await createLocalizer().localize(
      '<link rel="stylesheet" href="/static/css/main.css"><link rel="canonical" href="https://lms.example.org/page">',
      contextAt()
    );

    expect(output).toBe(
      '<link rel="stylesheet" href="main.css"><link rel="canonical" href="https://lms.example.org/page">'
    );
    expect(fs.readFileSync(path.join(dir, 'main.css'), 'utf-8')).toBe('a { background: url(bg.png); }');
  });

  it('should localize script sources', async () => {
    const output = await createLocalizer().localize('<script src="/static/js/app.js"></script>', contextAt());

    expect(output).toBe('<script src="app.js"></script>');
  });

  it('should replace streaming video iframes with a player', async () => {
    const url = 'https://www.youtube.com/embed/abc';

    const output = await createLocalizer().localize(`<iframe src="${url}"></iframe>`, contextAt());

    const filename = `${stableHash(url)}.mp4`;
    expect(output).not.toContain('<iframe');
    expect(output).toContain(`<source src="${filename}" type="video/mp4">`);
    expect(fs.readFileSync(path.join(dir, filename), 'utf-8')).toBe('VIDEO');
  });

  it('should add the subtitles downloaded with a streaming video to its player', async () => {
    const url = 'https://www.youtube.com/embed/abc';
    tools = new FakeToolRunner(
      {},
      {
        'yt-dlp': (args) => {
          const template = args[args.indexOf('-o') + 1];
          fs.writeFileSync(template.replace('%(ext)s', 'mp4'), 'VIDEO');
          fs.writeFileSync(template.replace('%(ext)s', 'en.vtt'), 'WEBVTT');
        },
      }
    );

    const output = await createLocalizer().localize(`<iframe src="${url}"></iframe>`, contextAt());

    const stem = stableHash(url);
    expect(output).toContain(`<track kind="subtitles" src="${stem}.en.vtt" srclang="en" label="en">`);
  });

  it('should download PDF iframes as plain assets', async () => {
    const output = await createLocalizer().localize('<iframe src="/files/notes.pdf"></iframe>', contextAt());

    expect(output).toBe('<iframe src="notes.pdf"></iframe>');
    expect(fs.readFileSync(path.join(dir, 'notes.pdf'), 'utf-8')).toBe('PDF');
    expect(pages.requested).toEqual([]);
  });

  it('should localize media sources', async () => {
    const output = await createLocalizer().localize(
      '<audio><source src="/media/talk.mp3" type="audio/mpeg"></audio>',
      contextAt()
    );

    expect(output).toBe('<audio><source src="talk.mp3" type="audio/mpeg"></audio>');
    expect(fs.readFileSync(path.join(dir, 'talk.mp3'), 'utf-8')).toBe('MP3');
  });

  it('should download protocol-relative references from other hosts', async () => {
    const output = await createLocalizer().localize('<img src="//cdn.example.com/x.png">', contextAt());

    expect(output).toBe('<img src="x.png" style=" max-width:100%">');
    expect(http.downloads).toEqual(['https://cdn.example.com/x.png']);
  });

  it('should archive other iframes as sub-documents', async () => {
    const output = await createLocalizer().localize('<iframe src="/embed/tool"></iframe>', contextAt());

    const filename = `${stableHash('https://lms.example.org/embed/tool')}.html`;
    expect(output).toBe(`<iframe src="${filename}"></iframe>`);
    expect(fs.readFileSync(path.join(dir, filename), 'utf-8')).toBe(
      '<html><head></head><body><img src="pic.png" style=" max-width:100%"></body></html>'
    );
  });

  it('should place sub-documents of a nested document in its asset directory', async () => {
    pages = new FakePageSource({
      'https://lms.example.org/embed/tool': '<html><body><img src="pic.png"><a href="/jump">Next</a></body></html>',
    });
    const links: InternalLinkResolver = {
      resolveInternalLink: (href, pathToRoot) => (href === '/jump' ? `${pathToRoot}course/x/index.html` : null),
    };
    const context = RelativePathContext.create({
      targetDir: dir,
      pathToTargetDir: 'assets',
      pathToRoot: '../',
      location,
    });

    const output = await createLocalizer(links).localize('<iframe src="/embed/tool"></iframe>', context);

    const filename = `${stableHash('https://lms.example.org/embed/tool')}.html`;
    expect(output).toBe(`<iframe src="assets/${filename}"></iframe>`);
    expect(fs.readFileSync(path.join(dir, filename), 'utf-8')).toBe(
      '<html><head></head><body><img src="pic.png" style=" max-width:100%">' +
        '<a href="../../course/x/index.html">Next</a></body></html>'
    );
    expect(fs.readFileSync(path.join(dir, 'pic.png'), 'utf-8')).toBe('PIC');
  });

  it('should hand out copies of the unresolved references', async () => {
    const localizer = createLocalizer();
    await localizer.localize('<img src="/static/missing.png">', contextAt());

    localizer.unresolved().pop();

    expect(localizer.unresolved()).toHaveLength(1);
  });

  it('should record references that could not be localized', async () => {
    const content = '<img src="/static/missing.png">';
    const localizer = createLocalizer();

    expect(await localizer.localize(content, contextAt())).toBe(content);
    expect(localizer.unresolved()).toEqual([
      {
        sourceUrl: '/static/missing.png',
        category: 'image',
        documentLocation: 'https://lms.example.org',
        targetDir: dir,
      },
    ]);
  });

  it('should hand anchors to the link resolver', async () => {
    const links: InternalLinkResolver = {
      resolveInternalLink: (href, pathToRoot) => (href === '/jump' ? `${pathToRoot}course/x/index.html` : null),
    };

    const output = await createLocalizer(links).localize(
      '<a href="/jump">Next</a><a href="https://elsewhere.example.com/">Out</a>',
      contextAt('../../')
    );

    expect(output).toBe('<a href="../../course/x/index.html">Next</a><a href="https://elsewhere.example.com/">Out</a>');
  });
});
