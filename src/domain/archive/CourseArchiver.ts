/**
 * Archives one course: content tree, course tabs and extra pages, homepage,
 * unit content, then every page of the offline copy.
 */

import * as cheerio from 'cheerio';
import * as fs from 'fs';
import * as path from 'path';
import { URL } from 'url';
import { AssetReference } from '../../models/ArchiveTypes';
import { CourseCatalog, courseIdFromUrl } from '../../services/CourseCatalog';
import { LoggingService } from '../../services/LoggingService';
import { PageSource } from '../../services/PlatformSession';
import { TemplateRenderer } from '../../services/TemplateRenderer';
import { BookEntry, CourseTabLink, SiteContext } from '../../templates/types';
import { AssetMaterializer } from '../assets/AssetMaterializer';
import { CssDependencyResolver } from '../assets/CssDependencyResolver';
import { HtmlAssetLocalizer } from '../assets/HtmlAssetLocalizer';
import { ScriptDeferrer } from '../assets/ScriptDeferrer';
import { ContentLinkResolver } from '../content/ContentLinkResolver';
import { ContentTreeBuilder } from '../content/ContentTreeBuilder';
import { ContentTree } from '../content/ContentUnit';
import { CourseTabRegistry, TabAnnexer } from '../content/CourseTabRegistry';
import { createHandlerTable, handlerFor, UnitContext, UnitHandler } from '../content/handlers';
import { RequiredResourceError } from '../models/errors';
import { ArchiveOptions, ArchiverConfigFile, NetworkLocation } from '../models/types';
import { RelativePathContext } from '../paths/RelativePathContext';
import { hostnameOf, prepareUrl, unquotePlus } from '../urls/UrlResolver';
import { resolveInstanceProfile } from '../../utils/ConfigLoader';
import { stableHash } from '../../utils/hashing';

/** Navigation bar candidates, first match wins */
const TAB_BAR_SELECTORS = ['ol.course-material', 'ul.course-material', 'ul.navbar-nav', 'ol.course-tabs'];

/** Homepage elements that only make sense on the live site */
const HOMEPAGE_CLUTTER = ['div.dismiss-message', 'a.action-show-bookmarks', 'button.toggle-visibility-button'];

const INSTANCE_DIR = 'instance';
const HOME_DIR = 'home';

export interface CourseArchiverDeps {
  pages: PageSource;
  materializer: AssetMaterializer;
  renderer: TemplateRenderer;
  logger: LoggingService;
  /** Block type to handler; the built-in table by default */
  handlers?: ReadonlyMap<string, UnitHandler>;
  /** Passed to the API as username= */
  username?: string;
  /** Unit DOM ids, random UUIDs by default */
  createToken?: () => string;
  /** Static files copied to <archive>/assets */
  assetsDir?: string;
}

export interface ArchiveSummary {
  courseId: string;
  courseName: string;
  /** Entry page, relative to the archive root */
  entryPage: string;
  tabs: CourseTabLink[];
  unitCount: number;
  downloadedUnits: number;
  /** Block ids of units whose content could not be fetched */
  failedUnits: string[];
  unresolvedReferences: readonly AssetReference[];
}

interface AnnexedPage {
  dirName: string;
  title: string;
  content: string;
}

type InstanceChrome = Pick<SiteContext, 'stylesheets' | 'headScripts' | 'bodyScripts'>;

interface BookList {
  dirName: string;
  title: string;
  links: Array<{ href: string; name: string }>;
}

export class CourseArchiver {
  private readonly logger: LoggingService;
  private readonly handlers: ReadonlyMap<string, UnitHandler>;
  private readonly css: CssDependencyResolver;
  private readonly annexedPages: AnnexedPage[] = [];
  private readonly bookLists: BookList[] = [];

  constructor(
    private readonly config: ArchiverConfigFile,
    private readonly options: ArchiveOptions,
    private readonly deps: CourseArchiverDeps
  ) {
    this.logger = deps.logger;
    this.handlers = deps.handlers ?? createHandlerTable();
    this.css = new CssDependencyResolver(deps.materializer, deps.logger.child('css'));
  }

  async run(): Promise<ArchiveSummary> {
    const { pages, materializer, renderer } = this.deps;
    const courseUrl = new URL(this.options.courseUrl);
    const instanceLocation: NetworkLocation = { origin: courseUrl.origin, serverPath: '' };
    const profile = resolveInstanceProfile(this.config, courseUrl.hostname);
    const archiveRoot = path.resolve(this.options.outputDir);

    this.logger.info(`Archiving ${this.options.courseUrl} into ${archiveRoot}`);

    const courseId = courseIdFromUrl(this.options.courseUrl, profile);
    const catalog = new CourseCatalog(pages, profile, this.logger, this.deps.username);
    const info = await catalog.getCourseInfo(courseId);
    const tree = new ContentTreeBuilder(
      {
        supportedTypes: new Set(this.handlers.keys()),
        ignoreUnsupported: this.options.ignoreUnsupported,
        createToken: this.deps.createToken,
      },
      this.logger
    ).build(await catalog.getCourseBlocks(courseId));

    await fs.promises.mkdir(archiveRoot, { recursive: true });
    const coursePagePath = `${tree.root.relativePath}/index.html`;

    this.logger.info('Getting course tabs ...');
    const coursePage = await pages.getPage(this.options.courseUrl);
    if (coursePage === null) {
      throw new RequiredResourceError('course page', this.options.courseUrl);
    }
    const $course = cheerio.load(coursePage);
    const tabs = new CourseTabRegistry(coursePagePath);
    await this.registerTabs($course, tabs, (href, dirName) =>
      this.annexPage(href, dirName, instanceLocation)
    );

    const localizer = new HtmlAssetLocalizer({
      materializer,
      css: this.css,
      pages,
      renderer,
      links: new ContentLinkResolver(
        tree,
        tabs,
        {
          instanceOrigin: instanceLocation.origin,
          coursePathPrefix: profile.coursePrefix + unquotePlus(courseId),
        },
        this.logger.child('links')
      ),
      settings: {
        downloadableExtensions: this.config.downloadableExtensions,
        audioFormats: this.config.audioFormats,
        videoHostPatterns: this.config.videoHostPatterns,
        videoFormat: this.options.videoFormat,
        autoplay: this.options.autoplay,
        instanceHost: hostnameOf(instanceLocation.origin),
      },
      logger: this.logger.child('localizer'),
    });

    const scripts = new ScriptDeferrer();
    const chrome = await this.localizeInstanceChrome($course, localizer, scripts, archiveRoot, instanceLocation);

    this.logger.info('Downloading content for extra pages ...');
    for (const page of this.annexedPages) {
      const context = RelativePathContext.create({
        targetDir: path.join(archiveRoot, page.dirName),
        pathToTargetDir: '',
        pathToRoot: '../',
        location: instanceLocation,
      });
      page.content = await localizer.localize(page.content, context);
    }
    const books = await this.downloadBookLists(archiveRoot, instanceLocation);

    this.logger.info('Getting homepage ...');
    const messages = await this.homepageMessages($course, localizer, archiveRoot, instanceLocation);
    const entryPage = messages.length > 0 ? 'index.html' : coursePagePath;

    const site: SiteContext = {
      courseName: info.name,
      org: info.org,
      entryPage,
      tabs: tabs.list(),
      ...chrome,
    };

    const ctx: UnitContext = {
      pages,
      localizer,
      scripts,
      materializer,
      renderer,
      tree,
      handlers: this.handlers,
      archiveRoot,
      instanceLocation,
      videoFormat: this.options.videoFormat,
      autoplay: this.options.autoplay,
      site,
      logger: this.logger,
    };

    this.logger.info('Getting content for supported units ...');
    await this.downloadUnits(tree, ctx);

    this.logger.info('Rendering pages ...');
    await handlerFor(ctx, tree.root).render(tree.root, ctx);

    for (const page of this.annexedPages) {
      await renderer.renderToFile(path.join(archiveRoot, page.dirName, 'index.html'), 'specific_page', {
        site,
        title: page.title,
        pathToRoot: '../',
        content: page.content,
      });
    }
    for (const [dirName, book] of books) {
      await renderer.renderToFile(path.join(archiveRoot, dirName, 'index.html'), 'booknav', {
        site,
        title: book.title,
        pathToRoot: '../',
        books: book.entries,
      });
    }

    const rootIndex = path.join(archiveRoot, 'index.html');
    if (messages.length > 0) {
      await renderer.renderToFile(rootIndex, 'home', { site, title: info.name, pathToRoot: '', messages });
    } else {
      await renderer.renderToFile(rootIndex, 'redirect', { title: info.name, target: coursePagePath });
    }

    await renderer.copyAssets(archiveRoot, this.deps.assetsDir);

    const failedUnits = tree.units.filter((unit) => unit.status === 'failed').map((unit) => unit.blockId);
    const summary: ArchiveSummary = {
      courseId,
      courseName: info.name,
      entryPage,
      tabs: site.tabs,
      unitCount: tree.units.length,
      downloadedUnits: tree.units.filter((unit) => unit.status === 'downloaded').length,
      failedUnits,
      unresolvedReferences: localizer.unresolved(),
    };
    this.logger.info(
      `Archived ${summary.downloadedUnits}/${summary.unitCount} units, ${failedUnits.length} failed, ` +
        `${summary.unresolvedReferences.length} unresolved references`
    );
    return summary;
  }

  private async registerTabs(
    $: cheerio.CheerioAPI,
    tabs: CourseTabRegistry,
    annexer: TabAnnexer
  ): Promise<void> {
    const selector = TAB_BAR_SELECTORS.find((candidate) => $(candidate).length > 0);
    if (!selector) {
      this.logger.warn('No course tabs found on the course page');
      return;
    }

    for (const element of $(selector).first().find('li').toArray()) {
      const item = $(element);
      const href = item.find('a[href]').first().attr('href');
      if (href) {
        await tabs.register(item.text(), href, annexer);
      }
    }
  }

  /**
   * Fetch the page behind an extra tab; content pages and book lists are
   * archived, anything else is dropped
   */
  private async annexPage(href: string, dirName: string, location: NetworkLocation): Promise<string | null> {
    const url = prepareUrl(href, location);
    const page = await this.deps.pages.getPage(url);
    if (page === null) {
      throw new RequiredResourceError(`page of tab ${dirName}`, url);
    }

    const $ = cheerio.load(page);
    const title = $('title').first().text().trim() || dirName;

    const container = $('section.container').first();
    if (container.length > 0) {
      this.annexedPages.push({ dirName, title, content: $.html(container) });
      return `${dirName}/index.html`;
    }

    const sidebar = $('section.book-sidebar').first();
    if (sidebar.length > 0) {
      const links = sidebar
        .find('a[rel]')
        .toArray()
        .map((element) => ({
          href: ($(element).attr('rel') ?? '').trim().split(/\s+/)[0],
          name: $(element).text().trim(),
        }))
        .filter((link) => link.href !== '');
      this.bookLists.push({ dirName, title, links });
      return `${dirName}/index.html`;
    }

    this.logger.warn(`Unsupported extra page in the course tabs: ${dirName}`);
    return null;
  }

  private async downloadBookLists(
    archiveRoot: string,
    location: NetworkLocation
  ): Promise<Map<string, { title: string; entries: BookEntry[] }>> {
    const books = new Map<string, { title: string; entries: BookEntry[] }>();
    for (const list of this.bookLists) {
      const entries: BookEntry[] = [];
      for (const link of list.links) {
        const asset = await this.deps.materializer.materialize(link.href, path.join(archiveRoot, list.dirName), {
          location,
        });
        if (asset) {
          entries.push({ url: asset.filename, name: link.name });
        } else {
          this.logger.warn(`Could not download book ${link.href}`);
        }
      }
      books.set(list.dirName, { title: list.title, entries });
    }
    return books;
  }

  /**
   * Stylesheets and scripts of the course page, stored in instance/ and
   * shared by every archived page
   */
  private async localizeInstanceChrome(
    $: cheerio.CheerioAPI,
    localizer: HtmlAssetLocalizer,
    scripts: ScriptDeferrer,
    archiveRoot: string,
    location: NetworkLocation
  ): Promise<InstanceChrome> {
    const targetDir = path.join(archiveRoot, INSTANCE_DIR);
    // a document at the archive root whose assets go to instance/
    const context = RelativePathContext.create({
      targetDir,
      pathToTargetDir: INSTANCE_DIR,
      pathToRoot: '',
      location,
    });

    const stylesheets = await this.localizeInstanceStylesheets($, targetDir, location);
    for (const sheet of await this.storeInlineStyles($, targetDir, location)) {
      if (!stylesheets.includes(sheet)) {
        stylesheets.push(sheet);
      }
    }

    return {
      stylesheets,
      headScripts: await this.localizeInstanceScripts($, 'head > script', localizer, scripts, context),
      bodyScripts: await this.localizeInstanceScripts($, 'body > script', localizer, scripts, context),
    };
  }

  /**
   * @returns their paths from the archive root
   */
  private async localizeInstanceStylesheets(
    $: cheerio.CheerioAPI,
    targetDir: string,
    location: NetworkLocation
  ): Promise<string[]> {
    const stylesheets: string[] = [];

    for (const element of $('head link[rel~="stylesheet"][href]').toArray()) {
      const href = ($(element).attr('href') ?? '').trim();
      const asset = await this.deps.materializer.materialize(href, targetDir, { location });
      if (!asset) {
        this.logger.warn(`Could not download instance stylesheet ${href}`);
        continue;
      }
      if (asset.freshlyDownloaded) {
        await this.css.resolve(href, path.join(targetDir, asset.filename), '', location);
      }
      const sheet = `${INSTANCE_DIR}/${asset.filename}`;
      if (!stylesheets.includes(sheet)) {
        stylesheets.push(sheet);
      }
    }
    return stylesheets;
  }

  /**
   * <style> elements of the head, each written to a stylesheet of its own
   */
  private async storeInlineStyles(
    $: cheerio.CheerioAPI,
    targetDir: string,
    location: NetworkLocation
  ): Promise<string[]> {
    const stylesheets: string[] = [];
    for (const element of $('head > style').toArray()) {
      const css = $(element).text().trim();
      if (!css) {
        continue;
      }
      const filename = `${stableHash(css)}.css`;
      const filePath = path.join(targetDir, filename);
      await fs.promises.mkdir(targetDir, { recursive: true });
      await fs.promises.writeFile(filePath, css, 'utf-8');
      await this.css.resolve(this.options.courseUrl, filePath, '', location);
      stylesheets.push(`${INSTANCE_DIR}/${filename}`);
    }
    return stylesheets;
  }

  /**
   * Scripts matching `selector`, downloaded or moved to files in instance/
   * @returns their paths from the archive root, in document order
   */
  private async localizeInstanceScripts(
    $: cheerio.CheerioAPI,
    selector: string,
    localizer: HtmlAssetLocalizer,
    scripts: ScriptDeferrer,
    context: RelativePathContext
  ): Promise<string[]> {
    const markup = $(selector)
      .toArray()
      .map((element) => $.html(element))
      .join('');
    if (!markup) {
      return [];
    }

    const localized = await scripts.defer(await localizer.localize(markup, context), context);
    const $scripts = cheerio.load(localized, null, false);
    const sources: string[] = [];
    for (const element of $scripts('script[src]').toArray()) {
      const src = $scripts(element).attr('src') ?? '';
      if (!src.startsWith(`${INSTANCE_DIR}/`)) {
        this.logger.warn(`Instance script ${src} was not archived, leaving it out`);
        continue;
      }
      if (!sources.includes(src)) {
        sources.push(src);
      }
    }
    return sources;
  }

  /**
   * Welcome message, or the course updates when there is none
   */
  private async homepageMessages(
    $: cheerio.CheerioAPI,
    localizer: HtmlAssetLocalizer,
    archiveRoot: string,
    location: NetworkLocation
  ): Promise<string[]> {
    const welcome = $('div.welcome-message').first();
    const articles =
      welcome.length > 0
        ? [welcome]
        : $('div[class*="info-wrapper"]')
            .toArray()
            .map((element) => $(element).attr('class', 'toggle-visibility-element article-content'));

    if (articles.length === 0) {
      this.logger.info('No homepage content, the course page is the entry page');
      return [];
    }

    const context = RelativePathContext.create({
      targetDir: path.join(archiveRoot, HOME_DIR),
      pathToTargetDir: HOME_DIR,
      pathToRoot: '',
      location,
    });

    const messages: string[] = [];
    for (const article of articles) {
      article.find(HOMEPAGE_CLUTTER.join(', ')).remove();
      messages.push(await localizer.localize($.html(article), context));
    }
    return messages;
  }

  /**
   * One unit at a time; a failure marks the unit and moves on
   */
  private async downloadUnits(tree: ContentTree, ctx: UnitContext): Promise<void> {
    for (const unit of tree.units) {
      try {
        await handlerFor(ctx, unit).download(unit, ctx);
        unit.status = 'downloaded';
      } catch (error) {
        unit.status = 'failed';
        this.logger.error(`Failed to get ${unit.type} unit "${unit.displayName}" (${unit.studentViewUrl})`, error);
      }
    }
  }
}
