import * as path from 'path';
import { AssetMaterializer } from '../../assets/AssetMaterializer';
import { HtmlAssetLocalizer } from '../../assets/HtmlAssetLocalizer';
import { ScriptDeferrer } from '../../assets/ScriptDeferrer';
import { NetworkLocation, VideoFormat } from '../../models/types';
import { RelativePathContext } from '../../paths/RelativePathContext';
import { LoggingService } from '../../../services/LoggingService';
import { PageSource } from '../../../services/PlatformSession';
import { TemplateRenderer } from '../../../services/TemplateRenderer';
import { SiteContext } from '../../../templates/types';
import { ContentTree, ContentUnit } from '../ContentUnit';

/**
 * Everything a handler may use while downloading or rendering a unit
 */
export interface UnitContext {
  pages: PageSource;
  localizer: HtmlAssetLocalizer;
  scripts: ScriptDeferrer;
  materializer: AssetMaterializer;
  renderer: TemplateRenderer;
  tree: ContentTree;
  handlers: ReadonlyMap<string, UnitHandler>;
  archiveRoot: string;
  /** Instance root; unit content resolves relative references against it */
  instanceLocation: NetworkLocation;
  videoFormat: VideoFormat;
  autoplay: boolean;
  site: SiteContext;
  logger: LoggingService;
}

/**
 * Behavior of one family of unit types
 */
export interface UnitHandler {
  /** Whether units of this type write an index.html */
  readonly pageProducing: boolean;
  /** Fetch and localize the unit's content */
  download(unit: ContentUnit, ctx: UnitContext): Promise<void>;
  /** Markup of the unit; page-producing units also write their page */
  render(unit: ContentUnit, ctx: UnitContext): Promise<string>;
}

/**
 * Handler registered for a unit's type
 * @throws Error when the type has none, which the tree builder prevents
 */
export function handlerFor(ctx: UnitContext, unit: ContentUnit): UnitHandler {
  const handler = ctx.handlers.get(unit.type);
  if (!handler) {
    throw new Error(`No handler for unit type ${unit.type}`);
  }
  return handler;
}

/**
 * Path context of a unit's content: assets go to the unit's own directory,
 * the markup ends up in the page of its nearest page-producing ancestor.
 */
export function unitContentContext(unit: ContentUnit, ctx: UnitContext): RelativePathContext {
  const page = unit.owningPage() ?? unit;
  return RelativePathContext.create({
    targetDir: path.join(ctx.archiveRoot, unit.relativePath),
    pathToTargetDir: path.posix.relative(page.relativePath, unit.relativePath),
    pathToRoot: page.pathToRoot,
    location: ctx.instanceLocation,
  });
}

/**
 * From a unit's page to another page of the archive
 */
export function pageHref(from: ContentUnit, to: ContentUnit): string {
  return `${from.pathToRoot}${to.relativePath}/index.html`;
}
