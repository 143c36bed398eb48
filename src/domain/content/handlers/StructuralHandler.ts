import * as path from 'path';
import { OutlineEntry } from '../../../templates/types';
import { ContentUnit } from '../ContentUnit';
import { handlerFor, pageHref, UnitContext, UnitHandler } from './UnitHandler';

/**
 * course, chapter, sequential and vertical units. Only the course and its
 * verticals have a page; chapters and sequentials just group them.
 */
export class StructuralHandler implements UnitHandler {
  constructor(readonly pageProducing: boolean) {}

  async download(): Promise<void> {
    return;
  }

  async render(unit: ContentUnit, ctx: UnitContext): Promise<string> {
    const fragments = await this.renderDescendants(unit, ctx);

    if (unit.kind === 'course') {
      await ctx.renderer.renderToFile(this.pagePath(unit, ctx), 'course_page', {
        site: ctx.site,
        title: unit.displayName,
        pathToRoot: unit.pathToRoot,
        outline: this.outline(unit, unit),
      });
    } else if (unit.kind === 'vertical') {
      const verticals = ctx.tree.verticals();
      const index = verticals.indexOf(unit);
      const previous = index > 0 ? verticals[index - 1] : undefined;
      const next = index >= 0 && index < verticals.length - 1 ? verticals[index + 1] : undefined;

      await ctx.renderer.renderToFile(this.pagePath(unit, ctx), 'vertical_page', {
        site: ctx.site,
        title: unit.displayName,
        pathToRoot: unit.pathToRoot,
        breadcrumbs: this.breadcrumbs(unit),
        fragments,
        previous: previous && pageHref(unit, previous),
        next: next && pageHref(unit, next),
      });
    }

    return '';
  }

  private async renderDescendants(unit: ContentUnit, ctx: UnitContext): Promise<string[]> {
    const fragments: string[] = [];
    for (const child of unit.descendants) {
      if (child.status === 'failed') {
        fragments.push(
          await ctx.renderer.render('unavailable', {
            displayName: child.displayName,
            type: child.type,
            liveUrl: child.lmsWebUrl,
          })
        );
        continue;
      }
      const markup = await handlerFor(ctx, child).render(child, ctx);
      if (markup) {
        fragments.push(markup);
      }
    }
    return fragments;
  }

  private pagePath(unit: ContentUnit, ctx: UnitContext): string {
    return path.join(ctx.archiveRoot, unit.relativePath, 'index.html');
  }

  private breadcrumbs(unit: ContentUnit): string[] {
    const names: string[] = [];
    for (let current = unit.parent; current && current.kind !== 'course'; current = current.parent) {
      names.unshift(current.displayName);
    }
    return names;
  }

  /**
   * Chapters, sequentials and verticals below `unit`, linked from `page`
   */
  private outline(unit: ContentUnit, page: ContentUnit): OutlineEntry[] {
    return unit.descendants
      .filter((child) => child.kind !== 'leaf' && child.kind !== 'unsupported')
      .map((child) => ({
        title: child.displayName,
        href: child.pageProducing && child.status !== 'failed' ? pageHref(page, child) : undefined,
        children: child.kind === 'vertical' ? [] : this.outline(child, page),
      }));
  }
}
