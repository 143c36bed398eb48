import * as cheerio from 'cheerio';
import { ArchiveError } from '../../models/errors';
import { ContentUnit } from '../ContentUnit';
import { UnitContext, UnitHandler, unitContentContext } from './UnitHandler';

export const DEFAULT_CONTENT_SELECTORS = ['div.edx-notes-wrapper', 'div.course-wrapper'];

/**
 * Units whose student view is an HTML fragment (html, problem, surveys...)
 */
export class FragmentHandler implements UnitHandler {
  readonly pageProducing = false;

  /**
   * @param selectors - Containers tried in order to cut the unit out of its page
   * @param notice - Markup placed before the content
   */
  constructor(
    private readonly selectors: readonly string[] = DEFAULT_CONTENT_SELECTORS,
    private readonly notice = ''
  ) {}

  async download(unit: ContentUnit, ctx: UnitContext): Promise<void> {
    const page = await ctx.pages.getPage(unit.studentViewUrl);
    if (page === null) {
      throw new ArchiveError(`Failed to fetch ${unit.type} content: ${unit.studentViewUrl}`);
    }

    const context = unitContentContext(unit, ctx);
    const localized = await ctx.localizer.localize(this.prepare(this.extract(page), unit), context);
    unit.generatedHtml = await ctx.scripts.defer(localized, context);
  }

  async render(unit: ContentUnit, ctx: UnitContext): Promise<string> {
    return ctx.renderer.render('unit_fragment', {
      token: unit.token,
      type: unit.type,
      content: this.notice + unit.generatedHtml,
    });
  }

  /**
   * Adjust the extracted fragment before it is localized
   */
  protected prepare(fragment: string, _unit: ContentUnit): string {
    return fragment;
  }

  private extract(page: string): string {
    const $ = cheerio.load(page);
    for (const selector of this.selectors) {
      const match = $(selector).first();
      if (match.length > 0) {
        return $.html(match);
      }
    }
    return $('body').html() ?? page;
  }
}
