import { ContentUnit } from '../ContentUnit';
import { UnitContext, UnitHandler } from './UnitHandler';

/**
 * Units that cannot work offline (discussions, LTI tools, surveys, drag and
 * drop) and substituted unsupported ones: a notice linking to the live unit
 */
export class PlaceholderHandler implements UnitHandler {
  readonly pageProducing = false;

  async download(): Promise<void> {
    return;
  }

  async render(unit: ContentUnit, ctx: UnitContext): Promise<string> {
    return ctx.renderer.render('unavailable', {
      displayName: unit.displayName,
      type: unit.block.type,
      liveUrl: unit.lmsWebUrl,
    });
  }
}
