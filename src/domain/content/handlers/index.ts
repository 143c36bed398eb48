import { FragmentHandler } from './FragmentHandler';
import { FreeTextHandler } from './FreeTextHandler';
import { PlaceholderHandler } from './PlaceholderHandler';
import { StructuralHandler } from './StructuralHandler';
import { UnitHandler } from './UnitHandler';
import { VideoHandler } from './VideoHandler';

export { handlerFor, unitContentContext, pageHref } from './UnitHandler';
export type { UnitContext, UnitHandler } from './UnitHandler';

/**
 * Block type to handler
 */
export function createHandlerTable(): ReadonlyMap<string, UnitHandler> {
  const page = new StructuralHandler(true);
  const grouping = new StructuralHandler(false);
  const fragment = new FragmentHandler();
  const video = new VideoHandler();
  const placeholder = new PlaceholderHandler();

  return new Map<string, UnitHandler>([
    ['course', page],
    ['chapter', grouping],
    ['sequential', grouping],
    ['vertical', page],
    ['html', fragment],
    ['problem', fragment],
    ['freetextresponse', new FreeTextHandler()],
    ['video', video],
    ['libcast_xblock', video],
    ['discussion', placeholder],
    ['qualtricssurvey', placeholder],
    ['lti', placeholder],
    ['drag-and-drop-v2', placeholder],
    ['unavailable', placeholder],
  ]);
}
