// src/domain/content/handlers/__tests__/index.test.ts
import { createHandlerTable } from '..';
import { FragmentHandler } from '../FragmentHandler';
import { FreeTextHandler } from '../FreeTextHandler';
import { PlaceholderHandler } from '../PlaceholderHandler';
import { VideoHandler } from '../VideoHandler';

describe('createHandlerTable', () => {
  const table = createHandlerTable();

  it('should show surveys as not available offline', () => {
    expect(table.get('qualtricssurvey')).toBeInstanceOf(PlaceholderHandler);
    expect(table.get('lti')).toBe(table.get('qualtricssurvey'));
  });

  it('should wire free text answers', () => {
    expect(table.get('freetextresponse')).toBeInstanceOf(FreeTextHandler);
  });

  it('should share one handler per family', () => {
    expect(table.get('html')).toBeInstanceOf(FragmentHandler);
    expect(table.get('problem')).toBe(table.get('html'));
    expect(table.get('libcast_xblock')).toBeInstanceOf(VideoHandler);
    expect(table.get('vertical')?.pageProducing).toBe(true);
    expect(table.get('sequential')?.pageProducing).toBe(false);
  });
});
