import * as cheerio from 'cheerio';
import { ContentUnit } from '../ContentUnit';
import { DEFAULT_CONTENT_SELECTORS, FragmentHandler } from './FragmentHandler';

export const FREE_TEXT_NOTICE =
  '<div class="noanswers"><p><b>Warning:</b> there is no correction for free text answers.</p></div>';

/**
 * Give the answer box an id and make its save button keep the answer in the
 * browser (save_freetext in assets/archive.js)
 */
export function wireFreeTextAnswer(fragment: string, answerId: string): string {
  const $ = cheerio.load(fragment, null, false);
  const answer = $('textarea.student_answer').first();
  if (answer.length === 0) {
    return fragment;
  }
  answer.attr('id', answerId);
  $('button.save').first().attr('onclick', `save_freetext('${answerId}')`);
  return $.html();
}

/**
 * freetextresponse units: the fragment, with a notice that answers are not
 * graded offline
 */
export class FreeTextHandler extends FragmentHandler {
  constructor() {
    super(DEFAULT_CONTENT_SELECTORS, FREE_TEXT_NOTICE);
  }

  protected prepare(fragment: string, unit: ContentUnit): string {
    return wireFreeTextAnswer(fragment, unit.blockId);
  }
}
