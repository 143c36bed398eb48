import * as cheerio from 'cheerio';
import * as fs from 'fs';
import { stableHash } from '../../utils/hashing';
import { RelativePathContext } from '../paths/RelativePathContext';

const JAVASCRIPT_TYPES = ['text/javascript', 'application/javascript'];

const FULL_DOCUMENT = /^\s*(<!doctype|<html[\s>])/i;

/**
 * Defers every script of a fragment so unit content loads before its
 * scripts run. Inline scripts move to <hash>.js files beside the
 * document's assets.
 */
export class ScriptDeferrer {
  async defer(content: string, context: RelativePathContext): Promise<string> {
    const $ = FULL_DOCUMENT.test(content) ? cheerio.load(content) : cheerio.load(content, null, false);
    let changed = false;

    for (const element of $('script').toArray()) {
      const script = $(element);
      const type = script.attr('type');
      if ((type !== undefined && !JAVASCRIPT_TYPES.includes(type)) || script.attr('defer') !== undefined) {
        continue;
      }

      if (script.attr('src') !== undefined) {
        script.attr('defer', '');
        changed = true;
        continue;
      }

      const code = script.text().trim();
      if (!code) {
        continue;
      }

      const filename = `${stableHash(code.slice(0, 200))}.js`;
      await fs.promises.mkdir(context.targetDir, { recursive: true });
      await fs.promises.writeFile(context.assetPath(filename), code, 'utf-8');
      script.text('');
      script.attr('src', context.reference(filename));
      script.attr('defer', '');
      changed = true;
    }

    return changed ? $.html() : content;
  }
}
