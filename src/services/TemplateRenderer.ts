/**
 * Renders page and fragment templates to markup
 */

import * as fs from 'fs';
import * as path from 'path';
import { Markup } from '../templates/layout';
import { audioPlayer, unavailable, unitFragment, video } from '../templates/fragments';
import { bookNav, coursePage, home, redirect, specificPage, verticalPage } from '../templates/pages';
import { TemplateName, TemplateVariables } from '../templates/types';

export type TemplateTable = {
  readonly [K in TemplateName]: (vars: TemplateVariables[K]) => Markup;
};

export const DEFAULT_TEMPLATES: TemplateTable = Object.freeze({
  video,
  audio_player: audioPlayer,
  unit_fragment: unitFragment,
  unavailable,
  course_page: coursePage,
  vertical_page: verticalPage,
  specific_page: specificPage,
  booknav: bookNav,
  home,
  redirect,
});

/** Static files copied to <archive>/assets */
export const DEFAULT_ASSETS_DIR = path.resolve(__dirname, '../../assets');

/**
 * Created once per run and shared read-only by every component that
 * produces markup.
 */
export class TemplateRenderer {
  constructor(private readonly templates: TemplateTable = DEFAULT_TEMPLATES) {}

  async render<K extends TemplateName>(name: K, vars: TemplateVariables[K]): Promise<string> {
    const template: (vars: TemplateVariables[K]) => Markup = this.templates[name];
    return String(await template(vars));
  }

  /**
   * Render a template into a file, creating parent directories
   */
  async renderToFile<K extends TemplateName>(
    filePath: string,
    name: K,
    vars: TemplateVariables[K]
  ): Promise<void> {
    const markup = await this.render(name, vars);
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    await fs.promises.writeFile(filePath, markup, 'utf-8');
  }

  /**
   * Copy the static assets the templates link to into the archive
   */
  async copyAssets(archiveRoot: string, assetsDir: string = DEFAULT_ASSETS_DIR): Promise<void> {
    await fs.promises.cp(assetsDir, path.join(archiveRoot, 'assets'), { recursive: true });
  }
}
