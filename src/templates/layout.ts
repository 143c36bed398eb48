import { html, raw } from 'hono/html';
import { PageVariables } from './types';

export type Markup = ReturnType<typeof html>;

/**
 * Full page shell: head, course header with tab navigation, main content
 */
export function pageLayout({ site, title, pathToRoot }: PageVariables, body: Markup | string): Markup {
  const content = typeof body === 'string' ? raw(body) : body;

  return html`<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="UTF-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1.0" />
    <title>${title} | ${site.courseName}</title>
    <link rel="stylesheet" href="${pathToRoot}assets/archive.css" />
    <script src="${pathToRoot}assets/archive.js"></script>
    ${site.stylesheets.map((sheet) => html`<link rel="stylesheet" href="${pathToRoot}${sheet}" />`)}
    ${site.headScripts.map((src) => html`<script defer src="${pathToRoot}${src}"></script>`)}
  </head>
  <body>
    <header class="course-header">
      <a class="course-name" href="${pathToRoot}${site.entryPage}">${site.courseName}</a>
      <span class="course-org">${site.org}</span>
      <nav class="course-tabs">
        <ul>
          ${site.tabs.map((tab) => html`<li><a href="${pathToRoot}${tab.path}">${tab.name}</a></li>`)}
        </ul>
      </nav>
    </header>
    <main>${content}</main>
    ${site.bodyScripts.map((src) => html`<script defer src="${pathToRoot}${src}"></script>`)}
  </body>
</html>
`;
}
