import { html, raw } from 'hono/html';
import { Markup, pageLayout } from './layout';
import {
  BookNavVariables,
  CoursePageVariables,
  HomeVariables,
  OutlineEntry,
  RedirectVariables,
  SpecificPageVariables,
  VerticalPageVariables,
} from './types';

function outlineList(entries: OutlineEntry[]): Markup {
  return html`<ul class="outline">
  ${entries.map(
    (entry) => html`<li>
    ${entry.href ? html`<a href="${entry.href}">${entry.title}</a>` : html`<span>${entry.title}</span>`}
    ${entry.children.length > 0 ? outlineList(entry.children) : ''}
  </li>`
  )}
</ul>`;
}

export function coursePage(vars: CoursePageVariables): Markup {
  return pageLayout(
    vars,
    html`<h1>${vars.title}</h1>
${outlineList(vars.outline)}`
  );
}

export function verticalPage(vars: VerticalPageVariables): Markup {
  return pageLayout(
    vars,
    html`<nav class="breadcrumbs">${vars.breadcrumbs.join(' › ')}</nav>
<h1>${vars.title}</h1>
${vars.fragments.map((fragment) => raw(fragment))}
<nav class="sequence-nav">
  ${vars.previous ? html`<a class="previous" href="${vars.previous}">Previous</a>` : ''}
  ${vars.next ? html`<a class="next" href="${vars.next}">Next</a>` : ''}
</nav>`
  );
}

/**
 * Extra page reached from the course tabs
 */
export function specificPage(vars: SpecificPageVariables): Markup {
  return pageLayout(vars, html`<h1>${vars.title}</h1>${raw(vars.content)}`);
}

export function bookNav(vars: BookNavVariables): Markup {
  return pageLayout(
    vars,
    html`<h1>${vars.title}</h1>
<ul class="book-list">
  ${vars.books.map((book) => html`<li><a href="${book.url}">${book.name}</a></li>`)}
</ul>`
  );
}

export function home(vars: HomeVariables): Markup {
  return pageLayout(
    vars,
    html`<section class="welcome">
  ${vars.messages.map((message) => html`<article class="article-content">${raw(message)}</article>`)}
</section>`
  );
}

/**
 * Root index of an archive without a homepage
 */
export function redirect(vars: RedirectVariables): Markup {
  return html`<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="UTF-8" />
    <meta http-equiv="refresh" content="0; url=${vars.target}" />
    <title>${vars.title}</title>
  </head>
  <body><a href="${vars.target}">${vars.title}</a></body>
</html>
`;
}
