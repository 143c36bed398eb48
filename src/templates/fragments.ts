import { html, raw } from 'hono/html';
import { Markup } from './layout';
import {
  AudioPlayerVariables,
  UnavailableVariables,
  UnitFragmentVariables,
  VideoVariables,
} from './types';

export function video({ format, videoPath, title, autoplay, subtitles }: VideoVariables): Markup {
  return html`<div class="video-player">
  ${title ? html`<h3>${title}</h3>` : ''}
  <video controls preload="metadata" style="max-width:100%"${autoplay ? raw(' autoplay') : ''}>
    <source src="${videoPath}" type="video/${format}" />
    ${subtitles.map(
      (track) => html`<track kind="subtitles" src="${track.src}" srclang="${track.srclang}" label="${track.label}" />`
    )}
  </video>
</div>`;
}

/**
 * Standalone page wrapping an audio file
 */
export function audioPlayer({ audioPath, format, title, pathToRoot }: AudioPlayerVariables): Markup {
  return html`<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="UTF-8" />
    <title>${title}</title>
    <link rel="stylesheet" href="${pathToRoot}assets/archive.css" />
  </head>
  <body class="audio-page">
    <h1>${title}</h1>
    <audio controls>
      <source src="${audioPath}" type="audio/${format}" />
    </audio>
    <p><a href="${audioPath}" download>${audioPath}</a></p>
  </body>
</html>
`;
}

export function unitFragment({ token, type, content }: UnitFragmentVariables): Markup {
  return html`<div class="xblock xblock-${type}" id="${token}">${raw(content)}</div>`;
}

export function unavailable({ displayName, type, liveUrl }: UnavailableVariables): Markup {
  return html`<div class="xblock xblock-unavailable">
  <h3>${displayName}</h3>
  <p>This content (${type}) is not available offline.</p>
  <p><a href="${liveUrl}">Open it on the course site</a></p>
</div>`;
}
