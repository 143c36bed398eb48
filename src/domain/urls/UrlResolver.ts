/**
 * Turns references found in markup into absolute, fetchable URLs and
 * classifies them.
 */

import * as path from 'path';
import { URL } from 'url';
import { NetworkLocation } from '../models/types';

export type ReferenceKind = 'passthrough' | 'external' | 'internal';

export interface ResolvedReference {
  url: string;
  kind: ReferenceKind;
}

const PASSTHROUGH_PATTERN = /^(#|data:|:\/\/|javascript:|mailto:|tel:|blob:)/i;
const ABSOLUTE_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Check whether a reference must never be rewritten
 */
export function isPassthrough(raw: string): boolean {
  const trimmed = raw.trim();
  return trimmed === '' || PASSTHROUGH_PATTERN.test(trimmed);
}

/**
 * Check whether a reference carries its own network location
 */
export function hasNetworkLocation(raw: string): boolean {
  const trimmed = raw.trim();
  return trimmed.startsWith('//') || ABSOLUTE_PATTERN.test(trimmed);
}

/**
 * Make a reference absolute.
 *
 * Host-rooted references ("/x") only use the origin; other relative
 * references resolve against origin + serverPath.
 */
export function prepareUrl(raw: string, location: NetworkLocation): string {
  const trimmed = raw.trim();

  if (trimmed.startsWith('//')) {
    return `https:${trimmed}`;
  }
  if (ABSOLUTE_PATTERN.test(trimmed)) {
    return trimmed;
  }

  const origin = location.origin.replace(/\/+$/, '');
  if (trimmed.startsWith('/')) {
    return new URL(trimmed, `${origin}/`).href;
  }

  const serverPath = location.serverPath.replace(/^\/+|\/+$/g, '');
  const base = serverPath ? `${origin}/${serverPath}/` : `${origin}/`;
  return new URL(trimmed, base).href;
}

/**
 * Classify a reference relative to the archived host
 */
export function classifyReference(raw: string, archivedHost: string): ReferenceKind {
  if (isPassthrough(raw)) {
    return 'passthrough';
  }
  if (hasNetworkLocation(raw)) {
    try {
      const hostname = new URL(prepareUrl(raw, { origin: 'https://localhost', serverPath: '' })).hostname;
      return hostname === hostnameOf(archivedHost) ? 'internal' : 'external';
    } catch {
      return 'passthrough';
    }
  }
  return 'internal';
}

/**
 * Absolute URL plus classification
 * @returns null when the reference cannot be made absolute
 */
export function resolveReference(
  raw: string,
  location: NetworkLocation,
  archivedHost: string
): ResolvedReference | null {
  const kind = classifyReference(raw, archivedHost);
  if (kind === 'passthrough') {
    return { url: raw, kind };
  }
  try {
    return { url: prepareUrl(raw, location), kind };
  } catch {
    return null;
  }
}

/**
 * Location used to resolve references found inside the resource at `absoluteUrl`
 */
export function locationOf(absoluteUrl: string): NetworkLocation {
  const parsed = new URL(absoluteUrl);
  const pathname = parsed.pathname;
  const lastSegment = pathname.split('/').pop() ?? '';
  const directory = path.posix.extname(lastSegment)
    ? path.posix.dirname(pathname)
    : pathname;

  return {
    origin: parsed.origin,
    serverPath: directory.replace(/\/+$/, ''),
  };
}

/**
 * Hostname of an origin or bare host string
 */
export function hostnameOf(hostOrOrigin: string): string {
  if (ABSOLUTE_PATTERN.test(hostOrOrigin)) {
    return new URL(hostOrOrigin).hostname;
  }
  return hostOrOrigin.replace(/\/.*$/, '').replace(/:\d+$/, '');
}

/**
 * Inverse of quote_plus-style encoding ("+" is a space)
 */
export function unquotePlus(value: string): string {
  const spaced = value.replace(/\+/g, ' ');
  try {
    return decodeURIComponent(spaced);
  } catch {
    return spaced;
  }
}
