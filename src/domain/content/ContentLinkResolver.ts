/**
 * Resolves links between course pages (jump-to deep links and course
 * tabs) to archived pages; everything else on the instance falls back
 * to the live site.
 */

import * as path from 'path';
import { URL } from 'url';
import { LoggingService } from '../../services/LoggingService';
import { hasNetworkLocation, hostnameOf, resolveReference } from '../urls/UrlResolver';
import { ContentTree, ContentUnit } from './ContentUnit';
import { CourseTabRegistry } from './CourseTabRegistry';

/**
 * What the HTML localizer needs to rewrite anchors
 */
export interface InternalLinkResolver {
  /**
   * @param pathToRoot - From the document holding the link to the archive root
   * @returns the rewritten href, or null to leave the link untouched
   */
  resolveInternalLink(href: string, pathToRoot: string): string | null;
}

export interface ContentLinkResolverOptions {
  /** Scheme and host of the archived instance */
  instanceOrigin: string;
  /** Path every course link starts with (course prefix + course id) */
  coursePathPrefix: string;
}

export class ContentLinkResolver implements InternalLinkResolver {
  private readonly maxSteps: number;
  private readonly instanceHost: string;
  private readonly origin: string;

  constructor(
    private readonly tree: ContentTree,
    private readonly tabs: CourseTabRegistry,
    private readonly options: ContentLinkResolverOptions,
    private readonly logger: LoggingService
  ) {
    this.maxSteps = tree.depth();
    this.origin = options.instanceOrigin.replace(/\/+$/, '');
    this.instanceHost = hostnameOf(this.origin);
  }

  resolveInternalLink(href: string, pathToRoot: string): string | null {
    const trimmed = href.trim();
    // document-relative links stay relative to the archived page
    if (!hasNetworkLocation(trimmed) && !trimmed.startsWith('/')) {
      return null;
    }

    const resolved = resolveReference(trimmed, { origin: this.origin, serverPath: '' }, this.instanceHost);
    if (resolved === null || resolved.kind !== 'internal') {
      return null;
    }

    let parsed: URL;
    try {
      parsed = new URL(resolved.url);
    } catch {
      return null;
    }

    const linkPath = parsed.pathname;
    if (linkPath.startsWith(this.options.coursePathPrefix)) {
      const target = linkPath.includes('jump_to')
        ? this.resolveJumpTo(linkPath)
        : this.tabs.lookup(linkPath);
      if (target !== null) {
        return pathToRoot + target;
      }
    }

    const live = `${this.origin}${linkPath}${parsed.search}${parsed.hash}`;
    this.logger.warn(`Link ${href} is not archived, pointing it at ${live}`);
    return live;
  }

  /**
   * Archive-relative page for a jump-to link path
   */
  resolveJumpTo(linkPath: string): string | null {
    const normalized = linkPath.replace(/\/+$/, '');
    const matched = this.findUnit(normalized);

    if (!matched) {
      const parentMatch = this.findUnit(path.posix.dirname(normalized));
      return parentMatch ? this.walkToPage(parentMatch) : null;
    }

    const page = this.walkToPage(matched);
    if (page !== null) {
      return page;
    }
    // at most one non-page layer sits below a page-producing unit
    return matched.parent ? this.walkToPage(matched.parent) : null;
  }

  private findUnit(linkPath: string): ContentUnit | undefined {
    const lastSegment = linkPath.split('/').pop() ?? '';
    if (lastSegment === '') {
      return undefined;
    }
    const usageKey = decodeSegment(lastSegment);

    return (
      this.tree.findByBlockId(lastSegment) ??
      this.tree.units.find((unit) => unit.block.id === usageKey || pathOf(unit.lmsWebUrl) === linkPath)
    );
  }

  /**
   * Follow first descendants to a page-producing unit, never past the
   * tree's depth; failed units end the walk
   */
  private walkToPage(start: ContentUnit): string | null {
    let current: ContentUnit | undefined = start;
    for (let step = 0; current && step <= this.maxSteps; step++) {
      if (current.status === 'failed') {
        return null;
      }
      if (current.pageProducing) {
        return `${current.relativePath}/index.html`;
      }
      current = current.descendants[0];
    }
    return null;
  }
}

function pathOf(url: string): string | null {
  try {
    return new URL(url).pathname;
  } catch {
    return null;
  }
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}
