import { CourseTabLink } from '../../templates/types';

/**
 * Fetches the page behind a tab and stores it under `dirName`.
 * Resolves to the page's path from the archive root, or null when the
 * page cannot be archived.
 */
export type TabAnnexer = (href: string, dirName: string) => Promise<string | null>;

export type TabClass = 'course' | 'info' | 'excluded' | 'extra';

const EXCLUDED_TABS = ['wiki', 'forum'];

/**
 * Directory name of a tab: the last segment of its path
 */
export function tabDirName(href: string): string {
  const pathname = href.split(/[?#]/, 1)[0].replace(/\/+$/, '');
  return pathname.split('/').pop() ?? '';
}

export function classifyTab(dirName: string): TabClass {
  if (dirName === 'course' || dirName.includes('courseware')) {
    return 'course';
  }
  if (dirName.includes('info')) {
    return 'info';
  }
  if (EXCLUDED_TABS.some((name) => dirName.includes(name))) {
    return 'excluded';
  }
  return 'extra';
}

/**
 * Table of the course navigation bar: tab name to archived page
 */
export class CourseTabRegistry {
  private readonly tabs: CourseTabLink[] = [];

  /**
   * @param coursePagePath - Course root page, relative to the archive root
   * @param infoPagePath - Page standing in for the course info tab
   */
  constructor(
    private readonly coursePagePath: string,
    private readonly infoPagePath: string = 'index.html'
  ) {}

  /**
   * Register a tab, annexing its page when it is not archived yet
   * @returns the registered tab, or null when the tab is not archived
   */
  async register(tabText: string, href: string, annexer: TabAnnexer): Promise<CourseTabLink | null> {
    const dirName = tabDirName(href);
    const name = tabText.replace(', current location', '').replace(/\s+/g, ' ').trim();

    let tabPath = this.knownPath(dirName);
    if (tabPath === null && classifyTab(dirName) === 'extra' && dirName !== '') {
      tabPath = await annexer(href, dirName);
    }
    if (tabPath === null || name === '') {
      return null;
    }

    const tab = { name, path: tabPath };
    this.tabs.push(tab);
    return tab;
  }

  /**
   * Archived page for a tab link, without annexing anything
   */
  lookup(href: string): string | null {
    return this.knownPath(tabDirName(href));
  }

  list(): CourseTabLink[] {
    return [...this.tabs];
  }

  private knownPath(dirName: string): string | null {
    switch (classifyTab(dirName)) {
      case 'course':
        return this.coursePagePath;
      case 'info':
        return this.infoPagePath;
      case 'excluded':
        return null;
      default: {
        const candidate = `${dirName}/index.html`;
        return this.tabs.some((tab) => tab.path === candidate) ? candidate : null;
      }
    }
  }
}
