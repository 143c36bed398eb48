/**
 * Course metadata and block structure from the platform REST API
 */

import { URL } from 'url';
import { ConfigError, RequiredResourceError } from '../domain/models/errors';
import {
  CourseBlocksResponse,
  CourseInfo,
  InstanceProfile,
  RawCourseBlock,
} from '../domain/models/types';
import { quotePlus } from '../domain/cache/CacheKey';
import { LoggingService } from './LoggingService';
import { PageSource } from './PlatformSession';

const BLOCKS_QUERY =
  'depth=all&requested_fields=graded,format,student_view_multi_device' +
  '&student_view_data=video,discussion&block_counts=video,discussion,problem&nav_depth=3';

/**
 * Course id as used in API paths (quote_plus encoded)
 * @throws ConfigError when the URL does not match the instance layout
 */
export function courseIdFromUrl(courseUrl: string, profile: InstanceProfile): string {
  const { pathname } = new URL(courseUrl);
  const start = pathname.indexOf(profile.coursePrefix);
  const end = pathname.lastIndexOf(profile.coursePageName);
  if (start !== 0 || end <= profile.coursePrefix.length) {
    throw new ConfigError(
      `Course URL ${courseUrl} does not match ${profile.coursePrefix}<course id>${profile.coursePageName}`
    );
  }

  const rawId = pathname.slice(profile.coursePrefix.length, end);
  // already encoded
  if (rawId.includes('%3')) {
    return rawId;
  }
  return quotePlus(rawId);
}

export class CourseCatalog {
  constructor(
    private readonly pages: PageSource,
    private readonly profile: InstanceProfile,
    private readonly logger: LoggingService,
    private readonly username?: string
  ) {}

  async getCourseInfo(courseId: string): Promise<CourseInfo> {
    this.logger.info('Getting course info ...');
    const apiPath = `${this.profile.apiBase}/courses/${courseId}${this.userQuery('?')}`;
    const raw = await this.pages.getApiJson(apiPath);

    if (!isRecord(raw) || typeof raw.name !== 'string') {
      throw new RequiredResourceError('course info', apiPath);
    }
    return {
      id: typeof raw.id === 'string' ? raw.id : courseId,
      name: raw.name,
      org: typeof raw.org === 'string' ? raw.org : '',
      short_description: typeof raw.short_description === 'string' ? raw.short_description : undefined,
    };
  }

  async getCourseBlocks(courseId: string): Promise<CourseBlocksResponse> {
    this.logger.info('Getting course blocks ...');
    const apiPath = `${this.profile.apiBase}/blocks/?course_id=${courseId}${this.userQuery('&')}&${BLOCKS_QUERY}`;
    const raw = await this.pages.getApiJson(apiPath);

    if (!isRecord(raw) || typeof raw.root !== 'string' || !isRecord(raw.blocks)) {
      throw new RequiredResourceError('course blocks', apiPath);
    }

    const blocks: Record<string, RawCourseBlock> = {};
    for (const [id, value] of Object.entries(raw.blocks)) {
      const block = parseBlock(id, value);
      if (block) {
        blocks[id] = block;
      } else {
        this.logger.warn(`Skipping malformed block ${id}`);
      }
    }
    return { root: raw.root, blocks };
  }

  private userQuery(separator: '?' | '&'): string {
    return this.username ? `${separator}username=${encodeURIComponent(this.username)}` : '';
  }
}

function parseBlock(id: string, value: unknown): RawCourseBlock | null {
  if (!isRecord(value) || typeof value.type !== 'string') {
    return null;
  }

  const descendants = Array.isArray(value.descendants)
    ? value.descendants.filter((item): item is string => typeof item === 'string')
    : undefined;

  const block: RawCourseBlock = {
    id: typeof value.id === 'string' ? value.id : id,
    block_id: typeof value.block_id === 'string' ? value.block_id : id,
    type: value.type,
    display_name: typeof value.display_name === 'string' ? value.display_name : '',
    descendants,
    student_view_url: typeof value.student_view_url === 'string' ? value.student_view_url : '',
    lms_web_url: typeof value.lms_web_url === 'string' ? value.lms_web_url : '',
  };

  const viewData = value.student_view_data;
  if (isRecord(viewData) && isRecord(viewData.encoded_videos)) {
    const encoded: Record<string, { url: string; file_size?: number }> = {};
    for (const [profile, video] of Object.entries(viewData.encoded_videos)) {
      if (isRecord(video) && typeof video.url === 'string') {
        encoded[profile] = {
          url: video.url,
          file_size: typeof video.file_size === 'number' ? video.file_size : undefined,
        };
      }
    }
    block.student_view_data = { encoded_videos: encoded };
  }

  return block;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
