// src/services/__tests__/CourseCatalog.test.ts
import { CourseCatalog, courseIdFromUrl } from '../CourseCatalog';
import { ConfigError, RequiredResourceError } from '../../domain/models/errors';
import { InstanceProfile } from '../../domain/models/types';
import { FakePageSource, silentLogger } from '../../__tests__/fakes';
import { COURSE_URL, ORIGIN, sampleCourseBlocks } from '../../__tests__/fixtures';

describe('CourseCatalog', () => {
  const profile: InstanceProfile = {
    coursePrefix: '/courses/',
    coursePageName: '/course',
    apiBase: '/api/courses/v1',
  };
  const courseId = 'course-v1%3AOrg%2BX%2B1';
  const blocksQuery =
    'depth=all&requested_fields=graded,format,student_view_multi_device' +
    '&student_view_data=video,discussion&block_counts=video,discussion,problem&nav_depth=3';

  describe('courseIdFromUrl', () => {
    it('should encode the course id', () => {
      expect(courseIdFromUrl(COURSE_URL, profile)).toBe(courseId);
    });

    it('should keep ids that are already encoded', () => {
      expect(courseIdFromUrl(`${ORIGIN}/courses/${courseId}/course`, profile)).toBe(courseId);
    });

    it('should reject URLs outside the course layout', () => {
      expect(() => courseIdFromUrl(`${ORIGIN}/dashboard`, profile)).toThrow(ConfigError);
    });
  });

  describe('getCourseInfo', () => {
    it('should request the course with the username', async () => {
      const infoPath = `/api/courses/v1/courses/${courseId}?username=learner`;
      const pages = new FakePageSource({}, { [infoPath]: { id: 'course-v1:Org+X+1', name: 'Intro to Testing' } });
      const catalog = new CourseCatalog(pages, profile, silentLogger(), 'learner');

      const info = await catalog.getCourseInfo(courseId);

      expect(pages.requested).toEqual([infoPath]);
      expect(info).toEqual({ id: 'course-v1:Org+X+1', name: 'Intro to Testing', org: '', short_description: undefined });
    });

    it('should reject payloads without a name', async () => {
      const infoPath = `/api/courses/v1/courses/${courseId}`;
      const catalog = new CourseCatalog(new FakePageSource({}, { [infoPath]: { id: 'x' } }), profile, silentLogger());

      await expect(catalog.getCourseInfo(courseId)).rejects.toThrow(RequiredResourceError);
    });
  });

  describe('getCourseBlocks', () => {
    it('should request every block and skip malformed ones', async () => {
      const blocksPath = `/api/courses/v1/blocks/?course_id=${courseId}&${blocksQuery}`;
      const payload = sampleCourseBlocks();
      const pages = new FakePageSource({}, {
        [blocksPath]: { root: payload.root, blocks: { ...payload.blocks, broken: { display_name: 'No type' } } },
      });
      const catalog = new CourseCatalog(pages, profile, silentLogger());

      const blocks = await catalog.getCourseBlocks(courseId);

      expect(pages.requested).toEqual([blocksPath]);
      expect(blocks.root).toBe(payload.root);
      expect(Object.keys(blocks.blocks)).toEqual(Object.keys(payload.blocks));
      expect(blocks.blocks[payload.root].descendants).toEqual(payload.blocks[payload.root].descendants);
      const video = Object.values(blocks.blocks).find((block) => block.type === 'video');
      expect(video?.student_view_data).toEqual({
        encoded_videos: { fallback: { url: 'https://cdn.example.org/intro.mp4', file_size: undefined } },
      });
    });

    it('should reject payloads without a root', async () => {
      const blocksPath = `/api/courses/v1/blocks/?course_id=${courseId}&${blocksQuery}`;
      const catalog = new CourseCatalog(new FakePageSource({}, { [blocksPath]: { blocks: {} } }), profile, silentLogger());

      await expect(catalog.getCourseBlocks(courseId)).rejects.toThrow(RequiredResourceError);
    });
  });
});
