// src/domain/content/__tests__/CourseTabRegistry.test.ts
import { classifyTab, CourseTabRegistry, tabDirName } from '../CourseTabRegistry';

describe('CourseTabRegistry', () => {
  const coursePage = 'course/intro-to-testing/index.html';

  it('should name tabs after the last path segment', () => {
    expect(tabDirName('/courses/x/wiki/')).toBe('wiki');
    expect(tabDirName('/courses/x/syllabus?lang=en')).toBe('syllabus');
  });

  it('should classify tabs', () => {
    expect(classifyTab('course')).toBe('course');
    expect(classifyTab('courseware')).toBe('course');
    expect(classifyTab('info')).toBe('info');
    expect(classifyTab('discussion_forum')).toBe('excluded');
    expect(classifyTab('wiki')).toBe('excluded');
    expect(classifyTab('syllabus')).toBe('extra');
  });

  it('should map the course and info tabs without annexing', async () => {
    const registry = new CourseTabRegistry(coursePage);
    const annexer = jest.fn(async () => 'unused/index.html');

    await registry.register('Course, current location', '/courses/x/course/', annexer);
    await registry.register('  Home\n ', '/courses/x/info', annexer);

    expect(annexer).not.toHaveBeenCalled();
    expect(registry.list()).toEqual([
      { name: 'Course', path: coursePage },
      { name: 'Home', path: 'index.html' },
    ]);
  });

  it('should annex extra tabs once', async () => {
    const registry = new CourseTabRegistry(coursePage);
    const annexer = jest.fn(async (_href: string, dirName: string) => `${dirName}/index.html`);

    await registry.register('Syllabus', '/courses/x/syllabus', annexer);
    await registry.register('Syllabus again', '/courses/x/syllabus/', annexer);

    expect(annexer).toHaveBeenCalledTimes(1);
    expect(annexer).toHaveBeenCalledWith('/courses/x/syllabus', 'syllabus');
    expect(registry.lookup('/courses/x/syllabus')).toBe('syllabus/index.html');
  });

  it('should drop excluded tabs and tabs that cannot be annexed', async () => {
    const registry = new CourseTabRegistry(coursePage);
    const annexer = jest.fn(async () => null);

    expect(await registry.register('Wiki', '/courses/x/wiki', annexer)).toBeNull();
    expect(await registry.register('Progress', '/courses/x/progress', annexer)).toBeNull();

    expect(annexer).toHaveBeenCalledTimes(1);
    expect(registry.list()).toEqual([]);
  });

  it('should never annex on lookup', () => {
    const registry = new CourseTabRegistry(coursePage);

    expect(registry.lookup('/courses/x/progress')).toBeNull();
    expect(registry.lookup('/courses/x/courseware')).toBe(coursePage);
    expect(registry.lookup('/courses/x/forum')).toBeNull();
  });
});
