// src/__tests__/fixtures.ts
// A small course: one chapter, one lesson, two units
import { CourseBlocksResponse, RawCourseBlock } from '../domain/models/types';

export const ORIGIN = 'https://lms.example.org';
export const COURSE_KEY = 'course-v1:Org+X+1';
export const COURSE_URL = `${ORIGIN}/courses/${COURSE_KEY}/course`;

export const BLOCK_IDS = {
  course: 'block-v1:Org+X+1+type@course+block@course',
  chapter: 'block-v1:Org+X+1+type@chapter+block@ch1',
  sequential: 'block-v1:Org+X+1+type@sequential+block@seq1',
  vertical1: 'block-v1:Org+X+1+type@vertical+block@abc123',
  html: 'block-v1:Org+X+1+type@html+block@def456',
  video: 'block-v1:Org+X+1+type@video+block@vid1',
  vertical2: 'block-v1:Org+X+1+type@vertical+block@ghi789',
  problem: 'block-v1:Org+X+1+type@problem+block@prob1',
};

export function block(
  id: string,
  type: string,
  displayName: string,
  descendants?: string[],
  extra: Partial<RawCourseBlock> = {}
): RawCourseBlock {
  const blockId = id.split('@').pop() ?? id;
  return {
    id,
    block_id: blockId,
    type,
    display_name: displayName,
    descendants,
    student_view_url: `${ORIGIN}/xblock/${id}`,
    lms_web_url: `${ORIGIN}/courses/${COURSE_KEY}/jump_to/${id}`,
    ...extra,
  };
}

export function sampleCourseBlocks(): CourseBlocksResponse {
  const ids = BLOCK_IDS;
  const blocks = [
    block(ids.course, 'course', 'Intro to Testing', [ids.chapter]),
    block(ids.chapter, 'chapter', 'Week 1', [ids.sequential]),
    block(ids.sequential, 'sequential', 'Lesson 1', [ids.vertical1, ids.vertical2]),
    block(ids.vertical1, 'vertical', 'Welcome', [ids.html, ids.video]),
    block(ids.html, 'html', 'Welcome text'),
    block(ids.video, 'video', 'Intro video', undefined, {
      student_view_data: { encoded_videos: { fallback: { url: 'https://cdn.example.org/intro.mp4' } } },
    }),
    block(ids.vertical2, 'vertical', 'Welcome', [ids.problem]),
    block(ids.problem, 'problem', 'Quiz 1'),
  ];
  return {
    root: ids.course,
    blocks: Object.fromEntries(blocks.map((item) => [item.id, item])),
  };
}

export const COURSE_PATH = 'course/intro-to-testing';
export const VERTICAL1_PATH = `${COURSE_PATH}/week-1/lesson-1/welcome`;
export const VERTICAL2_PATH = `${COURSE_PATH}/week-1/lesson-1/welcome-2`;

/**
 * Token generator yielding unit-1, unit-2, ...
 */
export function sequentialTokens(): () => string {
  let next = 0;
  return () => `unit-${++next}`;
}
