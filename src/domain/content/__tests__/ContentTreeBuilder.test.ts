// src/domain/content/__tests__/ContentTreeBuilder.test.ts
import { ContentTreeBuilder, slugFor } from '../ContentTreeBuilder';
import { ArchiveError, UnsupportedUnitError } from '../../models/errors';
import { CourseBlocksResponse } from '../../models/types';
import { silentLogger } from '../../../__tests__/fakes';
import {
  BLOCK_IDS,
  block,
  COURSE_PATH,
  sampleCourseBlocks,
  sequentialTokens,
  VERTICAL1_PATH,
  VERTICAL2_PATH,
} from '../../../__tests__/fixtures';

describe('ContentTreeBuilder', () => {
  const createBuilder = (ignoreUnsupported = false): ContentTreeBuilder =>
    new ContentTreeBuilder(
      {
        supportedTypes: new Set(['html', 'problem', 'video']),
        ignoreUnsupported,
        createToken: sequentialTokens(),
      },
      silentLogger()
    );

  const withExtraChild = (type: string): CourseBlocksResponse => {
    const course = sampleCourseBlocks();
    const extraId = 'block-v1:Org+X+1+type@survey+block@s1';
    course.blocks[extraId] = block(extraId, type, 'Survey');
    course.blocks[BLOCK_IDS.vertical2].descendants = [BLOCK_IDS.problem, extraId];
    return course;
  };

  it('should slugify display names with fallbacks', () => {
    expect(slugFor('Week 1: Basics!', 'ch1')).toBe('week-1-basics');
    expect(slugFor('!!!', 'Block ID')).toBe('block-id');
    expect(slugFor('', '')).toBe('unit');
  });

  it('should place units at slugged paths in depth-first order', () => {
    const tree = createBuilder().build(sampleCourseBlocks());

    expect(tree.units.map((unit) => unit.relativePath)).toEqual([
      COURSE_PATH,
      `${COURSE_PATH}/week-1`,
      `${COURSE_PATH}/week-1/lesson-1`,
      VERTICAL1_PATH,
      `${VERTICAL1_PATH}/welcome-text`,
      `${VERTICAL1_PATH}/intro-video`,
      VERTICAL2_PATH,
      `${VERTICAL2_PATH}/quiz-1`,
    ]);
    expect(tree.units.map((unit) => unit.token)).toEqual([
      'unit-1', 'unit-2', 'unit-3', 'unit-4', 'unit-5', 'unit-6', 'unit-7', 'unit-8',
    ]);
  });

  it('should derive kinds, root paths and owning pages', () => {
    const tree = createBuilder().build(sampleCourseBlocks());
    const html = tree.findByBlockId('def456');
    const chapter = tree.findByBlockId('ch1');

    expect(tree.root.kind).toBe('course');
    expect(tree.root.pathToRoot).toBe('../../');
    expect(html?.kind).toBe('leaf');
    expect(html?.pathToRoot).toBe('../../../../../../');
    expect(html?.owningPage()?.blockId).toBe('abc123');
    expect(chapter?.pageProducing).toBe(false);
    expect(chapter?.owningPage()).toBe(tree.root);
    expect(tree.verticals().map((unit) => unit.blockId)).toEqual(['abc123', 'ghi789']);
    expect(tree.depth()).toBe(5);
  });

  it('should fail on unsupported types by default', () => {
    expect(() => createBuilder().build(withExtraChild('survey'))).toThrow(UnsupportedUnitError);
  });

  it('should substitute unsupported types when asked to', () => {
    const tree = createBuilder(true).build(withExtraChild('survey'));
    const survey = tree.findByBlockId('s1');

    expect(survey?.kind).toBe('unsupported');
    expect(survey?.type).toBe('unavailable');
    expect(survey?.block.type).toBe('survey');
  });

  it('should skip missing and already placed children', () => {
    const course = sampleCourseBlocks();
    course.blocks[BLOCK_IDS.vertical2].descendants = [BLOCK_IDS.problem, 'missing', BLOCK_IDS.html];

    const tree = createBuilder().build(course);

    expect(tree.findByBlockId('ghi789')?.descendants.map((unit) => unit.blockId)).toEqual(['prob1']);
    expect(tree.units).toHaveLength(8);
  });

  it('should reject cycles', () => {
    const course = sampleCourseBlocks();
    course.blocks[BLOCK_IDS.html].descendants = [BLOCK_IDS.vertical1];

    expect(() => createBuilder().build(course)).toThrow(ArchiveError);
  });

  it('should reject a missing root', () => {
    expect(() => createBuilder().build({ root: 'nope', blocks: {} })).toThrow(ArchiveError);
  });
});
