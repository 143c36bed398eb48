/**
 * Builds the content tree from the course blocks API payload
 */

import * as crypto from 'crypto';
import slugify from 'slugify';
import { ArchiveError, UnsupportedUnitError } from '../models/errors';
import { CourseBlocksResponse, RawCourseBlock } from '../models/types';
import { LoggingService } from '../../services/LoggingService';
import { ContentTree, ContentUnit, UnitKind } from './ContentUnit';

const STRUCTURAL_KINDS: ReadonlyMap<string, UnitKind> = new Map<string, UnitKind>([
  ['course', 'course'],
  ['chapter', 'chapter'],
  ['sequential', 'sequential'],
  ['vertical', 'vertical'],
]);

/** Type given to units substituted for unsupported ones */
export const UNAVAILABLE_TYPE = 'unavailable';

export interface ContentTreeBuilderOptions {
  /** Block types with a handler */
  supportedTypes: ReadonlySet<string>;
  /** Substitute unsupported blocks instead of failing */
  ignoreUnsupported: boolean;
  /** Token generator, random UUIDs by default */
  createToken?: () => string;
}

/**
 * Directory name for a display name
 */
export function slugFor(displayName: string, fallback: string): string {
  const options = { lower: true, strict: true };
  return slugify(displayName, options) || slugify(fallback, options) || 'unit';
}

export class ContentTreeBuilder {
  private readonly createToken: () => string;

  constructor(
    private readonly options: ContentTreeBuilderOptions,
    private readonly logger: LoggingService
  ) {
    this.createToken = options.createToken ?? (() => crypto.randomUUID());
  }

  build({ blocks, root }: CourseBlocksResponse): ContentTree {
    const rootBlock = blocks[root];
    if (!rootBlock) {
      throw new ArchiveError(`Root block ${root} missing from course blocks`);
    }

    const placed = new Set<string>();
    const rootUnit = this.makeUnit(blocks, rootBlock, null, 'course', new Map(), [], placed);
    this.logger.info(`Built content tree with ${placed.size} units`);
    return new ContentTree(rootUnit);
  }

  private makeUnit(
    blocks: Record<string, RawCourseBlock>,
    block: RawCourseBlock,
    parent: ContentUnit | null,
    parentPath: string,
    siblingSlugs: Map<string, number>,
    ancestors: string[],
    placed: Set<string>
  ): ContentUnit {
    placed.add(block.id);

    const slug = uniqueSlug(slugFor(block.display_name, block.block_id), siblingSlugs);
    const { kind, type } = this.classify(block);
    const unit = new ContentUnit({
      block,
      kind,
      type,
      relativePath: `${parentPath}/${slug}`,
      token: this.createToken(),
      parent,
    });

    const lineage = [...ancestors, block.id];
    const childSlugs = new Map<string, number>();
    for (const childId of block.descendants ?? []) {
      if (lineage.includes(childId)) {
        throw new ArchiveError(`Cycle in course blocks: ${[...lineage, childId].join(' -> ')}`);
      }
      const child = blocks[childId];
      if (!child) {
        this.logger.warn(`Block ${childId} listed under ${block.id} is missing, skipping`);
        continue;
      }
      if (placed.has(childId)) {
        this.logger.warn(`Block ${childId} already has a parent, skipping under ${block.id}`);
        continue;
      }
      unit.adopt(
        this.makeUnit(blocks, child, unit, unit.relativePath, childSlugs, lineage, placed)
      );
    }

    return unit;
  }

  private classify(block: RawCourseBlock): { kind: UnitKind; type: string } {
    const structural = STRUCTURAL_KINDS.get(block.type);
    if (structural) {
      return { kind: structural, type: block.type };
    }
    if (this.options.supportedTypes.has(block.type)) {
      return { kind: 'leaf', type: block.type };
    }
    if (!this.options.ignoreUnsupported) {
      throw new UnsupportedUnitError(block.type, block.student_view_url);
    }
    this.logger.warn(
      `Ignoring unsupported unit: ${block.type} URL: ${block.student_view_url}`
    );
    return { kind: 'unsupported', type: UNAVAILABLE_TYPE };
  }
}

function uniqueSlug(slug: string, used: Map<string, number>): string {
  const count = used.get(slug) ?? 0;
  used.set(slug, count + 1);
  return count === 0 ? slug : `${slug}-${count + 1}`;
}
