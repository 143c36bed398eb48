import { RawCourseBlock } from '../models/types';
import { backJumps, segmentCount } from '../paths/PathAlgebra';

export type UnitKind = 'course' | 'chapter' | 'sequential' | 'vertical' | 'leaf' | 'unsupported';

export type UnitStatus = 'pending' | 'downloaded' | 'failed';

/** Kinds that write an index.html at their relative path */
export const PAGE_PRODUCING_KINDS: ReadonlySet<UnitKind> = new Set<UnitKind>(['course', 'vertical']);

export interface ContentUnitInit {
  block: RawCourseBlock;
  kind: UnitKind;
  /** Platform type, 'unavailable' when substituted for an unsupported one */
  type: string;
  relativePath: string;
  token: string;
  parent: ContentUnit | null;
}

/**
 * One node of the course structure
 */
export class ContentUnit {
  readonly blockId: string;
  readonly type: string;
  readonly kind: UnitKind;
  readonly displayName: string;
  readonly studentViewUrl: string;
  readonly lmsWebUrl: string;
  /** Directory of the unit, relative to the archive root (posix separators) */
  readonly relativePath: string;
  /** From the unit's directory to the archive root */
  readonly pathToRoot: string;
  /** DOM id used for in-page targeting */
  readonly token: string;
  readonly parent: ContentUnit | null;
  readonly block: RawCourseBlock;

  status: UnitStatus = 'pending';
  generatedHtml = '';

  private readonly children: ContentUnit[] = [];

  constructor(init: ContentUnitInit) {
    this.block = init.block;
    this.blockId = init.block.block_id;
    this.type = init.type;
    this.kind = init.kind;
    this.displayName = init.block.display_name;
    this.studentViewUrl = init.block.student_view_url;
    this.lmsWebUrl = init.block.lms_web_url;
    this.relativePath = init.relativePath;
    this.pathToRoot = backJumps(segmentCount(init.relativePath));
    this.token = init.token;
    this.parent = init.parent;
  }

  get descendants(): readonly ContentUnit[] {
    return this.children;
  }

  get pageProducing(): boolean {
    return PAGE_PRODUCING_KINDS.has(this.kind);
  }

  /**
   * Attach a child; only used while the tree is being built
   */
  adopt(child: ContentUnit): void {
    if (child.parent !== this) {
      throw new Error(`${child.blockId} does not belong to ${this.blockId}`);
    }
    this.children.push(child);
  }

  /**
   * Nearest page-producing ancestor, whose page displays this unit
   */
  owningPage(): ContentUnit | null {
    let current = this.parent;
    while (current && !current.pageProducing) {
      current = current.parent;
    }
    return current;
  }
}

/**
 * The built tree plus lookup helpers
 */
export class ContentTree {
  /** Every unit, depth-first pre-order */
  readonly units: readonly ContentUnit[];

  constructor(readonly root: ContentUnit) {
    const units: ContentUnit[] = [];
    const visit = (unit: ContentUnit): void => {
      units.push(unit);
      unit.descendants.forEach(visit);
    };
    visit(root);
    this.units = units;
  }

  findByBlockId(blockId: string): ContentUnit | undefined {
    return this.units.find((unit) => unit.blockId === blockId);
  }

  /**
   * Verticals in reading order
   */
  verticals(): ContentUnit[] {
    return this.units.filter((unit) => unit.kind === 'vertical');
  }

  /** Longest root-to-leaf path, in units */
  depth(): number {
    const measure = (unit: ContentUnit): number =>
      1 + unit.descendants.reduce((deepest, child) => Math.max(deepest, measure(child)), 0);
    return measure(this.root);
  }
}
