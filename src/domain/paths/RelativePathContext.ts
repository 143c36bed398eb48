import * as path from 'path';
import { NetworkLocation } from '../models/types';
import { backJumps, joinFromDocument, rootFromAsset, segmentCount } from './PathAlgebra';

export interface RelativePathFields {
  /** Absolute directory where the document's assets are written */
  targetDir: string;
  /** Path from the document to targetDir ('' when they sit side by side) */
  pathToTargetDir: string;
  /** Path from the document to the archive root */
  pathToRoot: string;
  /** Where the document was served from */
  location: NetworkLocation;
}

/**
 * Position of one document inside the archive and on the network.
 *
 * Immutable: every derived context is built through descendInto() or
 * forSubDocument(), which update the relative paths and the network
 * location together.
 */
export class RelativePathContext implements RelativePathFields {
  readonly targetDir: string;
  readonly pathToTargetDir: string;
  readonly pathToRoot: string;
  readonly location: NetworkLocation;

  private constructor(fields: RelativePathFields) {
    this.targetDir = fields.targetDir;
    this.pathToTargetDir = fields.pathToTargetDir;
    this.pathToRoot = fields.pathToRoot;
    this.location = Object.freeze({ ...fields.location });
    Object.freeze(this);
  }

  static create(fields: RelativePathFields): RelativePathContext {
    return new RelativePathContext(fields);
  }

  /**
   * Context of a document written at the archive root with its assets beside it
   */
  static atRoot(archiveRoot: string, location: NetworkLocation): RelativePathContext {
    return new RelativePathContext({
      targetDir: archiveRoot,
      pathToTargetDir: '',
      pathToRoot: '',
      location,
    });
  }

  /**
   * Context of a document stored in `subdir` below this context's asset
   * directory, with its own assets beside it.
   */
  descendInto(subdir: string, location: NetworkLocation = this.location): RelativePathContext {
    const rootFromTarget = rootFromAsset(this.pathToTargetDir, this.pathToRoot);
    return new RelativePathContext({
      targetDir: path.join(this.targetDir, subdir),
      pathToTargetDir: '',
      pathToRoot: backJumps(segmentCount(subdir)) + rootFromTarget,
      location,
    });
  }

  /**
   * Context of an embedded document (iframe) saved in this asset directory
   */
  forSubDocument(location: NetworkLocation): RelativePathContext {
    return this.descendInto('', location);
  }

  /**
   * On-disk path of an asset file
   */
  assetPath(filename: string): string {
    return path.join(this.targetDir, filename);
  }

  /**
   * Reference to an asset file as written in the document
   */
  reference(filename: string): string {
    return joinFromDocument(this.pathToTargetDir, filename);
  }

  /**
   * Path from a generated file placed in the asset directory to the root
   */
  rootFromTargetDir(): string {
    return rootFromAsset(this.pathToTargetDir, this.pathToRoot);
  }
}
