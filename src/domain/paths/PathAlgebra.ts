/**
 * Relative path arithmetic between documents, their asset directories
 * and the archive root. Pure string operations, no I/O.
 */

const BACK_JUMP = '../';

/**
 * "../" repeated n times (empty for n <= 0)
 */
export function backJumps(count: number): string {
  return count > 0 ? BACK_JUMP.repeat(count) : '';
}

/**
 * Number of "../" occurrences in a relative path
 */
export function countBackJumps(relativePath: string): number {
  return relativePath.split(BACK_JUMP).length - 1;
}

/**
 * Number of real directory segments, ignoring empty and "." parts
 */
export function segmentCount(relativePath: string): number {
  return relativePath.split('/').filter((part) => part !== '' && part !== '.').length;
}

/**
 * Path from a file stored in the asset directory back to the archive root.
 *
 * @param pathToTargetDir - path from the document to its asset directory
 * @param pathToRoot - path from the document to the archive root
 */
export function rootFromAsset(pathToTargetDir: string, pathToRoot: string): string {
  if (pathToTargetDir === '') {
    return pathToRoot;
  }

  const rootJumps = countBackJumps(pathToRoot);
  const assetJumps = countBackJumps(pathToTargetDir);
  const forwardPart = pathToTargetDir.slice(assetJumps * BACK_JUMP.length);

  return backJumps(rootJumps - assetJumps + segmentCount(forwardPart));
}

/**
 * Reference to a file in the asset directory as written in the document
 */
export function joinFromDocument(pathToTargetDir: string, filename: string): string {
  return pathToTargetDir ? `${pathToTargetDir}/${filename}` : filename;
}
