import path from 'node:path';

/**
 * Normalizes a path to use forward slashes.
 *
 * @param p The path to normalize.
 * @returns The normalized path with forward slashes.
 */
export function normalizePath(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * A platform-agnostic version of `path.relative`.
 */
export function relative(from: string, to: string): string {
  return normalizePath(path.relative(from, to));
}

/**
 * Checks whether any directory segment of `p` is one of `dirNames`.
 * The final segment counts only when `p` names a directory.
 *
 * @param p An absolute or relative path.
 * @param dirNames Directory names such as `.build` or `Pods`.
 * @param isDirectory Treat the last segment as a directory too.
 */
export function isWithinDirNamed(p: string, dirNames: readonly string[], isDirectory = false): boolean {
  const segments = normalizePath(p).split('/').filter((s) => s.length > 0);
  const dirs = isDirectory ? segments : segments.slice(0, -1);
  return dirs.some((segment) => dirNames.includes(segment));
}
