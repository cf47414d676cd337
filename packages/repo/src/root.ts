import * as fs from 'fs/promises';
import * as path from 'path';
import { RepoRootError } from '@contextpack/shared';

/**
 * Finds the repository root starting from the given directory: the nearest
 * parent containing `.git` (a directory, or a file for worktrees).
 */
export async function findRepoRoot(cwd: string = process.cwd()): Promise<string> {
  const root = path.parse(cwd).root;
  let currentDir = path.resolve(cwd);

  while (true) {
    if (await exists(path.join(currentDir, '.git'))) {
      return currentDir;
    }

    if (currentDir === root) {
      break;
    }
    currentDir = path.dirname(currentDir);
  }

  throw new RepoRootError(
    `Could not detect repository root from ${cwd}. Ensure you are inside a git repository.`,
  );
}

/**
 * Walks up from the directory of `filePath` and returns the nearest directory
 * containing `manifest`, never going above `stopAt`.
 */
export async function findPackageRoot(
  filePath: string,
  stopAt: string,
  manifest: string,
): Promise<string | undefined> {
  const boundary = path.resolve(stopAt);
  let currentDir = path.dirname(path.resolve(filePath));

  while (true) {
    if (await isFile(path.join(currentDir, manifest))) {
      return currentDir;
    }
    if (currentDir === boundary) {
      return undefined;
    }
    const parent = path.dirname(currentDir);
    if (parent === currentDir || !isInside(parent, boundary)) {
      return undefined;
    }
    currentDir = parent;
  }
}

function isInside(dir: string, boundary: string): boolean {
  const rel = path.relative(boundary, dir);
  return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel));
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

export async function isFile(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isFile();
  } catch {
    return false;
  }
}

export async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch {
    return false;
  }
}
