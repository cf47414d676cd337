import nodeFs from 'node:fs/promises';
import isBinaryPath from 'is-binary-path';
import type { Logger, ScanConfig } from '@contextpack/shared';

type Fs = typeof nodeFs;

export const ALWAYS_IGNORED = ['.git'];

export const DEFAULT_IGNORES = ['.DS_Store', 'DerivedData', '.swiftpm'];

export const IGNORE_FILES = ['.gitignore', '.contextpackignore'];

export async function isBinaryFile(filePath: string, fs: Fs = nodeFs): Promise<boolean> {
  // 1. Check extension
  if (isBinaryPath(filePath)) {
    return true;
  }

  // 2. Sample content for NUL bytes
  try {
    const handle = await fs.open(filePath, 'r');
    try {
      const buffer = Buffer.alloc(1024);
      const { bytesRead } = await handle.read(buffer, 0, 1024, 0);
      for (let i = 0; i < bytesRead; i++) {
        if (buffer[i] === 0) {
          return true;
        }
      }
      return false;
    } finally {
      await handle.close();
    }
  } catch {
    // Unreadable files are never searched, so treat them like binaries.
    return true;
  }
}

/**
 * Reads a file as UTF-8. A failed read yields empty text and a debug log line.
 */
export async function readTextOrEmpty(absPath: string, logger: Logger, fs: Fs = nodeFs): Promise<string> {
  try {
    return await fs.readFile(absPath, 'utf-8');
  } catch (error) {
    await logger.debug(
      `Could not read ${absPath}: ${error instanceof Error ? error.message : String(error)}`,
    );
    return '';
  }
}

/**
 * gitignore-style patterns for the build-artifact, vendor and configured
 * ignores of a run.
 */
export function scanExcludes(scan: ScanConfig): string[] {
  return [...scan.buildDirs, ...scan.vendorDirs, ...scan.ignore];
}
