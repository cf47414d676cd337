import path from 'node:path';
import type { Logger, RunConfig } from '@contextpack/shared';
import { readTextOrEmpty, scanExcludes } from '../scanner';
import { compareCodePoints } from '../symbols/extractor';
import type { StageDeps } from '../types';
import { mapLimit } from '../utils/parallel';

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Walks every root and returns the sorted absolute paths of source files whose
 * full text matches `pattern`. A file reached from several roots is reported
 * once. Unreadable files count as empty. Ignore files are not consulted; only
 * the configured excludes prune the walk.
 */
export async function findMatchingFiles(
  roots: readonly string[],
  pattern: RegExp,
  config: RunConfig,
  deps: StageDeps,
  logger: Logger = deps.logger,
): Promise<string[]> {
  const { scan, languages } = config.settings;
  const matches = new Set<string>();
  const tester = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));

  for (const root of roots) {
    await logger.debug(`Searching in directory: ${root}`);
    const snapshot = await deps.scanner.scan(root, {
      excludes: scanExcludes(scan),
      extensions: languages.extensions,
      respectIgnoreFiles: false,
    });

    const results = await mapLimit(snapshot.files, scan.concurrency, async (file) => {
      const text = await readTextOrEmpty(file.absPath, logger);
      return tester.test(text);
    });

    for (let i = 0; i < snapshot.files.length; i++) {
      if (!results[i]) continue;
      const absPath = path.resolve(snapshot.files[i].absPath);
      if (matches.has(absPath)) continue;
      matches.add(absPath);
      await logger.debug(`Matched: ${absPath}`);
    }
  }

  return [...matches].sort(compareCodePoints);
}
