import path from 'node:path';
import { isWithinDirNamed } from '@contextpack/shared';
import type { RunConfig } from '@contextpack/shared';
import { isFile } from '../root';
import { scanExcludes } from '../scanner';
import { compareCodePoints } from '../symbols/extractor';
import type { StageDeps } from '../types';

export type SearchRootScope = 'package' | 'global';

export interface SearchRoot {
  path: string;
  scope: SearchRootScope;
}

/**
 * Decides which directories definition search walks.
 *
 * A root that is itself a package is searched alone. Otherwise the root is
 * searched together with every package found beneath it, so a monorepo of
 * independently buildable packages still has each package's tree covered.
 */
export class ScopeResolver {
  constructor(private readonly deps: StageDeps) {}

  async resolve(root: string, config: RunConfig): Promise<SearchRoot[]> {
    const logger = this.deps.logger.child({ stage: 'scope' });
    const { packageManifest } = config.settings.languages;
    const { buildDirs } = config.settings.scan;
    const absRoot = path.resolve(root);

    if (await isFile(path.join(absRoot, packageManifest))) {
      await logger.debug(`${absRoot} is a package root`);
      return [{ path: absRoot, scope: 'package' }];
    }

    const roots = new Map<string, SearchRoot>();
    if (!buildDirs.includes(path.basename(absRoot))) {
      roots.set(absRoot, { path: absRoot, scope: 'global' });
    }

    const snapshot = await this.deps.scanner.scan(absRoot, {
      excludes: scanExcludes(config.settings.scan),
      respectIgnoreFiles: false,
    });
    for (const file of snapshot.files) {
      if (path.basename(file.path) !== packageManifest) continue;
      if (isWithinDirNamed(file.path, buildDirs)) continue;
      const dir = path.dirname(file.absPath);
      if (!roots.has(dir)) {
        roots.set(dir, { path: dir, scope: 'package' });
      }
    }

    const result = [...roots.values()].sort((a, b) => compareCodePoints(a.path, b.path));
    await logger.debug(`Search roots (${result.length}): ${result.map((r) => r.path).join(', ')}`);
    return result;
  }
}
