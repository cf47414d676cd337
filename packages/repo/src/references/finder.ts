import type { RunConfig } from '@contextpack/shared';
import { escapeRegExp, findMatchingFiles } from '../search/text-search';
import type { StageDeps } from '../types';

/**
 * Finds usage sites: every source file under a root that mentions a type name
 * as a whole word, declaration or not. Result size is unbounded.
 */
export class ReferenceFinder {
  constructor(private readonly deps: StageDeps) {}

  async findReferences(typeName: string, root: string, config: RunConfig): Promise<string[]> {
    const logger = this.deps.logger.child({ stage: 'references' });
    const pattern = new RegExp(`\\b${escapeRegExp(typeName)}\\b`);
    const files = await findMatchingFiles([root], pattern, config, this.deps, logger);
    await logger.debug(`${files.length} files reference ${typeName}`);
    return files;
  }
}
