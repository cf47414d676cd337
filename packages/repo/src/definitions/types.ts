import type { RunConfig } from '@contextpack/shared';
import type { SearchRoot } from '../scope/resolver';

/**
 * Maps candidate type names to the files that declare them. The regex
 * implementation is the only one today; an exact parser can replace it
 * without touching callers.
 */
export interface DefinitionResolver {
  /**
   * @returns Sorted, duplicate-free absolute paths.
   */
  findDefinitions(
    typeNames: readonly string[],
    searchRoots: readonly SearchRoot[],
    config: RunConfig,
  ): Promise<string[]>;
}
