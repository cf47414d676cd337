import { RegexCompileError } from '@contextpack/shared';
import type { RunConfig } from '@contextpack/shared';
import type { SearchRoot } from '../scope/resolver';
import { escapeRegExp, findMatchingFiles } from '../search/text-search';
import type { StageDeps } from '../types';
import type { DefinitionResolver } from './types';

/**
 * Builds `\b(?:class|struct|…)\s+(?:A|B|…)\b`.
 */
export function buildDeclarationPattern(
  typeNames: readonly string[],
  keywords: readonly string[],
): RegExp {
  const source = `\\b(?:${keywords.join('|')})\\s+(?:${typeNames.map(escapeRegExp).join('|')})\\b`;
  try {
    return new RegExp(source);
  } catch (error) {
    throw new RegexCompileError(source, { cause: error });
  }
}

/**
 * Lexical definition search. A file qualifies when a declaration keyword is
 * followed by a candidate name anywhere in its text, comments included.
 */
export class RegexDefinitionResolver implements DefinitionResolver {
  constructor(private readonly deps: StageDeps) {}

  async findDefinitions(
    typeNames: readonly string[],
    searchRoots: readonly SearchRoot[],
    config: RunConfig,
  ): Promise<string[]> {
    const logger = this.deps.logger.child({ stage: 'definitions' });
    if (typeNames.length === 0) {
      await logger.debug('No candidate types; skipping definition search');
      return [];
    }

    const pattern = buildDeclarationPattern(typeNames, config.settings.languages.declarationKeywords);
    await logger.debug(`Final regex pattern: ${pattern.source}`);

    const files = await findMatchingFiles(
      searchRoots.map((root) => root.path),
      pattern,
      config,
      this.deps,
      logger,
    );
    await logger.debug(`Total unique files found: ${files.length}`);
    return files;
  }
}
