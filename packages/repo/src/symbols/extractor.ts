/**
 * Candidate type-name extraction. Purely lexical: any capitalized identifier
 * is a candidate, and later stages simply find nothing for spurious names.
 */

const CANDIDATE_PATTERN = /^[A-Z][A-Za-z0-9]+$/;

/** Capitalized words the language reserves, plus the marker's own tokens */
export const NON_TYPE_WORDS: ReadonlySet<string> = new Set([
  'Self',
  'Type',
  'Protocol',
  'Any',
  'AnyObject',
  'TODO',
  'ChatGPT',
]);

export interface ExtractOptions {
  /** Additional words that never count as candidates */
  exclude?: Iterable<string>;
}

/**
 * Returns the sorted, duplicate-free candidate type names found in `text`.
 * Lines starting with `import ` contribute nothing.
 */
export function extractTypeNames(text: string, options: ExtractOptions = {}): string[] {
  const excluded = new Set([...NON_TYPE_WORDS, ...(options.exclude ?? [])]);
  const names = new Set<string>();

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.replace(/[^A-Za-z0-9]/g, ' ').trim();
    if (line.startsWith('import ')) {
      continue;
    }
    const tokens = line.split(/\s+/);
    for (const token of tokens) {
      if (CANDIDATE_PATTERN.test(token) && !excluded.has(token)) {
        names.add(token);
      }
    }
  }

  return [...names].sort(compareCodePoints);
}

/** Newline-delimited form, one identifier per line. */
export function formatTypeList(names: readonly string[]): string {
  return names.map((name) => `${name}\n`).join('');
}

export function compareCodePoints(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
