const DECLARATION = /\b(?:class|struct|enum|protocol|extension|actor)\s+([A-Za-z_][A-Za-z0-9_]*)/;

/**
 * Name of the type declaration that lexically contains `line` (1-based): the
 * last declaration at or above it, else the first declaration in the file.
 * Comment lines are never declarations.
 */
export function extractEnclosingType(text: string, line?: number): string | undefined {
  const lines = text.split(/\r?\n/);
  let before: string | undefined;
  let first: string | undefined;

  for (let i = 0; i < lines.length; i++) {
    const trimmed = lines[i].trim();
    if (trimmed.startsWith('//') || trimmed.startsWith('*') || trimmed.startsWith('/*')) continue;
    const match = DECLARATION.exec(lines[i]);
    if (!match) continue;

    first ??= match[1];
    if (line === undefined || i + 1 <= line) {
      before = match[1];
    }
  }

  return line === undefined ? first : before ?? first;
}
