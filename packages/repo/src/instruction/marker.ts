export type InstructionMarkerKind = 'legacy' | 'chatgpt';

export interface InstructionMarker {
  kind: InstructionMarkerKind;
  /** First matching line, left-trimmed */
  rawLine: string;
  /** 1-based line number of `rawLine` */
  line: number;
}

export const INSTRUCTION_MARKER_PATTERN = /\/\/ TODO: (ChatGPT: |- )/;

export const LEGACY_MARKER = '// TODO: - ';
export const CANONICAL_MARKER = '// TODO: ChatGPT: ';

/**
 * Returns the first instruction marker in `text`, if any.
 */
export function findInstructionMarker(text: string): InstructionMarker | undefined {
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const match = INSTRUCTION_MARKER_PATTERN.exec(lines[i]);
    if (match) {
      return {
        kind: match[1] === '- ' ? 'legacy' : 'chatgpt',
        rawLine: lines[i].trimStart(),
        line: i + 1,
      };
    }
  }
  return undefined;
}

/**
 * Rewrites every legacy marker to the canonical form.
 */
export function canonicalizeMarkers(text: string): string {
  return text.split(LEGACY_MARKER).join(CANONICAL_MARKER);
}
