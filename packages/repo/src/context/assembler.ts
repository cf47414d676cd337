import path from 'node:path';
import { canonicalizeMarkers } from '../instruction/marker';
import { compareCodePoints } from '../symbols/extractor';
import { filterRegions } from './regions';
import type { AssembleInput, AssembleOptions, ContentBundle } from './types';

export const SECTION_SEPARATOR = '-'.repeat(50);

function stripTrailingNewlines(text: string): string {
  return text.replace(/\n+$/, '');
}

export function sizeWarning(size: number, threshold: number): string | undefined {
  if (size <= threshold) return undefined;
  return `Warning: the bundle is ${size} characters long, above the ${threshold}-character limit. The model may not accept all of it.`;
}

/**
 * Builds the final bundle text. Pure: the same input always yields the same
 * text.
 */
export function assembleBundle(input: AssembleInput, options: AssembleOptions): ContentBundle {
  const files = [...input.files].sort((a, b) => compareCodePoints(a.path, b.path));
  let body = '';

  for (const file of files) {
    const basename = path.basename(file.path);
    const content = stripTrailingNewlines(filterRegions(file.content, options.regions));
    body += `The contents of ${basename} is as follows:\n\n${content}\n\n${SECTION_SEPARATOR}\n`;

    const diff = file.diff ?? '';
    if (input.diffBranch && diff.length > 0) {
      body +=
        `The diff for ${basename} (against branch \`${input.diffBranch}\`) is as follows:\n\n` +
        `${stripTrailingNewlines(diff)}\n\n${SECTION_SEPARATOR}\n`;
    }
  }

  const text = `${stripTrailingNewlines(canonicalizeMarkers(body))}\n\n${input.instruction}`;
  const size = [...text].length;

  return {
    text,
    size,
    files: files.map((f) => f.path),
    warning: sizeWarning(size, options.sizeWarningThreshold),
  };
}
