import type { RegionMarkers } from './types';

/**
 * Keeps only the marked regions of a file. Each region is preceded by the
 * placeholder line, and a final placeholder stands for whatever follows the
 * last closed region. Marker lines are never emitted. Content without a start
 * marker is returned unchanged.
 */
export function filterRegions(content: string, markers: RegionMarkers): string {
  const lines = content.split('\n');
  if (!lines.some((line) => line.trim() === markers.start)) {
    return content;
  }

  const output: string[] = [];
  let inRegion = false;

  for (const line of lines) {
    const trimmed = line.trim();
    if (trimmed === markers.start) {
      if (!inRegion) {
        output.push(markers.placeholder);
        inRegion = true;
      }
      continue;
    }
    if (trimmed === markers.end) {
      inRegion = false;
      continue;
    }
    if (inRegion) {
      output.push(line);
    }
  }

  if (!inRegion) {
    output.push(markers.placeholder);
  }
  return output.join('\n');
}
