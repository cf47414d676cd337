import path from 'node:path';
import { AmbiguousInstructionError, InstructionNotFoundError } from '@contextpack/shared';
import type { RunConfig } from '@contextpack/shared';
import { readTextOrEmpty, scanExcludes } from '../scanner';
import { mapLimit } from '../utils/parallel';
import type { StageDeps } from '../types';
import { findInstructionMarker } from './marker';
import type { InstructionMarker } from './marker';

export interface LocatedInstruction {
  /** Absolute path of the only file carrying a marker */
  filePath: string;
  marker: InstructionMarker;
}

/**
 * Finds the single file in a repository that carries an instruction marker.
 */
export class InstructionLocator {
  constructor(private readonly deps: StageDeps) {}

  async locate(repoRoot: string, config: RunConfig): Promise<LocatedInstruction> {
    const logger = this.deps.logger.child({ stage: 'instruction' });
    const snapshot = await this.deps.scanner.scan(repoRoot, {
      excludes: scanExcludes(config.settings.scan),
    });
    const textFiles = snapshot.files.filter((f) => f.isText);
    await logger.debug(`Scanning ${textFiles.length} text files under ${repoRoot}`);

    const markers = await mapLimit(textFiles, config.settings.scan.concurrency, async (file) => {
      const text = await readTextOrEmpty(file.absPath, logger);
      return findInstructionMarker(text);
    });

    const found: LocatedInstruction[] = [];
    textFiles.forEach((file, index) => {
      const marker = markers[index];
      if (marker) {
        found.push({ filePath: path.resolve(file.absPath), marker });
      }
    });

    if (found.length === 0) {
      throw new InstructionNotFoundError(
        `No file under ${repoRoot} contains an instruction ("// TODO: - " or "// TODO: ChatGPT: ").`,
      );
    }
    if (found.length > 1) {
      throw new AmbiguousInstructionError(found.map((f) => f.filePath).sort());
    }

    await logger.debug(`Instruction at ${found[0].filePath}:${found[0].marker.line}`);
    return found[0];
  }
}
