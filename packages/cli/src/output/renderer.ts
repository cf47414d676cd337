import pc from 'picocolors';
import { relative } from '@contextpack/shared';

export interface OutputResult {
  destination: 'clipboard' | 'file';
  /** Set when the bundle was written to a file */
  outputPath?: string;
  repoRoot: string;
  searchRoot: string;
  instructionFile: string;
  instruction: string;
  typeNames: string[];
  files: string[];
  size: number;
  warnings: string[];
}

export class OutputRenderer {
  constructor(
    private isJson: boolean,
    private verbose = false,
  ) {}

  render(data: OutputResult): void {
    if (this.isJson) {
      console.log(JSON.stringify(data, null, 2));
    } else {
      this.renderHuman(data);
    }
  }

  private renderHuman(data: OutputResult): void {
    const noun = data.files.length === 1 ? 'file' : 'files';
    const summary = `${data.files.length} ${noun} (${data.size} characters)`;
    if (data.destination === 'file') {
      console.log(pc.green(`✅ Wrote ${summary} to ${data.outputPath}.`));
    } else {
      console.log(pc.green(`✅ Copied ${summary} to the clipboard.`));
    }

    if (this.verbose) {
      console.log(`  Instruction: ${relative(data.repoRoot, data.instructionFile)}`);
      console.log(`  Search root: ${data.searchRoot}`);
      console.log(`  Types: ${data.typeNames.length > 0 ? data.typeNames.join(', ') : '(none)'}`);
    }

    console.log(pc.bold('\nFiles:'));
    data.files.forEach((file) => console.log(`  - ${relative(data.repoRoot, file)}`));

    for (const warning of data.warnings) {
      console.log(pc.yellow(`\n${warning}`));
    }
  }

  log(message: string): void {
    if (this.isJson) {
      // JSON mode should not have logs
    } else {
      console.log(pc.gray(message));
    }
  }
}
