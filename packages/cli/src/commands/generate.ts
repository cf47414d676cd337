import path from 'node:path';
import { Command } from 'commander';
import { ConfigLoader, ContextPipeline, resolveRepoRoot } from '@contextpack/core';
import { ConsoleLogger, atomicWrite, createRunConfig } from '@contextpack/shared';
import type { RunFlags } from '@contextpack/shared';
import { OutputRenderer } from '../output/renderer';
import { SystemClipboard } from '../utils/clipboard';
import type { Clipboard } from '../utils/clipboard';

export interface GenerateOptions {
  slim?: boolean;
  singular?: boolean;
  forceGlobal?: boolean;
  includeReferences?: boolean;
  diffWith?: string;
  exclude: string[];
  root?: string;
  output?: string;
}

export interface GlobalOptions {
  json?: boolean;
  config?: string;
  verbose?: boolean;
}

export interface GenerateDeps {
  clipboard?: Clipboard;
  cwd?: () => string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function toRunFlags(options: GenerateOptions, verbose: boolean): Partial<RunFlags> {
  return {
    slim: !!options.slim,
    singular: !!options.singular,
    forceGlobal: !!options.forceGlobal,
    includeReferences: !!options.includeReferences,
    diffWith: options.diffWith,
    excludes: options.exclude,
    verbose,
  };
}

export function registerGenerateCommand(program: Command, deps: GenerateDeps = {}) {
  program
    .command('generate', { isDefault: true })
    .description('Bundle the instruction file and the files it depends on')
    .option('--slim', 'Keep only the instruction file and model-like files')
    .option('--singular', 'Keep only the instruction file')
    .option('--force-global', 'Search the whole repository, ignoring package boundaries')
    .option('--include-references', 'Add files that use the enclosing type')
    .option('--diff-with <branch>', 'Append the diff of each file against a branch')
    .option('--exclude <basename>', 'Drop files with this basename (repeatable)', collect, [])
    .option('--root <dir>', 'Repository root (defaults to the enclosing git repository)')
    .option('--output <path>', 'Write the bundle to a file instead of the clipboard')
    .action(async (options: GenerateOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const verbose = !!globalOpts.verbose;
      const renderer = new OutputRenderer(!!globalOpts.json, verbose);

      const cwd = deps.cwd ? deps.cwd() : process.cwd();
      const logger = new ConsoleLogger({ verbose });
      const repoRoot = await resolveRepoRoot(options.root, cwd);
      const settings = ConfigLoader.load({ configPath: globalOpts.config, cwd: repoRoot });
      const config = createRunConfig(settings, toRunFlags(options, verbose));

      if (verbose) renderer.log(`Repository root: ${repoRoot}`);

      const result = await new ContextPipeline({ logger }).run({ repoRoot, config });

      let outputPath: string | undefined;
      if (options.output) {
        outputPath = path.resolve(cwd, options.output);
        await atomicWrite(outputPath, result.bundle.text);
      } else {
        await (deps.clipboard ?? new SystemClipboard()).write(result.bundle.text);
      }

      renderer.render({
        destination: outputPath ? 'file' : 'clipboard',
        outputPath,
        repoRoot,
        searchRoot: result.searchRoot,
        instructionFile: result.instruction.filePath,
        instruction: result.instruction.marker.rawLine,
        typeNames: result.typeNames,
        files: result.files,
        size: result.bundle.size,
        warnings: result.warnings,
      });
    });
}
