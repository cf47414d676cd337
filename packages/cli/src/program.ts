import { Command, CommanderError } from 'commander';
import { AppError, exitCodeFor } from '@contextpack/shared';
import { version } from '../package.json';
import { registerGenerateCommand } from './commands/generate';
import type { GenerateDeps, GlobalOptions } from './commands/generate';

export const name = '@contextpack/cli';

export function createProgram(deps: GenerateDeps = {}): Command {
  const program = new Command();

  program
    .name('contextpack')
    .description('Bundle an instruction and the code it refers to for a language model')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .exitOverride();

  registerGenerateCommand(program, deps);

  return program;
}

/**
 * Prints a failed run and returns the process exit code.
 */
export function reportError(e: unknown, opts: GlobalOptions): number {
  if (e instanceof CommanderError) {
    // commander has already printed its own message
    return e.exitCode === 0 ? 0 : 2;
  }

  if (opts.json) {
    if (e instanceof AppError) {
      console.log(
        JSON.stringify({
          error: {
            code: e.code,
            message: e.message,
            details: e.details,
          },
        }),
      );
    } else {
      console.log(
        JSON.stringify({
          error: {
            code: 'UnknownError',
            message: e instanceof Error ? e.message : String(e),
          },
        }),
      );
    }
  } else {
    // Human-readable output
    console.error(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`);
    if (e instanceof AppError && e.details) {
      console.error(
        `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
      );
    }
    if (opts.verbose && e instanceof Error && e.stack) {
      console.error(`\nStack Trace:\n${e.stack}`);
    } else {
      console.error(`\nFor more details, run with the --verbose flag.`);
    }
  }

  return exitCodeFor(e);
}
