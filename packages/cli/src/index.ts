#!/usr/bin/env tsx
import { createProgram, reportError } from './program';
import type { GlobalOptions } from './commands/generate';

const program = createProgram();

async function main() {
  try {
    await program.parseAsync(process.argv);
  } catch (e) {
    process.exit(reportError(e, program.opts<GlobalOptions>()));
  }
}

void main();
