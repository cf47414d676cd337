import { spawn } from 'child_process';
import { ProcessError, relative } from '@contextpack/shared';

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export type CommandRunner = (command: string, args: string[], cwd: string) => Promise<CommandResult>;

/**
 * Runs a command to completion and collects its output.
 * Rejects only when the process cannot be started.
 */
export const spawnCommand: CommandRunner = (command, args, cwd) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { cwd });
    let stdout = '';
    let stderr = '';

    child.stdout.on('data', (data) => {
      stdout += data.toString();
    });

    child.stderr.on('data', (data) => {
      stderr += data.toString();
    });

    child.on('close', (code) => {
      resolve({ stdout, stderr, exitCode: code ?? 1 });
    });

    child.on('error', (err) => {
      reject(new ProcessError(`Failed to start ${command} process: ${err.message}`, { cause: err }));
    });
  });

export interface GitServiceOptions {
  repoRoot: string;
  run?: CommandRunner;
}

export class GitService {
  private repoRoot: string;
  private run: CommandRunner;

  constructor(options: GitServiceOptions) {
    this.repoRoot = options.repoRoot;
    this.run = options.run ?? spawnCommand;
  }

  private async exec(args: string[]): Promise<string> {
    const result = await this.run('git', args, this.repoRoot);
    if (result.exitCode !== 0) {
      throw new ProcessError(`Git command failed: git ${args.join(' ')}\n${result.stderr}`, {
        exitCode: result.exitCode,
      });
    }
    return result.stdout;
  }

  /**
   * Whether `ref` names a commit in this repository.
   */
  async refExists(ref: string): Promise<boolean> {
    const result = await this.run(
      'git',
      ['rev-parse', '--verify', '--quiet', `${ref}^{commit}`],
      this.repoRoot,
    );
    return result.exitCode === 0;
  }

  /**
   * Unified diff of the working-tree file against `branch`; empty when identical.
   */
  async diffFileAgainst(branch: string, filePath: string): Promise<string> {
    const relPath = relative(this.repoRoot, filePath);
    const diff = await this.exec(['diff', branch, '--', relPath]);
    return diff.replace(/\s+$/, '');
  }
}
