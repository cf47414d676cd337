import { execa } from 'execa';
import { ProcessError } from '@contextpack/shared';

export interface Clipboard {
  write(text: string): Promise<void>;
}

export interface ClipboardCommand {
  command: string;
  args: string[];
}

/** Runs `command` with `input` on stdin; rejects on a non-zero exit. */
export type PipeRunner = (command: string, args: string[], input: string) => Promise<void>;

const execaRunner: PipeRunner = async (command, args, input) => {
  await execa(command, args, { input });
};

/**
 * Clipboard tools to try, in order, for a platform.
 */
export function clipboardCommands(platform: NodeJS.Platform): ClipboardCommand[] {
  switch (platform) {
    case 'darwin':
      return [{ command: 'pbcopy', args: [] }];
    case 'win32':
      return [{ command: 'clip', args: [] }];
    default:
      return [
        { command: 'wl-copy', args: [] },
        { command: 'xclip', args: ['-selection', 'clipboard'] },
      ];
  }
}

export class SystemClipboard implements Clipboard {
  constructor(
    private readonly platform: NodeJS.Platform = process.platform,
    private readonly run: PipeRunner = execaRunner,
  ) {}

  async write(text: string): Promise<void> {
    const commands = clipboardCommands(this.platform);
    let lastError: unknown;

    for (const { command, args } of commands) {
      try {
        await this.run(command, args, text);
        return;
      } catch (error) {
        lastError = error;
      }
    }

    const tried = commands.map((c) => c.command).join(', ');
    const exitCode =
      typeof lastError === 'object' && lastError !== null && 'exitCode' in lastError
        ? lastError.exitCode
        : undefined;
    throw new ProcessError(`Could not copy to the clipboard (tried ${tried}).`, {
      cause: lastError,
      exitCode: typeof exitCode === 'number' ? exitCode : undefined,
    });
  }
}
