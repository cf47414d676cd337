import { describe, it, expect, vi, beforeEach } from 'vitest';
import { execa } from 'execa';
import { ProcessError } from '@contextpack/shared';
import { SystemClipboard, clipboardCommands } from './clipboard';
import type { PipeRunner } from './clipboard';

vi.mock('execa', () => ({
  execa: vi.fn(),
}));

describe('clipboardCommands', () => {
  it('uses the platform tool', () => {
    expect(clipboardCommands('darwin')).toEqual([{ command: 'pbcopy', args: [] }]);
    expect(clipboardCommands('win32')).toEqual([{ command: 'clip', args: [] }]);
  });

  it('tries wayland before X11 on linux', () => {
    expect(clipboardCommands('linux')).toEqual([
      { command: 'wl-copy', args: [] },
      { command: 'xclip', args: ['-selection', 'clipboard'] },
    ]);
  });
});

describe('SystemClipboard', () => {
  beforeEach(() => {
    vi.mocked(execa).mockReset();
  });

  it('pipes the text through execa by default', async () => {
    const clipboard = new SystemClipboard('darwin');

    await clipboard.write('bundle text');

    expect(execa).toHaveBeenCalledWith('pbcopy', [], { input: 'bundle text' });
  });

  it('falls back to the next tool when one fails', async () => {
    const calls: string[] = [];
    const run: PipeRunner = async (command) => {
      calls.push(command);
      if (command === 'wl-copy') throw new Error('spawn wl-copy ENOENT');
    };

    await new SystemClipboard('linux', run).write('x');

    expect(calls).toEqual(['wl-copy', 'xclip']);
  });

  it('raises ProcessError when every tool fails', async () => {
    const failure = Object.assign(new Error('xclip failed'), { exitCode: 1 });
    const run: PipeRunner = async (command) => {
      if (command === 'xclip') throw failure;
      throw new Error('not found');
    };

    const error = await new SystemClipboard('linux', run).write('x').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProcessError);
    expect(error).toMatchObject({
      message: 'Could not copy to the clipboard (tried wl-copy, xclip).',
      exitCode: 1,
      cause: failure,
    });
  });
});
