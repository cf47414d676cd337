import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import nodeFs from 'node:fs/promises';
import * as path from 'path';
import * as os from 'os';
import { RepoScanner } from './index';
import { readTextOrEmpty } from './utils';
import { SilentLogger } from '@contextpack/shared';

describe('RepoScanner', () => {
  let tmpDir: string;
  let scanner: RepoScanner;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'contextpack-scanner-test-'));
    scanner = new RepoScanner();
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function createFiles(files: Record<string, string | Buffer>) {
    for (const [filePath, content] of Object.entries(files)) {
      const fullPath = path.join(tmpDir, filePath);
      await fs.mkdir(path.dirname(fullPath), { recursive: true });
      await fs.writeFile(fullPath, content);
    }
  }

  it('scans simple repo', async () => {
    await createFiles({
      'README.md': '# Hello',
      'Sources/App/Main.swift': 'print("hi")',
      'Package.swift': '// swift-tools-version:5.9',
    });

    const snapshot = await scanner.scan(tmpDir);
    expect(snapshot.root).toBe(tmpDir);
    expect(snapshot.files.map((f) => f.path)).toEqual([
      'Package.swift',
      'README.md',
      'Sources/App/Main.swift',
    ]);
    expect(snapshot.files[2].ext).toBe('swift');
  });

  it('respects default ignores and caller excludes', async () => {
    await createFiles({
      '.git/config': 'ignored',
      '.build/debug/Gen.swift': 'ignored',
      'Pods/Lib/Lib.h': 'ignored',
      'Sources/Kept.swift': 'kept',
    });

    const snapshot = await scanner.scan(tmpDir, { excludes: ['.build', 'Pods'] });
    expect(snapshot.files.map((f) => f.path)).toEqual(['Sources/Kept.swift']);
  });

  it('respects .gitignore and .contextpackignore', async () => {
    await createFiles({
      '.gitignore': '*.log\nsecret/',
      '.contextpackignore': 'Generated.swift',
      'app.log': 'ignored',
      'secret/Key.swift': 'ignored',
      'Generated.swift': 'ignored',
      'Model.swift': 'kept',
    });

    const snapshot = await scanner.scan(tmpDir);
    expect(snapshot.files.map((f) => f.path)).toEqual([
      '.contextpackignore',
      '.gitignore',
      'Model.swift',
    ]);
  });

  it('filters by extension case-insensitively', async () => {
    await createFiles({
      'A.swift': '',
      'B.H': '',
      'c.txt': '',
    });

    const snapshot = await scanner.scan(tmpDir, { extensions: ['swift', '.h'] });
    expect(snapshot.files.map((f) => f.path)).toEqual(['A.swift', 'B.H']);
  });

  it('detects binary files', async () => {
    await createFiles({
      'data.bin': Buffer.from([0x00, 0x01, 0x02]),
      'script.sh': '#!/bin/bash\necho hi',
      'image.png': 'fake png content',
    });

    const snapshot = await scanner.scan(tmpDir);
    expect(snapshot.files.find((f) => f.path === 'data.bin')?.isText).toBe(false);
    expect(snapshot.files.find((f) => f.path === 'script.sh')?.isText).toBe(true);
    expect(snapshot.files.find((f) => f.path === 'image.png')?.isText).toBe(false);
  });

  it('skips ignore files and soft defaults when respectIgnoreFiles is false', async () => {
    await createFiles({
      '.git/HEAD': 'ignored',
      '.gitignore': 'Generated/',
      '.contextpackignore': 'Local.swift',
      'Generated/Api.swift': 'kept',
      'DerivedData/Keep.swift': 'kept',
      'Local.swift': 'kept',
    });

    const snapshot = await scanner.scan(tmpDir, {
      extensions: ['swift'],
      respectIgnoreFiles: false,
    });
    expect(snapshot.files.map((f) => f.path)).toEqual([
      'DerivedData/Keep.swift',
      'Generated/Api.swift',
      'Local.swift',
    ]);
  });

  describe('caching', () => {
    it('caches scan results and busts the cache when options change', async () => {
      await createFiles({ 'a.txt': 'a', 'b.log': 'log' });
      const spiedFs = { ...nodeFs };
      const readdirSpy = vi.spyOn(spiedFs, 'readdir');
      const cachingScanner = new RepoScanner(spiedFs);

      const snapshot1 = await cachingScanner.scan(tmpDir);
      const snapshot2 = await cachingScanner.scan(tmpDir);
      expect(snapshot2).toBe(snapshot1);
      expect(readdirSpy).toHaveBeenCalledTimes(1);

      const snapshot3 = await cachingScanner.scan(tmpDir, { excludes: ['*.log'] });
      expect(snapshot3.files.map((f) => f.path)).toEqual(['a.txt']);
      expect(readdirSpy).toHaveBeenCalledTimes(2);
    });
  });
});

describe('readTextOrEmpty', () => {
  it('returns empty text for unreadable files', async () => {
    const text = await readTextOrEmpty(
      path.join(os.tmpdir(), 'contextpack-missing-dir', 'Nope.swift'),
      new SilentLogger(),
    );
    expect(text).toBe('');
  });
});
