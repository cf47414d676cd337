import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { findRepoRoot, findPackageRoot, isDirectory, isFile } from './root';

describe('findRepoRoot', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'contextpack-root-test-')));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('should find root with .git directory', async () => {
    const root = path.join(tmpDir, 'repo-git');
    await fs.mkdir(path.join(root, '.git'), { recursive: true });

    const subdir = path.join(root, 'Sources', 'App');
    await fs.mkdir(subdir, { recursive: true });

    expect(await findRepoRoot(subdir)).toBe(root);
  });

  it('should find root with .git file (worktree)', async () => {
    const root = path.join(tmpDir, 'worktree');
    await fs.mkdir(root, { recursive: true });
    await fs.writeFile(path.join(root, '.git'), 'gitdir: /elsewhere');

    expect(await findRepoRoot(root)).toBe(root);
  });
});

describe('findPackageRoot', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'contextpack-pkg-test-')));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('returns the nearest directory with a manifest', async () => {
    const pkg = path.join(tmpDir, 'Packages', 'Core');
    await fs.mkdir(path.join(pkg, 'Sources', 'Core'), { recursive: true });
    await fs.writeFile(path.join(pkg, 'Package.swift'), '// swift-tools-version:5.9');
    const file = path.join(pkg, 'Sources', 'Core', 'Model.swift');
    await fs.writeFile(file, 'struct Model {}');

    expect(await findPackageRoot(file, tmpDir, 'Package.swift')).toBe(pkg);
  });

  it('returns undefined when no manifest exists up to the boundary', async () => {
    await fs.mkdir(path.join(tmpDir, 'App'), { recursive: true });
    const file = path.join(tmpDir, 'App', 'Main.swift');
    await fs.writeFile(file, '');

    expect(await findPackageRoot(file, tmpDir, 'Package.swift')).toBeUndefined();
  });

  it('finds a manifest at the boundary itself', async () => {
    await fs.writeFile(path.join(tmpDir, 'Package.swift'), '');
    const file = path.join(tmpDir, 'Main.swift');
    await fs.writeFile(file, '');

    expect(await findPackageRoot(file, tmpDir, 'Package.swift')).toBe(tmpDir);
  });

  it('ignores a directory named like the manifest', async () => {
    await fs.mkdir(path.join(tmpDir, 'Package.swift'), { recursive: true });
    const file = path.join(tmpDir, 'Main.swift');
    await fs.writeFile(file, '');

    expect(await findPackageRoot(file, tmpDir, 'Package.swift')).toBeUndefined();
  });
});

describe('isFile / isDirectory', () => {
  it('reports missing paths as false', async () => {
    const missing = path.join(os.tmpdir(), 'contextpack-definitely-missing', 'x');
    expect(await isFile(missing)).toBe(false);
    expect(await isDirectory(missing)).toBe(false);
  });
});
