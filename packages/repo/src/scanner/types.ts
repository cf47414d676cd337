export interface ScanOptions {
  /** gitignore-style patterns skipped in addition to the defaults */
  excludes?: string[];
  /** Keep only files with these extensions (no leading dot, case-insensitive) */
  extensions?: string[];
  /** Honour .gitignore, .contextpackignore and the editor/tool defaults (default true) */
  respectIgnoreFiles?: boolean;
}

export interface RepoFileMeta {
  /** Path relative to the scanned root, forward slashes */
  path: string;
  absPath: string;
  sizeBytes: number;
  /** Lower-case extension without the dot */
  ext: string;
  isText: boolean;
}

export interface RepoSnapshot {
  root: string;
  files: RepoFileMeta[];
}
