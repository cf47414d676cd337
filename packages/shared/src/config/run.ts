import type { Config } from './schema';

/**
 * Mode switches for one invocation.
 */
export interface RunFlags {
  /** Keep only the instruction file and model-like files */
  slim: boolean;
  /** Keep only the instruction file */
  singular: boolean;
  /** Search the whole repository even when the instruction file sits in a package */
  forceGlobal: boolean;
  /** Add files that mention the enclosing type */
  includeReferences: boolean;
  /** Branch to diff every included file against */
  diffWith?: string;
  /** Basenames dropped from the final file list */
  excludes: readonly string[];
  verbose: boolean;
}

/**
 * The immutable value threaded through every pipeline stage.
 */
export interface RunConfig {
  readonly settings: Readonly<Config>;
  readonly flags: Readonly<RunFlags>;
}

export const DEFAULT_RUN_FLAGS: RunFlags = {
  slim: false,
  singular: false,
  forceGlobal: false,
  includeReferences: false,
  excludes: [],
  verbose: false,
};

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export function createRunConfig(settings: Config, flags: Partial<RunFlags> = {}): RunConfig {
  return deepFreeze({
    settings: structuredClone(settings),
    flags: {
      ...DEFAULT_RUN_FLAGS,
      ...flags,
      excludes: [...(flags.excludes ?? [])],
    },
  });
}

/**
 * Returns a copy of `config` with some flags replaced.
 */
export function withFlags(config: RunConfig, flags: Partial<RunFlags>): RunConfig {
  return createRunConfig(config.settings, { ...config.flags, ...flags });
}
