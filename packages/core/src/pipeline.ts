import path from 'node:path';
import { UnsupportedModeError, UsageError, withFlags } from '@contextpack/shared';
import type { Logger, RunConfig } from '@contextpack/shared';
import {
  GitService,
  InstructionLocator,
  ReferenceFinder,
  RegexDefinitionResolver,
  RepoScanner,
  ScopeResolver,
  assembleBundle,
  compareCodePoints,
  extractEnclosingType,
  extractTypeNames,
  findPackageRoot,
  formatTypeList,
  findRepoRoot,
  isDirectory,
  mapLimit,
  readTextOrEmpty,
} from '@contextpack/repo';
import type {
  BundleFile,
  ContentBundle,
  DefinitionResolver,
  LocatedInstruction,
  SearchRoot,
  StageDeps,
} from '@contextpack/repo';

export interface PipelineDeps {
  logger: Logger;
  scanner?: RepoScanner;
  definitions?: DefinitionResolver;
  /** Builds the git boundary for a repository; used only with a diff branch */
  createGit?: (repoRoot: string) => GitService;
}

export interface PipelineInput {
  repoRoot: string;
  config: RunConfig;
}

export interface PipelineResult {
  repoRoot: string;
  /** Directory definition and reference search started from */
  searchRoot: string;
  searchRoots: SearchRoot[];
  instruction: LocatedInstruction;
  typeNames: string[];
  /** Absolute paths of every file in the bundle, sorted */
  files: string[];
  bundle: ContentBundle;
  warnings: string[];
  /** Flags after forced adjustments (e.g. singular for script files) */
  config: RunConfig;
}

/**
 * Resolves the repository to run against: an explicit `--root` directory, or
 * the nearest git repository above `cwd`.
 */
export async function resolveRepoRoot(root: string | undefined, cwd: string): Promise<string> {
  if (root === undefined) {
    return findRepoRoot(cwd);
  }
  const absRoot = path.resolve(cwd, root);
  if (!(await isDirectory(absRoot))) {
    throw new UsageError(`Root directory does not exist: ${absRoot}`);
  }
  return absRoot;
}

function containsAny(name: string, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => name.includes(keyword));
}

/**
 * Runs one bundle generation end to end: locate the instruction, decide the
 * file set, read contents and diffs, assemble.
 */
export class ContextPipeline {
  private readonly logger: Logger;
  private readonly stageDeps: StageDeps;
  private readonly definitions: DefinitionResolver;
  private readonly createGit: (repoRoot: string) => GitService;

  constructor(deps: PipelineDeps) {
    this.logger = deps.logger.child({ stage: 'pipeline' });
    this.stageDeps = { scanner: deps.scanner ?? new RepoScanner(), logger: deps.logger };
    this.definitions = deps.definitions ?? new RegexDefinitionResolver(this.stageDeps);
    this.createGit = deps.createGit ?? ((repoRoot) => new GitService({ repoRoot }));
  }

  async run(input: PipelineInput): Promise<PipelineResult> {
    const { repoRoot } = input;
    let config = input.config;
    const { languages, bundle: bundleSettings } = config.settings;
    const warnings: string[] = [];

    // 1. Instruction
    const instruction = await new InstructionLocator(this.stageDeps).locate(repoRoot, config);
    const instructionPath = instruction.filePath;
    const instructionName = path.basename(instructionPath);
    const ext = path.extname(instructionPath).slice(1).toLowerCase();
    await this.logger.debug(`Instruction file: ${instructionPath}`);

    // 2. Mode checks
    if (config.flags.includeReferences && ext !== languages.primaryExtension) {
      throw new UnsupportedModeError(
        `--include-references requires a .${languages.primaryExtension} instruction file; got ${instructionName}.`,
      );
    }
    if (languages.singularOnlyExtensions.includes(ext) && !config.flags.singular) {
      const warning = `${instructionName} is a .${ext} file; support is limited, so only the instruction file is included.`;
      warnings.push(warning);
      await this.logger.debug(warning);
      config = withFlags(config, { singular: true, slim: false });
    }

    // 3. Search root
    let searchRoot = repoRoot;
    if (!config.flags.forceGlobal) {
      searchRoot =
        (await findPackageRoot(instructionPath, repoRoot, languages.packageManifest)) ?? repoRoot;
    }
    await this.logger.debug(`Search root: ${searchRoot}`);

    // 4. File set
    const files = new Set<string>([instructionPath]);
    let typeNames: string[] = [];
    let searchRoots: SearchRoot[] = [];
    const instructionText = await readTextOrEmpty(instructionPath, this.logger);

    if (!config.flags.singular) {
      typeNames = extractTypeNames(instructionText);
      await this.logger.debug(`Candidate types:\n${formatTypeList(typeNames)}`);

      searchRoots = await new ScopeResolver(this.stageDeps).resolve(searchRoot, config);
      for (const file of await this.definitions.findDefinitions(typeNames, searchRoots, config)) {
        files.add(file);
      }

      if (config.flags.slim) {
        for (const file of [...files]) {
          const name = path.basename(file);
          if (file !== instructionPath && containsAny(name, bundleSettings.slimExcludeKeywords)) {
            files.delete(file);
          }
        }
      }
    }

    // 5. References
    if (config.flags.includeReferences) {
      const enclosing = extractEnclosingType(instructionText, instruction.marker.line);
      if (enclosing) {
        const refs = await new ReferenceFinder(this.stageDeps).findReferences(
          enclosing,
          searchRoot,
          config,
        );
        refs.forEach((file) => files.add(file));
      } else {
        const warning = `No enclosing type found in ${instructionName}; no references added.`;
        warnings.push(warning);
        await this.logger.debug(warning);
      }
    }

    // 6. Exclusions
    const excludes = new Set(config.flags.excludes);
    const finalFiles = [...files]
      .filter((file) => file === instructionPath || !excludes.has(path.basename(file)))
      .sort(compareCodePoints);
    await this.logger.debug(`Files in bundle (${finalFiles.length}): ${finalFiles.join(', ')}`);

    // 7. Contents and diffs
    const diffBranch = config.flags.diffWith;
    const git = diffBranch ? this.createGit(repoRoot) : undefined;
    if (git && diffBranch && !(await git.refExists(diffBranch))) {
      throw new UsageError(`Branch not found: ${diffBranch}`);
    }

    const bundleFiles = await mapLimit(
      finalFiles,
      config.settings.scan.concurrency,
      async (file): Promise<BundleFile> => ({
        path: file,
        content: await readTextOrEmpty(file, this.logger),
        diff: git && diffBranch ? await git.diffFileAgainst(diffBranch, file) : undefined,
      }),
    );

    // 8. Assemble
    const bundle = assembleBundle(
      { files: bundleFiles, instruction: instruction.marker.rawLine, diffBranch },
      {
        regions: {
          start: bundleSettings.regionStart,
          end: bundleSettings.regionEnd,
          placeholder: bundleSettings.regionPlaceholder,
        },
        sizeWarningThreshold: bundleSettings.sizeWarningThreshold,
      },
    );
    if (bundle.warning) {
      warnings.push(bundle.warning);
    }

    return {
      repoRoot,
      searchRoot,
      searchRoots,
      instruction,
      typeNames,
      files: finalFiles,
      bundle,
      warnings,
      config,
    };
  }
}
