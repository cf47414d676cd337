import { z } from 'zod';

const extension = z
  .string()
  .min(1)
  .transform((value) => value.replace(/^\./, '').toLowerCase());

export const ScanConfigSchema = z.object({
  /** Extra gitignore-style patterns skipped by every repository walk */
  ignore: z.array(z.string()).default([]),
  /** Build-artifact directory names */
  buildDirs: z.array(z.string().min(1)).default(['.build']),
  /** Dependency-vendor directory names */
  vendorDirs: z.array(z.string().min(1)).default(['Pods', 'node_modules']),
  /** Files read in parallel while matching */
  concurrency: z.number().int().positive().default(8),
});
export type ScanConfig = z.infer<typeof ScanConfigSchema>;

export const LanguagesConfigSchema = z.object({
  primaryExtension: extension.default('swift'),
  extensions: z.array(extension).min(1).default(['swift', 'h', 'm', 'js']),
  /** Instruction files with these extensions always run in singular mode */
  singularOnlyExtensions: z.array(extension).default(['js']),
  packageManifest: z.string().min(1).default('Package.swift'),
  declarationKeywords: z
    .array(z.string().regex(/^[A-Za-z]+$/, 'keywords must be alphabetic'))
    .min(1)
    .default(['class', 'struct', 'enum', 'protocol', 'typealias']),
});
export type LanguagesConfig = z.infer<typeof LanguagesConfigSchema>;

export const DEFAULT_SLIM_EXCLUDE_KEYWORDS = [
  'ViewController',
  'Manager',
  'Presenter',
  'Configurator',
  'Router',
  'DataSource',
  'Delegate',
  'View',
];

export const BundleConfigSchema = z.object({
  sizeWarningThreshold: z.number().int().positive().default(100_000),
  regionStart: z.string().min(1).default('// v'),
  regionEnd: z.string().min(1).default('// ^'),
  regionPlaceholder: z.string().default('// ...'),
  slimExcludeKeywords: z.array(z.string().min(1)).default(DEFAULT_SLIM_EXCLUDE_KEYWORDS),
});
export type BundleConfig = z.infer<typeof BundleConfigSchema>;

export const ConfigSchema = z
  .object({
    configVersion: z.literal(1).default(1),
    scan: ScanConfigSchema.default({}),
    languages: LanguagesConfigSchema.default({}),
    bundle: BundleConfigSchema.default({}),
  })
  .refine((data) => data.bundle.regionStart !== data.bundle.regionEnd, {
    message: 'regionStart and regionEnd must differ',
    path: ['bundle', 'regionEnd'],
  });

export type Config = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});
