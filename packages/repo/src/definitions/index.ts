export type { DefinitionResolver } from './types';
export * from './regex-resolver';
