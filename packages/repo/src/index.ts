export const name = '@contextpack/repo';

export * from './root';
export type { StageDeps } from './types';
export * from './scanner';
export { mapLimit } from './utils/parallel';
export * from './instruction';
export * from './symbols/extractor';
export * from './scope/resolver';
export * from './search/text-search';
export * from './definitions';
export * from './references';
export * from './git';
export * from './context';
