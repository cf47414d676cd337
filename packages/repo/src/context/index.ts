export * from './types';
export * from './regions';
export * from './assembler';
