export const name = '@contextpack/shared';

export * from './logger';
export * from './errors';
export * from './config/schema';
export * from './config/run';
export * from './fs/path';
export * from './fs/io';
