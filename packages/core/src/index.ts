export const name = '@contextpack/core';

export * from './config/loader';
export * from './pipeline';
