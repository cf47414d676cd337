export * from './enclosing';
export * from './finder';
