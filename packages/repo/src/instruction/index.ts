export * from './marker';
export * from './locator';
