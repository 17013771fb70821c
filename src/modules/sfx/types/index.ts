export * from './error.types';
export * from './generation.types';
