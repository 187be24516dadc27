export * from './types/config';
export * from './schema';
export * from './flags';
export * from './env';
